import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { mkCpu, exec } from '../helpers/chip8Kit';

describe('8xyN arithmetic and logic', () => {
  it('8xy4 ADD carries out of 8 bits', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 0xff;
    state.V[2] = 0x01;
    exec(cpu, 0x8124);
    expect(state.V[1]).toBe(0x00);
    expect(state.V[0xf]).toBe(1);
    expect(state.PC).toBe(0x202);
  });

  it('8xy4 ADD without carry clears VF', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 0x10;
    state.V[2] = 0x20;
    state.V[0xf] = 1;
    exec(cpu, 0x8124);
    expect(state.V[1]).toBe(0x30);
    expect(state.V[0xf]).toBe(0);
  });

  it('8xy5 SUB wraps and reports borrow as VF=0', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 0x05;
    state.V[2] = 0x09;
    exec(cpu, 0x8125);
    expect(state.V[0xf]).toBe(0);
    expect(state.V[1]).toBe(0xfc);
  });

  it('8xy5 SUB sets VF only when Vx > Vy', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 9;
    state.V[2] = 5;
    exec(cpu, 0x8125);
    expect(state.V[1]).toBe(4);
    expect(state.V[0xf]).toBe(1);

    state.V[3] = 5;
    state.V[4] = 5;
    exec(cpu, 0x8345);
    expect(state.V[3]).toBe(0);
    expect(state.V[0xf]).toBe(0);
  });

  it('8xy6 SHR shifts out bit 0 into VF', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 0x05;
    exec(cpu, 0x8106);
    expect(state.V[0xf]).toBe(1);
    expect(state.V[1]).toBe(0x02);
  });

  it('8xy7 SUBN computes Vy - Vx', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 3;
    state.V[2] = 10;
    exec(cpu, 0x8127);
    expect(state.V[1]).toBe(7);
    expect(state.V[0xf]).toBe(1);

    state.V[1] = 10;
    state.V[2] = 3;
    exec(cpu, 0x8127);
    expect(state.V[1]).toBe(249);
    expect(state.V[0xf]).toBe(0);
  });

  it('8xyE SHL shifts out bit 7 into VF', () => {
    const { state, cpu } = mkCpu();
    state.V[1] = 0x81;
    exec(cpu, 0x810e);
    expect(state.V[1]).toBe(0x02);
    expect(state.V[0xf]).toBe(1);
  });

  it('8xy1/2/3 OR, AND, XOR', () => {
    const { state, cpu } = mkCpu();
    state.V[2] = 0x0a;
    state.V[1] = 0x0c;
    exec(cpu, 0x8121);
    expect(state.V[1]).toBe(0x0e);
    state.V[1] = 0x0c;
    exec(cpu, 0x8122);
    expect(state.V[1]).toBe(0x08);
    state.V[1] = 0x0c;
    exec(cpu, 0x8123);
    expect(state.V[1]).toBe(0x06);
    expect(state.PC).toBe(0x206);
  });

  it('8xy0 copies Vy into Vx', () => {
    const { state, cpu } = mkCpu();
    state.V[7] = 0x42;
    exec(cpu, 0x8370);
    expect(state.V[3]).toBe(0x42);
  });

  it('6xkk loads and 7xkk adds with wraparound, leaving VF alone', () => {
    const { state, cpu } = mkCpu();
    state.V[0xf] = 7;
    exec(cpu, 0x63fe);
    exec(cpu, 0x7305);
    expect(state.V[3]).toBe(0x03);
    expect(state.V[0xf]).toBe(7);
  });

  it('flag write lands after the result when VF is the destination', () => {
    const { state, cpu } = mkCpu();
    state.V[0xf] = 0xff;
    state.V[1] = 0x01;
    exec(cpu, 0x8f14);
    expect(state.V[0xf]).toBe(1);

    state.V[0xf] = 0x02;
    exec(cpu, 0x8f06);
    expect(state.V[0xf]).toBe(0);
  });

  it('ADD and SUB match a byte-wide model for all inputs', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const { state, cpu } = mkCpu();
        state.V[4] = a;
        state.V[5] = b;
        exec(cpu, 0x8454);
        expect(state.V[4]).toBe((a + b) & 0xff);
        expect(state.V[0xf]).toBe(a + b > 255 ? 1 : 0);

        state.V[4] = a;
        exec(cpu, 0x8455);
        expect(state.V[4]).toBe((a - b + 256) & 0xff);
        expect(state.V[0xf]).toBe(a > b ? 1 : 0);
      }),
      { numRuns: 300 }
    );
  });
});
