import { MachineState } from '../../src/machine/state';
import { Chip8CPU } from '../../src/cpu/chip8Cpu';
import type { CpuOptions, StepResult } from '../../src/cpu/chip8Cpu';
import type { LogSink } from '../../src/utils/log';

// Big-endian byte image of a list of opcode words.
export function words(...ops: number[]): Uint8Array {
  const out = new Uint8Array(ops.length * 2);
  ops.forEach((op, i) => {
    out[i * 2] = (op >> 8) & 0xff;
    out[i * 2 + 1] = op & 0xff;
  });
  return out;
}

export function mkCpu(ops: number[] = [], opts: CpuOptions = {}): { state: MachineState; cpu: Chip8CPU } {
  const state = new MachineState();
  if (ops.length > 0) state.loadProgram(words(...ops));
  return { state, cpu: new Chip8CPU(state, opts) };
}

// Places `op` at the current PC and runs one step.
export function exec(cpu: Chip8CPU, op: number): StepResult {
  const pc = cpu.state.PC;
  cpu.state.memory.write8(pc, (op >> 8) & 0xff);
  cpu.state.memory.write8(pc + 1, op & 0xff);
  return cpu.step();
}

export interface CapturedLog extends LogSink {
  lines: { level: 'info' | 'warn' | 'error'; msg: string }[];
}

export function captureLog(): CapturedLog {
  const lines: CapturedLog['lines'] = [];
  return {
    lines,
    info: (msg) => { lines.push({ level: 'info', msg }); },
    warn: (msg) => { lines.push({ level: 'warn', msg }); },
    error: (msg) => { lines.push({ level: 'error', msg }); },
  };
}
