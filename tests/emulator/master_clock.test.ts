import { describe, it, expect } from 'vitest';
import { MasterClock } from '../../src/emulator/masterClock';
import type { ClockEvent } from '../../src/emulator/masterClock';

function collect(clock: MasterClock, ms: number): ClockEvent[] {
  const events: ClockEvent[] = [];
  clock.advance(ms, (e) => { events.push(e); return true; });
  return events;
}

describe('MasterClock', () => {
  it('one timer period at 600/60 Hz yields ten instructions then a timer tick', () => {
    const clock = new MasterClock(600, 60);
    const events = collect(clock, 1000 / 60);
    expect(events).toEqual([...new Array<ClockEvent>(10).fill('instruction'), 'timer']);
  });

  it('tick counts depend only on accumulated time, not slice size', () => {
    const clock = new MasterClock(600, 60);
    for (let i = 0; i < 100; i++) collect(clock, 1);
    expect(clock.issuedInstructionTicks).toBe(60);
    expect(clock.issuedTimerTicks).toBe(6);

    const coarse = new MasterClock(600, 60);
    collect(coarse, 100);
    expect(coarse.issuedInstructionTicks).toBe(60);
    expect(coarse.issuedTimerTicks).toBe(6);
  });

  it('timer ticks are independent of the instruction rate', () => {
    for (const ips of [60, 600, 6000]) {
      const clock = new MasterClock(ips, 60);
      collect(clock, 1000);
      expect(clock.issuedTimerTicks).toBe(60);
      expect(clock.issuedInstructionTicks).toBe(ips);
    }
  });

  it('stops when the callback returns false and resumes on the next advance', () => {
    const clock = new MasterClock(600, 60);
    let seen = 0;
    clock.advance(1000 / 60, () => ++seen < 3);
    expect(seen).toBe(3);
    expect(clock.issuedInstructionTicks).toBe(3);

    const rest = collect(clock, 1000 / 60);
    expect(rest.filter((e) => e === 'instruction')).toHaveLength(17);
    expect(rest.filter((e) => e === 'timer')).toHaveLength(2);
  });

  it('ignores non-positive elapsed time', () => {
    const clock = new MasterClock(600, 60);
    expect(collect(clock, 0)).toEqual([]);
    expect(collect(clock, -5)).toEqual([]);
  });

  it('rejects non-positive rates', () => {
    expect(() => new MasterClock(0, 60)).toThrow(RangeError);
    expect(() => new MasterClock(600, -1)).toThrow(RangeError);
    expect(() => new MasterClock(Number.NaN, 60)).toThrow(RangeError);
  });

  it('reset starts the schedules over', () => {
    const clock = new MasterClock(600, 60);
    collect(clock, 50);
    clock.reset();
    expect(clock.issuedInstructionTicks).toBe(0);
    expect(clock.issuedTimerTicks).toBe(0);
    expect(collect(clock, 1000 / 60)).toHaveLength(11);
  });
});
