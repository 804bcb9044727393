// Clock constants. The timer cadence is fixed by the machine; the instruction rate is a host setting.
export interface Chip8Timing {
  readonly timerHz: number;
  readonly defaultInstructionsPerSecond: number;
  readonly maxCatchUpMs: number; // cap on wall-clock time replayed in one slice
}

export const TIMING: Chip8Timing = {
  timerHz: 60,
  defaultInstructionsPerSecond: 600,
  maxCatchUpMs: 250,
};

export function periodMs(hz: number): number {
  return 1000 / hz;
}
