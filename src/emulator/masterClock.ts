export type ClockEvent = 'instruction' | 'timer';

// Small tolerance so that e.g. 1000/60 ms at 600 Hz yields exactly 10 ticks despite float rounding.
const EPSILON = 1e-6;

// Two independent tick schedules multiplexed onto one elapsed-time accumulator.
// Each schedule's tick count depends only on elapsed time and its own rate.
export class MasterClock {
  private elapsedMs = 0;
  private instructionTicks = 0;
  private timerTicks = 0;

  constructor(public readonly instructionHz: number, public readonly timerHz: number) {
    if (!(instructionHz > 0) || !(timerHz > 0)) {
      throw new RangeError(`clock rates must be positive (instructionHz=${instructionHz}, timerHz=${timerHz})`);
    }
  }

  get issuedInstructionTicks(): number { return this.instructionTicks; }
  get issuedTimerTicks(): number { return this.timerTicks; }

  // Emits every tick that has come due, earliest first; an instruction tick that coincides
  // with a timer tick is emitted first. Returning false from onTick stops the replay.
  advance(ms: number, onTick: (event: ClockEvent) => boolean): void {
    if (!(ms > 0)) return;
    this.elapsedMs += ms;
    const dueInstr = Math.floor((this.elapsedMs * this.instructionHz) / 1000 + EPSILON);
    const dueTimer = Math.floor((this.elapsedMs * this.timerHz) / 1000 + EPSILON);
    while (this.instructionTicks < dueInstr || this.timerTicks < dueTimer) {
      const instrPending = this.instructionTicks < dueInstr;
      const timerPending = this.timerTicks < dueTimer;
      // Compare (i+1)/instrHz <= (t+1)/timerHz without division.
      const instrFirst = instrPending &&
        (!timerPending || (this.instructionTicks + 1) * this.timerHz <= (this.timerTicks + 1) * this.instructionHz);
      if (instrFirst) {
        this.instructionTicks++;
        if (!onTick('instruction')) return;
      } else {
        this.timerTicks++;
        if (!onTick('timer')) return;
      }
    }
  }

  reset(): void {
    this.elapsedMs = 0;
    this.instructionTicks = 0;
    this.timerTicks = 0;
  }
}
