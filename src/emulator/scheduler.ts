import { KEY_COUNT } from '../machine/state';
import type { MachineState } from '../machine/state';
import type { Chip8CPU } from '../cpu/chip8Cpu';
import { Chip8FaultError } from '../cpu/faults';
import type { Fault } from '../cpu/faults';
import { disassemble, formatOpcode } from '../cpu/disasm';
import { CountdownTimers } from '../timing/countdown';
import { TIMING, periodMs } from '../timing/rates';
import { describeFault } from '../tools/dump';
import { formatTraceLine } from '../tools/trace';
import { consoleSink } from '../utils/log';
import type { LogSink } from '../utils/log';
import { MasterClock } from './masterClock';
import type { Boundaries } from './boundaries';
import type { FaultMode } from '../config';

export type HaltReason =
  | { kind: 'UserQuit' }
  | { kind: 'Fault'; fault: Fault };

export type DriverState =
  | { status: 'running' }
  | { status: 'waitingForKey'; register: number }
  | { status: 'halted'; reason: HaltReason };

export interface SchedulerOptions {
  instructionsPerSecond?: number;
  timerHz?: number;
  onFault?: FaultMode;
  traceEveryInstr?: number; // if >0, log machine state every N instructions
  log?: LogSink;
}

// Cycle driver: sole mutator of the machine state. Instruction ticks and timer ticks
// are separate schedules; timer decay never depends on how many instructions ran.
export class Scheduler {
  private current: DriverState = { status: 'running' };
  private readonly clock: MasterClock;
  private readonly timers: CountdownTimers;
  private readonly onFault: FaultMode;
  private readonly traceEveryInstr: number;
  private readonly log: LogSink;
  private toneOn = false;
  private execCount = 0;
  private framesPresented = 0;

  constructor(
    public readonly cpu: Chip8CPU,
    private readonly io: Boundaries = {},
    opts: SchedulerOptions = {},
  ) {
    this.clock = new MasterClock(
      opts.instructionsPerSecond ?? TIMING.defaultInstructionsPerSecond,
      opts.timerHz ?? TIMING.timerHz,
    );
    this.timers = new CountdownTimers(cpu.state);
    this.onFault = opts.onFault ?? 'halt';
    this.traceEveryInstr = Math.max(0, opts.traceEveryInstr ?? 0) | 0;
    this.log = opts.log ?? consoleSink;
  }

  get state(): MachineState { return this.cpu.state; }
  get driverState(): DriverState { return this.current; }
  get executedInstructions(): number { return this.execCount; }
  get presentedFrames(): number { return this.framesPresented; }
  get instructionsPerSecond(): number { return this.clock.instructionHz; }
  get timerHz(): number { return this.clock.timerHz; }

  isHalted(): boolean {
    return this.current.status === 'halted';
  }

  haltReason(): HaltReason | undefined {
    return this.current.status === 'halted' ? this.current.reason : undefined;
  }

  // Feeds elapsed wall-clock time through both schedules.
  advance(ms: number): void {
    if (this.isHalted()) return;
    this.clock.advance(ms, (event) => {
      if (event === 'instruction') this.tickInstruction();
      else this.tickTimer();
      return !this.isHalted();
    });
  }

  // One timer period: timerHz/instructionsPerSecond worth of instructions plus one timer tick.
  runFrame(): void {
    this.advance(periodMs(this.clock.timerHz));
  }

  tickInstruction(): void {
    if (this.isHalted()) return;
    const poll = this.io.input?.poll();
    if (poll) {
      for (let k = 0; k < KEY_COUNT; k++) this.state.keypad[k] = poll.keys[k] === true;
      if (poll.quit) {
        this.halt({ kind: 'UserQuit' });
        return;
      }
    }

    if (this.current.status === 'waitingForKey') {
      this.resumeWith(poll?.keyDowns);
    } else {
      this.execute();
      // A key that went down just before Fx0A completes it on the same tick.
      this.resumeWith(poll?.keyDowns);
    }
    this.afterTick();
  }

  tickTimer(): void {
    if (this.isHalted()) return;
    this.timers.tick();
    this.afterTick();
  }

  reset(): void {
    this.current = { status: 'running' };
    this.clock.reset();
    this.cpu.resetStats();
    this.execCount = 0;
    this.framesPresented = 0;
    this.setTone(false);
  }

  private resumeWith(keyDowns: readonly number[] | undefined): void {
    if (this.current.status !== 'waitingForKey') return;
    const key = keyDowns?.find((k) => Number.isInteger(k) && k >= 0 && k < KEY_COUNT);
    if (key === undefined) return;
    this.cpu.resumeWithKey(this.current.register, key);
    this.current = { status: 'running' };
  }

  private execute(): void {
    const res = this.cpu.step();
    switch (res.kind) {
      case 'executed':
        this.execCount++;
        if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) {
          this.log.info(formatTraceLine(res.pc, res.op, this.state));
        }
        break;
      case 'waitForKey':
        this.execCount++;
        this.current = { status: 'waitingForKey', register: res.register };
        break;
      case 'unknown':
        this.execCount++;
        this.log.warn(`[chip8] unknown opcode ${formatOpcode(res.op)} at PC=0x${res.pc.toString(16).padStart(3, '0')} (${disassemble(res.op)}), skipped`);
        break;
      case 'fault':
        this.halt({ kind: 'Fault', fault: res.fault });
        for (const line of describeFault(res.fault)) this.log.error(`[chip8] ${line}`);
        if (this.onFault === 'throw') throw new Chip8FaultError(res.fault);
        break;
    }
  }

  // Frame handoff and tone signalling after every tick.
  private afterTick(): void {
    const display = this.io.display;
    if (this.state.drawFlag && display && !this.isHalted()) {
      const quit = display.present(this.state.gfx.slice());
      this.framesPresented++;
      this.state.drawFlag = false;
      if (quit) {
        this.halt({ kind: 'UserQuit' });
        return;
      }
    }
    this.setTone(this.timers.toneActive() && !this.isHalted());
  }

  private setTone(on: boolean): void {
    if (on === this.toneOn) return;
    this.toneOn = on;
    this.io.audio?.setTone(on);
  }

  private halt(reason: HaltReason): void {
    this.current = { status: 'halted', reason };
    this.setTone(false);
  }
}
