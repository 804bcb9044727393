import { MachineState } from '../machine/state';
import { Chip8CPU } from '../cpu/chip8Cpu';
import { validateRom } from '../cart/loader';
import { defaultConfig } from '../config';
import type { EmulatorConfig } from '../config';
import type { LogSink } from '../utils/log';
import type { Boundaries } from './boundaries';
import type { IEmulator } from './types';
import { Scheduler } from './scheduler';

export interface EmulatorOptions {
  config?: EmulatorConfig;
  io?: Boundaries;
  random?: () => number;
  log?: LogSink;
}

export class Emulator implements IEmulator {
  constructor(
    public readonly state: MachineState,
    public readonly cpu: Chip8CPU,
    public readonly scheduler: Scheduler,
    private readonly program: Uint8Array,
  ) {}

  // Throws RomLoadError before any state is built when the image does not fit.
  static fromRom(rom: Uint8Array, opts: EmulatorOptions = {}): Emulator {
    const program = validateRom(rom).slice();
    const config = opts.config ?? defaultConfig();
    const state = new MachineState();
    state.loadProgram(program);
    const cpu = new Chip8CPU(state, { random: opts.random, quirks: config.quirks });
    const scheduler = new Scheduler(cpu, opts.io, {
      instructionsPerSecond: config.instructionsPerSecond,
      timerHz: config.timerHz,
      onFault: config.onFault,
      traceEveryInstr: config.traceEveryInstr,
      log: opts.log,
    });
    return new Emulator(state, cpu, scheduler, program);
  }

  reset(): void {
    this.state.reset();
    this.state.loadProgram(this.program);
    this.scheduler.reset();
  }

  stepInstruction(): void {
    this.scheduler.tickInstruction();
  }
}
