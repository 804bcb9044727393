import type { MachineState } from '../machine/state';
import { PROGRAM_START, isAddressable } from '../bus/memory';
import { decode } from './decoder';
import { execute, DEFAULT_QUIRKS, mathRandomByte } from './executor';
import type { ExecContext, PcDirective, Quirks } from './executor';
import type { Fault, FaultReason } from './faults';

export type StepResult =
  | { kind: 'executed'; pc: number; op: number }
  | { kind: 'waitForKey'; pc: number; op: number; register: number }
  | { kind: 'unknown'; pc: number; op: number }
  | { kind: 'fault'; fault: Fault };

export interface CpuOptions {
  random?: () => number;
  quirks?: Partial<Quirks>;
}

// Fetch, decode, execute, then apply the handler's PC directive.
export class Chip8CPU {
  private readonly ctx: ExecContext;
  private unknownOpCounts = new Map<number, number>();

  constructor(public readonly state: MachineState, opts: CpuOptions = {}) {
    this.ctx = {
      random: opts.random ?? mathRandomByte,
      quirks: { ...DEFAULT_QUIRKS, ...opts.quirks },
    };
  }

  get quirks(): Quirks {
    return this.ctx.quirks;
  }

  // Opcode fetches are confined to the program area, with both bytes addressable.
  canFetch(pc: number): boolean {
    return pc >= PROGRAM_START && isAddressable(pc) && isAddressable(pc + 1);
  }

  fetch(pc: number): number {
    return this.state.memory.read16(pc);
  }

  step(): StepResult {
    const s = this.state;
    const pc = s.PC;
    if (!this.canFetch(pc)) {
      const op = isAddressable(pc) ? this.fetch(pc) : 0;
      return { kind: 'fault', fault: this.makeFault('InvalidAddress', op, pc, `cannot fetch opcode at 0x${pc.toString(16)}`) };
    }
    const op = this.fetch(pc);
    const d = decode(op);
    const out = execute(s, d, this.ctx);
    switch (out.kind) {
      case 'continue':
        this.applyDirective(out.pc);
        return { kind: 'executed', pc, op };
      case 'waitForKey':
        // PC stays on the Fx0A until a key arrives.
        return { kind: 'waitForKey', pc, op, register: out.register };
      case 'unknown':
        this.unknownOpCounts.set(op, (this.unknownOpCounts.get(op) ?? 0) + 1);
        this.applyDirective({ kind: 'advance' });
        return { kind: 'unknown', pc, op };
      case 'fault':
        return { kind: 'fault', fault: this.makeFault(out.reason, op, pc, out.detail) };
    }
  }

  // Completes a suspended Fx0A.
  resumeWithKey(register: number, key: number): void {
    this.state.V[register & 0xf] = key & 0xf;
    this.applyDirective({ kind: 'advance' });
  }

  applyDirective(dir: PcDirective): void {
    const s = this.state;
    switch (dir.kind) {
      case 'advance': s.PC = s.PC + 2; break;
      case 'skip': s.PC = s.PC + 4; break;
      case 'jump': s.PC = dir.target; break;
    }
  }

  getUnknownOpcodeStats(): { op: number; count: number }[] {
    const out = Array.from(this.unknownOpCounts, ([op, count]) => ({ op, count }));
    out.sort((a, b) => b.count - a.count);
    return out;
  }

  resetStats(): void {
    this.unknownOpCounts = new Map();
  }

  private makeFault(reason: FaultReason, opcode: number, pc: number, message: string): Fault {
    return { reason, opcode, pc, message, snapshot: this.state.snapshot() };
  }
}
