import type { MachineSnapshot } from '../machine/state';

export type FaultReason = 'StackOverflow' | 'StackUnderflow' | 'InvalidAddress';

// Fatal execution fault, captured at the instruction that raised it.
export interface Fault {
  readonly reason: FaultReason;
  readonly opcode: number;
  readonly pc: number;
  readonly message: string;
  readonly snapshot: MachineSnapshot;
}

export class Chip8FaultError extends Error {
  constructor(public readonly fault: Fault) {
    super(`${fault.reason} at PC=0x${fault.pc.toString(16).padStart(3, '0')}: ${fault.message}`);
    this.name = 'Chip8FaultError';
  }
}
