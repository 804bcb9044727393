import { Memory, PROGRAM_START, isAddressable } from '../bus/memory';
import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from '../display/frame';
import { FONT_BASE, FONT_TABLE } from './font';

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const KEY_COUNT = 16;
export const VF = 0xf;

export interface MachineSnapshot {
  PC: number;
  SP: number;
  I: number;
  DT: number;
  ST: number;
  V: number[];
  stack: number[]; // used slots only, bottom first
}

// Complete VM state. Owned by one cycle driver; handlers receive it by reference.
export class MachineState {
  readonly memory = new Memory();
  readonly V = new Uint8Array(REGISTER_COUNT);
  readonly stack = new Uint16Array(STACK_DEPTH);
  readonly gfx = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  readonly keypad: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);

  public PC = PROGRAM_START;
  public SP = 0; // count of used stack slots
  public I = 0; // kept wider than 12 bits; range-checked at use
  public DT = 0;
  public ST = 0;
  public drawFlag = false;
  public romSize = 0;

  constructor() {
    this.reset();
  }

  // Power-on state: cleared RAM with the font table, PC at 0x200. Program bytes are not kept.
  reset(): void {
    this.memory.clear();
    this.memory.load(FONT_BASE, FONT_TABLE);
    this.V.fill(0);
    this.stack.fill(0);
    this.gfx.fill(0);
    this.keypad.fill(false);
    this.PC = PROGRAM_START;
    this.SP = 0;
    this.I = 0;
    this.DT = 0;
    this.ST = 0;
    this.drawFlag = false;
    this.romSize = 0;
  }

  // Copies program bytes verbatim to 0x200. Size validation belongs to the ROM loader.
  loadProgram(program: Uint8Array): void {
    this.memory.load(PROGRAM_START, program);
    this.romSize = program.length;
  }

  snapshot(): MachineSnapshot {
    return {
      PC: this.PC,
      SP: this.SP,
      I: this.I,
      DT: this.DT,
      ST: this.ST,
      V: Array.from(this.V),
      stack: Array.from(this.stack.subarray(0, Math.min(this.SP, STACK_DEPTH))),
    };
  }

  // Lists violated structural invariants; empty when the state is consistent.
  checkInvariants(): string[] {
    const problems: string[] = [];
    if (!Number.isInteger(this.SP) || this.SP < 0 || this.SP > STACK_DEPTH) problems.push(`SP out of range: ${this.SP}`);
    if (!isAddressable(this.PC) || !isAddressable(this.PC + 1)) problems.push(`PC not fetchable: 0x${this.PC.toString(16)}`);
    if (this.DT < 0 || this.DT > 0xff) problems.push(`DT out of range: ${this.DT}`);
    if (this.ST < 0 || this.ST > 0xff) problems.push(`ST out of range: ${this.ST}`);
    if (this.I < 0) problems.push(`I negative: ${this.I}`);
    return problems;
  }
}
