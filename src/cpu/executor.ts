import type { MachineState } from '../machine/state';
import { STACK_DEPTH, VF, KEY_COUNT } from '../machine/state';
import { LAST_ADDRESS, isAddressable, isWritable } from '../bus/memory';
import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from '../display/frame';
import { glyphAddress } from '../machine/font';
import type { DecodedOp, OpKind } from './decoder';
import type { FaultReason } from './faults';

// How the program counter moves after a handler returns. Only the cycle driver applies it.
export type PcDirective =
  | { kind: 'advance' }              // PC += 2
  | { kind: 'skip' }                 // PC += 4
  | { kind: 'jump'; target: number } // PC = target

export type ExecOutcome =
  | { kind: 'continue'; pc: PcDirective }
  | { kind: 'waitForKey'; register: number }
  | { kind: 'fault'; reason: FaultReason; detail: string }
  | { kind: 'unknown' };

export interface Quirks {
  // Fx1E: set VF when I + Vx leaves the 12-bit address space.
  addIOverflowSetsVF: boolean;
}

export interface ExecContext {
  random: () => number; // byte source, 0..255
  quirks: Quirks;
}

export const DEFAULT_QUIRKS: Quirks = { addIOverflowSetsVF: false };

export function mathRandomByte(): number {
  return Math.floor(Math.random() * 256) & 0xff;
}

type Handler = (s: MachineState, d: DecodedOp, ctx: ExecContext) => ExecOutcome;

const ADVANCE: ExecOutcome = { kind: 'continue', pc: { kind: 'advance' } };
const SKIP: ExecOutcome = { kind: 'continue', pc: { kind: 'skip' } };
const jump = (target: number): ExecOutcome => ({ kind: 'continue', pc: { kind: 'jump', target } });
const skipIf = (cond: boolean): ExecOutcome => (cond ? SKIP : ADVANCE);
const fault = (reason: FaultReason, detail: string): ExecOutcome => ({ kind: 'fault', reason, detail });
const hex = (v: number) => `0x${v.toString(16).padStart(3, '0')}`;

function checkJumpTarget(target: number): ExecOutcome | null {
  // PC and PC+1 must both be addressable at the next fetch.
  if (target >= LAST_ADDRESS) return fault('InvalidAddress', `jump target ${hex(target)} outside memory`);
  return null;
}

function checkRead(start: number, length: number): ExecOutcome | null {
  if (length <= 0) return null;
  if (!isAddressable(start) || !isAddressable(start + length - 1)) {
    return fault('InvalidAddress', `read of ${length} bytes at ${hex(start)} outside memory`);
  }
  return null;
}

function checkWrite(start: number, length: number): ExecOutcome | null {
  if (!isWritable(start) || !isWritable(start + length - 1)) {
    return fault('InvalidAddress', `write of ${length} bytes at ${hex(start)} outside program memory`);
  }
  return null;
}

// Flag-producing handlers write VF after the result register so VF reads back as the flag
// even when x == 0xF.
function setWithFlag(s: MachineState, x: number, value: number, flag: number): void {
  s.V[x] = value & 0xff;
  s.V[VF] = flag & 1;
}

function drawSprite(s: MachineState, d: DecodedOp): ExecOutcome {
  const bad = checkRead(s.I, d.n);
  if (bad) return bad;
  const x0 = s.V[d.x];
  const y0 = s.V[d.y];
  let collision = 0;
  for (let row = 0; row < d.n; row++) {
    const bits = s.memory.read8(s.I + row);
    const py = (y0 + row) % DISPLAY_HEIGHT;
    for (let col = 0; col < 8; col++) {
      if ((bits & (0x80 >> col)) === 0) continue;
      const idx = py * DISPLAY_WIDTH + ((x0 + col) % DISPLAY_WIDTH);
      if (s.gfx[idx]) collision = 1;
      s.gfx[idx] ^= 1;
    }
  }
  s.V[VF] = collision;
  s.drawFlag = true;
  return ADVANCE;
}

const HANDLERS: Record<Exclude<OpKind, 'UNKNOWN'>, Handler> = {
  CLS: (s) => {
    s.gfx.fill(0);
    s.drawFlag = true;
    return ADVANCE;
  },
  RET: (s) => {
    if (s.SP === 0) return fault('StackUnderflow', 'RET with empty stack');
    s.SP -= 1;
    // Stored return address already points past the CALL.
    return jump(s.stack[s.SP]);
  },
  JP: (_s, d) => checkJumpTarget(d.nnn) ?? jump(d.nnn),
  CALL: (s, d) => {
    if (s.SP >= STACK_DEPTH) return fault('StackOverflow', `CALL ${hex(d.nnn)} with ${s.SP} frames in use`);
    const bad = checkJumpTarget(d.nnn);
    if (bad) return bad;
    s.stack[s.SP] = (s.PC + 2) & 0xffff;
    s.SP += 1;
    return jump(d.nnn);
  },
  SE_VX_KK: (s, d) => skipIf(s.V[d.x] === d.kk),
  SNE_VX_KK: (s, d) => skipIf(s.V[d.x] !== d.kk),
  SE_VX_VY: (s, d) => skipIf(s.V[d.x] === s.V[d.y]),
  LD_VX_KK: (s, d) => {
    s.V[d.x] = d.kk;
    return ADVANCE;
  },
  ADD_VX_KK: (s, d) => {
    s.V[d.x] = (s.V[d.x] + d.kk) & 0xff;
    return ADVANCE;
  },
  LD_VX_VY: (s, d) => {
    s.V[d.x] = s.V[d.y];
    return ADVANCE;
  },
  OR: (s, d) => {
    s.V[d.x] = s.V[d.x] | s.V[d.y];
    return ADVANCE;
  },
  AND: (s, d) => {
    s.V[d.x] = s.V[d.x] & s.V[d.y];
    return ADVANCE;
  },
  XOR: (s, d) => {
    s.V[d.x] = s.V[d.x] ^ s.V[d.y];
    return ADVANCE;
  },
  ADD_VX_VY: (s, d) => {
    const sum = s.V[d.x] + s.V[d.y];
    setWithFlag(s, d.x, sum, sum > 0xff ? 1 : 0);
    return ADVANCE;
  },
  SUB: (s, d) => {
    const a = s.V[d.x];
    const b = s.V[d.y];
    setWithFlag(s, d.x, a - b, a > b ? 1 : 0);
    return ADVANCE;
  },
  SHR: (s, d) => {
    const v = s.V[d.x];
    setWithFlag(s, d.x, v >> 1, v & 1);
    return ADVANCE;
  },
  SUBN: (s, d) => {
    const a = s.V[d.x];
    const b = s.V[d.y];
    setWithFlag(s, d.x, b - a, b > a ? 1 : 0);
    return ADVANCE;
  },
  SHL: (s, d) => {
    const v = s.V[d.x];
    setWithFlag(s, d.x, v << 1, (v >> 7) & 1);
    return ADVANCE;
  },
  SNE_VX_VY: (s, d) => skipIf(s.V[d.x] !== s.V[d.y]),
  LD_I: (s, d) => {
    s.I = d.nnn;
    return ADVANCE;
  },
  JP_V0: (s, d) => {
    const target = s.V[0] + d.nnn;
    return checkJumpTarget(target) ?? jump(target);
  },
  RND: (s, d, ctx) => {
    s.V[d.x] = ctx.random() & d.kk & 0xff;
    return ADVANCE;
  },
  DRW: (s, d) => drawSprite(s, d),
  SKP: (s, d) => {
    const key = s.V[d.x];
    return skipIf(key < KEY_COUNT && s.keypad[key]);
  },
  SKNP: (s, d) => {
    const key = s.V[d.x];
    return skipIf(!(key < KEY_COUNT && s.keypad[key]));
  },
  LD_VX_DT: (s, d) => {
    s.V[d.x] = s.DT;
    return ADVANCE;
  },
  // The driver owns the suspension; the handler only names the target register.
  LD_VX_K: (_s, d) => ({ kind: 'waitForKey', register: d.x }),
  LD_DT_VX: (s, d) => {
    s.DT = s.V[d.x];
    return ADVANCE;
  },
  LD_ST_VX: (s, d) => {
    s.ST = s.V[d.x];
    return ADVANCE;
  },
  ADD_I_VX: (s, d, ctx) => {
    const sum = s.I + s.V[d.x];
    s.I = sum & 0xffff;
    if (ctx.quirks.addIOverflowSetsVF) s.V[VF] = sum > LAST_ADDRESS ? 1 : 0;
    return ADVANCE;
  },
  LD_F_VX: (s, d) => {
    s.I = glyphAddress(s.V[d.x]);
    return ADVANCE;
  },
  LD_B_VX: (s, d) => {
    const bad = checkWrite(s.I, 3);
    if (bad) return bad;
    const v = s.V[d.x];
    s.memory.write8(s.I, Math.floor(v / 100));
    s.memory.write8(s.I + 1, Math.floor(v / 10) % 10);
    s.memory.write8(s.I + 2, v % 10);
    return ADVANCE;
  },
  LD_MEM_VX: (s, d) => {
    const bad = checkWrite(s.I, d.x + 1);
    if (bad) return bad;
    for (let r = 0; r <= d.x; r++) s.memory.write8(s.I + r, s.V[r]);
    return ADVANCE;
  },
  LD_VX_MEM: (s, d) => {
    const bad = checkRead(s.I, d.x + 1);
    if (bad) return bad;
    for (let r = 0; r <= d.x; r++) s.V[r] = s.memory.read8(s.I + r);
    return ADVANCE;
  },
};

// Unknown opcodes leave the state untouched; the driver reports them and advances.
export function execute(s: MachineState, d: DecodedOp, ctx: ExecContext): ExecOutcome {
  if (d.kind === 'UNKNOWN') return { kind: 'unknown' };
  return HANDLERS[d.kind](s, d, ctx);
}
