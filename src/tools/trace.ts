import type { MachineState } from '../machine/state';
import { disassemble, formatOpcode } from '../cpu/disasm';

const h = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// One line per executed instruction, state shown after execution:
// [TRACE] 0200: 6005  LD V0, 0x05  I=000 SP=0 DT=00 ST=00 V=05 00 00 ...
export function formatTraceLine(pc: number, op: number, s: MachineState): string {
  const text = disassemble(op).padEnd(16, ' ');
  const regs = Array.from(s.V, (v) => h(v, 2)).join(' ');
  return `[TRACE] ${h(pc, 4)}: ${formatOpcode(op)}  ${text} I=${h(s.I, 3)} SP=${s.SP} DT=${h(s.DT, 2)} ST=${h(s.ST, 2)} V=${regs}`;
}
