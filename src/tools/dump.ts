import type { MachineSnapshot } from '../machine/state';
import type { Fault } from '../cpu/faults';
import { disassemble, formatOpcode } from '../cpu/disasm';

const h = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

export function formatRegisters(s: MachineSnapshot): string[] {
  const lines: string[] = [];
  lines.push(`PC=${h(s.PC, 3)} SP=${s.SP} I=${h(s.I, 3)} DT=${h(s.DT, 2)} ST=${h(s.ST, 2)}`);
  lines.push(`Stack: [${s.stack.map((a) => h(a, 3)).join(' ')}]`);
  const regs: string[] = [];
  for (let i = 0; i < s.V.length; i++) regs.push(`V${h(i, 1)}=${h(s.V[i], 2)}`);
  lines.push(regs.slice(0, 8).join(' '));
  lines.push(regs.slice(8).join(' '));
  return lines;
}

// Classic 16-bytes-per-row dump with the row's start address.
export function hexDump(bytes: Uint8Array, origin = 0, width = 16): string[] {
  const rows: string[] = [];
  for (let off = 0; off < bytes.length; off += width) {
    const chunk = Array.from(bytes.subarray(off, off + width), (b) => h(b, 2));
    rows.push(`${h(origin + off, 3)}: ${chunk.join(' ')}`);
  }
  return rows;
}

export function describeFault(f: Fault): string[] {
  return [
    `${f.reason}: ${f.message}`,
    `  at PC=${h(f.pc, 3)} opcode=${formatOpcode(f.opcode)} (${disassemble(f.opcode)})`,
    ...formatRegisters(f.snapshot).map((l) => `  ${l}`),
  ];
}
