import { decode } from './decoder';
import type { DecodedOp } from './decoder';

const hex = (v: number, width: number) => v.toString(16).toUpperCase().padStart(width, '0');
const reg = (i: number) => `V${hex(i, 1)}`;
const imm = (v: number) => `0x${hex(v, 2)}`;
const addr = (v: number) => `0x${hex(v, 3)}`;

export function formatOpcode(op: number): string {
  return hex(op & 0xffff, 4);
}

export function disassembleDecoded(d: DecodedOp): string {
  switch (d.kind) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${addr(d.nnn)}`;
    case 'CALL': return `CALL ${addr(d.nnn)}`;
    case 'SE_VX_KK': return `SE ${reg(d.x)}, ${imm(d.kk)}`;
    case 'SNE_VX_KK': return `SNE ${reg(d.x)}, ${imm(d.kk)}`;
    case 'SE_VX_VY': return `SE ${reg(d.x)}, ${reg(d.y)}`;
    case 'LD_VX_KK': return `LD ${reg(d.x)}, ${imm(d.kk)}`;
    case 'ADD_VX_KK': return `ADD ${reg(d.x)}, ${imm(d.kk)}`;
    case 'LD_VX_VY': return `LD ${reg(d.x)}, ${reg(d.y)}`;
    case 'OR': return `OR ${reg(d.x)}, ${reg(d.y)}`;
    case 'AND': return `AND ${reg(d.x)}, ${reg(d.y)}`;
    case 'XOR': return `XOR ${reg(d.x)}, ${reg(d.y)}`;
    case 'ADD_VX_VY': return `ADD ${reg(d.x)}, ${reg(d.y)}`;
    case 'SUB': return `SUB ${reg(d.x)}, ${reg(d.y)}`;
    case 'SHR': return `SHR ${reg(d.x)}`;
    case 'SUBN': return `SUBN ${reg(d.x)}, ${reg(d.y)}`;
    case 'SHL': return `SHL ${reg(d.x)}`;
    case 'SNE_VX_VY': return `SNE ${reg(d.x)}, ${reg(d.y)}`;
    case 'LD_I': return `LD I, ${addr(d.nnn)}`;
    case 'JP_V0': return `JP V0, ${addr(d.nnn)}`;
    case 'RND': return `RND ${reg(d.x)}, ${imm(d.kk)}`;
    case 'DRW': return `DRW ${reg(d.x)}, ${reg(d.y)}, ${d.n}`;
    case 'SKP': return `SKP ${reg(d.x)}`;
    case 'SKNP': return `SKNP ${reg(d.x)}`;
    case 'LD_VX_DT': return `LD ${reg(d.x)}, DT`;
    case 'LD_VX_K': return `LD ${reg(d.x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${reg(d.x)}`;
    case 'LD_ST_VX': return `LD ST, ${reg(d.x)}`;
    case 'ADD_I_VX': return `ADD I, ${reg(d.x)}`;
    case 'LD_F_VX': return `LD F, ${reg(d.x)}`;
    case 'LD_B_VX': return `LD B, ${reg(d.x)}`;
    case 'LD_MEM_VX': return `LD [I], ${reg(d.x)}`;
    case 'LD_VX_MEM': return `LD ${reg(d.x)}, [I]`;
    case 'UNKNOWN': return `DW 0x${formatOpcode(d.op)}`;
  }
}

export function disassemble(op: number): string {
  return disassembleDecoded(decode(op));
}

export interface ListingLine {
  addr: number;
  op: number;
  text: string;
}

// Linear sweep over a program image loaded at `origin`. A trailing odd byte is listed as a byte.
export function disassembleProgram(program: Uint8Array, origin = 0x200): ListingLine[] {
  const out: ListingLine[] = [];
  for (let off = 0; off < program.length; off += 2) {
    if (off + 1 >= program.length) {
      out.push({ addr: origin + off, op: program[off], text: `DB 0x${hex(program[off], 2)}` });
      break;
    }
    const op = ((program[off] << 8) | program[off + 1]) & 0xffff;
    out.push({ addr: origin + off, op, text: disassemble(op) });
  }
  return out;
}
