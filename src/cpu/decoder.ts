// Opcode field extraction and family identification.
// Dispatch is keyed by the high nibble; families 0, 5, 8, 9, E and F are
// narrowed by a secondary match on the low nibble or low byte.

export type OpKind =
  | 'CLS' | 'RET' | 'JP' | 'CALL'
  | 'SE_VX_KK' | 'SNE_VX_KK' | 'SE_VX_VY' | 'LD_VX_KK' | 'ADD_VX_KK'
  | 'LD_VX_VY' | 'OR' | 'AND' | 'XOR' | 'ADD_VX_VY' | 'SUB' | 'SHR' | 'SUBN' | 'SHL'
  | 'SNE_VX_VY' | 'LD_I' | 'JP_V0' | 'RND' | 'DRW' | 'SKP' | 'SKNP'
  | 'LD_VX_DT' | 'LD_VX_K' | 'LD_DT_VX' | 'LD_ST_VX' | 'ADD_I_VX'
  | 'LD_F_VX' | 'LD_B_VX' | 'LD_MEM_VX' | 'LD_VX_MEM'
  | 'UNKNOWN';

export interface DecodedOp {
  readonly op: number;
  readonly kind: OpKind;
  readonly x: number;   // (op & 0x0F00) >> 8
  readonly y: number;   // (op & 0x00F0) >> 4
  readonly nnn: number; // op & 0x0FFF
  readonly kk: number;  // op & 0x00FF
  readonly n: number;   // op & 0x000F
}

type FamilyMatcher = (op: number) => OpKind;

const ALU_BY_LOW_NIBBLE: Partial<Record<number, OpKind>> = {
  0x0: 'LD_VX_VY',
  0x1: 'OR',
  0x2: 'AND',
  0x3: 'XOR',
  0x4: 'ADD_VX_VY',
  0x5: 'SUB',
  0x6: 'SHR',
  0x7: 'SUBN',
  0xe: 'SHL',
};

const MISC_BY_LOW_BYTE: Partial<Record<number, OpKind>> = {
  0x07: 'LD_VX_DT',
  0x0a: 'LD_VX_K',
  0x15: 'LD_DT_VX',
  0x18: 'LD_ST_VX',
  0x1e: 'ADD_I_VX',
  0x29: 'LD_F_VX',
  0x33: 'LD_B_VX',
  0x55: 'LD_MEM_VX',
  0x65: 'LD_VX_MEM',
};

const FAMILIES: readonly FamilyMatcher[] = [
  /* 0 */ (op) => (op === 0x00e0 ? 'CLS' : op === 0x00ee ? 'RET' : 'UNKNOWN'),
  /* 1 */ () => 'JP',
  /* 2 */ () => 'CALL',
  /* 3 */ () => 'SE_VX_KK',
  /* 4 */ () => 'SNE_VX_KK',
  /* 5 */ (op) => ((op & 0x000f) === 0 ? 'SE_VX_VY' : 'UNKNOWN'),
  /* 6 */ () => 'LD_VX_KK',
  /* 7 */ () => 'ADD_VX_KK',
  /* 8 */ (op) => ALU_BY_LOW_NIBBLE[op & 0x000f] ?? 'UNKNOWN',
  /* 9 */ (op) => ((op & 0x000f) === 0 ? 'SNE_VX_VY' : 'UNKNOWN'),
  /* A */ () => 'LD_I',
  /* B */ () => 'JP_V0',
  /* C */ () => 'RND',
  /* D */ () => 'DRW',
  /* E */ (op) => ((op & 0x00ff) === 0x9e ? 'SKP' : (op & 0x00ff) === 0xa1 ? 'SKNP' : 'UNKNOWN'),
  /* F */ (op) => MISC_BY_LOW_BYTE[op & 0x00ff] ?? 'UNKNOWN',
];

export function identify(op: number): OpKind {
  const w = op & 0xffff;
  return FAMILIES[(w & 0xf000) >>> 12](w);
}

// Never fails: words outside the instruction set decode to kind 'UNKNOWN'.
export function decode(op: number): DecodedOp {
  const w = op & 0xffff;
  return {
    op: w,
    kind: identify(w),
    x: (w & 0x0f00) >> 8,
    y: (w & 0x00f0) >> 4,
    nnn: w & 0x0fff,
    kk: w & 0x00ff,
    n: w & 0x000f,
  };
}
