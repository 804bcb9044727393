import type { FrameBuffer } from '../display/frame';

// FNV-1a 32-bit over a byte sequence.
export function fnv1a32(bytes: ArrayLike<number>): number {
  let hash = 0x811c9dc5 >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

export function toHex32(h: number): string {
  return (h >>> 0).toString(16).padStart(8, '0');
}

// Packs the 1-bit pixels eight to a byte (MSB = leftmost) before hashing.
export function frameHash(frame: FrameBuffer): string {
  const packed = new Uint8Array(Math.ceil(frame.length / 8));
  for (let i = 0; i < frame.length; i++) {
    if (frame[i]) packed[i >> 3] |= 0x80 >> (i & 7);
  }
  return toHex32(fnv1a32(packed));
}
