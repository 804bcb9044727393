import fs from 'fs';
import { MAX_PROGRAM_SIZE } from '../bus/memory';

export type RomLoadErrorKind = 'io' | 'oversize';

export class RomLoadError extends Error {
  constructor(public readonly kind: RomLoadErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RomLoadError';
  }
}

// Program images are copied verbatim to 0x200, so they must fit in the 3584 bytes above it.
export function validateRom(raw: Uint8Array): Uint8Array {
  if (raw.length > MAX_PROGRAM_SIZE) {
    throw new RomLoadError('oversize', `ROM is ${raw.length} bytes; at most ${MAX_PROGRAM_SIZE} fit above 0x200`);
  }
  return raw;
}

export function loadRomFile(path: string): Uint8Array {
  let raw: Buffer;
  try {
    raw = fs.readFileSync(path);
  } catch (e) {
    throw new RomLoadError('io', `cannot read ROM ${path}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  return validateRom(new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength));
}
