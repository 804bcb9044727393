import type { IMemoryBus, Byte, Word, Address } from '../emulator/types';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START; // 3584 bytes
export const LAST_ADDRESS = MEMORY_SIZE - 1;

export function isAddressable(addr: number): boolean {
  return Number.isInteger(addr) && addr >= 0 && addr <= LAST_ADDRESS;
}

// Writable program/data area: the interpreter region below 0x200 is only populated at init.
export function isWritable(addr: number): boolean {
  return isAddressable(addr) && addr >= PROGRAM_START;
}

// 4 KiB flat RAM. Callers range-check; the bus itself masks to 12 bits.
export class Memory implements IMemoryBus {
  readonly bytes = new Uint8Array(MEMORY_SIZE);

  read8(addr: Address): Byte {
    return this.bytes[addr & LAST_ADDRESS];
  }

  read16(addr: Address): Word {
    const hi = this.bytes[addr & LAST_ADDRESS];
    const lo = this.bytes[(addr + 1) & LAST_ADDRESS];
    return ((hi << 8) | lo) & 0xffff;
  }

  write8(addr: Address, value: Byte): void {
    this.bytes[addr & LAST_ADDRESS] = value & 0xff;
  }

  // Bulk copy used during initialization (font table, ROM image).
  load(addr: Address, data: ArrayLike<number>): void {
    if (addr < 0 || addr + data.length > MEMORY_SIZE) {
      throw new RangeError(`load of ${data.length} bytes at 0x${addr.toString(16)} exceeds memory`);
    }
    for (let i = 0; i < data.length; i++) this.bytes[addr + i] = data[i] & 0xff;
  }

  slice(addr: Address, length: number): Uint8Array {
    const start = Math.max(0, addr);
    return this.bytes.slice(start, Math.min(MEMORY_SIZE, start + Math.max(0, length)));
  }

  clear(): void {
    this.bytes.fill(0);
  }
}
