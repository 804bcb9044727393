export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Address = number; // 0..0xFFF

export interface IMemoryBus {
  read8(addr: Address): Byte;
  read16(addr: Address): Word; // big-endian: high byte at addr
  write8(addr: Address, value: Byte): void;
}

export interface IClocked {
  tick(): void; // advance one period of this component's clock
}

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // one instruction tick of the cycle driver
}
