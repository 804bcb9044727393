import type { InputBoundary, InputPoll } from '../emulator/boundaries';
import { KEY_COUNT } from '../machine/state';

export interface KeyEvent {
  tick: number; // poll index (instruction tick) at which the key goes down
  key: number; // 0x0-0xF
  hold?: number; // ticks held before release; default 1
}

// Keypad driven by a schedule keyed on poll count, plus manual press/release.
// Every poll is one instruction tick of the driver.
export class ScriptedKeypad implements InputBoundary {
  private readonly pressed = new Array<boolean>(KEY_COUNT).fill(false);
  private readonly releaseAt = new Map<number, number>();
  private readonly pendingDowns: number[] = [];
  private pollCount = 0;
  private quitRequested = false;

  constructor(private readonly script: readonly KeyEvent[] = [], private readonly quitAfterTicks = Infinity) {
    for (const ev of script) {
      if (!Number.isInteger(ev.key) || ev.key < 0 || ev.key >= KEY_COUNT) {
        throw new RangeError(`key out of range: ${ev.key}`);
      }
    }
  }

  get ticks(): number {
    return this.pollCount;
  }

  press(key: number): void {
    const k = key & 0xf;
    if (!this.pressed[k]) this.pendingDowns.push(k);
    this.pressed[k] = true;
  }

  release(key: number): void {
    this.pressed[key & 0xf] = false;
  }

  requestQuit(): void {
    this.quitRequested = true;
  }

  poll(): InputPoll {
    const tick = this.pollCount++;
    for (const [key, at] of this.releaseAt) {
      if (tick >= at) {
        this.pressed[key] = false;
        this.releaseAt.delete(key);
      }
    }
    for (const ev of this.script) {
      if (ev.tick !== tick) continue;
      this.press(ev.key);
      this.releaseAt.set(ev.key, tick + Math.max(1, ev.hold ?? 1));
    }
    const keyDowns = this.pendingDowns.splice(0, this.pendingDowns.length);
    return {
      keys: this.pressed.slice(),
      keyDowns,
      quit: this.quitRequested || this.pollCount > this.quitAfterTicks,
    };
  }
}

// "tick:key[:hold]" entries separated by commas; key is a hex digit.
export function parseKeyScript(text: string): KeyEvent[] {
  const out: KeyEvent[] = [];
  for (const part of text.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
    const m = part.match(/^(\d+):([0-9a-fA-F])(?::(\d+))?$/);
    if (!m) throw new SyntaxError(`bad key event "${part}" (expected tick:key[:hold])`);
    const ev: KeyEvent = { tick: Number(m[1]), key: parseInt(m[2], 16) };
    if (m[3] !== undefined) ev.hold = Number(m[3]);
    out.push(ev);
  }
  return out;
}
