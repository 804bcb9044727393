import { describe, it, expect } from 'vitest';
import { ScriptedKeypad, parseKeyScript } from '../../src/input/keypad';

describe('ScriptedKeypad', () => {
  it('presses scripted keys on their tick and releases them after the hold', () => {
    const pad = new ScriptedKeypad([{ tick: 1, key: 2, hold: 2 }]);
    const p0 = pad.poll();
    expect(p0.keys.some((k) => k)).toBe(false);
    expect(p0.keyDowns).toEqual([]);

    const p1 = pad.poll();
    expect(p1.keys[2]).toBe(true);
    expect(p1.keyDowns).toEqual([2]);

    const p2 = pad.poll();
    expect(p2.keys[2]).toBe(true);
    expect(p2.keyDowns).toEqual([]);

    const p3 = pad.poll();
    expect(p3.keys[2]).toBe(false);
  });

  it('reports a manual press once as a key-down', () => {
    const pad = new ScriptedKeypad();
    pad.press(0xa);
    pad.press(0xa);
    expect(pad.poll().keyDowns).toEqual([0xa]);
    expect(pad.poll().keys[0xa]).toBe(true);
    pad.release(0xa);
    expect(pad.poll().keys[0xa]).toBe(false);
  });

  it('asks to quit after the tick budget or on request', () => {
    const pad = new ScriptedKeypad([], 2);
    expect(pad.poll().quit).toBe(false);
    expect(pad.poll().quit).toBe(false);
    expect(pad.poll().quit).toBe(true);

    const manual = new ScriptedKeypad();
    manual.requestQuit();
    expect(manual.poll().quit).toBe(true);
  });

  it('rejects keys outside 0x0-0xF', () => {
    expect(() => new ScriptedKeypad([{ tick: 0, key: 16 }])).toThrow(RangeError);
  });
});

describe('parseKeyScript', () => {
  it('parses tick:key[:hold] entries with hex keys', () => {
    expect(parseKeyScript('5:b, 10:3:4')).toEqual([
      { tick: 5, key: 0xb },
      { tick: 10, key: 3, hold: 4 },
    ]);
    expect(parseKeyScript('')).toEqual([]);
  });

  it('rejects malformed entries', () => {
    expect(() => parseKeyScript('5:g')).toThrow(SyntaxError);
    expect(() => parseKeyScript('x')).toThrow('bad key event "x" (expected tick:key[:hold])');
  });
});
