import { describe, it, expect } from 'vitest';
import { parseArgs, parseFlag, defaultConfig, configFromEnv, resolveConfig, ConfigError } from '../../src/config';

describe('configuration', () => {
  it('defaults to 600 instructions per second and 60 Hz timers', () => {
    expect(defaultConfig()).toEqual({
      instructionsPerSecond: 600,
      timerHz: 60,
      quirks: { addIOverflowSetsVF: false },
      traceEveryInstr: 0,
      onFault: 'halt',
    });
  });

  it('reads CHIP8_* environment variables', () => {
    const cfg = configFromEnv({
      CHIP8_IPS: '1200',
      CHIP8_TIMER_HZ: '50',
      CHIP8_ADDI_VF: 'yes',
      CHIP8_TRACE: '5',
      CHIP8_ON_FAULT: 'throw',
    });
    expect(cfg).toEqual({
      instructionsPerSecond: 1200,
      timerHz: 50,
      quirks: { addIOverflowSetsVF: true },
      traceEveryInstr: 5,
      onFault: 'throw',
    });
  });

  it('keeps the default fault mode for an unknown value', () => {
    expect(configFromEnv({ CHIP8_ON_FAULT: 'explode' }).onFault).toBe('halt');
  });

  it('rejects rates that are not positive numbers', () => {
    expect(() => configFromEnv({ CHIP8_IPS: '0' })).toThrow(ConfigError);
    expect(() => configFromEnv({ CHIP8_TIMER_HZ: '-60' })).toThrow('CHIP8_TIMER_HZ must be a positive number, got -60');
    expect(() => configFromEnv({ CHIP8_IPS: 'fast' })).toThrow('CHIP8_IPS must be a positive number, got fast');
    expect(() => resolveConfig({}, { ips: 'Infinity' })).toThrow(ConfigError);
    expect(() => resolveConfig({}, parseArgs(['--ips=-5']).options)).toThrow('ips must be a positive number, got -5');
  });

  it('lets command-line options override the environment', () => {
    const { options } = parseArgs(['--ips=900', '--addiVf']);
    const cfg = resolveConfig({ CHIP8_IPS: '1200' }, options);
    expect(cfg.instructionsPerSecond).toBe(900);
    expect(cfg.quirks.addIOverflowSetsVF).toBe(true);
  });

  it('parseArgs splits options from positionals', () => {
    expect(parseArgs(['--rom=a.ch8', '--realtime', 'b.ch8'])).toEqual({
      options: { rom: 'a.ch8', realtime: '1' },
      positionals: ['b.ch8'],
    });
  });

  it('parseFlag accepts the usual spellings', () => {
    expect(parseFlag('ON', false)).toBe(true);
    expect(parseFlag('0', true)).toBe(false);
    expect(parseFlag('maybe', true)).toBe(true);
    expect(parseFlag(undefined, false)).toBe(false);
  });
});
