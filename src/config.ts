import { TIMING } from './timing/rates';
import type { Quirks } from './cpu/executor';

export type FaultMode = 'halt' | 'throw';

export interface EmulatorConfig {
  instructionsPerSecond: number;
  timerHz: number;
  quirks: Quirks;
  traceEveryInstr: number; // 0 disables tracing
  onFault: FaultMode;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function defaultConfig(): EmulatorConfig {
  return {
    instructionsPerSecond: TIMING.defaultInstructionsPerSecond,
    timerHz: TIMING.timerHz,
    quirks: { addIOverflowSetsVF: false },
    traceEveryInstr: 0,
    onFault: 'halt',
  };
}

type Env = Record<string, string | undefined>;

// --key=value pairs; bare words are collected as positionals.
export function parseArgs(argv: readonly string[]): { options: Record<string, string>; positionals: string[] } {
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) options[m[1]] = m[2];
    else if (a.startsWith('--')) options[a.slice(2)] = '1';
    else positionals.push(a);
  }
  return { options, positionals };
}

export function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const v = raw.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return fallback;
}

function parseRate(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new ConfigError(`${name} must be a positive number, got ${raw}`);
  return n;
}

function parseFaultMode(raw: string | undefined, fallback: FaultMode): FaultMode {
  if (raw === 'halt' || raw === 'throw') return raw;
  return fallback;
}

function merge(base: EmulatorConfig, src: Record<string, string | undefined>, keys: {
  ips: string; timerHz: string; addiVf: string; trace: string; onFault: string;
}): EmulatorConfig {
  const trace = Number(src[keys.trace] ?? '');
  return {
    instructionsPerSecond: parseRate(keys.ips, src[keys.ips], base.instructionsPerSecond),
    timerHz: parseRate(keys.timerHz, src[keys.timerHz], base.timerHz),
    quirks: { addIOverflowSetsVF: parseFlag(src[keys.addiVf], base.quirks.addIOverflowSetsVF) },
    traceEveryInstr: Number.isFinite(trace) && src[keys.trace] !== undefined ? Math.max(0, Math.floor(trace)) : base.traceEveryInstr,
    onFault: parseFaultMode(src[keys.onFault], base.onFault),
  };
}

export function configFromEnv(env: Env, base: EmulatorConfig = defaultConfig()): EmulatorConfig {
  return merge(base, env, {
    ips: 'CHIP8_IPS',
    timerHz: 'CHIP8_TIMER_HZ',
    addiVf: 'CHIP8_ADDI_VF',
    trace: 'CHIP8_TRACE',
    onFault: 'CHIP8_ON_FAULT',
  });
}

export function configFromArgs(options: Record<string, string>, base: EmulatorConfig): EmulatorConfig {
  return merge(base, options, {
    ips: 'ips',
    timerHz: 'timerHz',
    addiVf: 'addiVf',
    trace: 'trace',
    onFault: 'onFault',
  });
}

// Environment first, then command-line overrides.
export function resolveConfig(env: Env, options: Record<string, string>): EmulatorConfig {
  return configFromArgs(options, configFromEnv(env));
}
