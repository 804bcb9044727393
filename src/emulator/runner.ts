import { TIMING } from '../timing/rates';
import type { HaltReason, Scheduler } from './scheduler';

export interface RealtimeOptions {
  now?: () => number; // milliseconds
  sleep?: (ms: number) => Promise<void>;
  sliceMs?: number; // pause between slices
  maxCatchUpMs?: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Accumulated-time stepping against the wall clock. Resolves with the halt reason;
// rejects if the scheduler throws (onFault: 'throw').
export async function runRealtime(sched: Scheduler, opts: RealtimeOptions = {}): Promise<HaltReason> {
  const now = opts.now ?? (() => performance.now());
  const sleep = opts.sleep ?? defaultSleep;
  const sliceMs = Math.max(0, opts.sliceMs ?? 1);
  const maxCatchUp = Math.max(1, opts.maxCatchUpMs ?? TIMING.maxCatchUpMs);

  let last = now();
  for (;;) {
    const reason = sched.haltReason();
    if (reason) return reason;
    await sleep(sliceMs);
    const t = now();
    // Replays at most maxCatchUp per slice.
    const elapsed = Math.min(Math.max(0, t - last), maxCatchUp);
    last = t;
    sched.advance(elapsed);
  }
}
