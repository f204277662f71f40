/**
 * Timing primitives for the paradigm runner
 *
 * Every duration is measured against the monotonic clock. Periodic work is
 * scheduled against an accumulating "next fire time" so that late ticks never
 * push the whole schedule back.
 */

import { format } from 'date-fns';
import type { Clock, TimestampPair } from '@/types';

/** Tick interval for event-loop driven countdowns */
export const UI_TICK_INTERVAL_MS = 50;
/** Poll interval for sleep-poll countdowns and waits */
export const POLL_INTERVAL_MS = 10;

export const systemClock: Clock = {
  wallNow: () => new Date(),
  monotonicMs: () => performance.now(),
};

export function formatWallTime(date: Date): string {
  return format(date, "yyyy-MM-dd'T'HH:mm:ss.SSSxxx");
}

// =========================================================================
// STOPWATCH
// =========================================================================

export class Stopwatch {
  private readonly clock: Clock;
  private startWall: Date;
  private startMonotonic: number;
  private lastElapsedS = 0;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
    this.startWall = clock.wallNow();
    this.startMonotonic = clock.monotonicMs();
  }

  reset(): void {
    this.startWall = this.clock.wallNow();
    this.startMonotonic = this.clock.monotonicMs();
    this.lastElapsedS = 0;
  }

  get startWallTime(): Date {
    return this.startWall;
  }

  elapsedSeconds(): number {
    const elapsed = (this.clock.monotonicMs() - this.startMonotonic) / 1000;
    this.lastElapsedS = Math.max(this.lastElapsedS, elapsed);
    return this.lastElapsedS;
  }

  elapsedMs(): number {
    return Math.floor(this.elapsedSeconds() * 1000);
  }

  /** Both clocks read back to back, with no suspension point in between */
  timestampPair(): TimestampPair {
    return { wall: this.clock.wallNow(), elapsedS: this.elapsedSeconds() };
  }
}

// =========================================================================
// SCHEDULING HELPERS
// =========================================================================

/**
 * Fixed-period schedule. `advance` moves one slot at a time so a delayed
 * consumer catches up slot by slot; `advancePast` drops missed slots.
 */
export class PeriodicSchedule {
  readonly periodMs: number;
  private nextAtMs: number;

  constructor(periodMs: number, firstAtMs: number) {
    if (!(periodMs > 0)) {
      throw new RangeError(`Schedule period must be positive, got ${periodMs}`);
    }
    this.periodMs = periodMs;
    this.nextAtMs = firstAtMs;
  }

  isDue(nowMs: number): boolean {
    return nowMs >= this.nextAtMs;
  }

  advance(): number {
    this.nextAtMs += this.periodMs;
    return this.nextAtMs;
  }

  advancePast(nowMs: number): number {
    while (this.nextAtMs <= nowMs) {
      this.nextAtMs += this.periodMs;
    }
    return this.nextAtMs;
  }

  delayFrom(nowMs: number): number {
    return Math.max(0, this.nextAtMs - nowMs);
  }
}

/** Remaining time of a fixed duration, rounded up to the millisecond */
export class Deadline {
  private readonly clock: Clock;
  private readonly startMs: number;
  private readonly totalMs: number;

  constructor(durationS: number, clock: Clock) {
    this.clock = clock;
    this.startMs = clock.monotonicMs();
    // microsecond rounding keeps 1.1 s from turning into 1101 ms
    this.totalMs = Math.round(Math.max(0, durationS) * 1_000_000) / 1000;
  }

  remainingMs(nowMs: number = this.clock.monotonicMs()): number {
    return Math.max(0, Math.ceil(this.totalMs - (nowMs - this.startMs)));
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// =========================================================================
// COUNTDOWNS
// =========================================================================

export interface CountdownOptions {
  durationS: number;
  onTick: (remainingMs: number) => void;
  onFinished?: () => void;
  shouldAbort?: () => boolean;
  clock?: Clock;
}

export interface CountdownHandle {
  cancel(): void;
  readonly active: boolean;
}

/**
 * Event-loop driven countdown. Ticks immediately with the full duration,
 * then on every `intervalMs` tick until the remaining time reaches zero.
 * `onFinished` only fires on natural completion.
 */
export function startCountdownTimer(
  options: CountdownOptions & { intervalMs?: number }
): CountdownHandle {
  const clock = options.clock ?? systemClock;
  const intervalMs = options.intervalMs ?? UI_TICK_INTERVAL_MS;
  const deadline = new Deadline(options.durationS, clock);
  const ticks = new PeriodicSchedule(intervalMs, clock.monotonicMs() + intervalMs);
  let timer: ReturnType<typeof setTimeout> | null = null;
  let active = true;

  const stop = (): void => {
    active = false;
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const handle: CountdownHandle = {
    cancel: stop,
    get active() { return active; },
  };

  if (options.shouldAbort?.()) {
    stop();
    return handle;
  }

  const initialMs = deadline.remainingMs();
  options.onTick(initialMs);

  const handleTick = (): void => {
    timer = null;
    if (!active) return;
    if (options.shouldAbort?.()) {
      stop();
      return;
    }
    const now = clock.monotonicMs();
    const remaining = deadline.remainingMs(now);
    options.onTick(remaining);
    if (!active) return;
    if (remaining <= 0) {
      stop();
      options.onFinished?.();
      return;
    }
    ticks.advancePast(now);
    timer = setTimeout(handleTick, ticks.delayFrom(now));
  };

  if (!active) return handle;
  if (initialMs <= 0) {
    // zero or negative durations tick once, then finish on the next turn
    timer = setTimeout(() => {
      timer = null;
      if (!active) return;
      stop();
      if (!options.shouldAbort?.()) options.onFinished?.();
    }, 0);
    return handle;
  }
  timer = setTimeout(handleTick, ticks.delayFrom(clock.monotonicMs()));
  return handle;
}

export type CountdownResult = 'finished' | 'aborted';

/**
 * Sleep-poll countdown. Yields to the event loop between polls so abort
 * input stays responsive; repeated values are not re-emitted.
 */
export async function runPollingCountdown(
  options: CountdownOptions & { stepMs?: number; signal?: AbortSignal }
): Promise<CountdownResult> {
  const clock = options.clock ?? systemClock;
  const stepMs = options.stepMs ?? POLL_INTERVAL_MS;
  const deadline = new Deadline(options.durationS, clock);
  const polls = new PeriodicSchedule(stepMs, clock.monotonicMs() + stepMs);
  const aborted = (): boolean => (options.signal?.aborted ?? false) || (options.shouldAbort?.() ?? false);
  let lastMs: number | null = null;

  for (;;) {
    if (aborted()) return 'aborted';
    const now = clock.monotonicMs();
    const remaining = deadline.remainingMs(now);
    if (remaining !== lastMs) {
      lastMs = remaining;
      options.onTick(remaining);
    }
    if (remaining <= 0) break;
    polls.advancePast(now);
    await sleep(polls.delayFrom(now), options.signal);
  }

  if (aborted()) return 'aborted';
  options.onFinished?.();
  return 'finished';
}

/** Abortable wait with no tick output */
export function waitWithAbort(
  durationS: number,
  options: { signal?: AbortSignal; clock?: Clock; stepMs?: number } = {}
): Promise<CountdownResult> {
  return runPollingCountdown({ ...options, durationS, onTick: () => {} });
}

export function formatCountdownText(message: string, remainingMs: number): string {
  const seconds = (Math.max(0, remainingMs) / 1000).toFixed(3).padStart(6, '0');
  return `${message}\n${seconds}s`;
}
