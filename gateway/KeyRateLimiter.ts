import { maskKey } from './APIKeyRotator';

export const DEFAULT_RATE_LIMIT = 15;
export const WINDOW_MS = 60_000;

export interface KeyRateLimiterOptions {
  /** Requests each key may make per window. */
  limit?: number;
  windowMs?: number;
  now?: () => number;
}

export interface WindowCounter {
  windowStart: number;
  count: number;
}

/**
 * Fixed-window request counter for each upstream key.
 *
 * A window opens when the first check after the previous window's expiry
 * arrives, so a key may serve `limit` requests just before a boundary and
 * `limit` more just after it.
 */
export class KeyRateLimiter {
  private counters: Map<string, WindowCounter> = new Map();
  private limit: number;
  private windowMs: number;
  private now: () => number;

  constructor(keys: readonly string[], options: KeyRateLimiterOptions = {}) {
    this.limit = options.limit ?? DEFAULT_RATE_LIMIT;
    this.windowMs = options.windowMs ?? WINDOW_MS;
    this.now = options.now ?? Date.now;

    const startedAt = this.now();
    for (const key of keys) {
      this.counters.set(key, { windowStart: startedAt, count: 0 });
    }
  }

  /**
   * Consumes one unit of the key's quota if any is left.
   *
   * Check and increment happen without yielding, so two requests can never
   * both take the last unit. Unknown keys are always rejected.
   */
  tryAdmit(key: string): boolean {
    const counter = this.counters.get(key);
    if (!counter) {
      console.error(`[KeyRateLimiter] Rejected unconfigured key ${maskKey(key)}`);
      return false;
    }

    const now = this.now();
    if (now - counter.windowStart >= this.windowMs) {
      counter.windowStart = now;
      counter.count = 0;
    }

    if (counter.count < this.limit) {
      counter.count++;
      return true;
    }
    return false;
  }

  /**
   * Milliseconds until at least one key can admit again; 0 when one already can.
   */
  msUntilAvailable(): number {
    const now = this.now();
    let soonest = Infinity;

    for (const counter of this.counters.values()) {
      const elapsed = now - counter.windowStart;
      if (elapsed >= this.windowMs || counter.count < this.limit) {
        return 0;
      }
      soonest = Math.min(soonest, this.windowMs - elapsed);
    }

    return soonest === Infinity ? 0 : soonest;
  }

  snapshot(key: string): WindowCounter | undefined {
    const counter = this.counters.get(key);
    return counter ? { ...counter } : undefined;
  }
}
