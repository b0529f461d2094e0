/**
 * In-process sliding-window attempt counters.
 * Timestamps older than the window are dropped on every access, so an idle
 * key costs nothing once its attempts have aged out.
 */

export interface AttemptTrackerOptions {
  windowMs: number;
  /** Injectable clock for tests. */
  now?: () => number;
}

export class AttemptTracker {
  private store = new Map<string, number[]>();
  private windowMs: number;
  private now: () => number;

  constructor(options: AttemptTrackerOptions) {
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  /** Records one attempt and returns how many fall inside the window. */
  record(key: string): number {
    const attempts = this.recent(key);
    attempts.push(this.now());
    this.store.set(key, attempts);
    return attempts.length;
  }

  count(key: string): number {
    return this.recent(key).length;
  }

  reset(key: string): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  private recent(key: string): number[] {
    const cutoff = this.now() - this.windowMs;
    const kept = (this.store.get(key) ?? []).filter((t) => t > cutoff);
    if (kept.length === 0) this.store.delete(key);
    return kept;
  }
}

/** Save toggles per user and post; 10 inside 5 s counts as a race. */
export const SAVE_RACE_THRESHOLD = 10;
export const saveAttempts = new AttemptTracker({ windowMs: 5_000 });

/** Failed logins per client ip and username; the 10th inside 5 min is flagged. */
export const LOGIN_FAILURE_THRESHOLD = 10;
export const loginFailures = new AttemptTracker({ windowMs: 300_000 });
