type WindowEntry = {
  success: boolean;
  /** A CAPTCHA challenge was seen on this response. */
  captcha: boolean;
  /** Any detection signal: CAPTCHA, ban or rate limit. */
  detected: boolean;
  at: number;
};

type FailureWindowOptions = {
  horizonMs: number;
  maxEntries: number;
};

const DEFAULT_WINDOW_OPTIONS: FailureWindowOptions = {
  horizonMs: 10 * 60_000,
  maxEntries: 100,
};

/**
 * Rolling outcome record for one domain, bounded in both time and size.
 * The failure streak is kept apart from the entries so trimming never resets it.
 */
export class FailureWindow {
  private readonly options: FailureWindowOptions;
  private readonly entries: WindowEntry[];
  private streak: number;

  constructor(options?: Partial<FailureWindowOptions>) {
    this.options = { ...DEFAULT_WINDOW_OPTIONS, ...options };
    this.entries = [];
    this.streak = 0;
  }

  record(entry: WindowEntry): void {
    this.entries.push(entry);
    this.streak = entry.success ? 0 : this.streak + 1;
    this.trim(entry.at);
  }

  /** 1 when the window is empty. */
  successRate(now: number): number {
    this.trim(now);
    if (this.entries.length === 0) {
      return 1;
    }
    return this.entries.filter((entry) => entry.success).length / this.entries.length;
  }

  detectionRate(now: number): number {
    this.trim(now);
    if (this.entries.length === 0) {
      return 0;
    }
    return this.entries.filter((entry) => entry.detected).length / this.entries.length;
  }

  captchaSightings(now: number): number {
    this.trim(now);
    return this.entries.filter((entry) => entry.captcha).length;
  }

  consecutiveFailures(): number {
    return this.streak;
  }

  size(now: number): number {
    this.trim(now);
    return this.entries.length;
  }

  private trim(now: number): void {
    const cutoff = now - this.options.horizonMs;
    let drop = 0;
    while (drop < this.entries.length && (this.entries[drop]?.at ?? Infinity) <= cutoff) {
      drop += 1;
    }
    drop = Math.max(drop, this.entries.length - this.options.maxEntries);
    if (drop > 0) {
      this.entries.splice(0, drop);
    }
  }
}

export type { WindowEntry, FailureWindowOptions };
export { DEFAULT_WINDOW_OPTIONS };
