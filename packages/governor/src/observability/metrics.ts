import type { Logger } from '@workspace/logger';

type WaitSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  waits: WaitSummary;
};

type GovernorCounter =
  | 'admit.accepted'
  | 'admit.rejected'
  | 'report.success'
  | 'report.failure'
  | 'session.rotated'
  | `emergency.${string}`;

const emptyWaits = (): WaitSummary => ({ count: 0, min: 0, max: 0, avg: 0, total: 0 });

/**
 * In-process counters, gauges and admitted wait durations for the governor.
 */
export class GovernorMetrics {
  private readonly counters: Map<string, number>;
  private readonly gauges: Map<string, number>;
  private waits: WaitSummary;

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.waits = emptyWaits();
  }

  increment(counter: GovernorCounter, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: GovernorCounter): number {
    return this.counters.get(counter) ?? 0;
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordWait(ms: number): void {
    const { count, min, max, total } = this.waits;
    const nextCount = count + 1;
    const nextTotal = total + ms;

    this.waits = {
      count: nextCount,
      min: count === 0 ? ms : Math.min(min, ms),
      max: count === 0 ? ms : Math.max(max, ms),
      avg: nextTotal / nextCount,
      total: nextTotal,
    };
  }

  snapshot(): MetricSnapshot {
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      waits: { ...this.waits },
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('Governor metrics', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.waits = emptyWaits();
  }
}

export type { MetricSnapshot, WaitSummary, GovernorCounter };
