type Clock = {
  now(): number;
};

const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to. Used by simulations and tests.
 */
class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export type { Clock };
export { systemClock, ManualClock };
