import { describe, it, expect } from 'vitest';
import { RequestLog } from './request-log.js';

describe('RequestLog', () => {
  it('admits a candidate while the window has room', () => {
    const log = new RequestLog(60_000);
    log.add(0);
    log.add(1_000);

    expect(log.earliestSlot(2_000, 3)).toBe(2_000);
  });

  it('waits for the oldest send in a full window to age out', () => {
    const log = new RequestLog(60_000);
    [0, 1_000, 2_000].forEach((at) => log.add(at));

    expect(log.earliestSlot(5_000, 3)).toBe(60_000);
  });

  it('moves past later reservations that would overfill a window', () => {
    const log = new RequestLog(60_000);
    log.add(10_000);
    log.add(20_000);

    // A send at 5000 would share a window with both reservations
    expect(log.earliestSlot(5_000, 2)).toBe(70_000);
  });

  it('prunes sends older than the window', () => {
    const log = new RequestLog(60_000);
    [0, 30_000, 90_000].forEach((at) => log.add(at));

    log.prune(100_000);

    expect(log.size).toBe(1);
    expect(log.latest).toBe(90_000);
  });

  it('removes exactly one matching reservation', () => {
    const log = new RequestLog(60_000);
    log.add(5_000);
    log.add(5_000);

    expect(log.remove(5_000)).toBe(true);
    expect(log.size).toBe(1);
    expect(log.remove(7_000)).toBe(false);
  });
});
