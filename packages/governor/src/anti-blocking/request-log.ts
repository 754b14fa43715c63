/**
 * Sorted log of reserved send times for one domain, used as a sliding window:
 * no interval of `windowMs` may hold more than `limit` sends.
 */
export class RequestLog {
  private readonly windowMs: number;
  private readonly entries: number[];

  constructor(windowMs: number) {
    this.windowMs = windowMs;
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }

  get latest(): number | undefined {
    return this.entries[this.entries.length - 1];
  }

  /**
   * Drops sends that can no longer share a window with anything at or after `now`.
   */
  prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.entries.length && (this.entries[drop] ?? Infinity) <= cutoff) {
      drop += 1;
    }
    if (drop > 0) {
      this.entries.splice(0, drop);
    }
  }

  countSince(since: number): number {
    return this.entries.filter((at) => at > since).length;
  }

  /**
   * The earliest time at or after `candidate` where one more send keeps every
   * window at or under `limit`.
   */
  earliestSlot(candidate: number, limit: number): number {
    let slot = candidate;

    for (;;) {
      const index = this.insertionIndex(slot);
      const merged = [
        ...this.entries.slice(0, index),
        slot,
        ...this.entries.slice(index),
      ];

      let next: number | undefined;
      for (let start = Math.max(0, index - limit); start <= index; start++) {
        const first = merged[start];
        const last = merged[start + limit];
        if (first === undefined || last === undefined) {
          break;
        }
        if (last - first >= this.windowMs) {
          continue;
        }

        // Earlier sends crowd the window: wait for the oldest to age out.
        // Later reservations crowd it: move past the next one and look again.
        const moved =
          start < index ? first + this.windowMs : (merged[index + 1] ?? slot);
        next = next === undefined ? moved : Math.max(next, moved);
      }

      if (next === undefined || next <= slot) {
        return slot;
      }
      slot = next;
    }
  }

  add(at: number): void {
    this.entries.splice(this.insertionIndex(at), 0, at);
  }

  /**
   * Removes one reservation at exactly `at`. Returns false when there was none.
   */
  remove(at: number): boolean {
    const index = this.entries.indexOf(at);
    if (index === -1) {
      return false;
    }
    this.entries.splice(index, 1);
    return true;
  }

  clear(): void {
    this.entries.length = 0;
  }

  private insertionIndex(at: number): number {
    let low = 0;
    let high = this.entries.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if ((this.entries[mid] ?? Infinity) <= at) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
