/**
 * Explicit timer queue.
 *
 * Timers are plain entries with absolute deadlines in simulated time. The
 * owner asks for the next deadline and calls {@link TimerQueue.expire} when
 * its clock reaches it; cancelling a timer removes its entry, so nothing can
 * fire once the queue is cleared.
 *
 * @module engine/timer/queue
 */

interface TimerEntry<K> {
  kind: K;
  deadline: number;
  order: number;
}

/**
 * At most one pending deadline per timer kind.
 *
 * @template K - Union of timer kind names
 */
export class TimerQueue<K extends string> {
  private entries: Map<K, TimerEntry<K>> = new Map();
  private counter = 0;

  /**
   * Number of pending timers.
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Schedule (or reschedule) a timer.
   */
  schedule(kind: K, deadline: number): void {
    this.entries.set(kind, { kind, deadline, order: this.counter++ });
  }

  /**
   * Remove a timer.
   *
   * @returns Whether the timer was pending
   */
  cancel(kind: K): boolean {
    return this.entries.delete(kind);
  }

  isArmed(kind: K): boolean {
    return this.entries.has(kind);
  }

  deadline(kind: K): number | undefined {
    return this.entries.get(kind)?.deadline;
  }

  /**
   * Earliest pending deadline, or undefined when the queue is empty.
   */
  next(): number | undefined {
    let earliest: number | undefined;
    for (const entry of this.entries.values()) {
      if (earliest === undefined || entry.deadline < earliest) {
        earliest = entry.deadline;
      }
    }
    return earliest;
  }

  /**
   * Remove and return every timer whose deadline is at or before `now`,
   * earliest first (ties in scheduling order).
   */
  expire(now: number): K[] {
    const due = [...this.entries.values()]
      .filter((entry) => entry.deadline <= now)
      .sort((a, b) => a.deadline - b.deadline || a.order - b.order);

    for (const entry of due) {
      this.entries.delete(entry.kind);
    }

    return due.map((entry) => entry.kind);
  }

  /**
   * Drop every pending timer.
   */
  clear(): void {
    this.entries.clear();
  }
}
