/**
 * Counter Rate Tracking
 *
 * Turns monotonically increasing server counters (op counts, network bytes,
 * flushes) into per-second rates using the wall-clock gap between two polls.
 * One tracker belongs to one server; all its counters share the poll instant.
 */

export class RateTracker {
  private previous = new Map<string, number>();
  private lastCheck: number | null = null;
  private elapsedSeconds = 0;

  /** Mark the start of a poll. Must be called before perSecond(). */
  begin(now = Date.now()): void {
    if (this.lastCheck !== null) {
      this.elapsedSeconds = (now - this.lastCheck) / 1000;
    }
    this.lastCheck = now;
  }

  /**
   * Rate of change since the previous poll.
   *
   * Returns 0 for the first sample of a counter. A counter that went
   * backwards (server restarted) also yields 0 rather than a negative rate.
   */
  perSecond(name: string, value: number): number {
    const prev = this.previous.get(name);
    this.previous.set(name, value);

    if (prev === undefined || this.elapsedSeconds <= 0) return 0;
    return Math.max(0, (value - prev) / this.elapsedSeconds);
  }
}
