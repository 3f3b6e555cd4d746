import type { SessionProgress, SessionStatus, SessionSummary, StopReason } from "../types.js";

/** Counters owned by one session. */
export class SessionStatistics {
  private created = 0;
  private statusUpdates = 0;
  private shipped = 0;
  private cancelled = 0;
  private dispatchFailures = 0;

  recordCreated(): void {
    this.created++;
  }

  recordStatusUpdate(): void {
    this.statusUpdates++;
  }

  recordShipped(): void {
    this.shipped++;
  }

  recordCancelled(): void {
    this.cancelled++;
  }

  recordDispatchFailures(count: number): void {
    this.dispatchFailures += count;
  }

  get createdCount(): number {
    return this.created;
  }

  progress(status: SessionStatus, active: number, elapsedMs: number): SessionProgress {
    return {
      status,
      created: this.created,
      statusUpdates: this.statusUpdates,
      shipped: this.shipped,
      cancelled: this.cancelled,
      active,
      dispatchFailures: this.dispatchFailures,
      elapsedMs,
    };
  }

  summarize(input: {
    active: number;
    elapsedMs: number;
    stopReason: StopReason;
    startedAt: Date;
    endedAt: Date;
  }): SessionSummary {
    const { active, elapsedMs } = input;
    const elapsedMinutes = elapsedMs / 60_000;

    return {
      created: this.created,
      statusUpdates: this.statusUpdates,
      shipped: this.shipped,
      cancelled: this.cancelled,
      active,
      successRate: this.created > 0 ? this.shipped / this.created : 0,
      cancellationRate: this.created > 0 ? this.cancelled / this.created : 0,
      elapsedMs,
      ordersPerMinute: elapsedMinutes > 0 ? this.created / elapsedMinutes : 0,
      dispatchFailures: this.dispatchFailures,
      stopReason: input.stopReason,
      startedAt: input.startedAt.toISOString(),
      endedAt: input.endedAt.toISOString(),
    };
  }
}
