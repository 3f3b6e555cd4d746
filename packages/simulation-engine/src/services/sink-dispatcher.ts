/**
 * Sink Dispatcher
 *
 * Fans one event out to every configured sink. Sinks are awaited one after
 * another so each sink sees an order's events in emission order. A failing
 * sink is logged and counted; it never interrupts the session or the other
 * sinks.
 */

import type { OrderEventPayload } from "@order-sim/shared/protocol";
import { createLogger, type LoggerLike } from "@order-sim/shared/utils";
import type { EventSink } from "../types.js";

export class SinkDispatcher {
  private readonly sinks: readonly EventSink[];
  private readonly logger: LoggerLike;
  private readonly failuresBySink = new Map<string, number>();
  private closed = false;

  constructor(sinks: readonly EventSink[], logger: LoggerLike = createLogger("sink-dispatcher")) {
    this.sinks = sinks;
    this.logger = logger;
  }

  get sinkNames(): string[] {
    return this.sinks.map((sink) => sink.name);
  }

  /** Total failed writes across all sinks. */
  get failureCount(): number {
    let total = 0;
    for (const count of this.failuresBySink.values()) {
      total += count;
    }
    return total;
  }

  failuresFor(sinkName: string): number {
    return this.failuresBySink.get(sinkName) ?? 0;
  }

  /**
   * Deliver one event. Resolves with the number of sinks that failed.
   */
  async dispatch(event: OrderEventPayload): Promise<number> {
    let failed = 0;

    for (const sink of this.sinks) {
      try {
        await sink.write(event);
      } catch (err) {
        failed++;
        this.failuresBySink.set(sink.name, this.failuresFor(sink.name) + 1);
        this.logger.warn(
          { orderId: event.order_id, status: event.status, sink: sink.name, err },
          "Failed to dispatch order event",
        );
      }
    }

    return failed;
  }

  /**
   * Flush and close every sink. Only the first call does anything.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const sink of this.sinks) {
      try {
        await sink.close();
        this.logger.debug({ sink: sink.name }, "Sink closed");
      } catch (err) {
        this.logger.error({ sink: sink.name, err }, "Failed to close sink");
      }
    }
  }
}
