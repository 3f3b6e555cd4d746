import type { OrderEventPayload } from "@order-sim/shared/protocol";
import { SinkPublishError } from "../errors.js";
import type { EventSink } from "../types.js";
import type { BrokerPublisher } from "./ports.js";

/**
 * Publishes events to a broker topic keyed by order id.
 */
export class BrokerSink implements EventSink {
  readonly name: string;
  private readonly publisher: BrokerPublisher;
  private readonly topic: string;

  constructor(publisher: BrokerPublisher, topic: string) {
    this.publisher = publisher;
    this.topic = topic;
    this.name = `${publisher.kind}:${topic}`;
  }

  async write(event: OrderEventPayload): Promise<void> {
    const result = await this.publisher.publish(this.topic, event.order_id, event);
    if (!result.success) {
      throw new SinkPublishError(this.name, event.order_id, result.error ?? "unknown error");
    }
  }

  async close(): Promise<void> {
    await this.publisher.close();
  }
}
