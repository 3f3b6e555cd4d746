/**
 * Broker Publisher Port
 *
 * Keyed publishing to a message broker. Implementations never reject from
 * `publish`; failures come back as `{ success: false, error }`.
 */

import type { OrderEventPayload } from "@order-sim/shared/protocol";

export interface PublishResult {
  success: boolean;
  error?: string;
}

export interface BrokerPublisher {
  /** Broker kind, for logs. */
  readonly kind: string;

  connect(): Promise<void>;

  /**
   * Publish one event. `key` keeps all events of an order on one partition or
   * routing key so they are consumed in order.
   */
  publish(topic: string, key: string, payload: OrderEventPayload): Promise<PublishResult>;

  /** Flush pending messages and release the connection. */
  close(): Promise<void>;
}
