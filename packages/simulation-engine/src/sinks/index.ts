import type { LoggerLike } from "@order-sim/shared/utils";
import { AmqpPublisher } from "./amqp-publisher.js";
import { KafkaPublisher } from "./kafka-publisher.js";
import type { BrokerPublisher } from "./ports.js";

export { AmqpPublisher } from "./amqp-publisher.js";
export { BrokerSink } from "./broker-sink.js";
export { ConsoleSink } from "./console-sink.js";
export { KafkaPublisher, bridgeKafkaLogs } from "./kafka-publisher.js";
export type { BrokerPublisher, PublishResult } from "./ports.js";

/**
 * Pick a publisher from the broker address: `amqp://` and `amqps://` URLs
 * go to RabbitMQ, anything else is read as a comma-separated list of Kafka
 * bootstrap servers.
 */
export function createBrokerPublisher(address: string, logger?: LoggerLike): BrokerPublisher {
  const trimmed = address.trim();
  if (/^amqps?:\/\//i.test(trimmed)) {
    return new AmqpPublisher(trimmed, logger);
  }

  const brokers = trimmed
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return new KafkaPublisher({ brokers, logger });
}
