import { Kafka, logLevel, type LogEntry, type Producer } from "kafkajs";
import type { OrderEventPayload } from "@order-sim/shared/protocol";
import { createLogger, type LoggerLike } from "@order-sim/shared/utils";
import type { BrokerPublisher, PublishResult } from "./ports.js";

export interface KafkaPublisherOptions {
  /** Bootstrap servers, e.g. ["localhost:9092"] */
  brokers: string[];
  clientId?: string;
  logger?: LoggerLike;
}

const REQUEST_TIMEOUT_MS = 10_000;
const CLIENT_RETRIES = 3;

/**
 * Route kafkajs log entries into pino so client logs share the simulator's
 * format and level.
 */
export function bridgeKafkaLogs(logger: LoggerLike) {
  return () =>
    ({ namespace, level, log }: LogEntry): void => {
      const { message, ...extra } = log;
      const fields = { namespace, ...extra };
      switch (level) {
        case logLevel.ERROR:
        case logLevel.NOTHING:
          logger.error(fields, message);
          break;
        case logLevel.WARN:
          logger.warn(fields, message);
          break;
        case logLevel.INFO:
          logger.info(fields, message);
          break;
        default:
          logger.debug(fields, message);
      }
    };
}

/**
 * Kafka producer configured for per-key ordering: idempotent, one request in
 * flight, acknowledged by all in-sync replicas.
 */
export class KafkaPublisher implements BrokerPublisher {
  readonly kind = "kafka";
  private readonly producer: Producer;
  private readonly brokers: string[];
  private readonly logger: LoggerLike;
  private connected = false;

  constructor(options: KafkaPublisherOptions) {
    this.brokers = options.brokers;
    this.logger = options.logger ?? createLogger("kafka-publisher");

    const kafka = new Kafka({
      clientId: options.clientId ?? "order-lifecycle-simulator",
      brokers: options.brokers,
      requestTimeout: REQUEST_TIMEOUT_MS,
      retry: { retries: CLIENT_RETRIES },
      logCreator: bridgeKafkaLogs(this.logger),
    });

    this.producer = kafka.producer({ idempotent: true, maxInFlightRequests: 1 });
  }

  async connect(): Promise<void> {
    await this.producer.connect();
    this.connected = true;
    this.logger.info({ brokers: this.brokers }, "Connected to Kafka");
  }

  async publish(topic: string, key: string, payload: OrderEventPayload): Promise<PublishResult> {
    if (!this.connected) {
      return { success: false, error: "Kafka producer is not connected" };
    }

    try {
      await this.producer.send({
        topic,
        acks: -1,
        messages: [{ key, value: JSON.stringify(payload) }],
      });
      this.logger.debug({ topic, key, status: payload.status }, "Published order event");
      return { success: true };
    } catch (err) {
      return { success: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.producer.disconnect();
    this.logger.info("Kafka producer disconnected");
  }
}
