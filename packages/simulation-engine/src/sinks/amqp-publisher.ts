import { connect, type ChannelModel, type ConfirmChannel } from "amqplib";
import type { OrderEventPayload } from "@order-sim/shared/protocol";
import { createLogger, type LoggerLike } from "@order-sim/shared/utils";
import type { BrokerPublisher, PublishResult } from "./ports.js";

/**
 * RabbitMQ publisher. Each topic maps to a durable `topic` exchange of the
 * same name; the order id is the routing key. Publishing waits for the
 * broker's confirm.
 */
export class AmqpPublisher implements BrokerPublisher {
  readonly kind = "amqp";
  private readonly url: string;
  private readonly logger: LoggerLike;
  private connection: ChannelModel | null = null;
  private channel: ConfirmChannel | null = null;
  private readonly assertedExchanges = new Set<string>();
  private closing = false;

  constructor(url: string, logger: LoggerLike = createLogger("amqp-publisher")) {
    this.url = url;
    this.logger = logger;
  }

  async connect(): Promise<void> {
    const connection = await connect(this.url);
    connection.on("error", (err: Error) => this.handleDrop("connection", err));
    connection.on("close", () => this.handleDrop("connection"));

    let channel: ConfirmChannel;
    try {
      channel = await connection.createConfirmChannel();
    } catch (err) {
      await this.closeQuietly(connection);
      throw err;
    }
    channel.on("error", (err: Error) => this.handleDrop("channel", err));
    channel.on("close", () => this.handleDrop("channel"));

    this.closing = false;
    this.connection = connection;
    this.channel = channel;
    this.logger.info("Connected to AMQP broker");
  }

  async publish(topic: string, key: string, payload: OrderEventPayload): Promise<PublishResult> {
    const channel = this.channel;
    if (!channel) {
      return { success: false, error: "AMQP channel is not open" };
    }

    try {
      await this.ensureExchange(channel, topic);
      await new Promise<void>((resolve, reject) => {
        channel.publish(
          topic,
          key,
          Buffer.from(JSON.stringify(payload)),
          { persistent: true, contentType: "application/json" },
          (err: unknown) => {
            if (err) {
              reject(err instanceof Error ? err : new Error(String(err)));
            } else {
              resolve();
            }
          },
        );
      });
      this.logger.debug({ exchange: topic, routingKey: key, status: payload.status }, "Published order event");
      return { success: true };
    } catch (err) {
      return { success: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  /**
   * Wait for outstanding confirms, then release the channel and the
   * connection. The connection is closed even when a channel step fails; the
   * first failure is rethrown afterwards.
   */
  async close(): Promise<void> {
    const { channel, connection } = this;
    this.closing = true;
    this.channel = null;
    this.connection = null;

    const failures: unknown[] = [];
    const attempt = async (step: () => Promise<void>): Promise<void> => {
      try {
        await step();
      } catch (err) {
        failures.push(err);
      }
    };

    if (channel) {
      await attempt(() => channel.waitForConfirms());
      await attempt(() => channel.close());
    }
    if (connection) {
      await attempt(() => connection.close());
    }

    if (failures.length > 0) {
      throw failures[0];
    }
    if (connection) {
      this.logger.info("AMQP connection closed");
    }
  }

  /**
   * The server or the network took the channel or connection away. Later
   * publishes fail fast instead of writing to a dead channel.
   */
  private handleDrop(source: "connection" | "channel", err?: Error): void {
    if (this.closing) return;

    if (this.channel) {
      this.logger.warn({ err, source }, "AMQP channel lost; publishes will fail until restart");
    }
    this.channel = null;
    if (source === "connection") {
      this.connection = null;
    }
  }

  private async closeQuietly(connection: ChannelModel): Promise<void> {
    this.closing = true;
    try {
      await connection.close();
    } catch (err) {
      this.logger.warn({ err }, "Failed to close AMQP connection after channel setup failed");
    }
  }

  private async ensureExchange(channel: ConfirmChannel, exchange: string): Promise<void> {
    if (this.assertedExchanges.has(exchange)) return;
    await channel.assertExchange(exchange, "topic", { durable: true });
    this.assertedExchanges.add(exchange);
  }
}
