import { OrderStatus } from "@order-sim/shared/protocol";
import { createLogger, type LoggerLike } from "@order-sim/shared/utils";

import { SimulatorError } from "../errors.js";
import type {
  Clock,
  RandomSource,
  SessionProgress,
  SessionStatus,
  SessionSummary,
  SimulatedOrder,
  SimulationConfig,
  StopReason,
} from "../types.js";
import { ActiveOrderRegistry } from "./active-order-registry.js";
import { LifecyclePolicy } from "./lifecycle-policy.js";
import { toEventPayload, type OrderFactory } from "./order-factory.js";
import { mathRandom, uniform } from "./random.js";
import { SessionStatistics } from "./session-stats.js";
import type { SinkDispatcher } from "./sink-dispatcher.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_TICK_INTERVAL_MS = 100;

const systemClock: Clock = { now: () => Date.now() };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface SimulationSessionOptions {
  config: SimulationConfig;
  factory: OrderFactory;
  dispatcher: SinkDispatcher;
  /** Defaults to a policy built from `config.policy` and `random` */
  policy?: LifecyclePolicy;
  /** Session clock in ms; drives dwell and duration checks */
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  /** Source of the summary's start and end timestamps */
  wallClock?: () => Date;
  /** Draws inter-arrival delays */
  random?: RandomSource;
  logger?: LoggerLike;
}

// ---------------------------------------------------------------------------
// SimulationSession - one bounded run of the order lifecycle loop
// ---------------------------------------------------------------------------

export class SimulationSession {
  private readonly config: SimulationConfig;
  private readonly factory: OrderFactory;
  private readonly dispatcher: SinkDispatcher;
  private readonly policy: LifecyclePolicy;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly wallClock: () => Date;
  private readonly random: RandomSource;
  private readonly logger: LoggerLike;

  private readonly registry = new ActiveOrderRegistry();
  private readonly stats = new SessionStatistics();

  private state: SessionStatus = "IDLE";
  private stopRequested = false;
  private startMs = 0;
  private endMs: number | null = null;
  private nextArrivalMs = 0;
  private lastProgressLogMs = 0;
  /** Due ids skipped by the per-tick cap, served first on the next tick */
  private carryOver: string[] = [];

  constructor(options: SimulationSessionOptions) {
    this.config = options.config;
    this.factory = options.factory;
    this.dispatcher = options.dispatcher;
    this.random = options.random ?? mathRandom;
    this.policy = options.policy ?? new LifecyclePolicy(options.config.policy, this.random);
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? sleep;
    this.wallClock = options.wallClock ?? (() => new Date());
    this.logger = options.logger ?? createLogger("simulation-session");
  }

  get status(): SessionStatus {
    return this.state;
  }

  /** Number of orders currently in flight. */
  get activeCount(): number {
    return this.registry.size;
  }

  /** Ask the loop to stop after the current tick. */
  stop(): void {
    if (this.state === "STOPPED" || this.stopRequested) return;
    this.stopRequested = true;
    this.logger.info("Stop requested");
  }

  getProgress(): SessionProgress {
    return this.stats.progress(this.state, this.registry.size, this.elapsedMs());
  }

  /**
   * Run the session to completion. Sinks are closed exactly once on every
   * exit path, including when the loop throws.
   */
  async run(): Promise<SessionSummary> {
    if (this.state !== "IDLE") {
      throw new SimulatorError("A simulation session can only be run once");
    }

    this.state = "RUNNING";
    this.startMs = this.clock.now();
    this.lastProgressLogMs = this.startMs;
    this.nextArrivalMs = this.startMs + this.drawArrivalDelayMs();
    const startedAt = this.wallClock();

    this.logger.info(
      {
        durationMinutes: this.config.durationMinutes,
        minDelaySeconds: this.config.minDelaySeconds,
        maxDelaySeconds: this.config.maxDelaySeconds,
        cancellationProbability: this.config.policy.cancellationProbability,
        maxOrders: this.config.maxOrders,
        sinks: this.dispatcher.sinkNames,
      },
      "Simulation started",
    );

    let stopReason: StopReason;
    try {
      stopReason = await this.loop();
    } finally {
      this.endMs = this.clock.now();
      this.state = "STOPPED";
      await this.dispatcher.close();
    }

    const summary = this.stats.summarize({
      active: this.registry.size,
      elapsedMs: this.elapsedMs(),
      stopReason,
      startedAt,
      endedAt: this.wallClock(),
    });

    this.logger.info(
      {
        stopReason,
        created: summary.created,
        shipped: summary.shipped,
        cancelled: summary.cancelled,
        active: summary.active,
        dispatchFailures: summary.dispatchFailures,
      },
      "Simulation stopped",
    );

    return summary;
  }

  // -----------------------------------------------------------------------
  // Loop
  // -----------------------------------------------------------------------

  private async loop(): Promise<StopReason> {
    for (;;) {
      if (this.stopRequested) return "interrupt";

      const now = this.clock.now();
      const reason = await this.tick(now);
      if (reason !== null) return reason;

      this.maybeLogProgress(now);
      await this.sleep(this.config.tickIntervalMs);
    }
  }

  private async tick(now: number): Promise<StopReason | null> {
    if (now - this.startMs >= this.config.durationMinutes * 60_000) {
      return "duration";
    }

    if (this.canAdmit() && now >= this.nextArrivalMs) {
      await this.admit(now);
      this.nextArrivalMs = now + this.drawArrivalDelayMs();
    }

    await this.advanceDueOrders(now);

    if (this.isDrained()) return "drained";
    return null;
  }

  private async admit(now: number): Promise<void> {
    const order = this.factory.create(now);
    this.registry.insert(order);
    this.stats.recordCreated();

    this.logger.debug(
      { orderId: order.orderId, productId: order.productId, total: order.total },
      "Order created",
    );
    await this.dispatch(order);
  }

  private async advanceDueOrders(now: number): Promise<void> {
    const due = this.registry.collectDue((order) => this.policy.isDue(order, now));
    const batch = this.selectBatch(due);

    for (const orderId of batch) {
      const order = this.registry.get(orderId);
      if (!order) continue;

      const decision = this.policy.transition(order, now, this.wallClock().toISOString());
      this.stats.recordStatusUpdate();

      if (decision.kind === "cancel") {
        this.registry.remove(orderId);
        this.stats.recordCancelled();
        this.logger.debug(
          { orderId, from: decision.from, reason: decision.reason },
          "Order cancelled",
        );
      } else {
        if (decision.to === OrderStatus.Shipped) {
          this.registry.remove(orderId);
          this.stats.recordShipped();
        }
        this.logger.debug({ orderId, from: decision.from, to: decision.to }, "Order advanced");
      }

      await this.dispatch(order);
    }
  }

  /**
   * Apply `maxTransitionsPerTick`. Ids held over from the previous tick go
   * first so a capped backlog cannot starve later orders.
   */
  private selectBatch(due: string[]): string[] {
    const limit = this.config.maxTransitionsPerTick;
    if (limit === undefined) return due;

    const dueIds = new Set(due);
    const carried = this.carryOver.filter((id) => dueIds.has(id));
    const carriedIds = new Set(carried);
    const ordered = [...carried, ...due.filter((id) => !carriedIds.has(id))];

    this.carryOver = ordered.slice(limit);
    return ordered.slice(0, limit);
  }

  private async dispatch(order: SimulatedOrder): Promise<void> {
    const failed = await this.dispatcher.dispatch(toEventPayload(order));
    if (failed > 0) {
      this.stats.recordDispatchFailures(failed);
    }
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private canAdmit(): boolean {
    const { maxOrders } = this.config;
    return maxOrders === undefined || this.stats.createdCount < maxOrders;
  }

  private isDrained(): boolean {
    const { maxOrders } = this.config;
    return (
      maxOrders !== undefined &&
      this.stats.createdCount >= maxOrders &&
      this.registry.size === 0
    );
  }

  private drawArrivalDelayMs(): number {
    return uniform(this.random, this.config.minDelaySeconds, this.config.maxDelaySeconds) * 1000;
  }

  private elapsedMs(): number {
    if (this.state === "IDLE") return 0;
    return (this.endMs ?? this.clock.now()) - this.startMs;
  }

  private maybeLogProgress(now: number): void {
    const interval = this.config.progressIntervalMs;
    if (interval === undefined || now - this.lastProgressLogMs < interval) return;

    this.lastProgressLogMs = now;
    this.logger.info(this.getProgress(), "Simulation progress");
  }
}
