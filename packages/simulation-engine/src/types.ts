// ---------------------------------------------------------------------------
// Simulation Engine Types
// ---------------------------------------------------------------------------

import type {
  ActiveOrderStatus,
  CancellationReason,
  OrderEventPayload,
  OrderStatus,
  PaymentMethod,
  ShippingAddress,
} from "@order-sim/shared/protocol";

export type SessionStatus = "IDLE" | "RUNNING" | "STOPPED";

export type StopReason = "duration" | "interrupt" | "drained";

/** Inclusive [min, max] range in seconds. */
export interface DwellRange {
  min: number;
  max: number;
}

export interface Product {
  id: string;
  name: string;
  priceRange: { min: number; max: number };
}

/**
 * An order while the simulator tracks it. `lastStatusChange` and
 * `nextDueDuration` are scheduling state and never leave the engine.
 */
export interface SimulatedOrder {
  readonly orderId: string;
  readonly productId: string;
  readonly productName: string;
  readonly quantity: number;
  readonly price: number;
  readonly total: number;
  readonly customerId: string;
  readonly customerEmail: string;
  readonly paymentMethod: PaymentMethod;
  readonly shippingAddress: ShippingAddress;
  status: OrderStatus;
  /** ISO-8601 UTC time of the latest transition */
  timestamp: string;
  /** Session clock reading (ms) of the latest transition */
  lastStatusChange: number;
  /** Seconds to dwell in the current state; null once terminal */
  nextDueDuration: number | null;
  cancellationReason?: CancellationReason;
}

/** A registry member: an order whose status is still active. */
export type ActiveOrder = SimulatedOrder & { status: ActiveOrderStatus };

export interface LifecyclePolicyConfig {
  cancellationProbability: number;
  dwellRanges: Record<ActiveOrderStatus, DwellRange>;
}

export interface SimulationConfig {
  /** Session length in minutes; 0 stops before the first admission */
  durationMinutes: number;
  /** Inter-arrival range for new orders, in seconds */
  minDelaySeconds: number;
  maxDelaySeconds: number;
  tickIntervalMs: number;
  /** Stop admitting after this many orders and end once they all drain */
  maxOrders?: number;
  /** Cap on transitions per tick; the rest carry over to the next tick */
  maxTransitionsPerTick?: number;
  /** Log a progress snapshot this often; off when undefined */
  progressIntervalMs?: number;
  policy: LifecyclePolicyConfig;
}

/** Monotonic session clock in milliseconds. */
export interface Clock {
  now(): number;
}

/** Uniform source on [0, 1). */
export interface RandomSource {
  next(): number;
}

export interface SessionProgress {
  status: SessionStatus;
  created: number;
  statusUpdates: number;
  shipped: number;
  cancelled: number;
  active: number;
  dispatchFailures: number;
  elapsedMs: number;
}

export interface SessionSummary {
  created: number;
  statusUpdates: number;
  shipped: number;
  cancelled: number;
  /** Orders still in the registry at cutoff */
  active: number;
  /** shipped / created, 0 when nothing was created */
  successRate: number;
  /** cancelled / created, 0 when nothing was created */
  cancellationRate: number;
  elapsedMs: number;
  /** created / elapsed minutes */
  ordersPerMinute: number;
  dispatchFailures: number;
  stopReason: StopReason;
  startedAt: string;
  endedAt: string;
}

/**
 * A destination for lifecycle events. `close` flushes and releases whatever
 * the sink holds open.
 */
export interface EventSink {
  readonly name: string;
  write(event: OrderEventPayload): Promise<void>;
  close(): Promise<void>;
}
