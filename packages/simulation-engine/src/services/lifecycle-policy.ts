/**
 * Lifecycle Policy
 *
 * Decides what happens to an order once its dwell time is up: it is either
 * cancelled (with a reason tied to the state it was in) or moved one step
 * forward. `decide` only reads; `applyDecision` writes to the one order it is
 * given.
 */

import {
  OrderStatus,
  getCancellationReasons,
  getNextStatus,
  isCancellationReasonFor,
  isTerminalStatus,
  isValidOrderTransition,
  type ActiveOrderStatus,
  type CancellationReason,
  type ForwardOrderStatus,
} from "@order-sim/shared/protocol";
import { InvalidTransitionError } from "../errors.js";
import type {
  ActiveOrder,
  DwellRange,
  LifecyclePolicyConfig,
  RandomSource,
  SimulatedOrder,
} from "../types.js";
import { mathRandom, pickRandom, uniform } from "./random.js";

export const DEFAULT_CANCELLATION_PROBABILITY = 0.08;

/** Seconds spent in each state before the next check. */
export const DEFAULT_DWELL_RANGES: Readonly<Record<ActiveOrderStatus, DwellRange>> = {
  [OrderStatus.Pending]: { min: 10, max: 30 },
  [OrderStatus.Confirmed]: { min: 15, max: 45 },
  [OrderStatus.Processing]: { min: 20, max: 60 },
};

export const DEFAULT_POLICY_CONFIG: LifecyclePolicyConfig = {
  cancellationProbability: DEFAULT_CANCELLATION_PROBABILITY,
  dwellRanges: DEFAULT_DWELL_RANGES,
};

export type TransitionDecision =
  | { kind: "cancel"; from: ActiveOrderStatus; reason: CancellationReason }
  | {
      kind: "advance";
      from: ActiveOrderStatus;
      to: ForwardOrderStatus;
      /** Dwell for the new state; null when it is terminal */
      nextDueDuration: number | null;
    };

export class LifecyclePolicy {
  private readonly config: LifecyclePolicyConfig;
  private readonly random: RandomSource;

  constructor(config: LifecyclePolicyConfig = DEFAULT_POLICY_CONFIG, random: RandomSource = mathRandom) {
    this.config = config;
    this.random = random;
  }

  /** Draw a dwell time (seconds) for entering `status`. */
  drawDwell(status: ActiveOrderStatus): number {
    const range = this.config.dwellRanges[status];
    return uniform(this.random, range.min, range.max);
  }

  /**
   * True when the order has spent at least its dwell time in its current
   * state. Terminal orders are never due.
   */
  isDue(order: SimulatedOrder, nowMs: number): boolean {
    if (isTerminalStatus(order.status) || order.nextDueDuration === null) {
      return false;
    }
    return (nowMs - order.lastStatusChange) / 1000 >= order.nextDueDuration;
  }

  /**
   * Cancel with `cancellationProbability`, otherwise advance.
   */
  decide(status: ActiveOrderStatus): TransitionDecision {
    if (this.random.next() < this.config.cancellationProbability) {
      return {
        kind: "cancel",
        from: status,
        reason: pickRandom(this.random, getCancellationReasons(status)),
      };
    }

    const to = getNextStatus(status);
    return {
      kind: "advance",
      from: status,
      to,
      nextDueDuration: to === OrderStatus.Shipped ? null : this.drawDwell(to),
    };
  }

  /**
   * Write a decision onto the order.
   *
   * @throws InvalidTransitionError when the decision was made for another
   * state, skips a state, or carries a reason foreign to its state.
   */
  applyDecision(
    order: SimulatedOrder,
    decision: TransitionDecision,
    nowMs: number,
    timestamp: string,
  ): void {
    const target = decision.kind === "cancel" ? OrderStatus.Cancelled : decision.to;
    if (
      order.status !== decision.from ||
      !isValidOrderTransition(decision.from, target) ||
      (decision.kind === "cancel" && !isCancellationReasonFor(decision.from, decision.reason))
    ) {
      throw new InvalidTransitionError(order.orderId, order.status, target);
    }

    if (decision.kind === "cancel") {
      order.status = OrderStatus.Cancelled;
      order.cancellationReason = decision.reason;
      order.nextDueDuration = null;
    } else {
      order.status = decision.to;
      order.nextDueDuration = decision.nextDueDuration;
    }
    order.lastStatusChange = nowMs;
    order.timestamp = timestamp;
  }

  /**
   * Decide and apply in one step. Returns the decision taken.
   *
   * @throws InvalidTransitionError for an order that is already terminal.
   */
  transition(order: SimulatedOrder, nowMs: number, timestamp: string): TransitionDecision {
    if (!isActiveOrder(order)) {
      throw new InvalidTransitionError(order.orderId, order.status, null);
    }
    const decision = this.decide(order.status);
    this.applyDecision(order, decision, nowMs, timestamp);
    return decision;
  }
}

export function isActiveOrder(order: SimulatedOrder): order is ActiveOrder {
  return !isTerminalStatus(order.status);
}
