// ---------------------------------------------------------------------------
// State-dependent Cancellation Reasons
// ---------------------------------------------------------------------------
// An order is cancelled with a reason drawn from the set belonging to the
// state it was in just before cancellation.
// ---------------------------------------------------------------------------

import { OrderStatus, type ActiveOrderStatus } from "./order-states.js";

/**
 * Union type of all cancellation reason strings.
 */
export type CancellationReason =
  | "payment_failed"
  | "payment_declined"
  | "customer_cancelled"
  | "fraud_suspected"
  | "inventory_unavailable"
  | "payment_verification_failed"
  | "address_invalid"
  | "inventory_damaged"
  | "shipping_address_unreachable"
  | "customer_requested_cancellation";

const CANCELLATION_REASONS: Readonly<
  Record<ActiveOrderStatus, readonly CancellationReason[]>
> = {
  [OrderStatus.Pending]: [
    "payment_failed",
    "payment_declined",
    "customer_cancelled",
    "fraud_suspected",
  ],
  [OrderStatus.Confirmed]: [
    "inventory_unavailable",
    "customer_cancelled",
    "payment_verification_failed",
    "address_invalid",
  ],
  [OrderStatus.Processing]: [
    "customer_cancelled",
    "inventory_damaged",
    "shipping_address_unreachable",
    "customer_requested_cancellation",
  ],
};

// ---------------------------------------------------------------------------
// Utility functions
// ---------------------------------------------------------------------------

/**
 * Return the reasons an order may be cancelled with while in `status`.
 */
export function getCancellationReasons(
  status: ActiveOrderStatus,
): readonly CancellationReason[] {
  return CANCELLATION_REASONS[status];
}

/**
 * Check whether `reason` belongs to the set for `status`.
 */
export function isCancellationReasonFor(
  status: ActiveOrderStatus,
  reason: string,
): boolean {
  return CANCELLATION_REASONS[status].some((candidate) => candidate === reason);
}
