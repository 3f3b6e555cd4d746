// ---------------------------------------------------------------------------
// Order Lifecycle State Machine
// ---------------------------------------------------------------------------

/**
 * Enumeration of all order lifecycle states. Values are the wire form used in
 * emitted event payloads.
 */
export enum OrderStatus {
  Pending = "pending",
  Confirmed = "confirmed",
  Processing = "processing",
  Shipped = "shipped",
  Cancelled = "cancelled",
}

/** States an order can still leave. */
export type ActiveOrderStatus =
  | OrderStatus.Pending
  | OrderStatus.Confirmed
  | OrderStatus.Processing;

/** States an order never leaves. */
export type TerminalOrderStatus = OrderStatus.Shipped | OrderStatus.Cancelled;

/** States reachable by moving forward (never `pending`, never `cancelled`). */
export type ForwardOrderStatus =
  | OrderStatus.Confirmed
  | OrderStatus.Processing
  | OrderStatus.Shipped;

// ---------------------------------------------------------------------------
// Transition rules
// ---------------------------------------------------------------------------

/**
 * The single forward successor of each active state. Typed over
 * `ActiveOrderStatus` so no successor can be written for a terminal state.
 */
const NEXT_STATUS: Readonly<Record<ActiveOrderStatus, ForwardOrderStatus>> = {
  [OrderStatus.Pending]: OrderStatus.Confirmed,
  [OrderStatus.Confirmed]: OrderStatus.Processing,
  [OrderStatus.Processing]: OrderStatus.Shipped,
};

/**
 * Map of each order state to the set of states it may transition to.
 *
 * Rules:
 *   pending    -> confirmed, cancelled
 *   confirmed  -> processing, cancelled
 *   processing -> shipped, cancelled
 *   shipped    -> (terminal)
 *   cancelled  -> (terminal)
 */
const TRANSITION_MAP: Readonly<Record<OrderStatus, ReadonlySet<OrderStatus>>> = {
  [OrderStatus.Pending]: new Set([OrderStatus.Confirmed, OrderStatus.Cancelled]),
  [OrderStatus.Confirmed]: new Set([OrderStatus.Processing, OrderStatus.Cancelled]),
  [OrderStatus.Processing]: new Set([OrderStatus.Shipped, OrderStatus.Cancelled]),
  [OrderStatus.Shipped]: new Set<OrderStatus>(),
  [OrderStatus.Cancelled]: new Set<OrderStatus>(),
};

// ---------------------------------------------------------------------------
// Utility functions
// ---------------------------------------------------------------------------

/**
 * Return the next state in the forward progression.
 */
export function getNextStatus(current: ActiveOrderStatus): ForwardOrderStatus {
  return NEXT_STATUS[current];
}

/**
 * Check whether a transition from one state to another is permitted.
 */
export function isValidOrderTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITION_MAP[from].has(to);
}

/**
 * Narrow a status to the terminal subset.
 */
export function isTerminalStatus(status: OrderStatus): status is TerminalOrderStatus {
  return status === OrderStatus.Shipped || status === OrderStatus.Cancelled;
}

/**
 * Narrow a status to the active subset.
 */
export function isActiveStatus(status: OrderStatus): status is ActiveOrderStatus {
  return !isTerminalStatus(status);
}
