export {
  OrderStatus,
  getNextStatus,
  isValidOrderTransition,
  isTerminalStatus,
  isActiveStatus,
  type ActiveOrderStatus,
  type TerminalOrderStatus,
  type ForwardOrderStatus,
} from "./order-states.js";
export {
  getCancellationReasons,
  isCancellationReasonFor,
  type CancellationReason,
} from "./cancellation-reasons.js";
export {
  PAYMENT_METHODS,
  type PaymentMethod,
  type ShippingAddress,
  type OrderEventPayload,
} from "./types.js";
