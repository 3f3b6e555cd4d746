import type { OrderStatus } from "./order-states.js";
import type { CancellationReason } from "./cancellation-reasons.js";

// ---------------------------------------------------------------------------
// Payment methods
// ---------------------------------------------------------------------------

export const PAYMENT_METHODS = [
  "credit_card",
  "debit_card",
  "paypal",
  "apple_pay",
  "google_pay",
  "bank_transfer",
] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

// ---------------------------------------------------------------------------
// Event payload
// ---------------------------------------------------------------------------

export interface ShippingAddress {
  street: string;
  city: string;
  state: string;
  zip_code: string;
  /** ISO 3166-1 alpha-3 */
  country: string;
}

/**
 * One lifecycle event as seen by consumers. Every event carries the full,
 * current view of the order; `cancellation_reason` is present only when
 * `status` is `cancelled`.
 */
export interface OrderEventPayload {
  order_id: string;
  /** ISO-8601 UTC time of the transition that produced this event */
  timestamp: string;
  product_id: string;
  product_name: string;
  quantity: number;
  price: number;
  total: number;
  customer_id: string;
  customer_email: string;
  payment_method: PaymentMethod;
  shipping_address: ShippingAddress;
  status: OrderStatus;
  cancellation_reason?: CancellationReason;
}
