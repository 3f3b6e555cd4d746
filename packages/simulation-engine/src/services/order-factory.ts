/**
 * Order Factory
 *
 * Builds new orders in the `pending` state. The only state it keeps is the
 * set of ids already issued, so ids never repeat within a session.
 */

import { faker as defaultFaker, type Faker } from "@faker-js/faker";
import {
  OrderStatus,
  PAYMENT_METHODS,
  type OrderEventPayload,
  type ShippingAddress,
} from "@order-sim/shared/protocol";
import type { ActiveOrder, DwellRange, Product, RandomSource, SimulatedOrder } from "../types.js";
import { mathRandom, pickRandom, randomInt, roundCurrency, uniform } from "./random.js";

export interface OrderFactoryOptions {
  catalog: readonly Product[];
  /** Dwell range drawn for the initial `pending` state */
  pendingDwell: DwellRange;
  random?: RandomSource;
  /** Source of emails and addresses */
  faker?: Faker;
  /** Wall clock for event timestamps */
  wallClock?: () => Date;
}

const MAX_ID_ATTEMPTS = 1000;

export class OrderFactory {
  private readonly catalog: readonly Product[];
  private readonly pendingDwell: DwellRange;
  private readonly random: RandomSource;
  private readonly faker: Faker;
  private readonly wallClock: () => Date;
  private readonly issuedIds = new Set<string>();

  constructor(options: OrderFactoryOptions) {
    if (options.catalog.length === 0) {
      throw new RangeError("OrderFactory needs at least one product");
    }
    this.catalog = options.catalog;
    this.pendingDwell = options.pendingDwell;
    this.random = options.random ?? mathRandom;
    this.faker = options.faker ?? defaultFaker;
    this.wallClock = options.wallClock ?? (() => new Date());
  }

  /**
   * Create a new pending order.
   *
   * @param nowMs - Session clock reading recorded as the time of entering `pending`.
   */
  create(nowMs: number): ActiveOrder {
    const product = pickRandom(this.random, this.catalog);
    const quantity = randomInt(this.random, 1, 5);
    const price = roundCurrency(
      uniform(this.random, product.priceRange.min, product.priceRange.max),
    );

    return {
      orderId: this.nextOrderId(),
      productId: product.id,
      productName: product.name,
      quantity,
      price,
      total: roundCurrency(quantity * price),
      customerId: `CUST-${randomInt(this.random, 100000, 999999)}`,
      customerEmail: this.faker.internet.email(),
      paymentMethod: pickRandom(this.random, PAYMENT_METHODS),
      shippingAddress: this.generateAddress(),
      status: OrderStatus.Pending,
      timestamp: this.wallClock().toISOString(),
      lastStatusChange: nowMs,
      nextDueDuration: uniform(this.random, this.pendingDwell.min, this.pendingDwell.max),
    };
  }

  private nextOrderId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = `ORD-${randomInt(this.random, 10000000, 99999999)}`;
      if (!this.issuedIds.has(id)) {
        this.issuedIds.add(id);
        return id;
      }
    }
    throw new RangeError(`No free order id after ${MAX_ID_ATTEMPTS} attempts`);
  }

  private generateAddress(): ShippingAddress {
    return {
      street: this.faker.location.streetAddress(),
      city: this.faker.location.city(),
      state: this.faker.location.state({ abbreviated: true }),
      zip_code: this.faker.location.zipCode(),
      country: this.faker.location.countryCode("alpha-3"),
    };
  }
}

/**
 * Project an order onto its externally visible event payload. Scheduling
 * fields stay behind; `cancellation_reason` appears only for cancelled orders.
 */
export function toEventPayload(order: SimulatedOrder): OrderEventPayload {
  const payload: OrderEventPayload = {
    order_id: order.orderId,
    timestamp: order.timestamp,
    product_id: order.productId,
    product_name: order.productName,
    quantity: order.quantity,
    price: order.price,
    total: order.total,
    customer_id: order.customerId,
    customer_email: order.customerEmail,
    payment_method: order.paymentMethod,
    shipping_address: { ...order.shippingAddress },
    status: order.status,
  };

  if (order.status === OrderStatus.Cancelled && order.cancellationReason !== undefined) {
    payload.cancellation_reason = order.cancellationReason;
  }

  return payload;
}
