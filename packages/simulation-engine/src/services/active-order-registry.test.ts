import { describe, it, expect, beforeEach } from "vitest";
import { OrderStatus } from "@order-sim/shared/protocol";
import { ActiveOrderRegistry } from "./active-order-registry.js";
import { RegistryError } from "../errors.js";
import type { SimulatedOrder } from "../types.js";

function makeOrder(orderId: string, overrides: Partial<SimulatedOrder> = {}): SimulatedOrder {
  return {
    orderId,
    productId: "PROD-004",
    productName: "USB-C Cable",
    quantity: 1,
    price: 9.99,
    total: 9.99,
    customerId: "CUST-654321",
    customerEmail: "cable@example.com",
    paymentMethod: "debit_card",
    shippingAddress: {
      street: "2 Side St",
      city: "Shelbyville",
      state: "IL",
      zip_code: "62565",
      country: "USA",
    },
    status: OrderStatus.Pending,
    timestamp: "2026-01-01T00:00:00.000Z",
    lastStatusChange: 0,
    nextDueDuration: 10,
    ...overrides,
  };
}

describe("ActiveOrderRegistry", () => {
  let registry: ActiveOrderRegistry;

  beforeEach(() => {
    registry = new ActiveOrderRegistry();
  });

  it("stores inserted orders by id", () => {
    registry.insert(makeOrder("ORD-1"));
    expect(registry.size).toBe(1);
    expect(registry.has("ORD-1")).toBe(true);
    expect(registry.get("ORD-1")?.productId).toBe("PROD-004");
  });

  it("rejects a duplicate id", () => {
    registry.insert(makeOrder("ORD-1"));
    expect(() => registry.insert(makeOrder("ORD-1"))).toThrow(RegistryError);
    expect(registry.size).toBe(1);
  });

  it("rejects terminal orders", () => {
    expect(() =>
      registry.insert(makeOrder("ORD-2", { status: OrderStatus.Shipped, nextDueDuration: null })),
    ).toThrow(RegistryError);
    expect(() =>
      registry.insert(makeOrder("ORD-3", { status: OrderStatus.Cancelled, nextDueDuration: null })),
    ).toThrow(RegistryError);
    expect(registry.size).toBe(0);
  });

  it("removes orders and reports whether anything was removed", () => {
    registry.insert(makeOrder("ORD-1"));
    expect(registry.remove("ORD-1")).toBe(true);
    expect(registry.remove("ORD-1")).toBe(false);
    expect(registry.has("ORD-1")).toBe(false);
  });

  it("collects only the orders matching the predicate", () => {
    registry.insert(makeOrder("ORD-1", { nextDueDuration: 5 }));
    registry.insert(makeOrder("ORD-2", { nextDueDuration: 50 }));
    registry.insert(makeOrder("ORD-3", { nextDueDuration: 1 }));

    const due = registry.collectDue((order) => (order.nextDueDuration ?? Infinity) <= 5);
    expect(due).toEqual(["ORD-1", "ORD-3"]);
  });

  it("returns a snapshot unaffected by later removal", () => {
    registry.insert(makeOrder("ORD-1"));
    registry.insert(makeOrder("ORD-2"));
    const due = registry.collectDue(() => true);
    registry.remove("ORD-1");
    expect(due).toEqual(["ORD-1", "ORD-2"]);
    expect([...registry.values()].map((o) => o.orderId)).toEqual(["ORD-2"]);
  });
});
