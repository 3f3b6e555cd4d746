import { RegistryError } from "../errors.js";
import type { ActiveOrder, SimulatedOrder } from "../types.js";
import { isActiveOrder } from "./lifecycle-policy.js";

/**
 * In-flight orders keyed by order id. Holds exactly the orders that have not
 * reached a terminal state; the session removes an order the moment it does.
 */
export class ActiveOrderRegistry {
  private readonly orders = new Map<string, ActiveOrder>();

  get size(): number {
    return this.orders.size;
  }

  insert(order: SimulatedOrder): void {
    if (!isActiveOrder(order)) {
      throw new RegistryError(`Refusing to register ${order.orderId}: status is ${order.status}`);
    }
    if (this.orders.has(order.orderId)) {
      throw new RegistryError(`Order ${order.orderId} is already registered`);
    }
    this.orders.set(order.orderId, order);
  }

  get(orderId: string): ActiveOrder | undefined {
    return this.orders.get(orderId);
  }

  has(orderId: string): boolean {
    return this.orders.has(orderId);
  }

  remove(orderId: string): boolean {
    return this.orders.delete(orderId);
  }

  /**
   * Ids of every order for which `isDue` holds, collected before the caller
   * mutates anything, so an order moved during a tick is not picked up again
   * in the same tick.
   */
  collectDue(isDue: (order: ActiveOrder) => boolean): string[] {
    const due: string[] = [];
    for (const [orderId, order] of this.orders) {
      if (isDue(order)) {
        due.push(orderId);
      }
    }
    return due;
  }

  values(): IterableIterator<ActiveOrder> {
    return this.orders.values();
  }
}
