/**
 * Shared test fixtures for the simulator test suites.
 *
 * Provides a manual clock, in-memory sinks, spy loggers and config builders
 * used by the session unit tests and the integration scenarios.
 */

import { vi } from "vitest";
import type { OrderEventPayload } from "../../packages/shared/src/protocol/types.js";
import { OrderStatus } from "../../packages/shared/src/protocol/order-states.js";
import { OrderFactory } from "../../packages/simulation-engine/src/services/order-factory.js";
import { SinkDispatcher } from "../../packages/simulation-engine/src/services/sink-dispatcher.js";
import { SimulationSession } from "../../packages/simulation-engine/src/services/engine.js";
import { createSeededRandom } from "../../packages/simulation-engine/src/services/random.js";
import { DEFAULT_POLICY_CONFIG } from "../../packages/simulation-engine/src/services/lifecycle-policy.js";
import type {
  EventSink,
  Product,
  SimulationConfig,
} from "../../packages/simulation-engine/src/types.js";

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

/**
 * A clock that only moves when the session sleeps. A hook registered with
 * `onSleep` runs after each advance, e.g. to interrupt a session at a given
 * time.
 */
export function createManualClock(startMs = 0) {
  let nowMs = startMs;
  let sleepHook: ((nowMs: number) => void) | undefined;

  return {
    clock: { now: () => nowMs },
    sleep: async (ms: number): Promise<void> => {
      nowMs += ms;
      sleepHook?.(nowMs);
    },
    wallClock: () => new Date(Date.UTC(2026, 0, 1) + nowMs),
    onSleep(hook: (nowMs: number) => void): void {
      sleepHook = hook;
    },
  };
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export class RecordingSink implements EventSink {
  readonly name: string;
  readonly events: OrderEventPayload[] = [];
  closeCalls = 0;

  constructor(name = "recording") {
    this.name = name;
  }

  async write(event: OrderEventPayload): Promise<void> {
    this.events.push(structuredClone(event));
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  /** Status sequence per order id, in emission order. */
  statusesByOrder(): Map<string, string[]> {
    const byOrder = new Map<string, string[]>();
    for (const event of this.events) {
      const statuses = byOrder.get(event.order_id) ?? [];
      statuses.push(event.status);
      byOrder.set(event.order_id, statuses);
    }
    return byOrder;
  }
}

export class FailingSink implements EventSink {
  readonly name: string;
  attempts = 0;
  closeCalls = 0;

  constructor(name = "failing") {
    this.name = name;
  }

  async write(): Promise<void> {
    this.attempts++;
    throw new Error("broker unavailable");
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export function createSpyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------------------------------------------------------------------------
// Config & session builders
// ---------------------------------------------------------------------------

export const TEST_CATALOG: Product[] = [
  { id: "PROD-001", name: "Wireless Bluetooth Headphones", priceRange: { min: 29.99, max: 199.99 } },
  { id: "PROD-003", name: "Running Shoes", priceRange: { min: 49.99, max: 179.99 } },
  { id: "PROD-007", name: "Coffee Maker", priceRange: { min: 39.99, max: 249.99 } },
];

export function createTestConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return {
    durationMinutes: 60,
    minDelaySeconds: 1,
    maxDelaySeconds: 1,
    tickIntervalMs: 100,
    policy: DEFAULT_POLICY_CONFIG,
    ...overrides,
  };
}

/** Dwell ranges collapsed to single values, in seconds. */
export function fixedDwells(pending: number, confirmed: number, processing: number) {
  return {
    [OrderStatus.Pending]: { min: pending, max: pending },
    [OrderStatus.Confirmed]: { min: confirmed, max: confirmed },
    [OrderStatus.Processing]: { min: processing, max: processing },
  };
}

export function createTestSession(options: {
  config: SimulationConfig;
  sinks: EventSink[];
  seed?: number;
}) {
  const manual = createManualClock();
  const random = createSeededRandom(options.seed ?? 42);
  const sessionLogger = createSpyLogger();
  const dispatcherLogger = createSpyLogger();
  const factory = new OrderFactory({
    catalog: TEST_CATALOG,
    pendingDwell: options.config.policy.dwellRanges[OrderStatus.Pending],
    random,
    wallClock: manual.wallClock,
  });
  const dispatcher = new SinkDispatcher(options.sinks, dispatcherLogger);
  const session = new SimulationSession({
    config: options.config,
    factory,
    dispatcher,
    clock: manual.clock,
    sleep: manual.sleep,
    wallClock: manual.wallClock,
    random,
    logger: sessionLogger,
  });

  return { session, manual, dispatcher, sessionLogger, dispatcherLogger };
}
