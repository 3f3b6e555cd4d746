import { describe, it, expect } from "vitest";
import {
  OrderStatus,
  getCancellationReasons,
  isActiveStatus,
  isTerminalStatus,
  type OrderEventPayload,
} from "../../packages/shared/src/protocol/index.js";
import { DEFAULT_DWELL_RANGES } from "../../packages/simulation-engine/src/services/lifecycle-policy.js";
import {
  createTestConfig,
  createTestSession,
  fixedDwells,
  FailingSink,
  RecordingSink,
} from "../helpers/fixtures.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FORWARD: readonly OrderStatus[] = [
  OrderStatus.Pending,
  OrderStatus.Confirmed,
  OrderStatus.Processing,
  OrderStatus.Shipped,
];

function eventsByOrder(events: readonly OrderEventPayload[]): Map<string, OrderEventPayload[]> {
  const byOrder = new Map<string, OrderEventPayload[]>();
  for (const event of events) {
    const list = byOrder.get(event.order_id) ?? [];
    list.push(event);
    byOrder.set(event.order_id, list);
  }
  return byOrder;
}

/** Forward-only prefix of the lifecycle, optionally ending in a cancellation. */
function expectValidHistory(history: readonly OrderEventPayload[]): void {
  const statuses = history.map((e) => e.status);
  const cancelled = statuses[statuses.length - 1] === OrderStatus.Cancelled;
  const forward = cancelled ? statuses.slice(0, -1) : statuses;

  expect(forward.length).toBeGreaterThan(0);
  expect(forward).toEqual(FORWARD.slice(0, forward.length));

  history.forEach((event, index) => {
    if (event.status !== OrderStatus.Cancelled) {
      expect(event.cancellation_reason).toBeUndefined();
      return;
    }
    const previous = history[index - 1]?.status;
    expect(previous).toBeDefined();
    if (previous !== undefined && isActiveStatus(previous)) {
      expect(getCancellationReasons(previous)).toContain(event.cancellation_reason);
    } else {
      expect.unreachable(`cancelled after ${String(previous)}`);
    }
  });
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

describe("Session scenarios", () => {
  it("zero duration: no events, sinks closed once", async () => {
    const sink = new RecordingSink();
    const { session } = createTestSession({
      config: createTestConfig({ durationMinutes: 0 }),
      sinks: [sink],
    });

    const summary = await session.run();

    expect(sink.events).toEqual([]);
    expect(sink.closeCalls).toBe(1);
    expect(summary.created).toBe(0);
    expect(summary.stopReason).toBe("duration");
  });

  it("no cancellations: every order ships through all four states", async () => {
    const sink = new RecordingSink();
    const { session } = createTestSession({
      config: createTestConfig({
        minDelaySeconds: 1,
        maxDelaySeconds: 5,
        maxOrders: 20,
        policy: { cancellationProbability: 0, dwellRanges: DEFAULT_DWELL_RANGES },
      }),
      sinks: [sink],
    });

    const summary = await session.run();
    const histories = eventsByOrder(sink.events);

    expect(histories.size).toBe(20);
    for (const history of histories.values()) {
      expect(history.map((e) => e.status)).toEqual(FORWARD);
    }
    expect(summary).toMatchObject({
      created: 20,
      shipped: 20,
      cancelled: 0,
      active: 0,
      statusUpdates: 60,
      successRate: 1,
      stopReason: "drained",
    });
  });

  it("certain cancellation: every order is cancelled straight from pending", async () => {
    const sink = new RecordingSink();
    const { session } = createTestSession({
      config: createTestConfig({
        maxOrders: 15,
        policy: { cancellationProbability: 1, dwellRanges: DEFAULT_DWELL_RANGES },
      }),
      sinks: [sink],
    });

    const summary = await session.run();
    const pendingReasons = getCancellationReasons(OrderStatus.Pending);

    for (const history of eventsByOrder(sink.events).values()) {
      expect(history.map((e) => e.status)).toEqual([OrderStatus.Pending, OrderStatus.Cancelled]);
      expect(pendingReasons).toContain(history[1]?.cancellation_reason);
    }
    expect(summary).toMatchObject({ created: 15, cancelled: 15, shipped: 0, cancellationRate: 1 });
  });

  it("always-failing sink: the session completes with accurate statistics", async () => {
    const failing = new FailingSink("broker");
    const recording = new RecordingSink("console");
    const { session, dispatcherLogger } = createTestSession({
      config: createTestConfig({ durationMinutes: 2, minDelaySeconds: 1, maxDelaySeconds: 4 }),
      sinks: [failing, recording],
      seed: 7,
    });

    const summary = await session.run();

    expect(summary.stopReason).toBe("duration");
    expect(summary.created).toBeGreaterThan(0);
    expect(failing.attempts).toBe(recording.events.length);
    expect(summary.dispatchFailures).toBe(recording.events.length);
    expect(dispatcherLogger.warn).toHaveBeenCalledTimes(recording.events.length);
    expect(summary.created + summary.statusUpdates).toBe(recording.events.length);
    expect(summary.created).toBe(summary.shipped + summary.cancelled + summary.active);
    expect(failing.closeCalls).toBe(1);
  });

  it("an order that is never due emits only its creation event", async () => {
    const sink = new RecordingSink();
    const { session } = createTestSession({
      config: createTestConfig({
        durationMinutes: 1,
        maxOrders: 1,
        policy: { cancellationProbability: 0.5, dwellRanges: fixedDwells(120, 120, 120) },
      }),
      sinks: [sink],
    });

    const summary = await session.run();

    expect(sink.events.map((e) => e.status)).toEqual([OrderStatus.Pending]);
    expect(summary).toMatchObject({ created: 1, statusUpdates: 0, active: 1, stopReason: "duration" });
  });

  it("repeated stop requests shut down once", async () => {
    const sink = new RecordingSink();
    const { session, manual, sessionLogger } = createTestSession({
      config: createTestConfig(),
      sinks: [sink],
    });
    manual.onSleep((now) => {
      if (now >= 5_000) {
        session.stop();
        session.stop();
      }
    });

    const summary = await session.run();
    session.stop();

    expect(summary.stopReason).toBe("interrupt");
    expect(sink.closeCalls).toBe(1);
    expect(sessionLogger.info.mock.calls.filter((call) => call[0] === "Stop requested")).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// Properties across seeds
// ---------------------------------------------------------------------------

describe.each([1, 2, 3, 4, 5])("Session invariants (seed %i)", (seed) => {
  it("keeps every history valid and the counters consistent", async () => {
    const sink = new RecordingSink();
    const { session } = createTestSession({
      config: createTestConfig({
        durationMinutes: 3,
        minDelaySeconds: 1,
        maxDelaySeconds: 6,
        policy: { cancellationProbability: 0.3, dwellRanges: DEFAULT_DWELL_RANGES },
      }),
      sinks: [sink],
      seed,
    });

    const summary = await session.run();
    const histories = eventsByOrder(sink.events);

    for (const history of histories.values()) {
      expectValidHistory(history);
    }

    const finals = [...histories.values()].map((h) => h[h.length - 1]?.status);
    const stillActive = finals.filter((s) => s !== undefined && !isTerminalStatus(s)).length;

    expect(histories.size).toBe(summary.created);
    expect(summary.shipped).toBe(finals.filter((s) => s === OrderStatus.Shipped).length);
    expect(summary.cancelled).toBe(finals.filter((s) => s === OrderStatus.Cancelled).length);
    expect(summary.active).toBe(stillActive);
    expect(session.activeCount).toBe(stillActive);
    expect(summary.created).toBe(summary.shipped + summary.cancelled + summary.active);
    expect(summary.successRate + summary.cancellationRate).toBeLessThanOrEqual(1);
    if (summary.active === 0) {
      expect(summary.successRate + summary.cancellationRate).toBeCloseTo(1);
    }
    expect(summary.statusUpdates).toBe(sink.events.length - summary.created);
  });
});
