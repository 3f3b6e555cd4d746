import { describe, it, expect } from "vitest";
import { formatStartupBanner, formatSummary } from "./report.js";
import { resolveSimulatorConfig } from "../config.js";
import type { SessionSummary } from "../types.js";

const SUMMARY: SessionSummary = {
  created: 37,
  statusUpdates: 96,
  shipped: 25,
  cancelled: 4,
  active: 8,
  successRate: 25 / 37,
  cancellationRate: 4 / 37,
  elapsedMs: 300_600,
  ordersPerMinute: 37 / (300_600 / 60_000),
  dispatchFailures: 0,
  stopReason: "duration",
  startedAt: "2026-01-01T00:00:00.000Z",
  endedAt: "2026-01-01T00:05:00.600Z",
};

describe("formatSummary", () => {
  it("renders counts, one-decimal percentages and two-decimal timings", () => {
    expect(formatSummary(SUMMARY)).toEqual([
      "=".repeat(80),
      "Simulation finished (stop reason: duration)",
      "Total new orders created: 37",
      "Total status updates: 96",
      "Total orders shipped: 25",
      "Total orders cancelled: 4",
      "Active orders (still in pipeline): 8",
      "Success rate: 67.6%",
      "Cancellation rate: 10.8%",
      "Dispatch failures: 0",
      "Total time elapsed: 300.60 seconds (5.01 minutes)",
      "Average rate: 7.39 new orders per minute",
    ]);
  });
});

describe("formatStartupBanner", () => {
  it("describes a console-only run", () => {
    const config = resolveSimulatorConfig({
      durationMinutes: 5,
      minDelaySeconds: 1,
      maxDelaySeconds: 60,
      cancellationProbability: 0.08,
    });

    expect(formatStartupBanner(config)).toEqual([
      "Starting order lifecycle simulator",
      "Duration: 5 minutes",
      "New order delay range: 1-60 seconds",
      "Order lifecycle: pending -> confirmed -> processing -> shipped",
      "Cancellation probability: 8.0% per status check",
      "Broker output: DISABLED",
      "Console output: ENABLED",
      "=".repeat(80),
      "",
    ]);
  });

  it("names the broker target and order limit when set", () => {
    const config = resolveSimulatorConfig({
      durationMinutes: 1,
      minDelaySeconds: 0,
      maxDelaySeconds: 2,
      cancellationProbability: 0,
      broker: "amqp://localhost",
      topic: "orders",
      maxOrders: 10,
    });

    expect(formatStartupBanner(config).slice(5, 10)).toEqual([
      "Order limit: 10",
      "Broker output: ENABLED",
      "  Address: amqp://localhost",
      "  Topic: orders",
      "Console output: DISABLED",
    ]);
  });
});
