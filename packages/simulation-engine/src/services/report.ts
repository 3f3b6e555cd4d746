import type { SessionSummary } from "../types.js";
import type { SimulatorConfig } from "../config.js";

const RULE = "=".repeat(80);

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/** Lines printed before the first event. */
export function formatStartupBanner(config: SimulatorConfig): string[] {
  const { simulation, broker } = config;
  const lines = [
    "Starting order lifecycle simulator",
    `Duration: ${simulation.durationMinutes} minutes`,
    `New order delay range: ${simulation.minDelaySeconds}-${simulation.maxDelaySeconds} seconds`,
    "Order lifecycle: pending -> confirmed -> processing -> shipped",
    `Cancellation probability: ${percent(simulation.policy.cancellationProbability)} per status check`,
  ];

  if (simulation.maxOrders !== undefined) {
    lines.push(`Order limit: ${simulation.maxOrders}`);
  }

  if (broker) {
    lines.push("Broker output: ENABLED", `  Address: ${broker.address}`, `  Topic: ${broker.topic}`);
  } else {
    lines.push("Broker output: DISABLED");
  }
  lines.push(`Console output: ${config.console ? "ENABLED" : "DISABLED"}`, RULE, "");
  return lines;
}

/** Final statistics, one line per figure. */
export function formatSummary(summary: SessionSummary): string[] {
  const seconds = summary.elapsedMs / 1000;

  return [
    RULE,
    `Simulation finished (stop reason: ${summary.stopReason})`,
    `Total new orders created: ${summary.created}`,
    `Total status updates: ${summary.statusUpdates}`,
    `Total orders shipped: ${summary.shipped}`,
    `Total orders cancelled: ${summary.cancelled}`,
    `Active orders (still in pipeline): ${summary.active}`,
    `Success rate: ${percent(summary.successRate)}`,
    `Cancellation rate: ${percent(summary.cancellationRate)}`,
    `Dispatch failures: ${summary.dispatchFailures}`,
    `Total time elapsed: ${seconds.toFixed(2)} seconds (${(seconds / 60).toFixed(2)} minutes)`,
    `Average rate: ${summary.ordersPerMinute.toFixed(2)} new orders per minute`,
  ];
}
