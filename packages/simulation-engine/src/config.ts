/**
 * Simulator Configuration
 *
 * Merges command-line options over environment values and validates the
 * result before anything is started. Every rejected setting is reported at
 * once through a single ConfigValidationError.
 */

import { DEFAULT_CATALOG_PATH } from "./catalog/catalog.js";
import { ConfigValidationError } from "./errors.js";
import { DEFAULT_TICK_INTERVAL_MS } from "./services/engine.js";
import { DEFAULT_DWELL_RANGES } from "./services/lifecycle-policy.js";
import type { SimulationConfig } from "./types.js";

/** Options as given by the user, before validation. */
export interface SimulatorOptions {
  durationMinutes: number;
  minDelaySeconds: number;
  maxDelaySeconds: number;
  cancellationProbability: number;
  broker?: string;
  topic?: string;
  /** Explicit console switch; unset means "on unless a broker is configured" */
  console?: boolean;
  catalogPath?: string;
  maxOrders?: number;
  tickIntervalMs?: number;
  progressIntervalMs?: number;
}

export interface BrokerTarget {
  address: string;
  topic: string;
}

export interface SimulatorConfig {
  simulation: SimulationConfig;
  broker: BrokerTarget | null;
  console: boolean;
  catalogPath: string;
}

/**
 * Read simulator options from resolved environment values. Numbers that do
 * not parse come through as NaN and are rejected by `resolveSimulatorConfig`.
 */
export function optionsFromEnv(values: Record<string, string>): SimulatorOptions {
  return {
    durationMinutes: Number(values["SIM_DURATION_MINUTES"] ?? "5"),
    minDelaySeconds: Number(values["SIM_MIN_DELAY_SECONDS"] ?? "1"),
    maxDelaySeconds: Number(values["SIM_MAX_DELAY_SECONDS"] ?? "60"),
    cancellationProbability: Number(values["SIM_CANCELLATION_PROBABILITY"] ?? "0.08"),
    broker: values["SIM_BROKER"],
    topic: values["SIM_TOPIC"],
    catalogPath: values["SIM_CATALOG_PATH"],
  };
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === "" ? undefined : trimmed;
}

/**
 * Validate options and build the session configuration.
 *
 * @throws ConfigValidationError listing every problem found.
 */
export function resolveSimulatorConfig(options: SimulatorOptions): SimulatorConfig {
  const problems: string[] = [];

  const nonNegative: Array<[string, number]> = [
    ["durationMinutes", options.durationMinutes],
    ["minDelaySeconds", options.minDelaySeconds],
    ["maxDelaySeconds", options.maxDelaySeconds],
  ];
  for (const [name, value] of nonNegative) {
    if (!isNonNegative(value)) {
      problems.push(`${name} must be a finite number >= 0 (got ${value})`);
    }
  }

  if (
    isNonNegative(options.minDelaySeconds) &&
    isNonNegative(options.maxDelaySeconds) &&
    options.maxDelaySeconds < options.minDelaySeconds
  ) {
    problems.push(
      `maxDelaySeconds (${options.maxDelaySeconds}) must be >= minDelaySeconds (${options.minDelaySeconds})`,
    );
  }

  const p = options.cancellationProbability;
  if (!(Number.isFinite(p) && p >= 0 && p <= 1)) {
    problems.push(`cancellationProbability must be between 0 and 1 (got ${p})`);
  }

  if (
    options.maxOrders !== undefined &&
    !(Number.isInteger(options.maxOrders) && options.maxOrders > 0)
  ) {
    problems.push(`maxOrders must be a positive integer (got ${options.maxOrders})`);
  }

  const tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  if (!(Number.isFinite(tickIntervalMs) && tickIntervalMs > 0)) {
    problems.push(`tickIntervalMs must be a positive number (got ${tickIntervalMs})`);
  }

  if (
    options.progressIntervalMs !== undefined &&
    !(Number.isFinite(options.progressIntervalMs) && options.progressIntervalMs > 0)
  ) {
    problems.push(`progressIntervalMs must be a positive number (got ${options.progressIntervalMs})`);
  }

  const address = blankToUndefined(options.broker);
  const topic = blankToUndefined(options.topic);
  if ((address === undefined) !== (topic === undefined)) {
    problems.push("broker and topic must be set together");
  }
  if (address !== undefined && address.split(",").every((entry) => entry.trim() === "")) {
    problems.push("broker address lists no servers");
  }

  const broker = address !== undefined && topic !== undefined ? { address, topic } : null;
  const consoleEnabled = options.console ?? broker === null;
  if (!consoleEnabled && broker === null) {
    problems.push("no output enabled: turn the console on or configure a broker and topic");
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }

  return {
    simulation: {
      durationMinutes: options.durationMinutes,
      minDelaySeconds: options.minDelaySeconds,
      maxDelaySeconds: options.maxDelaySeconds,
      tickIntervalMs,
      maxOrders: options.maxOrders,
      progressIntervalMs: options.progressIntervalMs,
      policy: {
        cancellationProbability: p,
        dwellRanges: DEFAULT_DWELL_RANGES,
      },
    },
    broker,
    console: consoleEnabled,
    catalogPath: blankToUndefined(options.catalogPath) ?? DEFAULT_CATALOG_PATH,
  };
}
