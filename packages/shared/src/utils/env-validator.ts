/**
 * Environment Variable Validator
 *
 * Resolves the environment variables a process reads at startup, applying
 * defaults and collecting the names of required variables that are missing.
 */

import { createLogger, type LoggerLike } from "./logger.js";

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (the process won't start without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Description for error messages */
  description?: string;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  /** Variables that fell back to their default. */
  defaulted: string[];
  values: Record<string, string>;
}

export interface ValidateEnvironmentOptions {
  /** Variables to read; defaults to process.env */
  env?: Record<string, string | undefined>;
  logger?: LoggerLike;
}

/**
 * Validate environment variables against a set of requirements.
 *
 * Optional variables without a default are simply absent from `values`.
 * The caller decides what a failed validation means; nothing here exits the
 * process.
 */
export function validateEnvironment(
  requirements: readonly EnvRequirement[],
  options: ValidateEnvironmentOptions = {},
): EnvValidationResult {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger("env-validator");
  const errors: string[] = [];
  const defaulted: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = env[req.name];

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(
          `Missing required env var: ${req.name}${req.description ? ` (${req.description})` : ""}`,
        );
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
        defaulted.push(req.name);
      }
    } else {
      values[req.name] = value;
    }
  }

  if (defaulted.length > 0) {
    logger.debug({ defaulted }, "Environment variables resolved from defaults");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
  }

  return {
    valid: errors.length === 0,
    errors,
    defaulted,
    values,
  };
}

// ---------------------------------------------------------------------------
// Simulator requirement set
// ---------------------------------------------------------------------------

export const SIMULATOR_ENV_REQUIREMENTS: readonly EnvRequirement[] = [
  { name: "SIM_DURATION_MINUTES", required: false, default: "5", description: "Session length in minutes" },
  { name: "SIM_MIN_DELAY_SECONDS", required: false, default: "1", description: "Minimum delay between new orders" },
  { name: "SIM_MAX_DELAY_SECONDS", required: false, default: "60", description: "Maximum delay between new orders" },
  { name: "SIM_CANCELLATION_PROBABILITY", required: false, default: "0.08", description: "Chance of cancellation at each status check" },
  { name: "SIM_BROKER", required: false, description: "Kafka bootstrap servers or amqp:// URL" },
  { name: "SIM_TOPIC", required: false, description: "Topic events are published to" },
  { name: "SIM_CATALOG_PATH", required: false, description: "JSON product catalog replacing the bundled one" },
];
