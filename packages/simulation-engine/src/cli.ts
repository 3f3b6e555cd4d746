import { Command, CommanderError, InvalidArgumentError } from "commander";
import { OrderStatus } from "@order-sim/shared/protocol";
import {
  createLogger,
  SIMULATOR_ENV_REQUIREMENTS,
  validateEnvironment,
  type LoggerLike,
} from "@order-sim/shared/utils";

import { loadProductCatalog } from "./catalog/catalog.js";
import {
  optionsFromEnv,
  resolveSimulatorConfig,
  type SimulatorConfig,
  type SimulatorOptions,
} from "./config.js";
import { ConfigValidationError } from "./errors.js";
import { SimulationSession } from "./services/engine.js";
import { OrderFactory } from "./services/order-factory.js";
import { formatStartupBanner, formatSummary } from "./services/report.js";
import { SinkDispatcher } from "./services/sink-dispatcher.js";
import { BrokerSink, ConsoleSink, createBrokerPublisher, type BrokerPublisher } from "./sinks/index.js";
import type { EventSink, Product } from "./types.js";

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

interface CliOptions {
  duration?: number;
  minDelay?: number;
  maxDelay?: number;
  broker?: string;
  topic?: string;
  console?: boolean;
  cancelProbability?: number;
  catalog?: string;
  maxOrders?: number;
  progressInterval?: number;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function buildProgram(): Command {
  return new Command()
    .name("order-sim")
    .description("Simulate e-commerce orders moving through their lifecycle and emit every state change")
    .option("--duration <minutes>", "Session length in minutes", parseNumber)
    .option("--min-delay <seconds>", "Minimum delay between new orders", parseNumber)
    .option("--max-delay <seconds>", "Maximum delay between new orders", parseNumber)
    .option("--broker <address>", "Kafka bootstrap servers (host:port,...) or an amqp:// URL")
    .option("--topic <name>", "Topic or exchange events are published to")
    .option("--console", "Print events to stdout (default unless a broker is set)")
    .option("--no-console", "Do not print events to stdout")
    .option("--cancel-probability <p>", "Chance of cancellation at each status check", parseNumber)
    .option("--catalog <path>", "JSON product catalog to draw orders from")
    .option("--max-orders <n>", "Stop admitting after n orders and exit once they finish", parseInteger)
    .option("--progress-interval <ms>", "Log a progress line this often", parseInteger);
}

function mergeOptions(flags: CliOptions, env: SimulatorOptions): SimulatorOptions {
  return {
    durationMinutes: flags.duration ?? env.durationMinutes,
    minDelaySeconds: flags.minDelay ?? env.minDelaySeconds,
    maxDelaySeconds: flags.maxDelay ?? env.maxDelaySeconds,
    cancellationProbability: flags.cancelProbability ?? env.cancellationProbability,
    broker: flags.broker ?? env.broker,
    topic: flags.topic ?? env.topic,
    console: flags.console,
    catalogPath: flags.catalog ?? env.catalogPath,
    maxOrders: flags.maxOrders,
    progressIntervalMs: flags.progressInterval,
  };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  logger?: LoggerLike;
  /** stdout: console-sink events and the final report */
  writeLine?: (line: string) => void;
  /** stderr: banner, usage errors, configuration problems */
  writeError?: (line: string) => void;
  createPublisher?: (address: string, logger: LoggerLike) => BrokerPublisher;
  /** Install interrupt handlers; returns a function removing them */
  registerSignals?: (onSignal: (signal: string) => void) => () => void;
  /** Called on a second interrupt; defaults to process.exit */
  exit?: (code: number) => void;
}

/** Exit code for a forced stop after a repeated interrupt (128 + SIGINT). */
export const FORCED_EXIT_CODE = 130;

async function releasePublisher(publisher: BrokerPublisher, logger: LoggerLike): Promise<void> {
  try {
    await publisher.close();
  } catch (err) {
    logger.warn({ err, kind: publisher.kind }, "Failed to release broker client");
  }
}

function registerProcessSignals(onSignal: (signal: string) => void): () => void {
  const handler = (signal: NodeJS.Signals) => onSignal(signal);
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
  return () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
}

/**
 * Run the simulator with user arguments (without the node and script
 * entries). Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const writeLine = deps.writeLine ?? ((line: string) => console.log(line));
  const writeError = deps.writeError ?? ((line: string) => console.error(line));
  const logger = deps.logger ?? createLogger("order-sim", { destination: 2 });

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => writeLine(text.trimEnd()),
      writeErr: (text) => writeError(text.trimEnd()),
    });

  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const env = validateEnvironment(SIMULATOR_ENV_REQUIREMENTS, { env: deps.env, logger });

  let config: SimulatorConfig;
  let catalog: Product[];
  try {
    config = resolveSimulatorConfig(mergeOptions(program.opts<CliOptions>(), optionsFromEnv(env.values)));
    catalog = loadProductCatalog(config.catalogPath);
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      for (const problem of err.problems) {
        writeError(`Configuration error: ${problem}`);
      }
      return 1;
    }
    throw err;
  }

  const sinks: EventSink[] = [];
  let consoleEnabled = config.console;
  let brokerConnected = false;

  if (config.broker) {
    const { address, topic } = config.broker;
    const publisher = (deps.createPublisher ?? createBrokerPublisher)(address, logger);
    try {
      await publisher.connect();
      sinks.push(new BrokerSink(publisher, topic));
      brokerConnected = true;
    } catch (err) {
      logger.warn(
        { err, broker: address, kind: publisher.kind },
        "Broker unavailable; continuing with console output only",
      );
      await releasePublisher(publisher, logger);
      consoleEnabled = true;
    }
  }

  if (consoleEnabled) {
    sinks.push(new ConsoleSink(writeLine));
  }

  for (const line of formatStartupBanner({
    ...config,
    broker: brokerConnected ? config.broker : null,
    console: consoleEnabled,
  })) {
    writeError(line);
  }

  const factory = new OrderFactory({
    catalog,
    pendingDwell: config.simulation.policy.dwellRanges[OrderStatus.Pending],
  });
  const session = new SimulationSession({
    config: config.simulation,
    factory,
    dispatcher: new SinkDispatcher(sinks, logger),
    logger,
  });

  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let interrupted = false;
  const unregister = (deps.registerSignals ?? registerProcessSignals)((signal) => {
    if (interrupted) {
      logger.warn({ signal }, "Second interrupt received, exiting without waiting for shutdown");
      exit(FORCED_EXIT_CODE);
      return;
    }
    interrupted = true;
    logger.info({ signal }, "Interrupt received, shutting down");
    session.stop();
  });

  try {
    const summary = await session.run();
    for (const line of formatSummary(summary)) {
      writeLine(line);
    }
    return 0;
  } finally {
    unregister();
  }
}
