export * from "./types.js";
export * from "./errors.js";
export { loadProductCatalog, validateCatalog, DEFAULT_CATALOG_PATH } from "./catalog/catalog.js";
export type { CatalogIssue, CatalogValidationResult } from "./catalog/catalog.js";
export {
  optionsFromEnv,
  resolveSimulatorConfig,
  type BrokerTarget,
  type SimulatorConfig,
  type SimulatorOptions,
} from "./config.js";
export { SimulationSession, DEFAULT_TICK_INTERVAL_MS, type SimulationSessionOptions } from "./services/engine.js";
export { OrderFactory, toEventPayload, type OrderFactoryOptions } from "./services/order-factory.js";
export {
  LifecyclePolicy,
  DEFAULT_CANCELLATION_PROBABILITY,
  DEFAULT_DWELL_RANGES,
  DEFAULT_POLICY_CONFIG,
  isActiveOrder,
  type TransitionDecision,
} from "./services/lifecycle-policy.js";
export { ActiveOrderRegistry } from "./services/active-order-registry.js";
export { SinkDispatcher } from "./services/sink-dispatcher.js";
export { SessionStatistics } from "./services/session-stats.js";
export { formatStartupBanner, formatSummary } from "./services/report.js";
export { createSeededRandom, mathRandom } from "./services/random.js";
export * from "./sinks/index.js";
export { runCli, FORCED_EXIT_CODE, type CliDependencies } from "./cli.js";
