export { createLogger, type CreateLoggerOptions, type LoggerLike } from "./logger.js";
export {
  validateEnvironment,
  type EnvRequirement,
  type EnvValidationResult,
  type ValidateEnvironmentOptions,
  SIMULATOR_ENV_REQUIREMENTS,
} from "./env-validator.js";
