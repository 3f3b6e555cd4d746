/**
 * Simulator Errors
 */

export class SimulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimulatorError";
  }
}

/**
 * Raised before a session starts when its configuration cannot work.
 * `problems` holds one human-readable line per rejected setting.
 */
export class ConfigValidationError extends SimulatorError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigValidationError";
    this.problems = problems;
  }
}

export class CatalogValidationError extends ConfigValidationError {
  constructor(problems: readonly string[]) {
    super(problems);
    this.name = "CatalogValidationError";
  }
}

export class InvalidTransitionError extends SimulatorError {
  constructor(orderId: string, status: string, target: string | null) {
    super(
      target === null
        ? `Order ${orderId} is ${status} and cannot transition`
        : `Order ${orderId} cannot move from ${status} to ${target}`,
    );
    this.name = "InvalidTransitionError";
  }
}

export class RegistryError extends SimulatorError {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

export class SinkPublishError extends SimulatorError {
  readonly sink: string;
  readonly orderId: string;

  constructor(sink: string, orderId: string, reason: string) {
    super(`Sink ${sink} failed to publish order ${orderId}: ${reason}`);
    this.name = "SinkPublishError";
    this.sink = sink;
    this.orderId = orderId;
  }
}
