/**
 * Raised when a plan file cannot be found, read, or converted to plan JSON.
 */
export class PlanInputError extends Error {
  override readonly name = 'PlanInputError';

  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a configuration file cannot be loaded or fails validation.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    message: string,
    readonly path?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
