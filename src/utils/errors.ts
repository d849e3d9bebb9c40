/**
 * Generation Errors
 *
 * Generation is pure: the only runtime failures are configuration problems,
 * raised before any output is written.
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The victim pool for an attack pattern cannot cover the requested number of
 * instances. Fewer instances would skew the corpus class balance.
 */
export class InsufficientPopulationError extends ConfigurationError {
  constructor(
    public readonly pattern: string,
    public readonly required: number,
    public readonly available: number
  ) {
    super(`Cannot inject ${required} ${pattern} instances: only ${available} eligible customers`, [
      `pattern=${pattern}`,
      `required=${required}`,
      `available=${available}`,
    ]);
    this.name = 'InsufficientPopulationError';
  }
}

export class IdSpaceExhaustedError extends Error {
  constructor(min: number, max: number) {
    super(`No unused identifiers left in [${min}, ${max}]`);
    this.name = 'IdSpaceExhaustedError';
  }
}
