/**
 * Error types for handler resolution and reading.
 *
 * Configuration errors are raised synchronously by configuration calls;
 * creation and mapping errors come from the base factory chain and the
 * handlers it builds, and pass through the override layer unwrapped.
 */

export type PathSegment = string | number;

/**
 * Render a read path as `$`, `$.items[2].sku`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let rendered = '$';
  for (const segment of path) {
    rendered += typeof segment === 'number' ? `[${segment}]` : `.${segment}`;
  }
  return rendered;
}

/**
 * Base error class for all handler errors.
 */
export class HandlerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerError';
  }
}

/**
 * Error thrown when the factory is configured with an invalid extension,
 * or cannot be copied without losing state.
 */
export class FactoryConfigurationError extends HandlerError {
  readonly factoryType: string;

  constructor(message: string, factoryType: string) {
    super(message);
    this.name = 'FactoryConfigurationError';
    this.factoryType = factoryType;
  }
}

/**
 * Error thrown when no handler can be constructed for a type.
 */
export class HandlerCreationError extends HandlerError {
  readonly typeKey: string;

  constructor(typeKey: string, reason: string) {
    super(`Cannot create handler for '${typeKey}': ${reason}`);
    this.name = 'HandlerCreationError';
    this.typeKey = typeKey;
  }
}

/**
 * Error thrown when input does not fit the type being read.
 */
export class MappingError extends HandlerError {
  readonly path: readonly PathSegment[];
  readonly typeKey: string;

  constructor(message: string, path: readonly PathSegment[], typeKey: string) {
    super(`${message} (at ${formatPath(path)})`);
    this.name = 'MappingError';
    this.path = path;
    this.typeKey = typeKey;
  }
}
