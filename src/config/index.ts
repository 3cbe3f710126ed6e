/**
 * Reader configuration.
 *
 * Feature flags consulted by the built-in handlers while reading. A config
 * is passed unchanged through the factory entry points, so overrides and
 * extensions see the same settings as the base chain.
 */

export interface ReaderConfig {
  /** Fail on input keys that match no property (default: true) */
  readonly failOnUnknownProperties: boolean;

  /** Read a non-array value as a one-element array (default: false) */
  readonly acceptSingleValueAsArray: boolean;

  /** Match enum constants ignoring case (default: false) */
  readonly readEnumsCaseInsensitive: boolean;

  /** Accept integer indexes for enum constants (default: false) */
  readonly allowEnumIndexes: boolean;
}

export const DEFAULT_READER_CONFIG: ReaderConfig = Object.freeze({
  failOnUnknownProperties: true,
  acceptSingleValueAsArray: false,
  readEnumsCaseInsensitive: false,
  allowEnumIndexes: false,
});

/**
 * Derive a config from `base`, replacing the features given in `overrides`.
 * Features left undefined keep their base value. The result is frozen.
 */
export function withFeatures(base: ReaderConfig, overrides: Partial<ReaderConfig>): ReaderConfig {
  return Object.freeze({
    failOnUnknownProperties: overrides.failOnUnknownProperties ?? base.failOnUnknownProperties,
    acceptSingleValueAsArray: overrides.acceptSingleValueAsArray ?? base.acceptSingleValueAsArray,
    readEnumsCaseInsensitive: overrides.readEnumsCaseInsensitive ?? base.readEnumsCaseInsensitive,
    allowEnumIndexes: overrides.allowEnumIndexes ?? base.allowEnumIndexes,
  });
}

export function createReaderConfig(overrides: Partial<ReaderConfig> = {}): ReaderConfig {
  return withFeatures(DEFAULT_READER_CONFIG, overrides);
}
