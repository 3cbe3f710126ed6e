/**
 * Per-type handler overrides for a deserialization factory chain.
 *
 * @packageDocumentation
 */

// =============================================================================
// Configuration and errors
// =============================================================================
export {
  createReaderConfig,
  DEFAULT_READER_CONFIG,
  type ReaderConfig,
  withFeatures,
} from './config/index.js';
export {
  FactoryConfigurationError,
  formatPath,
  HandlerCreationError,
  HandlerError,
  MappingError,
  type PathSegment,
} from './errors.js';

// =============================================================================
// Type descriptors and keys
// =============================================================================
export * from './types/index.js';

// =============================================================================
// Factories, registries and introspection
// =============================================================================
export * from './factory/index.js';
export * from './introspect/index.js';
export * from './registry/index.js';

// =============================================================================
// Handlers and provider
// =============================================================================
export * from './handlers/index.js';
export * from './provider/index.js';

// =============================================================================
// Logging
// =============================================================================
export {
  buildLoggerOptions,
  type ComponentLogger,
  createLogger,
  getRootLogger,
  type LogFields,
  type LogLevel,
} from './logging/index.js';
