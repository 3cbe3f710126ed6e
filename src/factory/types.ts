import type { ReaderConfig } from '../config/index.js';
import type { ValueHandler } from '../handlers/types.js';
import type { HandlerProvider } from '../provider/types.js';
import type { HandlerExtension } from '../registry/extensions.js';
import type { ArrayType, EnumType, RecordType } from '../types/index.js';

/**
 * Handler factory: one creation entry point per category.
 *
 * Entry points may throw `HandlerCreationError` when no handler can be
 * built for the type.
 */
export interface HandlerFactory {
  createRecordHandler(config: ReaderConfig, type: RecordType, provider: HandlerProvider): ValueHandler;

  createArrayHandler(config: ReaderConfig, type: ArrayType, provider: HandlerProvider): ValueHandler;

  createEnumHandler(config: ReaderConfig, type: EnumType, provider: HandlerProvider): ValueHandler;

  /**
   * New factory with every current extension plus `extension`.
   * The receiving factory is left unchanged.
   */
  withExtension(extension: HandlerExtension): HandlerFactory;
}
