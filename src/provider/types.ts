import type { ReaderConfig } from '../config/index.js';
import type { ValueHandler } from '../handlers/types.js';
import type { TypeDescriptor } from '../types/index.js';

/**
 * Source of handlers for nested values.
 *
 * Handlers and factories go through the provider whenever they need the
 * handler of another type (an array's elements, a record's properties), so
 * direct mappings and extensions apply at every depth.
 */
export interface HandlerProvider {
  findValueHandler(config: ReaderConfig, type: TypeDescriptor): ValueHandler;
}
