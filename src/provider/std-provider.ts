/**
 * Standard handler provider.
 *
 * Routes scalar descriptors to the built-in scalar handlers and the three
 * creation categories to the factory's entry points. It keeps no cache:
 * every lookup goes through the factory, so a configured factory is the
 * only state involved in resolution.
 */

import { createReaderConfig, type ReaderConfig } from '../config/index.js';
import type { HandlerFactory } from '../factory/types.js';
import { scalarHandlerFor } from '../handlers/scalar.js';
import { ReadContext, type ValueHandler } from '../handlers/types.js';
import type { TypeDescriptor } from '../types/index.js';
import type { HandlerProvider } from './types.js';

export class StdHandlerProvider implements HandlerProvider {
  readonly factory: HandlerFactory;

  constructor(factory: HandlerFactory) {
    this.factory = factory;
  }

  findValueHandler(config: ReaderConfig, type: TypeDescriptor): ValueHandler {
    switch (type.kind) {
      case 'scalar':
        return scalarHandlerFor(type);
      case 'record':
        return this.factory.createRecordHandler(config, type, this);
      case 'array':
        return this.factory.createArrayHandler(config, type, this);
      case 'enum':
        return this.factory.createEnumHandler(config, type, this);
    }
  }

  /**
   * Read `input` as a value of `type`.
   *
   * @throws HandlerCreationError if no handler can be built for the type
   * @throws MappingError if the input does not fit the type
   */
  readValue(type: TypeDescriptor, input: unknown, config: ReaderConfig = createReaderConfig()): unknown {
    const handler = this.findValueHandler(config, type);
    return handler.deserialize(input, new ReadContext(config, this));
  }
}
