/**
 * Generic handler construction: the base factory chain.
 *
 * For each category the chain first asks the registered extensions, then
 * builds a handler from the descriptor:
 * - records: properties from introspection (with mixin overlays)
 * - arrays: element handler from the provider
 * - enums: the descriptor's constants
 *
 * Concrete factories supply `withExtension()` themselves; this class has no
 * copy path of its own that a subclass could inherit by accident.
 */

import type { ReaderConfig } from '../config/index.js';
import { HandlerCreationError } from '../errors.js';
import { ArrayHandler } from '../handlers/array-handler.js';
import { EnumHandler } from '../handlers/enum-handler.js';
import { RecordHandler } from '../handlers/record-handler.js';
import type { ValueHandler } from '../handlers/types.js';
import { introspectRecord, type MixinSource, NO_MIXINS } from '../introspect/introspector.js';
import type { HandlerProvider } from '../provider/types.js';
import { ExtensionList, type HandlerExtension } from '../registry/extensions.js';
import { type ArrayType, type EnumType, keyOf, type RecordType } from '../types/index.js';
import type { HandlerFactory } from './types.js';

export abstract class BasicHandlerFactory implements HandlerFactory {
  protected readonly extensions: ExtensionList;

  constructor(extensions: ExtensionList = ExtensionList.empty()) {
    this.extensions = extensions;
  }

  abstract withExtension(extension: HandlerExtension): HandlerFactory;

  /**
   * Extensions in the order they are consulted.
   */
  getExtensions(): readonly HandlerExtension[] {
    return this.extensions.toArray();
  }

  /**
   * Overlay lookup used when introspecting records. None by default.
   */
  protected findMixins(): MixinSource {
    return NO_MIXINS;
  }

  createRecordHandler(config: ReaderConfig, type: RecordType, provider: HandlerProvider): ValueHandler {
    for (const extension of this.extensions) {
      const handler = extension.findRecordHandler?.(type, config, provider);
      if (handler) {
        return handler;
      }
    }

    const introspection = introspectRecord(type, this.findMixins());
    const seen = new Set<string>();
    for (const property of introspection.properties) {
      if (seen.has(property.jsonName)) {
        throw new HandlerCreationError(
          keyOf(type).token,
          `conflicting properties for input name '${property.jsonName}'`
        );
      }
      seen.add(property.jsonName);
    }

    return new RecordHandler(type, introspection);
  }

  createArrayHandler(config: ReaderConfig, type: ArrayType, provider: HandlerProvider): ValueHandler {
    for (const extension of this.extensions) {
      const handler = extension.findArrayHandler?.(type, config, provider);
      if (handler) {
        return handler;
      }
    }

    return new ArrayHandler(type, provider.findValueHandler(config, type.elementType));
  }

  createEnumHandler(config: ReaderConfig, type: EnumType, provider: HandlerProvider): ValueHandler {
    for (const extension of this.extensions) {
      const handler = extension.findEnumHandler?.(type, config, provider);
      if (handler) {
        return handler;
      }
    }

    if (type.values.length === 0) {
      throw new HandlerCreationError(keyOf(type).token, 'enum declares no values');
    }
    return new EnumHandler(type);
  }
}
