/**
 * Handler extensions.
 *
 * An extension contributes handlers to the base factory chain. The chain
 * asks each extension, in list order, before building a handler itself;
 * the first non-null answer wins.
 *
 * @example
 * ```typescript
 * const isoDates: HandlerExtension = {
 *   findRecordHandler(type) {
 *     return type.name === 'Instant' ? instantHandler : null;
 *   },
 * };
 *
 * const factory = new CustomHandlerFactory().withExtension(isoDates);
 * ```
 */

import type { ReaderConfig } from '../config/index.js';
import type { ValueHandler } from '../handlers/types.js';
import type { HandlerProvider } from '../provider/types.js';
import type { ArrayType, EnumType, RecordType } from '../types/index.js';

export interface HandlerExtension {
  findRecordHandler?(
    type: RecordType,
    config: ReaderConfig,
    provider: HandlerProvider
  ): ValueHandler | null;

  findArrayHandler?(
    type: ArrayType,
    config: ReaderConfig,
    provider: HandlerProvider
  ): ValueHandler | null;

  findEnumHandler?(type: EnumType, config: ReaderConfig, provider: HandlerProvider): ValueHandler | null;
}

const EXTENSION_METHODS = ['findRecordHandler', 'findArrayHandler', 'findEnumHandler'] as const;

/**
 * Check that a value can be used as an extension: a non-null object whose
 * `find*` members, where present, are functions.
 */
export function isHandlerExtension(value: unknown): value is HandlerExtension {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return EXTENSION_METHODS.every((method) => {
    const member: unknown = Reflect.get(value, method);
    return member === undefined || typeof member === 'function';
  });
}

/**
 * Immutable, ordered list of extensions.
 *
 * `with()` puts the new extension first, so the most recently added
 * extension is consulted first.
 */
export class ExtensionList implements Iterable<HandlerExtension> {
  private readonly items: readonly HandlerExtension[];

  private constructor(items: readonly HandlerExtension[]) {
    this.items = items;
  }

  static empty(): ExtensionList {
    return new ExtensionList([]);
  }

  /**
   * List consulted in the given order.
   */
  static of(...extensions: HandlerExtension[]): ExtensionList {
    return new ExtensionList([...extensions]);
  }

  with(extension: HandlerExtension): ExtensionList {
    return new ExtensionList([extension, ...this.items]);
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): readonly HandlerExtension[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<HandlerExtension> {
    return this.items[Symbol.iterator]();
  }
}
