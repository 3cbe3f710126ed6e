/**
 * Direct (exact-type) handler mappings.
 *
 * Maps a type key to the handler to use for exactly that type. Lookups never
 * match subtypes or supertypes: a handler registered for `Shape` is not used
 * for `Circle`. The registry is not split by creation category; one entry
 * answers record, array and enum lookups alike.
 *
 * Mutated only during configuration. Once configuration is done the registry
 * is read-only and can be shared between any number of readers.
 *
 * @example
 * ```typescript
 * const mappings = new DirectMappingRegistry();
 * mappings.register(keyOf(Money), moneyHandler);
 *
 * mappings.lookup(keyOf(Money)); // moneyHandler
 * mappings.lookup(keyOf(Price)); // undefined
 * ```
 */

import type { ValueHandler } from '../handlers/types.js';
import { createLogger } from '../logging/index.js';
import { TypeKey } from '../types/index.js';

const log = createLogger({ component: 'direct-mappings' });

export class DirectMappingRegistry {
  private handlers: Map<string, ValueHandler> = new Map();

  /**
   * Register a handler for a type key, replacing any earlier one.
   */
  register(key: TypeKey, handler: ValueHandler): void {
    if (this.handlers.has(key.token)) {
      log.warn('Overwriting existing direct mapping', { operation: 'register', type_key: key.token });
    }
    this.handlers.set(key.token, handler);
    log.debug('Registered direct mapping', {
      operation: 'register',
      type_key: key.token,
      handled_type: handler.handledType,
    });
  }

  /**
   * Remove the mapping for a key.
   *
   * @returns True if a mapping was removed
   */
  unregister(key: TypeKey): boolean {
    return this.handlers.delete(key.token);
  }

  lookup(key: TypeKey): ValueHandler | undefined {
    return this.handlers.get(key.token);
  }

  has(key: TypeKey): boolean {
    return this.handlers.has(key.token);
  }

  /**
   * Keys with a registered handler, in registration order.
   */
  registeredKeys(): TypeKey[] {
    return Array.from(this.handlers.keys(), (token) => TypeKey.of(token));
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Independent registry holding the same entries.
   */
  copy(): DirectMappingRegistry {
    const copy = new DirectMappingRegistry();
    copy.handlers = new Map(this.handlers);
    return copy;
  }
}
