/**
 * Handler factory with per-type overrides and mixin overlays.
 *
 * Configuration, done before the factory is shared:
 * - `register(type, handler)`: use `handler` for exactly `type`, never for
 *   its subtypes
 * - `setOverlay(destination, source)`: introspect `destination` with the
 *   annotations of `source` mixed in
 * - `withExtension(extension)`: new factory with an added extension
 *
 * Each creation entry point checks the direct mappings first and returns a
 * hit as is; on a miss it delegates to the base chain with the same
 * arguments and returns its result, or lets its error through.
 *
 * The factory is not synchronized. Configure it fully, then share it: no
 * resolution call mutates state.
 *
 * @example
 * ```typescript
 * const factory = new CustomHandlerFactory();
 * factory.register(Money, moneyHandler);
 * factory.setOverlay(PublicApiView, InternalAnnotations);
 *
 * const provider = new StdHandlerProvider(factory);
 * provider.readValue(Money, { amount: 5, currency: 'EUR' });
 * ```
 *
 * @example Subclassing
 * ```typescript
 * class AuditedFactory extends CustomHandlerFactory {
 *   constructor(readonly auditLabel: string, state?: Partial<CustomFactoryState>) {
 *     super(state);
 *   }
 *
 *   // Required, or withExtension() throws
 *   protected copyWith(extensions: ExtensionList): AuditedFactory {
 *     return new AuditedFactory(this.auditLabel, this.snapshotState(extensions));
 *   }
 * }
 * ```
 */

import type { ReaderConfig } from '../config/index.js';
import { FactoryConfigurationError } from '../errors.js';
import type { ValueHandler } from '../handlers/types.js';
import type { MixinSource } from '../introspect/introspector.js';
import { createLogger } from '../logging/index.js';
import type { HandlerProvider } from '../provider/types.js';
import { DirectMappingRegistry } from '../registry/direct-mappings.js';
import { ExtensionList, type HandlerExtension, isHandlerExtension } from '../registry/extensions.js';
import { MixinOverlayRegistry } from '../registry/mixin-overlays.js';
import {
  type ArrayType,
  type DescribedType,
  type EnumType,
  keyOf,
  type RecordType,
  type TypeDescriptor,
  type TypeKey,
} from '../types/index.js';
import { BasicHandlerFactory } from './basic-factory.js';

const log = createLogger({ component: 'custom-factory' });

/**
 * State a custom factory is built from.
 */
export interface CustomFactoryState {
  readonly extensions: ExtensionList;
  readonly mappings: DirectMappingRegistry;
  readonly overlays: MixinOverlayRegistry;
}

export class CustomHandlerFactory extends BasicHandlerFactory implements MixinSource {
  protected readonly mappings: DirectMappingRegistry;
  protected readonly overlays: MixinOverlayRegistry;

  constructor(state: Partial<CustomFactoryState> = {}) {
    super(state.extensions ?? ExtensionList.empty());
    this.mappings = state.mappings ?? new DirectMappingRegistry();
    this.overlays = state.overlays ?? new MixinOverlayRegistry();
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /**
   * Use `handler` for `type`, and only that type.
   *
   * The handler may produce a narrower value than `type` describes, since
   * that value is still assignable where `type` is expected. A later
   * registration for the same type replaces this one.
   */
  register<T>(type: DescribedType<T>, handler: ValueHandler<T>): void {
    this.mappings.register(keyOf(type), handler);
  }

  /**
   * Mix the annotations of `source` (and its supertypes) into `destination`
   * when it is introspected. A later overlay for the same destination
   * replaces this one.
   */
  setOverlay(destination: TypeDescriptor, source: RecordType): void {
    const key = keyOf(destination);
    if (this.overlays.getOverlaySource(key)) {
      log.debug('Replacing mixin overlay', { operation: 'set_overlay', type_key: key.token });
    }
    this.overlays.setOverlay(key, source);
  }

  /**
   * New factory with every current extension plus `extension`, which is
   * consulted before the others. This factory is left unchanged.
   *
   * @throws FactoryConfigurationError if `extension` is absent or invalid,
   *   or if called on a subclass that does not define its own `copyWith()`
   */
  withExtension(extension: HandlerExtension): CustomHandlerFactory {
    const factoryType = this.constructor.name;

    if (!isHandlerExtension(extension)) {
      throw new FactoryConfigurationError(
        'Cannot add an absent or invalid handler extension',
        factoryType
      );
    }

    if (!definesOwnCopy(this)) {
      throw new FactoryConfigurationError(
        `Subtype of CustomHandlerFactory (${factoryType}) has not overridden method 'copyWith': ` +
          'cannot create a copy with additional handler extensions',
        factoryType
      );
    }

    const copy = this.copyWith(this.extensions.with(extension));
    log.debug('Added handler extension', {
      operation: 'with_extension',
      factory_type: factoryType,
      extension_count: this.extensions.size + 1,
    });
    return copy;
  }

  /**
   * Build the factory returned by `withExtension()`.
   *
   * Subclasses with state of their own must override this; the inherited
   * version would drop that state, so `withExtension()` refuses to use it.
   */
  protected copyWith(extensions: ExtensionList): CustomHandlerFactory {
    return new CustomHandlerFactory(this.snapshotState(extensions));
  }

  /**
   * Copies of the current mappings and overlays, with the given extensions.
   */
  protected snapshotState(extensions: ExtensionList): CustomFactoryState {
    return {
      extensions,
      mappings: this.mappings.copy(),
      overlays: this.overlays.copy(),
    };
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  getOverlay(destination: TypeKey): TypeKey | undefined {
    return this.overlays.getOverlay(destination);
  }

  getOverlaySource(destination: TypeKey): RecordType | undefined {
    return this.overlays.getOverlaySource(destination);
  }

  registeredKeys(): TypeKey[] {
    return this.mappings.registeredKeys();
  }

  protected findMixins(): MixinSource {
    return this.overlays;
  }

  // ---------------------------------------------------------------------------
  // Creation entry points
  // ---------------------------------------------------------------------------

  createRecordHandler(config: ReaderConfig, type: RecordType, provider: HandlerProvider): ValueHandler {
    return this.findDirectMapping(type) ?? super.createRecordHandler(config, type, provider);
  }

  createArrayHandler(config: ReaderConfig, type: ArrayType, provider: HandlerProvider): ValueHandler {
    return this.findDirectMapping(type) ?? super.createArrayHandler(config, type, provider);
  }

  createEnumHandler(config: ReaderConfig, type: EnumType, provider: HandlerProvider): ValueHandler {
    // Enums have no subtypes; a direct match is the only kind there is
    return this.findDirectMapping(type) ?? super.createEnumHandler(config, type, provider);
  }

  private findDirectMapping(type: TypeDescriptor): ValueHandler | undefined {
    const key = keyOf(type);
    const handler = this.mappings.lookup(key);
    if (handler) {
      log.trace('Using direct mapping', { operation: 'create_handler', type_key: key.token });
    }
    return handler;
  }
}

/**
 * True when the runtime class of `factory` is `CustomHandlerFactory` itself
 * or declares its own `copyWith()`.
 */
function definesOwnCopy(factory: CustomHandlerFactory): boolean {
  if (factory.constructor === CustomHandlerFactory) {
    return true;
  }
  const prototype: object = Object.getPrototypeOf(factory);
  return Object.prototype.hasOwnProperty.call(prototype, 'copyWith');
}
