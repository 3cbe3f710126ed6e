/**
 * Configuration registries behind the custom handler factory.
 *
 * - `DirectMappingRegistry`: exact-type handler overrides
 * - `MixinOverlayRegistry`: destination type to overlay source
 * - `ExtensionList`: immutable, ordered handler extensions
 */

export { DirectMappingRegistry } from './direct-mappings.js';
export { ExtensionList, type HandlerExtension, isHandlerExtension } from './extensions.js';
export { MixinOverlayRegistry } from './mixin-overlays.js';
