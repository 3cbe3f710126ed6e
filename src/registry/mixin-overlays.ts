/**
 * Mixin overlay storage.
 *
 * Records, per destination type, the record whose annotations the
 * introspector should treat as supplemental to the destination's own.
 * Storage only: how overlays combine with declared annotations, and which
 * supertypes get queried, is up to the introspector.
 */

import { keyOf, type RecordType, type TypeKey } from '../types/index.js';
import type { MixinSource } from '../introspect/introspector.js';

export class MixinOverlayRegistry implements MixinSource {
  private overlays: Map<string, RecordType> = new Map();

  /**
   * Set the overlay for a destination, replacing any earlier one.
   */
  setOverlay(destination: TypeKey, source: RecordType): void {
    this.overlays.set(destination.token, source);
  }

  /**
   * Key of the overlay source registered for a destination.
   */
  getOverlay(destination: TypeKey): TypeKey | undefined {
    const source = this.overlays.get(destination.token);
    return source ? keyOf(source) : undefined;
  }

  getOverlaySource(destination: TypeKey): RecordType | undefined {
    return this.overlays.get(destination.token);
  }

  get size(): number {
    return this.overlays.size;
  }

  copy(): MixinOverlayRegistry {
    const copy = new MixinOverlayRegistry();
    copy.overlays = new Map(this.overlays);
    return copy;
  }
}
