/**
 * Record introspection with mixin overlays.
 *
 * Collects the properties a record handler reads: declared properties of the
 * type and its supertypes, with annotations from any mixin overlay merged in.
 *
 * Walk order is most general first: a record's supertypes (recursively),
 * then the record itself. After each type is collected, the overlay
 * registered for that type (if any) is applied: annotations the overlay and
 * its own supertypes declare override the annotations of same-named
 * properties collected so far. Overlay members that match no property are
 * ignored; overlays never add properties.
 */

import {
  keyOf,
  type PropertyAnnotations,
  type PropertyDescriptor,
  type RecordType,
  type TypeDescriptor,
  type TypeKey,
} from '../types/index.js';

/**
 * Lookup of mixin overlays by destination type.
 */
export interface MixinSource {
  getOverlaySource(destination: TypeKey): RecordType | undefined;
}

export const NO_MIXINS: MixinSource = {
  getOverlaySource: () => undefined,
};

export interface PropertyMetadata {
  /** Field name in the produced value */
  readonly name: string;
  /** Key read from the input */
  readonly jsonName: string;
  readonly type: TypeDescriptor;
  readonly required: boolean;
}

export interface RecordIntrospection {
  readonly properties: readonly PropertyMetadata[];
  /** Input keys of ignored properties; accepted and skipped on read */
  readonly ignoredNames: readonly string[];
}

interface CollectedProperty {
  descriptor: PropertyDescriptor;
  annotations: PropertyAnnotations;
}

function collect(
  type: RecordType,
  mixins: MixinSource,
  into: Map<string, CollectedProperty>,
  visited: Set<string>
): void {
  const key = keyOf(type);
  if (visited.has(key.token)) {
    return;
  }
  visited.add(key.token);

  // Later supertypes first, so earlier ones win on conflicts
  for (let i = type.supertypes.length - 1; i >= 0; i--) {
    collect(type.supertypes[i], mixins, into, visited);
  }

  for (const property of type.properties) {
    into.set(property.name, { descriptor: property, annotations: { ...property.annotations } });
  }

  const overlay = mixins.getOverlaySource(key);
  if (overlay) {
    applyOverlay(overlay, into);
  }
}

function applyOverlay(overlay: RecordType, into: Map<string, CollectedProperty>): void {
  const overlayProperties = new Map<string, CollectedProperty>();
  collect(overlay, NO_MIXINS, overlayProperties, new Set());

  for (const [name, contributed] of overlayProperties) {
    const target = into.get(name);
    if (target) {
      target.annotations = { ...target.annotations, ...contributed.annotations };
    }
  }
}

/**
 * Introspect the readable properties of a record.
 *
 * @param type - Record to introspect
 * @param mixins - Overlay lookup, queried once per type in the hierarchy
 */
export function introspectRecord(type: RecordType, mixins: MixinSource): RecordIntrospection {
  const collected = new Map<string, CollectedProperty>();
  collect(type, mixins, collected, new Set());

  const properties: PropertyMetadata[] = [];
  const ignoredNames: string[] = [];

  for (const { descriptor, annotations } of collected.values()) {
    const jsonName = annotations.alias ?? descriptor.name;
    if (annotations.ignore) {
      ignoredNames.push(jsonName);
      continue;
    }
    properties.push({
      name: descriptor.name,
      jsonName,
      type: descriptor.type,
      required: annotations.required ?? false,
    });
  }

  return { properties, ignoredNames };
}
