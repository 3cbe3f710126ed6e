/**
 * Value-comparable type identity.
 *
 * A `TypeKey` is derived from a descriptor's raw type: the qualified name of
 * a record or enum, the name of a scalar, or the element key followed by
 * `[]` for arrays. Generic arguments are erased, so `Page<Order>` and
 * `Page<Invoice>` share the key `Page`.
 */

import type { TypeDescriptor } from './type-descriptor.js';

export class TypeKey {
  readonly token: string;

  private constructor(token: string) {
    this.token = token;
  }

  /**
   * Build a key from an already-normalized token.
   */
  static of(token: string): TypeKey {
    return new TypeKey(token);
  }

  equals(other: TypeKey): boolean {
    return this.token === other.token;
  }

  toString(): string {
    return this.token;
  }
}

function qualifiedName(name: string, namespace?: string): string {
  return namespace ? `${namespace}.${name}` : name;
}

function tokenOf(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'scalar':
      return type.name;
    case 'record':
    case 'enum':
      return qualifiedName(type.name, type.namespace);
    case 'array':
      return `${tokenOf(type.elementType)}[]`;
  }
}

/**
 * Derive the key of a descriptor.
 */
export function keyOf(type: TypeDescriptor): TypeKey {
  return TypeKey.of(tokenOf(type));
}
