/**
 * Structural type descriptors.
 *
 * Descriptors describe the shape a handler reads into: scalars, records
 * (named types with properties and supertypes), arrays and enums. They are
 * plain data, so two descriptors built independently for the same type are
 * interchangeable; identity is derived from them by `keyOf()`.
 *
 * Record, array and enum descriptors carry a phantom value type so that
 * registrations can be checked against the handler's produced type.
 *
 * @example
 * ```typescript
 * interface Money { amount: number; currency: string }
 *
 * const Money = recordType<Money>('Money', {
 *   namespace: 'billing',
 *   properties: [
 *     { name: 'amount', type: scalarTypes.number, annotations: { required: true } },
 *     { name: 'currency', type: scalarTypes.string },
 *   ],
 * });
 * ```
 */

export type ScalarName = 'string' | 'number' | 'boolean' | 'unknown';

/**
 * Annotations attached to a record property.
 *
 * Mixin overlays contribute the same annotations; see the introspector.
 */
export interface PropertyAnnotations {
  /** Name of the property in serialized input (defaults to the property name) */
  readonly alias?: string;

  /** Skip the property entirely; its input key is silently accepted */
  readonly ignore?: boolean;

  /** Fail when the input does not carry the property */
  readonly required?: boolean;
}

export interface PropertyDescriptor {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly annotations?: PropertyAnnotations;
}

export interface ScalarType<T = unknown> {
  readonly kind: 'scalar';
  readonly name: ScalarName;
  /** Phantom, never set at runtime */
  readonly __value?: T;
}

export interface RecordType<T = unknown> {
  readonly kind: 'record';
  readonly name: string;
  readonly namespace?: string;
  /** Generic arguments; erased from the type key */
  readonly typeParameters: readonly TypeDescriptor[];
  /** Direct supertypes; earlier entries take precedence over later ones */
  readonly supertypes: readonly RecordType[];
  readonly properties: readonly PropertyDescriptor[];
  /** Builds the runtime value from the read fields (plain object when absent) */
  readonly instantiate?: (fields: Record<string, unknown>) => T;
  readonly __value?: T;
}

export interface ArrayType<T = unknown> {
  readonly kind: 'array';
  readonly elementType: TypeDescriptor;
  readonly __value?: T;
}

export interface EnumType<T = unknown> {
  readonly kind: 'enum';
  readonly name: string;
  readonly namespace?: string;
  readonly values: readonly string[];
  readonly __value?: T;
}

export type TypeDescriptor = ScalarType | RecordType | ArrayType | EnumType;

/**
 * Descriptor of any kind whose runtime value is `T`.
 */
export type TypeDescriptorOf<T> = ScalarType<T> | RecordType<T> | ArrayType<T> | EnumType<T>;

/**
 * Descriptors that can carry a direct handler mapping: the three creation
 * categories. Scalars are always read by the built-in handlers.
 */
export type DescribedType<T> = RecordType<T> | ArrayType<T> | EnumType<T>;

export type TypeCategory = 'record' | 'array' | 'enum';

const stringType: ScalarType<string> = { kind: 'scalar', name: 'string' };
const numberType: ScalarType<number> = { kind: 'scalar', name: 'number' };
const booleanType: ScalarType<boolean> = { kind: 'scalar', name: 'boolean' };
const unknownType: ScalarType<unknown> = { kind: 'scalar', name: 'unknown' };

export const scalarTypes = {
  string: stringType,
  number: numberType,
  boolean: booleanType,
  unknown: unknownType,
} as const;

export interface RecordTypeOptions<T> {
  namespace?: string;
  typeParameters?: readonly TypeDescriptor[];
  supertypes?: readonly RecordType[];
  properties?: readonly PropertyDescriptor[];
  instantiate?: (fields: Record<string, unknown>) => T;
}

export function recordType<T = Record<string, unknown>>(
  name: string,
  options: RecordTypeOptions<T> = {}
): RecordType<T> {
  return {
    kind: 'record',
    name,
    namespace: options.namespace,
    typeParameters: options.typeParameters ?? [],
    supertypes: options.supertypes ?? [],
    properties: options.properties ?? [],
    instantiate: options.instantiate,
  };
}

export function arrayType<E>(elementType: TypeDescriptorOf<E>): ArrayType<E[]> {
  return { kind: 'array', elementType };
}

export function enumType<V extends string>(
  name: string,
  values: readonly V[],
  namespace?: string
): EnumType<V> {
  return { kind: 'enum', name, namespace, values };
}

/**
 * Creation category of a descriptor, or null for scalars.
 */
export function categoryOf(type: TypeDescriptor): TypeCategory | null {
  return type.kind === 'scalar' ? null : type.kind;
}
