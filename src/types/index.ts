export {
  type ArrayType,
  arrayType,
  categoryOf,
  type DescribedType,
  type EnumType,
  enumType,
  type PropertyAnnotations,
  type PropertyDescriptor,
  type RecordType,
  type RecordTypeOptions,
  recordType,
  type ScalarName,
  type ScalarType,
  scalarTypes,
  type TypeCategory,
  type TypeDescriptor,
  type TypeDescriptorOf,
} from './type-descriptor.js';
export { keyOf, TypeKey } from './type-key.js';
