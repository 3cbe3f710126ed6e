export {
  introspectRecord,
  type MixinSource,
  NO_MIXINS,
  type PropertyMetadata,
  type RecordIntrospection,
} from './introspector.js';
