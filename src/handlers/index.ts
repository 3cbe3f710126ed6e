export { ArrayHandler } from './array-handler.js';
export { EnumHandler } from './enum-handler.js';
export { RecordHandler } from './record-handler.js';
export { scalarHandlerFor } from './scalar.js';
export { describeInput, isPlainObject, ReadContext, type ValueHandler } from './types.js';
