export { BasicHandlerFactory } from './basic-factory.js';
export { type CustomFactoryState, CustomHandlerFactory } from './custom-factory.js';
export type { HandlerFactory } from './types.js';
