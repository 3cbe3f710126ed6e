export { StdHandlerProvider } from './std-provider.js';
export type { HandlerProvider } from './types.js';
