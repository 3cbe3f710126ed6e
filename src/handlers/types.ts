/**
 * Value handler contract and the context threaded through a read.
 */

import type { ReaderConfig } from '../config/index.js';
import type { PathSegment } from '../errors.js';
import type { HandlerProvider } from '../provider/types.js';

/**
 * Converts a serialized representation into a value of the handled type.
 *
 * A handler registered for a type may produce a narrower value than the
 * type's own: `ValueHandler<UsdAmount>` is accepted where
 * `ValueHandler<Amount>` is expected.
 */
export interface ValueHandler<T = unknown> {
  /** Key token (or label) of the type this handler reads */
  readonly handledType: string;

  deserialize(input: unknown, ctx: ReadContext): T;
}

/**
 * Per-read state: configuration, provider for nested handlers and the
 * path of the value being read. Immutable; `child()` derives a new context.
 */
export class ReadContext {
  readonly config: ReaderConfig;
  readonly provider: HandlerProvider;
  readonly path: readonly PathSegment[];

  constructor(config: ReaderConfig, provider: HandlerProvider, path: readonly PathSegment[] = []) {
    this.config = config;
    this.provider = provider;
    this.path = path;
  }

  child(segment: PathSegment): ReadContext {
    return new ReadContext(this.config, this.provider, [...this.path, segment]);
  }
}

/**
 * Describe an input value for error messages.
 */
export function describeInput(input: unknown): string {
  if (input === null) {
    return 'null';
  }
  if (Array.isArray(input)) {
    return 'array';
  }
  return typeof input;
}

/**
 * True for object literals and null-prototype objects; false for arrays,
 * class instances and built-ins such as `Date` or `Map`.
 */
export function isPlainObject(input: unknown): input is Record<string, unknown> {
  if (typeof input !== 'object' || input === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(input);
  return prototype === Object.prototype || prototype === null;
}
