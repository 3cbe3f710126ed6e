/**
 * Built-in scalar handlers.
 *
 * Scalars are not a creation category: they never reach the factory, so
 * direct mappings and extensions do not apply to them.
 */

import { MappingError } from '../errors.js';
import type { ScalarName, ScalarType } from '../types/index.js';
import { describeInput, type ReadContext, type ValueHandler } from './types.js';

class TypedScalarHandler<T> implements ValueHandler<T> {
  readonly handledType: string;
  private readonly accepts: (input: unknown) => input is T;
  private readonly expected: string;

  constructor(name: ScalarName, expected: string, accepts: (input: unknown) => input is T) {
    this.handledType = name;
    this.expected = expected;
    this.accepts = accepts;
  }

  deserialize(input: unknown, ctx: ReadContext): T {
    if (!this.accepts(input)) {
      throw new MappingError(
        `Expected ${this.expected}, got ${describeInput(input)}`,
        ctx.path,
        this.handledType
      );
    }
    return input;
  }
}

const unknownHandler: ValueHandler<unknown> = {
  handledType: 'unknown',
  deserialize: (input) => input,
};

const scalarHandlers: Record<ScalarName, ValueHandler> = {
  string: new TypedScalarHandler(
    'string',
    'a string',
    (input): input is string => typeof input === 'string'
  ),
  number: new TypedScalarHandler(
    'number',
    'a finite number',
    (input): input is number => typeof input === 'number' && Number.isFinite(input)
  ),
  boolean: new TypedScalarHandler(
    'boolean',
    'a boolean',
    (input): input is boolean => typeof input === 'boolean'
  ),
  unknown: unknownHandler,
};

export function scalarHandlerFor(type: ScalarType): ValueHandler {
  return scalarHandlers[type.name];
}
