import { MappingError } from '../errors.js';
import { type EnumType, keyOf } from '../types/index.js';
import { describeInput, type ReadContext, type ValueHandler } from './types.js';

/**
 * Reads enum constants by name, or by index when `allowEnumIndexes` is set.
 */
export class EnumHandler implements ValueHandler<string> {
  readonly handledType: string;
  private readonly values: readonly string[];

  constructor(type: EnumType) {
    this.handledType = keyOf(type).token;
    this.values = type.values;
  }

  deserialize(input: unknown, ctx: ReadContext): string {
    if (typeof input === 'string') {
      const match = ctx.config.readEnumsCaseInsensitive
        ? this.values.find((value) => value.toLowerCase() === input.toLowerCase())
        : this.values.find((value) => value === input);
      if (match !== undefined) {
        return match;
      }
      throw this.mismatch(`'${input}'`, ctx);
    }

    if (typeof input === 'number' && ctx.config.allowEnumIndexes) {
      const value = Number.isInteger(input) ? this.values[input] : undefined;
      if (value !== undefined) {
        return value;
      }
      throw this.mismatch(`index ${input}`, ctx);
    }

    throw this.mismatch(describeInput(input), ctx);
  }

  private mismatch(received: string, ctx: ReadContext): MappingError {
    return new MappingError(
      `Cannot read ${received} as enum '${this.handledType}': expected one of ${this.values.join(', ')}`,
      ctx.path,
      this.handledType
    );
  }
}
