import { MappingError } from '../errors.js';
import { type ArrayType, keyOf } from '../types/index.js';
import { describeInput, type ReadContext, type ValueHandler } from './types.js';

/**
 * Reads arrays element by element with the element type's handler.
 */
export class ArrayHandler implements ValueHandler<unknown[]> {
  readonly handledType: string;
  private readonly elementHandler: ValueHandler;

  constructor(type: ArrayType, elementHandler: ValueHandler) {
    this.handledType = keyOf(type).token;
    this.elementHandler = elementHandler;
  }

  deserialize(input: unknown, ctx: ReadContext): unknown[] {
    if (!Array.isArray(input)) {
      if (ctx.config.acceptSingleValueAsArray && input !== null && input !== undefined) {
        return [this.elementHandler.deserialize(input, ctx.child(0))];
      }
      throw new MappingError(
        `Expected an array for '${this.handledType}', got ${describeInput(input)}`,
        ctx.path,
        this.handledType
      );
    }

    return input.map((element, index) => this.elementHandler.deserialize(element, ctx.child(index)));
  }
}
