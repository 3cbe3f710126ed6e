import { MappingError } from '../errors.js';
import type { PropertyMetadata, RecordIntrospection } from '../introspect/introspector.js';
import { keyOf, type RecordType } from '../types/index.js';
import { describeInput, isPlainObject, type ReadContext, type ValueHandler } from './types.js';

/**
 * Reads a record from a plain object, property by property.
 *
 * Property handlers are looked up through the context's provider on every
 * read, which keeps recursive record types working and keeps the handler
 * itself stateless.
 */
export class RecordHandler implements ValueHandler {
  readonly handledType: string;
  private readonly type: RecordType;
  private readonly properties: readonly PropertyMetadata[];
  private readonly knownNames: ReadonlySet<string>;

  constructor(type: RecordType, introspection: RecordIntrospection) {
    this.handledType = keyOf(type).token;
    this.type = type;
    this.properties = introspection.properties;
    this.knownNames = new Set([
      ...introspection.properties.map((property) => property.jsonName),
      ...introspection.ignoredNames,
    ]);
  }

  deserialize(input: unknown, ctx: ReadContext): unknown {
    if (!isPlainObject(input)) {
      throw new MappingError(
        `Expected an object for '${this.handledType}', got ${describeInput(input)}`,
        ctx.path,
        this.handledType
      );
    }

    if (ctx.config.failOnUnknownProperties) {
      for (const name of Object.keys(input)) {
        if (!this.knownNames.has(name)) {
          throw new MappingError(
            `Unrecognized property '${name}' for '${this.handledType}'`,
            ctx.child(name).path,
            this.handledType
          );
        }
      }
    }

    // Own keys only; built with fromEntries so '__proto__' stays a plain field
    const entries: [string, unknown][] = [];
    for (const property of this.properties) {
      const value = Object.hasOwn(input, property.jsonName) ? input[property.jsonName] : undefined;
      if (value === undefined) {
        if (property.required) {
          throw new MappingError(
            `Missing required property '${property.jsonName}' for '${this.handledType}'`,
            ctx.child(property.jsonName).path,
            this.handledType
          );
        }
        continue;
      }

      const handler = ctx.provider.findValueHandler(ctx.config, property.type);
      entries.push([property.name, handler.deserialize(value, ctx.child(property.jsonName))]);
    }

    const fields: Record<string, unknown> = Object.fromEntries(entries);
    return this.type.instantiate ? this.type.instantiate(fields) : fields;
  }
}
