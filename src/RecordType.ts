import type { SchemaDefinition } from './domain/model/Schema.js';
import type { ConstructOptions } from './domain/model/ConstructOptions.js';
import type { DirectStep } from './domain/model/ConversionStep.js';
import { direct } from './domain/model/ConversionStep.js';
import type { RecordOwner } from './domain/model/Record.js';
import { ownerOf } from './domain/model/Record.js';
import { fail } from './domain/model/Result.js';
import { ConstructionException, ShapeError } from './domain/model/Errors.js';
import type { ConstructHooks } from './domain/ports/ConstructHooks.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { HandlerErrorListener } from './application/EventBus.js';
import { EventBus } from './application/EventBus.js';
import { RecordTypeContext } from './application/RecordTypeContext.js';
import { ConstructRecord } from './application/usecases/ConstructRecord.js';
import type { Constructed, ConstructionResult } from './application/usecases/ConstructRecord.js';

/** Configuration for a record type. */
export interface RecordTypeConfig<T> {
  /** Name, ordered fields and default options. Frozen at registration. */
  readonly schema: SchemaDefinition;
  /** Lifecycle hooks wrapping every construction call. */
  readonly hooks?: ConstructHooks<T>;
  /** Receives errors thrown by event handlers. Default: ignored. */
  readonly onHandlerError?: HandlerErrorListener;
}

/**
 * Facade for one record type: turns mappings, ordered pairs, other records, or lists
 * of them into records of type `T`, reporting every field error at once.
 *
 * Delegates construction to the `ConstructRecord` use case. Holds the shared,
 * read-only `RecordTypeContext`, so one instance is safe to use from anywhere.
 *
 * @example
 * ```typescript
 * const Person = new RecordType<Person>({
 *   schema: {
 *     name: 'Person',
 *     fields: [
 *       { name: 'name', required: true, step: isNotBlank },
 *       { name: 'age', defaultValue: 0, step: toInteger },
 *     ],
 *   },
 * });
 * Person.construct({ name: 'Alice', age: '30' }); // { ok: true, value: { name: 'Alice', age: 30 } }
 * ```
 */
export class RecordType<T extends object = Record<string, unknown>> implements RecordOwner {
  private readonly ctx: RecordTypeContext<T>;
  private readonly constructRecord: ConstructRecord<T>;

  constructor(config: RecordTypeConfig<T>) {
    this.ctx = new RecordTypeContext<T>(
      config.schema,
      this,
      Object.freeze({ ...config.hooks }),
      new EventBus(config.onHandlerError),
    );
    this.constructRecord = new ConstructRecord<T>(this.ctx);
  }

  get name(): string {
    return this.ctx.schema.name;
  }

  get fieldNames(): readonly string[] {
    return this.ctx.schema.fieldNames;
  }

  /**
   * Build a record from `input`, or one record per element when `input` is a list.
   *
   * Never throws for invalid values: failing fields come back as an `ErrorReport`, an
   * unrecognized input shape as a `ShapeError`.
   *
   * @throws KeyError when `checkKeys` is in effect and a key is unknown or a required field is absent.
   * @throws ConversionStepError when a conversion step throws.
   */
  construct(input: unknown, options?: ConstructOptions): ConstructionResult<T> {
    return this.constructRecord.execute(input, options);
  }

  /**
   * Same as `construct()`, but returns the bare value.
   *
   * @throws ConstructionException carrying the `ErrorReport` when construction fails.
   */
  constructOrThrow(input: unknown, options?: ConstructOptions): Constructed<T> {
    const result = this.construct(input, options);
    if (!result.ok) throw new ConstructionException(this.name, result.error);
    return result.value;
  }

  /** Decode a payload with `parser` and construct one record per decoded mapping. */
  constructFrom(data: string | Buffer, parser: SourceParser, options?: ConstructOptions): ConstructionResult<T> {
    return this.construct([...parser.parse(data)], options);
  }

  /**
   * A conversion step that constructs this record type from a field's value, for
   * nesting one record type inside another. Failures keep their nested report.
   */
  asStep(options?: ConstructOptions): DirectStep {
    return direct((value) => {
      const result = this.construct(value, options);
      if (result.ok) return result;
      return fail(result.error instanceof ShapeError ? result.error.message : result.error);
    });
  }

  /** Whether `value` is a record built by this record type. */
  is(value: unknown): value is T {
    return ownerOf(value) === this;
  }

  /** Subscribe to construction events of the given type. */
  on<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all construction events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a previously registered handler. */
  off<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}

/** Register a record type. Shorthand for `new RecordType<T>(config)`. */
export function defineRecord<T extends object = Record<string, unknown>>(config: RecordTypeConfig<T>): RecordType<T> {
  return new RecordType<T>(config);
}
