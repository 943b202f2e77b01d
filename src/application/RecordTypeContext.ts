import type { SchemaDefinition } from '../domain/model/Schema.js';
import type { RecordOwner } from '../domain/model/Record.js';
import type { ConstructOptions, ResolvedConstructOptions } from '../domain/model/ConstructOptions.js';
import { resolveOptions } from '../domain/model/ConstructOptions.js';
import type { ConstructHooks } from '../domain/ports/ConstructHooks.js';
import { CompiledSchema } from '../domain/services/CompiledSchema.js';
import { InputNormalizer } from '../domain/services/InputNormalizer.js';
import { FieldPipeline } from '../domain/services/FieldPipeline.js';
import { ErrorAggregator } from '../domain/services/ErrorAggregator.js';
import { EventBus } from './EventBus.js';

/**
 * Read-only state shared by every construction call of one record type.
 *
 * Internal class, not exported from the public API. Holds the compiled schema,
 * the domain services built on it, the hooks and the event bus. Nothing here
 * changes after registration; each call allocates its own working record.
 */
export class RecordTypeContext<T> {
  readonly schema: CompiledSchema;
  readonly normalizer: InputNormalizer;
  readonly pipeline: FieldPipeline;
  readonly aggregator: ErrorAggregator;

  constructor(
    definition: SchemaDefinition,
    readonly owner: RecordOwner,
    readonly hooks: Readonly<ConstructHooks<T>>,
    readonly eventBus: EventBus,
  ) {
    this.schema = new CompiledSchema(definition);
    this.normalizer = new InputNormalizer(this.schema);
    this.pipeline = new FieldPipeline(this.schema);
    this.aggregator = new ErrorAggregator();
  }

  resolveOptions(options?: ConstructOptions): ResolvedConstructOptions {
    return resolveOptions(this.schema.options, options);
  }
}
