import type { ConstructOptions, ResolvedConstructOptions } from '../../domain/model/ConstructOptions.js';
import type { ErrorReport } from '../../domain/model/ErrorReport.js';
import type { RawRecord, RecordOwner } from '../../domain/model/Record.js';
import { brandRecord, ownerOf } from '../../domain/model/Record.js';
import type { Result } from '../../domain/model/Result.js';
import { ok, fail } from '../../domain/model/Result.js';
import { KeyError, ShapeError } from '../../domain/model/Errors.js';
import type { DomainEvent } from '../../domain/events/DomainEvents.js';
import type { HookContext } from '../../domain/ports/ConstructHooks.js';
import { defaultBeforeConstruct, defaultAfterConstruct } from '../../domain/ports/ConstructHooks.js';
import type { RecordTypeContext } from '../RecordTypeContext.js';

/** A constructed value: a record, `null` (for `null` input without `nilToEmpty`), or one per list element. */
export type Constructed<T> = T | null | readonly Constructed<T>[];

/** Result of `construct()`. Aggregated errors come back as a report; unrecognized input as a `ShapeError`. */
export type ConstructionResult<T> = Result<Constructed<T>, ErrorReport | ShapeError>;

/**
 * Use case: build a record (or a list of records) from loosely-typed input.
 *
 * normalize → `beforeConstruct` → defaults → required keys → field chains →
 * aggregate → `afterConstruct`. Lists recurse through the whole pipeline per element
 * and are reported by index.
 */
export class ConstructRecord<T extends object> {
  constructor(private readonly ctx: RecordTypeContext<T>) {}

  /** @throws KeyError when `checkKeys` is in effect and the input has an unknown key or lacks a required one. */
  execute(input: unknown, options?: ConstructOptions): ConstructionResult<T> {
    return this.run(input, this.ctx.resolveOptions(options));
  }

  private run(input: unknown, options: ResolvedConstructOptions): ConstructionResult<T> {
    const normalized = this.ctx.normalizer.classify(input);

    switch (normalized.kind) {
      case 'null':
        return options.nilToEmpty ? this.build({}, null, options) : ok(null);
      case 'list':
        return this.ctx.aggregator.indexed(normalized.items.map((item) => this.run(item, options)));
      case 'mapping':
        return this.build(normalized.fields, normalized.source, options);
      case 'unrecognized': {
        const error = new ShapeError(this.ctx.schema.name, normalized.input);
        this.emitIfObserved(() => ({
          type: 'input:rejected',
          recordType: this.ctx.schema.name,
          reason: error.message,
          timestamp: Date.now(),
        }));
        return fail(error);
      }
    }
  }

  private build(
    fields: RawRecord,
    source: RecordOwner | null,
    options: ResolvedConstructOptions,
  ): Result<T, ErrorReport> {
    const { normalizer, pipeline, aggregator, hooks } = this.ctx;
    const context: HookContext = { recordType: this.ctx.owner, source, options };

    const canonical = normalizer.canonicalize(fields, options.checkKeys);

    const before = hooks.beforeConstruct
      ? hooks.beforeConstruct(canonical, defaultBeforeConstruct, context)
      : defaultBeforeConstruct(canonical);
    if (!before.ok) return this.reject(before.error);

    const working = this.applyDefaults(normalizer.canonicalize(before.value, false));
    if (options.checkKeys) this.checkRequired(working);

    const aggregated = aggregator.fields(pipeline.run(working), working);
    if (!aggregated.ok) return this.reject(aggregated.error);

    const record = brandRecord(this.asRecord(aggregated.value), this.ctx.owner);
    const after = hooks.afterConstruct
      ? hooks.afterConstruct(record, defaultAfterConstruct, context)
      : defaultAfterConstruct(record);
    if (!after.ok) return this.reject(after.error);

    const result = ownerOf(after.value) === null ? brandRecord(after.value, this.ctx.owner) : after.value;
    this.emitIfObserved(() => ({
      type: 'record:constructed',
      recordType: this.ctx.schema.name,
      record: result,
      timestamp: Date.now(),
    }));
    return ok(result);
  }

  /** Fresh working record holding every schema field: the input value, else the default. */
  private applyDefaults(fields: RawRecord): Record<string, unknown> {
    return Object.fromEntries(
      this.ctx.schema.fields.map((field): [string, unknown] => {
        const value = Object.hasOwn(fields, field.name) ? fields[field.name] : undefined;
        return [field.name, value === undefined && field.hasDefault ? field.defaultValue : value];
      }),
    );
  }

  private checkRequired(working: Record<string, unknown>): void {
    for (const field of this.ctx.schema.fields) {
      if (field.required && working[field.name] === undefined) {
        throw new KeyError('MISSING_REQUIRED_KEY', this.ctx.schema.name, field.name);
      }
    }
  }

  private reject(report: ErrorReport): Result<never, ErrorReport> {
    this.emitIfObserved(() => ({
      type: 'record:rejected',
      recordType: this.ctx.schema.name,
      report,
      timestamp: Date.now(),
    }));
    return fail(report);
  }

  // Every schema field now holds its chain's output, which is what `T` describes.
  private asRecord(fields: Record<string, unknown>): T {
    return fields as T;
  }

  private emitIfObserved(build: () => DomainEvent): void {
    if (this.ctx.eventBus.hasListeners) this.ctx.eventBus.emit(build());
  }
}
