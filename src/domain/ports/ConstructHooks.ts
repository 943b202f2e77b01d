import type { RawRecord, RecordOwner } from '../model/Record.js';
import type { ErrorReport } from '../model/ErrorReport.js';
import type { ResolvedConstructOptions } from '../model/ConstructOptions.js';
import type { Result } from '../model/Result.js';
import { ok } from '../model/Result.js';

/** Context passed to lifecycle hook functions. */
export interface HookContext {
  /** Record type being constructed. */
  readonly recordType: RecordOwner;
  /** Record type of the input when it was an existing record, otherwise `null`. */
  readonly source: RecordOwner | null;
  /** Options in effect for this call. */
  readonly options: ResolvedConstructOptions;
}

export type BeforeConstructResult = Result<RawRecord, ErrorReport>;

export type AfterConstructResult<T> = Result<T, ErrorReport>;

/**
 * Lifecycle hooks wrapping a single construction call.
 *
 * Pipeline order:
 * 1. Normalize input (shape, canonical keys)
 * 2. **`beforeConstruct`**: reshape the mapping (merge, rename, synthesize fields)
 * 3. Apply defaults, check required keys (with `checkKeys`)
 * 4. Run every field's conversion chain and aggregate errors
 * 5. **`afterConstruct`**: whole-record checks, only when step 4 succeeded
 *
 * Each hook receives `next`, the default behavior, and may call it for cases it does not handle.
 */
export interface ConstructHooks<T> {
  beforeConstruct?: (
    input: RawRecord,
    next: (input: RawRecord) => BeforeConstructResult,
    context: HookContext,
  ) => BeforeConstructResult;
  afterConstruct?: (
    record: T,
    next: (record: T) => AfterConstructResult<T>,
    context: HookContext,
  ) => AfterConstructResult<T>;
}

/** Default `beforeConstruct`: pass the input to the field pipeline unchanged. */
export function defaultBeforeConstruct(input: RawRecord): BeforeConstructResult {
  return ok(input);
}

/** Default `afterConstruct`: accept the record. */
export function defaultAfterConstruct<T>(record: T): AfterConstructResult<T> {
  return ok(record);
}
