import type { ErrorDetail, ErrorReport } from '../model/ErrorReport.js';
import type { Result } from '../model/Result.js';
import { ok, fail } from '../model/Result.js';
import { ShapeError } from '../model/Errors.js';
import type { FieldOutcome } from './FieldPipeline.js';

/** Merges per-field or per-index outcomes into a single result. */
export class ErrorAggregator {
  /**
   * Write every successful field value into `base` and collect every failure.
   * `base` is the call's own working record and is updated in place.
   */
  fields(outcomes: readonly FieldOutcome[], base: Record<string, unknown>): Result<Record<string, unknown>, ErrorReport> {
    const errors: [string, ErrorDetail][] = [];

    for (const [field, result] of outcomes) {
      if (result.ok) {
        base[field] = result.value;
      } else {
        errors.push([field, result.error]);
      }
    }

    return errors.length === 0 ? ok(base) : fail(Object.fromEntries(errors));
  }

  /**
   * Combine the results of a list of inputs. Succeeds only when every element did;
   * otherwise reports every failing index. Shape failures are reported by message.
   */
  indexed<V>(results: readonly Result<V, ErrorReport | ShapeError>[]): Result<V[], ErrorReport> {
    const values: V[] = [];
    const errors: [string, ErrorDetail][] = [];

    results.forEach((result, index) => {
      if (result.ok) {
        values.push(result.value);
      } else {
        errors.push([String(index), result.error instanceof ShapeError ? result.error.message : result.error]);
      }
    });

    return errors.length === 0 ? ok(values) : fail(Object.fromEntries(errors));
  }
}
