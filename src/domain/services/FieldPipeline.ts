import type { ConversionStep, StepResult } from '../model/ConversionStep.js';
import { ok } from '../model/Result.js';
import { ConversionStepError, RecordConstructorError } from '../model/Errors.js';
import type { CompiledSchema } from './CompiledSchema.js';

/** Outcome of one field's chain, keyed by field name. */
export type FieldOutcome = readonly [field: string, result: StepResult];

/**
 * Run a conversion step against a value.
 *
 * Chains feed each success into the next step and return the first failure
 * unchanged (nested reports included); later steps are not invoked.
 */
export function runStep(step: ConversionStep, value: unknown): StepResult {
  switch (step.kind) {
    case 'direct':
      return step.fn(value);
    case 'bound':
      return step.fn(value, ...step.args);
    case 'chain': {
      let current = value;
      for (const inner of step.steps) {
        const result = runStep(inner, current);
        if (!result.ok) return result;
        current = result.value;
      }
      return ok(current);
    }
  }
}

/** Domain service that runs every field's chain against a working record. */
export class FieldPipeline {
  constructor(private readonly schema: CompiledSchema) {}

  /**
   * Run all chains. Each chain only sees its own field's value, so evaluation order
   * does not matter.
   *
   * @throws ConversionStepError when a step throws instead of returning a failure.
   */
  run(record: Readonly<Record<string, unknown>>): FieldOutcome[] {
    return this.schema.fields.map((field): FieldOutcome => [
      field.name,
      this.runField(field.name, field.step, record[field.name]),
    ]);
  }

  private runField(name: string, step: ConversionStep, value: unknown): StepResult {
    try {
      return runStep(step, value);
    } catch (error) {
      // Hard failures from nested record types keep their own identity.
      if (error instanceof RecordConstructorError) throw error;
      throw new ConversionStepError(this.schema.name, name, error);
    }
  }
}
