import type { Result } from './Result.js';
import type { ErrorDetail } from './ErrorReport.js';

/** Failure payload of a step: a message, or the report of a nested record. */
export type StepError = ErrorDetail;

export type StepResult = Result<unknown, StepError>;

/** A conversion/validation function taking only the live value. */
export type StepFn = (value: unknown) => StepResult;

/** A conversion/validation function taking the live value first, then schema-declared constants. */
export type BoundStepFn<A extends readonly unknown[]> = (value: unknown, ...args: A) => StepResult;

export interface DirectStep {
  readonly kind: 'direct';
  readonly fn: StepFn;
}

export interface BoundStep {
  readonly kind: 'bound';
  // Method syntax so that functions with concrete extra parameter types can be stored.
  fn(value: unknown, ...args: readonly unknown[]): StepResult;
  readonly args: readonly unknown[];
}

export interface ChainStep {
  readonly kind: 'chain';
  readonly steps: readonly ConversionStep[];
}

/**
 * One field's conversion chain.
 *
 * - `direct`: `fn(value)`
 * - `bound`: `fn(value, ...args)`
 * - `chain`: left-to-right fold, stops at the first failure
 */
export type ConversionStep = DirectStep | BoundStep | ChainStep;

/** Shorthand accepted in field definitions: a bare function is `direct`, an array is a `chain`. */
export type StepSpec = ConversionStep | StepFn | readonly StepSpec[];

export function direct(fn: StepFn): DirectStep {
  return { kind: 'direct', fn };
}

export function bound<A extends readonly unknown[]>(fn: BoundStepFn<A>, ...args: A): BoundStep {
  return { kind: 'bound', fn, args };
}

export function chain(...steps: readonly StepSpec[]): ChainStep {
  return { kind: 'chain', steps: steps.map(toStep) };
}

/** Normalize a `StepSpec` into the tagged `ConversionStep` form. */
export function toStep(spec: StepSpec): ConversionStep {
  if (typeof spec === 'function') return direct(spec);
  if (isStepList(spec)) return { kind: 'chain', steps: spec.map(toStep) };
  return spec;
}

function isStepList(spec: ConversionStep | readonly StepSpec[]): spec is readonly StepSpec[] {
  return Array.isArray(spec);
}
