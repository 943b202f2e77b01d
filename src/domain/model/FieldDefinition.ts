import type { StepSpec } from './ConversionStep.js';

/** Defines a single field of a record type. */
export interface FieldDefinition {
  /** Canonical field name on the constructed record. */
  readonly name: string;
  /**
   * When `true` and `checkKeys` is enabled, the field must hold a value after defaults
   * are applied, otherwise construction throws a `KeyError`. Default: `false`.
   */
  readonly required?: boolean;
  /** Value used when the input has no value (`undefined`) for this field. Shared by every call; do not mutate it. */
  readonly defaultValue?: unknown;
  /** Conversion chain run against the field value. Omitted means the value passes through unchanged. */
  readonly step?: StepSpec;
  /** Alternative input keys that map to this field's canonical name. Case-insensitive. */
  readonly aliases?: readonly string[];
}
