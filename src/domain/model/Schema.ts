import type { FieldDefinition } from './FieldDefinition.js';
import type { ConstructOptions } from './ConstructOptions.js';

/** Top-level schema definition for a record type. */
export interface SchemaDefinition {
  /** Record type name, used in error messages and events. */
  readonly name: string;
  /** Ordered list of field definitions. */
  readonly fields: readonly FieldDefinition[];
  /** Schema-level defaults for `construct()` options. */
  readonly options?: ConstructOptions;
}
