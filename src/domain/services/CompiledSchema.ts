import type { SchemaDefinition } from '../model/Schema.js';
import type { ConstructOptions } from '../model/ConstructOptions.js';
import type { ConversionStep } from '../model/ConversionStep.js';
import { toStep } from '../model/ConversionStep.js';
import { SchemaDefinitionError } from '../model/Errors.js';

/** A field definition after registration: step normalized, flags resolved. */
export interface CompiledField {
  readonly name: string;
  readonly required: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly step: ConversionStep;
}

const EMPTY_CHAIN: ConversionStep = { kind: 'chain', steps: [] };

/**
 * Registered, read-only form of a `SchemaDefinition`.
 *
 * Built once per record type. Normalizes every field's `StepSpec` and precomputes
 * the key lookup used to map input keys (names and aliases, case-insensitive) to
 * canonical field names. Shared by every construction call.
 */
export class CompiledSchema {
  readonly name: string;
  readonly fields: readonly CompiledField[];
  readonly fieldNames: readonly string[];
  readonly options: ConstructOptions;
  private readonly keyMap: ReadonlyMap<string, string>;

  constructor(definition: SchemaDefinition) {
    this.name = definition.name;
    this.fields = Object.freeze(
      definition.fields.map((field) =>
        Object.freeze({
          name: field.name,
          required: field.required ?? false,
          hasDefault: field.defaultValue !== undefined,
          defaultValue: field.defaultValue,
          step: field.step === undefined ? EMPTY_CHAIN : toStep(field.step),
        }),
      ),
    );
    this.fieldNames = Object.freeze(this.fields.map((f) => f.name));
    this.options = Object.freeze({ ...definition.options });
    this.keyMap = this.buildKeyMap(definition);
  }

  /** Canonical field name for an input key, or `undefined` when the key matches no field. */
  resolveKey(key: string): string | undefined {
    return this.keyMap.get(key.toLowerCase());
  }

  private buildKeyMap(definition: SchemaDefinition): Map<string, string> {
    const map = new Map<string, string>();

    const register = (key: string, fieldName: string): void => {
      const normalized = key.toLowerCase();
      const existing = map.get(normalized);
      if (existing !== undefined) {
        throw new SchemaDefinitionError(
          existing === fieldName
            ? `${definition.name}: field '${fieldName}' is declared more than once`
            : `${definition.name}: key '${key}' of field '${fieldName}' collides with field '${existing}'`,
        );
      }
      map.set(normalized, fieldName);
    };

    for (const field of definition.fields) {
      register(field.name, field.name);
    }
    for (const field of definition.fields) {
      for (const alias of field.aliases ?? []) {
        if (map.get(alias.toLowerCase()) === field.name) continue;
        register(alias, field.name);
      }
    }

    return map;
  }
}
