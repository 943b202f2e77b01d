import type { RawRecord, RecordOwner } from '../model/Record.js';
import { ownerOf, fieldsOf } from '../model/Record.js';
import { KeyError } from '../model/Errors.js';
import type { CompiledSchema } from './CompiledSchema.js';

/** Classified input, ready for the construction pipeline. */
export type NormalizedInput =
  | { readonly kind: 'null' }
  | { readonly kind: 'list'; readonly items: readonly unknown[] }
  | { readonly kind: 'mapping'; readonly fields: RawRecord; readonly source: RecordOwner | null }
  | { readonly kind: 'unrecognized'; readonly input: unknown };

type OrderedPair = readonly [string, unknown];

/**
 * Domain service that classifies heterogeneous input and reshapes it into a
 * field → value mapping keyed by the schema's canonical names.
 */
export class InputNormalizer {
  constructor(private readonly schema: CompiledSchema) {}

  /**
   * Classify raw input.
   *
   * Ordered pairs fold into a mapping (last write wins), `Map`s with string keys (an
   * empty `Map` included) and plain objects are mappings, constructed records become
   * mappings of their fields. Empty arrays are lists, never pairs.
   */
  classify(input: unknown): NormalizedInput {
    if (input === null || input === undefined) return { kind: 'null' };

    if (Array.isArray(input)) {
      if (isOrderedPairs(input)) {
        return { kind: 'mapping', fields: Object.fromEntries(input), source: null };
      }
      return { kind: 'list', items: input };
    }

    if (typeof input !== 'object') return { kind: 'unrecognized', input };

    const owner = ownerOf(input);
    if (owner) return { kind: 'mapping', fields: fieldsOf(input), source: owner };

    if (input instanceof Map) {
      const entries: [unknown, unknown][] = [...input.entries()];
      if (!entries.every(hasStringKey)) return { kind: 'unrecognized', input };
      return { kind: 'mapping', fields: Object.fromEntries(entries), source: null };
    }

    if (isPlainObject(input)) return { kind: 'mapping', fields: fieldsOf(input), source: null };

    return { kind: 'unrecognized', input };
  }

  /**
   * Rename keys to canonical field names. Keys matching no field are kept as-is so
   * that `beforeConstruct` can still read them; they never reach the record.
   * When several keys resolve to the same field, the first one wins.
   *
   * @throws KeyError when `checkKeys` is set and a key matches no field.
   */
  canonicalize(fields: RawRecord, checkKeys: boolean): RawRecord {
    const seen = new Set<string>();
    const entries: [string, unknown][] = [];

    for (const [key, value] of Object.entries(fields)) {
      const canonicalName = this.schema.resolveKey(key);
      if (canonicalName === undefined && checkKeys) {
        throw new KeyError('UNKNOWN_KEY', this.schema.name, key);
      }
      const target = canonicalName ?? key;
      if (seen.has(target)) continue;
      seen.add(target);
      entries.push([target, value]);
    }

    return Object.fromEntries(entries);
  }
}

function isOrderedPairs(items: readonly unknown[]): items is readonly OrderedPair[] {
  return (
    items.length > 0 &&
    items.every((item) => Array.isArray(item) && item.length === 2 && typeof item[0] === 'string')
  );
}

function hasStringKey(entry: readonly [unknown, unknown]): entry is [string, unknown] {
  return typeof entry[0] === 'string';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
