/** A key-value mapping as received from the caller, a parser, or a hook. */
export interface RawRecord {
  readonly [key: string]: unknown;
}

/** Identity of the record type that built a record. */
export interface RecordOwner {
  readonly name: string;
  readonly fieldNames: readonly string[];
}

const OWNER = Symbol('record-constructor.owner');

interface OwnedRecord {
  readonly [OWNER]: RecordOwner;
}

/** Attach the owning record type to a freshly built record. The brand is non-enumerable. */
export function brandRecord<R extends object>(record: R, owner: RecordOwner): R {
  Object.defineProperty(record, OWNER, { value: owner, enumerable: false, writable: false, configurable: false });
  return record;
}

/** Return the record type that built `value`, or `null` when it is not a constructed record. */
export function ownerOf(value: unknown): RecordOwner | null {
  if (typeof value !== 'object' || value === null || !isOwned(value)) return null;
  return value[OWNER];
}

/** Own enumerable fields of a value, as a fresh mapping. */
export function fieldsOf(value: object): Record<string, unknown> {
  return { ...value };
}

/** Check whether every value in a raw record is empty (`undefined`, `null`, or `''`). */
export function isEmptyRow(record: RawRecord): boolean {
  return Object.values(record).every((v) => v === undefined || v === null || v === '');
}

function isOwned(value: object): value is OwnedRecord {
  return OWNER in value;
}
