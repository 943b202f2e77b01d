import type { Result } from '../domain/model/Result.js';
import { ok, fail } from '../domain/model/Result.js';
import { isBoolean, isList, isNumber, isString, isUuid } from './validate.js';

// Conversions coerce the common loosely-typed representations first, then validate.

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/** Numbers, booleans and bigints become their string form; `null`/`undefined` become `''`. */
export function toString(value: unknown): Result<string, string> {
  if (isAbsent(value)) return ok('');
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return ok(String(value));
  }
  return isString(value);
}

export function toStringOrNull(value: unknown): Result<string | null, string> {
  return isAbsent(value) ? ok(null) : toString(value);
}

/**
 * Decimal integer strings are parsed; `null`, `undefined` and `''` become `0`.
 * Fractional numbers and values outside the safe integer range fail.
 */
export function toInteger(value: unknown): Result<number, string> {
  if (isAbsent(value) || value === '') return ok(0);
  const parsed = typeof value === 'string' && INTEGER_PATTERN.test(value.trim()) ? Number(value.trim()) : value;
  return typeof parsed === 'number' && Number.isSafeInteger(parsed) ? ok(parsed) : fail('must be an integer');
}

export function toIntegerOrNull(value: unknown): Result<number | null, string> {
  return isAbsent(value) ? ok(null) : toInteger(value);
}

/** Decimal strings such as `'12'` or `'-1.5'` are parsed; `null`, `undefined` and `''` become `0`. */
export function toNumber(value: unknown): Result<number, string> {
  if (isAbsent(value) || value === '') return ok(0);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return DECIMAL_PATTERN.test(trimmed) ? isNumber(Number(trimmed)) : fail('must be a number');
  }
  return isNumber(value);
}

export function toNumberOrNull(value: unknown): Result<number | null, string> {
  return isAbsent(value) ? ok(null) : toNumber(value);
}

/** Exactly `'true'`/`'false'`, `1` or `0`; `null`, `undefined` and `''` become `false`. */
export function toBoolean(value: unknown): Result<boolean, string> {
  if (isAbsent(value) || value === '' || value === 'false' || value === 0) return ok(false);
  if (value === 'true' || value === 1) return ok(true);
  return isBoolean(value);
}

export function toBooleanOrNull(value: unknown): Result<boolean | null, string> {
  return isAbsent(value) ? ok(null) : toBoolean(value);
}

export function nullToList(value: unknown): Result<unknown[], string> {
  return isAbsent(value) ? ok([]) : isList(value);
}

/** `'fooBar'`, `'FooBar'` and `'foo-bar'` all become `'FOO_BAR'`. Absent or empty input becomes `null`. */
export function toEnumString(value: unknown): Result<string | null, string> {
  if (isAbsent(value) || value === '') return ok(null);
  if (typeof value !== 'string') return fail('must be a string');
  return ok(
    value
      .replace(/([a-z\d])([A-Z])/g, '$1_$2')
      .replace(/[-\s]+/g, '_')
      .toUpperCase(),
  );
}

/** Absent or empty input gets a freshly generated v4 UUID; anything else must already be one. */
export function toUuid(value: unknown): Result<string, string> {
  return isAbsent(value) || value === '' ? ok(crypto.randomUUID()) : isUuid(value);
}
