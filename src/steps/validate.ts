import type { Result } from '../domain/model/Result.js';
import { ok, fail } from '../domain/model/Result.js';

const UUID_PATTERN = /^[a-f0-9]{8}-[a-f0-9]{4}-4[a-f0-9]{3}-[89ab][a-f0-9]{3}-[a-f0-9]{12}$/i;

export function isString(value: unknown): Result<string, string> {
  return typeof value === 'string' ? ok(value) : fail('must be a string');
}

/** Like `isString`, but `null` and `undefined` pass as `null`. */
export function isStringOrNull(value: unknown): Result<string | null, string> {
  return value === null || value === undefined ? ok(null) : isString(value);
}

/** A string with at least one non-whitespace character. */
export function isNotBlank(value: unknown): Result<string, string> {
  if (typeof value !== 'string') return fail('must be a string');
  return value.trim() === '' ? fail('must not be blank') : ok(value);
}

/** A string other than `''`; a missing value reads as "is required". */
export function isNonemptyString(value: unknown): Result<string, string> {
  if (value === null || value === undefined || value === '') return fail('is required');
  return isString(value);
}

export function isStringList(value: unknown): Result<string[], string> {
  if (!Array.isArray(value)) return fail('must be a list');
  const items: unknown[] = value;
  return items.every((item): item is string => typeof item === 'string')
    ? ok(items)
    : fail('must be a list of strings');
}

export function isInteger(value: unknown): Result<number, string> {
  return typeof value === 'number' && Number.isInteger(value) ? ok(value) : fail('must be an integer');
}

/** A finite number. */
export function isNumber(value: unknown): Result<number, string> {
  return typeof value === 'number' && Number.isFinite(value) ? ok(value) : fail('must be a number');
}

export function isBoolean(value: unknown): Result<boolean, string> {
  return typeof value === 'boolean' ? ok(value) : fail('must be a boolean');
}

export function isList(value: unknown): Result<unknown[], string> {
  return Array.isArray(value) ? ok(value) : fail('must be a list');
}

/** A valid `Date`. An absent value passes as `null`. */
export function isDate(value: unknown): Result<Date | null, string> {
  if (value === null || value === undefined) return ok(null);
  return value instanceof Date && !Number.isNaN(value.getTime()) ? ok(value) : fail('must be a Date');
}

/** A version 4 UUID string. */
export function isUuid(value: unknown): Result<string, string> {
  return typeof value === 'string' && UUID_PATTERN.test(value) ? ok(value) : fail('must be a UUID');
}

/** Bound step: `bound(minLength, 3)`. */
export function minLength(value: unknown, size: number): Result<string, string> {
  if (typeof value !== 'string') return fail('must be a string');
  return value.length >= size ? ok(value) : fail(`must be at least ${String(size)} characters`);
}

/** Bound step: `bound(maxLength, 80)`. */
export function maxLength(value: unknown, size: number): Result<string, string> {
  if (typeof value !== 'string') return fail('must be a string');
  return value.length <= size ? ok(value) : fail(`must be at most ${String(size)} characters`);
}

/** Bound step: `bound(oneOf, ['admin', 'user'])`. */
export function oneOf(value: unknown, allowed: readonly unknown[]): Result<unknown, string> {
  return allowed.includes(value) ? ok(value) : fail(`must be one of: ${allowed.map(String).join(', ')}`);
}
