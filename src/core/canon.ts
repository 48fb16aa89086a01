/**
 * API Assert - Canonicalization
 *
 * Converts arbitrary input into the JSON-like canonical representation
 * compared by all assertions:
 * - numbers become number, or bigint outside the safe integer range
 * - arrays, Sets and typed arrays become arrays
 * - plain objects, class instances and string-keyed Maps become objects
 * - strings, booleans and null pass through
 *
 * Failures are reported on the passed chain and surface as { ok: false }.
 */

import { types } from 'node:util';

import Ajv, { type ErrorObject, type SchemaObject } from 'ajv';

import type { CanonicalNumber, CanonicalObject, CanonicalValue } from '../types';
import type { Chain } from './chain';

// ============================================================================
// Types
// ============================================================================

export type CanonResult<T> = { ok: true; value: T } | { ok: false };

export type Comparison = -1 | 0 | 1;

class MarshalError extends Error {}

const ajv = new Ajv({ allErrors: true, addUsedSchema: false });

// ============================================================================
// Numbers
// ============================================================================

/**
 * Convert a numeric input into a canonical number
 */
export function canonicalizeNumber(chain: Chain, input: unknown): CanonResult<CanonicalNumber> {
  const value = input instanceof Number ? input.valueOf() : input;

  if (typeof value === 'number' && !Number.isNaN(value)) {
    return { ok: true, value };
  }
  if (typeof value === 'bigint') {
    return { ok: true, value: normalizeBigInt(value) };
  }

  chain.fail({
    type: 'valid',
    actual: { value: input },
    errors: ['expected: valid number'],
  });
  return { ok: false };
}

function normalizeBigInt(value: bigint): CanonicalNumber {
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value;
}

/**
 * Order two canonical numbers, exact for bigint
 */
export function compareNumbers(a: CanonicalNumber, b: CanonicalNumber): Comparison {
  if (typeof a === 'bigint') {
    return typeof b === 'bigint' ? order(a, b) : compareBigIntToNumber(a, b);
  }
  return typeof b === 'bigint' ? negate(compareBigIntToNumber(b, a)) : order(a, b);
}

function order(a: number | bigint, b: number | bigint): Comparison {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function negate(comparison: Comparison): Comparison {
  if (comparison === 0) return 0;
  return comparison === 1 ? -1 : 1;
}

function compareBigIntToNumber(big: bigint, num: number): Comparison {
  if (num === Infinity) return -1;
  if (num === -Infinity) return 1;

  const floor = Math.floor(num);
  const comparison = order(big, BigInt(floor));
  if (comparison !== 0) return comparison;

  return num > floor ? -1 : 0;
}

/**
 * Convert a canonical number to a JS number, possibly losing precision
 */
export function toNumber(value: CanonicalNumber): number {
  return typeof value === 'bigint' ? Number(value) : value;
}

// ============================================================================
// Values
// ============================================================================

/**
 * Normalize any JSON-compatible input into its canonical form
 */
export function canonicalizeValue(chain: Chain, input: unknown): CanonResult<CanonicalValue> {
  try {
    return { ok: true, value: marshal(input, new Set()) };
  } catch (error) {
    if (!(error instanceof MarshalError)) {
      throw error;
    }
    chain.fail({
      type: 'valid',
      actual: { value: input },
      errors: ['expected: marshalable value', error.message],
    });
    return { ok: false };
  }
}

/**
 * Canonicalize and require an array
 */
export function canonicalizeArray(chain: Chain, input: unknown): CanonResult<CanonicalValue[]> {
  const result = canonicalizeValue(chain, input);
  if (!result.ok) {
    return result;
  }

  if (!Array.isArray(result.value)) {
    chain.fail({
      type: 'valid',
      actual: { value: input },
      errors: ['expected: valid array'],
    });
    return { ok: false };
  }

  return { ok: true, value: result.value };
}

/**
 * Canonicalize and require a string-keyed object
 */
export function canonicalizeObject(chain: Chain, input: unknown): CanonResult<CanonicalObject> {
  const result = canonicalizeValue(chain, input);
  if (!result.ok) {
    return result;
  }

  if (!isCanonicalObject(result.value)) {
    chain.fail({
      type: 'valid',
      actual: { value: input },
      errors: ['expected: valid map'],
    });
    return { ok: false };
  }

  return { ok: true, value: result.value };
}

export function isCanonicalObject(value: CanonicalValue): value is CanonicalObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function marshal(input: unknown, seen: Set<object>): CanonicalValue {
  if (input === undefined || input === null) {
    return null;
  }
  if (typeof input === 'boolean' || typeof input === 'string') {
    return input;
  }
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new MarshalError(`unsupported value: ${input}`);
    }
    return input;
  }
  if (typeof input === 'bigint') {
    return normalizeBigInt(input);
  }
  if (typeof input === 'object') {
    return marshalObject(input, seen);
  }
  throw new MarshalError(`unsupported type: ${typeof input}`);
}

function marshalObject(input: object, seen: Set<object>): CanonicalValue {
  if (input instanceof Number || input instanceof String || input instanceof Boolean) {
    return marshal(input.valueOf(), seen);
  }

  if (seen.has(input)) {
    throw new MarshalError('unsupported value: encountered a cycle');
  }
  seen.add(input);

  try {
    if ('toJSON' in input && typeof input.toJSON === 'function') {
      const json: unknown = input.toJSON();
      return marshal(json, seen);
    }

    if (Array.isArray(input) || input instanceof Set) {
      return Array.from(input, (item: unknown) => marshal(item, seen));
    }

    if (types.isTypedArray(input)) {
      const items: CanonicalValue[] = [];
      for (const item of input) {
        items.push(marshal(item, seen));
      }
      return items;
    }

    if (input instanceof Map) {
      const entries: [string, unknown][] = [];
      for (const [key, value] of input) {
        if (typeof key !== 'string') {
          throw new MarshalError(`unsupported map key type: ${typeof key}`);
        }
        entries.push([key, value]);
      }
      return marshalEntries(entries, seen);
    }

    return marshalEntries(Object.entries(input), seen);
  } finally {
    seen.delete(input);
  }
}

function marshalEntries(entries: [string, unknown][], seen: Set<object>): CanonicalObject {
  const out: CanonicalObject = {};
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    out[key] = marshal(value, seen);
  }
  return out;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Deep equality of canonical values
 */
export function deepEqual(a: CanonicalValue, b: CanonicalValue): boolean {
  if (isNumber(a) && isNumber(b)) {
    return compareNumbers(a, b) === 0;
  }
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (isCanonicalObject(a) && isCanonicalObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;

    for (const key of keysA) {
      if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
      if (!deepEqual(a[key], b[key])) return false;
    }
    return true;
  }

  return false;
}

export function isNumber(value: CanonicalValue): value is CanonicalNumber {
  return typeof value === 'number' || typeof value === 'bigint';
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Canonicalize a value and check it against a JSON Schema describing the
 * decode target.
 *
 * @returns the value typed as T, or undefined with a reported failure
 */
export function canonicalDecode<T>(
  chain: Chain,
  value: unknown,
  schema: SchemaObject | undefined
): T | undefined {
  if (schema === undefined) {
    chain.fail({
      type: 'usage',
      errors: ['unexpected nil target argument'],
    });
    return undefined;
  }

  const validate = compileSchema<T>(chain, schema);
  if (!validate) {
    return undefined;
  }

  const canon = canonicalizeValue(chain, value);
  if (!canon.ok) {
    return undefined;
  }

  const decoded: unknown = canon.value;
  if (!validate(decoded)) {
    chain.fail({
      type: 'valid',
      actual: { value },
      errors: [
        'expected: value can be decoded into target argument',
        ajv.errorsText(validate.errors),
      ],
    });
    return undefined;
  }

  return decoded;
}

/**
 * Compile a JSON Schema, reporting an invalid schema as a usage failure
 */
export function compileSchema<T>(chain: Chain, schema: SchemaObject) {
  try {
    return ajv.compile<T>(schema);
  } catch (error) {
    chain.fail({
      type: 'usage',
      errors: [
        'unexpected invalid schema argument',
        error instanceof Error ? error.message : String(error),
      ],
    });
    return undefined;
  }
}

export function schemaErrorsText(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors);
}
