/**
 * API Assert - Assertion Object Types
 */

import type { ArrayAssert } from './array';
import type { BooleanAssert } from './boolean';
import type { NumberAssert } from './number';
import type { ObjectAssert } from './object';
import type { ResponseAssert } from './response';
import type { StringAssert } from './string';
import type { ValueAssert } from './value';

export type AssertionKind = 'value' | 'object' | 'array' | 'string' | 'number' | 'boolean' | 'response';

/**
 * Capability shared by every assertion object: it holds a chain and a value
 */
export interface Assertion<T> {
  readonly kind: AssertionKind;

  /**
   * Underlying value in canonical form
   */
  raw(): T;

  /**
   * Replace the displayed path of failures with the given name
   */
  alias(name: string): this;
}

export type AnyAssertion =
  | ValueAssert
  | ObjectAssert
  | ArrayAssert
  | StringAssert
  | NumberAssert
  | BooleanAssert
  | ResponseAssert;
