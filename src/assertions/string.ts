/**
 * API Assert - String Assertions
 */

import type { Chain } from '../core/chain';
import { canonicalizeNumber } from '../core/canon';
import { AssertionList, type CanonicalNumber } from '../types';
import type { Assertion } from './assertion';
import { BooleanAssert } from './boolean';
import { enterOp } from './chain-helpers';
import { NumberAssert } from './number';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ASCII_PATTERN = /^[\x00-\x7f]*$/;

export class StringAssert implements Assertion<string> {
  readonly kind = 'string';

  private readonly chain: Chain;
  private readonly value: string = '';

  constructor(chain: Chain, value: string) {
    this.chain = chain;

    if (chain.failed()) return;

    if (typeof value !== 'string') {
      chain.fail({
        type: 'type',
        actual: { value },
        errors: ['expected: value is string'],
      });
      return;
    }
    this.value = value;
  }

  raw(): string {
    return this.value;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  /**
   * Number of code points in the string
   */
  length(): NumberAssert {
    const opChain = enterOp(this.chain, 'length()');
    try {
      if (opChain.failed()) {
        return new NumberAssert(opChain.clone(), 0);
      }
      return new NumberAssert(opChain.clone(), [...this.value].length);
    } finally {
      opChain.leave();
    }
  }

  isEmpty(): this {
    return this.check('isEmpty()', this.value === '', {
      type: 'empty',
      error: 'expected: string is empty',
    });
  }

  notEmpty(): this {
    return this.check('notEmpty()', this.value !== '', {
      type: 'not-empty',
      error: 'expected: string is non-empty',
    });
  }

  isEqual(value: string): this {
    return this.check('isEqual()', this.value === value, {
      type: 'equal',
      expected: value,
      error: 'expected: strings are equal',
    });
  }

  notEqual(value: string): this {
    return this.check('notEqual()', this.value !== value, {
      type: 'not-equal',
      expected: value,
      error: 'expected: strings are non-equal',
    });
  }

  isEqualFold(value: string): this {
    return this.check('isEqualFold()', fold(this.value) === fold(value), {
      type: 'equal',
      expected: value,
      error: 'expected: strings are equal (if folded)',
    });
  }

  notEqualFold(value: string): this {
    return this.check('notEqualFold()', fold(this.value) !== fold(value), {
      type: 'not-equal',
      expected: value,
      error: 'expected: strings are non-equal (if folded)',
    });
  }

  contains(value: string): this {
    return this.check('contains()', this.value.includes(value), {
      type: 'contains-subset',
      expected: value,
      error: 'expected: string contains sub-string',
    });
  }

  notContains(value: string): this {
    return this.check('notContains()', !this.value.includes(value), {
      type: 'not-contains-subset',
      expected: value,
      error: 'expected: string does not contain sub-string',
    });
  }

  containsFold(value: string): this {
    return this.check('containsFold()', fold(this.value).includes(fold(value)), {
      type: 'contains-subset',
      expected: value,
      error: 'expected: string contains sub-string (if folded)',
    });
  }

  notContainsFold(value: string): this {
    return this.check('notContainsFold()', !fold(this.value).includes(fold(value)), {
      type: 'not-contains-subset',
      expected: value,
      error: 'expected: string does not contain sub-string (if folded)',
    });
  }

  hasPrefix(value: string): this {
    return this.check('hasPrefix()', this.value.startsWith(value), {
      type: 'contains-subset',
      expected: value,
      error: 'expected: string has prefix',
    });
  }

  hasSuffix(value: string): this {
    return this.check('hasSuffix()', this.value.endsWith(value), {
      type: 'contains-subset',
      expected: value,
      error: 'expected: string has suffix',
    });
  }

  notHasPrefix(value: string): this {
    return this.check('notHasPrefix()', !this.value.startsWith(value), {
      type: 'not-contains-subset',
      expected: value,
      error: "expected: string doesn't have prefix",
    });
  }

  notHasSuffix(value: string): this {
    return this.check('notHasSuffix()', !this.value.endsWith(value), {
      type: 'not-contains-subset',
      expected: value,
      error: "expected: string doesn't have suffix",
    });
  }

  hasPrefixFold(value: string): this {
    return this.check('hasPrefixFold()', fold(this.value).startsWith(fold(value)), {
      type: 'contains-subset',
      expected: value,
      error: 'expected: string has prefix (if folded)',
    });
  }

  notHasPrefixFold(value: string): this {
    return this.check('notHasPrefixFold()', !fold(this.value).startsWith(fold(value)), {
      type: 'not-contains-subset',
      expected: value,
      error: "expected: string doesn't have prefix (if folded)",
    });
  }

  hasSuffixFold(value: string): this {
    return this.check('hasSuffixFold()', fold(this.value).endsWith(fold(value)), {
      type: 'contains-subset',
      expected: value,
      error: 'expected: string has suffix (if folded)',
    });
  }

  notHasSuffixFold(value: string): this {
    return this.check('notHasSuffixFold()', !fold(this.value).endsWith(fold(value)), {
      type: 'not-contains-subset',
      expected: value,
      error: "expected: string doesn't have suffix (if folded)",
    });
  }

  isASCII(): this {
    return this.check('isASCII()', ASCII_PATTERN.test(this.value), {
      type: 'valid',
      error: 'expected: all string characters are ascii',
    });
  }

  notIsASCII(): this {
    return this.check('notIsASCII()', !ASCII_PATTERN.test(this.value), {
      type: 'valid',
      error: 'expected: at least one string character is not ascii',
    });
  }

  match(pattern: string | RegExp): this {
    const opChain = enterOp(this.chain, 'match()');
    try {
      if (opChain.failed()) return this;

      const regexp = compilePattern(opChain, pattern);
      if (!regexp) return this;

      if (!regexp.test(this.value)) {
        opChain.fail({
          type: 'match-regexp',
          actual: { value: this.value },
          expected: { value: regexp },
          errors: ['expected: string matches regexp'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notMatch(pattern: string | RegExp): this {
    const opChain = enterOp(this.chain, 'notMatch()');
    try {
      if (opChain.failed()) return this;

      const regexp = compilePattern(opChain, pattern);
      if (!regexp) return this;

      if (regexp.test(this.value)) {
        opChain.fail({
          type: 'not-match-regexp',
          actual: { value: this.value },
          expected: { value: regexp },
          errors: ['expected: string does not match regexp'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  inList(...values: string[]): this {
    const opChain = enterOp(this.chain, 'inList()');
    try {
      if (opChain.failed() || !requireValues(opChain, values)) return this;

      if (!values.includes(this.value)) {
        opChain.fail({
          type: 'belongs',
          actual: { value: this.value },
          expected: { value: new AssertionList(values) },
          errors: ['expected: string is equal to one of the values'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notInList(...values: string[]): this {
    const opChain = enterOp(this.chain, 'notInList()');
    try {
      if (opChain.failed() || !requireValues(opChain, values)) return this;

      if (values.includes(this.value)) {
        opChain.fail({
          type: 'not-belongs',
          actual: { value: this.value },
          expected: { value: new AssertionList(values) },
          errors: ['expected: string is not equal to any of the values'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  /**
   * Parse the string as a number.
   * Base 10 accepts integers and floats; other bases accept integers only.
   * Integers outside the safe range are kept exact.
   */
  asNumber(base = 10): NumberAssert {
    const opChain = enterOp(this.chain, 'asNumber()');
    try {
      if (opChain.failed()) {
        return new NumberAssert(opChain.clone(), 0);
      }

      if (!Number.isInteger(base) || base < 2 || base > 36) {
        opChain.fail({
          type: 'usage',
          errors: [`unexpected base argument: ${base}`],
        });
        return new NumberAssert(opChain.clone(), 0);
      }

      const parsed = parseNumber(this.value, base);
      if (parsed === undefined) {
        opChain.fail({
          type: 'valid',
          actual: { value: this.value },
          errors: [
            base === 10
              ? 'expected: string can be parsed to integer or float'
              : `expected: string can be parsed to integer with base ${base}`,
          ],
        });
        return new NumberAssert(opChain.clone(), 0);
      }

      const canon = canonicalizeNumber(opChain, parsed);
      return new NumberAssert(opChain.clone(), canon.ok ? canon.value : 0);
    } finally {
      opChain.leave();
    }
  }

  /**
   * Parse "true", "True", "false" or "False"
   */
  asBoolean(): BooleanAssert {
    const opChain = enterOp(this.chain, 'asBoolean()');
    try {
      if (opChain.failed()) {
        return new BooleanAssert(opChain.clone(), false);
      }

      switch (this.value) {
        case 'true':
        case 'True':
          return new BooleanAssert(opChain.clone(), true);

        case 'false':
        case 'False':
          return new BooleanAssert(opChain.clone(), false);
      }

      opChain.fail({
        type: 'valid',
        actual: { value: this.value },
        errors: ['expected: string can be parsed to boolean'],
      });
      return new BooleanAssert(opChain.clone(), false);
    } finally {
      opChain.leave();
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private check(
    name: string,
    passed: boolean,
    failure: { type: StringCheckType; expected?: string; error: string }
  ): this {
    const opChain = enterOp(this.chain, name);
    try {
      if (opChain.failed() || passed) return this;

      opChain.fail({
        type: failure.type,
        actual: { value: this.value },
        expected: failure.expected === undefined ? undefined : { value: failure.expected },
        errors: [failure.error],
      });
      return this;
    } finally {
      opChain.leave();
    }
  }
}

type StringCheckType =
  | 'empty'
  | 'not-empty'
  | 'equal'
  | 'not-equal'
  | 'contains-subset'
  | 'not-contains-subset'
  | 'valid';

function fold(value: string): string {
  return value.toLowerCase();
}

function requireValues(opChain: Chain, values: string[]): boolean {
  if (values.length > 0) return true;

  opChain.fail({
    type: 'usage',
    errors: ['unexpected empty list argument'],
  });
  return false;
}

function compilePattern(opChain: Chain, pattern: string | RegExp): RegExp | undefined {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }

  try {
    return new RegExp(pattern);
  } catch (error) {
    opChain.fail({
      type: 'valid',
      actual: { value: pattern },
      errors: ['expected: valid regexp', error instanceof Error ? error.message : String(error)],
    });
    return undefined;
  }
}

function parseNumber(text: string, base: number): CanonicalNumber | undefined {
  if (base === 10) {
    if (INTEGER_PATTERN.test(text)) return BigInt(text.replace(/^\+/, ''));
    if (FLOAT_PATTERN.test(text)) return Number(text);
    return undefined;
  }

  const negative = text.startsWith('-');
  const digits = text.replace(/^[+-]/, '').toLowerCase();
  if (digits === '') return undefined;

  let result = 0n;
  for (const char of digits) {
    const digit = parseInt(char, 36);
    if (Number.isNaN(digit) || digit >= base) return undefined;
    result = result * BigInt(base) + BigInt(digit);
  }
  return negative ? -result : result;
}
