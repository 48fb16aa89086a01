/**
 * API Assert - Number Assertions
 *
 * Values are canonical numbers: a JS number, or a bigint when the integer
 * does not fit the safe range. Comparisons between the two are exact.
 */

import { canonicalizeNumber, compareNumbers, toNumber } from '../core/canon';
import type { Chain } from '../core/chain';
import {
  AssertionList,
  AssertionRange,
  type AssertionType,
  type CanonicalNumber,
} from '../types';
import type { Assertion } from './assertion';
import { enterOp } from './chain-helpers';

type OrderCheck = 'gt' | 'ge' | 'lt' | 'le';

const ORDER_ERRORS: Record<OrderCheck, string> = {
  gt: 'expected: number is larger than given value',
  ge: 'expected: number is larger than or equal to given value',
  lt: 'expected: number is less than given value',
  le: 'expected: number is less than or equal to given value',
};

export class NumberAssert implements Assertion<CanonicalNumber> {
  readonly kind = 'number';

  private readonly chain: Chain;
  private readonly value: CanonicalNumber = 0;

  constructor(chain: Chain, value: unknown) {
    this.chain = chain;

    if (chain.failed()) return;

    const canon = canonicalizeNumber(chain, value);
    if (canon.ok) {
      this.value = canon.value;
    }
  }

  raw(): CanonicalNumber {
    return this.value;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  isEqual(value: unknown): this {
    const opChain = enterOp(this.chain, 'isEqual()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeNumber(opChain, value);
      if (!expected.ok) return this;

      if (compareNumbers(this.value, expected.value) !== 0) {
        opChain.fail({
          type: 'equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: ['expected: numbers are equal'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notEqual(value: unknown): this {
    const opChain = enterOp(this.chain, 'notEqual()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeNumber(opChain, value);
      if (!expected.ok) return this;

      if (compareNumbers(this.value, expected.value) === 0) {
        opChain.fail({
          type: 'not-equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: ['expected: numbers are non-equal'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that the number differs from value by at most delta
   */
  inDelta(value: unknown, delta: number): this {
    return this.checkDelta('inDelta()', value, delta, true);
  }

  notInDelta(value: unknown, delta: number): this {
    return this.checkDelta('notInDelta()', value, delta, false);
  }

  gt(value: unknown): this {
    return this.checkOrder('gt', value);
  }

  ge(value: unknown): this {
    return this.checkOrder('ge', value);
  }

  lt(value: unknown): this {
    return this.checkOrder('lt', value);
  }

  le(value: unknown): this {
    return this.checkOrder('le', value);
  }

  /**
   * Check min <= number <= max
   */
  inRange(min: unknown, max: unknown): this {
    return this.checkRange('inRange()', min, max, true);
  }

  notInRange(min: unknown, max: unknown): this {
    return this.checkRange('notInRange()', min, max, false);
  }

  inList(...values: unknown[]): this {
    return this.checkList('inList()', values, true);
  }

  notInList(...values: unknown[]): this {
    return this.checkList('notInList()', values, false);
  }

  isInteger(): this {
    const opChain = enterOp(this.chain, 'isInteger()');
    try {
      if (opChain.failed()) return this;

      if (typeof this.value === 'number' && !Number.isInteger(this.value)) {
        opChain.fail({
          type: 'valid',
          actual: { value: this.value },
          errors: ['expected: number is integer'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private checkDelta(name: string, value: unknown, delta: number, inside: boolean): this {
    const opChain = enterOp(this.chain, name);
    try {
      if (opChain.failed()) return this;

      if (Number.isNaN(delta) || delta < 0) {
        opChain.fail({
          type: 'usage',
          errors: [`unexpected delta argument: ${delta}`],
        });
        return this;
      }

      const expected = canonicalizeNumber(opChain, value);
      if (!expected.ok) return this;

      const within =
        compareNumbers(this.value, expected.value) === 0 ||
        Math.abs(toNumber(this.value) - toNumber(expected.value)) <= delta;
      if (within !== inside) {
        opChain.fail({
          type: inside ? 'equal' : 'not-equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          delta: { value: delta },
          errors: [
            inside
              ? 'expected: numbers lie within delta'
              : 'expected: numbers do not lie within delta',
          ],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  private checkOrder(check: OrderCheck, value: unknown): this {
    const opChain = enterOp(this.chain, '%s()', check);
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeNumber(opChain, value);
      if (!expected.ok) return this;

      const comparison = compareNumbers(this.value, expected.value);
      const passed =
        (check === 'gt' && comparison > 0) ||
        (check === 'ge' && comparison >= 0) ||
        (check === 'lt' && comparison < 0) ||
        (check === 'le' && comparison <= 0);

      if (!passed) {
        opChain.fail({
          type: check,
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: [ORDER_ERRORS[check]],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  private checkRange(name: string, min: unknown, max: unknown, inside: boolean): this {
    const opChain = enterOp(this.chain, name);
    try {
      if (opChain.failed()) return this;

      const low = canonicalizeNumber(opChain, min);
      if (!low.ok) return this;
      const high = canonicalizeNumber(opChain, max);
      if (!high.ok) return this;

      const within =
        compareNumbers(this.value, low.value) >= 0 && compareNumbers(this.value, high.value) <= 0;

      if (within !== inside) {
        opChain.fail({
          type: inside ? 'in-range' : 'not-in-range',
          actual: { value: this.value },
          expected: { value: new AssertionRange(low.value, high.value) },
          errors: [
            inside
              ? 'expected: number is within given range'
              : 'expected: number is not within given range',
          ],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  private checkList(name: string, values: unknown[], inside: boolean): this {
    const opChain = enterOp(this.chain, name);
    try {
      if (opChain.failed()) return this;

      if (values.length === 0) {
        opChain.fail({
          type: 'usage',
          errors: ['unexpected empty list argument'],
        });
        return this;
      }

      const list: CanonicalNumber[] = [];
      for (const value of values) {
        const canon = canonicalizeNumber(opChain, value);
        if (!canon.ok) return this;
        list.push(canon.value);
      }

      const found = list.some((item) => compareNumbers(this.value, item) === 0);
      if (found !== inside) {
        const type: AssertionType = inside ? 'belongs' : 'not-belongs';
        opChain.fail({
          type,
          actual: { value: this.value },
          expected: { value: new AssertionList(list) },
          errors: [
            inside
              ? 'expected: number is equal to one of the values'
              : 'expected: number is not equal to any of the values',
          ],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }
}
