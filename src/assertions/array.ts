/**
 * API Assert - Array Assertions
 *
 * Element checks compare canonical values, so 1, 1.0 and 1n are the same
 * element.
 */

import { canonicalizeArray, deepEqual } from '../core/canon';
import type { Chain } from '../core/chain';
import { AssertionRange, type AssertionType, type CanonicalValue } from '../types';
import type { Assertion } from './assertion';
import { elementChain, enterOp, runPredicate } from './chain-helpers';
import { NumberAssert } from './number';
import { ValueAssert, canonicalizeList } from './value';

export type ArrayVisitor = (index: number, value: ValueAssert) => void;
export type ArrayPredicate = (index: number, value: ValueAssert) => boolean;

export class ArrayAssert implements Assertion<CanonicalValue[]> {
  readonly kind = 'array';

  private readonly chain: Chain;
  private readonly value: CanonicalValue[] = [];

  constructor(chain: Chain, value: unknown) {
    this.chain = chain;

    if (chain.failed()) return;

    const canon = canonicalizeArray(chain, value);
    if (canon.ok) {
      this.value = canon.value;
    }
  }

  raw(): CanonicalValue[] {
    return this.value;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  // ==========================================================================
  // Navigation
  // ==========================================================================

  length(): NumberAssert {
    const opChain = enterOp(this.chain, 'length()');
    try {
      if (opChain.failed()) {
        return new NumberAssert(opChain.clone(), 0);
      }
      return new NumberAssert(opChain.clone(), this.value.length);
    } finally {
      opChain.leave();
    }
  }

  element(index: number): ValueAssert {
    const opChain = enterOp(this.chain, 'element(%d)', index);
    try {
      if (opChain.failed()) {
        return new ValueAssert(opChain.clone(), null);
      }

      if (!Number.isInteger(index) || index < 0 || index >= this.value.length) {
        opChain.fail({
          type: 'in-range',
          actual: { value: index },
          expected: { value: new AssertionRange(0, this.value.length - 1) },
          errors: ['expected: valid element index'],
        });
        return new ValueAssert(opChain.clone(), null);
      }

      return new ValueAssert(opChain.clone(), this.value[index]);
    } finally {
      opChain.leave();
    }
  }

  first(): ValueAssert {
    const opChain = enterOp(this.chain, 'first()');
    try {
      if (opChain.failed() || !this.requireElements(opChain)) {
        return new ValueAssert(opChain.clone(), null);
      }
      return new ValueAssert(opChain.clone(), this.value[0]);
    } finally {
      opChain.leave();
    }
  }

  last(): ValueAssert {
    const opChain = enterOp(this.chain, 'last()');
    try {
      if (opChain.failed() || !this.requireElements(opChain)) {
        return new ValueAssert(opChain.clone(), null);
      }
      return new ValueAssert(opChain.clone(), this.value[this.value.length - 1]);
    } finally {
      opChain.leave();
    }
  }

  /**
   * One ValueAssert per element
   */
  iter(): ValueAssert[] {
    const opChain = enterOp(this.chain, 'iter()');
    try {
      if (opChain.failed()) return [];

      return this.value.map(
        (item, index) => new ValueAssert(elementChain(opChain, 'iter[%d]', index), item)
      );
    } finally {
      opChain.leave();
    }
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  /**
   * Run the visitor for every element.
   * Failures inside the visitor fail this assertion, and every element is
   * visited regardless.
   */
  every(visitor: ArrayVisitor): this {
    const opChain = enterOp(this.chain, 'every()');
    try {
      if (opChain.failed()) return this;

      this.value.forEach((item, index) => {
        visitor(index, new ValueAssert(elementChain(opChain, 'every[%d]', index), item));
      });
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Map every element through fn and continue with the results
   */
  transform(fn: (index: number, value: CanonicalValue) => unknown): ArrayAssert {
    const opChain = enterOp(this.chain, 'transform()');
    try {
      if (opChain.failed()) {
        return new ArrayAssert(opChain.clone(), []);
      }

      const mapped = this.value.map((item, index) => fn(index, item));
      return new ArrayAssert(opChain.clone(), mapped);
    } finally {
      opChain.leave();
    }
  }

  /**
   * Keep the elements accepted by the predicate.
   * An element whose predicate fails an assertion is dropped without failing
   * this assertion.
   */
  filter(predicate: ArrayPredicate): ArrayAssert {
    const opChain = enterOp(this.chain, 'filter()');
    try {
      if (opChain.failed()) {
        return new ArrayAssert(opChain.clone(), []);
      }

      const filtered = this.value.filter((item, index) =>
        this.test(opChain, 'filter[%d]', index, predicate)
      );

      return new ArrayAssert(opChain.clone(), filtered);
    } finally {
      opChain.leave();
    }
  }

  find(predicate: ArrayPredicate): ValueAssert {
    const opChain = enterOp(this.chain, 'find()');
    try {
      if (opChain.failed()) {
        return new ValueAssert(opChain.clone(), null);
      }

      for (let index = 0; index < this.value.length; index++) {
        if (this.test(opChain, 'find[%d]', index, predicate)) {
          return new ValueAssert(opChain.clone(), this.value[index]);
        }
      }

      opChain.fail({
        type: 'valid',
        actual: { value: this.value },
        errors: ['expected: at least one array element matches predicate'],
      });
      return new ValueAssert(opChain.clone(), null);
    } finally {
      opChain.leave();
    }
  }

  findAll(predicate: ArrayPredicate): ValueAssert[] {
    const opChain = enterOp(this.chain, 'findAll()');
    try {
      if (opChain.failed()) return [];

      const found: ValueAssert[] = [];
      this.value.forEach((item, index) => {
        if (this.test(opChain, 'findAll[%d]', index, predicate)) {
          found.push(new ValueAssert(elementChain(opChain, 'findAll[%d]', index), item));
        }
      });
      return found;
    } finally {
      opChain.leave();
    }
  }

  notFind(predicate: ArrayPredicate): this {
    const opChain = enterOp(this.chain, 'notFind()');
    try {
      if (opChain.failed()) return this;

      for (let index = 0; index < this.value.length; index++) {
        if (this.test(opChain, 'notFind[%d]', index, predicate)) {
          opChain.fail({
            type: 'not-contains-element',
            actual: { value: this.value },
            expected: { value: this.value[index] },
            errors: [
              'expected: none of the array elements match predicate',
              `element with index ${index} matches predicate`,
            ],
          });
          break;
        }
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  // ==========================================================================
  // Checks
  // ==========================================================================

  isEmpty(): this {
    const opChain = enterOp(this.chain, 'isEmpty()');
    try {
      if (opChain.failed()) return this;

      if (this.value.length !== 0) {
        opChain.fail({
          type: 'empty',
          actual: { value: this.value },
          errors: ['expected: empty array'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notEmpty(): this {
    const opChain = enterOp(this.chain, 'notEmpty()');
    try {
      if (opChain.failed()) return this;

      this.requireElements(opChain);
      return this;
    } finally {
      opChain.leave();
    }
  }

  isEqual(value: unknown): this {
    const opChain = enterOp(this.chain, 'isEqual()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeArray(opChain, value);
      if (!expected.ok) return this;

      if (!deepEqual(this.value, expected.value)) {
        opChain.fail({
          type: 'equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: ['expected: arrays are equal'],
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

      const expected = canonicalizeArray(opChain, value);
      if (!expected.ok) return this;

      if (deepEqual(this.value, expected.value)) {
        opChain.fail({
          type: 'not-equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: ['expected: arrays are non-equal'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that both arrays hold the same elements the same number of times,
   * in any order
   */
  isEqualUnordered(value: unknown): this {
    const opChain = enterOp(this.chain, 'isEqualUnordered()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeArray(opChain, value);
      if (!expected.ok) return this;

      const reference = expected.value;

      for (const item of [...reference, ...this.value]) {
        const expectedCount = countElement(reference, item);
        const actualCount = countElement(this.value, item);
        if (expectedCount === actualCount) continue;

        let type: AssertionType = 'not-contains-element';
        let error: string;
        if (expectedCount === 1 && actualCount === 0) {
          type = 'contains-element';
          error = 'expected: array contains element from reference array';
        } else if (expectedCount === 0 && actualCount === 1) {
          error = 'expected: array does not contain elements that are not present in reference array';
        } else {
          error =
            `expected: element occurs ${expectedCount} time(s), as in reference array,` +
            ` but it occurs ${actualCount} time(s)`;
        }

        opChain.fail({
          type,
          actual: { value: this.value },
          expected: { value: item },
          reference: { value: reference },
          errors: [error],
        });
        break;
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notEqualUnordered(value: unknown): this {
    const opChain = enterOp(this.chain, 'notEqualUnordered()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeArray(opChain, value);
      if (!expected.ok) return this;

      const reference = expected.value;
      const different = [...reference, ...this.value].some(
        (item) => countElement(reference, item) !== countElement(this.value, item)
      );

      if (!different) {
        opChain.fail({
          type: 'not-equal',
          actual: { value: this.value },
          expected: { value: reference },
          reference: { value: reference },
          errors: ['expected: arrays are non-equal (ignoring order)'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that every given value is an element of the array
   */
  containsAll(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'containsAll()');
    try {
      if (opChain.failed()) return this;

      const elements = canonicalizeList(opChain, values);
      if (!elements) return this;

      const missing = elements.find((item) => countElement(this.value, item) === 0);
      if (missing !== undefined) {
        opChain.fail({
          type: 'contains-element',
          actual: { value: this.value },
          expected: { value: missing },
          reference: { value: elements },
          errors: ['expected: array contains element from reference array'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that at least one given value is not an element of the array
   */
  notContainsAll(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'notContainsAll()');
    try {
      if (opChain.failed()) return this;

      const elements = canonicalizeList(opChain, values);
      if (!elements) return this;

      if (elements.every((item) => countElement(this.value, item) > 0)) {
        opChain.fail({
          type: 'not-contains-subset',
          actual: { value: this.value },
          expected: { value: elements },
          errors: ['expected: array does not contain at least one element from reference array'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  containsAny(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'containsAny()');
    try {
      if (opChain.failed()) return this;

      const elements = canonicalizeList(opChain, values);
      if (!elements) return this;

      if (!elements.some((item) => countElement(this.value, item) > 0)) {
        opChain.fail({
          type: 'contains-element',
          actual: { value: this.value },
          reference: { value: elements },
          errors: ['expected: array contains at least one element from reference array'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notContainsAny(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'notContainsAny()');
    try {
      if (opChain.failed()) return this;

      const elements = canonicalizeList(opChain, values);
      if (!elements) return this;

      const found = elements.find((item) => countElement(this.value, item) > 0);
      if (found !== undefined) {
        opChain.fail({
          type: 'not-contains-element',
          actual: { value: this.value },
          expected: { value: found },
          reference: { value: elements },
          errors: ['expected: array does not contain any elements from reference array'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that the array holds the given values and nothing else, in any
   * order and any number of times
   */
  containsOnly(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'containsOnly()');
    try {
      if (opChain.failed()) return this;

      const elements = canonicalizeList(opChain, values);
      if (!elements) return this;

      const missing = elements.find((item) => countElement(this.value, item) === 0);
      if (missing !== undefined) {
        opChain.fail({
          type: 'contains-element',
          actual: { value: this.value },
          expected: { value: missing },
          reference: { value: elements },
          errors: ['expected: array contains element from reference array'],
        });
        return this;
      }

      const extra = this.value.find((item) => countElement(elements, item) === 0);
      if (extra !== undefined) {
        opChain.fail({
          type: 'not-contains-element',
          actual: { value: this.value },
          expected: { value: extra },
          reference: { value: elements },
          errors: ['expected: array does not contain elements that are not present in reference array'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that the array either misses one of the given values or holds
   * something else
   */
  notContainsOnly(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'notContainsOnly()');
    try {
      if (opChain.failed()) return this;

      const elements = canonicalizeList(opChain, values);
      if (!elements) return this;

      const different =
        elements.some((item) => countElement(this.value, item) === 0) ||
        this.value.some((item) => countElement(elements, item) === 0);

      if (!different) {
        opChain.fail({
          type: 'not-equal',
          actual: { value: this.value },
          expected: { value: elements },
          reference: { value: elements },
          errors: [
            'expected: array does not contain only elements from reference array' +
              ' (at least one distinguishing element needed)',
          ],
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

  private requireElements(opChain: Chain): boolean {
    if (this.value.length > 0) return true;

    opChain.fail({
      type: 'not-empty',
      actual: { value: this.value },
      errors: ['expected: non-empty array'],
    });
    return false;
  }

  private test(opChain: Chain, segment: string, index: number, predicate: ArrayPredicate): boolean {
    return runPredicate(opChain, segment, index, (chain) =>
      predicate(index, new ValueAssert(chain, this.value[index]))
    );
  }
}

export function countElement(array: readonly CanonicalValue[], item: CanonicalValue): number {
  let count = 0;
  for (const candidate of array) {
    if (deepEqual(candidate, item)) count++;
  }
  return count;
}
