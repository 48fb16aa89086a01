/**
 * API Assert - Object Assertions
 */

import { canonicalizeObject, canonicalizeValue, deepEqual, isCanonicalObject } from '../core/canon';
import type { Chain } from '../core/chain';
import type { CanonicalObject, CanonicalValue } from '../types';
import { ArrayAssert } from './array';
import type { Assertion } from './assertion';
import { elementChain, enterOp, runPredicate } from './chain-helpers';
import { ValueAssert } from './value';

export type ObjectVisitor = (key: string, value: ValueAssert) => void;
export type ObjectPredicate = (key: string, value: ValueAssert) => boolean;

export class ObjectAssert implements Assertion<CanonicalObject> {
  readonly kind = 'object';

  private readonly chain: Chain;
  private readonly data: CanonicalObject = {};

  constructor(chain: Chain, value: unknown) {
    this.chain = chain;

    if (chain.failed()) return;

    const canon = canonicalizeObject(chain, value);
    if (canon.ok) {
      this.data = canon.value;
    }
  }

  raw(): CanonicalObject {
    return this.data;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  // ==========================================================================
  // Navigation
  // ==========================================================================

  /**
   * Sorted keys of the object
   */
  keys(): ArrayAssert {
    const opChain = enterOp(this.chain, 'keys()');
    try {
      if (opChain.failed()) {
        return new ArrayAssert(opChain.clone(), []);
      }
      return new ArrayAssert(opChain.clone(), this.sortedKeys());
    } finally {
      opChain.leave();
    }
  }

  /**
   * Values of the object, ordered by key
   */
  values(): ArrayAssert {
    const opChain = enterOp(this.chain, 'values()');
    try {
      if (opChain.failed()) {
        return new ArrayAssert(opChain.clone(), []);
      }
      return new ArrayAssert(
        opChain.clone(),
        this.sortedKeys().map((key) => this.data[key])
      );
    } finally {
      opChain.leave();
    }
  }

  value(key: string): ValueAssert {
    const opChain = enterOp(this.chain, 'value(%j)', key);
    try {
      if (opChain.failed()) {
        return new ValueAssert(opChain.clone(), null);
      }

      if (!this.hasKey(key)) {
        opChain.fail({
          type: 'contains-key',
          actual: { value: this.data },
          expected: { value: key },
          errors: ['expected: map contains key'],
        });
        return new ValueAssert(opChain.clone(), null);
      }

      return new ValueAssert(opChain.clone(), this.data[key]);
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

      if (Object.keys(this.data).length !== 0) {
        opChain.fail({
          type: 'empty',
          actual: { value: this.data },
          errors: ['expected: map is empty'],
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

      if (Object.keys(this.data).length === 0) {
        opChain.fail({
          type: 'not-empty',
          actual: { value: this.data },
          errors: ['expected: map is non-empty'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  isEqual(value: unknown): this {
    const opChain = enterOp(this.chain, 'isEqual()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeObject(opChain, value);
      if (!expected.ok) return this;

      if (!deepEqual(this.data, expected.value)) {
        opChain.fail({
          type: 'equal',
          actual: { value: this.data },
          expected: { value: expected.value },
          errors: ['expected: maps are equal'],
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

      const expected = canonicalizeObject(opChain, value);
      if (!expected.ok) return this;

      if (deepEqual(this.data, expected.value)) {
        opChain.fail({
          type: 'not-equal',
          actual: { value: this.data },
          expected: { value: expected.value },
          errors: ['expected: maps are non-equal'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  containsKey(key: string): this {
    const opChain = enterOp(this.chain, 'containsKey(%j)', key);
    try {
      if (opChain.failed()) return this;

      if (!this.hasKey(key)) {
        opChain.fail({
          type: 'contains-key',
          actual: { value: this.data },
          expected: { value: key },
          errors: ['expected: map contains key'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notContainsKey(key: string): this {
    const opChain = enterOp(this.chain, 'notContainsKey(%j)', key);
    try {
      if (opChain.failed()) return this;

      if (this.hasKey(key)) {
        opChain.fail({
          type: 'not-contains-key',
          actual: { value: this.data },
          expected: { value: key },
          errors: ['expected: map does not contain key'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check that every key of the subset is present with a matching value.
   * Nested objects are matched as subsets too.
   */
  containsSubset(subset: unknown): this {
    const opChain = enterOp(this.chain, 'containsSubset()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeObject(opChain, subset);
      if (!expected.ok) return this;

      if (!isSubset(expected.value, this.data)) {
        opChain.fail({
          type: 'contains-subset',
          actual: { value: this.data },
          expected: { value: expected.value },
          errors: ['expected: map contains sub-map'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notContainsSubset(subset: unknown): this {
    const opChain = enterOp(this.chain, 'notContainsSubset()');
    try {
      if (opChain.failed()) return this;

      const expected = canonicalizeObject(opChain, subset);
      if (!expected.ok) return this;

      if (isSubset(expected.value, this.data)) {
        opChain.fail({
          type: 'not-contains-subset',
          actual: { value: this.data },
          expected: { value: expected.value },
          errors: ['expected: map does not contain sub-map'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  hasValue(key: string, value: unknown): this {
    return this.checkValue('hasValue(%j)', key, value, true);
  }

  notHasValue(key: string, value: unknown): this {
    return this.checkValue('notHasValue(%j)', key, value, false);
  }

  /**
   * Same check as hasValue(), reported under its own name
   */
  valueEqual(key: string, value: unknown): this {
    return this.checkValue('valueEqual(%j)', key, value, true);
  }

  /**
   * Same check as notHasValue(); a missing key fails too
   */
  valueNotEqual(key: string, value: unknown): this {
    return this.checkValue('valueNotEqual(%j)', key, value, false);
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  /**
   * Run the visitor for every entry, ordered by key.
   * Failures inside the visitor fail this assertion.
   */
  every(visitor: ObjectVisitor): this {
    const opChain = enterOp(this.chain, 'every()');
    try {
      if (opChain.failed()) return this;

      for (const key of this.sortedKeys()) {
        const chain = elementChain(opChain, 'every[%j]', key);
        visitor(key, new ValueAssert(chain, this.data[key]));
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Keep the entries accepted by the predicate.
   * An entry whose predicate fails an assertion is dropped without failing
   * this assertion.
   */
  filter(predicate: ObjectPredicate): ObjectAssert {
    const opChain = enterOp(this.chain, 'filter()');
    try {
      if (opChain.failed()) {
        return new ObjectAssert(opChain.clone(), {});
      }

      const filtered: CanonicalObject = {};
      for (const key of this.sortedKeys()) {
        if (this.test(opChain, 'filter[%j]', key, predicate)) {
          filtered[key] = this.data[key];
        }
      }

      return new ObjectAssert(opChain.clone(), filtered);
    } finally {
      opChain.leave();
    }
  }

  /**
   * First value, ordered by key, accepted by the predicate
   */
  find(predicate: ObjectPredicate): ValueAssert {
    const opChain = enterOp(this.chain, 'find()');
    try {
      if (opChain.failed()) {
        return new ValueAssert(opChain.clone(), null);
      }

      for (const key of this.sortedKeys()) {
        if (this.test(opChain, 'find[%j]', key, predicate)) {
          return new ValueAssert(opChain.clone(), this.data[key]);
        }
      }

      opChain.fail({
        type: 'valid',
        actual: { value: this.data },
        errors: ['expected: at least one object value matches predicate'],
      });
      return new ValueAssert(opChain.clone(), null);
    } finally {
      opChain.leave();
    }
  }

  /**
   * All values, ordered by key, accepted by the predicate
   */
  findAll(predicate: ObjectPredicate): ValueAssert[] {
    const opChain = enterOp(this.chain, 'findAll()');
    try {
      if (opChain.failed()) return [];

      const found: ValueAssert[] = [];
      for (const key of this.sortedKeys()) {
        if (this.test(opChain, 'findAll[%j]', key, predicate)) {
          found.push(new ValueAssert(elementChain(opChain, 'findAll[%j]', key), this.data[key]));
        }
      }
      return found;
    } finally {
      opChain.leave();
    }
  }

  notFind(predicate: ObjectPredicate): this {
    const opChain = enterOp(this.chain, 'notFind()');
    try {
      if (opChain.failed()) return this;

      for (const key of this.sortedKeys()) {
        if (this.test(opChain, 'notFind[%j]', key, predicate)) {
          opChain.fail({
            type: 'not-contains-element',
            actual: { value: this.data },
            expected: { value: this.data[key] },
            errors: [
              'expected: none of the object values match predicate',
              `value with key "${key}" matches predicate`,
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
  // Helpers
  // ==========================================================================

  private sortedKeys(): string[] {
    return Object.keys(this.data).sort();
  }

  private hasKey(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data, key);
  }

  private checkValue(name: string, key: string, value: unknown, equal: boolean): this {
    const opChain = enterOp(this.chain, name, key);
    try {
      if (opChain.failed()) return this;

      if (!this.requireKey(opChain, key)) return this;

      const expected = canonicalizeValue(opChain, value);
      if (!expected.ok) return this;

      if (deepEqual(this.data[key], expected.value) !== equal) {
        opChain.fail({
          type: equal ? 'equal' : 'not-equal',
          actual: { value: this.data[key] },
          expected: { value: expected.value },
          errors: [
            equal
              ? `expected: map value for key "${key}" is equal to given value`
              : `expected: map value for key "${key}" is non-equal to given value`,
          ],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  private requireKey(opChain: Chain, key: string): boolean {
    if (this.hasKey(key)) return true;

    opChain.fail({
      type: 'contains-key',
      actual: { value: this.data },
      expected: { value: key },
      errors: ['expected: map contains key'],
    });
    return false;
  }

  private test(opChain: Chain, segment: string, key: string, predicate: ObjectPredicate): boolean {
    return runPredicate(opChain, segment, key, (chain) =>
      predicate(key, new ValueAssert(chain, this.data[key]))
    );
  }
}

/**
 * Check if every entry of subset is present in value.
 * Objects match recursively, arrays match element-wise with equal length.
 */
export function isSubset(subset: CanonicalValue, value: CanonicalValue): boolean {
  if (isCanonicalObject(subset)) {
    if (!isCanonicalObject(value)) return false;

    return Object.keys(subset).every(
      (key) =>
        Object.prototype.hasOwnProperty.call(value, key) && isSubset(subset[key], value[key])
    );
  }

  if (Array.isArray(subset)) {
    if (!Array.isArray(value) || value.length !== subset.length) return false;

    return subset.every((item, index) => isSubset(item, value[index]));
  }

  return deepEqual(subset, value);
}
