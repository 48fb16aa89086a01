/**
 * API Assert - Value Assertions
 *
 * Wraps a value of any JSON-compatible type. Use object(), array(),
 * string(), number() or boolean() to continue with a typed assertion.
 *
 * @example
 * expect.value(body).object().value('id').number().isEqual(1);
 */

import type { SchemaObject } from 'ajv';

import {
  canonicalDecode,
  canonicalizeValue,
  compileSchema,
  deepEqual,
  isCanonicalObject,
  isNumber,
  schemaErrorsText,
} from '../core/canon';
import type { Chain } from '../core/chain';
import { AssertionList, type AssertionFailure, type CanonicalValue } from '../types';
import { ArrayAssert } from './array';
import type { Assertion } from './assertion';
import { BooleanAssert } from './boolean';
import { enterOp } from './chain-helpers';
import { NumberAssert } from './number';
import { ObjectAssert } from './object';
import { StringAssert } from './string';

export class ValueAssert implements Assertion<CanonicalValue> {
  readonly kind = 'value';

  private readonly chain: Chain;
  private readonly value: CanonicalValue = null;

  constructor(chain: Chain, value: unknown) {
    this.chain = chain;

    if (chain.failed()) return;

    const canon = canonicalizeValue(chain, value);
    if (canon.ok) {
      this.value = canon.value;
    }
  }

  raw(): CanonicalValue {
    return this.value;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  // ==========================================================================
  // Type Conversions
  // ==========================================================================

  object(): ObjectAssert {
    const opChain = enterOp(this.chain, 'object()');
    try {
      if (opChain.failed()) {
        return new ObjectAssert(opChain.clone(), {});
      }

      if (!isCanonicalObject(this.value)) {
        opChain.fail(typeFailure(this.value, 'object'));
        return new ObjectAssert(opChain.clone(), {});
      }

      return new ObjectAssert(opChain.clone(), this.value);
    } finally {
      opChain.leave();
    }
  }

  array(): ArrayAssert {
    const opChain = enterOp(this.chain, 'array()');
    try {
      if (opChain.failed()) {
        return new ArrayAssert(opChain.clone(), []);
      }

      if (!Array.isArray(this.value)) {
        opChain.fail(typeFailure(this.value, 'array'));
        return new ArrayAssert(opChain.clone(), []);
      }

      return new ArrayAssert(opChain.clone(), this.value);
    } finally {
      opChain.leave();
    }
  }

  string(): StringAssert {
    const opChain = enterOp(this.chain, 'string()');
    try {
      if (opChain.failed()) {
        return new StringAssert(opChain.clone(), '');
      }

      if (typeof this.value !== 'string') {
        opChain.fail(typeFailure(this.value, 'string'));
        return new StringAssert(opChain.clone(), '');
      }

      return new StringAssert(opChain.clone(), this.value);
    } finally {
      opChain.leave();
    }
  }

  number(): NumberAssert {
    const opChain = enterOp(this.chain, 'number()');
    try {
      if (opChain.failed()) {
        return new NumberAssert(opChain.clone(), 0);
      }

      if (!isNumber(this.value)) {
        opChain.fail(typeFailure(this.value, 'number'));
        return new NumberAssert(opChain.clone(), 0);
      }

      return new NumberAssert(opChain.clone(), this.value);
    } finally {
      opChain.leave();
    }
  }

  boolean(): BooleanAssert {
    const opChain = enterOp(this.chain, 'boolean()');
    try {
      if (opChain.failed()) {
        return new BooleanAssert(opChain.clone(), false);
      }

      if (typeof this.value !== 'boolean') {
        opChain.fail(typeFailure(this.value, 'boolean'));
        return new BooleanAssert(opChain.clone(), false);
      }

      return new BooleanAssert(opChain.clone(), this.value);
    } finally {
      opChain.leave();
    }
  }

  // ==========================================================================
  // Checks
  // ==========================================================================

  isNull(): this {
    const opChain = enterOp(this.chain, 'isNull()');
    try {
      if (opChain.failed()) return this;

      if (this.value !== null) {
        opChain.fail({
          type: 'nil',
          actual: { value: this.value },
          errors: ['expected: value is null'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notNull(): this {
    const opChain = enterOp(this.chain, 'notNull()');
    try {
      if (opChain.failed()) return this;

      if (this.value === null) {
        opChain.fail({
          type: 'not-nil',
          actual: { value: this.value },
          errors: ['expected: value is non-null'],
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

      const expected = canonicalizeValue(opChain, value);
      if (!expected.ok) return this;

      if (!deepEqual(this.value, expected.value)) {
        opChain.fail({
          type: 'equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: ['expected: values are equal'],
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

      const expected = canonicalizeValue(opChain, value);
      if (!expected.ok) return this;

      if (deepEqual(this.value, expected.value)) {
        opChain.fail({
          type: 'not-equal',
          actual: { value: this.value },
          expected: { value: expected.value },
          errors: ['expected: values are non-equal'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  inList(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'inList()');
    try {
      if (opChain.failed()) return this;

      const list = canonicalizeList(opChain, values);
      if (!list) return this;

      if (!list.some((item) => deepEqual(this.value, item))) {
        opChain.fail({
          type: 'belongs',
          actual: { value: this.value },
          expected: { value: new AssertionList(list) },
          errors: ['expected: value is equal to one of the values'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  notInList(...values: unknown[]): this {
    const opChain = enterOp(this.chain, 'notInList()');
    try {
      if (opChain.failed()) return this;

      const list = canonicalizeList(opChain, values);
      if (!list) return this;

      if (list.some((item) => deepEqual(this.value, item))) {
        opChain.fail({
          type: 'not-belongs',
          actual: { value: this.value },
          expected: { value: new AssertionList(list) },
          errors: ['expected: value is not equal to any of the values'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check the value against a JSON Schema
   */
  matchSchema(schema: SchemaObject): this {
    const opChain = enterOp(this.chain, 'matchSchema()');
    try {
      if (opChain.failed()) return this;

      const validate = compileSchema(opChain, schema);
      if (!validate) return this;

      if (!validate(this.value)) {
        opChain.fail({
          type: 'match-schema',
          actual: { value: this.value },
          expected: { value: schema },
          errors: ['expected: value matches schema', schemaErrorsText(validate.errors)],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Return the value typed as T after checking it against a JSON Schema
   * describing T
   */
  decode<T>(schema?: SchemaObject): T | undefined {
    const opChain = enterOp(this.chain, 'decode()');
    try {
      if (opChain.failed()) return undefined;

      return canonicalDecode<T>(opChain, this.value, schema);
    } finally {
      opChain.leave();
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function typeFailure(value: CanonicalValue, typeName: string): AssertionFailure {
  return {
    type: 'type',
    actual: { value },
    errors: [`expected: value is ${typeName}`],
  };
}

/**
 * Canonicalize arguments of a variadic check, reporting a usage failure
 * when there are none
 */
export function canonicalizeList(opChain: Chain, values: unknown[]): CanonicalValue[] | undefined {
  if (values.length === 0) {
    opChain.fail({
      type: 'usage',
      errors: ['unexpected empty list argument'],
    });
    return undefined;
  }

  const list: CanonicalValue[] = [];
  for (const value of values) {
    const canon = canonicalizeValue(opChain, value);
    if (!canon.ok) return undefined;
    list.push(canon.value);
  }
  return list;
}
