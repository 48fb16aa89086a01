/**
 * API Assert - Boolean Assertions
 */

import type { Chain } from '../core/chain';
import type { Assertion } from './assertion';
import { enterOp } from './chain-helpers';

export class BooleanAssert implements Assertion<boolean> {
  readonly kind = 'boolean';

  private readonly chain: Chain;
  private readonly value: boolean = false;

  constructor(chain: Chain, value: boolean) {
    this.chain = chain;

    if (chain.failed()) return;

    if (typeof value !== 'boolean') {
      chain.fail({
        type: 'type',
        actual: { value },
        errors: ['expected: value is boolean'],
      });
      return;
    }
    this.value = value;
  }

  raw(): boolean {
    return this.value;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  isEqual(value: boolean): this {
    return this.check('isEqual()', value, true);
  }

  notEqual(value: boolean): this {
    return this.check('notEqual()', value, false);
  }

  isTrue(): this {
    return this.check('isTrue()', true, true);
  }

  isFalse(): this {
    return this.check('isFalse()', false, true);
  }

  private check(name: string, expected: boolean, equal: boolean): this {
    const opChain = enterOp(this.chain, name);
    try {
      if (opChain.failed()) return this;

      if ((this.value === expected) !== equal) {
        opChain.fail({
          type: equal ? 'equal' : 'not-equal',
          actual: { value: this.value },
          expected: { value: expected },
          errors: [equal ? 'expected: booleans are equal' : 'expected: booleans are non-equal'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }
}
