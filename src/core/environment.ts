/**
 * API Assert - Environment
 *
 * Key/value storage shared by all chains created from one Expect instance.
 * Typed getters report a failure when the key is missing or holds a value
 * of another type.
 */

import type { AssertionFailure, ResolvedConfig } from '../types';
import { Chain } from './chain';

export class Environment {
  private readonly data = new Map<string, unknown>();
  private readonly chain: Chain;

  constructor(config: ResolvedConfig) {
    this.chain = Chain.create('environment()', { ...config, environment: this });
  }

  put(key: string, value: unknown): void {
    this.data.set(key, value);
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  delete(key: string): void {
    this.data.delete(key);
  }

  keys(): string[] {
    return [...this.data.keys()].sort();
  }

  /**
   * Get a raw value, or undefined with a reported failure when missing
   */
  get(key: string): unknown {
    return this.lookup('get', key, (value): value is unknown => true, 'any', undefined);
  }

  getString(key: string): string {
    return this.lookup('getString', key, (value): value is string => typeof value === 'string', 'string', '');
  }

  getNumber(key: string): number {
    return this.lookup(
      'getNumber',
      key,
      (value): value is number => typeof value === 'number' && !Number.isNaN(value),
      'number',
      0
    );
  }

  getBoolean(key: string): boolean {
    return this.lookup('getBoolean', key, (value): value is boolean => typeof value === 'boolean', 'boolean', false);
  }

  getStringArray(key: string): string[] {
    return this.lookup(
      'getStringArray',
      key,
      (value): value is string[] =>
        Array.isArray(value) && value.every((item) => typeof item === 'string'),
      'string array',
      []
    );
  }

  private lookup<T>(
    operation: string,
    key: string,
    guard: (value: unknown) => value is T,
    typeName: string,
    fallback: T
  ): T {
    const opChain = this.chain.enter('%s(%j)', operation, key);
    try {
      if (!this.data.has(key)) {
        opChain.fail(missingKey(this.keys(), key));
        return fallback;
      }

      const value = this.data.get(key);
      if (!guard(value)) {
        opChain.fail({
          type: 'type',
          actual: { value },
          errors: [`expected: value of key "${key}" is ${typeName}`],
        });
        return fallback;
      }

      return value;
    } finally {
      opChain.leave();
    }
  }
}

function missingKey(keys: string[], key: string): AssertionFailure {
  return {
    type: 'contains-key',
    actual: { value: keys },
    expected: { value: key },
    errors: ['expected: environment contains key'],
  };
}
