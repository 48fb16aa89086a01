/**
 * API Assert - Expect Factory
 *
 * Entry point of the fluent API. Every call creates a new root chain, so
 * assertions started from different calls never affect each other. All of
 * them share one Environment.
 *
 * @example
 * const expect = new Expect({ reporter: new ThrowReporter() });
 * expect.response(res).status(200).json().object().value('id').number().gt(0);
 */

import { Chain } from '../core/chain';
import { resolveConfig } from '../core/config';
import { Environment } from '../core/environment';
import type { Config, RequestSnapshot, ResolvedConfig, ResponseSnapshot } from '../types';
import { ArrayAssert } from './array';
import { BooleanAssert } from './boolean';
import { NumberAssert } from './number';
import { ObjectAssert } from './object';
import { ResponseAssert } from './response';
import { StringAssert } from './string';
import { ValueAssert } from './value';

export interface ResponseOptions {
  request?: RequestSnapshot;
  requestName?: string;
}

export class Expect {
  private readonly config: ResolvedConfig;
  private readonly environment: Environment;

  constructor(config: Config) {
    const resolved = resolveConfig(config);
    this.environment = resolved.environment ?? new Environment(resolved);
    this.config = { ...resolved, environment: this.environment };
  }

  env(): Environment {
    return this.environment;
  }

  value(value: unknown): ValueAssert {
    return new ValueAssert(this.root('value()'), value);
  }

  object(value: unknown): ObjectAssert {
    return new ObjectAssert(this.root('object()'), value);
  }

  array(value: unknown): ArrayAssert {
    return new ArrayAssert(this.root('array()'), value);
  }

  string(value: string): StringAssert {
    return new StringAssert(this.root('string()'), value);
  }

  number(value: unknown): NumberAssert {
    return new NumberAssert(this.root('number()'), value);
  }

  boolean(value: boolean): BooleanAssert {
    return new BooleanAssert(this.root('boolean()'), value);
  }

  response(response: ResponseSnapshot, options: ResponseOptions = {}): ResponseAssert {
    const chain = this.root('response()');
    chain.setResponse(response);
    if (options.request) {
      chain.setRequest(options.request);
    }
    if (options.requestName) {
      chain.setRequestName(options.requestName);
    }
    return new ResponseAssert(chain, response);
  }

  private root(name: string): Chain {
    return Chain.create(name, this.config);
  }
}

/**
 * Create an Expect instance
 */
export function createExpect(config: Config): Expect {
  return new Expect(config);
}
