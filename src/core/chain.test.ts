import { describe, expect, it, vi } from 'vitest';

import { UsageError } from '../errors';
import { RecordingHandler, resolvedConfig, rootChain } from '../test-utils';
import type { AssertionFailure } from '../types';
import { Chain } from './chain';
import { Environment } from './environment';

const EQUAL_FAILURE: AssertionFailure = {
  type: 'equal',
  actual: { value: 1 },
  expected: { value: 2 },
  errors: ['expected: values are equal'],
};

function failure(message: string): AssertionFailure {
  return { type: 'valid', actual: { value: message }, errors: [message] };
}

describe('Chain', () => {
  describe('failure recording', () => {
    it('reports a failure once no matter how many times fail() is called', () => {
      const { chain, handler } = rootChain('root');

      const opChain = chain.enter('op()');
      opChain.fail(EQUAL_FAILURE);
      opChain.fail(failure('second'));
      expect(opChain.treeFailed()).toBe(true);
      opChain.leave();

      expect(handler.failures).toHaveLength(1);
      expect(handler.failures[0].failure.errors).toEqual(['expected: values are equal']);
      expect(handler.failures[0].failure.severity).toBe('error');
      expect(handler.failures[0].context.path).toEqual(['root', 'op()']);
      expect(opChain.treeFailed()).toBe(true);
    });

    it('keeps failed() false on the parent and sets treeFailed()', () => {
      const { chain } = rootChain('R');

      const child = chain.enter('Foo');
      child.fail(EQUAL_FAILURE);
      child.leave();

      expect(chain.failed()).toBe(false);
      expect(chain.treeFailed()).toBe(true);
    });

    it('reports a nested failure once, from the outermost entered chain', () => {
      const handler = new RecordingHandler();
      const root = Chain.create('', resolvedConfig(handler));

      const c1 = root.enter('Foo');
      const c2 = c1.enter('Bar');
      c2.fail(EQUAL_FAILURE);
      c2.leave();

      expect(handler.failures).toHaveLength(0);

      c1.leave();

      expect(root.treeFailed()).toBe(true);
      expect(c1.treeFailed()).toBe(true);
      expect(handler.failures).toHaveLength(1);
      expect(handler.failures[0].context.path.join('.')).toBe('Foo.Bar');
    });

    it('marks exactly the ancestors of failed leaves', () => {
      const { chain, handler } = rootChain('R');

      const a = chain.enter('a');
      const a1 = a.enter('a1');
      a1.fail(EQUAL_FAILURE);
      a1.leave();
      const a2 = a.enter('a2');
      a2.leave();
      a.leave();

      const b = chain.enter('b');
      const b1 = b.enter('b1');
      b1.leave();
      b.leave();

      expect(a1.treeFailed()).toBe(true);
      expect(a.treeFailed()).toBe(true);
      expect(chain.treeFailed()).toBe(true);
      expect(a2.treeFailed()).toBe(false);
      expect(b.treeFailed()).toBe(false);
      expect(b1.treeFailed()).toBe(false);

      expect(handler.failedPaths()).toEqual(['R.a.a1']);
      expect(handler.successes.map((context) => context.path.join('.'))).toEqual(['R.b']);
    });

    it('reports root failures immediately', () => {
      const { chain, handler } = rootChain('value()');

      chain.fail(failure('expected: valid number'));
      expect(handler.failures).toHaveLength(1);

      chain.fail(failure('again'));
      expect(handler.failures).toHaveLength(1);
      expect(chain.failed()).toBe(true);
    });

    it('does not record new failures on a chain whose failed flag was inherited', () => {
      const { chain, handler } = rootChain('R');

      const opChain = chain.enter('op()');
      opChain.fail(EQUAL_FAILURE);

      const clone = opChain.clone();
      expect(clone.failed()).toBe(true);
      clone.fail(failure('ignored'));

      opChain.leave();

      expect(handler.failures).toHaveLength(1);
      expect(handler.failures[0].failure.errors).toEqual(['expected: values are equal']);
    });

    it('stores a frozen copy of the failure', () => {
      const { chain, handler } = rootChain('R');
      const errors = ['expected: values are equal'];

      chain.fail({ ...EQUAL_FAILURE, errors });
      errors.push('mutated');

      const recorded = handler.failures[0].failure;
      expect(recorded.errors).toEqual(['expected: values are equal']);
      expect(Object.isFrozen(recorded)).toBe(true);
    });
  });

  describe('setRoot', () => {
    it('stops propagation at the root boundary', () => {
      const { chain, handler } = rootChain('R');

      const boundary = chain.enter('filter()');
      boundary.setRoot();

      const inner = boundary.enter('inner');
      const observed: AssertionFailure[] = [];
      inner.setFailCallback((recorded) => observed.push(recorded));
      inner.fail(EQUAL_FAILURE);
      inner.leave();

      expect(boundary.treeFailed()).toBe(true);
      boundary.leave();

      expect(chain.treeFailed()).toBe(false);
      expect(observed).toHaveLength(1);
      expect(observed[0].errors).toEqual(['expected: values are equal']);
      expect(handler.failedPaths()).toEqual(['R.filter().inner']);
    });

    it('keeps failures of a root clone away from the source chain', () => {
      const { chain } = rootChain('R');

      const opChain = chain.enter('find()');
      const isolated = opChain.clone();
      isolated.setRoot();

      const check = isolated.enter('isEqual()');
      check.fail(EQUAL_FAILURE);
      check.leave();

      expect(isolated.treeFailed()).toBe(true);
      expect(opChain.treeFailed()).toBe(false);

      opChain.leave();
      expect(chain.treeFailed()).toBe(false);
    });
  });

  describe('clone', () => {
    it('keeps failed flags independent', () => {
      const { chain } = rootChain('A');

      const clone = chain.clone();
      clone.fail(EQUAL_FAILURE);
      expect(chain.failed()).toBe(false);

      const other = chain.clone();
      chain.fail(EQUAL_FAILURE);
      expect(other.failed()).toBe(false);
      expect(chain.clone().failed()).toBe(true);
    });

    it('copies the path', () => {
      const { chain } = rootChain('R');

      const opChain = chain.enter('every()');
      const clone = opChain.clone();
      clone.replace('every[%d]', 2);

      expect(clone.context().path).toEqual(['R', 'every[2]']);
      expect(opChain.context().path).toEqual(['R', 'every()']);

      opChain.leave();
    });
  });

  describe('setFailed', () => {
    it('marks the chain failed without reporting', () => {
      const { chain, handler } = rootChain('R');

      const opChain = chain.enter('op()');
      opChain.setFailed();
      const clone = opChain.clone();
      opChain.leave();

      expect(opChain.failed()).toBe(true);
      expect(clone.failed()).toBe(true);
      expect(chain.failed()).toBe(false);
      expect(handler.failures).toHaveLength(0);
      expect(handler.successes).toHaveLength(0);
    });

    it('does not report a later fail()', () => {
      const { chain, handler } = rootChain('R');

      chain.setFailed();
      chain.fail(EQUAL_FAILURE);

      expect(handler.failures).toHaveLength(0);
    });
  });

  describe('paths', () => {
    it('formats segments with arguments', () => {
      const { chain } = rootChain('object()');

      const opChain = chain.enter('value(%j)', 'id');
      expect(opChain.context().path).toEqual(['object()', 'value("id")']);
      opChain.leave();
    });

    it('appends nothing for an empty name on a non-empty path', () => {
      const { chain } = rootChain('R');

      const opChain = chain.enter('');
      expect(opChain.context().path).toEqual(['R']);
      opChain.leave();
    });

    it('displays the alias instead of the path', () => {
      const { chain, handler } = rootChain('object()');
      chain.setAlias('user');

      const opChain = chain.enter('value(%j)', 'id');
      opChain.fail(EQUAL_FAILURE);
      opChain.leave();

      const { context } = handler.failures[0];
      expect(context.path).toEqual(['object()', 'value("id")']);
      expect(context.aliasedPath).toEqual(['user', 'value("id")']);
    });

    it('clears the displayed path with an empty alias', () => {
      const { chain } = rootChain('object()');
      chain.setAlias('');

      const opChain = chain.enter('keys()');
      expect(opChain.context().aliasedPath).toEqual(['keys()']);
      opChain.leave();
    });

    it('does not replace the alias', () => {
      const { chain } = rootChain('R');
      const clone = chain.clone();
      clone.setAlias('item');
      clone.replace('every[%d]', 0);

      expect(clone.context().path).toEqual(['every[0]']);
      expect(clone.context().aliasedPath).toEqual(['item']);
    });
  });

  describe('settings', () => {
    it('fills failure severity from the chain', () => {
      const { chain, handler } = rootChain('R');
      chain.setSeverity('log');

      const first = chain.enter('a');
      first.fail(EQUAL_FAILURE);
      first.leave();

      const second = chain.enter('b');
      second.fail({ ...EQUAL_FAILURE, severity: 'info' });
      second.leave();

      expect(handler.failures.map(({ failure }) => failure.severity)).toEqual(['log', 'info']);
    });

    it('invokes an inherited fail callback on every fail() call', () => {
      const { chain } = rootChain('R');
      const callback = vi.fn();
      chain.setFailCallback(callback);

      const opChain = chain.enter('op()');
      opChain.fail(EQUAL_FAILURE);
      opChain.fail(failure('second'));
      opChain.leave();

      expect(callback).toHaveBeenCalledTimes(2);
      expect(callback.mock.calls[0][0]).toMatchObject({ type: 'equal', severity: 'error' });
    });

    it('carries request, response and request name into the context', () => {
      const { chain } = rootChain('response()', { testName: 'users' });
      chain.setRequest({ method: 'GET', url: 'http://localhost/users/1' });
      chain.setResponse({ status: 200, headers: {}, body: '' });
      chain.setRequestName('get-user');

      const opChain = chain.enter('status()');
      const context = opChain.context();
      opChain.leave();

      expect(context.testName).toBe('users');
      expect(context.requestName).toBe('get-user');
      expect(context.request).toEqual({ method: 'GET', url: 'http://localhost/users/1' });
      expect(context.response?.status).toBe(200);
    });

    it('shares the environment across the tree', () => {
      const { chain } = rootChain('R');

      const opChain = chain.enter('op()');
      expect(chain.env()).toBeInstanceOf(Environment);
      expect(opChain.env()).toBe(chain.env());
      opChain.leave();
    });

    it('reports success at the reporting point', () => {
      const { chain, handler } = rootChain('R');

      const opChain = chain.enter('a');
      opChain.leave();

      expect(handler.successes).toHaveLength(1);
      expect(handler.successes[0].path).toEqual(['R', 'a']);
    });
  });

  describe('usage errors', () => {
    it('throws when leave() is called twice', () => {
      const { chain } = rootChain('R');

      const opChain = chain.enter('op()');
      opChain.leave();

      expect(() => opChain.leave()).toThrow(UsageError);
      expect(() => opChain.leave()).toThrow('leave() called twice');
    });

    it('throws when leaving a chain that was not entered', () => {
      const { chain } = rootChain('R');

      expect(() => chain.leave()).toThrow('leave() allowed only on chains created by enter()');
      expect(() => chain.clone().leave()).toThrow(UsageError);
    });

    it('throws when leaving before nested chains', () => {
      const { chain } = rootChain('R');

      const outer = chain.enter('outer');
      outer.enter('inner');

      expect(() => outer.leave()).toThrow('leave() called before nested chains were left');
    });

    it('throws when a closed chain is used', () => {
      const { chain } = rootChain('R');

      const opChain = chain.enter('op()');
      opChain.leave();

      expect(() => opChain.enter('x')).toThrow('enter() called after leave()');
      expect(() => opChain.clone()).toThrow('clone() called after leave()');
      expect(() => opChain.fail(EQUAL_FAILURE)).toThrow('fail() called after leave()');
      expect(() => opChain.setAlias('x')).toThrow('setAlias() called after leave()');
    });

    it('throws when entering an empty name on an empty path', () => {
      const handler = new RecordingHandler();
      const root = Chain.create('', resolvedConfig(handler));

      expect(() => root.enter('')).toThrow('enter() requires a name when the path is empty');
      expect(() => root.replace('x')).toThrow('replace() requires a non-empty path');
    });

    it('throws on a second fail callback', () => {
      const { chain } = rootChain('R');
      chain.setFailCallback(() => undefined);

      expect(() => chain.setFailCallback(() => undefined)).toThrow('fail callback already set');
    });

    it('throws when request or response is set twice', () => {
      const { chain } = rootChain('R');
      chain.setRequest({ method: 'GET', url: 'http://localhost/' });
      chain.setResponse({ status: 204, headers: {}, body: '' });

      const opChain = chain.enter('op()');
      expect(() => opChain.setRequest({ method: 'POST', url: 'http://localhost/' })).toThrow(
        'request already set'
      );
      expect(() => opChain.setResponse({ status: 200, headers: {}, body: '' })).toThrow(
        'response already set'
      );
      opChain.leave();
    });

    it('throws on unknown failure types', () => {
      const { chain } = rootChain('R');
      const unknownType: AssertionFailure = JSON.parse('{"type":"bogus","errors":["x"]}');

      expect(() => chain.fail(unknownType)).toThrow('unknown assertion type bogus');
    });

    it('throws on malformed failures unless validation is off', () => {
      const { chain } = rootChain('R');
      const malformed: AssertionFailure = { type: 'equal', actual: { value: 1 }, errors: ['x'] };

      expect(() => chain.fail(malformed)).toThrow(
        'AssertionFailure of type equal should have expected field'
      );

      const lenient = rootChain('R', { validateFailures: false });
      lenient.chain.fail(malformed);
      expect(lenient.handler.failures).toHaveLength(1);
    });
  });
});
