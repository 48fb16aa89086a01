import { describe, expect, it } from 'vitest';

import { recordingExpect } from '../test-utils';

describe('StringAssert', () => {
  it('passes matching checks', () => {
    const { api, handler } = recordingExpect();

    api
      .string('Hello, World')
      .notEmpty()
      .isEqual('Hello, World')
      .notEqual('hello')
      .isEqualFold('HELLO, WORLD')
      .contains('World')
      .notContains('world')
      .containsFold('WORLD')
      .hasPrefix('Hello')
      .hasSuffix('World')
      .match(/^Hello/)
      .notMatch('^World')
      .inList('Hello, World', 'x')
      .notInList('x')
      .notEqualFold('hello')
      .notContainsFold('planet')
      .notHasPrefix('World')
      .notHasSuffix('Hello')
      .hasPrefixFold('hello')
      .notHasPrefixFold('world')
      .hasSuffixFold('WORLD')
      .notHasSuffixFold('HELLO')
      .isASCII();
    api.string('').isEmpty();
    api.string('h\u00e9llo').notIsASCII();

    expect(handler.failures).toHaveLength(0);
  });

  it('reports inequality', () => {
    const { api, handler } = recordingExpect();

    api.string('foo').isEqual('bar');

    const { context, failure } = handler.failures[0];
    expect(context.path).toEqual(['string()', 'isEqual()']);
    expect(failure.type).toBe('equal');
    expect(failure.actual).toEqual({ value: 'foo' });
    expect(failure.expected).toEqual({ value: 'bar' });
    expect(failure.errors).toEqual(['expected: strings are equal']);
  });

  it('reports failed sub-string checks', () => {
    const { api, handler } = recordingExpect();

    api.string('abc').contains('x');
    api.string('abc').hasPrefix('b');
    api.string('abc').notContains('b');

    expect(handler.failures.map(({ failure }) => failure.errors[0])).toEqual([
      'expected: string contains sub-string',
      'expected: string has prefix',
      'expected: string does not contain sub-string',
    ]);
  });

  it('reports failed negations and folded checks', () => {
    const { api, handler } = recordingExpect();

    api.string('Hello').notEqualFold('HELLO');
    api.string('Hello').notContainsFold('ELL');
    api.string('Hello').notHasPrefix('He');
    api.string('Hello').notHasSuffix('lo');
    api.string('Hello').hasPrefixFold('x');
    api.string('Hello').notHasPrefixFold('HE');
    api.string('Hello').hasSuffixFold('x');
    api.string('Hello').notHasSuffixFold('LO');

    expect(handler.failures.map(({ failure }) => [failure.type, failure.errors[0]])).toEqual([
      ['not-equal', 'expected: strings are non-equal (if folded)'],
      ['not-contains-subset', 'expected: string does not contain sub-string (if folded)'],
      ['not-contains-subset', "expected: string doesn't have prefix"],
      ['not-contains-subset', "expected: string doesn't have suffix"],
      ['contains-subset', 'expected: string has prefix (if folded)'],
      ['not-contains-subset', "expected: string doesn't have prefix (if folded)"],
      ['contains-subset', 'expected: string has suffix (if folded)'],
      ['not-contains-subset', "expected: string doesn't have suffix (if folded)"],
    ]);
    expect(handler.failures[2].failure.expected).toEqual({ value: 'He' });
  });

  it('checks ASCII content', () => {
    const { api, handler } = recordingExpect();

    api.string('caf\u00e9').isASCII();
    api.string('cafe').notIsASCII();

    expect(handler.failures.map(({ context, failure }) => [context.path[1], failure.errors[0]])).toEqual([
      ['isASCII()', 'expected: all string characters are ascii'],
      ['notIsASCII()', 'expected: at least one string character is not ascii'],
    ]);
    expect(handler.failures[0].failure).toMatchObject({ type: 'valid', actual: { value: 'caf\u00e9' } });
  });

  it('counts code points', () => {
    const { api } = recordingExpect();

    expect(api.string('h\u00e9llo').length().raw()).toBe(5);
    expect(api.string('\u{1F600}').length().raw()).toBe(1);
  });

  it('matches regular expressions', () => {
    const { api, handler } = recordingExpect();
    const global = /\d/g;

    api.string('123').match(/^\d+$/);
    api.string('a1').match(global).match(global);
    api.string('abc').match(/^\d+$/);

    expect(handler.failures).toHaveLength(1);
    expect(handler.failures[0].failure.type).toBe('match-regexp');
    expect(handler.failures[0].failure.errors).toEqual(['expected: string matches regexp']);
  });

  it('reports an invalid pattern', () => {
    const { api, handler } = recordingExpect();

    api.string('abc').match('[');

    const { failure } = handler.failures[0];
    expect(failure.type).toBe('valid');
    expect(failure.errors[0]).toBe('expected: valid regexp');
    expect(failure.errors).toHaveLength(2);
  });

  it('checks list membership', () => {
    const { api, handler } = recordingExpect();

    api.string('c').inList('a', 'b');
    api.string('c').inList();

    expect(handler.failures.map(({ failure }) => failure.type)).toEqual(['belongs', 'usage']);
  });

  describe('asNumber', () => {
    it('parses integers and floats', () => {
      const { api, handler } = recordingExpect();

      expect(api.string('42').asNumber().raw()).toBe(42);
      expect(api.string('+7').asNumber().raw()).toBe(7);
      expect(api.string('3.5').asNumber().raw()).toBe(3.5);
      expect(api.string('1e3').asNumber().raw()).toBe(1000);
      expect(api.string('9007199254740993').asNumber().raw()).toBe(9007199254740993n);
      expect(api.string('ff').asNumber(16).raw()).toBe(255);
      expect(api.string('-101').asNumber(2).raw()).toBe(-5);

      expect(handler.failures).toHaveLength(0);
    });

    it('reports unparsable strings', () => {
      const { api, handler } = recordingExpect();

      api.string('abc').asNumber();
      api.string('zz').asNumber(16);
      api.string('1').asNumber(1);

      expect(handler.failures.map(({ failure }) => failure.errors[0])).toEqual([
        'expected: string can be parsed to integer or float',
        'expected: string can be parsed to integer with base 16',
        'unexpected base argument: 1',
      ]);
      expect(handler.failures[0].context.path).toEqual(['string()', 'asNumber()']);
    });
  });

  describe('asBoolean', () => {
    it('parses boolean words', () => {
      const { api, handler } = recordingExpect();

      api.string('True').asBoolean().isTrue();
      api.string('false').asBoolean().isFalse();
      api.string('yes').asBoolean();

      expect(handler.failures).toHaveLength(1);
      expect(handler.failures[0].failure.errors).toEqual(['expected: string can be parsed to boolean']);
    });
  });
});
