import { describe, expect, it, vi } from 'vitest';

import { AssertionError, ConfigurationError } from '../errors';
import { CollectReporter, ThrowReporter } from '../reporters';
import { Environment } from '../core/environment';
import { Expect, createExpect } from './expect';

describe('Expect', () => {
  it('throws formatted failures with a throwing reporter', () => {
    const api = new Expect({ reporter: new ThrowReporter() });

    expect(() => api.value(1).isEqual(2)).toThrow(AssertionError);
    expect(() => api.value(1).isEqual(2)).toThrow(
      'expected: values are equal\n\nassertion:\n  value().isEqual()\nexpected:\n  2\nactual:\n  1'
    );
    expect(() => api.value(1).isEqual(1)).not.toThrow();
  });

  it('collects failures from independent chains', () => {
    const reporter = new CollectReporter();
    const api = createExpect({ reporter, testName: 'users' });

    api.number(1).gt(2);
    api.string('a').isEmpty();
    api.boolean(true).isTrue();

    expect(reporter.messages).toHaveLength(2);
    expect(reporter.messages[0]).toContain('test name: users');
    expect(() => reporter.assertNoFailures()).toThrow('2 assertions failed');
  });

  it('logs failures below error severity', () => {
    const reporter = new CollectReporter();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const api = new Expect({ reporter, logger, severity: 'log' });

    api.value(1).isEqual(2);

    expect(reporter.messages).toEqual([]);
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it('shares one environment', () => {
    const api = new Expect({ reporter: new CollectReporter() });

    api.env().put('token', 'test-token');

    expect(api.env()).toBeInstanceOf(Environment);
    expect(api.env().getString('token')).toBe('test-token');
  });

  it('reports environment failures through the reporter', () => {
    const reporter = new CollectReporter();
    const api = new Expect({ reporter });

    api.env().getString('missing');

    expect(reporter.messages[0].split('\n')[0]).toBe('expected: environment contains key');
  });

  it('reuses a given environment', () => {
    const first = new Expect({ reporter: new CollectReporter() });
    const second = new Expect({ reporter: new CollectReporter(), environment: first.env() });

    expect(second.env()).toBe(first.env());
  });

  it('requires a reporter or handler', () => {
    expect(() => new Expect({})).toThrow(ConfigurationError);
  });
});
