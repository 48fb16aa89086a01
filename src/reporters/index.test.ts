import { describe, expect, it, vi } from 'vitest';

import { AssertionError, ConfigurationError } from '../errors';
import {
  CollectReporter,
  ConsoleReporter,
  ThrowReporter,
  createReporter,
  getAvailableReporterTypes,
  isValidReporterType,
} from './index';

describe('ThrowReporter', () => {
  it('throws an AssertionError with the message', () => {
    const reporter = new ThrowReporter();

    expect(() => reporter.error('boom')).toThrow(AssertionError);
    expect(() => reporter.error('boom')).toThrow('boom');
    expect(reporter.failures).toBe(2);
  });
});

describe('CollectReporter', () => {
  it('collects messages', () => {
    const reporter = new CollectReporter();

    reporter.error('a');
    reporter.error('b');

    expect(reporter.messages).toEqual(['a', 'b']);
    expect(reporter.failures).toBe(2);
  });

  it('throws all collected messages at once', () => {
    const reporter = new CollectReporter();
    reporter.error('a');
    reporter.error('b');

    let caught: unknown;
    try {
      reporter.assertNoFailures();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AssertionError);
    if (!(caught instanceof AssertionError)) return;
    expect(caught.message).toBe('2 assertions failed');
    expect(caught.failures).toEqual(['a', 'b']);
    expect(caught.toDetailedString()).toBe('2 assertions failed\n\n#1\na\n\n#2\nb');
  });

  it('uses singular wording for one failure', () => {
    const reporter = new CollectReporter();
    reporter.error('a');

    expect(() => reporter.assertNoFailures()).toThrow('1 assertion failed');
  });

  it('starts over after clear()', () => {
    const reporter = new CollectReporter();
    reporter.error('a');
    reporter.clear();

    expect(reporter.messages).toEqual([]);
    expect(reporter.failures).toBe(0);
    expect(() => reporter.assertNoFailures()).not.toThrow();
  });
});

describe('ConsoleReporter', () => {
  it('logs failures as errors', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const reporter = new ConsoleReporter({ logger });

    reporter.error('x');

    expect(logger.error).toHaveBeenCalledWith('x');
    expect(reporter.failures).toBe(1);
  });
});

describe('createReporter', () => {
  it('creates reporters by type', () => {
    expect(createReporter('throw')).toBeInstanceOf(ThrowReporter);
    expect(createReporter('collect').name).toBe('collect');
    expect(createReporter('console', { noColor: true })).toBeInstanceOf(ConsoleReporter);
  });

  it('rejects unknown types', () => {
    expect(() => createReporter('junit')).toThrow(ConfigurationError);
    expect(() => createReporter('junit')).toThrow('Unknown reporter type: junit');
  });

  it('lists and validates types', () => {
    expect(getAvailableReporterTypes()).toEqual(['throw', 'collect', 'console']);
    expect(isValidReporterType('collect')).toBe(true);
    expect(isValidReporterType('junit')).toBe(false);
  });
});
