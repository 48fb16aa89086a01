/**
 * API Assert - Test Utilities
 */

import { Expect } from './assertions/expect';
import { Chain } from './core/chain';
import type {
  AssertionContext,
  AssertionFailure,
  AssertionHandler,
  Config,
  ResolvedConfig,
} from './types';

export interface RecordedFailure {
  context: AssertionContext;
  failure: AssertionFailure;
}

/**
 * Handler that remembers every call
 */
export class RecordingHandler implements AssertionHandler {
  readonly successes: AssertionContext[] = [];
  readonly failures: RecordedFailure[] = [];

  success(context: AssertionContext): void {
    this.successes.push(context);
  }

  failure(context: AssertionContext, failure: AssertionFailure): void {
    this.failures.push({ context, failure });
  }

  /**
   * Aliased paths of reported failures, joined with "."
   */
  failedPaths(): string[] {
    return this.failures.map(({ context }) => context.aliasedPath.join('.'));
  }

  errorFailures(): RecordedFailure[] {
    return this.failures.filter(({ failure }) => failure.severity === 'error');
  }
}

export function resolvedConfig(
  handler: AssertionHandler,
  overrides: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  return {
    handler,
    severity: 'error',
    validateFailures: true,
    ...overrides,
  };
}

export function rootChain(
  name: string,
  overrides: Partial<ResolvedConfig> = {}
): { chain: Chain; handler: RecordingHandler } {
  const handler = new RecordingHandler();
  const chain = Chain.create(name, resolvedConfig(handler, overrides));
  return { chain, handler };
}

/**
 * Expect instance reporting into a RecordingHandler
 */
export function recordingExpect(config: Config = {}): { api: Expect; handler: RecordingHandler } {
  const handler = new RecordingHandler();
  const api = new Expect({ ...config, assertionHandler: handler });
  return { api, handler };
}
