/**
 * API Assert - Assertion Handlers
 *
 * Handlers receive the outcome of each root-level assertion. The default one
 * formats it and routes error-severity failures to a Reporter and everything
 * else to an optional Logger.
 */

import type {
  AssertionContext,
  AssertionFailure,
  AssertionHandler,
  Formatter,
  Logger,
  Reporter,
} from '../types';
import { DefaultFormatter } from './formatter';

export interface DefaultAssertionHandlerOptions {
  reporter: Reporter;
  formatter?: Formatter;
  logger?: Logger;
}

export class DefaultAssertionHandler implements AssertionHandler {
  readonly reporter: Reporter;
  readonly formatter: Formatter;
  readonly logger?: Logger;

  constructor(options: DefaultAssertionHandlerOptions) {
    this.reporter = options.reporter;
    this.formatter = options.formatter ?? new DefaultFormatter();
    this.logger = options.logger;
  }

  success(context: AssertionContext): void {
    if (!this.logger) return;
    this.logger.debug(this.formatter.formatSuccess(context));
  }

  failure(context: AssertionContext, failure: AssertionFailure): void {
    switch (failure.severity ?? 'error') {
      case 'error':
        this.reporter.error(this.formatter.formatFailure(context, failure));
        break;

      case 'log':
        this.logger?.info(this.formatter.formatFailure(context, failure));
        break;

      case 'info':
        this.logger?.debug(this.formatter.formatFailure(context, failure));
        break;
    }
  }
}

/**
 * Calls every handler in order
 */
export class ChainAssertionHandler implements AssertionHandler {
  private readonly handlers: AssertionHandler[];

  constructor(handlers: AssertionHandler[]) {
    this.handlers = [...handlers];
  }

  success(context: AssertionContext): void {
    for (const handler of this.handlers) {
      handler.success(context);
    }
  }

  failure(context: AssertionContext, failure: AssertionFailure): void {
    for (const handler of this.handlers) {
      handler.failure(context, failure);
    }
  }
}
