/**
 * API Assert - Console Reporter
 *
 * Prints failures through a logger instead of failing the test
 */

import type { Logger } from '../types';
import { createLogger } from '../utils/logger';
import { BaseReporter, type ReporterOptions } from './base.reporter';

export interface ConsoleReporterOptions extends ReporterOptions {
  logger?: Logger;
}

export class ConsoleReporter extends BaseReporter {
  private readonly logger: Logger;

  constructor(options: ConsoleReporterOptions = {}) {
    super(options);
    this.logger =
      options.logger ??
      createLogger({
        level: 'error',
        useColors: !this.options.noColor && process.stdout.isTTY === true,
      });
  }

  get name(): string {
    return 'console';
  }

  protected onFailure(message: string): void {
    this.logger.error(message);
  }
}
