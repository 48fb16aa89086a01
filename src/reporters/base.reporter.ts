/**
 * API Assert - Base Reporter
 *
 * Abstract base class for reporting sinks
 */

import type { Reporter } from '../types';

export interface ReporterOptions {
  noColor?: boolean;
}

export abstract class BaseReporter implements Reporter {
  protected readonly options: ReporterOptions;
  protected failureCount = 0;

  constructor(options: ReporterOptions = {}) {
    this.options = {
      noColor: options.noColor ?? false,
    };
  }

  /**
   * Get the reporter name for identification
   */
  abstract get name(): string;

  /**
   * Number of failures received so far
   */
  get failures(): number {
    return this.failureCount;
  }

  error(message: string): void {
    this.failureCount++;
    this.onFailure(message);
  }

  /**
   * Called for every failure with the formatted message
   */
  protected abstract onFailure(message: string): void;
}
