/**
 * API Assert - Collect Reporter
 *
 * Records every failure message so a test can check them all at the end.
 */

import { AssertionError } from '../errors';
import { BaseReporter } from './base.reporter';

export class CollectReporter extends BaseReporter {
  private readonly collected: string[] = [];

  get name(): string {
    return 'collect';
  }

  /**
   * Messages received so far, oldest first
   */
  get messages(): readonly string[] {
    return this.collected;
  }

  /**
   * Throw an AssertionError listing every collected failure, if any
   */
  assertNoFailures(): void {
    const count = this.collected.length;
    if (count === 0) return;

    throw new AssertionError(
      `${count} assertion${count === 1 ? '' : 's'} failed`,
      [...this.collected]
    );
  }

  clear(): void {
    this.collected.length = 0;
    this.failureCount = 0;
  }

  protected onFailure(message: string): void {
    this.collected.push(message);
  }
}
