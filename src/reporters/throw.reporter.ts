/**
 * API Assert - Throw Reporter
 *
 * Fail-fast sink: throws on the first error-severity failure
 */

import { AssertionError } from '../errors';
import { BaseReporter } from './base.reporter';

export class ThrowReporter extends BaseReporter {
  get name(): string {
    return 'throw';
  }

  protected onFailure(message: string): void {
    throw new AssertionError(message);
  }
}
