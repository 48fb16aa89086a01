/**
 * API Assert - Reporters Index
 *
 * Barrel exports and factory function for creating reporters
 */

import { ConfigurationError } from '../errors';
import type { BaseReporter } from './base.reporter';
import { CollectReporter } from './collect.reporter';
import { ConsoleReporter, type ConsoleReporterOptions } from './console.reporter';
import { ThrowReporter } from './throw.reporter';

export { BaseReporter } from './base.reporter';
export type { ReporterOptions } from './base.reporter';
export { ThrowReporter } from './throw.reporter';
export { CollectReporter } from './collect.reporter';
export { ConsoleReporter } from './console.reporter';
export type { ConsoleReporterOptions } from './console.reporter';
export { DefaultFormatter, dumpValue } from './formatter';
export type { FormatterOptions } from './formatter';
export { DefaultAssertionHandler, ChainAssertionHandler } from './assertion-handler';
export type { DefaultAssertionHandlerOptions } from './assertion-handler';

/**
 * Reporter type union
 */
export type ReporterType = 'throw' | 'collect' | 'console';

/**
 * Factory function to create reporter instances
 *
 * @param type - The type of reporter to create
 * @param options - Options passed to the reporter
 */
export function createReporter(
  type: ReporterType | string,
  options: ConsoleReporterOptions = {}
): BaseReporter {
  switch (type) {
    case 'throw':
      return new ThrowReporter(options);

    case 'collect':
      return new CollectReporter(options);

    case 'console':
      return new ConsoleReporter(options);

    default:
      throw new ConfigurationError(
        `Unknown reporter type: ${type}`,
        `Available types: ${getAvailableReporterTypes().join(', ')}`
      );
  }
}

/**
 * Get available reporter types
 */
export function getAvailableReporterTypes(): ReporterType[] {
  return ['throw', 'collect', 'console'];
}

/**
 * Validate reporter type
 */
export function isValidReporterType(type: string): type is ReporterType {
  return type === 'throw' || type === 'collect' || type === 'console';
}
