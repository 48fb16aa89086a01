/**
 * API Assert - Main Entry Point
 *
 * Fluent assertions for HTTP API tests
 */

export * from './assertions';
export * from './core';
export * from './reporters';
export * from './errors';
export {
  ASSERTION_TYPES,
  AssertionList,
  AssertionRange,
  type AssertionContext,
  type AssertionFailure,
  type AssertionHandler,
  type AssertionSeverity,
  type AssertionType,
  type AssertionValue,
  type CanonicalNumber,
  type CanonicalObject,
  type CanonicalValue,
  type Config,
  type Formatter,
  type Logger,
  type Reporter,
  type RequestSnapshot,
  type ResolvedConfig,
  type ResponseSnapshot,
} from './types';
export {
  LOG_LEVELS,
  colorize,
  createLogger,
  type Color,
  type LogLevel,
  type LoggerOptions,
} from './utils/logger';
