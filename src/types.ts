/**
 * API Assert - Core Type Definitions
 */

import type { Environment } from './core/environment';

// ============================================================================
// Assertion Types
// ============================================================================

/**
 * Kinds of performed assertions
 */
export const ASSERTION_TYPES = [
  // Check if the invocation is correct
  'usage',
  // Check if the operation succeeded
  'operation',

  'type',
  'not-type',
  'valid',
  'not-valid',
  'nil',
  'not-nil',
  'empty',
  'not-empty',

  // If delta is set, it specifies allowed difference between values
  'equal',
  'not-equal',

  'lt',
  'le',
  'gt',
  'ge',

  // Expected value is an AssertionRange
  'in-range',
  'not-in-range',

  'match-schema',
  'not-match-schema',
  'match-path',
  'not-match-path',
  'match-regexp',
  'not-match-regexp',
  'match-format',
  'not-match-format',

  'contains-key',
  'not-contains-key',
  'contains-element',
  'not-contains-element',
  'contains-subset',
  'not-contains-subset',

  // Expected value is an AssertionList
  'belongs',
  'not-belongs',
] as const;

export type AssertionType = (typeof ASSERTION_TYPES)[number];

/**
 * How a failure should be treated:
 * - error: marks the test as failed
 * - log: informational, logged at info level
 * - info: informational, logged at debug level
 */
export type AssertionSeverity = 'error' | 'log' | 'info';

// ============================================================================
// Failure Value Model
// ============================================================================

/**
 * Holds an actual, expected, reference or delta value.
 * Allows to distinguish "not present" from "present but null".
 */
export interface AssertionValue {
  value: unknown;
}

/**
 * Inclusive range of allowed values
 */
export class AssertionRange {
  constructor(
    public readonly min: unknown,
    public readonly max: unknown
  ) {}
}

/**
 * List of allowed values
 */
export class AssertionList {
  public readonly values: readonly unknown[];

  constructor(values: readonly unknown[]) {
    this.values = [...values];
  }
}

/**
 * Detailed information about a failed assertion.
 *
 * `actual` is the examined value. `expected` is the value it was compared to,
 * or the range, list, pattern or element it should match. `reference` is the
 * value the check originated from, e.g. the array whose element is missing
 * from `actual`. `delta` is the allowed difference between actual and
 * expected.
 */
export interface AssertionFailure {
  readonly type: AssertionType;
  readonly severity?: AssertionSeverity;
  readonly errors: readonly string[];
  readonly actual?: AssertionValue;
  readonly expected?: AssertionValue;
  readonly reference?: AssertionValue;
  readonly delta?: AssertionValue;
}

// ============================================================================
// HTTP Snapshots
// ============================================================================

export interface RequestSnapshot {
  method: string;
  url: string;
  headers?: Record<string, string | string[]>;
}

export interface ResponseSnapshot {
  status: number;
  statusText?: string;
  headers: Record<string, string | string[]>;
  body: string;
}

// ============================================================================
// Assertion Context
// ============================================================================

/**
 * Where the assertion happened
 */
export interface AssertionContext {
  testName?: string;
  requestName?: string;

  /**
   * Chain of nested assertion names
   * @example ['response()', 'json()', 'object()', 'value("id")', 'isEqual()']
   */
  path: string[];

  /**
   * Same as path, but starting from the alias when one is set
   */
  aliasedPath: string[];

  request?: RequestSnapshot;
  response?: ResponseSnapshot;
  environment?: Environment;
}

// ============================================================================
// Reporting Interfaces
// ============================================================================

/**
 * Sink for formatted failure messages
 */
export interface Reporter {
  error(message: string): void;
}

/**
 * Formats success and failure messages
 */
export interface Formatter {
  formatSuccess(context: AssertionContext): string;
  formatFailure(context: AssertionContext, failure: AssertionFailure): string;
}

/**
 * Receives the outcome of every root-level assertion
 */
export interface AssertionHandler {
  success(context: AssertionContext): void;
  failure(context: AssertionContext, failure: AssertionFailure): void;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface Config {
  testName?: string;

  /**
   * Used with DefaultAssertionHandler when assertionHandler is not set
   */
  reporter?: Reporter;
  formatter?: Formatter;
  logger?: Logger;

  /**
   * Takes precedence over reporter, formatter and logger
   */
  assertionHandler?: AssertionHandler;

  /**
   * Severity of failures on root chains, defaults to 'error'
   */
  severity?: AssertionSeverity;

  environment?: Environment;

  /**
   * Throw UsageError on malformed failures, defaults to true
   */
  validateFailures?: boolean;
}

export interface ResolvedConfig {
  readonly testName?: string;
  readonly handler: AssertionHandler;
  readonly severity: AssertionSeverity;
  readonly environment?: Environment;
  readonly validateFailures: boolean;
}

// ============================================================================
// Canonical Values
// ============================================================================

export type CanonicalNumber = number | bigint;

export type CanonicalValue =
  | null
  | boolean
  | CanonicalNumber
  | string
  | CanonicalValue[]
  | CanonicalObject;

export interface CanonicalObject {
  [key: string]: CanonicalValue;
}
