/**
 * API Assert - Default Formatter
 *
 * Renders assertion context and failure details into a multi-line message:
 *
 *   expected: values are equal
 *
 *   assertion:
 *     object().value("id").isEqual()
 *   expected:
 *     2
 *   actual:
 *     1
 */

import {
  AssertionList,
  AssertionRange,
  type AssertionContext,
  type AssertionFailure,
  type AssertionType,
  type Formatter,
} from '../types';
import { colorize } from '../utils/logger';

export interface FormatterOptions {
  colors?: boolean;
}

export class DefaultFormatter implements Formatter {
  private readonly colors: boolean;

  constructor(options: FormatterOptions = {}) {
    this.colors = options.colors ?? false;
  }

  formatSuccess(context: AssertionContext): string {
    return `passed: ${formatPath(context)}`;
  }

  formatFailure(context: AssertionContext, failure: AssertionFailure): string {
    const lines: string[] = failure.errors.map((error) => colorize(error, 'red', this.colors));

    const details: string[] = [];

    if (context.testName) {
      details.push(`test name: ${context.testName}`);
    }
    if (context.requestName) {
      details.push(`request name: ${context.requestName}`);
    }
    if (context.request) {
      details.push(`request: ${context.request.method} ${context.request.url}`);
    }
    if (context.response) {
      const { status, statusText } = context.response;
      details.push(`response: ${statusText ? `${status} ${statusText}` : status}`);
    }
    if (context.aliasedPath.length > 0) {
      this.pushSection(details, 'assertion', formatPath(context));
    }

    if (failure.expected) {
      this.pushSection(details, expectedLabel(failure.type), dumpValue(failure.expected.value));
    }
    if (failure.reference) {
      this.pushSection(details, 'reference', dumpValue(failure.reference.value));
    }
    if (failure.delta) {
      this.pushSection(details, 'delta', dumpValue(failure.delta.value));
    }
    if (failure.actual) {
      this.pushSection(details, 'actual', dumpValue(failure.actual.value));
    }

    if (details.length > 0) {
      lines.push('', ...details);
    }

    return lines.join('\n');
  }

  private pushSection(lines: string[], label: string, body: string): void {
    lines.push(colorize(`${label}:`, 'bold', this.colors));
    lines.push(indent(body));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function formatPath(context: AssertionContext): string {
  return context.aliasedPath.join('.');
}

function expectedLabel(type: AssertionType): string {
  switch (type) {
    case 'not-equal':
      return 'denied value';
    case 'in-range':
      return 'expected range';
    case 'not-in-range':
      return 'denied range';
    case 'belongs':
      return 'expected one of';
    case 'not-belongs':
      return 'denied values';
    case 'contains-key':
      return 'expected key';
    case 'not-contains-key':
      return 'denied key';
    case 'contains-element':
      return 'expected element';
    case 'not-contains-element':
      return 'denied element';
    case 'contains-subset':
      return 'expected subset';
    case 'not-contains-subset':
      return 'denied subset';
    case 'match-schema':
    case 'not-match-schema':
      return 'schema';
    case 'match-regexp':
    case 'not-match-regexp':
      return 'pattern';
    case 'match-format':
    case 'not-match-format':
      return 'format';
    default:
      return 'expected';
  }
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

/**
 * Dump a value for display in failure messages
 */
export function dumpValue(value: unknown): string {
  if (value instanceof AssertionRange) {
    return `[${dumpValue(value.min)}; ${dumpValue(value.max)}]`;
  }
  if (value instanceof AssertionList) {
    return dumpValue(value.values);
  }
  if (value === undefined) return 'undefined';
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'function') return `[Function: ${value.name || 'anonymous'}]`;
  if (typeof value === 'symbol') return value.toString();
  if (value instanceof RegExp) return value.toString();

  try {
    const json = JSON.stringify(
      value,
      (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item),
      2
    );
    return json === undefined ? String(value) : json;
  } catch {
    return String(value);
  }
}
