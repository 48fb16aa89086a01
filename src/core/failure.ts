/**
 * API Assert - Assertion Failure Validation
 *
 * Checks that a failure carries the fields its kind requires, so that
 * formatters can rely on them.
 */

import {
  ASSERTION_TYPES,
  AssertionList,
  AssertionRange,
  type AssertionFailure,
  type AssertionType,
} from '../types';

type FieldRequirement = 'optional' | 'required' | 'denied';

interface FieldTraits {
  actual: FieldRequirement;
  expected: FieldRequirement;
  range?: boolean;
  list?: boolean;
}

const KNOWN_TYPES: ReadonlySet<string> = new Set(ASSERTION_TYPES);

/**
 * Check if a value names a known assertion kind
 */
export function isAssertionType(value: unknown): value is AssertionType {
  return typeof value === 'string' && KNOWN_TYPES.has(value);
}

function traitsFor(type: AssertionType): FieldTraits {
  switch (type) {
    case 'usage':
    case 'operation':
      return { actual: 'denied', expected: 'denied' };

    case 'type':
    case 'not-type':
    case 'valid':
    case 'not-valid':
    case 'nil':
    case 'not-nil':
    case 'empty':
    case 'not-empty':
      return { actual: 'required', expected: 'denied' };

    case 'equal':
    case 'not-equal':
    case 'lt':
    case 'le':
    case 'gt':
    case 'ge':
    case 'match-schema':
    case 'not-match-schema':
    case 'match-path':
    case 'not-match-path':
    case 'match-regexp':
    case 'not-match-regexp':
    case 'match-format':
    case 'not-match-format':
      return { actual: 'required', expected: 'required' };

    case 'in-range':
    case 'not-in-range':
      return { actual: 'required', expected: 'required', range: true };

    case 'contains-key':
    case 'not-contains-key':
    case 'contains-element':
    case 'not-contains-element':
    case 'contains-subset':
    case 'not-contains-subset':
      return { actual: 'required', expected: 'optional' };

    case 'belongs':
    case 'not-belongs':
      return { actual: 'required', expected: 'required', list: true };
  }
}

function checkField(
  failure: AssertionFailure,
  field: 'actual' | 'expected',
  requirement: FieldRequirement
): string | undefined {
  const present = failure[field] !== undefined;

  if (requirement === 'required' && !present) {
    return `AssertionFailure of type ${failure.type} should have ${field} field`;
  }
  if (requirement === 'denied' && present) {
    return `AssertionFailure of type ${failure.type} can't have ${field} field`;
  }
  return undefined;
}

/**
 * Validate the structure of a failure.
 *
 * @returns a description of the first problem found, or undefined
 */
export function validateFailure(failure: AssertionFailure): string | undefined {
  if (!isAssertionType(failure.type)) {
    return `unknown assertion type ${String(failure.type)}`;
  }

  if (failure.errors.length === 0) {
    return 'AssertionFailure should have non-empty errors list';
  }
  for (const error of failure.errors) {
    if (typeof error !== 'string' || error === '') {
      return 'AssertionFailure should not have empty entries in errors list';
    }
  }

  const traits = traitsFor(failure.type);

  const problem =
    checkField(failure, 'actual', traits.actual) ??
    checkField(failure, 'expected', traits.expected);
  if (problem) {
    return problem;
  }

  if (traits.range && !(failure.expected?.value instanceof AssertionRange)) {
    return `AssertionFailure of type ${failure.type} should have AssertionRange in expected field`;
  }
  if (traits.list && !(failure.expected?.value instanceof AssertionList)) {
    return `AssertionFailure of type ${failure.type} should have AssertionList in expected field`;
  }

  return undefined;
}
