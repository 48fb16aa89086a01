/**
 * API Assert - Assertions Module
 *
 * Fluent assertion objects for values, objects, arrays, strings, numbers,
 * booleans and HTTP responses.
 */

export { Expect, createExpect, type ResponseOptions } from './expect';
export { ValueAssert } from './value';
export { ObjectAssert, isSubset, type ObjectPredicate, type ObjectVisitor } from './object';
export { ArrayAssert, countElement, type ArrayPredicate, type ArrayVisitor } from './array';
export { StringAssert } from './string';
export { NumberAssert } from './number';
export { BooleanAssert } from './boolean';
export { ResponseAssert, parseMediaType, statusCodeText, type StatusRange } from './response';
export type { AnyAssertion, Assertion, AssertionKind } from './assertion';
