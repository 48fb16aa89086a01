/**
 * API Assert - Response Assertions
 *
 * Works on a response snapshot that was already received. The body is a
 * string; json() parses it.
 */

import { STATUS_CODES } from 'node:http';

import type { Chain } from '../core/chain';
import { AssertionList, type ResponseSnapshot } from '../types';
import type { Assertion } from './assertion';
import { enterOp } from './chain-helpers';
import { ObjectAssert } from './object';
import { StringAssert } from './string';
import { ValueAssert } from './value';

export type StatusRange = '1xx' | '2xx' | '3xx' | '4xx' | '5xx';

const STATUS_RANGE_NAMES: Record<StatusRange, string> = {
  '1xx': 'Informational',
  '2xx': 'Success',
  '3xx': 'Redirection',
  '4xx': 'Client Error',
  '5xx': 'Server Error',
};

export class ResponseAssert implements Assertion<ResponseSnapshot> {
  readonly kind = 'response';

  private readonly chain: Chain;
  private readonly response: ResponseSnapshot;

  constructor(chain: Chain, response: ResponseSnapshot) {
    this.chain = chain;
    this.response = response;
  }

  raw(): ResponseSnapshot {
    return this.response;
  }

  alias(name: string): this {
    this.chain.setAlias(name);
    return this;
  }

  status(status: number): this {
    const opChain = enterOp(this.chain, 'status()');
    try {
      if (opChain.failed()) return this;

      if (this.response.status !== status) {
        opChain.fail({
          type: 'equal',
          actual: { value: statusCodeText(this.response.status) },
          expected: { value: statusCodeText(status) },
          errors: ['unexpected http status value'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  statusRange(range: StatusRange): this {
    const opChain = enterOp(this.chain, 'statusRange()');
    try {
      if (opChain.failed()) return this;

      if (statusRangeOf(this.response.status) !== range) {
        opChain.fail({
          type: 'belongs',
          actual: { value: statusCodeText(this.response.status) },
          expected: { value: new AssertionList([statusRangeText(range)]) },
          errors: ['expected: http status belongs to given range'],
        });
      }
      return this;
    } finally {
      opChain.leave();
    }
  }

  /**
   * Value of a header, matched case-insensitively.
   * Repeated headers are joined with ", "; a missing header is "".
   */
  header(name: string): StringAssert {
    const opChain = enterOp(this.chain, 'header(%j)', name);
    try {
      if (opChain.failed()) {
        return new StringAssert(opChain.clone(), '');
      }
      return new StringAssert(opChain.clone(), this.headerValue(name));
    } finally {
      opChain.leave();
    }
  }

  headers(): ObjectAssert {
    const opChain = enterOp(this.chain, 'headers()');
    try {
      if (opChain.failed()) {
        return new ObjectAssert(opChain.clone(), {});
      }
      return new ObjectAssert(opChain.clone(), this.response.headers);
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check the media type of the Content-Type header, and the charset if
   * given. Without a charset argument, only utf-8 or no charset passes.
   */
  contentType(mediaType: string, charset?: string): this {
    const opChain = enterOp(this.chain, 'contentType()');
    try {
      if (opChain.failed()) return this;

      checkContentType(opChain, this.headerValue('content-type'), mediaType, charset);
      return this;
    } finally {
      opChain.leave();
    }
  }

  body(): StringAssert {
    const opChain = enterOp(this.chain, 'body()');
    try {
      if (opChain.failed()) {
        return new StringAssert(opChain.clone(), '');
      }
      return new StringAssert(opChain.clone(), this.response.body);
    } finally {
      opChain.leave();
    }
  }

  /**
   * Check for an application/json content type and decode the body
   */
  json(): ValueAssert {
    const opChain = enterOp(this.chain, 'json()');
    try {
      if (opChain.failed()) {
        return new ValueAssert(opChain.clone(), null);
      }

      if (!checkContentType(opChain, this.headerValue('content-type'), 'application/json')) {
        return new ValueAssert(opChain.clone(), null);
      }

      let value: unknown;
      try {
        value = JSON.parse(this.response.body);
      } catch (error) {
        opChain.fail({
          type: 'valid',
          actual: { value: this.response.body },
          errors: ['failed to decode json', error instanceof Error ? error.message : String(error)],
        });
        return new ValueAssert(opChain.clone(), null);
      }

      return new ValueAssert(opChain.clone(), value);
    } finally {
      opChain.leave();
    }
  }

  private headerValue(name: string): string {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.response.headers)) {
      if (key.toLowerCase() === wanted) {
        return Array.isArray(value) ? value.join(', ') : value;
      }
    }
    return '';
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function statusCodeText(status: number): string {
  const text = STATUS_CODES[status];
  return text ? `${status} ${text}` : String(status);
}

function statusRangeOf(status: number): StatusRange | undefined {
  if (status >= 100 && status < 200) return '1xx';
  if (status >= 200 && status < 300) return '2xx';
  if (status >= 300 && status < 400) return '3xx';
  if (status >= 400 && status < 500) return '4xx';
  if (status >= 500 && status < 600) return '5xx';
  return undefined;
}

function statusRangeText(range: StatusRange): string {
  return `${range} ${STATUS_RANGE_NAMES[range]}`;
}

interface MediaType {
  type: string;
  params: Record<string, string>;
}

/**
 * Parse a Content-Type header value; undefined when it is malformed
 */
export function parseMediaType(header: string): MediaType | undefined {
  const [type, ...rest] = header.split(';');
  const mediaType = type.trim().toLowerCase();
  if (!/^[\w!#$&^.+-]+\/[\w!#$&^.+-]+$/.test(mediaType)) {
    return undefined;
  }

  const params: Record<string, string> = {};
  for (const part of rest) {
    const index = part.indexOf('=');
    if (index <= 0) return undefined;

    const key = part.slice(0, index).trim().toLowerCase();
    const value = part.slice(index + 1).trim().replace(/^"(.*)"$/, '$1');
    params[key] = value;
  }

  return { type: mediaType, params };
}

function checkContentType(
  opChain: Chain,
  header: string,
  expectedType: string,
  expectedCharset?: string
): boolean {
  const parsed = parseMediaType(header);
  if (!parsed) {
    opChain.fail({
      type: 'valid',
      actual: { value: header },
      errors: ['invalid "Content-Type" response header'],
    });
    return false;
  }

  if (parsed.type !== expectedType.toLowerCase()) {
    opChain.fail({
      type: 'equal',
      actual: { value: parsed.type },
      expected: { value: expectedType },
      errors: ['unexpected media type in "Content-Type" response header'],
    });
    return false;
  }

  const charset = parsed.params.charset ?? '';

  if (expectedCharset === undefined) {
    if (charset !== '' && charset.toLowerCase() !== 'utf-8') {
      opChain.fail({
        type: 'belongs',
        actual: { value: charset },
        expected: { value: new AssertionList(['', 'utf-8']) },
        errors: ['unexpected charset in "Content-Type" response header'],
      });
      return false;
    }
  } else if (charset.toLowerCase() !== expectedCharset.toLowerCase()) {
    opChain.fail({
      type: 'equal',
      actual: { value: charset },
      expected: { value: expectedCharset },
      errors: ['unexpected charset in "Content-Type" response header'],
    });
    return false;
  }

  return true;
}
