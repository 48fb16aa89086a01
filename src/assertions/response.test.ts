import { describe, expect, it } from 'vitest';

import { recordingExpect } from '../test-utils';
import { AssertionList, type ResponseSnapshot } from '../types';
import { parseMediaType, statusCodeText } from './response';

function jsonResponse(overrides: Partial<ResponseSnapshot> = {}): ResponseSnapshot {
  return {
    status: 200,
    statusText: 'OK',
    headers: {
      'Content-Type': 'application/json; charset=utf-8',
      'X-Request-Id': 'req-1',
      'Set-Cookie': ['a=1', 'b=2'],
    },
    body: '{"id":1,"name":"test-user"}',
    ...overrides,
  };
}

describe('ResponseAssert', () => {
  it('passes matching checks', () => {
    const { api, handler } = recordingExpect();
    const response = api.response(jsonResponse());

    response.status(200).statusRange('2xx').contentType('application/json');
    response.contentType('application/json', 'UTF-8');
    response.header('x-request-id').isEqual('req-1');
    response.header('set-cookie').isEqual('a=1, b=2');
    response.header('missing').isEmpty();
    response.headers().containsKey('X-Request-Id');
    response.body().contains('test-user');
    response.json().object().value('name').string().isEqual('test-user');

    expect(handler.failures).toHaveLength(0);
  });

  it('reports an unexpected status', () => {
    const { api, handler } = recordingExpect();

    api.response(jsonResponse()).status(404);

    const { context, failure } = handler.failures[0];
    expect(context.path).toEqual(['response()', 'status()']);
    expect(failure.type).toBe('equal');
    expect(failure.actual).toEqual({ value: '200 OK' });
    expect(failure.expected).toEqual({ value: '404 Not Found' });
    expect(failure.errors).toEqual(['unexpected http status value']);
  });

  it('reports an unexpected status range', () => {
    const { api, handler } = recordingExpect();

    api.response(jsonResponse()).statusRange('4xx');

    const { failure } = handler.failures[0];
    expect(failure.type).toBe('belongs');
    expect(failure.expected?.value).toEqual(new AssertionList(['4xx Client Error']));
    expect(failure.errors).toEqual(['expected: http status belongs to given range']);
  });

  it('reports the full path of nested failures', () => {
    const { api, handler } = recordingExpect();

    api.response(jsonResponse()).json().object().value('name').string().isEqual('other');

    expect(handler.failures).toHaveLength(1);
    expect(handler.failures[0].context.path).toEqual([
      'response()',
      'json()',
      'object()',
      'value("name")',
      'string()',
      'isEqual()',
    ]);
  });

  it('carries request details into the context', () => {
    const { api, handler } = recordingExpect({ testName: 'users' });

    api
      .response(jsonResponse(), {
        request: { method: 'GET', url: 'http://localhost/users/1' },
        requestName: 'get-user',
      })
      .status(500);

    const { context } = handler.failures[0];
    expect(context.testName).toBe('users');
    expect(context.requestName).toBe('get-user');
    expect(context.request?.method).toBe('GET');
    expect(context.response?.status).toBe(200);
  });

  describe('content type', () => {
    it('rejects another media type in json()', () => {
      const { api, handler } = recordingExpect();

      api
        .response(jsonResponse({ headers: { 'content-type': 'text/plain' }, body: 'ok' }))
        .json()
        .object();

      expect(handler.failures).toHaveLength(1);
      const { context, failure } = handler.failures[0];
      expect(context.path).toEqual(['response()', 'json()']);
      expect(failure.type).toBe('equal');
      expect(failure.actual).toEqual({ value: 'text/plain' });
      expect(failure.expected).toEqual({ value: 'application/json' });
      expect(failure.errors).toEqual(['unexpected media type in "Content-Type" response header']);
    });

    it('rejects a body that is not JSON', () => {
      const { api, handler } = recordingExpect();

      api.response(jsonResponse({ body: '{' })).json();

      const { failure } = handler.failures[0];
      expect(failure.type).toBe('valid');
      expect(failure.errors[0]).toBe('failed to decode json');
      expect(failure.actual).toEqual({ value: '{' });
    });

    it('checks the charset', () => {
      const { api, handler } = recordingExpect();

      api.response(jsonResponse()).contentType('application/json', 'latin1');
      api
        .response(jsonResponse({ headers: { 'Content-Type': 'text/plain; charset=latin1' } }))
        .contentType('text/plain');

      const [explicit, implicit] = handler.failures.map(({ failure }) => failure);
      expect(explicit).toMatchObject({
        type: 'equal',
        actual: { value: 'utf-8' },
        expected: { value: 'latin1' },
        errors: ['unexpected charset in "Content-Type" response header'],
      });
      expect(implicit.type).toBe('belongs');
      expect(implicit.expected?.value).toEqual(new AssertionList(['', 'utf-8']));
    });

    it('rejects a missing header', () => {
      const { api, handler } = recordingExpect();

      api.response(jsonResponse({ headers: {} })).contentType('application/json');

      expect(handler.failures[0].failure).toMatchObject({
        type: 'valid',
        actual: { value: '' },
        errors: ['invalid "Content-Type" response header'],
      });
    });
  });
});

describe('parseMediaType', () => {
  it('parses type and parameters', () => {
    expect(parseMediaType('Application/JSON; charset="UTF-8"')).toEqual({
      type: 'application/json',
      params: { charset: 'UTF-8' },
    });
  });

  it('rejects malformed values', () => {
    expect(parseMediaType('')).toBeUndefined();
    expect(parseMediaType('json')).toBeUndefined();
    expect(parseMediaType('text/plain; bogus')).toBeUndefined();
  });
});

describe('statusCodeText', () => {
  it('appends the reason phrase when known', () => {
    expect(statusCodeText(201)).toBe('201 Created');
    expect(statusCodeText(299)).toBe('299');
  });
});
