import { describe, expect, it } from 'vitest';
import { createLogicRequest } from './request.js';
import type { ExecutionContext } from './types.js';

function context(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    method: 'GET',
    url: '/posts/42?ref=home',
    headers: { host: ['example.test'], accept: ['text/html'] },
    body: '',
    host: 'example.test',
    remoteAddr: '127.0.0.1',
    params: { id: '42' },
    ...overrides,
  };
}

describe('createLogicRequest', () => {
  it('rebuilds url, query and headers', () => {
    const request = createLogicRequest(context());
    expect(request.url.href).toBe('http://example.test/posts/42?ref=home');
    expect(request.url.pathname).toBe('/posts/42');
    expect(request.query.get('ref')).toBe('home');
    expect(request.headers.get('accept')).toBe('text/html');
    expect(request.host).toBe('example.test');
    expect(request.remoteAddr).toBe('127.0.0.1');
  });

  it('joins repeated headers', () => {
    const request = createLogicRequest(
      context({ headers: { 'x-tag': ['a', 'b'] } })
    );
    expect(request.headers.get('x-tag')).toBe('a, b');
  });

  it('uppercases the method', () => {
    expect(createLogicRequest(context({ method: 'post' })).method).toBe('POST');
  });

  it('falls back to localhost without a host', () => {
    const request = createLogicRequest(context({ host: '' }));
    expect(request.url.origin).toBe('http://localhost');
    expect(request.host).toBe('localhost');
  });

  it('parses urlencoded POST bodies into form, ahead of query fields', () => {
    const request = createLogicRequest(
      context({
        method: 'POST',
        url: '/comments?name=query',
        headers: { 'content-type': ['application/x-www-form-urlencoded; charset=utf-8'] },
        body: 'name=body&text=hello+there',
      })
    );
    expect(request.form.getAll('name')).toEqual(['body', 'query']);
    expect(request.form.get('text')).toBe('hello there');
  });

  it('ignores bodies for GET and for other content types', () => {
    const get = createLogicRequest(
      context({
        headers: { 'content-type': ['application/x-www-form-urlencoded'] },
        body: 'a=1',
      })
    );
    expect(get.form.has('a')).toBe(false);

    const json = createLogicRequest(
      context({
        method: 'POST',
        headers: { 'content-type': ['application/json'] },
        body: '{"a":1}',
      })
    );
    expect(json.form.has('a')).toBe(false);
    expect(json.json()).toEqual({ a: 1 });
  });

  it('throws from json() on an invalid body', () => {
    const request = createLogicRequest(context({ body: 'not json' }));
    expect(() => request.json()).toThrow(SyntaxError);
  });
});
