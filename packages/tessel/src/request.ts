import type { ExecutionContext, LogicRequest } from './types.js';

// This module is also bundled into the per-request runner program, so it
// relies on globals only.

const FORM_METHODS = new Set(['POST', 'PUT', 'PATCH']);

function isUrlEncoded(headers: Headers): boolean {
  const type = headers.get('content-type') ?? '';
  return type.split(';')[0].trim().toLowerCase() === 'application/x-www-form-urlencoded';
}

/** Rebuild the handler-facing request from a captured execution context. */
export function createLogicRequest(context: ExecutionContext): LogicRequest {
  const headers = new Headers();
  for (const [name, values] of Object.entries(context.headers)) {
    for (const value of values) {
      headers.append(name, value);
    }
  }

  const host = context.host || 'localhost';
  const url = new URL(context.url, `http://${host}`);
  const method = context.method.toUpperCase();

  const form = new URLSearchParams();
  if (FORM_METHODS.has(method) && isUrlEncoded(headers)) {
    for (const [key, value] of new URLSearchParams(context.body)) {
      form.append(key, value);
    }
  }
  for (const [key, value] of url.searchParams) {
    form.append(key, value);
  }

  return {
    method,
    url,
    headers,
    body: context.body,
    host,
    remoteAddr: context.remoteAddr,
    query: new URLSearchParams(url.searchParams),
    form,
    json(): unknown {
      return JSON.parse(context.body);
    },
  };
}
