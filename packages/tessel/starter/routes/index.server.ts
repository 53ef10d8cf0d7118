import type { LogicRequest, LogicResult } from 'tessel';

export function handleRequest(request: LogicRequest): LogicResult {
  return { title: 'Hello from tessel', path: request.url.pathname };
}
