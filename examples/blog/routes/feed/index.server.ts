import type { LogicRequest, LogicResult } from 'tessel';
import { getPosts } from '../../lib/posts.js';

export async function handleRequest(request: LogicRequest): Promise<LogicResult> {
  return { origin: request.url.origin, posts: getPosts() };
}
