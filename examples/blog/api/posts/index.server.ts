import type { LogicRequest, LogicResult } from 'tessel';
import { getPosts } from '../../lib/posts.js';

export async function handleRequest(request: LogicRequest): Promise<LogicResult> {
  const limit = Number(request.query.get('limit') ?? 10);
  const posts = getPosts()
    .slice(0, Number.isFinite(limit) ? limit : 10)
    .map(({ id, title, date, summary }) => ({ id, title, date, summary }));
  return { posts };
}
