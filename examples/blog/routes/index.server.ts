import type { LogicRequest, LogicResult } from 'tessel';
import { getPosts } from '../lib/posts.js';

export async function handleRequest(request: LogicRequest): Promise<LogicResult> {
  const tag = request.query.get('q')?.toLowerCase();
  const posts = getPosts().filter((post) => !tag || post.title.toLowerCase().includes(tag));
  return { posts };
}
