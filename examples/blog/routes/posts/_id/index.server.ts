import type { LogicRequest, LogicResult, RouteParams } from 'tessel';
import { notFound } from 'tessel/errors';
import { getPost } from '../../../lib/posts.js';

export async function handleRequest(_request: LogicRequest, params: RouteParams): Promise<LogicResult> {
  const post = getPost(params.id);
  if (!post) notFound(`post ${params.id}`);

  return {
    ...post,
    meta: { id: post.id, date: post.date },
  };
}
