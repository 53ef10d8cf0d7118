import fs from 'node:fs';
import path from 'node:path';

export interface Post {
  id: string;
  title: string;
  date: string;
  summary: string;
  body: string;
}

// Logic units run with the site root as working directory.
const POSTS_FILE = path.join(process.cwd(), 'data', 'posts.json');

function isPost(value: unknown): value is Post {
  if (typeof value !== 'object' || value === null) return false;
  return ['id', 'title', 'date', 'summary', 'body'].every(
    (key) => key in value && typeof Reflect.get(value, key) === 'string'
  );
}

export function getPosts(): Post[] {
  const raw: unknown = JSON.parse(fs.readFileSync(POSTS_FILE, 'utf-8'));
  if (!Array.isArray(raw)) return [];
  return raw.filter(isPost).sort((a, b) => b.date.localeCompare(a.date));
}

export function getPost(id: string): Post | undefined {
  return getPosts().find((post) => post.id === id);
}
