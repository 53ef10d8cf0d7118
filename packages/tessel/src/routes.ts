import fs from 'node:fs';
import path from 'node:path';
import type {
  ApiRouteDescriptor,
  RouteDescriptor,
  RouteMatch,
  RouteParams,
} from './types.js';

/** Directory prefix marking a dynamic segment: routes/posts/_id → /posts/:id */
export const PARAM_PREFIX = '_';

/** Error page directories (routes/_error) are never routable. */
export const ERROR_DIR_PREFIX = '_error';

export const PAGE_FILES = ['index.html', 'index.xml'] as const;

export const LOGIC_FILE = 'index.server.ts';

export const API_LOGIC_FILES = ['index.server.ts', 'index.ts'] as const;

interface CompiledSegments {
  path: string;
  pattern: RegExp;
  paramKeys: string[];
  paramRawKeys: string[];
}

export function isParamSegment(segment: string): boolean {
  return segment.startsWith(PARAM_PREFIX);
}

/**
 * Compile the directory segments of a route into a matcher.
 * ['posts', '_id'] → ^posts/([^/]+)$ with paramKeys ['id']
 * ['feed', '_name.xml'] → ^feed/([^/]+)$ with paramKeys ['name'], raw 'name.xml'
 */
export function compileSegments(segments: string[]): CompiledSegments {
  const paramKeys: string[] = [];
  const paramRawKeys: string[] = [];
  const regexParts: string[] = [];
  const displayParts: string[] = [];

  for (const segment of segments) {
    if (isParamSegment(segment)) {
      const rawKey = segment.slice(PARAM_PREFIX.length);
      const key = rawKey.slice(0, rawKey.length - path.extname(rawKey).length);
      paramRawKeys.push(rawKey);
      paramKeys.push(key);
      regexParts.push('([^/]+)');
      displayParts.push(`:${key}`);
    } else {
      regexParts.push(segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      displayParts.push(segment);
    }
  }

  return {
    path: '/' + displayParts.join('/'),
    pattern: new RegExp(`^${regexParts.join('/')}$`),
    paramKeys,
    paramRawKeys,
  };
}

function toSegments(baseDir: string, dir: string): string[] {
  const rel = path.relative(baseDir, dir);
  if (!rel) return [];
  return rel.split(path.sep);
}

function walkDirs(dir: string, visit: (dir: string) => boolean): void {
  if (!visit(dir)) return;
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isDirectory()) {
      walkDirs(path.join(dir, entry.name), visit);
    }
  }
}

function isDynamic(route: { paramKeys: string[] }): boolean {
  return route.paramKeys.length > 0;
}

/** Stable: static routes keep their relative order ahead of dynamic ones. */
export function sortRoutes<R extends { paramKeys: string[] }>(routes: R[]): R[] {
  return [...routes.filter((r) => !isDynamic(r)), ...routes.filter(isDynamic)];
}

/**
 * Walk the routes directory. Every directory holding index.html or index.xml
 * becomes a route; _error subtrees are skipped.
 */
export function scanRoutes(routesDir: string): RouteDescriptor[] {
  if (!fs.existsSync(routesDir)) return [];

  const routes: RouteDescriptor[] = [];

  walkDirs(routesDir, (dir) => {
    if (dir !== routesDir && path.basename(dir).startsWith(ERROR_DIR_PREFIX)) {
      return false;
    }

    const pageFile = PAGE_FILES.find((file) => fs.existsSync(path.join(dir, file)));
    if (!pageFile) return true;

    const compiled = compileSegments(toSegments(routesDir, dir));
    routes.push({
      ...compiled,
      templatePath: path.join(dir, pageFile),
      logicPath: path.join(dir, LOGIC_FILE),
      dir,
      ext: path.extname(pageFile).slice(1),
    });
    return true;
  });

  return sortRoutes(routes);
}

/** Same walk over api/, qualifying directories that hold a logic unit. */
export function scanApiRoutes(apiDir: string): ApiRouteDescriptor[] {
  if (!fs.existsSync(apiDir)) return [];

  const routes: ApiRouteDescriptor[] = [];

  walkDirs(apiDir, (dir) => {
    const logicFile = API_LOGIC_FILES.find((file) => fs.existsSync(path.join(dir, file)));
    if (!logicFile) return true;

    const compiled = compileSegments(toSegments(apiDir, dir));
    routes.push({
      ...compiled,
      method: 'ANY',
      logicPath: path.join(dir, logicFile),
      dir,
    });
    return true;
  });

  return sortRoutes(routes);
}

/** Strip the query string and surrounding slashes: '/posts/42/?a=1' → 'posts/42' */
export function normalizePath(url: string): string {
  const pathname = url.split('?')[0].split('#')[0];
  return pathname.replace(/^\/+|\/+$/g, '');
}

function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Read param values off a regex match. A raw key with an extension strips
 * that suffix from its value: raw 'id.json' + '42.json' → '42'.
 */
export function extractParams(
  route: { paramKeys: string[]; paramRawKeys: string[] },
  match: RegExpMatchArray
): RouteParams {
  const params: RouteParams = {};
  route.paramKeys.forEach((key, i) => {
    const ext = path.extname(route.paramRawKeys[i] ?? '');
    let value = match[i + 1] ?? '';
    if (ext && value.endsWith(ext)) {
      value = value.slice(0, value.length - ext.length);
    }
    params[key] = decodeParam(value);
  });
  return params;
}

/** True when a cleaned path has a '.' or '..' segment. */
export function hasDotSegment(cleanPath: string): boolean {
  return cleanPath.split('/').some((segment) => segment === '.' || segment === '..');
}

/**
 * Linear scan; the first matching route wins, so static routes listed first
 * are never shadowed by a pattern. Paths with dot segments match nothing.
 */
export function matchRoute<R extends { pattern: RegExp; paramKeys: string[]; paramRawKeys: string[] }>(
  url: string,
  routes: R[]
): RouteMatch<R> | null {
  const cleanPath = normalizePath(url);
  if (hasDotSegment(cleanPath)) return null;

  for (const route of routes) {
    const match = cleanPath.match(route.pattern);
    if (match) {
      return { route, params: extractParams(route, match) };
    }
  }

  return null;
}
