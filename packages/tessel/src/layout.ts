import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

/** Only the head of a page is searched for the directive. */
export const LAYOUT_SCAN_LINES = 50;

const DIRECTIVE = /^<!--\s*layout:\s*(.*?)\s*-->$/;

/**
 * Parse a layout directive line: `<!-- layout: components/layouts/main.html -->`
 * → 'components/layouts/main.html'
 */
export function parseLayoutDirective(line: string): string | null {
  const match = line.trim().match(DIRECTIVE);
  if (!match || !match[1]) return null;
  return match[1];
}

/** Index of the directive line within the scanned head, or -1. */
export function findLayoutDirective(source: string): { index: number; layout: string } | null {
  const lines = source.split('\n', LAYOUT_SCAN_LINES);
  for (let i = 0; i < lines.length; i++) {
    const layout = parseLayoutDirective(lines[i]);
    if (layout) return { index: i, layout };
  }
  return null;
}

interface CachedLayout {
  mtimeMs: number;
  layout: string | null;
}

/**
 * Resolves which layout a page asks for. Results are cached per page path and
 * reused while the page's mtime is unchanged.
 */
export class LayoutResolver {
  private readonly cache = new Map<string, CachedLayout>();

  constructor(private readonly root: string) {}

  /** Absolute layout path, or null when the page has no directive. */
  async resolve(file: string): Promise<string | null> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(file)).mtimeMs;
    } catch (err) {
      logger.warn(`Could not scan ${file} for a layout directive: ${errorMessage(err)}`);
      return null;
    }

    const cached = this.cache.get(file);
    if (cached && cached.mtimeMs === mtimeMs) return cached.layout;

    let layout: string | null = null;
    try {
      const directive = findLayoutDirective(await fs.readFile(file, 'utf-8'));
      layout = directive ? path.resolve(this.root, directive.layout) : null;
    } catch (err) {
      logger.warn(`Could not scan ${file} for a layout directive: ${errorMessage(err)}`);
    }

    this.cache.set(file, { mtimeMs, layout });
    return layout;
  }
}
