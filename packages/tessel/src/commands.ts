import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { TesselConfig } from './types.js';
import { errorDetail } from './errors.js';
import { LayoutResolver } from './layout.js';
import { PAGE_FILES, scanApiRoutes, scanRoutes } from './routes.js';
import { TemplateRenderer, scanComponents } from './render.js';

// ── check ────────────────────────────────────────────────────────

export interface TemplateCheck {
  /** Display path of the route, e.g. '/posts/:id' */
  route: string;
  ok: boolean;
  error?: string;
}

/**
 * Parse and execute every route's layout + page + fragments set against
 * empty data. A missing layout, a syntax error or a throwing helper fails
 * the route.
 */
export async function checkTemplates(root: string): Promise<TemplateCheck[]> {
  const componentsDir = path.join(root, 'components');
  const components = scanComponents(componentsDir);
  const renderer = new TemplateRenderer({
    env: 'prod',
    componentsDir,
    layouts: new LayoutResolver(root),
  });

  const results: TemplateCheck[] = [];
  for (const route of scanRoutes(path.join(root, 'routes'))) {
    try {
      await renderer.render(route.templatePath, {}, components);
      results.push({ route: route.path, ok: true });
    } catch (err) {
      results.push({ route: route.path, ok: false, error: errorDetail(err) });
    }
  }
  return results;
}

// ── info ─────────────────────────────────────────────────────────

export interface ProjectInfo {
  config: TesselConfig;
  routes: number;
  apiRoutes: number;
  components: number;
  /** Rendered pages in the output cache, gzip twins not counted. */
  cachedPages: number;
}

function countCachedPages(dir: string): number {
  if (!fs.existsSync(dir)) return 0;
  let count = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      count += countCachedPages(path.join(dir, entry.name));
    } else if (PAGE_FILES.some((file) => file === entry.name)) {
      count++;
    }
  }
  return count;
}

export function projectInfo(root: string, config: TesselConfig): ProjectInfo {
  return {
    config,
    routes: scanRoutes(path.join(root, 'routes')).length,
    apiRoutes: scanApiRoutes(path.join(root, 'api')).length,
    components: scanComponents(path.join(root, 'components')).length,
    cachedPages: countCachedPages(path.resolve(root, config.outputDir)),
  };
}

export function formatProjectInfo(info: ProjectInfo): string[] {
  return [
    `Output directory: ${info.config.outputDir}`,
    `Cache enabled:    ${info.config.cache}`,
    `Debug headers:    ${info.config.debugHeaders}`,
    `Debug logs:       ${info.config.debugLogs}`,
    '',
    `Routes:           ${info.routes}`,
    `API routes:       ${info.apiRoutes}`,
    `Components:       ${info.components}`,
    `Cached pages:     ${info.cachedPages}`,
  ];
}

// ── init ─────────────────────────────────────────────────────────

/** Starter site shipped beside src/ and dist/. */
export const STARTER_DIR = fileURLToPath(new URL('../starter', import.meta.url));

// npm leaves .gitignore files out of a published package.
const RENAMED_FILES = new Map([['gitignore', '.gitignore']]);

function tesselVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version);
  }
  return '0.1.0';
}

function starterPackage(name: string): string {
  const pkg = {
    name,
    version: '0.1.0',
    private: true,
    type: 'module',
    scripts: {
      dev: 'tessel dev',
      start: 'tessel prod',
      build: 'tessel build',
      check: 'tessel check',
    },
    dependencies: {
      tessel: `^${tesselVersion()}`,
    },
  };
  return JSON.stringify(pkg, null, 2) + '\n';
}

function listFiles(dir: string, base = dir): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...listFiles(full, base));
    else files.push(path.relative(base, full));
  }
  return files.sort();
}

export interface InitResult {
  /** Paths relative to the target directory, in write order. */
  written: string[];
  /** Files left alone because they already existed. */
  skipped: string[];
}

/**
 * Copy the starter site into `targetDir`. Existing files are never
 * overwritten; a package.json depending on tessel is added when missing.
 */
export function initProject(targetDir: string, starterDir = STARTER_DIR): InitResult {
  const result: InitResult = { written: [], skipped: [] };

  const place = (rel: string, content: Buffer | string) => {
    const dest = path.join(targetDir, rel);
    if (fs.existsSync(dest)) {
      result.skipped.push(rel);
      return;
    }
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.writeFileSync(dest, content);
    result.written.push(rel);
  };

  for (const rel of listFiles(starterDir)) {
    const name = RENAMED_FILES.get(path.basename(rel));
    const destRel = name ? path.join(path.dirname(rel), name) : rel;
    place(destRel, fs.readFileSync(path.join(starterDir, rel)));
  }
  place('package.json', starterPackage(path.basename(path.resolve(targetDir))));

  return result;
}
