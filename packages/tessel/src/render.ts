import { createHash } from 'node:crypto';
import { existsSync, readdirSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import Handlebars from 'handlebars';
import type { TesselEnv } from './types.js';
import {
  TemplateExecutionError,
  TemplateParseError,
  errorMessage,
} from './errors.js';
import { findLayoutDirective, type LayoutResolver } from './layout.js';
import { logger } from './logger.js';

type HandlebarsEnv = ReturnType<typeof Handlebars.create>;
type CompiledTemplate = ReturnType<HandlebarsEnv['compile']>;

export const LIVE_RELOAD_PATH = '/__tessel_reload';

const LIVE_RELOAD_SNIPPET = `<script>
  if (typeof WebSocket !== "undefined") {
    const protocol = location.protocol === "https:" ? "wss" : "ws";
    const ws = new WebSocket(protocol + "://" + location.host + "${LIVE_RELOAD_PATH}");
    ws.onmessage = (e) => {
      if (e.data === "reload") location.reload();
    };
  }
</script>`;

/** Insert the live-reload client before the first </body>. */
export function injectLiveReload(html: string): string {
  return html.replace('</body>', `${LIVE_RELOAD_SNIPPET}\n</body>`);
}

/**
 * Identity of a template set: every participating path and its mtime.
 * Editing any file changes the key; contents are never hashed.
 */
export async function hashTemplateFiles(files: string[]): Promise<string> {
  const hash = createHash('sha256');
  for (const file of files) {
    hash.update(file);
    try {
      const { mtimeMs } = await fs.stat(file);
      hash.update(String(mtimeMs));
    } catch {
      hash.update('missing');
    }
  }
  return hash.digest('hex');
}

export function registerHelpers(hbs: HandlebarsEnv): void {
  hbs.registerHelper('safeHTML', (value: unknown) => {
    if (value instanceof hbs.SafeString) return value;
    if (typeof value === 'string') return new hbs.SafeString(value);
    return '';
  });

  // {{> card (props "title" post.title "href" post.url)}}
  hbs.registerHelper('props', (...args: unknown[]) => {
    const values = args.slice(0, -1);
    if (values.length % 2 !== 0) {
      throw new Error('props must be called with an even number of arguments');
    }
    const result: Record<string, unknown> = {};
    for (let i = 0; i < values.length; i += 2) {
      const key = values[i];
      if (typeof key !== 'string') {
        throw new Error('props keys must be strings');
      }
      result[key] = values[i + 1];
    }
    return result;
  });

  hbs.registerHelper('json', (value: unknown) => new hbs.SafeString(JSON.stringify(value)));

  hbs.registerHelper('eq', (a: unknown, b: unknown) => a === b || String(a) === String(b));
}

export interface TemplateFiles {
  layout: string | null;
  page: string;
  components: string[];
}

/** Parsed layout + page + fragments, ready to execute. */
export interface CompiledTemplateSet {
  key: string;
  files: TemplateFiles;
  execute(data: unknown): string;
}

async function readTemplate(file: string): Promise<string> {
  const source = await fs.readFile(file, 'utf-8');
  const directive = findLayoutDirective(source);
  if (!directive) return source;

  // Blank the directive line so it does not reach the output; keep line numbers.
  const lines = source.split('\n');
  lines[directive.index] = '';
  return lines.join('\n');
}

async function compileFile(
  hbs: HandlebarsEnv,
  file: string
): Promise<CompiledTemplate> {
  const source = await readTemplate(file);
  let ast: ReturnType<HandlebarsEnv['parse']>;
  try {
    ast = hbs.parse(source);
  } catch (err) {
    throw new TemplateParseError(file, errorMessage(err));
  }
  return hbs.compile(ast);
}

/** Every .html file under the components directory, in a stable order. */
export function scanComponents(componentsDir: string): string[] {
  if (!existsSync(componentsDir)) return [];
  const files: string[] = [];
  const walk = (dir: string) => {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name.localeCompare(b.name)
    );
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.name.endsWith('.html')) files.push(full);
    }
  };
  walk(componentsDir);
  return files;
}

/**
 * Fragments are addressed by their path under components/ without the
 * extension: components/cards/post.html → {{> cards/post}}
 */
export function partialName(componentsDir: string, file: string): string {
  const rel = path.relative(componentsDir, file);
  const withoutExt = rel.slice(0, rel.length - path.extname(rel).length);
  return withoutExt.split(path.sep).join('/');
}

export async function parseTemplateSet(
  key: string,
  files: TemplateFiles,
  componentsDir: string
): Promise<CompiledTemplateSet> {
  const hbs = Handlebars.create();
  registerHelpers(hbs);

  for (const component of files.components) {
    hbs.registerPartial(partialName(componentsDir, component), await compileFile(hbs, component));
  }

  const page = await compileFile(hbs, files.page);
  let entry = page;

  if (files.layout) {
    const layout = await compileFile(hbs, files.layout);
    hbs.registerPartial('layout', layout);
    hbs.registerPartial('content', page);
    entry = layout;
  }

  return {
    key,
    files,
    execute: (data) => entry(data),
  };
}

export interface TemplateRendererOptions {
  env: TesselEnv;
  componentsDir: string;
  layouts: LayoutResolver;
}

/**
 * Composes layout + page + fragments and caches each parsed set by file
 * identity for the life of the process.
 */
export class TemplateRenderer {
  private readonly sets = new Map<string, Promise<CompiledTemplateSet>>();

  constructor(private readonly options: TemplateRendererOptions) {}

  get cachedSets(): number {
    return this.sets.size;
  }

  async resolveFiles(templatePath: string, components: string[]): Promise<TemplateFiles> {
    const isXml = path.extname(templatePath) === '.xml';
    const layout = isXml ? null : await this.options.layouts.resolve(templatePath);

    if (layout) {
      try {
        await fs.access(layout);
      } catch {
        throw new TemplateExecutionError(
          `layout "${path.relative(process.cwd(), layout)}" referenced by ${templatePath} does not exist`
        );
      }
    }

    return { layout, page: templatePath, components };
  }

  async load(files: TemplateFiles): Promise<CompiledTemplateSet> {
    const list = [...(files.layout ? [files.layout] : []), files.page, ...files.components];
    const key = await hashTemplateFiles(list);

    let set = this.sets.get(key);
    if (!set) {
      set = parseTemplateSet(key, files, this.options.componentsDir);
      this.sets.set(key, set);
      set.catch((err: unknown) => {
        this.sets.delete(key);
        logger.error(`Template parse error [${key.slice(0, 12)}]: ${errorMessage(err)}`);
      });
    }
    return set;
  }

  /**
   * Render a page with its layout (when present) and every shared fragment.
   * Throws TemplateParseError or TemplateExecutionError.
   */
  async render(templatePath: string, data: unknown, components: string[]): Promise<string> {
    const files = await this.resolveFiles(templatePath, components);
    const set = await this.load(files);

    let output: string;
    try {
      output = set.execute(data);
    } catch (err) {
      throw new TemplateExecutionError(errorMessage(err), { cause: err });
    }

    if (this.options.env !== 'prod' && path.extname(templatePath) !== '.xml') {
      output = injectLiveReload(output);
    }
    return output;
  }
}
