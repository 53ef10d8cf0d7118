import fs from 'node:fs/promises';
import type { IncomingHttpHeaders } from 'node:http';
import path from 'node:path';
import type {
  ApiRouteDescriptor,
  ExecutionContext,
  LogicResult,
  RouteDescriptor,
  RouteMatch,
  RouteParams,
  RouterRequest,
  RouterResponse,
  RuntimeContext,
  TesselConfig,
} from './types.js';
import {
  TemplateExecutionError,
  TemplateParseError,
  errorDetail,
  isNotFoundError,
} from './errors.js';
import { artifactPathFor, ArtifactStrategy } from './artifact.js';
import {
  CACHE_HEADER,
  OutputCache,
  WriteBackQueue,
  acceptsGzip,
  contentTypeFor,
  generateETag,
  respondFromCache,
} from './cache.js';
import { LogicExecutor } from './executor.js';
import { LayoutResolver } from './layout.js';
import { KeyedLocks } from './locks.js';
import { logger } from './logger.js';
import { TemplateRenderer, scanComponents } from './render.js';
import { matchRoute, normalizePath, scanApiRoutes, scanRoutes, ERROR_DIR_PREFIX } from './routes.js';
import { SubprocessStrategy } from './subprocess.js';
import { watchProject, type ProjectWatcher } from './watcher.js';

export const API_PREFIX = 'api/';

const UNLOGGED_PREFIXES = ['/.well-known', '/favicon.ico', '/robots.txt'];

export function shouldLogRequest(pathname: string): boolean {
  return !UNLOGGED_PREFIXES.some((prefix) => pathname.startsWith(prefix));
}

/**
 * Response wrapper that remembers the status actually written, so the
 * request log is right even when the status is set deep in rendering.
 */
export class StatusRecorder implements RouterResponse {
  private written = 200;

  constructor(private readonly res: RouterResponse) {}

  get status(): number {
    return this.written;
  }

  get statusCode(): number {
    return this.res.statusCode;
  }

  set statusCode(code: number) {
    this.written = code;
    this.res.statusCode = code;
  }

  get headersSent(): boolean {
    return this.res.headersSent;
  }

  setHeader(name: string, value: string | number): unknown {
    return this.res.setHeader(name, value);
  }

  end(chunk?: string | Buffer): unknown {
    return this.res.end(chunk);
  }
}

function sendText(res: RouterResponse, status: number, message: string): void {
  const body = Buffer.from(message, 'utf-8');
  res.statusCode = status;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.setHeader('Content-Length', body.length);
  res.end(body);
}

function sendBody(res: RouterResponse, status: number, contentType: string, body: Buffer): void {
  res.statusCode = status;
  res.setHeader('Content-Type', contentType);
  res.setHeader('Content-Length', body.length);
  res.end(body);
}

function firstHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function toHeaderMap(headers: IncomingHttpHeaders): Record<string, string[]> {
  const map: Record<string, string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    map[name] = Array.isArray(value) ? [...value] : [String(value)];
  }
  return map;
}

export async function readBody(req: RouterRequest): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

interface RouteTable {
  routes: RouteDescriptor[];
  apiRoutes: ApiRouteDescriptor[];
  components: string[];
}

export interface RouterOptions {
  config: TesselConfig;
  context: RuntimeContext;
  executor?: LogicExecutor;
  renderer?: TemplateRenderer;
  cache?: OutputCache;
  queue?: WriteBackQueue;
}

/**
 * Dispatches requests to API handlers or the page pipeline:
 * cache lookup → logic unit → render → respond → cache write-back.
 */
export class Router {
  readonly config: TesselConfig;
  readonly context: RuntimeContext;
  readonly routesDir: string;
  readonly apiDir: string;
  readonly componentsDir: string;
  readonly errorDir: string;
  readonly executor: LogicExecutor;
  readonly renderer: TemplateRenderer;
  readonly cache: OutputCache;
  readonly queue: WriteBackQueue;
  private table: RouteTable;
  private watcher: ProjectWatcher | null = null;

  constructor(options: RouterOptions) {
    const { config, context } = options;
    this.config = config;
    this.context = context;
    this.routesDir = path.join(context.root, 'routes');
    this.apiDir = path.join(context.root, 'api');
    this.componentsDir = path.join(context.root, 'components');
    this.errorDir = path.join(this.routesDir, ERROR_DIR_PREFIX);

    this.executor =
      options.executor ??
      new LogicExecutor([
        new ArtifactStrategy(),
        new SubprocessStrategy({ forwardStderr: context.env === 'dev' }),
      ]);
    this.renderer =
      options.renderer ??
      new TemplateRenderer({
        env: context.env,
        componentsDir: this.componentsDir,
        layouts: new LayoutResolver(context.root),
      });
    this.cache = options.cache ?? new OutputCache(path.resolve(context.root, config.outputDir));
    this.queue = options.queue ?? new WriteBackQueue(this.cache, new KeyedLocks());

    this.table = this.loadTable();
  }

  get routes(): RouteDescriptor[] {
    return this.table.routes;
  }

  get apiRoutes(): ApiRouteDescriptor[] {
    return this.table.apiRoutes;
  }

  get components(): string[] {
    return this.table.components;
  }

  private loadTable(): RouteTable {
    return {
      routes: scanRoutes(this.routesDir),
      apiRoutes: scanApiRoutes(this.apiDir),
      components: scanComponents(this.componentsDir),
    };
  }

  /** Rebuild routes, API routes and components; readers see old or new, never a mix. */
  reload(): void {
    this.table = this.loadTable();
  }

  /** Start watching the site; changes reload the table and notify onReload. */
  watch(debounceMs?: number): ProjectWatcher {
    this.watcher?.close();
    const dirs = [this.routesDir, this.apiDir, this.componentsDir, path.join(this.context.root, 'public')];
    this.watcher = watchProject(
      dirs,
      () => {
        try {
          this.reload();
        } catch (err) {
          logger.error('Reload failed', err);
          return;
        }
        logger.info('Change detected and reloaded');
        this.context.onReload?.();
      },
      { debounceMs }
    );
    return this.watcher;
  }

  /** Stop watching and wait for pending cache writes. */
  async close(): Promise<void> {
    this.watcher?.close();
    this.watcher = null;
    await this.queue.drain();
  }

  async handle(req: RouterRequest, res: RouterResponse): Promise<void> {
    const start = Date.now();
    const url = req.url ?? '/';
    const pathname = url.split('?')[0];
    const recorder = new StatusRecorder(res);

    try {
      await this.dispatch(req, recorder, url, pathname);
    } catch (err) {
      logger.error(`Unhandled error for ${pathname}`, err);
      if (!res.headersSent) {
        sendText(recorder, 500, `Internal server error: ${errorDetail(err)}`);
      }
    }

    if (this.context.env === 'dev' && shouldLogRequest(pathname)) {
      logger.request(pathname, recorder.status, Date.now() - start);
    }
  }

  private async dispatch(
    req: RouterRequest,
    res: RouterResponse,
    url: string,
    pathname: string
  ): Promise<void> {
    const cleanPath = normalizePath(url);

    if (cleanPath.startsWith(API_PREFIX)) {
      await this.handleApi(req, res, url, cleanPath.slice(API_PREFIX.length));
      return;
    }

    const match = matchRoute(cleanPath, this.table.routes);
    if (!match) {
      await this.renderErrorPage(res, 404, 'Page not found', pathname);
      return;
    }

    await this.servePage(req, res, match, url, cleanPath, pathname);
  }

  private async executionContext(
    req: RouterRequest,
    url: string,
    params: RouteParams
  ): Promise<ExecutionContext> {
    return {
      method: req.method ?? 'GET',
      url,
      headers: toHeaderMap(req.headers),
      body: await readBody(req),
      host: firstHeader(req.headers, 'host') ?? '',
      remoteAddr: req.socket.remoteAddress ?? '',
      params,
    };
  }

  private async handleApi(
    req: RouterRequest,
    res: RouterResponse,
    url: string,
    apiPath: string
  ): Promise<void> {
    const match = matchRoute(apiPath, this.table.apiRoutes);
    if (!match) {
      sendText(res, 404, 'API route not found');
      return;
    }

    let result: LogicResult;
    try {
      result = await this.executor.execute(
        match.route.logicPath,
        await this.executionContext(req, url, match.params)
      );
    } catch (err) {
      if (isNotFoundError(err)) {
        sendText(res, 404, 'Not Found');
        return;
      }
      sendText(res, 500, `Server error: ${errorDetail(err)}`);
      return;
    }

    sendBody(res, 200, 'application/json', Buffer.from(JSON.stringify(result), 'utf-8'));
  }

  private async hasLogic(logicPath: string): Promise<boolean> {
    return (await exists(logicPath)) || (await exists(artifactPathFor(logicPath)));
  }

  private async servePage(
    req: RouterRequest,
    res: RouterResponse,
    { route, params }: RouteMatch,
    url: string,
    routeKey: string,
    pathname: string
  ): Promise<void> {
    const { cache: cacheEnabled, debugHeaders } = this.config;

    if (cacheEnabled) {
      const entry = await this.cache.read(
        routeKey,
        route.ext,
        acceptsGzip(req.headers['accept-encoding'])
      );
      if (entry) {
        const outcome = respondFromCache(res, entry, {
          ifNoneMatch: firstHeader(req.headers, 'if-none-match'),
          debugHeaders,
        });
        const kind = entry.gzip ? ' (gzip)' : '';
        logger.debug(
          outcome === 'hit' ? `Cache HIT${kind}: /${routeKey}` : `304 Not Modified${kind}: /${routeKey}`
        );
        return;
      }
    }

    let data: LogicResult = {};
    if (await this.hasLogic(route.logicPath)) {
      try {
        data = await this.executor.execute(
          route.logicPath,
          await this.executionContext(req, url, params)
        );
      } catch (err) {
        if (isNotFoundError(err)) {
          await this.renderErrorPage(res, 404, 'Page not found', pathname);
          return;
        }
        sendText(res, 500, `Server logic error: ${errorDetail(err)}`);
        return;
      }
    }

    let output: string;
    try {
      output = await this.renderer.render(route.templatePath, data, this.table.components);
    } catch (err) {
      if (err instanceof TemplateParseError) {
        sendText(res, 500, `Template error: ${err.detail}`);
        return;
      }
      if (err instanceof TemplateExecutionError) {
        sendText(res, 500, `Template execution error: ${err.detail}`);
        return;
      }
      throw err;
    }

    const body = Buffer.from(output, 'utf-8');
    res.statusCode = 200;
    res.setHeader('Content-Type', contentTypeFor(route.ext));
    res.setHeader('Content-Length', body.length);
    if (cacheEnabled) {
      res.setHeader('ETag', generateETag(body));
    }
    if (debugHeaders) {
      res.setHeader(CACHE_HEADER, 'MISS');
    }
    res.end(body);

    if (cacheEnabled) {
      this.queue.enqueue({ routeKey, ext: route.ext, data: body });
    }
  }

  /**
   * routes/_error/<status>.html, then routes/_error/index.html, then a bare
   * "<status> - <message>" line.
   */
  async renderErrorPage(
    res: RouterResponse,
    status: number,
    message: string,
    pathname: string
  ): Promise<void> {
    const data = {
      Title: `${status} - ${message}`,
      StatusCode: status,
      Message: message,
      Path: pathname,
      Description: message,
    };

    const candidates = [
      path.join(this.errorDir, `${status}.html`),
      path.join(this.errorDir, 'index.html'),
    ];

    for (const file of candidates) {
      if (!(await exists(file))) continue;
      try {
        const html = await this.renderer.render(file, data, this.table.components);
        sendBody(res, status, contentTypeFor('html'), Buffer.from(html, 'utf-8'));
        return;
      } catch (err) {
        logger.error(`Could not render error page ${path.relative(this.context.root, file)}: ${errorDetail(err)}`);
      }
    }

    sendText(res, status, `${status} - ${message}`);
  }
}

export function createRouter(config: TesselConfig, context: RuntimeContext): Router {
  const router = new Router({ config, context });
  if (context.enableWatch) {
    router.watch();
  }
  return router;
}
