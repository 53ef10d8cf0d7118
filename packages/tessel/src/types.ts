import type { IncomingHttpHeaders } from 'node:http';

export type RouteParams = Record<string, string>;

/** Data returned by a logic unit, handed to the page template. */
export type LogicResult = Record<string, unknown>;

export type TesselEnv = 'dev' | 'prod';

/** Site configuration, read from tessel.config.json. */
export interface TesselConfig {
  /** Directory for cached render output, relative to the site root. Defaults to './cache'. */
  outputDir: string;
  /** Serve from and write into the output cache. */
  cache: boolean;
  /** Add X-Tessel-Cache headers to page responses. */
  debugHeaders: boolean;
  /** Print cache and queue activity. */
  debugLogs: boolean;
}

export interface RuntimeContext {
  env: TesselEnv;
  /** Absolute site root. routes/, api/ and components/ are resolved from here. */
  root: string;
  enableWatch?: boolean;
  /** Called after a file change has been picked up. */
  onReload?: () => void;
}

export interface RouteDescriptor {
  /** Display form, e.g. '/posts/:id' */
  path: string;
  /** Matches the slash-trimmed request path. */
  pattern: RegExp;
  paramKeys: string[];
  /** Segment text after the '_' sentinel, e.g. 'id.json' */
  paramRawKeys: string[];
  templatePath: string;
  logicPath: string;
  dir: string;
  /** Extension of the page template without the dot ('html', 'xml'). */
  ext: string;
}

export interface ApiRouteDescriptor {
  path: string;
  method: 'ANY';
  pattern: RegExp;
  paramKeys: string[];
  paramRawKeys: string[];
  logicPath: string;
  dir: string;
}

export interface RouteMatch<R extends { paramKeys: string[] } = RouteDescriptor> {
  route: R;
  params: RouteParams;
}

/**
 * Snapshot of an incoming request, serialized into the logic unit's runner.
 * Plain JSON so it can cross a process boundary.
 */
export interface ExecutionContext {
  method: string;
  /** Path and query as received, e.g. '/posts/42?ref=home' */
  url: string;
  headers: Record<string, string[]>;
  body: string;
  host: string;
  remoteAddr: string;
  params: RouteParams;
}

/** The request object a logic unit receives. */
export interface LogicRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string;
  host: string;
  remoteAddr: string;
  query: URLSearchParams;
  /** urlencoded body fields followed by query fields */
  form: URLSearchParams;
  json(): unknown;
}

export type LogicHandler = (
  request: LogicRequest,
  params: RouteParams
) => Promise<LogicResult> | LogicResult;

/**
 * The parts of an incoming request the router reads. Node's IncomingMessage
 * satisfies it.
 */
export interface RouterRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string };
}

/** The parts of a response the router writes. Node's ServerResponse satisfies it. */
export interface RouterResponse {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string | number): unknown;
  end(chunk?: string | Buffer): unknown;
}
