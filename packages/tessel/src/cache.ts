import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import pLimit, { type LimitFunction } from 'p-limit';
import { TesselError } from './errors.js';
import type { KeyedLocks } from './locks.js';
import { logger } from './logger.js';
import type { RouterResponse } from './types.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const CACHE_HEADER = 'X-Tessel-Cache';

export const DEFAULT_QUEUE_CAPACITY = 100;

/** Weak tag over the first 8 bytes of the SHA-256 digest: W/"1a2b3c4d5e6f7a8b" */
export function generateETag(data: Buffer | string): string {
  const digest = createHash('sha256').update(data).digest();
  return `W/"${digest.subarray(0, 8).toString('hex')}"`;
}

export function contentTypeFor(ext: string): string {
  return ext === 'xml' ? 'application/xml' : 'text/html';
}

/** True when Accept-Encoding lists gzip with a non-zero q-value. */
export function acceptsGzip(header: string | string[] | undefined): boolean {
  const value = Array.isArray(header) ? header.join(',') : header ?? '';
  return value.split(',').some((part) => {
    const [coding, ...params] = part.split(';');
    if (coding.trim().toLowerCase() !== 'gzip') return false;
    const q = params.map((p) => p.trim()).find((p) => p.toLowerCase().startsWith('q='));
    return q === undefined || Number(q.slice(2)) > 0;
  });
}

export interface CachedOutput {
  data: Buffer;
  etag: string;
  ext: string;
  gzip: boolean;
}

/** Anything that can persist rendered output for a route. */
export interface CacheWriter {
  write(routeKey: string, ext: string, data: Buffer): Promise<void>;
}

/**
 * Disk-backed output cache. Every entry is stored raw and as a gzip twin:
 *
 *   <outputDir>/<routeKey>/index.<ext>
 *   <outputDir>/<routeKey>/index.<ext>.gz
 *
 * Both representations carry the tag of the raw bytes, which is also the tag
 * sent with the response that produced the entry. Nothing is held in memory;
 * each read goes to disk.
 */
export class OutputCache implements CacheWriter {
  constructor(readonly outputDir: string) {}

  /** Directory of a route's entries; keys that resolve outside outputDir throw. */
  entryDir(routeKey: string): string {
    const dir = path.resolve(this.outputDir, routeKey);
    const rel = path.relative(path.resolve(this.outputDir), dir);
    if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new TesselError(`cache key "${routeKey}" escapes ${this.outputDir}`);
    }
    return dir;
  }

  entryPath(routeKey: string, ext: string): string {
    return path.join(this.entryDir(routeKey), `index.${ext}`);
  }

  async read(routeKey: string, ext: string, preferGzip: boolean): Promise<CachedOutput | null> {
    const file = this.entryPath(routeKey, ext);

    if (preferGzip) {
      const data = await readIfExists(`${file}.gz`);
      if (data) return { data, etag: generateETag(await gunzipAsync(data)), ext, gzip: true };
    }

    const data = await readIfExists(file);
    if (data) return { data, etag: generateETag(data), ext, gzip: false };

    return null;
  }

  /** Overwrite both representations. */
  async write(routeKey: string, ext: string, data: Buffer): Promise<void> {
    const file = this.entryPath(routeKey, ext);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, data);
    await fs.writeFile(`${file}.gz`, await gzipAsync(data));
  }

  /**
   * Remove one route's entries, or the whole output directory. Entries of
   * nested routes are kept when clearing a single route.
   */
  async clear(routeKey?: string): Promise<void> {
    if (routeKey === undefined) {
      await fs.rm(this.outputDir, { recursive: true, force: true });
      return;
    }

    const dir = this.entryDir(routeKey);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (isMissing(err)) return;
      throw err;
    }
    await Promise.all(
      names
        .filter((name) => name.startsWith('index.'))
        .map((name) => fs.rm(path.join(dir, name), { force: true }))
    );
  }
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR' || err.code === 'EISDIR')
  );
}

export interface RespondOptions {
  ifNoneMatch: string | undefined;
  debugHeaders: boolean;
}

/**
 * Answer a request from a cache entry: 304 when the client's tag matches,
 * otherwise 200 with the stored bytes.
 */
export function respondFromCache(
  res: RouterResponse,
  entry: CachedOutput,
  options: RespondOptions
): 'hit' | 'not-modified' {
  if (options.ifNoneMatch === entry.etag) {
    res.statusCode = 304;
    res.end();
    return 'not-modified';
  }

  res.statusCode = 200;
  res.setHeader('ETag', entry.etag);
  res.setHeader('Content-Type', contentTypeFor(entry.ext));
  res.setHeader('Content-Length', entry.data.length);
  if (entry.gzip) {
    res.setHeader('Content-Encoding', 'gzip');
    res.setHeader('Vary', 'Accept-Encoding');
  }
  if (options.debugHeaders) {
    res.setHeader(CACHE_HEADER, 'HIT');
  }
  res.end(entry.data);
  return 'hit';
}

export interface CacheWriteJob {
  routeKey: string;
  ext: string;
  data: Buffer;
}

export interface WriteBackQueueOptions {
  capacity?: number;
}

/**
 * FIFO of pending cache writes with a single consumer. Each write runs under
 * its route key's lock. When the queue is at capacity the write starts right
 * away instead of waiting its turn; nothing is dropped.
 */
export class WriteBackQueue {
  private readonly limit: LimitFunction = pLimit(1);
  private readonly inFlight = new Set<Promise<void>>();
  readonly capacity: number;

  constructor(
    private readonly writer: CacheWriter,
    private readonly locks: KeyedLocks,
    options: WriteBackQueueOptions = {}
  ) {
    this.capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
  }

  /** Writes waiting for or held by the consumer. */
  get pending(): number {
    return this.limit.activeCount + this.limit.pendingCount;
  }

  enqueue(job: CacheWriteJob): 'queued' | 'immediate' {
    const { routeKey } = job;
    const persist = () =>
      this.locks.run(routeKey, () => this.writer.write(routeKey, job.ext, job.data));

    let mode: 'queued' | 'immediate';
    let task: Promise<void>;
    if (this.pending < this.capacity) {
      mode = 'queued';
      logger.debug(`Enqueued cache write: /${routeKey}`);
      task = this.limit(persist);
    } else {
      mode = 'immediate';
      logger.debug(`Cache queue full, writing immediately: /${routeKey}`);
      task = persist();
    }

    const tracked: Promise<void> = task
      .then(
        () => logger.debug(`Cache write complete (${mode}): /${routeKey}`),
        (err: unknown) => logger.error(`Cache write failed (${mode}): /${routeKey}`, err)
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);

    return mode;
  }

  /** Resolves once every write accepted so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
