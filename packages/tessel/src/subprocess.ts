/**
 * Compile-and-run strategy.
 *
 * For a logic unit without a precompiled artifact, a small runner program is
 * generated next to the unit's package root:
 *
 *   <root>/.tessel-tmp/<hash>/runner.ts   imports the handler, rebuilds the
 *                                          request, prints the result as JSON
 *   <root>/.tessel-tmp/<hash>/runner.mjs  esbuild bundle of the above
 *
 * The bundle runs under the current Node binary with the package root as its
 * working directory. The scratch directory is removed afterwards whatever
 * the outcome.
 */

import { spawn } from 'node:child_process';
import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { build, transform } from 'esbuild';
import type { ExecutionContext, LogicResult } from './types.js';
import type { LogicStrategy } from './executor.js';
import { toLogicResult } from './executor.js';
import {
  LogicExecutionError,
  MalformedResultError,
  NOT_FOUND_CODE,
  NOT_FOUND_EXIT_CODE,
  NOT_FOUND_SENTINEL,
  NotFoundError,
  errorMessage,
} from './errors.js';
import { logger } from './logger.js';

export const TMP_DIR = '.tessel-tmp';

export interface SpawnResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface SubprocessStrategyOptions {
  /** Bundle the runner source at `entry` into `outfile`. */
  compile?: (entry: string, outfile: string) => Promise<void>;
  /** Best-effort source normalization before compiling. */
  format?: (source: string) => Promise<string>;
  /** Run the bundled runner with `cwd` as working directory. */
  spawn?: (script: string, cwd: string, onStderr?: (chunk: string) => void) => Promise<SpawnResult>;
  now?: () => bigint;
  /** Echo the runner's stderr to this process's stderr as it arrives. */
  forwardStderr?: boolean;
}

function getModuleDir(): string {
  return path.dirname(fileURLToPath(import.meta.url));
}

/**
 * Locate the module that rebuilds the request inside the runner. From source
 * (vitest, monorepo) it is request.ts beside this file; from dist it is
 * request.js.
 */
export function resolveRequestModule(moduleDir = getModuleDir()): string {
  const ts = path.join(moduleDir, 'request.ts');
  if (existsSync(ts)) return ts;
  return path.join(moduleDir, 'request.js');
}

/** Nearest directory at or above the file holding a package.json. */
export function findModuleRoot(file: string): string {
  let dir = path.dirname(path.resolve(file));
  for (;;) {
    if (existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new LogicExecutionError(`no package.json found above ${file}`);
    }
    dir = parent;
  }
}

/** Import specifier for `target` as seen from a file in `fromDir`. */
export function importSpecifier(fromDir: string, target: string): string {
  const rel = path.relative(fromDir, target).split(path.sep).join('/');
  return rel.startsWith('.') ? rel : `./${rel}`;
}

export interface RunnerSource {
  handlerImport: string;
  requestImport: string;
  context: ExecutionContext;
}

export function renderRunner({ handlerImport, requestImport, context }: RunnerSource): string {
  return `import { handleRequest } from ${JSON.stringify(handlerImport)};
import { createLogicRequest } from ${JSON.stringify(requestImport)};

const context = ${JSON.stringify(context)};

async function main() {
  const request = createLogicRequest(context);
  const result = await handleRequest(request, context.params);
  process.stdout.write(JSON.stringify(result ?? {}));
}

main().catch((err) => {
  if (err && err.code === ${JSON.stringify(NOT_FOUND_CODE)}) {
    process.stderr.write(${JSON.stringify(NOT_FOUND_SENTINEL + '\n')});
    process.exitCode = ${NOT_FOUND_EXIT_CODE};
    return;
  }
  process.stderr.write(String(err && err.stack ? err.stack : err) + "\\n");
  process.exitCode = 1;
});
`;
}

/** Scratch directory name: hash of the handler path and a high-resolution timestamp. */
export function scratchName(absPath: string, now: bigint): string {
  return createHash('sha256').update(`${absPath}${now}`).digest('hex').slice(0, 16);
}

function hasNotFoundSentinel(stderr: string): boolean {
  return stderr.split('\n').some((line) => line.trimStart().startsWith(NOT_FOUND_SENTINEL));
}

/**
 * Map a finished runner to a result or a typed error. The dedicated exit code
 * (or the sentinel line on stderr) means not found.
 */
export function interpretRun(run: SpawnResult, logicPath: string): LogicResult {
  if (run.code === NOT_FOUND_EXIT_CODE || (run.code !== 0 && hasNotFoundSentinel(run.stderr))) {
    throw new NotFoundError();
  }
  if (run.code !== 0) {
    const detail = run.stderr.trim() || `exit code ${run.code}`;
    throw new LogicExecutionError(`${logicPath} failed: ${detail}`, run.stderr);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(run.stdout);
  } catch (err) {
    throw new MalformedResultError(
      `${logicPath} printed invalid JSON: ${errorMessage(err)}`,
      { cause: err }
    );
  }
  return toLogicResult(parsed, logicPath);
}

export async function compileRunner(entry: string, outfile: string): Promise<void> {
  await build({
    entryPoints: [entry],
    outfile,
    bundle: true,
    platform: 'node',
    format: 'esm',
    target: 'node20',
    packages: 'external',
    logLevel: 'silent',
  });
}

export async function formatRunner(source: string): Promise<string> {
  const result = await transform(source, { loader: 'ts', format: 'esm', target: 'node20' });
  return result.code;
}

export function spawnRunner(
  script: string,
  cwd: string,
  onStderr?: (chunk: string) => void
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, [script], {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
      onStderr?.(chunk);
    });

    child.on('error', reject);
    child.on('close', (code) => resolve({ code, stdout, stderr }));
  });
}

export class SubprocessStrategy implements LogicStrategy {
  readonly name = 'subprocess';
  private readonly compile: (entry: string, outfile: string) => Promise<void>;
  private readonly format: (source: string) => Promise<string>;
  private readonly spawn: NonNullable<SubprocessStrategyOptions['spawn']>;
  private readonly now: () => bigint;
  private readonly forwardStderr: boolean;

  constructor(options: SubprocessStrategyOptions = {}) {
    this.compile = options.compile ?? compileRunner;
    this.format = options.format ?? formatRunner;
    this.spawn = options.spawn ?? spawnRunner;
    this.now = options.now ?? (() => process.hrtime.bigint());
    this.forwardStderr = options.forwardStderr ?? false;
  }

  async execute(logicPath: string, context: ExecutionContext): Promise<LogicResult> {
    const absPath = path.resolve(logicPath);
    const root = findModuleRoot(absPath);
    const runDir = path.join(root, TMP_DIR, scratchName(absPath, this.now()));

    try {
      await fs.mkdir(runDir, { recursive: true });

      const source = renderRunner({
        handlerImport: importSpecifier(runDir, absPath),
        requestImport: resolveRequestModule(),
        context,
      });

      const entry = path.join(runDir, 'runner.ts');
      await fs.writeFile(entry, await this.tryFormat(source, absPath), 'utf-8');

      const outfile = path.join(runDir, 'runner.mjs');
      try {
        await this.compile(entry, outfile);
      } catch (err) {
        throw new LogicExecutionError(`could not compile ${logicPath}: ${errorMessage(err)}`, '', {
          cause: err,
        });
      }

      const onStderr = this.forwardStderr
        ? (chunk: string) => {
            process.stderr.write(chunk);
          }
        : undefined;
      const run = await this.spawn(outfile, root, onStderr);
      return interpretRun(run, logicPath);
    } finally {
      await fs.rm(runDir, { recursive: true, force: true });
    }
  }

  private async tryFormat(source: string, absPath: string): Promise<string> {
    try {
      return await this.format(source);
    } catch (err) {
      logger.warn(`Could not format runner for ${absPath}: ${errorMessage(err)}`);
      return source;
    }
  }
}
