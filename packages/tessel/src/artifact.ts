import fs from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ExecutionContext, LogicResult, RouteParams, LogicRequest } from './types.js';
import type { LogicStrategy } from './executor.js';
import { toLogicResult } from './executor.js';
import { InvalidPluginError } from './errors.js';
import { createLogicRequest } from './request.js';

export const ARTIFACT_EXT = '.mjs';

type LoadedHandler = (request: LogicRequest, params: RouteParams) => Promise<unknown>;

export type ModuleImporter = (url: string) => Promise<unknown>;

/** routes/posts/_id/index.server.ts → routes/posts/_id/index.server.mjs */
export function artifactPathFor(logicPath: string): string {
  const ext = path.extname(logicPath);
  return logicPath.slice(0, logicPath.length - ext.length) + ARTIFACT_EXT;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check the shape of a loaded artifact: it must export a handleRequest
 * function taking (request, params).
 */
export function resolveHandler(mod: unknown, artifactPath: string): LoadedHandler {
  if (typeof mod !== 'object' || mod === null || !('handleRequest' in mod)) {
    throw new InvalidPluginError(artifactPath, 'missing "handleRequest" export');
  }

  const handler = mod.handleRequest;
  if (typeof handler !== 'function') {
    throw new InvalidPluginError(artifactPath, '"handleRequest" is not a function');
  }
  if (handler.length > 2) {
    throw new InvalidPluginError(
      artifactPath,
      `"handleRequest" takes ${handler.length} parameters, expected (request, params)`
    );
  }

  return async (request, params) => {
    const result: unknown = await handler(request, params);
    return result;
  };
}

/**
 * Runs a precompiled index.server.mjs next to the logic unit, in process.
 * Loaded modules are kept for the life of the strategy.
 */
export class ArtifactStrategy implements LogicStrategy {
  readonly name = 'artifact';
  private readonly handles = new Map<string, Promise<LoadedHandler>>();

  constructor(private readonly importer: ModuleImporter = (url) => import(url)) {}

  async execute(logicPath: string, context: ExecutionContext): Promise<LogicResult | undefined> {
    const artifactPath = artifactPathFor(logicPath);
    if (!(await exists(artifactPath))) return undefined;

    const handler = await this.load(artifactPath);
    const result = await handler(createLogicRequest(context), context.params);
    return toLogicResult(result, artifactPath);
  }

  private load(artifactPath: string): Promise<LoadedHandler> {
    let handle = this.handles.get(artifactPath);
    if (!handle) {
      handle = this.importer(pathToFileURL(artifactPath).href).then((mod) =>
        resolveHandler(mod, artifactPath)
      );
      this.handles.set(artifactPath, handle);
      handle.catch(() => this.handles.delete(artifactPath));
    }
    return handle;
  }
}
