import path from 'node:path';
import { build } from 'esbuild';
import { artifactPathFor } from './artifact.js';
import { scanApiRoutes, scanRoutes } from './routes.js';
import { existsSync } from 'node:fs';
import { logger } from './logger.js';

/** Every logic unit under routes/ and api/ that exists on disk. */
export function findLogicUnits(root: string): string[] {
  const pages = scanRoutes(path.join(root, 'routes')).map((route) => route.logicPath);
  const apis = scanApiRoutes(path.join(root, 'api')).map((route) => route.logicPath);
  return [...pages, ...apis].filter((file) => existsSync(file));
}

/**
 * Precompile logic units into the .mjs artifacts the artifact strategy loads.
 * Third-party imports stay external and resolve from the site's node_modules.
 */
export async function buildLogicUnits(root: string): Promise<string[]> {
  const units = findLogicUnits(root);
  const built: string[] = [];

  for (const unit of units) {
    const outfile = artifactPathFor(unit);
    await build({
      entryPoints: [unit],
      outfile,
      bundle: true,
      platform: 'node',
      format: 'esm',
      target: 'node20',
      packages: 'external',
      logLevel: 'silent',
    });
    logger.info(`  built: ${path.relative(root, outfile)}`);
    built.push(outfile);
  }

  return built;
}
