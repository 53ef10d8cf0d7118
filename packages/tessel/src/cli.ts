/**
 * Tessel CLI
 *
 * Usage:
 *   tessel dev [--port 8080]              Serve with live reload, no output cache
 *   tessel prod [--port 8080] [--no-cache]  Serve with the output cache on
 *   tessel build                          Precompile logic units to .mjs artifacts
 *   tessel clean [route]                  Delete the output cache, or one route's entry
 *   tessel check                          Parse and execute every route's templates
 *   tessel info                           Print the config and a project summary
 *   tessel init [dir]                     Create a starter site
 *
 * Run from the site root (the directory holding tessel.config.json).
 */

import path from 'node:path';
import { parseArgs } from 'node:util';
import type { TesselEnv } from './types.js';
import { buildLogicUnits } from './build.js';
import { OutputCache } from './cache.js';
import { checkTemplates, formatProjectInfo, initProject, projectInfo } from './commands.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { normalizePath } from './routes.js';
import { DEFAULT_PORT, startServer } from './server.js';

const root = process.cwd();

function parsePort(value: string | undefined): number {
  if (value === undefined) return Number(process.env.PORT ?? DEFAULT_PORT);
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function serve(env: TesselEnv, args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      port: { type: 'string', short: 'p' },
      'no-cache': { type: 'boolean', default: false },
    },
  });

  const config = loadConfig(root);
  logger.setDebug(config.debugLogs);

  const cache = env === 'prod' && !values['no-cache'];
  const server = await startServer({
    root,
    env,
    config: { ...config, cache },
    port: parsePort(values.port),
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function build() {
  logger.info('Building logic units...');
  const built = await buildLogicUnits(root);
  logger.info(`Built ${built.length} logic unit(s)`);
}

async function clean(route: string | undefined) {
  const config = loadConfig(root);
  const cache = new OutputCache(path.resolve(root, config.outputDir));

  if (route === undefined) {
    await cache.clear();
    logger.info(`Removed ${config.outputDir}`);
    return;
  }

  const routeKey = normalizePath(route);
  await cache.clear(routeKey);
  logger.info(`Removed cache for /${routeKey}`);
}

async function check() {
  const results = await checkTemplates(root);
  for (const result of results) {
    if (result.ok) console.log(`  ok    ${result.route}`);
    else console.log(`  FAIL  ${result.route}: ${result.error}`);
  }

  const failed = results.filter((result) => !result.ok).length;
  if (failed > 0) {
    logger.error(`${failed} of ${results.length} route(s) failed`);
    process.exit(1);
  }
  logger.info(`All ${results.length} route(s) rendered`);
}

function info() {
  const config = loadConfig(root);
  for (const line of formatProjectInfo(projectInfo(root, config))) {
    console.log(line);
  }
}

function init(dir: string | undefined) {
  const target = path.resolve(root, dir ?? '.');
  logger.info(`Creating a tessel site in ${target}`);

  const { written, skipped } = initProject(target);
  for (const file of written) console.log(`  created  ${file}`);
  for (const file of skipped) console.log(`  exists   ${file}`);

  logger.info('Done. Next: npm install && npx tessel dev');
}

function fail(label: string) {
  return (err: unknown) => {
    logger.error(`${label} failed: ${errorMessage(err)}`);
    process.exit(1);
  };
}

// ── CLI entry point ──────────────────────────────────────────────

const [command, ...rest] = process.argv.slice(2);

switch (command) {
  case 'dev':
  case 'prod':
    serve(command, rest).catch(fail('Server'));
    break;

  case 'build':
    build().catch(fail('Build'));
    break;

  case 'clean':
    clean(rest[0]).catch(fail('Clean'));
    break;

  case 'check':
    check().catch(fail('Check'));
    break;

  case 'info':
    try {
      info();
    } catch (err) {
      fail('Info')(err);
    }
    break;

  case 'init':
    try {
      init(rest[0]);
    } catch (err) {
      fail('Init')(err);
    }
    break;

  default:
    console.log(`
Usage: tessel <command>

Commands:
  dev [--port N]              Serve with live reload, no output cache
  prod [--port N] [--no-cache]  Serve with the output cache on
  build                       Precompile logic units
  clean [route]               Delete the output cache, or one route's entry
  check                       Parse and execute every route's templates
  info                        Print the config and a project summary
  init [dir]                  Create a starter site
`);
    process.exit(command ? 1 : 0);
}
