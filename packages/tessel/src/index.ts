export type {
  RouteParams,
  LogicResult,
  TesselEnv,
  TesselConfig,
  RuntimeContext,
  RouteDescriptor,
  ApiRouteDescriptor,
  RouteMatch,
  ExecutionContext,
  LogicRequest,
  LogicHandler,
  RouterRequest,
  RouterResponse,
} from './types.js';

export {
  TesselError,
  NotFoundError,
  InvalidPluginError,
  LogicExecutionError,
  MalformedResultError,
  TemplateParseError,
  TemplateExecutionError,
  ConfigError,
  notFound,
  isNotFoundError,
} from './errors.js';

export { defineConfig, validateConfig, loadConfig, DEFAULT_CONFIG } from './config.js';
export { scanRoutes, scanApiRoutes, matchRoute, normalizePath } from './routes.js';
export { TemplateRenderer } from './render.js';
export { LayoutResolver } from './layout.js';
export { OutputCache, WriteBackQueue, generateETag } from './cache.js';
export { LogicExecutor, type LogicStrategy } from './executor.js';
export { ArtifactStrategy } from './artifact.js';
export { SubprocessStrategy } from './subprocess.js';
export { buildLogicUnits } from './build.js';
export {
  checkTemplates,
  projectInfo,
  formatProjectInfo,
  initProject,
  type TemplateCheck,
  type ProjectInfo,
  type InitResult,
} from './commands.js';
export { Router, createRouter, StatusRecorder } from './router.js';
export { watchProject } from './watcher.js';
export { LiveReloader } from './live-reload.js';
export { startServer, type TesselServer } from './server.js';
export { logger } from './logger.js';
