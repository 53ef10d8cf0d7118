import http from 'node:http';
import type { TesselConfig, TesselEnv } from './types.js';
import { LiveReloader } from './live-reload.js';
import { logger } from './logger.js';
import { createRouter, type Router } from './router.js';

export const DEFAULT_PORT = 8080;

export interface ServerOptions {
  root: string;
  env: TesselEnv;
  config: TesselConfig;
  port?: number;
  /** Defaults to true in dev. */
  watch?: boolean;
}

export interface TesselServer {
  server: http.Server;
  router: Router;
  port: number;
  close(): Promise<void>;
}

/**
 * HTTP bootstrap. In dev, also serves the live-reload socket and watches the
 * site for changes.
 */
export async function startServer(options: ServerOptions): Promise<TesselServer> {
  const { root, env, config } = options;
  const reloader = env === 'dev' ? new LiveReloader() : null;

  const router = createRouter(config, {
    env,
    root,
    enableWatch: options.watch ?? env === 'dev',
    onReload: reloader ? () => reloader.broadcast() : undefined,
  });

  const server = http.createServer((req, res) => {
    router.handle(req, res).catch((err: unknown) => {
      logger.error(`Request failed: ${req.url ?? ''}`, err);
    });
  });

  if (reloader) {
    server.on('upgrade', (req, socket, head) => {
      if (!reloader.handleUpgrade(req, socket, head)) {
        socket.destroy();
      }
    });
  }

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port ?? DEFAULT_PORT, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : options.port ?? DEFAULT_PORT;
  logger.info(`Serving ${root} on http://localhost:${port} (${env})`);

  return {
    server,
    router,
    port,
    async close() {
      await reloader?.close();
      server.closeIdleConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await router.close();
    },
  };
}
