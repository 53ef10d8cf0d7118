import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer } from 'ws';
import { LIVE_RELOAD_PATH } from './render.js';
import { logger } from './logger.js';

/**
 * WebSocket endpoint the injected dev snippet connects to. Shares the HTTP
 * server's port through upgrade handling.
 */
export class LiveReloader {
  private readonly wss = new WebSocketServer({ noServer: true });

  get clientCount(): number {
    return this.wss.clients.size;
  }

  /** Take over an upgrade for the reload path; returns false for any other path. */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const pathname = (req.url ?? '').split('?')[0];
    if (pathname !== LIVE_RELOAD_PATH) return false;

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit('connection', ws, req);
    });
    return true;
  }

  /** Tell every open client to reload. Returns how many were told. */
  broadcast(message = 'reload'): number {
    let sent = 0;
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
        sent++;
      }
    }
    logger.debug(`Live reload sent to ${sent} client(s)`);
    return sent;
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
