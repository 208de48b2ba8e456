/**
 * Context sync server
 *
 * One HTTP server hosts everything:
 * - /data   WebSocket endpoint speaking the staged protocol
 * - /ping   WebSocket endpoint answering every text frame with "pong"
 * - /health plain HTTP liveness check
 *
 * Each /data connection owns its ServerSession; the only thing connections
 * share is the model client.
 */

import * as http from 'http';
import type { AddressInfo } from 'net';
import express, { type Express } from 'express';
import { WebSocketServer, type WebSocket } from 'ws';
import { ConnectionClosedError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ModelClient } from '../model/modelClient.js';
import { encodeResponse } from '../protocol/envelope.js';
import { ServerSession } from '../protocol/serverSession.js';
import type { DebugSnapshotWriter } from '../server/debugSnapshot.js';
import { CloseCode, describeCloseCode, isGracefulClose } from '../transport/closeCodes.js';
import { WebSocketChannel } from '../transport/wsChannel.js';
import { createHealthRouter, type HealthSource } from './routes/health.js';

export const DATA_PATH = '/data';
export const PING_PATH = '/ping';

export interface ContextSyncServerOptions {
  model: ModelClient;
  logger: Logger;
  debugSnapshot?: DebugSnapshotWriter;
}

export function parseAddr(addr: string): { host: string | undefined; port: number } {
  const separator = addr.lastIndexOf(':');
  const host = separator >= 0 ? addr.slice(0, separator) : '';
  const portText = separator >= 0 ? addr.slice(separator + 1) : addr;
  const port = Number.parseInt(portText, 10);

  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new Error(`Invalid address "${addr}": expected host:port`);
  }
  return { host: host === '' ? undefined : host, port };
}

export class ContextSyncServer implements HealthSource {
  readonly app: Express;
  readonly startedAt = new Date();
  private readonly httpServer: http.Server;
  private readonly wss: WebSocketServer;
  private readonly model: ModelClient;
  private readonly logger: Logger;
  private readonly debugSnapshot: DebugSnapshotWriter | undefined;
  private readonly channels = new Set<WebSocketChannel>();

  constructor(options: ContextSyncServerOptions) {
    this.model = options.model;
    this.logger = options.logger.child('Server');
    this.debugSnapshot = options.debugSnapshot;

    this.app = express();
    this.app.use(createHealthRouter(this));

    this.httpServer = http.createServer(this.app);
    this.wss = new WebSocketServer({ noServer: true });

    this.httpServer.on('upgrade', (req, socket, head) => {
      const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
      if (pathname !== DATA_PATH && pathname !== PING_PATH) {
        this.logger.warn(`Rejecting upgrade for unknown path: ${pathname}`);
        socket.destroy();
        return;
      }

      this.wss.handleUpgrade(req, socket, head, (ws) => {
        const clientIp = req.socket.remoteAddress ?? 'unknown';
        if (pathname === DATA_PATH) {
          this.serveData(ws, clientIp);
        } else {
          this.servePing(ws);
        }
      });
    });
  }

  get modelName(): string {
    return this.model.modelName;
  }

  activeConnections(): number {
    return this.channels.size;
  }

  listen(addr: string): Promise<AddressInfo> {
    const { host, port } = parseAddr(addr);

    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.httpServer.once('error', onError);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', onError);
        try {
          const address = this.address();
          this.logger.info(`Listening on ${address.address}:${address.port}`);
          resolve(address);
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  /** @throws Error when the server is not listening on a TCP port */
  address(): AddressInfo {
    const address = this.httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP address');
    }
    return address;
  }

  /**
   * Close every open connection with "going away" and stop listening.
   */
  async close(): Promise<void> {
    await Promise.all(Array.from(this.channels, (channel) => channel.close(CloseCode.GoingAway, 'server shutting down')));
    // Ping sockets have no channel
    for (const ws of this.wss.clients) {
      ws.close(CloseCode.GoingAway, 'server shutting down');
    }

    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
    });

    await this.debugSnapshot?.flush();
    this.logger.info('Server stopped');
  }

  private serveData(ws: WebSocket, clientIp: string): void {
    const logger = this.logger.child('Connection', { client_ip: clientIp });
    const channel = new WebSocketChannel(ws, logger);
    const session = new ServerSession({ model: this.model, logger, debugSnapshot: this.debugSnapshot });

    this.channels.add(channel);
    logger.info('Client connected');

    void this.runConnection(channel, session, logger)
      .catch((error: unknown) => {
        logger.error('Connection failed', { error: errorMessage(error) });
        return channel.close(CloseCode.InternalServerError, 'internal error');
      })
      .finally(() => {
        this.channels.delete(channel);
      });
  }

  private async runConnection(channel: WebSocketChannel, session: ServerSession, logger: Logger): Promise<void> {
    for (;;) {
      let raw: string;
      try {
        raw = await channel.receive();
      } catch (error) {
        if (error instanceof ConnectionClosedError) {
          const message = `Client disconnected: ${describeCloseCode(error.closeCode)}`;
          if (isGracefulClose(error.closeCode)) {
            logger.info(message);
          } else {
            logger.warn(message, { reason: error.message });
          }
          return;
        }
        throw error;
      }

      const action = await session.handle(raw);
      switch (action.kind) {
        case 'ignore':
          break;
        case 'reply':
          await channel.send(encodeResponse(action.response));
          break;
        case 'close':
          logger.warn(`Closing connection: ${action.reason}`, { code: action.code });
          await channel.close(action.code, action.reason);
          return;
      }
    }
  }

  private servePing(ws: WebSocket): void {
    ws.on('message', (_data, isBinary) => {
      if (!isBinary) {
        ws.send('pong');
      }
    });
  }
}
