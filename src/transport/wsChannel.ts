import WebSocket from 'ws';
import { ConnectionClosedError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { InboundQueue, type MessageChannel } from './channel.js';
import { CloseCode, describeCloseCode } from './closeCodes.js';

/** How long to wait for the peer's close frame before dropping the socket */
const CLOSE_HANDSHAKE_TIMEOUT_MS = 1000;

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface ConnectOptions {
  connectTimeoutMs?: number;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

/**
 * MessageChannel over a `ws` socket. Text frames are queued as they arrive;
 * binary frames are not part of the protocol and are dropped.
 */
export class WebSocketChannel implements MessageChannel {
  private readonly socket: WebSocket;
  private readonly logger: Logger;
  private readonly inbound = new InboundQueue();

  constructor(socket: WebSocket, logger: Logger) {
    this.socket = socket;
    this.logger = logger;

    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        this.logger.warn('Dropping binary frame');
        return;
      }
      this.inbound.push(rawDataToString(data));
    });

    socket.on('close', (code, reason) => {
      const text = reason.toString('utf-8');
      this.logger.debug(`Connection closed: ${describeCloseCode(code)}`, { code, reason: text });
      this.inbound.close(code, text);
    });

    socket.on('error', (error) => {
      this.logger.error('WebSocket error', { error: errorMessage(error) });
    });
  }

  /**
   * Open a client connection.
   *
   * @throws ConnectionClosedError when the handshake fails
   */
  static connect(url: string, logger: Logger, options: ConnectOptions = {}): Promise<WebSocketChannel> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, {
        handshakeTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      });

      const onError = (error: Error): void => {
        socket.off('open', onOpen);
        reject(new ConnectionClosedError(CloseCode.AbnormalClosure, `failed to connect to ${url}: ${error.message}`));
      };
      const onOpen = (): void => {
        socket.off('error', onError);
        logger.info(`Connected to ${url}`);
        resolve(new WebSocketChannel(socket, logger));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }

  get closed(): boolean {
    return this.inbound.isClosed || this.socket.readyState !== WebSocket.OPEN;
  }

  send(text: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionClosedError(CloseCode.AbnormalClosure, 'socket is not open'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(text, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<string> {
    return this.inbound.next();
  }

  /**
   * Start the close handshake and resolve once the socket is closed. If the
   * peer does not answer in time the socket is terminated.
   */
  close(code: number, reason = ''): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => this.socket.terminate(), CLOSE_HANDSHAKE_TIMEOUT_MS);
      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
        this.socket.close(code, reason);
      }
    });
  }
}
