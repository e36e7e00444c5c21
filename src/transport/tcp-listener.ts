/**
 * @fileoverview TCP listener. Clients that connect while another is being
 * served wait, paused, in arrival order.
 */

import { createServer, type Server, type Socket } from 'net';
import type { BridgeLogger } from '../logging/logger';
import { silentLogger } from '../logging/logger';
import { SocketTransport } from './socket-transport';
import type { Transport, TransportListener } from './transport';

export class TcpListener implements TransportListener {
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly logger: BridgeLogger;
  private readonly server: Server;
  private waiting: Socket[] = [];
  private readonly detachers = new Map<Socket, () => void>();

  constructor(host: string, port: number, logger: BridgeLogger = silentLogger) {
    this.host = host;
    this.requestedPort = port;
    this.logger = logger;
    this.server = createServer({ pauseOnConnect: true }, (socket) => this.enqueue(socket));
  }

  /** Bound port; differs from the requested one when that was 0. */
  get port(): number {
    const address = this.server.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.requestedPort;
  }

  get address(): string {
    return `${this.host}:${this.port}`;
  }

  /** Clients waiting for the current one to disconnect. */
  get pending(): number {
    return this.waiting.length;
  }

  listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        this.server.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        this.server.off('error', onError);
        this.server.on('error', (error) => this.logger.error(`listener error: ${error.message}`));
        resolve();
      };
      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.requestedPort, this.host);
    });
  }

  accept(): Transport | undefined {
    const socket = this.waiting.shift();
    if (socket === undefined) {
      return undefined;
    }
    this.detachers.get(socket)?.();
    this.detachers.delete(socket);
    return new SocketTransport(socket);
  }

  close(): Promise<void> {
    for (const socket of this.waiting) {
      socket.destroy();
    }
    this.waiting = [];
    this.detachers.clear();
    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private enqueue(socket: Socket): void {
    this.waiting.push(socket);
    this.logger.verbose(
      `client ${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0} queued ` +
        `(${this.waiting.length} waiting)`
    );
    const onError = (error: Error): void => {
      this.logger.warn(`queued client error: ${error.message}`);
    };
    const onClose = (): void => {
      this.waiting = this.waiting.filter((queued) => queued !== socket);
      this.detachers.delete(socket);
    };
    socket.on('error', onError);
    socket.on('close', onClose);
    this.detachers.set(socket, () => {
      socket.off('error', onError);
      socket.off('close', onClose);
    });
  }
}
