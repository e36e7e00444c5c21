/**
 * @fileoverview Single-client connection lifecycle: accept, detect, dispatch
 * and tear down.
 */

import { dispatchMinimalHeader, pollLegacy } from '../engine/legacy-engine';
import { pollVpi } from '../engine/vpi-engine';
import { initialProtocolMode } from '../protocol/framing-detector';
import type { TransportListener } from '../transport/transport';
import {
  createConnectionContext,
  describeContext,
  type ConnectionContext,
  type EngineEnvironment,
} from './connection-context';
import { isTransportError, wrapError, type DisconnectReason } from './errors';
import type { SignalMailbox } from './mailbox';
import type { ProtocolMode } from './types';

export interface ConnectionManagerOptions {
  listener: TransportListener;
  mailbox: SignalMailbox;
  env: EngineEnvironment;
  /** Called after a client's STOP_SIMU has closed its connection. */
  onStopSimulation?: () => void;
}

/**
 * Serves one client at a time. Any failure on the connection (EOF, a fatal
 * socket error, STOP_SIMU, or an unexpected exception while handling its
 * bytes) closes that connection only; the next queued client is accepted on
 * the following poll.
 */
export class ConnectionManager {
  private readonly listener: TransportListener;
  private readonly mailbox: SignalMailbox;
  private readonly env: EngineEnvironment;
  private readonly onStopSimulation: (() => void) | undefined;
  private connection: ConnectionContext | undefined;
  private served = 0;

  constructor(options: ConnectionManagerOptions) {
    this.listener = options.listener;
    this.mailbox = options.mailbox;
    this.env = options.env;
    this.onStopSimulation = options.onStopSimulation;
  }

  isClientConnected(): boolean {
    return this.connection !== undefined;
  }

  get protocolMode(): ProtocolMode {
    return this.connection?.mode ?? 'unknown';
  }

  /** Clients accepted so far. */
  get clientsServed(): number {
    return this.served;
  }

  poll(): void {
    const ctx = this.connection ?? this.acceptNext();
    if (ctx === undefined) {
      return;
    }
    try {
      this.service(ctx);
    } catch (error) {
      if (isTransportError(error)) {
        this.disconnect(ctx, error.reason, error.message);
        return;
      }
      const wrapped = wrapError(error);
      this.env.logger.error(`closing connection after ${wrapped.code}: ${wrapped.message}`);
      this.disconnect(ctx, 'socket-error', wrapped.message);
    }
  }

  /** Closes the current client, if any. */
  closeClient(): void {
    if (this.connection !== undefined) {
      this.connection.transport.close();
      this.connection = undefined;
      this.mailbox.reset(this.env.initialModeSelect);
    }
  }

  private acceptNext(): ConnectionContext | undefined {
    const transport = this.listener.accept();
    if (transport === undefined) {
      return undefined;
    }
    this.served += 1;
    const ctx = createConnectionContext(transport, initialProtocolMode(this.env.protocol));
    this.connection = ctx;
    this.env.logger.info(`client connected from ${transport.remote} (protocol=${ctx.mode})`);
    return ctx;
  }

  private service(ctx: ConnectionContext): void {
    switch (ctx.mode) {
      case 'unknown': {
        const detection = ctx.detector.detect(ctx.transport, this.env.logger);
        if (detection.mode === 'unknown') {
          return;
        }
        ctx.mode = detection.mode;
        if (detection.mode === 'openocd-full') {
          ctx.vpi.rx.prefill(detection.header);
          pollVpi(ctx, this.mailbox, this.env);
        } else {
          dispatchMinimalHeader(ctx, detection.header, this.mailbox, this.env);
        }
        return;
      }
      case 'legacy-minimal':
        pollLegacy(ctx, this.mailbox, this.env);
        return;
      case 'openocd-full':
        pollVpi(ctx, this.mailbox, this.env);
        return;
    }
  }

  private disconnect(ctx: ConnectionContext, reason: DisconnectReason, message: string): void {
    this.env.logger.info(`client ${ctx.transport.remote} disconnected: ${message}`);
    this.env.logger.verbose(`connection state at close: ${describeContext(ctx)}`);
    this.closeClient();
    if (reason === 'stop-simulation' && this.onStopSimulation !== undefined) {
      this.onStopSimulation();
    }
  }
}
