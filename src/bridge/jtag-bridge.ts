/**
 * @fileoverview Public face of the bridge: the four calls a simulation loop
 * makes each tick, plus lifecycle.
 */

import { createLogger, silentLogger, type BridgeLogger } from '../logging/logger';
import type { ConfiguredProtocol } from '../protocol/framing-detector';
import { TcpListener } from '../transport/tcp-listener';
import type { TransportListener } from '../transport/transport';
import type { BridgeConfig } from '../config/types';
import { ConnectionManager } from './connection-manager';
import { SignalMailbox } from './mailbox';
import type { Bit, BitOrder, DutSample, PendingSignal, ProtocolMode } from './types';

export interface JtagBridgeOptions {
  listener: TransportListener;
  protocol?: ConfiguredProtocol;
  bitOrder?: BitOrder;
  /** modeSelect level driven while no OSCAN1 traffic has switched it */
  initialModeSelect?: Bit;
  logger?: BridgeLogger;
  onStopSimulation?: () => void;
}

/**
 * JTAG/cJTAG bridge between a TCP debug client and a simulated DUT.
 *
 * @example
 * const bridge = JtagBridge.fromConfig(config);
 * await bridge.init();
 * // every N cycles:
 * const signal = bridge.tick(sampleDut());
 * if (signal) applyToDut(signal);
 */
export class JtagBridge {
  readonly mailbox: SignalMailbox;
  private readonly listener: TransportListener;
  private readonly manager: ConnectionManager;
  private readonly logger: BridgeLogger;
  private listening = false;

  constructor(options: JtagBridgeOptions) {
    const initialModeSelect = options.initialModeSelect ?? 0;
    this.listener = options.listener;
    this.logger = options.logger ?? silentLogger;
    this.mailbox = new SignalMailbox(initialModeSelect);
    const managerOptions = {
      listener: options.listener,
      mailbox: this.mailbox,
      env: {
        bitOrder: options.bitOrder ?? 'lsb-first',
        protocol: options.protocol ?? 'auto',
        initialModeSelect,
        logger: this.logger,
      },
    };
    this.manager = new ConnectionManager(
      options.onStopSimulation === undefined
        ? managerOptions
        : { ...managerOptions, onStopSimulation: options.onStopSimulation }
    );
  }

  /**
   * Bridge listening on TCP as described by a loaded configuration.
   */
  static fromConfig(
    config: BridgeConfig,
    overrides: { logger?: BridgeLogger; onStopSimulation?: () => void } = {}
  ): JtagBridge {
    const logger = overrides.logger ?? createLogger(config.debugLevel);
    const options: JtagBridgeOptions = {
      listener: new TcpListener(config.host, config.port, logger),
      protocol: config.protocol,
      bitOrder: config.bitOrder,
      initialModeSelect: config.mode === 'cjtag' ? 1 : 0,
      logger,
    };
    if (overrides.onStopSimulation !== undefined) {
      options.onStopSimulation = overrides.onStopSimulation;
    }
    return new JtagBridge(options);
  }

  async init(): Promise<void> {
    await this.listener.listen();
    this.listening = true;
    this.logger.info(`listening on ${this.listener.address}`);
  }

  /** Services the client connection once; never blocks. */
  poll(): void {
    if (this.listening) {
      this.manager.poll();
    }
  }

  updateSignals(sample: DutSample): void {
    this.mailbox.updateSignals(sample);
  }

  getPendingSignal(): PendingSignal | undefined {
    return this.mailbox.getPendingSignal();
  }

  /**
   * updateSignals, poll, getPendingSignal in the order the tick loop needs.
   */
  tick(sample: DutSample): PendingSignal | undefined {
    this.updateSignals(sample);
    this.poll();
    return this.getPendingSignal();
  }

  isClientConnected(): boolean {
    return this.manager.isClientConnected();
  }

  get protocolMode(): ProtocolMode {
    return this.manager.protocolMode;
  }

  async close(): Promise<void> {
    this.manager.closeClient();
    if (this.listening) {
      this.listening = false;
      await this.listener.close();
    }
  }
}
