/**
 * @fileoverview Bridge configuration shape and defaults.
 */

import type { BitOrder } from '../bridge/types';
import type { DebugLevel } from '../logging/logger';
import type { ConfiguredProtocol } from '../protocol/framing-detector';

export type InterfaceMode = 'jtag' | 'cjtag';

export interface BridgeConfig {
  /** Listen address */
  host: string;
  /** Listen port, 1-65535 (0 binds an ephemeral port) */
  port: number;
  /** Forced dialect, or 'auto' to detect per connection */
  protocol: ConfiguredProtocol;
  bitOrder: BitOrder;
  /** Initial modeSelect level: jtag = 0, cjtag = 1 */
  mode: InterfaceMode;
  debugLevel: DebugLevel;
  /** Simulation cycles between bridge polls */
  pollInterval: number;
  /** Wall-clock limit for a simulation run */
  timeoutSeconds: number;
  /** IDCODE reported by the reference TAP */
  idcode: number;
}

/**
 * Contents of a configuration file: any subset of BridgeConfig.
 */
export type BridgeConfigFile = Partial<BridgeConfig>;

export const DEFAULT_CONFIG: Readonly<BridgeConfig> = {
  host: '127.0.0.1',
  port: 3333,
  protocol: 'auto',
  bitOrder: 'lsb-first',
  mode: 'jtag',
  debugLevel: 0,
  pollInterval: 10,
  timeoutSeconds: 300,
  idcode: 0x1dead3ff,
};
