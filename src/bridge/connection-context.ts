/**
 * @fileoverview Per-connection state. Everything a client can leave half done
 * lives here, so dropping the context on disconnect drops all of it.
 */

import type { ScanSession } from '../engine/scan-session';
import type { Sf0Exchange } from '../engine/sf0-exchange';
import type { BridgeLogger } from '../logging/logger';
import { MINIMAL_HEADER_SIZE, VPI_PACKET_SIZE } from '../protocol/constants';
import { FramingDetector, type ConfiguredProtocol } from '../protocol/framing-detector';
import { RxAccumulator, TxQueue } from '../transport/byte-stream';
import type { Transport } from '../transport/transport';
import type { Bit, BitOrder, ProtocolMode } from './types';

/**
 * Minimal-dialect scan state machine.
 */
export type LegacyScanState =
  | { phase: 'idle' }
  | { phase: 'receiving-tms'; bits: number; purpose: 'scan' | 'tms-seq'; rx: RxAccumulator }
  | { phase: 'receiving-tdi'; bits: number; tms: Uint8Array; rx: RxAccumulator }
  | { phase: 'processing'; session: ScanSession; replyWithTdo: boolean }
  | { phase: 'sending-tdo' };

/**
 * Work the full-packet engine is carrying out for the last packet.
 */
export type VpiWork =
  | { kind: 'idle' }
  | { kind: 'scan'; cmd: number; session: ScanSession }
  | { kind: 'tms-seq'; session: ScanSession }
  | { kind: 'oscan1'; exchange: Sf0Exchange };

export interface ConnectionContext {
  readonly transport: Transport;
  mode: ProtocolMode;
  readonly detector: FramingDetector;
  readonly tx: TxQueue;
  readonly legacy: { header: RxAccumulator; state: LegacyScanState };
  readonly vpi: { rx: RxAccumulator; work: VpiWork };
  commandsHandled: number;
}

/**
 * Settings the engines read; fixed for the bridge's lifetime.
 */
export interface EngineEnvironment {
  bitOrder: BitOrder;
  protocol: ConfiguredProtocol;
  initialModeSelect: Bit;
  logger: BridgeLogger;
}

export function createConnectionContext(
  transport: Transport,
  mode: ProtocolMode
): ConnectionContext {
  return {
    transport,
    mode,
    detector: new FramingDetector(),
    tx: new TxQueue(),
    legacy: { header: new RxAccumulator(MINIMAL_HEADER_SIZE), state: { phase: 'idle' } },
    vpi: { rx: new RxAccumulator(VPI_PACKET_SIZE), work: { kind: 'idle' } },
    commandsHandled: 0,
  };
}

/**
 * One-line summary for disconnect logs.
 */
export function describeContext(ctx: ConnectionContext): string {
  const scan =
    ctx.mode === 'openocd-full' ? ctx.vpi.work.kind : ctx.legacy.state.phase;
  return (
    `protocol=${ctx.mode}, commands=${ctx.commandsHandled}, ` +
    `rx=${ctx.vpi.rx.count}/${VPI_PACKET_SIZE}, work=${scan}, ` +
    `tx_pending=${ctx.tx.pendingBytes()}`
  );
}
