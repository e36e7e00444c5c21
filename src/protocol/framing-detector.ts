/**
 * @fileoverview Classifies a new connection's dialect from its first bytes.
 *
 * The first 8 bytes are common to both dialects. If more bytes are already
 * buffered once those 8 have been read, the client is sending a full 1036-byte
 * jtag_vpi packet; otherwise the 8 bytes are taken as a complete minimal
 * command. A full packet split by the network right after byte 8 is therefore
 * classified minimal. That ambiguity is accepted and logged.
 */

import type { ProtocolMode } from '../bridge/types';
import type { BridgeLogger } from '../logging/logger';
import type { Transport } from '../transport/transport';
import { RxAccumulator } from '../transport/byte-stream';
import { MINIMAL_HEADER_SIZE } from './constants';

export type ConfiguredProtocol = 'auto' | 'openocd' | 'legacy';

export type Detection =
  | { mode: 'unknown' }
  | { mode: 'legacy-minimal' | 'openocd-full'; header: Uint8Array };

/**
 * Pure classification rule.
 */
export function classifyDialect(headerBytes: number, bufferedBeyondHeader: number): ProtocolMode {
  if (headerBytes < MINIMAL_HEADER_SIZE) {
    return 'unknown';
  }
  return bufferedBeyondHeader > 0 ? 'openocd-full' : 'legacy-minimal';
}

/**
 * Mode a connection starts in before any byte arrives.
 */
export function initialProtocolMode(configured: ConfiguredProtocol): ProtocolMode {
  switch (configured) {
    case 'openocd':
      return 'openocd-full';
    case 'legacy':
      return 'legacy-minimal';
    case 'auto':
      return 'unknown';
  }
}

/**
 * Accumulates the shared header and makes the one-time decision.
 */
export class FramingDetector {
  private readonly header = new RxAccumulator(MINIMAL_HEADER_SIZE);

  /**
   * Reads toward the 8-byte header; once complete, peeks the transport and
   * decides. Never blocks.
   *
   * @throws TransportError on EOF or a fatal socket error
   */
  detect(transport: Transport, logger: BridgeLogger): Detection {
    if (!this.header.fill(transport, logger)) {
      logger.verbose(`detecting protocol: ${this.header.count}/${MINIMAL_HEADER_SIZE} bytes`);
      return { mode: 'unknown' };
    }
    const mode = classifyDialect(this.header.count, transport.available());
    const header = this.header.take();
    this.header.reset();
    if (mode === 'unknown') {
      return { mode };
    }
    if (mode === 'openocd-full') {
      logger.info(`OpenOCD jtag_vpi protocol detected (cmd=0x${hex(header[0])})`);
    } else {
      logger.info(
        `minimal 8-byte protocol detected (cmd=0x${hex(header[0])}); ` +
          'a full packet fragmented after 8 bytes would also look like this'
      );
    }
    return { mode, header };
  }

  reset(): void {
    this.header.reset();
  }
}

function hex(value: number | undefined): string {
  return (value ?? 0).toString(16).padStart(2, '0');
}
