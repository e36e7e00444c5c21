/**
 * @fileoverview Per-bit TCK pulse/capture loop shared by both dialects.
 */

import type { SignalMailbox } from '../bridge/mailbox';
import type { Bit, BitOrder } from '../bridge/types';
import { getBit, setBit } from '../protocol/bit-buffer';
import { bytesForBits } from '../protocol/constants';

export type ScanProgress = 'waiting' | 'issued' | 'done';

export interface ScanSessionInit {
  bits: number;
  tms: Uint8Array;
  tdi: Uint8Array;
  bitOrder: BitOrder;
}

/**
 * Shifts `bits` TMS/TDI pairs through the DUT, one pulse per mailbox
 * exchange, collecting TDO.
 *
 * Capture is pipelined by one step: the sample for bit i-1 becomes valid only
 * after its pulse has been applied, so it is folded in just before bit i is
 * requested, and the last bit's sample is folded in once the final exchange
 * completes.
 */
export class ScanSession {
  readonly bits: number;
  readonly byteCount: number;
  private readonly tms: Uint8Array;
  private readonly tdi: Uint8Array;
  private readonly tdo: Uint8Array;
  private readonly bitOrder: BitOrder;
  private index = 0;
  private finished = false;

  constructor(init: ScanSessionInit) {
    this.bits = init.bits;
    this.byteCount = bytesForBits(init.bits);
    this.bitOrder = init.bitOrder;
    this.tms = fitTo(init.tms, this.byteCount);
    this.tdi = fitTo(init.tdi, this.byteCount);
    this.tdo = new Uint8Array(this.byteCount);
  }

  /**
   * All-zero TMS except, when `flipLast` is set, the final bit, which exits
   * the shift state.
   */
  static synthesizeTms(bits: number, flipLast: boolean, bitOrder: BitOrder): Uint8Array {
    const tms = new Uint8Array(bytesForBits(bits));
    if (flipLast && bits > 0) {
      setBit(tms, bits - 1, 1, bitOrder);
    }
    return tms;
  }

  get bitIndex(): number {
    return this.index;
  }

  isDone(): boolean {
    return this.finished;
  }

  /**
   * Moves the scan forward by at most one mailbox exchange.
   */
  advance(mailbox: SignalMailbox): ScanProgress {
    if (this.finished) {
      return 'done';
    }
    if (!mailbox.isIdle()) {
      return 'waiting';
    }
    if (this.index > 0) {
      this.capture(this.index - 1, mailbox.sample.tdo);
    }
    if (this.index < this.bits) {
      mailbox.issue(
        'tck-pulse',
        getBit(this.tms, this.index, this.bitOrder),
        getBit(this.tdi, this.index, this.bitOrder)
      );
      this.index += 1;
      return 'issued';
    }
    this.finished = true;
    return 'done';
  }

  /** Captured TDO bytes; complete once `isDone()`. */
  result(): Uint8Array {
    return this.tdo.slice();
  }

  private capture(bit: number, tdo: Bit): void {
    setBit(this.tdo, bit, tdo, this.bitOrder);
  }
}

function fitTo(source: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length);
  out.set(source.subarray(0, length));
  return out;
}
