/**
 * @fileoverview OScan1 Scanning Format 0: one logical bit as two TCKC edges.
 */

import type { SignalMailbox } from '../bridge/mailbox';
import type { Bit } from '../bridge/types';

export type Sf0Phase = 'send-tms' | 'send-tdi' | 'idle';

/**
 * Drives one SF0 bit. The first toggle (rising TCKC) carries TMS, the second
 * (falling TCKC) carries TDI; TDO is read only after the second toggle has
 * been applied and sampled. Each phase waits for the mailbox to report its
 * toggle consumed before moving on.
 */
export class Sf0Exchange {
  readonly tms: Bit;
  readonly tdi: Bit;
  private current: Sf0Phase = 'send-tms';
  private tdo: Bit | undefined;

  constructor(tms: Bit, tdi: Bit) {
    this.tms = tms;
    this.tdi = tdi;
  }

  get phase(): Sf0Phase {
    return this.current;
  }

  /** Issues the rising-edge toggle. The mailbox must be idle. */
  start(mailbox: SignalMailbox): void {
    mailbox.issue('tckc-toggle', this.tms, 0);
  }

  /**
   * @returns the captured TDO once both toggles are complete
   */
  advance(mailbox: SignalMailbox): Bit | undefined {
    if (this.current === 'idle') {
      return this.tdo;
    }
    if (!mailbox.isIdle()) {
      return undefined;
    }
    if (this.current === 'send-tms') {
      mailbox.issue('tckc-toggle', 0, this.tdi);
      this.current = 'send-tdi';
      return undefined;
    }
    this.tdo = mailbox.sample.tdo;
    this.current = 'idle';
    return this.tdo;
  }
}
