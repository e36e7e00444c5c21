/**
 * @fileoverview The single exchange point between the scan engines and the
 * simulation stepper: one pending request out, one sample in.
 */

import { RESET_PULSE_COUNT } from '../protocol/constants';
import { BridgeError } from './errors';
import { IDLE_SAMPLE, type Bit, type DutSample, type PendingSignal } from './types';

type RequestState = 'idle' | 'requested' | 'taken';

interface EngineRequest {
  tms: Bit;
  tdi: Bit;
  kind: 'tck-pulse' | 'tckc-toggle';
}

/**
 * Holds at most one engine request. A request goes requested → taken (handed
 * to the stepper) → idle (stepper reported the resulting sample); the engine
 * may only issue the next one once the mailbox is idle again.
 *
 * A reset burst sits beside the request and always goes out first, so its
 * pulses cannot interleave with an in-flight scan bit.
 */
export class SignalMailbox {
  private state: RequestState = 'idle';
  private request: EngineRequest | undefined;
  private resetPulsesRemaining = 0;
  private modeSelect: Bit;
  private drivenModeSelect: Bit;
  private latest: DutSample = { ...IDLE_SAMPLE };
  private exchanges = 0;

  constructor(initialModeSelect: Bit = 0) {
    this.modeSelect = initialModeSelect;
    this.drivenModeSelect = initialModeSelect;
  }

  /** True when the engine may issue its next request. */
  isIdle(): boolean {
    return this.state === 'idle';
  }

  /**
   * Queues the next engine request.
   *
   * @throws BridgeError (`MAILBOX_BUSY`) if a request is still outstanding
   */
  issue(kind: EngineRequest['kind'], tms: Bit, tdi: Bit): void {
    if (this.state !== 'idle') {
      throw new BridgeError(
        `Mailbox busy (${this.state}); previous ${this.request?.kind} not consumed`,
        'MAILBOX_BUSY',
        { state: this.state }
      );
    }
    this.request = { kind, tms, tdi };
    this.state = 'requested';
  }

  /** Drops any outstanding engine request. */
  cancel(): void {
    this.request = undefined;
    this.state = 'idle';
  }

  queueResetBurst(): void {
    this.resetPulsesRemaining = RESET_PULSE_COUNT;
  }

  getResetPulsesRemaining(): number {
    return this.resetPulsesRemaining;
  }

  setModeSelect(mode: Bit): void {
    this.modeSelect = mode;
  }

  getModeSelect(): Bit {
    return this.modeSelect;
  }

  /** Latest values reported by the stepper. */
  get sample(): DutSample {
    return this.latest;
  }

  /** Engine requests completed (taken and sampled) since construction. */
  get completedExchanges(): number {
    return this.exchanges;
  }

  /**
   * Next signal change for the stepper, if any. Called once per tick.
   */
  getPendingSignal(): PendingSignal | undefined {
    if (this.resetPulsesRemaining > 0) {
      this.resetPulsesRemaining -= 1;
      return this.drive({ tms: 1, tdi: 0, kind: 'tck-pulse' });
    }
    if (this.state === 'requested' && this.request !== undefined) {
      this.state = 'taken';
      return this.drive(this.request);
    }
    if (this.modeSelect !== this.drivenModeSelect) {
      return this.drive({ tms: 0, tdi: 0, kind: 'none' });
    }
    return undefined;
  }

  /**
   * Records the values the stepper sampled. Completes a taken request.
   */
  updateSignals(sample: DutSample): void {
    this.latest = { ...sample };
    if (this.state === 'taken') {
      this.state = 'idle';
      this.request = undefined;
      this.exchanges += 1;
    }
  }

  /**
   * Back to the connection-less state: nothing queued, mode reverted.
   */
  reset(initialModeSelect: Bit): void {
    this.cancel();
    this.resetPulsesRemaining = 0;
    this.modeSelect = initialModeSelect;
  }

  private drive(signal: { tms: Bit; tdi: Bit; kind: PendingSignal['kind'] }): PendingSignal {
    this.drivenModeSelect = this.modeSelect;
    return { tms: signal.tms, tdi: signal.tdi, modeSelect: this.modeSelect, kind: signal.kind };
  }
}
