/**
 * @fileoverview Shared types for the bridge core: commands, signals, samples.
 */

export type Bit = 0 | 1;

/**
 * Wire dialect spoken by the connected client. Fixed at the first command of
 * a connection; back to 'unknown' on disconnect.
 */
export type ProtocolMode = 'unknown' | 'legacy-minimal' | 'openocd-full';

export type BitOrder = 'lsb-first' | 'msb-first';

/**
 * Decoded client command. Both dialects map onto this union; a minimal-dialect
 * scan carries an empty TDI buffer because its data follows the header.
 */
export type Command =
  | { kind: 'reset' }
  | { kind: 'tms-seq'; bits: number; tms: Uint8Array }
  | { kind: 'scan'; bits: number; tdi: Uint8Array; flipTmsOnLast: boolean }
  | { kind: 'set-port' }
  | { kind: 'oscan1-edge'; tms: Bit; tdi: Bit }
  | { kind: 'stop-simulation' };

export type CommandKind = Command['kind'];

/**
 * What the stepper should do with the clock line for a pending signal.
 * 'none' only changes the level of modeSelect.
 */
export type RequestKind = 'tck-pulse' | 'tckc-toggle' | 'none';

/**
 * One request handed to the simulation stepper.
 */
export interface PendingSignal {
  tms: Bit;
  tdi: Bit;
  modeSelect: Bit;
  kind: RequestKind;
}

/**
 * Values read back from the DUT after a request has been applied.
 */
export interface DutSample {
  tdo: Bit;
  tdoEnable: Bit;
  idcode: number;
  activeMode: Bit;
}

export const IDLE_SAMPLE: Readonly<DutSample> = {
  tdo: 0,
  tdoEnable: 0,
  idcode: 0,
  activeMode: 0,
};

export function toBit(value: number | boolean): Bit {
  return value ? 1 : 0;
}
