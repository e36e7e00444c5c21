/**
 * @fileoverview The device-under-test surface the simulation stepper drives.
 */

import type { Bit } from '../bridge/types';

export interface DutInputs {
  tms: Bit;
  tdi: Bit;
  /** 0 = 4-wire JTAG, 1 = 2-wire cJTAG (OScan1) */
  modeSelect: Bit;
}

export interface DutOutputs {
  tdo: Bit;
  /** TDO output enable; TDO is tri-stated while low */
  tdoEnable: Bit;
  idcode: number;
  activeMode: Bit;
}

/**
 * A clocked JTAG target. Inputs are set before a clock edge; outputs are read
 * after it.
 */
export interface Dut {
  drive(inputs: DutInputs): void;
  /** Sets the TCK (or TCKC) level; a change of level is an edge. */
  setClock(level: Bit): void;
  outputs(): DutOutputs;
}
