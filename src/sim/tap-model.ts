/**
 * @fileoverview Reference JTAG target: a 1149.1 TAP controller with IDCODE
 * and BYPASS, and SF0 decoding of the 2-wire interface.
 */

import type { Bit } from '../bridge/types';
import type { Dut, DutInputs, DutOutputs } from './dut';

export type TapState =
  | 'test-logic-reset'
  | 'run-test-idle'
  | 'select-dr-scan'
  | 'capture-dr'
  | 'shift-dr'
  | 'exit1-dr'
  | 'pause-dr'
  | 'exit2-dr'
  | 'update-dr'
  | 'select-ir-scan'
  | 'capture-ir'
  | 'shift-ir'
  | 'exit1-ir'
  | 'pause-ir'
  | 'exit2-ir'
  | 'update-ir';

/** Next state for [TMS = 0, TMS = 1]. */
export const TAP_TRANSITIONS: Readonly<Record<TapState, readonly [TapState, TapState]>> = {
  'test-logic-reset': ['run-test-idle', 'test-logic-reset'],
  'run-test-idle': ['run-test-idle', 'select-dr-scan'],
  'select-dr-scan': ['capture-dr', 'select-ir-scan'],
  'capture-dr': ['shift-dr', 'exit1-dr'],
  'shift-dr': ['shift-dr', 'exit1-dr'],
  'exit1-dr': ['pause-dr', 'update-dr'],
  'pause-dr': ['pause-dr', 'exit2-dr'],
  'exit2-dr': ['shift-dr', 'update-dr'],
  'update-dr': ['run-test-idle', 'select-dr-scan'],
  'select-ir-scan': ['capture-ir', 'test-logic-reset'],
  'capture-ir': ['shift-ir', 'exit1-ir'],
  'shift-ir': ['shift-ir', 'exit1-ir'],
  'exit1-ir': ['pause-ir', 'update-ir'],
  'pause-ir': ['pause-ir', 'exit2-ir'],
  'exit2-ir': ['shift-ir', 'update-ir'],
  'update-ir': ['run-test-idle', 'select-dr-scan'],
};

export const IR_LENGTH = 5;
export const INSTRUCTION_IDCODE = 0x01;
export const INSTRUCTION_BYPASS = 0x1f;
/** Value loaded into the IR shift register on Capture-IR */
const IR_CAPTURE = 0b00001;
const IR_MASK = (1 << IR_LENGTH) - 1;

interface DataRegister {
  value: number;
  length: number;
}

export class TapModel implements Dut {
  readonly idcode: number;
  private state: TapState = 'test-logic-reset';
  private instruction = INSTRUCTION_IDCODE;
  private irShift = 0;
  private dr: DataRegister = { value: 0, length: 1 };
  private inputs: DutInputs = { tms: 0, tdi: 0, modeSelect: 0 };
  private clock: Bit = 0;
  private tdo: Bit = 0;
  private tdoEnable: Bit = 0;
  /** TMS latched on the rising TCKC edge of an SF0 pair */
  private sf0Tms: Bit = 0;

  constructor(idcode: number) {
    this.idcode = idcode >>> 0;
  }

  get tapState(): TapState {
    return this.state;
  }

  get currentInstruction(): number {
    return this.instruction;
  }

  drive(inputs: DutInputs): void {
    this.inputs = { ...inputs };
  }

  setClock(level: Bit): void {
    if (level === this.clock) {
      return;
    }
    this.clock = level;
    if (this.inputs.modeSelect === 1) {
      this.sf0Edge(level);
      return;
    }
    if (level === 1) {
      this.rising(this.inputs.tms, this.inputs.tdi);
    } else {
      this.falling();
    }
  }

  outputs(): DutOutputs {
    return {
      tdo: this.tdo,
      tdoEnable: this.tdoEnable,
      idcode: this.idcode,
      activeMode: this.inputs.modeSelect,
    };
  }

  /** Rising TCKC latches TMS; falling TCKC latches TDI and clocks the TAP. */
  private sf0Edge(level: Bit): void {
    if (level === 1) {
      this.sf0Tms = this.inputs.tms;
      return;
    }
    this.rising(this.sf0Tms, this.inputs.tdi);
    this.falling();
  }

  private rising(tms: Bit, tdi: Bit): void {
    switch (this.state) {
      case 'capture-dr':
        this.dr =
          this.instruction === INSTRUCTION_IDCODE
            ? { value: this.idcode, length: 32 }
            : { value: 0, length: 1 };
        this.tdoEnable = 0;
        break;
      case 'shift-dr':
        this.tdo = (this.dr.value & 1) === 1 ? 1 : 0;
        this.tdoEnable = 1;
        this.dr.value = ((this.dr.value >>> 1) | (tdi << (this.dr.length - 1))) >>> 0;
        break;
      case 'capture-ir':
        this.irShift = IR_CAPTURE;
        this.tdoEnable = 0;
        break;
      case 'shift-ir':
        this.tdo = (this.irShift & 1) === 1 ? 1 : 0;
        this.tdoEnable = 1;
        this.irShift = ((this.irShift >>> 1) | (tdi << (IR_LENGTH - 1))) & IR_MASK;
        break;
      default:
        this.tdoEnable = 0;
        break;
    }
    this.state = TAP_TRANSITIONS[this.state][tms];
  }

  private falling(): void {
    switch (this.state) {
      case 'test-logic-reset':
        this.instruction = INSTRUCTION_IDCODE;
        break;
      case 'update-ir':
        this.instruction = this.irShift;
        break;
      default:
        break;
    }
  }
}
