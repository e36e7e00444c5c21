/**
 * @file Reference TAP tests, standalone and behind the bridge.
 */

import { describe, it, expect } from 'vitest';
import type { Bit } from '../../src/bridge/types';
import { VPI_PACKET_SIZE } from '../../src/protocol/constants';
import { decodeVpiPacket } from '../../src/protocol/vpi-codec';
import { INSTRUCTION_BYPASS, INSTRUCTION_IDCODE, TapModel } from '../../src/sim/tap-model';
import { FakeTransport } from '../helpers/fakes';
import { startHarness, vpiBytes } from '../helpers/harness';

function pulse(tap: TapModel, tms: Bit, tdi: Bit = 0): Bit {
  tap.drive({ tms, tdi, modeSelect: 0 });
  tap.setClock(1);
  tap.setClock(0);
  return tap.outputs().tdo;
}

describe('TapModel', () => {
  it('follows the TAP state diagram', () => {
    const tap = new TapModel(0);
    const visited = [0, 1, 1, 0, 0, 1, 1].map((tms) => {
      pulse(tap, tms === 1 ? 1 : 0);
      return tap.tapState;
    });
    expect(visited).toEqual([
      'run-test-idle',
      'select-dr-scan',
      'select-ir-scan',
      'capture-ir',
      'shift-ir',
      'exit1-ir',
      'update-ir',
    ]);
  });

  it('reaches Test-Logic-Reset after five TMS=1 pulses from anywhere', () => {
    const tap = new TapModel(0);
    for (const tms of [0, 1, 0, 0] as const) {
      pulse(tap, tms);
    }
    expect(tap.tapState).toBe('shift-dr');
    for (let i = 0; i < 5; i++) {
      pulse(tap, 1);
    }
    expect(tap.tapState).toBe('test-logic-reset');
    expect(tap.currentInstruction).toBe(INSTRUCTION_IDCODE);
  });

  it('shifts out the IDCODE least significant bit first', () => {
    const tap = new TapModel(0x1dead3ff);
    for (const tms of [0, 1, 0, 0] as const) {
      pulse(tap, tms);
    }
    let value = 0;
    for (let i = 0; i < 32; i++) {
      value |= pulse(tap, i === 31 ? 1 : 0) << i;
    }
    expect(value >>> 0).toBe(0x1dead3ff);
    expect(tap.tapState).toBe('exit1-dr');
    expect(tap.outputs().tdoEnable).toBe(1);
    pulse(tap, 1);
    expect(tap.outputs().tdoEnable).toBe(0);
  });

  it('clocks the TAP once per SF0 toggle pair in cJTAG mode', () => {
    const tap = new TapModel(0);
    tap.drive({ tms: 0, tdi: 0, modeSelect: 1 });
    tap.setClock(1);
    expect(tap.tapState).toBe('test-logic-reset');
    tap.setClock(0);
    expect(tap.tapState).toBe('run-test-idle');
    tap.drive({ tms: 1, tdi: 0, modeSelect: 1 });
    tap.setClock(1);
    tap.drive({ tms: 0, tdi: 1, modeSelect: 1 });
    tap.setClock(0);
    expect(tap.tapState).toBe('select-dr-scan');
    expect(tap.outputs().activeMode).toBe(1);
  });

  it('reads IDCODE through the bridge after RESET and TMS_SEQ', async () => {
    const client = new FakeTransport();
    const { stepper } = await startHarness([client], { dut: new TapModel(0x1dead3ff) });
    client.push(vpiBytes({ kind: 'reset' }));
    client.push(vpiBytes({ kind: 'tms-seq', bits: 4, tms: Uint8Array.of(0b0010) }));
    client.push(vpiBytes({ kind: 'scan', bits: 32, tdi: new Uint8Array(4), flipTmsOnLast: true }));
    stepper.run(200);
    const output = client.output();
    expect(output.length).toBe(3 * VPI_PACKET_SIZE);
    const scan = decodeVpiPacket(output.subarray(2 * VPI_PACKET_SIZE));
    expect(scan.cmd).toBe(3);
    expect(scan.nbBits).toBe(32);
    expect(Array.from(scan.bufferIn.subarray(0, 4))).toEqual([0xff, 0xd3, 0xea, 0x1d]);
  });

  it('loops 0xAA back as 0x54 through BYPASS', async () => {
    const client = new FakeTransport();
    const tap = new TapModel(0x1dead3ff);
    const { stepper } = await startHarness([client], { dut: tap });
    client.push(vpiBytes({ kind: 'reset' }));
    client.push(vpiBytes({ kind: 'tms-seq', bits: 5, tms: Uint8Array.of(0b00110) }));
    client.push(vpiBytes({ kind: 'scan', bits: 5, tdi: Uint8Array.of(0x1f), flipTmsOnLast: true }));
    client.push(vpiBytes({ kind: 'tms-seq', bits: 4, tms: Uint8Array.of(0b0011) }));
    client.push(vpiBytes({ kind: 'scan', bits: 8, tdi: Uint8Array.of(0xaa), flipTmsOnLast: false }));
    stepper.run(300);
    const output = client.output();
    expect(output.length).toBe(5 * VPI_PACKET_SIZE);
    expect(tap.currentInstruction).toBe(INSTRUCTION_BYPASS);
    const irScan = decodeVpiPacket(output.subarray(2 * VPI_PACKET_SIZE));
    expect(irScan.bufferIn[0]).toBe(0x01);
    const drScan = decodeVpiPacket(output.subarray(4 * VPI_PACKET_SIZE));
    expect(drScan.bufferIn[0]).toBe(0x54);
  });
});
