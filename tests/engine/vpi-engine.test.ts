/**
 * @file OpenOCD jtag_vpi dialect, end to end through the bridge.
 */

import { describe, it, expect, vi } from 'vitest';
import { VPI_PACKET_SIZE } from '../../src/protocol/constants';
import { decodeVpiPacket, type VpiPacket } from '../../src/protocol/vpi-codec';
import { TapModel } from '../../src/sim/tap-model';
import { FakeTransport } from '../helpers/fakes';
import { startHarness, vpiBytes } from '../helpers/harness';

function packets(client: FakeTransport): VpiPacket[] {
  const output = client.output();
  const result: VpiPacket[] = [];
  for (let offset = 0; offset + VPI_PACKET_SIZE <= output.length; offset += VPI_PACKET_SIZE) {
    result.push(decodeVpiPacket(output.subarray(offset, offset + VPI_PACKET_SIZE)));
  }
  return result;
}

describe('vpi engine', () => {
  it('returns 0x54 for an 8-bit scan of 0xAA', async () => {
    const client = new FakeTransport();
    const { bridge, stepper } = await startHarness([client]);
    client.push(
      vpiBytes({ kind: 'scan', bits: 8, tdi: Uint8Array.of(0xaa), flipTmsOnLast: false })
    );
    stepper.run(30);
    expect(bridge.protocolMode).toBe('openocd-full');
    expect(client.output().length).toBe(VPI_PACKET_SIZE);
    const [response] = packets(client);
    expect(response?.cmd).toBe(2);
    expect(response?.bufferIn[0]).toBe(0x54);
    expect(response?.length).toBe(1);
    expect(response?.nbBits).toBe(8);
    expect(response?.bufferOut.every((byte) => byte === 0)).toBe(true);
  });

  it('raises TMS only on the last bit of a flip-TMS scan', async () => {
    const client = new FakeTransport();
    const { stepper, dut } = await startHarness([client]);
    client.push(
      vpiBytes({ kind: 'scan', bits: 10, tdi: Uint8Array.of(0x00, 0x00), flipTmsOnLast: true })
    );
    stepper.run(40);
    expect(dut.edges.map((edge) => edge.tms)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 1]);
    expect(packets(client)[0]?.cmd).toBe(3);
  });

  it('answers RESET at once and then pulses TMS high six times', async () => {
    const client = new FakeTransport();
    const { stepper, dut } = await startHarness([client]);
    client.push(vpiBytes({ kind: 'reset' }));
    stepper.run(1);
    expect(packets(client).map((packet) => packet.cmd)).toEqual([0]);
    stepper.run(20);
    expect(dut.edges).toEqual(Array.from({ length: 6 }, () => ({ tms: 1, tdi: 0, modeSelect: 0 })));
  });

  it('answers TMS_SEQ at once and drives its bits', async () => {
    const client = new FakeTransport();
    const { stepper, dut } = await startHarness([client]);
    client.push(vpiBytes({ kind: 'tms-seq', bits: 5, tms: Uint8Array.of(0b10011) }));
    stepper.run(1);
    expect(packets(client).map((packet) => packet.cmd)).toEqual([1]);
    stepper.run(20);
    expect(dut.edges.map((edge) => edge.tms)).toEqual([1, 1, 0, 0, 1]);
  });

  it('runs reset pulses before a scan that follows it', async () => {
    const client = new FakeTransport();
    const { stepper, dut } = await startHarness([client]);
    client.push(vpiBytes({ kind: 'reset' }));
    client.push(vpiBytes({ kind: 'scan', bits: 2, tdi: Uint8Array.of(0x03), flipTmsOnLast: false }));
    stepper.run(40);
    expect(dut.edges.map((edge) => `${edge.tms}${edge.tdi}`)).toEqual([
      '10', '10', '10', '10', '10', '10', '01', '01',
    ]);
    expect(packets(client).map((packet) => packet.cmd)).toEqual([0, 2]);
  });

  it('performs an OSCAN1 exchange as two TCKC toggles in cJTAG mode', async () => {
    const client = new FakeTransport();
    const tap = new TapModel(0x1dead3ff);
    const { bridge, stepper } = await startHarness([client], { dut: tap });
    client.push(vpiBytes({ kind: 'oscan1-edge', tms: 1, tdi: 1 }));
    stepper.run(10);
    const [response] = packets(client);
    expect(response?.cmd).toBe(5);
    expect(response?.length).toBe(1);
    expect(response?.nbBits).toBe(2);
    // the TAP sits in Test-Logic-Reset with TDO tri-stated, which reads as 1
    expect(response?.bufferIn[0]).toBe(1);
    expect(bridge.mailbox.completedExchanges).toBe(2);
    expect(stepper.signalsApplied).toBe(2);
    expect(bridge.mailbox.getModeSelect()).toBe(1);
    expect(tap.outputs().activeMode).toBe(1);
  });

  it('reverts modeSelect when the OSCAN1 client disconnects', async () => {
    const client = new FakeTransport();
    const { bridge, stepper } = await startHarness([client]);
    client.push(vpiBytes({ kind: 'oscan1-edge', tms: 0, tdi: 0 }));
    stepper.run(10);
    client.end();
    stepper.run(2);
    expect(bridge.isClientConnected()).toBe(false);
    expect(bridge.mailbox.getModeSelect()).toBe(0);
  });

  it('closes the connection and reports STOP_SIMU', async () => {
    const client = new FakeTransport();
    const onStopSimulation = vi.fn();
    const { bridge, stepper } = await startHarness([client], { onStopSimulation });
    client.push(vpiBytes({ kind: 'stop-simulation' }));
    stepper.run(3);
    expect(onStopSimulation).toHaveBeenCalledTimes(1);
    expect(client.closed).toBe(true);
    expect(client.output().length).toBe(0);
    expect(bridge.isClientConnected()).toBe(false);
  });

  it('ignores packets it cannot decode and keeps serving', async () => {
    const client = new FakeTransport();
    const { bridge, stepper, logger } = await startHarness([client]);
    const bogus = vpiBytes({ kind: 'reset' });
    bogus.writeUInt32LE(9, 0);
    client.push(bogus);
    stepper.run(5);
    expect(client.output().length).toBe(0);
    expect(bridge.isClientConnected()).toBe(true);
    expect(logger.lines).toContain('verbose ignoring packet: Unknown command 0x9');
    client.push(vpiBytes({ kind: 'scan', bits: 8, tdi: Uint8Array.of(0xaa), flipTmsOnLast: false }));
    stepper.run(30);
    expect(packets(client)[0]?.bufferIn[0]).toBe(0x54);
  });

  it('stays in full-packet mode when a later packet arrives in fragments', async () => {
    const client = new FakeTransport();
    const { bridge, stepper } = await startHarness([client]);
    client.push(vpiBytes({ kind: 'reset' }));
    stepper.run(20);
    const scan = vpiBytes({ kind: 'scan', bits: 8, tdi: Uint8Array.of(0xaa), flipTmsOnLast: false });
    client.push(scan.subarray(0, 8));
    stepper.run(5);
    client.push(scan.subarray(8));
    stepper.run(30);
    expect(bridge.protocolMode).toBe('openocd-full');
    expect(packets(client).map((packet) => packet.cmd)).toEqual([0, 2]);
  });

  it('reassembles packets from short reads and drains through short writes', async () => {
    const client = new FakeTransport();
    client.readLimit = 100;
    client.writeLimit = 7;
    const { stepper } = await startHarness([client]);
    client.push(
      vpiBytes({ kind: 'scan', bits: 16, tdi: Uint8Array.of(0xff, 0x00), flipTmsOnLast: false })
    );
    stepper.run(400);
    const [response] = packets(client);
    expect(client.output().length).toBe(VPI_PACKET_SIZE);
    expect(Array.from(response?.bufferIn.subarray(0, 2) ?? [])).toEqual([0xfe, 0x01]);
  });
});
