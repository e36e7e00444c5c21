/**
 * @file Bridge + stepper wiring shared by the engine and bridge tests.
 */

import { JtagBridge, type JtagBridgeOptions } from '../../src/bridge/jtag-bridge';
import type { Bit, BitOrder, Command } from '../../src/bridge/types';
import type { ConfiguredProtocol } from '../../src/protocol/framing-detector';
import { commandToVpiPacket, encodeVpiPacket } from '../../src/protocol/vpi-codec';
import type { Dut } from '../../src/sim/dut';
import { SimulationStepper } from '../../src/sim/stepper';
import {
  FakeListener,
  LoopbackDut,
  createRecordingLogger,
  type FakeTransport,
  type RecordingLogger,
} from './fakes';

export interface HarnessOptions {
  protocol?: ConfiguredProtocol;
  bitOrder?: BitOrder;
  initialModeSelect?: Bit;
  onStopSimulation?: () => void;
}

export interface Harness<D extends Dut> {
  bridge: JtagBridge;
  stepper: SimulationStepper;
  listener: FakeListener;
  logger: RecordingLogger;
  dut: D;
}

export async function startHarness(
  clients: FakeTransport[],
  options: HarnessOptions & { dut: Dut }
): Promise<Harness<Dut>>;
export async function startHarness(
  clients: FakeTransport[],
  options?: HarnessOptions
): Promise<Harness<LoopbackDut>>;
export async function startHarness(
  clients: FakeTransport[],
  options: HarnessOptions & { dut?: Dut } = {}
): Promise<Harness<Dut>> {
  const listener = new FakeListener(...clients);
  const logger = createRecordingLogger();
  const bridgeOptions: JtagBridgeOptions = { listener, logger };
  if (options.protocol !== undefined) bridgeOptions.protocol = options.protocol;
  if (options.bitOrder !== undefined) bridgeOptions.bitOrder = options.bitOrder;
  if (options.initialModeSelect !== undefined) {
    bridgeOptions.initialModeSelect = options.initialModeSelect;
  }
  if (options.onStopSimulation !== undefined) {
    bridgeOptions.onStopSimulation = options.onStopSimulation;
  }
  const bridge = new JtagBridge(bridgeOptions);
  await bridge.init();
  const dut = options.dut ?? new LoopbackDut();
  const stepper = new SimulationStepper(bridge, dut, { pollInterval: 1 });
  return { bridge, stepper, listener, logger, dut };
}

export function minimalHeader(cmd: number, length: number): number[] {
  const header = Buffer.alloc(8);
  header.writeUInt8(cmd, 0);
  header.writeUInt32BE(length, 4);
  return Array.from(header);
}

export function vpiBytes(command: Command): Buffer {
  return encodeVpiPacket(commandToVpiPacket(command));
}
