/**
 * @file Real TCP loopback test: a Node client talks to the bridge through
 * TcpListener and SocketTransport on an ephemeral port.
 */

import { connect, type Socket } from 'net';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { afterEach, describe, it, expect } from 'vitest';
import { JtagBridge } from '../../src/bridge/jtag-bridge';
import { SimulationStepper } from '../../src/sim/stepper';
import { TcpListener } from '../../src/transport/tcp-listener';
import { LoopbackDut, createRecordingLogger } from '../helpers/fakes';
import { minimalHeader } from '../helpers/harness';

async function openClient(port: number): Promise<{ socket: Socket; received: number[] }> {
  const received: number[] = [];
  const socket = await new Promise<Socket>((resolve, reject) => {
    const client = connect(port, '127.0.0.1', () => resolve(client));
    client.once('error', reject);
  });
  socket.on('data', (chunk: Buffer) => received.push(...chunk));
  return { socket, received };
}

async function runUntil(stepper: SimulationStepper, done: () => boolean): Promise<void> {
  for (let slice = 0; slice < 2000 && !done(); slice++) {
    stepper.run(10);
    await yieldToEventLoop();
  }
}

describe('TcpListener', () => {
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await cleanup?.();
    cleanup = undefined;
  });

  it('carries a minimal scan over a loopback socket', async () => {
    const listener = new TcpListener('127.0.0.1', 0);
    const bridge = new JtagBridge({ listener, logger: createRecordingLogger() });
    await bridge.init();
    const stepper = new SimulationStepper(bridge, new LoopbackDut(), { pollInterval: 1 });
    const { socket, received } = await openClient(listener.port);
    cleanup = async () => {
      socket.destroy();
      await bridge.close();
    };
    expect(listener.port).toBeGreaterThan(0);

    socket.write(Buffer.from(minimalHeader(2, 8)));
    await runUntil(stepper, () => received.length >= 4);
    expect(received).toEqual([0, 0, 0, 0]);

    socket.write(Buffer.from([0x00, 0xaa]));
    await runUntil(stepper, () => received.length >= 5);
    expect(received).toEqual([0, 0, 0, 0, 0x54]);
    expect(bridge.protocolMode).toBe('legacy-minimal');
  });

  it('holds a second client until the first disconnects', async () => {
    const listener = new TcpListener('127.0.0.1', 0);
    const bridge = new JtagBridge({ listener, logger: createRecordingLogger() });
    await bridge.init();
    const stepper = new SimulationStepper(bridge, new LoopbackDut(), { pollInterval: 1 });
    const first = await openClient(listener.port);
    const second = await openClient(listener.port);
    cleanup = async () => {
      first.socket.destroy();
      second.socket.destroy();
      await bridge.close();
    };

    await runUntil(stepper, () => bridge.isClientConnected() && listener.pending === 1);
    second.socket.write(Buffer.from(minimalHeader(3, 0)));
    stepper.run(50);
    await yieldToEventLoop();
    expect(second.received).toEqual([]);

    first.socket.end();
    await runUntil(stepper, () => second.received.length >= 4);
    expect(second.received).toEqual([0, 0, 0, 0]);
  });
});
