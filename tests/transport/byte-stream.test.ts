/**
 * @file Receive accumulator and send queue tests.
 */

import { describe, it, expect } from 'vitest';
import { isTransportError } from '../../src/bridge/errors';
import { RxAccumulator, TxQueue } from '../../src/transport/byte-stream';
import { classifyTransportError } from '../../src/transport/transport';
import { FakeTransport, createRecordingLogger } from '../helpers/fakes';

describe('RxAccumulator', () => {
  it('collects bytes over several fills without overreading', () => {
    const transport = new FakeTransport();
    const logger = createRecordingLogger();
    const rx = new RxAccumulator(4);
    transport.push([1, 2]);
    expect(rx.fill(transport, logger)).toBe(false);
    transport.push([3, 4, 5]);
    expect(rx.fill(transport, logger)).toBe(true);
    expect(Array.from(rx.take())).toEqual([1, 2, 3, 4]);
    expect(transport.available()).toBe(1);
  });

  it('counts prefilled bytes toward the target', () => {
    const transport = new FakeTransport();
    const rx = new RxAccumulator(3);
    rx.prefill(Uint8Array.of(9, 8));
    transport.push([7]);
    expect(rx.fill(transport, createRecordingLogger())).toBe(true);
    expect(Array.from(rx.take())).toEqual([9, 8, 7]);
    rx.reset(5);
    expect(rx.size).toBe(5);
    expect(rx.count).toBe(0);
  });

  it('throws a transport error at end of stream', () => {
    const transport = new FakeTransport();
    transport.end();
    let caught: unknown;
    try {
      new RxAccumulator(1).fill(transport, createRecordingLogger());
    } catch (error) {
      caught = error;
    }
    expect(isTransportError(caught) && caught.reason).toBe('eof');
  });

  it('throws on fatal errors and retries recoverable ones', () => {
    const transport = new FakeTransport();
    const logger = createRecordingLogger();
    const rx = new RxAccumulator(1);
    transport.failNextRead('EINTR', 'interrupted');
    expect(rx.fill(transport, logger)).toBe(false);
    expect(logger.lines).toEqual(['warn recv error (EINTR): interrupted, retrying']);
    transport.failNextRead('ECONNRESET', 'reset');
    expect(() => rx.fill(transport, logger)).toThrow('Socket error (ECONNRESET): reset');
  });
});

describe('TxQueue', () => {
  it('keeps its cursor across partial writes', () => {
    const transport = new FakeTransport();
    const logger = createRecordingLogger();
    const tx = new TxQueue();
    tx.enqueue(Uint8Array.of(1, 2, 3));
    tx.enqueue(Uint8Array.of(4, 5));
    transport.writeLimit = 2;
    expect(tx.flush(transport, logger)).toBe(false);
    expect(tx.pendingBytes()).toBe(3);
    expect(Array.from(transport.output())).toEqual([1, 2]);
    expect(tx.flush(transport, logger)).toBe(true);
    expect(Array.from(transport.output())).toEqual([1, 2, 3, 4, 5]);
    expect(tx.isEmpty()).toBe(true);
  });

  it('leaves bytes queued while the socket would block', () => {
    const transport = new FakeTransport();
    transport.writeLimit = 0;
    const tx = new TxQueue();
    tx.enqueue(Uint8Array.of(1));
    expect(tx.flush(transport, createRecordingLogger())).toBe(false);
    expect(tx.pendingBytes()).toBe(1);
    expect(tx.isEmpty()).toBe(false);
  });
});

describe('classifyTransportError', () => {
  it('retries only transient conditions', () => {
    expect(classifyTransportError('EAGAIN')).toBe('recoverable');
    expect(classifyTransportError('EWOULDBLOCK')).toBe('recoverable');
    expect(classifyTransportError('EINTR')).toBe('recoverable');
    expect(classifyTransportError('ETIMEDOUT')).toBe('recoverable');
    expect(classifyTransportError('EPIPE')).toBe('fatal');
    expect(classifyTransportError('ECONNRESET')).toBe('fatal');
  });
});
