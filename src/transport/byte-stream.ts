/**
 * @fileoverview Resumable receive and send cursors over a non-blocking
 * transport. Each keeps its byte position across polls so chunked or slow
 * streams never stall the tick loop.
 */

import { TransportError } from '../bridge/errors';
import type { BridgeLogger } from '../logging/logger';
import { classifyTransportError, type Transport } from './transport';

function handleFailure(
  result: { code: string; message: string },
  direction: 'recv' | 'send',
  logger: BridgeLogger
): void {
  if (classifyTransportError(result.code) === 'recoverable') {
    logger.warn(`${direction} error (${result.code}): ${result.message}, retrying`);
    return;
  }
  throw TransportError.fromSocket(result.code, result.message);
}

/**
 * Collects exactly `size` bytes, possibly over many polls.
 */
export class RxAccumulator {
  private bytes: Uint8Array;
  private received = 0;

  constructor(size: number) {
    this.bytes = new Uint8Array(size);
  }

  get size(): number {
    return this.bytes.length;
  }

  get count(): number {
    return this.received;
  }

  isComplete(): boolean {
    return this.received >= this.bytes.length;
  }

  /**
   * Reads what is available toward the target size.
   *
   * @returns true once all bytes have arrived
   * @throws TransportError on EOF or a fatal socket error
   */
  fill(transport: Transport, logger: BridgeLogger): boolean {
    if (this.isComplete()) {
      return true;
    }
    const result = transport.read(this.bytes.length - this.received);
    switch (result.status) {
      case 'data':
        this.bytes.set(result.bytes, this.received);
        this.received += result.bytes.length;
        break;
      case 'would-block':
        break;
      case 'eof':
        throw TransportError.peerClosed();
      case 'error':
        handleFailure(result, 'recv', logger);
        break;
    }
    return this.isComplete();
  }

  /**
   * Seeds the accumulator with bytes already read elsewhere.
   */
  prefill(prefix: Uint8Array): void {
    const count = Math.min(prefix.length, this.bytes.length - this.received);
    this.bytes.set(prefix.subarray(0, count), this.received);
    this.received += count;
  }

  /** Copy of the collected bytes. */
  take(): Uint8Array {
    return this.bytes.slice(0, this.received);
  }

  reset(size: number = this.bytes.length): void {
    if (size !== this.bytes.length) {
      this.bytes = new Uint8Array(size);
    } else {
      this.bytes.fill(0);
    }
    this.received = 0;
  }
}

/**
 * Ordered outbound byte queue. Responses are appended whole and drained
 * through a single cursor, so partial writes never reorder or drop bytes.
 */
export class TxQueue {
  private chunks: Uint8Array[] = [];
  private offset = 0;

  enqueue(bytes: Uint8Array): void {
    if (bytes.length > 0) {
      this.chunks.push(bytes);
    }
  }

  isEmpty(): boolean {
    return this.chunks.length === 0;
  }

  /** Bytes still waiting to be sent. */
  pendingBytes(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.length, 0) - this.offset;
  }

  /**
   * Sends as much as the transport accepts.
   *
   * @returns true when the queue is empty
   * @throws TransportError on a fatal socket error
   */
  flush(transport: Transport, logger: BridgeLogger): boolean {
    while (this.chunks.length > 0) {
      const head = this.chunks[0];
      if (head === undefined) {
        break;
      }
      const result = transport.write(head.subarray(this.offset));
      if (result.status === 'would-block') {
        return false;
      }
      if (result.status === 'error') {
        handleFailure(result, 'send', logger);
        return false;
      }
      this.offset += result.count;
      if (this.offset < head.length) {
        return false;
      }
      this.chunks.shift();
      this.offset = 0;
    }
    return true;
  }
}
