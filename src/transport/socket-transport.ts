/**
 * @fileoverview Transport over a Node TCP socket. Incoming data is buffered as
 * it arrives so the engines can read, and peek, synchronously from the tick
 * loop.
 */

import type { Socket } from 'net';
import type { ReadResult, Transport, WriteResult } from './transport';

export class SocketTransport implements Transport {
  readonly remote: string;
  private readonly socket: Socket;
  private chunks: Buffer[] = [];
  private queued = 0;
  private ended = false;
  private failure: { code: string; message: string } | undefined;

  constructor(socket: Socket) {
    this.socket = socket;
    this.remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    socket.setNoDelay(true);
    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.queued += chunk.length;
    });
    socket.on('end', () => {
      this.ended = true;
    });
    socket.on('close', () => {
      this.ended = true;
    });
    socket.on('error', (error: NodeJS.ErrnoException) => {
      this.failure = { code: error.code ?? 'EIO', message: error.message };
    });
    // sockets wait paused in the listener's accept queue
    socket.resume();
  }

  available(): number {
    return this.queued;
  }

  read(max: number): ReadResult {
    if (this.queued > 0 && max > 0) {
      return { status: 'data', bytes: this.take(max) };
    }
    if (this.failure !== undefined) {
      const { code, message } = this.failure;
      this.failure = undefined;
      return { status: 'error', code, message };
    }
    if (this.ended) {
      return { status: 'eof' };
    }
    return { status: 'would-block' };
  }

  write(bytes: Uint8Array): WriteResult {
    if (this.failure !== undefined) {
      const { code, message } = this.failure;
      this.failure = undefined;
      return { status: 'error', code, message };
    }
    if (this.socket.destroyed || !this.socket.writable) {
      return { status: 'error', code: 'ENOTCONN', message: 'socket is not writable' };
    }
    if (this.socket.writableNeedDrain) {
      return { status: 'would-block' };
    }
    this.socket.write(Buffer.from(bytes));
    return { status: 'sent', count: bytes.length };
  }

  close(): void {
    this.chunks = [];
    this.queued = 0;
    this.socket.destroy();
  }

  private take(max: number): Buffer {
    const parts: Buffer[] = [];
    let remaining = Math.min(max, this.queued);
    while (remaining > 0) {
      const head = this.chunks[0];
      if (head === undefined) {
        break;
      }
      if (head.length <= remaining) {
        parts.push(head);
        this.chunks.shift();
        remaining -= head.length;
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    const bytes = Buffer.concat(parts);
    this.queued -= bytes.length;
    return bytes;
  }
}
