/**
 * @fileoverview Non-blocking byte transport seen by the bridge engines.
 * Mirrors recv/send semantics: a read may return data, nothing yet, EOF or an
 * error; a write may accept fewer bytes than offered.
 */

export type ReadResult =
  | { status: 'data'; bytes: Buffer }
  | { status: 'would-block' }
  | { status: 'eof' }
  | { status: 'error'; code: string; message: string };

export type WriteResult =
  | { status: 'sent'; count: number }
  | { status: 'would-block' }
  | { status: 'error'; code: string; message: string };

export interface Transport {
  /** Human-readable peer description for logs. */
  readonly remote: string;
  /** Bytes received and not yet read; a non-destructive peek. */
  available(): number;
  /** Reads up to `max` bytes without blocking. */
  read(max: number): ReadResult;
  /** Offers bytes for sending without blocking. */
  write(bytes: Uint8Array): WriteResult;
  close(): void;
}

/**
 * Hands out transports for newly connected clients.
 */
export interface TransportListener {
  /** Address the listener is bound to, once listening. */
  readonly address: string;
  listen(): Promise<void>;
  /** Next waiting client in arrival order, if any. */
  accept(): Transport | undefined;
  close(): Promise<void>;
}

export type TransportErrorClass = 'recoverable' | 'fatal';

const RECOVERABLE_CODES: ReadonlySet<string> = new Set([
  'EAGAIN',
  'EWOULDBLOCK',
  'EINTR',
  'ETIMEDOUT',
]);

/**
 * Recoverable errors keep the partial-transfer cursor and retry on the next
 * poll; everything else (EPIPE, ECONNRESET, ENOTCONN, ...) closes the
 * connection.
 */
export function classifyTransportError(code: string): TransportErrorClass {
  return RECOVERABLE_CODES.has(code) ? 'recoverable' : 'fatal';
}
