/**
 * @fileoverview Encode/decode for the minimal 8-byte command dialect.
 *
 * Request:  cmd:u8, pad:u8[3], length:u32 (network order; host order tolerated)
 * Response: response:u8, tdo:u8, mode:u8, status:u8
 */

import { FramingError } from '../bridge/errors';
import type { Command } from '../bridge/types';
import {
  MAX_SCAN_BITS,
  MINIMAL_CMD_RESET,
  MINIMAL_CMD_SCAN,
  MINIMAL_CMD_SET_PORT,
  MINIMAL_CMD_TMS_SEQ,
  MINIMAL_HEADER_SIZE,
  MINIMAL_RESPONSE_SIZE,
} from './constants';

export interface MinimalHeader {
  cmd: number;
  length: number;
}

export interface MinimalResponse {
  response: number;
  tdo: number;
  mode: number;
  status: number;
}

export type LengthByteOrder = 'big-endian' | 'little-endian';

/**
 * Reads the header's length field. Network order is preferred; when that
 * reading is implausible (> 4096) the little-endian reading is taken instead.
 */
export function readTolerantLength(header: Uint8Array): number {
  const view = new DataView(header.buffer, header.byteOffset, header.byteLength);
  const bigEndian = view.getUint32(4, false);
  if (bigEndian <= MAX_SCAN_BITS) {
    return bigEndian;
  }
  return view.getUint32(4, true);
}

export function decodeMinimalHeader(bytes: Uint8Array): MinimalHeader {
  if (bytes.length < MINIMAL_HEADER_SIZE) {
    throw new RangeError(`Minimal header needs ${MINIMAL_HEADER_SIZE} bytes, got ${bytes.length}`);
  }
  return { cmd: bytes[0] ?? 0, length: readTolerantLength(bytes) };
}

export function encodeMinimalHeader(
  header: MinimalHeader,
  byteOrder: LengthByteOrder = 'big-endian'
): Buffer {
  const bytes = Buffer.alloc(MINIMAL_HEADER_SIZE);
  bytes.writeUInt8(header.cmd & 0xff, 0);
  if (byteOrder === 'big-endian') {
    bytes.writeUInt32BE(header.length >>> 0, 4);
  } else {
    bytes.writeUInt32LE(header.length >>> 0, 4);
  }
  return bytes;
}

export function encodeMinimalResponse(response: MinimalResponse): Buffer {
  return Buffer.from([
    response.response & 0xff,
    response.tdo & 0xff,
    response.mode & 0xff,
    response.status & 0xff,
  ]);
}

export function decodeMinimalResponse(bytes: Uint8Array): MinimalResponse {
  if (bytes.length < MINIMAL_RESPONSE_SIZE) {
    throw new RangeError(
      `Minimal response needs ${MINIMAL_RESPONSE_SIZE} bytes, got ${bytes.length}`
    );
  }
  return {
    response: bytes[0] ?? 0,
    tdo: bytes[1] ?? 0,
    mode: bytes[2] ?? 0,
    status: bytes[3] ?? 0,
  };
}

/**
 * Maps a header onto a command. Scan and TMS buffers are empty here: in this
 * dialect they follow the header on the wire.
 *
 * @throws FramingError for unknown commands and implausible lengths
 */
export function minimalHeaderToCommand(header: MinimalHeader): Command {
  const { cmd, length } = header;
  if (length > MAX_SCAN_BITS) {
    throw FramingError.badLength(cmd, length);
  }
  switch (cmd) {
    case MINIMAL_CMD_RESET:
      return { kind: 'reset' };
    case MINIMAL_CMD_SET_PORT:
      return { kind: 'set-port' };
    case MINIMAL_CMD_TMS_SEQ:
      if (length === 0) {
        throw FramingError.badLength(cmd, length);
      }
      return { kind: 'tms-seq', bits: length, tms: new Uint8Array(0) };
    case MINIMAL_CMD_SCAN:
      if (length === 0) {
        throw FramingError.badLength(cmd, length);
      }
      return { kind: 'scan', bits: length, tdi: new Uint8Array(0), flipTmsOnLast: false };
    default:
      throw FramingError.unknownCommand(cmd, length);
  }
}

/**
 * Builds the header a client sends for a command. OScan1 and stop have no
 * minimal form.
 */
export function commandToMinimalHeader(command: Command): MinimalHeader {
  switch (command.kind) {
    case 'reset':
      return { cmd: MINIMAL_CMD_RESET, length: 0 };
    case 'set-port':
      return { cmd: MINIMAL_CMD_SET_PORT, length: 0 };
    case 'tms-seq':
      return { cmd: MINIMAL_CMD_TMS_SEQ, length: command.bits };
    case 'scan':
      return { cmd: MINIMAL_CMD_SCAN, length: command.bits };
    case 'oscan1-edge':
    case 'stop-simulation':
      throw new FramingError(
        `Command "${command.kind}" has no minimal-dialect encoding`,
        -1,
        0
      );
  }
}
