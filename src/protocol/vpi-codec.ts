/**
 * @fileoverview Encode/decode for OpenOCD's fixed-size jtag_vpi packet.
 * All integer fields are little-endian.
 */

import { FramingError } from '../bridge/errors';
import type { Bit, Command } from '../bridge/types';
import {
  MAX_SCAN_BITS,
  OSCAN1_TDI_BIT,
  OSCAN1_TMS_BIT,
  VPI_BUFFER_SIZE,
  VPI_CMD_OSCAN1,
  VPI_CMD_RESET,
  VPI_CMD_SCAN_CHAIN,
  VPI_CMD_SCAN_CHAIN_FLIP_TMS,
  VPI_CMD_STOP_SIMU,
  VPI_CMD_TMS_SEQ,
  VPI_OFFSET_BUFFER_IN,
  VPI_OFFSET_BUFFER_OUT,
  VPI_OFFSET_CMD,
  VPI_OFFSET_LENGTH,
  VPI_OFFSET_NB_BITS,
  VPI_PACKET_SIZE,
  bytesForBits,
} from './constants';

/**
 * One jtag_vpi packet. Both buffers are always VPI_BUFFER_SIZE bytes.
 */
export interface VpiPacket {
  cmd: number;
  bufferOut: Uint8Array;
  bufferIn: Uint8Array;
  length: number;
  nbBits: number;
}

export function createVpiPacket(fields: Partial<VpiPacket> = {}): VpiPacket {
  const packet: VpiPacket = {
    cmd: fields.cmd ?? 0,
    bufferOut: new Uint8Array(VPI_BUFFER_SIZE),
    bufferIn: new Uint8Array(VPI_BUFFER_SIZE),
    length: fields.length ?? 0,
    nbBits: fields.nbBits ?? 0,
  };
  if (fields.bufferOut) {
    packet.bufferOut.set(fields.bufferOut.subarray(0, VPI_BUFFER_SIZE));
  }
  if (fields.bufferIn) {
    packet.bufferIn.set(fields.bufferIn.subarray(0, VPI_BUFFER_SIZE));
  }
  return packet;
}

export function encodeVpiPacket(packet: VpiPacket): Buffer {
  const bytes = Buffer.alloc(VPI_PACKET_SIZE);
  bytes.writeUInt32LE(packet.cmd >>> 0, VPI_OFFSET_CMD);
  bytes.set(packet.bufferOut.subarray(0, VPI_BUFFER_SIZE), VPI_OFFSET_BUFFER_OUT);
  bytes.set(packet.bufferIn.subarray(0, VPI_BUFFER_SIZE), VPI_OFFSET_BUFFER_IN);
  bytes.writeUInt32LE(packet.length >>> 0, VPI_OFFSET_LENGTH);
  bytes.writeUInt32LE(packet.nbBits >>> 0, VPI_OFFSET_NB_BITS);
  return bytes;
}

export function decodeVpiPacket(bytes: Uint8Array): VpiPacket {
  if (bytes.length < VPI_PACKET_SIZE) {
    throw new RangeError(`jtag_vpi packet needs ${VPI_PACKET_SIZE} bytes, got ${bytes.length}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, VPI_PACKET_SIZE);
  return {
    cmd: view.getUint32(VPI_OFFSET_CMD, true),
    bufferOut: new Uint8Array(bytes.subarray(VPI_OFFSET_BUFFER_OUT, VPI_OFFSET_BUFFER_IN)),
    bufferIn: new Uint8Array(bytes.subarray(VPI_OFFSET_BUFFER_IN, VPI_OFFSET_LENGTH)),
    length: view.getUint32(VPI_OFFSET_LENGTH, true),
    nbBits: view.getUint32(VPI_OFFSET_NB_BITS, true),
  };
}

function checkBits(packet: VpiPacket): number {
  if (packet.nbBits > MAX_SCAN_BITS) {
    throw FramingError.badLength(packet.cmd, packet.nbBits);
  }
  return packet.nbBits;
}

/**
 * Interprets a received packet.
 *
 * @throws FramingError for unknown commands and bit counts above 4096
 */
export function vpiPacketToCommand(packet: VpiPacket): Command {
  switch (packet.cmd) {
    case VPI_CMD_RESET:
      return { kind: 'reset' };
    case VPI_CMD_TMS_SEQ: {
      const bits = checkBits(packet);
      return { kind: 'tms-seq', bits, tms: packet.bufferOut.slice(0, bytesForBits(bits)) };
    }
    case VPI_CMD_SCAN_CHAIN:
    case VPI_CMD_SCAN_CHAIN_FLIP_TMS: {
      const bits = checkBits(packet);
      return {
        kind: 'scan',
        bits,
        tdi: packet.bufferOut.slice(0, bytesForBits(bits)),
        flipTmsOnLast: packet.cmd === VPI_CMD_SCAN_CHAIN_FLIP_TMS,
      };
    }
    case VPI_CMD_STOP_SIMU:
      return { kind: 'stop-simulation' };
    case VPI_CMD_OSCAN1: {
      const control = packet.bufferOut[0] ?? 0;
      const tms: Bit = (control & OSCAN1_TMS_BIT) !== 0 ? 1 : 0;
      const tdi: Bit = (control & OSCAN1_TDI_BIT) !== 0 ? 1 : 0;
      return { kind: 'oscan1-edge', tms, tdi };
    }
    default:
      throw FramingError.unknownCommand(packet.cmd, packet.nbBits);
  }
}

/**
 * Builds the packet a client sends for a command. 'set-port' is a
 * minimal-dialect query and has no packet form.
 */
export function commandToVpiPacket(command: Command): VpiPacket {
  switch (command.kind) {
    case 'reset':
      return createVpiPacket({ cmd: VPI_CMD_RESET });
    case 'tms-seq':
      return createVpiPacket({
        cmd: VPI_CMD_TMS_SEQ,
        bufferOut: command.tms,
        length: bytesForBits(command.bits),
        nbBits: command.bits,
      });
    case 'scan':
      return createVpiPacket({
        cmd: command.flipTmsOnLast ? VPI_CMD_SCAN_CHAIN_FLIP_TMS : VPI_CMD_SCAN_CHAIN,
        bufferOut: command.tdi,
        length: bytesForBits(command.bits),
        nbBits: command.bits,
      });
    case 'stop-simulation':
      return createVpiPacket({ cmd: VPI_CMD_STOP_SIMU });
    case 'oscan1-edge':
      return createVpiPacket({
        cmd: VPI_CMD_OSCAN1,
        bufferOut: Uint8Array.of(
          (command.tms ? OSCAN1_TMS_BIT : 0) | (command.tdi ? OSCAN1_TDI_BIT : 0)
        ),
        length: 1,
        nbBits: 2,
      });
    case 'set-port':
      throw new FramingError('Command "set-port" has no jtag_vpi packet encoding', -1, 0);
  }
}
