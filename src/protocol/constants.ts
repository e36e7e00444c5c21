/**
 * @file Wire protocol constants for the minimal and OpenOCD jtag_vpi dialects.
 * @fileoverview
 */

// ===== Sizes =====
/** Minimal command header: cmd, 3 pad bytes, 32-bit length. */
export const MINIMAL_HEADER_SIZE = 8;
/** Minimal response: response, tdo, mode, status. */
export const MINIMAL_RESPONSE_SIZE = 4;
/** jtag_vpi data buffer size (each direction). */
export const VPI_BUFFER_SIZE = 512;
/** cmd(4) + buffer_out(512) + buffer_in(512) + length(4) + nb_bits(4). */
export const VPI_PACKET_SIZE = 4 + VPI_BUFFER_SIZE * 2 + 4 + 4;

// ===== Packet Field Offsets =====
export const VPI_OFFSET_CMD = 0;
export const VPI_OFFSET_BUFFER_OUT = 4;
export const VPI_OFFSET_BUFFER_IN = VPI_OFFSET_BUFFER_OUT + VPI_BUFFER_SIZE;
export const VPI_OFFSET_LENGTH = VPI_OFFSET_BUFFER_IN + VPI_BUFFER_SIZE;
export const VPI_OFFSET_NB_BITS = VPI_OFFSET_LENGTH + 4;

// ===== Limits =====
/** Longest scan accepted in either dialect. */
export const MAX_SCAN_BITS = 4096;
/** Pulses in the TMS=1 burst issued for RESET. */
export const RESET_PULSE_COUNT = 6;

// ===== Minimal Dialect Commands =====
export const MINIMAL_CMD_RESET = 0x00;
export const MINIMAL_CMD_TMS_SEQ = 0x01;
export const MINIMAL_CMD_SCAN = 0x02;
export const MINIMAL_CMD_SET_PORT = 0x03;

// ===== Minimal Dialect Response Codes =====
export const MINIMAL_RESPONSE_OK = 0x00;
export const MINIMAL_RESPONSE_ERROR = 0x01;
export const MINIMAL_STATUS_OK = 0x00;
export const MINIMAL_STATUS_FRAMING_ERROR = 0x01;

// ===== OpenOCD jtag_vpi Commands =====
export const VPI_CMD_RESET = 0;
export const VPI_CMD_TMS_SEQ = 1;
export const VPI_CMD_SCAN_CHAIN = 2;
export const VPI_CMD_SCAN_CHAIN_FLIP_TMS = 3;
export const VPI_CMD_STOP_SIMU = 4;
export const VPI_CMD_OSCAN1 = 5;

// ===== OScan1 Sub-command Bits (buffer_out[0]) =====
export const OSCAN1_TDI_BIT = 0x01;
export const OSCAN1_TMS_BIT = 0x02;

/** Bytes needed to hold a bit count. */
export function bytesForBits(bits: number): number {
  return Math.ceil(bits / 8);
}
