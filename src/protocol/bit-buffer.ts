/**
 * @fileoverview Bit addressing inside packed scan buffers.
 * Bit i lives in byte i >> 3; its position inside the byte depends on the
 * configured bit order.
 */

import type { Bit, BitOrder } from '../bridge/types';

function bitMask(index: number, order: BitOrder): number {
  const offset = index & 7;
  return 1 << (order === 'msb-first' ? 7 - offset : offset);
}

export function getBit(buffer: Uint8Array, index: number, order: BitOrder = 'lsb-first'): Bit {
  const byte = buffer[index >> 3] ?? 0;
  return (byte & bitMask(index, order)) !== 0 ? 1 : 0;
}

export function setBit(
  buffer: Uint8Array,
  index: number,
  value: Bit,
  order: BitOrder = 'lsb-first'
): void {
  const byteIndex = index >> 3;
  if (byteIndex >= buffer.length) {
    throw new RangeError(`Bit ${index} outside a ${buffer.length}-byte buffer`);
  }
  const mask = bitMask(index, order);
  const current = buffer[byteIndex] ?? 0;
  buffer[byteIndex] = value ? current | mask : current & ~mask & 0xff;
}

/**
 * Packs a list of bits into bytes (test and client helper).
 */
export function packBits(bits: readonly Bit[], order: BitOrder = 'lsb-first'): Uint8Array {
  const buffer = new Uint8Array(Math.ceil(bits.length / 8));
  bits.forEach((bit, index) => setBit(buffer, index, bit, order));
  return buffer;
}

export function unpackBits(
  buffer: Uint8Array,
  count: number,
  order: BitOrder = 'lsb-first'
): Bit[] {
  const bits: Bit[] = [];
  for (let i = 0; i < count; i += 1) {
    bits.push(getBit(buffer, i, order));
  }
  return bits;
}
