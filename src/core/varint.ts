/**
 * VarInt utilities for Minecraft protocol
 * Based on Minecraft protocol specification: https://wiki.vg/Protocol#VarInt_and_VarLong
 */
import { ProtocolError } from './errors.js';

export const MAX_VARINT_BYTES = 5;

/**
 * Reads a VarInt from a buffer starting at the given offset.
 * Returns the value and the new offset.
 *
 * Values are returned unsigned, so every 32-bit pattern in [0, 2^32) survives a
 * write/read cycle. A sixth byte is rejected before the buffer is checked for
 * more data: five bytes with the continuation bit set can never become valid.
 */
export function readVarIntSync(buffer: Uint8Array, offset: number): { value: number; offset: number } {
  let result = 0;
  let shift = 0;
  let byte: number;
  let bytesRead = 0;

  do {
    if (bytesRead >= MAX_VARINT_BYTES) {
      throw new ProtocolError('VarInt too big', 'VARINT_TOO_BIG');
    }

    if (offset >= buffer.length) {
      throw new ProtocolError('Buffer too short', 'BUFFER_TOO_SHORT');
    }

    byte = buffer[offset]!;
    offset++;
    bytesRead++;

    result |= (byte & 0x7F) << shift;
    shift += 7;
  } while ((byte & 0x80) !== 0);

  return { value: result >>> 0, offset };
}

/**
 * Writes a VarInt to a buffer at the given offset.
 * Returns the new offset.
 */
export function writeVarIntSync(buffer: Uint8Array, value: number, offset: number): number {
  do {
    let temp = value & 0x7F;
    value >>>= 7;
    if (value !== 0) {
      temp |= 0x80;
    }
    buffer[offset++] = temp;
  } while (value !== 0);
  return offset;
}

/**
 * Calculates the number of bytes required to encode a VarInt.
 */
export function varIntLength(value: number): number {
  let length = 0;
  do {
    value >>>= 7;
    length++;
  } while (value !== 0);
  return length;
}

export function encodeVarInt(value: number): Uint8Array {
  const buffer = new Uint8Array(varIntLength(value));
  writeVarIntSync(buffer, value, 0);
  return buffer;
}
