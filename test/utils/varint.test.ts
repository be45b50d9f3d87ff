import { describe, expect, test } from 'vitest';
import { ProtocolError } from '../../src/core/errors.js';
import { encodeVarInt, readVarIntSync, writeVarIntSync, varIntLength } from '../../src/core/varint.js';

describe('VarInt', () => {
  test('readVarIntSync - single byte', () => {
    const buffer = new Uint8Array([0x00]);
    const result = readVarIntSync(buffer, 0);
    expect(result.value).toBe(0);
    expect(result.offset).toBe(1);
  });

  test('readVarIntSync - two bytes', () => {
    const buffer = new Uint8Array([0x80, 0x01]);
    const result = readVarIntSync(buffer, 0);
    expect(result.value).toBe(128);
    expect(result.offset).toBe(2);
  });

  test('readVarIntSync - three bytes', () => {
    const buffer = new Uint8Array([0x80, 0x80, 0x01]);
    const result = readVarIntSync(buffer, 0);
    expect(result.value).toBe(16384);
    expect(result.offset).toBe(3);
  });

  test('readVarIntSync - max value with 5 bytes', () => {
    const buffer = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x07]);
    const result = readVarIntSync(buffer, 0);
    expect(result.value).toBe(2147483647);
    expect(result.offset).toBe(5);
  });

  test('readVarIntSync - all 32 bits set reads back unsigned', () => {
    const buffer = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x0f]);
    expect(readVarIntSync(buffer, 0)).toEqual({ value: 4294967295, offset: 5 });
  });

  test('readVarIntSync - starts at the given offset', () => {
    const buffer = new Uint8Array([0xaa, 0xdd, 0xc7, 0x01]);
    expect(readVarIntSync(buffer, 1)).toEqual({ value: 25565, offset: 4 });
  });

  test('readVarIntSync - sixth byte is a size violation', () => {
    const buffer = new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]);
    let code: string | undefined;
    try {
      readVarIntSync(buffer, 0);
    } catch (error) {
      if (error instanceof ProtocolError) code = error.code;
    }
    expect(code).toBe('VARINT_TOO_BIG');
  });

  test('readVarIntSync - five continuation bytes fail even without a sixth', () => {
    const buffer = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff]);
    expect(() => readVarIntSync(buffer, 0)).toThrow('VarInt too big');
  });

  test('readVarIntSync - truncated input reports a short buffer', () => {
    expect(() => readVarIntSync(new Uint8Array([0x80]), 0)).toThrow('Buffer too short');
    expect(() => readVarIntSync(new Uint8Array([]), 0)).toThrow('Buffer too short');
  });

  test('writeVarIntSync - single byte', () => {
    const buffer = new Uint8Array(5);
    const offset = writeVarIntSync(buffer, 0, 0);
    expect(offset).toBe(1);
    expect(buffer.slice(0, offset)).toEqual(new Uint8Array([0x00]));
  });

  test('writeVarIntSync - two bytes', () => {
    const buffer = new Uint8Array(5);
    const offset = writeVarIntSync(buffer, 128, 0);
    expect(offset).toBe(2);
    expect(buffer.slice(0, offset)).toEqual(new Uint8Array([0x80, 0x01]));
  });

  test('encodeVarInt - protocol 765', () => {
    expect(encodeVarInt(765)).toEqual(new Uint8Array([0xfd, 0x05]));
  });

  test('round trip across the 32-bit range', () => {
    const values = [0, 1, 127, 128, 255, 16383, 16384, 2097151, 2097152, 268435455, 268435456, 2147483647, 2147483648, 4294967295];
    for (const value of values) {
      const buffer = new Uint8Array(5);
      const offset = writeVarIntSync(buffer, value, 0);
      expect(offset).toBe(varIntLength(value));
      expect(readVarIntSync(buffer, 0)).toEqual({ value, offset });
    }
  });

  test('varIntLength', () => {
    expect(varIntLength(0)).toBe(1);
    expect(varIntLength(127)).toBe(1);
    expect(varIntLength(128)).toBe(2);
    expect(varIntLength(16383)).toBe(2);
    expect(varIntLength(16384)).toBe(3);
    expect(varIntLength(2097151)).toBe(3);
    expect(varIntLength(2097152)).toBe(4);
    expect(varIntLength(268435455)).toBe(4);
    expect(varIntLength(268435456)).toBe(5);
    expect(varIntLength(2147483647)).toBe(5);
    expect(varIntLength(4294967295)).toBe(5);
  });
});
