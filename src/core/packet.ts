import { ProtocolError } from './errors.js';
import { encodeVarInt, readVarIntSync, varIntLength, writeVarIntSync } from './varint.js';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export interface Frame {
    /** Packet id, the first VarInt of the body */
    id: number;
    /** Body without the length prefix (id included) */
    body: Uint8Array;
    /** Bytes after the packet id */
    payload: Uint8Array;
    /** The frame exactly as received */
    raw: Uint8Array;
    /** Total bytes consumed, length prefix included */
    size: number;
}

/**
 * Reads one `varint(length) ++ body` frame from the start of the buffer.
 * Throws `ProtocolError('BUFFER_TOO_SHORT')` while the frame is incomplete.
 */
export function readFrame(buffer: Uint8Array, maxLength: number): Frame {
    const { value: length, offset } = readVarIntSync(buffer, 0);

    if (length === 0) {
        throw new ProtocolError('Empty packet', 'EMPTY_PACKET');
    }
    if (length > maxLength) {
        throw new ProtocolError(`Packet length ${length} exceeds ${maxLength}`, 'PACKET_TOO_LARGE');
    }
    if (buffer.length < offset + length) {
        throw new ProtocolError('Buffer too short', 'BUFFER_TOO_SHORT');
    }

    const body = buffer.subarray(offset, offset + length);
    // The id must fit inside the declared body; running off its end is a violation, not a short read.
    let idResult: { value: number; offset: number };
    try {
        idResult = readVarIntSync(body, 0);
    } catch (error) {
        if (error instanceof ProtocolError && error.code === 'BUFFER_TOO_SHORT') {
            throw new ProtocolError('Packet id overruns packet body', 'UNEXPECTED_PACKET');
        }
        throw error;
    }

    return {
        id: idResult.value,
        body,
        payload: body.subarray(idResult.offset),
        raw: buffer.subarray(0, offset + length),
        size: offset + length,
    };
}

/**
 * Builds `varint(length) ++ varint(id) ++ payload`.
 */
export function encodeFrame(id: number, payload: Uint8Array): Uint8Array {
    const bodyLength = varIntLength(id) + payload.length;
    const frame = new Uint8Array(varIntLength(bodyLength) + bodyLength);
    let offset = writeVarIntSync(frame, bodyLength, 0);
    offset = writeVarIntSync(frame, id, offset);
    frame.set(payload, offset);
    return frame;
}

/**
 * Reads a `varint(byteLength) ++ utf8` string.
 */
export function readString(buffer: Uint8Array, offset: number): { value: string; offset: number } {
    const lengthResult = readVarIntSync(buffer, offset);
    const end = lengthResult.offset + lengthResult.value;
    if (end > buffer.length) {
        throw new ProtocolError('Buffer too short', 'BUFFER_TOO_SHORT');
    }
    return {
        value: textDecoder.decode(buffer.subarray(lengthResult.offset, end)),
        offset: end,
    };
}

export function encodeString(value: string): Uint8Array {
    const bytes = textEncoder.encode(value);
    const length = encodeVarInt(bytes.length);
    const out = new Uint8Array(length.length + bytes.length);
    out.set(length);
    out.set(bytes, length.length);
    return out;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
    const out = new Uint8Array(a.length + b.length);
    out.set(a);
    out.set(b, a.length);
    return out;
}
