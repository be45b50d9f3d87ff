import { ProtocolError } from './errors.js';
import { readString, type Frame } from './packet.js';
import { readVarIntSync } from './varint.js';

export const HANDSHAKE_PACKET_ID = 0x00;

/** Largest frame accepted anywhere in the handshake/status/login subset */
export const MAX_PACKET_LENGTH = 4096;

export interface Handshake {
  packetLength: number;
  packetId: number;
  protocolVersion: number;
  serverAddress: string;
  serverPort: number;
  nextState: number;
}

/**
 * Decodes the fields of an already framed handshake packet.
 * The frame is complete, so running out of bytes here means the client sent garbage.
 */
export function decodeHandshake(frame: Frame): Handshake {
  if (frame.id !== HANDSHAKE_PACKET_ID) {
    throw new ProtocolError(`Expected packet ID 0x00 for handshake, got ${frame.id}`, 'UNEXPECTED_PACKET');
  }

  const payload = frame.payload;
  try {
    // Read protocol version (VarInt)
    const protocolVersionResult = readVarIntSync(payload, 0);
    let offset = protocolVersionResult.offset;

    // Read server address (string)
    const addressResult = readString(payload, offset);
    offset = addressResult.offset;

    // Read server port (unsigned short, 2 bytes, big-endian)
    if (offset + 2 > payload.length) {
      throw new ProtocolError('Handshake truncated before server port', 'INVALID_HANDSHAKE');
    }
    const serverPort = (payload[offset]! << 8) | payload[offset + 1]!;
    offset += 2;

    // Read next state (VarInt)
    const nextStateResult = readVarIntSync(payload, offset);
    offset = nextStateResult.offset;

    if (offset !== payload.length) {
      throw new ProtocolError(
        `Parsed ${offset} payload bytes but handshake carries ${payload.length}`,
        'INVALID_HANDSHAKE'
      );
    }

    return {
      packetLength: frame.body.length,
      packetId: frame.id,
      protocolVersion: protocolVersionResult.value,
      serverAddress: addressResult.value,
      serverPort,
      nextState: nextStateResult.value,
    };
  } catch (error) {
    if (error instanceof ProtocolError && error.code === 'BUFFER_TOO_SHORT') {
      throw new ProtocolError('Handshake fields overrun the packet', 'INVALID_HANDSHAKE');
    }
    throw error;
  }
}

