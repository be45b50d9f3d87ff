import type { Protocol, Packet } from './Protocol.js';
import { ProtocolError } from '../core/errors.js';
import { MAX_PACKET_LENGTH } from '../core/handshake.js';
import { readFrame, type Frame } from '../core/packet.js';

/**
 * Splits the Minecraft stream into `varint(length) ++ body` frames.
 */
export class MinecraftProtocol implements Protocol<Frame> {
    constructor(private readonly maxPacketLength: number = MAX_PACKET_LENGTH) {}

    parse(buffer: Uint8Array): Packet<Frame> | null {
        if (buffer.length === 0) return null;
        try {
            const frame = readFrame(buffer, this.maxPacketLength);
            return { size: frame.size, id: frame.id, data: frame };
        } catch (error) {
            if (error instanceof ProtocolError && error.code === 'BUFFER_TOO_SHORT') {
                return null;
            }
            throw error;
        }
    }
}
