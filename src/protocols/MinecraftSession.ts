import { ProtocolError } from '../core/errors.js';
import { decodeHandshake, MAX_PACKET_LENGTH, type Handshake } from '../core/handshake.js';
import { concatBytes, encodeFrame, encodeString, type Frame } from '../core/packet.js';
import type { ServerStatus } from '../core/types.js';
import { MinecraftProtocol } from './MinecraftProtocol.js';
import type { Packet } from './Protocol.js';

export type SessionState = 'handshake' | 'status' | 'statusPing' | 'login' | 'closed';

const STATUS_REQUEST_ID = 0x00;
const STATUS_RESPONSE_ID = 0x00;
const PING_ID = 0x01;
const LOGIN_START_ID = 0x00;
const LOGIN_DISCONNECT_ID = 0x00;
/** Packet id + 8-byte ping payload */
const MIN_PING_BODY = 9;

export interface LoginAttempt {
    protocolVersion: number;
    serverAddress: string;
    remoteAddress: string;
}

export interface SessionHandlers {
    status(protocolVersion: number): ServerStatus;
    login(attempt: LoginAttempt): void;
    disconnectMessage(): string;
}

export interface SessionOutput {
    writes: Uint8Array[];
    close: boolean;
}

/**
 * Parse state of a single accepted connection:
 * handshake -> status -> statusPing -> closed, or handshake -> login -> closed.
 *
 * Feed raw bytes with `receive`; the returned writes go to the client in order.
 * Violations throw `ProtocolError` and the caller drops the connection.
 */
export class MinecraftSession {
    private buffer: Uint8Array = new Uint8Array();
    private current: SessionState = 'handshake';
    private protocolVersion = 0;
    private serverAddress = '';
    private nextState = 0;
    private readonly protocol: MinecraftProtocol;

    constructor(
        private readonly handlers: SessionHandlers,
        private readonly remoteAddress = 'unknown',
        private readonly maxBuffered = MAX_PACKET_LENGTH
    ) {
        this.protocol = new MinecraftProtocol(maxBuffered);
    }

    get state(): SessionState {
        return this.current;
    }

    /** Client's declared protocol version, 0 until the handshake is parsed */
    get declaredProtocol(): number {
        return this.protocolVersion;
    }

    get declaredNextState(): number {
        return this.nextState;
    }

    receive(chunk: Uint8Array): SessionOutput {
        const output: SessionOutput = { writes: [], close: false };
        if (this.current === 'closed') {
            output.close = true;
            return output;
        }

        if (this.buffer.length + chunk.length > this.maxBuffered) {
            this.current = 'closed';
            throw new ProtocolError(
                `Buffered ${this.buffer.length + chunk.length} bytes without a complete packet`,
                'PACKET_TOO_LARGE'
            );
        }
        this.buffer = concatBytes(this.buffer, chunk);

        while (this.state !== 'closed') {
            let packet: Packet<Frame> | null;
            try {
                packet = this.protocol.parse(this.buffer);
            } catch (error) {
                this.current = 'closed';
                throw error;
            }
            if (!packet) break;

            this.buffer = this.buffer.subarray(packet.size);
            this.handleFrame(packet.data, output);
        }

        output.close = this.state === 'closed';
        return output;
    }

    private handleFrame(frame: Frame, output: SessionOutput): void {
        switch (this.current) {
            case 'handshake':
                this.onHandshake(frame);
                return;
            case 'status':
                this.onStatusRequest(frame, output);
                return;
            case 'statusPing':
                this.onPing(frame, output);
                return;
            case 'login':
                this.onLoginStart(frame, output);
                return;
            case 'closed':
                return;
        }
    }

    private onHandshake(frame: Frame): void {
        let handshake: Handshake;
        try {
            handshake = decodeHandshake(frame);
        } catch (error) {
            this.current = 'closed';
            throw error;
        }
        this.protocolVersion = handshake.protocolVersion;
        this.serverAddress = handshake.serverAddress;
        this.nextState = handshake.nextState;

        if (handshake.nextState === 1) {
            this.current = 'status';
        } else if (handshake.nextState === 2) {
            this.current = 'login';
        } else {
            this.current = 'closed';
        }
    }

    private onStatusRequest(frame: Frame, output: SessionOutput): void {
        if (frame.id !== STATUS_REQUEST_ID) {
            this.current = 'closed';
            throw new ProtocolError(`Expected status request, got packet ${frame.id}`, 'UNEXPECTED_PACKET');
        }
        const status = this.handlers.status(this.protocolVersion);
        output.writes.push(encodeFrame(STATUS_RESPONSE_ID, encodeString(JSON.stringify(status))));
        this.current = 'statusPing';
    }

    private onPing(frame: Frame, output: SessionOutput): void {
        // The ping is optional; anything else simply ends the exchange.
        if (frame.id === PING_ID && frame.body.length >= MIN_PING_BODY) {
            output.writes.push(frame.raw.slice());
        }
        this.current = 'closed';
    }

    private onLoginStart(frame: Frame, output: SessionOutput): void {
        if (frame.id !== LOGIN_START_ID) {
            this.current = 'closed';
            throw new ProtocolError(`Expected login start, got packet ${frame.id}`, 'UNEXPECTED_PACKET');
        }
        this.handlers.login({
            protocolVersion: this.protocolVersion,
            serverAddress: this.serverAddress,
            remoteAddress: this.remoteAddress,
        });
        const message = JSON.stringify({ text: this.handlers.disconnectMessage() });
        output.writes.push(encodeFrame(LOGIN_DISCONNECT_ID, encodeString(message)));
        this.current = 'closed';
    }
}
