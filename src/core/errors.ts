/**
 * Raised by the Minecraft codec. `BUFFER_TOO_SHORT` means more bytes are needed;
 * every other code is a protocol violation that ends the connection.
 */
export class ProtocolError extends Error {
    constructor(
        message: string,
        public readonly code:
            | 'BUFFER_TOO_SHORT'
            | 'VARINT_TOO_BIG'
            | 'UNEXPECTED_PACKET'
            | 'EMPTY_PACKET'
            | 'PACKET_TOO_LARGE'
            | 'INVALID_HANDSHAKE'
    ) {
        super(message);
        this.name = 'ProtocolError';
    }
}

/**
 * The route or interface address owning the target could not be found.
 */
export class DetectionError extends Error {
    constructor(
        message: string,
        public readonly code: 'NO_ROUTE' | 'NO_INTERFACE_ADDRESS',
        public readonly target?: string
    ) {
        super(message);
        this.name = 'DetectionError';
    }
}

export class CommandError extends Error {
    constructor(
        message: string,
        public readonly code: 'SPAWN_FAILED' | 'COMMAND_FAILED',
        public readonly argv: readonly string[],
        public readonly stderr = '',
        public override readonly cause?: Error
    ) {
        super(message);
        this.name = 'CommandError';
    }
}

export class WakeError extends Error {
    constructor(
        message: string,
        public readonly code: 'INVALID_MAC'
    ) {
        super(message);
        this.name = 'WakeError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
