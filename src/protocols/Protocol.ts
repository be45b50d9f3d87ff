
export interface Packet<T = Uint8Array> {
    size: number;
    id: number;
    data: T;
}

export interface Protocol<T = Uint8Array> {
    /**
     * Attempts to parse a single packet from the buffer.
     * Returns the packet if successful, or null if more data is needed.
     * Throws error if data is invalid for this protocol.
     */
    parse(buffer: Uint8Array): Packet<T> | null;
}
