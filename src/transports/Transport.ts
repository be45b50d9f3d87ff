
export interface Connection {
    write(data: Uint8Array): void;
    /** Flushes pending writes, then closes */
    end(): void;
    /** Closes immediately, dropping anything unsent */
    close(): void;
    setTimeout(ms: number): void;
    on(event: 'data', listener: (data: Uint8Array) => void): void;
    on(event: 'close', listener: () => void): void;
    on(event: 'error', listener: (err: Error) => void): void;
    on(event: 'timeout', listener: () => void): void;

    remoteAddress?: string;
    remotePort?: number;
}

export interface Transport {
    listen(port: number, host?: string): Promise<void>;
    onConnection(listener: (connection: Connection) => void): void;
    /** Errors on the listening socket after `listen` resolved */
    onError(listener: (error: Error) => void): void;
    /** Resolves once the listening socket is unbound */
    close(): Promise<void>;
    /** Bound port, or null while not listening */
    readonly port: number | null;
}

export interface Datagram {
    data: Uint8Array;
    remoteAddress: string;
    remotePort: number;
    /** Local port the datagram arrived on */
    localPort: number;
}

export interface DatagramTransport {
    bind(port: number, host?: string): Promise<void>;
    onDatagram(listener: (datagram: Datagram) => void): void;
    onError(listener: (error: Error) => void): void;
    close(): Promise<void>;
    readonly port: number | null;
}
