import { createServer, type Server, type Socket } from 'node:net';
import type { Transport, Connection } from './Transport.js';

export class TcpConnection implements Connection {
    constructor(private readonly socket: Socket) {}

    write(data: Uint8Array): void {
        if (!this.socket.destroyed) {
            this.socket.write(data);
        }
    }

    end(): void {
        this.socket.end();
    }

    close(): void {
        this.socket.destroy();
    }

    setTimeout(ms: number): void {
        this.socket.setTimeout(ms);
    }

    on(event: 'data', listener: (data: Uint8Array) => void): void;
    on(event: 'close', listener: () => void): void;
    on(event: 'error', listener: (err: Error) => void): void;
    on(event: 'timeout', listener: () => void): void;
    on(
        event: 'data' | 'close' | 'error' | 'timeout',
        listener: ((data: Uint8Array) => void) | (() => void) | ((err: Error) => void)
    ): void {
        this.socket.on(event, listener);
    }

    get remoteAddress(): string | undefined {
        return this.socket.remoteAddress;
    }

    get remotePort(): number | undefined {
        return this.socket.remotePort;
    }
}

export class TcpTransport implements Transport {
    private server: Server | null = null;
    private connectionHandler: ((conn: Connection) => void) | null = null;
    private errorHandler: ((error: Error) => void) | null = null;
    private readonly sockets = new Set<Socket>();

    async listen(port: number, host: string = '0.0.0.0'): Promise<void> {
        if (this.server) {
            throw new Error(`TCP transport already listening on ${this.port}`);
        }

        const server = createServer((socket) => {
            this.sockets.add(socket);
            socket.on('close', () => this.sockets.delete(socket));
            const conn = new TcpConnection(socket);
            if (this.connectionHandler) {
                this.connectionHandler(conn);
            } else {
                socket.destroy();
            }
        });

        await new Promise<void>((resolve, reject) => {
            const onError = (error: Error) => {
                server.off('listening', onListening);
                reject(error);
            };
            const onListening = () => {
                server.off('error', onError);
                resolve();
            };
            server.once('error', onError);
            server.once('listening', onListening);
            server.listen({ port, host, exclusive: true });
        });

        // Accept failures (EMFILE, ENFILE) arrive here once listening.
        server.on('error', (error) => this.errorHandler?.(error));
        this.server = server;
    }

    onConnection(listener: (connection: Connection) => void): void {
        this.connectionHandler = listener;
    }

    onError(listener: (error: Error) => void): void {
        this.errorHandler = listener;
    }

    get port(): number | null {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : null;
    }

    async close(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;

        // In-flight connections are dropped, not drained.
        for (const socket of this.sockets) {
            socket.destroy();
        }
        this.sockets.clear();

        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
    }
}
