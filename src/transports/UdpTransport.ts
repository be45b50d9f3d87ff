import { createSocket, type Socket } from 'node:dgram';
import type { Datagram, DatagramTransport } from './Transport.js';

/**
 * One unconnected UDP socket. Incoming datagrams are handed to the listener;
 * nothing is ever sent back.
 */
export class UdpTransport implements DatagramTransport {
    private socket: Socket | null = null;
    private datagramHandler: ((datagram: Datagram) => void) | null = null;
    private errorHandler: ((error: Error) => void) | null = null;

    async bind(port: number, host: string = '0.0.0.0'): Promise<void> {
        if (this.socket) {
            throw new Error(`UDP transport already bound on ${this.port}`);
        }

        const socket = createSocket({ type: 'udp4', reuseAddr: false });
        await new Promise<void>((resolve, reject) => {
            const onError = (error: Error) => {
                socket.close();
                reject(error);
            };
            socket.once('error', onError);
            socket.bind({ port, address: host, exclusive: true }, () => {
                socket.off('error', onError);
                resolve();
            });
        });

        const localPort = socket.address().port;
        socket.on('message', (data, rinfo) => {
            this.datagramHandler?.({
                data,
                remoteAddress: rinfo.address,
                remotePort: rinfo.port,
                localPort,
            });
        });
        socket.on('error', (error) => this.errorHandler?.(error));
        this.socket = socket;
    }

    onDatagram(listener: (datagram: Datagram) => void): void {
        this.datagramHandler = listener;
    }

    onError(listener: (error: Error) => void): void {
        this.errorHandler = listener;
    }

    get port(): number | null {
        return this.socket ? this.socket.address().port : null;
    }

    async close(): Promise<void> {
        const socket = this.socket;
        if (!socket) return;
        this.socket = null;
        await new Promise<void>((resolve) => socket.close(() => resolve()));
    }
}
