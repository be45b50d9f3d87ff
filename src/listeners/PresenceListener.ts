import type { ProtocolListener, WakeSink } from '../core/types.js';
import { globalMetrics, type MetricsRegistry } from '../lib/metrics/MetricsRegistry.js';
import { UdpTransport } from '../transports/UdpTransport.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface PresenceListenerOptions {
    host: string;
    ports: readonly number[];
    onWake: WakeSink;
    logger?: Logger;
    metrics?: MetricsRegistry;
}

/**
 * Silent UDP sink: any datagram on a watched port means a client is looking for
 * the server. Nothing is sent back.
 */
export class PresenceListener implements ProtocolListener {
    private transports: UdpTransport[] = [];
    private started = false;
    private readonly log: Logger;
    private readonly metrics: MetricsRegistry;

    constructor(private readonly options: PresenceListenerOptions) {
        this.log = options.logger ?? silentLogger;
        this.metrics = options.metrics ?? globalMetrics;
        this.metrics.registerCounter('presence_datagrams_total', 'Datagrams received on presence ports', ['port']);
    }

    get running(): boolean {
        return this.started;
    }

    /** Bound ports, in configuration order */
    get ports(): number[] {
        return this.transports.flatMap((t) => (t.port === null ? [] : [t.port]));
    }

    async start(): Promise<void> {
        if (this.started) return;

        const bound: UdpTransport[] = [];
        try {
            for (const port of this.options.ports) {
                const transport = new UdpTransport();
                transport.onDatagram((datagram) => {
                    this.metrics.increment('presence_datagrams_total', { port: String(datagram.localPort) });
                    this.options.onWake({
                        source: 'presence',
                        reason: `udp from ${datagram.remoteAddress}:${datagram.remotePort} on port ${datagram.localPort}`,
                    });
                });
                transport.onError((error) => this.log.warn(`Presence socket error on ${port}: ${error.message}`));
                await transport.bind(port, this.options.host);
                bound.push(transport);
                this.log.info(`Presence sink listening on ${this.options.host}:${transport.port}/udp`);
            }
        } catch (error) {
            // Never left half-bound.
            await Promise.all(bound.map((t) => t.close()));
            throw error;
        }

        this.transports = bound;
        this.started = true;
    }

    async stop(): Promise<void> {
        if (!this.started) return;
        const transports = this.transports;
        this.transports = [];
        this.started = false;
        await Promise.all(transports.map((t) => t.close()));
        this.log.info('Presence sink stopped');
    }
}
