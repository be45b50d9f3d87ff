import { errorMessage } from '../core/errors.js';
import type { ProtocolListener, ServerStatus, WakeSink } from '../core/types.js';
import { globalMetrics, type MetricsRegistry } from '../lib/metrics/MetricsRegistry.js';
import { MinecraftSession } from '../protocols/MinecraftSession.js';
import { TcpTransport } from '../transports/TcpTransport.js';
import type { Connection } from '../transports/Transport.js';
import { silentLogger, type Logger } from '../utils/logger.js';

const READ_TIMEOUT_MS = 5000;

export interface MinecraftListenerOptions {
    host: string;
    port: number;
    /** Builds the status body for the client's declared protocol */
    status: (protocolVersion: number) => ServerStatus;
    disconnectMessage: () => string;
    onWake: WakeSink;
    readTimeoutMs?: number;
    logger?: Logger;
    metrics?: MetricsRegistry;
}

/**
 * Answers server-list pings and turns login attempts into wake events.
 * Gameplay traffic is never proxied.
 */
export class MinecraftListener implements ProtocolListener {
    private transport: TcpTransport | null = null;
    private readonly log: Logger;
    private readonly metrics: MetricsRegistry;

    constructor(private readonly options: MinecraftListenerOptions) {
        this.log = options.logger ?? silentLogger;
        this.metrics = options.metrics ?? globalMetrics;
        this.metrics.registerCounter('minecraft_connections_total', 'Connections accepted by the Minecraft listener');
        this.metrics.registerCounter('minecraft_protocol_errors_total', 'Connections dropped for protocol violations');
    }

    get running(): boolean {
        return this.transport !== null;
    }

    /** Bound port while running; differs from the configured one only when that is 0 */
    get port(): number | null {
        return this.transport?.port ?? null;
    }

    async start(): Promise<void> {
        if (this.transport) return;

        const transport = new TcpTransport();
        transport.onConnection((conn) => this.handleClient(conn));
        transport.onError((error) => this.log.warn(`MC listener socket error: ${error.message}`));
        await transport.listen(this.options.port, this.options.host);
        this.transport = transport;
        this.log.info(`MC proxy listening on ${this.options.host}:${transport.port}`);
    }

    async stop(): Promise<void> {
        const transport = this.transport;
        if (!transport) return;
        this.transport = null;
        await transport.close();
        this.log.info('MC proxy stopped');
    }

    private handleClient(client: Connection) {
        const peer = `${client.remoteAddress ?? 'unknown'}:${client.remotePort ?? 0}`;
        this.metrics.increment('minecraft_connections_total');
        this.log.debug(`New connection from ${peer}`);

        const session = new MinecraftSession(
            {
                status: (protocolVersion) => this.options.status(protocolVersion),
                login: (attempt) =>
                    this.options.onWake({
                        source: 'minecraft',
                        reason: `MC join attempt (login from ${attempt.remoteAddress}, protocol ${attempt.protocolVersion})`,
                    }),
                disconnectMessage: () => this.options.disconnectMessage(),
            },
            peer
        );

        client.setTimeout(this.options.readTimeoutMs ?? READ_TIMEOUT_MS);
        client.on('timeout', () => {
            this.log.debug(`Read timeout for ${peer} in state ${session.state}`);
            client.close();
        });

        client.on('data', (data: Uint8Array) => {
            try {
                const output = session.receive(data);
                for (const chunk of output.writes) {
                    client.write(chunk);
                }
                if (output.close) {
                    client.end();
                }
            } catch (error) {
                this.metrics.increment('minecraft_protocol_errors_total');
                this.log.debug(`MC client error ${peer}: ${errorMessage(error)}`);
                client.close();
            }
        });

        client.on('error', (err: Error) => {
            this.log.debug(`MC client socket error ${peer}: ${err.message}`);
        });
    }
}
