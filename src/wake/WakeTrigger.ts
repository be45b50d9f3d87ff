import { createSocket } from 'node:dgram';
import { WakeError, errorMessage } from '../core/errors.js';
import { globalMetrics, type MetricsRegistry } from '../lib/metrics/MetricsRegistry.js';
import { LIMITED_BROADCAST } from '../network/ipv4.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** Discard port, the conventional Wake-on-LAN target */
export const WOL_PORT = 9;
export const MAGIC_PACKET_LENGTH = 102;

const MAC_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/;

/**
 * Hyphens become colons and hex digits lower case; anything but six hex octets throws.
 */
export function normalizeMac(mac: string): string {
    const normalized = mac.trim().replace(/-/g, ':').toLowerCase();
    if (!MAC_PATTERN.test(normalized)) {
        throw new WakeError(`Invalid MAC address: ${mac}`, 'INVALID_MAC');
    }
    return normalized;
}

/**
 * 6 bytes of 0xFF followed by the hardware address 16 times.
 */
export function buildMagicPacket(mac: string): Buffer {
    const hardware = Buffer.from(normalizeMac(mac).replace(/:/g, ''), 'hex');
    const packet = Buffer.alloc(MAGIC_PACKET_LENGTH, 0xff);
    for (let i = 0; i < 16; i++) {
        hardware.copy(packet, 6 + i * 6);
    }
    return packet;
}

/**
 * Order-preserving dedup that always ends with the limited broadcast.
 */
export function wakeTargets(broadcasts: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const address of [...broadcasts, LIMITED_BROADCAST]) {
        const trimmed = address.trim();
        if (trimmed) seen.add(trimmed);
    }
    return [...seen];
}

export interface DatagramSender {
    send(packet: Uint8Array, address: string, port: number): Promise<void>;
}

/**
 * Opens a broadcast-enabled socket per send.
 */
export class UdpBroadcastSender implements DatagramSender {
    send(packet: Uint8Array, address: string, port: number): Promise<void> {
        return new Promise((resolve, reject) => {
            const socket = createSocket('udp4');
            socket.once('error', (error) => {
                socket.close();
                reject(error);
            });
            socket.bind(() => {
                try {
                    socket.setBroadcast(true);
                    socket.send(packet, port, address, (error) => {
                        socket.close();
                        if (error) reject(error);
                        else resolve();
                    });
                } catch (error) {
                    socket.close();
                    reject(error);
                }
            });
        });
    }
}

export interface WakeReport {
    address: string;
    sent: boolean;
    error?: string;
}

/** What the orchestrator needs from a wake trigger */
export interface Waker {
    wake(mac: string, broadcasts: readonly string[]): Promise<WakeReport[]>;
}

export interface WakeTriggerOptions {
    port?: number;
    sender?: DatagramSender;
    logger?: Logger;
    metrics?: MetricsRegistry;
}

export class WakeTrigger implements Waker {
    private readonly port: number;
    private readonly sender: DatagramSender;
    private readonly log: Logger;
    private readonly metrics: MetricsRegistry;

    constructor(options: WakeTriggerOptions = {}) {
        this.port = options.port ?? WOL_PORT;
        this.sender = options.sender ?? new UdpBroadcastSender();
        this.log = options.logger ?? silentLogger;
        this.metrics = options.metrics ?? globalMetrics;
        this.metrics.registerCounter('wake_packets_sent_total', 'Magic packets handed to the network', ['address']);
        this.metrics.registerCounter('wake_packets_failed_total', 'Magic packets that failed to send', ['address']);
    }

    /**
     * Best effort across every broadcast domain: one failed address does not stop the rest.
     * An invalid MAC throws before anything is sent.
     */
    async wake(mac: string, broadcasts: readonly string[]): Promise<WakeReport[]> {
        const normalized = normalizeMac(mac);
        const packet = buildMagicPacket(normalized);
        const reports: WakeReport[] = [];

        for (const address of wakeTargets(broadcasts)) {
            try {
                await this.sender.send(packet, address, this.port);
                this.metrics.increment('wake_packets_sent_total', { address });
                this.log.info(`WOL magic packet sent to ${normalized} via ${address}:${this.port}`);
                reports.push({ address, sent: true });
            } catch (error) {
                this.metrics.increment('wake_packets_failed_total', { address });
                this.log.error(`WOL error via ${address}: ${errorMessage(error)}`);
                reports.push({ address, sent: false, error: errorMessage(error) });
            }
        }
        return reports;
    }
}
