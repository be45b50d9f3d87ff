import { setTimeout as sleep } from 'node:timers/promises';
import { CommandError, DetectionError, errorMessage } from '../core/errors.js';
import { SerialQueue } from '../lib/queue/SerialQueue.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { CommandExecutor } from './CommandExecutor.js';
import { isValidPrefixLength, subnetBroadcast } from './ipv4.js';

export interface NetworkBinding {
    iface: string;
    prefixLength: number;
    /** Broadcast addresses reported by the interface, possibly empty */
    broadcasts: string[];
}

/** The parts of IP ownership the orchestrator depends on */
export interface AddressOwner {
    readonly claimed: boolean;
    claim(): Promise<void>;
    release(): Promise<void>;
    broadcastAddresses(): Promise<string[]>;
}

export interface IpOwnershipOptions {
    executor: CommandExecutor;
    /** Configured prefix length; overrides detection when set */
    prefixLength?: number | null;
    logger?: Logger;
    /** Gratuitous ARP announcements sent after a claim */
    arpAnnouncements?: number;
    arpSpacingMs?: number;
}

const ADDRESS_EXISTS = /File exists/i;
const ADDRESS_GONE = /Cannot assign requested address|Cannot find device/i;

export function parseRouteInterface(output: string): string | null {
    return /\bdev\s+(\S+)/.exec(output)?.[1] ?? null;
}

export function parseInterfacePrefix(output: string): number | null {
    const match = /\binet\s+\S+?\/(\d+)/.exec(output);
    return match?.[1] ? Number(match[1]) : null;
}

export function parseInterfaceBroadcasts(output: string): string[] {
    return [...output.matchAll(/\bbrd\s+(\d+\.\d+\.\d+\.\d+)/g)].flatMap((m) => (m[1] ? [m[1]] : []));
}

/**
 * Claims the target address as a secondary address on the local interface that
 * routes to it, and gives it back when the real server returns.
 */
export class IpOwnershipManager implements AddressOwner {
    private binding: NetworkBinding | null = null;
    private isClaimed = false;
    private readonly lock = new SerialQueue();
    private readonly executor: CommandExecutor;
    private readonly configuredPrefix: number | null;
    private readonly log: Logger;
    private readonly arpAnnouncements: number;
    private readonly arpSpacingMs: number;

    constructor(
        private readonly targetIp: string,
        options: IpOwnershipOptions
    ) {
        this.executor = options.executor;
        this.configuredPrefix = options.prefixLength ?? null;
        this.log = options.logger ?? silentLogger;
        this.arpAnnouncements = options.arpAnnouncements ?? 2;
        this.arpSpacingMs = options.arpSpacingMs ?? 200;
    }

    get claimed(): boolean {
        return this.isClaimed;
    }

    /**
     * Resolves the interface and prefix length for the target. Cached after the
     * first success; the interface is assumed stable for the process lifetime.
     */
    async detectBinding(): Promise<NetworkBinding> {
        if (this.binding) return this.binding;

        const route = await this.executor.run(['ip', 'route', 'get', this.targetIp]);
        if (route.exitCode !== 0) {
            throw new DetectionError(
                `ip route get ${this.targetIp} failed: ${route.stderr.trim()}`,
                'NO_ROUTE',
                this.targetIp
            );
        }
        const iface = parseRouteInterface(route.stdout);
        if (!iface) {
            throw new DetectionError(
                `No interface in route to ${this.targetIp}: ${route.stdout.trim()}`,
                'NO_ROUTE',
                this.targetIp
            );
        }

        const addr = await this.executor.run(['ip', '-o', '-f', 'inet', 'addr', 'show', 'dev', iface]);
        const detectedPrefix = addr.exitCode === 0 ? parseInterfacePrefix(addr.stdout) : null;
        const broadcasts = addr.exitCode === 0 ? parseInterfaceBroadcasts(addr.stdout) : [];

        const prefixLength = this.configuredPrefix ?? detectedPrefix;
        if (prefixLength === null || !isValidPrefixLength(prefixLength)) {
            throw new DetectionError(
                `No IPv4 address entry on ${iface}: ${addr.stderr.trim() || addr.stdout.trim()}`,
                'NO_INTERFACE_ADDRESS',
                this.targetIp
            );
        }

        this.binding = { iface, prefixLength, broadcasts };
        this.log.info(`Detected iface=${iface}, cidr=/${prefixLength}`);
        return this.binding;
    }

    claim(): Promise<void> {
        return this.lock.run(() => this.doClaim());
    }

    release(): Promise<void> {
        return this.lock.run(() => this.doRelease());
    }

    async broadcastAddresses(): Promise<string[]> {
        const binding = await this.detectBinding();
        if (binding.broadcasts.length > 0) {
            return [...binding.broadcasts];
        }
        return [subnetBroadcast(this.targetIp, binding.prefixLength)];
    }

    private async doClaim(): Promise<void> {
        if (this.isClaimed) return;

        const { iface, prefixLength } = await this.detectBinding();
        const cidr = `${this.targetIp}/${prefixLength}`;
        const argv = ['ip', 'addr', 'add', cidr, 'dev', iface];
        const result = await this.executor.run(argv);
        if (result.exitCode !== 0 && !ADDRESS_EXISTS.test(result.stderr)) {
            throw new CommandError(
                `Failed to add ${cidr} on ${iface}: ${result.stderr.trim()}`,
                'COMMAND_FAILED',
                argv,
                result.stderr
            );
        }

        await this.announce(iface);
        this.isClaimed = true;
        this.log.info(`Claimed IP ${cidr} on ${iface}`);
    }

    private async announce(iface: string): Promise<void> {
        for (let i = 0; i < this.arpAnnouncements; i++) {
            if (i > 0 && this.arpSpacingMs > 0) {
                await sleep(this.arpSpacingMs);
            }
            try {
                const result = await this.executor.run(['arping', '-U', '-I', iface, '-c', '1', this.targetIp]);
                if (result.exitCode !== 0) {
                    this.log.warn(`Gratuitous ARP on ${iface} exited ${result.exitCode}: ${result.stderr.trim()}`);
                }
            } catch (error) {
                this.log.warn(`Gratuitous ARP on ${iface} failed: ${errorMessage(error)}`);
            }
        }
    }

    private async doRelease(): Promise<void> {
        if (!this.isClaimed) return;

        const binding = this.binding;
        if (!binding) {
            this.isClaimed = false;
            return;
        }
        const cidr = `${this.targetIp}/${binding.prefixLength}`;
        try {
            const result = await this.executor.run(['ip', 'addr', 'del', cidr, 'dev', binding.iface]);
            if (result.exitCode !== 0) {
                if (ADDRESS_GONE.test(result.stderr)) {
                    this.log.warn(`${cidr} already gone from ${binding.iface}: ${result.stderr.trim()}`);
                } else {
                    this.log.error(`Failed to delete ${cidr} from ${binding.iface}: ${result.stderr.trim()}`);
                }
            }
        } catch (error) {
            this.log.error(`Failed to delete ${cidr} from ${binding.iface}: ${errorMessage(error)}`);
        }
        this.isClaimed = false;
        this.log.info(`Released IP ${cidr} from ${binding.iface}`);
    }
}
