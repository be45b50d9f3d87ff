import { setTimeout as sleep } from 'node:timers/promises';
import type { WakeProxyConfig } from '../config/config.js';
import { errorMessage } from './errors.js';
import type { LifecycleState, MotdState, ProtocolListener, ServerStatus, WakeEvent, WakeSink } from './types.js';
import { globalMetrics, type MetricsRegistry } from '../lib/metrics/MetricsRegistry.js';
import { SerialQueue } from '../lib/queue/SerialQueue.js';
import { MinecraftListener } from '../listeners/MinecraftListener.js';
import { PresenceListener } from '../listeners/PresenceListener.js';
import type { AddressOwner } from '../network/IpOwnershipManager.js';
import type { LivenessProbe } from '../network/LivenessProbe.js';
import type { Waker } from '../wake/WakeTrigger.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ListenerContext {
    config: WakeProxyConfig;
    onWake: WakeSink;
    status: (protocolVersion: number) => ServerStatus;
    logger: Logger;
    metrics: MetricsRegistry;
}

export interface ListenerFactory {
    minecraft(context: ListenerContext): ProtocolListener;
    presence(context: ListenerContext): ProtocolListener;
}

export const defaultListenerFactory: ListenerFactory = {
    minecraft: ({ config, onWake, status, logger, metrics }) =>
        new MinecraftListener({
            host: config.gameServerIp,
            port: config.mcPort,
            status,
            disconnectMessage: () => config.mcDisconnectMessage,
            onWake,
            logger: logger.child('minecraft'),
            metrics,
        }),
    presence: ({ config, onWake, logger, metrics }) =>
        new PresenceListener({
            host: config.gameServerIp,
            ports: config.presencePorts,
            onWake,
            logger: logger.child('presence'),
            metrics,
        }),
};

export interface OrchestratorOptions {
    config: WakeProxyConfig;
    address: AddressOwner;
    probe: LivenessProbe;
    waker: Waker;
    listeners?: ListenerFactory;
    logger?: Logger;
    metrics?: MetricsRegistry;
}

const STATE_GAUGE: Record<LifecycleState, number> = { INIT: 0, OFFLINE: 1, STARTING: 2, ONLINE: 3 };

/**
 * Liveness-driven state machine: INIT -> OFFLINE -> STARTING -> ONLINE.
 *
 * Probe results and wake events are applied through one serial queue, so no two
 * transitions overlap and a wake arriving mid-transition runs after it. The IP
 * is claimed, and the listeners run, only while OFFLINE.
 */
export class Orchestrator {
    private current: LifecycleState = 'INIT';
    private motd: MotdState = 'idle';
    private failCount = 0;
    private okCount = 0;
    private minecraft: ProtocolListener | null = null;
    private presence: ProtocolListener | null = null;
    private loop: Promise<void> | null = null;
    private abort: AbortController | null = null;
    private readonly queue = new SerialQueue();
    private readonly config: WakeProxyConfig;
    private readonly address: AddressOwner;
    private readonly probe: LivenessProbe;
    private readonly waker: Waker;
    private readonly listeners: ListenerFactory;
    private readonly log: Logger;
    private readonly metrics: MetricsRegistry;

    constructor(options: OrchestratorOptions) {
        this.config = options.config;
        this.address = options.address;
        this.probe = options.probe;
        this.waker = options.waker;
        this.listeners = options.listeners ?? defaultListenerFactory;
        this.log = options.logger ?? silentLogger;
        this.metrics = options.metrics ?? globalMetrics;
        this.initMetrics();
    }

    private initMetrics() {
        this.metrics.registerCounter('probe_failures_total', 'Failed liveness probes');
        this.metrics.registerCounter('state_transitions_total', 'Lifecycle transitions', ['to']);
        this.metrics.registerCounter('wake_triggers_total', 'Wake events that sent magic packets', ['source']);
        this.metrics.registerCounter('wake_suppressed_total', 'Wake events ignored outside OFFLINE', ['source']);
        this.metrics.registerGauge('lifecycle_state', 'INIT=0 OFFLINE=1 STARTING=2 ONLINE=3');
        this.metrics.set('lifecycle_state', STATE_GAUGE[this.current]);
    }

    get state(): LifecycleState {
        return this.current;
    }

    get consecutiveFailures(): number {
        return this.failCount;
    }

    get consecutiveSuccesses(): number {
        return this.okCount;
    }

    get listenersRunning(): boolean {
        return this.minecraft !== null || this.presence !== null;
    }

    /** Event channel handed to the listeners */
    readonly dispatch: WakeSink = (event: WakeEvent) => {
        void this.queue.run(() => this.handleWake(event)).catch((error: unknown) => {
            this.log.error(`Wake handling failed (${event.reason}): ${errorMessage(error)}`);
        });
    };

    /** Status body served to the client; the protocol is echoed to avoid an "outdated" banner */
    statusFor(protocolVersion: number): ServerStatus {
        return {
            version: { name: this.config.mcVersionLabel, protocol: protocolVersion },
            players: { max: 0, online: 0 },
            description: { text: this.motd === 'starting' ? this.config.mcMotdStarting : this.config.mcMotdIdle },
        };
    }

    /**
     * One probe plus the transition it implies. Never rejects.
     */
    async tick(): Promise<void> {
        const up = await this.probe.isAlive().catch((error: unknown) => {
            this.log.warn(`Liveness probe error: ${errorMessage(error)}`);
            return false;
        });
        await this.queue.run(() => this.applyProbe(up));
    }

    /** Resolves once every queued transition has finished */
    settled(): Promise<void> {
        return this.queue.idle();
    }

    start(): void {
        if (this.loop) return;
        const abort = new AbortController();
        this.abort = abort;
        this.log.info(
            `Watching ${this.config.gameServerIp} every ${this.config.pingIntervalSec}s ` +
                `(takeover after ${Math.max(1, this.config.pingFailThreshold)} failed probes)`
        );
        this.loop = this.run(abort.signal);
    }

    /**
     * Ends the loop, stops the listeners and gives the address back.
     */
    async stop(): Promise<void> {
        this.abort?.abort();
        await this.loop;
        this.loop = null;
        this.abort = null;
        await this.queue.run(() => this.ensureReleased());
    }

    private async run(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            await this.tick();
            try {
                await sleep(this.config.pingIntervalSec * 1000, undefined, { signal });
            } catch (error) {
                if (!signal.aborted) throw error;
            }
        }
    }

    private async applyProbe(up: boolean): Promise<void> {
        if (up) {
            this.okCount++;
            this.failCount = 0;
            try {
                await this.ensureReleased();
            } catch (error) {
                this.log.error(`Failed to hand back ${this.config.gameServerIp}: ${errorMessage(error)}`);
            }
            if (this.current !== 'ONLINE') {
                this.motd = 'idle';
                this.transition('ONLINE', 'real server reachable');
            }
            return;
        }

        this.failCount++;
        this.okCount = 0;
        this.metrics.increment('probe_failures_total');

        if (this.failCount < Math.max(1, this.config.pingFailThreshold)) {
            this.log.debug(`Probe failed (${this.failCount}/${this.config.pingFailThreshold})`);
            return;
        }
        if (this.current === 'STARTING') {
            // Waiting for the woken server to answer.
            return;
        }

        try {
            await this.ensureClaimedAndListening();
        } catch (error) {
            this.log.error(`Takeover of ${this.config.gameServerIp} failed, retrying: ${errorMessage(error)}`);
            try {
                await this.ensureReleased();
            } catch (releaseError) {
                this.log.error(`Cleanup after failed takeover failed: ${errorMessage(releaseError)}`);
            }
            return;
        }
        if (this.current !== 'OFFLINE') {
            this.transition('OFFLINE', `${this.failCount} consecutive failed probes, proxy active`);
        }
    }

    private async handleWake(event: WakeEvent): Promise<void> {
        if (this.current !== 'OFFLINE') {
            this.metrics.increment('wake_suppressed_total', { source: event.source });
            this.log.debug(`Ignoring wake in ${this.current}: ${event.reason}`);
            return;
        }

        this.log.info(`Start trigger: ${event.reason}`);
        this.metrics.increment('wake_triggers_total', { source: event.source });

        let broadcasts: string[] = [];
        try {
            broadcasts = await this.address.broadcastAddresses();
        } catch (error) {
            this.log.warn(`Failed to determine broadcast addresses: ${errorMessage(error)}`);
        }
        try {
            await this.waker.wake(this.config.gameServerMac, broadcasts);
        } catch (error) {
            this.log.error(`Wake-on-LAN failed: ${errorMessage(error)}`);
        }

        this.motd = 'starting';
        this.transition('STARTING', event.reason);
        // Free the address and ports right away so the booting server can take them.
        await this.ensureReleased();
    }

    private transition(next: LifecycleState, reason: string): void {
        const previous = this.current;
        this.current = next;
        this.metrics.increment('state_transitions_total', { to: next });
        this.metrics.set('lifecycle_state', STATE_GAUGE[next]);
        this.log.info(`State ${previous} -> ${next} (${reason})`);
    }

    private listenerContext(): ListenerContext {
        return {
            config: this.config,
            onWake: this.dispatch,
            status: (protocolVersion) => this.statusFor(protocolVersion),
            logger: this.log,
            metrics: this.metrics,
        };
    }

    private async ensureClaimedAndListening(): Promise<void> {
        await this.address.claim();
        if (!this.minecraft) {
            const listener = this.listeners.minecraft(this.listenerContext());
            await listener.start();
            this.minecraft = listener;
        }
        if (!this.presence) {
            const listener = this.listeners.presence(this.listenerContext());
            await listener.start();
            this.presence = listener;
        }
    }

    private async stopListeners(): Promise<void> {
        const minecraft = this.minecraft;
        const presence = this.presence;
        this.minecraft = null;
        this.presence = null;
        const results = await Promise.allSettled([minecraft?.stop(), presence?.stop()]);
        for (const result of results) {
            if (result.status === 'rejected') {
                this.log.error(`Failed to stop listener: ${errorMessage(result.reason)}`);
            }
        }
    }

    private async ensureReleased(): Promise<void> {
        await this.stopListeners();
        await this.address.release();
    }
}
