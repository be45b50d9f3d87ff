export type LifecycleState = 'INIT' | 'OFFLINE' | 'STARTING' | 'ONLINE';

export type MotdState = 'idle' | 'starting';

export type WakeSource = 'minecraft' | 'presence';

export interface WakeEvent {
    source: WakeSource;
    /** Diagnostic context, e.g. the client address */
    reason: string;
}

/** Listeners report activity through this; they never touch lifecycle state */
export type WakeSink = (event: WakeEvent) => void;

/** Server list ping response body */
export interface ServerStatus {
    version: { name: string; protocol: number };
    players: { max: number; online: number };
    description: { text: string };
}

/**
 * A socket-owning listener. `start` on a running listener and `stop` on a stopped
 * one are no-ops; `stop` resolves only once every socket is unbound.
 */
export interface ProtocolListener {
    readonly running: boolean;
    start(): Promise<void>;
    stop(): Promise<void>;
}
