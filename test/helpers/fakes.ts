import type { ProtocolListener } from '../../src/core/types.js';
import type { ListenerContext, ListenerFactory } from '../../src/core/Orchestrator.js';
import type { CommandExecutor, CommandResult, RunOptions } from '../../src/network/CommandExecutor.js';
import type { AddressOwner } from '../../src/network/IpOwnershipManager.js';
import type { LivenessProbe } from '../../src/network/LivenessProbe.js';
import type { Logger } from '../../src/utils/logger.js';
import type { WakeReport, Waker } from '../../src/wake/WakeTrigger.js';

type Responder = (argv: readonly string[]) => Partial<CommandResult> | Error;

/**
 * Answers commands by their leading words; unmatched commands exit 0 with no output.
 */
export class FakeExecutor implements CommandExecutor {
    readonly calls: string[][] = [];
    readonly options: (RunOptions | undefined)[] = [];
    private readonly responders: [string, Responder][] = [];

    on(prefix: string, response: Partial<CommandResult> | Error | Responder): this {
        this.responders.unshift([prefix, typeof response === 'function' ? response : () => response]);
        return this;
    }

    commands(): string[] {
        return this.calls.map((argv) => argv.join(' '));
    }

    async run(argv: readonly string[], options?: RunOptions): Promise<CommandResult> {
        this.calls.push([...argv]);
        this.options.push(options);
        const line = argv.join(' ');
        const match = this.responders.find(([prefix]) => line.startsWith(prefix));
        const response = match ? match[1](argv) : {};
        if (response instanceof Error) throw response;
        return { exitCode: 0, stdout: '', stderr: '', ...response };
    }
}

export interface LogLine {
    level: 'debug' | 'info' | 'warn' | 'error';
    scope: string;
    message: string;
}

export function recordingLogger(lines: LogLine[] = [], scope = 'test'): Logger & { lines: LogLine[] } {
    const push = (level: LogLine['level']) => (message: string) => {
        lines.push({ level, scope, message });
    };
    return {
        lines,
        debug: push('debug'),
        info: push('info'),
        warn: push('warn'),
        error: push('error'),
        child: (child) => recordingLogger(lines, `${scope}:${child}`),
    };
}

export class FakeAddressOwner implements AddressOwner {
    claimed = false;
    claims = 0;
    releases = 0;
    failClaims = 0;
    broadcasts: string[] | Error = ['192.168.1.255'];

    async claim(): Promise<void> {
        this.claims++;
        if (this.failClaims > 0) {
            this.failClaims--;
            throw new Error('ip addr add failed');
        }
        this.claimed = true;
    }

    async release(): Promise<void> {
        this.releases++;
        this.claimed = false;
    }

    async broadcastAddresses(): Promise<string[]> {
        if (this.broadcasts instanceof Error) throw this.broadcasts;
        return [...this.broadcasts];
    }
}

/** Returns queued results in order, then `fallback` */
export class ScriptedProbe implements LivenessProbe {
    private readonly results: (boolean | Error)[] = [];

    constructor(public fallback = false) {}

    push(...results: (boolean | Error)[]): this {
        this.results.push(...results);
        return this;
    }

    async isAlive(): Promise<boolean> {
        const next = this.results.shift() ?? this.fallback;
        if (next instanceof Error) throw next;
        return next;
    }
}

export class FakeWaker implements Waker {
    readonly calls: { mac: string; broadcasts: string[] }[] = [];

    async wake(mac: string, broadcasts: readonly string[]): Promise<WakeReport[]> {
        this.calls.push({ mac, broadcasts: [...broadcasts] });
        return broadcasts.map((address) => ({ address, sent: true }));
    }
}

export class FakeListener implements ProtocolListener {
    running = false;
    starts = 0;
    stops = 0;

    constructor(
        readonly kind: 'minecraft' | 'presence',
        readonly context: ListenerContext,
        private readonly failStart = false
    ) {}

    async start(): Promise<void> {
        this.starts++;
        if (this.failStart) throw new Error(`${this.kind} port in use`);
        this.running = true;
    }

    async stop(): Promise<void> {
        this.stops++;
        this.running = false;
    }
}

/**
 * Records every listener the orchestrator creates.
 */
export class FakeListenerFactory implements ListenerFactory {
    readonly created: FakeListener[] = [];
    failMinecraftStarts = 0;

    minecraft(context: ListenerContext): ProtocolListener {
        const fail = this.failMinecraftStarts > 0;
        if (fail) this.failMinecraftStarts--;
        return this.track(new FakeListener('minecraft', context, fail));
    }

    presence(context: ListenerContext): ProtocolListener {
        return this.track(new FakeListener('presence', context));
    }

    running(): FakeListener[] {
        return this.created.filter((listener) => listener.running);
    }

    latest(kind: 'minecraft' | 'presence'): FakeListener | undefined {
        return this.created.filter((listener) => listener.kind === kind).at(-1);
    }

    private track(listener: FakeListener): FakeListener {
        this.created.push(listener);
        return listener;
    }
}
