import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { CommandExecutor } from './CommandExecutor.js';

export interface LivenessProbe {
    /** Resolves false on any failure; never rejects for an unreachable host */
    isAlive(): Promise<boolean>;
}

/**
 * One ICMP echo through the system `ping`, bounded by `timeoutSec`.
 */
export class PingProbe implements LivenessProbe {
    constructor(
        private readonly host: string,
        private readonly executor: CommandExecutor,
        private readonly timeoutSec = 1,
        private readonly log: Logger = silentLogger
    ) {}

    async isAlive(): Promise<boolean> {
        const timeout = Math.max(1, Math.round(this.timeoutSec));
        try {
            const result = await this.executor.run(['ping', '-c', '1', '-w', String(timeout), this.host], {
                timeoutMs: (timeout + 1) * 1000,
            });
            return result.exitCode === 0;
        } catch (error) {
            this.log.debug(`Ping ${this.host} failed: ${errorMessage(error)}`);
            return false;
        }
    }
}
