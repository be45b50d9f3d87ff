export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    child(scope: string): Logger;
}

export interface LoggerOptions {
    /** Emit debug lines */
    debug?: boolean;
    /** Suppress all output */
    silent?: boolean;
    /** Clock override, used by tests */
    now?: () => Date;
}

export function formatTimestamp(date: Date): string {
    return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * Console logger with a `[timestamp UTC] [scope]` prefix on every line.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const now = options.now ?? (() => new Date());
    const prefix = () => `[${formatTimestamp(now())}] [${scope}]`;
    const silent = options.silent ?? false;

    return {
        debug: (message, ...args) => {
            if (!silent && options.debug) console.debug(`${prefix()} ${message}`, ...args);
        },
        info: (message, ...args) => {
            if (!silent) console.log(`${prefix()} ${message}`, ...args);
        },
        warn: (message, ...args) => {
            if (!silent) console.warn(`${prefix()} ${message}`, ...args);
        },
        error: (message, ...args) => {
            if (!silent) console.error(`${prefix()} ${message}`, ...args);
        },
        child: (child) => createLogger(`${scope}:${child}`, options),
    };
}

export const silentLogger: Logger = createLogger('silent', { silent: true });
