import { access, readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Configuration error with context
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly code: 'PARSE_ERROR' | 'VALIDATION_ERROR' | 'IO_ERROR' | 'INVALID_TYPE',
        public readonly path?: string,
        public override readonly cause?: Error
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Validation function type
 */
export type ConfigValidator<T> = (config: T) => boolean | string | Promise<boolean | string>;

/**
 * Configuration manager options
 */
export interface ConfigManagerOptions<T extends object> {
    /** File name (relative to cwd) or absolute path */
    fileName: string;
    /** Default configuration */
    defaultConfig: T;
    /** Custom validator function */
    validator?: ConfigValidator<T>;
    /** Number of spaces for YAML formatting (default: 2) */
    spaces?: number;
    /** Silent mode - suppress console logs */
    silent?: boolean;
    logger?: Logger;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merges two objects.
 * Sources overwrite target. Arrays are replaced, not merged.
 */
export function deepMerge(target: unknown, source: unknown): unknown {
    if (!isPlainObject(target) || !isPlainObject(source)) {
        return source;
    }

    const output: Record<string, unknown> = { ...target };
    for (const key of Object.keys(source)) {
        const sourceVal = source[key];
        const targetVal = target[key];
        output[key] = isPlainObject(sourceVal) && isPlainObject(targetVal) ? deepMerge(targetVal, sourceVal) : sourceVal;
    }
    return output;
}

/**
 * Validates the config against the default config types.
 */
export function validateConfigTypes(config: unknown, defaults: unknown, path = ''): string[] {
    const errors: string[] = [];

    if (!isPlainObject(defaults) || !isPlainObject(config)) return errors;

    for (const key of Object.keys(defaults)) {
        if (!(key in config)) continue;

        const defaultVal = defaults[key];
        const configVal = config[key];
        const currentPath = path ? `${path}.${key}` : key;

        if (defaultVal === null || configVal === null) continue; // Skip null checks

        if (typeof defaultVal !== typeof configVal || Array.isArray(defaultVal) !== Array.isArray(configVal)) {
            const got = Array.isArray(configVal) ? 'array' : typeof configVal;
            const expected = Array.isArray(defaultVal) ? 'array' : typeof defaultVal;
            errors.push(`Expected type ${expected} for '${currentPath}', got ${got}`);
        } else if (isPlainObject(defaultVal)) {
            errors.push(...validateConfigTypes(configVal, defaultVal, currentPath));
        }
    }

    return errors;
}

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Configuration Manager Class
 * Loads a YAML file over defaults, validates it, and writes it back.
 */
export class ConfigManager<T extends object> {
    private config: T;
    private readonly defaultConfig: T;
    private readonly configPath: string;
    private readonly validator?: ConfigValidator<T>;
    private readonly spaces: number;
    private readonly silent: boolean;
    private readonly log: Logger;

    constructor(options: ConfigManagerOptions<T>) {
        this.defaultConfig = options.defaultConfig;
        this.configPath = isAbsolute(options.fileName) ? options.fileName : join(process.cwd(), options.fileName);
        this.validator = options.validator;
        this.spaces = options.spaces ?? 2;
        this.silent = options.silent ?? false;
        this.log = options.logger ?? createLogger('config', { silent: this.silent });
        this.config = { ...this.defaultConfig };
    }

    get path(): string {
        return this.configPath;
    }

    /**
     * Initialize and load configuration
     */
    async load(): Promise<T> {
        const loaded = await this.loadFromFile(this.configPath);
        await this.validate(loaded);
        this.config = loaded;
        return this.get();
    }

    /**
     * Re-reads the file until it loads and validates. Each failure is logged once
     * per distinct message. Rejects only when the signal aborts.
     */
    async waitUntilValid(intervalMs: number, signal?: AbortSignal): Promise<T> {
        let lastMessage = '';
        for (;;) {
            try {
                return await this.load();
            } catch (error) {
                if (!(error instanceof ConfigError)) throw error;
                const message = error.cause ? `${error.message}: ${error.cause.message}` : error.message;
                if (message !== lastMessage) {
                    this.log.warn(`${message}. Waiting for a valid configuration in ${this.configPath}`);
                    lastMessage = message;
                }
            }
            await sleep(intervalMs, undefined, { signal });
        }
    }

    /**
     * Load configuration from a file
     */
    private async loadFromFile(path: string): Promise<T> {
        let content: string;
        try {
            if (!(await exists(path))) {
                if (!this.silent) {
                    this.log.info(`Creating default configuration: ${path}`);
                }
                await this.write(path, this.defaultConfig);
                return { ...this.defaultConfig };
            }

            if (!this.silent) {
                this.log.info(`Loading configuration from ${path}`);
            }
            content = await readFile(path, 'utf8');
        } catch (error) {
            throw new ConfigError(
                'Failed to load configuration',
                'IO_ERROR',
                path,
                error instanceof Error ? error : undefined
            );
        }

        // Handle empty or whitespace-only files
        if (content.trim().length === 0) {
            if (!this.silent) {
                this.log.warn(`Config file is empty, using defaults`);
            }
            return { ...this.defaultConfig };
        }

        let parsed: unknown;
        try {
            parsed = parseYaml(content);
        } catch (error) {
            throw new ConfigError(
                `Failed to parse YAML`,
                'PARSE_ERROR',
                path,
                error instanceof Error ? error : undefined
            );
        }

        if (!isPlainObject(parsed)) {
            throw new ConfigError(
                `Config file is invalid (not an object)`,
                'INVALID_TYPE',
                path
            );
        }

        const merged = deepMerge(this.defaultConfig, parsed);

        // Validate types
        const typeErrors = validateConfigTypes(merged, this.defaultConfig);
        if (typeErrors.length > 0) {
            throw new ConfigError(
                `Type validation failed: ${typeErrors.join(', ')}`,
                'VALIDATION_ERROR',
                path
            );
        }

        return merged as T;
    }

    private async validate(config: T): Promise<void> {
        if (!this.validator) return;
        const result = await this.validator(config);
        if (typeof result === 'string') {
            throw new ConfigError(
                `Custom validation failed: ${result}`,
                'VALIDATION_ERROR',
                this.configPath
            );
        }
        if (result === false) {
            throw new ConfigError(
                'Custom validation failed',
                'VALIDATION_ERROR',
                this.configPath
            );
        }
    }

    /**
     * Get current configuration
     */
    get(): T {
        return { ...this.config };
    }

    private async write(path: string, value: T): Promise<void> {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, stringifyYaml(value, { indent: this.spaces }), 'utf8');
    }
}

