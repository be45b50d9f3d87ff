import { execFile } from 'node:child_process';
import { CommandError } from '../core/errors.js';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface RunOptions {
    /** Kill the command after this many milliseconds */
    timeoutMs?: number;
}

/**
 * Runs OS network commands (`ip`, `arping`, `ping`). A non-zero exit is a
 * result, not an error; only a command that cannot be started rejects.
 */
export interface CommandExecutor {
    run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export class ProcessCommandExecutor implements CommandExecutor {
    constructor(private readonly defaultTimeoutMs = 10_000) {}

    run(argv: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
        const [file, ...args] = argv;
        if (!file) {
            return Promise.reject(new CommandError('Empty command', 'SPAWN_FAILED', argv));
        }

        return new Promise((resolve, reject) => {
            execFile(
                file,
                args,
                { encoding: 'utf8', timeout: options.timeoutMs ?? this.defaultTimeoutMs },
                (error, stdout, stderr) => {
                    if (!error) {
                        resolve({ exitCode: 0, stdout, stderr });
                        return;
                    }

                    const code: unknown = error.code;
                    if (typeof code === 'number') {
                        resolve({ exitCode: code, stdout, stderr });
                    } else if (error.killed) {
                        resolve({ exitCode: -1, stdout, stderr: stderr || `${file} timed out` });
                    } else {
                        reject(
                            new CommandError(
                                `Failed to run ${file}: ${error.message}`,
                                'SPAWN_FAILED',
                                argv,
                                stderr,
                                error
                            )
                        );
                    }
                }
            );
        });
    }
}
