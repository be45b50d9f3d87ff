/**
 * Runs tasks one at a time in submission order. A task that throws rejects its
 * own promise only; the tasks queued behind it still run.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    run<T>(task: () => T | Promise<T>): Promise<T> {
        this.pending++;
        const result = this.tail.then(task);
        this.tail = result.then(
            () => {
                this.pending--;
            },
            () => {
                this.pending--;
            }
        );
        return result;
    }

    /** Number of tasks queued or running */
    get size(): number {
        return this.pending;
    }

    /** Resolves once every task queued so far has settled */
    idle(): Promise<void> {
        return this.tail;
    }
}
