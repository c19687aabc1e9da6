/**
 * Promise-chain mutex for serialising async critical sections within one process.
 *
 * Waiters run in FIFO order. A rejected critical section releases the lock like a
 * resolved one, and its rejection is returned only to its own caller.
 */
export class AsyncMutex {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        let release: () => void = () => {};
        const next = new Promise<void>((resolve) => {
            release = resolve;
        });
        const previous = this.tail;
        this.tail = previous.then(() => next);
        this.pending++;

        await previous;
        try {
            return await fn();
        } finally {
            this.pending--;
            release();
        }
    }

    /**
     * True while a critical section is running or queued
     */
    isLocked(): boolean {
        return this.pending > 0;
    }
}
