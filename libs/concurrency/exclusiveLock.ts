/**
 * FIFO async mutex. Callers of runExclusive() run strictly one after another,
 * in the order they called.
 */
export class ExclusiveLock {
    private tail: Promise<void> = Promise.resolve();
    private waiting = 0;

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let unlock: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            unlock = resolve;
        });
        this.tail = previous.then(() => current);

        this.waiting++;
        await previous;
        this.waiting--;
        try {
            return await fn();
        } finally {
            unlock();
        }
    }

    /** Callers queued behind the current holder. */
    get queued(): number {
        return this.waiting;
    }
}
