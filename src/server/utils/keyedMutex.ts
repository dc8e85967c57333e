/**
 * KeyedMutex
 *
 * One FIFO lock per key. Work under different keys never waits on each other;
 * work under the same key runs strictly one at a time in arrival order.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    /**
     * Run `fn` while holding the lock for `key`
     */
    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            // Last holder cleans up so idle keys do not accumulate
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /**
     * Number of keys with a holder or waiters
     */
    size(): number {
        return this.tails.size;
    }
}
