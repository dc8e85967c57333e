/**
 * pLimit
 *
 * Limits the concurrency of async operations: at most `concurrency` thunks run
 * at once, the rest wait in FIFO order.
 *
 * @param concurrency - Max number of concurrent operations
 */
export function pLimit(concurrency: number): Limiter {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    const run = <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async () => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };

    return Object.assign(run, {
        activeCount: () => activeCount,
        pendingCount: () => queue.length,
    });
}

export interface Limiter {
    <T>(fn: () => Promise<T>): Promise<T>;
    activeCount(): number;
    pendingCount(): number;
}
