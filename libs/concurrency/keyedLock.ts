/**
 * Keyed Lock
 * Serializes async tasks per key through a promise chain.
 *
 * Multi-key acquisitions take their keys in sorted order, so two tasks that
 * share keys always queue in the same order and cannot deadlock.
 * Not reentrant: a task must not re-acquire a key it already holds.
 */

export class KeyedLock {
    // Tail of the queue for each key; resolves when the last holder releases.
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(keys: string | readonly string[], task: () => Promise<T>): Promise<T> {
        const ordered = Array.from(new Set(typeof keys === 'string' ? [keys] : keys)).sort();
        const releases: Array<() => void> = [];

        try {
            for (const key of ordered) {
                releases.push(await this.acquire(key));
            }
            return await task();
        } finally {
            for (const release of releases.reverse()) {
                release();
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get size(): number {
        return this.tails.size;
    }

    private async acquire(key: string): Promise<() => void> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;

        return () => {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }
}
