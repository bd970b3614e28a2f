/**
 * Async mutex for one control connection.
 *
 * Promise chain, not an OS lock: a holder keeps the lock across awaits,
 * other callers queue behind it. Each session owns its own instance, so
 * two sessions never wait on each other.
 */
export class SessionLock {
    private current?: Promise<void>;

    /**
     * Returns a release function that MUST be called in a finally block.
     */
    async acquire(): Promise<() => void> {
        while (this.current) {
            await this.current;
        }
        let release: () => void = () => {};
        const held: Promise<void> = new Promise<void>(resolve => {
            release = () => {
                if (this.current === held) {
                    this.current = undefined;
                }
                resolve();
            };
        });
        this.current = held;
        return release;
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await task();
        } finally {
            release();
        }
    }

    get locked(): boolean {
        return this.current !== undefined;
    }
}
