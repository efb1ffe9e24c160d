type Release = () => void;

/** FIFO mutex: waiters are granted the lock in arrival order. */
export class AsyncLock {
    private queue: Array<() => void> = [];
    private locked = false;

    acquire(): Promise<Release> {
        return new Promise((resolve) => {
            const attempt = () => {
                if (!this.locked) {
                    this.locked = true;
                    let released = false;
                    resolve(() => {
                        if (released) return;
                        released = true;
                        this.release();
                    });
                } else {
                    this.queue.push(attempt);
                }
            };
            attempt();
        });
    }

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }

    isLocked(): boolean {
        return this.locked;
    }

    pendingCount(): number {
        return this.queue.length;
    }

    private release(): void {
        this.locked = false;
        const next = this.queue.shift();
        if (next) {
            next();
        }
    }
}

/**
 * One {@link AsyncLock} per key. Locks are dropped once nobody holds or waits on
 * them, so the map only ever contains keys with work in flight.
 */
export class KeyedLock {
    private locks = new Map<string, AsyncLock>();

    async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
        let lock = this.locks.get(key);
        if (!lock) {
            lock = new AsyncLock();
            this.locks.set(key, lock);
        }

        try {
            return await lock.runExclusive(fn);
        } finally {
            if (!lock.isLocked() && lock.pendingCount() === 0 && this.locks.get(key) === lock) {
                this.locks.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.locks.get(key)?.isLocked() ?? false;
    }

    size(): number {
        return this.locks.size;
    }
}
