import { debug } from './log';

/**
 * FIFO async mutex. All store mutations go through one of these so only a
 * single write transaction is ever in flight, whatever the number of
 * concurrent ingestion workers.
 */
export class WriteLock {
    private held = false;
    private readonly waiters: Array<() => void> = [];

    constructor(private readonly name = 'write') {}

    get pending(): number {
        return this.waiters.length;
    }

    get locked(): boolean {
        return this.held;
    }

    async acquire(): Promise<void> {
        if (!this.held) {
            this.held = true;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
        debug('lock.acquire.waited', { lock: this.name, pending: this.waiters.length });
    }

    release(): void {
        const next = this.waiters.shift();
        // ownership passes straight to the next waiter; held stays true
        if (next) next();
        else this.held = false;
    }

    async run<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}

// Shared by every store in the process unless one is given its own lock.
export const globalWriteLock = new WriteLock('store');
