/**
 * Runs async work under mutual exclusion.
 * Waiters are woken in arrival order; the lock is released whether the work resolves or throws.
 */
export class AsyncLock {
    private locked = false;
    private waiting: Array<() => void> = [];

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await func();
        } finally {
            this.release();
        }
    }

    get isLocked(): boolean {
        return this.locked;
    }

    get pending(): number {
        return this.waiting.length;
    }

    private async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiting.push(resolve);
        });
    }

    private release(): void {
        if (!this.locked) {
            throw new Error("Lock released without acquisition.");
        }
        const next = this.waiting.shift();
        if (next) {
            // Ownership passes straight to the next waiter.
            next();
            return;
        }
        this.locked = false;
    }
}
