type LockMode = "read" | "write";

interface Waiter {
    readonly mode: LockMode;
    readonly grant: () => void;
}

export interface ReadWriteLockDebug {
    readers: number;
    writing: boolean;
    queued: number;
}

/**
 * FIFO readers-writer lock for async critical sections.
 *
 * - Any number of readers, or exactly one writer.
 * - Waiters are granted in arrival order: a queued writer holds back
 *   readers that arrive after it.
 * - No timeout and no cancellation; callers wait until granted.
 * - Not reentrant: a section that awaits another section of the same
 *   lock never gets it.
 */
export class ReadWriteLock {
    private readers = 0;
    private writing = false;
    private readonly queue: Waiter[] = [];

    async read<T>(section: () => T | Promise<T>): Promise<T> {
        await this.acquire("read");
        try {
            return await section();
        } finally {
            this.release("read");
        }
    }

    async write<T>(section: () => T | Promise<T>): Promise<T> {
        await this.acquire("write");
        try {
            return await section();
        } finally {
            this.release("write");
        }
    }

    debug(): ReadWriteLockDebug {
        return {
            readers: this.readers,
            writing: this.writing,
            queued: this.queue.length,
        };
    }

    private acquire(mode: LockMode): Promise<void> {
        if (this.queue.length === 0 && this.canGrant(mode)) {
            this.take(mode);
            return Promise.resolve();
        }

        return new Promise<void>((resolve) => {
            this.queue.push({ mode, grant: () => resolve() });
        });
    }

    private release(mode: LockMode): void {
        if (mode === "write") {
            this.writing = false;
        } else {
            this.readers--;
        }
        this.drain();
    }

    /**
     * Grant the longest run of compatible waiters at the front of the queue.
     * Ownership is taken here, before the waiter resumes.
     */
    private drain(): void {
        while (this.queue.length > 0) {
            const waiter = this.queue[0];
            if (!this.canGrant(waiter.mode)) return;

            this.queue.shift();
            this.take(waiter.mode);
            waiter.grant();

            if (waiter.mode === "write") return;
        }
    }

    private canGrant(mode: LockMode): boolean {
        return mode === "write" ? !this.writing && this.readers === 0 : !this.writing;
    }

    private take(mode: LockMode): void {
        if (mode === "write") {
            this.writing = true;
        } else {
            this.readers++;
        }
    }
}
