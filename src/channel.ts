/**
 * Unbounded async channel. Producers `push`, one consumer iterates.
 * `close()` ends iteration after buffered items drain; `fail()` rejects the
 * consumer's next read once the buffer is empty. `interrupt()` rejects only
 * the reads already waiting and leaves the channel open.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
    private buffer: T[] = [];
    private waiters: Array<{ resolve: (r: IteratorResult<T>) => void; reject: (err: unknown) => void }> = [];
    private closed = false;
    private failure: { error: unknown } | undefined;

    public push(value: T): boolean {
        if (this.closed) return false;

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve({ value, done: false });
        } else {
            this.buffer.push(value);
        }
        return true;
    }

    public close() {
        if (this.closed) return;
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter.resolve({ value: undefined, done: true });
        }
    }

    public fail(error: unknown) {
        if (this.closed) return;
        this.failure = { error };
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter.reject(error);
        }
    }

    public interrupt(error: unknown) {
        for (const waiter of this.waiters.splice(0)) {
            waiter.reject(error);
        }
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public next(): Promise<IteratorResult<T>> {
        if (this.buffer.length > 0) {
            const [value] = this.buffer.splice(0, 1);
            return Promise.resolve({ value, done: false });
        }
        if (this.failure) return Promise.reject(this.failure.error);
        if (this.closed) return Promise.resolve({ value: undefined, done: true });

        return new Promise((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    public [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.next(),
            return: async () => {
                this.close();
                return { value: undefined, done: true };
            }
        };
    }
}
