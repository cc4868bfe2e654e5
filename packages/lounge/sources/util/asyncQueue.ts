/**
 * Unbounded push queue consumed as an async iterable.
 * Pending readers resolve in order; after close they drain what is left and finish.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
    private readonly items: T[] = [];
    private readonly waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
    private closed = false;

    get isClosed(): boolean {
        return this.closed;
    }

    push(item: T): void {
        if (this.closed) {
            throw new Error("Queue is closed.");
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ done: false, value: item });
            return;
        }
        this.items.push(item);
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter({ done: true, value: undefined });
        }
    }

    async next(): Promise<IteratorResult<T, undefined>> {
        if (this.items.length > 0) {
            const value = this.items.shift();
            if (value !== undefined) {
                return { done: false, value };
            }
        }
        if (this.closed) {
            return { done: true, value: undefined };
        }
        return new Promise<IteratorResult<T, undefined>>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
            return: async () => {
                this.close();
                return { done: true, value: undefined };
            }
        };
    }
}
