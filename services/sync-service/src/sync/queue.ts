interface Waiter<T> {
    resolve: (value: T) => void;
    reject: (reason: unknown) => void;
}

export const yieldToEventLoop = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

/**
 * FIFO queue with a fixed capacity. `put` waits while the queue is full and
 * `get` waits while it is empty.
 *
 * `abort(reason)` rejects every pending and future `put`/`get` with `reason`.
 */
export class BoundedQueue<T> {
    private readonly items: T[] = [];
    private readonly getters: Waiter<T>[] = [];
    private readonly putters: Waiter<void>[] = [];
    private failure: { reason: unknown } | undefined;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length;
    }

    get aborted(): boolean {
        return this.failure !== undefined;
    }

    async put(item: T): Promise<void> {
        for (; ;) {
            if (this.failure) throw this.failure.reason;

            // A waiting getter implies the queue is empty
            const getter = this.getters.shift();
            if (getter) {
                getter.resolve(item);
                return;
            }

            if (this.items.length < this.capacity) {
                this.items.push(item);
                return;
            }

            await new Promise<void>((resolve, reject) => this.putters.push({ resolve, reject }));
        }
    }

    async get(): Promise<T> {
        if (this.failure) throw this.failure.reason;

        if (this.items.length > 0) {
            const [item] = this.items.splice(0, 1);
            this.putters.shift()?.resolve();
            return item;
        }

        return new Promise<T>((resolve, reject) => this.getters.push({ resolve, reject }));
    }

    abort(reason: unknown): void {
        if (this.failure) return;
        this.failure = { reason };

        for (const getter of this.getters.splice(0)) getter.reject(reason);
        for (const putter of this.putters.splice(0)) putter.reject(reason);
    }
}
