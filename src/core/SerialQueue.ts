/**
 * Async serialization primitives for per-connection state.
 * @module core/SerialQueue
 */

/**
 * Runs async tasks strictly one after another, in submission order.
 * A failing task rejects only its own caller; later tasks still run.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    /** Number of tasks queued or running. */
    public get size(): number {
        return this.pending;
    }

    public run<T>(task: () => Promise<T> | T): Promise<T> {
        this.pending += 1;
        const result = this.tail.then(task).finally(() => {
            this.pending -= 1;
        });
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }
}

/**
 * One-shot asynchronous initializer.
 *
 * The first {@link OnceCell.get} starts `factory`; concurrent callers share the
 * in-flight promise, so nobody observes a half-built value. A rejected factory
 * leaves the cell empty.
 */
export class OnceCell<T> {
    private slot: {value: T} | null = null;
    private inflight: Promise<T> | null = null;

    public get hasValue(): boolean {
        return this.slot !== null;
    }

    public peek(): T | undefined {
        return this.slot?.value;
    }

    public get(factory: () => Promise<T>): Promise<T> {
        if (this.slot) return Promise.resolve(this.slot.value);
        if (this.inflight) return this.inflight;

        const inflight = Promise.resolve()
            .then(factory)
            .then((value) => {
                this.slot = {value};
                return value;
            })
            .finally(() => {
                this.inflight = null;
            });
        this.inflight = inflight;
        return inflight;
    }
}
