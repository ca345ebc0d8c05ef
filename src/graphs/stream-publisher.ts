/**
 * Single-consumer async queue between the executor and a stream reader.
 *
 * `publish` never waits. While the reader is behind, events are buffered up
 * to `capacity`; past that the oldest buffered event is dropped. Checkpoints
 * remain the durable record, the stream is only a live view.
 *
 * @example
 * ```typescript
 * const publisher = new StreamPublisher<StepEvent>({ capacity: 64 });
 * publisher.publish(event);
 * publisher.close();
 * for await (const event of publisher) {
 *   render(event);
 * }
 * ```
 */
export class StreamPublisher<E> implements AsyncIterable<E> {
    private readonly buffer: E[] = [];
    private readonly capacity: number;
    private readonly onCancel?: () => void;
    private pending?: {
        resolve: (result: IteratorResult<E, undefined>) => void;
        reject: (error: unknown) => void;
    };
    private closed = false;
    private failure: { error: unknown } | undefined;
    private _dropped = 0;

    /**
     * @param options.capacity - Maximum number of undelivered events kept
     * @param options.onCancel - Called when the reader stops early
     */
    constructor(options: { capacity: number; onCancel?: () => void }) {
        if (!Number.isInteger(options.capacity) || options.capacity < 1) {
            throw new RangeError(`Stream capacity must be a positive integer, got ${options.capacity}`);
        }
        this.capacity = options.capacity;
        this.onCancel = options.onCancel;
    }

    /** Events discarded because the buffer was full. */
    get dropped(): number {
        return this._dropped;
    }

    get buffered(): number {
        return this.buffer.length;
    }

    publish(event: E): void {
        if (this.closed) {
            return;
        }
        if (this.pending !== undefined) {
            const { resolve } = this.pending;
            this.pending = undefined;
            resolve({ value: event, done: false });
            return;
        }
        if (this.buffer.length >= this.capacity) {
            this.buffer.shift();
            this._dropped++;
        }
        this.buffer.push(event);
    }

    /**
     * Ends the stream once the buffered events have been read.
     */
    close(): void {
        this.closed = true;
        this.settlePending();
    }

    /**
     * Ends the stream with an error, raised to the reader after the buffered
     * events.
     */
    fail(error: unknown): void {
        this.failure = { error };
        this.close();
    }

    private settlePending(): void {
        if (this.pending === undefined || this.buffer.length > 0) {
            return;
        }
        const { resolve, reject } = this.pending;
        this.pending = undefined;
        if (this.failure !== undefined) {
            reject(this.failure.error);
        } else {
            resolve({ value: undefined, done: true });
        }
    }

    private next(): Promise<IteratorResult<E, undefined>> {
        const event = this.buffer.shift();
        if (event !== undefined) {
            return Promise.resolve({ value: event, done: false });
        }
        if (this.closed) {
            return this.failure !== undefined
                ? Promise.reject(this.failure.error)
                : Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve, reject) => {
            this.pending = { resolve, reject };
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<E, undefined> {
        return {
            next: () => this.next(),
            return: async () => {
                if (!this.closed) {
                    this.onCancel?.();
                }
                this.buffer.length = 0;
                this.closed = true;
                return { value: undefined, done: true };
            },
        };
    }
}
