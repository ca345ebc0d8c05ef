import { describe, expect, it, vi } from "vitest";
import { StreamPublisher } from "./stream-publisher";

async function drain<E>(publisher: StreamPublisher<E>): Promise<E[]> {
    const events: E[] = [];
    for await (const event of publisher) {
        events.push(event);
    }
    return events;
}

describe("StreamPublisher", () => {
    it("should deliver buffered events in order and end after close", async () => {
        const publisher = new StreamPublisher<number>({ capacity: 8 });
        publisher.publish(1);
        publisher.publish(2);
        publisher.close();
        publisher.publish(3);
        expect(await drain(publisher)).toEqual([1, 2]);
    });

    it("should hand events straight to a waiting reader", async () => {
        const publisher = new StreamPublisher<string>({ capacity: 1 });
        const iterator = publisher[Symbol.asyncIterator]();
        const next = iterator.next();
        publisher.publish("a");
        expect(await next).toEqual({ value: "a", done: false });
        expect(publisher.buffered).toBe(0);
    });

    it("should drop the oldest event when the buffer is full", async () => {
        const publisher = new StreamPublisher<number>({ capacity: 2 });
        publisher.publish(1);
        publisher.publish(2);
        publisher.publish(3);
        publisher.close();
        expect(publisher.dropped).toBe(1);
        expect(await drain(publisher)).toEqual([2, 3]);
    });

    it("should raise a failure after the buffered events", async () => {
        const publisher = new StreamPublisher<number>({ capacity: 4 });
        publisher.publish(1);
        publisher.fail(new Error("stopped"));
        const iterator = publisher[Symbol.asyncIterator]();
        expect(await iterator.next()).toEqual({ value: 1, done: false });
        await expect(iterator.next()).rejects.toThrow("stopped");
    });

    it("should call onCancel when the reader leaves early", async () => {
        const onCancel = vi.fn();
        const publisher = new StreamPublisher<number>({ capacity: 4, onCancel });
        publisher.publish(1);
        publisher.publish(2);
        for await (const event of publisher) {
            expect(event).toBe(1);
            break;
        }
        expect(onCancel).toHaveBeenCalledTimes(1);
        expect(publisher.buffered).toBe(0);
    });

    it("should reject a capacity below one", () => {
        expect(() => new StreamPublisher<number>({ capacity: 0 })).toThrow(RangeError);
    });
});
