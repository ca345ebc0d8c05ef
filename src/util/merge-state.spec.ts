import { describe, expect, it } from "vitest";
import { z } from "zod";
import { mergeState } from "./merge-state";
import { STATE_MERGE } from "../graphs/registry";

describe("mergeState", () => {
    it("should replace scalars with the latest write", () => {
        const schema = z.object({
            count: z.number(),
            label: z.string(),
        });
        const result = mergeState({ count: 1, label: "a" }, { count: 2 }, schema);
        expect(result).toEqual({ count: 2, label: "a" });
    });

    it("should append arrays", () => {
        const schema = z.object({
            items: z.array(z.number()),
        });
        const result = mergeState({ items: [1, 2] }, { items: [3] }, schema);
        expect(result).toEqual({ items: [1, 2, 3] });
    });

    it("should recursively merge nested objects", () => {
        const schema = z.object({
            count: z.number(),
            nested: z.object({
                count: z.number(),
                name: z.string(),
            }),
        });
        const result = mergeState({ count: 1, nested: { count: 2, name: "x" } }, { nested: { count: 4 } }, schema);
        expect(result).toEqual({ count: 1, nested: { count: 4, name: "x" } });
    });

    it("should ignore undefined values and fill missing or null keys", () => {
        const result = mergeState({ a: 1, b: null }, { a: undefined, b: [1], c: "new" });
        expect(result).toEqual({ a: 1, b: [1], c: "new" });
    });

    it("should merge changes with registered merge functions", () => {
        const schema = z.object({
            count: z.number().register(STATE_MERGE, { merge: (old: number, change: number) => old + change }),
        });
        const result = mergeState({ count: 1 }, { count: 2 }, schema);
        expect(result).toEqual({ count: 3 });
    });

    it("should merge changes with registered merge functions recursively", () => {
        const schema = z.object({
            count: z.number().register(STATE_MERGE, { merge: (old: number, change: number) => old + change }),
            nested: z.object({
                count: z.number().register(STATE_MERGE, { merge: (old: number, change: number) => old + change }),
            }).optional(),
        });
        const result = mergeState({ count: 1, nested: { count: 2 } }, { count: 3, nested: { count: 4 } }, schema);
        expect(result).toEqual({ count: 4, nested: { count: 6 } });
    });

    it("should let a registered merge replace an array instead of appending", () => {
        const schema = z.object({
            targets: z.array(z.string()).default([]).register(STATE_MERGE, { merge: (_old, change) => change }),
        });
        const result = mergeState({ targets: ["a", "b"] }, { targets: ["c"] }, schema);
        expect(result).toEqual({ targets: ["c"] });
    });

    it("should not mutate the base or share references with the changes", () => {
        const base = { items: [1], nested: { tags: ["x"] } };
        const changes = { items: [2], nested: { tags: ["y"] } };
        const result = mergeState(base, changes);
        changes.items.push(99);
        expect(base).toEqual({ items: [1], nested: { tags: ["x"] } });
        expect(result).toEqual({ items: [1, 2], nested: { tags: ["x", "y"] } });
    });
});
