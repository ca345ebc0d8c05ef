import { z } from "zod";
import { STATE_MERGE } from "../graphs/registry";

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Finds the object schema behind optional, nullable and default wrappers so
 * nested fields can still be looked up in `STATE_MERGE`.
 */
function objectSchemaOf(schema: z.core.$ZodType | undefined): z.ZodObject | undefined {
    if (schema instanceof z.ZodObject) {
        return schema;
    }
    if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodDefault) {
        return objectSchemaOf(schema.unwrap());
    }
    return undefined;
}

/**
 * Merges a node's partial update into an accumulated result payload.
 *
 * Rules, per key of `changes`:
 * - `undefined` values are ignored
 * - missing or null keys on the base take the new value
 * - fields registered in `STATE_MERGE` on `schema` use their own merge function
 * - arrays append, so repeated detections accumulate
 * - plain objects merge recursively
 * - everything else is last-write-wins
 *
 * The base is never mutated.
 *
 * @example
 * ```typescript
 * const base = { count: 5, items: [1, 2], user: { name: "Ada" } };
 * mergeState(base, { count: 6, items: [3], user: { age: 36 } });
 * // { count: 6, items: [1, 2, 3], user: { name: "Ada", age: 36 } }
 *
 * // Replace instead of append for one field
 * const schema = z.object({
 *   targets: z.array(z.string()).register(STATE_MERGE, { merge: (_old, change) => change }),
 * });
 * mergeState({ targets: ["a"] }, { targets: ["b"] }, schema); // { targets: ["b"] }
 * ```
 */
export function mergeState(
    base: Record<string, unknown>,
    changes: Record<string, unknown>,
    schema?: z.ZodObject,
): Record<string, unknown> {
    const acc = structuredClone(base);
    for (const [key, value] of Object.entries(changes)) {
        if (value === undefined) {
            continue;
        }
        const current = acc[key];
        const fieldSchema: z.core.$ZodType | undefined = schema?.shape[key];
        if (current === undefined || current === null) {
            acc[key] = structuredClone(value);
            continue;
        }
        // A registered merge owns the whole value, nested fields included
        const custom = fieldSchema === undefined ? undefined : STATE_MERGE.get(fieldSchema);
        if (custom !== undefined) {
            acc[key] = custom.merge(current, structuredClone(value));
            continue;
        }
        if (Array.isArray(current) && Array.isArray(value)) {
            acc[key] = [...current, ...structuredClone(value)];
            continue;
        }
        if (isPlainObject(current) && isPlainObject(value)) {
            acc[key] = mergeState(current, value, objectSchemaOf(fieldSchema));
            continue;
        }
        acc[key] = structuredClone(value);
    }
    return acc;
}
