import { type Completion, type NodeFailure, type NodeUpdate } from "./types";

export function update<R extends Record<string, unknown>>(partial: Partial<R>): NodeUpdate<R> {
    return { kind: "update", update: partial };
}

/**
 * Ends the session after this node with the given verdict. `partial` is merged
 * before the session is marked terminal.
 */
export function complete<R extends Record<string, unknown>>(
    status: Completion["status"],
    partial: Partial<R> = {},
    detail?: string,
): NodeUpdate<R> {
    const completion: Completion = detail === undefined ? { status } : { status, detail };
    return { kind: "update", update: partial, complete: completion };
}

export function fail(message: string, detail?: unknown): NodeFailure {
    return detail === undefined
        ? { kind: "error", error: { message } }
        : { kind: "error", error: { message, detail } };
}
