import { type NodeContext } from "../graphs/runtime-context";
import { type SessionState } from "../graphs/state";

/**
 * Marks the session terminal with the node's own verdict.
 */
export interface Completion {
    status: "success" | "failure";
    detail?: string;
}

export interface NodeUpdate<R extends Record<string, unknown>> {
    kind: "update";
    update: Partial<R>;
    complete?: Completion;
}

export interface NodeFailure {
    kind: "error";
    error: {
        message: string;
        detail?: unknown;
    };
}

export type NodeOutput<R extends Record<string, unknown>> = NodeUpdate<R> | NodeFailure;

/**
 * Uniform signature every node implements. A node reports failure through a
 * `NodeFailure` value; a thrown error or rejected promise is treated the same
 * way by the executor.
 */
export interface NodeLike<R extends Record<string, unknown>, C = unknown> {
    run(state: Readonly<SessionState<R>>, context: NodeContext<C>): Promise<NodeOutput<R>>;
}
