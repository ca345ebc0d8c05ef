import { type NodeContext } from "../graphs/runtime-context";
import { type SessionState } from "../graphs/state";
import { type NodeLike, type NodeOutput } from "./types";

export type NodeFunction<R extends Record<string, unknown>, C = unknown> = (
    state: Readonly<SessionState<R>>,
    context: NodeContext<C>,
) => NodeOutput<R> | Promise<NodeOutput<R>>;

/**
 * A node backed by a plain function.
 *
 * @example
 * ```typescript
 * const capture = new FunctionNode<Result, Collaborators>(async (state, context) => {
 *   const shot = await context.collaborators.capture.capture(undefined, context.signal);
 *   return update({ screenshots: [shot.image] });
 * });
 * ```
 */
export class FunctionNode<R extends Record<string, unknown>, C = unknown> implements NodeLike<R, C> {
    constructor(private readonly func: NodeFunction<R, C>) { }

    async run(state: Readonly<SessionState<R>>, context: NodeContext<C>): Promise<NodeOutput<R>> {
        const response = this.func(state, context);
        if (response instanceof Promise) {
            return await response;
        }

        return response;
    }
}

/**
 * Helper to create a FunctionNode with type inference.
 *
 * @example
 * ```typescript
 * const node = makeNode<Result>((state) => update({ count: state.result.count + 1 }));
 * ```
 */
export function makeNode<R extends Record<string, unknown>, C = unknown>(
    func: NodeFunction<R, C>,
): NodeLike<R, C> {
    return new FunctionNode(func);
}
