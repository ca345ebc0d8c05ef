import { z } from "zod";
import { type NodeSettings } from "../config/settings";
import { type NodeLike } from "../nodes/types";
import { type EdgeRouter } from "./edge-router";
import { type NodeRegistry, START } from "./node-registry";
import { type SessionState } from "./state";

export type ResultParse<R> =
    | { success: true; data: R }
    | { success: false; error: string };

/**
 * A compiled graph: frozen node registry, frozen routing table and the result
 * schema. Produced by `StateMachine.compile()` and shared read-only by every
 * session an executor runs.
 *
 * @template Z - The zod schema of the result payload
 * @template C - Collaborators handed to every node
 * @template R - The inferred result payload
 */
export class Graph<
    Z extends z.ZodObject,
    C = unknown,
    R extends Record<string, unknown> = z.infer<Z>,
> {
    constructor(
        public readonly schema: Z,
        private readonly registry: NodeRegistry<NodeLike<R, C>>,
        private readonly router: EdgeRouter<SessionState<R>>,
        private readonly options: ReadonlyMap<string, NodeSettings>,
    ) { }

    /**
     * @throws {UnknownNodeError} If `name` is not part of the graph
     */
    node(name: string): NodeLike<R, C> {
        return this.registry.get(name);
    }

    /**
     * @param {string} name - Node name to look up
     * @returns {boolean} True if the node was added before compiling
     */
    hasNode(name: string): boolean {
        return this.registry.has(name);
    }

    /**
     * @returns {string[]} Node names in the order they were added
     */
    nodeNames(): string[] {
        return this.registry.names();
    }

    /** Options given to `addNode`; engine settings may still override them. */
    nodeOptions(name: string): NodeSettings {
        return this.options.get(name) ?? {};
    }

    /**
     * Node a fresh session starts at, chosen by the edge leaving `start`.
     */
    entry(state: Readonly<SessionState<R>>): string {
        return this.router.route(START, state);
    }

    /**
     * Picks the node that follows `from` for the given state.
     *
     * @param {string} from - Node that just ran
     * @param {SessionState<R>} state - State after its update was merged
     * @returns {string} The next node name, or `end`
     * @throws {FatalConfigurationError} If a predicate throws or `from` has no edge
     */
    route(from: string, state: Readonly<SessionState<R>>): string {
        return this.router.route(from, state);
    }

    /**
     * Validates a result payload. Keys the schema does not know are dropped.
     */
    parseResult(value: unknown): R {
        return this.schema.parse(value) as R;
    }

    safeParseResult(value: unknown): ResultParse<R> {
        const parsed = this.schema.safeParse(value);
        if (!parsed.success) {
            return { success: false, error: z.prettifyError(parsed.error) };
        }
        return { success: true, data: parsed.data as R };
    }

    toMermaid(): string {
        return this.router.toMermaid();
    }
}
