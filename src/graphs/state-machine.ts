import { z } from "zod";
import { type NodeSettings, NodeSettingsSchema } from "../config/settings";
import { FatalConfigurationError, MalformedEdgeError } from "../errors";
import { type NodeLike } from "../nodes/types";
import { type Branch, type Edge, EdgeRouter } from "./edge-router";
import { Graph } from "./graph";
import { NodeRegistry } from "./node-registry";
import { type SessionState } from "./state";

/**
 * Builder for a graph with arbitrary nodes, plain edges and conditional
 * edges. Cycles are allowed; the executor's step budget bounds them.
 *
 * @class StateMachine
 * @template Z - The zod schema of the result payload
 * @template C - Collaborators handed to every node
 * @template R - The inferred result payload
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   status: z.enum(["pending", "done"]).default("pending"),
 *   data: z.string().default(""),
 * });
 *
 * const graph = new StateMachine(schema)
 *   .addNode("process", makeNode(...))
 *   .addNode("validate", makeNode(...), { maxRetries: 1 })
 *   .addEdge(START, "process")
 *   .addConditionalEdge("process", [{ when: (s) => s.result.data !== "", to: "validate" }], END)
 *   .addEdge("validate", END)
 *   .compile();
 * ```
 */
export class StateMachine<
    Z extends z.ZodObject,
    C = unknown,
    R extends Record<string, unknown> = z.infer<Z>,
> {
    private readonly registry = new NodeRegistry<NodeLike<R, C>>();
    private readonly edges = new Map<string, Edge<SessionState<R>>>();
    private readonly options = new Map<string, NodeSettings>();

    constructor(private readonly schema: Z) { }

    /**
     * Adds a node to the state machine.
     *
     * @param name - Unique name for the node (cannot be "start" or "end")
     * @param node - The node implementation
     * @param options - Retry, timeout and recovery defaults for this node
     * @throws {DuplicateNodeError} If the name is taken
     * @throws {FatalConfigurationError} If the name is reserved or the options are invalid
     */
    addNode(name: string, node: NodeLike<R, C>, options: NodeSettings = {}): this {
        const parsed = NodeSettingsSchema.safeParse(options);
        if (!parsed.success) {
            throw new FatalConfigurationError(`Invalid options for node ${name}: ${z.prettifyError(parsed.error)}`);
        }
        this.registry.register(name, node);
        this.options.set(name, Object.freeze(parsed.data));
        return this;
    }

    /**
     * Adds an unconditional edge: after `from` the session always goes to `to`.
     *
     * @example
     * ```typescript
     * sm.addEdge(START, "nodeA");
     * sm.addEdge("nodeA", END);
     * ```
     */
    addEdge(from: string, to: string): this {
        return this.setEdge({ from, branches: [], default: to });
    }

    /**
     * Adds an ordered list of guarded targets. The first branch whose `when`
     * holds is taken, `defaultTarget` otherwise.
     *
     * @example
     * ```typescript
     * sm.addConditionalEdge(
     *   "decision",
     *   [
     *     { when: (s) => s.result.priority > 5, to: "path1", label: "urgent" },
     *     { when: (s) => s.result.priority > 2, to: "path2" },
     *   ],
     *   END,
     * );
     * ```
     */
    addConditionalEdge(from: string, branches: Branch<SessionState<R>>[], defaultTarget: string): this {
        return this.setEdge({ from, branches, default: defaultTarget });
    }

    private setEdge(edge: Edge<SessionState<R>>): this {
        if (this.registry.isCompiled) {
            throw new FatalConfigurationError(`Cannot add an edge from ${edge.from}: graph is compiled`);
        }
        if (this.edges.has(edge.from)) {
            throw new MalformedEdgeError(`Node ${edge.from} has more than one edge table`);
        }
        this.edges.set(edge.from, edge);
        return this;
    }

    /**
     * Freezes the nodes and validates every edge against them.
     *
     * @throws {FatalConfigurationError} On any dangling or malformed edge
     */
    compile(): Graph<Z, C, R> {
        const router = new EdgeRouter([...this.edges.values()], this.registry);
        this.registry.compile();
        return new Graph(this.schema, this.registry, router, new Map(this.options));
    }
}
