import { FatalConfigurationError, MalformedEdgeError, UnknownNodeError } from "../errors";
import { END, START } from "./node-registry";

/**
 * One conditional target. `when` must be a pure function of the state.
 */
export interface Branch<S> {
    when: (state: Readonly<S>) => boolean;
    to: string;
    /** Shown on the edge when the graph is rendered. */
    label?: string;
}

/**
 * Routing rule for one source node: branches are tried in declaration order,
 * `default` is taken when none matches.
 */
export interface Edge<S> {
    from: string;
    branches: readonly Branch<S>[];
    default: string;
}

interface NodeLookup {
    has(name: string): boolean;
    names(): string[];
}

/**
 * Compiled routing table. Validates every edge against the registry up front
 * and is never changed afterwards.
 *
 * @example
 * ```typescript
 * const router = new EdgeRouter([
 *   { from: START, branches: [], default: "capture" },
 *   { from: "capture", branches: [{ when: (s) => s.result.retry === true, to: "capture" }], default: END },
 * ], registry);
 * router.route("capture", state); // "capture" or "end"
 * ```
 */
export class EdgeRouter<S> {
    private readonly table: ReadonlyMap<string, Edge<S>>;

    /**
     * @throws {MalformedEdgeError} On a missing start edge, a missing default, a
     *   duplicated source, a reserved target, or a registered node without an edge
     * @throws {UnknownNodeError} When an edge names a node that is not registered
     */
    constructor(edges: readonly Edge<S>[], registry: NodeLookup) {
        const table = new Map<string, Edge<S>>();
        for (const edge of edges) {
            if (table.has(edge.from)) {
                throw new MalformedEdgeError(`Node ${edge.from} has more than one edge table`);
            }
            if (edge.from === END) {
                throw new MalformedEdgeError(`Edges cannot leave ${END}`);
            }
            if (edge.from !== START && !registry.has(edge.from)) {
                throw new UnknownNodeError(edge.from, "an edge source");
            }
            if (typeof edge.default !== "string" || edge.default.length === 0) {
                throw new MalformedEdgeError(`Edge from ${edge.from} has no default target`);
            }
            for (const target of [...edge.branches.map((branch) => branch.to), edge.default]) {
                this.checkTarget(edge.from, target, registry);
            }
            table.set(edge.from, Object.freeze({
                from: edge.from,
                branches: Object.freeze(edge.branches.map((branch) => Object.freeze({ ...branch }))),
                default: edge.default,
            }));
        }
        if (!table.has(START)) {
            throw new MalformedEdgeError(`No edge found for starting node ${START}`);
        }
        for (const name of registry.names()) {
            if (!table.has(name)) {
                throw new MalformedEdgeError(`No edge found after node ${name}`);
            }
        }
        this.table = table;
    }

    private checkTarget(from: string, target: string, registry: NodeLookup): void {
        if (target === START) {
            throw new MalformedEdgeError(`Edge from ${from} cannot target ${START}`);
        }
        if (target !== END && !registry.has(target)) {
            throw new UnknownNodeError(target, `the edge from ${from}`);
        }
    }

    /**
     * Picks the next node after `from`. The first matching branch wins, even
     * when later branches also match.
     *
     * @throws {MalformedEdgeError} If `from` has no edge table
     * @throws {FatalConfigurationError} If a predicate throws
     */
    route(from: string, state: Readonly<S>): string {
        const edge = this.table.get(from);
        if (edge === undefined) {
            throw new MalformedEdgeError(`No edge found after node ${from}`);
        }
        for (const [position, branch] of edge.branches.entries()) {
            let matched: boolean;
            try {
                matched = branch.when(state);
            } catch (error) {
                throw new FatalConfigurationError(
                    `Predicate ${branch.label ?? `#${position}`} on edge from ${from} threw: ${error instanceof Error ? error.message : String(error)}`,
                    { cause: error },
                );
            }
            if (matched) {
                return branch.to;
            }
        }
        return edge.default;
    }

    edge(from: string): Edge<S> | undefined {
        return this.table.get(from);
    }

    edges(): Edge<S>[] {
        return [...this.table.values()];
    }

    /**
     * Renders the routing table as a Mermaid flowchart. Branches keep their
     * declaration order; the default edge is drawn last and dotted.
     */
    toMermaid(): string {
        const lines = ["flowchart TD"];
        for (const edge of this.table.values()) {
            const from = displayName(edge.from);
            for (const [position, branch] of edge.branches.entries()) {
                lines.push(`    ${from} -->|${branch.label ?? `when #${position + 1}`}| ${displayName(branch.to)}`);
            }
            lines.push(edge.branches.length === 0
                ? `    ${from} --> ${displayName(edge.default)}`
                : `    ${from} -.->|otherwise| ${displayName(edge.default)}`);
        }
        return lines.join("\n");
    }
}

// "end" is a keyword in Mermaid flowcharts
function displayName(node: string): string {
    if (node === START) return "__start__";
    if (node === END) return "__end__";
    return node;
}
