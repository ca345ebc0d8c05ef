import { type EngineSettings, type NodeSettings } from "../config/settings";
import { MaxRetriesExceeded, type NodeExecutionError, type NodeTimeout, UnknownNodeError } from "../errors";

export interface ResolvedNodeSettings {
    maxRetries: number;
    timeoutMs: number;
    /** Node that runs after a retryable failure. Defaults to the failing node. */
    recoveryNode: string;
}

export type RetryDecision =
    | { kind: "retry"; target: string; failures: number }
    | { kind: "exhausted"; error: MaxRetriesExceeded };

export interface FailureOutcome {
    retries: Record<string, number>;
    decision: RetryDecision;
}

interface PolicyGraph {
    nodeNames(): string[];
    nodeOptions(name: string): NodeSettings;
}

/**
 * Bounded per-node retries. Counters are cumulative for the whole session and
 * never reset on success, so a node reached along several paths still gets at
 * most `maxRetries` retries in total.
 */
export class RetryPolicy {
    private readonly resolved: ReadonlyMap<string, ResolvedNodeSettings>;

    /**
     * Resolution order per field: `settings.nodes[name]`, then the options
     * given when the node was added, then the engine defaults.
     *
     * @throws {UnknownNodeError} If a recovery node is not part of the graph
     */
    constructor(graph: PolicyGraph, settings: EngineSettings) {
        const names = new Set(graph.nodeNames());
        const resolved = new Map<string, ResolvedNodeSettings>();
        for (const name of names) {
            const fromGraph = graph.nodeOptions(name);
            const fromSettings = settings.nodes[name] ?? {};
            const recoveryNode = fromSettings.recoveryNode ?? fromGraph.recoveryNode ?? name;
            if (!names.has(recoveryNode)) {
                throw new UnknownNodeError(recoveryNode, `the recovery setting of ${name}`);
            }
            resolved.set(name, Object.freeze({
                maxRetries: fromSettings.maxRetries ?? fromGraph.maxRetries ?? settings.defaultMaxRetries,
                timeoutMs: fromSettings.timeoutMs ?? fromGraph.timeoutMs ?? settings.defaultTimeoutMs,
                recoveryNode,
            }));
        }
        this.resolved = resolved;
    }

    /**
     * @throws {UnknownNodeError} If `node` is not part of the graph
     */
    forNode(node: string): ResolvedNodeSettings {
        const settings = this.resolved.get(node);
        if (settings === undefined) {
            throw new UnknownNodeError(node);
        }
        return settings;
    }

    /**
     * Records one failure of `node` and decides where the session goes next.
     * Returns fresh counters; `retries` is left untouched.
     */
    onFailure(
        node: string,
        retries: Readonly<Record<string, number>>,
        failure: NodeExecutionError | NodeTimeout,
    ): FailureOutcome {
        const settings = this.forNode(node);
        const failures = (retries[node] ?? 0) + 1;
        const next = { ...retries, [node]: failures };
        if (failures <= settings.maxRetries) {
            return { retries: next, decision: { kind: "retry", target: settings.recoveryNode, failures } };
        }
        return { retries: next, decision: { kind: "exhausted", error: new MaxRetriesExceeded(node, failures, failure) } };
    }
}
