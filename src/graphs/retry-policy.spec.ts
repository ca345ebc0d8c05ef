import { describe, expect, it } from "vitest";
import { loadSettings, type NodeSettings } from "../config/settings";
import { MaxRetriesExceeded, NodeExecutionError, NodeTimeout, UnknownNodeError } from "../errors";
import { RetryPolicy } from "./retry-policy";

function graphOf(options: Record<string, NodeSettings>) {
    return {
        nodeNames: () => Object.keys(options),
        nodeOptions: (name: string) => options[name] ?? {},
    };
}

describe("RetryPolicy", () => {
    const settings = loadSettings({ defaultMaxRetries: 2, defaultTimeoutMs: 500 }, { env: {} });

    it("should resolve settings over node options over defaults", () => {
        const policy = new RetryPolicy(
            graphOf({ analyze: { maxRetries: 5, recoveryNode: "capture" }, capture: {} }),
            loadSettings({ defaultMaxRetries: 2, nodes: { analyze: { timeoutMs: 50 } } }, { env: {} }),
        );
        expect(policy.forNode("analyze")).toEqual({ maxRetries: 5, timeoutMs: 50, recoveryNode: "capture" });
        expect(policy.forNode("capture")).toEqual({ maxRetries: 2, timeoutMs: 30_000, recoveryNode: "capture" });
    });

    it("should retry at the recovery node until the counter exceeds maxRetries", () => {
        const policy = new RetryPolicy(graphOf({ analyze: { recoveryNode: "capture" }, capture: {} }), settings);
        const failure = new NodeTimeout("analyze", 500);

        const first = policy.onFailure("analyze", {}, failure);
        expect(first).toEqual({ retries: { analyze: 1 }, decision: { kind: "retry", target: "capture", failures: 1 } });

        const second = policy.onFailure("analyze", first.retries, failure);
        expect(second.decision).toEqual({ kind: "retry", target: "capture", failures: 2 });

        const third = policy.onFailure("analyze", second.retries, failure);
        expect(third.retries).toEqual({ analyze: 3 });
        expect(third.decision.kind).toBe("exhausted");
        if (third.decision.kind === "exhausted") {
            expect(third.decision.error).toBeInstanceOf(MaxRetriesExceeded);
            expect(third.decision.error.message).toBe("Node analyze failed 3 times: Node analyze timed out after 500ms");
        }
    });

    it("should keep counters cumulative and leave the input untouched", () => {
        const policy = new RetryPolicy(graphOf({ act: {} }), settings);
        const retries = { act: 1, other: 4 };
        const outcome = policy.onFailure("act", retries, new NodeExecutionError("act", "no"));
        expect(outcome.retries).toEqual({ act: 2, other: 4 });
        expect(retries).toEqual({ act: 1, other: 4 });
    });

    it("should exhaust immediately when maxRetries is zero", () => {
        const policy = new RetryPolicy(graphOf({ act: { maxRetries: 0 } }), settings);
        expect(policy.onFailure("act", {}, new NodeExecutionError("act", "no")).decision.kind).toBe("exhausted");
    });

    it("should reject unknown recovery nodes", () => {
        expect(() => new RetryPolicy(graphOf({ act: { recoveryNode: "ghost" } }), settings)).toThrow(UnknownNodeError);
    });
});
