import { describe, expect, it } from "vitest";
import { z } from "zod";
import { DuplicateNodeError, FatalConfigurationError, MalformedEdgeError, UnknownNodeError } from "../errors";
import { makeNode } from "../nodes/function-node";
import { update } from "../nodes/output";
import { END, START } from "./node-registry";
import { StateMachine } from "./state-machine";
import { createInitialState } from "./state";

const schema = z.object({
    count: z.number().default(0),
});
type state = z.infer<typeof schema>;

const increment = makeNode<state>((state) => update({ count: state.result.count + 1 }));

describe("StateMachine", () => {
    it("should compile a graph with its nodes, options and routes", () => {
        const graph = new StateMachine(schema)
            .addNode("first", increment, { maxRetries: 1 })
            .addNode("second", increment)
            .addEdge(START, "first")
            .addConditionalEdge("first", [{ when: (state) => state.result.count < 3, to: "first" }], "second")
            .addEdge("second", END)
            .compile();

        const state = createInitialState({
            sessionId: "s1",
            command: "count",
            entry: START,
            result: { count: 5 },
            createdAt: new Date("2026-01-01T00:00:00.000Z"),
        });
        expect(graph.nodeNames()).toEqual(["first", "second"]);
        expect(graph.nodeOptions("first")).toEqual({ maxRetries: 1 });
        expect(graph.nodeOptions("second")).toEqual({});
        expect(graph.entry(state)).toBe("first");
        expect(graph.route("first", state)).toBe("second");
        expect(graph.route("first", { ...state, result: { count: 1 } })).toBe("first");
        expect(graph.node("first")).toBe(increment);
    });

    it("should parse result payloads with the schema", () => {
        const graph = new StateMachine(schema)
            .addNode("only", increment)
            .addEdge(START, "only")
            .addEdge("only", END)
            .compile();
        expect(graph.parseResult({})).toEqual({ count: 0 });
        expect(graph.safeParseResult({ count: "x" }).success).toBe(false);
    });

    it("should reject duplicate nodes and invalid node options", () => {
        const machine = new StateMachine(schema).addNode("only", increment);
        expect(() => machine.addNode("only", increment)).toThrow(DuplicateNodeError);
        expect(() => machine.addNode("other", increment, { maxRetries: -1 })).toThrow(FatalConfigurationError);
    });

    it("should reject a second edge table for one node", () => {
        const machine = new StateMachine(schema).addNode("only", increment).addEdge("only", END);
        expect(() => machine.addEdge("only", "only")).toThrow(MalformedEdgeError);
    });

    it("should validate edges when compiling", () => {
        const dangling = new StateMachine(schema)
            .addNode("only", increment)
            .addEdge(START, "only")
            .addEdge("only", "ghost");
        expect(() => dangling.compile()).toThrow(UnknownNodeError);

        const unrouted = new StateMachine(schema)
            .addNode("only", increment)
            .addNode("orphan", increment)
            .addEdge(START, "only")
            .addEdge("only", END);
        expect(() => unrouted.compile()).toThrow("No edge found after node orphan");
    });

    it("should refuse changes after compile", () => {
        const machine = new StateMachine(schema)
            .addNode("only", increment)
            .addEdge(START, "only")
            .addEdge("only", END);
        machine.compile();
        expect(() => machine.addNode("late", increment)).toThrow(FatalConfigurationError);
        expect(() => machine.addEdge("late", END)).toThrow(/graph is compiled/);
    });

    it("should render the graph as Mermaid", () => {
        const graph = new StateMachine(schema)
            .addNode("only", increment)
            .addEdge(START, "only")
            .addEdge("only", END)
            .compile();
        expect(graph.toMermaid()).toBe("flowchart TD\n    __start__ --> only\n    only --> __end__");
    });
});
