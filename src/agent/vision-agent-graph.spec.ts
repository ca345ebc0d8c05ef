import { describe, expect, it } from "vitest";
import { type EngineSettingsInput, loadSettings } from "../config/settings";
import { MemoryStore } from "../graphs/store/memory-store";
import { createLogger } from "../util/logger";
import { type UIElement } from "./collaborators";
import { parseStep } from "./intent";
import { actionsFor, centerOf } from "./nodes/action-executor";
import { findElement } from "./nodes/screen-analyzer";
import { FakeActionService, FakeCaptureService, ScriptedVisionService } from "./testing";
import { createVisionAgent, createVisionAgentGraph } from "./vision-agent-graph";

const logger = createLogger({ silent: true });

function element(id: string, label: string | undefined, confidence: number, bounds = { x: 0, y: 0, width: 10, height: 10 }): UIElement {
    return label === undefined
        ? { id, type: "button", bounds, confidence }
        : { id, type: "button", label, bounds, confidence };
}

function setup(overrides: EngineSettingsInput = {}) {
    const vision = new ScriptedVisionService();
    const capture = new FakeCaptureService();
    const actions = new FakeActionService();
    const store = new MemoryStore();
    const agent = createVisionAgent({
        collaborators: { vision, capture, actions },
        store,
        settings: loadSettings(overrides, { env: {} }),
        logger,
    });
    return { vision, capture, actions, store, agent };
}

describe("createVisionAgent", () => {
    it("should open an app without looking at the screen", async () => {
        const { agent, actions, capture } = setup();

        const result = await agent.run("open Safari");

        expect(result.state.steps.map((step) => step.node)).toEqual(["command_analyzer", "action_executor", "result_validator"]);
        expect(result).toMatchObject({ exitReason: "end", outcome: { status: "success" } });
        expect(actions.executed).toEqual([{ kind: "open_app", app: "Safari" }]);
        expect(capture.calls).toBe(0);
        expect(result.state.result.intent).toBe("open_app");
        expect(result.state.result.verdict).toBe("Completed 1 step(s)");
        expect(result.state.result.actionResults).toEqual([
            { step: 0, action: { kind: "open_app", app: "Safari" }, success: true },
        ]);
    });

    it("should re-capture after a timed out analysis and then click", async () => {
        const { agent, actions, capture, vision } = setup({
            nodes: { screen_analyzer: { timeoutMs: 10, maxRetries: 3 } },
        });
        vision.hang().hang().respondWith({
            elements: [element("ok", "OK button", 0.9, { x: 100, y: 200, width: 80, height: 30 })],
            text: "a dialog",
        });

        const result = await agent.run("click the OK button");

        expect(result.state.steps.map((step) => `${step.node}:${step.status}`)).toEqual([
            "command_analyzer:succeeded",
            "screen_capture:succeeded",
            "screen_analyzer:failed",
            "screen_capture:succeeded",
            "screen_analyzer:failed",
            "screen_capture:succeeded",
            "screen_analyzer:succeeded",
            "action_executor:succeeded",
            "result_validator:succeeded",
        ]);
        expect(result.state.steps[2]?.error).toEqual({ kind: "NodeTimeout", message: "Node screen_analyzer timed out after 10ms" });
        expect(result).toMatchObject({ exitReason: "end", outcome: { status: "success" } });
        expect(capture.calls).toBe(3);
        expect(vision.requests.map((request) => request.image.id)).toEqual(["shot-1", "shot-2", "shot-3"]);
        expect(vision.requests[2]?.prompt).toBe("Locate the following elements: OK button");
        expect(actions.executed).toEqual([{ kind: "click", x: 140, y: 215 }]);
        expect(result.state.retries).toEqual({ screen_analyzer: 2 });
        expect(result.state.steps.filter((step) => step.status === "failed")).toHaveLength(2);
    });

    it("should accumulate detected elements and locate targets per step", async () => {
        const { agent, actions, vision } = setup();
        vision
            .respondWith({ elements: [element("1", "A", 0.9, { x: 0, y: 0, width: 10, height: 10 })], text: "" })
            .respondWith({ elements: [element("2", "B", 0.9, { x: 20, y: 20, width: 10, height: 10 })], text: "" });

        const result = await agent.run("click A then click B");

        expect(result).toMatchObject({ outcome: { status: "success" } });
        expect(result.state.result.elements.map((found) => found.id)).toEqual(["1", "2"]);
        expect(result.state.result.targets.map((found) => found.id)).toEqual(["2"]);
        expect(actions.executed).toEqual([
            { kind: "click", x: 5, y: 5 },
            { kind: "click", x: 25, y: 25 },
        ]);
    });

    it("should fail a command it cannot understand in one step", async () => {
        const { agent, actions } = setup();

        const result = await agent.run("dance");

        expect(result.state.steps.map((step) => step.node)).toEqual(["command_analyzer"]);
        expect(result).toMatchObject({
            exitReason: "end",
            outcome: { status: "failure", detail: 'Could not understand command "dance"' },
        });
        expect(actions.executed).toEqual([]);
    });

    it("should work through a multi-step plan", async () => {
        const { agent, actions, vision } = setup();
        vision.respondWith({
            elements: [element("editor", "Editor", 0.8, { x: 0, y: 0, width: 200, height: 100 })],
            text: "",
        });

        const result = await agent.run("open Notes then type hello into the editor");

        expect(result.state.steps.map((step) => step.node)).toEqual([
            "command_analyzer",
            "action_executor",
            "result_validator",
            "screen_capture",
            "screen_analyzer",
            "action_executor",
            "result_validator",
        ]);
        expect(actions.executed).toEqual([
            { kind: "open_app", app: "Notes" },
            { kind: "click", x: 100, y: 50 },
            { kind: "type", text: "hello" },
        ]);
        expect(result.state.result.cursor).toBe(2);
        expect(result.state.result.verdict).toBe("Completed 2 step(s)");
        expect(result).toMatchObject({ outcome: { status: "success" } });
    });

    it("should answer a question from the screen without acting", async () => {
        const { agent, actions, vision } = setup();
        vision.respondWith({ elements: [], text: "A login form" });

        const result = await agent.run("what is on screen");

        expect(result.state.steps.map((step) => step.node)).toEqual([
            "command_analyzer",
            "screen_capture",
            "screen_analyzer",
            "result_validator",
        ]);
        expect(vision.requests[0]?.prompt).toBe("what is on screen");
        expect(result.state.result.verdict).toBe("A login form");
        expect(actions.executed).toEqual([]);
        expect(result).toMatchObject({ outcome: { status: "success" } });
    });

    it("should fail when an action does not succeed", async () => {
        const { agent, actions } = setup();
        actions.respondWith({ success: false, observed: "dialog blocked" });

        const result = await agent.run("press cmd+q");

        expect(result.state.steps.map((step) => step.node)).toEqual(["command_analyzer", "action_executor", "result_validator"]);
        expect(result).toMatchObject({
            outcome: { status: "failure", detail: "Action key_combo did not succeed: dialog blocked" },
        });
    });

    it("should give up when the target never shows up", async () => {
        const { agent, capture } = setup();

        const result = await agent.run("click Cancel");

        expect(result.state.steps).toHaveLength(9);
        expect(result.state.steps[8]).toMatchObject({ node: "screen_analyzer", status: "failed" });
        expect(capture.calls).toBe(4);
        expect(result).toMatchObject({
            outcome: {
                status: "failure",
                errorKind: "MaxRetriesExceeded",
                detail: 'Node screen_analyzer failed 4 times: No element matches "Cancel"',
            },
        });
    });

    it("should keep a checkpoint per step", async () => {
        const { agent, store } = setup();
        const result = await agent.run("open Safari", { sessionId: "vision-1" });

        const history = await store.getHistory("vision-1");
        expect(history.map((checkpoint) => checkpoint.stepIndex)).toEqual([1, 2, 3]);
        expect(history[2]?.state).toEqual(result.state);
    });
});

describe("createVisionAgentGraph", () => {
    it("should render the routing table", () => {
        expect(createVisionAgentGraph().toMermaid()).toBe([
            "flowchart TD",
            "    __start__ --> command_analyzer",
            "    command_analyzer -->|screenless| action_executor",
            "    command_analyzer -.->|otherwise| screen_capture",
            "    screen_capture --> screen_analyzer",
            "    screen_analyzer -->|analysis only| result_validator",
            "    screen_analyzer -.->|otherwise| action_executor",
            "    action_executor --> result_validator",
            "    result_validator -->|screenless| action_executor",
            "    result_validator -.->|otherwise| screen_capture",
        ].join("\n"));
    });

    it("should merge node options over the defaults", () => {
        const graph = createVisionAgentGraph({ nodes: { screen_analyzer: { maxRetries: 5 } } });
        expect(graph.nodeOptions("screen_analyzer")).toEqual({ recoveryNode: "screen_capture", maxRetries: 5 });
        expect(graph.nodeOptions("command_analyzer")).toEqual({ maxRetries: 0 });
    });
});

describe("findElement", () => {
    const elements = [
        element("short", "OK", 0.5),
        element("full", "OK button", 0.6),
        element("unlabeled", undefined, 1),
        element("cancel", "Cancel", 0.9),
    ];

    it("should prefer exact labels", () => {
        expect(findElement(elements, "ok button")?.id).toBe("full");
    });

    it("should match labels containing the query", () => {
        expect(findElement(elements, "button")?.id).toBe("full");
    });

    it("should break ties by confidence, then by order", () => {
        expect(findElement([element("a", "Save", 0.4), element("b", "Save", 0.7)], "save")?.id).toBe("b");
        expect(findElement([element("a", "Save", 0.7), element("b", "Save", 0.7)], "save")?.id).toBe("a");
    });

    it("should return undefined when nothing matches", () => {
        expect(findElement(elements, "Submit")).toBeUndefined();
    });
});

describe("actionsFor", () => {
    const first = element("first", "From", 1, { x: 10, y: 10, width: 5, height: 5 });
    const second = element("second", "To", 1, { x: 100, y: 50, width: 20, height: 20 });

    it("should round element centers", () => {
        expect(centerOf(first.bounds)).toEqual({ x: 13, y: 13 });
    });

    it.each([
        ["double-click From", [first], [{ kind: "double_click", x: 13, y: 13 }]],
        ["right click From", [first], [{ kind: "right_click", x: 13, y: 13 }]],
        ["drag From to To", [first, second], [{ kind: "drag", from: { x: 13, y: 13 }, to: { x: 110, y: 60 } }]],
        ["type hi into From", [first], [{ kind: "click", x: 13, y: 13 }, { kind: "type", text: "hi" }]],
        ["type hi", [], [{ kind: "type", text: "hi" }]],
        ["scroll up 2", [], [{ kind: "scroll", direction: "up", amount: 2 }]],
        ["click From", [], []],
        ["describe the window", [], []],
    ])("should translate %s", (segment, targets, expected) => {
        const step = parseStep(segment);
        expect(step).toBeDefined();
        if (step !== undefined) {
            expect(actionsFor(step, targets)).toEqual(expected);
        }
    });
});
