import { type EngineSettings, type NodeSettings } from "../config/settings";
import { Executor } from "../graphs/executor";
import { type Graph } from "../graphs/graph";
import { START } from "../graphs/node-registry";
import { StateMachine } from "../graphs/state-machine";
import { type CheckpointStore } from "../graphs/store/base-store";
import { MemoryStore } from "../graphs/store/memory-store";
import { type Logger } from "../util/logger";
import { type AgentCollaborators } from "./collaborators";
import { isScreenless } from "./intent";
import { ActionExecutor } from "./nodes/action-executor";
import { CommandAnalyzer } from "./nodes/command-analyzer";
import { ResultValidator } from "./nodes/result-validator";
import { ScreenAnalyzer } from "./nodes/screen-analyzer";
import { ScreenCapture } from "./nodes/screen-capture";
import { currentStep, type VisionResult, VisionResultSchema, type VisionState } from "./result";

export const NODES = {
    commandAnalyzer: "command_analyzer",
    screenCapture: "screen_capture",
    screenAnalyzer: "screen_analyzer",
    actionExecutor: "action_executor",
    resultValidator: "result_validator",
} as const;
export type VisionNodeName = (typeof NODES)[keyof typeof NODES];

export type VisionAgentGraph = Graph<typeof VisionResultSchema, AgentCollaborators, VisionResult>;

export interface VisionAgentGraphOptions {
    /** Merged over the built-in node options. */
    nodes?: Partial<Record<VisionNodeName, NodeSettings>>;
}

function screenlessNext(state: Readonly<VisionState>): boolean {
    const step = currentStep(state);
    return step !== undefined && isScreenless(step);
}

/**
 * Builds the perceive/cognize/act graph:
 *
 * ```
 * start -> command_analyzer -> screen_capture -> screen_analyzer -> action_executor -> result_validator
 * ```
 *
 * Steps that need no screen skip capture and analysis, analysis-only steps
 * skip the executor, and the validator loops back for the next plan step.
 * A failed analysis re-captures before it is retried.
 */
export function createVisionAgentGraph(options: VisionAgentGraphOptions = {}): VisionAgentGraph {
    const defaults: Record<VisionNodeName, NodeSettings> = {
        command_analyzer: { maxRetries: 0 },
        screen_capture: {},
        screen_analyzer: { recoveryNode: NODES.screenCapture },
        action_executor: {},
        result_validator: { maxRetries: 0 },
    };
    const settingsFor = (name: VisionNodeName): NodeSettings => ({ ...defaults[name], ...options.nodes?.[name] });

    return new StateMachine<typeof VisionResultSchema, AgentCollaborators>(VisionResultSchema)
        .addNode(NODES.commandAnalyzer, new CommandAnalyzer(), settingsFor(NODES.commandAnalyzer))
        .addNode(NODES.screenCapture, new ScreenCapture(), settingsFor(NODES.screenCapture))
        .addNode(NODES.screenAnalyzer, new ScreenAnalyzer(), settingsFor(NODES.screenAnalyzer))
        .addNode(NODES.actionExecutor, new ActionExecutor(), settingsFor(NODES.actionExecutor))
        .addNode(NODES.resultValidator, new ResultValidator(), settingsFor(NODES.resultValidator))
        .addEdge(START, NODES.commandAnalyzer)
        .addConditionalEdge(
            NODES.commandAnalyzer,
            [{ when: screenlessNext, to: NODES.actionExecutor, label: "screenless" }],
            NODES.screenCapture,
        )
        .addEdge(NODES.screenCapture, NODES.screenAnalyzer)
        .addConditionalEdge(
            NODES.screenAnalyzer,
            [{ when: (state) => currentStep(state)?.intent === "analyze", to: NODES.resultValidator, label: "analysis only" }],
            NODES.actionExecutor,
        )
        .addEdge(NODES.actionExecutor, NODES.resultValidator)
        .addConditionalEdge(
            NODES.resultValidator,
            [{ when: screenlessNext, to: NODES.actionExecutor, label: "screenless" }],
            NODES.screenCapture,
        )
        .compile();
}

export interface VisionAgentOptions extends VisionAgentGraphOptions {
    collaborators: AgentCollaborators;
    /** Defaults to a fresh `MemoryStore`. */
    store?: CheckpointStore;
    settings?: EngineSettings;
    logger?: Logger;
    clock?: () => Date;
}

/**
 * Executor over a freshly built vision agent graph.
 *
 * @example
 * ```typescript
 * const agent = createVisionAgent({ collaborators: { vision, capture, actions } });
 * const result = await agent.run("open Safari");
 * ```
 */
export function createVisionAgent(options: VisionAgentOptions): Executor<typeof VisionResultSchema, AgentCollaborators, VisionResult> {
    return new Executor({
        graph: createVisionAgentGraph(options),
        store: options.store ?? new MemoryStore(),
        collaborators: options.collaborators,
        settings: options.settings,
        logger: options.logger,
        clock: options.clock,
    });
}
