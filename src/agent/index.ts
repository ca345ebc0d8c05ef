export * from "./collaborators";
export {
    DEFAULT_SCROLL_AMOUNT,
    INTENTS,
    isScreenless,
    parseCommand,
    parseStep,
    PlanStepSchema,
    SCROLL_DIRECTIONS,
    targetsOf,
    type Intent,
    type PlanStep,
} from "./intent";
export {
    ActionRecordSchema,
    currentStep,
    VisionResultSchema,
    type ActionRecord,
    type VisionResult,
    type VisionState,
} from "./result";
export { CommandAnalyzer } from "./nodes/command-analyzer";
export { ScreenCapture } from "./nodes/screen-capture";
export { ScreenAnalyzer, findElement } from "./nodes/screen-analyzer";
export { ActionExecutor, actionsFor, centerOf } from "./nodes/action-executor";
export { ResultValidator } from "./nodes/result-validator";
export {
    createVisionAgent,
    createVisionAgentGraph,
    NODES,
    type VisionAgentGraph,
    type VisionAgentGraphOptions,
    type VisionAgentOptions,
    type VisionNodeName,
} from "./vision-agent-graph";
