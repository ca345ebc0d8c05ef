export { StateMachine } from "./state-machine";
export { Graph, type ResultParse } from "./graph";
export {
    Executor,
    type ExecutorOptions,
    type ResumeOptions,
    type RunOptions,
    type SessionHandle,
    type StepStream,
} from "./executor";
export { type GraphResult, type StepEvent, type StepListener } from "./types";
export { NodeRegistry, START, END } from "./node-registry";
export { EdgeRouter, type Branch, type Edge } from "./edge-router";
export { RetryPolicy, type ResolvedNodeSettings, type RetryDecision } from "./retry-policy";
export { StreamPublisher } from "./stream-publisher";
export { RuntimeContext, type NodeContext } from "./runtime-context";
export { withTimeout } from "./timeout";
export { STATE_MERGE } from "./registry";
export {
    createInitialState,
    lastStep,
    ExecutionStepSchema,
    OutcomeSchema,
    SessionStateSchema,
    StepErrorSchema,
    STEP_STATUSES,
    type ExecutionStep,
    type Outcome,
    type SessionState,
    type StepError,
    type StepStatus,
} from "./state";
export { CheckpointStore, type Checkpoint } from "./store/base-store";
export { StoredSession } from "./store/stored-session";
export { MemoryStore } from "./store/memory-store";
export { SQLiteStore } from "./store/sqlite-store";
