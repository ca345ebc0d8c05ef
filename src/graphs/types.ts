import { type Outcome, type SessionState, type StepStatus } from "./state";

interface EndResult<R extends Record<string, unknown>> {
    sessionId: string;
    state: SessionState<R>;
    exitReason: "end";
    outcome: Outcome;
}

/**
 * The caller stopped the session between two steps. The state is not terminal
 * and `Executor.resume` continues it.
 */
interface CancelledResult<R extends Record<string, unknown>> {
    sessionId: string;
    state: SessionState<R>;
    exitReason: "cancelled";
    exitMessage: string;
}

export type GraphResult<R extends Record<string, unknown>> = EndResult<R> | CancelledResult<R>;

/**
 * One event per recorded step, published after the step's checkpoint write.
 */
export interface StepEvent {
    sessionId: string;
    stepIndex: number;
    node: string;
    status: StepStatus;
    /** The merged update for succeeded steps, otherwise empty. */
    resultDelta: Record<string, unknown>;
    completed: boolean;
    outcome?: Outcome;
}

export type StepListener = (event: StepEvent) => void;
