import { z } from "zod";
import { STEP_ERROR_KINDS, TERMINAL_ERROR_KINDS } from "../errors";

export const STEP_STATUSES = ["succeeded", "failed"] as const;

/**
 * Every failed attempt is `failed`, whether the retry policy handed it to a
 * recovery node or it ended the session.
 */
export type StepStatus = (typeof STEP_STATUSES)[number];

export const StepErrorSchema = z.object({
    kind: z.enum(STEP_ERROR_KINDS),
    message: z.string(),
    detail: z.unknown().optional(),
});
export type StepError = z.infer<typeof StepErrorSchema>;

export const ExecutionStepSchema = z.object({
    /** 1-based, dense within a session. */
    index: z.number().int().positive(),
    node: z.string(),
    startedAt: z.string(),
    endedAt: z.string(),
    status: z.enum(STEP_STATUSES),
    update: z.record(z.string(), z.unknown()).optional(),
    error: StepErrorSchema.optional(),
});
export type ExecutionStep = z.infer<typeof ExecutionStepSchema>;

export const OutcomeSchema = z.object({
    status: z.enum(["success", "failure"]),
    errorKind: z.enum(TERMINAL_ERROR_KINDS).optional(),
    detail: z.string().optional(),
});
export type Outcome = z.infer<typeof OutcomeSchema>;

export const SessionStateSchema = z.object({
    sessionId: z.string().min(1),
    command: z.string(),
    createdAt: z.string(),
    currentNode: z.string(),
    steps: z.array(ExecutionStepSchema),
    retries: z.record(z.string(), z.number().int().nonnegative()),
    result: z.record(z.string(), z.unknown()),
    completed: z.boolean(),
    outcome: OutcomeSchema.optional(),
});

/**
 * The record threaded through the graph for one session. Only the executor
 * produces new versions of it.
 */
export type SessionState<R extends Record<string, unknown> = Record<string, unknown>> =
    Omit<z.infer<typeof SessionStateSchema>, "result"> & { result: R };

export interface InitialStateInput<R extends Record<string, unknown>> {
    sessionId: string;
    command: string;
    entry: string;
    result: R;
    createdAt: Date;
}

export function createInitialState<R extends Record<string, unknown>>(input: InitialStateInput<R>): SessionState<R> {
    return {
        sessionId: input.sessionId,
        command: input.command,
        createdAt: input.createdAt.toISOString(),
        currentNode: input.entry,
        steps: [],
        retries: {},
        result: input.result,
        completed: false,
    };
}

/** Most recent step of a session, if it has run any. */
export function lastStep(state: Pick<SessionState, "steps">): ExecutionStep | undefined {
    return state.steps[state.steps.length - 1];
}
