import { createId } from "@paralleldrive/cuid2";
import { type z } from "zod";
import { type EngineSettings, loadSettings } from "../config/settings";
import {
    CheckpointWriteError,
    type EngineError,
    FatalConfigurationError,
    NodeExecutionError,
    NodeTimeout,
    SessionActiveError,
    SessionExistsError,
    StepBudgetExceeded,
    terminalKindOf,
} from "../errors";
import { type Completion, type NodeLike } from "../nodes/types";
import { deepFreeze } from "../util/deep-freeze";
import { createLogger, type Logger } from "../util/logger";
import { mergeState } from "../util/merge-state";
import { type Graph } from "./graph";
import { END, START } from "./node-registry";
import { RetryPolicy } from "./retry-policy";
import { RuntimeContext } from "./runtime-context";
import { createInitialState, type ExecutionStep, type Outcome, type SessionState } from "./state";
import { type Checkpoint, type CheckpointStore } from "./store/base-store";
import { StreamPublisher } from "./stream-publisher";
import { withTimeout } from "./timeout";
import { type GraphResult, type StepEvent, type StepListener } from "./types";

export interface ExecutorOptions<Z extends z.ZodObject, C, R extends Record<string, unknown>> {
    graph: Graph<Z, C, R>;
    store: CheckpointStore;
    collaborators: C;
    /** Defaults to `loadSettings()`. */
    settings?: EngineSettings;
    logger?: Logger;
    clock?: () => Date;
}

export interface ResumeOptions {
    /** Aborting it cancels the session before its next step. */
    signal?: AbortSignal;
    /** Delete the stored checkpoints once the session ends with success. */
    deleteAfterEnd?: boolean;
}

export interface RunOptions<R extends Record<string, unknown>> extends ResumeOptions {
    sessionId?: string;
    /** Seeds the result payload; parsed with the result schema. */
    initialResult?: Partial<R>;
}

export interface SessionHandle<R extends Record<string, unknown>> {
    readonly sessionId: string;
    readonly result: Promise<GraphResult<R>>;
    cancel(reason?: string): void;
}

/**
 * Live view of a running session. Ends after the terminal step; leaving a
 * `for await` loop early cancels the session.
 */
export interface StepStream<R extends Record<string, unknown>> extends SessionHandle<R>, AsyncIterable<StepEvent> {
    /** Events dropped because the reader fell behind. */
    readonly dropped: number;
}

type Invocation<R extends Record<string, unknown>> =
    | { ok: true; delta: Record<string, unknown>; result: R; complete?: Completion }
    | { ok: false; error: NodeExecutionError | NodeTimeout };

/**
 * Drives sessions through a compiled graph: run a node, merge its update,
 * pick the next node, checkpoint, publish. All three run modes share this
 * loop, so they produce the same steps and checkpoints.
 *
 * @example
 * ```typescript
 * const executor = new Executor({ graph, store: new MemoryStore(), collaborators });
 *
 * const result = await executor.run("open Safari");
 * if (result.exitReason === "end") {
 *   console.log(result.outcome.status);
 * }
 *
 * for await (const event of executor.runStream("click the OK button")) {
 *   console.log(event.stepIndex, event.node, event.status);
 * }
 * ```
 */
export class Executor<Z extends z.ZodObject, C, R extends Record<string, unknown>> {
    readonly settings: EngineSettings;
    private readonly graph: Graph<Z, C, R>;
    private readonly store: CheckpointStore;
    private readonly collaborators: C;
    private readonly policy: RetryPolicy;
    private readonly logger: Logger;
    private readonly clock: () => Date;
    private readonly active = new Set<string>();
    private readonly listeners = new Set<StepListener>();

    /**
     * @throws {FatalConfigurationError} If settings name an unknown recovery node
     */
    constructor(options: ExecutorOptions<Z, C, R>) {
        this.graph = options.graph;
        this.store = options.store;
        this.collaborators = options.collaborators;
        this.settings = options.settings ?? loadSettings();
        this.logger = options.logger ?? createLogger({ level: this.settings.logLevel });
        this.clock = options.clock ?? (() => new Date());
        for (const name of Object.keys(this.settings.nodes)) {
            if (!this.graph.hasNode(name)) {
                this.logger.warn(`Settings configure node ${name}, which is not part of the graph`);
            }
        }
        this.policy = new RetryPolicy(this.graph, this.settings);
    }

    /**
     * Runs a new session to its end or until it is cancelled.
     *
     * @param {string} command - Instruction stored on the session
     * @param {RunOptions<R>} options - Session id, initial result, signal and cleanup
     * @returns {Promise<GraphResult<R>>} The terminal or cancelled result
     * @throws {SessionActiveError} If the session id is already running
     * @throws {SessionExistsError} If the store already holds checkpoints for the id
     * @throws {FatalConfigurationError} If `initialResult` does not fit the result schema
     * @async
     */
    async run(command: string, options: RunOptions<R> = {}): Promise<GraphResult<R>> {
        return await this.runAsync(command, options).result;
    }

    /**
     * Starts a new session and returns at once. A stored session id is
     * reported through `result`.
     *
     * @param {string} command - Instruction stored on the session
     * @param {RunOptions<R>} options - Session id, initial result, signal and cleanup
     * @returns {SessionHandle<R>} Handle carrying the session id, the result promise and `cancel`
     * @throws {SessionActiveError} If the session id is already running
     */
    runAsync(command: string, options: RunOptions<R> = {}): SessionHandle<R> {
        const sessionId = options.sessionId ?? createId();
        const controller = new AbortController();
        const result = this.start(sessionId, () => this.createSession(sessionId, command, options), options, controller);
        return {
            sessionId,
            result,
            cancel: (reason?: string) => controller.abort(reason),
        };
    }

    /**
     * Starts a new session and streams one event per step.
     *
     * @param {string} command - Instruction stored on the session
     * @param {RunOptions<R>} options - Session id, initial result, signal and cleanup
     * @returns {StepStream<R>} Async iterable of step events that also carries the result
     * @throws {SessionActiveError} If the session id is already running
     */
    runStream(command: string, options: RunOptions<R> = {}): StepStream<R> {
        const sessionId = options.sessionId ?? createId();
        const controller = new AbortController();
        const publisher = new StreamPublisher<StepEvent>({
            capacity: this.settings.stream.bufferSize,
            onCancel: () => controller.abort("stream closed by reader"),
        });
        const result = this.start(
            sessionId,
            () => this.createSession(sessionId, command, options),
            options,
            controller,
            publisher,
        );
        void result.then(() => publisher.close(), (error: unknown) => publisher.fail(error));
        return {
            sessionId,
            result,
            cancel: (reason?: string) => controller.abort(reason),
            get dropped() {
                return publisher.dropped;
            },
            [Symbol.asyncIterator]: () => publisher[Symbol.asyncIterator](),
        };
    }

    /**
     * Continues a session from its latest checkpoint. A terminal session is
     * returned as recorded, without running anything.
     *
     * @param {string} sessionId - Id of a session held by the store
     * @param {ResumeOptions} options - Signal and cleanup
     * @returns {Promise<GraphResult<R>>} The terminal or cancelled result
     * @throws {SessionNotFoundError} If the store has no checkpoint for it
     * @throws {SessionActiveError} If it is running on this executor
     * @async
     */
    async resume(sessionId: string, options: ResumeOptions = {}): Promise<GraphResult<R>> {
        const controller = new AbortController();
        return await this.start(sessionId, () => this.loadSession(sessionId), options, controller);
    }

    /**
     * Every checkpoint of a session, oldest first.
     *
     * @param {string} sessionId - Session to read
     * @returns {Promise<Checkpoint[]>} Empty for an unknown session
     * @async
     */
    async getHistory(sessionId: string): Promise<Checkpoint[]> {
        return await this.store.getHistory(sessionId);
    }

    /**
     * Subscribes to step events of every session this executor runs. A
     * listener that throws is logged and otherwise ignored.
     *
     * @param {StepListener} listener - Called once per recorded step
     * @returns {() => void} Unsubscribe function
     */
    onStep(listener: StepListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * @param {string} sessionId - Session to look up
     * @returns {boolean} True while a run or resume of the session is in progress here
     */
    isActive(sessionId: string): boolean {
        return this.active.has(sessionId);
    }

    private start(
        sessionId: string,
        load: () => Promise<SessionState<R>>,
        options: ResumeOptions,
        controller: AbortController,
        publisher?: StreamPublisher<StepEvent>,
    ): Promise<GraphResult<R>> {
        if (this.active.has(sessionId)) {
            throw new SessionActiveError(sessionId);
        }
        this.active.add(sessionId);
        const signal = options.signal;
        if (signal !== undefined) {
            if (signal.aborted) {
                controller.abort(signal.reason);
            } else {
                signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
            }
        }
        return this.drive(sessionId, load, new RuntimeContext(sessionId, controller.signal), options, publisher);
    }

    private async drive(
        sessionId: string,
        load: () => Promise<SessionState<R>>,
        runtime: RuntimeContext,
        options: ResumeOptions,
        publisher?: StreamPublisher<StepEvent>,
    ): Promise<GraphResult<R>> {
        try {
            return await this.runSession(await load(), runtime, options, publisher);
        } finally {
            this.active.delete(sessionId);
        }
    }

    private async createSession(sessionId: string, command: string, options: RunOptions<R>): Promise<SessionState<R>> {
        if (await this.store.exists(sessionId)) {
            throw new SessionExistsError(sessionId);
        }
        const parsed = this.graph.safeParseResult(options.initialResult ?? {});
        if (!parsed.success) {
            throw new FatalConfigurationError(`Invalid initial result: ${parsed.error}`);
        }
        const state = createInitialState({
            sessionId,
            command,
            entry: START,
            result: parsed.data,
            createdAt: this.clock(),
        });
        return { ...state, currentNode: this.graph.entry(state) };
    }

    private async loadSession(sessionId: string): Promise<SessionState<R>> {
        const state = await this.store.resume(sessionId);
        const parsed = this.graph.safeParseResult(state.result);
        if (!parsed.success) {
            throw new FatalConfigurationError(`Stored result of session ${sessionId} does not fit the schema: ${parsed.error}`);
        }
        return { ...state, result: parsed.data };
    }

    private async runSession(
        initial: SessionState<R>,
        runtime: RuntimeContext,
        options: ResumeOptions,
        publisher?: StreamPublisher<StepEvent>,
    ): Promise<GraphResult<R>> {
        const log = this.logger.child({ sessionId: initial.sessionId });
        let state = initial;
        log.info(`Session started at ${state.currentNode} after ${state.steps.length} steps`);
        while (!state.completed) {
            if (runtime.cancelled) {
                log.info(`Session cancelled before step ${state.steps.length + 1}`);
                return {
                    sessionId: state.sessionId,
                    state,
                    exitReason: "cancelled",
                    exitMessage: runtime.cancelReason,
                };
            }
            if (state.currentNode === END) {
                state = { ...state, completed: true, outcome: { status: "success" } };
                break;
            }
            state = await this.step(state, log, publisher);
        }
        const outcome: Outcome = state.outcome ?? { status: "success" };
        if (outcome.status === "success") {
            log.info(`Session ended with success after ${state.steps.length} steps`);
            if (options.deleteAfterEnd === true) {
                await this.store.delete(state.sessionId);
            }
        } else {
            log.error(`Session ended with failure (${outcome.errorKind ?? "node verdict"}): ${outcome.detail ?? ""}`);
        }
        return { sessionId: state.sessionId, state, exitReason: "end", outcome };
    }

    /**
     * One step of the control loop. Returns the state as checkpointed, or the
     * terminal state when the checkpoint could not be written durably.
     */
    private async step(
        state: SessionState<R>,
        log: Logger,
        publisher?: StreamPublisher<StepEvent>,
    ): Promise<SessionState<R>> {
        const nodeName = state.currentNode;
        if (!this.graph.hasNode(nodeName)) {
            // Only reachable through a checkpoint written by another graph
            return terminate(state, new FatalConfigurationError(`Session is positioned at unknown node ${nodeName}`));
        }
        const index = state.steps.length + 1;
        const settings = this.policy.forNode(nodeName);
        const startedAt = this.clock().toISOString();
        const invocation = await this.invoke(this.graph.node(nodeName), state, index, settings.timeoutMs, log);
        const endedAt = this.clock().toISOString();

        let next: SessionState<R>;
        let delta: Record<string, unknown> = {};
        if (invocation.ok) {
            delta = invocation.delta;
            const record: ExecutionStep = { index, node: nodeName, startedAt, endedAt, status: "succeeded", update: delta };
            next = { ...state, steps: [...state.steps, record], result: invocation.result };
            if (invocation.complete !== undefined) {
                next = {
                    ...next,
                    currentNode: END,
                    completed: true,
                    outcome: invocation.complete.detail === undefined
                        ? { status: invocation.complete.status }
                        : { status: invocation.complete.status, detail: invocation.complete.detail },
                };
            } else {
                next = this.advance(next, nodeName);
            }
        } else {
            const { retries, decision } = this.policy.onFailure(nodeName, state.retries, invocation.error);
            const record: ExecutionStep = {
                index,
                node: nodeName,
                startedAt,
                endedAt,
                status: "failed",
                error: { kind: invocation.error instanceof NodeTimeout ? "NodeTimeout" : "NodeExecutionError", message: invocation.error.message },
            };
            next = { ...state, steps: [...state.steps, record], retries };
            if (decision.kind === "retry") {
                log.warn(`${nodeName} failed (${decision.failures}/${settings.maxRetries}), continuing at ${decision.target}: ${invocation.error.message}`);
                next = { ...next, currentNode: decision.target };
            } else {
                next = terminate(next, decision.error);
            }
        }

        if (!next.completed && next.steps.length >= this.settings.stepBudget) {
            next = terminate(next, new StepBudgetExceeded(this.settings.stepBudget));
        }

        log.debug(`Step ${index} ${nodeName} ${lastStatus(next)} -> ${next.completed ? "terminal" : next.currentNode}`);
        next = await this.checkpoint(next, index, log);
        this.emit({
            sessionId: next.sessionId,
            stepIndex: index,
            node: nodeName,
            status: lastStatus(next),
            resultDelta: delta,
            completed: next.completed,
            ...(next.outcome !== undefined ? { outcome: next.outcome } : {}),
        }, log, publisher);
        return next;
    }

    private advance(state: SessionState<R>, from: string): SessionState<R> {
        let target: string;
        try {
            target = this.graph.route(from, state);
        } catch (error) {
            if (error instanceof FatalConfigurationError) {
                return terminate(state, error);
            }
            throw error;
        }
        if (target === END) {
            return { ...state, currentNode: END, completed: true, outcome: { status: "success" } };
        }
        return { ...state, currentNode: target };
    }

    private async invoke(
        node: NodeLike<R, C>,
        state: SessionState<R>,
        stepIndex: number,
        timeoutMs: number,
        log: Logger,
    ): Promise<Invocation<R>> {
        const name = state.currentNode;
        const frozen = deepFreeze(structuredClone(state));
        try {
            const output = await withTimeout(name, timeoutMs, (signal) => node.run(frozen, {
                sessionId: state.sessionId,
                node: name,
                stepIndex,
                attempt: (state.retries[name] ?? 0) + 1,
                collaborators: this.collaborators,
                signal,
                logger: log.child({ node: name }),
            }));
            if (output.kind === "error") {
                return { ok: false, error: new NodeExecutionError(name, output.error.message, output.error.detail) };
            }
            const delta = toRecord(output.update);
            const parsed = this.graph.safeParseResult(mergeState(state.result, delta, this.graph.schema));
            if (!parsed.success) {
                return { ok: false, error: new NodeExecutionError(name, `Update rejected by the result schema: ${parsed.error}`) };
            }
            return output.complete === undefined
                ? { ok: true, delta, result: parsed.data }
                : { ok: true, delta, result: parsed.data, complete: output.complete };
        } catch (error) {
            if (error instanceof NodeTimeout) {
                return { ok: false, error };
            }
            return { ok: false, error: NodeExecutionError.from(name, error) };
        }
    }

    /**
     * Writes the checkpoint for step `stepIndex`, retrying as configured. When
     * every attempt fails the session ends if durability is required,
     * otherwise it continues with a gap in its history.
     */
    private async checkpoint(state: SessionState<R>, stepIndex: number, log: Logger): Promise<SessionState<R>> {
        const attempts = this.settings.checkpoint.writeRetries + 1;
        let failure: CheckpointWriteError | undefined;
        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                await this.store.put(state.sessionId, stepIndex, state, this.clock());
                return state;
            } catch (error) {
                failure = error instanceof CheckpointWriteError
                    ? error
                    : new CheckpointWriteError(state.sessionId, stepIndex, error instanceof Error ? error.message : String(error), { cause: error });
                log.warn(`Checkpoint attempt ${attempt}/${attempts} failed: ${failure.message}`);
            }
        }
        if (failure === undefined || !this.settings.checkpoint.requireDurable) {
            log.warn(`Continuing without checkpoint ${stepIndex}; the session cannot be resumed from it`);
            return state;
        }
        return terminate(state, failure);
    }

    private emit(event: StepEvent, log: Logger, publisher?: StreamPublisher<StepEvent>): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                log.error(`Step listener failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
        publisher?.publish(event);
    }
}

function terminate<R extends Record<string, unknown>>(state: SessionState<R>, error: EngineError): SessionState<R> {
    return {
        ...state,
        currentNode: END,
        completed: true,
        outcome: { status: "failure", errorKind: terminalKindOf(error), detail: error.message },
    };
}

function lastStatus(state: SessionState): ExecutionStep["status"] {
    return state.steps[state.steps.length - 1]?.status ?? "succeeded";
}

function toRecord<R extends Record<string, unknown>>(update: Partial<R>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(update));
}
