import { CheckpointWriteError, SessionNotFoundError } from "../../errors";
import { type SessionState } from "../state";
import { StoredSession } from "./stored-session";

/**
 * Immutable snapshot of a session's full state after step `stepIndex`.
 */
export interface Checkpoint {
    sessionId: string;
    stepIndex: number;
    state: SessionState;
    createdAt: string;
}

/**
 * Abstract base class for the append-only checkpoint log.
 *
 * Writes for one session id are queued behind each other, so at most one
 * `write` per session is in flight; different sessions write concurrently.
 * Implementations must reject a `stepIndex` that is not greater than the
 * latest stored one.
 *
 * @abstract
 *
 * @example
 * ```typescript
 * class RedisStore extends CheckpointStore {
 *   protected async write(checkpoint: Checkpoint): Promise<void> { ... }
 *   async getHistory(sessionId: string): Promise<Checkpoint[]> { ... }
 *   // ... implement the other methods
 * }
 *
 * const executor = new Executor({ graph, store: new RedisStore(), collaborators });
 * ```
 */
export abstract class CheckpointStore {
    private readonly writeQueues = new Map<string, Promise<void>>();

    /**
     * Persists one checkpoint durably before resolving.
     *
     * @abstract
     * @throws {CheckpointWriteError} If the index does not extend the log or the write fails
     */
    protected abstract write(checkpoint: Checkpoint): Promise<void>;

    /**
     * All checkpoints of a session ordered by step index. Empty for unknown
     * sessions. Each call returns fresh copies.
     *
     * @abstract
     */
    abstract getHistory(sessionId: string): Promise<Checkpoint[]>;

    /**
     * @abstract
     */
    abstract latest(sessionId: string): Promise<Checkpoint | undefined>;

    /**
     * Removes every checkpoint of a session.
     *
     * @abstract
     */
    abstract delete(sessionId: string): Promise<void>;

    /**
     * Releases resources. Called when the store is no longer needed.
     *
     * @abstract
     */
    abstract dispose(): Promise<void>;

    async put(sessionId: string, stepIndex: number, state: SessionState, createdAt: Date = new Date()): Promise<void> {
        if (!Number.isInteger(stepIndex) || stepIndex < 1) {
            throw new CheckpointWriteError(sessionId, stepIndex, "step index must be a positive integer");
        }
        const checkpoint: Checkpoint = {
            sessionId,
            stepIndex,
            state: structuredClone(state),
            createdAt: createdAt.toISOString(),
        };
        const previous = this.writeQueues.get(sessionId) ?? Promise.resolve();
        const written = previous.then(() => this.write(checkpoint));
        // The queue only orders writes; each caller sees its own failure through `written`.
        const settled = written.then(() => undefined, () => undefined);
        this.writeQueues.set(sessionId, settled);
        void settled.then(() => {
            if (this.writeQueues.get(sessionId) === settled) {
                this.writeQueues.delete(sessionId);
            }
        });
        await written;
    }

    async exists(sessionId: string): Promise<boolean> {
        return (await this.latest(sessionId)) !== undefined;
    }

    /**
     * Reconstructs the state recorded by the latest checkpoint.
     *
     * @throws {SessionNotFoundError} If the session has no checkpoint
     */
    async resume(sessionId: string): Promise<SessionState> {
        const checkpoint = await this.latest(sessionId);
        if (checkpoint === undefined) {
            throw new SessionNotFoundError(sessionId);
        }
        return checkpoint.state;
    }

    /**
     * Gets a StoredSession wrapper for a specific session id.
     *
     * @example
     * ```typescript
     * const stored = store.getStoredSession("session-123");
     * if (await stored.exists()) {
     *   const { state } = (await stored.latest())!;
     * }
     * ```
     */
    getStoredSession(sessionId: string): StoredSession {
        return new StoredSession(sessionId, this);
    }
}
