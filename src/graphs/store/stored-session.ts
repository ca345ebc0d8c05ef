import { type Checkpoint, type CheckpointStore } from "./base-store";
import { type SessionState } from "../state";

/**
 * Wrapper for interacting with one session's checkpoint log.
 *
 * @class StoredSession
 *
 * @example
 * ```typescript
 * const stored = store.getStoredSession("session-123");
 *
 * if (await stored.exists()) {
 *   const history = await stored.history();
 *   console.log("Steps so far:", history.length);
 * }
 *
 * await stored.delete();
 * ```
 */
export class StoredSession {
    /**
     * @param {string} sessionId - Session this wrapper is bound to
     * @param {CheckpointStore} store - The underlying store implementation
     */
    constructor(public readonly sessionId: string, private readonly store: CheckpointStore) {
    }

    /**
     * Appends the state recorded after step `stepIndex`.
     *
     * @param {number} stepIndex - 1-based index, greater than the latest stored one
     * @param {SessionState} state - Full session state after that step
     * @returns {Promise<void>}
     * @throws {CheckpointWriteError} If the index does not extend the log
     *
     * @example
     * ```typescript
     * await stored.save(3, state);
     * ```
     */
    async save(stepIndex: number, state: SessionState): Promise<void> {
        await this.store.put(this.sessionId, stepIndex, state);
    }

    /**
     * Checks if this session has at least one checkpoint.
     *
     * @returns {Promise<boolean>} True if the session exists
     */
    async exists(): Promise<boolean> {
        return await this.store.exists(this.sessionId);
    }

    /**
     * @returns {Promise<Checkpoint[]>} Every checkpoint of this session, oldest first
     */
    async history(): Promise<Checkpoint[]> {
        return await this.store.getHistory(this.sessionId);
    }

    /**
     * @returns {Promise<Checkpoint | undefined>} The newest checkpoint, if any
     */
    async latest(): Promise<Checkpoint | undefined> {
        return await this.store.latest(this.sessionId);
    }

    /**
     * Loads the state recorded by the latest checkpoint.
     *
     * @returns {Promise<SessionState>} The state to continue from
     * @throws {SessionNotFoundError} If nothing was saved for this session
     */
    async load(): Promise<SessionState> {
        return await this.store.resume(this.sessionId);
    }

    /**
     * Removes every checkpoint of this session.
     *
     * @returns {Promise<void>}
     */
    async delete(): Promise<void> {
        await this.store.delete(this.sessionId);
    }
}
