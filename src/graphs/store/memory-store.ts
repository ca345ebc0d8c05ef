import { CheckpointWriteError } from "../../errors";
import { type Checkpoint, CheckpointStore } from "./base-store";

/**
 * Keeps checkpoints in process memory. Every read hands out deep copies, so
 * callers cannot alter the recorded history.
 */
export class MemoryStore extends CheckpointStore {
    private readonly sessions = new Map<string, Checkpoint[]>();

    /**
     * @throws {CheckpointWriteError} If the index does not extend the session's log
     */
    protected async write(checkpoint: Checkpoint): Promise<void> {
        const log = this.sessions.get(checkpoint.sessionId) ?? [];
        const last = log.at(-1);
        if (last !== undefined && checkpoint.stepIndex <= last.stepIndex) {
            throw new CheckpointWriteError(
                checkpoint.sessionId,
                checkpoint.stepIndex,
                `step ${last.stepIndex} is already recorded`,
            );
        }
        log.push(structuredClone(checkpoint));
        this.sessions.set(checkpoint.sessionId, log);
    }

    /**
     * @param {string} sessionId - Session to read
     * @returns {Promise<Checkpoint[]>} Copies of the stored checkpoints, oldest first
     */
    async getHistory(sessionId: string): Promise<Checkpoint[]> {
        return (this.sessions.get(sessionId) ?? []).map((checkpoint) => structuredClone(checkpoint));
    }

    /**
     * @param {string} sessionId - Session to read
     * @returns {Promise<Checkpoint | undefined>} A copy of the newest checkpoint
     */
    async latest(sessionId: string): Promise<Checkpoint | undefined> {
        const last = this.sessions.get(sessionId)?.at(-1);
        return last === undefined ? undefined : structuredClone(last);
    }

    /**
     * @param {string} sessionId - Session whose log is dropped
     * @returns {Promise<void>}
     */
    async delete(sessionId: string): Promise<void> {
        this.sessions.delete(sessionId);
    }

    /**
     * Forgets every session.
     *
     * @returns {Promise<void>}
     */
    async dispose(): Promise<void> {
        this.sessions.clear();
    }
}
