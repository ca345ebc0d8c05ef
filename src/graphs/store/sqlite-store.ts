import type Database from "better-sqlite3";
import { CheckpointWriteError } from "../../errors";
import { SessionStateSchema } from "../state";
import { type Checkpoint, CheckpointStore } from "./base-store";

interface CheckpointRow {
    session_id: string;
    step_index: number;
    state: string;
    created_at: string;
}

/**
 * A store implementation using SQLite for durable checkpoint logs.
 * One row per step; rows are only ever inserted or deleted per session.
 *
 * @class SQLiteStore
 * @extends {CheckpointStore}
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 *
 * const db = new Database("sessions.db");
 * const store = new SQLiteStore(db, "checkpoints");
 *
 * const executor = new Executor({ graph, store, collaborators });
 * const first = await executor.run("open Safari");
 *
 * // Later, possibly in another process
 * const again = await executor.resume(first.sessionId);
 *
 * await store.dispose();
 * ```
 */
export class SQLiteStore extends CheckpointStore {
    private readonly insertRow: Database.Statement<[string, number, string, string]>;
    private readonly selectMax: Database.Statement<[string], { max_index: number | null }>;
    private readonly selectAll: Database.Statement<[string], CheckpointRow>;
    private readonly selectLatest: Database.Statement<[string], CheckpointRow>;
    private readonly deleteRows: Database.Statement<[string]>;
    private readonly append: (checkpoint: Checkpoint) => void;

    /**
     * Creates the table if it doesn't exist.
     *
     * @param db - The SQLite database connection
     * @param tableName - Table holding the checkpoints
     */
    constructor(private readonly db: Database.Database, private readonly tableName: string = "checkpoints") {
        super();
        if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
            throw new RangeError(`Invalid table name ${tableName}`);
        }
        this.db.prepare(
            `CREATE TABLE IF NOT EXISTS ${this.tableName} (
                session_id TEXT NOT NULL,
                step_index INTEGER NOT NULL,
                state TEXT NOT NULL,
                created_at TEXT NOT NULL,
                PRIMARY KEY (session_id, step_index)
            )`,
        ).run();
        this.insertRow = this.db.prepare<[string, number, string, string]>(
            `INSERT INTO ${this.tableName} (session_id, step_index, state, created_at) VALUES (?, ?, ?, ?)`,
        );
        this.selectMax = this.db.prepare<[string], { max_index: number | null }>(
            `SELECT MAX(step_index) AS max_index FROM ${this.tableName} WHERE session_id = ?`,
        );
        this.selectAll = this.db.prepare<[string], CheckpointRow>(
            `SELECT session_id, step_index, state, created_at FROM ${this.tableName} WHERE session_id = ? ORDER BY step_index`,
        );
        this.selectLatest = this.db.prepare<[string], CheckpointRow>(
            `SELECT session_id, step_index, state, created_at FROM ${this.tableName} WHERE session_id = ? ORDER BY step_index DESC LIMIT 1`,
        );
        this.deleteRows = this.db.prepare<[string]>(`DELETE FROM ${this.tableName} WHERE session_id = ?`);
        this.append = this.db.transaction((checkpoint: Checkpoint) => {
            const max = this.selectMax.get(checkpoint.sessionId)?.max_index ?? null;
            if (max !== null && checkpoint.stepIndex <= max) {
                throw new CheckpointWriteError(checkpoint.sessionId, checkpoint.stepIndex, `step ${max} is already recorded`);
            }
            this.insertRow.run(
                checkpoint.sessionId,
                checkpoint.stepIndex,
                JSON.stringify(checkpoint.state),
                checkpoint.createdAt,
            );
        });
    }

    protected async write(checkpoint: Checkpoint): Promise<void> {
        try {
            this.append(checkpoint);
        } catch (error) {
            if (error instanceof CheckpointWriteError) {
                throw error;
            }
            throw new CheckpointWriteError(
                checkpoint.sessionId,
                checkpoint.stepIndex,
                error instanceof Error ? error.message : String(error),
                { cause: error },
            );
        }
    }

    /**
     * Loads and re-validates every row of a session.
     *
     * @param {string} sessionId - Session to read
     * @returns {Promise<Checkpoint[]>} Checkpoints ordered by step index
     * @async
     */
    async getHistory(sessionId: string): Promise<Checkpoint[]> {
        return this.selectAll.all(sessionId).map(toCheckpoint);
    }

    /**
     * @param {string} sessionId - Session to read
     * @returns {Promise<Checkpoint | undefined>} The row with the highest step index
     * @async
     */
    async latest(sessionId: string): Promise<Checkpoint | undefined> {
        const row = this.selectLatest.get(sessionId);
        return row === undefined ? undefined : toCheckpoint(row);
    }

    /**
     * Deletes every row of a session.
     *
     * @param {string} sessionId - Session to remove
     * @returns {Promise<void>}
     * @async
     */
    async delete(sessionId: string): Promise<void> {
        this.deleteRows.run(sessionId);
    }

    /**
     * Closes the database connection.
     */
    async dispose(): Promise<void> {
        this.db.close();
    }
}

function toCheckpoint(row: CheckpointRow): Checkpoint {
    return {
        sessionId: row.session_id,
        stepIndex: row.step_index,
        state: SessionStateSchema.parse(JSON.parse(row.state)),
        createdAt: row.created_at,
    };
}
