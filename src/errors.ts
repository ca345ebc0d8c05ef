/**
 * Failure kinds recorded on a failed execution step. Both are retryable.
 */
export const STEP_ERROR_KINDS = ["NodeExecutionError", "NodeTimeout"] as const;
export type StepErrorKind = (typeof STEP_ERROR_KINDS)[number];

/**
 * Failure kinds that end a session. They are reported on the terminal outcome,
 * never thrown at the caller.
 */
export const TERMINAL_ERROR_KINDS = [
    "MaxRetriesExceeded",
    "StepBudgetExceeded",
    "FatalConfigurationError",
    "CheckpointWriteError",
] as const;
export type TerminalErrorKind = (typeof TERMINAL_ERROR_KINDS)[number];

export type ErrorKind =
    | StepErrorKind
    | TerminalErrorKind
    | "UnknownNodeError"
    | "DuplicateNodeError"
    | "MalformedEdgeError"
    | "SessionActiveError"
    | "SessionExistsError"
    | "SessionNotFoundError";

/**
 * Root of every error the engine produces.
 */
export abstract class EngineError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A node reported an error signal, threw, or produced an update the result
 * schema rejects.
 */
export class NodeExecutionError extends EngineError {
    readonly kind: ErrorKind = "NodeExecutionError";

    constructor(
        public readonly node: string,
        message: string,
        public readonly detail?: unknown,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }

    static from(node: string, error: unknown): NodeExecutionError {
        if (error instanceof NodeExecutionError) {
            return error;
        }
        const message = error instanceof Error ? error.message : String(error);
        return new NodeExecutionError(node, message, undefined, { cause: error });
    }
}

export class NodeTimeout extends EngineError {
    readonly kind: ErrorKind = "NodeTimeout";

    constructor(public readonly node: string, public readonly timeoutMs: number) {
        super(`Node ${node} timed out after ${timeoutMs}ms`);
    }
}

export class MaxRetriesExceeded extends EngineError {
    readonly kind: ErrorKind = "MaxRetriesExceeded";

    constructor(
        public readonly node: string,
        public readonly failures: number,
        public readonly lastFailure: NodeExecutionError | NodeTimeout,
    ) {
        super(`Node ${node} failed ${failures} times: ${lastFailure.message}`, { cause: lastFailure });
    }
}

export class StepBudgetExceeded extends EngineError {
    readonly kind: ErrorKind = "StepBudgetExceeded";

    constructor(public readonly budget: number) {
        super(`Step budget of ${budget} exhausted`);
    }
}

export class CheckpointWriteError extends EngineError {
    readonly kind: ErrorKind = "CheckpointWriteError";

    constructor(
        public readonly sessionId: string,
        public readonly stepIndex: number,
        reason: string,
        options?: { cause?: unknown },
    ) {
        super(`Checkpoint ${sessionId}#${stepIndex} not written: ${reason}`, options);
    }
}

/**
 * A defect in the graph definition or its configuration. Never retried.
 */
export class FatalConfigurationError extends EngineError {
    readonly kind: ErrorKind = "FatalConfigurationError";
}

export class UnknownNodeError extends FatalConfigurationError {
    override readonly kind: ErrorKind = "UnknownNodeError";

    constructor(public readonly node: string, where?: string) {
        super(where ? `Unknown node ${node} referenced by ${where}` : `Unknown node ${node}`);
    }
}

export class DuplicateNodeError extends FatalConfigurationError {
    override readonly kind: ErrorKind = "DuplicateNodeError";

    constructor(public readonly node: string) {
        super(`Node ${node} already exists`);
    }
}

export class MalformedEdgeError extends FatalConfigurationError {
    override readonly kind: ErrorKind = "MalformedEdgeError";
}

export class SessionActiveError extends EngineError {
    readonly kind: ErrorKind = "SessionActiveError";

    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} is already running`);
    }
}

/**
 * A new session was started under an id that already has checkpoints. Sessions
 * own their step log, so the existing one is left untouched.
 */
export class SessionExistsError extends EngineError {
    readonly kind: ErrorKind = "SessionExistsError";

    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} already exists; resume it or pick another id`);
    }
}

export class SessionNotFoundError extends EngineError {
    readonly kind: ErrorKind = "SessionNotFoundError";

    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} not found`);
    }
}

export function isFatalConfiguration(error: unknown): error is FatalConfigurationError {
    return error instanceof FatalConfigurationError;
}

/**
 * Maps an error that ends a session to the kind reported on its outcome.
 */
export function terminalKindOf(error: EngineError): TerminalErrorKind {
    const errorKind: ErrorKind = error.kind;
    if (isFatalConfiguration(error)) {
        return "FatalConfigurationError";
    }
    for (const kind of TERMINAL_ERROR_KINDS) {
        if (errorKind === kind) {
            return kind;
        }
    }
    return "FatalConfigurationError";
}
