import { type Logger } from "../util/logger";

/**
 * What a node receives besides the state: who it runs for, which attempt this
 * is, the collaborators handed to the executor, and a signal that aborts when
 * the node's timeout expires.
 */
export interface NodeContext<C = unknown> {
    readonly sessionId: string;
    readonly node: string;
    /** Index the step produced by this invocation will get. */
    readonly stepIndex: number;
    /** 1 on the first attempt, then one more per recorded failure of this node. */
    readonly attempt: number;
    readonly collaborators: C;
    readonly signal: AbortSignal;
    readonly logger: Logger;
}

/**
 * Per-session runtime flags shared by the control loop. Cancellation is
 * cooperative: the loop checks `cancelled` between steps only.
 *
 * @example
 * ```typescript
 * const runtime = new RuntimeContext("session-1", controller.signal);
 * controller.abort("user closed the window");
 * runtime.cancelled;     // true
 * runtime.cancelReason;  // "user closed the window"
 * ```
 */
export class RuntimeContext {
    private _cancelled = false;
    private _cancelReason = "";

    get cancelled(): boolean {
        return this._cancelled;
    }

    get cancelReason(): string {
        return this._cancelReason;
    }

    /**
     * @param sessionId - Session this runtime belongs to
     * @param signal - Optional caller signal; aborting it requests cancellation
     */
    constructor(public readonly sessionId: string, signal?: AbortSignal) {
        if (signal === undefined) {
            return;
        }
        if (signal.aborted) {
            this.markCancelled(reasonOf(signal));
        } else {
            signal.addEventListener("abort", () => this.markCancelled(reasonOf(signal)), { once: true });
        }
    }

    /**
     * Requests that the session stop before its next step.
     */
    markCancelled(reason?: string): void {
        if (this._cancelled) {
            return;
        }
        this._cancelled = true;
        this._cancelReason = reason ?? "";
    }
}

function reasonOf(signal: AbortSignal): string {
    const reason: unknown = signal.reason;
    if (typeof reason === "string") {
        return reason;
    }
    return reason instanceof Error ? reason.message : "";
}
