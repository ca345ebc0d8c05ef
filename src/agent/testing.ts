import {
    type ActionDescriptor,
    type ActionOutcome,
    type ActionService,
    type Bounds,
    type Capture,
    type CaptureService,
    type VisionAnalysis,
    type VisionRequest,
    type VisionService,
} from "./collaborators";

/**
 * One scripted reaction: return a value, throw, or never settle until the
 * caller's signal aborts.
 */
export type Scripted<T> =
    | { kind: "reply"; value: T }
    | { kind: "error"; message: string }
    | { kind: "hang" };

/**
 * Queue of canned reactions consumed in order. Once it is empty every call
 * gets the fallback.
 *
 * @example
 * ```typescript
 * const script = new Script<number>({ kind: "reply", value: 0 })
 *   .enqueue({ kind: "error", message: "busy" })
 *   .enqueue({ kind: "reply", value: 42 });
 * ```
 */
export class Script<T> {
    private readonly queue: Scripted<T>[] = [];

    constructor(private readonly fallback: Scripted<T>) { }

    enqueue(reaction: Scripted<T>): this {
        this.queue.push(reaction);
        return this;
    }

    get pending(): number {
        return this.queue.length;
    }

    async play(signal: AbortSignal): Promise<T> {
        const reaction = this.queue.shift() ?? this.fallback;
        switch (reaction.kind) {
            case "reply":
                return structuredClone(reaction.value);
            case "error":
                throw new Error(reaction.message);
            case "hang":
                return await new Promise<T>((_, reject) => {
                    const abort = () => reject(signal.reason instanceof Error ? signal.reason : new Error("aborted"));
                    if (signal.aborted) {
                        abort();
                    } else {
                        signal.addEventListener("abort", abort, { once: true });
                    }
                });
        }
    }
}

/**
 * Vision service answering from a script. Requests are recorded.
 */
export class ScriptedVisionService implements VisionService {
    readonly requests: VisionRequest[] = [];
    readonly script: Script<VisionAnalysis>;

    constructor(fallback: VisionAnalysis = { elements: [], text: "" }) {
        this.script = new Script<VisionAnalysis>({ kind: "reply", value: fallback });
    }

    respondWith(analysis: VisionAnalysis): this {
        this.script.enqueue({ kind: "reply", value: analysis });
        return this;
    }

    failWith(message: string): this {
        this.script.enqueue({ kind: "error", message });
        return this;
    }

    /** The next call waits for its abort signal. */
    hang(): this {
        this.script.enqueue({ kind: "hang" });
        return this;
    }

    async analyze(request: VisionRequest, signal: AbortSignal): Promise<VisionAnalysis> {
        this.requests.push(structuredClone(request));
        return await this.script.play(signal);
    }
}

/**
 * Produces numbered screenshots `shot-1`, `shot-2`, ... unless scripted
 * otherwise.
 */
export class FakeCaptureService implements CaptureService {
    readonly regions: (Bounds | undefined)[] = [];
    private readonly script = new Script<Capture | undefined>({ kind: "reply", value: undefined });

    failWith(message: string): this {
        this.script.enqueue({ kind: "error", message });
        return this;
    }

    get calls(): number {
        return this.regions.length;
    }

    async capture(region: Bounds | undefined, signal: AbortSignal): Promise<Capture> {
        this.regions.push(region);
        const scripted = await this.script.play(signal);
        const id = `shot-${this.regions.length}`;
        return scripted ?? {
            image: { id, uri: `memory://${id}`, width: 1280, height: 800 },
            metadata: {},
        };
    }
}

/**
 * Records every action and reports success unless scripted otherwise.
 */
export class FakeActionService implements ActionService {
    readonly executed: ActionDescriptor[] = [];
    readonly script = new Script<ActionOutcome>({ kind: "reply", value: { success: true } });

    respondWith(outcome: ActionOutcome): this {
        this.script.enqueue({ kind: "reply", value: outcome });
        return this;
    }

    failWith(message: string): this {
        this.script.enqueue({ kind: "error", message });
        return this;
    }

    async execute(action: ActionDescriptor, signal: AbortSignal): Promise<ActionOutcome> {
        this.executed.push(structuredClone(action));
        return await this.script.play(signal);
    }
}
