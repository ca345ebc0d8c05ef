import { z } from "zod";

export const INTENTS = ["click", "type", "scroll", "drag", "key_combo", "open_app", "close_app", "analyze"] as const;
export type Intent = (typeof INTENTS)[number];

export const SCROLL_DIRECTIONS = ["up", "down", "left", "right"] as const;
export const DEFAULT_SCROLL_AMOUNT = 3;

const description = z.string();

export const PlanStepSchema = z.discriminatedUnion("intent", [
    z.object({ intent: z.literal("click"), description, target: z.string(), button: z.enum(["left", "right", "double"]) }),
    z.object({ intent: z.literal("type"), description, text: z.string(), target: z.string().optional() }),
    z.object({
        intent: z.literal("scroll"),
        description,
        direction: z.enum(SCROLL_DIRECTIONS),
        amount: z.number().int().positive(),
    }),
    z.object({ intent: z.literal("drag"), description, target: z.string(), destination: z.string() }),
    z.object({ intent: z.literal("key_combo"), description, keys: z.array(z.string()).min(1) }),
    z.object({ intent: z.literal("open_app"), description, app: z.string() }),
    z.object({ intent: z.literal("close_app"), description, app: z.string() }),
    z.object({ intent: z.literal("analyze"), description, question: z.string() }),
]);
export type PlanStep = z.infer<typeof PlanStepSchema>;

type StepParser = (segment: string) => PlanStep | undefined;

const ARTICLE = String.raw`(?:the\s+)?`;

const parsers: StepParser[] = [
    (segment) => {
        const app = /^(?:open|launch|start)\s+(.+)$/i.exec(segment)?.[1];
        return app === undefined ? undefined : { intent: "open_app", description: segment, app };
    },
    (segment) => {
        const app = /^(?:close|quit|exit)\s+(.+)$/i.exec(segment)?.[1];
        return app === undefined ? undefined : { intent: "close_app", description: segment, app };
    },
    (segment) => {
        const match = new RegExp(String.raw`^(double[-\s]?click|right[-\s]?click|click|tap)\s+(?:on\s+)?${ARTICLE}(.+)$`, "i").exec(segment);
        const verb = match?.[1]?.toLowerCase();
        const target = match?.[2];
        if (verb === undefined || target === undefined) {
            return undefined;
        }
        const button = verb.startsWith("double") ? "double" : verb.startsWith("right") ? "right" : "left";
        return { intent: "click", description: segment, target, button };
    },
    (segment) => {
        const match = new RegExp(
            String.raw`^(?:type|enter|write)\s+(?:"([^"]*)"|'([^']*)'|(.+?))(?:\s+(?:into|in)\s+${ARTICLE}(.+))?$`,
            "i",
        ).exec(segment);
        if (match === null) {
            return undefined;
        }
        const [, doubleQuoted, singleQuoted, bare, target] = match;
        const text = doubleQuoted ?? singleQuoted ?? bare ?? "";
        return target === undefined
            ? { intent: "type", description: segment, text }
            : { intent: "type", description: segment, text, target };
    },
    (segment) => {
        const match = /^(?:press|hit)\s+(.+)$/i.exec(segment);
        const keys = match?.[1]?.split(/\s*\+\s*/).map((key) => key.trim().toLowerCase()).filter((key) => key.length > 0) ?? [];
        return keys.length === 0 ? undefined : { intent: "key_combo", description: segment, keys };
    },
    (segment) => {
        const match = /^scroll(?:\s+(up|down|left|right))?(?:\s+(?:by\s+)?(\d+))?$/i.exec(segment);
        if (match === null) {
            return undefined;
        }
        const [, rawDirection, rawAmount] = match;
        const amount = rawAmount === undefined ? DEFAULT_SCROLL_AMOUNT : Number.parseInt(rawAmount, 10);
        if (amount < 1) {
            return undefined;
        }
        const direction = SCROLL_DIRECTIONS.find((candidate) => candidate === rawDirection?.toLowerCase()) ?? "down";
        return { intent: "scroll", description: segment, direction, amount };
    },
    (segment) => {
        const match = new RegExp(String.raw`^drag\s+${ARTICLE}(.+?)\s+(?:to|onto|into)\s+${ARTICLE}(.+)$`, "i").exec(segment);
        const target = match?.[1];
        const destination = match?.[2];
        if (target === undefined || destination === undefined) {
            return undefined;
        }
        return { intent: "drag", description: segment, target, destination };
    },
    (segment) => /^(?:analy[sz]e|describe|what|find|look|read)\b/i.test(segment)
        ? { intent: "analyze", description: segment, question: segment }
        : undefined,
];

/**
 * Parses one instruction such as `click the OK button` or `press cmd+c`.
 */
export function parseStep(segment: string): PlanStep | undefined {
    const trimmed = segment.trim();
    if (trimmed.length === 0) {
        return undefined;
    }
    for (const parser of parsers) {
        const step = parser(trimmed);
        if (step !== undefined) {
            return step;
        }
    }
    return undefined;
}

/**
 * Splits a command on `;` and `then` and parses every part. A command with
 * any part that cannot be understood yields an empty plan.
 *
 * @example
 * ```typescript
 * parseCommand("open Notes then type hello");
 * // [
 * //   { intent: "open_app", description: "open Notes", app: "Notes" },
 * //   { intent: "type", description: "type hello", text: "hello" },
 * // ]
 * ```
 */
export function parseCommand(command: string): PlanStep[] {
    const segments = command
        .split(/\s*;\s*|,?\s+(?:and\s+)?then\s+/i)
        .map((segment) => segment.trim())
        .filter((segment) => segment.length > 0);
    const plan: PlanStep[] = [];
    for (const segment of segments) {
        const step = parseStep(segment);
        if (step === undefined) {
            return [];
        }
        plan.push(step);
    }
    return plan;
}

/**
 * Steps that act without looking at the screen first.
 */
export function isScreenless(step: PlanStep): boolean {
    return step.intent === "open_app" || step.intent === "close_app" || step.intent === "key_combo";
}

/**
 * Labels the vision service has to locate before the step can act.
 */
export function targetsOf(step: PlanStep): string[] {
    switch (step.intent) {
        case "click":
            return [step.target];
        case "drag":
            return [step.target, step.destination];
        case "type":
            return step.target === undefined ? [] : [step.target];
        default:
            return [];
    }
}
