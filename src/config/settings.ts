import * as dotenv from "dotenv";
import { z } from "zod";
import { FatalConfigurationError } from "../errors";
import { deepFreeze } from "../util/deep-freeze";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Per-node overrides. Anything left out falls back to the options given to
 * `addNode`, then to the engine-wide defaults.
 */
export const NodeSettingsSchema = z.object({
    maxRetries: z.number().int().nonnegative().optional(),
    timeoutMs: z.number().int().positive().optional(),
    recoveryNode: z.string().min(1).optional(),
});
export type NodeSettings = z.infer<typeof NodeSettingsSchema>;

export const EngineSettingsSchema = z.object({
    /** Maximum node invocations per session, across resumes. */
    stepBudget: z.number().int().positive().default(50),
    defaultMaxRetries: z.number().int().nonnegative().default(3),
    defaultTimeoutMs: z.number().int().positive().default(30_000),
    nodes: z.record(z.string(), NodeSettingsSchema).default({}),
    checkpoint: z.object({
        /** When true a checkpoint that cannot be written ends the session. */
        requireDurable: z.boolean().default(true),
        writeRetries: z.number().int().nonnegative().default(2),
    }).prefault({}),
    stream: z.object({
        bufferSize: z.number().int().positive().default(256),
    }).prefault({}),
    logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;

const EnvSchema = z.object({
    PF_STEP_BUDGET: z.coerce.number().int().positive().optional(),
    PF_MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
    PF_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    PF_REQUIRE_DURABLE: z.enum(["true", "false"]).transform((value) => value === "true").optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface LoadSettingsOptions {
    /** Defaults to `process.env` after loading `.env`. */
    env?: NodeJS.ProcessEnv;
    dotenvPath?: string;
}

function fromEnv(env: NodeJS.ProcessEnv): EngineSettingsInput {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new FatalConfigurationError(`Invalid environment settings: ${z.prettifyError(parsed.error)}`);
    }
    const vars = parsed.data;
    const settings: EngineSettingsInput = {};
    if (vars.PF_STEP_BUDGET !== undefined) settings.stepBudget = vars.PF_STEP_BUDGET;
    if (vars.PF_MAX_RETRIES !== undefined) settings.defaultMaxRetries = vars.PF_MAX_RETRIES;
    if (vars.PF_TIMEOUT_MS !== undefined) settings.defaultTimeoutMs = vars.PF_TIMEOUT_MS;
    if (vars.PF_REQUIRE_DURABLE !== undefined) settings.checkpoint = { requireDurable: vars.PF_REQUIRE_DURABLE };
    if (vars.LOG_LEVEL !== undefined) settings.logLevel = vars.LOG_LEVEL;
    return settings;
}

/**
 * Builds the read-only engine settings. Environment variables are applied
 * first, explicit overrides win over them.
 *
 * @throws {FatalConfigurationError} If the merged settings do not validate.
 *
 * @example
 * ```typescript
 * const settings = loadSettings({ stepBudget: 20, nodes: { screen_analyzer: { maxRetries: 5 } } });
 * ```
 */
export function loadSettings(overrides: EngineSettingsInput = {}, options: LoadSettingsOptions = {}): EngineSettings {
    let env = options.env;
    if (env === undefined) {
        dotenv.config({ path: options.dotenvPath });
        env = process.env;
    }
    const base = fromEnv(env);
    const merged: EngineSettingsInput = {
        ...base,
        ...overrides,
        nodes: { ...base.nodes, ...overrides.nodes },
        checkpoint: { ...base.checkpoint, ...overrides.checkpoint },
        stream: { ...base.stream, ...overrides.stream },
    };
    const result = EngineSettingsSchema.safeParse(merged);
    if (!result.success) {
        throw new FatalConfigurationError(`Invalid engine settings: ${z.prettifyError(result.error)}`);
    }
    return deepFreeze(result.data);
}
