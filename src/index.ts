export * from "./graphs";
export * from "./nodes";
export * from "./errors";
export {
    EngineSettingsSchema,
    loadSettings,
    LOG_LEVELS,
    NodeSettingsSchema,
    type EngineSettings,
    type EngineSettingsInput,
    type LoadSettingsOptions,
    type LogLevel,
    type NodeSettings,
} from "./config/settings";
export { createLogger, type Logger, type LoggerOptions } from "./util/logger";
export { mergeState } from "./util/merge-state";
export * from "./agent";
