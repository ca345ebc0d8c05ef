import winston from "winston";
import { type LogLevel } from "../config/settings";

export type Logger = winston.Logger;

export interface LoggerOptions {
    level?: LogLevel;
    silent?: boolean;
}

const format = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.printf((info) => {
        const scope = [info.sessionId, info.node].filter((part) => part !== undefined).join("/");
        return scope.length > 0
            ? `${info.timestamp} ${info.level} [${scope}]: ${info.message}`
            : `${info.timestamp} ${info.level}: ${info.message}`;
    }),
);

/**
 * Creates the engine logger. Executors hand each node a child of it carrying
 * `sessionId` and `node` metadata.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    return winston.createLogger({
        level: options.level ?? "info",
        silent: options.silent ?? false,
        format,
        transports: [new winston.transports.Console()],
    });
}
