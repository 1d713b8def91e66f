type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = "info" | "warn" | "error" | "debug";

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    // Everything goes to stderr; stdout belongs to whatever embeds the library.
    const logger = level === "warn" ? console.warn : console.error;
    if (context && Object.keys(context).length > 0) {
        logger(message, context);
        return;
    }
    logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);

/** Prefix every message with `[component]`, matching the extractor log lines. */
export function scopedLogger(component: string): Record<LogLevel, LoggerFn> {
    const tag = `[${component}]`;
    return {
        info: (message, context) => logInfo(`${tag} ${message}`, context),
        warn: (message, context) => logWarning(`${tag} ${message}`, context),
        error: (message, context) => logError(`${tag} ${message}`, context),
        debug: (message, context) => logDebug(`${tag} ${message}`, context),
    };
}
