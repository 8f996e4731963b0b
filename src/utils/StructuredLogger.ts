export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    child(component: string): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const requested = (env.SURFACE_MCP_LOG_LEVEL ?? "").trim().toLowerCase();
    if (isLogLevel(requested)) {
        return requested;
    }
    return env.SURFACE_MCP_DEBUG === "true" ? "debug" : "info";
}

/**
 * Structured, level-filtered logging. Every record goes to stderr; stdout
 * belongs to the MCP transport.
 */
export function createLogger(component: string, level: LogLevel = resolveLogLevel()): Logger {
    const log = (recordLevel: LogLevel, message: string, fields?: LogFields) => {
        if (LEVEL_PRIORITY[recordLevel] < LEVEL_PRIORITY[level]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level: recordLevel,
            component,
            message,
            ...(fields ?? {})
        };
        process.stderr.write(`${safeStringify(payload)}\n`);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields),
        child: name => createLogger(`${component}.${name}`, level)
    };
}

function safeStringify(payload: LogFields): string {
    try {
        return JSON.stringify(payload, (_key, value: unknown) =>
            value instanceof Error ? { name: value.name, message: value.message } : value);
    } catch {
        return JSON.stringify({ level: payload.level, component: payload.component, message: payload.message });
    }
}
