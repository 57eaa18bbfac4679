export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

let activeLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
    activeLevel = level;
}

export type Logger = {
    debug: (message: string, meta?: Record<string, unknown>) => void;
    info: (message: string, meta?: Record<string, unknown>) => void;
    warn: (message: string, meta?: Record<string, unknown>) => void;
    error: (message: string, meta?: Record<string, unknown>) => void;
};

// stdout carries the MCP stdio transport, so every line goes to stderr.
export function createLogger(scope: string): Logger {
    const write =
        (level: Exclude<LogLevel, "silent">) =>
        (message: string, meta?: Record<string, unknown>): void => {
            if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) {
                return;
            }
            const line = `[${scope}] ${level.toUpperCase()} ${message}`;
            if (meta && Object.keys(meta).length) {
                console.error(line, JSON.stringify(meta));
            } else {
                console.error(line);
            }
        };

    return {
        debug: write("debug"),
        info: write("info"),
        warn: write("warn"),
        error: write("error")
    };
}
