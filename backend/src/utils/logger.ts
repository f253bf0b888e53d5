export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

type EmitLevel = Exclude<LogLevel, "silent">;

export interface Logger {
    readonly scope: string | null;
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    /** Nested scope (`parent.child`); `context` is merged over the parent's. */
    child: (scope: string, context?: LogContext) => Logger;
    /** Same scope, with extra fields attached to every line. */
    withContext: (context: LogContext) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LOG_LEVELS, value);
}

function resolveLogLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return process.env.NODE_ENV === "production" ? "warn" : "debug";
    }
    // Unknown levels silence output rather than guessing
    return isLogLevel(configured) ? configured : "silent";
}

const currentLevel = resolveLogLevel();
const includeTimestamps = process.env.LOG_TIMESTAMPS === "true";

const CONSOLE_METHODS: Record<EmitLevel, (...data: unknown[]) => void> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.info(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

function isLogContext(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(value: unknown): unknown {
    if (!(value instanceof Error)) {
        return value;
    }
    return { name: value.name, message: value.message, stack: value.stack };
}

function normalizeContext(context: LogContext): LogContext {
    return Object.fromEntries(
        Object.entries(context).map(([key, value]) => [key, normalizeError(value)])
    );
}

/**
 * Bound fields come first so per-call fields win; the merged object is only
 * passed on when there is something in it.
 */
function consoleArgs(bound: LogContext, args: unknown[]): unknown[] {
    const [first, ...rest] = args;
    const hasCallContext = args.length > 0 && isLogContext(first);
    const merged = hasCallContext ? { ...bound, ...first } : bound;
    const passthrough = (hasCallContext ? rest : args).map(normalizeError);

    if (Object.keys(merged).length === 0) {
        return passthrough;
    }
    return [normalizeContext(merged), ...passthrough];
}

function linePrefix(level: EmitLevel, scope: string | null, message: string): string {
    const stamp = includeTimestamps ? `${new Date().toISOString()} ` : "";
    const scoped = scope ? ` [${scope}]` : "";
    return `${stamp}[${level.toUpperCase()}]${scoped} ${message}`;
}

function joinScope(parent: string | null, child: string): string | null {
    const trimmed = child.trim();
    if (!trimmed) {
        return parent;
    }
    return parent ? `${parent}.${trimmed}` : trimmed;
}

function buildLogger(scope: string | null, bound: LogContext): Logger {
    const write =
        (level: EmitLevel) =>
        (message: string, ...args: unknown[]): void => {
            if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
                return;
            }
            CONSOLE_METHODS[level](linePrefix(level, scope, message), ...consoleArgs(bound, args));
        };

    return {
        scope,
        debug: write("debug"),
        info: write("info"),
        warn: write("warn"),
        error: write("error"),
        child: (childScope, context = {}) =>
            buildLogger(joinScope(scope, childScope), { ...bound, ...context }),
        withContext: (context) => buildLogger(scope, { ...bound, ...context }),
    };
}

export function createLogger(scope?: string, context: LogContext = {}): Logger {
    return buildLogger(scope?.trim() || null, { ...context });
}

/**
 * Runs `run` and reports started/completed/failed at debug (or error) level
 * with the elapsed time in `durationMs`.
 */
export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {},
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.error(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export const logger = createLogger();
