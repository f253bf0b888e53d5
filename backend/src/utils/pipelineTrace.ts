import { createLogger, Logger } from "./logger";

/**
 * Per-run debug trace for playlist generation.
 *
 * Each message is stamped with the seconds elapsed since the trace started and
 * mirrored to the scoped logger. Messages that mention a failure are also kept
 * as user-facing warnings, whether or not step capture is enabled.
 */

const WARNING_KEYWORDS = ["error", "failed", "missing", "unavailable"] as const;

export type TraceLog = (message: string) => void;

export interface PipelineTraceOptions {
    /** Mirrors every step at debug level; usually a run-scoped child logger. */
    logger?: Logger;
    captureSteps?: boolean;
    now?: () => number;
}

export function isWarningMessage(message: string): boolean {
    const lowered = message.toLowerCase();
    return WARNING_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export class PipelineTrace {
    readonly steps: string[] = [];
    readonly warnings: string[] = [];

    private readonly startedAt: number;
    private readonly now: () => number;
    private readonly captureSteps: boolean;
    private readonly traceLogger: Logger;

    constructor(options: PipelineTraceOptions = {}) {
        this.now = options.now ?? Date.now;
        this.startedAt = this.now();
        this.captureSteps = options.captureSteps ?? true;
        this.traceLogger = options.logger ?? createLogger("recommender");
    }

    /** Bound logging callback handed to pipeline stages. */
    readonly log: TraceLog = (message: string): void => {
        const elapsedSeconds = (this.now() - this.startedAt) / 1000;
        const formatted = `[${elapsedSeconds.toFixed(2)}s] ${message}`;

        if (this.captureSteps) {
            this.steps.push(formatted);
        }
        if (isWarningMessage(message)) {
            this.warnings.push(message);
        }
        this.traceLogger.debug(formatted);
    };
}

/** Trace sink for callers that do not need the output. */
export const noopTrace: TraceLog = () => undefined;
