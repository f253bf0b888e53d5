/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can retry with different input
    TRANSIENT = "TRANSIENT", // Upstream issue, retry later
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Request preconditions
    PROMPT_REQUIRED = "PROMPT_REQUIRED",
    NOT_AUTHENTICATED = "NOT_AUTHENTICATED",

    // Cached playlist access
    PLAYLIST_NOT_FOUND = "PLAYLIST_NOT_FOUND",
    PLAYLIST_OWNERSHIP_MISMATCH = "PLAYLIST_OWNERSHIP_MISMATCH",
    TRACK_NOT_FOUND = "TRACK_NOT_FOUND",

    // Publishing
    INVALID_PLAYLIST_NAME = "INVALID_PLAYLIST_NAME",
    EMPTY_PLAYLIST = "EMPTY_PLAYLIST",
    CATALOG_USER_UNRESOLVED = "CATALOG_USER_UNRESOLVED",

    // Upstream
    CATALOG_REQUEST_FAILED = "CATALOG_REQUEST_FAILED",

    // Configuration
    INVALID_CONFIG = "INVALID_CONFIG",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * Best-effort human readable message for logging and trace output.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
