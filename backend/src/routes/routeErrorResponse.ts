import type { Response } from "express";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { LOGIN_REDIRECT } from "../middleware/auth";

export type RouteErrorExtras = Record<string, unknown>;

export const PROMPT_REDIRECT = "/dashboard";

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

export const sendInternalRouteError = (
    res: Response,
    message: string,
    extras?: RouteErrorExtras
): Response => sendRouteError(res, 500, message, extras);

const NOT_FOUND_CODES: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.PLAYLIST_NOT_FOUND,
    ErrorCode.PLAYLIST_OWNERSHIP_MISMATCH,
    ErrorCode.TRACK_NOT_FOUND,
]);

/** HTTP status for an AppError: preconditions first, then lookups, then category. */
export function appErrorStatus(error: AppError): number {
    switch (error.code) {
        case ErrorCode.PROMPT_REQUIRED:
            return 400;
        case ErrorCode.NOT_AUTHENTICATED:
            return 401;
        default:
            break;
    }
    if (NOT_FOUND_CODES.has(error.code)) {
        return 404;
    }
    switch (error.category) {
        case ErrorCategory.TRANSIENT:
            return 503;
        case ErrorCategory.FATAL:
            return 500;
        default:
            return 400;
    }
}

/**
 * Map an AppError to its HTTP response. Returns null for anything else so the
 * caller can fall back to a 500.
 */
export const sendAppError = (res: Response, error: unknown): Response | null => {
    if (!(error instanceof AppError)) {
        return null;
    }
    const status = appErrorStatus(error);
    switch (error.code) {
        case ErrorCode.PROMPT_REQUIRED:
            return sendRouteError(res, status, error.message, { redirect: PROMPT_REDIRECT });
        case ErrorCode.NOT_AUTHENTICATED:
            return sendRouteError(res, status, error.message, { redirect: LOGIN_REDIRECT });
        default:
            return sendRouteError(res, status, error.message, { code: error.code });
    }
};
