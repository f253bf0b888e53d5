import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError } from "../utils/errors";
import { config } from "../config";
import { appErrorStatus } from "../routes/routeErrorResponse";

// express.json() rejects unparsable bodies with a SyntaxError carrying status 400
function isMalformedBody(err: Error): boolean {
    return err instanceof SyntaxError && "status" in err && err.status === 400;
}

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) {
    if (res.headersSent) {
        return next(err);
    }

    if (isMalformedBody(err)) {
        return res.status(400).json({ error: "Malformed JSON body" });
    }

    if (err instanceof AppError) {
        logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);

        return res.status(appErrorStatus(err)).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
    }

    logger.error("Unhandled error:", err.stack);

    // Stack traces stay server-side in production
    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
