import { Request, Response, NextFunction } from "express";
import type { RequesterIdentity } from "../services/generationCache";

export const ANONYMOUS_USER = "anonymous";
export const LOGIN_REDIRECT = "/auth/login";

declare module "express-session" {
    interface SessionData {
        /** Bearer token for the catalog API, written by the OAuth flow */
        catalogAccessToken?: string;
        catalogUserId?: string;
        /** Key of the playlist most recently generated in this session */
        lastPlaylistCacheKey?: string;
    }
}

declare global {
    namespace Express {
        interface Request {
            user?: {
                id: string;
                username: string;
            };
        }
    }
}

/**
 * User identifier for cache keys and history: account id, then the catalog
 * user id remembered in the session, then "anonymous".
 */
export function resolveRequestUserId(req: Request): string {
    return req.user?.id || req.session?.catalogUserId || ANONYMOUS_USER;
}

export function requesterIdentity(req: Request): RequesterIdentity {
    return {
        userId: resolveRequestUserId(req),
        sessionKey: req.sessionID ?? "",
    };
}

export function catalogAccessToken(req: Request): string | undefined {
    return req.session?.catalogAccessToken || undefined;
}

// For routes that call the catalog directly rather than through the generator
export function requireCatalogAuth(
    req: Request,
    res: Response,
    next: NextFunction
) {
    if (catalogAccessToken(req)) {
        return next();
    }
    return res
        .status(401)
        .json({ error: "Not authenticated", redirect: LOGIN_REDIRECT });
}
