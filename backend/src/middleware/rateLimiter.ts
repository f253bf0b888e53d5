import rateLimit from "express-rate-limit";

// Runs behind a reverse proxy with app.set("trust proxy", true)
const trustProxyValidation = { validate: { trustProxy: false } };

const HEALTH_PATHS: ReadonlySet<string> = new Set(["/health", "/api/health"]);

export function isHealthCheckPath(path: string): boolean {
    return HEALTH_PATHS.has(path);
}

// General API rate limiter (1000 req/minute per IP)
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: 1000,
    message: "Too many requests from this IP, please try again later.",
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    skip: (req) => isHealthCheckPath(req.path),
    ...trustProxyValidation,
});

// Generation limiter (20 req/minute)
// Each generate/remix fans out into several LLM and catalog calls
export const generationLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: 20,
    message: "Too many playlist generation requests. Please slow down.",
    standardHeaders: true,
    legacyHeaders: false,
    ...trustProxyValidation,
});
