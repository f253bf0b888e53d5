import express from "express";
import session from "express-session";
import RedisStore from "connect-redis";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import { createServer } from "http";
import type { Socket } from "net";
import swaggerUi from "swagger-ui-express";
import { config } from "./config";
import { connectRedis, redisClient } from "./utils/redis";
import { logger } from "./utils/logger";
import recommenderRoutes from "./routes/recommender";
import explorerRoutes from "./routes/explorer";
import { errorHandler } from "./middleware/errorHandler";
import { apiLimiter } from "./middleware/rateLimiter";
import { swaggerSpec } from "./config/swagger";
import { BRAND_API_DOCS_TITLE, BRAND_NAME } from "./config/brand";

const app = express();
const HTTP_SERVER_CLOSE_TIMEOUT_MS = 12_000;
let isStartupComplete = false;

// Middleware
app.use(
    helmet({
        crossOriginResourcePolicy: { policy: "cross-origin" },
    })
);
app.use(
    cors({
        origin: (origin, callback) => {
            if (!origin || config.allowedOrigins === true) {
                // Same-origin, curl, or development
                callback(null, true);
            } else if (config.allowedOrigins.includes(origin)) {
                callback(null, true);
            } else {
                logger.debug(`[CORS] Origin ${origin} not in allowlist`);
                callback(null, false);
            }
        },
        credentials: true,
    })
);
app.use(compression({ threshold: 1024 }));
app.use(express.json({ limit: "1mb" }));

// Session
// Trust proxy for reverse proxy setups (nginx, traefik, etc.)
app.set("trust proxy", true);

app.use(
    session({
        store: new RedisStore({
            client: redisClient,
            prefix: "session:",
            ttl: 7 * 24 * 60 * 60, // 7 days in seconds - must match cookie maxAge
        }),
        secret: config.sessionSecret,
        resave: false,
        saveUninitialized: false,
        proxy: true,
        cookie: {
            httpOnly: true,
            // Set SECURE_COOKIES=true if running behind HTTPS reverse proxy
            secure: config.secureCookies,
            sameSite: "lax",
            maxAge: 1000 * 60 * 60 * 24 * 7, // 7 days
        },
    })
);

// Routes - All API routes prefixed with /api
app.use("/api/recommender", apiLimiter, recommenderRoutes);
app.use("/api/explorer", apiLimiter, explorerRoutes);

function buildHealthPayload() {
    return {
        status: "ok",
        startupComplete: isStartupComplete,
        redis: redisClient.isReady,
    };
}

async function isReadyForTraffic(): Promise<boolean> {
    if (!isStartupComplete || !redisClient.isReady) {
        return false;
    }
    try {
        await redisClient.ping();
        return true;
    } catch (error) {
        logger.error("[Startup] readiness check failed:", error);
        return false;
    }
}

app.get(["/health", "/api/health"], async (req, res) => {
    if (!(await isReadyForTraffic())) {
        return res.status(503).json(buildHealthPayload());
    }
    return res.json(buildHealthPayload());
});

// Swagger API Documentation
// The raw JSON spec is hidden in production unless DOCS_PUBLIC=true.
app.use(
    "/api/docs",
    swaggerUi.serve,
    swaggerUi.setup(swaggerSpec, {
        customCss: ".swagger-ui .topbar { display: none }",
        customSiteTitle: BRAND_API_DOCS_TITLE,
    })
);

app.get("/api/docs.json", (req, res) => {
    if (config.nodeEnv === "production" && !config.docsPublic) {
        return res.status(404).json({ error: "Not found" });
    }
    return res.json(swaggerSpec);
});

// Error handler
app.use(errorHandler);

async function checkRedisConnection() {
    const MAX_RETRIES = 10;
    const BASE_DELAY_MS = 1_000;
    const MAX_DELAY_MS = 15_000;

    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
        try {
            if (!redisClient.isReady) {
                throw new Error(
                    "Redis client is not ready - connection failed or still connecting"
                );
            }
            await redisClient.ping();
            logger.debug("✓ Redis connection verified");
            return;
        } catch (error) {
            const errorMsg = error instanceof Error ? error.message : String(error);

            if (attempt < MAX_RETRIES) {
                const delay = Math.min(BASE_DELAY_MS * Math.pow(2, attempt - 1), MAX_DELAY_MS);
                logger.warn(
                    `Redis connection attempt ${attempt}/${MAX_RETRIES} failed: ${errorMsg} – retrying in ${delay}ms`,
                );
                await new Promise((resolve) => setTimeout(resolve, delay));
            } else {
                logger.error("✗ Redis connection failed after all retries:", {
                    error: errorMsg,
                    redisUrl: config.redisUrl.replace(/:[^:@]+@/, ":***@"),
                });
                logger.error("Unable to connect to Redis. Please ensure REDIS_URL in .env is correct");
                process.exit(1);
            }
        }
    }
}

const httpServer = createServer(app);
const activeHttpConnections = new Set<Socket>();

httpServer.on("connection", (socket) => {
    activeHttpConnections.add(socket);
    socket.on("close", () => {
        activeHttpConnections.delete(socket);
    });
});

httpServer.listen(config.port, "0.0.0.0", async () => {
    await connectRedis();
    await checkRedisConnection();

    isStartupComplete = true;
    logger.info(`${BRAND_NAME} API running on port ${config.port}`);
});

let isShuttingDown = false;

async function closeHttpServerWithTimeout(timeoutMs: number): Promise<void> {
    await new Promise<void>((resolve) => {
        let settled = false;
        const finish = () => {
            if (settled) return;
            settled = true;
            clearTimeout(timeoutId);
            resolve();
        };

        const timeoutId = setTimeout(() => {
            if (activeHttpConnections.size > 0) {
                logger.warn(
                    `[Shutdown] HTTP server close timed out after ${timeoutMs}ms; forcing ${activeHttpConnections.size} active connection(s) closed`
                );
            }
            for (const socket of activeHttpConnections) {
                socket.destroy();
            }
            httpServer.closeAllConnections();
            finish();
        }, timeoutMs);
        timeoutId.unref();

        httpServer.close(() => {
            finish();
        });
        httpServer.closeIdleConnections();
    });
}

async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.debug(`Received ${signal}. Starting graceful shutdown...`);

    try {
        logger.debug("Closing HTTP server...");
        await closeHttpServerWithTimeout(HTTP_SERVER_CLOSE_TIMEOUT_MS);

        logger.debug("Closing Redis connection...");
        if (redisClient.isOpen) {
            await redisClient.quit();
        }

        logger.debug("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception - initiating graceful shutdown:", {
        message: error.message,
        stack: error.stack,
    });
    gracefulShutdown("uncaughtException").catch(() => {
        process.exit(1);
    });
});
