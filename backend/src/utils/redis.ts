import { createClient } from "redis";
import { logger } from "./logger";
import { config } from "../config";

const MAX_RETRY_DELAY_MS = 30_000;
const BASE_RETRY_DELAY_MS = 250;

const redisLogger = logger.child("redis");

/**
 * Shared node-redis client: sessions, generation cache, profile snapshots and
 * generation history all live here.
 */
const redisClient = createClient({
    url: config.redisUrl,
    socket: {
        reconnectStrategy: (retries: number) => {
            // 250ms, 500ms, 1s, 2s, ... capped at 30s
            const delay = Math.min(
                BASE_RETRY_DELAY_MS * Math.pow(2, retries),
                MAX_RETRY_DELAY_MS,
            );
            redisLogger.debug(
                `Reconnect attempt ${retries + 1}, retrying in ${delay}ms`,
            );
            return delay;
        },
        connectTimeout: 10_000,
    },
});

redisClient.on("error", (err: Error) => {
    redisLogger.error("Redis error:", err.message);
});

redisClient.on("reconnecting", () => {
    redisLogger.debug("Redis reconnecting...");
});

redisClient.on("ready", () => {
    redisLogger.debug("Redis ready");
});

export type RedisClient = typeof redisClient;

/** Connect once at startup; failures keep retrying in the background. */
export async function connectRedis(): Promise<void> {
    if (redisClient.isOpen) {
        return;
    }
    try {
        await redisClient.connect();
    } catch (error) {
        redisLogger.error("Redis initial connection failed:", error);
        redisLogger.debug("Redis will continue retrying in the background...");
    }
}

export { redisClient };
