import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvFloat,
    parseEnvInt,
    parseEnvIntMap,
} from "./utils/envParsers";
import { createRecommenderSettings } from "./services/recommenderSettings";

dotenv.config();

// Validate critical environment variables on startup
const envSchema = z.object({
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),
    SESSION_SECRET: z
        .string()
        .min(32, "SESSION_SECRET must be at least 32 characters"),
    PORT: z.string().optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
    logger.error(" Environment validation failed:");
    parsedEnv.error.errors.forEach((err) => {
        logger.error(`   - ${err.path.join(".")}: ${err.message}`);
    });
    logger.error(
        "\n Please check your .env file and ensure all required variables are set."
    );
    process.exit(1);
}

const env = parsedEnv.data;
logger.debug("Environment variables validated");

const allowedOriginsFromEnv = parseEnvCsv(process.env.ALLOWED_ORIGINS);
const allowedOrigins: true | string[] =
    allowedOriginsFromEnv ||
    (env.NODE_ENV === "development" ? true : []);

/** Centralized runtime configuration object for the backend. */
export const config = {
    port: parseEnvInt(env.PORT, 3007),
    nodeEnv: env.NODE_ENV ?? "development",
    redisUrl: env.REDIS_URL,
    sessionSecret: env.SESSION_SECRET,
    secureCookies: isEnvFlagEnabled(process.env.SECURE_COOKIES),
    docsPublic: isEnvFlagEnabled(process.env.DOCS_PUBLIC),

    // Without a key the LLM layer answers "" and every stage uses its fallback
    openai: {
        apiKey: process.env.OPENAI_API_KEY || "",
        baseUrl: process.env.OPENAI_API_BASE || "https://api.openai.com/v1",
        model: process.env.RECOMMENDER_OPENAI_MODEL || "gpt-4o-mini",
        temperature: parseEnvFloat(process.env.RECOMMENDER_OPENAI_TEMPERATURE, 0.7),
        maxTokens: parseEnvInt(process.env.RECOMMENDER_OPENAI_MAX_TOKENS, 512),
        timeoutMs: parseEnvInt(process.env.OPENAI_TIMEOUT_MS, 60000),
    },

    catalog: {
        apiBaseUrl: process.env.CATALOG_API_BASE || "https://api.spotify.com/v1",
        timeoutMs: parseEnvInt(process.env.CATALOG_TIMEOUT_MS, 15000),
    },

    recommender: createRecommenderSettings({
        market: process.env.RECOMMENDER_MARKET || "US",
        seedLimit: parseEnvInt(process.env.RECOMMENDER_SEED_LIMIT, 5),
        similarLimit: parseEnvInt(process.env.RECOMMENDER_SIMILAR_LIMIT, 10),
        cacheTtlSeconds: parseEnvInt(process.env.RECOMMENDER_CACHE_TIMEOUT_SECONDS, 15 * 60),
        popularityThreshold: parseEnvInt(process.env.RECOMMENDER_POPULARITY_THRESHOLD, 45),
        genrePopularityOverrides: parseEnvIntMap(
            process.env.RECOMMENDER_GENRE_POPULARITY_OVERRIDES
        ),
        requireLatin: isEnvFlagEnabled(process.env.RECOMMENDER_REQUIRE_LATIN),
        latinThreshold: parseEnvFloat(process.env.RECOMMENDER_LATIN_THRESHOLD, 0.4),
        playlistNamePrefix: process.env.RECOMMENDER_PLAYLIST_PREFIX || "",
        playlistPublic: isEnvFlagEnabled(process.env.RECOMMENDER_PLAYLIST_PUBLIC),
        catalogConcurrency: parseEnvInt(process.env.RECOMMENDER_CATALOG_CONCURRENCY, 2),
        artistMinFollowers: parseEnvInt(process.env.RECOMMENDER_ARTIST_MIN_FOLLOWERS, 1000),
        artistMinPopularity: parseEnvInt(process.env.RECOMMENDER_ARTIST_MIN_POPULARITY, 15),
    }),

    allowedOrigins,
};

export type AppConfig = typeof config;
