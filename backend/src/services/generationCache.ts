import { createHash } from "node:crypto";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import type { RedisClient } from "../utils/redis";
import { resolvedTrackSchema } from "./profileCache";
import { TRACK_SOURCES } from "./recommenderTypes";

const log = createLogger("generation-cache");

const scoreBreakdownSchema = z.object({
    popularity: z.number(),
    seedOverlap: z.number(),
    focusArtist: z.number(),
    keywordMatch: z.number(),
    yearAlignment: z.number(),
    energyBias: z.number(),
    cacheTrackHit: z.number(),
    cacheGenreAlignment: z.number(),
    novelty: z.number(),
    total: z.number(),
});

const scoredTrackSchema = resolvedTrackSchema.extend({
    score: z.number(),
    scoreBreakdown: scoreBreakdownSchema,
    seedArtistOverlap: z.boolean(),
    focusArtistOverlap: z.boolean(),
});

const genreShareSchema = z.object({ genre: z.string(), percentage: z.number() });

const trackHighlightSchema = z.object({
    id: z.string(),
    name: z.string(),
    artists: z.string(),
    popularity: z.number(),
    albumImageUrl: z.string(),
});

export const playlistStatisticsSchema = z.object({
    totalTracks: z.number().int().nonnegative(),
    totalDuration: z.string(),
    totalDurationMs: z.number().nonnegative(),
    avgPopularity: z.number().nullable(),
    novelty: z.number(),
    genreDistribution: z.record(z.number()),
    genreTop: z.array(genreShareSchema),
    genreRemaining: z.array(genreShareSchema),
    noveltyReferenceIds: z.array(z.string()),
    sourceMix: z.array(
        z.object({
            key: z.enum(TRACK_SOURCES),
            label: z.string(),
            count: z.number().int(),
            percentage: z.number(),
        })
    ),
    sourceTotal: z.number().int(),
    topPopularTracks: z.array(trackHighlightSchema),
    leastPopularTracks: z.array(trackHighlightSchema),
});

export const generationPayloadSchema = z.object({
    playlist: z.array(z.string()),
    trackIds: z.array(z.string()),
    trackDetails: z.array(resolvedTrackSchema),
    attributes: z.object({
        mood: z.string(),
        genre: z.string(),
        energy: z.string(),
        artist: z.string().default(""),
        artists: z.array(z.string()).default([]),
    }),
    llmSuggestions: z.array(z.object({ title: z.string(), artist: z.string() })),
    resolvedSeedTracks: z.array(resolvedTrackSchema),
    seedTrackDisplay: z.array(z.string()),
    similarTracksDisplay: z.array(z.string()),
    similarTracks: z.array(scoredTrackSchema),
    seedSources: z.record(z.number()),
    promptArtistIds: z.array(z.string()),
    promptArtistCandidates: z.array(z.string()),
    debugSteps: z.array(z.string()),
    errors: z.array(z.string()),
    prompt: z.string(),
    suggestedPlaylistName: z.string(),
    playlistStats: playlistStatisticsSchema,
    llmUsage: z.object({
        promptTokens: z.number(),
        completionTokens: z.number(),
        totalTokens: z.number(),
    }),
    cacheKey: z.string(),
    ownerUserId: z.string(),
    ownerSessionKey: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

export type GenerationPayload = z.infer<typeof generationPayloadSchema>;

export interface RequesterIdentity {
    userId: string;
    sessionKey: string;
}

export function buildCacheKey(userIdentifier: string, prompt: string): string {
    const digest = createHash("sha256").update(prompt, "utf8").digest("hex");
    return `recommender:${userIdentifier}:${digest}`;
}

/**
 * A payload belongs to a requester only when both its user id and its session
 * key match. Payloads missing either owner field belong to nobody.
 */
export function isOwner(
    payload: Pick<GenerationPayload, "ownerUserId" | "ownerSessionKey">,
    requester: RequesterIdentity
): boolean {
    if (!payload.ownerUserId || !payload.ownerSessionKey) {
        return false;
    }
    return (
        payload.ownerUserId === requester.userId &&
        payload.ownerSessionKey === requester.sessionKey
    );
}

/**
 * The key a follow-up request may act on: the session's last generated key.
 * A provided key that disagrees with the session's yields "".
 */
export function resolveCacheKey(sessionCacheKey: string | undefined, providedKey: string | undefined): string {
    const provided = (providedKey ?? "").trim();
    const remembered = (sessionCacheKey ?? "").trim();
    if (!remembered) {
        return provided;
    }
    if (provided && provided !== remembered) {
        log.warn(`Cache key mismatch (provided=${provided}, session=${remembered}).`);
        return "";
    }
    return remembered;
}

export interface CacheStore {
    get(key: string): Promise<unknown>;
    set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

/** Validated read; malformed entries count as misses. */
export async function readPayload(
    store: CacheStore,
    key: string
): Promise<GenerationPayload | null> {
    if (!key) {
        return null;
    }
    const raw = await store.get(key);
    if (raw === null || raw === undefined) {
        return null;
    }
    const parsed = generationPayloadSchema.safeParse(raw);
    if (!parsed.success) {
        log.warn(`Discarding malformed cache entry ${key}`);
        return null;
    }
    return parsed.data;
}

export class RedisCacheStore implements CacheStore {
    constructor(private readonly redis: RedisClient) {}

    async get(key: string): Promise<unknown> {
        const raw = await this.redis.get(key);
        if (!raw) {
            return null;
        }
        try {
            return JSON.parse(raw);
        } catch (error) {
            log.warn(`Unreadable cache entry ${key}:`, error);
            return null;
        }
    }

    async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        await this.redis.setEx(key, Math.max(1, Math.trunc(ttlSeconds)), JSON.stringify(value));
    }
}
