import { z } from "zod";
import { createLogger } from "../utils/logger";
import type { RedisClient } from "../utils/redis";
import type { LlmUsage } from "./llmClient";
import { PlaylistStatistics } from "./playlistStatistics";

const log = createLogger("generation-stats");

const TOP_GENRE_MAX_LENGTH = 128;
const BREAKDOWN_SIZE = 5;

export const generationStatSchema = z.object({
    userIdentifier: z.string().min(1),
    prompt: z.string(),
    trackCount: z.number().int().nonnegative(),
    totalDurationMs: z.number().nonnegative(),
    topGenre: z.string().max(TOP_GENRE_MAX_LENGTH),
    avgNovelty: z.number().nullable(),
    promptTokens: z.number().int().nonnegative().default(0),
    completionTokens: z.number().int().nonnegative().default(0),
    totalTokens: z.number().int().nonnegative().default(0),
    genreTop: z
        .array(z.object({ genre: z.string(), percentage: z.number() }))
        .default([]),
    createdAt: z.string(),
});

export type GenerationStat = z.infer<typeof generationStatSchema>;

export interface GenerationStatStore {
    record(stat: GenerationStat): Promise<void>;
    /** Newest first. */
    list(userIdentifier: string, limit: number): Promise<GenerationStat[]>;
}

export function generationStatsKey(userIdentifier: string): string {
    return `generation-stats:${userIdentifier}`;
}

export class RedisGenerationStatStore implements GenerationStatStore {
    constructor(
        private readonly redis: RedisClient,
        private readonly historyLimit: number
    ) {}

    async record(stat: GenerationStat): Promise<void> {
        const key = generationStatsKey(stat.userIdentifier);
        await this.redis.lPush(key, JSON.stringify(stat));
        await this.redis.lTrim(key, 0, Math.max(this.historyLimit, 1) - 1);
    }

    async list(userIdentifier: string, limit: number): Promise<GenerationStat[]> {
        if (!userIdentifier || limit <= 0) {
            return [];
        }
        const rows = await this.redis.lRange(generationStatsKey(userIdentifier), 0, limit - 1);
        const stats: GenerationStat[] = [];
        for (const row of rows) {
            try {
                const parsed = generationStatSchema.safeParse(JSON.parse(row));
                if (parsed.success) {
                    stats.push(parsed.data);
                }
            } catch (error) {
                log.warn(`Skipping unreadable generation stat for ${userIdentifier}:`, error);
            }
        }
        return stats;
    }
}

/**
 * Build the history record for one finished generation.
 */
export function buildGenerationStat(input: {
    userIdentifier: string;
    prompt: string;
    statistics: PlaylistStatistics;
    usage: LlmUsage;
    createdAt: Date;
}): GenerationStat {
    const { statistics } = input;
    let topGenre = statistics.genreTop[0]?.genre.trim() ?? "";
    if (!topGenre) {
        topGenre = Object.keys(statistics.genreDistribution)[0] ?? "";
    }
    return {
        userIdentifier: input.userIdentifier,
        prompt: input.prompt,
        trackCount: statistics.totalTracks,
        totalDurationMs: statistics.totalDurationMs,
        topGenre: topGenre.slice(0, TOP_GENRE_MAX_LENGTH),
        avgNovelty: statistics.totalTracks > 0 ? statistics.novelty : null,
        promptTokens: input.usage.promptTokens,
        completionTokens: input.usage.completionTokens,
        totalTokens: input.usage.totalTokens,
        genreTop: statistics.genreTop.map((share) => ({ ...share })),
        createdAt: input.createdAt.toISOString(),
    };
}

export interface GenerationSummary {
    totalPlaylists: number;
    totalTracks: number;
    totalDurationMs: number;
    totalHours: number;
    totalTokens: number;
    avgNovelty: number | null;
    topGenre: string;
    lastGeneratedAt: string | null;
}

export function emptyGenerationSummary(): GenerationSummary {
    return {
        totalPlaylists: 0,
        totalTracks: 0,
        totalDurationMs: 0,
        totalHours: 0,
        totalTokens: 0,
        avgNovelty: null,
        topGenre: "",
        lastGeneratedAt: null,
    };
}

/**
 * Aggregate totals over the retained generation history of one user.
 */
export async function summarizeGenerationStats(
    store: GenerationStatStore,
    userIdentifier: string,
    historyLimit: number
): Promise<GenerationSummary> {
    if (!userIdentifier) {
        return emptyGenerationSummary();
    }
    const history = await store.list(userIdentifier, historyLimit);
    if (history.length === 0) {
        return emptyGenerationSummary();
    }

    let totalTracks = 0;
    let totalDurationMs = 0;
    let totalTokens = 0;
    let noveltySum = 0;
    let noveltyCount = 0;
    let lastGeneratedAt: string | null = null;
    const genreCounts = new Map<string, number>();

    for (const stat of history) {
        totalTracks += stat.trackCount;
        totalDurationMs += stat.totalDurationMs;
        totalTokens += stat.totalTokens;
        if (stat.avgNovelty !== null) {
            noveltySum += stat.avgNovelty;
            noveltyCount += 1;
        }
        if (stat.topGenre) {
            genreCounts.set(stat.topGenre, (genreCounts.get(stat.topGenre) ?? 0) + 1);
        }
        if (!lastGeneratedAt || stat.createdAt > lastGeneratedAt) {
            lastGeneratedAt = stat.createdAt;
        }
    }

    const [topGenre] = [...genreCounts.entries()].sort(
        (a, b) => b[1] - a[1] || a[0].localeCompare(b[0])
    );

    return {
        totalPlaylists: history.length,
        totalTracks,
        totalDurationMs,
        totalHours: totalDurationMs ? Math.round((totalDurationMs / 3_600_000) * 100) / 100 : 0,
        totalTokens,
        avgNovelty: noveltyCount > 0 ? Math.round((noveltySum / noveltyCount) * 10) / 10 : null,
        topGenre: topGenre ? topGenre[0] : "",
        lastGeneratedAt,
    };
}

export interface GenreBreakdownEntry {
    genre: string;
    percentage: number;
}

/**
 * Most common genres across the user's most recent generations, weighted by
 * each generation's genre percentages.
 */
export async function getGenreBreakdown(
    store: GenerationStatStore,
    userIdentifier: string,
    sampleSize = 25
): Promise<GenreBreakdownEntry[]> {
    if (!userIdentifier) {
        return [];
    }
    const recent = await store.list(userIdentifier, sampleSize);
    const weights = new Map<string, number>();

    for (const stat of recent) {
        for (const entry of stat.genreTop) {
            const genre = entry.genre.trim();
            if (!genre) {
                continue;
            }
            weights.set(genre, (weights.get(genre) ?? 0) + (entry.percentage || 1));
        }
        if (stat.topGenre && !weights.has(stat.topGenre)) {
            weights.set(stat.topGenre, 1);
        }
    }

    const totalWeight = [...weights.values()].reduce((sum, weight) => sum + weight, 0);
    if (totalWeight === 0) {
        return [];
    }

    return [...weights.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, BREAKDOWN_SIZE)
        .map(([genre, weight]) => ({
            genre,
            percentage: Math.round((weight / totalWeight) * 1000) / 10,
        }));
}
