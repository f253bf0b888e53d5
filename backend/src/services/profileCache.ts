import { z } from "zod";
import { createLogger } from "../utils/logger";
import type { RedisClient } from "../utils/redis";
import { normalizeArtistKey } from "./genreNormalizer";
import { ResolvedTrack, TRACK_SOURCES } from "./recommenderTypes";

const log = createLogger("profile-cache");

/**
 * Listening-profile snapshot built outside this service. The pipeline only
 * reads it for seeding, scoring and novelty.
 */

const cachedArtistSchema = z
    .object({
        name: z.string().default(""),
        genres: z.array(z.string()).default([]),
        playCount: z.number().int().nonnegative().default(0),
        popularity: z.number().nullish(),
        followers: z.number().nullish(),
        image: z.string().nullish(),
        url: z.string().nullish(),
    })
    .passthrough();

const genreBucketSchema = z
    .object({
        trackCount: z.number().int().nonnegative().default(0),
        trackIds: z.array(z.string()).default([]),
    })
    .passthrough();

export const resolvedTrackSchema = z.object({
    id: z.string().min(1),
    name: z.string().default("Unknown"),
    artists: z.string().default("Unknown"),
    artistIds: z.array(z.string()).default([]),
    albumName: z.string().default(""),
    albumImageUrl: z.string().default(""),
    year: z.number().int().nullable().default(null),
    durationMs: z.number().int().nonnegative().default(0),
    popularity: z.number().nullable().default(null),
    seedSource: z.enum(TRACK_SOURCES).optional(),
});

export const profileCacheSchema = z.object({
    artists: z.record(cachedArtistSchema).default({}),
    genreBuckets: z.record(genreBucketSchema).default({}),
    tracks: z.record(resolvedTrackSchema).default({}),
    topTrackIds: z.array(z.string()).default([]),
    artistCounts: z.record(z.number()).optional(),
    source: z.string().default("unknown"),
});

export type ProfileCache = z.infer<typeof profileCacheSchema>;
export type CachedArtist = z.infer<typeof cachedArtistSchema>;

export interface ProfileCacheSource {
    getProfile(userIdentifier: string): Promise<ProfileCache | null>;
}

export const emptyProfileSource: ProfileCacheSource = {
    async getProfile() {
        return null;
    },
};

export function profileCacheKey(userIdentifier: string): string {
    return `profile-cache:${userIdentifier}`;
}

/** Validate a raw snapshot; anything that does not match is treated as absent. */
export function parseProfileCache(raw: unknown): ProfileCache | null {
    const parsed = profileCacheSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

export class RedisProfileCacheSource implements ProfileCacheSource {
    constructor(private readonly redis: RedisClient) {}

    async getProfile(userIdentifier: string): Promise<ProfileCache | null> {
        if (!userIdentifier) {
            return null;
        }
        const raw = await this.redis.get(profileCacheKey(userIdentifier));
        if (!raw) {
            return null;
        }
        try {
            return parseProfileCache(JSON.parse(raw));
        } catch (error) {
            log.warn(`Ignoring unreadable profile snapshot for ${userIdentifier}:`, error);
            return null;
        }
    }
}

/** Own-property lookup, so ids such as "constructor" never hit the prototype. */
export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
}

function copyTrack(track: ResolvedTrack): ResolvedTrack {
    return { ...track, artistIds: [...track.artistIds] };
}

/** Every track id the profile already knows about. */
export function profileTrackIds(profile: ProfileCache | null | undefined): Set<string> {
    const ids = new Set<string>();
    if (!profile) {
        return ids;
    }
    Object.keys(profile.tracks).forEach((id) => ids.add(id));
    profile.topTrackIds.forEach((id) => ids.add(id));
    return ids;
}

export function cachedTracksForGenre(
    profile: ProfileCache | null | undefined,
    canonicalGenre: string,
    limit = 5
): ResolvedTrack[] {
    if (!profile || !canonicalGenre) {
        return [];
    }
    const bucket = ownEntry(profile.genreBuckets, canonicalGenre);
    if (!bucket) {
        return [];
    }

    const results: ResolvedTrack[] = [];
    for (const trackId of bucket.trackIds) {
        const track = ownEntry(profile.tracks, trackId);
        if (!track) {
            continue;
        }
        results.push(copyTrack(track));
        if (results.length >= limit) {
            break;
        }
    }
    return results;
}

/** Cached tracks by `artistId`, most popular (then newest) first. */
export function cachedTracksForArtist(
    profile: ProfileCache | null | undefined,
    artistId: string,
    limit = 5
): ResolvedTrack[] {
    if (!profile || !artistId) {
        return [];
    }
    const matches = Object.values(profile.tracks).filter((track) =>
        track.artistIds.includes(artistId)
    );
    matches.sort(
        (a, b) =>
            (b.popularity ?? 0) - (a.popularity ?? 0) || (b.year ?? 0) - (a.year ?? 0)
    );
    return matches.slice(0, limit).map(copyTrack);
}

export function cachedArtistIdForHint(
    profile: ProfileCache | null | undefined,
    artistHint: string
): string | null {
    if (!profile || !artistHint) {
        return null;
    }
    const hintKey = normalizeArtistKey(artistHint);
    if (!hintKey) {
        return null;
    }

    for (const [artistId, artist] of Object.entries(profile.artists)) {
        const nameKey = normalizeArtistKey(artist.name);
        if (nameKey && (nameKey === hintKey || nameKey.includes(hintKey))) {
            return artistId;
        }
    }
    return null;
}

/** Play count per artist, preferring the explicit `artistCounts` map. */
export function artistPlayCount(profile: ProfileCache, artistId: string): number {
    const explicit = profile.artistCounts ? ownEntry(profile.artistCounts, artistId) : undefined;
    if (explicit !== undefined) {
        return explicit;
    }
    return ownEntry(profile.artists, artistId)?.playCount ?? 0;
}

type GenreBucket = ProfileCache["genreBuckets"][string];

/** Track volume of a genre bucket; the explicit count wins over the id list. */
export function genreBucketWeight(bucket: GenreBucket): number {
    return bucket.trackCount || bucket.trackIds.length;
}

/** Genre bucket keys with the most tracks first; ties keep snapshot order. */
export function topProfileGenres(profile: ProfileCache | null | undefined, limit = 5): string[] {
    if (!profile) {
        return [];
    }
    return Object.entries(profile.genreBuckets)
        .map(([genre, bucket]) => ({ genre, weight: genreBucketWeight(bucket) }))
        .sort((a, b) => b.weight - a.weight)
        .slice(0, Math.max(limit, 0))
        .map((entry) => entry.genre);
}
