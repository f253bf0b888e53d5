import { z } from "zod";
import { ResolvedTrack, TrackSource } from "./recommenderTypes";

/**
 * Wire shapes returned by the music catalog (Spotify Web API) and their
 * conversion into pipeline tracks. Unknown fields pass through untouched;
 * items that do not carry an id are dropped by `parseCatalogItems`.
 */

const imageSchema = z.object({ url: z.string().nullish() }).passthrough();

export const catalogArtistRefSchema = z
    .object({
        id: z.string().nullish(),
        name: z.string().nullish(),
    })
    .passthrough();

export const catalogTrackSchema = z
    .object({
        id: z.string().min(1),
        name: z.string().default("Unknown"),
        artists: z.array(catalogArtistRefSchema).default([]),
        album: z
            .object({
                name: z.string().nullish(),
                images: z.array(imageSchema).nullish(),
                release_date: z.string().nullish(),
            })
            .passthrough()
            .nullish(),
        duration_ms: z.number().nullish(),
        popularity: z.number().nullish(),
        available_markets: z.array(z.string()).nullish(),
        release_date: z.string().nullish(),
    })
    .passthrough();

export const catalogArtistSchema = z
    .object({
        id: z.string().min(1),
        name: z.string().default(""),
        genres: z.array(z.string()).default([]),
        popularity: z.number().nullish(),
        images: z.array(imageSchema).nullish(),
        followers: z.object({ total: z.number().nullish() }).passthrough().nullish(),
        external_urls: z.object({ spotify: z.string().nullish() }).passthrough().nullish(),
    })
    .passthrough();

export const catalogPlaylistSchema = z
    .object({
        id: z.string().min(1),
        name: z.string().default(""),
        description: z.string().nullish(),
        owner: z
            .object({
                id: z.string().nullish(),
                display_name: z.string().nullish(),
            })
            .passthrough()
            .nullish(),
        images: z.array(imageSchema).nullish(),
        tracks: z.object({ total: z.number().nullish() }).passthrough().nullish(),
        external_urls: z.object({ spotify: z.string().nullish() }).passthrough().nullish(),
    })
    .passthrough();

export const catalogUserSchema = z
    .object({
        id: z.string().min(1),
        display_name: z.string().nullish(),
    })
    .passthrough();

export type CatalogTrack = z.infer<typeof catalogTrackSchema>;
export type CatalogArtist = z.infer<typeof catalogArtistSchema>;
export type CatalogPlaylist = z.infer<typeof catalogPlaylistSchema>;
export type CatalogUser = z.infer<typeof catalogUserSchema>;

/**
 * Parse a list of wire items, dropping nulls and entries that fail validation.
 */
export function parseCatalogItems<S extends z.ZodTypeAny>(
    schema: S,
    items: unknown
): z.infer<S>[] {
    if (!Array.isArray(items)) {
        return [];
    }

    const parsed: z.infer<S>[] = [];
    for (const item of items) {
        if (item === null || item === undefined) {
            continue;
        }
        const result = schema.safeParse(item);
        if (result.success) {
            parsed.push(result.data);
        }
    }
    return parsed;
}

export function catalogArtistIds(track: CatalogTrack): string[] {
    const ids: string[] = [];
    for (const artist of track.artists) {
        if (artist.id) {
            ids.push(artist.id);
        }
    }
    return ids;
}

export function catalogArtistNames(track: CatalogTrack): string[] {
    const names: string[] = [];
    for (const artist of track.artists) {
        if (artist.name) {
            names.push(artist.name);
        }
    }
    return names;
}

export function extractReleaseYear(track: CatalogTrack): number | null {
    const date = track.album?.release_date || track.release_date;
    if (!date) {
        return null;
    }
    const match = /^(\d{4})/.exec(date);
    return match ? Number.parseInt(match[1], 10) : null;
}

export function primaryImageUrl(
    images: ReadonlyArray<{ url?: string | null }> | null | undefined
): string {
    for (const image of images ?? []) {
        if (image.url) {
            return image.url;
        }
    }
    return "";
}

export function toResolvedTrack(
    track: CatalogTrack,
    seedSource?: TrackSource
): ResolvedTrack {
    const resolved: ResolvedTrack = {
        id: track.id,
        name: track.name || "Unknown",
        artists: catalogArtistNames(track).join(", ") || "Unknown",
        artistIds: catalogArtistIds(track),
        albumName: track.album?.name ?? "",
        albumImageUrl: primaryImageUrl(track.album?.images),
        year: extractReleaseYear(track),
        durationMs: Math.trunc(track.duration_ms ?? 0),
        popularity: Math.trunc(track.popularity ?? 0),
    };
    if (seedSource) {
        resolved.seedSource = seedSource;
    }
    return resolved;
}
