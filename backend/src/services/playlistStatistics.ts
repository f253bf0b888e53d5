import { mapChunksSettled } from "../utils/async";
import { describeError } from "../utils/errors";
import { noopTrace, TraceLog } from "../utils/pipelineTrace";
import { CatalogArtist } from "./catalogTracks";
import { ARTIST_LOOKUP_BATCH_SIZE, normalizeGenre } from "./genreNormalizer";
import { ownEntry, ProfileCache, profileTrackIds } from "./profileCache";
import { ResolvedTrack, TrackSource } from "./recommenderTypes";

export const GENRE_TOP_COUNT = 3;

export const SOURCE_LABELS: Readonly<Record<TrackSource, string>> = {
    llm_seed: "LLM Seeds",
    similarity: "Similarity Engine",
    genre_discovery: "Genre Discovery",
    remix_seed: "Remix Seeds",
    playlist: "Existing Playlist",
    artist_top_tracks: "Artist Top Tracks",
    profile_cache: "Listening History",
    user_genre_cache: "Genre Favourites",
};

export interface GenreShare {
    genre: string;
    percentage: number;
}

export interface SourceShare {
    key: TrackSource;
    label: string;
    count: number;
    percentage: number;
}

export interface TrackHighlight {
    id: string;
    name: string;
    artists: string;
    popularity: number;
    albumImageUrl: string;
}

export interface PlaylistStatistics {
    totalTracks: number;
    totalDuration: string;
    totalDurationMs: number;
    avgPopularity: number | null;
    novelty: number;
    genreDistribution: Record<string, number>;
    genreTop: GenreShare[];
    genreRemaining: GenreShare[];
    noveltyReferenceIds: string[];
    sourceMix: SourceShare[];
    sourceTotal: number;
    topPopularTracks: TrackHighlight[];
    leastPopularTracks: TrackHighlight[];
}

export interface StatisticsOptions {
    profile?: ProfileCache | null;
    cachedTrackIds?: readonly string[] | null;
    /** Catalog artist lookup for genre tags; profile genres are used without it. */
    lookupArtists?: (ids: string[]) => Promise<CatalogArtist[]>;
    lookupConcurrency?: number;
    highlightCount?: number;
    log?: TraceLog;
}

function round1(value: number): number {
    return Math.round(value * 10) / 10;
}

/** HH:MM:SS, hours are not wrapped into days. */
export function formatDuration(totalMs: number): string {
    const totalSeconds = Math.floor(Math.max(totalMs, 0) / 1000);
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

export function emptyPlaylistStatistics(): PlaylistStatistics {
    return {
        totalTracks: 0,
        totalDuration: "00:00:00",
        totalDurationMs: 0,
        avgPopularity: null,
        novelty: 100,
        genreDistribution: {},
        genreTop: [],
        genreRemaining: [],
        noveltyReferenceIds: [],
        sourceMix: [],
        sourceTotal: 0,
        topPopularTracks: [],
        leastPopularTracks: [],
    };
}

async function collectArtistGenres(
    artistIds: readonly string[],
    options: StatisticsOptions,
    log: TraceLog
): Promise<Map<string, string[]>> {
    const genres = new Map<string, string[]>();
    const profile = options.profile;
    const missing: string[] = [];

    for (const artistId of artistIds) {
        const cached = profile ? ownEntry(profile.artists, artistId) : undefined;
        if (cached && cached.genres.length > 0) {
            genres.set(artistId, cached.genres);
        } else {
            missing.push(artistId);
        }
    }

    if (missing.length === 0 || !options.lookupArtists) {
        return genres;
    }

    const outcomes = await mapChunksSettled(
        missing,
        ARTIST_LOOKUP_BATCH_SIZE,
        options.lookupArtists,
        options.lookupConcurrency
    );
    for (const outcome of outcomes) {
        if (!outcome.ok) {
            log(`Failed to fetch artist genres for statistics: ${describeError(outcome.error)}.`);
            continue;
        }
        for (const artist of outcome.value) {
            genres.set(artist.id, artist.genres);
        }
    }
    return genres;
}

function toHighlight(track: ResolvedTrack, popularity: number): TrackHighlight {
    return {
        id: track.id,
        name: track.name,
        artists: track.artists,
        popularity,
        albumImageUrl: track.albumImageUrl,
    };
}

/**
 * Duration, popularity, novelty, genre and provenance summary of a track list.
 * An empty list yields the neutral baseline (novelty 100, no averages).
 */
export async function computePlaylistStatistics(
    tracks: readonly ResolvedTrack[],
    options: StatisticsOptions = {}
): Promise<PlaylistStatistics> {
    if (tracks.length === 0) {
        return emptyPlaylistStatistics();
    }
    const log = options.log ?? noopTrace;
    const highlightCount = options.highlightCount ?? 5;

    const totalDurationMs = tracks.reduce((sum, track) => sum + Math.max(track.durationMs, 0), 0);

    const rated: Array<{ track: ResolvedTrack; popularity: number }> = [];
    for (const track of tracks) {
        if (track.popularity !== null) {
            rated.push({ track, popularity: track.popularity });
        }
    }
    const avgPopularity =
        rated.length > 0
            ? round1(rated.reduce((sum, entry) => sum + entry.popularity, 0) / rated.length)
            : null;

    const reference = profileTrackIds(options.profile);
    (options.cachedTrackIds ?? []).forEach((id) => {
        if (id) {
            reference.add(id);
        }
    });
    let novelty = 100;
    if (reference.size > 0) {
        const known = tracks.filter((track) => reference.has(track.id)).length;
        novelty = 100 * (1 - known / tracks.length);
    }

    const uniqueArtistIds = [...new Set(tracks.flatMap((track) => track.artistIds))];
    const artistGenres = await collectArtistGenres(uniqueArtistIds, options, log);
    const genreCounts = new Map<string, number>();
    for (const track of tracks) {
        const trackGenres = new Set<string>();
        for (const artistId of track.artistIds) {
            for (const tag of artistGenres.get(artistId) ?? []) {
                const genre = normalizeGenre(tag);
                if (genre) {
                    trackGenres.add(genre);
                }
            }
        }
        trackGenres.forEach((genre) => genreCounts.set(genre, (genreCounts.get(genre) ?? 0) + 1));
    }

    const genreTally = [...genreCounts.values()].reduce((sum, count) => sum + count, 0);
    const genreShares: GenreShare[] = [...genreCounts.entries()]
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .map(([genre, count]) => ({ genre, percentage: round1((count / genreTally) * 100) }));
    const genreDistribution: Record<string, number> = {};
    genreShares.forEach((share) => {
        genreDistribution[share.genre] = share.percentage;
    });

    const sourceCounts = new Map<TrackSource, number>();
    for (const track of tracks) {
        const source = track.seedSource ?? "playlist";
        sourceCounts.set(source, (sourceCounts.get(source) ?? 0) + 1);
    }
    const sourceMix: SourceShare[] = [...sourceCounts.entries()]
        .sort((a, b) => b[1] - a[1])
        .map(([key, count]) => ({
            key,
            label: SOURCE_LABELS[key],
            count,
            percentage: round1((count / tracks.length) * 100),
        }));

    // Array.prototype.sort is stable, so equal popularity keeps playlist order
    const byPopularityDesc = [...rated].sort((a, b) => b.popularity - a.popularity);
    const byPopularityAsc = [...rated].sort((a, b) => a.popularity - b.popularity);

    return {
        totalTracks: tracks.length,
        totalDuration: formatDuration(totalDurationMs),
        totalDurationMs,
        avgPopularity,
        novelty,
        genreDistribution,
        genreTop: genreShares.slice(0, GENRE_TOP_COUNT),
        genreRemaining: genreShares.slice(GENRE_TOP_COUNT),
        noveltyReferenceIds: [...reference],
        sourceMix,
        sourceTotal: tracks.length,
        topPopularTracks: byPopularityDesc
            .slice(0, highlightCount)
            .map((entry) => toHighlight(entry.track, entry.popularity)),
        leastPopularTracks: byPopularityAsc
            .slice(0, highlightCount)
            .map((entry) => toHighlight(entry.track, entry.popularity)),
    };
}
