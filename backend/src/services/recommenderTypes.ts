/**
 * Shared shapes exchanged between playlist pipeline stages.
 */

export const TRACK_SOURCES = [
    "llm_seed",
    "similarity",
    "genre_discovery",
    "remix_seed",
    "playlist",
    "artist_top_tracks",
    "profile_cache",
    "user_genre_cache",
] as const;

export type TrackSource = (typeof TRACK_SOURCES)[number];

export interface PlaylistAttributes {
    mood: string;
    genre: string;
    energy: string;
    /** Primary artist named in the prompt, or "" */
    artist: string;
    artists: string[];
}

export interface TrackSuggestion {
    title: string;
    artist: string;
}

export interface ResolvedTrack {
    id: string;
    name: string;
    /** Artist names joined with ", " */
    artists: string;
    artistIds: string[];
    albumName: string;
    albumImageUrl: string;
    year: number | null;
    durationMs: number;
    popularity: number | null;
    seedSource?: TrackSource;
}

export interface ScoreBreakdown {
    popularity: number;
    seedOverlap: number;
    focusArtist: number;
    keywordMatch: number;
    yearAlignment: number;
    energyBias: number;
    cacheTrackHit: number;
    cacheGenreAlignment: number;
    novelty: number;
    total: number;
}

export interface ScoredTrack extends ResolvedTrack {
    score: number;
    scoreBreakdown: ScoreBreakdown;
    seedArtistOverlap: boolean;
    focusArtistOverlap: boolean;
}

export function formatTrackDisplay(track: Pick<ResolvedTrack, "name" | "artists">): string {
    return `${track.name} - ${track.artists}`;
}
