import { CatalogArtist, primaryImageUrl } from "./catalogTracks";
import { normalizeGenre } from "./genreNormalizer";
import {
    artistPlayCount,
    CachedArtist,
    genreBucketWeight,
    ProfileCache,
} from "./profileCache";

/**
 * Artist cards for the dashboard, built from the cached listening profile.
 */

export const DEFAULT_RECOMMENDATION_LIMIT = 10;
export const SEED_ARTIST_LIMIT = 12;

export interface ArtistMetadata {
    id: string;
    name: string;
    image: string;
    genres: string[];
    popularity: number;
    followers: number;
    url: string;
}

export interface ArtistCard extends ArtistMetadata {
    seedArtistIds: string[];
    seedArtistNames: string[];
    reason: string;
    score: number;
}

export interface SeedArtist extends ArtistMetadata {
    playCount: number;
}

export interface ArtistCardOptions {
    reason: string;
    score?: number;
    seedArtistIds?: string[];
    seedArtistNames?: string[];
}

export function buildArtistCard(artist: ArtistMetadata, options: ArtistCardOptions): ArtistCard {
    const seedArtistIds = options.seedArtistIds?.length ? [...options.seedArtistIds] : [artist.id];
    return {
        id: artist.id,
        name: artist.name,
        image: artist.image,
        genres: [...artist.genres],
        popularity: artist.popularity,
        followers: artist.followers,
        url: artist.url,
        seedArtistIds,
        seedArtistNames: [...(options.seedArtistNames ?? [])],
        reason: options.reason,
        score: options.score ?? 0,
    };
}

export function artistFromProfile(id: string, artist: CachedArtist): ArtistMetadata {
    return {
        id,
        name: artist.name.trim(),
        image: artist.image ?? "",
        genres: [...artist.genres],
        popularity: Math.trunc(artist.popularity ?? 0),
        followers: Math.trunc(artist.followers ?? 0),
        url: artist.url ?? "",
    };
}

export function artistFromCatalog(artist: CatalogArtist): ArtistMetadata {
    return {
        id: artist.id,
        name: artist.name,
        image: primaryImageUrl(artist.images),
        genres: [...artist.genres],
        popularity: Math.trunc(artist.popularity ?? 0),
        followers: Math.trunc(artist.followers?.total ?? 0),
        url: artist.external_urls?.spotify ?? "",
    };
}

function profileArtists(profile: ProfileCache): SeedArtist[] {
    return Object.entries(profile.artists)
        .map(([id, artist]) => ({
            ...artistFromProfile(id, artist),
            playCount: artistPlayCount(profile, id),
        }))
        .filter((artist) => artist.id && artist.name);
}

/** The listener's most-played artists, popularity breaking ties. */
export function rankSeedArtists(
    profile: ProfileCache | null | undefined,
    limit = SEED_ARTIST_LIMIT
): SeedArtist[] {
    if (!profile || limit <= 0) {
        return [];
    }
    return profileArtists(profile)
        .sort((a, b) => b.playCount - a.playCount || b.popularity - a.popularity)
        .slice(0, limit);
}

/** Track volume per canonical genre, zero-weight buckets left out. */
export function genreWeights(profile: ProfileCache): Map<string, number> {
    const weights = new Map<string, number>();
    for (const [genre, bucket] of Object.entries(profile.genreBuckets)) {
        const weight = genreBucketWeight(bucket);
        if (genre && weight) {
            weights.set(genre, weight);
        }
    }
    return weights;
}

export function scoreProfileArtist(
    artist: SeedArtist,
    weights: ReadonlyMap<string, number>
): { score: number; reason: string } {
    const primaryGenre = artist.genres[0] ?? "";
    const genreWeight = primaryGenre ? weights.get(normalizeGenre(primaryGenre)) ?? 0 : 0;

    let score = artist.playCount * 2 + artist.popularity + genreWeight;
    if (!score) {
        score = 1;
    }

    let reason = "Discovered from your recent tracks";
    if (primaryGenre) {
        reason = `Heavily featured in your ${primaryGenre.replace(/-/g, " ")} listening`;
    } else if (artist.playCount) {
        reason = "Frequently appears in your recent listening";
    }
    return { score, reason };
}

/**
 * Rank every artist in the snapshot by plays, popularity and how much of the
 * listener's genre volume their primary genre carries.
 */
export function recommendArtistsFromProfile(
    profile: ProfileCache | null | undefined,
    limit = DEFAULT_RECOMMENDATION_LIMIT
): ArtistCard[] {
    if (!profile || limit <= 0) {
        return [];
    }
    const weights = genreWeights(profile);

    return profileArtists(profile)
        .map((artist) => {
            const { score, reason } = scoreProfileArtist(artist, weights);
            return { artist, card: buildArtistCard(artist, { reason, score }) };
        })
        .sort(
            (a, b) =>
                b.card.score - a.card.score ||
                b.artist.popularity - a.artist.popularity ||
                b.artist.playCount - a.artist.playCount
        )
        .slice(0, limit)
        .map(({ card }) => card);
}
