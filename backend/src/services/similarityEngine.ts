import { noopTrace } from "../utils/pipelineTrace";
import { CatalogTrack, toResolvedTrack } from "./catalogTracks";
import {
    filterByMarket,
    filterNonLatinTracks,
    filterTracksByArtistGenre,
    normalizeGenre,
} from "./genreNormalizer";
import { artistPlayCount, ownEntry, ProfileCache } from "./profileCache";
import {
    PlaylistAttributes,
    ResolvedTrack,
    ScoreBreakdown,
    ScoredTrack,
} from "./recommenderTypes";
import {
    catalogAttempt,
    CatalogStageContext,
    discoverPlaylistSeeds,
} from "./seedDiscovery";
import { popularityThresholdForGenre } from "./recommenderSettings";

/**
 * Heuristic candidate ranking. Every channel is an additive term reported in
 * the breakdown; absent inputs contribute zero.
 */
export const SCORE_WEIGHTS = {
    popularity: 0.45,
    seedOverlap: 0.2,
    focusArtist: 0.3,
    keywordPerHit: 0.05,
    keywordMaxHits: 2,
    yearAlignment: 0.18,
    yearWindow: 18,
    energyBias: 0.05,
    cacheTrackHit: 0.18,
    cacheGenreAlignment: 0.12,
} as const;

/** Popularity range each energy label expects (inclusive). */
export const ENERGY_POPULARITY_BANDS: Readonly<Record<string, readonly [number, number]>> = {
    high: [65, 100],
    medium: [40, 75],
    low: [0, 50],
};

const MAX_TRACKS_PER_ARTIST = 2;
const SIMILARITY_PLAYLISTS = 4;
const SIMILARITY_TRACKS_PER_PLAYLIST = 40;
const RECENT_YEAR_RANGE = "2015-2025";

export interface ScoringSignals {
    seedArtistIds: ReadonlySet<string>;
    targetYear: number | null;
    targetEnergy: string;
    promptKeywords: ReadonlySet<string>;
    profile?: ProfileCache | null;
    focusArtistIds?: ReadonlySet<string>;
    targetGenre?: string;
}

/** Lowercase alphanumeric runs longer than two characters. */
export function extractPromptKeywords(prompt: string): Set<string> {
    const keywords = new Set<string>();
    for (const match of prompt.toLowerCase().matchAll(/[a-z0-9]+/g)) {
        if (match[0].length > 2) {
            keywords.add(match[0]);
        }
    }
    return keywords;
}

function round4(value: number): number {
    return Math.round(value * 10000) / 10000;
}

function noveltyAdjustment(playCount: number): number {
    if (playCount === 0) {
        return 0.05;
    }
    if (playCount <= 2) {
        return 0.02;
    }
    if (playCount >= 6) {
        return -0.03;
    }
    return -0.01;
}

function sharesArtist(track: ResolvedTrack, artistIds: ReadonlySet<string> | undefined): boolean {
    if (!artistIds || artistIds.size === 0) {
        return false;
    }
    return track.artistIds.some((id) => artistIds.has(id));
}

export function scoreTrackBasic(
    track: ResolvedTrack,
    signals: ScoringSignals
): { score: number; breakdown: ScoreBreakdown } {
    const popularity = ((track.popularity ?? 0) / 100) * SCORE_WEIGHTS.popularity;
    const seedOverlap = sharesArtist(track, signals.seedArtistIds) ? SCORE_WEIGHTS.seedOverlap : 0;
    const focusArtist = sharesArtist(track, signals.focusArtistIds) ? SCORE_WEIGHTS.focusArtist : 0;

    let keywordMatch = 0;
    if (signals.promptKeywords.size > 0) {
        const name = track.name.toLowerCase();
        let hits = 0;
        signals.promptKeywords.forEach((keyword) => {
            if (name.includes(keyword)) {
                hits += 1;
            }
        });
        keywordMatch = Math.min(hits, SCORE_WEIGHTS.keywordMaxHits) * SCORE_WEIGHTS.keywordPerHit;
    }

    let yearAlignment = 0;
    if (signals.targetYear && track.year) {
        const distance = Math.abs(track.year - signals.targetYear);
        yearAlignment =
            Math.max(0, (SCORE_WEIGHTS.yearWindow - distance) / (SCORE_WEIGHTS.yearWindow * 2)) *
            SCORE_WEIGHTS.yearAlignment;
    }

    let energyBias = 0;
    const band = ownEntry(ENERGY_POPULARITY_BANDS, signals.targetEnergy.toLowerCase());
    if (band && track.popularity !== null) {
        const [low, high] = band;
        if (track.popularity >= low && track.popularity <= high) {
            energyBias = SCORE_WEIGHTS.energyBias;
        }
    }

    let cacheTrackHit = 0;
    let cacheGenreAlignment = 0;
    let novelty = 0;
    const profile = signals.profile;
    if (profile) {
        if (ownEntry(profile.tracks, track.id)) {
            cacheTrackHit = SCORE_WEIGHTS.cacheTrackHit;
        }
        const bucket = signals.targetGenre
            ? ownEntry(profile.genreBuckets, signals.targetGenre)
            : undefined;
        if (bucket && bucket.trackIds.includes(track.id)) {
            cacheGenreAlignment = SCORE_WEIGHTS.cacheGenreAlignment;
        }
        for (const artistId of new Set(track.artistIds)) {
            novelty += noveltyAdjustment(artistPlayCount(profile, artistId));
        }
    }

    const total = Math.max(
        popularity +
            seedOverlap +
            focusArtist +
            keywordMatch +
            yearAlignment +
            energyBias +
            cacheTrackHit +
            cacheGenreAlignment +
            novelty,
        0
    );

    return {
        score: total,
        breakdown: {
            popularity: round4(popularity),
            seedOverlap: round4(seedOverlap),
            focusArtist: round4(focusArtist),
            keywordMatch: round4(keywordMatch),
            yearAlignment: round4(yearAlignment),
            energyBias: round4(energyBias),
            cacheTrackHit: round4(cacheTrackHit),
            cacheGenreAlignment: round4(cacheGenreAlignment),
            novelty: round4(novelty),
            total: round4(total),
        },
    };
}

export interface SimilarTracksRequest {
    seedTrackIds: readonly string[];
    seedArtistIds: ReadonlySet<string>;
    targetYear: number | null;
    attributes: Pick<PlaylistAttributes, "genre" | "mood" | "energy">;
    promptKeywords: ReadonlySet<string>;
    limit?: number;
    profile?: ProfileCache | null;
    focusArtistIds?: ReadonlySet<string>;
}

/**
 * Rank catalog candidates around the seed set. No seeds means no work: the
 * call returns immediately without touching the catalog.
 */
export async function getSimilarTracks(
    context: CatalogStageContext,
    request: SimilarTracksRequest
): Promise<ScoredTrack[]> {
    const log = context.log ?? noopTrace;
    if (request.seedTrackIds.length === 0) {
        log("No seed track IDs available; skipping local recommendations.");
        return [];
    }

    const { catalog, settings } = context;
    const limit = request.limit ?? settings.similarLimit;
    const market = settings.market;
    const canonicalGenre = normalizeGenre(request.attributes.genre || "pop");

    const candidates: CatalogTrack[] = await discoverPlaylistSeeds(context, canonicalGenre, {
        playlistLimit: SIMILARITY_PLAYLISTS,
        trackLimit: SIMILARITY_TRACKS_PER_PLAYLIST,
    });

    const queries = [`genre:"${canonicalGenre}" year:${RECENT_YEAR_RANGE}`];
    if (request.attributes.mood) {
        queries.push(`"${request.attributes.mood}" ${canonicalGenre}`);
    }

    const searchLimit = Math.min(limit * 4, 50);
    for (const query of queries) {
        log(`Catalog search tracks: q='${query}', limit=${searchLimit}, market=${market}`);
        const found = await catalogAttempt(log, `Catalog search for '${query}'`, [], () =>
            catalog.searchTracks(query, { limit: searchLimit, market })
        );
        let tracks = await filterTracksByArtistGenre(filterByMarket(found, market), canonicalGenre, {
            lookupArtists: (ids) => catalog.getArtists(ids),
            popularityThreshold: popularityThresholdForGenre(settings, canonicalGenre),
            lookupConcurrency: settings.catalogConcurrency,
            log,
        });
        if (settings.requireLatin) {
            tracks = filterNonLatinTracks(tracks, settings.latinThreshold);
        }
        log(`Search returned ${tracks.length} candidates for query '${query}'.`);
        candidates.push(...tracks);
    }

    const seen = new Set(request.seedTrackIds);
    const pool: ResolvedTrack[] = [];
    for (const track of candidates) {
        if (seen.has(track.id)) {
            continue;
        }
        seen.add(track.id);
        pool.push(toResolvedTrack(track, "similarity"));
    }
    log(`Local recommender candidate pool size after filtering: ${pool.length}.`);

    const signals: ScoringSignals = {
        seedArtistIds: request.seedArtistIds,
        targetYear: request.targetYear,
        targetEnergy: request.attributes.energy,
        promptKeywords: request.promptKeywords,
        profile: request.profile,
        focusArtistIds: request.focusArtistIds,
        targetGenre: canonicalGenre,
    };

    const scored = pool.map((track) => ({ track, ...scoreTrackBasic(track, signals) }));
    scored.sort(
        (a, b) => b.score - a.score || (b.track.popularity ?? 0) - (a.track.popularity ?? 0)
    );
    log(`Local recommender scored ${scored.length} candidates.`);

    const perArtist = new Map<string, number>();
    const results: ScoredTrack[] = [];
    for (const { track, score, breakdown } of scored) {
        if (results.length >= limit) {
            break;
        }
        const artistKeys = track.artistIds.length > 0 ? track.artistIds : [track.artists];
        if (artistKeys.some((key) => (perArtist.get(key) ?? 0) >= MAX_TRACKS_PER_ARTIST)) {
            continue;
        }
        artistKeys.forEach((key) => perArtist.set(key, (perArtist.get(key) ?? 0) + 1));
        results.push({
            ...track,
            score: round4(score),
            scoreBreakdown: breakdown,
            seedArtistOverlap: sharesArtist(track, request.seedArtistIds),
            focusArtistOverlap: sharesArtist(track, request.focusArtistIds),
        });
    }

    log(`Local recommender selected ${results.length} similarity-based tracks.`);
    return results;
}
