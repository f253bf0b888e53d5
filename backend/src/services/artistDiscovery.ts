import { noopTrace, TraceLog } from "../utils/pipelineTrace";
import type { CatalogTrack } from "./catalogTracks";
import {
    artistFromCatalog,
    artistFromProfile,
    ArtistCard,
    ArtistMetadata,
    buildArtistCard,
    rankSeedArtists,
    SeedArtist,
} from "./artistRecommendations";
import { formatGenreLabel, normalizeArtistKey } from "./genreNormalizer";
import type { LlmDispatcher } from "./llmClient";
import { isRecord, parseJsonResponse } from "./llmResponse";
import { ProfileCache, topProfileGenres } from "./profileCache";
import type { RecommenderSettings } from "./recommenderSettings";
import { catalogAttempt } from "./seedDiscovery";
import type { CatalogClient } from "./spotifyCatalog";

const DEFAULT_REASON = "AI discovery pick";
const HISTORY_REASON = "From your listening history";
const PLACEHOLDER_ARTIST = "New Artist Discovery";

export interface ArtistCandidate {
    name: string;
    reason: string;
}

export interface ArtistDiscoveryContext {
    llm: LlmDispatcher;
    /** Without a catalog only artists already in the profile can be resolved. */
    catalog: CatalogClient | null;
    settings: Pick<RecommenderSettings, "market" | "artistMinFollowers" | "artistMinPopularity">;
    random?: () => number;
    log?: TraceLog;
}

export function renderArtistDiscoveryPrompt(
    topArtists: readonly SeedArtist[],
    genres: readonly string[],
    limit: number
): string {
    const artistLines = topArtists.map((artist) => {
        const tagged = artist.genres.slice(0, 2).join(", ");
        const name = artist.name || "Unknown";
        return tagged ? `- ${name} (${tagged})` : `- ${name}`;
    });
    const genreLine = genres.length > 0 ? genres.join(", ") : "varied styles";
    const artistSummary = artistLines.join("\n") || "No artists provided";

    return (
        "You are an AI music curator helping a Spotify power user discover new artists.\n" +
        `Their current top artists are:\n${artistSummary}\n\n` +
        `Their favorite genres lean toward ${genreLine}.\n` +
        `Suggest ${limit} fresh artists that complement their taste but aren't obvious duplicates.\n` +
        'Return strictly JSON: an array where each entry is {"name": "Artist", "reason": "Short why"}.\n' +
        "Prioritize globally available artists with enough discography to build playlists."
    );
}

/** `[{name, reason}]` or bare names; anything else yields no candidates. */
export function parseArtistCandidates(response: string): ArtistCandidate[] {
    const parsed = parseJsonResponse(response);
    if (parsed.kind !== "ok" || !Array.isArray(parsed.value)) {
        return [];
    }

    const candidates: ArtistCandidate[] = [];
    for (const entry of parsed.value) {
        if (typeof entry === "string") {
            candidates.push({ name: entry.trim(), reason: DEFAULT_REASON });
        } else if (isRecord(entry) && entry.name) {
            const reason = typeof entry.reason === "string" ? entry.reason.trim() : "";
            candidates.push({ name: String(entry.name).trim(), reason: reason || DEFAULT_REASON });
        }
    }
    return candidates.filter((candidate) => candidate.name);
}

function profileArtistsByKey(profile: ProfileCache | null): Map<string, ArtistMetadata> {
    const lookup = new Map<string, ArtistMetadata>();
    if (!profile) {
        return lookup;
    }
    for (const [id, artist] of Object.entries(profile.artists)) {
        const key = normalizeArtistKey(artist.name);
        if (key) {
            lookup.set(key, artistFromProfile(id, artist));
        }
    }
    return lookup;
}

async function searchArtist(
    context: ArtistDiscoveryContext,
    name: string,
    log: TraceLog
): Promise<ArtistMetadata | null> {
    const { catalog } = context;
    if (!catalog || !name) {
        return null;
    }
    const hits = await catalogAttempt(log, `Artist search for '${name}'`, [], () =>
        catalog.searchArtists(`artist:"${name}"`, { limit: 1 })
    );
    return hits.length > 0 ? artistFromCatalog(hits[0]) : null;
}

/** Unknown when there is no catalog or the lookup fails, which counts as listenable. */
async function hasListenableTracks(
    context: ArtistDiscoveryContext,
    artistId: string,
    log: TraceLog
): Promise<boolean> {
    const { catalog } = context;
    if (!catalog || !artistId) {
        return true;
    }
    const tracks = await catalogAttempt<CatalogTrack[] | null>(
        log,
        `Top tracks for artist ${artistId}`,
        null,
        () => catalog.getArtistTopTracks(artistId, context.settings.market)
    );
    return tracks === null || tracks.some((track) => Boolean(track.id));
}

async function isPresentable(
    context: ArtistDiscoveryContext,
    artist: ArtistMetadata,
    log: TraceLog
): Promise<boolean> {
    const { artistMinFollowers, artistMinPopularity } = context.settings;
    if (artist.followers < artistMinFollowers || artist.popularity < artistMinPopularity) {
        return false;
    }
    return hasListenableTracks(context, artist.id, log);
}

function shuffled<T>(items: readonly T[], random: () => number): T[] {
    const copy = [...items];
    for (let index = copy.length - 1; index > 0; index -= 1) {
        const swap = Math.floor(random() * (index + 1));
        [copy[index], copy[swap]] = [copy[swap], copy[index]];
    }
    return copy;
}

async function artistCandidates(
    context: ArtistDiscoveryContext,
    seedArtists: readonly SeedArtist[],
    genres: readonly string[],
    limit: number,
    log: TraceLog
): Promise<ArtistCandidate[]> {
    const promptLimit = Math.max(limit + 6, limit * 2);
    const response = await context.llm.dispatch(
        renderArtistDiscoveryPrompt(seedArtists, genres, promptLimit)
    );
    const candidates = parseArtistCandidates(response);
    if (candidates.length > 0) {
        return candidates;
    }

    log("AI artist suggestions unavailable; falling back to listening history.");
    const names = seedArtists.length > 0 ? seedArtists.map((artist) => artist.name) : [PLACEHOLDER_ARTIST];
    return names.filter(Boolean).map((name) => ({ name, reason: HISTORY_REASON }));
}

/**
 * Ask the model for artists that complement the listener's top artists, then
 * keep those the catalog (or the profile) can resolve and that clear the
 * follower and popularity floors. Short results are topped up with the
 * listener's own artists in random order.
 */
export async function discoverArtists(
    context: ArtistDiscoveryContext,
    profile: ProfileCache | null,
    limit = 8
): Promise<ArtistCard[]> {
    if (limit <= 0) {
        return [];
    }
    const log = context.log ?? noopTrace;
    const seedArtists = rankSeedArtists(profile, Math.max(10, limit + 2));
    const genres = topProfileGenres(profile).map(formatGenreLabel).filter(Boolean);
    const candidates = await artistCandidates(context, seedArtists, genres, limit, log);
    const knownArtists = profileArtistsByKey(profile);

    const cards: ArtistCard[] = [];
    const seenIds = new Set<string>();

    for (const candidate of candidates) {
        if (cards.length >= limit) {
            break;
        }
        const artist =
            knownArtists.get(normalizeArtistKey(candidate.name)) ??
            (await searchArtist(context, candidate.name, log));
        if (!artist?.id || seenIds.has(artist.id)) {
            continue;
        }
        if (!(await isPresentable(context, artist, log))) {
            continue;
        }
        seenIds.add(artist.id);
        cards.push(buildArtistCard(artist, { reason: candidate.reason }));
    }

    for (const seed of shuffled(seedArtists, context.random ?? Math.random)) {
        if (cards.length >= limit) {
            break;
        }
        if (seenIds.has(seed.id) || !(await isPresentable(context, seed, log))) {
            continue;
        }
        seenIds.add(seed.id);
        cards.push(buildArtistCard(seed, { reason: HISTORY_REASON }));
    }

    log(`Discovered ${cards.length} artist cards.`);
    return cards.slice(0, limit);
}
