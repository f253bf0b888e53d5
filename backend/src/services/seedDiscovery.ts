import { describeError } from "../utils/errors";
import { noopTrace, TraceLog } from "../utils/pipelineTrace";
import { CatalogPlaylist, CatalogTrack, toResolvedTrack } from "./catalogTracks";
import {
    filterByMarket,
    filterNonLatinTracks,
    filterTracksByArtistGenre,
    normalizeArtistKey,
    normalizeGenre,
} from "./genreNormalizer";
import {
    cachedArtistIdForHint,
    cachedTracksForArtist,
    ownEntry,
    ProfileCache,
} from "./profileCache";
import {
    PlaylistAttributes,
    ResolvedTrack,
    TrackSource,
    TrackSuggestion,
} from "./recommenderTypes";
import { popularityThresholdForGenre, RecommenderSettings } from "./recommenderSettings";
import type { CatalogClient } from "./spotifyCatalog";

/**
 * Turns suggestions and genres into concrete catalog tracks.
 *
 * Catalog failures never escape these functions: a failed call is logged to
 * the trace and counts as "no results".
 */

const RESOLVE_SEARCH_LIMIT = 5;
const ARTIST_SEARCH_LIMIT = 3;
const CATALOG_OWNER_ID = "spotify";
const ARTIST_CREDIT_SEPARATOR = /\s*(?:,|&|feat\.?|ft\.?|with)\s*/;

export interface CatalogStageContext {
    catalog: CatalogClient;
    settings: RecommenderSettings;
    log?: TraceLog;
}

/**
 * Run a catalog call, logging failures and answering `fallback` instead.
 */
export async function catalogAttempt<T>(
    log: TraceLog,
    label: string,
    fallback: T,
    run: () => Promise<T>
): Promise<T> {
    try {
        return await run();
    } catch (error) {
        log(`${label} failed: ${describeError(error)}.`);
        return fallback;
    }
}

/** First credited artist of "A, B feat. C". */
export function primaryArtistHint(artist: string): string {
    if (!artist) {
        return "";
    }
    return artist.split(ARTIST_CREDIT_SEPARATOR)[0].trim();
}

function applyLatinPolicy<T extends { name: string }>(
    settings: RecommenderSettings,
    tracks: T[]
): T[] {
    return settings.requireLatin ? filterNonLatinTracks(tracks, settings.latinThreshold) : tracks;
}

function byPopularityDesc(a: CatalogTrack, b: CatalogTrack): number {
    return (b.popularity ?? 0) - (a.popularity ?? 0);
}

/**
 * Resolve model suggestions to catalog tracks: market-scoped search, then the
 * primary artist only, then a marketless search. First hit wins; suggestions
 * with no hit are skipped.
 */
export async function resolveSeedTracks(
    context: CatalogStageContext,
    suggestions: readonly TrackSuggestion[],
    limit = context.settings.seedLimit,
    source: TrackSource = "llm_seed"
): Promise<ResolvedTrack[]> {
    const { catalog, settings } = context;
    const log = context.log ?? noopTrace;
    const market = settings.market;
    const resolved: ResolvedTrack[] = [];

    const scopedSearch = async (query: string, label: string): Promise<CatalogTrack[]> => {
        log(`Catalog search track${label}: q="${query}", limit=${RESOLVE_SEARCH_LIMIT}, market=${market}`);
        const hits = await catalogAttempt(log, `Catalog search for '${query}'`, [], () =>
            catalog.searchTracks(query, { limit: RESOLVE_SEARCH_LIMIT, market })
        );
        return applyLatinPolicy(settings, filterByMarket(hits, market));
    };

    for (const suggestion of suggestions) {
        if (resolved.length >= limit) {
            break;
        }

        const title = suggestion.title.trim();
        const artist = suggestion.artist.trim();
        if (!title) {
            continue;
        }

        const query = artist ? `track:"${title}" artist:"${artist}"` : `track:"${title}"`;
        let tracks = await scopedSearch(query, "");

        const primaryArtist = primaryArtistHint(artist);
        if (tracks.length === 0 && primaryArtist && primaryArtist !== artist) {
            tracks = await scopedSearch(
                `track:"${title}" artist:"${primaryArtist}"`,
                " (primary artist)"
            );
        }

        if (tracks.length === 0) {
            log(`Catalog search track (no market): q="${query}", limit=${RESOLVE_SEARCH_LIMIT}`);
            const hits = await catalogAttempt(
                log,
                `Catalog search retry without market for '${query}'`,
                [],
                () => catalog.searchTracks(query, { limit: RESOLVE_SEARCH_LIMIT })
            );
            tracks = applyLatinPolicy(settings, hits);
        }

        if (tracks.length === 0) {
            log(`No search results found for '${title}' (${artist}).`);
            continue;
        }

        resolved.push(toResolvedTrack(tracks[0], source));
    }

    log(`Resolved ${resolved.length} seed tracks via catalog search.`);
    return resolved;
}

export interface PlaylistMiningOptions {
    playlistLimit?: number;
    trackLimit?: number;
}

function playlistQueries(canonicalGenre: string): string[] {
    const label = canonicalGenre.replace(/-/g, " ").trim() || "popular";
    return [`${label} hits`, `top ${label}`, `best of ${label}`, `${label} mix`];
}

/**
 * Harvest candidate tracks from community playlists about `canonicalGenre`.
 * Playlists owned by the catalog vendor are skipped; tracks are unique by id.
 */
export async function discoverPlaylistSeeds(
    context: CatalogStageContext,
    canonicalGenre: string,
    options: PlaylistMiningOptions = {}
): Promise<CatalogTrack[]> {
    const { catalog, settings } = context;
    const log = context.log ?? noopTrace;
    const playlistLimit = options.playlistLimit ?? 3;
    const trackLimit = options.trackLimit ?? 40;
    const market = settings.market;

    const playlists: CatalogPlaylist[] = [];
    const seenPlaylists = new Set<string>();
    for (const query of playlistQueries(canonicalGenre)) {
        if (playlists.length >= playlistLimit) {
            break;
        }
        log(`Catalog search playlists: q='${query}', limit=${playlistLimit}`);
        const found = await catalogAttempt(log, "Catalog playlist search", [], () =>
            catalog.searchPlaylists(query, { limit: playlistLimit })
        );
        for (const playlist of found) {
            const owner = playlist.owner?.id ?? "";
            if (owner.toLowerCase() === CATALOG_OWNER_ID || seenPlaylists.has(playlist.id)) {
                continue;
            }
            seenPlaylists.add(playlist.id);
            playlists.push(playlist);
            if (playlists.length >= playlistLimit) {
                break;
            }
        }
    }

    const collected: CatalogTrack[] = [];
    const seenTracks = new Set<string>();
    for (const playlist of playlists) {
        log(
            `Catalog playlist items: playlist_id=${playlist.id}, limit=${trackLimit}, market=${market}`
        );
        let items: CatalogTrack[];
        try {
            items = await catalog.getPlaylistItems(playlist.id, { limit: trackLimit, market });
        } catch {
            items = await catalogAttempt(
                log,
                `Fetching playlist items for '${playlist.id}'`,
                [],
                () => catalog.getPlaylistItems(playlist.id, { limit: trackLimit })
            );
        }

        for (const track of items) {
            if (seenTracks.has(track.id)) {
                continue;
            }
            seenTracks.add(track.id);
            collected.push(track);
        }
    }

    log(`Collected ${collected.length} tracks from playlists for genre '${canonicalGenre}'.`);
    return collected;
}

async function filterForGenre(
    context: CatalogStageContext,
    tracks: CatalogTrack[],
    canonicalGenre: string
): Promise<CatalogTrack[]> {
    const { catalog, settings } = context;
    const filtered = await filterTracksByArtistGenre(tracks, canonicalGenre, {
        lookupArtists: (ids) => catalog.getArtists(ids),
        popularityThreshold: popularityThresholdForGenre(settings, canonicalGenre),
        lookupConcurrency: settings.catalogConcurrency,
        log: context.log,
    });
    return applyLatinPolicy(settings, filtered).sort(byPopularityDesc);
}

export interface GenreDiscoveryOptions {
    seedLimit?: number;
    searchLimit?: number;
}

/**
 * Bootstrap seeds for a genre: community playlists first, then a direct
 * `genre:"..."` search when the playlists come up short.
 */
export async function discoverTopTracksForGenre(
    context: CatalogStageContext,
    attributes: Pick<PlaylistAttributes, "genre">,
    options: GenreDiscoveryOptions = {}
): Promise<ResolvedTrack[]> {
    const { catalog, settings } = context;
    const log = context.log ?? noopTrace;
    const seedLimit = options.seedLimit ?? settings.seedLimit;
    const searchLimit = options.searchLimit ?? 50;
    const market = settings.market;
    const canonicalGenre = normalizeGenre(attributes.genre || "pop");

    const selected: ResolvedTrack[] = [];
    const selectedIds = new Set<string>();
    const collect = (tracks: readonly CatalogTrack[]): void => {
        for (const track of tracks) {
            if (selected.length >= seedLimit) {
                break;
            }
            if (selectedIds.has(track.id)) {
                continue;
            }
            selectedIds.add(track.id);
            selected.push(toResolvedTrack(track, "genre_discovery"));
        }
    };

    const mined = await discoverPlaylistSeeds(context, canonicalGenre);
    const playlistTracks = await filterForGenre(context, mined, canonicalGenre);
    if (playlistTracks.length > 0) {
        log(`Playlist seed sample: ${JSON.stringify(playlistTracks.slice(0, 5).map((t) => t.name))}`);
    }
    collect(playlistTracks);

    if (selected.length < seedLimit) {
        const query = `genre:"${canonicalGenre}"`;
        log(`Catalog search tracks (genre seed): q='${query}', limit=${searchLimit}, market=${market}`);
        let tracks = await catalogAttempt(log, "Catalog search for genre seeds", [], async () =>
            filterByMarket(await catalog.searchTracks(query, { limit: searchLimit, market }), market)
        );

        if (tracks.length === 0) {
            log(`Catalog search tracks (no market): q='${query}', limit=${searchLimit}`);
            tracks = await catalogAttempt(log, "Catalog search without market", [], () =>
                catalog.searchTracks(query, { limit: searchLimit })
            );
        }

        if (tracks.length > 0) {
            const searchTracks = await filterForGenre(context, tracks, canonicalGenre);
            if (searchTracks.length > 0) {
                log(`Search seed sample: ${JSON.stringify(searchTracks.slice(0, 5).map((t) => t.name))}`);
            }
            collect(searchTracks);
        }
    }

    log(`Discovered ${selected.length} top tracks for genre '${canonicalGenre}'.`);
    return selected;
}

export interface ArtistSeed {
    artistId: string;
    artistName: string;
    tracks: ResolvedTrack[];
    source: Extract<TrackSource, "profile_cache" | "artist_top_tracks">;
}

/**
 * Seed tracks for an artist named in the prompt: cached listening history
 * first, the artist's catalog top tracks otherwise. Null when the artist
 * cannot be resolved or has no tracks.
 */
export async function ensureArtistSeed(
    context: CatalogStageContext,
    artistHint: string,
    profile: ProfileCache | null
): Promise<ArtistSeed | null> {
    const { catalog, settings } = context;
    const log = context.log ?? noopTrace;
    if (!artistHint) {
        return null;
    }

    let artistId = cachedArtistIdForHint(profile, artistHint);
    let artistName = artistId && profile ? ownEntry(profile.artists, artistId)?.name ?? "" : "";

    if (!artistId) {
        const query = `artist:"${artistHint}"`;
        const candidates = await catalogAttempt(
            log,
            `Catalog artist search for '${artistHint}'`,
            [],
            () => catalog.searchArtists(query, { limit: ARTIST_SEARCH_LIMIT })
        );
        const hintKey = normalizeArtistKey(artistHint);
        const match =
            candidates.find((candidate) => {
                const candidateKey = normalizeArtistKey(candidate.name);
                return candidateKey === hintKey || candidateKey.includes(hintKey);
            }) ?? candidates[0];
        if (match) {
            artistId = match.id;
            artistName = match.name;
        }
    }

    if (!artistId) {
        log(`Unable to resolve artist for hint '${artistHint}'.`);
        return null;
    }
    const displayName = artistName || artistHint;

    const cachedTracks = cachedTracksForArtist(profile, artistId, settings.seedLimit);
    if (cachedTracks.length > 0) {
        log(`Using ${cachedTracks.length} cached tracks for artist '${displayName}'.`);
        return {
            artistId,
            artistName: displayName,
            tracks: cachedTracks.map((track) => ({ ...track, seedSource: "profile_cache" })),
            source: "profile_cache",
        };
    }

    const resolvedId = artistId;
    const topTracks = await catalogAttempt(
        log,
        `Catalog top tracks for artist '${resolvedId}'`,
        [],
        () => catalog.getArtistTopTracks(resolvedId, settings.market)
    );

    const tracks: ResolvedTrack[] = [];
    const seen = new Set<string>();
    for (const track of topTracks) {
        if (tracks.length >= settings.seedLimit) {
            break;
        }
        if (seen.has(track.id)) {
            continue;
        }
        seen.add(track.id);
        tracks.push(toResolvedTrack(track, "artist_top_tracks"));
    }

    if (tracks.length === 0) {
        log(`No top tracks returned for artist '${resolvedId}'.`);
        return null;
    }

    log(`Collected ${tracks.length} top tracks for artist '${displayName}'.`);
    return { artistId, artistName: displayName, tracks, source: "artist_top_tracks" };
}
