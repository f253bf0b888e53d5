import { mapChunksSettled } from "../utils/async";
import { describeError } from "../utils/errors";
import { noopTrace, TraceLog } from "../utils/pipelineTrace";
import { CatalogArtist, CatalogTrack, catalogArtistIds } from "./catalogTracks";

/** Maximum ids accepted by the catalog's several-artists endpoint. */
export const ARTIST_LOOKUP_BATCH_SIZE = 50;

function stripToAscii(value: string): string {
    return value.normalize("NFKD").replace(/[^\x00-\x7F]/g, "");
}

/**
 * Lowercase, ascii-only, hyphenated genre token: "Synth Pop" -> "synth-pop".
 */
export function normalizeGenre(raw: string): string {
    if (!raw) {
        return "";
    }
    return stripToAscii(raw).trim().toLowerCase().replace(/ /g, "-");
}

/**
 * Alphanumeric-only key used for fuzzy artist name comparisons.
 */
export function normalizeArtistKey(name: string): string {
    if (!name) {
        return "";
    }
    return stripToAscii(name).toLowerCase().replace(/[^a-z0-9]/g, "");
}

/** Capitalize the first letter of every run of letters: "lo-fi beats" -> "Lo-Fi Beats". */
export function titleCase(text: string): string {
    return text
        .toLowerCase()
        .replace(/(^|[^a-z])([a-z])/g, (_match, lead: string, letter: string) => lead + letter.toUpperCase());
}

/** Display label for a stored genre key: "indie-rock" -> "Indie Rock". */
export function formatGenreLabel(genre: string): string {
    return titleCase(genre.replace(/-/g, " ").trim());
}

/**
 * Equivalent spellings of a canonical genre, including irregular aliases.
 */
export function genreAliases(canonical: string): Set<string> {
    if (!canonical) {
        return new Set();
    }

    const spaced = canonical.replace(/-/g, " ");
    const compact = spaced.replace(/ /g, "");
    const variants = new Set([canonical, spaced, compact]);

    if (canonical.endsWith("-music")) {
        variants.add(canonical.slice(0, -"-music".length));
    }
    if (canonical === "r-b" || canonical === "r&b") {
        variants.add("r&b");
        variants.add("rb");
        variants.add("r-b");
    }
    if (canonical === "hip-hop") {
        variants.add("hiphop");
    }

    variants.delete("");
    return variants;
}

/**
 * Does a catalog artist genre tag describe the canonical genre (or an alias)?
 */
export function genreTagMatches(
    tag: string,
    canonicalGenre: string,
    aliases: ReadonlySet<string> = genreAliases(canonicalGenre)
): boolean {
    const lowered = tag.toLowerCase();
    const squashed = lowered.replace(/[ -]/g, "");
    const target = canonicalGenre.replace(/-/g, "");

    if (target && squashed.includes(target)) {
        return true;
    }
    for (const alias of aliases) {
        if (alias === lowered || alias === squashed || squashed.includes(alias)) {
            return true;
        }
    }
    return false;
}

export function filterByMarket<T extends Pick<CatalogTrack, "available_markets">>(
    tracks: readonly T[],
    market: string
): T[] {
    return tracks.filter((track) => {
        const markets = track.available_markets;
        return !markets || markets.length === 0 || markets.includes(market);
    });
}

const LETTER = /\p{L}/u;
const LATIN_LETTER = /\p{Script=Latin}/u;

/**
 * True when at least `threshold` of the alphabetic characters are Latin
 * script. Text without letters counts as Latin.
 */
export function isMostlyLatinScript(text: string, threshold = 0.4): boolean {
    if (!text) {
        return true;
    }

    let letters = 0;
    let latin = 0;
    for (const char of text) {
        if (!LETTER.test(char)) {
            continue;
        }
        letters += 1;
        if (LATIN_LETTER.test(char)) {
            latin += 1;
        }
    }

    if (letters === 0) {
        return true;
    }
    return latin / letters >= threshold;
}

export function filterNonLatinTracks<T extends { name: string }>(
    tracks: readonly T[],
    threshold = 0.4
): T[] {
    return tracks.filter((track) => isMostlyLatinScript(track.name, threshold));
}

export interface ArtistGenreFilterOptions {
    lookupArtists: (ids: string[]) => Promise<CatalogArtist[]>;
    popularityThreshold: number;
    lookupConcurrency?: number;
    log?: TraceLog;
}

/**
 * Keep tracks that meet the popularity floor and whose artists carry a genre
 * tag matching `canonicalGenre`.
 *
 * Fails open: when no artist genres could be fetched, or when filtering would
 * drop every track, the input is returned unchanged.
 */
export async function filterTracksByArtistGenre(
    tracks: readonly CatalogTrack[],
    canonicalGenre: string,
    options: ArtistGenreFilterOptions
): Promise<CatalogTrack[]> {
    const log = options.log ?? noopTrace;
    if (tracks.length === 0) {
        return [];
    }

    const artistIdsByTrack = new Map<string, string[]>();
    const uniqueArtistIds = new Set<string>();
    for (const track of tracks) {
        const ids = catalogArtistIds(track);
        if (ids.length > 0) {
            artistIdsByTrack.set(track.id, ids);
            ids.forEach((id) => uniqueArtistIds.add(id));
        }
    }

    if (uniqueArtistIds.size === 0) {
        return [...tracks];
    }

    const outcomes = await mapChunksSettled(
        [...uniqueArtistIds],
        ARTIST_LOOKUP_BATCH_SIZE,
        options.lookupArtists,
        options.lookupConcurrency
    );

    const genresByArtist = new Map<string, string[]>();
    for (const outcome of outcomes) {
        if (!outcome.ok) {
            log(`Failed to fetch artist genres: ${describeError(outcome.error)}.`);
            continue;
        }
        for (const artist of outcome.value) {
            genresByArtist.set(artist.id, artist.genres);
        }
    }

    if (genresByArtist.size === 0) {
        return [...tracks];
    }

    const aliases = genreAliases(canonicalGenre);
    const filtered = tracks.filter((track) => {
        if ((track.popularity ?? 0) < options.popularityThreshold) {
            return false;
        }
        const artistIds = artistIdsByTrack.get(track.id) ?? [];
        return artistIds.some((artistId) =>
            (genresByArtist.get(artistId) ?? []).some((tag) =>
                genreTagMatches(tag, canonicalGenre, aliases)
            )
        );
    });

    log(
        `Filtered tracks by artist genre '${canonicalGenre}': ${filtered.length} remaining.`
    );

    return filtered.length > 0 ? filtered : [...tracks];
}
