import { z } from "zod";
import fallbackSeedData from "../data/fallbackSeeds.json";
import { noopTrace, TraceLog } from "../utils/pipelineTrace";
import { isRecord, parseJsonResponse } from "./llmResponse";
import type { LlmDispatcher } from "./llmClient";
import { ownEntry } from "./profileCache";
import { PlaylistAttributes, TrackSuggestion } from "./recommenderTypes";
import { DefaultAttributes } from "./recommenderSettings";

/**
 * Prompt builders and reply interpreters for the language model.
 *
 * None of these throw on a bad or missing reply: each documents the fallback
 * it returns instead.
 */

const REMIX_SNAPSHOT_LIMIT = 25;
const SNIPPET_LENGTH = 400;
const SUGGESTION_WRAPPER_KEYS = ["tracks", "playlist", "songs"] as const;
const LIST_MARKER = /^(?:[-*•]\s+|\d+[.)]\s+)/;

const suggestionSchema = z.object({
    title: z.string().min(1),
    artist: z.string(),
});

const fallbackSeedsSchema = z.object({
    genres: z.record(z.array(suggestionSchema)),
    default: z.array(suggestionSchema).min(1),
});

export type FallbackSeeds = z.infer<typeof fallbackSeedsSchema>;

export const builtInFallbackSeeds: FallbackSeeds = fallbackSeedsSchema.parse(fallbackSeedData);

function snippet(response: string, length = SNIPPET_LENGTH): string {
    return response.length <= length ? response : `${response.slice(0, length - 3)}...`;
}

function describeAttributes(attributes: Pick<PlaylistAttributes, "mood" | "genre" | "energy">): string {
    return JSON.stringify({
        mood: attributes.mood,
        genre: attributes.genre,
        energy: attributes.energy,
    });
}

function scalarText(value: unknown): string {
    if (typeof value === "string") {
        return value.trim();
    }
    if (typeof value === "number") {
        return String(value);
    }
    return "";
}

function splitDisplay(entry: string): TrackSuggestion {
    const separator = entry.indexOf(" - ");
    if (separator === -1) {
        return { title: entry, artist: "" };
    }
    return {
        title: entry.slice(0, separator),
        artist: entry.slice(separator + 3),
    };
}

function suggestionFromItem(item: unknown): TrackSuggestion | null {
    if (typeof item === "string") {
        return splitDisplay(item);
    }
    if (!isRecord(item)) {
        return null;
    }

    const title = scalarText(item.title) || scalarText(item.song) || scalarText(item.name);
    if (!title) {
        return null;
    }
    const rawArtist = item.artist || item.artists || item.singer;
    const artist = Array.isArray(rawArtist)
        ? rawArtist.map((part) => String(part)).join(", ")
        : scalarText(rawArtist);
    return { title, artist };
}

/**
 * Suggestion list from a parsed reply, or null when the reply is not a list
 * (directly or under a known wrapper key).
 */
function suggestionItems(value: unknown): TrackSuggestion[] | null {
    let list = value;
    if (isRecord(value)) {
        const key = SUGGESTION_WRAPPER_KEYS.find((candidate) => candidate in value);
        list = key ? value[key] : value;
    }
    if (!Array.isArray(list)) {
        return null;
    }

    const suggestions: TrackSuggestion[] = [];
    for (const item of list) {
        const suggestion = suggestionFromItem(item);
        if (suggestion) {
            suggestions.push(suggestion);
        }
    }
    return suggestions;
}

function suggestionsFromLines(
    response: string,
    options: { allowTitleOnly: boolean }
): TrackSuggestion[] {
    const suggestions: TrackSuggestion[] = [];
    for (const rawLine of response.split(/\r?\n/)) {
        const line = rawLine.trim().replace(LIST_MARKER, "");
        if (!line) {
            continue;
        }
        if (!line.includes(" - ") && !options.allowTitleOnly) {
            continue;
        }
        suggestions.push(splitDisplay(line));
    }
    return suggestions;
}

function interpretSuggestions(
    response: string,
    options: { allowTitleOnly: boolean }
): TrackSuggestion[] {
    const parsed = parseJsonResponse(response);
    if (parsed.kind === "empty") {
        return [];
    }
    if (parsed.kind === "ok") {
        const items = suggestionItems(parsed.value);
        if (items) {
            return items;
        }
    }
    return suggestionsFromLines(response, options);
}

function cleanSuggestion(suggestion: TrackSuggestion): TrackSuggestion | null {
    const title = suggestion.title.trim();
    if (!title) {
        return null;
    }
    return { title, artist: suggestion.artist.trim() };
}

export function defaultPlaylistAttributes(defaults: DefaultAttributes): PlaylistAttributes {
    return {
        mood: defaults.mood,
        genre: defaults.genre,
        energy: defaults.energy,
        artist: "",
        artists: [],
    };
}

export interface PromptStageOptions {
    log?: TraceLog;
}

/**
 * Ask the model for mood/genre/energy (and any named artists) in `prompt`.
 * Missing fields take `defaults`; an empty or unparsable reply returns the
 * defaults outright.
 */
export async function extractAttributes(
    llm: LlmDispatcher,
    prompt: string,
    defaults: DefaultAttributes,
    options: PromptStageOptions = {}
): Promise<PlaylistAttributes> {
    const log = options.log ?? noopTrace;
    const query =
        "Extract the mood, genre, energy level, and any explicitly referenced primary artists " +
        "or bands from this playlist request. Respond with JSON containing the keys " +
        "`mood`, `genre`, and `energy`, plus optional `artist` (string) and `artists` " +
        "(array of strings) when specific performers are mentioned. " +
        "If no artist is present, set those fields to null or an empty list. " +
        `Request: ${prompt}`;
    log(`LLM prompt (attribute extraction): ${query}`);

    const response = await llm.dispatch(query);
    log(`LLM raw response (attributes): ${snippet(response, 300)}`);

    const parsed = parseJsonResponse(response);
    if (parsed.kind === "empty") {
        log("LLM attribute extraction failed; using default attributes.");
        return defaultPlaylistAttributes(defaults);
    }
    if (parsed.kind === "malformed" || !isRecord(parsed.value)) {
        log("Failed to parse LLM attribute response; using defaults.");
        return defaultPlaylistAttributes(defaults);
    }

    const lowered = new Map<string, unknown>();
    for (const [key, value] of Object.entries(parsed.value)) {
        lowered.set(key.toLowerCase(), value);
    }
    const pick = (...keys: string[]): string => {
        for (const key of keys) {
            const value = scalarText(lowered.get(key));
            if (value) {
                return value;
            }
        }
        return "";
    };

    let artistHint: unknown = lowered.get("artist") || lowered.get("primary_artist");
    if (Array.isArray(artistHint)) {
        artistHint = artistHint[0];
    }
    const artist = scalarText(artistHint);

    const artistsField = lowered.get("artists") || lowered.get("artist_list");
    const artists: string[] = [];
    if (typeof artistsField === "string" && artistsField.trim()) {
        artists.push(artistsField.trim());
    } else if (Array.isArray(artistsField)) {
        for (const entry of artistsField) {
            const name = scalarText(entry);
            if (name) {
                artists.push(name);
            }
        }
    }
    if (artist && !artists.some((name) => name.toLowerCase() === artist.toLowerCase())) {
        artists.unshift(artist);
    }

    const attributes: PlaylistAttributes = {
        mood: pick("mood") || defaults.mood,
        genre: pick("genre", "music_genre") || defaults.genre,
        energy: pick("energy", "energy_level", "energylevel") || defaults.energy,
        artist,
        artists,
    };
    log(`LLM parsed attributes: ${JSON.stringify(attributes)}`);
    return attributes;
}

export function fallbackSuggestions(
    genre: string,
    maxSuggestions: number,
    seeds: FallbackSeeds = builtInFallbackSeeds
): TrackSuggestion[] {
    const key = genre.toLowerCase().replace(/-/g, " ").trim();
    const pool = ownEntry(seeds.genres, key) ?? seeds.default;
    return pool.slice(0, Math.max(1, maxSuggestions)).map((entry) => ({ ...entry }));
}

export interface SeedSuggestionOptions extends PromptStageOptions {
    maxSuggestions?: number;
    fallbackSeeds?: FallbackSeeds;
}

/**
 * Ask the model for seed songs fitting the request. Never returns an empty
 * list: without usable suggestions the built-in genre fallbacks are used.
 */
export async function suggestSeedTracks(
    llm: LlmDispatcher,
    prompt: string,
    attributes: PlaylistAttributes,
    options: SeedSuggestionOptions = {}
): Promise<TrackSuggestion[]> {
    const log = options.log ?? noopTrace;
    const cap = Math.max(1, Math.trunc(options.maxSuggestions ?? 5));
    const query =
        "You are selecting seed songs for a Spotify playlist.\n" +
        `Playlist request: "${prompt}"\n` +
        `Extracted attributes: ${describeAttributes(attributes)}\n` +
        `Return a JSON array with at most ${cap} objects, each containing the keys ` +
        '"title" and "artist". Choose well-known songs that fit the mood/genre/' +
        "energy and are likely available on Spotify.";
    log(`LLM prompt (seed suggestions): ${query}`);

    const response = await llm.dispatch(query);
    log(`LLM raw response (seed suggestions): ${snippet(response)}`);

    const suggestions: TrackSuggestion[] = [];
    for (const candidate of interpretSuggestions(response, { allowTitleOnly: false })) {
        const cleaned = cleanSuggestion(candidate);
        if (cleaned) {
            suggestions.push(cleaned);
        }
    }

    if (suggestions.length > 0) {
        const accepted = suggestions.slice(0, cap);
        log(`LLM parsed seed suggestions: ${JSON.stringify(accepted)}`);
        return accepted;
    }

    log("LLM seed suggestions unavailable; will rely on catalog fallback.");
    const fallback = fallbackSuggestions(attributes.genre, cap, options.fallbackSeeds);
    log(`Provided fallback seed suggestions for genre '${attributes.genre || "default"}'.`);
    return fallback;
}

export interface RemixSuggestionOptions extends PromptStageOptions {
    prompt: string;
    targetCount: number;
}

/**
 * Ask the model to refresh an existing playlist (given as "Title - Artist"
 * lines). Short replies are padded from the existing tracks, so a dead model
 * degrades the remix to a no-op.
 */
export async function suggestRemixTracks(
    llm: LlmDispatcher,
    existingTracks: readonly string[],
    attributes: PlaylistAttributes,
    options: RemixSuggestionOptions
): Promise<TrackSuggestion[]> {
    const log = options.log ?? noopTrace;
    const desired = Math.max(Math.trunc(options.targetCount), 0);
    if (desired === 0) {
        return [];
    }

    const uniqueExisting: string[] = [];
    const seenExisting = new Set<string>();
    for (const entry of existingTracks) {
        const normalized = entry.trim();
        const lowered = normalized.toLowerCase();
        if (!normalized || seenExisting.has(lowered)) {
            continue;
        }
        seenExisting.add(lowered);
        uniqueExisting.push(normalized);
    }

    const snapshotLimit = Math.max(1, Math.min(desired, REMIX_SNAPSHOT_LIMIT));
    const snapshot = uniqueExisting.slice(0, snapshotLimit);
    const numbered = (snapshot.length > 0 ? snapshot : ["(playlist currently empty)"])
        .map((entry, index) => `${index + 1}. ${entry}`)
        .join("\n");

    const query =
        "You are refreshing an existing Spotify playlist for a user.\n" +
        `Original request: "${options.prompt || "Unnamed playlist request"}"\n` +
        `Target attributes: ${describeAttributes(attributes)}\n` +
        "Current playlist tracks:\n" +
        `${numbered}\n\n` +
        `Remix the playlist by returning exactly ${desired} songs that match the same mood, ` +
        "genre, and energy. You may keep some of the existing songs, but avoid duplicates " +
        "overall and ensure the list feels refreshed. Return a JSON array where each object " +
        'contains the keys "title" and "artist". Prefer well-known tracks that are likely ' +
        "available on Spotify.";
    log(`LLM prompt (remix suggestions): ${query}`);

    const response = await llm.dispatch(query);
    log(`LLM raw response (remix suggestions): ${snippet(response)}`);

    const suggestions: TrackSuggestion[] = [];
    const seenPairs = new Set<string>();
    const add = (candidate: TrackSuggestion): void => {
        const cleaned = cleanSuggestion(candidate);
        if (!cleaned) {
            return;
        }
        const key = `${cleaned.title.toLowerCase()}\u0000${cleaned.artist.toLowerCase()}`;
        if (seenPairs.has(key)) {
            return;
        }
        seenPairs.add(key);
        suggestions.push(cleaned);
    };

    interpretSuggestions(response, { allowTitleOnly: true }).forEach(add);

    if (suggestions.length < desired) {
        log("LLM remix suggestions insufficient; filling with existing playlist tracks.");
        for (const entry of uniqueExisting) {
            if (suggestions.length >= desired) {
                break;
            }
            add(splitDisplay(entry));
        }
    }

    if (suggestions.length === 0) {
        log("Remix suggestions unavailable; returning empty list.");
    } else {
        log(`LLM parsed remix suggestions: ${JSON.stringify(suggestions.slice(0, 5))}`);
    }

    return suggestions.slice(0, desired);
}

/**
 * Ask for five more widely known songs and append the lines not already in
 * `seedTracks` (exact, case-sensitive match).
 */
export async function refinePlaylist(
    llm: LlmDispatcher,
    seedTracks: readonly string[],
    attributes: PlaylistAttributes,
    options: PromptStageOptions = {}
): Promise<string[]> {
    const log = options.log ?? noopTrace;
    const query =
        `Given these seed tracks: ${seedTracks.join("\n")}, and attributes ${describeAttributes(attributes)}, ` +
        "recommend 5 additional widely known songs that are available on Spotify. " +
        "Return each song on a new line and prefer artists that match the requested genre.";
    log(`LLM prompt (playlist refinement): ${query}`);

    const response = await llm.dispatch(query);
    log(`LLM raw response (refinement): ${snippet(response)}`);

    if (!response) {
        log("LLM refinement returned no response; using seed tracks only.");
        return [...seedTracks];
    }

    const known = new Set(seedTracks);
    const additions: string[] = [];
    for (const rawLine of response.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || known.has(line)) {
            continue;
        }
        known.add(line);
        additions.push(line);
    }
    log(`LLM suggested additions: ${JSON.stringify(additions)}`);
    return [...seedTracks, ...additions];
}
