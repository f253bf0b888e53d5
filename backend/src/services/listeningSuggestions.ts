import {
    GenerationStatStore,
    getGenreBreakdown,
    summarizeGenerationStats,
} from "./generationStats";
import { formatGenreLabel } from "./genreNormalizer";
import { artistPlayCount, ProfileCache, topProfileGenres } from "./profileCache";

const DEFAULT_MAX_PROMPTS = 9;
const TOP_ARTIST_LIMIT = 4;
const NOVELTY_DISCOVERY_THRESHOLD = 70;

export interface ListeningSuggestionOptions {
    maxPrompts?: number;
    genreSampleSize?: number;
    historyLimit?: number;
}

/** Trimmed, non-empty labels with case-insensitive duplicates removed. */
function uniqueLabels(labels: Iterable<string>): string[] {
    const seen = new Set<string>();
    const unique: string[] = [];
    for (const raw of labels) {
        const label = raw.trim();
        const key = label.toLowerCase();
        if (label && !seen.has(key)) {
            seen.add(key);
            unique.push(label);
        }
    }
    return unique;
}

function topProfileArtists(profile: ProfileCache | null, limit = TOP_ARTIST_LIMIT): string[] {
    if (!profile) {
        return [];
    }
    const ranked = Object.entries(profile.artists)
        .map(([id, artist]) => ({ name: artist.name, plays: artistPlayCount(profile, id) }))
        .sort((a, b) => b.plays - a.plays)
        .map((entry) => entry.name);
    return uniqueLabels(ranked).slice(0, limit);
}

/**
 * Short prompt ideas for the dashboard, drawn from recent generation history
 * and the cached listening profile. Empty when there is nothing to go on.
 */
export async function generateListeningSuggestions(
    stats: GenerationStatStore,
    userIdentifier: string,
    profile: ProfileCache | null,
    options: ListeningSuggestionOptions = {}
): Promise<string[]> {
    if (!userIdentifier) {
        return [];
    }
    const maxPrompts = options.maxPrompts ?? DEFAULT_MAX_PROMPTS;

    const [summary, breakdown] = await Promise.all([
        summarizeGenerationStats(stats, userIdentifier, options.historyLimit ?? 200),
        getGenreBreakdown(stats, userIdentifier, options.genreSampleSize ?? 25),
    ]);
    const genres = uniqueLabels(
        [
            ...breakdown.map((entry) => entry.genre),
            summary.topGenre,
            ...topProfileGenres(profile),
        ].map(formatGenreLabel)
    );
    const artists = topProfileArtists(profile);
    const hasHistory = summary.totalPlaylists > 0 || profile !== null;
    if (genres.length === 0 && artists.length === 0 && !hasHistory) {
        return [];
    }

    const prompts: string[] = [];
    const seen = new Set<string>();
    const add = (prompt: string): void => {
        const normalized = prompt.trim();
        const key = normalized.toLowerCase();
        if (prompts.length >= maxPrompts || !normalized || seen.has(key)) {
            return;
        }
        seen.add(key);
        prompts.push(normalized);
    };

    genres.slice(0, 3).forEach((genre) => add(`My go-to ${genre} tracks lately`));
    if (genres.length >= 2) {
        add(`Blend ${genres[0]} and ${genres[1]} like my recent listening`);
    }
    if (genres.length >= 3) {
        add(`Chill ${genres[2]} session inspired by my stats`);
    }

    for (const artist of artists.slice(0, 3)) {
        add(`Something like ${artist} with fresh finds`);
        add(`Deep cuts inspired by ${artist}`);
    }
    if (genres.length > 0 && artists.length > 0) {
        add(`${genres[0]} vibes featuring ${artists[0]} influences`);
    }

    if (profile?.source === "recently_played") {
        add("Replay my recent listens with new discoveries");
    } else if (profile?.source === "top_tracks") {
        add("High-energy mix from my top tracks");
    }

    if (summary.avgNovelty !== null) {
        add(
            summary.avgNovelty < NOVELTY_DISCOVERY_THRESHOLD
                ? "Blend familiar favorites with deeper cuts I've missed"
                : "Keep the discovery streak from my recent playlists"
        );
    } else if (summary.totalPlaylists > 0) {
        add("Remix what I've been generating lately");
    }

    return prompts.slice(0, maxPrompts);
}
