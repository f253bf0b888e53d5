/**
 * Tunable policy for the playlist pipeline.
 *
 * Settings are immutable values built per process (or per test) and handed to
 * the generator explicitly; nothing in the pipeline reads module-level defaults.
 */

import { ownEntry } from "./profileCache";

export interface DefaultAttributes {
    readonly mood: string;
    readonly genre: string;
    readonly energy: string;
}

export interface RecommenderSettings {
    readonly defaultAttributes: DefaultAttributes;
    readonly market: string;
    readonly seedLimit: number;
    readonly similarLimit: number;
    readonly maxSuggestions: number;
    readonly cacheTtlSeconds: number;
    readonly statsHighlightCount: number;
    readonly popularityThreshold: number;
    readonly genrePopularityOverrides: Readonly<Record<string, number>>;
    readonly requireLatin: boolean;
    readonly latinThreshold: number;
    readonly playlistNamePrefix: string;
    readonly playlistPublic: boolean;
    readonly statsHistoryLimit: number;
    readonly genreBreakdownSampleSize: number;
    /** Artist lookup batches allowed in flight at once. */
    readonly catalogConcurrency: number;
    /** Floors an AI-suggested artist must clear before it is shown. */
    readonly artistMinFollowers: number;
    readonly artistMinPopularity: number;
}

export const DEFAULT_GENRE_POPULARITY_OVERRIDES: Readonly<Record<string, number>> = {
    ambient: 25,
    "lo-fi": 25,
    lofi: 25,
    jazz: 30,
    classical: 30,
    folk: 35,
    "singer-songwriter": 35,
};

export type RecommenderSettingsOverrides = Partial<
    Omit<RecommenderSettings, "defaultAttributes">
> & {
    defaultAttributes?: Partial<DefaultAttributes>;
};

export function createRecommenderSettings(
    overrides: RecommenderSettingsOverrides = {}
): RecommenderSettings {
    const { defaultAttributes, genrePopularityOverrides, ...rest } = overrides;

    return Object.freeze({
        market: "US",
        seedLimit: 5,
        similarLimit: 10,
        maxSuggestions: 5,
        cacheTtlSeconds: 15 * 60,
        statsHighlightCount: 5,
        popularityThreshold: 45,
        requireLatin: false,
        latinThreshold: 0.4,
        playlistNamePrefix: "",
        playlistPublic: false,
        statsHistoryLimit: 200,
        genreBreakdownSampleSize: 25,
        catalogConcurrency: 2,
        artistMinFollowers: 1000,
        artistMinPopularity: 15,
        ...rest,
        genrePopularityOverrides: Object.freeze({
            ...DEFAULT_GENRE_POPULARITY_OVERRIDES,
            ...genrePopularityOverrides,
        }),
        defaultAttributes: Object.freeze({
            mood: "chill",
            genre: "pop",
            energy: "medium",
            ...defaultAttributes,
        }),
    });
}

export function popularityThresholdForGenre(
    settings: Pick<RecommenderSettings, "popularityThreshold" | "genrePopularityOverrides">,
    canonicalGenre: string
): number {
    return ownEntry(settings.genrePopularityOverrides, canonicalGenre) ?? settings.popularityThreshold;
}
