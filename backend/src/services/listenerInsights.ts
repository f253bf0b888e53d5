import { createLogger } from "../utils/logger";
import { describeError } from "../utils/errors";
import { discoverArtists } from "./artistDiscovery";
import { ArtistCard, DEFAULT_RECOMMENDATION_LIMIT, recommendArtistsFromProfile } from "./artistRecommendations";
import type { GenerationStatStore } from "./generationStats";
import { generateListeningSuggestions } from "./listeningSuggestions";
import type { LlmDispatcher } from "./llmClient";
import { ProfileCache, ProfileCacheSource } from "./profileCache";
import type { RecommenderSettings } from "./recommenderSettings";
import type { CatalogClientFactory } from "./spotifyCatalog";

const logger = createLogger("listener-insights");

export const DISCOVERY_LIMIT = 8;
const MAX_CARD_LIMIT = 50;

export interface ListenerInsightsDeps {
    llm: LlmDispatcher;
    catalogFactory: CatalogClientFactory;
    profiles: ProfileCacheSource;
    stats: GenerationStatStore;
    settings: RecommenderSettings;
    random?: () => number;
}

export interface ArtistDiscoveryRequest {
    userIdentifier: string;
    accessToken?: string;
    limit?: number;
}

function boundedLimit(limit: number | undefined, fallback: number): number {
    if (limit === undefined || !Number.isFinite(limit)) {
        return fallback;
    }
    return Math.min(Math.max(Math.trunc(limit), 1), MAX_CARD_LIMIT);
}

/**
 * Dashboard extras built on the listening profile and generation history:
 * prompt ideas, profile-ranked artists and AI-picked artists.
 */
export class ListenerInsights {
    constructor(private readonly deps: ListenerInsightsDeps) {}

    private async loadProfile(userIdentifier: string): Promise<ProfileCache | null> {
        try {
            return await this.deps.profiles.getProfile(userIdentifier);
        } catch (error) {
            logger.warn(`Profile snapshot unavailable for ${userIdentifier}: ${describeError(error)}`);
            return null;
        }
    }

    async suggestions(userIdentifier: string): Promise<string[]> {
        const { settings, stats } = this.deps;
        const profile = await this.loadProfile(userIdentifier);
        return generateListeningSuggestions(stats, userIdentifier, profile, {
            historyLimit: settings.statsHistoryLimit,
            genreSampleSize: settings.genreBreakdownSampleSize,
        });
    }

    async recommendedArtists(userIdentifier: string, limit?: number): Promise<ArtistCard[]> {
        const profile = await this.loadProfile(userIdentifier);
        return recommendArtistsFromProfile(profile, boundedLimit(limit, DEFAULT_RECOMMENDATION_LIMIT));
    }

    async discoverArtists(request: ArtistDiscoveryRequest): Promise<ArtistCard[]> {
        const profile = await this.loadProfile(request.userIdentifier);
        const catalog = request.accessToken ? this.deps.catalogFactory(request.accessToken) : null;
        const run = logger.child("discover", { userIdentifier: request.userIdentifier });

        return discoverArtists(
            {
                llm: this.deps.llm,
                catalog,
                settings: this.deps.settings,
                random: this.deps.random,
                log: (message) => run.debug(message),
            },
            profile,
            boundedLimit(request.limit, DISCOVERY_LIMIT)
        );
    }
}
