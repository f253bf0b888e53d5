import { config } from "../config";
import { redisClient } from "../utils/redis";
import { RedisCacheStore } from "./generationCache";
import { RedisGenerationStatStore } from "./generationStats";
import { ListenerInsights } from "./listenerInsights";
import { openAIService } from "./openai";
import { PlaylistGenerator } from "./playlistGenerator";
import { RedisProfileCacheSource } from "./profileCache";
import { createSpotifyCatalogClient } from "./spotifyCatalog";

const profiles = new RedisProfileCacheSource(redisClient);
const stats = new RedisGenerationStatStore(redisClient, config.recommender.statsHistoryLimit);

/** Process-wide generator backed by Redis, OpenAI and the Spotify Web API. */
export const playlistGenerator = new PlaylistGenerator({
    llm: openAIService,
    catalogFactory: createSpotifyCatalogClient,
    cache: new RedisCacheStore(redisClient),
    profiles,
    stats,
    settings: config.recommender,
});

export const listenerInsights = new ListenerInsights({
    llm: openAIService,
    catalogFactory: createSpotifyCatalogClient,
    profiles,
    stats,
    settings: config.recommender,
});
