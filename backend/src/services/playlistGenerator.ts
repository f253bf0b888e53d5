import { AppError, describeError, ErrorCategory, ErrorCode } from "../utils/errors";
import { createLogger, withLogTiming } from "../utils/logger";
import { PipelineTrace, TraceLog } from "../utils/pipelineTrace";
import {
    buildCacheKey,
    CacheStore,
    GenerationPayload,
    generationPayloadSchema,
    isOwner,
    readPayload,
    RequesterIdentity,
} from "./generationCache";
import {
    buildGenerationStat,
    GenerationStatStore,
    GenerationSummary,
    GenreBreakdownEntry,
    getGenreBreakdown,
    summarizeGenerationStats,
} from "./generationStats";
import { normalizeGenre, titleCase } from "./genreNormalizer";
import { LlmCompletionClient, LlmDispatcher, LlmUsageTracker, trackUsage } from "./llmClient";
import { OrderedTrackSet } from "./orderedTrackSet";
import {
    extractAttributes,
    FallbackSeeds,
    suggestRemixTracks,
    suggestSeedTracks,
} from "./playlistPrompts";
import { createPlaylistWithTracks, PublishedPlaylist } from "./playlistPublisher";
import { computePlaylistStatistics, PlaylistStatistics } from "./playlistStatistics";
import { cachedTracksForGenre, ProfileCache, ProfileCacheSource } from "./profileCache";
import {
    formatTrackDisplay,
    PlaylistAttributes,
    ResolvedTrack,
    ScoredTrack,
    TrackSource,
    TrackSuggestion,
} from "./recommenderTypes";
import { RecommenderSettings } from "./recommenderSettings";
import {
    CatalogStageContext,
    discoverTopTracksForGenre,
    ensureArtistSeed,
    resolveSeedTracks,
} from "./seedDiscovery";
import { extractPromptKeywords, getSimilarTracks } from "./similarityEngine";
import { CatalogClient, CatalogClientFactory } from "./spotifyCatalog";

const logger = createLogger("playlist-generator");

const CACHED_GENRE_SEED_LIMIT = 5;
const REMIX_SIMILARITY_MINIMUM = 5;
const DEFAULT_PLAYLIST_NAME = "AI Playlist";
const PLAYLIST_NAME_LENGTH = 100;

export interface PlaylistGeneratorDeps {
    llm: LlmCompletionClient;
    catalogFactory: CatalogClientFactory;
    cache: CacheStore;
    profiles: ProfileCacheSource;
    stats: GenerationStatStore;
    settings: RecommenderSettings;
    fallbackSeeds?: FallbackSeeds;
    now?: () => Date;
}

export interface GenerateRequest {
    prompt: string;
    requester: RequesterIdentity;
    accessToken?: string;
    debug?: boolean;
}

export interface CachedPlaylistRequest {
    cacheKey: string;
    requester: RequesterIdentity;
    accessToken?: string;
    debug?: boolean;
}

export interface RemoveTrackRequest extends CachedPlaylistRequest {
    trackId?: string;
    position?: number;
}

export interface SavePlaylistRequest extends CachedPlaylistRequest {
    name?: string;
}

export interface GenerationStatsReport {
    summary: GenerationSummary;
    genreBreakdown: GenreBreakdownEntry[];
}

export interface GenerationResult {
    payload: GenerationPayload;
    cacheHit: boolean;
}

interface RunContext {
    trace: PipelineTrace;
    llm: LlmDispatcher;
    usage: LlmUsageTracker;
    catalog: CatalogClient;
    stage: CatalogStageContext;
    profile: ProfileCache | null;
}

/** Title-cased prompt, or the default name for a blank prompt. */
export function suggestPlaylistName(prompt: string): string {
    const label = prompt.trim();
    if (!label) {
        return DEFAULT_PLAYLIST_NAME;
    }
    return titleCase(label).slice(0, PLAYLIST_NAME_LENGTH);
}

function averageYear(tracks: readonly ResolvedTrack[]): number | null {
    const years = tracks.flatMap((track) => (track.year ? [track.year] : []));
    if (years.length === 0) {
        return null;
    }
    return years.reduce((sum, year) => sum + year, 0) / years.length;
}

function artistIdsOf(tracks: readonly ResolvedTrack[]): Set<string> {
    return new Set(tracks.flatMap((track) => track.artistIds.filter(Boolean)));
}

/** Plain track fields only; drops scoring extras before caching. */
function toPlainTrack(track: ResolvedTrack): ResolvedTrack {
    const plain: ResolvedTrack = {
        id: track.id,
        name: track.name,
        artists: track.artists,
        artistIds: [...track.artistIds],
        albumName: track.albumName,
        albumImageUrl: track.albumImageUrl,
        year: track.year,
        durationMs: track.durationMs,
        popularity: track.popularity,
    };
    if (track.seedSource) {
        plain.seedSource = track.seedSource;
    }
    return plain;
}

function promptArtistCandidates(attributes: PlaylistAttributes): string[] {
    const candidates: string[] = [];
    const seen = new Set<string>();
    for (const name of [attributes.artist, ...attributes.artists]) {
        const trimmed = name.trim();
        if (!trimmed || seen.has(trimmed.toLowerCase())) {
            continue;
        }
        seen.add(trimmed.toLowerCase());
        candidates.push(trimmed);
    }
    return candidates;
}

/**
 * Runs the prompt-to-playlist pipeline and manages the cached result
 * (remix, track removal, publishing).
 */
export class PlaylistGenerator {
    private readonly now: () => Date;

    constructor(private readonly deps: PlaylistGeneratorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    private requireToken(accessToken: string | undefined): string {
        if (!accessToken) {
            throw new AppError(
                ErrorCode.NOT_AUTHENTICATED,
                ErrorCategory.RECOVERABLE,
                "Catalog authentication required."
            );
        }
        return accessToken;
    }

    private async loadOwnedPayload(
        cacheKey: string,
        requester: RequesterIdentity
    ): Promise<GenerationPayload> {
        const payload = await readPayload(this.deps.cache, cacheKey);
        if (!payload) {
            throw new AppError(
                ErrorCode.PLAYLIST_NOT_FOUND,
                ErrorCategory.RECOVERABLE,
                "Playlist session expired. Please generate a new playlist."
            );
        }
        if (!isOwner(payload, requester)) {
            throw new AppError(
                ErrorCode.PLAYLIST_OWNERSHIP_MISMATCH,
                ErrorCategory.RECOVERABLE,
                "Playlist session does not belong to your session."
            );
        }
        return payload;
    }

    private async loadProfile(userId: string, log: TraceLog): Promise<ProfileCache | null> {
        try {
            return await this.deps.profiles.getProfile(userId);
        } catch (error) {
            log(`Profile snapshot unavailable: ${describeError(error)}.`);
            return null;
        }
    }

    private async startRun(
        label: string,
        cacheKey: string,
        accessToken: string,
        userId: string,
        debug: boolean
    ): Promise<RunContext> {
        const trace = new PipelineTrace({
            logger: logger.child(label, { cacheKey }),
            captureSteps: debug,
        });
        const usage = new LlmUsageTracker();
        const catalog = this.deps.catalogFactory(accessToken);
        const stage: CatalogStageContext = {
            catalog,
            settings: this.deps.settings,
            log: trace.log,
        };
        const profile = await this.loadProfile(userId, trace.log);
        return {
            trace,
            llm: trackUsage(this.deps.llm, usage),
            usage,
            catalog,
            stage,
            profile,
        };
    }

    private statistics(
        tracks: readonly ResolvedTrack[],
        profile: ProfileCache | null,
        cachedTrackIds: readonly string[] | null,
        catalog: CatalogClient | null,
        log: TraceLog
    ): Promise<PlaylistStatistics> {
        return computePlaylistStatistics(tracks, {
            profile,
            cachedTrackIds,
            lookupArtists: catalog ? (ids) => catalog.getArtists(ids) : undefined,
            lookupConcurrency: this.deps.settings.catalogConcurrency,
            highlightCount: this.deps.settings.statsHighlightCount,
            log,
        });
    }

    private announceCaching(log: TraceLog): void {
        const ttl = this.deps.settings.cacheTtlSeconds;
        const span = ttl % 60 === 0 ? `${ttl / 60} minute${ttl === 60 ? "" : "s"}` : `${ttl} seconds`;
        log(`Playlist cached for ${span}.`);
    }

    private async store(payload: GenerationPayload): Promise<GenerationPayload> {
        const validated = generationPayloadSchema.parse(payload);
        await this.deps.cache.set(validated.cacheKey, validated, this.deps.settings.cacheTtlSeconds);
        return validated;
    }

    private async persistStat(
        userId: string,
        prompt: string,
        statistics: PlaylistStatistics,
        usage: LlmUsageTracker
    ): Promise<void> {
        if (!userId) {
            return;
        }
        try {
            await this.deps.stats.record(
                buildGenerationStat({
                    userIdentifier: userId,
                    prompt,
                    statistics,
                    usage: usage.snapshot(),
                    createdAt: this.now(),
                })
            );
        } catch (error) {
            logger.warn("Playlist stat persistence failed:", error);
        }
    }

    /**
     * Build (or return the cached) playlist for `prompt`. Only the two
     * precondition failures throw; every pipeline stage degrades instead.
     */
    async generate(request: GenerateRequest): Promise<GenerationResult> {
        const accessToken = this.requireToken(request.accessToken);
        const prompt = request.prompt.trim();
        if (!prompt) {
            throw new AppError(
                ErrorCode.PROMPT_REQUIRED,
                ErrorCategory.RECOVERABLE,
                "A playlist prompt is required."
            );
        }

        const { settings } = this.deps;
        const { requester } = request;
        const cacheKey = buildCacheKey(requester.userId, prompt);

        const cached = await readPayload(this.deps.cache, cacheKey);
        if (cached && isOwner(cached, requester)) {
            logger.debug(`Cache hit for ${cacheKey}`);
            return { payload: cached, cacheHit: true };
        }
        if (cached) {
            logger.warn(`Ignoring cached playlist ${cacheKey} owned by another session`);
        }

        const run = await this.startRun(
            "generate",
            cacheKey,
            accessToken,
            requester.userId,
            request.debug ?? false
        );
        const { trace, llm, stage, profile } = run;
        const log = trace.log;

        const attributes = await extractAttributes(llm, prompt, settings.defaultAttributes, { log });
        log(`Attributes after normalization: ${JSON.stringify(attributes)}`);
        const canonicalGenre = normalizeGenre(attributes.genre || "pop");
        const artistCandidates = promptArtistCandidates(attributes);

        const seeds = new OrderedTrackSet();
        const seedSources: Record<string, number> = {};
        const appendSeed = (track: ResolvedTrack, source: TrackSource): void => {
            const tagged = { ...track, seedSource: track.seedSource ?? source };
            if (seeds.add(tagged)) {
                seedSources[source] = (seedSources[source] ?? 0) + 1;
            }
        };

        const promptArtistIds = new Set<string>();
        const primaryArtist = artistCandidates[0];
        if (primaryArtist) {
            const artistSeed = await ensureArtistSeed(stage, primaryArtist, profile);
            if (artistSeed) {
                promptArtistIds.add(artistSeed.artistId);
                artistSeed.tracks.forEach((track) => appendSeed(track, artistSeed.source));
                log(`Artist seed ensured ${artistSeed.tracks.length} tracks for '${artistSeed.artistName}'.`);
            }
        }

        const cachedGenreTracks = cachedTracksForGenre(profile, canonicalGenre, CACHED_GENRE_SEED_LIMIT);
        if (cachedGenreTracks.length > 0) {
            cachedGenreTracks.forEach((track) =>
                appendSeed({ ...track, seedSource: "user_genre_cache" }, "user_genre_cache")
            );
            log(
                `User cache contributed ${cachedGenreTracks.length} seed tracks for genre '${canonicalGenre}'.`
            );
        }

        let llmSuggestions: TrackSuggestion[] = await suggestSeedTracks(llm, prompt, attributes, {
            maxSuggestions: settings.maxSuggestions,
            fallbackSeeds: this.deps.fallbackSeeds,
            log,
        });
        const llmSeedTracks = await resolveSeedTracks(stage, llmSuggestions, settings.seedLimit, "llm_seed");
        llmSeedTracks.forEach((track) => appendSeed(track, "llm_seed"));
        if (llmSeedTracks.length > 0) {
            log(`LLM resolved ${llmSeedTracks.length} seed tracks via catalog search.`);
        }

        if (seeds.size < settings.seedLimit) {
            if (seeds.size > 0) {
                log("Seed count below threshold but primary sources provided seeds; skipping genre discovery.");
            } else {
                log("Seed count below threshold; discovering top tracks from the catalog.");
                const discovered = await discoverTopTracksForGenre(stage, attributes, {
                    seedLimit: settings.seedLimit,
                });
                discovered.forEach((track) => appendSeed(track, "genre_discovery"));
                if (discovered.length > 0 && llmSeedTracks.length === 0) {
                    llmSuggestions = discovered.map((track) => ({
                        title: track.name,
                        artist: track.artists,
                    }));
                }
            }
        }

        const resolvedSeedTracks = seeds.toArray();
        const seedTrackDisplay = resolvedSeedTracks.map(formatTrackDisplay);
        log(`Resolved seed tracks (${seedTrackDisplay.length}): ${JSON.stringify(seedTrackDisplay)}`);

        const ordered = new OrderedTrackSet(resolvedSeedTracks);
        const seedTrackIds = resolvedSeedTracks.map((track) => track.id).filter(Boolean);
        let similarTracks: ScoredTrack[] = [];
        if (seedTrackIds.length === 0) {
            log("No seed track IDs resolved; skipping local recommendation.");
        } else {
            similarTracks = await getSimilarTracks(stage, {
                seedTrackIds,
                seedArtistIds: artistIdsOf(resolvedSeedTracks),
                targetYear: averageYear(resolvedSeedTracks),
                attributes,
                promptKeywords: extractPromptKeywords(prompt),
                profile,
                focusArtistIds: promptArtistIds,
            });
            log(`Similarity engine produced ${similarTracks.length} tracks.`);
            ordered.addAll(similarTracks);
        }

        const finalTracks = ordered.toArray().map(toPlainTrack);
        log(`Final playlist (${finalTracks.length} tracks) compiled from seeds and similar tracks.`);

        const playlistStats = await this.statistics(finalTracks, profile, null, run.catalog, log);
        await this.persistStat(requester.userId, prompt, playlistStats, run.usage);

        this.announceCaching(log);
        const createdAt = this.now().toISOString();
        const payload: GenerationPayload = {
            playlist: finalTracks.map(formatTrackDisplay),
            trackIds: finalTracks.map((track) => track.id).filter(Boolean),
            trackDetails: finalTracks,
            attributes,
            llmSuggestions,
            resolvedSeedTracks: resolvedSeedTracks.map(toPlainTrack),
            seedTrackDisplay,
            similarTracksDisplay: similarTracks.map(formatTrackDisplay),
            similarTracks,
            seedSources,
            promptArtistIds: [...promptArtistIds],
            promptArtistCandidates: artistCandidates,
            debugSteps: [...trace.steps],
            errors: [...trace.warnings],
            prompt,
            suggestedPlaylistName: suggestPlaylistName(prompt),
            playlistStats,
            llmUsage: run.usage.snapshot(),
            cacheKey,
            ownerUserId: requester.userId,
            ownerSessionKey: requester.sessionKey,
            createdAt,
            updatedAt: createdAt,
        };

        return { payload: await this.store(payload), cacheHit: false };
    }

    /**
     * Refresh a cached playlist in place: same key, same length where the
     * catalog allows it.
     */
    async remix(request: CachedPlaylistRequest): Promise<GenerationPayload> {
        const accessToken = this.requireToken(request.accessToken);
        const existing = await this.loadOwnedPayload(request.cacheKey, request.requester);
        if (existing.trackDetails.length === 0) {
            throw new AppError(
                ErrorCode.EMPTY_PLAYLIST,
                ErrorCategory.RECOVERABLE,
                "No tracks available to remix yet. Generate a playlist first."
            );
        }

        const run = await this.startRun(
            "remix",
            existing.cacheKey,
            accessToken,
            request.requester.userId,
            request.debug ?? false
        );
        const { trace, llm, stage, profile } = run;
        const log = trace.log;
        const prompt = existing.prompt;
        const attributes = existing.attributes;

        const targetCount = existing.trackDetails.length;
        const snapshot = existing.trackDetails.map(formatTrackDisplay);
        log(`Remix target track count: ${targetCount}`);

        const suggestions = await suggestRemixTracks(llm, snapshot, attributes, {
            prompt,
            targetCount,
            log,
        });
        const resolved = await resolveSeedTracks(stage, suggestions, targetCount, "remix_seed");
        log(`Resolved ${resolved.length} remix tracks via catalog search.`);

        const ordered = new OrderedTrackSet(resolved);
        const similarUsed: ScoredTrack[] = [];
        const seedTrackIds = resolved.map((track) => track.id).filter(Boolean);
        if (ordered.size < targetCount && seedTrackIds.length > 0) {
            log("Resolved remix seeds below target; fetching similarity tracks.");
            const seedArtistIds = artistIdsOf(resolved);
            const candidates = await getSimilarTracks(stage, {
                seedTrackIds,
                seedArtistIds,
                targetYear: averageYear(resolved),
                attributes,
                promptKeywords: extractPromptKeywords(prompt),
                limit: Math.max(targetCount - ordered.size, REMIX_SIMILARITY_MINIMUM),
                profile,
                focusArtistIds: seedArtistIds,
            });
            for (const candidate of candidates) {
                if (ordered.size >= targetCount) {
                    break;
                }
                if (ordered.add(candidate)) {
                    similarUsed.push(candidate);
                }
            }
        }

        if (ordered.size < targetCount) {
            log("Falling back to original playlist tracks to maintain length.");
            for (const track of existing.trackDetails) {
                if (ordered.size >= targetCount) {
                    break;
                }
                ordered.add({ ...track, seedSource: "playlist" });
            }
        }

        const finalTracks = ordered.toArray().slice(0, targetCount).map(toPlainTrack);
        const playlistStats = await this.statistics(
            finalTracks,
            profile,
            existing.playlistStats.noveltyReferenceIds,
            run.catalog,
            log
        );

        this.announceCaching(log);
        const updated: GenerationPayload = {
            ...existing,
            playlist: finalTracks.map(formatTrackDisplay),
            trackIds: finalTracks.map((track) => track.id).filter(Boolean),
            trackDetails: finalTracks,
            llmSuggestions: suggestions,
            resolvedSeedTracks: resolved.map(toPlainTrack),
            seedTrackDisplay: snapshot,
            similarTracks: similarUsed,
            similarTracksDisplay: similarUsed.map(formatTrackDisplay),
            playlistStats,
            llmUsage: run.usage.snapshot(),
            debugSteps: [...trace.steps],
            errors: [...trace.warnings],
            ownerUserId: request.requester.userId,
            ownerSessionKey: request.requester.sessionKey,
            updatedAt: this.now().toISOString(),
        };

        return this.store(updated);
    }

    /**
     * Drop one track (by id, else by zero-based position) and recompute
     * statistics. Genre lookups use the catalog only when a token is given.
     */
    async removeTrack(request: RemoveTrackRequest): Promise<GenerationPayload> {
        const payload = await this.loadOwnedPayload(request.cacheKey, request.requester);
        const tracks = payload.trackDetails;

        let index = -1;
        const trackId = request.trackId?.trim();
        if (trackId) {
            index = tracks.findIndex((track) => track.id === trackId);
        }
        if (index === -1 && request.position !== undefined) {
            const position = Math.trunc(request.position);
            if (position >= 0 && position < tracks.length) {
                index = position;
            }
        }
        if (index === -1) {
            throw new AppError(
                ErrorCode.TRACK_NOT_FOUND,
                ErrorCategory.RECOVERABLE,
                "Track could not be located."
            );
        }

        const remaining = tracks.filter((_track, position) => position !== index);
        const catalog = request.accessToken ? this.deps.catalogFactory(request.accessToken) : null;
        const statsLog: TraceLog = (message) => logger.debug(`removeTrack: ${message}`);
        const profile = await this.loadProfile(request.requester.userId, statsLog);
        const playlistStats = await this.statistics(
            remaining,
            profile,
            payload.playlistStats.noveltyReferenceIds,
            catalog,
            statsLog
        );

        const updated: GenerationPayload = {
            ...payload,
            trackDetails: remaining,
            trackIds: remaining.map((track) => track.id).filter(Boolean),
            playlist: remaining.map(formatTrackDisplay),
            playlistStats,
            ownerUserId: request.requester.userId,
            ownerSessionKey: request.requester.sessionKey,
            updatedAt: this.now().toISOString(),
        };
        return this.store(updated);
    }

    /** Publish the cached playlist to the requester's catalog account. */
    async save(request: SavePlaylistRequest): Promise<PublishedPlaylist> {
        const accessToken = this.requireToken(request.accessToken);
        const payload = await this.loadOwnedPayload(request.cacheKey, request.requester);
        const { settings } = this.deps;

        const name = (request.name ?? "").replace(/[\r\n\t]+/g, " ").trim() || payload.suggestedPlaylistName;
        const published = await withLogTiming(
            logger,
            "Publish playlist",
            () =>
                createPlaylistWithTracks(this.deps.catalogFactory(accessToken), payload.trackIds, name, {
                    prefix: settings.playlistNamePrefix,
                    isPublic: settings.playlistPublic,
                }),
            { cacheKey: payload.cacheKey, trackCount: payload.trackIds.length }
        );
        logger.info(`Saved playlist ${published.playlistId} (${payload.trackIds.length} tracks)`);
        return published;
    }

    async getStats(userIdentifier: string): Promise<GenerationStatsReport> {
        const { settings, stats } = this.deps;
        const [summary, genreBreakdown] = await Promise.all([
            summarizeGenerationStats(stats, userIdentifier, settings.statsHistoryLimit),
            getGenreBreakdown(stats, userIdentifier, settings.genreBreakdownSampleSize),
        ]);
        return { summary, genreBreakdown };
    }
}
