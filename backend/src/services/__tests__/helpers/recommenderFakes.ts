import type { CatalogArtist, CatalogPlaylist, CatalogTrack, CatalogUser } from "../../catalogTracks";
import type { CacheStore } from "../../generationCache";
import type { GenerationStat, GenerationStatStore } from "../../generationStats";
import type { LlmCompletion, LlmCompletionClient, LlmDispatcher, LlmDispatchOptions } from "../../llmClient";
import type { ProfileCache } from "../../profileCache";
import type { ResolvedTrack } from "../../recommenderTypes";
import type {
    CatalogClient,
    CatalogSearchOptions,
    CreatePlaylistOptions,
} from "../../spotifyCatalog";

export interface TrackFixture {
    id: string;
    name?: string;
    artists?: Array<{ id: string; name: string }>;
    popularity?: number;
    durationMs?: number;
    releaseDate?: string;
    markets?: string[];
}

export function catalogTrack(fixture: TrackFixture): CatalogTrack {
    return {
        id: fixture.id,
        name: fixture.name ?? `Track ${fixture.id}`,
        artists: fixture.artists ?? [{ id: `artist-${fixture.id}`, name: `Artist ${fixture.id}` }],
        album: {
            name: `Album ${fixture.id}`,
            images: [{ url: `https://img.test/${fixture.id}.jpg` }],
            release_date: fixture.releaseDate ?? "2020-01-01",
        },
        duration_ms: fixture.durationMs ?? 180_000,
        popularity: fixture.popularity ?? 60,
        available_markets: fixture.markets ?? null,
    };
}

export function catalogArtist(id: string, name: string, genres: string[] = []): CatalogArtist {
    return { id, name, genres, popularity: 50 };
}

export function resolvedTrack(overrides: Partial<ResolvedTrack> & { id: string }): ResolvedTrack {
    return {
        name: `Track ${overrides.id}`,
        artists: `Artist ${overrides.id}`,
        artistIds: [`artist-${overrides.id}`],
        albumName: "",
        albumImageUrl: "",
        year: 2020,
        durationMs: 180_000,
        popularity: 50,
        ...overrides,
    };
}

export interface FakeCatalog extends CatalogClient {
    searchTracks: jest.Mock<Promise<CatalogTrack[]>, [string, CatalogSearchOptions]>;
    searchPlaylists: jest.Mock<Promise<CatalogPlaylist[]>, [string, CatalogSearchOptions]>;
    searchArtists: jest.Mock<Promise<CatalogArtist[]>, [string, CatalogSearchOptions]>;
    getArtists: jest.Mock<Promise<CatalogArtist[]>, [string[]]>;
    getPlaylistItems: jest.Mock<Promise<CatalogTrack[]>, [string, { limit: number; market?: string }]>;
    getArtistTopTracks: jest.Mock<Promise<CatalogTrack[]>, [string, string]>;
    getCurrentUser: jest.Mock<Promise<CatalogUser>, []>;
    createPlaylist: jest.Mock<Promise<CatalogPlaylist>, [string, CreatePlaylistOptions]>;
    addTracksToPlaylist: jest.Mock<Promise<void>, [string, string[]]>;
}

/** Catalog that answers every call with nothing until a test scripts it. */
export function createFakeCatalog(): FakeCatalog {
    return {
        searchTracks: jest.fn<Promise<CatalogTrack[]>, [string, CatalogSearchOptions]>().mockResolvedValue([]),
        searchPlaylists: jest
            .fn<Promise<CatalogPlaylist[]>, [string, CatalogSearchOptions]>()
            .mockResolvedValue([]),
        searchArtists: jest.fn<Promise<CatalogArtist[]>, [string, CatalogSearchOptions]>().mockResolvedValue([]),
        getArtists: jest.fn<Promise<CatalogArtist[]>, [string[]]>().mockResolvedValue([]),
        getPlaylistItems: jest
            .fn<Promise<CatalogTrack[]>, [string, { limit: number; market?: string }]>()
            .mockResolvedValue([]),
        getArtistTopTracks: jest.fn<Promise<CatalogTrack[]>, [string, string]>().mockResolvedValue([]),
        getCurrentUser: jest.fn<Promise<CatalogUser>, []>().mockResolvedValue({ id: "catalog-user" }),
        createPlaylist: jest
            .fn<Promise<CatalogPlaylist>, [string, CreatePlaylistOptions]>()
            .mockResolvedValue({ id: "new-playlist", name: "" }),
        addTracksToPlaylist: jest.fn<Promise<void>, [string, string[]]>().mockResolvedValue(undefined),
    };
}

export function totalCatalogCalls(catalog: FakeCatalog): number {
    return [
        catalog.searchTracks,
        catalog.searchPlaylists,
        catalog.searchArtists,
        catalog.getArtists,
        catalog.getPlaylistItems,
        catalog.getArtistTopTracks,
        catalog.getCurrentUser,
        catalog.createPlaylist,
        catalog.addTracksToPlaylist,
    ].reduce((sum, mock) => sum + mock.mock.calls.length, 0);
}

export type ScriptedReply = string | ((prompt: string) => string);

/**
 * Completion client that replies from a queue (then "" once exhausted) and
 * reports 10/5 token usage for every non-empty reply.
 */
export class ScriptedLlm implements LlmCompletionClient, LlmDispatcher {
    readonly prompts: string[] = [];
    private readonly replies: ScriptedReply[];

    constructor(replies: ScriptedReply[] = []) {
        this.replies = [...replies];
    }

    async complete(prompt: string, _options?: LlmDispatchOptions): Promise<LlmCompletion> {
        this.prompts.push(prompt);
        const next = this.replies.shift() ?? "";
        const text = typeof next === "function" ? next(prompt) : next;
        if (!text) {
            return { text: "", usage: null };
        }
        return { text, usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 } };
    }

    async dispatch(prompt: string, options?: LlmDispatchOptions): Promise<string> {
        return (await this.complete(prompt, options)).text;
    }
}

/** JSON round-trip on write, like the Redis-backed store. */
export class MemoryCacheStore implements CacheStore {
    readonly entries = new Map<string, { value: string; ttlSeconds: number }>();

    async get(key: string): Promise<unknown> {
        const entry = this.entries.get(key);
        return entry ? JSON.parse(entry.value) : null;
    }

    async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        this.entries.set(key, { value: JSON.stringify(value), ttlSeconds });
    }
}

export class MemoryStatStore implements GenerationStatStore {
    readonly records: GenerationStat[] = [];

    async record(stat: GenerationStat): Promise<void> {
        this.records.unshift(stat);
    }

    async list(userIdentifier: string, limit: number): Promise<GenerationStat[]> {
        return this.records.filter((stat) => stat.userIdentifier === userIdentifier).slice(0, limit);
    }
}

export function emptyProfile(overrides: Partial<ProfileCache> = {}): ProfileCache {
    return {
        artists: {},
        genreBuckets: {},
        tracks: {},
        topTrackIds: [],
        source: "test",
        ...overrides,
    };
}
