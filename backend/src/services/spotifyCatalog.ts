import axios, { AxiosInstance } from "axios";
import { config } from "../config";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { createLogger } from "../utils/logger";
import {
    CatalogArtist,
    CatalogPlaylist,
    CatalogTrack,
    CatalogUser,
    catalogArtistSchema,
    catalogPlaylistSchema,
    catalogTrackSchema,
    catalogUserSchema,
    parseCatalogItems,
} from "./catalogTracks";

/**
 * Spotify Web API client scoped to one user's bearer token.
 *
 * Every method throws `CatalogRequestError` on a non-success response; the
 * pipeline stages decide which fallback applies.
 */

const log = createLogger("catalog");

export const MAX_ARTISTS_PER_LOOKUP = 50;
export const MAX_TRACKS_PER_ADD = 100;

export interface CatalogSearchOptions {
    limit: number;
    market?: string;
    offset?: number;
}

export interface CreatePlaylistOptions {
    name: string;
    isPublic: boolean;
    description?: string;
}

export interface CatalogClient {
    searchTracks(query: string, options: CatalogSearchOptions): Promise<CatalogTrack[]>;
    searchPlaylists(query: string, options: CatalogSearchOptions): Promise<CatalogPlaylist[]>;
    searchArtists(query: string, options: CatalogSearchOptions): Promise<CatalogArtist[]>;
    getArtists(ids: string[]): Promise<CatalogArtist[]>;
    getPlaylistItems(
        playlistId: string,
        options: { limit: number; market?: string }
    ): Promise<CatalogTrack[]>;
    getArtistTopTracks(artistId: string, market: string): Promise<CatalogTrack[]>;
    getCurrentUser(): Promise<CatalogUser>;
    createPlaylist(userId: string, options: CreatePlaylistOptions): Promise<CatalogPlaylist>;
    addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void>;
}

export type CatalogClientFactory = (accessToken: string) => CatalogClient;

export class CatalogRequestError extends AppError {
    constructor(
        public operation: string,
        public status: number | null,
        message: string
    ) {
        super(ErrorCode.CATALOG_REQUEST_FAILED, ErrorCategory.TRANSIENT, message, {
            operation,
            status,
        });
        this.name = "CatalogRequestError";
        Object.setPrototypeOf(this, CatalogRequestError.prototype);
    }
}

function readPath(data: unknown, ...keys: string[]): unknown {
    let current: unknown = data;
    for (const key of keys) {
        if (typeof current !== "object" || current === null) {
            return undefined;
        }
        current = Reflect.get(current, key);
    }
    return current;
}

function toCatalogError(operation: string, error: unknown): CatalogRequestError {
    if (error instanceof CatalogRequestError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        const status = error.response?.status ?? null;
        return new CatalogRequestError(
            operation,
            status,
            `Catalog ${operation} failed${status ? ` (HTTP ${status})` : ""}: ${error.message}`
        );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CatalogRequestError(operation, null, `Catalog ${operation} failed: ${message}`);
}

export class SpotifyCatalogClient implements CatalogClient {
    private client: AxiosInstance;

    constructor(accessToken: string) {
        this.client = axios.create({
            baseURL: config.catalog.apiBaseUrl,
            timeout: config.catalog.timeoutMs,
            headers: {
                Authorization: `Bearer ${accessToken}`,
                "Content-Type": "application/json",
            },
        });
    }

    private async request(
        operation: string,
        run: (client: AxiosInstance) => Promise<{ data: unknown }>
    ): Promise<unknown> {
        try {
            const response = await run(this.client);
            return response.data;
        } catch (error) {
            const wrapped = toCatalogError(operation, error);
            log.debug(wrapped.message);
            throw wrapped;
        }
    }

    private async search(
        type: "track" | "playlist" | "artist",
        query: string,
        options: CatalogSearchOptions
    ): Promise<unknown> {
        const params: Record<string, string | number> = {
            q: query,
            type,
            limit: options.limit,
        };
        if (options.market) {
            params.market = options.market;
        }
        if (options.offset) {
            params.offset = options.offset;
        }
        return this.request(`search ${type}`, (client) =>
            client.get("/search", { params })
        );
    }

    async searchTracks(query: string, options: CatalogSearchOptions): Promise<CatalogTrack[]> {
        const data = await this.search("track", query, options);
        return parseCatalogItems(catalogTrackSchema, readPath(data, "tracks", "items"));
    }

    async searchPlaylists(
        query: string,
        options: CatalogSearchOptions
    ): Promise<CatalogPlaylist[]> {
        const data = await this.search("playlist", query, options);
        return parseCatalogItems(catalogPlaylistSchema, readPath(data, "playlists", "items"));
    }

    async searchArtists(query: string, options: CatalogSearchOptions): Promise<CatalogArtist[]> {
        const data = await this.search("artist", query, options);
        return parseCatalogItems(catalogArtistSchema, readPath(data, "artists", "items"));
    }

    async getArtists(ids: string[]): Promise<CatalogArtist[]> {
        if (ids.length === 0) {
            return [];
        }
        if (ids.length > MAX_ARTISTS_PER_LOOKUP) {
            throw new RangeError(
                `At most ${MAX_ARTISTS_PER_LOOKUP} artists can be looked up per call`
            );
        }
        const data = await this.request("artists lookup", (client) =>
            client.get("/artists", { params: { ids: ids.join(",") } })
        );
        return parseCatalogItems(catalogArtistSchema, readPath(data, "artists"));
    }

    async getPlaylistItems(
        playlistId: string,
        options: { limit: number; market?: string }
    ): Promise<CatalogTrack[]> {
        const params: Record<string, string | number> = { limit: options.limit };
        if (options.market) {
            params.market = options.market;
        }
        const data = await this.request("playlist items", (client) =>
            client.get(`/playlists/${encodeURIComponent(playlistId)}/tracks`, { params })
        );
        const items = readPath(data, "items");
        const tracks = Array.isArray(items)
            ? items.map((entry: unknown) => readPath(entry, "track"))
            : [];
        return parseCatalogItems(catalogTrackSchema, tracks);
    }

    async getArtistTopTracks(artistId: string, market: string): Promise<CatalogTrack[]> {
        const data = await this.request("artist top tracks", (client) =>
            client.get(`/artists/${encodeURIComponent(artistId)}/top-tracks`, {
                params: { market },
            })
        );
        return parseCatalogItems(catalogTrackSchema, readPath(data, "tracks"));
    }

    async getCurrentUser(): Promise<CatalogUser> {
        const data = await this.request("current user", (client) => client.get("/me"));
        const parsed = catalogUserSchema.safeParse(data);
        if (!parsed.success) {
            throw new CatalogRequestError("current user", null, "Catalog user profile has no id");
        }
        return parsed.data;
    }

    async createPlaylist(
        userId: string,
        options: CreatePlaylistOptions
    ): Promise<CatalogPlaylist> {
        const data = await this.request("create playlist", (client) =>
            client.post(`/users/${encodeURIComponent(userId)}/playlists`, {
                name: options.name,
                public: options.isPublic,
                description: options.description ?? "",
            })
        );
        const parsed = catalogPlaylistSchema.safeParse(data);
        if (!parsed.success) {
            throw new CatalogRequestError("create playlist", null, "Created playlist has no id");
        }
        return parsed.data;
    }

    async addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
        if (trackIds.length > MAX_TRACKS_PER_ADD) {
            throw new RangeError(
                `At most ${MAX_TRACKS_PER_ADD} tracks can be added per call`
            );
        }
        await this.request("add tracks", (client) =>
            client.post(`/playlists/${encodeURIComponent(playlistId)}/tracks`, {
                uris: trackIds.map((id) => `spotify:track:${id}`),
            })
        );
    }
}

export const createSpotifyCatalogClient: CatalogClientFactory = (accessToken) =>
    new SpotifyCatalogClient(accessToken);
