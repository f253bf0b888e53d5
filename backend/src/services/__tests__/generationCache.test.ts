import {
    buildCacheKey,
    GenerationPayload,
    isOwner,
    readPayload,
    resolveCacheKey,
} from "../generationCache";
import { emptyPlaylistStatistics } from "../playlistStatistics";
import { MemoryCacheStore } from "./helpers/recommenderFakes";

function samplePayload(overrides: Partial<GenerationPayload> = {}): GenerationPayload {
    return {
        playlist: ["Song - Band"],
        trackIds: ["t1"],
        trackDetails: [
            {
                id: "t1",
                name: "Song",
                artists: "Band",
                artistIds: ["a1"],
                albumName: "",
                albumImageUrl: "",
                year: 2020,
                durationMs: 180_000,
                popularity: 50,
                seedSource: "llm_seed",
            },
        ],
        attributes: { mood: "chill", genre: "pop", energy: "medium", artist: "", artists: [] },
        llmSuggestions: [{ title: "Song", artist: "Band" }],
        resolvedSeedTracks: [],
        seedTrackDisplay: ["Song - Band"],
        similarTracksDisplay: [],
        similarTracks: [],
        seedSources: { llm_seed: 1 },
        promptArtistIds: [],
        promptArtistCandidates: [],
        debugSteps: [],
        errors: [],
        prompt: "chill pop",
        suggestedPlaylistName: "Chill Pop",
        playlistStats: emptyPlaylistStatistics(),
        llmUsage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        cacheKey: "recommender:u1:abc",
        ownerUserId: "u1",
        ownerSessionKey: "s1",
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
        ...overrides,
    };
}

describe("buildCacheKey", () => {
    it("namespaces the user and hashes the prompt", () => {
        expect(buildCacheKey("u1", "")).toBe(
            "recommender:u1:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
        );
        expect(buildCacheKey("u1", "chill pop")).toBe(buildCacheKey("u1", "chill pop"));
        expect(buildCacheKey("u1", "chill pop")).not.toBe(buildCacheKey("u2", "chill pop"));
        expect(buildCacheKey("u1", "chill pop")).toMatch(/^recommender:u1:[0-9a-f]{64}$/);
    });
});

describe("isOwner", () => {
    const payload = { ownerUserId: "u1", ownerSessionKey: "s1" };

    it("requires both the user and the session to match", () => {
        expect(isOwner(payload, { userId: "u1", sessionKey: "s1" })).toBe(true);
        expect(isOwner(payload, { userId: "u1", sessionKey: "s2" })).toBe(false);
        expect(isOwner(payload, { userId: "u2", sessionKey: "s1" })).toBe(false);
    });

    it("treats payloads without an owner as unowned", () => {
        expect(isOwner({ ownerUserId: "", ownerSessionKey: "" }, { userId: "", sessionKey: "" })).toBe(false);
        expect(isOwner({ ownerUserId: "u1", ownerSessionKey: "" }, { userId: "u1", sessionKey: "" })).toBe(false);
    });
});

describe("resolveCacheKey", () => {
    it("prefers the session key and rejects a conflicting one", () => {
        expect(resolveCacheKey("k1", undefined)).toBe("k1");
        expect(resolveCacheKey("k1", " k1 ")).toBe("k1");
        expect(resolveCacheKey("k1", "k2")).toBe("");
    });

    it("uses the provided key when the session has none", () => {
        expect(resolveCacheKey(undefined, " k2 ")).toBe("k2");
        expect(resolveCacheKey("", undefined)).toBe("");
    });
});

describe("readPayload", () => {
    it("returns null for empty keys and misses", async () => {
        const store = new MemoryCacheStore();
        await expect(readPayload(store, "")).resolves.toBeNull();
        await expect(readPayload(store, "missing")).resolves.toBeNull();
    });

    it("discards malformed entries", async () => {
        const store = new MemoryCacheStore();
        await store.set("bad", { playlist: "not a list" }, 60);

        await expect(readPayload(store, "bad")).resolves.toBeNull();
    });

    it("returns a stored payload unchanged", async () => {
        const store = new MemoryCacheStore();
        const payload = samplePayload();
        await store.set(payload.cacheKey, payload, 900);

        await expect(readPayload(store, payload.cacheKey)).resolves.toEqual(payload);
    });

    it("fills defaults for older entries without artist attributes", async () => {
        const store = new MemoryCacheStore();
        const { attributes, ...rest } = samplePayload();
        await store.set("old", { ...rest, attributes: { mood: attributes.mood, genre: "rock", energy: "high" } }, 900);

        const payload = await readPayload(store, "old");

        expect(payload?.attributes).toEqual({ mood: "chill", genre: "rock", energy: "high", artist: "", artists: [] });
    });
});
