import { GenerationStat } from "../generationStats";
import { generateListeningSuggestions } from "../listeningSuggestions";
import { emptyProfile, MemoryStatStore } from "./helpers/recommenderFakes";

function stat(overrides: Partial<GenerationStat> = {}): GenerationStat {
    return {
        userIdentifier: "u1",
        prompt: "test prompt",
        trackCount: 10,
        totalDurationMs: 1_800_000,
        topGenre: "",
        avgNovelty: null,
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        genreTop: [],
        createdAt: "2026-01-01T12:00:00.000Z",
        ...overrides,
    };
}

async function storeWith(...records: GenerationStat[]): Promise<MemoryStatStore> {
    const store = new MemoryStatStore();
    for (const record of records) {
        await store.record(record);
    }
    return store;
}

describe("generateListeningSuggestions", () => {
    it("returns nothing without a user or any listening signal", async () => {
        const store = await storeWith(stat());

        await expect(generateListeningSuggestions(store, "", null)).resolves.toEqual([]);
        await expect(generateListeningSuggestions(store, "someone-else", null)).resolves.toEqual([]);
    });

    it("blends history genres, profile genres and top artists", async () => {
        const store = await storeWith(
            stat({
                topGenre: "dream-pop",
                avgNovelty: 55,
                genreTop: [
                    { genre: "dream-pop", percentage: 60 },
                    { genre: "indie-rock", percentage: 40 },
                ],
            })
        );
        const profile = emptyProfile({
            source: "recently_played",
            genreBuckets: {
                "indie-rock": { trackCount: 5, trackIds: [] },
                "synth-pop": { trackCount: 0, trackIds: ["x", "y"] },
            },
            artists: {
                a1: { name: "Band A", genres: [], playCount: 3 },
                a2: { name: "band a", genres: [], playCount: 1 },
                a3: { name: "Band C", genres: [], playCount: 7 },
            },
        });

        const prompts = await generateListeningSuggestions(store, "u1", profile);

        expect(prompts).toEqual([
            "My go-to Dream Pop tracks lately",
            "My go-to Indie Rock tracks lately",
            "My go-to Synth Pop tracks lately",
            "Blend Dream Pop and Indie Rock like my recent listening",
            "Chill Synth Pop session inspired by my stats",
            "Something like Band C with fresh finds",
            "Deep cuts inspired by Band C",
            "Something like Band A with fresh finds",
            "Deep cuts inspired by Band A",
        ]);
    });

    it("adds source and novelty prompts when there is room", async () => {
        const store = await storeWith(stat({ topGenre: "jazz", avgNovelty: 80 }));
        const profile = emptyProfile({ source: "top_tracks" });

        await expect(generateListeningSuggestions(store, "u1", profile)).resolves.toEqual([
            "My go-to Jazz tracks lately",
            "High-energy mix from my top tracks",
            "Keep the discovery streak from my recent playlists",
        ]);
    });

    it("suggests a remix when history has no novelty figures", async () => {
        const store = await storeWith(stat({ trackCount: 0 }));

        await expect(generateListeningSuggestions(store, "u1", null)).resolves.toEqual([
            "Remix what I've been generating lately",
        ]);
    });

    it("leans toward familiar favorites for low novelty and honors the prompt cap", async () => {
        const store = await storeWith(stat({ topGenre: "folk", avgNovelty: 20 }));

        await expect(
            generateListeningSuggestions(store, "u1", null, { maxPrompts: 2 })
        ).resolves.toEqual([
            "My go-to Folk tracks lately",
            "Blend familiar favorites with deeper cuts I've missed",
        ]);
    });
});
