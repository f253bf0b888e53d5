import {
    extractPromptKeywords,
    getSimilarTracks,
    scoreTrackBasic,
    ScoringSignals,
} from "../similarityEngine";
import { createRecommenderSettings } from "../recommenderSettings";
import {
    catalogArtist,
    catalogTrack,
    createFakeCatalog,
    emptyProfile,
    resolvedTrack,
    totalCatalogCalls,
} from "./helpers/recommenderFakes";

const settings = createRecommenderSettings();

const baseSignals: ScoringSignals = {
    seedArtistIds: new Set(),
    targetYear: null,
    targetEnergy: "",
    promptKeywords: new Set(),
};

describe("extractPromptKeywords", () => {
    it("keeps lowercase alphanumeric words longer than two characters", () => {
        expect(extractPromptKeywords("Late-night Drive in LA, 80s synth!")).toEqual(
            new Set(["late", "night", "drive", "80s", "synth"])
        );
    });
});

describe("scoreTrackBasic", () => {
    it("adds popularity, overlap, keyword, year and energy terms", () => {
        const track = resolvedTrack({
            id: "t1",
            name: "Night Drive",
            artistIds: ["seed-artist"],
            popularity: 80,
            year: 2020,
        });

        const { score, breakdown } = scoreTrackBasic(track, {
            seedArtistIds: new Set(["seed-artist"]),
            targetYear: 2020,
            targetEnergy: "High",
            promptKeywords: new Set(["night", "rain"]),
        });

        expect(breakdown).toEqual({
            popularity: 0.36,
            seedOverlap: 0.2,
            focusArtist: 0,
            keywordMatch: 0.05,
            yearAlignment: 0.09,
            energyBias: 0.05,
            cacheTrackHit: 0,
            cacheGenreAlignment: 0,
            novelty: 0,
            total: 0.75,
        });
        expect(score).toBeCloseTo(0.75);
    });

    it("caps keyword hits and fades year alignment with distance", () => {
        const track = resolvedTrack({
            id: "t2",
            name: "summer night drive",
            popularity: 0,
            year: 2011,
        });

        const { breakdown } = scoreTrackBasic(track, {
            ...baseSignals,
            targetYear: 2020,
            promptKeywords: new Set(["summer", "night", "drive"]),
        });

        expect(breakdown.keywordMatch).toBe(0.1);
        // (18 - 9) / 36 * 0.18
        expect(breakdown.yearAlignment).toBe(0.045);
    });

    it("rewards focus artists and profile matches", () => {
        const track = resolvedTrack({ id: "known", artistIds: ["fresh", "heavy"], popularity: 0 });
        const profile = emptyProfile({
            artists: {
                fresh: { name: "Fresh", genres: [], playCount: 0 },
                heavy: { name: "Heavy", genres: [], playCount: 9 },
            },
            genreBuckets: { rock: { trackCount: 1, trackIds: ["known"] } },
            tracks: { known: resolvedTrack({ id: "known" }) },
        });

        const { breakdown } = scoreTrackBasic(track, {
            ...baseSignals,
            focusArtistIds: new Set(["heavy"]),
            profile,
            targetGenre: "rock",
        });

        expect(breakdown.focusArtist).toBe(0.3);
        expect(breakdown.cacheTrackHit).toBe(0.18);
        expect(breakdown.cacheGenreAlignment).toBe(0.12);
        expect(breakdown.novelty).toBe(0.02);
    });

    it("never scores below zero", () => {
        const track = resolvedTrack({ id: "t3", artistIds: ["heavy"], popularity: 0 });
        const profile = emptyProfile({
            artists: { heavy: { name: "Heavy", genres: [], playCount: 12 } },
        });

        const { score, breakdown } = scoreTrackBasic(track, { ...baseSignals, profile });

        expect(breakdown.novelty).toBe(-0.03);
        expect(score).toBe(0);
        expect(breakdown.total).toBe(0);
    });

    it("ignores energy outside the band or without popularity", () => {
        const outside = scoreTrackBasic(resolvedTrack({ id: "a", popularity: 90 }), {
            ...baseSignals,
            targetEnergy: "low",
        });
        const unknown = scoreTrackBasic(resolvedTrack({ id: "b", popularity: null }), {
            ...baseSignals,
            targetEnergy: "low",
        });

        expect(outside.breakdown.energyBias).toBe(0);
        expect(unknown.breakdown.energyBias).toBe(0);
    });

    it("treats prototype names as unknown energy levels", () => {
        const { breakdown } = scoreTrackBasic(resolvedTrack({ id: "a", popularity: 50 }), {
            ...baseSignals,
            targetEnergy: "constructor",
        });

        expect(breakdown.energyBias).toBe(0);
    });
});

describe("getSimilarTracks", () => {
    const attributes = { genre: "rock", mood: "energetic", energy: "medium" };

    it("does nothing without seeds", async () => {
        const catalog = createFakeCatalog();
        const log = jest.fn();

        const tracks = await getSimilarTracks(
            { catalog, settings, log },
            {
                seedTrackIds: [],
                seedArtistIds: new Set(),
                targetYear: null,
                attributes,
                promptKeywords: new Set(),
            }
        );

        expect(tracks).toEqual([]);
        expect(totalCatalogCalls(catalog)).toBe(0);
        expect(log).toHaveBeenCalledWith("No seed track IDs available; skipping local recommendations.");
    });

    it("ranks candidates, excludes seeds and caps tracks per artist", async () => {
        const catalog = createFakeCatalog();
        const artistA = [{ id: "art-a", name: "A" }];
        catalog.searchTracks
            .mockResolvedValueOnce([
                catalogTrack({ id: "seed-1", popularity: 100 }),
                catalogTrack({ id: "a1", popularity: 90, artists: artistA }),
                catalogTrack({ id: "a2", popularity: 80, artists: artistA }),
                catalogTrack({ id: "a3", popularity: 70, artists: artistA }),
                catalogTrack({ id: "b1", popularity: 50, artists: [{ id: "art-b", name: "B" }] }),
            ])
            .mockResolvedValueOnce([catalogTrack({ id: "a1", popularity: 90, artists: artistA })]);

        const tracks = await getSimilarTracks(
            { catalog, settings },
            {
                seedTrackIds: ["seed-1"],
                seedArtistIds: new Set(["art-b"]),
                targetYear: null,
                attributes,
                promptKeywords: new Set(),
                limit: 3,
            }
        );

        expect(tracks.map((track) => [track.id, track.score])).toEqual([
            ["b1", 0.475],
            ["a1", 0.405],
            ["a3", 0.365],
        ]);
        expect(tracks[0].seedArtistOverlap).toBe(true);
        expect(tracks[0].seedSource).toBe("similarity");
        expect(tracks[1].seedArtistOverlap).toBe(false);
        expect(catalog.searchTracks.mock.calls).toEqual([
            ['genre:"rock" year:2015-2025', { limit: 12, market: "US" }],
            ['"energetic" rock', { limit: 12, market: "US" }],
        ]);
    });

    it("looks up candidate artists with the configured catalog concurrency", async () => {
        const catalog = createFakeCatalog();
        catalog.searchTracks.mockResolvedValueOnce(
            Array.from({ length: 150 }, (_, index) => catalogTrack({ id: `c${index}` }))
        );
        let active = 0;
        let peak = 0;
        catalog.getArtists.mockImplementation(async (ids) => {
            active += 1;
            peak = Math.max(peak, active);
            await new Promise((resolve) => setImmediate(resolve));
            active -= 1;
            return ids.map((id) => catalogArtist(id, id, ["rock"]));
        });

        await getSimilarTracks(
            { catalog, settings: createRecommenderSettings({ catalogConcurrency: 3 }) },
            {
                seedTrackIds: ["seed-1"],
                seedArtistIds: new Set(),
                targetYear: null,
                attributes,
                promptKeywords: new Set(),
            }
        );

        expect(catalog.getArtists).toHaveBeenCalledTimes(3);
        expect(peak).toBe(3);
    });

    it("survives a failing catalog", async () => {
        const catalog = createFakeCatalog();
        catalog.searchPlaylists.mockRejectedValue(new Error("down"));
        catalog.searchTracks.mockRejectedValue(new Error("down"));

        await expect(
            getSimilarTracks(
                { catalog, settings },
                {
                    seedTrackIds: ["seed-1"],
                    seedArtistIds: new Set(),
                    targetYear: 2001,
                    attributes: { genre: "", mood: "", energy: "" },
                    promptKeywords: new Set(),
                }
            )
        ).resolves.toEqual([]);
        expect(catalog.searchTracks).toHaveBeenCalledTimes(1);
    });
});
