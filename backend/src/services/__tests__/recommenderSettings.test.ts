import {
    createRecommenderSettings,
    popularityThresholdForGenre,
} from "../recommenderSettings";

describe("createRecommenderSettings", () => {
    it("applies defaults and merges genre overrides", () => {
        const settings = createRecommenderSettings({
            seedLimit: 8,
            genrePopularityOverrides: { drone: 5 },
            defaultAttributes: { mood: "upbeat" },
        });

        expect(settings.seedLimit).toBe(8);
        expect(settings.catalogConcurrency).toBe(2);
        expect(settings.defaultAttributes).toEqual({ mood: "upbeat", genre: "pop", energy: "medium" });
        expect(settings.genrePopularityOverrides).toMatchObject({ drone: 5, jazz: 30 });
        expect(Object.isFrozen(settings)).toBe(true);
    });
});

describe("popularityThresholdForGenre", () => {
    const settings = createRecommenderSettings();

    it("uses the genre override when one exists", () => {
        expect(popularityThresholdForGenre(settings, "jazz")).toBe(30);
        expect(popularityThresholdForGenre(settings, "rock")).toBe(45);
    });

    it("falls back to the base threshold for prototype member names", () => {
        expect(popularityThresholdForGenre(settings, "constructor")).toBe(45);
        expect(popularityThresholdForGenre(settings, "toString")).toBe(45);
    });
});
