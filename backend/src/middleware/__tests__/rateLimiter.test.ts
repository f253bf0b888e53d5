import type { Options } from "express-rate-limit";

const mockRateLimit = jest.fn((options: Partial<Options>) => options);

describe("rateLimiter middleware config", () => {
    async function loadRateLimiterModule() {
        jest.resetModules();
        mockRateLimit.mockClear();

        jest.doMock("express-rate-limit", () => ({
            __esModule: true,
            default: (options: Partial<Options>) => mockRateLimit(options),
        }));

        return import("../rateLimiter");
    }

    it("creates the API and generation limiters with trustProxy validation disabled", async () => {
        const mod = await loadRateLimiterModule();

        expect(mockRateLimit).toHaveBeenCalledTimes(2);
        expect(mod.apiLimiter).toBeDefined();
        expect(mod.generationLimiter).toBeDefined();

        for (const [options] of mockRateLimit.mock.calls) {
            expect(options.validate).toEqual({ trustProxy: false });
            expect(options.standardHeaders).toBe(true);
            expect(options.legacyHeaders).toBe(false);
        }
    });

    it("keeps generation stricter than the general API", async () => {
        await loadRateLimiterModule();

        const [apiOptions] = mockRateLimit.mock.calls[0];
        const [generationOptions] = mockRateLimit.mock.calls[1];

        expect(apiOptions.max).toBe(1000);
        expect(apiOptions.windowMs).toBe(60_000);
        expect(apiOptions.message).toContain("Too many requests");

        expect(generationOptions.max).toBe(20);
        expect(generationOptions.windowMs).toBe(60_000);
        expect(generationOptions.message).toBe(
            "Too many playlist generation requests. Please slow down."
        );
    });

    it("apiLimiter skips only the health endpoints", async () => {
        const mod = await loadRateLimiterModule();
        const [apiOptions] = mockRateLimit.mock.calls[0];

        expect(apiOptions.skip).toBeDefined();
        expect(mod.isHealthCheckPath("/health")).toBe(true);
        expect(mod.isHealthCheckPath("/api/health")).toBe(true);
        expect(mod.isHealthCheckPath("/api/recommender/generate")).toBe(false);
        expect(mod.isHealthCheckPath("/api/health/extra")).toBe(false);
    });
});
