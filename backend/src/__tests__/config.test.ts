export {};

const mockDotenvConfig = jest.fn();
const mockLoggerDebug = jest.fn();
const mockLoggerError = jest.fn();

jest.mock("dotenv", () => ({
    __esModule: true,
    default: {
        config: (...args: unknown[]) => mockDotenvConfig(...args),
    },
}));

jest.mock("../utils/logger", () => ({
    ...jest.requireActual("../utils/logger"),
    logger: {
        debug: (...args: unknown[]) => mockLoggerDebug(...args),
        error: (...args: unknown[]) => mockLoggerError(...args),
        warn: jest.fn(),
    },
}));

describe("config module", () => {
    const originalEnv = process.env;

    function requiredEnv(): Record<string, string> {
        return {
            REDIS_URL: "redis://127.0.0.1:6379",
            SESSION_SECRET: "test-secret-test-secret-test-secret",
        };
    }

    // Starts from a clean environment so host variables never leak in
    async function loadConfigModule(
        overrides: Record<string, string | undefined> = {}
    ) {
        jest.resetModules();
        jest.clearAllMocks();

        const nextEnv: NodeJS.ProcessEnv = { ...requiredEnv() };
        for (const [key, value] of Object.entries(overrides)) {
            if (value === undefined) {
                delete nextEnv[key];
            } else {
                nextEnv[key] = value;
            }
        }

        process.env = nextEnv;
        return import("../config");
    }

    afterAll(() => {
        process.env = originalEnv;
    });

    it("applies defaults for everything but the required variables", async () => {
        const { config } = await loadConfigModule();

        expect(mockDotenvConfig).toHaveBeenCalledTimes(1);
        expect(mockLoggerDebug).toHaveBeenCalledWith("Environment variables validated");

        expect(config.port).toBe(3007);
        expect(config.nodeEnv).toBe("development");
        expect(config.redisUrl).toBe("redis://127.0.0.1:6379");
        expect(config.secureCookies).toBe(false);
        expect(config.openai).toEqual({
            apiKey: "",
            baseUrl: "https://api.openai.com/v1",
            model: "gpt-4o-mini",
            temperature: 0.7,
            maxTokens: 512,
            timeoutMs: 60000,
        });
        expect(config.catalog).toEqual({
            apiBaseUrl: "https://api.spotify.com/v1",
            timeoutMs: 15000,
        });
        expect(config.recommender.market).toBe("US");
        expect(config.recommender.cacheTtlSeconds).toBe(900);
        expect(config.recommender.genrePopularityOverrides.jazz).toBe(30);
        expect(config.recommender.catalogConcurrency).toBe(2);
        expect(config.allowedOrigins).toBe(true);
    });

    it("reads recommender tuning from the environment", async () => {
        const { config } = await loadConfigModule({
            PORT: "4010",
            NODE_ENV: "production",
            OPENAI_API_KEY: "test-openai-key",
            RECOMMENDER_OPENAI_MODEL: "gpt-4o",
            RECOMMENDER_OPENAI_TEMPERATURE: "0.3",
            RECOMMENDER_MARKET: "GB",
            RECOMMENDER_SEED_LIMIT: "8",
            RECOMMENDER_CACHE_TIMEOUT_SECONDS: "60",
            RECOMMENDER_GENRE_POPULARITY_OVERRIDES: "jazz:10, drone:5, broken",
            RECOMMENDER_REQUIRE_LATIN: "true",
            RECOMMENDER_PLAYLIST_PREFIX: "Mix: ",
            RECOMMENDER_PLAYLIST_PUBLIC: "true",
            RECOMMENDER_CATALOG_CONCURRENCY: "4",
            ALLOWED_ORIGINS: "https://app.test, http://localhost:5173 ",
        });

        expect(config.port).toBe(4010);
        expect(config.nodeEnv).toBe("production");
        expect(config.openai.apiKey).toBe("test-openai-key");
        expect(config.openai.model).toBe("gpt-4o");
        expect(config.openai.temperature).toBe(0.3);
        expect(config.recommender).toMatchObject({
            market: "GB",
            seedLimit: 8,
            cacheTtlSeconds: 60,
            requireLatin: true,
            playlistNamePrefix: "Mix: ",
            playlistPublic: true,
            catalogConcurrency: 4,
        });
        expect(config.recommender.genrePopularityOverrides).toMatchObject({
            jazz: 10,
            drone: 5,
            ambient: 25,
        });
        expect(config.allowedOrigins).toEqual([
            "https://app.test",
            "http://localhost:5173",
        ]);
    });

    it("locks origins down in production without an allowlist", async () => {
        const { config } = await loadConfigModule({ NODE_ENV: "production" });
        expect(config.allowedOrigins).toEqual([]);
    });

    it("logs validation errors and exits for invalid environment variables", async () => {
        const exitSpy = jest.spyOn(process, "exit").mockImplementation((code) => {
            throw new Error(`process.exit:${code}`);
        });

        await expect(loadConfigModule({ SESSION_SECRET: "short" })).rejects.toThrow(
            "process.exit:1"
        );

        expect(mockLoggerError).toHaveBeenCalledWith(" Environment validation failed:");
        expect(mockLoggerError).toHaveBeenCalledWith(
            "   - SESSION_SECRET: SESSION_SECRET must be at least 32 characters"
        );
        expect(mockLoggerError).toHaveBeenCalledWith(
            "\n Please check your .env file and ensure all required variables are set."
        );

        exitSpy.mockRestore();
    });
});
