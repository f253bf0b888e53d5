import type { RequestHandler } from "express";
import session from "express-session";
import request from "supertest";

const mockLog = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
};

jest.mock("../../utils/logger", () => ({
    logger: mockLog,
    createLogger: () => mockLog,
}));

const playlistGenerator = {
    generate: jest.fn(),
    remix: jest.fn(),
    removeTrack: jest.fn(),
    save: jest.fn(),
    getStats: jest.fn(),
};
const listenerInsights = {
    suggestions: jest.fn(),
    recommendedArtists: jest.fn(),
    discoverArtists: jest.fn(),
};
jest.mock("../../services/recommender", () => ({
    playlistGenerator,
    listenerInsights,
}));

import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import router from "../recommender";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

const TOKEN_HEADER = "x-test-catalog-token";

// Stands in for the OAuth callback that stores the catalog token in the session
const storeCatalogToken: RequestHandler = (req, _res, next) => {
    const token = req.header(TOKEN_HEADER);
    if (token) {
        req.session.catalogAccessToken = token;
    }
    next();
};

function createApp() {
    return createRouteTestApp("/api/recommender", router, [
        session({ secret: "test-secret", resave: false, saveUninitialized: false }),
        storeCatalogToken,
    ]);
}

function payload(cacheKey: string) {
    return {
        cacheKey,
        prompt: "upbeat rock",
        trackIds: ["t1", "t2"],
    };
}

describe("recommender routes", () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    it("generates a playlist for the session's requester", async () => {
        playlistGenerator.generate.mockResolvedValueOnce({
            payload: payload("key-1"),
            cacheHit: false,
        });

        const res = await request(createApp())
            .post("/api/recommender/generate")
            .set(TOKEN_HEADER, "test-token")
            .send({ prompt: "upbeat rock", debug: true });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ ...payload("key-1"), cacheHit: false });
        expect(playlistGenerator.generate).toHaveBeenCalledWith({
            prompt: "upbeat rock",
            requester: { userId: "anonymous", sessionKey: expect.any(String) },
            accessToken: "test-token",
            debug: true,
        });
    });

    it("remembers the generated key for follow-up requests in the same session", async () => {
        const agent = request.agent(createApp());
        playlistGenerator.generate.mockResolvedValueOnce({
            payload: payload("key-1"),
            cacheHit: true,
        });
        playlistGenerator.remix.mockResolvedValueOnce(payload("key-1"));

        await agent
            .post("/api/recommender/generate")
            .set(TOKEN_HEADER, "test-token")
            .send({ prompt: "upbeat rock" })
            .expect(200);
        const remix = await agent.post("/api/recommender/remix").send({});

        expect(remix.status).toBe(200);
        expect(remix.body).toEqual(payload("key-1"));
        const [generateRequest] = playlistGenerator.generate.mock.calls[0];
        expect(playlistGenerator.remix).toHaveBeenCalledWith({
            cacheKey: "key-1",
            requester: generateRequest.requester,
            accessToken: "test-token",
            debug: undefined,
        });
    });

    it("refuses a provided key that differs from the session's", async () => {
        const agent = request.agent(createApp());
        playlistGenerator.generate.mockResolvedValueOnce({
            payload: payload("key-1"),
            cacheHit: false,
        });
        playlistGenerator.remix.mockRejectedValueOnce(
            new AppError(
                ErrorCode.PLAYLIST_NOT_FOUND,
                ErrorCategory.RECOVERABLE,
                "Playlist session expired. Please generate a new playlist."
            )
        );

        await agent
            .post("/api/recommender/generate")
            .set(TOKEN_HEADER, "test-token")
            .send({ prompt: "upbeat rock" })
            .expect(200);
        const res = await agent.post("/api/recommender/remix").send({ cacheKey: "someone-elses-key" });

        expect(playlistGenerator.remix).toHaveBeenCalledWith(
            expect.objectContaining({ cacheKey: "" })
        );
        expect(res.status).toBe(404);
        expect(res.body).toEqual({
            error: "Playlist session expired. Please generate a new playlist.",
            code: ErrorCode.PLAYLIST_NOT_FOUND,
        });
    });

    it("redirects to login when the catalog token is missing", async () => {
        playlistGenerator.generate.mockRejectedValueOnce(
            new AppError(
                ErrorCode.NOT_AUTHENTICATED,
                ErrorCategory.RECOVERABLE,
                "Catalog authentication required."
            )
        );

        const res = await request(createApp())
            .post("/api/recommender/generate")
            .send({ prompt: "upbeat rock" });

        expect(res.status).toBe(401);
        expect(res.body).toEqual({
            error: "Catalog authentication required.",
            redirect: "/auth/login",
        });
        expect(playlistGenerator.generate).toHaveBeenCalledWith(
            expect.objectContaining({ accessToken: undefined })
        );
    });

    it("redirects to the dashboard for a blank prompt", async () => {
        playlistGenerator.generate.mockRejectedValueOnce(
            new AppError(ErrorCode.PROMPT_REQUIRED, ErrorCategory.RECOVERABLE, "Prompt is required.")
        );

        const res = await request(createApp())
            .post("/api/recommender/generate")
            .set(TOKEN_HEADER, "test-token")
            .send({});

        expect(res.status).toBe(400);
        expect(res.body).toEqual({ error: "Prompt is required.", redirect: "/dashboard" });
        expect(playlistGenerator.generate).toHaveBeenCalledWith(
            expect.objectContaining({ prompt: "" })
        );
    });

    it("rejects a malformed body before reaching the generator", async () => {
        const res = await request(createApp())
            .post("/api/recommender/generate")
            .send({ prompt: 42 });

        expect(res.status).toBe(400);
        expect(res.body.error).toBe("Invalid request body");
        expect(res.body.details).toHaveLength(1);
        expect(playlistGenerator.generate).not.toHaveBeenCalled();
    });

    it("passes track removal targets through", async () => {
        playlistGenerator.removeTrack.mockResolvedValueOnce(payload("key-9"));

        const res = await request(createApp())
            .post("/api/recommender/tracks/remove")
            .send({ cacheKey: "key-9", trackId: "t2", position: 1 });

        expect(res.status).toBe(200);
        expect(playlistGenerator.removeTrack).toHaveBeenCalledWith({
            cacheKey: "key-9",
            requester: { userId: "anonymous", sessionKey: expect.any(String) },
            accessToken: undefined,
            trackId: "t2",
            position: 1,
        });
    });

    it("maps a missing track to 404", async () => {
        playlistGenerator.removeTrack.mockRejectedValueOnce(
            new AppError(ErrorCode.TRACK_NOT_FOUND, ErrorCategory.RECOVERABLE, "Track not found in playlist.")
        );

        const res = await request(createApp())
            .post("/api/recommender/tracks/remove")
            .send({ cacheKey: "key-9", position: 7 });

        expect(res.status).toBe(404);
        expect(res.body.code).toBe(ErrorCode.TRACK_NOT_FOUND);
    });

    it("returns the published playlist", async () => {
        const published = {
            playlistId: "pl-1",
            playlistName: "My Mix",
            userId: "catalog-user",
            playlistUrl: "https://open.spotify.com/playlist/pl-1",
        };
        playlistGenerator.save.mockResolvedValueOnce(published);

        const res = await request(createApp())
            .post("/api/recommender/save")
            .set(TOKEN_HEADER, "test-token")
            .send({ cacheKey: "key-1", name: "My Mix" });

        expect(res.status).toBe(200);
        expect(res.body).toEqual(published);
        expect(playlistGenerator.save).toHaveBeenCalledWith(
            expect.objectContaining({ cacheKey: "key-1", name: "My Mix", accessToken: "test-token" })
        );
    });

    it("maps publishing validation errors to 400", async () => {
        playlistGenerator.save.mockRejectedValueOnce(
            new AppError(ErrorCode.EMPTY_PLAYLIST, ErrorCategory.RECOVERABLE, "Playlist has no tracks to save.")
        );

        const res = await request(createApp())
            .post("/api/recommender/save")
            .set(TOKEN_HEADER, "test-token")
            .send({ cacheKey: "key-1" });

        expect(res.status).toBe(400);
        expect(res.body).toEqual({
            error: "Playlist has no tracks to save.",
            code: ErrorCode.EMPTY_PLAYLIST,
        });
    });

    it("hides unexpected failures behind a 500", async () => {
        playlistGenerator.save.mockRejectedValueOnce(new Error("socket hang up"));

        const res = await request(createApp())
            .post("/api/recommender/save")
            .set(TOKEN_HEADER, "test-token")
            .send({ cacheKey: "key-1" });

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ error: "Failed to save playlist" });
        expect(mockLog.error).toHaveBeenCalledWith("Save playlist error:", expect.any(Error));
    });

    it("reports generation stats for the requester", async () => {
        const report = {
            summary: { totalPlaylists: 0 },
            genreBreakdown: [],
        };
        playlistGenerator.getStats.mockResolvedValueOnce(report);

        const res = await request(createApp()).get("/api/recommender/stats");

        expect(res.status).toBe(200);
        expect(res.body).toEqual(report);
        expect(playlistGenerator.getStats).toHaveBeenCalledWith("anonymous");
    });

    it("lists prompt suggestions for the requester", async () => {
        listenerInsights.suggestions.mockResolvedValueOnce(["My go-to Jazz tracks lately"]);

        const res = await request(createApp()).get("/api/recommender/suggestions");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ suggestions: ["My go-to Jazz tracks lately"] });
        expect(listenerInsights.suggestions).toHaveBeenCalledWith("anonymous");
    });

    it("passes the requested artist card count through", async () => {
        listenerInsights.recommendedArtists.mockResolvedValueOnce([{ id: "a1", name: "Indie Band" }]);

        const res = await request(createApp()).get("/api/recommender/artists?limit=3");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ artists: [{ id: "a1", name: "Indie Band" }] });
        expect(listenerInsights.recommendedArtists).toHaveBeenCalledWith("anonymous", 3);
    });

    it("uses the default card count for an unusable limit", async () => {
        listenerInsights.recommendedArtists.mockResolvedValueOnce([]);

        await request(createApp()).get("/api/recommender/artists?limit=lots").expect(200);

        expect(listenerInsights.recommendedArtists).toHaveBeenCalledWith("anonymous", 10);
    });

    it("discovers artists with the session's catalog token", async () => {
        listenerInsights.discoverArtists.mockResolvedValueOnce([{ id: "fa", name: "Fresh Act" }]);

        const res = await request(createApp())
            .get("/api/recommender/artists/discover")
            .set(TOKEN_HEADER, "test-token");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ artists: [{ id: "fa", name: "Fresh Act" }] });
        expect(listenerInsights.discoverArtists).toHaveBeenCalledWith({
            userIdentifier: "anonymous",
            accessToken: "test-token",
            limit: 8,
        });
    });

    it("reports artist discovery failures as a 500", async () => {
        listenerInsights.discoverArtists.mockRejectedValueOnce(new Error("model offline"));

        const res = await request(createApp()).get("/api/recommender/artists/discover?limit=4");

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ error: "Failed to discover artists" });
        expect(mockLog.error).toHaveBeenCalledWith("Artist discovery error:", expect.any(Error));
    });
});
