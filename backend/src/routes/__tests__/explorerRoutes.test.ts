import type { RequestHandler } from "express";
import session from "express-session";
import request from "supertest";

jest.mock("../../utils/logger", () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

jest.mock("../../config", () => ({
    config: {
        recommender: { market: "US" },
    },
}));

const mockCreateCatalogClient = jest.fn();
jest.mock("../../services/spotifyCatalog", () => ({
    createSpotifyCatalogClient: (token: string) => mockCreateCatalogClient(token),
}));

import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import { catalogTrack, createFakeCatalog, FakeCatalog } from "../../services/__tests__/helpers/recommenderFakes";
import router from "../explorer";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

const TOKEN_HEADER = "x-test-catalog-token";

const storeCatalogToken: RequestHandler = (req, _res, next) => {
    const token = req.header(TOKEN_HEADER);
    if (token) {
        req.session.catalogAccessToken = token;
    }
    next();
};

const app = createRouteTestApp("/api/explorer", router, [
    session({ secret: "test-secret", resave: false, saveUninitialized: false }),
    storeCatalogToken,
]);

describe("explorer routes", () => {
    let catalog: FakeCatalog;

    beforeEach(() => {
        jest.clearAllMocks();
        catalog = createFakeCatalog();
        mockCreateCatalogClient.mockReturnValue(catalog);
    });

    it("requires a catalog token", async () => {
        const res = await request(app).get("/api/explorer/playlists?q=rock");

        expect(res.status).toBe(401);
        expect(res.body).toEqual({ error: "Not authenticated", redirect: "/auth/login" });
        expect(mockCreateCatalogClient).not.toHaveBeenCalled();
    });

    it("searches community playlists with the session token", async () => {
        catalog.searchPlaylists.mockResolvedValueOnce([
            {
                id: "p1",
                name: "Rock Mix",
                owner: { id: "fan", display_name: "Fan" },
                tracks: { total: 12 },
            },
        ]);

        const res = await request(app)
            .get("/api/explorer/playlists?q=%20rock%20&limit=5")
            .set(TOKEN_HEADER, "test-token");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            playlists: [
                {
                    id: "p1",
                    name: "Rock Mix",
                    description: "",
                    ownerName: "Fan",
                    imageUrl: "",
                    trackCount: 12,
                    url: "https://open.spotify.com/playlist/p1",
                },
            ],
        });
        expect(mockCreateCatalogClient).toHaveBeenCalledWith("test-token");
        expect(catalog.searchPlaylists).toHaveBeenCalledWith("rock", { limit: 5 });
    });

    it("falls back to the default limit for out-of-range values", async () => {
        await request(app)
            .get("/api/explorer/playlists?q=jazz&limit=500")
            .set(TOKEN_HEADER, "test-token")
            .expect(200);

        expect(catalog.searchPlaylists).toHaveBeenCalledWith("jazz", { limit: 20 });
    });

    it("returns no playlists for a blank query", async () => {
        const res = await request(app).get("/api/explorer/playlists").set(TOKEN_HEADER, "test-token");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ playlists: [] });
        expect(catalog.searchPlaylists).not.toHaveBeenCalled();
    });

    it("lists playlist tracks in the configured market", async () => {
        catalog.getPlaylistItems.mockResolvedValueOnce([catalogTrack({ id: "t1", popularity: 42 })]);

        const res = await request(app)
            .get("/api/explorer/playlists/p1/tracks")
            .set(TOKEN_HEADER, "test-token");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            tracks: [
                {
                    id: "t1",
                    name: "Track t1",
                    artists: "Artist t1",
                    artistIds: ["artist-t1"],
                    albumName: "Album t1",
                    albumImageUrl: "https://img.test/t1.jpg",
                    year: 2020,
                    durationMs: 180000,
                    popularity: 42,
                    seedSource: "playlist",
                },
            ],
        });
        expect(catalog.getPlaylistItems).toHaveBeenCalledWith("p1", { limit: 100, market: "US" });
    });

    it("maps catalog failures to 503", async () => {
        catalog.getPlaylistItems.mockRejectedValueOnce(
            new AppError(
                ErrorCode.CATALOG_REQUEST_FAILED,
                ErrorCategory.TRANSIENT,
                "Catalog playlist items failed (HTTP 502): Bad gateway"
            )
        );

        const res = await request(app)
            .get("/api/explorer/playlists/p1/tracks")
            .set(TOKEN_HEADER, "test-token");

        expect(res.status).toBe(503);
        expect(res.body).toEqual({
            error: "Catalog playlist items failed (HTTP 502): Bad gateway",
            code: ErrorCode.CATALOG_REQUEST_FAILED,
        });
    });
});
