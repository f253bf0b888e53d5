import swaggerJsdoc from "swagger-jsdoc";
import { config } from "../config";
import { BRAND_API_DESCRIPTION, BRAND_API_TITLE } from "./brand";

const trackSchema = {
    type: "object",
    properties: {
        id: { type: "string" },
        name: { type: "string" },
        artists: { type: "string" },
        artistIds: { type: "array", items: { type: "string" } },
        albumName: { type: "string" },
        albumImageUrl: { type: "string" },
        year: { type: "integer", nullable: true },
        durationMs: { type: "integer" },
        popularity: { type: "integer", nullable: true },
        seedSource: { type: "string" },
    },
};

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: "3.0.0",
        info: {
            title: BRAND_API_TITLE,
            version: "1.0.0",
            description: BRAND_API_DESCRIPTION,
        },
        servers: [
            {
                url: `http://localhost:${config.port}`,
                description: "Development server",
            },
        ],
        components: {
            securitySchemes: {
                sessionAuth: {
                    type: "apiKey",
                    in: "cookie",
                    name: "connect.sid",
                    description:
                        "Session cookie carrying the catalog access token",
                },
            },
            schemas: {
                Track: trackSchema,
                PlaylistStatistics: {
                    type: "object",
                    properties: {
                        totalTracks: { type: "integer" },
                        totalDuration: { type: "string", example: "00:42:10" },
                        avgPopularity: { type: "number", nullable: true },
                        novelty: { type: "number" },
                        genreTop: { type: "array", items: { type: "object" } },
                        genreRemaining: { type: "array", items: { type: "object" } },
                        sourceMix: { type: "array", items: { type: "object" } },
                        sourceTotal: { type: "integer" },
                    },
                },
                GenerationPayload: {
                    type: "object",
                    properties: {
                        cacheKey: { type: "string" },
                        prompt: { type: "string" },
                        playlist: { type: "array", items: { type: "string" } },
                        trackIds: { type: "array", items: { type: "string" } },
                        trackDetails: {
                            type: "array",
                            items: { $ref: "#/components/schemas/Track" },
                        },
                        errors: { type: "array", items: { type: "string" } },
                        suggestedPlaylistName: { type: "string" },
                        playlistStats: {
                            $ref: "#/components/schemas/PlaylistStatistics",
                        },
                    },
                },
                ArtistCard: {
                    type: "object",
                    properties: {
                        id: { type: "string" },
                        name: { type: "string" },
                        image: { type: "string" },
                        genres: { type: "array", items: { type: "string" } },
                        popularity: { type: "integer" },
                        followers: { type: "integer" },
                        url: { type: "string" },
                        seedArtistIds: { type: "array", items: { type: "string" } },
                        seedArtistNames: { type: "array", items: { type: "string" } },
                        reason: { type: "string" },
                        score: { type: "number" },
                    },
                },
                Error: {
                    type: "object",
                    properties: {
                        error: { type: "string" },
                        redirect: { type: "string" },
                    },
                },
            },
        },
        security: [{ sessionAuth: [] }],
    },
    apis: ["./src/routes/*.ts"],
};

export const swaggerSpec = swaggerJsdoc(options);
