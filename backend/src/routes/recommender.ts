import { Router, Request } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import {
    catalogAccessToken,
    requesterIdentity,
    resolveRequestUserId,
} from "../middleware/auth";
import { generationLimiter } from "../middleware/rateLimiter";
import { resolveCacheKey } from "../services/generationCache";
import { DEFAULT_RECOMMENDATION_LIMIT } from "../services/artistRecommendations";
import { DISCOVERY_LIMIT } from "../services/listenerInsights";
import { listenerInsights, playlistGenerator } from "../services/recommender";
import {
    sendAppError,
    sendInternalRouteError,
    sendRouteError,
} from "./routeErrorResponse";

const router = Router();

const generateBodySchema = z.object({
    prompt: z.string().default(""),
    debug: z.boolean().optional(),
});

const cachedPlaylistBodySchema = z.object({
    cacheKey: z.string().optional(),
    debug: z.boolean().optional(),
});

const removeTrackBodySchema = z.object({
    cacheKey: z.string().optional(),
    trackId: z.string().optional(),
    position: z.number().int().optional(),
});

const saveBodySchema = z.object({
    cacheKey: z.string().optional(),
    name: z.string().optional(),
});

const artistCardLimit = (fallback: number) =>
    z.object({ limit: z.coerce.number().int().min(1).max(50).catch(fallback) });

function sessionCacheKey(req: Request, provided: string | undefined): string {
    return resolveCacheKey(req.session?.lastPlaylistCacheKey, provided);
}

function rememberCacheKey(req: Request, cacheKey: string): void {
    if (req.session) {
        req.session.lastPlaylistCacheKey = cacheKey;
    }
}

/**
 * @openapi
 * /api/recommender/generate:
 *   post:
 *     summary: Generate a playlist from a free-text prompt
 *     description: Returns the cached playlist when the same requester already generated this prompt within the cache lifetime.
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [prompt]
 *             properties:
 *               prompt:
 *                 type: string
 *                 example: upbeat 90s rock for a road trip
 *               debug:
 *                 type: boolean
 *     responses:
 *       200:
 *         description: Generated (or cached) playlist
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/GenerationPayload'
 *       400:
 *         description: Prompt missing
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Error'
 *       401:
 *         description: No catalog token in the session
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Error'
 */
router.post("/generate", generationLimiter, async (req, res) => {
    const parsed = generateBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        return sendRouteError(res, 400, "Invalid request body", {
            details: parsed.error.errors.map((issue) => issue.message),
        });
    }

    try {
        const { payload, cacheHit } = await playlistGenerator.generate({
            prompt: parsed.data.prompt,
            requester: requesterIdentity(req),
            accessToken: catalogAccessToken(req),
            debug: parsed.data.debug,
        });
        rememberCacheKey(req, payload.cacheKey);
        res.json({ ...payload, cacheHit });
    } catch (error) {
        if (sendAppError(res, error)) {
            return;
        }
        logger.error("Playlist generation error:", error);
        sendInternalRouteError(res, "Failed to generate playlist");
    }
});

/**
 * @openapi
 * /api/recommender/remix:
 *   post:
 *     summary: Remix the session's current playlist in place
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               cacheKey:
 *                 type: string
 *               debug:
 *                 type: boolean
 *     responses:
 *       200:
 *         description: Remixed playlist, same cache key
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/GenerationPayload'
 *       401:
 *         description: No catalog token in the session
 *       404:
 *         description: Playlist expired or belongs to another session
 */
router.post("/remix", generationLimiter, async (req, res) => {
    const parsed = cachedPlaylistBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        return sendRouteError(res, 400, "Invalid request body");
    }

    try {
        const payload = await playlistGenerator.remix({
            cacheKey: sessionCacheKey(req, parsed.data.cacheKey),
            requester: requesterIdentity(req),
            accessToken: catalogAccessToken(req),
            debug: parsed.data.debug,
        });
        rememberCacheKey(req, payload.cacheKey);
        res.json(payload);
    } catch (error) {
        if (sendAppError(res, error)) {
            return;
        }
        logger.error("Playlist remix error:", error);
        sendInternalRouteError(res, "Failed to remix playlist");
    }
});

/**
 * @openapi
 * /api/recommender/tracks/remove:
 *   post:
 *     summary: Remove one track from the session's current playlist
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               cacheKey:
 *                 type: string
 *               trackId:
 *                 type: string
 *               position:
 *                 type: integer
 *                 description: Zero-based index, used when trackId does not match
 *     responses:
 *       200:
 *         description: Updated playlist
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/GenerationPayload'
 *       404:
 *         description: Playlist or track not found
 */
router.post("/tracks/remove", async (req, res) => {
    const parsed = removeTrackBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        return sendRouteError(res, 400, "Invalid request body");
    }

    try {
        const payload = await playlistGenerator.removeTrack({
            cacheKey: sessionCacheKey(req, parsed.data.cacheKey),
            requester: requesterIdentity(req),
            accessToken: catalogAccessToken(req),
            trackId: parsed.data.trackId,
            position: parsed.data.position,
        });
        res.json(payload);
    } catch (error) {
        if (sendAppError(res, error)) {
            return;
        }
        logger.error("Remove track error:", error);
        sendInternalRouteError(res, "Failed to remove track");
    }
});

/**
 * @openapi
 * /api/recommender/save:
 *   post:
 *     summary: Save the session's current playlist to the catalog account
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               cacheKey:
 *                 type: string
 *               name:
 *                 type: string
 *     responses:
 *       200:
 *         description: Created playlist
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 playlistId:
 *                   type: string
 *                 playlistName:
 *                   type: string
 *                 userId:
 *                   type: string
 *                 playlistUrl:
 *                   type: string
 *       400:
 *         description: Invalid name or empty playlist
 *       401:
 *         description: No catalog token in the session
 *       404:
 *         description: Playlist expired or belongs to another session
 */
router.post("/save", async (req, res) => {
    const parsed = saveBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        return sendRouteError(res, 400, "Invalid request body");
    }

    try {
        const published = await playlistGenerator.save({
            cacheKey: sessionCacheKey(req, parsed.data.cacheKey),
            requester: requesterIdentity(req),
            accessToken: catalogAccessToken(req),
            name: parsed.data.name,
        });
        res.json(published);
    } catch (error) {
        if (sendAppError(res, error)) {
            return;
        }
        logger.error("Save playlist error:", error);
        sendInternalRouteError(res, "Failed to save playlist");
    }
});

/**
 * @openapi
 * /api/recommender/stats:
 *   get:
 *     summary: Generation history summary for the requester
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     responses:
 *       200:
 *         description: Summary and genre breakdown
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 summary:
 *                   type: object
 *                 genreBreakdown:
 *                   type: array
 *                   items:
 *                     type: object
 *                     properties:
 *                       genre:
 *                         type: string
 *                       percentage:
 *                         type: number
 */
router.get("/stats", async (req, res) => {
    try {
        res.json(await playlistGenerator.getStats(resolveRequestUserId(req)));
    } catch (error) {
        logger.error("Generation stats error:", error);
        sendInternalRouteError(res, "Failed to load generation stats");
    }
});

/**
 * @openapi
 * /api/recommender/suggestions:
 *   get:
 *     summary: Prompt ideas drawn from the requester's listening profile and generation history
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     responses:
 *       200:
 *         description: Up to nine prompts; empty when there is no history
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 suggestions:
 *                   type: array
 *                   items:
 *                     type: string
 */
router.get("/suggestions", async (req, res) => {
    try {
        const suggestions = await listenerInsights.suggestions(resolveRequestUserId(req));
        res.json({ suggestions });
    } catch (error) {
        logger.error("Listening suggestions error:", error);
        sendInternalRouteError(res, "Failed to load listening suggestions");
    }
});

/**
 * @openapi
 * /api/recommender/artists:
 *   get:
 *     summary: Artists ranked from the requester's cached listening profile
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     parameters:
 *       - in: query
 *         name: limit
 *         schema:
 *           type: integer
 *           default: 10
 *           maximum: 50
 *     responses:
 *       200:
 *         description: Artist cards, best score first
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 artists:
 *                   type: array
 *                   items:
 *                     $ref: '#/components/schemas/ArtistCard'
 */
router.get("/artists", async (req, res) => {
    const { limit } = artistCardLimit(DEFAULT_RECOMMENDATION_LIMIT).parse(req.query);
    try {
        const artists = await listenerInsights.recommendedArtists(resolveRequestUserId(req), limit);
        res.json({ artists });
    } catch (error) {
        logger.error("Artist recommendations error:", error);
        sendInternalRouteError(res, "Failed to load artist recommendations");
    }
});

/**
 * @openapi
 * /api/recommender/artists/discover:
 *   get:
 *     summary: New artists picked by the language model for the requester
 *     description: Candidates are resolved through the catalog when the session holds a catalog token, otherwise only from the listening profile.
 *     tags: [Recommender]
 *     security:
 *       - sessionAuth: []
 *     parameters:
 *       - in: query
 *         name: limit
 *         schema:
 *           type: integer
 *           default: 8
 *           maximum: 50
 *     responses:
 *       200:
 *         description: Artist cards with the reason for each pick
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 artists:
 *                   type: array
 *                   items:
 *                     $ref: '#/components/schemas/ArtistCard'
 */
router.get("/artists/discover", generationLimiter, async (req, res) => {
    const { limit } = artistCardLimit(DISCOVERY_LIMIT).parse(req.query);
    try {
        const artists = await listenerInsights.discoverArtists({
            userIdentifier: resolveRequestUserId(req),
            accessToken: catalogAccessToken(req),
            limit,
        });
        res.json({ artists });
    } catch (error) {
        logger.error("Artist discovery error:", error);
        sendInternalRouteError(res, "Failed to discover artists");
    }
});

export default router;
