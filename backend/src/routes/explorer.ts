import { Router, Request } from "express";
import { z } from "zod";
import { config } from "../config";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { catalogAccessToken, requireCatalogAuth } from "../middleware/auth";
import {
    getPlaylistTracks,
    searchCommunityPlaylists,
} from "../services/playlistExplorer";
import { CatalogClient, createSpotifyCatalogClient } from "../services/spotifyCatalog";
import { sendAppError, sendInternalRouteError } from "./routeErrorResponse";

const router = Router();

router.use(requireCatalogAuth);

const searchQuerySchema = z.object({
    q: z.string().catch(""),
    limit: z.coerce.number().int().min(1).max(50).catch(20),
});

function catalogFor(req: Request): CatalogClient {
    const token = catalogAccessToken(req);
    if (!token) {
        throw new AppError(
            ErrorCode.NOT_AUTHENTICATED,
            ErrorCategory.RECOVERABLE,
            "Catalog authentication required."
        );
    }
    return createSpotifyCatalogClient(token);
}

/**
 * @openapi
 * /api/explorer/playlists:
 *   get:
 *     summary: Search community playlists
 *     tags: [Explorer]
 *     security:
 *       - sessionAuth: []
 *     parameters:
 *       - in: query
 *         name: q
 *         schema:
 *           type: string
 *       - in: query
 *         name: limit
 *         schema:
 *           type: integer
 *           default: 20
 *           maximum: 50
 *     responses:
 *       200:
 *         description: Playlist previews (empty for a blank query)
 *       401:
 *         description: No catalog token in the session
 */
router.get("/playlists", async (req, res) => {
    const { q, limit } = searchQuerySchema.parse(req.query);
    try {
        const playlists = await searchCommunityPlaylists(catalogFor(req), q, limit);
        res.json({ playlists });
    } catch (error) {
        if (sendAppError(res, error)) {
            return;
        }
        logger.error("Playlist search error:", error);
        sendInternalRouteError(res, "Failed to search playlists");
    }
});

/**
 * @openapi
 * /api/explorer/playlists/{id}/tracks:
 *   get:
 *     summary: List the tracks of a catalog playlist
 *     tags: [Explorer]
 *     security:
 *       - sessionAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Tracks of the playlist
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 tracks:
 *                   type: array
 *                   items:
 *                     $ref: '#/components/schemas/Track'
 *       401:
 *         description: No catalog token in the session
 */
router.get("/playlists/:id/tracks", async (req, res) => {
    try {
        const tracks = await getPlaylistTracks(
            catalogFor(req),
            req.params.id,
            config.recommender.market
        );
        res.json({ tracks });
    } catch (error) {
        if (sendAppError(res, error)) {
            return;
        }
        logger.error("Playlist tracks error:", error);
        sendInternalRouteError(res, "Failed to load playlist tracks");
    }
});

export default router;
