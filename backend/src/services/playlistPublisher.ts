import { chunkArray } from "../utils/async";
import { AppError, describeError, ErrorCategory, ErrorCode } from "../utils/errors";
import { CatalogClient, CatalogRequestError, MAX_TRACKS_PER_ADD } from "./spotifyCatalog";

export const MAX_PLAYLIST_NAME_LENGTH = 100;

export interface PublishOptions {
    prefix?: string;
    userId?: string;
    isPublic?: boolean;
    description?: string;
}

export interface PublishedPlaylist {
    playlistId: string;
    playlistName: string;
    userId: string;
    playlistUrl: string;
}

/**
 * Create a catalog playlist and add `trackIds` in order, at most 100 per call.
 */
export async function createPlaylistWithTracks(
    catalog: CatalogClient,
    trackIds: readonly string[],
    playlistName: string,
    options: PublishOptions = {}
): Promise<PublishedPlaylist> {
    if (trackIds.length === 0) {
        throw new AppError(
            ErrorCode.EMPTY_PLAYLIST,
            ErrorCategory.RECOVERABLE,
            "At least one track id is required to create a playlist."
        );
    }

    const cleanedName = playlistName.trim();
    if (!cleanedName) {
        throw new AppError(
            ErrorCode.INVALID_PLAYLIST_NAME,
            ErrorCategory.RECOVERABLE,
            "A playlist name must be provided."
        );
    }
    const title = `${options.prefix ?? ""}${cleanedName}`;
    if (title.length > MAX_PLAYLIST_NAME_LENGTH) {
        throw new AppError(
            ErrorCode.INVALID_PLAYLIST_NAME,
            ErrorCategory.RECOVERABLE,
            `Playlist name must be ${MAX_PLAYLIST_NAME_LENGTH} characters or fewer.`,
            { length: title.length }
        );
    }

    let userId = options.userId ?? "";
    if (!userId) {
        try {
            userId = (await catalog.getCurrentUser()).id;
        } catch (error) {
            throw new AppError(
                ErrorCode.CATALOG_USER_UNRESOLVED,
                ErrorCategory.TRANSIENT,
                `Catalog user id could not be resolved: ${describeError(error)}`
            );
        }
    }

    const created = await catalog.createPlaylist(userId, {
        name: title,
        isPublic: options.isPublic ?? false,
        description: options.description,
    });

    const batches = chunkArray(trackIds, MAX_TRACKS_PER_ADD);
    for (const [index, batch] of batches.entries()) {
        try {
            await catalog.addTracksToPlaylist(created.id, batch);
        } catch (error) {
            const start = index * MAX_TRACKS_PER_ADD;
            throw new CatalogRequestError(
                "add tracks",
                error instanceof CatalogRequestError ? error.status : null,
                `Catalog rejected playlist items batch starting at index ${start}: ${describeError(error)}`
            );
        }
    }

    return {
        playlistId: created.id,
        playlistName: title,
        userId,
        playlistUrl:
            created.external_urls?.spotify ?? `https://open.spotify.com/playlist/${created.id}`,
    };
}
