import { CatalogPlaylist, primaryImageUrl, toResolvedTrack } from "./catalogTracks";
import type { CatalogClient } from "./spotifyCatalog";
import { ResolvedTrack } from "./recommenderTypes";

const MAX_SEARCH_LIMIT = 50;
const PLAYLIST_TRACK_LIMIT = 100;

export interface PlaylistPreview {
    id: string;
    name: string;
    description: string;
    ownerName: string;
    imageUrl: string;
    trackCount: number;
    url: string;
}

export function toPlaylistPreview(playlist: CatalogPlaylist): PlaylistPreview {
    return {
        id: playlist.id,
        name: playlist.name,
        description: playlist.description ?? "",
        ownerName: playlist.owner?.display_name ?? playlist.owner?.id ?? "",
        imageUrl: primaryImageUrl(playlist.images),
        trackCount: Math.trunc(playlist.tracks?.total ?? 0),
        url: playlist.external_urls?.spotify ?? `https://open.spotify.com/playlist/${playlist.id}`,
    };
}

/** Community playlists matching `query`; a blank query searches nothing. */
export async function searchCommunityPlaylists(
    catalog: CatalogClient,
    query: string,
    limit = 20
): Promise<PlaylistPreview[]> {
    const cleaned = query.trim();
    if (!cleaned) {
        return [];
    }
    const bounded = Math.min(Math.max(Math.trunc(limit) || 1, 1), MAX_SEARCH_LIMIT);
    const playlists = await catalog.searchPlaylists(cleaned, { limit: bounded });
    return playlists.map(toPlaylistPreview);
}

export async function getPlaylistTracks(
    catalog: CatalogClient,
    playlistId: string,
    market?: string
): Promise<ResolvedTrack[]> {
    if (!playlistId.trim()) {
        return [];
    }
    const items = await catalog.getPlaylistItems(playlistId.trim(), {
        limit: PLAYLIST_TRACK_LIMIT,
        market,
    });
    return items.map((track) => toResolvedTrack(track, "playlist"));
}
