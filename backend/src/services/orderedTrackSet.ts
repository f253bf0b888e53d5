import { ResolvedTrack } from "./recommenderTypes";

/** Dedup key: the catalog id, or "name::artists" for tracks without one. */
export function trackKey(track: Pick<ResolvedTrack, "id" | "name" | "artists">): string {
    return track.id || `${track.name}::${track.artists}`;
}

/**
 * Insertion-ordered set of tracks. The first track added under a key wins,
 * so whatever is appended earlier (seeds) takes priority over later sources.
 */
export class OrderedTrackSet<T extends ResolvedTrack = ResolvedTrack> {
    private readonly entries = new Map<string, T>();

    constructor(initial: Iterable<T> = []) {
        for (const track of initial) {
            this.add(track);
        }
    }

    /** Returns false when the key was already present. */
    add(track: T): boolean {
        const key = trackKey(track);
        if (this.entries.has(key)) {
            return false;
        }
        this.entries.set(key, track);
        return true;
    }

    addAll(tracks: Iterable<T>): number {
        let added = 0;
        for (const track of tracks) {
            if (this.add(track)) {
                added += 1;
            }
        }
        return added;
    }

    has(track: Pick<ResolvedTrack, "id" | "name" | "artists">): boolean {
        return this.entries.has(trackKey(track));
    }

    get size(): number {
        return this.entries.size;
    }

    toArray(): T[] {
        return [...this.entries.values()];
    }
}
