import type { AlbumMetadataIndex, ListenSession, PlayEvent } from '../types/listening';

export interface AggregationOptions {
    watchOnly?: boolean;
    // A song counts as listened once a single play covers this share of it
    listenThreshold?: number;
    // Sessions below this completion ratio are dropped
    minCompletionRatio?: number;
    metadata?: AlbumMetadataIndex;
}

interface SongProgress {
    mediaDurationMs: number;
    longestPlayMs: number;
    listened: boolean;
}

interface AlbumAccumulator {
    albumName: string;
    songs: Map<string, SongProgress>;
    playCount: number;
    firstListen: Date;
    lastListen: Date;
}

export function computeCompletionRatio(playedMs: number, nominalMs: number): number {
    if (!(nominalMs > 0)) {
        return 0;
    }
    return Math.min(1, Math.max(0, playedMs / nominalMs));
}

function isListened(event: PlayEvent, threshold: number): boolean {
    if (event.mediaDurationMs === 0) return false;
    return event.playDurationMs / event.mediaDurationMs >= threshold;
}

function addEvent(album: AlbumAccumulator, event: PlayEvent, listenThreshold: number): void {
    album.playCount++;
    if (event.playedAt < album.firstListen) album.firstListen = event.playedAt;
    if (event.playedAt > album.lastListen) album.lastListen = event.playedAt;

    const song = album.songs.get(event.songName) ?? {
        mediaDurationMs: 0,
        longestPlayMs: 0,
        listened: false,
    };
    song.mediaDurationMs = Math.max(song.mediaDurationMs, event.mediaDurationMs);
    song.longestPlayMs = Math.max(song.longestPlayMs, event.playDurationMs);
    song.listened = song.listened || isListened(event, listenThreshold);
    album.songs.set(event.songName, song);
}

function toSession(album: AlbumAccumulator, metadata?: AlbumMetadataIndex): ListenSession {
    let nominalMs = 0;
    let playedMs = 0;
    let listenedTracks = 0;

    for (const song of album.songs.values()) {
        nominalMs += song.mediaDurationMs;
        // Replaying one song cannot push the album past that song's length
        playedMs += Math.min(song.longestPlayMs, song.mediaDurationMs);
        if (song.listened) listenedTracks++;
    }

    const albumMetadata = metadata?.get(album.albumName);

    return {
        albumName: album.albumName,
        artistName: albumMetadata?.artistName ?? '',
        genre: albumMetadata?.genre,
        firstListen: album.firstListen,
        lastListen: album.lastListen,
        completionRatio: computeCompletionRatio(playedMs, nominalMs),
        totalTracks: album.songs.size,
        listenedTracks,
        playCount: album.playCount,
    };
}

/**
 * Folds track-level plays into one session per album, in order of first
 * appearance. Completion is played time over nominal album time, where each
 * song contributes its longest play capped at its media duration.
 */
export function aggregateSessions(
    events: Iterable<PlayEvent>,
    options: AggregationOptions = {}
): ListenSession[] {
    const {
        watchOnly = false,
        listenThreshold = 0.5,
        minCompletionRatio = 0,
        metadata,
    } = options;

    const albums = new Map<string, AlbumAccumulator>();

    for (const event of events) {
        if (watchOnly && !event.isWatchPlay) continue;

        let album = albums.get(event.albumName);
        if (!album) {
            album = {
                albumName: event.albumName,
                songs: new Map(),
                playCount: 0,
                firstListen: event.playedAt,
                lastListen: event.playedAt,
            };
            albums.set(event.albumName, album);
        }
        addEvent(album, event, listenThreshold);
    }

    const sessions: ListenSession[] = [];
    for (const album of albums.values()) {
        const session = toSession(album, metadata);
        if (session.completionRatio >= minCompletionRatio) {
            sessions.push(session);
        }
    }
    return sessions;
}
