// Data contracts for the Apple Music side of the pipeline

// One usable row of the Play Activity export
export interface PlayEvent {
    albumName: string;
    songName: string;
    playedAt: Date;
    playDurationMs: number;
    mediaDurationMs: number;
    isWatchPlay: boolean;
}

export interface AlbumMetadata {
    artistName?: string;
    genre?: string;
}

// album name → metadata, built from the Container Details export
export type AlbumMetadataIndex = Map<string, AlbumMetadata>;

export interface ListenSession {
    albumName: string;
    artistName: string;
    genre?: string;
    firstListen: Date;
    lastListen: Date;
    completionRatio: number;
    totalTracks: number;
    listenedTracks: number;
    playCount: number;
}

export interface ParseSummary {
    totalRows: number;
    skippedRows: number;
}
