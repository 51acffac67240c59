import type { OutputRecord } from '../types/records';

export interface RecordStatistics {
    totalAlbums: number;
    starredAlbums: number;
    albumsWithStrava: number;
    albumsWithoutStrava: number;
    albumsWithArtist: number;
    albumsWithoutArtist: number;
    albumsWithGenre: number;
    albumsWithoutGenre: number;
    lookedUpArtists: number;
    distinctRuns: number;
    multiAlbumRuns: number;
}

export function computeStatistics(records: OutputRecord[]): RecordStatistics {
    const runs = new Map<number, number>();
    let starredAlbums = 0;
    let albumsWithStrava = 0;
    let albumsWithArtist = 0;
    let albumsWithGenre = 0;
    let lookedUpArtists = 0;

    for (const record of records) {
        if (record.starred) starredAlbums++;
        if (record.artist_name.trim() !== '') albumsWithArtist++;
        if (record.artist_source === 'lookup') lookedUpArtists++;
        if (record.genre) albumsWithGenre++;
        if (record.strava_activity_id !== undefined) {
            albumsWithStrava++;
            runs.set(record.strava_activity_id, (runs.get(record.strava_activity_id) ?? 0) + 1);
        }
    }

    const total = records.length;
    let multiAlbumRuns = 0;
    for (const count of runs.values()) {
        if (count > 1) multiAlbumRuns++;
    }

    return {
        totalAlbums: total,
        starredAlbums,
        albumsWithStrava,
        albumsWithoutStrava: total - albumsWithStrava,
        albumsWithArtist,
        albumsWithoutArtist: total - albumsWithArtist,
        albumsWithGenre,
        albumsWithoutGenre: total - albumsWithGenre,
        lookedUpArtists,
        distinctRuns: runs.size,
        multiAlbumRuns,
    };
}
