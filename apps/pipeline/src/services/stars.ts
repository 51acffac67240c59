import type { OutputRecord } from '../types/records';

export type RecordPredicate = (record: OutputRecord) => boolean;

// Flips `starred` on every record the predicate selects; input is left untouched
export function toggleStars(
    records: OutputRecord[],
    predicate: RecordPredicate
): { records: OutputRecord[]; toggled: OutputRecord[] } {
    const toggled: OutputRecord[] = [];

    const next = records.map((record) => {
        if (!predicate(record)) return record;
        const flipped = { ...record, starred: !record.starred };
        toggled.push(flipped);
        return flipped;
    });

    return { records: next, toggled };
}

export function byAlbumName(albumName: string): RecordPredicate {
    return (record) => record.album_name === albumName;
}

export function byIdentity(target: Pick<OutputRecord, 'album_name' | 'artist_name'>): RecordPredicate {
    return (record) =>
        record.album_name === target.album_name && record.artist_name === target.artist_name;
}

// Case-insensitive substring match on album or artist
export function findRecords(records: OutputRecord[], term: string): OutputRecord[] {
    const needle = term.trim().toLowerCase();
    if (!needle) return [];

    return records.filter(
        (record) =>
            record.album_name.toLowerCase().includes(needle) ||
            record.artist_name.toLowerCase().includes(needle)
    );
}

export function listStarred(records: OutputRecord[]): OutputRecord[] {
    return records.filter((record) => record.starred);
}

export function formatRecordLine(record: OutputRecord): string {
    const star = record.starred ? '★' : '☆';
    return `${star} ${record.album_name} - ${record.artist_name || 'Unknown'}`;
}
