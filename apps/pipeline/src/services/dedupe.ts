import { OutputRecordSchema, hasStravaMatch, pickListenFields, pickStravaFields, type OutputRecord } from '../types/records';
import { albumKey } from './record-merge';

export interface DedupeResult {
    records: OutputRecord[];
    removed: number;
    duplicateAlbums: string[];
}

/**
 * Collapses entries that share one album into a single record. The entry with
 * the highest play_count is the base; it becomes starred if any entry was, its
 * listen range widens to cover all entries, and it borrows a run match from
 * another entry when it has none of its own.
 */
export function collapseDuplicates(group: OutputRecord[]): OutputRecord {
    const [base, ...others] = [...group].sort((a, b) => b.play_count - a.play_count);

    let starred = base.starred;
    let firstListen = base.first_listen;
    let lastListen = base.last_listen;
    let strava = hasStravaMatch(base) ? pickStravaFields(base) : undefined;

    for (const other of others) {
        starred = starred || other.starred;
        if (Date.parse(other.first_listen) < Date.parse(firstListen)) firstListen = other.first_listen;
        if (Date.parse(other.last_listen) > Date.parse(lastListen)) lastListen = other.last_listen;
        if (!strava && hasStravaMatch(other)) strava = pickStravaFields(other);
    }

    return OutputRecordSchema.parse({
        ...pickListenFields(base),
        starred,
        first_listen: firstListen,
        last_listen: lastListen,
        ...(strava ?? pickStravaFields(base)),
    });
}

// Groups keep the position of their first entry
export function dedupeRecords(records: OutputRecord[]): DedupeResult {
    const groups = new Map<string, OutputRecord[]>();
    for (const record of records) {
        const key = albumKey(record);
        groups.set(key, [...(groups.get(key) ?? []), record]);
    }

    const duplicateAlbums: string[] = [];
    const deduped: OutputRecord[] = [];

    for (const group of groups.values()) {
        if (group.length > 1) duplicateAlbums.push(group[0].album_name);
        deduped.push(group.length === 1 ? group[0] : collapseDuplicates(group));
    }

    return {
        records: deduped,
        removed: records.length - deduped.length,
        duplicateAlbums,
    };
}
