import {
    OutputRecordSchema,
    hasStravaMatch,
    pickListenFields,
    pickStravaFields,
    type OutputRecord,
} from '../types/records';

export interface MergeSummary {
    added: number;
    updated: number;
    dropped: number;
    starsPreserved: number;
}

function normalizeKeyPart(value: string): string {
    return value.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function albumKey(record: Pick<OutputRecord, 'album_name'>): string {
    return normalizeKeyPart(record.album_name);
}

export function recordKey(record: Pick<OutputRecord, 'album_name' | 'artist_name'>): string {
    return `${normalizeKeyPart(record.album_name)}::${normalizeKeyPart(record.artist_name)}`;
}

// Same key twice: the later record wins but keeps the earlier position
export function dedupeByKey(records: OutputRecord[]): OutputRecord[] {
    const byKey = new Map<string, OutputRecord>();
    for (const record of records) {
        byKey.set(recordKey(record), record);
    }
    return Array.from(byKey.values());
}

// An artist-less record may pick up an artist resolved elsewhere, and a looked-up
// artist may be superseded by one from the export, without losing the record's state.
function canMatchByAlbum(computed: OutputRecord, existing: OutputRecord): boolean {
    return (
        computed.artist_name.trim() === '' ||
        existing.artist_name.trim() === '' ||
        existing.artist_source === 'lookup'
    );
}

/**
 * Field-level precedence for one identity. Derived listening fields always come
 * from `computed`. `starred` always comes from `existing`. Artist and genre
 * fall back to `existing` when `computed` has none, and the strava_* group is
 * kept from `existing` unless `computed` carries its own match.
 */
export function mergeRecord(existing: OutputRecord | undefined, computed: OutputRecord): OutputRecord {
    if (!existing) {
        return OutputRecordSchema.parse(computed);
    }

    const merged: OutputRecord = {
        ...pickListenFields(computed),
        starred: existing.starred,
    };

    if (computed.artist_name.trim() === '' && existing.artist_name.trim() !== '') {
        merged.artist_name = existing.artist_name;
        if (existing.artist_source) merged.artist_source = existing.artist_source;
    }

    if (computed.genre === undefined && existing.genre !== undefined) {
        merged.genre = existing.genre;
    }

    const strava = hasStravaMatch(computed) ? pickStravaFields(computed) : pickStravaFields(existing);

    return OutputRecordSchema.parse({ ...merged, ...strava });
}

function pairWithExisting(
    existing: OutputRecord[],
    computed: OutputRecord[]
): Array<OutputRecord | undefined> {
    const claimed = new Set<number>();
    const pairs: Array<OutputRecord | undefined> = new Array(computed.length).fill(undefined);

    const byKey = new Map<string, number>();
    existing.forEach((record, index) => {
        const key = recordKey(record);
        if (!byKey.has(key)) byKey.set(key, index);
    });

    // Exact identity first, so a fallback never steals a record someone owns outright
    computed.forEach((record, i) => {
        const index = byKey.get(recordKey(record));
        if (index !== undefined && !claimed.has(index)) {
            claimed.add(index);
            pairs[i] = existing[index];
        }
    });

    const byAlbum = new Map<string, number[]>();
    existing.forEach((record, index) => {
        const key = albumKey(record);
        byAlbum.set(key, [...(byAlbum.get(key) ?? []), index]);
    });

    computed.forEach((record, i) => {
        if (pairs[i]) return;
        const candidates = byAlbum.get(albumKey(record)) ?? [];
        const index = candidates.find(
            (candidate) => !claimed.has(candidate) && canMatchByAlbum(record, existing[candidate])
        );
        if (index !== undefined) {
            claimed.add(index);
            pairs[i] = existing[index];
        }
    });

    return pairs;
}

/**
 * Refresh `existing` with `computed`. Every computed identity is kept, records
 * found only in `existing` are dropped, and protected fields carry over through
 * mergeRecord. Pure and idempotent: merging the result with the same
 * `computed` again yields the same records.
 */
export function mergeRecords(existing: OutputRecord[], computed: OutputRecord[]): OutputRecord[] {
    return mergeRecordsWithSummary(existing, computed).records;
}

export function mergeRecordsWithSummary(
    existing: OutputRecord[],
    computed: OutputRecord[]
): { records: OutputRecord[]; summary: MergeSummary } {
    const incoming = dedupeByKey(computed);
    const pairs = pairWithExisting(existing, incoming);

    const summary: MergeSummary = { added: 0, updated: 0, dropped: 0, starsPreserved: 0 };
    const merged = incoming.map((record, i) => {
        const previous = pairs[i];
        if (previous) {
            summary.updated++;
            if (previous.starred) summary.starsPreserved++;
        } else {
            summary.added++;
        }
        return mergeRecord(previous, record);
    });

    summary.dropped = existing.length - summary.updated;

    return { records: dedupeByKey(merged), summary };
}
