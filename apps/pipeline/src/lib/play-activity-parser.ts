import type { PlayEvent, ParseSummary } from '../types/listening';
import { createCsvRowStream, isCsvRow, readField, type CsvRow } from './csv';

const SINGLE_SUFFIX = ' - Single';
const WATCH_INDICATORS = ['WATCH', 'WATCHOS'];

export function normalizeAlbumName(name: string): string {
    const trimmed = name.trim();
    if (trimmed.endsWith(SINGLE_SUFFIX)) {
        return trimmed.slice(0, -SINGLE_SUFFIX.length).trim();
    }
    return trimmed;
}

// Non-numeric or negative durations count as zero
export function parseMillis(value: string | undefined): number {
    if (!value) return 0;
    const parsed = Number(value.trim());
    if (!Number.isFinite(parsed) || parsed < 0) return 0;
    return parsed;
}

export function parseEventTimestamp(value: string): Date | null {
    if (!value) return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

export function isWatchDevice(row: CsvRow): boolean {
    const fields = [
        row['Device Type'],
        row['Device OS Name'],
        row['Client Device Name'],
    ].map((value) => (value ?? '').toUpperCase());

    return WATCH_INDICATORS.some((indicator) =>
        fields.some((field) => field.includes(indicator))
    );
}

export function parsePlayRow(row: CsvRow): PlayEvent | null {
    const albumName = normalizeAlbumName(
        readField(row, 'Album Name', 'Container Album Name', 'Container Name')
    );
    const songName = readField(row, 'Song Name');

    if (!albumName || !songName) {
        return null;
    }

    const playedAt = parseEventTimestamp(
        readField(row, 'Event End Timestamp', 'Event Start Timestamp')
    );
    if (!playedAt) {
        return null;
    }

    return {
        albumName,
        songName,
        playedAt,
        playDurationMs: parseMillis(row['Play Duration Milliseconds']),
        mediaDurationMs: parseMillis(row['Media Duration In Milliseconds']),
        isWatchPlay: isWatchDevice(row),
    };
}

export async function extractPlayEventsFromStream(
    fileStream: NodeJS.ReadableStream,
    onProgress?: (processed: number) => void
): Promise<ParseSummary & { events: PlayEvent[] }> {
    const events: PlayEvent[] = [];
    let totalRows = 0;
    let skippedRows = 0;

    const csv = createCsvRowStream(fileStream);

    for await (const row of csv.rows) {
        totalRows++;

        const parsed = isCsvRow(row) ? parsePlayRow(row) : null;
        if (parsed) {
            events.push(parsed);
        } else {
            skippedRows++;
        }

        if (onProgress && totalRows % 10000 === 0) {
            onProgress(totalRows);
        }
    }

    const unparseable = csv.skipped();

    return {
        events,
        totalRows: totalRows + unparseable,
        skippedRows: skippedRows + unparseable,
    };
}
