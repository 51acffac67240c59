import type { AlbumMetadataIndex } from '../types/listening';
import { createCsvRowStream, isCsvRow, readField, type CsvRow } from './csv';
import { normalizeAlbumName } from './play-activity-parser';

const GENERIC_GENRES = new Set(['music']);

export interface ContainerEntry {
    albumName: string;
    artistName?: string;
    genre?: string;
}

// "Pop, Music, Rock" -> "Pop, Rock"
export function cleanGenres(genres: string): string {
    return genres
        .split(',')
        .map((genre) => genre.trim())
        .filter((genre) => genre && !GENERIC_GENRES.has(genre.toLowerCase()))
        .join(', ');
}

export function parseContainerRow(row: CsvRow): ContainerEntry | null {
    if (readField(row, 'Container Type') !== 'ALBUM') {
        return null;
    }

    const description = readField(row, 'Container Description');
    if (!description) {
        return null;
    }

    const genre = cleanGenres(readField(row, 'Genres')) || undefined;

    // Descriptions read "Artist - Album"; only the first separator splits
    const separator = description.indexOf(' - ');
    if (separator > 0) {
        const albumName = normalizeAlbumName(description.slice(separator + 3));
        if (!albumName) return null;
        return {
            albumName,
            artistName: description.slice(0, separator).trim() || undefined,
            genre,
        };
    }

    const albumName = normalizeAlbumName(description);
    const artistName = readField(row, 'Artists') || undefined;
    if (!artistName && !genre) {
        return null;
    }

    return { albumName, artistName, genre };
}

export async function extractAlbumMetadataFromStream(
    fileStream: NodeJS.ReadableStream
): Promise<{ metadata: AlbumMetadataIndex; totalRows: number; skippedRows: number }> {
    const metadata: AlbumMetadataIndex = new Map();
    let totalRows = 0;
    let skippedRows = 0;

    const csv = createCsvRowStream(fileStream);

    for await (const row of csv.rows) {
        totalRows++;

        const entry = isCsvRow(row) ? parseContainerRow(row) : null;
        if (!entry) {
            skippedRows++;
            continue;
        }

        // First occurrence wins for each field independently
        const current = metadata.get(entry.albumName) ?? {};
        metadata.set(entry.albumName, {
            artistName: current.artistName ?? entry.artistName,
            genre: current.genre ?? entry.genre,
        });
    }

    return {
        metadata,
        totalRows: totalRows + csv.skipped(),
        skippedRows: skippedRows + csv.skipped(),
    };
}
