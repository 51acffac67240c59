import { parse, type Parser } from 'csv-parse';

export type CsvRow = Record<string, string | undefined>;

export function isCsvRow(value: unknown): value is CsvRow {
    if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
    return Object.values(value).every((v) => v === undefined || typeof v === 'string');
}

export interface CsvRowStream {
    rows: Parser;
    // Number of records csv-parse dropped because they could not be parsed
    skipped: () => number;
}

// Header-keyed rows. Records csv-parse cannot parse (broken quoting) are skipped;
// short rows are kept with the missing columns undefined.
export function createCsvRowStream(input: NodeJS.ReadableStream): CsvRowStream {
    let skipped = 0;

    const rows = parse({
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        skip_records_with_error: true,
        trim: false,
    });
    rows.on('skip', () => {
        skipped++;
    });

    // pipe() does not forward source errors; without this a missing file never ends
    input.on('error', (error: Error) => rows.destroy(error));
    input.pipe(rows);

    return { rows, skipped: () => skipped };
}

export function readField(row: CsvRow, ...names: string[]): string {
    for (const name of names) {
        const value = row[name]?.trim();
        if (value) return value;
    }
    return '';
}
