import { Readable } from 'stream';
import { createCsvRowStream, isCsvRow, readField } from '../../src/lib/csv';

async function collect(text: string) {
    const stream = createCsvRowStream(Readable.from([text]));
    const rows: unknown[] = [];
    for await (const row of stream.rows) {
        rows.push(row);
    }
    return { rows, skipped: stream.skipped() };
}

describe('createCsvRowStream', () => {
    test('keys rows by header', async () => {
        const { rows, skipped } = await collect('Album,Artist\nBlue Lines,Massive Attack\n');

        expect(rows).toEqual([{ Album: 'Blue Lines', Artist: 'Massive Attack' }]);
        expect(skipped).toBe(0);
    });

    test('keeps a short row with the missing columns undefined', async () => {
        const { rows, skipped } = await collect('Album,Artist,Genre\nMezzanine,Massive Attack\n');

        expect(rows).toHaveLength(1);
        expect(rows[0]).toMatchObject({ Album: 'Mezzanine', Artist: 'Massive Attack' });
        expect(isCsvRow(rows[0]) && readField(rows[0], 'Genre')).toBe('');
        expect(skipped).toBe(0);
    });
});
