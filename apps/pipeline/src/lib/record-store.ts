import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { pipeline } from 'stream';
import { parser } from 'stream-json';
import { streamArray } from 'stream-json/streamers/StreamArray';
import { z } from 'zod';
import { OutputRecordSchema, type OutputRecord } from '../types/records';
import { isMissingFileError, writeFileAtomic } from './atomic-file';
import { logger } from './logger';

// StreamArray emits one { key, value } pair per top-level array element
const arrayEntrySchema = z.object({
    key: z.number(),
    value: z.unknown(),
});

async function fileExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch (error) {
        if (isMissingFileError(error)) return false;
        throw error;
    }
}

/**
 * Reads the persisted record array one element at a time. A missing file is
 * an empty set; elements that fail validation are skipped with a warning.
 */
export async function readRecords(path: string): Promise<OutputRecord[]> {
    if (!(await fileExists(path))) {
        logger.info({ path }, 'No existing record file, starting empty');
        return [];
    }

    const records: OutputRecord[] = [];
    let invalid = 0;

    const elements = pipeline(createReadStream(path), parser(), streamArray(), (error) => {
        if (error) logger.debug({ path, err: error }, 'Record file stream closed with an error');
    });

    for await (const chunk of elements) {
        const entry = arrayEntrySchema.safeParse(chunk);
        if (!entry.success) continue;

        const parsed = OutputRecordSchema.safeParse(entry.data.value);
        if (parsed.success) {
            records.push(parsed.data);
        } else {
            invalid++;
            logger.warn(
                { path, index: entry.data.key, issue: parsed.error.issues[0]?.message },
                'Skipping invalid record'
            );
        }
    }

    logger.debug({ path, loaded: records.length, invalid }, 'Loaded existing records');
    return records;
}

export function serializeRecords(records: OutputRecord[]): string {
    const validated = records.map((record) => OutputRecordSchema.parse(record));
    return JSON.stringify(validated, null, 2) + '\n';
}

export async function writeRecords(path: string, records: OutputRecord[]): Promise<void> {
    await writeFileAtomic(path, serializeRecords(records));
    logger.info({ path, records: records.length }, 'Wrote record file');
}

export interface RecordUpdate<T> {
    records: OutputRecord[];
    result: T;
}

export interface UpdateOptions {
    dryRun?: boolean;
}

// Read-modify-write of the record file
export async function updateRecordFile<T>(
    path: string,
    update: (records: OutputRecord[]) => RecordUpdate<T> | Promise<RecordUpdate<T>>,
    options: UpdateOptions = {}
): Promise<T> {
    const existing = await readRecords(path);
    const { records, result } = await update(existing);

    if (options.dryRun) {
        logger.info({ path, records: records.length }, 'Dry run, record file left unchanged');
    } else {
        await writeRecords(path, records);
    }
    return result;
}
