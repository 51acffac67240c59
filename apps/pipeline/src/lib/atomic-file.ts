import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { dirname, basename, join } from 'path';

// Writes through a sibling temp file and renames it over the target, so a
// reader sees either the old contents or the new ones, never a partial file.
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
    const directory = dirname(path);
    await mkdir(directory, { recursive: true });

    const tempPath = join(directory, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
    await writeFile(tempPath, contents, 'utf-8');

    try {
        await rename(tempPath, path);
    } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
    }
}

export function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
