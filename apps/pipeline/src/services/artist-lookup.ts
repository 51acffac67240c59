import { ItunesApiError, searchAlbumArtist } from '../lib/itunes-api';
import { logger } from '../lib/logger';
import type { RequestThrottle } from '../lib/rate-limiter';
import type { OutputRecord } from '../types/records';

export type ArtistSearch = (albumName: string) => Promise<string | null>;

export interface ArtistLookupOptions {
    throttle: RequestThrottle;
    search?: ArtistSearch;
}

export type LookupStopReason = 'request_cap' | 'rate_limited';

export interface ArtistLookupResult {
    records: OutputRecord[];
    found: number;
    notFound: number;
    stopReason: LookupStopReason | null;
}

export function needsArtistLookup(record: OutputRecord): boolean {
    return record.artist_name.trim() === '';
}

/**
 * Fills empty artist names from the iTunes catalogue. Found names are tagged
 * `artist_source: 'lookup'` so later merges keep them. Stops early when the
 * throttle is spent or the API rate-limits, keeping everything found so far.
 */
export async function lookupMissingArtists(
    records: OutputRecord[],
    options: ArtistLookupOptions
): Promise<ArtistLookupResult> {
    const { throttle, search = searchAlbumArtist } = options;
    const log = logger.child({ component: 'artist-lookup' });

    const resolved = new Map<string, string>();
    let found = 0;
    let notFound = 0;
    let stopReason: LookupStopReason | null = null;

    const pending = Array.from(new Set(records.filter(needsArtistLookup).map((record) => record.album_name)));
    log.info({ albums: pending.length }, 'Looking up missing artists');

    for (const albumName of pending) {
        if (!(await throttle.acquire())) {
            stopReason = 'request_cap';
            break;
        }

        try {
            const artist = await search(albumName);
            throttle.recordSuccess();
            if (artist) {
                resolved.set(albumName, artist);
                found++;
                log.debug({ albumName, artist }, 'Artist found');
            } else {
                notFound++;
                log.debug({ albumName }, 'No artist found');
            }
        } catch (error) {
            if (error instanceof ItunesApiError && error.rateLimited) {
                log.warn({ albumName, statusCode: error.statusCode }, 'iTunes rate limit hit, stopping lookup');
                stopReason = 'rate_limited';
                break;
            }
            notFound++;
            log.warn({ albumName, error: error instanceof Error ? error.message : String(error) }, 'Artist lookup failed');
        }
    }

    const updated = records.map((record): OutputRecord => {
        const artist = needsArtistLookup(record) ? resolved.get(record.album_name) : undefined;
        return artist ? { ...record, artist_name: artist, artist_source: 'lookup' } : record;
    });

    log.info({ found, notFound, stopReason }, 'Artist lookup finished');
    return { records: updated, found, notFound, stopReason };
}
