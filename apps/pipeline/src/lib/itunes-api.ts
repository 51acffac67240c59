import { distance } from 'fastest-levenshtein';
import { z } from 'zod';

const ITUNES_SEARCH_URL = 'https://itunes.apple.com/search';

export class ItunesApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly rateLimited: boolean
    ) {
        super(message);
        this.name = 'ItunesApiError';
    }
}

const albumResultSchema = z.object({
    collectionName: z.string().default(''),
    artistName: z.string().default(''),
});

const searchResponseSchema = z.object({
    resultCount: z.number().int().default(0),
    results: z.array(albumResultSchema).default([]),
});

export type ItunesAlbumResult = z.infer<typeof albumResultSchema>;

/**
 * Picks the result that names this album: an exact case-insensitive title
 * first, then a title containing or contained in the album name, then the
 * title with the smallest edit distance.
 */
export function selectAlbumMatch(albumName: string, results: ItunesAlbumResult[]): ItunesAlbumResult | null {
    const target = albumName.trim().toLowerCase();
    const candidates = results.filter((result) => result.artistName.trim() !== '');
    if (candidates.length === 0) return null;

    const titled = candidates.map((result) => ({ result, title: result.collectionName.trim().toLowerCase() }));

    const exact = titled.find(({ title }) => title === target);
    if (exact) return exact.result;

    const containing = titled.find(({ title }) => title !== '' && (title.includes(target) || target.includes(title)));
    if (containing) return containing.result;

    let best = titled[0];
    let bestDistance = distance(best.title, target);
    for (const candidate of titled.slice(1)) {
        const candidateDistance = distance(candidate.title, target);
        if (candidateDistance < bestDistance) {
            best = candidate;
            bestDistance = candidateDistance;
        }
    }
    return best.result;
}

export async function searchAlbums(term: string, limit = 5): Promise<ItunesAlbumResult[]> {
    const params = new URLSearchParams({
        term: term.trim(),
        entity: 'album',
        limit: String(limit),
    });

    const response = await fetch(`${ITUNES_SEARCH_URL}?${params.toString()}`);

    if (response.status === 403 || response.status === 429) {
        throw new ItunesApiError('iTunes search rate limited', response.status, true);
    }
    if (!response.ok) {
        throw new ItunesApiError(`iTunes search failed with status ${response.status}`, response.status, false);
    }

    const parsed = searchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
        throw new ItunesApiError('Unexpected iTunes search response', response.status, false);
    }
    return parsed.data.results;
}

// Artist of the best-matching album, or null when nothing plausible came back
export async function searchAlbumArtist(albumName: string): Promise<string | null> {
    const results = await searchAlbums(albumName);
    return selectAlbumMatch(albumName, results)?.artistName ?? null;
}
