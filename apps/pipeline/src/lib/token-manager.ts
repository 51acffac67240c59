import { readFile } from 'fs/promises';
import { z } from 'zod';
import { env } from '../env';
import type { StravaTokenResponse } from '../types/strava';
import { writeFileAtomic, isMissingFileError } from './atomic-file';
import { logger } from './logger';
import { refreshAccessToken } from './strava-auth';
import { TokenRefreshError } from './strava-errors';

// Strava access tokens live 6 hours; refresh when fewer than 5 minutes remain
const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

const storedTokensSchema = z.object({
    accessToken: z.string(),
    refreshToken: z.string().min(1),
    expiresAt: z.number().nullable(), // epoch seconds; null when unknown
});

export type StoredTokens = z.infer<typeof storedTokensSchema>;

export interface TokenStore {
    load(): Promise<StoredTokens | null>;
    save(tokens: StoredTokens): Promise<void>;
}

export type RefreshFn = (refreshToken: string) => Promise<StravaTokenResponse>;

// What the activity fetch loop needs: a token now, and a way to get a new one after a 401
export interface AccessTokenSource {
    getAccessToken(): Promise<string | null>;
    refresh(): Promise<string | null>;
}

export function seedTokensFromEnv(): StoredTokens | null {
    if (!env.STRAVA_REFRESH_TOKEN) {
        return null;
    }
    return {
        accessToken: env.STRAVA_ACCESS_TOKEN ?? '',
        refreshToken: env.STRAVA_REFRESH_TOKEN,
        expiresAt: null,
    };
}

// Tokens persisted as JSON; falls back to the seed until the first refresh writes the file
export class FileTokenStore implements TokenStore {
    constructor(
        private readonly path: string,
        private readonly seed: StoredTokens | null = null
    ) { }

    async load(): Promise<StoredTokens | null> {
        let raw: string;
        try {
            raw = await readFile(this.path, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                return this.seed;
            }
            throw error;
        }

        try {
            const parsed = storedTokensSchema.safeParse(JSON.parse(raw));
            if (parsed.success) {
                return parsed.data;
            }
        } catch (error) {
            logger.warn({ path: this.path, err: error }, 'Token file is not valid JSON');
            return this.seed;
        }

        logger.warn({ path: this.path }, 'Token file has an unexpected shape, ignoring it');
        return this.seed;
    }

    async save(tokens: StoredTokens): Promise<void> {
        await writeFileAtomic(this.path, JSON.stringify(tokens, null, 2) + '\n');
    }
}

export class MemoryTokenStore implements TokenStore {
    constructor(private tokens: StoredTokens | null = null) { }

    async load(): Promise<StoredTokens | null> {
        return this.tokens;
    }

    async save(tokens: StoredTokens): Promise<void> {
        this.tokens = tokens;
    }
}

function needsRefresh(tokens: StoredTokens, now: number): boolean {
    if (!tokens.accessToken) return true;
    if (tokens.expiresAt === null) return false;
    return tokens.expiresAt * 1000 - now < REFRESH_THRESHOLD_MS;
}

// Gets a valid access token, refreshing if needed
export async function getValidAccessToken(
    store: TokenStore,
    refresh: RefreshFn = refreshAccessToken
): Promise<string | null> {
    const tokens = await store.load();

    if (!tokens) {
        return null;
    }

    if (needsRefresh(tokens, Date.now())) {
        return refreshStoredToken(store, refresh);
    }

    return tokens.accessToken;
}

// Refreshes the token and persists the new pair
export async function refreshStoredToken(
    store: TokenStore,
    refresh: RefreshFn = refreshAccessToken
): Promise<string | null> {
    const tokens = await store.load();

    if (!tokens) {
        return null;
    }

    try {
        const response = await refresh(tokens.refreshToken);

        // Strava may rotate the refresh token
        await store.save({
            accessToken: response.access_token,
            refreshToken: response.refresh_token || tokens.refreshToken,
            expiresAt: response.expires_at,
        });

        logger.info({ expiresAt: new Date(response.expires_at * 1000).toISOString() }, 'Strava access token refreshed');
        return response.access_token;
    } catch (error) {
        if (error instanceof TokenRefreshError && error.isRevoked) {
            logger.error({ stravaError: error.stravaError }, 'Strava refresh token revoked; re-authorize the app');
            return null;
        }

        logger.error({ err: error }, 'Strava token refresh failed');
        throw error;
    }
}

export function createTokenSource(
    store: TokenStore,
    refresh: RefreshFn = refreshAccessToken
): AccessTokenSource {
    return {
        getAccessToken: () => getValidAccessToken(store, refresh),
        refresh: () => refreshStoredToken(store, refresh),
    };
}
