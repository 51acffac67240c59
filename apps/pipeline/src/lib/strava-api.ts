import pRetry from 'p-retry';
import { z } from 'zod';
import type { StravaSummaryActivity } from '../types/strava';
import { logger } from './logger';
import {
    StravaApiError,
    StravaUnauthenticatedError,
    StravaForbiddenError,
    StravaRateLimitError,
    StravaDownError,
    RequestCapReachedError,
} from './strava-errors';

const STRAVA_API_URL = 'https://www.strava.com/api/v3';
const LOW_QUOTA_WARNING = 20;

const optionalNumber = z.number().nullish().transform((value) => value ?? undefined);

export const summaryActivitySchema = z.object({
    id: z.number().int(),
    name: z.string().default(''),
    type: z.string(),
    sport_type: z.string().optional(),
    start_date: z.string(),
    distance: z.number().default(0),
    moving_time: z.number().default(0),
    elapsed_time: z.number().default(0),
    total_elevation_gain: optionalNumber,
    average_speed: optionalNumber,
    max_speed: optionalNumber,
    average_cadence: optionalNumber,
    has_heartrate: z.boolean().optional(),
    average_heartrate: optionalNumber,
    max_heartrate: optionalNumber,
}) satisfies z.ZodType<StravaSummaryActivity, z.ZodTypeDef, unknown>;

const activityListSchema = z.array(summaryActivitySchema);

export interface ListActivitiesOptions {
    after?: number;   // epoch seconds
    before?: number;  // epoch seconds
    page?: number;
    perPage?: number; // 1-200, default 200
}

export interface RateLimitUsage {
    limit15Min: number;
    usage15Min: number;
    remaining15Min: number;
}

// X-RateLimit-Limit / X-RateLimit-Usage carry "15-minute,daily" pairs
export function readRateLimitUsage(headers: Pick<Headers, 'get'>): RateLimitUsage | null {
    const limit = headers.get('X-RateLimit-Limit');
    const usage = headers.get('X-RateLimit-Usage');
    if (!limit || !usage) return null;

    const limit15Min = parseInt(limit.split(',')[0] ?? '', 10);
    const usage15Min = parseInt(usage.split(',')[0] ?? '', 10);
    if (Number.isNaN(limit15Min) || Number.isNaN(usage15Min)) return null;

    return { limit15Min, usage15Min, remaining15Min: limit15Min - usage15Min };
}

// Handle API response and throw appropriate errors
async function handleResponse<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const quota = readRateLimitUsage(response.headers);
    if (quota && quota.remaining15Min < LOW_QUOTA_WARNING) {
        logger.warn(quota, 'Strava 15-minute request quota running low');
    }

    if (response.ok) {
        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
            throw new StravaApiError(
                `Unexpected Strava response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
                response.status,
                false
            );
        }
        return parsed.data;
    }

    if (response.status === 401) {
        throw new StravaUnauthenticatedError();
    }

    if (response.status === 403) {
        throw new StravaForbiddenError();
    }

    if (response.status === 429) {
        const retryAfter = parseInt(response.headers.get('Retry-After') || '900', 10);
        throw new StravaRateLimitError(retryAfter);
    }

    if (response.status >= 500) {
        throw new StravaDownError(response.status);
    }

    // Other errors
    const errorText = await response.text();
    throw new StravaApiError(`Strava API error: ${errorText}`, response.status, false);
}

// Callback that spends one unit of the caller's request budget; false means none is left
export type AttemptGate = () => Promise<boolean>;

// Wrapper for fetch with retry logic (retries only retryable errors, each retry through the gate)
async function fetchWithRetry<T>(
    url: string,
    accessToken: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    beforeRetry?: AttemptGate
): Promise<T> {
    return pRetry(
        async () => {
            const response = await fetch(url, {
                headers: {
                    Authorization: `Bearer ${accessToken}`,
                },
            });
            return handleResponse(response, schema);
        },
        {
            retries: 3,
            onFailedAttempt: async (error) => {
                if (!(error instanceof StravaApiError) || !error.retryable) {
                    throw error;
                }
                if (beforeRetry && !(await beforeRetry())) {
                    throw new RequestCapReachedError();
                }
                logger.warn(
                    { attempt: error.attemptNumber, retriesLeft: error.retriesLeft },
                    'Strava API attempt failed, retrying'
                );
            },
        }
    );
}

// One page of the authenticated athlete's activities, newest first
export async function listAthleteActivities(
    accessToken: string,
    options: ListActivitiesOptions = {},
    beforeRetry?: AttemptGate
): Promise<StravaSummaryActivity[]> {
    const params = new URLSearchParams();

    params.set('per_page', String(options.perPage || 200));
    params.set('page', String(options.page || 1));

    if (options.after !== undefined) {
        params.set('after', String(Math.floor(options.after)));
    }
    if (options.before !== undefined) {
        params.set('before', String(Math.floor(options.before)));
    }

    const url = `${STRAVA_API_URL}/athlete/activities?${params.toString()}`;
    return fetchWithRetry(url, accessToken, activityListSchema, beforeRetry);
}
