// Mock p-retry to avoid retry delays
jest.mock('p-retry', () => ({
    __esModule: true,
    default: jest.fn(async (fn: () => Promise<unknown>) => fn()),
}));

import { mockFetch, restoreFetch, createMockResponse, recordedRequests } from '../mocks/fetch.mock';
import { listAthleteActivities, readRateLimitUsage } from '../../src/lib/strava-api';
import {
    StravaUnauthenticatedError,
    StravaForbiddenError,
    StravaRateLimitError,
    StravaDownError,
    StravaApiError,
} from '../../src/lib/strava-errors';

const activity = {
    id: 42,
    name: 'Morning Run',
    type: 'Run',
    start_date: '2024-05-01T07:00:00Z',
    distance: 5000,
    moving_time: 1500,
    elapsed_time: 1600,
    total_elevation_gain: 12.5,
    average_speed: 3.33,
    max_speed: 4.1,
    average_heartrate: null,
};

describe('strava-api', () => {
    afterEach(() => {
        restoreFetch();
    });

    describe('listAthleteActivities', () => {
        test('returns validated activities', async () => {
            mockFetch(async () => createMockResponse(200, [activity]));

            const result = await listAthleteActivities('valid-token');
            expect(result).toHaveLength(1);
            expect(result[0].id).toBe(42);
            expect(result[0].total_elevation_gain).toBe(12.5);
            expect(result[0].average_heartrate).toBeUndefined();
        });

        test('sends paging and time range parameters', async () => {
            mockFetch(async () => createMockResponse(200, []));

            await listAthleteActivities('token', { after: 1000.9, before: 2000, page: 3, perPage: 50 });

            const url = new URL(recordedRequests()[0].url);
            expect(url.pathname).toBe('/api/v3/athlete/activities');
            expect(url.searchParams.get('per_page')).toBe('50');
            expect(url.searchParams.get('page')).toBe('3');
            expect(url.searchParams.get('after')).toBe('1000');
            expect(url.searchParams.get('before')).toBe('2000');
        });

        test('sends the bearer token', async () => {
            mockFetch(async () => createMockResponse(200, []));

            await listAthleteActivities('test-access-token');

            expect(recordedRequests()[0].init?.headers).toEqual({ Authorization: 'Bearer test-access-token' });
        });

        test('throws StravaUnauthenticatedError on 401', async () => {
            mockFetch(async () => createMockResponse(401, { message: 'Authorization Error' }));
            await expect(listAthleteActivities('bad-token')).rejects.toThrow(StravaUnauthenticatedError);
        });

        test('throws StravaForbiddenError on 403', async () => {
            mockFetch(async () => createMockResponse(403, { message: 'Forbidden' }));
            await expect(listAthleteActivities('token')).rejects.toThrow(StravaForbiddenError);
        });

        test('throws StravaRateLimitError with Retry-After on 429', async () => {
            mockFetch(async () => createMockResponse(429, {}, { 'Retry-After': '60' }));

            await expect(listAthleteActivities('token')).rejects.toMatchObject({
                name: 'StravaRateLimitError',
                retryAfterSeconds: 60,
            });
        });

        test('defaults Retry-After to 900 seconds', async () => {
            mockFetch(async () => createMockResponse(429, {}));

            const error = await listAthleteActivities('token').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(StravaRateLimitError);
            expect(error).toMatchObject({ retryAfterSeconds: 900 });
        });

        test('throws StravaDownError on 5xx', async () => {
            mockFetch(async () => createMockResponse(503, 'Service Unavailable'));
            await expect(listAthleteActivities('token')).rejects.toThrow(StravaDownError);
        });

        test('throws StravaApiError with the body on other statuses', async () => {
            mockFetch(async () => createMockResponse(400, 'bad paging'));
            await expect(listAthleteActivities('token')).rejects.toThrow('Strava API error: bad paging');
        });

        test('rejects a body of the wrong shape', async () => {
            mockFetch(async () => createMockResponse(200, { activities: [] }));
            await expect(listAthleteActivities('token')).rejects.toThrow(StravaApiError);
        });
    });

    describe('readRateLimitUsage', () => {
        test('reads the 15-minute window', () => {
            const headers = new Headers({ 'X-RateLimit-Limit': '200,2000', 'X-RateLimit-Usage': '185,900' });
            expect(readRateLimitUsage(headers)).toEqual({ limit15Min: 200, usage15Min: 185, remaining15Min: 15 });
        });

        test('returns null when headers are missing or malformed', () => {
            expect(readRateLimitUsage(new Headers())).toBeNull();
            expect(readRateLimitUsage(new Headers({ 'X-RateLimit-Limit': 'x', 'X-RateLimit-Usage': '1' }))).toBeNull();
        });
    });
});
