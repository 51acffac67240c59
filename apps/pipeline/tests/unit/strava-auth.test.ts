import { mockFetch, restoreFetch, createMockResponse, recordedRequests } from '../mocks/fetch.mock';
import { refreshAccessToken, hasStravaCredentials } from '../../src/lib/strava-auth';
import { TokenRefreshError } from '../../src/lib/strava-errors';

describe('strava-auth', () => {
    afterEach(() => {
        restoreFetch();
    });

    test('reports client credentials from the test environment', () => {
        expect(hasStravaCredentials()).toBe(true);
    });

    describe('refreshAccessToken', () => {
        const tokenBody = {
            token_type: 'Bearer',
            access_token: 'new-access',
            refresh_token: 'new-refresh',
            expires_at: 1714560000,
            expires_in: 21600,
        };

        test('posts the refresh grant as form data', async () => {
            mockFetch(async () => createMockResponse(200, tokenBody));

            await refreshAccessToken('old-refresh');

            const [request] = recordedRequests();
            expect(request.url).toBe('https://www.strava.com/oauth/token');
            expect(request.init?.method).toBe('POST');
            const form = new URLSearchParams(String(request.init?.body));
            expect(form.get('client_id')).toBe('test-client');
            expect(form.get('client_secret')).toBe('test-secret');
            expect(form.get('grant_type')).toBe('refresh_token');
            expect(form.get('refresh_token')).toBe('old-refresh');
        });

        test('returns the rotated token pair', async () => {
            mockFetch(async () => createMockResponse(200, tokenBody));

            const result = await refreshAccessToken('old-refresh');
            expect(result.access_token).toBe('new-access');
            expect(result.refresh_token).toBe('new-refresh');
            expect(result.expires_at).toBe(1714560000);
        });

        test('marks an invalid refresh token as revoked', async () => {
            mockFetch(async () =>
                createMockResponse(400, {
                    message: 'Bad Request',
                    errors: [{ resource: 'RefreshToken', field: 'refresh_token', code: 'invalid' }],
                })
            );

            const error = await refreshAccessToken('dead-refresh').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(TokenRefreshError);
            expect(error).toMatchObject({
                isRevoked: true,
                stravaError: 'RefreshToken:invalid',
                message: 'Token refresh failed: Bad Request',
            });
        });

        test('does not mark a server error as revoked', async () => {
            mockFetch(async () => createMockResponse(500, 'upstream down'));

            const error = await refreshAccessToken('old-refresh').catch((e: unknown) => e);
            expect(error).toMatchObject({
                isRevoked: false,
                message: 'Token refresh failed: upstream down',
            });
        });

        test('rejects an unexpected success body', async () => {
            mockFetch(async () => createMockResponse(200, { access_token: 'only-half' }));

            await expect(refreshAccessToken('old-refresh')).rejects.toThrow(
                'Token refresh returned an unexpected body'
            );
        });
    });
});
