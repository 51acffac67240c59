import { z } from 'zod';
import { env } from '../env';
import type { StravaFaultResponse, StravaTokenResponse } from '../types/strava';
import { TokenRefreshError } from './strava-errors';

const STRAVA_TOKEN_URL = 'https://www.strava.com/oauth/token';

const tokenResponseSchema = z.object({
    token_type: z.string().default('Bearer'),
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_at: z.number(),
    expires_in: z.number().default(0),
}) satisfies z.ZodType<StravaTokenResponse, z.ZodTypeDef, unknown>;

const faultSchema = z.object({
    message: z.string().optional(),
    errors: z.array(z.object({
        resource: z.string().optional(),
        field: z.string().optional(),
        code: z.string().optional(),
    })).optional(),
}) satisfies z.ZodType<StravaFaultResponse, z.ZodTypeDef, unknown>;

function getClientCredentials() {
    const clientId = env.STRAVA_CLIENT_ID;
    const clientSecret = env.STRAVA_CLIENT_SECRET;

    if (!clientId || !clientSecret) {
        throw new Error('Missing Strava OAuth environment variables (STRAVA_CLIENT_ID, STRAVA_CLIENT_SECRET)');
    }

    return { clientId, clientSecret };
}

export function hasStravaCredentials(): boolean {
    return Boolean(env.STRAVA_CLIENT_ID && env.STRAVA_CLIENT_SECRET);
}

function parseFault(text: string): StravaFaultResponse {
    try {
        const parsed = faultSchema.safeParse(JSON.parse(text));
        return parsed.success ? parsed.data : {};
    } catch {
        // Not JSON, use raw text
        return {};
    }
}

// A refresh token Strava no longer accepts comes back as an invalid RefreshToken fault
function isRevokedFault(status: number, fault: StravaFaultResponse): boolean {
    if (status === 401) return true;
    return (fault.errors ?? []).some(
        (error) => error.resource === 'RefreshToken' && error.code === 'invalid'
    );
}

// Refresh access token using refresh token
export async function refreshAccessToken(refreshToken: string): Promise<StravaTokenResponse> {
    const { clientId, clientSecret } = getClientCredentials();

    const params = new URLSearchParams({
        client_id: clientId,
        client_secret: clientSecret,
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
    });

    const response = await fetch(STRAVA_TOKEN_URL, {
        method: 'POST',
        headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: params.toString(),
    });

    if (!response.ok) {
        const errorText = await response.text();
        const fault = parseFault(errorText);
        const firstError = fault.errors?.[0];

        throw new TokenRefreshError(
            `Token refresh failed: ${fault.message || errorText}`,
            isRevokedFault(response.status, fault),
            firstError ? `${firstError.resource ?? ''}:${firstError.code ?? ''}` : undefined
        );
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
        throw new TokenRefreshError('Token refresh returned an unexpected body', false);
    }
    return parsed.data;
}
