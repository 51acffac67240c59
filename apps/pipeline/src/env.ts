
import { z } from 'zod';
import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env from project root
// This ensures env vars are present before validation
config({ path: resolve(__dirname, '../../../.env') });

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_PRETTY: booleanFlag('false'),

    PLAY_ACTIVITY_CSV: z.string().min(1).default('Apple Music Play Activity.csv'),
    CONTAINER_DETAILS_CSV: z.string().min(1).default('Apple Music - Container Details.csv'),
    OUTPUT_PATH: z.string().min(1).default('data/data.json'),
    TOKEN_PATH: z.string().min(1).default('.strava-tokens.json'),

    STRAVA_CLIENT_ID: z.string().min(1).optional(),
    STRAVA_CLIENT_SECRET: z.string().min(1).optional(),
    STRAVA_ACCESS_TOKEN: z.string().min(1).optional(),
    STRAVA_REFRESH_TOKEN: z.string().min(1).optional(),
    STRAVA_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
    STRAVA_REQUEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
    STRAVA_PER_PAGE: z.coerce.number().int().min(1).max(200).default(200),
    // Saved /athlete/activities export; used instead of the API when set
    STRAVA_ACTIVITIES_JSON: z.string().min(1).optional(),

    MATCH_WINDOW_MINUTES: z.coerce.number().positive().default(30),
    FETCH_BUFFER_DAYS: z.coerce.number().nonnegative().default(7),
    WATCH_ONLY: booleanFlag('true'),
    LISTEN_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
    MIN_COMPLETION_RATIO: z.coerce.number().min(0).max(1).default(0.5),
    INCLUDE_HEARTRATE: booleanFlag('false'),

    ITUNES_REQUEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5000),
    ITUNES_MAX_REQUESTS: z.coerce.number().int().positive().default(50),
});

const _env = envSchema.safeParse(process.env);

if (!_env.success) {
    console.error('Invalid environment variables:');
    console.error(JSON.stringify(_env.error.format(), null, 2));
    process.exit(1);
}

export const env = _env.data;

// Type inference
export type Env = z.infer<typeof envSchema>;
