import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../lib/logger';
import { RequestThrottle } from '../lib/rate-limiter';
import { listAthleteActivities, summaryActivitySchema } from '../lib/strava-api';
import { RequestCapReachedError, StravaRateLimitError, StravaUnauthenticatedError } from '../lib/strava-errors';
import type { AccessTokenSource } from '../lib/token-manager';
import type {
    ActivityFetchResult,
    ActivitySession,
    FetchStopReason,
    StravaSummaryActivity,
} from '../types/strava';

const RUN_TYPES = new Set(['Run', 'VirtualRun']);

export type ActivityTypePredicate = (activityType: string) => boolean;

export const isRun: ActivityTypePredicate = (activityType) => RUN_TYPES.has(activityType);

export interface ActivityProvider {
    listActivities(start: Date, end: Date): Promise<ActivityFetchResult>;
}

export function normalizeActivity(activity: StravaSummaryActivity): ActivitySession | null {
    const startTime = new Date(activity.start_date);
    if (Number.isNaN(startTime.getTime())) {
        return null;
    }

    return {
        activityId: activity.id,
        name: activity.name,
        activityType: activity.type,
        startTime,
        durationSeconds: activity.moving_time,
        elapsedSeconds: activity.elapsed_time,
        distanceMeters: activity.distance,
        elevationGainMeters: activity.total_elevation_gain,
        averageSpeedMps: activity.average_speed,
        maxSpeedMps: activity.max_speed,
        averageCadence: activity.average_cadence,
        averageHeartrate: activity.average_heartrate,
        maxHeartrate: activity.max_heartrate,
    };
}

function normalizeAll(activities: StravaSummaryActivity[]): ActivitySession[] {
    const sessions: ActivitySession[] = [];
    for (const activity of activities) {
        const session = normalizeActivity(activity);
        if (session) sessions.push(session);
    }
    return sessions;
}

// Activities already on hand (a saved export, or fixtures); never incomplete
export class StaticActivityProvider implements ActivityProvider {
    private readonly sessions: ActivitySession[];

    constructor(activities: StravaSummaryActivity[]) {
        this.sessions = normalizeAll(activities);
    }

    static async fromFile(path: string): Promise<StaticActivityProvider> {
        const parsed = z.array(summaryActivitySchema).safeParse(JSON.parse(await readFile(path, 'utf-8')));
        if (!parsed.success) {
            throw new Error(`Activity file ${path} is not an array of Strava activities: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }
        logger.info({ path, activities: parsed.data.length }, 'Loaded saved Strava activities');
        return new StaticActivityProvider(parsed.data);
    }

    async listActivities(start: Date, end: Date): Promise<ActivityFetchResult> {
        const activities = this.sessions.filter(
            (session) => session.startTime >= start && session.startTime <= end
        );
        return { activities, complete: true, stopReason: 'exhausted', requestsMade: 0 };
    }
}

export interface StravaActivityProviderOptions {
    tokens: AccessTokenSource;
    throttle: RequestThrottle;
    perPage?: number;
    listPage?: typeof listAthleteActivities;
}

type PageResult =
    | { ok: true; items: StravaSummaryActivity[] }
    | { ok: false; reason: FetchStopReason };

// Pages through /athlete/activities. Stops without throwing on the request cap,
// a 429, an unrecoverable 401 or any other failure, keeping what it already has.
export class StravaActivityProvider implements ActivityProvider {
    private readonly tokens: AccessTokenSource;
    private readonly throttle: RequestThrottle;
    private readonly perPage: number;
    private readonly listPage: typeof listAthleteActivities;
    private requestsMade = 0;

    constructor(options: StravaActivityProviderOptions) {
        this.tokens = options.tokens;
        this.throttle = options.throttle;
        this.perPage = options.perPage ?? 200;
        this.listPage = options.listPage ?? listAthleteActivities;
    }

    async listActivities(start: Date, end: Date): Promise<ActivityFetchResult> {
        const log = logger.child({ provider: 'strava' });
        const activities: ActivitySession[] = [];
        this.requestsMade = 0;

        const finish = (stopReason: FetchStopReason): ActivityFetchResult => {
            const complete = stopReason === 'exhausted';
            const level = complete ? 'info' : 'warn';
            log[level](
                { stopReason, fetched: activities.length, requestsMade: this.requestsMade },
                complete ? 'Strava activity fetch complete' : 'Strava activity fetch stopped early'
            );
            return { activities, complete, stopReason, requestsMade: this.requestsMade };
        };

        let accessToken = await this.safeToken(() => this.tokens.getAccessToken());
        if (!accessToken) {
            return finish('auth_failed');
        }

        const after = Math.floor(start.getTime() / 1000);
        const before = Math.floor(end.getTime() / 1000);

        for (let page = 1; ; page++) {
            let result = await this.requestPage(accessToken, page, after, before);

            // One refresh and one retry per 401, then give up
            if (!result.ok && result.reason === 'auth_failed') {
                log.info({ page }, 'Strava access token rejected, refreshing');
                const refreshed = await this.safeToken(() => this.tokens.refresh());
                if (!refreshed) {
                    return finish('auth_failed');
                }
                accessToken = refreshed;
                result = await this.requestPage(accessToken, page, after, before);
            }

            if (!result.ok) {
                return finish(result.reason);
            }

            if (result.items.length === 0) {
                return finish('exhausted');
            }

            activities.push(...normalizeAll(result.items));
            log.debug({ page, received: result.items.length }, 'Fetched Strava activity page');
        }
    }

    private async requestPage(
        accessToken: string,
        page: number,
        after: number,
        before: number
    ): Promise<PageResult> {
        if (!(await this.spendRequest())) {
            return { ok: false, reason: 'request_cap' };
        }

        try {
            const items = await this.listPage(
                accessToken,
                { after, before, page, perPage: this.perPage },
                () => this.spendRequest()
            );
            this.throttle.recordSuccess();
            return { ok: true, items };
        } catch (error) {
            if (error instanceof RequestCapReachedError) {
                return { ok: false, reason: 'request_cap' };
            }
            if (error instanceof StravaUnauthenticatedError) {
                return { ok: false, reason: 'auth_failed' };
            }
            if (error instanceof StravaRateLimitError) {
                this.throttle.handleRateLimit(error.retryAfterSeconds);
                return { ok: false, reason: 'rate_limited' };
            }
            logger.warn({ err: error, page }, 'Strava activity page failed');
            return { ok: false, reason: 'fetch_failed' };
        }
    }

    // Every HTTP attempt, retries included, waits its turn and counts against the cap
    private async spendRequest(): Promise<boolean> {
        if (!(await this.throttle.acquire())) {
            return false;
        }
        this.requestsMade++;
        return true;
    }

    private async safeToken(read: () => Promise<string | null>): Promise<string | null> {
        try {
            return await read();
        } catch (error) {
            logger.warn({ err: error }, 'Could not obtain a Strava access token');
            return null;
        }
    }
}

// Runs only by default; the provider stays unaware of activity kinds
export class ActivityStore {
    constructor(
        private readonly provider: ActivityProvider,
        private readonly predicate: ActivityTypePredicate = isRun
    ) { }

    async loadActivities(start: Date, end: Date): Promise<ActivityFetchResult> {
        const result = await this.provider.listActivities(start, end);
        return {
            ...result,
            activities: result.activities.filter((activity) => this.predicate(activity.activityType)),
        };
    }
}
