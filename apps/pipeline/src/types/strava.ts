// Subset of the Strava v3 API payloads the pipeline reads

export interface StravaSummaryActivity {
    id: number;
    name: string;
    type: string;
    sport_type?: string;
    start_date: string;
    distance: number;
    moving_time: number;
    elapsed_time: number;
    total_elevation_gain?: number;
    average_speed?: number;
    max_speed?: number;
    average_cadence?: number;
    has_heartrate?: boolean;
    average_heartrate?: number;
    max_heartrate?: number;
}

export interface StravaTokenResponse {
    token_type: string;
    access_token: string;
    refresh_token: string;
    expires_at: number;
    expires_in: number;
}

export interface StravaFaultResponse {
    message?: string;
    errors?: Array<{ resource?: string; field?: string; code?: string }>;
}

export interface ActivitySession {
    activityId: number;
    name: string;
    activityType: string;
    startTime: Date;
    durationSeconds: number;
    elapsedSeconds: number;
    distanceMeters: number;
    elevationGainMeters?: number;
    averageSpeedMps?: number;
    maxSpeedMps?: number;
    averageCadence?: number;
    averageHeartrate?: number;
    maxHeartrate?: number;
}

export type FetchStopReason =
    | 'exhausted'
    | 'request_cap'
    | 'rate_limited'
    | 'auth_failed'
    | 'fetch_failed';

export interface ActivityFetchResult {
    activities: ActivitySession[];
    complete: boolean;
    stopReason: FetchStopReason;
    requestsMade: number;
}
