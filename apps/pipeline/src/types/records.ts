import { z } from 'zod';

// Shape of one entry in the viewer's data.json. Field names are snake_case
// because the static viewer reads the file as-is.

export const ListenFieldsSchema = z.object({
    album_name: z.string().min(1),
    artist_name: z.string().default(''),
    artist_source: z.enum(['container', 'lookup']).optional(),
    genre: z.string().optional(),
    total_tracks: z.number().int().nonnegative(),
    listened_tracks: z.number().int().nonnegative(),
    play_count: z.number().int().nonnegative(),
    completion_ratio: z.number().min(0).max(1),
    completion_percentage: z.number().min(0).max(100),
    first_listen: z.string().datetime({ offset: true }),
    last_listen: z.string().datetime({ offset: true }),
    starred: z.boolean().default(false),
});

export const StravaFieldsSchema = z.object({
    strava_activity_id: z.number().int().optional(),
    strava_activity_name: z.string().optional(),
    strava_activity_type: z.string().optional(),
    strava_start_date: z.string().optional(),
    strava_distance_meters: z.number().optional(),
    strava_distance_miles: z.number().optional(),
    strava_moving_time_seconds: z.number().optional(),
    strava_elapsed_time_seconds: z.number().optional(),
    strava_pace_per_mile: z.string().optional(),
    strava_elevation_gain_meters: z.number().optional(),
    strava_average_speed_mps: z.number().optional(),
    strava_max_speed_mps: z.number().optional(),
    strava_average_cadence: z.number().optional(),
    strava_average_heartrate: z.number().optional(),
    strava_max_heartrate: z.number().optional(),
    strava_run_album_count: z.number().int().positive().optional(),
});

export const OutputRecordSchema = ListenFieldsSchema.merge(StravaFieldsSchema);

export type ListenFields = z.infer<typeof ListenFieldsSchema>;
export type StravaFields = z.infer<typeof StravaFieldsSchema>;
export type OutputRecord = z.infer<typeof OutputRecordSchema>;

// Splits a record into its listening half, dropping every strava_* key
export function pickListenFields(record: OutputRecord): ListenFields {
    return ListenFieldsSchema.parse(record);
}

// Only the strava_* keys that are actually present
export function pickStravaFields(record: OutputRecord): StravaFields {
    return StravaFieldsSchema.parse(record);
}

export function hasStravaMatch(record: OutputRecord): boolean {
    return record.strava_activity_id !== undefined;
}
