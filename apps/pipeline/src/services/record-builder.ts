import type { ListenSession } from '../types/listening';
import type { OutputRecord, StravaFields } from '../types/records';
import type { ActivitySession } from '../types/strava';
import type { SessionMatch } from './activity-matcher';

const MILES_PER_METER = 0.000621371;

export interface BuildOptions {
    includeHeartrate?: boolean;
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

export function metersToMiles(meters: number): number {
    return meters * MILES_PER_METER;
}

// "M:SS" per mile; zero distance reads "0:00"
export function formatPace(seconds: number, distanceMiles: number): string {
    if (distanceMiles <= 0) {
        return '0:00';
    }
    const paceSeconds = seconds / distanceMiles;
    const minutes = Math.floor(paceSeconds / 60);
    const secs = Math.floor(paceSeconds % 60);
    return `${minutes}:${String(secs).padStart(2, '0')}`;
}

export function toStravaFields(activity: ActivitySession, options: BuildOptions = {}): StravaFields {
    const miles = metersToMiles(activity.distanceMeters);

    const fields: StravaFields = {
        strava_activity_id: activity.activityId,
        strava_activity_name: activity.name,
        strava_activity_type: activity.activityType,
        strava_start_date: activity.startTime.toISOString(),
        strava_distance_meters: activity.distanceMeters,
        strava_distance_miles: round(miles, 2),
        strava_moving_time_seconds: activity.durationSeconds,
        strava_elapsed_time_seconds: activity.elapsedSeconds,
        strava_pace_per_mile: formatPace(activity.durationSeconds, miles),
    };

    if (activity.elevationGainMeters !== undefined) fields.strava_elevation_gain_meters = activity.elevationGainMeters;
    if (activity.averageSpeedMps !== undefined) fields.strava_average_speed_mps = activity.averageSpeedMps;
    if (activity.maxSpeedMps !== undefined) fields.strava_max_speed_mps = activity.maxSpeedMps;
    if (activity.averageCadence !== undefined) fields.strava_average_cadence = activity.averageCadence;

    if (options.includeHeartrate) {
        if (activity.averageHeartrate !== undefined) fields.strava_average_heartrate = activity.averageHeartrate;
        if (activity.maxHeartrate !== undefined) fields.strava_max_heartrate = activity.maxHeartrate;
    }

    return fields;
}

export function sessionToRecord(session: ListenSession): OutputRecord {
    const record: OutputRecord = {
        album_name: session.albumName,
        artist_name: session.artistName,
        total_tracks: session.totalTracks,
        listened_tracks: session.listenedTracks,
        play_count: session.playCount,
        completion_ratio: session.completionRatio,
        completion_percentage: round(session.completionRatio * 100, 1),
        first_listen: session.firstListen.toISOString(),
        last_listen: session.lastListen.toISOString(),
        starred: false,
    };

    if (session.artistName) record.artist_source = 'container';
    if (session.genre) record.genre = session.genre;

    return record;
}

// Unmatched sessions get no strava_* keys at all
export function buildRecords(matches: SessionMatch[], options: BuildOptions = {}): OutputRecord[] {
    return matches.map(({ session, activity }) => {
        const record = sessionToRecord(session);
        return activity ? { ...record, ...toStravaFields(activity, options) } : record;
    });
}

export function groupRecordsByActivity(records: OutputRecord[]): Map<number, OutputRecord[]> {
    const groups = new Map<number, OutputRecord[]>();
    for (const record of records) {
        if (record.strava_activity_id === undefined) continue;
        const group = groups.get(record.strava_activity_id);
        if (group) {
            group.push(record);
        } else {
            groups.set(record.strava_activity_id, [record]);
        }
    }
    return groups;
}

// Stamps every matched record with how many albums share its run
export function annotateRunGroups(records: OutputRecord[]): OutputRecord[] {
    const groups = groupRecordsByActivity(records);

    return records.map((record) => {
        const { strava_run_album_count: _previous, ...rest } = record;
        if (record.strava_activity_id === undefined) {
            return rest;
        }
        const size = groups.get(record.strava_activity_id)?.length ?? 1;
        return { ...rest, strava_run_album_count: size };
    });
}
