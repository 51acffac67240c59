// Builders for the record, session and activity shapes used across service tests

import type { ListenSession, PlayEvent } from '../../src/types/listening';
import type { OutputRecord } from '../../src/types/records';
import type { ActivitySession, StravaSummaryActivity } from '../../src/types/strava';

export const BASE_TIME = new Date('2024-05-01T07:00:00.000Z');

export function minutesAfter(minutes: number, from: Date = BASE_TIME): Date {
    return new Date(from.getTime() + minutes * 60 * 1000);
}

export function buildSession(overrides: Partial<ListenSession> = {}): ListenSession {
    return {
        albumName: 'Blue Lines',
        artistName: 'Massive Attack',
        firstListen: BASE_TIME,
        lastListen: minutesAfter(45),
        completionRatio: 0.9,
        totalTracks: 9,
        listenedTracks: 8,
        playCount: 10,
        ...overrides,
    };
}

export function buildActivity(overrides: Partial<ActivitySession> = {}): ActivitySession {
    return {
        activityId: 1,
        name: 'Morning Run',
        activityType: 'Run',
        startTime: BASE_TIME,
        durationSeconds: 1800,
        elapsedSeconds: 1900,
        distanceMeters: 5000,
        ...overrides,
    };
}

export function buildSummaryActivity(overrides: Partial<StravaSummaryActivity> = {}): StravaSummaryActivity {
    return {
        id: 1,
        name: 'Morning Run',
        type: 'Run',
        start_date: BASE_TIME.toISOString(),
        distance: 5000,
        moving_time: 1800,
        elapsed_time: 1900,
        ...overrides,
    };
}

export function buildRecord(overrides: Partial<OutputRecord> = {}): OutputRecord {
    return {
        album_name: 'Blue Lines',
        artist_name: 'Massive Attack',
        artist_source: 'container',
        total_tracks: 9,
        listened_tracks: 8,
        play_count: 10,
        completion_ratio: 0.9,
        completion_percentage: 90,
        first_listen: BASE_TIME.toISOString(),
        last_listen: minutesAfter(45).toISOString(),
        starred: false,
        ...overrides,
    };
}

export function buildPlay(overrides: Partial<PlayEvent> = {}): PlayEvent {
    return {
        albumName: 'Blue Lines',
        songName: 'Safe from Harm',
        playedAt: BASE_TIME,
        playDurationMs: 300000,
        mediaDurationMs: 300000,
        isWatchPlay: true,
        ...overrides,
    };
}
