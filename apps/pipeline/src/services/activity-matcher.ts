import type { ListenSession } from '../types/listening';
import type { ActivitySession } from '../types/strava';

export const DEFAULT_MATCH_WINDOW_MS = 30 * 60 * 1000;

export interface SessionMatch {
    session: ListenSession;
    activity: ActivitySession | null;
    deltaMs: number | null;
}

// Orders by start time, then id, so binary search and tie-breaking share one ordering
export function sortActivities(activities: ActivitySession[]): ActivitySession[] {
    return [...activities].sort((a, b) => {
        const byTime = a.startTime.getTime() - b.startTime.getTime();
        return byTime !== 0 ? byTime : a.activityId - b.activityId;
    });
}

// First index whose start time is >= target
function lowerBound(sorted: ActivitySession[], target: number): number {
    let low = 0;
    let high = sorted.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (sorted[mid].startTime.getTime() < target) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    return low;
}

/**
 * Closest activity whose start lies within ±windowMs of the listen time.
 * Equal distances resolve to the lower activity id. `sorted` must come from
 * sortActivities.
 */
export function findClosestActivity(
    listenedAt: Date,
    sorted: ActivitySession[],
    windowMs: number = DEFAULT_MATCH_WINDOW_MS
): { activity: ActivitySession; deltaMs: number } | null {
    const anchor = listenedAt.getTime();
    if (Number.isNaN(anchor)) {
        return null;
    }

    let best: { activity: ActivitySession; deltaMs: number } | null = null;

    for (let i = lowerBound(sorted, anchor - windowMs); i < sorted.length; i++) {
        const activity = sorted[i];
        const start = activity.startTime.getTime();
        if (start > anchor + windowMs) break;
        if (Number.isNaN(start)) continue;

        const deltaMs = Math.abs(start - anchor);
        if (
            best === null ||
            deltaMs < best.deltaMs ||
            (deltaMs === best.deltaMs && activity.activityId < best.activity.activityId)
        ) {
            best = { activity, deltaMs };
        }
    }

    return best;
}

export function matchSessions(
    sessions: ListenSession[],
    activities: ActivitySession[],
    windowMs: number = DEFAULT_MATCH_WINDOW_MS
): SessionMatch[] {
    const sorted = sortActivities(activities);

    return sessions.map((session) => {
        const best = findClosestActivity(session.firstListen, sorted, windowMs);
        return {
            session,
            activity: best?.activity ?? null,
            deltaMs: best?.deltaMs ?? null,
        };
    });
}
