import {
    DEFAULT_MATCH_WINDOW_MS,
    findClosestActivity,
    matchSessions,
    sortActivities,
} from '../../../src/services/activity-matcher';
import { BASE_TIME, buildActivity, buildSession, minutesAfter } from '../../mocks/fixtures';

describe('activity-matcher', () => {
    describe('findClosestActivity', () => {
        it('matches an activity exactly at the window edge', () => {
            const sorted = sortActivities([buildActivity({ startTime: minutesAfter(30) })]);

            expect(findClosestActivity(BASE_TIME, sorted)?.deltaMs).toBe(DEFAULT_MATCH_WINDOW_MS);
        });

        it('matches on either side of the listen time', () => {
            const before = sortActivities([buildActivity({ startTime: minutesAfter(-30) })]);
            expect(findClosestActivity(BASE_TIME, before)?.activity.activityId).toBe(1);
        });

        it('never matches outside the window', () => {
            const sorted = sortActivities([
                buildActivity({ activityId: 1, startTime: new Date(minutesAfter(30).getTime() + 1) }),
                buildActivity({ activityId: 2, startTime: minutesAfter(-31) }),
            ]);

            expect(findClosestActivity(BASE_TIME, sorted)).toBeNull();
        });

        it('picks the closer of two in-window activities', () => {
            const sorted = sortActivities([
                buildActivity({ activityId: 1, startTime: minutesAfter(-20) }),
                buildActivity({ activityId: 2, startTime: minutesAfter(5) }),
            ]);

            expect(findClosestActivity(BASE_TIME, sorted)).toEqual({
                activity: expect.objectContaining({ activityId: 2 }),
                deltaMs: 5 * 60 * 1000,
            });
        });

        it('breaks an exact tie towards the lower activity id', () => {
            const sorted = sortActivities([
                buildActivity({ activityId: 9, startTime: minutesAfter(10) }),
                buildActivity({ activityId: 4, startTime: minutesAfter(-10) }),
            ]);

            expect(findClosestActivity(BASE_TIME, sorted)?.activity.activityId).toBe(4);
        });

        it('breaks a tie between simultaneous activities the same way', () => {
            const sorted = sortActivities([
                buildActivity({ activityId: 7, startTime: minutesAfter(3) }),
                buildActivity({ activityId: 3, startTime: minutesAfter(3) }),
            ]);

            expect(findClosestActivity(BASE_TIME, sorted)?.activity.activityId).toBe(3);
        });

        it('respects a custom window', () => {
            const sorted = sortActivities([buildActivity({ startTime: minutesAfter(20) })]);

            expect(findClosestActivity(BASE_TIME, sorted, 15 * 60 * 1000)).toBeNull();
        });

        it('returns null for an invalid listen time', () => {
            expect(findClosestActivity(new Date('invalid'), [buildActivity()])).toBeNull();
        });
    });

    describe('matchSessions', () => {
        it('finds the closest activity among many', () => {
            const activities = Array.from({ length: 50 }, (_, i) =>
                buildActivity({ activityId: i + 1, startTime: minutesAfter(i * 60 - 600) })
            );
            const [match] = matchSessions([buildSession({ firstListen: minutesAfter(62) })], activities);

            // Activity 11 starts at minute 0, activity 12 at minute 60
            expect(match.activity?.activityId).toBe(12);
            expect(match.deltaMs).toBe(2 * 60 * 1000);
        });

        it('leaves sessions without a nearby activity unmatched', () => {
            const [match] = matchSessions(
                [buildSession({ firstListen: minutesAfter(300) })],
                [buildActivity()]
            );

            expect(match).toEqual({ session: expect.any(Object), activity: null, deltaMs: null });
        });

        it('does not reorder the caller array', () => {
            const activities = [
                buildActivity({ activityId: 2, startTime: minutesAfter(10) }),
                buildActivity({ activityId: 1, startTime: minutesAfter(0) }),
            ];
            matchSessions([buildSession()], activities);

            expect(activities.map((a) => a.activityId)).toEqual([2, 1]);
        });
    });
});
