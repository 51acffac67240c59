import { aggregateSessions, computeCompletionRatio } from '../../../src/services/session-aggregator';
import { buildPlay, minutesAfter } from '../../mocks/fixtures';

describe('session-aggregator', () => {
    describe('computeCompletionRatio', () => {
        it('divides played time by nominal time', () => {
            expect(computeCompletionRatio(150, 300)).toBe(0.5);
        });

        it('returns 0 for a zero or invalid nominal duration', () => {
            expect(computeCompletionRatio(1000, 0)).toBe(0);
            expect(computeCompletionRatio(1000, Number.NaN)).toBe(0);
        });

        it('clamps to [0, 1]', () => {
            expect(computeCompletionRatio(400, 300)).toBe(1);
            expect(computeCompletionRatio(-5, 300)).toBe(0);
        });
    });

    describe('aggregateSessions', () => {
        it('builds one session per album with track and play counts', () => {
            const sessions = aggregateSessions([
                buildPlay({ songName: 'One', mediaDurationMs: 200000, playDurationMs: 200000 }),
                buildPlay({ songName: 'Two', mediaDurationMs: 100000, playDurationMs: 30000, playedAt: minutesAfter(4) }),
            ]);

            expect(sessions).toHaveLength(1);
            expect(sessions[0]).toMatchObject({
                albumName: 'Blue Lines',
                totalTracks: 2,
                listenedTracks: 1,
                playCount: 2,
            });
            expect(sessions[0].completionRatio).toBeCloseTo(230000 / 300000, 10);
        });

        it('caps each song at its length and counts replays once', () => {
            const sessions = aggregateSessions([
                buildPlay({ songName: 'One', mediaDurationMs: 200000, playDurationMs: 200000 }),
                buildPlay({ songName: 'One', mediaDurationMs: 200000, playDurationMs: 200000, playedAt: minutesAfter(4) }),
                buildPlay({ songName: 'Two', mediaDurationMs: 200000, playDurationMs: 900000, playedAt: minutesAfter(8) }),
                buildPlay({ songName: 'Three', mediaDurationMs: 200000, playDurationMs: 0, playedAt: minutesAfter(20) }),
            ]);

            expect(sessions[0].completionRatio).toBeCloseTo(400000 / 600000, 10);
            expect(sessions[0].playCount).toBe(4);
            expect(sessions[0].totalTracks).toBe(3);
        });

        it('gives an album with zero duration a ratio of 0', () => {
            const sessions = aggregateSessions([buildPlay({ mediaDurationMs: 0, playDurationMs: 120000 })]);

            expect(sessions[0].completionRatio).toBe(0);
            expect(sessions[0].listenedTracks).toBe(0);
        });

        it('tracks the earliest and latest listen regardless of input order', () => {
            const sessions = aggregateSessions([
                buildPlay({ songName: 'Two', playedAt: minutesAfter(30) }),
                buildPlay({ songName: 'One', playedAt: minutesAfter(0) }),
                buildPlay({ songName: 'Three', playedAt: minutesAfter(10) }),
            ]);

            expect(sessions[0].firstListen).toEqual(minutesAfter(0));
            expect(sessions[0].lastListen).toEqual(minutesAfter(30));
        });

        it('keeps albums in order of first appearance', () => {
            const sessions = aggregateSessions([
                buildPlay({ albumName: 'Mezzanine' }),
                buildPlay({ albumName: 'Blue Lines' }),
                buildPlay({ albumName: 'Mezzanine', songName: 'Angel' }),
            ]);

            expect(sessions.map((s) => s.albumName)).toEqual(['Mezzanine', 'Blue Lines']);
        });

        it('drops non-watch plays in watch-only mode', () => {
            const plays = [
                buildPlay({ albumName: 'Watch Album', isWatchPlay: true }),
                buildPlay({ albumName: 'Phone Album', isWatchPlay: false }),
            ];

            expect(aggregateSessions(plays, { watchOnly: true }).map((s) => s.albumName)).toEqual(['Watch Album']);
            expect(aggregateSessions(plays)).toHaveLength(2);
        });

        it('drops sessions below the minimum completion ratio', () => {
            const sessions = aggregateSessions(
                [
                    buildPlay({ albumName: 'Finished', playDurationMs: 300000 }),
                    buildPlay({ albumName: 'Skipped', playDurationMs: 30000 }),
                ],
                { minCompletionRatio: 0.5 }
            );

            expect(sessions.map((s) => s.albumName)).toEqual(['Finished']);
        });

        it('honours a custom listen threshold', () => {
            const plays = [buildPlay({ playDurationMs: 240000, mediaDurationMs: 300000 })];

            expect(aggregateSessions(plays, { listenThreshold: 0.9 })[0].listenedTracks).toBe(0);
            expect(aggregateSessions(plays, { listenThreshold: 0.8 })[0].listenedTracks).toBe(1);
        });

        it('attaches artist and genre from container metadata', () => {
            const metadata = new Map([['Blue Lines', { artistName: 'Massive Attack', genre: 'Electronic' }]]);
            const sessions = aggregateSessions(
                [buildPlay(), buildPlay({ albumName: 'Unknown Album' })],
                { metadata }
            );

            expect(sessions[0]).toMatchObject({ artistName: 'Massive Attack', genre: 'Electronic' });
            expect(sessions[1].artistName).toBe('');
            expect(sessions[1].genre).toBeUndefined();
        });
    });
});
