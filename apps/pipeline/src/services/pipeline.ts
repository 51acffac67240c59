import { createReadStream } from 'fs';
import { extractAlbumMetadataFromStream } from '../lib/container-details-parser';
import { logger } from '../lib/logger';
import { extractPlayEventsFromStream } from '../lib/play-activity-parser';
import { readRecords, writeRecords } from '../lib/record-store';
import type { ListenSession } from '../types/listening';
import type { OutputRecord } from '../types/records';
import type { ActivityFetchResult, FetchStopReason } from '../types/strava';
import { DEFAULT_MATCH_WINDOW_MS, matchSessions } from './activity-matcher';
import type { ActivityStore } from './activity-store';
import { annotateRunGroups, buildRecords } from './record-builder';
import { mergeRecordsWithSummary, type MergeSummary } from './record-merge';
import { aggregateSessions, type AggregationOptions } from './session-aggregator';
import { computeStatistics, type RecordStatistics } from './statistics';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PipelineOptions {
    playActivityPath: string;
    containerDetailsPath: string;
    outputPath: string;
    dryRun?: boolean;
    aggregation?: Omit<AggregationOptions, 'metadata'>;
    matchWindowMs?: number;
    fetchBufferDays?: number;
    includeHeartrate?: boolean;
}

export interface PipelineDeps {
    // null skips the activity fetch; every record is then unmatched
    activityStore: ActivityStore | null;
}

export interface PipelineSummary {
    playEvents: number;
    skippedRows: number;
    sessions: number;
    activities: number;
    matched: number;
    matchingComplete: boolean;
    stopReason: FetchStopReason | 'skipped';
    merge: MergeSummary;
    statistics: RecordStatistics;
    written: boolean;
}

export function computeFetchRange(
    sessions: ListenSession[],
    bufferDays: number
): { start: Date; end: Date } | null {
    if (sessions.length === 0) return null;

    let earliest = sessions[0].firstListen.getTime();
    let latest = sessions[0].lastListen.getTime();
    for (const session of sessions) {
        earliest = Math.min(earliest, session.firstListen.getTime());
        latest = Math.max(latest, session.lastListen.getTime());
    }

    const buffer = bufferDays * DAY_MS;
    return { start: new Date(earliest - buffer), end: new Date(latest + buffer) };
}

// Most played first, album name breaking ties
export function sortRecords(records: OutputRecord[]): OutputRecord[] {
    return [...records].sort((a, b) => {
        if (b.play_count !== a.play_count) return b.play_count - a.play_count;
        if (a.album_name < b.album_name) return -1;
        if (a.album_name > b.album_name) return 1;
        return 0;
    });
}

async function fetchActivities(
    store: ActivityStore | null,
    sessions: ListenSession[],
    bufferDays: number
): Promise<ActivityFetchResult | null> {
    if (!store) return null;

    const range = computeFetchRange(sessions, bufferDays);
    if (!range) {
        return { activities: [], complete: true, stopReason: 'exhausted', requestsMade: 0 };
    }
    return store.loadActivities(range.start, range.end);
}

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineSummary> {
    const log = logger.child({ outputPath: options.outputPath, dryRun: options.dryRun ?? false });

    const plays = await extractPlayEventsFromStream(
        createReadStream(options.playActivityPath),
        (processed) => log.debug({ processed }, 'Parsing play activity')
    );
    log.info({ events: plays.events.length, skipped: plays.skippedRows }, 'Parsed play activity');

    const containers = await extractAlbumMetadataFromStream(createReadStream(options.containerDetailsPath));
    log.info({ albums: containers.metadata.size, skipped: containers.skippedRows }, 'Parsed container details');

    const sessions = aggregateSessions(plays.events, {
        ...options.aggregation,
        metadata: containers.metadata,
    });
    log.info({ sessions: sessions.length }, 'Aggregated listening sessions');
    if (sessions.length === 0) {
        log.warn('No listening sessions qualified; every stored record will be dropped');
    }

    const fetched = await fetchActivities(deps.activityStore, sessions, options.fetchBufferDays ?? 7);
    const activities = fetched?.activities ?? [];

    const matches = matchSessions(sessions, activities, options.matchWindowMs ?? DEFAULT_MATCH_WINDOW_MS);
    const computed = buildRecords(matches, { includeHeartrate: options.includeHeartrate });
    const matched = matches.filter((match) => match.activity !== null).length;
    log.info({ activities: activities.length, matched }, 'Matched sessions to activities');

    const existing = await readRecords(options.outputPath);
    const merged = mergeRecordsWithSummary(existing, computed);
    const records = sortRecords(annotateRunGroups(merged.records));
    log.info(merged.summary, 'Merged with existing records');

    if (!options.dryRun) {
        await writeRecords(options.outputPath, records);
    }

    const statistics = computeStatistics(records);
    log.info(statistics, 'Record statistics');

    return {
        playEvents: plays.events.length,
        skippedRows: plays.skippedRows,
        sessions: sessions.length,
        activities: activities.length,
        matched,
        matchingComplete: fetched?.complete ?? false,
        stopReason: fetched?.stopReason ?? 'skipped',
        merge: merged.summary,
        statistics,
        written: !options.dryRun,
    };
}
