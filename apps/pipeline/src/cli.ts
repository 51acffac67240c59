#!/usr/bin/env node
import { createInterface } from 'readline/promises';
import { parseArgs } from 'util';
import { env } from './env';
import { logger } from './lib/logger';
import { RequestThrottle } from './lib/rate-limiter';
import { readRecords, updateRecordFile, writeRecords } from './lib/record-store';
import { hasStravaCredentials } from './lib/strava-auth';
import { FileTokenStore, createTokenSource, seedTokensFromEnv } from './lib/token-manager';
import { ActivityStore, StaticActivityProvider, StravaActivityProvider } from './services/activity-store';
import { lookupMissingArtists } from './services/artist-lookup';
import { dedupeRecords } from './services/dedupe';
import { runPipeline, sortRecords } from './services/pipeline';
import { annotateRunGroups } from './services/record-builder';
import { byAlbumName, byIdentity, findRecords, formatRecordLine, listStarred, toggleStars } from './services/stars';
import { computeStatistics } from './services/statistics';
import type { OutputRecord } from './types/records';

const USAGE = `Usage: album-runs <command> [options]

Commands:
  run [--skip-strava] [--dry-run]   Rebuild the record file from the exports
  star toggle <album>               Star or unstar an album by exact name
  star list                         List starred albums
  star search [term]                Search and toggle stars interactively
  lookup-artists [--dry-run]        Fill missing artists from the iTunes catalogue
  dedupe [--dry-run]                Collapse duplicate album entries
  stats                             Print record statistics
`;

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function print(line = ''): void {
    process.stdout.write(line + '\n');
}

async function buildActivityStore(skipStrava: boolean): Promise<ActivityStore | null> {
    if (skipStrava) {
        logger.info('Strava fetch skipped by flag');
        return null;
    }

    if (env.STRAVA_ACTIVITIES_JSON) {
        return new ActivityStore(await StaticActivityProvider.fromFile(env.STRAVA_ACTIVITIES_JSON));
    }

    const seed = seedTokensFromEnv();
    if (!hasStravaCredentials()) {
        logger.warn('Strava client credentials missing, continuing without run data');
        return null;
    }

    const provider = new StravaActivityProvider({
        tokens: createTokenSource(new FileTokenStore(env.TOKEN_PATH, seed)),
        throttle: new RequestThrottle({
            name: 'strava',
            minIntervalMs: env.STRAVA_REQUEST_INTERVAL_MS,
            maxRequests: env.STRAVA_MAX_REQUESTS,
        }),
        perPage: env.STRAVA_PER_PAGE,
    });
    return new ActivityStore(provider);
}

async function runCommand(flags: { skipStrava: boolean; dryRun: boolean }): Promise<void> {
    const summary = await runPipeline(
        {
            playActivityPath: env.PLAY_ACTIVITY_CSV,
            containerDetailsPath: env.CONTAINER_DETAILS_CSV,
            outputPath: env.OUTPUT_PATH,
            dryRun: flags.dryRun,
            aggregation: {
                watchOnly: env.WATCH_ONLY,
                listenThreshold: env.LISTEN_THRESHOLD,
                minCompletionRatio: env.MIN_COMPLETION_RATIO,
            },
            matchWindowMs: env.MATCH_WINDOW_MINUTES * 60 * 1000,
            fetchBufferDays: env.FETCH_BUFFER_DAYS,
            includeHeartrate: env.INCLUDE_HEARTRATE,
        },
        { activityStore: await buildActivityStore(flags.skipStrava) }
    );

    print(`Albums: ${summary.statistics.totalAlbums} (${summary.merge.added} new, ${summary.merge.dropped} dropped)`);
    print(`Matched to runs: ${summary.matched} of ${summary.sessions}`);
    if (!summary.matchingComplete) {
        print(`Run matching incomplete: ${summary.stopReason}`);
    }
    if (!summary.written) {
        print('Dry run, nothing written');
    }
}

async function toggleCommand(albumName: string | undefined): Promise<void> {
    if (!albumName) {
        throw new UsageError('star toggle needs an album name');
    }

    const records = await readRecords(env.OUTPUT_PATH);
    const result = toggleStars(records, byAlbumName(albumName));
    if (result.toggled.length === 0) {
        throw new UsageError(`No album named "${albumName}"`);
    }

    await writeRecords(env.OUTPUT_PATH, result.records);
    result.toggled.forEach((record) => print(formatRecordLine(record)));
}

async function listCommand(): Promise<void> {
    const starred = listStarred(await readRecords(env.OUTPUT_PATH));
    if (starred.length === 0) {
        print('No starred albums');
        return;
    }
    starred.forEach((record) => print(formatRecordLine(record)));
}

async function searchCommand(initialTerm: string | undefined): Promise<void> {
    const prompt = createInterface({ input: process.stdin, output: process.stdout });

    try {
        let term = initialTerm ?? (await prompt.question('Search albums: '));
        let records = await readRecords(env.OUTPUT_PATH);

        while (term.trim()) {
            const matches = findRecords(records, term);
            if (matches.length === 0) {
                print(`No albums match "${term}"`);
            } else {
                matches.forEach((record, i) => print(`${i + 1}. ${formatRecordLine(record)}`));
                const choice = Number(await prompt.question('Number to toggle (blank to skip): '));
                const picked: OutputRecord | undefined = matches[choice - 1];

                if (Number.isInteger(choice) && picked) {
                    const result = toggleStars(records, byIdentity(picked));
                    records = result.records;
                    await writeRecords(env.OUTPUT_PATH, records);
                    result.toggled.forEach((record) => print(`Toggled ${formatRecordLine(record)}`));
                }
            }
            term = await prompt.question('Search albums (blank to quit): ');
        }
    } finally {
        prompt.close();
    }
}

async function lookupCommand(dryRun: boolean): Promise<void> {
    const throttle = new RequestThrottle({
        name: 'itunes',
        minIntervalMs: env.ITUNES_REQUEST_INTERVAL_MS,
        maxRequests: env.ITUNES_MAX_REQUESTS,
    });

    const result = await updateRecordFile(
        env.OUTPUT_PATH,
        async (records) => {
            const lookup = await lookupMissingArtists(records, { throttle });
            return { records: lookup.records, result: lookup };
        },
        { dryRun }
    );

    print(`Artists found: ${result.found}, not found: ${result.notFound}`);
    if (result.stopReason) {
        print(`Stopped early: ${result.stopReason}`);
    }
}

async function dedupeCommand(dryRun: boolean): Promise<void> {
    const result = await updateRecordFile(
        env.OUTPUT_PATH,
        (records) => {
            const deduped = dedupeRecords(records);
            return { records: sortRecords(annotateRunGroups(deduped.records)), result: deduped };
        },
        { dryRun }
    );

    if (result.removed === 0) {
        print('No duplicates found');
        return;
    }
    result.duplicateAlbums.forEach((album) => print(`Merged duplicates of ${album}`));
    print(`Removed ${result.removed} duplicate record(s)`);
}

async function statsCommand(): Promise<void> {
    const statistics = computeStatistics(await readRecords(env.OUTPUT_PATH));
    print(JSON.stringify(statistics, null, 2));
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
    const { values, positionals } = parseArgs({
        args: argv,
        options: {
            'skip-strava': { type: 'boolean', default: false },
            'dry-run': { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
        allowPositionals: true,
    });

    const [command, subcommand, ...rest] = positionals;
    const dryRun = values['dry-run'] ?? false;

    if (values.help || !command) {
        print(USAGE);
        return;
    }

    switch (command) {
        case 'run':
            return runCommand({ skipStrava: values['skip-strava'] ?? false, dryRun });
        case 'star':
            if (subcommand === 'toggle') return toggleCommand(rest.join(' ') || undefined);
            if (subcommand === 'list') return listCommand();
            if (subcommand === 'search') return searchCommand(rest.join(' ') || undefined);
            throw new UsageError(`Unknown star command: ${subcommand ?? '(none)'}`);
        case 'lookup-artists':
            return lookupCommand(dryRun);
        case 'dedupe':
            return dedupeCommand(dryRun);
        case 'stats':
            return statsCommand();
        default:
            throw new UsageError(`Unknown command: ${command}`);
    }
}

if (require.main === module) {
    main().catch((error) => {
        if (error instanceof UsageError) {
            process.stderr.write(`${error.message}\n\n${USAGE}`);
        } else {
            logger.fatal({ err: error }, 'Command failed');
        }
        process.exit(1);
    });
}
