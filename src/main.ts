#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: county hiring monitor CLI
 *
 *   daily               search → geofence → store, one run row per invocation
 *   daily-report        a run date's stats and the companies first seen that day
 *   monthly             top employers for a month
 *   weekly              last completed week (or week to date when it is empty)
 *   indicators          this month vs last month per employer, plus live open counts
 *   trends              monthly requirement-tag and title-keyword series
 *   still-open          overlap of captured postings with today's live listings
 *   still-open-history  stored still-open snapshots for one period
 *   retag               recompute sector tags after a rule change
 *   migrate             create / extend the schema
 *
 * Every command reads the environment once (dotenv + zod), opens the SQLite
 * file and runs migrate() before doing anything else.
 */

import 'dotenv/config';
import * as fs from 'fs';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { log } from '@crawlee/core';
import { z } from 'zod';
import { parseEnv, requireSearchKey, type Env } from './config/env.js';
import { buildAppConfig, type AppConfig } from './config/index.js';
import { openDb, closeDb, type Db } from './utils/db.js';
import { migrate } from './db/migrate.js';
import { MonitorError } from './utils/errors.js';
import { createRunContext } from './utils/runContext.js';
import { loadRegion } from './region/boundary.js';
import { JSearchClient } from './sources/jsearchApi.js';
import { PlacesClient } from './sources/placesApi.js';
import { runDaily } from './services/dailyRun.js';
import { computeStillOpen, loadStillOpenHistory } from './services/stillOpen.js';
import {
    buildDailyReport,
    buildIndicatorsReport,
    buildMonthlyReport,
    buildTrendSeries,
    buildWeeklyReport,
} from './services/reports.js';
import { retagRecentJobs } from './services/retag.js';
import { countJobs } from './store/jobStore.js';
import { countCompanies } from './store/companyStore.js';
import { latestRunDate } from './store/runStore.js';
import { isValidIsoDate, isValidMonth, monthOf, previousMonth, todayIso, utcNowIso } from './time/windows.js';
import {
    printDailyReport,
    printDailyResult,
    printIndicatorsReport,
    printMonthlyReport,
    printStillOpenHistory,
    printStillOpenReport,
    printTrendSeries,
    printWeeklyReport,
} from './cli/display.js';

// ─── Setup ────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<Env['LOG_LEVEL'], number> = {
    debug: log.LEVELS.DEBUG,
    info: log.LEVELS.INFO,
    warning: log.LEVELS.WARNING,
    error: log.LEVELS.ERROR,
};

const INDICATORS_LIMIT = 50;

function readVersion(): string {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    return z.object({ version: z.string() }).parse(raw).version;
}

interface CommandContext {
    env: Env;
    config: AppConfig;
    db: Db;
    today: string;
}

/** Parse env, set the log level, open + migrate the DB, run `fn`, close the DB. */
async function withContext(fn: (ctx: CommandContext) => Promise<void> | void): Promise<void> {
    const env = parseEnv();
    log.setLevel(LOG_LEVELS[env.LOG_LEVEL]);

    const config = buildAppConfig(env);
    const db = openDb(config.dbPath);
    try {
        migrate(db);
        await fn({ env, config, db, today: todayIso() });
    } finally {
        closeDb(db);
    }
}

/** Live search client for the read-only lookups, or null when no key is configured. */
function optionalSearchSource(env: Env, config: AppConfig): JSearchClient | null {
    if (!env.RAPIDAPI_KEY) return null;
    return new JSearchClient({
        apiKey: env.RAPIDAPI_KEY,
        apiHost: config.search.apiHost,
        country: config.search.country,
        retry: config.retry,
        region: loadRegion(config.region, config.boundary),
        openJobsMaxPages: config.reports.openJobsMaxPages,
        pageThrottle: { delayMs: config.search.delayMs, jitterMs: config.search.jitterMs },
    });
}

// ─── Option parsers ───────────────────────────────────────────────────────────

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
    return n;
}

function parseMonth(value: string): string {
    if (!isValidMonth(value)) throw new InvalidArgumentError('Expected YYYY-MM.');
    return value;
}

function parseDate(value: string): string {
    if (!isValidIsoDate(value)) throw new InvalidArgumentError('Expected YYYY-MM-DD.');
    return value;
}

function parsePeriod(value: string): string {
    if (!isValidMonth(value) && !isValidIsoDate(value)) throw new InvalidArgumentError('Expected YYYY-MM or YYYY-MM-DD.');
    return value;
}

// ─── Program ──────────────────────────────────────────────────────────────────

function buildProgram(): Command {
    const program = new Command();

    program
        .name('hiring-monitor')
        .description('Track employer hiring activity inside a county boundary')
        .version(readVersion());

    program
        .command('daily')
        .description('Run one ingestion cycle against the job-search API')
        .action(() => withContext(async ({ env, config, db }) => {
            const apiKey = requireSearchKey(env);
            const region = loadRegion(config.region, config.boundary);

            const source = new JSearchClient({
                apiKey,
                apiHost: config.search.apiHost,
                country: config.search.country,
                retry: config.retry,
                region,
                openJobsMaxPages: config.reports.openJobsMaxPages,
            });
            const places = new PlacesClient({ apiKey: config.placesKey, region });
            if (!places.enabled) {
                log.info('[Daily] GOOGLE_PLACES_KEY not set; new companies will not be place-verified.');
            }

            const result = await runDaily(
                { db, source, region, verifier: places.enabled ? places : undefined },
                config.search,
                createRunContext(),
            );
            printDailyResult(result);
        }));

    program
        .command('daily-report')
        .description('Run stats and new companies for one run date')
        .option('--date <YYYY-MM-DD>', 'run date (default: the latest run)', parseDate)
        .action((opts: { date?: string }) => withContext(({ db, today }) => {
            printDailyReport(buildDailyReport(db, opts.date ?? latestRunDate(db) ?? today));
        }));

    program
        .command('monthly')
        .description('Top employers by unique postings for a month')
        .option('--month <YYYY-MM>', 'month to report (default: last month)', parseMonth)
        .option('--top <n>', 'number of employers to list', parsePositiveInt)
        .action((opts: { month?: string; top?: number }) => withContext(({ config, db, today }) => {
            const month = opts.month ?? previousMonth(monthOf(today));
            printMonthlyReport(buildMonthlyReport(db, month, opts.top ?? config.reports.monthlyTopN));
        }));

    program
        .command('weekly')
        .description('Most recent completed week: run stats, new companies, sectors')
        .action(() => withContext(({ config, db, today }) => {
            printWeeklyReport(buildWeeklyReport(db, today, {
                topN: config.reports.monthlyTopN,
                excludedEmployers: config.reports.excludedEmployers,
            }));
        }));

    program
        .command('indicators')
        .description('Unique postings this month vs last month per employer')
        .action(() => withContext(async ({ env, config, db, today }) => {
            const source = optionalSearchSource(env, config);
            if (!source) log.info('[Indicators] RAPIDAPI_KEY not set; live open counts will show as NA.');
            printIndicatorsReport(await buildIndicatorsReport(db, today, {
                limit: INDICATORS_LIMIT,
                excludedEmployers: config.reports.excludedEmployers,
                source,
                throttle: { delayMs: config.search.delayMs, jitterMs: config.search.jitterMs },
            }));
        }));

    program
        .command('trends')
        .description('Monthly counts per requirement tag and title keyword')
        .option('--months <n>', 'number of months, ending with the current one', parsePositiveInt, 12)
        .action((opts: { months: number }) => withContext(({ db, today }) => {
            printTrendSeries(buildTrendSeries(db, today, opts.months));
        }));

    program
        .command('still-open')
        .description('Compare captured postings with what the API still lists today')
        .action(() => withContext(async ({ env, config, db, today }) => {
            const report = await computeStillOpen(db, optionalSearchSource(env, config), {
                today,
                computedUtc: utcNowIso(),
                topN: config.reports.stillOpenTopN,
                excludedEmployers: config.reports.excludedEmployers,
                policy: config.delayPolicy,
                delayMs: config.search.delayMs,
                jitterMs: config.search.jitterMs,
            });
            if (report) printStillOpenReport(report);
        }));

    program
        .command('still-open-history')
        .description('Show stored still-open snapshots for a month or a week')
        .requiredOption('--period <key>', 'YYYY-MM for a month, or a week\'s last day as YYYY-MM-DD', parsePeriod)
        .action((opts: { period: string }) => withContext(({ db }) => {
            printStillOpenHistory(loadStillOpenHistory(db, opts.period));
        }));

    program
        .command('retag')
        .description('Recompute sector tags for recently seen jobs')
        .option('--days-back <n>', 'how far back to retag', parsePositiveInt, 180)
        .action((opts: { daysBack: number }) => withContext(({ db, today }) => {
            const updated = retagRecentJobs(db, today, opts.daysBack);
            console.log(chalk.green(`✔ Retagged ${updated} jobs.`));
        }));

    program
        .command('migrate')
        .description('Create or extend the database schema')
        .action(() => withContext(({ config, db }) => {
            console.log(chalk.green(`✔ Schema ready at ${config.dbPath}`));
            console.log(`${countJobs(db)} jobs, ${countCompanies(db)} companies stored.`);
        }));

    return program;
}

async function main(): Promise<void> {
    try {
        await buildProgram().parseAsync(process.argv);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (error instanceof MonitorError) {
            log.error(`[Main] ${error.name}: ${message}`);
        } else {
            log.exception(error instanceof Error ? error : new Error(message), '[Main] Command failed');
        }
        console.error(chalk.red(message));
        process.exitCode = 1;
    }
}

void main();
