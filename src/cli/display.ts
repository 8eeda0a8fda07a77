/**
 * src/cli/display.ts
 *
 * Terminal rendering for command results. Formatting helpers are pure and
 * return strings; the print* functions write to stdout.
 */

import chalk from 'chalk';
import type { DailyRunResult } from '../services/dailyRun.js';
import type {
    DailyReport,
    IndicatorsReport,
    MonthlyReport,
    TrendSeries,
    WeeklyReport,
} from '../services/reports.js';
import type { StillOpenHistory, StillOpenReport } from '../services/stillOpen.js';
import { lastDay, type DateRange } from '../time/windows.js';

// ─── Formatting ───────────────────────────────────────────────────────────────

export function formatRange(range: DateRange): string {
    return `${range.start} → ${lastDay(range)}`;
}

export function formatRate(rate: number): string {
    return rate.toFixed(3);
}

export function formatPctChange(pct: number | null): string {
    return pct === null ? 'NA' : `${pct.toFixed(1)}%`;
}

export function formatCount(n: number | null): string {
    return n === null ? 'NA' : String(n);
}

/** Left-aligned columns separated by two spaces, with a dashed rule under the header. */
export function formatTable(headers: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
    const cells = rows.map((row) => row.map(String));
    const widths = headers.map((h, i) => Math.max(h.length, ...cells.map((r) => (r[i] ?? '').length)));
    const line = (values: readonly string[]) =>
        values.map((v, i) => v.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

    return [
        line(headers),
        line(widths.map((w) => '-'.repeat(w))),
        ...cells.map(line),
    ].join('\n');
}

function heading(text: string): void {
    console.log();
    console.log(chalk.bold.cyan(text));
}

function printTableOrEmpty(headers: readonly string[], rows: Array<Array<string | number>>, empty: string): void {
    console.log(rows.length > 0 ? formatTable(headers, rows) : chalk.dim(empty));
}

// ─── Commands ─────────────────────────────────────────────────────────────────

export function printDailyResult(result: DailyRunResult): void {
    const s = result.summary;
    heading(`Daily run ${result.runId} (${s.runDate})`);
    console.log(formatTable(
        ['Scanned', 'In region', 'New jobs', 'New companies'],
        [[s.jobsScannedCount, s.jobsInRegionCount, s.newJobsCount, s.newCompaniesCount]],
    ));

    if (result.newCompanies.length > 0) {
        heading('New companies');
        printTableOrEmpty(
            ['Company', 'Places'],
            result.newCompanies.map((c) => [c.employerName, c.verification?.reason ?? '-']),
            '',
        );
    }
}

export function printMonthlyReport(report: MonthlyReport): void {
    heading(`Monthly: ${report.month} (${formatRange(report.window)})`);
    console.log(`Unique postings captured: ${chalk.bold(report.totalJobs)}`);
    printTableOrEmpty(
        ['Rank', 'Company', 'Unique postings'],
        report.employers.map((e, i) => [i + 1, e.employerName, e.count]),
        'No data for that month.',
    );
}

export function printWeeklyReport(report: WeeklyReport): void {
    const label = report.weekToDate ? 'Week to date' : 'Week';
    heading(`${label}: ${formatRange(report.window)}`);
    if (report.weekToDate) {
        console.log(chalk.yellow('The last completed week has no captured jobs; showing the current week so far.'));
    }

    const r = report.runStats;
    console.log(formatTable(
        ['Scanned', 'In region', 'New jobs', 'New companies'],
        [[r.jobsScannedCount, r.jobsInRegionCount, r.newJobsCount, r.newCompaniesCount]],
    ));

    heading('New companies');
    printTableOrEmpty(
        ['Company', 'First seen', 'Verified', 'Sample job', 'Salary', 'Requirements'],
        report.newCompanies.map((c) => [
            c.employerName,
            c.firstSeenRunDate,
            c.verified ? 'yes' : 'no',
            c.sampleJob?.title ?? '',
            c.sampleJob?.salary ?? '',
            c.sampleJob?.requirements ?? '',
        ]),
        'No new companies in that week.',
    );

    heading('Hiring companies');
    printTableOrEmpty(
        ['Rank', 'Company', 'Unique postings'],
        report.topEmployers.map((e, i) => [i + 1, e.employerName, e.count]),
        'No data for that week.',
    );

    heading('Sectors');
    console.log(formatTable(
        ['Sector', 'Captured', 'Unique jobs', 'New companies'],
        report.sectors.map(({ tag, stats }) => [tag, stats.captured, stats.distinctJobs, stats.newCompanies]),
    ));

    for (const sector of report.sectors) {
        heading(`Sector: ${sector.tag}`);
        printTableOrEmpty(
            ['Rank', 'Company', 'Unique postings'],
            sector.topEmployers.map((e, i) => [i + 1, e.employerName, e.count]),
            'No postings in this sector.',
        );
        if (sector.newCompanies.length > 0) {
            console.log();
            console.log(formatTable(
                ['New company', 'First seen', 'Sample job'],
                sector.newCompanies.map((c) => [c.employerName, c.firstSeenRunDate, c.sampleJob?.title ?? '']),
            ));
        }
    }
}

export function printDailyReport(report: DailyReport): void {
    heading(`Daily report: ${report.runDate}`);
    if (report.run) {
        const r = report.run;
        console.log(`Run ${r.runId}, finished ${r.finishedUtc}`);
        console.log(formatTable(
            ['Scanned', 'In region', 'New jobs', 'New companies'],
            [[r.jobsScannedCount, r.jobsInRegionCount, r.newJobsCount, r.newCompaniesCount]],
        ));
    } else {
        console.log(chalk.yellow('No run recorded for that date.'));
    }

    heading('New companies');
    printTableOrEmpty(
        ['Company', 'Jobs', 'Places', 'Address', 'Sample jobs'],
        report.newCompanies.map((c) => [
            c.employerName,
            c.jobCount,
            c.placesReason || '-',
            c.address,
            c.samples.map((j) => j.title).join(' | '),
        ]),
        'No new companies that day.',
    );
}

export function printIndicatorsReport(report: IndicatorsReport): void {
    heading(`Company indicators: ${report.thisMonth} vs ${report.lastMonth}`);
    printTableOrEmpty(
        [
            'Company',
            report.thisMonth,
            report.lastMonth,
            '% change',
            'Open last month (live)',
            'Hard to fill',
            `Top titles (${report.thisMonth})`,
        ],
        report.rows.map((r) => [
            r.employerName,
            r.thisCount,
            formatCount(r.lastCount),
            formatPctChange(r.pctChange),
            formatCount(r.openLastMonth),
            formatCount(r.hardToFill),
            r.titlesThisMonth.join(', '),
        ]),
        'No data for this month yet.',
    );
}

export function printTrendSeries(series: TrendSeries): void {
    heading('Requirement tags by month');
    console.log(formatTable(
        ['Month', ...series.requirements.map((s) => s.tag)],
        series.months.map((m, i) => [m, ...series.requirements.map((s) => s.counts[i] ?? 0)]),
    ));

    heading('Title keywords by month');
    console.log(formatTable(
        ['Month', ...series.titles.map((s) => s.keyword)],
        series.months.map((m, i) => [m, ...series.titles.map((s) => s.counts[i] ?? 0)]),
    ));
}

export function printStillOpenReport(report: StillOpenReport): void {
    heading(`Still open: ${report.month} (${formatRange(report.monthWindow)})`);
    printTableOrEmpty(
        ['Company', 'Captured', 'Open now', 'Still open', 'Rate', 'Delay'],
        report.companies.map((c) => [
            c.employerName,
            c.monthly.captured,
            c.monthly.openNow,
            c.monthly.stillOpen,
            formatRate(c.monthly.rate),
            c.monthlyFlag ? 'YES' : 'no',
        ]),
        'No tracked employers for that month.',
    );

    heading(`Last ${report.weeks.length} completed weeks (newest first)`);
    printTableOrEmpty(
        ['Company', ...report.weeks.map((w) => `w/e ${lastDay(w)}`), 'Trend'],
        report.companies.map((c) => [
            c.employerName,
            ...c.weekly.map((w) => `${w.counts.stillOpen}/${w.counts.captured} (${formatRate(w.counts.rate)})`),
            c.trendFlag ? 'YES' : 'no',
        ]),
        'No tracked employers.',
    );

    if (report.failed.length > 0) {
        console.log(chalk.yellow(`Skipped (live fetch failed): ${report.failed.join(', ')}`));
    }
}

export function printStillOpenHistory(history: StillOpenHistory): void {
    const label = history.kind === 'monthly' ? 'month' : 'week ending';
    heading(`Stored still-open snapshots for ${label} ${history.periodKey}`);
    printTableOrEmpty(
        ['Company', 'Window', 'Captured', 'Open now', 'Still open', 'Rate', 'Computed'],
        history.metrics.map((m) => [
            m.employerName,
            formatRange(m.window),
            m.counts.captured,
            m.counts.openNow,
            m.counts.stillOpen,
            formatRate(m.counts.rate),
            m.computedUtc,
        ]),
        'Nothing stored for that period.',
    );
}
