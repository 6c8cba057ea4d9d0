import * as os from 'os';
import * as lodash from 'lodash';
import * as types from './types';
import { StreamingReportParser, coverageRatio } from './parser';
import { messages, messagesFormatter } from './messages';

export const WORST_CLASSES_LIMIT = 20;

export function defaultParallelism(): number {
    return Math.max(1, os.availableParallelism());
}

/**
 * Runs `task` for every item with at most `limit` tasks in flight. Results keep the order of `items`
 * whatever order the tasks complete in.
 */
export async function runBounded<T, R>(items: readonly T[], limit: number, task: (item: T) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const drain = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await task(items[index]);
        }
    };

    const poolSize = Number.isNaN(limit) ? 1 : Math.max(1, Math.floor(limit));
    const workerCount = Math.min(poolSize, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => drain()));
    return results;
}

/**
 * Folds per-report outcomes into one summary. Counters are summed, class records are concatenated without
 * de-duplication and ranked ascending by line coverage.
 */
export function mergeOutcomes(outcomes: readonly types.ReportParseOutcome[]): types.CoverageSummary {
    const line: types.Counter = { missed: lodash.sumBy(outcomes, (o) => o.line.missed), covered: lodash.sumBy(outcomes, (o) => o.line.covered) };
    const branch: types.Counter = { missed: lodash.sumBy(outcomes, (o) => o.branch.missed), covered: lodash.sumBy(outcomes, (o) => o.branch.covered) };
    const classRecords = lodash.flatMap(outcomes, (o) => o.classRecords);

    return {
        success: true,
        lineCoverage: coverageRatio(line),
        branchCoverage: coverageRatio(branch),
        worstClasses: rankWorstClasses(classRecords),
        reportCount: outcomes.length
    };
}

export function rankWorstClasses(classRecords: readonly types.ClassCoverageRecord[], limit: number = WORST_CLASSES_LIMIT): string[] {
    return lodash.take(lodash.sortBy(classRecords, (record) => record.ratio), limit).map((record) => record.name);
}

export class Aggregator {
    private readonly maxParallel: number;

    constructor(private readonly parser: StreamingReportParser, private readonly logger: types.Logger, maxParallel?: number) {
        this.maxParallel = maxParallel ?? defaultParallelism();
    }

    async aggregate(projectRoot: string, reportPaths: readonly string[], query: types.ScopeQuery): Promise<types.CoverageSummary> {
        if (!reportPaths.length) {
            return { success: false, error: messagesFormatter.format(messages.coverage_report_not_found, projectRoot) };
        }

        const results = await runBounded(reportPaths, this.maxParallel, (reportPath) => this.parseReport(reportPath, query));

        const outcomes: types.ReportParseOutcome[] = [];
        for (const result of results) {
            if (result.ok) {
                outcomes.push(result.outcome);
            } else {
                this.logger.warning(messagesFormatter.format(messages.failed_to_parse_coverage_report, result.error.reportPath, result.error.message));
            }
        }

        if (!outcomes.length) {
            return { success: false, error: messagesFormatter.format(messages.all_reports_failed, reportPaths.length, projectRoot) };
        }
        return mergeOutcomes(outcomes);
    }

    private async parseReport(reportPath: string, query: types.ScopeQuery): Promise<types.ParseResult> {
        try {
            return await this.parser.parse(reportPath, query);
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            return { ok: false, error: new types.ReportParseError(reportPath, errorMessage) };
        }
    }
}
