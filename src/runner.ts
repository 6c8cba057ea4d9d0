import * as core from '@actions/core';
import * as pt from 'path';
import * as types from './types';
import { ReportLocator } from './locator';
import { StreamingReportParser } from './parser';
import { Aggregator } from './aggregator';
import { createScopeQuery } from './scope';
import { coreLogger } from './logger';
import { messages, messagesFormatter } from './messages';

export interface RunOptions {
    /* Path to the project whose JaCoCo reports are aggregated */
    projectRoot: string;

    /* Comma-separated module names, only used to locate per-module reports */
    targetModules?: string;

    /* Comma-separated package prefixes to keep */
    targetPackages?: string;

    /* Comma-separated simple or fully qualified class names to keep */
    targetClasses?: string;

    /* Upper bound of reports parsed concurrently, defaults to the available parallelism */
    maxParallel?: number;
}

export class CoverageRunner {
    constructor(private readonly logger: types.Logger = coreLogger) {}

    async run(runOptions: RunOptions): Promise<types.CoverageSummary> {
        try {
            const projectRoot = pt.resolve(runOptions.projectRoot);
            this.logger.info(messagesFormatter.format(messages.project_root, projectRoot));

            const query = createScopeQuery(runOptions);
            const reportPaths = new ReportLocator(this.logger).locate(projectRoot, query);
            const aggregator = new Aggregator(new StreamingReportParser(this.logger), this.logger, runOptions.maxParallel);
            const summary = await aggregator.aggregate(projectRoot, reportPaths, query);

            if (summary.success) {
                this.logger.info(messagesFormatter.format(messages.coverage_result,
                    formatPercentage(summary.lineCoverage), formatPercentage(summary.branchCoverage), summary.reportCount));
                this.logger.info(messagesFormatter.format(messages.worst_classes, summary.worstClasses.join(', ')));
            }
            return summary;
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            return { success: false, error: errorMessage };
        }
    }
}

export function toCoverageResponse(summary: types.CoverageSummary): types.CoverageResponse {
    if (!summary.success) {
        return { success: false, error: summary.error, lineCoverage: 0, branchCoverage: 0, worstClasses: [] };
    }
    return {
        success: true,
        error: null,
        lineCoverage: summary.lineCoverage,
        branchCoverage: summary.branchCoverage,
        worstClasses: summary.worstClasses
    };
}

export function formatPercentage(ratio: number): string {
    return `${(ratio * 100).toFixed(2)}%`; // e.g., 66.67%
}

export async function generateCoverageSummary(summary: types.CoverageSummary, jobSummary: typeof core.summary = core.summary): Promise<void> {
    jobSummary.addHeading('JaCoCo Scope Coverage');
    if (!summary.success) {
        jobSummary.addRaw(summary.error, true);
    } else {
        jobSummary.addTable([
            [{ data: 'Metric', header: true }, { data: 'Coverage', header: true }],
            ['Line', formatPercentage(summary.lineCoverage)],
            ['Branch', formatPercentage(summary.branchCoverage)]
        ]);
        if (summary.worstClasses.length) {
            jobSummary.addHeading('Worst covered classes', 3).addList(summary.worstClasses, true);
        }
    }
    await jobSummary.write();
}
