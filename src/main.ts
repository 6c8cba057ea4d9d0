import * as core from '@actions/core';
import * as types from './types';
import * as runner from "./runner";
import { defaultParallelism } from './aggregator';
import { coreLogger } from './logger';
import { messages, messagesFormatter } from './messages';

export interface ActionIO {
    getInput(name: string): string;
    setOutput(name: string, value: string): void;
    setFailed(message: string): void;
}

export function parseMaxParallel(value: string, logger: types.Logger): number | undefined {
    if (!value.trim()) {
        return undefined;
    }
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < 1) {
        logger.warning(messagesFormatter.format(messages.invalid_max_parallel, value, defaultParallelism()));
        return undefined;
    }
    return parsed;
}

export async function run(io: ActionIO = core, logger: types.Logger = coreLogger, theRunner = new runner.CoverageRunner(logger)) {
    try {
        const runOptions: runner.RunOptions = {
            projectRoot: io.getInput("project-root") || process.env.GITHUB_WORKSPACE || process.cwd(),
            targetModules: io.getInput("target-modules"),
            targetPackages: io.getInput("target-packages"),
            targetClasses: io.getInput("target-classes"),
            maxParallel: parseMaxParallel(io.getInput("max-parallel"), logger)
        };
        const summary = await theRunner.run(runOptions);
        const response = runner.toCoverageResponse(summary);

        io.setOutput("success", String(response.success));
        io.setOutput("error", response.error ?? '');
        io.setOutput("line-coverage", String(response.lineCoverage));
        io.setOutput("branch-coverage", String(response.branchCoverage));
        io.setOutput("worst-classes", JSON.stringify(response.worstClasses));
        io.setOutput("report-count", String(summary.success ? summary.reportCount : 0));
        io.setOutput("response", JSON.stringify(response));

        if (process.env.GITHUB_STEP_SUMMARY) {
            await runner.generateCoverageSummary(summary);
        }
        if (!summary.success) {
            io.setFailed(summary.error);
        }
    } catch (error) {
        logger.error(messages.run_failed);
        if (error instanceof Error) {
            logger.error(error.message);
            io.setFailed(error.message);
        } else {
            const errorString = String(error);
            io.setFailed(messagesFormatter.format(messages.unexpected_error, errorString));
        }
    }
}

if (require.main === module) {
    void run();
}
