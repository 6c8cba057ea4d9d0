import * as fs from 'fs';
import * as pt from 'path';
import { globSync } from 'glob';
import * as lodash from 'lodash';
import * as types from './types';
import { messages, messagesFormatter } from './messages';

export const STANDARDS_DOCUMENT = 'TESTING_STANDARDS.md';
export const REPORT_FILE_NAME = 'jacocoTestReport.xml';

const REPORT_PATH_DIRECTIVE = /(?:Report Path|Jacoco.*Report):\s*(\S+)/i;

/* Aggregate report locations at the project root, highest priority first */
export const ROOT_REPORT_PATHS = [
    'build/reports/jacoco/root/jacocoRootReport.xml',
    'build/reports/jacoco/testCodeCoverageReport/testCodeCoverageReport.xml',
    'target/site/jacoco-aggregate/jacoco.xml'
];

/* Report locations relative to a module directory, highest priority first */
export const MODULE_REPORT_PATHS = [
    'build/reports/jacoco/test/' + REPORT_FILE_NAME,
    'target/site/jacoco/jacoco.xml'
];

/**
 * Converts a Gradle project path such as ":services:api" to the module directory "services/api".
 */
export function toModuleDirectory(moduleName: string): string {
    if (!moduleName.startsWith(':')) {
        return moduleName;
    }
    return moduleName.split(':').filter((segment) => segment.length > 0).join('/');
}

export function readReportPathDirective(content: string): string | undefined {
    const match = REPORT_PATH_DIRECTIVE.exec(content);
    if (!match) {
        return undefined;
    }
    const reportPath = match[1].replace(/^[`'"]+|[`'",]+$/g, '');
    return reportPath.length > 0 ? reportPath : undefined;
}

export class ReportLocator {
    constructor(private readonly logger: types.Logger) {}

    /**
     * Returns the absolute, de-duplicated report paths for a query. The first tier that resolves wins:
     * standards document override, target modules, root aggregate reports, recursive search.
     */
    locate(projectRoot: string, query: types.ScopeQuery): string[] {
        const root = pt.resolve(projectRoot);
        const reportPaths = this.findStandardsReport(root)
            ?? this.findModuleReports(root, query.targetModules)
            ?? this.findRootReport(root)
            ?? this.searchReports(root);

        const uniquePaths = lodash.uniq(reportPaths.map((reportPath) => pt.resolve(reportPath)));
        uniquePaths.forEach((reportPath) => this.logger.info(messagesFormatter.format(messages.found_matching_file, reportPath)));
        return uniquePaths;
    }

    private findStandardsReport(root: string): string[] | undefined {
        const standardsPath = pt.join(root, STANDARDS_DOCUMENT);
        if (!fs.existsSync(standardsPath)) {
            return undefined;
        }

        this.logger.debug(messagesFormatter.format(messages.reading_standards_document, standardsPath));
        let content: string;
        try {
            content = fs.readFileSync(standardsPath, 'utf8');
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            this.logger.warning(messagesFormatter.format(messages.failed_to_read_standards_document, standardsPath, errorMessage));
            return undefined;
        }

        const declaredPath = readReportPathDirective(content);
        if (!declaredPath) {
            return undefined;
        }
        const reportPath = pt.resolve(root, declaredPath);
        if (!fs.existsSync(reportPath)) {
            this.logger.warning(messagesFormatter.format(messages.standards_report_path_not_found, reportPath));
            return undefined;
        }

        this.logger.info(messagesFormatter.format(messages.using_standards_report_path, reportPath));
        return [reportPath];
    }

    private findModuleReports(root: string, targetModules: ReadonlySet<string>): string[] | undefined {
        if (targetModules.size == 0) {
            return undefined;
        }

        const reportPaths: string[] = [];
        for (const moduleName of targetModules) {
            const moduleDir = pt.join(root, toModuleDirectory(moduleName));
            const reportPath = this.probe(MODULE_REPORT_PATHS.map((candidate) => pt.join(moduleDir, candidate)));
            if (reportPath) {
                reportPaths.push(reportPath);
            } else {
                this.logger.debug(messagesFormatter.format(messages.module_report_not_found, moduleName));
            }
        }

        if (!reportPaths.length) {
            return undefined;
        }
        this.logger.info(messagesFormatter.format(messages.using_module_reports, reportPaths.length));
        return reportPaths;
    }

    private findRootReport(root: string): string[] | undefined {
        const reportPath = this.probe(ROOT_REPORT_PATHS.map((candidate) => pt.join(root, candidate)));
        if (!reportPath) {
            return undefined;
        }
        this.logger.info(messagesFormatter.format(messages.using_root_report, reportPath));
        return [reportPath];
    }

    private searchReports(root: string): string[] {
        this.logger.info(messagesFormatter.format(messages.searching_reports_recursively, REPORT_FILE_NAME, root));
        if (!fs.existsSync(root)) {
            return [];
        }
        return globSync('**/' + REPORT_FILE_NAME, {
            cwd: root,
            absolute: true,
            nodir: true,
            ignore: ['**/node_modules/**']
        }).sort();
    }

    private probe(candidates: string[]): string | undefined {
        for (const candidate of candidates) {
            this.logger.debug(messagesFormatter.format(messages.probing_report_path, candidate));
            if (fs.existsSync(candidate)) {
                return candidate;
            }
        }
        return undefined;
    }
}
