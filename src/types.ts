export type CounterType = 'LINE' | 'BRANCH';

export type Counter = {
    missed: number;
    covered: number;
}

export type ClassCoverageRecord = {
    name: string; // Fully qualified, dot separated
    lineCounter: Counter;
    ratio: number; // lineCounter.covered / (missed + covered), only recorded when that sum is > 0
}

export type ScopeQuery = {
    readonly targetModules: ReadonlySet<string>;
    readonly targetPackages: ReadonlySet<string>;
    readonly targetClasses: ReadonlySet<string>;
    readonly exclusionPatterns: readonly RegExp[];
}

export type ReportParseOutcome = {
    reportPath: string;
    line: Counter;
    branch: Counter;
    classRecords: ClassCoverageRecord[];
    excludedClasses: number;
}

export class ReportParseError extends Error {
    constructor(readonly reportPath: string, message: string) {
        super(message);
        this.name = 'ReportParseError';
    }
}

export type ParseResult =
    | { ok: true; outcome: ReportParseOutcome }
    | { ok: false; error: ReportParseError };

export type CoverageSummary =
    | { success: true; lineCoverage: number; branchCoverage: number; worstClasses: string[]; reportCount: number }
    | { success: false; error: string };

/** Flat shape handed to the orchestrating caller. */
export type CoverageResponse = {
    success: boolean;
    error: string | null;
    lineCoverage: number;
    branchCoverage: number;
    worstClasses: string[];
}

export interface Logger {
    info(message: string): void;
    warning(message: string): void;
    debug(message: string): void;
    error(message: string): void;
}
