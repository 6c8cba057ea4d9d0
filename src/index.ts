export * from './types';
export { parseScopeList, createScopeQuery, isClassInScope, BUILT_IN_EXCLUSION_PATTERNS } from './scope';
export { ReportLocator, readReportPathDirective } from './locator';
export { StreamingReportParser } from './parser';
export { Aggregator, mergeOutcomes, rankWorstClasses, WORST_CLASSES_LIMIT } from './aggregator';
export { CoverageRunner, toCoverageResponse } from './runner';
export type { RunOptions } from './runner';
