import * as fs from 'fs';
import * as sax from 'sax';
import * as types from './types';
import { isClassInScope } from './scope';
import { messages, messagesFormatter } from './messages';

type OpenClass = {
    name: string;
    depth: number;
    line?: types.Counter;
    branch?: types.Counter;
}

function localName(tagName: string): string {
    return tagName.slice(tagName.indexOf(':') + 1);
}

function attributeOf(node: sax.Tag | sax.QualifiedTag, name: string): string | undefined {
    const value = node.attributes[name];
    if (value === undefined) {
        return undefined;
    }
    return typeof value === 'string' ? value : value.value;
}

export function toClassName(reportName: string): string {
    return reportName.replace(/\//g, '.');
}

export function coverageRatio(counter: types.Counter): number {
    const total = counter.missed + counter.covered;
    return total > 0 ? counter.covered / total : 0;
}

/**
 * Reads one JaCoCo XML report as a sax event stream. Only the counters of the class element being visited are kept,
 * subtrees of out-of-scope classes are skipped without touching their counters.
 */
export type ReportOpener = (reportPath: string) => fs.ReadStream;

export class StreamingReportParser {
    constructor(private readonly logger: types.Logger, private readonly openReport: ReportOpener = (reportPath) => fs.createReadStream(reportPath)) {}

    parse(reportPath: string, query: types.ScopeQuery): Promise<types.ParseResult> {
        this.logger.debug(messagesFormatter.format(messages.parsing_coverage_report, reportPath));

        return new Promise((resolve) => {
            const outcome: types.ReportParseOutcome = {
                reportPath: reportPath,
                line: { missed: 0, covered: 0 },
                branch: { missed: 0, covered: 0 },
                classRecords: [],
                excludedClasses: 0
            };
            let depth = 0;
            let sawElement = false;
            let skipDepth: number | undefined;
            let openClass: OpenClass | undefined;
            let settled = false;

            const readStream = this.openReport(reportPath);
            const saxStream = sax.createStream(true, {});

            const settle = (result: types.ParseResult) => {
                if (settled) {
                    return;
                }
                settled = true;
                readStream.unpipe(saxStream);
                // The file handle is released before the result is reported
                if (readStream.closed) {
                    resolve(result);
                } else {
                    readStream.once('close', () => resolve(result));
                    readStream.destroy();
                }
            };
            const fail = (message: string) => {
                settle({ ok: false, error: new types.ReportParseError(reportPath, message) });
            };

            const readCounter = (node: sax.Tag | sax.QualifiedTag, type: types.CounterType, className: string): types.Counter | undefined => {
                const counter: types.Counter = { missed: 0, covered: 0 };
                for (const field of ['missed', 'covered'] as const) {
                    const value = attributeOf(node, field);
                    if (value === undefined || !/^\d+$/.test(value)) {
                        fail(messagesFormatter.format(messages.invalid_counter_attribute, field, value ?? '', type, className));
                        return undefined;
                    }
                    counter[field] = parseInt(value, 10);
                }
                return counter;
            };

            saxStream.on('opentag', (node) => {
                depth++;
                sawElement = true;
                if (settled || skipDepth !== undefined) {
                    return;
                }

                const tagName = localName(node.name);
                if (tagName == 'class' && !openClass) {
                    const reportName = attributeOf(node, 'name');
                    if (!reportName) {
                        fail('Class element without a name attribute');
                        return;
                    }
                    const className = toClassName(reportName);
                    if (!isClassInScope(className, query)) {
                        outcome.excludedClasses++;
                        skipDepth = depth;
                        return;
                    }
                    openClass = { name: className, depth: depth };
                    return;
                }

                if (tagName == 'counter' && openClass && depth == openClass.depth + 1) {
                    const type = attributeOf(node, 'type');
                    if (type == 'LINE' && !openClass.line) {
                        openClass.line = readCounter(node, type, openClass.name);
                    } else if (type == 'BRANCH' && !openClass.branch) {
                        openClass.branch = readCounter(node, type, openClass.name);
                    }
                }
            });

            saxStream.on('closetag', () => {
                if (!settled) {
                    if (skipDepth === depth) {
                        skipDepth = undefined;
                    } else if (openClass && openClass.depth === depth) {
                        this.closeClass(openClass, outcome);
                        openClass = undefined;
                    }
                }
                depth--;
            });

            saxStream.on('error', (e) => {
                fail(e.message);
            });

            saxStream.on('end', () => {
                if (settled) {
                    return;
                }
                if (!sawElement) {
                    fail('Document has no root element');
                    return;
                }
                if (outcome.excludedClasses > 0) {
                    this.logger.debug(messagesFormatter.format(messages.excluded_classes, outcome.excludedClasses, reportPath));
                }
                this.logger.debug(messagesFormatter.format(messages.parsed_coverage_report, reportPath, outcome.classRecords.length));
                settle({ ok: true, outcome: outcome });
            });

            readStream.on('error', (e) => {
                fail(messagesFormatter.format(messages.failed_to_read_coverage_report, e.message));
            });

            readStream.pipe(saxStream);
        });
    }

    private closeClass(openClass: OpenClass, outcome: types.ReportParseOutcome): void {
        const line = openClass.line ?? { missed: 0, covered: 0 };
        const branch = openClass.branch ?? { missed: 0, covered: 0 };

        outcome.line.missed += line.missed;
        outcome.line.covered += line.covered;
        outcome.branch.missed += branch.missed;
        outcome.branch.covered += branch.covered;

        // Classes without line units (interfaces, constants holders) are not ranked
        if (line.missed + line.covered > 0) {
            outcome.classRecords.push({ name: openClass.name, lineCounter: line, ratio: coverageRatio(line) });
        }
    }
}
