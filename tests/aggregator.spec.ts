import * as sinon from 'sinon';
import should from 'should';
import * as types from '../src/types';
import * as aggregator from '../src/aggregator';
import { StreamingReportParser } from '../src/parser';
import { createScopeQuery } from '../src/scope';
import { createFakeLogger, reportFixture, FakeLogger } from './helpers';

const PROJECT_ROOT = '/work/project';

const record = (name: string, ratio: number): types.ClassCoverageRecord => ({
    name: name,
    lineCounter: { missed: 0, covered: 0 },
    ratio: ratio
});

const outcome = (line: types.Counter, branch: types.Counter, classRecords: types.ClassCoverageRecord[]): types.ReportParseOutcome => ({
    reportPath: 'report.xml',
    line: line,
    branch: branch,
    classRecords: classRecords,
    excludedClasses: 0
});

describe('jacoco-scope-coverage-action/aggregator', () => {
    const sandbox = sinon.createSandbox();
    let logger: FakeLogger;
    let theAggregator: aggregator.Aggregator;

    beforeEach(() => {
        logger = createFakeLogger(sandbox);
        theAggregator = new aggregator.Aggregator(new StreamingReportParser(logger), logger, 2);
    });

    afterEach(() => {
        sandbox.restore();
    });

    describe('runBounded()', () => {
        it('should never run more tasks than the limit and keep the input order', async () => {
            let inFlight = 0;
            let maxInFlight = 0;
            const delays = [30, 5, 20, 1, 10];

            const res = await aggregator.runBounded(delays, 2, async (delay) => {
                inFlight++;
                maxInFlight = Math.max(maxInFlight, inFlight);
                await new Promise((resolve) => setTimeout(resolve, delay));
                inFlight--;
                return delay * 2;
            });

            res.should.eql([60, 10, 40, 2, 20]);
            should(maxInFlight).equal(2);
        });

        it('should run one task at a time when the limit is not a number', async () => {
            let inFlight = 0;
            let maxInFlight = 0;

            const res = await aggregator.runBounded([3, 1, 2], NaN, async (delay) => {
                inFlight++;
                maxInFlight = Math.max(maxInFlight, inFlight);
                await new Promise((resolve) => setTimeout(resolve, delay));
                inFlight--;
                return delay;
            });

            res.should.eql([3, 1, 2]);
            should(maxInFlight).equal(1);
        });

        it('should return an empty list for no items', async () => {
            const res = await aggregator.runBounded([], 4, async () => 1);

            res.should.eql([]);
        });
    });

    describe('rankWorstClasses()', () => {
        it('should sort ascending by coverage and keep the first 20', () => {
            const records = Array.from({ length: 25 }, (_, i) => record(`com.x.C${24 - i}`, (24 - i) / 24));

            const res = aggregator.rankWorstClasses(records);

            res.length.should.equal(aggregator.WORST_CLASSES_LIMIT);
            res.should.eql(Array.from({ length: 20 }, (_, i) => `com.x.C${i}`));
        });

        it('should keep the original order of equally covered classes', () => {
            aggregator.rankWorstClasses([record('b', 0.5), record('a', 0.5), record('c', 0.1)]).should.eql(['c', 'b', 'a']);
        });
    });

    describe('mergeOutcomes()', () => {
        it('should sum counters and concatenate class records', () => {
            const res = aggregator.mergeOutcomes([
                outcome({ missed: 1, covered: 3 }, { missed: 0, covered: 0 }, [record('com.x.A', 0.75)]),
                outcome({ missed: 3, covered: 1 }, { missed: 1, covered: 1 }, [record('com.x.A', 0.25)])
            ]);

            res.should.eql({ success: true, lineCoverage: 0.5, branchCoverage: 0.5, worstClasses: ['com.x.A', 'com.x.A'], reportCount: 2 });
        });

        it('should report zero coverage when nothing was measured', () => {
            const res = aggregator.mergeOutcomes([outcome({ missed: 0, covered: 0 }, { missed: 0, covered: 0 }, [])]);

            res.should.eql({ success: true, lineCoverage: 0, branchCoverage: 0, worstClasses: [], reportCount: 1 });
        });
    });

    describe('aggregate()', () => {
        it('should fail when no report was found', async () => {
            const res = await theAggregator.aggregate(PROJECT_ROOT, [], createScopeQuery());

            res.should.eql({ success: false, error: "No reports found under '/work/project'. Checked TESTING_STANDARDS.md and standard paths." });
        });

        it('should compute line coverage of a single class', async () => {
            const res = await theAggregator.aggregate(PROJECT_ROOT, [reportFixture('single.xml')], createScopeQuery());

            res.should.eql({ success: true, lineCoverage: 0.8, branchCoverage: 0, worstClasses: ['com.x.Foo'], reportCount: 1 });
        });

        it('should only reflect classes of the requested packages', async () => {
            const res = await theAggregator.aggregate(PROJECT_ROOT, [reportFixture('jacoco.xml')], createScopeQuery({ targetPackages: 'com.x' }));

            res.should.eql({ success: true, lineCoverage: 0.65, branchCoverage: 0.625, worstClasses: ['com.x.Bar', 'com.x.Foo'], reportCount: 1 });
        });

        it('should never rank a generated class even when it is targeted', async () => {
            const res = await theAggregator.aggregate(PROJECT_ROOT, [reportFixture('jacoco.xml')], createScopeQuery({ targetClasses: 'Stub, Foo' }));

            res.should.eql({ success: true, lineCoverage: 0.8, branchCoverage: 0.75, worstClasses: ['com.x.Foo'], reportCount: 1 });
        });

        it('should skip reports that fail to parse', async () => {
            const invalidReport = reportFixture('invalid.xml');

            const res = await theAggregator.aggregate(PROJECT_ROOT, [invalidReport, reportFixture('single.xml')], createScopeQuery());

            res.should.eql({ success: true, lineCoverage: 0.8, branchCoverage: 0, worstClasses: ['com.x.Foo'], reportCount: 1 });
            sinon.assert.calledOnce(logger.warning);
            const warning: string = logger.warning.getCall(0).args[0];
            should(warning.startsWith(`Skipping coverage report '${invalidReport}': Unexpected close tag`)).be.true();
        });

        it('should fail when every report fails to parse', async () => {
            const res = await theAggregator.aggregate(PROJECT_ROOT, [reportFixture('invalid.xml'), reportFixture('missing.xml')], createScopeQuery());

            res.should.eql({ success: false, error: "All 2 coverage report(s) under '/work/project' failed to parse." });
            sinon.assert.calledTwice(logger.warning);
        });

        it('should keep one entry per report for classes with the same name', async () => {
            const res = await theAggregator.aggregate(PROJECT_ROOT, [reportFixture('duplicate_a.xml'), reportFixture('duplicate_b.xml')], createScopeQuery());

            res.should.eql({ success: true, lineCoverage: 0.5, branchCoverage: 0.5, worstClasses: ['com.x.Dup', 'com.x.Dup'], reportCount: 2 });
        });

        it('should give the same summary whatever the report order', async () => {
            const query = createScopeQuery();
            const reports = [reportFixture('jacoco.xml'), reportFixture('single.xml'), reportFixture('duplicate_b.xml')];

            const forward = await theAggregator.aggregate(PROJECT_ROOT, reports, query);
            const backward = await theAggregator.aggregate(PROJECT_ROOT, [...reports].reverse(), query);

            backward.should.eql(forward);
        });

        it('should equal merging the reports parsed one by one', async () => {
            const query = createScopeQuery();
            const parser = new StreamingReportParser(logger);
            const outcomes: types.ReportParseOutcome[] = [];
            for (const reportPath of [reportFixture('jacoco.xml'), reportFixture('single.xml')]) {
                const result = await parser.parse(reportPath, query);
                if (result.ok) {
                    outcomes.push(result.outcome);
                }
            }

            const res = await theAggregator.aggregate(PROJECT_ROOT, [reportFixture('jacoco.xml'), reportFixture('single.xml')], query);

            res.should.eql(aggregator.mergeOutcomes(outcomes));
            res.should.eql({ success: true, lineCoverage: 0.55, branchCoverage: 5 / 12, worstClasses: ['com.y.Bar', 'com.x.Bar', 'com.x.Foo', 'com.x.Foo'], reportCount: 2 });
        });

        it('should aggregate every report when max parallelism is not a number', async () => {
            const nanAggregator = new aggregator.Aggregator(new StreamingReportParser(logger), logger, NaN);

            const res = await nanAggregator.aggregate(PROJECT_ROOT, [reportFixture('duplicate_a.xml'), reportFixture('duplicate_b.xml')], createScopeQuery());

            res.should.eql({ success: true, lineCoverage: 0.5, branchCoverage: 0.5, worstClasses: ['com.x.Dup', 'com.x.Dup'], reportCount: 2 });
        });

        it('should treat a rejected parse as a failed report', async () => {
            const parser = sandbox.createStubInstance(StreamingReportParser);
            parser.parse.rejects(new Error('boom'));
            const stubbedAggregator = new aggregator.Aggregator(parser, logger, 1);

            const res = await stubbedAggregator.aggregate(PROJECT_ROOT, ['/work/project/report.xml'], createScopeQuery());

            res.should.eql({ success: false, error: "All 1 coverage report(s) under '/work/project' failed to parse." });
            sinon.assert.calledWith(logger.warning, "Skipping coverage report '/work/project/report.xml': boom");
        });
    });
});
