/**
 * Unit Tests: Test Runner
 * One batch through fetch, compute and publish
 */

import { TestRunner } from '../../../src/services/test-runner';
import { FetcherManager } from '../../../src/services/fetcher-manager';
import { PublisherManager } from '../../../src/services/publisher-manager';
import { FetchError } from '../../../src/lib/errors';
import { FakePublisher, fakeDataSourceFactory } from '../../fakes';
import { monitorTestUtils } from '../../setup';

describe('TestRunner', () => {
  const logger = monitorTestUtils.silentLogger();
  let publisher: FakePublisher;

  const makeRunner = async (answers: Record<string, Record<string, number | Error>> = {}): Promise<TestRunner> => {
    const { factory } = fakeDataSourceFactory(answers);
    const fetcherManager = await FetcherManager.open(monitorTestUtils.makeConfig(), logger, factory);
    return new TestRunner(fetcherManager, new PublisherManager([publisher], logger), logger);
  };

  beforeEach(() => {
    publisher = new FakePublisher('datadog');
  });

  it('should compute and publish every test of a healthy batch', async () => {
    const runner = await makeRunner();
    const quality = monitorTestUtils.makeQualityTest({ name: 'q', tags: { segment: 'x' } });
    const ratio = monitorTestUtils.makeConsistencyTest('ratio', { name: 'r' });

    const summary = await runner.runBatch([quality, ratio]);

    expect(quality.result).toBe(1);
    expect(ratio.result).toBe(2.5);
    expect(publisher.published).toEqual([[quality, ratio]]);
    expect(summary).toEqual({
      testsReceived: 2,
      testsFetched: 2,
      testsComputed: 2,
      droppedTests: [],
      publishReports: [{ publisher: 'datadog', tests: 2, success: true }],
      durationMs: expect.any(Number)
    });
  });

  it('should drop a test that failed to fetch and publish the rest', async () => {
    const runner = await makeRunner({
      billing: { 'SELECT 4': new FetchError('billing: Query returned zero rows', 'NO_ROWS') }
    });
    const quality = monitorTestUtils.makeQualityTest({ name: 'q' });
    const difference = monitorTestUtils.makeConsistencyTest('difference', { name: 'd', tags: { segment: 'y' } });

    const summary = await runner.runBatch([quality, difference]);

    expect(difference.result).toBeUndefined();
    expect(publisher.published).toEqual([[quality]]);
    expect(summary.droppedTests).toEqual([{ test: 'd{segment:y}', stage: 'fetch', reason: 'NO_ROWS' }]);
    expect(summary.testsFetched).toBe(1);
  });

  it('should drop a ratio with a zero divisor at the compute stage', async () => {
    const runner = await makeRunner({ billing: { 'SELECT 4': 0 } });
    const ratio = monitorTestUtils.makeConsistencyTest('ratio', { name: 'r' });
    const quality = monitorTestUtils.makeQualityTest({ name: 'q' });

    const summary = await runner.runBatch([ratio, quality]);

    expect(summary.droppedTests).toEqual([{ test: 'r', stage: 'compute', reason: 'DIVISION_BY_ZERO' }]);
    expect(summary.testsFetched).toBe(2);
    expect(summary.testsComputed).toBe(1);
    expect(publisher.published).toEqual([[quality]]);
  });

  it('should skip publishing when nothing was computed', async () => {
    const runner = await makeRunner({ warehouse: { 'SELECT 1': new FetchError('warehouse: timeout', 'INTERNAL_ERROR') } });

    const summary = await runner.runBatch([monitorTestUtils.makeQualityTest()]);

    expect(publisher.published).toEqual([]);
    expect(summary.publishReports).toEqual([]);
    expect(summary.testsComputed).toBe(0);
  });
});
