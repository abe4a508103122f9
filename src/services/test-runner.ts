/**
 * Test Runner
 *
 * Runs one batch through fetch, compute and publish.
 */

import { ResultComputationError } from '../lib/errors';
import { Logger } from '../lib/logger';
import { MonitoringTest, MonitoringTestModel } from '../models/monitoring-test';
import { FetchedTest, FetcherManager } from './fetcher-manager';
import { PublishReport, PublisherManager } from './publisher-manager';

export interface DroppedTest {
  test: string;
  stage: 'fetch' | 'compute';
  reason: string;
}

export interface RunSummary {
  testsReceived: number;
  testsFetched: number;
  testsComputed: number;
  droppedTests: DroppedTest[];
  publishReports: PublishReport[];
  durationMs: number;
}

export class TestRunner {
  constructor(
    private readonly fetcherManager: FetcherManager,
    private readonly publisherManager: PublisherManager,
    private readonly logger: Logger
  ) {}

  async runBatch(tests: readonly MonitoringTest[]): Promise<RunSummary> {
    const start = Date.now();
    const droppedTests: DroppedTest[] = [];

    const { fetched, failed } = await this.fetcherManager.fetchResults(tests);
    for (const failure of failed) {
      droppedTests.push({
        test: MonitoringTestModel.describe(failure.test),
        stage: 'fetch',
        reason: failure.error.reason
      });
    }

    const computed = this.computeResults(fetched, droppedTests);
    const publishReports = computed.length > 0 ? await this.publisherManager.publishResults(computed) : [];

    const summary: RunSummary = {
      testsReceived: tests.length,
      testsFetched: fetched.length,
      testsComputed: computed.length,
      droppedTests,
      publishReports,
      durationMs: Date.now() - start
    };

    this.logger.info('Batch completed', {
      tests_received: summary.testsReceived,
      tests_fetched: summary.testsFetched,
      tests_computed: summary.testsComputed,
      tests_dropped: droppedTests.length,
      duration_ms: summary.durationMs
    });

    return summary;
  }

  private computeResults(
    fetched: readonly FetchedTest[],
    droppedTests: DroppedTest[]
  ): MonitoringTest[] {
    const computed: MonitoringTest[] = [];

    for (const { test, values } of fetched) {
      try {
        MonitoringTestModel.computeResult(test, values);
        computed.push(test);
      } catch (error) {
        if (!(error instanceof ResultComputationError)) {
          throw error;
        }
        this.logger.error(`Could not compute result of ${MonitoringTestModel.describe(test)}`, error);
        droppedTests.push({ test: MonitoringTestModel.describe(test), stage: 'compute', reason: error.errorCode });
      }
    }

    return computed;
  }
}
