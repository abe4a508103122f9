/**
 * Fetcher Manager
 *
 * Owns the data sources of one worker. `open` connects every configured data
 * source; callers release them with `tearDown` from a finally block.
 */

import { MonitorConfig } from '../config/monitor-config';
import { ConfigurationError, FetchError, toError } from '../lib/errors';
import { Logger } from '../lib/logger';
import { DataSource, DataSourceFactory, createDataSource } from '../fetchers/data-source';
import { MonitoringTest, MonitoringTestModel } from '../models/monitoring-test';

export interface FetchedTest {
  test: MonitoringTest;
  /** One value per data source, in declaration order */
  values: number[];
}

export interface FetchFailure {
  test: MonitoringTest;
  error: FetchError;
}

export interface FetchOutcome {
  fetched: FetchedTest[];
  failed: FetchFailure[];
}

export class FetcherManager {
  private constructor(
    private readonly dataSources: Map<string, DataSource>,
    private readonly maxTestDurationMs: number,
    private readonly logger: Logger
  ) {}

  /**
   * Connects every data source named in the run configuration. Sources already
   * connected are closed again if a later one fails.
   */
  static async open(
    config: MonitorConfig,
    logger: Logger,
    factory: DataSourceFactory = createDataSource
  ): Promise<FetcherManager> {
    const dataSources = new Map<string, DataSource>();
    const manager = new FetcherManager(dataSources, config.runConfiguration.maxTestDurationMs, logger);

    try {
      for (const name of config.runConfiguration.fetchers) {
        const fetcherConfig = config.fetchers[name];
        if (!fetcherConfig) {
          throw new ConfigurationError(`Fetcher ${name} has no configuration`, 'UNKNOWN_FETCHER', { fetcher: name });
        }
        const dataSource = factory(name, fetcherConfig, logger);
        await dataSource.connect();
        dataSources.set(name, dataSource);
      }
    } catch (error) {
      await manager.tearDown();
      throw error;
    }

    logger.info('Data sources opened', { data_sources: [...dataSources.keys()] });
    return manager;
  }

  /**
   * Resolves every data-source value of every test. A fetch failure drops
   * only the test it belongs to.
   */
  async fetchResults(tests: readonly MonitoringTest[]): Promise<FetchOutcome> {
    const start = Date.now();
    const fetched: FetchedTest[] = [];
    const failed: FetchFailure[] = [];

    for (const test of tests) {
      try {
        fetched.push({ test, values: await this.fetchTest(test) });
      } catch (error) {
        if (!(error instanceof FetchError)) {
          throw error;
        }
        this.logger.warn('Dropping test after fetch failure', {
          test: MonitoringTestModel.describe(test),
          reason: error.reason,
          error_message: error.message
        });
        failed.push({ test, error });
      }
    }

    this.logger.info('Fetched test values', {
      tests_fetched: fetched.length,
      tests_failed: failed.length,
      duration_ms: Date.now() - start
    });

    return { fetched, failed };
  }

  /**
   * Closes every data source; close failures are logged, never thrown
   */
  async tearDown(): Promise<void> {
    for (const [name, dataSource] of this.dataSources) {
      try {
        await dataSource.close();
      } catch (error) {
        this.logger.error(`Failed to close data source ${name}`, toError(error));
      }
    }
    this.dataSources.clear();
  }

  private async fetchTest(test: MonitoringTest): Promise<number[]> {
    const values: number[] = [];

    for (const call of test.dataSources) {
      const dataSource = this.dataSources.get(call.name);
      if (!dataSource) {
        throw new ConfigurationError(
          `Test ${test.name} uses data source ${call.name}, which is not configured for this run`,
          'UNKNOWN_FETCHER',
          { test_name: test.name, fetcher: call.name, source_file: test.sourceFile }
        );
      }

      const callStart = Date.now();
      values.push(await dataSource.resolve(call.details));
      const duration = Date.now() - callStart;

      if (duration > this.maxTestDurationMs) {
        this.logger.warn('Data source call overran', {
          test: MonitoringTestModel.describe(test),
          data_source: call.name,
          duration_ms: duration,
          max_test_duration_ms: this.maxTestDurationMs
        });
      }
    }

    return values;
  }
}
