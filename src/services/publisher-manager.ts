/**
 * Publisher Manager
 *
 * Fans results out to the configured publishers. Each publisher only sees the
 * tests that target it, and a failing publisher never stops the others.
 */

import { MonitorConfig } from '../config/monitor-config';
import { ConfigurationError, PublishError, toError } from '../lib/errors';
import { Logger } from '../lib/logger';
import { MonitoringTest } from '../models/monitoring-test';
import { Publisher, PublisherFactory, createPublisher } from '../publishers/publisher';

export interface PublishReport {
  publisher: string;
  tests: number;
  success: boolean;
  error?: string;
}

export class PublisherManager {
  constructor(
    private readonly publishers: readonly Publisher[],
    private readonly logger: Logger
  ) {}

  static fromConfig(
    config: MonitorConfig,
    logger: Logger,
    factory: PublisherFactory = createPublisher
  ): PublisherManager {
    const publishers = config.runConfiguration.publishers.map(name => {
      const publisherConfig = config.publishers[name];
      if (!publisherConfig) {
        throw new ConfigurationError(`Publisher ${name} has no configuration`, 'UNKNOWN_PUBLISHER', { publisher: name });
      }
      return factory(name, publisherConfig, logger);
    });
    return new PublisherManager(publishers, logger);
  }

  static testsForPublisher(publisherName: string, tests: readonly MonitoringTest[]): MonitoringTest[] {
    return tests.filter(test => test.publishTargets.some(target => target.name === publisherName));
  }

  async publishResults(tests: readonly MonitoringTest[]): Promise<PublishReport[]> {
    return this.forEachPublisher(tests, 'publish results', (publisher, selected) => publisher.publishResults(selected));
  }

  /**
   * Dashboard reconciliation, run by the updater role only
   */
  async updatePublishers(tests: readonly MonitoringTest[]): Promise<PublishReport[]> {
    return this.forEachPublisher(tests, 'update', (publisher, selected) => {
      this.logger.info('Updating publisher', { publisher: publisher.name, tests: selected.length });
      return publisher.update(selected);
    });
  }

  async tearDown(): Promise<void> {
    for (const publisher of this.publishers) {
      try {
        await publisher.tearDown();
      } catch (error) {
        this.logger.error(`Failed to tear down publisher ${publisher.name}`, toError(error));
      }
    }
  }

  private async forEachPublisher(
    tests: readonly MonitoringTest[],
    action: string,
    operation: (publisher: Publisher, selected: MonitoringTest[]) => Promise<void>
  ): Promise<PublishReport[]> {
    const reports: PublishReport[] = [];

    for (const publisher of this.publishers) {
      const selected = PublisherManager.testsForPublisher(publisher.name, tests);
      if (selected.length === 0) {
        reports.push({ publisher: publisher.name, tests: 0, success: true });
        continue;
      }

      try {
        await operation(publisher, selected);
        reports.push({ publisher: publisher.name, tests: selected.length, success: true });
      } catch (error) {
        const failure = error instanceof PublishError
          ? error
          : new PublishError(toError(error).message, 'PUBLISH_ERROR', { publisher: publisher.name });
        this.logger.error(`Publisher ${publisher.name} failed to ${action}`, failure, { tests: selected.length });
        reports.push({ publisher: publisher.name, tests: selected.length, success: false, error: failure.message });
      }
    }

    return reports;
  }
}
