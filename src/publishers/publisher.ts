/**
 * Publisher contract and registry
 */

import { PublisherConfig } from '../config/monitor-config';
import { Logger } from '../lib/logger';
import { MonitoringTest } from '../models/monitoring-test';
import { DatadogPublisher } from './datadog-publisher';

export interface Publisher {
  readonly name: string;
  /**
   * Sends computed results; rejects with PublishError
   */
  publishResults(tests: readonly MonitoringTest[]): Promise<void>;
  /**
   * Reconciles dashboards and metric metadata with the given tests
   */
  update(tests: readonly MonitoringTest[]): Promise<void>;
  tearDown(): Promise<void>;
}

export type PublisherFactory = (name: string, config: PublisherConfig, logger: Logger) => Publisher;

export const createPublisher: PublisherFactory = (name, config, logger) => {
  switch (config.type) {
    case 'datadog':
      return new DatadogPublisher(name, config, logger);
  }
};
