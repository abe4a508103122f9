/**
 * Data source contract and registry
 */

import { FetcherConfig } from '../config/monitor-config';
import { Logger } from '../lib/logger';
import { CallDetails } from '../models/monitoring-test';
import { PostgresDataSource } from './postgres-data-source';

/**
 * One connection to a system tests read values from. Opened once per worker,
 * closed at teardown.
 */
export interface DataSource {
  readonly name: string;
  connect(): Promise<void>;
  /**
   * Resolves one numeric value; rejects with FetchError
   */
  resolve(details: CallDetails): Promise<number>;
  close(): Promise<void>;
}

export type DataSourceFactory = (name: string, config: FetcherConfig, logger: Logger) => DataSource;

/**
 * Builds the data source matching the configured type
 */
export const createDataSource: DataSourceFactory = (name, config, logger) => {
  switch (config.type) {
    case 'postgres':
      return new PostgresDataSource(name, config, logger);
  }
};
