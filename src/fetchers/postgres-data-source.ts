/**
 * PostgreSQL data source
 *
 * Runs a test's query and reads the first column of the first row.
 */

import { Client, ClientConfig, QueryArrayConfig } from 'pg';
import { PostgresFetcherConfig } from '../config/monitor-config';
import { errorMessage, FetchError, FetchFailureReason } from '../lib/errors';
import { Logger } from '../lib/logger';
import { CallDetails } from '../models/monitoring-test';
import { DataSource } from './data-source';

/**
 * The part of pg's Client this data source relies on
 */
export interface PostgresClient {
  connect(): Promise<unknown>;
  query(config: QueryArrayConfig): Promise<{ rows: unknown[][] }>;
  end(): Promise<unknown>;
}

export type PostgresClientFactory = (config: ClientConfig) => PostgresClient;

// SQLSTATE classes raised by the statement itself: 42 syntax/access, 22 data exception
const QUERY_ERROR_CLASSES = ['42', '22'];

function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  // numeric and bigint columns arrive as strings
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export class PostgresDataSource implements DataSource {
  private client: PostgresClient | null = null;

  constructor(
    readonly name: string,
    private readonly config: PostgresFetcherConfig,
    private readonly logger: Logger,
    private readonly clientFactory: PostgresClientFactory = clientConfig => new Client(clientConfig)
  ) {}

  async connect(): Promise<void> {
    const client = this.clientFactory({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      ssl: this.config.ssl ? { rejectUnauthorized: false } : false,
      connectionTimeoutMillis: this.config.connectionTimeoutMs,
      statement_timeout: this.config.statementTimeoutMs ?? false,
      application_name: 'quality-monitor'
    });

    try {
      await client.connect();
    } catch (error) {
      this.logger.error(`Could not connect data source ${this.name}`, error instanceof Error ? error : undefined, {
        host: this.config.host,
        database: this.config.database
      });
      throw new FetchError(`Could not connect data source ${this.name}: ${errorMessage(error)}`, 'INTERNAL_ERROR', {
        data_source: this.name
      });
    }

    this.client = client;
    this.logger.debug('Data source connected', { data_source: this.name, host: this.config.host });
  }

  async resolve(details: CallDetails): Promise<number> {
    const query = details.query;
    if (typeof query !== 'string') {
      throw this.failure('QUERY_ERROR', 'Call details carry no query');
    }
    if (!this.client) {
      throw this.failure('INTERNAL_ERROR', 'Data source is not connected');
    }

    let rows: unknown[][];
    try {
      ({ rows } = await this.client.query({ text: query, rowMode: 'array' }));
    } catch (error) {
      const state = sqlState(error);
      const reason: FetchFailureReason = state && QUERY_ERROR_CLASSES.includes(state.slice(0, 2))
        ? 'QUERY_ERROR'
        : 'INTERNAL_ERROR';
      throw this.failure(reason, errorMessage(error), { sql_state: state });
    }

    if (rows.length === 0 || rows[0].length === 0) {
      throw this.failure('NO_ROWS', 'Query returned zero rows');
    }

    const value = toNumber(rows[0][0]);
    if (value === undefined) {
      throw this.failure('QUERY_ERROR', `Query returned a non-numeric value: ${String(rows[0][0])}`);
    }
    return value;
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }
    const client = this.client;
    this.client = null;
    await client.end();
  }

  private failure(reason: FetchFailureReason, message: string, context: Record<string, unknown> = {}): FetchError {
    return new FetchError(`${this.name}: ${message}`, reason, { data_source: this.name, ...context });
  }
}
