/**
 * Monitor configuration
 *
 * Reads the JSON configuration file, overlays secrets from the environment and
 * validates the result. Every issue is collected before anything is thrown so
 * that one run reports the whole set.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { LogLevel, parseLogLevel } from '../lib/logger';
import { CatalogLocation } from '../services/test-catalog';

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_PATH = 'config/monitor.config.json';

export type MonitorEnvironment = 'development' | 'test' | 'production';
export type RunMode = 'local' | 'distributed';
export type WorkerRole = 'master' | 'slave' | 'updater';

export const WORKER_ROLES: readonly WorkerRole[] = ['master', 'slave', 'updater'];

export interface RunConfiguration {
  mode: RunMode;
  batchSize: number;
  /** Batches one master dispatches before handing off */
  iterations: number;
  timeBetweenCallsMs: number;
  /** Advisory threshold for one data-source call */
  maxTestDurationMs: number;
  fetchers: string[];
  publishers: string[];
}

export interface PostgresFetcherConfig {
  type: 'postgres';
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  connectionTimeoutMs: number;
  statementTimeoutMs?: number;
}

export type FetcherConfig = PostgresFetcherConfig;

export interface DatadogPublisherConfig {
  type: 'datadog';
  site: string;
  metricPrefix: string;
  /** Metric series per submission request */
  batchSize: number;
  breakdownTag: string;
  apiKey: string;
  appKey: string;
  timeoutMs: number;
}

export type PublisherConfig = DatadogPublisherConfig;

export interface LoggingSettings {
  level: LogLevel;
  enableFile: boolean;
  logDirectory: string;
  structured: boolean;
}

export interface WorkerSettings {
  command: string;
  args: string[];
}

export interface MonitorConfig {
  environment: MonitorEnvironment;
  runConfiguration: RunConfiguration;
  definitions: CatalogLocation;
  fetchers: Record<string, FetcherConfig>;
  publishers: Record<string, PublisherConfig>;
  logging: LoggingSettings;
  worker: WorkerSettings;
}

export interface ConfigurationIssue {
  setting: string;
  issue: string;
  severity: 'error' | 'warning';
}

export interface ConfigValidationResult {
  valid: boolean;
  issues: ConfigurationIssue[];
}

export interface ConfigLoadOptions {
  env?: NodeJS.ProcessEnv;
  /** Role this process runs as; decides which secrets are mandatory in production */
  role?: WorkerRole;
}

const ENVIRONMENTS: readonly MonitorEnvironment[] = ['development', 'test', 'production'];
const RUN_MODES: readonly RunMode[] = ['local', 'distributed'];
const FETCHER_TYPES: readonly FetcherConfig['type'][] = ['postgres'];
const PUBLISHER_TYPES: readonly PublisherConfig['type'][] = ['datadog'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Upper-cased name usable inside an environment variable
 */
export function secretKey(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

/**
 * Typed field access that records an issue instead of throwing
 */
class ConfigReader {
  readonly issues: ConfigurationIssue[] = [];

  error(setting: string, issue: string): void {
    this.issues.push({ setting, issue, severity: 'error' });
  }

  warning(setting: string, issue: string): void {
    this.issues.push({ setting, issue, severity: 'warning' });
  }

  section(source: Record<string, unknown>, key: string, setting: string, required: boolean): Record<string, unknown> {
    const value = source[key];
    if (isRecord(value)) {
      return value;
    }
    if (value !== undefined || required) {
      this.error(setting, 'Must be an object');
    }
    return {};
  }

  string(source: Record<string, unknown>, key: string, setting: string, fallback?: string): string {
    const value = source[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    this.error(setting, value === undefined ? 'Missing required setting' : 'Must be a non-empty string');
    return fallback ?? '';
  }

  integer(source: Record<string, unknown>, key: string, setting: string, fallback: number | undefined, min: number): number {
    const value = source[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value === 'number' && Number.isInteger(value) && value >= min) {
      return value;
    }
    this.error(setting, value === undefined ? 'Missing required setting' : `Must be an integer >= ${min}`);
    return fallback ?? min;
  }

  boolean(source: Record<string, unknown>, key: string, setting: string, fallback: boolean): boolean {
    const value = source[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    this.error(setting, 'Must be a boolean');
    return fallback;
  }

  stringList(source: Record<string, unknown>, key: string, setting: string): string[] {
    const value = source[key];
    if (value === undefined) {
      return [];
    }
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    this.error(setting, 'Must be a list of strings');
    return [];
  }

  oneOf<T extends string>(
    source: Record<string, unknown>,
    key: string,
    setting: string,
    allowed: readonly T[],
    fallback?: T
  ): T | undefined {
    const value = source[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      this.error(setting, `Must be one of: ${allowed.join(', ')}`);
      return fallback;
    }
    return match;
  }
}

interface ParsedConfig {
  config: MonitorConfig;
  issues: ConfigurationIssue[];
}

function secretsRequired(environment: MonitorEnvironment, role: WorkerRole | undefined, kind: 'fetcher' | 'publisher'): boolean {
  if (environment !== 'production' || role === undefined) {
    return false;
  }
  return kind === 'fetcher' ? role === 'slave' : role === 'slave' || role === 'updater';
}

function readSecret(
  reader: ConfigReader,
  env: NodeJS.ProcessEnv,
  variable: string,
  fileValue: unknown,
  setting: string,
  required: boolean
): string {
  const fromEnv = env[variable];
  if (fromEnv) {
    return fromEnv;
  }
  if (required) {
    reader.error(variable, `Missing secret for ${setting}`);
    return '';
  }
  return typeof fileValue === 'string' ? fileValue : '';
}

function parse(raw: unknown, options: ConfigLoadOptions): ParsedConfig {
  const env = options.env ?? process.env;
  const reader = new ConfigReader();
  const root = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) {
    reader.error('config', 'Configuration must be a JSON object');
  }

  const environment = reader.oneOf(
    { environment: env.MONITOR_ENV ?? root.environment },
    'environment',
    'environment',
    ENVIRONMENTS,
    'development'
  ) ?? 'development';

  const run = reader.section(root, 'runConfiguration', 'runConfiguration', true);
  const runConfiguration: RunConfiguration = {
    mode: reader.oneOf(run, 'mode', 'runConfiguration.mode', RUN_MODES, 'local') ?? 'local',
    batchSize: reader.integer(run, 'batchSize', 'runConfiguration.batchSize', undefined, 1),
    iterations: reader.integer(run, 'iterations', 'runConfiguration.iterations', undefined, 1),
    timeBetweenCallsMs: reader.integer(run, 'timeBetweenCallsMs', 'runConfiguration.timeBetweenCallsMs', 0, 0),
    maxTestDurationMs: reader.integer(run, 'maxTestDurationMs', 'runConfiguration.maxTestDurationMs', 30000, 1),
    fetchers: reader.stringList(run, 'fetchers', 'runConfiguration.fetchers'),
    publishers: reader.stringList(run, 'publishers', 'runConfiguration.publishers')
  };

  if (runConfiguration.mode === 'distributed' && runConfiguration.timeBetweenCallsMs === 0) {
    reader.warning('runConfiguration.timeBetweenCallsMs', 'Distributed mode without a delay between worker calls');
  }

  const defs = reader.section(root, 'definitions', 'definitions', true);
  const definitions: CatalogLocation = {
    path: reader.string(defs, 'path', 'definitions.path'),
    extension: reader.string(defs, 'extension', 'definitions.extension', '.json')
  };

  const fetcherSection = reader.section(root, 'fetchers', 'fetchers', false);
  const fetchers: Record<string, FetcherConfig> = {};
  for (const name of runConfiguration.fetchers) {
    const setting = `fetchers.${name}`;
    const source = reader.section(fetcherSection, name, setting, true);
    const type = reader.oneOf(source, 'type', `${setting}.type`, FETCHER_TYPES);
    if (type === undefined) {
      continue;
    }
    const statementTimeoutMs = source.statementTimeoutMs === undefined
      ? undefined
      : reader.integer(source, 'statementTimeoutMs', `${setting}.statementTimeoutMs`, undefined, 1);
    fetchers[name] = {
      type,
      host: reader.string(source, 'host', `${setting}.host`),
      port: reader.integer(source, 'port', `${setting}.port`, 5432, 1),
      database: reader.string(source, 'database', `${setting}.database`),
      user: reader.string(source, 'user', `${setting}.user`),
      password: readSecret(
        reader,
        env,
        `FETCHER_${secretKey(name)}_PASSWORD`,
        source.password,
        `${setting}.password`,
        secretsRequired(environment, options.role, 'fetcher')
      ),
      ssl: reader.boolean(source, 'ssl', `${setting}.ssl`, false),
      connectionTimeoutMs: reader.integer(source, 'connectionTimeoutMs', `${setting}.connectionTimeoutMs`, 30000, 1),
      ...(statementTimeoutMs !== undefined ? { statementTimeoutMs } : {})
    };
  }

  const publisherSection = reader.section(root, 'publishers', 'publishers', false);
  const publishers: Record<string, PublisherConfig> = {};
  for (const name of runConfiguration.publishers) {
    const setting = `publishers.${name}`;
    const source = reader.section(publisherSection, name, setting, true);
    const type = reader.oneOf(source, 'type', `${setting}.type`, PUBLISHER_TYPES);
    if (type === undefined) {
      continue;
    }
    const required = secretsRequired(environment, options.role, 'publisher');
    publishers[name] = {
      type,
      site: reader.string(source, 'site', `${setting}.site`, 'datadoghq.com'),
      metricPrefix: reader.string(source, 'metricPrefix', `${setting}.metricPrefix`, 'quality_monitor'),
      batchSize: reader.integer(source, 'batchSize', `${setting}.batchSize`, 100, 1),
      breakdownTag: reader.string(source, 'breakdownTag', `${setting}.breakdownTag`, 'segment'),
      apiKey: readSecret(reader, env, `PUBLISHER_${secretKey(name)}_API_KEY`, source.apiKey, `${setting}.apiKey`, required),
      appKey: readSecret(reader, env, `PUBLISHER_${secretKey(name)}_APP_KEY`, source.appKey, `${setting}.appKey`, required),
      timeoutMs: reader.integer(source, 'timeoutMs', `${setting}.timeoutMs`, 10000, 1)
    };
  }

  const log = reader.section(root, 'logging', 'logging', false);
  const logging: LoggingSettings = {
    level: parseLogLevel(env.LOG_LEVEL ?? reader.string(log, 'level', 'logging.level', 'info')),
    enableFile: reader.boolean(log, 'enableFile', 'logging.enableFile', false),
    logDirectory: reader.string(log, 'logDirectory', 'logging.logDirectory', './logs'),
    structured: reader.boolean(log, 'structured', 'logging.structured', environment === 'production')
  };

  const workerSection = reader.section(root, 'worker', 'worker', false);
  const worker: WorkerSettings = {
    command: reader.string(workerSection, 'command', 'worker.command', process.execPath),
    args: workerSection.args === undefined
      ? [path.resolve(__dirname, '../cli/monitor-cli.js')]
      : reader.stringList(workerSection, 'args', 'worker.args')
  };

  return {
    config: { environment, runConfiguration, definitions, fetchers, publishers, logging, worker },
    issues: reader.issues
  };
}

/**
 * Validates a parsed configuration document without throwing
 */
export function validateMonitorConfig(raw: unknown, options: ConfigLoadOptions = {}): ConfigValidationResult {
  const { issues } = parse(raw, options);
  return {
    valid: issues.every(issue => issue.severity !== 'error'),
    issues
  };
}

/**
 * Builds the typed configuration, throwing ConfigurationError listing every error
 */
export function parseMonitorConfig(raw: unknown, options: ConfigLoadOptions = {}): MonitorConfig {
  const { config, issues } = parse(raw, options);
  const errors = issues.filter(issue => issue.severity === 'error');
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid configuration: ${errors.map(issue => `${issue.setting}: ${issue.issue}`).join('; ')}`,
      'INVALID_CONFIG',
      { issues: errors }
    );
  }
  return config;
}

/**
 * Configuration file path, from MONITOR_CONFIG_PATH or the default location
 */
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(explicitPath ?? env.MONITOR_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);
}

export function loadMonitorConfig(configPath: string, options: ConfigLoadOptions = {}): MonitorConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read configuration ${configPath}: ${errorMessage(error)}`,
      'CONFIG_UNREADABLE',
      { path: configPath }
    );
  }
  return parseMonitorConfig(raw, options);
}

/**
 * Returns a safe configuration object for logging (with sensitive data masked)
 */
export function getConfigForLogging(config: MonitorConfig): Record<string, unknown> {
  const mask = (value: string): string => (value ? '***masked***' : '');

  return {
    ...config,
    fetchers: Object.fromEntries(
      Object.entries(config.fetchers).map(([name, fetcher]) => [name, { ...fetcher, password: mask(fetcher.password) }])
    ),
    publishers: Object.fromEntries(
      Object.entries(config.publishers).map(([name, publisher]) => [
        name,
        { ...publisher, apiKey: mask(publisher.apiKey), appKey: mask(publisher.appKey) }
      ])
    )
  };
}

export function isWorkerRole(value: unknown): value is WorkerRole {
  return WORKER_ROLES.some(role => role === value);
}
