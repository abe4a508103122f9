export * from './lib/errors';
export * from './lib/logger';
export * from './lib/log-file';
export * from './config/monitor-config';
export * from './models/monitoring-test';
export * from './models/test-definition';
export * from './fetchers/data-source';
export * from './fetchers/postgres-data-source';
export * from './publishers/publisher';
export * from './publishers/datadog-publisher';
export * from './services/test-catalog';
export * from './services/test-batcher';
export * from './services/fetcher-manager';
export * from './services/publisher-manager';
export * from './services/test-runner';
export * from './services/worker-invoker';
export * from './services/dispatch-orchestrator';
export * from './quality-monitor';
