/**
 * Quality Monitor
 *
 * Entry point of one bounded invocation. Routes a payload to the behaviour of
 * the role this worker was started as: masters dispatch, slaves run one batch,
 * updaters reconcile dashboards.
 */

import { v4 as uuidv4 } from 'uuid';
import { MonitorConfig, WorkerRole } from './config/monitor-config';
import { ConfigurationError } from './lib/errors';
import { Logger } from './lib/logger';
import { DataSourceFactory, createDataSource } from './fetchers/data-source';
import { PublisherFactory, createPublisher } from './publishers/publisher';
import { DelayFunction, DispatchOrchestrator, DispatchOutcome, sleep } from './services/dispatch-orchestrator';
import { FetcherManager } from './services/fetcher-manager';
import { PublishReport, PublisherManager } from './services/publisher-manager';
import { TestCatalog } from './services/test-catalog';
import { RunSummary, TestRunner } from './services/test-runner';
import {
  InvocationPayload,
  LocalWorkerInvoker,
  ProcessWorkerInvoker,
  SpawnFunction,
  WorkerInvoker
} from './services/worker-invoker';

export interface QualityMonitorDependencies {
  dataSourceFactory?: DataSourceFactory;
  publisherFactory?: PublisherFactory;
  /** Replaces the invoker derived from the run mode */
  invoker?: WorkerInvoker;
  delay?: DelayFunction;
  /** Environment handed to distributed workers */
  workerEnv?: NodeJS.ProcessEnv;
  spawnFn?: SpawnFunction;
}

export type MonitorRunResult =
  | { role: 'master'; outcome: DispatchOutcome }
  | { role: 'slave'; summary: RunSummary }
  | { role: 'updater'; reports: PublishReport[] };

export class QualityMonitor {
  readonly correlationId = uuidv4();
  private readonly catalog: TestCatalog;
  private readonly invoker: WorkerInvoker;

  constructor(
    private readonly config: MonitorConfig,
    readonly role: WorkerRole,
    private readonly logger: Logger,
    private readonly deps: QualityMonitorDependencies = {}
  ) {
    this.catalog = new TestCatalog(config.definitions, logger);
    this.invoker = deps.invoker ?? this.createInvoker();
  }

  async handle(payload: InvocationPayload): Promise<MonitorRunResult> {
    this.applyLogContext();

    if (payload.role !== this.role) {
      throw new ConfigurationError(
        `Received a ${payload.role} payload on a worker configured as ${this.role}`,
        'WRONG_ROLE',
        { role: this.role, payload_role: payload.role }
      );
    }

    this.logger.info('Invocation started', { payload });

    switch (payload.role) {
      case 'master':
        return { role: 'master', outcome: await this.dispatchWork(payload.startIndex) };
      case 'slave':
        return { role: 'slave', summary: await this.runTests(payload.fileNames) };
      case 'updater':
        return { role: 'updater', reports: await this.updatePublishers() };
    }
  }

  async dispatchWork(startIndex: number): Promise<DispatchOutcome> {
    const orchestrator = new DispatchOrchestrator(
      this.role,
      this.config.runConfiguration,
      this.invoker,
      this.logger,
      this.deps.delay ?? sleep
    );
    orchestrator.assertMaster();
    return orchestrator.dispatchWork(this.catalog.buildTests(), startIndex);
  }

  async runTests(fileNames: readonly string[]): Promise<RunSummary> {
    const tests = this.catalog.buildTests({ fileNames });
    if (tests.length === 0) {
      this.logger.warn('No active tests in the requested files', { files: fileNames });
      return { testsReceived: 0, testsFetched: 0, testsComputed: 0, droppedTests: [], publishReports: [], durationMs: 0 };
    }

    const publisherManager = PublisherManager.fromConfig(
      this.config,
      this.logger,
      this.deps.publisherFactory ?? createPublisher
    );
    const fetcherManager = await FetcherManager.open(
      this.config,
      this.logger,
      this.deps.dataSourceFactory ?? createDataSource
    );

    try {
      return await new TestRunner(fetcherManager, publisherManager, this.logger).runBatch(tests);
    } finally {
      await fetcherManager.tearDown();
      await publisherManager.tearDown();
    }
  }

  async updatePublishers(): Promise<PublishReport[]> {
    const tests = this.catalog.buildTests({ includeInactive: true });
    this.logger.info('Updating publishers', { tests: tests.length });

    const publisherManager = PublisherManager.fromConfig(
      this.config,
      this.logger,
      this.deps.publisherFactory ?? createPublisher
    );
    try {
      return await publisherManager.updatePublishers(tests);
    } finally {
      await publisherManager.tearDown();
    }
  }

  private createInvoker(): WorkerInvoker {
    if (this.config.runConfiguration.mode === 'distributed') {
      return new ProcessWorkerInvoker(
        this.config.worker,
        this.logger,
        this.deps.workerEnv ?? process.env,
        this.deps.spawnFn
      );
    }

    return new LocalWorkerInvoker(async payload => {
      const worker = new QualityMonitor(this.config, payload.role, this.logger, this.deps);
      try {
        await worker.handle(payload);
      } finally {
        this.applyLogContext();
      }
    });
  }

  private applyLogContext(): void {
    this.logger.setCorrelationId(this.correlationId);
    this.logger.setRole(this.role);
  }
}
