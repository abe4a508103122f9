/**
 * Dispatch Orchestrator
 *
 * Master control loop. Hands batches to slaves until the catalog is exhausted
 * or the per-generation iteration budget is spent, in which case the remaining
 * work goes to a new master carrying only the cursor.
 *
 *   idle -> dispatching -> done
 *                       -> handing_off
 */

import { RunConfiguration, WorkerRole } from '../config/monitor-config';
import { ConfigurationError } from '../lib/errors';
import { Logger } from '../lib/logger';
import { MonitoringTest } from '../models/monitoring-test';
import { TestCatalog } from './test-catalog';
import { assertForwardProgress, subsetOfTests } from './test-batcher';
import { WorkerInvoker } from './worker-invoker';

export type DispatchState = 'idle' | 'dispatching' | 'handing_off' | 'done';

export interface DispatchOutcome {
  finalState: Extract<DispatchState, 'handing_off' | 'done'>;
  /** Cursor the generation started from */
  startIndex: number;
  batchesDispatched: number;
  testsDispatched: number;
  /** Cursor handed to the next master, when handing off */
  handOffIndex?: number;
}

export type DispatchSettings = Pick<RunConfiguration, 'mode' | 'batchSize' | 'iterations' | 'timeBetweenCallsMs'>;

export type DelayFunction = (ms: number) => Promise<void>;

export const sleep: DelayFunction = ms => new Promise(resolve => setTimeout(resolve, ms));

export class DispatchOrchestrator {
  private state: DispatchState = 'idle';

  constructor(
    private readonly role: WorkerRole,
    private readonly settings: DispatchSettings,
    private readonly invoker: WorkerInvoker,
    private readonly logger: Logger,
    private readonly delay: DelayFunction = sleep
  ) {}

  get currentState(): DispatchState {
    return this.state;
  }

  /**
   * Dispatching from any other role is a configuration error
   */
  assertMaster(): void {
    if (this.role !== 'master') {
      throw new ConfigurationError(
        `Dispatch requested from a worker configured as ${this.role}`,
        'WRONG_ROLE',
        { role: this.role, expected_role: 'master' }
      );
    }
  }

  async dispatchWork(tests: readonly MonitoringTest[], startIndex: number): Promise<DispatchOutcome> {
    this.assertMaster();
    if (this.state !== 'idle') {
      throw new ConfigurationError(`Dispatcher already used (state ${this.state})`, 'DISPATCHER_REUSED');
    }

    assertForwardProgress(tests, this.settings.batchSize);

    this.state = 'dispatching';
    let cursor = startIndex;
    let batchesDispatched = 0;

    while (cursor < tests.length && batchesDispatched < this.settings.iterations) {
      const { batch, nextIndex } = subsetOfTests(tests, cursor, this.settings.batchSize);
      const fileNames = TestCatalog.sourceFilesOf(batch);

      this.logger.info('Calling slave', { start_index: cursor, end_index: nextIndex, files: fileNames.length });
      await this.invoker.invoke({ role: 'slave', fileNames });

      cursor = nextIndex;
      batchesDispatched += 1;

      if (this.invoker.mode === 'distributed' && cursor < tests.length && this.settings.timeBetweenCallsMs > 0) {
        await this.delay(this.settings.timeBetweenCallsMs);
      }
    }

    const outcome: DispatchOutcome = {
      finalState: cursor < tests.length ? 'handing_off' : 'done',
      startIndex,
      batchesDispatched,
      testsDispatched: cursor - startIndex
    };

    if (outcome.finalState === 'handing_off') {
      this.state = 'handing_off';
      this.logger.info('Reached max iterations, passing to new master', { start_index: cursor });
      await this.invoker.invoke({ role: 'master', startIndex: cursor });
      return { ...outcome, handOffIndex: cursor };
    }

    this.state = 'done';
    this.logger.info('All tests dispatched', { batches: batchesDispatched, tests: outcome.testsDispatched });
    return outcome;
  }
}
