/**
 * Worker Invoker
 *
 * Starts a bounded worker for a role. Local mode runs it in this process and
 * waits for it; distributed mode starts a detached process and returns once
 * that process exists.
 */

import { ChildProcess, SpawnOptions, spawn } from 'child_process';
import { RunMode, WorkerSettings, isWorkerRole } from '../config/monitor-config';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { Logger } from '../lib/logger';

export interface MasterPayload {
  role: 'master';
  startIndex: number;
}

export interface SlavePayload {
  role: 'slave';
  /** Definition files, relative to the definitions root, that make up one batch */
  fileNames: string[];
}

export interface UpdaterPayload {
  role: 'updater';
}

export type InvocationPayload = MasterPayload | SlavePayload | UpdaterPayload;

export interface WorkerInvoker {
  readonly mode: RunMode;
  invoke(payload: InvocationPayload): Promise<void>;
}

export type InvocationHandler = (payload: InvocationPayload) => Promise<void>;

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates an incoming invocation payload
 */
export function parseInvocationPayload(raw: unknown): InvocationPayload {
  if (!isRecord(raw) || !isWorkerRole(raw.role)) {
    throw new ConfigurationError('Invocation payload must carry a role of master, slave or updater', 'INVALID_PAYLOAD', {
      payload: raw
    });
  }

  switch (raw.role) {
    case 'master': {
      const startIndex = raw.startIndex ?? 0;
      if (typeof startIndex !== 'number' || !Number.isInteger(startIndex) || startIndex < 0) {
        throw new ConfigurationError('Master payload needs a non-negative integer startIndex', 'INVALID_PAYLOAD', {
          payload: raw
        });
      }
      return { role: 'master', startIndex };
    }
    case 'slave': {
      const fileNames = raw.fileNames;
      if (!Array.isArray(fileNames) || fileNames.length === 0 || !fileNames.every(name => typeof name === 'string')) {
        throw new ConfigurationError('Slave payload needs a non-empty list of fileNames', 'INVALID_PAYLOAD', {
          payload: raw
        });
      }
      return { role: 'slave', fileNames: fileNames.map(String) };
    }
    case 'updater':
      return { role: 'updater' };
  }
}

/**
 * Runs the target role in-process
 */
export class LocalWorkerInvoker implements WorkerInvoker {
  readonly mode = 'local';

  constructor(private readonly handler: InvocationHandler) {}

  async invoke(payload: InvocationPayload): Promise<void> {
    await this.handler(payload);
  }
}

/**
 * Starts the CLI `invoke` command in a detached process, fire-and-forget
 */
export class ProcessWorkerInvoker implements WorkerInvoker {
  readonly mode = 'distributed';

  constructor(
    private readonly settings: WorkerSettings,
    private readonly logger: Logger,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly spawnFn: SpawnFunction = spawn
  ) {}

  invoke(payload: InvocationPayload): Promise<void> {
    const args = [...this.settings.args, 'invoke', '--payload', JSON.stringify(payload)];

    return new Promise<void>((resolve, reject) => {
      const child = this.spawnFn(this.settings.command, args, {
        detached: true,
        stdio: 'ignore',
        env: { ...this.env, MONITOR_ROLE: payload.role }
      });

      child.once('spawn', () => {
        child.unref();
        this.logger.debug('Worker started', { role: payload.role, pid: child.pid });
        resolve();
      });

      child.once('error', error => {
        reject(new ConfigurationError(
          `Could not start ${payload.role} worker with ${this.settings.command}: ${errorMessage(error)}`,
          'WORKER_SPAWN_FAILED',
          { role: payload.role, command: this.settings.command }
        ));
      });
    });
  }
}
