#!/usr/bin/env node
/**
 * Quality Monitor CLI
 *
 * Starts an invocation for one role. `invoke` is the entry point distributed
 * workers are spawned with; the other commands are for running by hand.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import {
  MonitorConfig,
  WorkerRole,
  getConfigForLogging,
  isWorkerRole,
  loadMonitorConfig,
  resolveConfigPath
} from '../config/monitor-config';
import { ConfigurationError, MonitorBaseError, errorMessage } from '../lib/errors';
import { Logger } from '../lib/logger';
import { MonitorRunResult, QualityMonitor, QualityMonitorDependencies } from '../quality-monitor';
import { TestCatalog } from '../services/test-catalog';
import { assertContiguousNames, longestNameRun } from '../services/test-batcher';
import { InvocationPayload, parseInvocationPayload } from '../services/worker-invoker';

interface MasterOptions {
  startIndex: string;
}

interface SlaveOptions {
  files: string;
}

interface InvokeOptions {
  payload: string;
}

interface CatalogOptions {
  all?: boolean;
  team?: string;
  export?: string;
}

export interface MonitorCliDependencies {
  env?: NodeJS.ProcessEnv;
  monitor?: QualityMonitorDependencies;
  /** Receives everything the CLI prints */
  write?: (text: string) => void;
  /** Builds the logger from the loaded configuration */
  createLogger?: (config: MonitorConfig) => Logger;
}

export function parseStartIndex(value: string): number {
  const startIndex = Number(value);
  if (!Number.isInteger(startIndex) || startIndex < 0) {
    throw new ConfigurationError(`Start index must be a non-negative integer, got ${value}`, 'INVALID_START_INDEX');
  }
  return startIndex;
}

export function parseFileList(value: string): string[] {
  return value.split(',').map(file => file.trim()).filter(file => file !== '');
}

const defaultLogger = (config: MonitorConfig): Logger => new Logger({
  level: config.logging.level,
  enableFile: config.logging.enableFile,
  logDirectory: config.logging.logDirectory,
  enableStructuredLogging: config.logging.structured
});

export class MonitorCli {
  private readonly program: Command;
  private readonly env: NodeJS.ProcessEnv;
  private readonly write: (text: string) => void;

  constructor(private readonly deps: MonitorCliDependencies = {}) {
    this.env = deps.env ?? process.env;
    this.write = deps.write ?? (text => console.log(text));
    this.program = new Command();
    this.setupCommands();
  }

  async run(args: string[]): Promise<void> {
    await this.program.parseAsync(args);
  }

  private setupCommands(): void {
    this.program
      .name('quality-monitor')
      .description('Batched data-quality and consistency monitoring')
      .version('1.0.0')
      .option('-c, --config <path>', 'Configuration file (default: MONITOR_CONFIG_PATH or config/monitor.config.json)');

    this.program
      .command('master')
      .description('Dispatch every active test to slaves, batch by batch')
      .option('-s, --start-index <n>', 'Catalog position to resume from', '0')
      .action(async (options: MasterOptions) => {
        await this.execute('master', () => ({ role: 'master', startIndex: parseStartIndex(options.startIndex) }));
      });

    this.program
      .command('slave')
      .description('Run the tests of the given definition files')
      .requiredOption('-f, --files <paths>', 'Comma-separated definition files, relative to the definitions root')
      .action(async (options: SlaveOptions) => {
        await this.execute('slave', () => ({ role: 'slave', fileNames: parseFileList(options.files) }));
      });

    this.program
      .command('update-boards')
      .description('Recreate dashboards and metric descriptions from the definitions')
      .action(async () => {
        await this.execute('updater', () => ({ role: 'updater' }));
      });

    this.program
      .command('invoke')
      .description('Run a worker from a JSON invocation payload')
      .requiredOption('--payload <json>', 'Invocation payload')
      .action(async (options: InvokeOptions) => {
        const payload = this.parsePayload(options.payload);
        if (!payload) {
          return;
        }
        const configuredRole = this.env.MONITOR_ROLE;
        const role = isWorkerRole(configuredRole) ? configuredRole : payload.role;
        await this.execute(role, () => payload);
      });

    this.program
      .command('catalog')
      .description('List the tests built from the definitions')
      .option('-a, --all', 'Include inactive tests')
      .option('-t, --team <team>', 'Only tests of this team')
      .option('-e, --export <dir>', 'Write the listed tests back out as definition files')
      .action(async (options: CatalogOptions) => {
        await this.handleCatalogCommand(options);
      });

    this.program
      .command('validate')
      .description('Check the configuration and every definition file')
      .action(async () => {
        await this.handleValidateCommand();
      });
  }

  private async execute(role: WorkerRole, buildPayload: () => InvocationPayload): Promise<void> {
    try {
      const config = this.loadConfig(role);
      const logger = (this.deps.createLogger ?? defaultLogger)(config);
      const monitor = new QualityMonitor(config, role, logger, {
        workerEnv: { ...this.env, MONITOR_CONFIG_PATH: this.configPath() },
        ...this.deps.monitor
      });

      logger.debug('Loaded configuration', getConfigForLogging(config));
      const result = await monitor.handle(buildPayload());
      this.printResult(result);
    } catch (error) {
      this.handleError(error);
    }
  }

  private parsePayload(text: string): InvocationPayload | undefined {
    try {
      return parseInvocationPayload(JSON.parse(text));
    } catch (error) {
      this.handleError(error);
      return undefined;
    }
  }

  private async handleCatalogCommand(options: CatalogOptions): Promise<void> {
    try {
      const config = this.loadConfig();
      const logger = (this.deps.createLogger ?? defaultLogger)(config);
      const catalog = new TestCatalog(config.definitions, logger);
      const built = catalog.buildTests({ includeInactive: options.all === true });
      const tests = options.team ? TestCatalog.filterTests(built, { team: options.team }) : built;

      const table = new Table({
        head: ['#', 'Name', 'Type', 'Team', 'Active', 'Tags', 'File']
      });
      tests.forEach((test, index) => {
        table.push([
          String(index),
          test.name,
          test.kind === 'consistency' ? `consistency (${test.action})` : 'quality',
          test.team,
          test.active ? chalk.green('yes') : chalk.gray('no'),
          Object.entries(test.tags).map(([key, value]) => `${key}:${value}`).join(', '),
          test.sourceFile
        ]);
      });

      this.write(table.toString());
      this.write(chalk.blue(`${tests.length} test(s), longest same-name run ${longestNameRun(tests)}`));

      if (options.export) {
        const written = catalog.exportDefinitions(tests, options.export);
        this.write(chalk.green(`Exported ${written.length} definition file(s) to ${options.export}`));
      }
    } catch (error) {
      this.handleError(error);
    }
  }

  private async handleValidateCommand(): Promise<void> {
    try {
      const config = this.loadConfig();
      const logger = (this.deps.createLogger ?? defaultLogger)(config);
      const tests = new TestCatalog(config.definitions, logger).buildTests({ includeInactive: true });
      const active = tests.filter(test => test.active);
      assertContiguousNames(active);
      const longestRun = longestNameRun(active);

      this.write(chalk.green(`Configuration and ${tests.length} test(s) are valid`));
      if (longestRun > config.runConfiguration.batchSize) {
        this.write(chalk.red(
          `Batch size ${config.runConfiguration.batchSize} is smaller than the longest same-name run (${longestRun})`
        ));
        process.exitCode = 1;
      }
    } catch (error) {
      this.handleError(error);
    }
  }

  private printResult(result: MonitorRunResult): void {
    switch (result.role) {
      case 'master': {
        const { outcome } = result;
        this.write(chalk.green(
          `Dispatched ${outcome.testsDispatched} test(s) in ${outcome.batchesDispatched} batch(es) from index ${outcome.startIndex}`
        ));
        if (outcome.handOffIndex !== undefined) {
          this.write(chalk.yellow(`Handed off to a new master at index ${outcome.handOffIndex}`));
        }
        break;
      }
      case 'slave': {
        const { summary } = result;
        this.write(chalk.green(`Computed ${summary.testsComputed}/${summary.testsReceived} test(s) in ${summary.durationMs}ms`));
        summary.droppedTests.forEach(dropped => {
          this.write(chalk.yellow(`  dropped ${dropped.test} at ${dropped.stage}: ${dropped.reason}`));
        });
        break;
      }
      case 'updater':
        result.reports.forEach(report => {
          const status = report.success ? chalk.green('ok') : chalk.red(`failed: ${report.error ?? 'unknown error'}`);
          this.write(`${report.publisher}: ${report.tests} test(s) ${status}`);
        });
        break;
    }
  }

  private loadConfig(role?: WorkerRole): MonitorConfig {
    return loadMonitorConfig(this.configPath(), { env: this.env, role });
  }

  private configPath(): string {
    const { config } = this.program.opts();
    return resolveConfigPath(typeof config === 'string' ? config : undefined, this.env);
  }

  private handleError(error: unknown): void {
    const prefix = error instanceof MonitorBaseError ? `${error.errorCode}: ` : '';
    console.error(chalk.red(`❌ ${prefix}${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

// CLI entry point
if (require.main === module) {
  new MonitorCli().run(process.argv)
    .catch((error) => {
      console.error('CLI failed to start:', error);
      process.exit(1);
    });
}
