/**
 * Test Catalog Service
 *
 * Finds declarative definition files under a root directory, expands them into
 * MonitoringTest instances and filters them. Files are visited in lexicographic
 * path order, which keeps same-named tests adjacent for the batcher.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../lib/logger';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { MonitoringTest, MonitoringTestModel, TestCriteria } from '../models/monitoring-test';
import { TestDefinitionModel } from '../models/test-definition';

export interface CatalogLocation {
  path: string;
  extension: string;
}

export interface BuildTestsOptions {
  /** Relative definition paths (or bare file names) to restrict the build to */
  fileNames?: readonly string[];
  /** Keep inactive tests, used when reconciling dashboards */
  includeInactive?: boolean;
}

export class TestCatalog {
  constructor(
    private readonly location: CatalogLocation,
    private readonly logger: Logger
  ) {}

  /**
   * Definition files relative to the catalog root, sorted by path
   */
  findDefinitionFiles(fileNames?: readonly string[]): string[] {
    const root = path.resolve(this.location.path);
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new ConfigurationError(
        `Test definitions directory not found: ${root}`,
        'DEFINITIONS_NOT_FOUND',
        { path: root }
      );
    }

    const files = this.walk(root)
      .map(file => path.relative(root, file).split(path.sep).join('/'))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    if (!fileNames) {
      return files;
    }

    const wanted = new Set(fileNames);
    return files.filter(file => wanted.has(file) || wanted.has(path.posix.basename(file)));
  }

  /**
   * Finds, loads and expands definitions into the ordered test list
   */
  buildTests(options: BuildTestsOptions = {}): MonitoringTest[] {
    const start = Date.now();
    const files = this.findDefinitionFiles(options.fileNames);
    const tests: MonitoringTest[] = [];

    for (const file of files) {
      tests.push(...TestDefinitionModel.toTests(this.loadDefinition(file), file));
    }

    const selected = options.includeInactive ? tests : TestCatalog.filterTests(tests, { active: true });

    this.logger.info('Built tests', {
      definition_files: files.length,
      tests_built: tests.length,
      tests_selected: selected.length,
      duration_ms: Date.now() - start
    });

    return selected;
  }

  /**
   * Writes one definition file per test name, under a directory per team
   */
  exportDefinitions(tests: readonly MonitoringTest[], targetDir: string): string[] {
    const groups = new Map<string, MonitoringTest[]>();
    for (const test of tests) {
      const key = `${test.team}/${test.name}`;
      groups.set(key, [...(groups.get(key) ?? []), test]);
    }

    const written: string[] = [];
    for (const [key, group] of groups) {
      const filePath = path.join(targetDir, `${key}${this.location.extension}`);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify(TestDefinitionModel.fromTests(group), null, 2) + '\n', 'utf8');
      written.push(filePath);
    }

    this.logger.info('Exported test definitions', { files: written.length, target_dir: targetDir });
    return written;
  }

  static filterTests(tests: readonly MonitoringTest[], criteria: TestCriteria): MonitoringTest[] {
    return tests.filter(test => MonitoringTestModel.matches(test, criteria));
  }

  /**
   * Unique definition files of the given tests, in first-seen order
   */
  static sourceFilesOf(tests: readonly MonitoringTest[]): string[] {
    return [...new Set(tests.map(test => test.sourceFile))];
  }

  private loadDefinition(relativeFile: string): unknown {
    const fullPath = path.join(path.resolve(this.location.path), relativeFile);
    try {
      return JSON.parse(fs.readFileSync(fullPath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `Could not parse test definition ${relativeFile}: ${errorMessage(error)}`,
        'MALFORMED_DEFINITION',
        { source_file: relativeFile }
      );
    }
  }

  private walk(dir: string): string[] {
    const files: string[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...this.walk(fullPath));
      } else if (entry.isFile() && entry.name.endsWith(this.location.extension)) {
        files.push(fullPath);
      }
    }
    return files;
  }
}
