/**
 * TestDefinition Model
 * Declarative definition file layout and its expansion into MonitoringTest instances
 */

import {
  CallDetails,
  ConsistencyAction,
  DataSourceCall,
  MonitoringTest,
  MonitoringTestModel,
  PublishTarget,
  TestKind
} from './monitoring-test';
import { ConfigurationError } from '../lib/errors';

// Core interfaces
export interface MetricDefinition {
  active: boolean;
  tags: Record<string, string>;
  fetchers: Record<string, CallDetails>;
  publishers: Record<string, CallDetails>;
}

export interface TestDefinition {
  name: string;
  description: string;
  type: TestKind;
  team: string;
  action?: ConsistencyAction;
  metrics: Record<string, MetricDefinition>;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

const VALID_TYPES: TestKind[] = ['quality', 'consistency'];

// 'division' is the keyword older definition files use for ratios
const ACTION_ALIASES: Record<string, ConsistencyAction> = {
  difference: 'difference',
  ratio: 'ratio',
  division: 'ratio'
};

const REQUIRED_FETCHERS: Record<TestKind, number> = {
  quality: 1,
  consistency: 2
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(v => typeof v === 'string');
}

// Object key order puts integer-like keys first, ahead of declaration order
const INTEGER_LIKE_KEY = /^\d+$/;

function isTestKind(value: unknown): value is TestKind {
  return typeof value === 'string' && VALID_TYPES.some(kind => kind === value);
}

/**
 * TestDefinition Model Implementation
 */
export class TestDefinitionModel {
  /**
   * Validates a parsed definition file against the expected layout
   */
  static validate(raw: unknown): ValidationResult {
    const errors: string[] = [];

    if (!isRecord(raw)) {
      return { isValid: false, errors: ['definition must be an object'] };
    }

    for (const field of ['name', 'description', 'team']) {
      if (typeof raw[field] !== 'string') {
        errors.push(`${field} is required and must be a string`);
      }
    }

    if (typeof raw.name === 'string' && raw.name.trim() === '') {
      errors.push('name must not be empty');
    }

    if (!isTestKind(raw.type)) {
      errors.push(`type is required and must be one of: ${VALID_TYPES.join(', ')}`);
    }

    if (raw.type === 'consistency') {
      if (typeof raw.action !== 'string' || !Object.keys(ACTION_ALIASES).includes(raw.action)) {
        errors.push(`action is required for consistency tests and must be one of: ${Object.keys(ACTION_ALIASES).join(', ')}`);
      }
    }

    if (!isRecord(raw.metrics) || Object.keys(raw.metrics).length === 0) {
      errors.push('metrics is required and must contain at least one metric');
      return { isValid: false, errors };
    }

    const expectedFetchers = isTestKind(raw.type) ? REQUIRED_FETCHERS[raw.type] : undefined;

    for (const [metricKey, metric] of Object.entries(raw.metrics)) {
      const prefix = `metrics.${metricKey}`;

      if (INTEGER_LIKE_KEY.test(metricKey)) {
        errors.push(`${prefix} must not be an integer-like key, metrics expand in declaration order`);
      }

      if (!isRecord(metric)) {
        errors.push(`${prefix} must be an object`);
        continue;
      }

      if (typeof metric.active !== 'boolean') {
        errors.push(`${prefix}.active is required and must be a boolean`);
      }

      if (!isStringRecord(metric.tags)) {
        errors.push(`${prefix}.tags is required and must map strings to strings`);
      }

      if (!isRecord(metric.fetchers)) {
        errors.push(`${prefix}.fetchers is required and must be an object`);
      } else {
        const fetcherEntries = Object.entries(metric.fetchers);
        if (expectedFetchers !== undefined && fetcherEntries.length !== expectedFetchers) {
          errors.push(`${prefix}.fetchers must declare exactly ${expectedFetchers} data source(s), found ${fetcherEntries.length}`);
        }
        for (const [fetcherName, details] of fetcherEntries) {
          if (INTEGER_LIKE_KEY.test(fetcherName)) {
            errors.push(`${prefix}.fetchers.${fetcherName} must not be an integer-like key, data sources are compared in declaration order`);
          }
          if (!isRecord(details) || typeof details.query !== 'string') {
            errors.push(`${prefix}.fetchers.${fetcherName}.query is required and must be a string`);
          }
        }
      }

      if (!isRecord(metric.publishers)) {
        errors.push(`${prefix}.publishers is required and must be an object`);
      } else {
        for (const [publisherName, details] of Object.entries(metric.publishers)) {
          if (!isRecord(details)) {
            errors.push(`${prefix}.publishers.${publisherName} must be an object`);
          }
        }
      }
    }

    return { isValid: errors.length === 0, errors };
  }

  /**
   * Validates a parsed definition and expands it into one test per metric,
   * in declaration order. Throws ConfigurationError listing every problem.
   */
  static toTests(raw: unknown, sourceFile: string): MonitoringTest[] {
    const validation = TestDefinitionModel.validate(raw);
    if (!validation.isValid || !isRecord(raw) || !isRecord(raw.metrics)) {
      throw new ConfigurationError(
        `Malformed test definition in ${sourceFile}: ${validation.errors.join('; ')}`,
        'MALFORMED_DEFINITION',
        { source_file: sourceFile, issues: validation.errors }
      );
    }

    const name = String(raw.name);
    const description = String(raw.description);
    const team = String(raw.team);
    const action = typeof raw.action === 'string' ? ACTION_ALIASES[raw.action] : undefined;
    const tests: MonitoringTest[] = [];

    for (const metric of Object.values(raw.metrics)) {
      if (!isRecord(metric) || !isRecord(metric.fetchers) || !isRecord(metric.publishers)) {
        continue;
      }

      const dataSources: DataSourceCall[] = Object.entries(metric.fetchers)
        .map(([fetcherName, details]) => ({ name: fetcherName, details: isRecord(details) ? details : {} }));
      const publishTargets: PublishTarget[] = Object.entries(metric.publishers)
        .map(([publisherName, details]) => ({ name: publisherName, details: isRecord(details) ? details : {} }));
      const common = {
        name,
        description,
        team,
        active: metric.active === true,
        dataSources,
        publishTargets,
        tags: isStringRecord(metric.tags) ? metric.tags : {},
        sourceFile
      };

      if (raw.type === 'consistency' && action) {
        tests.push(MonitoringTestModel.create({ ...common, kind: 'consistency', action }));
      } else {
        tests.push(MonitoringTestModel.create({ ...common, kind: 'quality' }));
      }
    }

    return tests;
  }

  /**
   * Rebuilds the definition layout from tests sharing one name
   */
  static fromTests(tests: readonly MonitoringTest[]): TestDefinition {
    if (tests.length === 0) {
      throw new ConfigurationError('Cannot build a definition from an empty test list', 'EMPTY_DEFINITION');
    }

    const [first] = tests;
    const metrics: Record<string, MetricDefinition> = {};
    tests.forEach((test, index) => {
      metrics[`metric${index + 1}`] = {
        active: test.active,
        tags: { ...test.tags },
        fetchers: Object.fromEntries(test.dataSources.map(ds => [ds.name, ds.details])),
        publishers: Object.fromEntries(test.publishTargets.map(pt => [pt.name, pt.details]))
      };
    });

    return {
      name: first.name,
      description: first.description,
      type: first.kind,
      team: first.team,
      ...(first.kind === 'consistency' ? { action: first.action } : {}),
      metrics
    };
  }
}
