/**
 * MonitoringTest Model
 * One data-quality or consistency check, the data sources it reads and the
 * destinations its result is published to
 */

import { isDeepStrictEqual } from 'util';
import { ConfigurationError, ResultComputationError } from '../lib/errors';

// Core types
export type TestKind = 'quality' | 'consistency';
export type ConsistencyAction = 'difference' | 'ratio';

export type CallDetails = Readonly<Record<string, unknown>>;

export interface DataSourceCall {
  readonly name: string;
  readonly details: CallDetails;
}

export interface PublishTarget {
  readonly name: string;
  readonly details: CallDetails;
}

interface MonitoringTestBase {
  readonly name: string;
  readonly description: string;
  readonly team: string;
  readonly active: boolean;
  readonly dataSources: readonly DataSourceCall[];
  readonly publishTargets: readonly PublishTarget[];
  readonly tags: Readonly<Record<string, string>>;
  readonly sourceFile: string;
  result?: number;
}

export interface QualityTest extends MonitoringTestBase {
  readonly kind: 'quality';
}

export interface ConsistencyTest extends MonitoringTestBase {
  readonly kind: 'consistency';
  readonly action: ConsistencyAction;
}

export type MonitoringTest = QualityTest | ConsistencyTest;

export type MonitoringTestCreateInput =
  | Omit<QualityTest, 'result'>
  | Omit<ConsistencyTest, 'result'>;

/**
 * Fields a test can be filtered on
 */
export interface TestCriteria {
  name?: string;
  description?: string;
  team?: string;
  kind?: TestKind;
  active?: boolean;
  sourceFile?: string;
}

const CRITERIA_KEYS: (keyof TestCriteria)[] = ['name', 'description', 'team', 'kind', 'active', 'sourceFile'];

const REQUIRED_SOURCES: Record<TestKind, number> = {
  quality: 1,
  consistency: 2
};

/**
 * MonitoringTest Model Implementation
 */
export class MonitoringTestModel {
  /**
   * Creates a test after checking the data-source count for its kind
   */
  static create(input: MonitoringTestCreateInput): MonitoringTest {
    const expected = REQUIRED_SOURCES[input.kind];
    if (input.dataSources.length !== expected) {
      throw new ConfigurationError(
        `Test ${input.name} of type ${input.kind} requires exactly ${expected} data source(s), got ${input.dataSources.length}`,
        'INVALID_DATA_SOURCE_COUNT',
        { test_name: input.name, source_file: input.sourceFile }
      );
    }

    const common = {
      name: input.name,
      description: input.description,
      team: input.team,
      active: input.active,
      dataSources: input.dataSources.map(ds => ({ name: ds.name, details: { ...ds.details } })),
      publishTargets: input.publishTargets.map(pt => ({ name: pt.name, details: { ...pt.details } })),
      tags: { ...input.tags },
      sourceFile: input.sourceFile
    };

    if (input.kind === 'consistency') {
      return { ...common, kind: 'consistency', action: input.action };
    }
    return { ...common, kind: 'quality' };
  }

  /**
   * Sets the result from the resolved data-source values, in declaration order.
   * A zero divisor is a domain error, never Infinity.
   */
  static computeResult(test: MonitoringTest, values: readonly number[]): number {
    if (test.result !== undefined) {
      throw new ResultComputationError(
        `Result of test ${test.name} has already been computed`,
        'RESULT_ALREADY_SET',
        { test_name: test.name }
      );
    }

    if (values.length !== test.dataSources.length) {
      throw new ResultComputationError(
        `Test ${test.name} expects ${test.dataSources.length} value(s), got ${values.length}`,
        'MISSING_SOURCE_VALUES',
        { test_name: test.name }
      );
    }

    const result = MonitoringTestModel.evaluate(test, values);
    test.result = result;
    return result;
  }

  private static evaluate(test: MonitoringTest, values: readonly number[]): number {
    if (test.kind === 'quality') {
      return values[0];
    }

    const [first, second] = values;
    switch (test.action) {
      case 'difference':
        return first - second;
      case 'ratio':
        if (second === 0) {
          throw new ResultComputationError(
            `Division by zero computing ratio for test ${test.name}`,
            'DIVISION_BY_ZERO',
            { test_name: test.name, tags: test.tags, numerator: first }
          );
        }
        return first / second;
    }
  }

  /**
   * True if every supplied criterion equals the corresponding field
   */
  static matches(test: MonitoringTest, criteria: TestCriteria): boolean {
    return CRITERIA_KEYS.every(key => criteria[key] === undefined || test[key] === criteria[key]);
  }

  /**
   * Structural equality of every field, including the result
   */
  static equals(a: MonitoringTest, b: MonitoringTest): boolean {
    return isDeepStrictEqual(a, b);
  }

  /**
   * Details of the publish target with the given name, if the test declares it
   */
  static targetDetails(test: MonitoringTest, publisherName: string): CallDetails | undefined {
    return test.publishTargets.find(target => target.name === publisherName)?.details;
  }

  static describe(test: MonitoringTest): string {
    const tags = Object.entries(test.tags).map(([key, value]) => `${key}:${value}`).join(',');
    return tags ? `${test.name}{${tags}}` : test.name;
  }
}
