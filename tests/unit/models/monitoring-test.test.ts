/**
 * Unit Tests: MonitoringTest Model
 * Construction rules, result computation and structural filtering
 */

import { MonitoringTestModel } from '../../../src/models/monitoring-test';
import { ResultComputationError } from '../../../src/lib/errors';
import { monitorTestUtils } from '../../setup';

describe('MonitoringTestModel', () => {
  describe('create', () => {
    it('should reject a quality test with two data sources', () => {
      expect(() => MonitoringTestModel.create({
        kind: 'quality',
        name: 'two_sources',
        description: '',
        team: 'qa',
        active: true,
        dataSources: [
          { name: 'warehouse', details: { query: 'SELECT 1' } },
          { name: 'billing', details: { query: 'SELECT 2' } }
        ],
        publishTargets: [],
        tags: {},
        sourceFile: 'two_sources.json'
      })).toThrow('requires exactly 1 data source(s), got 2');
    });

    it('should reject a consistency test with one data source', () => {
      let thrown: unknown;
      try {
        MonitoringTestModel.create({
          kind: 'consistency',
          action: 'ratio',
          name: 'one_source',
          description: '',
          team: 'qa',
          active: true,
          dataSources: [{ name: 'warehouse', details: { query: 'SELECT 1' } }],
          publishTargets: [],
          tags: {},
          sourceFile: 'one_source.json'
        });
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toHaveErrorCode('INVALID_DATA_SOURCE_COUNT');
    });

    it('should copy tags so later changes to the input do not leak in', () => {
      const tags: Record<string, string> = { segment: 'north' };
      const test = monitorTestUtils.makeQualityTest({ tags });
      tags.segment = 'south';

      expect(test.tags).toEqual({ segment: 'north' });
      expect(test.result).toBeUndefined();
    });
  });

  describe('computeResult', () => {
    it.each([0, -3, 42.5])('should use the single value of a quality test (%p)', value => {
      const test = monitorTestUtils.makeQualityTest();

      expect(MonitoringTestModel.computeResult(test, [value])).toBe(value);
      expect(test.result).toBe(value);
    });

    it('should subtract the second value for a difference test, allowing negatives', () => {
      const test = monitorTestUtils.makeConsistencyTest('difference');

      expect(MonitoringTestModel.computeResult(test, [3, 10])).toBe(-7);
    });

    it('should divide the first value by the second for a ratio test', () => {
      const test = monitorTestUtils.makeConsistencyTest('ratio');

      expect(MonitoringTestModel.computeResult(test, [3, 4])).toBe(0.75);
    });

    it('should raise a domain error instead of returning Infinity on a zero divisor', () => {
      const test = monitorTestUtils.makeConsistencyTest('ratio');

      expect(() => MonitoringTestModel.computeResult(test, [5, 0])).toThrow(ResultComputationError);
      expect(test.result).toBeUndefined();
    });

    it('should allow a zero numerator', () => {
      const test = monitorTestUtils.makeConsistencyTest('ratio');

      expect(MonitoringTestModel.computeResult(test, [0, 8])).toBe(0);
    });

    it('should refuse to set the result twice', () => {
      const test = monitorTestUtils.makeQualityTest();
      MonitoringTestModel.computeResult(test, [1]);

      expect(() => MonitoringTestModel.computeResult(test, [2])).toThrow('has already been computed');
      expect(test.result).toBe(1);
    });

    it('should require one value per data source', () => {
      const test = monitorTestUtils.makeConsistencyTest('difference');

      expect(() => MonitoringTestModel.computeResult(test, [1])).toThrow('expects 2 value(s), got 1');
    });
  });

  describe('matches', () => {
    const test = monitorTestUtils.makeQualityTest({ name: 'orders', team: 'ops' });

    it('should match when every supplied field is equal', () => {
      expect(MonitoringTestModel.matches(test, { name: 'orders', team: 'ops', active: true })).toBe(true);
    });

    it('should not match when one supplied field differs', () => {
      expect(MonitoringTestModel.matches(test, { name: 'orders', team: 'finance' })).toBe(false);
    });

    it('should match everything with empty criteria', () => {
      expect(MonitoringTestModel.matches(test, {})).toBe(true);
    });

    it('should compare the kind', () => {
      expect(MonitoringTestModel.matches(test, { kind: 'consistency' })).toBe(false);
    });
  });

  describe('equals', () => {
    it('should compare structurally, including the result', () => {
      const a = monitorTestUtils.makeQualityTest({ tags: { segment: 'x' } });
      const b = monitorTestUtils.makeQualityTest({ tags: { segment: 'x' } });

      expect(MonitoringTestModel.equals(a, b)).toBe(true);

      MonitoringTestModel.computeResult(a, [1]);
      expect(MonitoringTestModel.equals(a, b)).toBe(false);
    });
  });

  describe('describe', () => {
    it('should render the name with its tags', () => {
      const test = monitorTestUtils.makeQualityTest({ name: 'orders', tags: { segment: 'x', region: 'eu' } });

      expect(MonitoringTestModel.describe(test)).toBe('orders{segment:x,region:eu}');
    });
  });
});
