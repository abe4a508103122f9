/**
 * Unit Tests: TestDefinition Model
 * Validation of definition files and their expansion into tests
 */

import { TestDefinitionModel } from '../../../src/models/test-definition';
import { ConfigurationError } from '../../../src/lib/errors';

const qualityDefinition = () => ({
  name: 'orders_without_customer',
  description: 'Orders whose customer id has no match',
  type: 'quality',
  team: 'data_insight',
  metrics: {
    north: {
      active: true,
      tags: { segment: 'north' },
      fetchers: { warehouse: { query: 'SELECT 1' } },
      publishers: { datadog: { dashboardName: 'Insight', typeOfDashboard: 'timeboard' } }
    },
    south: {
      active: false,
      tags: { segment: 'south' },
      fetchers: { warehouse: { query: 'SELECT 2' } },
      publishers: { datadog: { dashboardName: 'Insight', typeOfDashboard: 'timeboard' } }
    }
  }
});

describe('TestDefinitionModel', () => {
  describe('validate', () => {
    it('should accept a well-formed quality definition', () => {
      expect(TestDefinitionModel.validate(qualityDefinition())).toEqual({ isValid: true, errors: [] });
    });

    it('should reject something that is not an object', () => {
      expect(TestDefinitionModel.validate(['not', 'a', 'definition'])).toEqual({
        isValid: false,
        errors: ['definition must be an object']
      });
    });

    it('should report every missing field at once', () => {
      const { team, description, ...rest } = qualityDefinition();
      const result = TestDefinitionModel.validate(rest);

      expect(team).toBe('data_insight');
      expect(description).toBeDefined();
      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual([
        'description is required and must be a string',
        'team is required and must be a string'
      ]);
    });

    it('should require an action for consistency definitions', () => {
      const result = TestDefinitionModel.validate({ ...qualityDefinition(), type: 'consistency' });

      expect(result.errors).toContain(
        'action is required for consistency tests and must be one of: difference, ratio, division'
      );
    });

    it('should require two fetchers per metric for consistency definitions', () => {
      const result = TestDefinitionModel.validate({ ...qualityDefinition(), type: 'consistency', action: 'difference' });

      expect(result.errors).toEqual([
        'metrics.north.fetchers must declare exactly 2 data source(s), found 1',
        'metrics.south.fetchers must declare exactly 2 data source(s), found 1'
      ]);
    });

    it('should reject an unknown type', () => {
      const result = TestDefinitionModel.validate({ ...qualityDefinition(), type: 'freshness' });

      expect(result.errors).toEqual(['type is required and must be one of: quality, consistency']);
    });

    it('should reject a fetcher without a query', () => {
      const definition = qualityDefinition();
      const result = TestDefinitionModel.validate({
        ...definition,
        metrics: { only: { ...definition.metrics.north, fetchers: { warehouse: { sql: 'SELECT 1' } } } }
      });

      expect(result.errors).toEqual(['metrics.only.fetchers.warehouse.query is required and must be a string']);
    });

    it('should reject integer-like metric keys, which would not keep their declared order', () => {
      const definition = qualityDefinition();
      const result = TestDefinitionModel.validate({
        ...definition,
        metrics: { north: definition.metrics.north, 2: definition.metrics.south }
      });

      expect(result.errors).toEqual(['metrics.2 must not be an integer-like key, metrics expand in declaration order']);
    });

    it('should reject integer-like fetcher keys of a consistency metric', () => {
      const definition = qualityDefinition();
      const result = TestDefinitionModel.validate({
        ...definition,
        type: 'consistency',
        action: 'difference',
        metrics: {
          only: { ...definition.metrics.north, fetchers: { billing: { query: 'SELECT 1' }, 0: { query: 'SELECT 2' } } }
        }
      });

      expect(result.errors).toEqual([
        'metrics.only.fetchers.0 must not be an integer-like key, data sources are compared in declaration order'
      ]);
    });

    it('should reject an empty metrics map', () => {
      const result = TestDefinitionModel.validate({ ...qualityDefinition(), metrics: {} });

      expect(result.errors).toEqual(['metrics is required and must contain at least one metric']);
    });
  });

  describe('toTests', () => {
    it('should expand one test per metric in declaration order', () => {
      const tests = TestDefinitionModel.toTests(qualityDefinition(), 'insight/orders.json');

      expect(tests).toHaveLength(2);
      expect(tests.map(test => test.tags.segment)).toEqual(['north', 'south']);
      expect(tests.map(test => test.active)).toEqual([true, false]);
      expect(tests[0]).toEqual({
        kind: 'quality',
        name: 'orders_without_customer',
        description: 'Orders whose customer id has no match',
        team: 'data_insight',
        active: true,
        dataSources: [{ name: 'warehouse', details: { query: 'SELECT 1' } }],
        publishTargets: [{ name: 'datadog', details: { dashboardName: 'Insight', typeOfDashboard: 'timeboard' } }],
        tags: { segment: 'north' },
        sourceFile: 'insight/orders.json'
      });
    });

    it('should map the division keyword to a ratio test', () => {
      const definition = {
        ...qualityDefinition(),
        type: 'consistency',
        action: 'division',
        metrics: {
          only: {
            active: true,
            tags: {},
            fetchers: { warehouse: { query: 'SELECT 1' }, billing: { query: 'SELECT 2' } },
            publishers: {}
          }
        }
      };

      const [test] = TestDefinitionModel.toTests(definition, 'ratio.json');

      expect(test.kind).toBe('consistency');
      expect(test.kind === 'consistency' && test.action).toBe('ratio');
      expect(test.dataSources.map(ds => ds.name)).toEqual(['warehouse', 'billing']);
    });

    it('should throw a ConfigurationError naming the file', () => {
      const { team, ...rest } = qualityDefinition();

      expect(team).toBe('data_insight');
      expect(() => TestDefinitionModel.toTests(rest, 'broken.json')).toThrow(ConfigurationError);
      expect(() => TestDefinitionModel.toTests(rest, 'broken.json')).toThrow(
        'Malformed test definition in broken.json: team is required and must be a string'
      );
    });
  });

  describe('fromTests', () => {
    it('should rebuild a definition that expands back into equal tests', () => {
      const tests = TestDefinitionModel.toTests(qualityDefinition(), 'orders.json');
      const definition = TestDefinitionModel.fromTests(tests);

      expect(Object.keys(definition.metrics)).toEqual(['metric1', 'metric2']);
      expect(definition.action).toBeUndefined();
      expect(TestDefinitionModel.toTests(definition, 'orders.json')).toEqual(tests);
    });

    it('should refuse an empty list', () => {
      expect(() => TestDefinitionModel.fromTests([])).toThrow('Cannot build a definition from an empty test list');
    });
  });
});
