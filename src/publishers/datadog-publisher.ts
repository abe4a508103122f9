/**
 * Datadog Publisher
 *
 * Sends test results as metric series and keeps one dashboard per
 * (dashboard type, dashboard name) in line with the tests targeting it.
 *
 * Metric naming:
 *   detailed  <prefix>.<dashboard>.<test name>   tagged with the test's tags
 *   summary   <prefix>.<dashboard>               tagged with the test's tags and test_name
 */

import axios, { AxiosInstance } from 'axios';
import { DatadogPublisherConfig } from '../config/monitor-config';
import { errorMessage, PublishError } from '../lib/errors';
import { Logger } from '../lib/logger';
import { MonitoringTest, MonitoringTestModel } from '../models/monitoring-test';
import { Publisher } from './publisher';

export type DatadogHttpClient = Pick<AxiosInstance, 'get' | 'post' | 'put'>;

export type DashboardType = 'timeboard' | 'screenboard';

export interface DashboardTarget {
  dashboardName: string;
  typeOfDashboard: DashboardType;
}

export interface MetricSeries {
  metric: string;
  type: 'gauge';
  points: [number, number][];
  tags: string[];
}

export interface WidgetLayout {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Widget {
  definition: Record<string, unknown>;
  layout?: WidgetLayout;
}

export interface DashboardPayload {
  title: string;
  description: string;
  layout_type: 'ordered' | 'free';
  widgets: Widget[];
  template_variables: { name: string; prefix: string; default: string }[];
}

export interface DatadogPublisherOptions {
  http?: DatadogHttpClient;
  /** Current time in milliseconds */
  now?: () => number;
}

const TOP_WIDGET_LAYOUT: WidgetLayout = { x: 1, y: 3, width: 50, height: 20 };
const CHANGE_WIDGET_LAYOUT: WidgetLayout = { x: 55, y: 3, width: 52, height: 20 };
const TIMESERIES_PER_ROW = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class DatadogPublisher implements Publisher {
  private readonly http: DatadogHttpClient;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    private readonly config: DatadogPublisherConfig,
    private readonly logger: Logger,
    options: DatadogPublisherOptions = {}
  ) {
    this.http = options.http ?? axios.create({
      baseURL: `https://api.${config.site}`,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'DD-API-KEY': config.apiKey,
        'DD-APPLICATION-KEY': config.appKey
      }
    });
    this.now = options.now ?? Date.now;
  }

  // ===== METRIC REPORTING =====

  async publishResults(tests: readonly MonitoringTest[]): Promise<void> {
    const start = Date.now();
    const series = tests.flatMap(test => this.buildSeries(test));
    const chunks = chunk(series, this.config.batchSize);

    for (const [index, batch] of chunks.entries()) {
      await this.send('post', '/api/v1/series', { series: batch }, `submit metric batch ${index + 1}/${chunks.length}`);
    }

    this.logger.info('Sent metric points to Datadog', {
      publisher: this.name,
      tests: tests.length,
      series: series.length,
      requests: chunks.length,
      duration_ms: Date.now() - start
    });
  }

  /**
   * Detailed and summary series for one test; none when it cannot be named
   */
  buildSeries(test: MonitoringTest): MetricSeries[] {
    const target = this.dashboardOf(test);
    if (test.result === undefined || !target) {
      this.logger.warn('Skipping test without result or dashboard details', {
        publisher: this.name,
        test: MonitoringTestModel.describe(test)
      });
      return [];
    }

    const points: [number, number][] = [[Math.floor(this.now() / 1000), test.result]];
    const tags = Object.entries(test.tags).map(([key, value]) => `${key}:${value}`);

    return [
      { metric: this.detailedMetric(target.dashboardName, test.name), type: 'gauge', points, tags },
      { metric: this.summaryMetric(target.dashboardName), type: 'gauge', points, tags: [...tags, `test_name:${test.name}`] }
    ];
  }

  // ===== DASHBOARDS =====

  async update(tests: readonly MonitoringTest[]): Promise<void> {
    const groups = this.groupByDashboard(tests);
    const failed: string[] = [];

    for (const [key, group] of groups) {
      try {
        await this.upsertDashboard(group.target, group.tests);
      } catch (error) {
        this.logger.error(`Could not update dashboard ${key}`, error instanceof Error ? error : undefined, {
          publisher: this.name
        });
        failed.push(key);
      }
    }

    await this.updateMetricsMetadata(tests);

    if (failed.length > 0) {
      throw new PublishError(`Failed to update ${failed.length} dashboard(s): ${failed.join(', ')}`, 'DASHBOARD_UPDATE_FAILED', {
        publisher: this.name,
        dashboards: failed
      });
    }
  }

  /**
   * Widgets of one dashboard: top offenders, change, then one timeseries per test name
   */
  buildDashboard(target: DashboardTarget, tests: readonly MonitoringTest[]): DashboardPayload {
    const free = target.typeOfDashboard === 'screenboard';
    const summary = this.summaryMetric(target.dashboardName);
    const breakdown = this.config.breakdownTag;

    const widgets: Widget[] = [
      {
        definition: {
          type: 'toplist',
          title: 'Top offenders',
          requests: [{ q: `top(avg:${summary}{*} by {test_name,${breakdown}}, 50, 'last', 'desc')` }]
        },
        ...(free ? { layout: TOP_WIDGET_LAYOUT } : {})
      },
      {
        definition: {
          type: 'change',
          title: 'Change vs previous day',
          requests: [{
            q: `avg:${summary}{*} by {test_name,${breakdown}}`,
            compare_to: 'day_before',
            change_type: 'absolute',
            order_by: 'change',
            order_dir: 'desc',
            show_present: true,
            increase_good: false
          }]
        },
        ...(free ? { layout: CHANGE_WIDGET_LAYOUT } : {})
      }
    ];

    const names = [...new Set(tests.map(test => test.name))];
    names.forEach((testName, i) => {
      widgets.push({
        definition: {
          type: 'timeseries',
          title: testName,
          requests: [{
            q: `avg:${this.detailedMetric(target.dashboardName, testName)}{*} by {${breakdown}}`,
            display_type: 'line'
          }]
        },
        ...(free
          ? {
              layout: {
                x: 1 + 37 * (i % TIMESERIES_PER_ROW),
                y: 30 + 17 * Math.floor(i / TIMESERIES_PER_ROW),
                width: 35,
                height: 13
              }
            }
          : {})
      });
    });

    return {
      title: target.dashboardName,
      description: '',
      layout_type: free ? 'free' : 'ordered',
      widgets,
      template_variables: [{ name: 'var', prefix: breakdown, default: '*' }]
    };
  }

  async tearDown(): Promise<void> {
    this.logger.debug('Publisher torn down', { publisher: this.name });
  }

  private async upsertDashboard(target: DashboardTarget, tests: readonly MonitoringTest[]): Promise<void> {
    const payload = this.buildDashboard(target, tests);
    const existingId = await this.findDashboardId(target.dashboardName);

    if (existingId) {
      await this.send('put', `/api/v1/dashboard/${existingId}`, payload, `update dashboard ${target.dashboardName}`);
      this.logger.info('Updated dashboard', { publisher: this.name, dashboard: target.dashboardName, tests: tests.length });
    } else {
      await this.send('post', '/api/v1/dashboard', payload, `create dashboard ${target.dashboardName}`);
      this.logger.info('Created dashboard', { publisher: this.name, dashboard: target.dashboardName, tests: tests.length });
    }
  }

  private async findDashboardId(title: string): Promise<string | undefined> {
    const data = await this.send('get', '/api/v1/dashboard', undefined, 'list dashboards');
    if (!isRecord(data) || !Array.isArray(data.dashboards)) {
      return undefined;
    }
    for (const dashboard of data.dashboards) {
      if (isRecord(dashboard) && dashboard.title === title && typeof dashboard.id === 'string') {
        return dashboard.id;
      }
    }
    return undefined;
  }

  private async updateMetricsMetadata(tests: readonly MonitoringTest[]): Promise<void> {
    const described = new Map<string, string>();
    for (const test of tests) {
      const target = this.dashboardOf(test);
      if (target && test.description !== '') {
        const metric = this.detailedMetric(target.dashboardName, test.name);
        if (!described.has(metric)) {
          described.set(metric, test.description);
        }
      }
    }

    for (const [metric, description] of described) {
      try {
        await this.send('put', `/api/v1/metrics/${metric}`, { description }, `update metadata of ${metric}`);
      } catch (error) {
        this.logger.warn('Could not update metric description', { metric, error: errorMessage(error) });
      }
    }

    this.logger.info('Updated metric descriptions', { publisher: this.name, metrics: described.size });
  }

  private groupByDashboard(tests: readonly MonitoringTest[]): Map<string, { target: DashboardTarget; tests: MonitoringTest[] }> {
    const groups = new Map<string, { target: DashboardTarget; tests: MonitoringTest[] }>();
    for (const test of tests) {
      const target = this.dashboardOf(test);
      if (!target) {
        continue;
      }
      const key = `${target.typeOfDashboard}:${target.dashboardName}`;
      const group = groups.get(key) ?? { target, tests: [] };
      group.tests.push(test);
      groups.set(key, group);
    }
    return groups;
  }

  private dashboardOf(test: MonitoringTest): DashboardTarget | undefined {
    const details = MonitoringTestModel.targetDetails(test, this.name);
    if (!details || typeof details.dashboardName !== 'string' || typeof details.typeOfDashboard !== 'string') {
      return undefined;
    }
    const type = details.typeOfDashboard.toLowerCase();
    if (type !== 'timeboard' && type !== 'screenboard') {
      return undefined;
    }
    return { dashboardName: details.dashboardName, typeOfDashboard: type };
  }

  private detailedMetric(dashboardName: string, testName: string): string {
    return `${this.summaryMetric(dashboardName)}.${testName}`;
  }

  private summaryMetric(dashboardName: string): string {
    return `${this.config.metricPrefix}.${dashboardName.replace(/ /g, '_')}`;
  }

  private async send(method: 'get' | 'post' | 'put', url: string, body: unknown, action: string): Promise<unknown> {
    let data: unknown;
    try {
      switch (method) {
        case 'get':
          data = (await this.http.get<unknown>(url)).data;
          break;
        case 'post':
          data = (await this.http.post<unknown>(url, body)).data;
          break;
        case 'put':
          data = (await this.http.put<unknown>(url, body)).data;
          break;
      }
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new PublishError(`Datadog request failed to ${action}: ${errorMessage(error)}`, 'DATADOG_REQUEST_FAILED', {
        publisher: this.name,
        url,
        status
      });
    }

    if (isRecord(data) && Array.isArray(data.errors) && data.errors.length > 0) {
      throw new PublishError(`Datadog rejected request to ${action}: ${data.errors.map(String).join('; ')}`, 'DATADOG_REJECTED', {
        publisher: this.name,
        url
      });
    }
    return data;
  }
}
