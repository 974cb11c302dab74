/**
 * Grafana provisioning files and the platform dashboard.
 *
 * Grafana reads datasources and dashboard providers from
 * /etc/grafana/provisioning at startup, so the monitoring host only has to
 * drop these files in place before the service starts.
 */

import * as yaml from 'js-yaml';
import { RenderError } from '../errors';

export const PROMETHEUS_DATASOURCE_UID = 'prometheus';

export interface DashboardPanel {
  readonly title: string;
  /** PromQL expression */
  readonly expr: string;
  readonly unit?: string;
  readonly legendFormat?: string;
}

export interface DashboardOptions {
  readonly title: string;
  readonly uid: string;
  readonly panels: DashboardPanel[];
  /** Auto refresh interval, e.g. `30s` */
  readonly refresh?: string;
  readonly tags?: string[];
}

export interface GridPosition {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

export interface GrafanaPanel {
  readonly id: number;
  readonly type: 'timeseries';
  readonly title: string;
  readonly gridPos: GridPosition;
  readonly datasource: { readonly type: 'prometheus'; readonly uid: string };
  readonly fieldConfig: { readonly defaults: { readonly unit: string }; readonly overrides: never[] };
  readonly targets: { readonly refId: string; readonly expr: string; readonly legendFormat?: string }[];
}

export interface GrafanaDashboard {
  readonly uid: string;
  readonly title: string;
  readonly tags: string[];
  readonly timezone: 'browser';
  readonly schemaVersion: number;
  readonly refresh: string;
  readonly time: { readonly from: string; readonly to: string };
  readonly panels: GrafanaPanel[];
}

const PANEL_WIDTH = 12;
const PANEL_HEIGHT = 8;
const PANELS_PER_ROW = 2;

export const DEFAULT_PANELS: DashboardPanel[] = [
  {
    title: 'CPU Usage',
    expr: '100 - (avg by (instance) (rate(node_cpu_seconds_total{mode="idle"}[5m])) * 100)',
    unit: 'percent',
    legendFormat: '{{instance}}',
  },
  {
    title: 'Memory Usage',
    expr: '(1 - node_memory_MemAvailable_bytes / node_memory_MemTotal_bytes) * 100',
    unit: 'percent',
    legendFormat: '{{instance}}',
  },
  {
    title: 'Disk Usage',
    expr: '(1 - node_filesystem_avail_bytes{mountpoint="/"} / node_filesystem_size_bytes{mountpoint="/"}) * 100',
    unit: 'percent',
    legendFormat: '{{instance}}',
  },
  {
    title: 'Network Traffic',
    expr: 'rate(node_network_receive_bytes_total{device!="lo"}[5m])',
    unit: 'Bps',
    legendFormat: '{{instance}} {{device}}',
  },
  { title: 'Targets Up', expr: 'up', unit: 'short', legendFormat: '{{job}} {{instance}}' },
  {
    title: 'EC2 CPU (CloudWatch)',
    expr: 'aws_ec2_cpuutilization_average',
    unit: 'percent',
    legendFormat: '{{instance_id}}',
  },
  { title: 'Jenkins Queue Size', expr: 'jenkins_queue_size_value', unit: 'short' },
  { title: 'Jenkins Busy Executors', expr: 'jenkins_executor_in_use_value', unit: 'short' },
];

export function renderGrafanaDatasource(options: { prometheusUrl: string }): string {
  return yaml.dump(
    {
      apiVersion: 1,
      datasources: [
        {
          name: 'Prometheus',
          type: 'prometheus',
          uid: PROMETHEUS_DATASOURCE_UID,
          access: 'proxy',
          url: options.prometheusUrl,
          isDefault: true,
          editable: false,
        },
      ],
    },
    { lineWidth: -1, noRefs: true },
  );
}

export function renderDashboardProvider(options: { dashboardsPath: string; folder?: string }): string {
  return yaml.dump(
    {
      apiVersion: 1,
      providers: [
        {
          name: 'platform',
          folder: options.folder ?? 'Platform',
          type: 'file',
          disableDeletion: true,
          options: { path: options.dashboardsPath },
        },
      ],
    },
    { lineWidth: -1, noRefs: true },
  );
}

export function gridPosition(index: number): GridPosition {
  return {
    x: (index % PANELS_PER_ROW) * PANEL_WIDTH,
    y: Math.floor(index / PANELS_PER_ROW) * PANEL_HEIGHT,
    w: PANEL_WIDTH,
    h: PANEL_HEIGHT,
  };
}

export function buildGrafanaDashboard(options: DashboardOptions): GrafanaDashboard {
  const file = `${options.uid}.json`;
  if (options.panels.length === 0) {
    throw new RenderError(file, 'a dashboard needs at least one panel');
  }

  const titles = new Set<string>();
  const panels = options.panels.map((panel, index): GrafanaPanel => {
    if (titles.has(panel.title)) {
      throw new RenderError(file, `duplicate panel title '${panel.title}'`);
    }
    titles.add(panel.title);
    return {
      id: index + 1,
      type: 'timeseries',
      title: panel.title,
      gridPos: gridPosition(index),
      datasource: { type: 'prometheus', uid: PROMETHEUS_DATASOURCE_UID },
      fieldConfig: { defaults: { unit: panel.unit ?? 'short' }, overrides: [] },
      targets: [
        panel.legendFormat === undefined
          ? { refId: 'A', expr: panel.expr }
          : { refId: 'A', expr: panel.expr, legendFormat: panel.legendFormat },
      ],
    };
  });

  return {
    uid: options.uid,
    title: options.title,
    tags: options.tags ?? [],
    timezone: 'browser',
    schemaVersion: 39,
    refresh: options.refresh ?? '30s',
    time: { from: 'now-6h', to: 'now' },
    panels,
  };
}

export function renderGrafanaDashboard(options: DashboardOptions): string {
  return JSON.stringify(buildGrafanaDashboard(options), null, 2);
}
