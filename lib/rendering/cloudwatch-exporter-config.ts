import * as yaml from 'js-yaml';
import { RenderError } from '../errors';

const FILE = 'cloudwatch_exporter_config.yml';

export type CloudWatchStatistic = 'Average' | 'Sum' | 'Maximum' | 'Minimum' | 'SampleCount';

export interface CloudWatchMetric {
  readonly namespace: string;
  readonly name: string;
  readonly dimensions: string[];
  readonly statistics: CloudWatchStatistic[];
}

export interface CloudWatchExporterOptions {
  readonly region: string;
  readonly metrics: CloudWatchMetric[];
  /** How far behind "now" each query ends; CloudWatch needs a few minutes to settle */
  readonly delaySeconds?: number;
}

export const DEFAULT_EC2_METRICS: CloudWatchMetric[] = [
  { namespace: 'AWS/EC2', name: 'CPUUtilization', dimensions: ['InstanceId'], statistics: ['Average'] },
  { namespace: 'AWS/EC2', name: 'NetworkIn', dimensions: ['InstanceId'], statistics: ['Sum'] },
  { namespace: 'AWS/EC2', name: 'NetworkOut', dimensions: ['InstanceId'], statistics: ['Sum'] },
  { namespace: 'AWS/EC2', name: 'StatusCheckFailed', dimensions: ['InstanceId'], statistics: ['Maximum'] },
];

export function renderCloudWatchExporterConfig(options: CloudWatchExporterOptions): string {
  if (options.metrics.length === 0) {
    throw new RenderError(FILE, 'at least one metric is required');
  }

  const metrics = options.metrics.map(metric => {
    if (metric.statistics.length === 0) {
      throw new RenderError(FILE, `metric '${metric.namespace}/${metric.name}' has no statistics`);
    }
    return {
      aws_namespace: metric.namespace,
      aws_metric_name: metric.name,
      aws_dimensions: metric.dimensions,
      aws_statistics: metric.statistics,
    };
  });

  return yaml.dump(
    {
      region: options.region,
      delay_seconds: options.delaySeconds ?? 600,
      metrics,
    },
    { lineWidth: -1, noRefs: true },
  );
}
