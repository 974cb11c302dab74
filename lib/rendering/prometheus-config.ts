import * as yaml from 'js-yaml';
import { RenderError } from '../errors';

const FILE = 'prometheus.yml';

export const PROMETHEUS_PORT = 9090;
export const NODE_EXPORTER_PORT = 9100;
export const CLOUDWATCH_EXPORTER_PORT = 9106;
export const JENKINS_PORT = 8080;

export interface ScrapeJob {
  readonly jobName: string;
  /** `host:port` pairs */
  readonly targets: string[];
  readonly metricsPath?: string;
  /** Overrides the global interval for this job */
  readonly scrapeIntervalSeconds?: number;
}

export interface PrometheusConfigOptions {
  readonly scrapeIntervalSeconds: number;
  readonly evaluationIntervalSeconds?: number;
  readonly jobs: ScrapeJob[];
  /** Static labels attached to every series leaving this server */
  readonly externalLabels?: Record<string, string>;
}

/**
 * Hosts the default job set is built from. Each value is an address
 * without port.
 */
export interface ScrapeHosts {
  /** Hosts running node_exporter, including the monitoring host itself */
  readonly nodeHosts: string[];
  readonly jenkinsHost?: string;
}

/**
 * Scrape jobs for the platform: Prometheus itself, every node_exporter,
 * the CloudWatch exporter running beside Prometheus and, when present,
 * the Jenkins Prometheus plugin endpoint.
 */
export function defaultScrapeJobs(hosts: ScrapeHosts): ScrapeJob[] {
  const jobs: ScrapeJob[] = [
    { jobName: 'prometheus', targets: [`localhost:${PROMETHEUS_PORT}`] },
    { jobName: 'node', targets: hosts.nodeHosts.map(host => `${host}:${NODE_EXPORTER_PORT}`) },
    // CloudWatch API calls are billed and the data lags; no point scraping it often
    { jobName: 'cloudwatch', targets: [`localhost:${CLOUDWATCH_EXPORTER_PORT}`], scrapeIntervalSeconds: 60 },
  ];
  if (hosts.jenkinsHost !== undefined) {
    jobs.push({
      jobName: 'jenkins',
      targets: [`${hosts.jenkinsHost}:${JENKINS_PORT}`],
      metricsPath: '/prometheus',
    });
  }
  return jobs;
}

function seconds(value: number): string {
  return `${value}s`;
}

export function renderPrometheusConfig(options: PrometheusConfigOptions): string {
  if (options.jobs.length === 0) {
    throw new RenderError(FILE, 'at least one scrape job is required');
  }

  const seen = new Set<string>();
  const scrapeConfigs = options.jobs.map(job => {
    if (seen.has(job.jobName)) {
      throw new RenderError(FILE, `duplicate scrape job '${job.jobName}'`);
    }
    seen.add(job.jobName);
    if (job.targets.length === 0) {
      throw new RenderError(FILE, `scrape job '${job.jobName}' has no targets`);
    }

    const scrapeConfig: Record<string, unknown> = { job_name: job.jobName };
    if (job.scrapeIntervalSeconds !== undefined) {
      scrapeConfig.scrape_interval = seconds(job.scrapeIntervalSeconds);
    }
    if (job.metricsPath !== undefined) {
      scrapeConfig.metrics_path = job.metricsPath;
    }
    scrapeConfig.static_configs = [{ targets: job.targets }];
    return scrapeConfig;
  });

  const global: Record<string, unknown> = {
    scrape_interval: seconds(options.scrapeIntervalSeconds),
    evaluation_interval: seconds(options.evaluationIntervalSeconds ?? options.scrapeIntervalSeconds),
  };
  if (options.externalLabels && Object.keys(options.externalLabels).length > 0) {
    global.external_labels = options.externalLabels;
  }

  return yaml.dump({ global, scrape_configs: scrapeConfigs }, { lineWidth: -1, noRefs: true });
}
