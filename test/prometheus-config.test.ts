import * as yaml from 'js-yaml';
import { defaultScrapeJobs, renderPrometheusConfig } from '../lib/rendering/prometheus-config';

describe('renderPrometheusConfig', () => {
  test('renders the platform scrape jobs', () => {
    const rendered = renderPrometheusConfig({
      scrapeIntervalSeconds: 15,
      jobs: defaultScrapeJobs({ nodeHosts: ['localhost', '10.0.0.12'], jenkinsHost: '10.0.0.12' }),
      externalLabels: { environment: 'dev' },
    });

    expect(yaml.load(rendered)).toEqual({
      global: {
        scrape_interval: '15s',
        evaluation_interval: '15s',
        external_labels: { environment: 'dev' },
      },
      scrape_configs: [
        { job_name: 'prometheus', static_configs: [{ targets: ['localhost:9090'] }] },
        { job_name: 'node', static_configs: [{ targets: ['localhost:9100', '10.0.0.12:9100'] }] },
        { job_name: 'cloudwatch', scrape_interval: '60s', static_configs: [{ targets: ['localhost:9106'] }] },
        { job_name: 'jenkins', metrics_path: '/prometheus', static_configs: [{ targets: ['10.0.0.12:8080'] }] },
      ],
    });
  });

  test('uses a separate evaluation interval and omits empty labels', () => {
    const rendered = renderPrometheusConfig({
      scrapeIntervalSeconds: 30,
      evaluationIntervalSeconds: 60,
      jobs: [{ jobName: 'node', targets: ['10.0.1.5:9100'] }],
      externalLabels: {},
    });

    expect(yaml.load(rendered)).toEqual({
      global: { scrape_interval: '30s', evaluation_interval: '60s' },
      scrape_configs: [{ job_name: 'node', static_configs: [{ targets: ['10.0.1.5:9100'] }] }],
    });
  });

  test('rejects an empty job list', () => {
    expect(() => renderPrometheusConfig({ scrapeIntervalSeconds: 15, jobs: [] }))
      .toThrow('prometheus.yml: at least one scrape job is required');
  });

  test('rejects duplicate job names', () => {
    expect(() => renderPrometheusConfig({
      scrapeIntervalSeconds: 15,
      jobs: [
        { jobName: 'node', targets: ['a:9100'] },
        { jobName: 'node', targets: ['b:9100'] },
      ],
    })).toThrow("prometheus.yml: duplicate scrape job 'node'");
  });

  test('rejects a job without targets', () => {
    expect(() => renderPrometheusConfig({ scrapeIntervalSeconds: 15, jobs: [{ jobName: 'node', targets: [] }] }))
      .toThrow("prometheus.yml: scrape job 'node' has no targets");
  });
});

describe('defaultScrapeJobs', () => {
  test('leaves out the Jenkins job without a Jenkins host', () => {
    const jobs = defaultScrapeJobs({ nodeHosts: ['localhost'] });

    expect(jobs.map(job => job.jobName)).toEqual(['prometheus', 'node', 'cloudwatch']);
  });
});
