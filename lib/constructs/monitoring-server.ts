import { Construct } from 'constructs';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { PlatformInstance } from './platform-instance';
import { UserDataBuilder } from '../user-data/user-data-builder';
import { PROMETHEUS_PORT, defaultScrapeJobs, renderPrometheusConfig } from '../rendering/prometheus-config';
import { DEFAULT_EC2_METRICS, renderCloudWatchExporterConfig } from '../rendering/cloudwatch-exporter-config';
import {
  DEFAULT_PANELS,
  renderDashboardProvider,
  renderGrafanaDashboard,
  renderGrafanaDatasource,
} from '../rendering/grafana';

export const GRAFANA_DASHBOARDS_PATH = '/var/lib/grafana/dashboards';
export const PLATFORM_DASHBOARD_UID = 'platform-overview';

export interface MonitoringServerProps {
  readonly prefix: string;
  readonly environment: string;
  readonly region: string;
  readonly vpc: ec2.IVpc;
  readonly securityGroup: ec2.ISecurityGroup;
  readonly instanceType: string;
  readonly ami?: { readonly id: string; readonly region: string };
  readonly keyPairName?: string;
  readonly prometheusVersion: string;
  readonly nodeExporterVersion: string;
  readonly cloudwatchExporterVersion: string;
  readonly scrapeIntervalSeconds: number;
  readonly grafanaAdminSecret: secretsmanager.ISecret;
  /** Private addresses of the other hosts running node_exporter */
  readonly nodeHosts: string[];
  readonly jenkinsHost?: string;
}

/**
 * Prometheus, the CloudWatch exporter and Grafana on a single host.
 */
export class MonitoringServer extends Construct {
  public readonly instance: ec2.Instance;
  public readonly role: iam.Role;
  public readonly prometheusConfig: string;

  constructor(scope: Construct, id: string, props: MonitoringServerProps) {
    super(scope, id);

    this.prometheusConfig = renderPrometheusConfig({
      scrapeIntervalSeconds: props.scrapeIntervalSeconds,
      jobs: defaultScrapeJobs({
        nodeHosts: ['localhost', ...props.nodeHosts],
        jenkinsHost: props.jenkinsHost,
      }),
      externalLabels: { environment: props.environment },
    });

    const userData = ec2.UserData.forLinux();
    new UserDataBuilder(userData)
      .updateSystem()
      .installAwsCli()
      .installNodeExporter(props.nodeExporterVersion)
      .installPrometheus(props.prometheusVersion)
      .installCloudWatchExporter(props.cloudwatchExporterVersion)
      .installGrafana()
      .writeFile('/etc/prometheus/prometheus.yml', this.prometheusConfig, { owner: 'prometheus:prometheus' })
      .writeFile('/etc/cloudwatch_exporter/config.yml', renderCloudWatchExporterConfig({
        region: props.region,
        metrics: DEFAULT_EC2_METRICS,
      }))
      .writeFile('/etc/grafana/provisioning/datasources/prometheus.yaml', renderGrafanaDatasource({
        prometheusUrl: `http://localhost:${PROMETHEUS_PORT}`,
      }), { owner: 'root:grafana', mode: '0640' })
      .writeFile('/etc/grafana/provisioning/dashboards/platform.yaml', renderDashboardProvider({
        dashboardsPath: GRAFANA_DASHBOARDS_PATH,
      }), { owner: 'root:grafana', mode: '0640' })
      .writeFile(`${GRAFANA_DASHBOARDS_PATH}/${PLATFORM_DASHBOARD_UID}.json`, renderGrafanaDashboard({
        title: `${props.prefix} overview`,
        uid: PLATFORM_DASHBOARD_UID,
        panels: DEFAULT_PANELS,
        tags: ['platform', props.environment],
      }), { owner: 'grafana:grafana' })
      .exportSecretToEnvironmentFile({
        secretId: props.grafanaAdminSecret.secretArn,
        region: props.region,
        variable: 'GF_SECURITY_ADMIN_PASSWORD',
        envFile: '/etc/sysconfig/grafana-server',
      })
      .startServices('node_exporter', 'prometheus', 'cloudwatch_exporter', 'grafana-server')
      .addCompletionMarker();

    const host = new PlatformInstance(this, 'Host', {
      name: `${props.prefix}-monitoring`,
      description: 'Prometheus and Grafana host',
      vpc: props.vpc,
      securityGroup: props.securityGroup,
      instanceType: props.instanceType,
      ami: props.ami,
      keyPairName: props.keyPairName,
      userData,
    });
    this.instance = host.instance;
    this.role = host.role;

    props.grafanaAdminSecret.grantRead(this.role);

    // CloudWatch exporter; these read APIs do not support resource-level permissions
    this.role.addToPolicy(new iam.PolicyStatement({
      sid: 'ReadCloudWatchMetrics',
      effect: iam.Effect.ALLOW,
      actions: [
        'cloudwatch:ListMetrics',
        'cloudwatch:GetMetricStatistics',
        'cloudwatch:GetMetricData',
        'tag:GetResources',
      ],
      resources: ['*'],
    }));
  }
}
