/**
 * DevOps Platform Stack
 *
 * The hosts of the delivery and observability platform:
 * - VPC with public subnets and per-role security groups
 * - Jenkins controller running Terraform against the state backend
 * - Prometheus, CloudWatch exporter and Grafana on the monitoring host
 * - Elasticsearch and Kibana on the logging host (optional)
 * - Status check alarms for every host, published to an SNS topic
 */

import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as snsSubscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cloudwatchActions from 'aws-cdk-lib/aws-cloudwatch-actions';
import { OPEN_CIDR, PlatformConfig, resourcePrefix } from './config';
import { GRAFANA_PORT, PlatformNetwork } from './constructs/platform-network';
import { JenkinsServer } from './constructs/jenkins-server';
import { MonitoringServer } from './constructs/monitoring-server';
import { LoggingServer } from './constructs/logging-server';
import { JENKINS_PORT, PROMETHEUS_PORT } from './rendering/prometheus-config';
import { KIBANA_PORT } from './rendering/elastic';

/**
 * Resources owned by StateBackendStack that the platform consumes.
 */
export interface StateBackendResources {
  readonly stateBucket: s3.IBucket;
  readonly lockTable: dynamodb.ITable;
  readonly jenkinsAdminSecret: secretsmanager.ISecret;
  readonly grafanaAdminSecret: secretsmanager.ISecret;
}

export interface DevOpsPlatformStackProps extends cdk.StackProps {
  readonly config: PlatformConfig;
  readonly backend: StateBackendResources;
}

export class DevOpsPlatformStack extends cdk.Stack {
  public readonly network: PlatformNetwork;
  public readonly jenkins: JenkinsServer;
  public readonly monitoring: MonitoringServer;
  public readonly logging?: LoggingServer;
  public readonly alarmTopic: sns.Topic;

  private readonly config: PlatformConfig;
  private readonly prefix: string;

  constructor(scope: Construct, id: string, props: DevOpsPlatformStackProps) {
    super(scope, id, props);

    this.config = props.config;
    this.prefix = resourcePrefix(props.config);
    const { config, backend } = props;

    this.validateAccess();

    this.network = new PlatformNetwork(this, 'Network', {
      prefix: this.prefix,
      vpcCidr: config.vpcCidr,
      adminCidr: config.adminCidr,
      retainData: config.retainData,
    });

    const ami = config.amiId === undefined ? undefined : { id: config.amiId, region: config.region };
    const hostDefaults = {
      prefix: this.prefix,
      vpc: this.network.vpc,
      ami,
      keyPairName: config.keyPairName,
      nodeExporterVersion: config.toolVersions.nodeExporter,
    };

    if (config.enableLogging) {
      this.logging = new LoggingServer(this, 'Logging', {
        ...hostDefaults,
        securityGroup: this.network.loggingSecurityGroup,
        instanceType: config.instanceTypes.logging,
        elasticVersion: config.toolVersions.elastic,
      });
    }

    this.jenkins = new JenkinsServer(this, 'Jenkins', {
      ...hostDefaults,
      region: config.region,
      securityGroup: this.network.jenkinsSecurityGroup,
      instanceType: config.instanceTypes.jenkins,
      terraformVersion: config.toolVersions.terraform,
      stateBucket: backend.stateBucket,
      stateKey: config.stateKey,
      lockTable: backend.lockTable,
      adminSecret: backend.jenkinsAdminSecret,
      pipelineRepository: config.pipelineRepository === undefined
        ? undefined
        : { url: config.pipelineRepository, branch: config.pipelineBranch },
      requireApproval: config.environment !== 'dev',
      elasticsearchHost: this.logging?.instance.instancePrivateIp,
      elasticVersion: config.toolVersions.elastic,
    });

    const nodeHosts = [this.jenkins.instance.instancePrivateIp];
    if (this.logging) {
      nodeHosts.push(this.logging.instance.instancePrivateIp);
    }

    this.monitoring = new MonitoringServer(this, 'Monitoring', {
      ...hostDefaults,
      environment: config.environment,
      region: config.region,
      securityGroup: this.network.monitoringSecurityGroup,
      instanceType: config.instanceTypes.monitoring,
      prometheusVersion: config.toolVersions.prometheus,
      cloudwatchExporterVersion: config.toolVersions.cloudwatchExporter,
      scrapeIntervalSeconds: config.scrapeIntervalSeconds,
      grafanaAdminSecret: backend.grafanaAdminSecret,
      nodeHosts,
      jenkinsHost: this.jenkins.instance.instancePrivateIp,
    });

    this.alarmTopic = this.createAlarmTopic();
    this.createStatusCheckAlarm('Jenkins', this.jenkins.instance);
    this.createStatusCheckAlarm('Monitoring', this.monitoring.instance);
    if (this.logging) {
      this.createStatusCheckAlarm('Logging', this.logging.instance);
    }

    cdk.Tags.of(this).add('Project', config.projectName);
    cdk.Tags.of(this).add('Environment', config.environment);
    cdk.Tags.of(this).add('ManagedBy', 'aws-cdk');

    this.createOutputs();
  }

  /**
   * Surfaces risky access settings at synth time
   */
  private validateAccess(): void {
    if (this.config.adminCidr === OPEN_CIDR) {
      cdk.Annotations.of(this).addWarning(
        'adminCidr is 0.0.0.0/0: Jenkins, Grafana, Prometheus and Kibana are reachable from the internet',
      );
    }
    if (this.config.pipelineRepository === undefined) {
      cdk.Annotations.of(this).addInfo(
        'pipelineRepository is not set: Jenkins starts without the Terraform seed job',
      );
    }
  }

  private createAlarmTopic(): sns.Topic {
    const topic = new sns.Topic(this, 'AlarmTopic', {
      topicName: `${this.prefix}-alarms`,
      displayName: 'DevOps platform alarms',
      enforceSSL: true,
    });
    if (this.config.alertEmail !== undefined) {
      topic.addSubscription(new snsSubscriptions.EmailSubscription(this.config.alertEmail));
    }
    return topic;
  }

  private createStatusCheckAlarm(name: string, instance: ec2.Instance): cloudwatch.Alarm {
    const metric = new cloudwatch.Metric({
      namespace: 'AWS/EC2',
      metricName: 'StatusCheckFailed',
      dimensionsMap: { InstanceId: instance.instanceId },
      statistic: cloudwatch.Stats.MAXIMUM,
      period: cdk.Duration.minutes(1),
    });

    const alarm = new cloudwatch.Alarm(this, `${name}StatusCheckAlarm`, {
      alarmName: `${this.prefix}-${name.toLowerCase()}-status-check`,
      alarmDescription: `${name} host failed its EC2 status checks`,
      metric,
      threshold: 1,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.MISSING,
    });
    alarm.addAlarmAction(new cloudwatchActions.SnsAction(this.alarmTopic));
    return alarm;
  }

  private createOutputs(): void {
    new cdk.CfnOutput(this, 'VpcId', {
      value: this.network.vpc.vpcId,
      description: 'ID of the platform VPC',
      exportName: `${this.prefix}-vpc-id`,
    });

    new cdk.CfnOutput(this, 'JenkinsUrl', {
      value: `http://${this.jenkins.instance.instancePublicDnsName}:${JENKINS_PORT}`,
      description: 'Jenkins web UI',
    });

    new cdk.CfnOutput(this, 'PrometheusUrl', {
      value: `http://${this.monitoring.instance.instancePublicDnsName}:${PROMETHEUS_PORT}`,
      description: 'Prometheus web UI',
    });

    new cdk.CfnOutput(this, 'GrafanaUrl', {
      value: `http://${this.monitoring.instance.instancePublicDnsName}:${GRAFANA_PORT}`,
      description: 'Grafana web UI (user admin)',
    });

    if (this.logging) {
      new cdk.CfnOutput(this, 'KibanaUrl', {
        value: `http://${this.logging.instance.instancePublicDnsName}:${KIBANA_PORT}`,
        description: 'Kibana web UI',
      });
    }

    new cdk.CfnOutput(this, 'WorkloadBoundaryArn', {
      value: this.jenkins.workloadBoundary.managedPolicyArn,
      description: 'Permissions boundary required on roles created by the Terraform pipeline',
    });

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarmTopic.topicArn,
      description: 'SNS topic receiving host status alarms',
    });
  }
}
