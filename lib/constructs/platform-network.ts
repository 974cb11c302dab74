import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import { JENKINS_PORT, NODE_EXPORTER_PORT, PROMETHEUS_PORT } from '../rendering/prometheus-config';
import { ELASTICSEARCH_PORT, KIBANA_PORT } from '../rendering/elastic';
import { cidrPrefixLength } from '../config';
import { ConfigurationError } from '../errors';

export const GRAFANA_PORT = 3000;
export const SSH_PORT = 22;

const DEFAULT_SUBNET_MASK = 24;

/**
 * Mask of the per-AZ public subnets: /24 where the VPC has room for one per
 * AZ, otherwise the VPC split evenly across the AZs.
 */
export function publicSubnetMask(vpcCidr: string, azCount: number): number {
  const prefix = cidrPrefixLength(vpcCidr);
  if (prefix === undefined) {
    throw new ConfigurationError([`vpcCidr '${vpcCidr}' is not a valid IPv4 CIDR block`]);
  }
  const mask = Math.max(DEFAULT_SUBNET_MASK, prefix + Math.ceil(Math.log2(azCount)));
  if (mask > 28) {
    throw new ConfigurationError([`vpcCidr '${vpcCidr}' is too small for ${azCount} public subnets`]);
  }
  return mask;
}

export interface PlatformNetworkProps {
  readonly prefix: string;
  readonly vpcCidr: string;
  readonly adminCidr: string;
  readonly retainData: boolean;
  /** @default 2 */
  readonly maxAzs?: number;
}

/**
 * VPC and security groups shared by the platform hosts.
 *
 * Hosts live in public subnets (no NAT gateway; the platform has no
 * private workloads). The admin CIDR reaches SSH and the web consoles;
 * everything else is only reachable from the monitoring group or the VPC.
 */
export class PlatformNetwork extends Construct {
  public readonly vpc: ec2.Vpc;
  public readonly jenkinsSecurityGroup: ec2.SecurityGroup;
  public readonly monitoringSecurityGroup: ec2.SecurityGroup;
  public readonly loggingSecurityGroup: ec2.SecurityGroup;

  constructor(scope: Construct, id: string, props: PlatformNetworkProps) {
    super(scope, id);

    const maxAzs = props.maxAzs ?? 2;
    this.vpc = new ec2.Vpc(this, 'Vpc', {
      ipAddresses: ec2.IpAddresses.cidr(props.vpcCidr),
      maxAzs,
      enableDnsHostnames: true,
      enableDnsSupport: true,
      natGateways: 0,
      subnetConfiguration: [
        {
          cidrMask: publicSubnetMask(props.vpcCidr, maxAzs),
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
        },
      ],
    });
    cdk.Tags.of(this.vpc).add('Name', `${props.prefix}-vpc`);

    const flowLogGroup = new logs.LogGroup(this, 'FlowLogGroup', {
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: props.retainData ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY,
    });
    this.vpc.addFlowLog('FlowLog', {
      destination: ec2.FlowLogDestination.toCloudWatchLogs(flowLogGroup),
      trafficType: ec2.FlowLogTrafficType.REJECT,
    });

    const admin = ec2.Peer.ipv4(props.adminCidr);

    this.jenkinsSecurityGroup = this.createSecurityGroup('JenkinsSecurityGroup', `${props.prefix}-jenkins-sg`, 'Jenkins controller');
    this.jenkinsSecurityGroup.addIngressRule(admin, ec2.Port.tcp(JENKINS_PORT), 'Jenkins web UI from admin network');
    this.jenkinsSecurityGroup.addIngressRule(admin, ec2.Port.tcp(SSH_PORT), 'SSH from admin network');

    this.monitoringSecurityGroup = this.createSecurityGroup('MonitoringSecurityGroup', `${props.prefix}-monitoring-sg`, 'Prometheus and Grafana');
    this.monitoringSecurityGroup.addIngressRule(admin, ec2.Port.tcp(PROMETHEUS_PORT), 'Prometheus UI from admin network');
    this.monitoringSecurityGroup.addIngressRule(admin, ec2.Port.tcp(GRAFANA_PORT), 'Grafana from admin network');
    this.monitoringSecurityGroup.addIngressRule(admin, ec2.Port.tcp(SSH_PORT), 'SSH from admin network');

    this.loggingSecurityGroup = this.createSecurityGroup('LoggingSecurityGroup', `${props.prefix}-logging-sg`, 'Elasticsearch and Kibana');
    this.loggingSecurityGroup.addIngressRule(admin, ec2.Port.tcp(KIBANA_PORT), 'Kibana from admin network');
    this.loggingSecurityGroup.addIngressRule(admin, ec2.Port.tcp(SSH_PORT), 'SSH from admin network');
    this.loggingSecurityGroup.addIngressRule(
      ec2.Peer.ipv4(props.vpcCidr),
      ec2.Port.tcp(ELASTICSEARCH_PORT),
      'Elasticsearch from hosts shipping logs',
    );

    // Prometheus scrapes node_exporter everywhere and the Jenkins plugin endpoint
    for (const target of [this.jenkinsSecurityGroup, this.loggingSecurityGroup, this.monitoringSecurityGroup]) {
      target.addIngressRule(this.monitoringSecurityGroup, ec2.Port.tcp(NODE_EXPORTER_PORT), 'node_exporter from Prometheus');
    }
    this.jenkinsSecurityGroup.addIngressRule(this.monitoringSecurityGroup, ec2.Port.tcp(JENKINS_PORT), 'Jenkins metrics from Prometheus');
  }

  private createSecurityGroup(id: string, name: string, description: string): ec2.SecurityGroup {
    const securityGroup = new ec2.SecurityGroup(this, id, {
      vpc: this.vpc,
      description: `Security group for ${description}`,
      allowAllOutbound: true,
    });
    cdk.Tags.of(securityGroup).add('Name', name);
    return securityGroup;
  }
}
