import { Construct } from 'constructs';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import { PlatformInstance } from './platform-instance';
import { UserDataBuilder } from '../user-data/user-data-builder';
import { ELASTICSEARCH_PORT, renderElasticsearchConfig, renderKibanaConfig } from '../rendering/elastic';

export interface LoggingServerProps {
  readonly prefix: string;
  readonly vpc: ec2.IVpc;
  readonly securityGroup: ec2.ISecurityGroup;
  readonly instanceType: string;
  readonly ami?: { readonly id: string; readonly region: string };
  readonly keyPairName?: string;
  readonly elasticVersion: string;
  readonly nodeExporterVersion: string;
  /** JVM heap for Elasticsearch @default '2g' */
  readonly heapSize?: string;
}

/**
 * Single-node Elasticsearch with Kibana in front of it.
 */
export class LoggingServer extends Construct {
  public readonly instance: ec2.Instance;
  public readonly role: iam.Role;

  constructor(scope: Construct, id: string, props: LoggingServerProps) {
    super(scope, id);

    const userData = ec2.UserData.forLinux();
    new UserDataBuilder(userData)
      .updateSystem()
      .installNodeExporter(props.nodeExporterVersion)
      .installElasticRepository(props.elasticVersion)
      .installElasticsearch(props.heapSize ?? '2g')
      .installKibana()
      .writeFile('/etc/elasticsearch/elasticsearch.yml', renderElasticsearchConfig({
        clusterName: `${props.prefix}-logs`,
      }), { owner: 'root:elasticsearch', mode: '0660' })
      .writeFile('/etc/kibana/kibana.yml', renderKibanaConfig({
        elasticsearchUrl: `http://localhost:${ELASTICSEARCH_PORT}`,
        serverName: `${props.prefix}-kibana`,
      }), { owner: 'root:kibana', mode: '0660' })
      .startServices('node_exporter', 'elasticsearch', 'kibana')
      .addCompletionMarker();

    const host = new PlatformInstance(this, 'Host', {
      name: `${props.prefix}-logging`,
      description: 'Elasticsearch and Kibana host',
      vpc: props.vpc,
      securityGroup: props.securityGroup,
      instanceType: props.instanceType,
      ami: props.ami,
      keyPairName: props.keyPairName,
      userData,
      rootVolumeSize: 100,
    });
    this.instance = host.instance;
    this.role = host.role;
  }
}
