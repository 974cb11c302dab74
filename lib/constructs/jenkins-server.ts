import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { PlatformInstance } from './platform-instance';
import { UserDataBuilder } from '../user-data/user-data-builder';
import { renderBackendConfig } from '../rendering/terraform-backend';
import { renderJenkinsfile, terraformPipelineStages } from '../rendering/jenkinsfile';
import { JENKINS_PLUGINS, renderJenkinsCasc } from '../rendering/jenkins-casc';
import { renderFilebeatConfig } from '../rendering/elastic';

export const JENKINS_HOME = '/var/lib/jenkins';
export const BACKEND_CONFIG_PATH = `${JENKINS_HOME}/terraform/backend.hcl`;
export const SEED_JENKINSFILE_PATH = `${JENKINS_HOME}/seed/Jenkinsfile`;
export const CASC_PATH = `${JENKINS_HOME}/casc/jenkins.yaml`;
export const JENKINS_ADMIN_ENV_FILE = '/etc/sysconfig/jenkins-admin';
export const SEED_JOB_NAME = 'terraform-deploy';

export interface JenkinsServerProps {
  readonly prefix: string;
  readonly region: string;
  readonly vpc: ec2.IVpc;
  readonly securityGroup: ec2.ISecurityGroup;
  readonly instanceType: string;
  readonly ami?: { readonly id: string; readonly region: string };
  readonly keyPairName?: string;
  readonly terraformVersion: string;
  readonly nodeExporterVersion: string;
  readonly stateBucket: s3.IBucket;
  readonly stateKey: string;
  readonly lockTable: dynamodb.ITable;
  readonly adminSecret: secretsmanager.ISecret;
  /** Repository the seed pipeline clones; no seed job is created without it */
  readonly pipelineRepository?: { readonly url: string; readonly branch: string };
  /** Gate `terraform apply` behind a manual approval */
  readonly requireApproval: boolean;
  /** Ship build logs to this Elasticsearch host when set */
  readonly elasticsearchHost?: string;
  readonly elasticVersion?: string;
}

/**
 * Jenkins controller that runs Terraform against the S3 state backend.
 *
 * First boot installs Jenkins LTS with its plugins, Terraform and
 * node_exporter, then writes backend.hcl, the seed Jenkinsfile and the
 * configuration-as-code file so the controller comes up without the setup
 * wizard.
 */
export class JenkinsServer extends Construct {
  public readonly instance: ec2.Instance;
  public readonly role: iam.Role;
  public readonly jenkinsfile: string;
  /** Permissions boundary every role created by the pipeline must carry */
  public readonly workloadBoundary: iam.ManagedPolicy;

  constructor(scope: Construct, id: string, props: JenkinsServerProps) {
    super(scope, id);

    this.jenkinsfile = renderJenkinsfile({
      stages: terraformPipelineStages({
        backendConfigPath: BACKEND_CONFIG_PATH,
        requireApproval: props.requireApproval,
        repository: props.pipelineRepository,
      }),
      environment: { AWS_REGION: props.region, TF_IN_AUTOMATION: 'true' },
      archive: ['tfplan'],
    });

    const userData = ec2.UserData.forLinux();
    const builder = new UserDataBuilder(userData)
      .updateSystem()
      .installAwsCli()
      .installNodeExporter(props.nodeExporterVersion)
      .installTerraform(props.terraformVersion)
      .installJenkins(JENKINS_PLUGINS)
      .writeFile(BACKEND_CONFIG_PATH, renderBackendConfig({
        bucket: props.stateBucket.bucketName,
        key: props.stateKey,
        region: props.region,
        lockTable: props.lockTable.tableName,
      }), { owner: 'jenkins:jenkins' })
      .writeFile(SEED_JENKINSFILE_PATH, this.jenkinsfile, { owner: 'jenkins:jenkins' })
      .writeFile(CASC_PATH, renderJenkinsCasc({
        systemMessage: `${props.prefix} delivery controller`,
        adminPasswordVariable: 'JENKINS_ADMIN_PASSWORD',
        seedJob: props.pipelineRepository === undefined
          ? undefined
          : { name: SEED_JOB_NAME, jenkinsfilePath: SEED_JENKINSFILE_PATH },
      }), { owner: 'jenkins:jenkins', mode: '0640' })
      .writeFile('/etc/systemd/system/jenkins.service.d/override.conf', [
        '[Service]',
        `EnvironmentFile=${JENKINS_ADMIN_ENV_FILE}`,
        'Environment="JAVA_OPTS=-Djava.awt.headless=true -Djenkins.install.runSetupWizard=false"',
        `Environment="CASC_JENKINS_CONFIG=${CASC_PATH}"`,
      ].join('\n'))
      .exportSecretToEnvironmentFile({
        secretId: props.adminSecret.secretArn,
        region: props.region,
        variable: 'JENKINS_ADMIN_PASSWORD',
        envFile: JENKINS_ADMIN_ENV_FILE,
      });

    const services = ['node_exporter', 'jenkins'];
    if (props.elasticsearchHost !== undefined) {
      builder
        .installElasticRepository(props.elasticVersion ?? '8.x')
        .installFilebeat()
        .writeFile('/etc/filebeat/filebeat.yml', renderFilebeatConfig({
          elasticsearchHost: props.elasticsearchHost,
          paths: ['/var/log/user-data.log', `${JENKINS_HOME}/jobs/*/builds/*/log`],
          service: 'jenkins',
        }), { mode: '0600' });
      services.push('filebeat');
    }
    builder.startServices(...services).addCompletionMarker();

    const host = new PlatformInstance(this, 'Host', {
      name: `${props.prefix}-jenkins`,
      description: 'Jenkins controller',
      vpc: props.vpc,
      securityGroup: props.securityGroup,
      instanceType: props.instanceType,
      ami: props.ami,
      keyPairName: props.keyPairName,
      userData,
      rootVolumeSize: 50,
    });
    this.instance = host.instance;
    this.role = host.role;

    this.workloadBoundary = new iam.ManagedPolicy(this, 'WorkloadBoundary', {
      managedPolicyName: `${props.prefix}-workload-boundary`,
      description: 'Upper bound for the permissions of roles created by the Terraform pipeline',
      statements: [
        new iam.PolicyStatement({
          sid: 'WorkloadBasics',
          effect: iam.Effect.ALLOW,
          actions: [
            'ec2:Describe*',
            'cloudwatch:PutMetricData',
            'logs:CreateLogGroup',
            'logs:CreateLogStream',
            'logs:PutLogEvents',
            's3:GetObject',
            'ssm:UpdateInstanceInformation',
            'ssmmessages:*',
            'ec2messages:*',
          ],
          resources: ['*'],
        }),
      ],
    });

    this.grantTerraformAccess(props);
  }

  /**
   * State and lock access for the backend, plus what the pipeline needs to
   * provision networks, instances and their roles. IAM writes are limited
   * to names carrying the platform prefix, and roles can only be created or
   * given policies under the workload boundary.
   */
  private grantTerraformAccess(props: JenkinsServerProps): void {
    props.stateBucket.grantReadWrite(this.role, `${props.stateKey}*`);
    props.lockTable.grantReadWriteData(this.role);
    props.adminSecret.grantRead(this.role);

    this.role.addToPolicy(new iam.PolicyStatement({
      sid: 'ProvisionNetworkAndCompute',
      effect: iam.Effect.ALLOW,
      actions: ['ec2:*', 'elasticloadbalancing:Describe*', 'sts:GetCallerIdentity'],
      resources: ['*'],
    }));

    const stack = cdk.Stack.of(this);
    const prefixedRoles = [
      stack.formatArn({ service: 'iam', region: '', resource: 'role', resourceName: `${props.prefix}-*` }),
    ];

    // Roles created by the pipeline must carry the workload boundary
    this.role.addToPolicy(new iam.PolicyStatement({
      sid: 'ManageBoundedRoles',
      effect: iam.Effect.ALLOW,
      actions: [
        'iam:CreateRole',
        'iam:AttachRolePolicy',
        'iam:DetachRolePolicy',
        'iam:PutRolePolicy',
        'iam:DeleteRolePolicy',
        'iam:PutRolePermissionsBoundary',
      ],
      resources: prefixedRoles,
      conditions: {
        StringEquals: { 'iam:PermissionsBoundary': this.workloadBoundary.managedPolicyArn },
      },
    }));

    this.role.addToPolicy(new iam.PolicyStatement({
      sid: 'PassPrefixedRolesToEc2',
      effect: iam.Effect.ALLOW,
      actions: ['iam:PassRole'],
      resources: prefixedRoles,
      conditions: {
        StringEquals: { 'iam:PassedToService': 'ec2.amazonaws.com' },
      },
    }));

    this.role.addToPolicy(new iam.PolicyStatement({
      sid: 'ManagePrefixedRoles',
      effect: iam.Effect.ALLOW,
      actions: [
        'iam:DeleteRole',
        'iam:GetRole',
        'iam:TagRole',
        'iam:GetRolePolicy',
        'iam:ListRolePolicies',
        'iam:ListAttachedRolePolicies',
        'iam:ListInstanceProfilesForRole',
        'iam:CreateInstanceProfile',
        'iam:DeleteInstanceProfile',
        'iam:GetInstanceProfile',
        'iam:AddRoleToInstanceProfile',
        'iam:RemoveRoleFromInstanceProfile',
      ],
      resources: [
        ...prefixedRoles,
        stack.formatArn({ service: 'iam', region: '', resource: 'instance-profile', resourceName: `${props.prefix}-*` }),
      ],
    }));
  }
}
