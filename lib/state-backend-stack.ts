/**
 * Terraform State Backend Stack
 *
 * Bootstrap resources the Jenkins pipeline's Terraform runs depend on,
 * deployed before the platform itself:
 * - Versioned, encrypted S3 bucket holding the state files
 * - DynamoDB table used by the S3 backend for state locking
 * - Generated admin passwords for Jenkins and Grafana in Secrets Manager
 */

import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { PlatformConfig, resourcePrefix } from './config';
import { renderBackendBlock } from './rendering/terraform-backend';

export interface StateBackendStackProps extends cdk.StackProps {
  readonly config: PlatformConfig;
}

export class StateBackendStack extends cdk.Stack {
  public readonly stateBucket: s3.Bucket;
  public readonly lockTable: dynamodb.Table;
  public readonly jenkinsAdminSecret: secretsmanager.Secret;
  public readonly grafanaAdminSecret: secretsmanager.Secret;

  constructor(scope: Construct, id: string, props: StateBackendStackProps) {
    super(scope, id, props);

    const { config } = props;
    const prefix = resourcePrefix(config);
    const removalPolicy = config.retainData ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY;

    const accessLogsBucket = new s3.Bucket(this, 'AccessLogsBucket', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      objectOwnership: s3.ObjectOwnership.BUCKET_OWNER_PREFERRED,
      lifecycleRules: [{ id: 'ExpireAccessLogs', expiration: cdk.Duration.days(90) }],
      removalPolicy,
      autoDeleteObjects: !config.retainData,
    });

    this.stateBucket = new s3.Bucket(this, 'StateBucket', {
      versioned: true,
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      serverAccessLogsBucket: accessLogsBucket,
      serverAccessLogsPrefix: 'state-bucket/',
      lifecycleRules: [
        {
          id: 'ExpireOldStateVersions',
          noncurrentVersionExpiration: cdk.Duration.days(90),
          noncurrentVersionsToRetain: 10,
        },
      ],
      removalPolicy,
      autoDeleteObjects: !config.retainData,
    });

    // Key name and type are fixed by Terraform's S3 backend
    this.lockTable = new dynamodb.Table(this, 'LockTable', {
      tableName: `${prefix}-terraform-locks`,
      partitionKey: { name: 'LockID', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecovery: true,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      removalPolicy,
    });

    this.jenkinsAdminSecret = this.createAdminSecret('JenkinsAdminSecret', `${prefix}/jenkins/admin-password`, 'Jenkins admin password', removalPolicy);
    this.grafanaAdminSecret = this.createAdminSecret('GrafanaAdminSecret', `${prefix}/grafana/admin-password`, 'Grafana admin password', removalPolicy);

    cdk.Tags.of(this).add('Project', config.projectName);
    cdk.Tags.of(this).add('Environment', config.environment);
    cdk.Tags.of(this).add('Component', 'terraform-state');

    this.createOutputs(config, prefix);
  }

  private createAdminSecret(id: string, secretName: string, description: string, removalPolicy: cdk.RemovalPolicy): secretsmanager.Secret {
    const secret = new secretsmanager.Secret(this, id, {
      secretName,
      description,
      generateSecretString: {
        passwordLength: 32,
        excludePunctuation: true,
      },
    });
    secret.applyRemovalPolicy(removalPolicy);
    return secret;
  }

  private createOutputs(config: PlatformConfig, prefix: string): void {
    new cdk.CfnOutput(this, 'StateBucketName', {
      value: this.stateBucket.bucketName,
      description: 'S3 bucket holding Terraform state',
      exportName: `${prefix}-state-bucket`,
    });

    new cdk.CfnOutput(this, 'LockTableName', {
      value: this.lockTable.tableName,
      description: 'DynamoDB table used for Terraform state locking',
      exportName: `${prefix}-lock-table`,
    });

    new cdk.CfnOutput(this, 'TerraformBackendBlock', {
      value: renderBackendBlock({
        bucket: this.stateBucket.bucketName,
        key: config.stateKey,
        region: config.region,
        lockTable: this.lockTable.tableName,
      }),
      description: 'Backend block to paste into main.tf',
    });

    new cdk.CfnOutput(this, 'JenkinsAdminSecretArn', {
      value: this.jenkinsAdminSecret.secretArn,
      description: 'Secrets Manager secret with the Jenkins admin password',
    });

    new cdk.CfnOutput(this, 'GrafanaAdminSecretArn', {
      value: this.grafanaAdminSecret.secretArn,
      description: 'Secrets Manager secret with the Grafana admin password',
    });
  }
}
