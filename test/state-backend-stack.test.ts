import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { StateBackendStack } from '../lib/state-backend-stack';
import { testConfig } from './fixtures';

describe('StateBackendStack', () => {
  let template: Template;

  beforeEach(() => {
    const app = new cdk.App();
    const stack = new StateBackendStack(app, 'TestStateBackend', { config: testConfig() });
    template = Template.fromStack(stack);
  });

  test('creates a versioned, encrypted, private state bucket', () => {
    template.hasResourceProperties('AWS::S3::Bucket', {
      VersioningConfiguration: { Status: 'Enabled' },
      BucketEncryption: {
        ServerSideEncryptionConfiguration: [
          { ServerSideEncryptionByDefault: { SSEAlgorithm: 'AES256' } },
        ],
      },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
      LoggingConfiguration: Match.objectLike({ LogFilePrefix: 'state-bucket/' }),
    });
  });

  test('creates the state and access log buckets only', () => {
    template.resourceCountIs('AWS::S3::Bucket', 2);
  });

  test('creates the lock table with the key the S3 backend expects', () => {
    template.hasResourceProperties('AWS::DynamoDB::Table', {
      TableName: 'devops-platform-dev-terraform-locks',
      KeySchema: [{ AttributeName: 'LockID', KeyType: 'HASH' }],
      AttributeDefinitions: [{ AttributeName: 'LockID', AttributeType: 'S' }],
      BillingMode: 'PAY_PER_REQUEST',
      PointInTimeRecoverySpecification: { PointInTimeRecoveryEnabled: true },
    });
  });

  test('generates admin passwords for Jenkins and Grafana', () => {
    template.resourceCountIs('AWS::SecretsManager::Secret', 2);
    template.hasResourceProperties('AWS::SecretsManager::Secret', {
      Name: 'devops-platform-dev/jenkins/admin-password',
      GenerateSecretString: { PasswordLength: 32, ExcludePunctuation: true },
    });
    template.hasResourceProperties('AWS::SecretsManager::Secret', {
      Name: 'devops-platform-dev/grafana/admin-password',
    });
  });

  test('destroys data outside prod', () => {
    template.hasResource('AWS::DynamoDB::Table', { DeletionPolicy: 'Delete' });
    template.hasResource('AWS::SecretsManager::Secret', { DeletionPolicy: 'Delete' });
  });

  test('publishes the backend settings', () => {
    template.hasOutput('StateBucketName', { Export: { Name: 'devops-platform-dev-state-bucket' } });
    template.hasOutput('LockTableName', { Export: { Name: 'devops-platform-dev-lock-table' } });
    template.hasOutput('TerraformBackendBlock', {});
    template.hasOutput('JenkinsAdminSecretArn', {});
    template.hasOutput('GrafanaAdminSecretArn', {});
  });
});

describe('StateBackendStack in prod', () => {
  test('retains state, locks and secrets', () => {
    const app = new cdk.App();
    const stack = new StateBackendStack(app, 'ProdStateBackend', {
      config: testConfig({ environment: 'prod', adminCidr: '203.0.113.0/24' }),
    });
    const template = Template.fromStack(stack);

    template.hasResource('AWS::DynamoDB::Table', { DeletionPolicy: 'Retain' });
    template.hasResource('AWS::S3::Bucket', { DeletionPolicy: 'Retain' });
    template.hasResource('AWS::SecretsManager::Secret', { DeletionPolicy: 'Retain' });
    template.resourceCountIs('Custom::S3AutoDeleteObjects', 0);
  });
});
