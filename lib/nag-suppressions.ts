import * as cdk from 'aws-cdk-lib';
import { NagSuppressions } from 'cdk-nag';

/**
 * Accepted deviations from the AwsSolutions rule pack.
 */
export function applyNagSuppressions(backendStack: cdk.Stack, platformStack: cdk.Stack): void {
  NagSuppressions.addStackSuppressions(backendStack, [
    {
      id: 'AwsSolutions-SMG4',
      reason: 'Admin passwords are read at first boot; rotating them would need a restart hook on each host',
    },
    {
      id: 'AwsSolutions-IAM4',
      reason: 'The auto-delete-objects custom resource uses the AWS managed Lambda basic execution policy',
    },
    {
      id: 'AwsSolutions-S1',
      reason: 'The only bucket without access logging is the access log bucket itself',
    },
    {
      id: 'AwsSolutions-L1',
      reason: 'Runtime of the auto-delete-objects provider is managed by aws-cdk-lib',
    },
  ]);

  NagSuppressions.addStackSuppressions(platformStack, [
    {
      id: 'AwsSolutions-IAM4',
      reason: 'AmazonSSMManagedInstanceCore is the documented policy for Session Manager access',
    },
    {
      id: 'AwsSolutions-IAM5',
      reason: 'Terraform provisions arbitrary EC2 resources and CloudWatch read APIs have no resource-level permissions',
    },
    {
      id: 'AwsSolutions-EC23',
      reason: 'Web consoles are restricted to the admin CIDR, which is validated and must not be open in prod',
    },
    {
      id: 'AwsSolutions-SNS2',
      reason: 'Alarm notifications carry no sensitive data; a customer managed key adds cost without benefit here',
    },
    {
      id: 'AwsSolutions-EC29',
      reason: 'Hosts are rebuilt from user data; termination protection would block stack updates that replace them',
    },
  ]);
}
