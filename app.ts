#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { AwsSolutionsChecks } from 'cdk-nag';
import { resolvePlatformConfig, resourcePrefix } from './lib/config';
import { StateBackendStack } from './lib/state-backend-stack';
import { DevOpsPlatformStack } from './lib/devops-platform-stack';
import { applyNagSuppressions } from './lib/nag-suppressions';

/**
 * CDK Application entry point
 *
 * Configuration comes from cdk.json context, `-c key=value` overrides and
 * environment variables; see lib/config.ts for the accepted keys.
 */
const app = new cdk.App();

const config = resolvePlatformConfig(app.node);
const prefix = resourcePrefix(config);
const env = { account: config.account, region: config.region };

const backendStack = new StateBackendStack(app, `${prefix}-state-backend`, {
  config,
  env,
  description: `Terraform state backend for the ${config.environment} DevOps platform`,
  terminationProtection: config.environment === 'prod',
});

const platformStack = new DevOpsPlatformStack(app, `${prefix}-platform`, {
  config,
  env,
  description: `Jenkins, Prometheus, Grafana and Kibana hosts for the ${config.environment} DevOps platform`,
  backend: backendStack,
});
platformStack.addDependency(backendStack);

cdk.Tags.of(app).add('Application', 'devops-platform');
cdk.Tags.of(app).add('ManagedBy', 'aws-cdk');

applyNagSuppressions(backendStack, platformStack);
cdk.Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));

console.log(`Synthesizing ${prefix}`);
console.log(`   - Region: ${config.region}`);
console.log(`   - Admin CIDR: ${config.adminCidr}`);
console.log(`   - Logging host: ${config.enableLogging ? 'Enabled' : 'Disabled'}`);
console.log(`   - Seed pipeline: ${config.pipelineRepository ?? 'none'}`);

app.synth();
