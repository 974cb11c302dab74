import { ConfigurationError } from './errors';

export type EnvironmentName = 'dev' | 'staging' | 'prod';

export const ENVIRONMENTS: readonly EnvironmentName[] = ['dev', 'staging', 'prod'];

export interface InstanceTypes {
  readonly jenkins: string;
  readonly monitoring: string;
  readonly logging: string;
}

export interface ToolVersions {
  readonly terraform: string;
  readonly prometheus: string;
  readonly nodeExporter: string;
  readonly cloudwatchExporter: string;
  /** Major release line of the Elastic yum repository */
  readonly elastic: string;
}

/**
 * Fully resolved configuration shared by every stack of the platform.
 */
export interface PlatformConfig {
  readonly projectName: string;
  readonly environment: EnvironmentName;
  readonly account?: string;
  readonly region: string;
  readonly vpcCidr: string;
  /** CIDR allowed to reach SSH and the web consoles */
  readonly adminCidr: string;
  readonly keyPairName?: string;
  /** Pinned AMI; the latest Amazon Linux 2023 image is used when absent */
  readonly amiId?: string;
  readonly instanceTypes: InstanceTypes;
  readonly enableLogging: boolean;
  readonly retainData: boolean;
  readonly alertEmail?: string;
  /** Git repository holding the Terraform code the seed pipeline deploys */
  readonly pipelineRepository?: string;
  readonly pipelineBranch: string;
  readonly scrapeIntervalSeconds: number;
  /** Object key of the Terraform state file inside the state bucket */
  readonly stateKey: string;
  readonly toolVersions: ToolVersions;
}

interface EnvironmentPreset {
  readonly instanceTypes: InstanceTypes;
  readonly retainData: boolean;
}

export const ENVIRONMENT_PRESETS: Record<EnvironmentName, EnvironmentPreset> = {
  dev: {
    instanceTypes: { jenkins: 't3.medium', monitoring: 't3.small', logging: 't3.large' },
    retainData: false,
  },
  staging: {
    instanceTypes: { jenkins: 't3.medium', monitoring: 't3.medium', logging: 't3.large' },
    retainData: false,
  },
  prod: {
    instanceTypes: { jenkins: 't3.large', monitoring: 't3.medium', logging: 'm5.large' },
    retainData: true,
  },
};

export const DEFAULT_TOOL_VERSIONS: ToolVersions = {
  terraform: '1.8.5',
  prometheus: '2.53.0',
  nodeExporter: '1.8.1',
  cloudwatchExporter: '0.15.5',
  elastic: '8.x',
};

export const OPEN_CIDR = '0.0.0.0/0';

/**
 * Anything exposing CDK-style context lookups; `app.node` satisfies it.
 */
export interface ContextReader {
  tryGetContext(key: string): unknown;
}

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PROJECT_NAME_PATTERN = /^[a-z][a-z0-9-]{2,30}$/;
const INSTANCE_TYPE_PATTERN = /^[a-z][a-z0-9-]*\.[a-z0-9]+$/;
const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Returns the prefix length of a valid IPv4 CIDR, or undefined.
 */
export function cidrPrefixLength(value: string): number | undefined {
  const match = CIDR_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  if (octets.some(octet => octet > 255) || prefix > 32) {
    return undefined;
  }
  return prefix;
}

export function parseBoolean(value: unknown, key: string, fallback: boolean, problems: string[]): boolean {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  problems.push(`${key} must be true or false, got '${String(value)}'`);
  return fallback;
}

export function parseInteger(value: unknown, key: string, fallback: number, problems: string[]): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  const numeric = typeof value === 'number' || INTEGER_PATTERN.test(String(value));
  if (!numeric || !Number.isInteger(parsed)) {
    problems.push(`${key} must be an integer, got '${String(value)}'`);
    return fallback;
  }
  return parsed;
}

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = String(value).trim();
  return text === '' ? undefined : text;
}

function isEnvironmentName(value: string): value is EnvironmentName {
  return ENVIRONMENTS.some(name => name === value);
}

/**
 * Resolves the platform configuration from CDK context and environment
 * variables. Context wins over environment variables, which win over the
 * preset of the selected environment.
 */
export function resolvePlatformConfig(context: ContextReader, env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  const problems: string[] = [];

  const lookup = (contextKey: string, envKey?: string): string | undefined =>
    optionalString(context.tryGetContext(contextKey)) ?? (envKey ? optionalString(env[envKey]) : undefined);

  const projectName = lookup('projectName', 'PROJECT_NAME') ?? 'devops-platform';
  if (!PROJECT_NAME_PATTERN.test(projectName)) {
    problems.push(`projectName '${projectName}' must be 3-31 lowercase letters, digits or hyphens, starting with a letter`);
  }

  const requestedEnvironment = lookup('environment', 'ENVIRONMENT') ?? 'dev';
  let environment: EnvironmentName = 'dev';
  if (isEnvironmentName(requestedEnvironment)) {
    environment = requestedEnvironment;
  } else {
    problems.push(`environment must be one of: ${ENVIRONMENTS.join(', ')}`);
  }
  const preset = ENVIRONMENT_PRESETS[environment];

  const account = lookup('account', 'CDK_DEFAULT_ACCOUNT');
  if (account !== undefined && !/^\d{12}$/.test(account)) {
    problems.push('AWS account ID must be 12 digits');
  }

  const region = lookup('region', 'CDK_DEFAULT_REGION') ?? 'us-east-1';

  const vpcCidr = lookup('vpcCidr') ?? '10.0.0.0/16';
  const vpcPrefix = cidrPrefixLength(vpcCidr);
  if (vpcPrefix === undefined) {
    problems.push(`vpcCidr '${vpcCidr}' is not a valid IPv4 CIDR block`);
  } else if (vpcPrefix < 16 || vpcPrefix > 24) {
    problems.push(`vpcCidr '${vpcCidr}' must have a prefix length between /16 and /24`);
  }

  const adminCidr = lookup('adminCidr', 'ADMIN_CIDR') ?? OPEN_CIDR;
  if (cidrPrefixLength(adminCidr) === undefined) {
    problems.push(`adminCidr '${adminCidr}' is not a valid IPv4 CIDR block`);
  } else if (environment === 'prod' && adminCidr === OPEN_CIDR) {
    problems.push('adminCidr must be restricted in prod; 0.0.0.0/0 exposes Jenkins and Grafana to the internet');
  }

  const amiId = lookup('amiId', 'AMI_ID');
  if (amiId !== undefined && !/^ami-[0-9a-f]{8,17}$/.test(amiId)) {
    problems.push(`amiId '${amiId}' is not a valid AMI identifier`);
  }

  const alertEmail = lookup('alertEmail', 'ALERT_EMAIL');
  if (alertEmail !== undefined && !EMAIL_PATTERN.test(alertEmail)) {
    problems.push('alertEmail must be a valid email address');
  }

  const pipelineRepository = lookup('pipelineRepository', 'PIPELINE_REPOSITORY');
  if (pipelineRepository !== undefined && !/^(https:\/\/|git@)\S+$/.test(pipelineRepository)) {
    problems.push(`pipelineRepository '${pipelineRepository}' must be an https:// or git@ URL`);
  }

  const instanceTypes: InstanceTypes = {
    jenkins: lookup('jenkinsInstanceType') ?? preset.instanceTypes.jenkins,
    monitoring: lookup('monitoringInstanceType') ?? preset.instanceTypes.monitoring,
    logging: lookup('loggingInstanceType') ?? preset.instanceTypes.logging,
  };
  for (const [role, instanceType] of Object.entries(instanceTypes)) {
    if (!INSTANCE_TYPE_PATTERN.test(instanceType)) {
      problems.push(`${role} instance type '${instanceType}' is not a valid EC2 instance type`);
    }
  }

  const scrapeIntervalSeconds = parseInteger(context.tryGetContext('scrapeIntervalSeconds'), 'scrapeIntervalSeconds', 15, problems);
  if (scrapeIntervalSeconds < 5 || scrapeIntervalSeconds > 300) {
    problems.push('scrapeIntervalSeconds must be between 5 and 300');
  }

  const config: PlatformConfig = {
    projectName,
    environment,
    account,
    region,
    vpcCidr,
    adminCidr,
    keyPairName: lookup('keyPairName', 'KEY_PAIR_NAME'),
    amiId,
    instanceTypes,
    enableLogging: parseBoolean(context.tryGetContext('enableLogging'), 'enableLogging', true, problems),
    retainData: parseBoolean(context.tryGetContext('retainData'), 'retainData', preset.retainData, problems),
    alertEmail,
    pipelineRepository,
    pipelineBranch: lookup('pipelineBranch', 'PIPELINE_BRANCH') ?? 'main',
    scrapeIntervalSeconds,
    stateKey: lookup('stateKey') ?? `${projectName}/${environment}/terraform.tfstate`,
    toolVersions: DEFAULT_TOOL_VERSIONS,
  };

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Prefix used for physical resource names: `<project>-<environment>`.
 */
export function resourcePrefix(config: Pick<PlatformConfig, 'projectName' | 'environment'>): string {
  return `${config.projectName}-${config.environment}`;
}
