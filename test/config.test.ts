import {
  ENVIRONMENT_PRESETS,
  OPEN_CIDR,
  cidrPrefixLength,
  resolvePlatformConfig,
  resourcePrefix,
} from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { fakeContext } from './fixtures';

function captureConfigurationError(resolve: () => unknown): ConfigurationError {
  try {
    resolve();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolvePlatformConfig', () => {
  test('applies dev defaults when nothing is set', () => {
    const config = resolvePlatformConfig(fakeContext({}), {});

    expect(config).toEqual({
      projectName: 'devops-platform',
      environment: 'dev',
      account: undefined,
      region: 'us-east-1',
      vpcCidr: '10.0.0.0/16',
      adminCidr: OPEN_CIDR,
      keyPairName: undefined,
      amiId: undefined,
      instanceTypes: { jenkins: 't3.medium', monitoring: 't3.small', logging: 't3.large' },
      enableLogging: true,
      retainData: false,
      alertEmail: undefined,
      pipelineRepository: undefined,
      pipelineBranch: 'main',
      scrapeIntervalSeconds: 15,
      stateKey: 'devops-platform/dev/terraform.tfstate',
      toolVersions: {
        terraform: '1.8.5',
        prometheus: '2.53.0',
        nodeExporter: '1.8.1',
        cloudwatchExporter: '0.15.5',
        elastic: '8.x',
      },
    });
  });

  test('reads account and region from the CDK environment variables', () => {
    const config = resolvePlatformConfig(fakeContext({}), {
      CDK_DEFAULT_ACCOUNT: '123456789012',
      CDK_DEFAULT_REGION: 'eu-west-1',
    });

    expect(config.account).toBe('123456789012');
    expect(config.region).toBe('eu-west-1');
  });

  test('context takes precedence over environment variables', () => {
    const config = resolvePlatformConfig(fakeContext({ environment: 'staging' }), { ENVIRONMENT: 'prod' });

    expect(config.environment).toBe('staging');
    expect(config.instanceTypes).toEqual(ENVIRONMENT_PRESETS.staging.instanceTypes);
  });

  test('prod retains data and uses larger hosts', () => {
    const config = resolvePlatformConfig(fakeContext({ environment: 'prod', adminCidr: '203.0.113.0/24' }), {});

    expect(config.retainData).toBe(true);
    expect(config.instanceTypes.jenkins).toBe('t3.large');
    expect(config.stateKey).toBe('devops-platform/prod/terraform.tfstate');
  });

  test('explicit instance types override the preset', () => {
    const config = resolvePlatformConfig(fakeContext({ jenkinsInstanceType: 'm5.xlarge' }), {});

    expect(config.instanceTypes).toEqual({ jenkins: 'm5.xlarge', monitoring: 't3.small', logging: 't3.large' });
  });

  test('parses booleans and integers passed as strings', () => {
    const config = resolvePlatformConfig(
      fakeContext({ enableLogging: 'false', retainData: 'true', scrapeIntervalSeconds: '30' }),
      {},
    );

    expect(config.enableLogging).toBe(false);
    expect(config.retainData).toBe(true);
    expect(config.scrapeIntervalSeconds).toBe(30);
  });

  test.each(['0x1e', '1e1', ' 15 ', '15.0'])('rejects %p as an integer', value => {
    const error = captureConfigurationError(() =>
      resolvePlatformConfig(fakeContext({ scrapeIntervalSeconds: value }), {}),
    );

    expect(error.problems).toEqual([`scrapeIntervalSeconds must be an integer, got '${value}'`]);
  });

  test('accepts VPCs from /16 down to /24', () => {
    expect(resolvePlatformConfig(fakeContext({ vpcCidr: '10.0.0.0/23' }), {}).vpcCidr).toBe('10.0.0.0/23');
    expect(resolvePlatformConfig(fakeContext({ vpcCidr: '10.0.0.0/24' }), {}).vpcCidr).toBe('10.0.0.0/24');

    const error = captureConfigurationError(() => resolvePlatformConfig(fakeContext({ vpcCidr: '10.0.0.0/25' }), {}));
    expect(error.problems).toEqual(["vpcCidr '10.0.0.0/25' must have a prefix length between /16 and /24"]);
  });

  test('rejects an open admin CIDR in prod', () => {
    const error = captureConfigurationError(() => resolvePlatformConfig(fakeContext({ environment: 'prod' }), {}));

    expect(error.problems).toEqual([
      'adminCidr must be restricted in prod; 0.0.0.0/0 exposes Jenkins and Grafana to the internet',
    ]);
  });

  test('rejects an unknown environment', () => {
    const error = captureConfigurationError(() => resolvePlatformConfig(fakeContext({ environment: 'qa' }), {}));

    expect(error.problems).toEqual(['environment must be one of: dev, staging, prod']);
  });

  test('reports every problem at once', () => {
    const error = captureConfigurationError(() =>
      resolvePlatformConfig(fakeContext({ vpcCidr: '10.0.0.0/8', alertEmail: 'not-an-email' }), {}),
    );

    expect(error.problems).toEqual([
      "vpcCidr '10.0.0.0/8' must have a prefix length between /16 and /24",
      'alertEmail must be a valid email address',
    ]);
    expect(error.message).toBe(
      'Invalid platform configuration:\n' +
        "  - vpcCidr '10.0.0.0/8' must have a prefix length between /16 and /24\n" +
        '  - alertEmail must be a valid email address',
    );
  });

  test('rejects malformed values', () => {
    const error = captureConfigurationError(() =>
      resolvePlatformConfig(
        fakeContext({
          projectName: 'Platform',
          adminCidr: '10.0.0.300/32',
          amiId: 'ubuntu',
          enableLogging: 'maybe',
          pipelineRepository: 'ftp://example.com/infra.git',
        }),
        { CDK_DEFAULT_ACCOUNT: '1234' },
      ),
    );

    expect(error.problems).toEqual([
      "projectName 'Platform' must be 3-31 lowercase letters, digits or hyphens, starting with a letter",
      'AWS account ID must be 12 digits',
      "adminCidr '10.0.0.300/32' is not a valid IPv4 CIDR block",
      "amiId 'ubuntu' is not a valid AMI identifier",
      "pipelineRepository 'ftp://example.com/infra.git' must be an https:// or git@ URL",
      "enableLogging must be true or false, got 'maybe'",
    ]);
  });

  test('bounds the scrape interval', () => {
    const error = captureConfigurationError(() =>
      resolvePlatformConfig(fakeContext({ scrapeIntervalSeconds: 2 }), {}),
    );

    expect(error.problems).toEqual(['scrapeIntervalSeconds must be between 5 and 300']);
  });
});

describe('cidrPrefixLength', () => {
  test.each([
    ['10.0.0.0/16', 16],
    ['203.0.113.7/32', 32],
    ['0.0.0.0/0', 0],
  ])('returns the prefix of %s', (cidr, prefix) => {
    expect(cidrPrefixLength(cidr)).toBe(prefix);
  });

  test.each(['256.0.0.0/16', '10.0.0.0/33', '10.0.0.0', 'example'])('rejects %s', cidr => {
    expect(cidrPrefixLength(cidr)).toBeUndefined();
  });
});

test('resourcePrefix joins project and environment', () => {
  expect(resourcePrefix({ projectName: 'delivery', environment: 'staging' })).toBe('delivery-staging');
});
