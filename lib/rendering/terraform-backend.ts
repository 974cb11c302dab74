/**
 * Settings of the Terraform S3 backend provisioned by StateBackendStack.
 */
export interface TerraformBackendSettings {
  readonly bucket: string;
  readonly key: string;
  readonly region: string;
  readonly lockTable: string;
  readonly encrypt?: boolean;
}

function hclValue(value: string | boolean): string {
  return typeof value === 'boolean' ? String(value) : JSON.stringify(value);
}

function attributes(settings: TerraformBackendSettings): [string, string][] {
  return [
    ['bucket', hclValue(settings.bucket)],
    ['key', hclValue(settings.key)],
    ['region', hclValue(settings.region)],
    ['dynamodb_table', hclValue(settings.lockTable)],
    ['encrypt', hclValue(settings.encrypt ?? true)],
  ];
}

function align(pairs: [string, string][], pad: string): string[] {
  const width = Math.max(...pairs.map(([key]) => key.length));
  return pairs.map(([key, value]) => `${pad}${key.padEnd(width)} = ${value}`);
}

/**
 * Partial backend configuration passed to `terraform init -backend-config=`.
 */
export function renderBackendConfig(settings: TerraformBackendSettings): string {
  return `${align(attributes(settings), '').join('\n')}\n`;
}

/**
 * Full `terraform { backend "s3" { ... } }` block for a main.tf.
 */
export function renderBackendBlock(settings: TerraformBackendSettings): string {
  return [
    'terraform {',
    '  backend "s3" {',
    ...align(attributes(settings), '    '),
    '  }',
    '}',
    '',
  ].join('\n');
}
