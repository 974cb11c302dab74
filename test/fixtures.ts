import { ContextReader, PlatformConfig, resolvePlatformConfig } from '../lib/config';

export function fakeContext(values: Record<string, unknown>): ContextReader {
  return { tryGetContext: (key: string) => values[key] };
}

/**
 * Resolves a configuration the way app.ts does, without reading the
 * process environment.
 */
export function testConfig(values: Record<string, unknown> = {}): PlatformConfig {
  return resolvePlatformConfig(fakeContext({ region: 'us-east-1', ...values }), {});
}
