import { publicSubnetMask } from '../lib/constructs/platform-network';

describe('publicSubnetMask', () => {
  test('uses /24 subnets while the VPC has room', () => {
    expect(publicSubnetMask('10.0.0.0/16', 2)).toBe(24);
    expect(publicSubnetMask('10.0.0.0/23', 2)).toBe(24);
  });

  test('splits a small VPC across the AZs', () => {
    expect(publicSubnetMask('10.0.0.0/24', 2)).toBe(25);
    expect(publicSubnetMask('10.0.0.0/24', 3)).toBe(26);
  });

  test('rejects an invalid CIDR', () => {
    expect(() => publicSubnetMask('10.0.0.0', 2)).toThrow("vpcCidr '10.0.0.0' is not a valid IPv4 CIDR block");
  });
});
