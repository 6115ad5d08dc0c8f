// Network helpers for the cidr rule

import { BlockList, isIP } from 'node:net';

type IpFamily = 'ipv4' | 'ipv6';

/**
 * A parsed CIDR block.
 */
export type CidrBlock = {
  family: IpFamily;
  contains(address: string): boolean;
};

function familyOf(address: string): IpFamily | undefined {
  const version = isIP(address);
  if (version === 4) return 'ipv4';
  if (version === 6) return 'ipv6';
  return undefined;
}

/**
 * Parse a CIDR block such as `10.0.0.0/8` or `2001:db8::/32`.
 * A bare address is treated as a single-host block.
 *
 * @returns The block, or undefined if the notation is invalid
 */
export function parseCidr(cidr: string): CidrBlock | undefined {
  const [address, prefixText, ...rest] = cidr.trim().split('/');
  if (address === undefined || rest.length > 0) return undefined;

  const family = familyOf(address);
  if (!family) return undefined;

  const maxPrefix = family === 'ipv4' ? 32 : 128;
  let prefix = maxPrefix;
  if (prefixText !== undefined) {
    if (!/^\d{1,3}$/.test(prefixText)) return undefined;
    prefix = Number(prefixText);
    if (prefix > maxPrefix) return undefined;
  }

  const blockList = new BlockList();
  blockList.addSubnet(address, prefix, family);

  return {
    family,
    contains(candidate: string): boolean {
      return familyOf(candidate) === family && blockList.check(candidate, family);
    },
  };
}
