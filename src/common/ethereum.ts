import { BadRequestException } from '@nestjs/common';
import { getAddress, isAddress } from 'ethers';

/**
 * Checksum form of an EVM address. Every address stored by the service goes through here
 * so that comparisons are plain string equality.
 */
export function normalizeAddress(value: string): string {
  if (!isAddress(value)) {
    throw new BadRequestException(`Invalid address: ${value}`);
  }
  return getAddress(value);
}

export function sameAddress(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Parse a decimal unsigned integer such as a wei amount or a request id. These cross the
 * API as strings because JSON has no bigint.
 */
export function parseUint(value: string, field: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new BadRequestException(`${field} must be an unsigned decimal integer`);
  }
  return BigInt(value);
}
