import * as crypto from 'crypto';
import { ResponderError } from './errors.js';
import { formatIPv4, parseIPv4 } from './ipv4.js';

/**
 * Returns a uniformly distributed integer in [min, max)
 */
export type RandomSource = (min: number, max: number) => number;

const PREFIX_PATTERN = /^\d{1,2}$/;

export const defaultRandomSource: RandomSource = (min, max) => crypto.randomInt(min, max);

/**
 * An IPv4 CIDR block that hands out random host addresses.
 *
 * The network address (offset 0) and the top address of the block are never returned,
 * so a block needs at least three addresses.
 */
export class AddressPool {
  readonly base: number;
  readonly range: number;
  readonly prefixLength: number;
  private readonly random: RandomSource;

  private constructor(base: number, prefixLength: number, random: RandomSource) {
    this.base = base;
    this.prefixLength = prefixLength;
    this.range = 2 ** (32 - prefixLength);
    this.random = random;
  }

  /**
   * Build a pool from CIDR notation such as `192.168.0.0/16`.
   * Host bits in the address are masked off.
   *
   * @throws ResponderError `InvalidNetwork` when the string is not an IPv4 CIDR,
   *   `RangeTooSmall` for /31 and /32
   */
  static fromCIDR(cidr: string, random: RandomSource = defaultRandomSource): AddressPool {
    const trimmed = cidr.trim();
    const slash = trimmed.indexOf('/');
    if (slash === -1) {
      throw new ResponderError('InvalidNetwork', `Invalid network "${cidr}": missing prefix length`);
    }

    const address = parseIPv4(trimmed.slice(0, slash));
    const prefixRaw = trimmed.slice(slash + 1);
    if (address === null || !PREFIX_PATTERN.test(prefixRaw)) {
      throw new ResponderError('InvalidNetwork', `Invalid network "${cidr}"`);
    }

    const prefixLength = parseInt(prefixRaw, 10);
    if (prefixLength > 32) {
      throw new ResponderError('InvalidNetwork', `Invalid network "${cidr}": prefix length ${prefixLength} exceeds 32`);
    }

    const range = 2 ** (32 - prefixLength);
    if (range <= 2) {
      throw new ResponderError(
        'RangeTooSmall',
        `Network "${cidr}" has ${range} address${range === 1 ? '' : 'es'}, at least 3 are required`,
      );
    }

    // Prefix 0 leaves no network bits; the shift below would wrap to a full mask
    const mask = prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;
    return new AddressPool((address & mask) >>> 0, prefixLength, random);
  }

  get cidr(): string {
    return `${formatIPv4(this.base)}/${this.prefixLength}`;
  }

  get firstUsable(): string {
    return formatIPv4(this.base + 1);
  }

  get lastUsable(): string {
    return formatIPv4(this.base + this.range - 2);
  }

  sample(): string {
    const offset = this.random(1, this.range - 1);
    return formatIPv4(this.base + offset);
  }
}
