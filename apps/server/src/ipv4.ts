// Decimal octets without leading zeros
const OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/;

/**
 * Parse a dotted-quad IPv4 address into an unsigned 32-bit number.
 * Returns null for anything that is not four decimal octets in 0-255.
 */
export function parseIPv4(ip: string): number | null {
  const parts = ip.split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!OCTET_PATTERN.test(part)) return null;
    const octet = parseInt(part, 10);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIPv4(value: number): string {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join('.');
}
