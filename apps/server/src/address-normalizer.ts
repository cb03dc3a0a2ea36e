import net from 'net';
import { MalformedAddressError } from './errors.js';

export type AddressFamily = 'ipv4' | 'ipv6';

export const REVERSE_ZONES: Record<AddressFamily, string> = {
  ipv4: 'in-addr.arpa',
  ipv6: 'ip6.arpa',
};

/**
 * Result of normalizing a reverse-lookup name. `candidates` lists every textual
 * form the record store may index the host under, canonical form first.
 */
export interface ReverseAddress {
  family: AddressFamily;
  address: string;
  mappedIPv4?: string;
  candidates: string[];
}

const IPV4_LABEL_COUNT = 4;
const IPV6_NIBBLE_COUNT = 32;
const HEX_NIBBLE = /^[0-9a-f]$/i;

function reverseName(labels: readonly string[], family: AddressFamily): string {
  return [...labels, REVERSE_ZONES[family]].join('.');
}

/**
 * `4.3.2.1` (the labels in front of `in-addr.arpa`) becomes `1.2.3.4`.
 */
export function normalizeIPv4Reverse(labels: readonly string[]): ReverseAddress {
  if (labels.length !== IPV4_LABEL_COUNT) {
    throw new MalformedAddressError(
      reverseName(labels, 'ipv4'),
      `expected ${IPV4_LABEL_COUNT} octets, got ${labels.length}`,
    );
  }

  const address = [...labels].reverse().join('.');
  if (!net.isIPv4(address)) {
    throw new MalformedAddressError(reverseName(labels, 'ipv4'), `"${address}" is not a dotted-quad address`);
  }

  return { family: 'ipv4', address, candidates: [address] };
}

/**
 * Reassembles the 32 nibble labels in front of `ip6.arpa` into an address. When
 * the address is IPv4-mapped (`::ffff:0:0/96`) the embedded dotted quad is
 * returned as a second candidate.
 */
export function normalizeIPv6Reverse(labels: readonly string[]): ReverseAddress {
  if (labels.length !== IPV6_NIBBLE_COUNT) {
    throw new MalformedAddressError(
      reverseName(labels, 'ipv6'),
      `expected ${IPV6_NIBBLE_COUNT} nibbles, got ${labels.length}`,
    );
  }

  const bad = labels.find((label) => !HEX_NIBBLE.test(label));
  if (bad !== undefined) {
    throw new MalformedAddressError(reverseName(labels, 'ipv6'), `"${bad}" is not a hex nibble`);
  }

  const nibbles = [...labels].reverse().join('').toLowerCase();
  const groups: number[] = [];
  for (let i = 0; i < IPV6_NIBBLE_COUNT; i += 4) {
    groups.push(parseInt(nibbles.slice(i, i + 4), 16));
  }

  const address = formatIPv6(groups);
  const mappedIPv4 = mappedIPv4FromGroups(groups);
  if (mappedIPv4) {
    return { family: 'ipv6', address, mappedIPv4, candidates: [address, mappedIPv4] };
  }
  return { family: 'ipv6', address, candidates: [address] };
}

export function normalizeReverseName(labels: readonly string[], family: AddressFamily): ReverseAddress {
  return family === 'ipv4' ? normalizeIPv4Reverse(labels) : normalizeIPv6Reverse(labels);
}

/**
 * RFC 5952 text form: lower-case hex, no leading zeros, the longest run of two or
 * more zero groups (leftmost on a tie) collapsed to `::`.
 */
export function formatIPv6(groups: readonly number[]): string {
  if (groups.length !== 8) {
    throw new RangeError(`IPv6 address needs 8 groups, got ${groups.length}`);
  }

  let bestStart = -1;
  let bestLength = 0;
  let runStart = -1;
  for (let i = 0; i <= groups.length; i++) {
    if (i < groups.length && groups[i] === 0) {
      if (runStart === -1) runStart = i;
      continue;
    }
    if (runStart !== -1) {
      const runLength = i - runStart;
      if (runLength > bestLength) {
        bestStart = runStart;
        bestLength = runLength;
      }
      runStart = -1;
    }
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }
  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}

/**
 * Parses any RFC 4291 text form (`::` compression, embedded IPv4 tail, zone id)
 * into eight 16-bit groups. Returns null for anything that is not IPv6.
 */
export function parseIPv6(text: string): number[] | null {
  const withoutZone = text.split('%')[0];
  if (!net.isIPv6(withoutZone)) {
    return null;
  }

  let normalized = withoutZone;
  const lastColon = normalized.lastIndexOf(':');
  const tail = normalized.slice(lastColon + 1);
  if (tail.includes('.')) {
    const octets = parseIPv4(tail);
    if (!octets) return null;
    const high = ((octets[0] << 8) | octets[1]).toString(16);
    const low = ((octets[2] << 8) | octets[3]).toString(16);
    normalized = `${normalized.slice(0, lastColon + 1)}${high}:${low}`;
  }

  const halves = normalized.split('::');
  if (halves.length > 2) return null;

  const toGroups = (part: string) => (part === '' ? [] : part.split(':').map((group) => parseInt(group, 16)));
  const left = toGroups(halves[0]);
  if (halves.length === 1) {
    return left.length === 8 ? left : null;
  }

  const right = toGroups(halves[1]);
  const missing = 8 - left.length - right.length;
  if (missing < 1) return null;
  return [...left, ...new Array<number>(missing).fill(0), ...right];
}

export function parseIPv4(text: string): number[] | null {
  if (!net.isIPv4(text)) return null;
  return text.split('.').map((octet) => parseInt(octet, 10));
}

function mappedIPv4FromGroups(groups: readonly number[]): string | null {
  const prefixIsZero = groups.slice(0, 5).every((group) => group === 0);
  if (!prefixIsZero || groups[5] !== 0xffff) {
    return null;
  }
  return [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff].join('.');
}

export function ipv4ToBytes(ip: string): Buffer {
  const octets = parseIPv4(ip);
  if (!octets) {
    throw new RangeError(`Not an IPv4 address: ${ip}`);
  }
  return Buffer.from(octets);
}

export function ipv6ToBytes(ip: string): Buffer {
  const groups = parseIPv6(ip);
  if (!groups) {
    throw new RangeError(`Not an IPv6 address: ${ip}`);
  }
  const bytes = Buffer.alloc(16);
  groups.forEach((group, index) => bytes.writeUInt16BE(group, index * 2));
  return bytes;
}
