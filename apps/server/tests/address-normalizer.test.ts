import { describe, it, expect } from 'vitest';
import {
  formatIPv6,
  ipv4ToBytes,
  ipv6ToBytes,
  normalizeIPv4Reverse,
  normalizeIPv6Reverse,
  normalizeReverseName,
  parseIPv6,
} from '../src/address-normalizer.js';
import { MalformedAddressError } from '../src/errors.js';

/** Nibble labels as they appear in front of ip6.arpa for a 32-digit hex address */
const nibbles = (hex: string) => hex.split('').reverse();

describe('Address Normalizer', () => {
  describe('IPv4 reverse names', () => {
    it('should reverse the octet labels', () => {
      expect(normalizeIPv4Reverse(['4', '3', '2', '1'])).toEqual({
        family: 'ipv4',
        address: '1.2.3.4',
        candidates: ['1.2.3.4'],
      });
    });

    it('should reject the wrong number of octets', () => {
      expect(() => normalizeIPv4Reverse(['3', '2', '1'])).toThrow(MalformedAddressError);
      expect(() => normalizeIPv4Reverse(['5', '4', '3', '2', '1'])).toThrow(MalformedAddressError);
    });

    it('should reject octets out of range or not numeric', () => {
      expect(() => normalizeIPv4Reverse(['256', '1', '1', '10'])).toThrow(MalformedAddressError);
      expect(() => normalizeIPv4Reverse(['x', '1', '1', '10'])).toThrow(MalformedAddressError);
    });

    it('should name the full reverse name in the error', () => {
      try {
        normalizeIPv4Reverse(['3', '2', '1']);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedAddressError);
        if (error instanceof MalformedAddressError) {
          expect(error.input).toBe('3.2.1.in-addr.arpa');
          expect(error.code).toBe('MALFORMED_ADDRESS');
        }
      }
    });
  });

  describe('IPv6 reverse names', () => {
    it('should rebuild a compressed address from nibbles', () => {
      const result = normalizeIPv6Reverse(nibbles('20010db8000000000000000000000001'));
      expect(result).toEqual({ family: 'ipv6', address: '2001:db8::1', candidates: ['2001:db8::1'] });
    });

    it('should accept upper-case nibbles', () => {
      const result = normalizeIPv6Reverse(nibbles('20010DB8000000000000000000000001'));
      expect(result.address).toBe('2001:db8::1');
    });

    it('should add the dotted quad for IPv4-mapped addresses', () => {
      const result = normalizeIPv6Reverse(nibbles('00000000000000000000ffff01020304'));
      expect(result).toEqual({
        family: 'ipv6',
        address: '::ffff:102:304',
        mappedIPv4: '1.2.3.4',
        candidates: ['::ffff:102:304', '1.2.3.4'],
      });
    });

    it('should reject the wrong number of nibbles', () => {
      expect(() => normalizeIPv6Reverse(nibbles('20010db800000000000000000000001'))).toThrow(MalformedAddressError);
    });

    it('should reject labels that are not single hex digits', () => {
      const labels = nibbles('20010db8000000000000000000000001');
      labels[0] = 'g';
      expect(() => normalizeIPv6Reverse(labels)).toThrow(MalformedAddressError);
      labels[0] = '10';
      expect(() => normalizeIPv6Reverse(labels)).toThrow(MalformedAddressError);
    });

    it('should dispatch on the address family', () => {
      expect(normalizeReverseName(['1', '0', '0', '127'], 'ipv4').address).toBe('127.0.0.1');
      expect(normalizeReverseName(nibbles('00000000000000000000000000000001'), 'ipv6').address).toBe('::1');
    });
  });

  describe('formatIPv6', () => {
    it('should collapse the longest zero run', () => {
      expect(formatIPv6([0x2001, 0xdb8, 0, 0, 1, 0, 0, 0])).toBe('2001:db8:0:0:1::');
    });

    it('should collapse the leftmost run on a tie', () => {
      expect(formatIPv6([1, 0, 0, 2, 0, 0, 3, 4])).toBe('1::2:0:0:3:4');
    });

    it('should not collapse a single zero group', () => {
      expect(formatIPv6([1, 0, 2, 3, 4, 5, 6, 7])).toBe('1:0:2:3:4:5:6:7');
    });

    it('should write the unspecified address as ::', () => {
      expect(formatIPv6([0, 0, 0, 0, 0, 0, 0, 0])).toBe('::');
    });

    it('should require eight groups', () => {
      expect(() => formatIPv6([1, 2, 3])).toThrow(RangeError);
    });
  });

  describe('parseIPv6', () => {
    it('should expand :: compression', () => {
      expect(parseIPv6('2001:db8::1')).toEqual([0x2001, 0xdb8, 0, 0, 0, 0, 0, 1]);
    });

    it('should read an embedded IPv4 tail', () => {
      expect(parseIPv6('::ffff:1.2.3.4')).toEqual([0, 0, 0, 0, 0, 0xffff, 0x102, 0x304]);
    });

    it('should drop a zone id', () => {
      expect(parseIPv6('fe80::1%eth0')).toEqual([0xfe80, 0, 0, 0, 0, 0, 0, 1]);
    });

    it('should return null for anything that is not IPv6', () => {
      expect(parseIPv6('1.2.3.4')).toBeNull();
      expect(parseIPv6('not-an-address')).toBeNull();
    });
  });

  describe('binary forms', () => {
    it('should encode IPv4 addresses as four bytes', () => {
      expect([...ipv4ToBytes('192.168.1.10')]).toEqual([192, 168, 1, 10]);
      expect(() => ipv4ToBytes('300.1.1.1')).toThrow(RangeError);
    });

    it('should encode IPv6 addresses as sixteen bytes', () => {
      const bytes = ipv6ToBytes('::1');
      expect(bytes.length).toBe(16);
      expect(bytes[15]).toBe(1);
      expect(bytes.subarray(0, 15).every((byte) => byte === 0)).toBe(true);
      expect(() => ipv6ToBytes('1.2.3.4')).toThrow(RangeError);
    });
  });
});
