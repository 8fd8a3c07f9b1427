/**
 * Unit Tests for IP version selection
 */
import { describe, it, expect } from 'vitest';
import {
  Version,
  addressFamily,
  matchesVersion,
  parseAddress,
  parseVersion,
} from '@ipscout/core';

describe('Version', () => {
  // ---------------------------------------------------------------------------
  // matchesVersion
  // ---------------------------------------------------------------------------
  describe('matchesVersion', () => {
    it('V4 accepts only IPv4 addresses', () => {
      expect(matchesVersion(Version.V4, '203.0.113.5')).toBe(true);
      expect(matchesVersion(Version.V4, '2001:db8::1')).toBe(false);
    });

    it('V6 accepts only IPv6 addresses', () => {
      expect(matchesVersion(Version.V6, '2001:db8::1')).toBe(true);
      expect(matchesVersion(Version.V6, '203.0.113.5')).toBe(false);
    });

    it('Any accepts both families', () => {
      expect(matchesVersion(Version.Any, '203.0.113.5')).toBe(true);
      expect(matchesVersion(Version.Any, '2001:db8::1')).toBe(true);
    });

    it('rejects strings that are not addresses, even for Any', () => {
      expect(matchesVersion(Version.Any, 'example.com')).toBe(false);
      expect(matchesVersion(Version.Any, '')).toBe(false);
      expect(matchesVersion(Version.V4, '256.1.1.1')).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // addressFamily / parseAddress
  // ---------------------------------------------------------------------------
  describe('addressFamily', () => {
    it('returns 4, 6 or undefined', () => {
      expect(addressFamily('198.51.100.1')).toBe(4);
      expect(addressFamily('::1')).toBe(6);
      expect(addressFamily('not-an-ip')).toBeUndefined();
    });
  });

  describe('parseAddress', () => {
    it('trims surrounding whitespace', () => {
      expect(parseAddress('  198.51.100.1\n')).toBe('198.51.100.1');
    });

    it('returns undefined for empty or invalid candidates', () => {
      expect(parseAddress('')).toBeUndefined();
      expect(parseAddress('   ')).toBeUndefined();
      expect(parseAddress('"198.51.100.1"')).toBeUndefined();
    });
  });

  // ---------------------------------------------------------------------------
  // parseVersion
  // ---------------------------------------------------------------------------
  describe('parseVersion', () => {
    it('accepts the common spellings', () => {
      expect(parseVersion('v4')).toBe('v4');
      expect(parseVersion('IPv4')).toBe('v4');
      expect(parseVersion('6')).toBe('v6');
      expect(parseVersion(' any ')).toBe('any');
    });

    it('returns undefined for anything else', () => {
      expect(parseVersion('v5')).toBeUndefined();
    });
  });
});
