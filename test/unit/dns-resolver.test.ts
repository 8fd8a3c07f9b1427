/**
 * Unit Tests for the DNS strategy
 *
 * Tests server filtering, answer parsing, error mapping and the built-in
 * providers against an in-process transport.
 */
import { describe, it, expect } from 'vitest';
import { NoAddressError, StrategyError, Version } from '@ipscout/core';
import { bestEffortResolution } from '@ipscout/fallback';
import {
  DnsDetails,
  DnsQueryError,
  DnsResolver,
  NodeDnsTransport,
  createDnsProvider,
  createDnsProviders,
  formatSocketAddress,
  isDnsDetails,
  isValidDnsName,
  parseAnswer,
  type DnsQuery,
} from '@ipscout/dns';
import { collect, FakeDnsTransport, silentLogger, summarize } from '../helpers/fakes.js';

const context = { logger: silentLogger };

describe('DnsResolver', () => {
  const options = {
    name: 'myip.example.net',
    servers: ['192.0.2.53', '2001:db8::53', '198.51.100.53'],
    method: 'TXT' as const,
  };

  // ---------------------------------------------------------------------------
  // Server selection
  // ---------------------------------------------------------------------------
  describe('Server selection', () => {
    it('only contacts servers of the requested family, in listed order', async () => {
      const transport = new FakeDnsTransport();
      const resolver = new DnsResolver(options, transport);

      await collect(resolver.resolve(Version.V4, context));

      expect(transport.queries.map((q) => q.server)).toEqual(['192.0.2.53', '198.51.100.53']);
    });

    it('yields nothing when no server can serve the version', async () => {
      const transport = new FakeDnsTransport();
      const resolver = new DnsResolver({ ...options, servers: ['192.0.2.53'] }, transport);

      expect(await collect(resolver.resolve(Version.V6, context))).toEqual([]);
      expect(transport.queries).toEqual([]);
    });

    it('defaults to port 53 and a name derived from the query', () => {
      const resolver = new DnsResolver(options, new FakeDnsTransport());
      expect(resolver.port).toBe(53);
      expect(resolver.name).toBe('dns:myip.example.net/TXT');
      expect(resolver.serversFor(Version.Any)).toEqual(options.servers);
    });
  });

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------
  describe('Results', () => {
    it('falls back to the next server after a timeout', async () => {
      const transport = new FakeDnsTransport({ '198.51.100.53': ['203.0.113.9'] });
      const resolver = new DnsResolver({ ...options, port: 5353 }, transport);

      const items = await collect(resolver.resolve(Version.V4, context));

      expect(summarize(items)).toEqual(['error:strategy', '203.0.113.9']);
      const [timeout, success] = items;
      if (timeout && !timeout.ok) {
        expect(timeout.error.message).toBe('dns resolver: queryA ETIMEOUT myip.example.net');
      }
      if (success?.ok) {
        expect(success.details).toEqual(
          new DnsDetails({
            server: '198.51.100.53',
            port: 5353,
            name: 'myip.example.net',
            method: 'TXT',
          }),
        );
      }
    });

    it('maps ENODATA to NoAddressError', async () => {
      const transport = new FakeDnsTransport({
        '192.0.2.53': new DnsQueryError('queryTxt ENODATA myip.example.net', 'ENODATA'),
      });
      const resolver = new DnsResolver({ ...options, servers: ['192.0.2.53'] }, transport);

      const [only] = await collect(resolver.resolve(Version.V4, context));

      expect(only?.ok).toBe(false);
      if (only && !only.ok) {
        expect(only.error).toBeInstanceOf(NoAddressError);
      }
    });

    it('rejects an invalid DNS name without any query', async () => {
      const transport = new FakeDnsTransport();
      const resolver = new DnsResolver({ ...options, name: 'bad..name' }, transport);

      const items = await collect(resolver.resolve(Version.Any, context));

      expect(items).toHaveLength(1);
      const [only] = items;
      if (only && !only.ok) {
        expect(only.error.kind).toBe('other');
        expect(only.error.message).toBe('other resolver: invalid DNS name "bad..name"');
      }
      expect(transport.queries).toEqual([]);
    });
  });
});

// ---------------------------------------------------------------------------
// parseAnswer
// ---------------------------------------------------------------------------
describe('parseAnswer', () => {
  const query = (method: DnsQuery['method']): DnsQuery => ({
    server: '192.0.2.53',
    port: 53,
    name: 'myip.example.net',
    method,
  });

  it('uses the first record only', () => {
    const result = parseAnswer(['203.0.113.1', '203.0.113.2'], query('A'));
    expect(result.ok && result.address).toBe('203.0.113.1');
  });

  it('reports an empty answer as no address', () => {
    const result = parseAnswer([], query('A'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('no IP address string found');
  });

  it('reports an unparsable record as an invalid address', () => {
    const result = parseAnswer(['edns0-client-subnet 192.0.2.0/24'], query('TXT'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'invalid IP address string "edns0-client-subnet 192.0.2.0/24"',
      );
    }
  });

  it('treats an A answer holding an IPv6 address as a protocol error', () => {
    const result = parseAnswer(['2001:db8::1'], query('A'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StrategyError);
      expect(result.error.message).toBe('dns resolver: A answer contained 2001:db8::1');
    }
  });

  it('accepts either family from TXT', () => {
    const result = parseAnswer(['2001:db8::1'], query('TXT'));
    expect(result.ok && result.address).toBe('2001:db8::1');
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------
describe('DNS helpers', () => {
  it('validates DNS names', () => {
    expect(isValidDnsName('myip.opendns.com')).toBe(true);
    expect(isValidDnsName('o-o.myaddr.l.google.com.')).toBe(true);
    expect(isValidDnsName('')).toBe(false);
    expect(isValidDnsName('-leading.example')).toBe(false);
    expect(isValidDnsName(`${'a'.repeat(64)}.example`)).toBe(false);
  });

  it('brackets IPv6 socket addresses', () => {
    expect(formatSocketAddress('192.0.2.53', 53)).toBe('192.0.2.53:53');
    expect(formatSocketAddress('2001:db8::53', 5353)).toBe('[2001:db8::53]:5353');
  });

  it('NodeDnsTransport refuses to start an aborted query', async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new NodeDnsTransport({ timeoutMs: 100 });

    await expect(
      transport.query(
        { server: '192.0.2.53', port: 53, name: 'myip.example.net', method: 'A' },
        controller.signal,
      ),
    ).rejects.toMatchObject({ name: 'DnsQueryError', code: 'ECANCELLED' });
  });
});

// ---------------------------------------------------------------------------
// Built-in providers
// ---------------------------------------------------------------------------
describe('DNS providers', () => {
  it('OpenDNS answers over IPv4 with an A query', async () => {
    const transport = new FakeDnsTransport({ '208.67.222.222': ['203.0.113.10'] });

    const result = await bestEffortResolution(
      createDnsProvider('opendns', transport, { port: 5353 }),
      Version.V4,
      context,
    );

    expect(result?.address).toBe('203.0.113.10');
    expect(transport.queries).toEqual([
      { server: '208.67.222.222', port: 5353, name: 'myip.opendns.com', method: 'A' },
    ]);
    const details = result?.details;
    expect(details !== undefined && isDnsDetails(details)).toBe(true);
    if (details && isDnsDetails(details)) {
      expect(details.socketAddress).toBe('208.67.222.222:5353');
    }
  });

  it('tries every IPv6 server of every provider in order', async () => {
    const transport = new FakeDnsTransport();

    const items = await collect(createDnsProviders(transport).resolve(Version.V6, context));

    expect(items).toHaveLength(6);
    expect(transport.queries.map((q) => `${q.method} ${q.server}`)).toEqual([
      'AAAA 2620:0:ccc::2',
      'AAAA 2620:0:ccd::2',
      'TXT 2001:4860:4802:32::a',
      'TXT 2001:4860:4802:34::a',
      'TXT 2001:4860:4802:36::a',
      'TXT 2001:4860:4802:38::a',
    ]);
  });
});
