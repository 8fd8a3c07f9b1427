/**
 * @ipscout/dns - Resolution details
 */

import type { Details } from '@ipscout/core';

/** Method used to read our address out of a DNS answer. */
export type QueryMethod = 'A' | 'AAAA' | 'TXT';

/** Evidence attached to an address resolved over DNS. */
export class DnsDetails implements Details {
  readonly kind = 'dns' as const;
  /** IP address of the DNS server that answered. */
  public readonly server: string;
  public readonly port: number;
  /** DNS name that was queried. */
  public readonly name: string;
  public readonly method: QueryMethod;

  constructor(fields: { server: string; port: number; name: string; method: QueryMethod }) {
    this.server = fields.server;
    this.port = fields.port;
    this.name = fields.name;
    this.method = fields.method;
    Object.freeze(this);
  }

  /** `host:port`, with IPv6 hosts in brackets. */
  get socketAddress(): string {
    return formatSocketAddress(this.server, this.port);
  }
}

export function isDnsDetails(details: Details): details is DnsDetails {
  return details instanceof DnsDetails;
}

export function formatSocketAddress(address: string, port: number): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}
