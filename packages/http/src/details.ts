/**
 * @ipscout/http - Resolution details
 */

import type { Details } from '@ipscout/core';

/** How our address is read out of a response body. */
export type ExtractMethod = 'plain-text' | 'strip-double-quotes' | 'json-ip-field';

/** Evidence attached to an address resolved over HTTP. */
export class HttpDetails implements Details {
  readonly kind = 'http' as const;
  public readonly uri: string;
  /** IP address of the server the request was sent to. */
  public readonly server: string;
  public readonly method: ExtractMethod;

  constructor(fields: { uri: string; server: string; method: ExtractMethod }) {
    this.uri = fields.uri;
    this.server = fields.server;
    this.method = fields.method;
    Object.freeze(this);
  }
}

export function isHttpDetails(details: Details): details is HttpDetails {
  return details instanceof HttpDetails;
}
