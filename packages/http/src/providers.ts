/**
 * @ipscout/http - Built-in HTTP providers
 */

import { HTTP_PROVIDER_NAMES, type HttpProviderName } from '@ipscout/core';
import { ResolverList } from '@ipscout/fallback';
import type { HttpClient } from './client.js';
import { HttpResolver, type HttpResolverOptions } from './resolver.js';

export const HTTP_IPIFY_ORG: HttpResolverOptions = {
  label: 'ipify-org',
  uri: 'http://api.ipify.org',
  method: 'plain-text',
};

export const HTTP_MY_IP_IO: HttpResolverOptions = {
  label: 'my-ip-io',
  uri: 'https://api.my-ip.io/ip',
  method: 'plain-text',
};

export const HTTP_MYIP_COM: HttpResolverOptions = {
  label: 'myip-com',
  uri: 'https://api.myip.com',
  method: 'json-ip-field',
};

export const HTTP_SEEIP_ORG: HttpResolverOptions = {
  label: 'seeip-org',
  uri: 'https://ip.seeip.org',
  method: 'plain-text',
};

export const HTTP_PROVIDERS = {
  'ipify-org': HTTP_IPIFY_ORG,
  'my-ip-io': HTTP_MY_IP_IO,
  'myip-com': HTTP_MYIP_COM,
  'seeip-org': HTTP_SEEIP_ORG,
} as const satisfies Record<HttpProviderName, HttpResolverOptions>;

export function createHttpProvider(name: HttpProviderName, client: HttpClient): HttpResolver {
  return new HttpResolver(HTTP_PROVIDERS[name], client);
}

/** Several built-in providers, in the given order (default: all of them). */
export function createHttpProviders(
  client: HttpClient,
  names: readonly HttpProviderName[] = HTTP_PROVIDER_NAMES,
): ResolverList {
  return new ResolverList(
    names.map((name) => createHttpProvider(name, client)),
    'http',
  );
}
