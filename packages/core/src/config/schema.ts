/**
 * @ipscout/core - TypeBox schema for ipscout.json configuration
 *
 * Sections: version, timeoutMs, order, dns, http
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const VersionSchema = Type.Union(
  [Type.Literal('v4'), Type.Literal('v6'), Type.Literal('any')],
  { default: 'any' },
);

/** Built-in DNS providers, see @ipscout/dns. */
export const DNS_PROVIDER_NAMES = ['opendns', 'google'] as const;
export type DnsProviderName = (typeof DNS_PROVIDER_NAMES)[number];

/** Built-in HTTP providers, see @ipscout/http. */
export const HTTP_PROVIDER_NAMES = ['ipify-org', 'my-ip-io', 'myip-com', 'seeip-org'] as const;
export type HttpProviderName = (typeof HTTP_PROVIDER_NAMES)[number];

/**
 * Provider names are checked by the validator against the names known for
 * each group: the built-ins, plus whatever the host registered.
 */
const ProviderNameSchema = Type.String({ minLength: 1 });

export const QueryMethodSchema = Type.Union([
  Type.Literal('A'),
  Type.Literal('AAAA'),
  Type.Literal('TXT'),
]);

export const ExtractMethodSchema = Type.Union([
  Type.Literal('plain-text'),
  Type.Literal('strip-double-quotes'),
  Type.Literal('json-ip-field'),
]);

export const StrategyKindSchema = Type.Union([Type.Literal('dns'), Type.Literal('http')]);
export type StrategyKind = Static<typeof StrategyKindSchema>;

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const CustomDnsSchema = Type.Object({
  label: Type.Optional(Type.String()),
  name: Type.String({ minLength: 1, description: 'DNS name to query, e.g. myip.opendns.com' }),
  servers: Type.Array(Type.String(), { minItems: 1, description: 'IP addresses of the DNS servers' }),
  port: Type.Optional(Type.Number({ minimum: 1, maximum: 65535 })),
  method: QueryMethodSchema,
});
export type CustomDnsConfig = Static<typeof CustomDnsSchema>;

const CustomHttpSchema = Type.Object({
  label: Type.Optional(Type.String()),
  uri: Type.String({ minLength: 1 }),
  method: Type.Optional(ExtractMethodSchema),
});
export type CustomHttpConfig = Static<typeof CustomHttpSchema>;

const DnsSchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  providers: Type.Array(ProviderNameSchema, { default: [...DNS_PROVIDER_NAMES] }),
  port: Type.Number({ minimum: 1, maximum: 65535, default: 53 }),
  tries: Type.Number({ minimum: 1, default: 1 }),
  custom: Type.Array(CustomDnsSchema, { default: [] }),
});

const HttpSchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  providers: Type.Array(ProviderNameSchema, { default: [...HTTP_PROVIDER_NAMES] }),
  userAgent: Type.Optional(Type.String()),
  custom: Type.Array(CustomHttpSchema, { default: [] }),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const IpscoutConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: VersionSchema,
  timeoutMs: Type.Number({ minimum: 1, default: 5000, description: 'Per-query timeout in ms' }),
  order: Type.Array(StrategyKindSchema, { default: ['dns', 'http'] }),
  dns: DnsSchema,
  http: HttpSchema,
});

export type IpscoutConfig = Static<typeof IpscoutConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: IpscoutConfig = {
  version: 'any',
  timeoutMs: 5000,
  order: ['dns', 'http'],
  dns: {
    enabled: true,
    providers: ['opendns', 'google'],
    port: 53,
    tries: 1,
    custom: [],
  },
  http: {
    enabled: true,
    providers: ['ipify-org', 'my-ip-io', 'myip-com', 'seeip-org'],
    custom: [],
  },
};
