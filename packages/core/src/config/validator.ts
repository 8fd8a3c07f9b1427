/**
 * @ipscout/core - Configuration validator
 *
 * Validates an IpscoutConfig object using TypeBox, then applies business
 * rules: provider names must be known to their group, custom DNS servers
 * must be IP literals and custom URIs must parse. A config in which no
 * strategy can produce anything gets a warning.
 */

import { Value } from '@sinclair/typebox/value';
import { addressFamily } from '../version.js';
import {
  DEFAULT_CONFIG,
  DNS_PROVIDER_NAMES,
  HTTP_PROVIDER_NAMES,
  IpscoutConfigSchema,
  type IpscoutConfig,
  type StrategyKind,
} from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** The validated config, or a copy of the defaults when `valid` is false. */
  config: IpscoutConfig;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidateOptions {
  /**
   * Provider names each group may reference, in addition to its built-ins
   * (e.g. names registered with a ProviderRegistry).
   */
  providers?: Partial<Record<StrategyKind, readonly string[]>>;
}

const BUILTIN_PROVIDERS: Record<StrategyKind, readonly string[]> = {
  dns: DNS_PROVIDER_NAMES,
  http: HTTP_PROVIDER_NAMES,
};

/**
 * Validate and normalise a raw configuration value.
 *
 * 1. Apply TypeBox defaults
 * 2. TypeBox schema check
 * 3. Business rules (errors and soft warnings)
 */
export function validateConfig(raw: unknown, options: ValidateOptions = {}): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const candidate: unknown = Value.Default(IpscoutConfigSchema, Value.Clone(raw));

  // ----- TypeBox schema validation -----
  if (!Value.Check(IpscoutConfigSchema, candidate)) {
    for (const err of Value.Errors(IpscoutConfigSchema, candidate)) {
      errors.push({ path: err.path, message: err.message });
    }
    return { valid: false, errors, warnings, config: structuredClone(DEFAULT_CONFIG) };
  }

  const config = candidate;

  // ----- Business rules -----
  for (const kind of ['dns', 'http'] as const) {
    const known = new Set([...BUILTIN_PROVIDERS[kind], ...(options.providers?.[kind] ?? [])]);
    config[kind].providers.forEach((name, i) => {
      if (!known.has(name)) {
        errors.push({
          path: `/${kind}/providers/${i}`,
          message: `Unknown ${kind.toUpperCase()} provider "${name}"`,
        });
      }
    });
  }

  config.dns.custom.forEach((entry, i) => {
    entry.servers.forEach((server, j) => {
      if (addressFamily(server) === undefined) {
        errors.push({
          path: `/dns/custom/${i}/servers/${j}`,
          message: `DNS server "${server}" must be an IP address`,
        });
      }
    });
  });

  config.http.custom.forEach((entry, i) => {
    if (!isValidHttpUri(entry.uri)) {
      errors.push({
        path: `/http/custom/${i}/uri`,
        message: `URI "${entry.uri}" must be an absolute http:// or https:// URL`,
      });
    }
  });

  const seen = new Set<string>();
  config.order.forEach((kind, i) => {
    if (seen.has(kind)) {
      warnings.push({ path: `/order/${i}`, message: `Strategy "${kind}" is listed more than once` });
    }
    seen.add(kind);
  });

  const active = config.order.filter((kind) => {
    const section = config[kind];
    return section.enabled && section.providers.length + section.custom.length > 0;
  });
  if (active.length === 0) {
    warnings.push({
      path: '/order',
      message: 'No strategy is enabled; every resolution will come back empty',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

/**
 * Check that a string is an absolute http(s) URL.
 */
export function isValidHttpUri(uri: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    return false;
  }
  return parsed.protocol === 'http:' || parsed.protocol === 'https:';
}
