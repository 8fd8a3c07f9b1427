export {
  IpscoutConfigSchema,
  DEFAULT_CONFIG,
  DNS_PROVIDER_NAMES,
  HTTP_PROVIDER_NAMES,
  type IpscoutConfig,
  type CustomDnsConfig,
  type CustomHttpConfig,
  type DnsProviderName,
  type HttpProviderName,
  type StrategyKind,
} from './schema.js';
export { loadConfig, mergeConfig, resolveConfigPath, ConfigError } from './loader.js';
export { validateConfig, isValidHttpUri, type ValidationResult, type ValidationIssue, type ValidateOptions } from './validator.js';
