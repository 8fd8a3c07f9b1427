/**
 * @ipscout/core - Configuration loader
 *
 * Loads ipscout.json (path argument > IPSCOUT_CONFIG env var > defaults
 * only), merges it over DEFAULT_CONFIG, applies env overrides and validates.
 */

import { readFile } from 'node:fs/promises';
import { parseVersion } from '../version.js';
import { DEFAULT_CONFIG, type IpscoutConfig } from './schema.js';
import {
  validateConfig,
  type ValidateOptions,
  type ValidationIssue,
  type ValidationResult,
} from './validator.js';

/** Thrown when a config file cannot be read, parsed or validated. */
export class ConfigError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
export function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, overVal] of Object.entries(override)) {
    const baseVal = result[key];
    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = mergeConfig(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Resolve the config file path.
 * Priority: explicit argument > IPSCOUT_CONFIG env var > none
 */
export function resolveConfigPath(explicit?: string): string | undefined {
  if (explicit) return explicit;
  const fromEnv = process.env['IPSCOUT_CONFIG'];
  return fromEnv && fromEnv.trim() !== '' ? fromEnv.trim() : undefined;
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load the ipscout configuration.
 *
 * 1. Read the JSON file, if one is configured
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Apply IPSCOUT_VERSION / IPSCOUT_TIMEOUT_MS overrides
 * 4. Validate (throws ConfigError on any error)
 */
export async function loadConfig(
  path?: string,
  options: ValidateOptions = {},
): Promise<{ config: IpscoutConfig; validation: ValidationResult }> {
  const configPath = resolveConfigPath(path);
  const fileConfig = configPath ? await readConfigFile(configPath) : {};

  const merged = mergeConfig(structuredClone(DEFAULT_CONFIG), fileConfig);

  // ----- Env overrides -----
  const versionEnv = process.env['IPSCOUT_VERSION'];
  if (versionEnv) {
    const version = parseVersion(versionEnv);
    if (!version) {
      throw new ConfigError(`IPSCOUT_VERSION "${versionEnv}" is not one of v4, v6, any`);
    }
    merged['version'] = version;
  }

  const timeoutEnv = process.env['IPSCOUT_TIMEOUT_MS'];
  if (timeoutEnv) {
    merged['timeoutMs'] = Number(timeoutEnv);
  }

  // ----- Validate -----
  const validation = validateConfig(merged, options);
  if (!validation.valid) {
    throw new ConfigError(
      `Invalid configuration${configPath ? ` in ${configPath}` : ''}: ` +
        validation.errors.map((e) => `${e.path} ${e.message}`).join('; '),
      validation.errors,
    );
  }

  return { config: validation.config, validation };
}
