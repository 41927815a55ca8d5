/**
 * Configuration loader for for-sale-check.
 *
 * Loads environment variables with sensible defaults.
 * Nothing here relaxes validation: schema, scheme whitelist and size
 * limits are fixed and have no settings.
 */

import { config as loadDotenv } from 'dotenv';
import type { Config } from './types.js';

// Load .env file if present
loadDotenv();

export const DEFAULT_DOH_URL = 'https://cloudflare-dns.com/dns-query';
export const DEFAULT_RDAP_BOOTSTRAP_URL = 'https://data.iana.org/rdap/dns.json';

const LOG_LEVELS: ReadonlyArray<Config['logLevel']> = ['debug', 'info', 'warn', 'error'];

/**
 * Parse an integer with a fallback default.
 */
function parseIntWithDefault(
  value: string | undefined,
  defaultValue: number,
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a boolean from environment variable.
 */
function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseLogLevel(value: string | undefined): Config['logLevel'] {
  const level = LOG_LEVELS.find((l) => l === value?.toLowerCase());
  return level ?? 'info';
}

function parseOutputFormat(value: string | undefined): Config['outputFormat'] {
  const format = value?.toLowerCase();
  if (format === 'json' || format === 'both') return format;
  return 'text';
}

/**
 * Load configuration from environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    outputFormat: parseOutputFormat(env.OUTPUT_FORMAT),
    dohUrl: env.FORSALE_DOH_URL || DEFAULT_DOH_URL,
    rdapBootstrapUrl: env.FORSALE_RDAP_BOOTSTRAP_URL || DEFAULT_RDAP_BOOTSTRAP_URL,
    policy: {
      rdapOnlyConfirms: parseBool(env.FORSALE_RDAP_ONLY_CONFIRMS, true),
      failureCacheTtl: parseIntWithDefault(env.FORSALE_FAILURE_CACHE_TTL, 30),
      cacheMaxEntries: parseIntWithDefault(env.FORSALE_CACHE_MAX_ENTRIES, 10000),
    },
    defaults: {
      enableRdapCheck: parseBool(env.FORSALE_DEFAULT_RDAP, false),
      cacheTTL: parseIntWithDefault(env.FORSALE_DEFAULT_CACHE_TTL, 300),
      timeout: parseIntWithDefault(env.FORSALE_DEFAULT_TIMEOUT, 5),
    },
  };
}

/**
 * Global config instance.
 * Loaded once at startup.
 */
export const config = loadConfig();
