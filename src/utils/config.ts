/**
 * Resolver Configuration
 *
 * Defaults overlaid with PAGE_RESOLVER_* environment variables. The entry
 * point loads .env files before calling loadConfig().
 *
 * @module utils/config
 */

import {
  DEFAULT_DOMAINS_QUERY,
  DEFAULT_PAGES_QUERY,
} from '../services/storage/database/types.js';
import { DEFAULT_BUSY_TIMEOUT_MS } from '../services/storage/database/connection-operations.js';
import { DEFAULT_URL_TEMPLATE } from '../services/output/formatter.js';
import { ConfigurationError } from './errors.js';
import { ResolverEnvInput, formatIssues } from './validation.js';

export interface ResolverConfig {
  /** Connection string used when --dsn is not given */
  dsn?: string;
  pagesQuery: string;
  domainsQuery: string;
  urlTemplate: string;
  busyTimeoutMs: number;
}

export const defaultConfig: Readonly<ResolverConfig> = {
  pagesQuery: DEFAULT_PAGES_QUERY,
  domainsQuery: DEFAULT_DOMAINS_QUERY,
  urlTemplate: DEFAULT_URL_TEMPLATE,
  busyTimeoutMs: DEFAULT_BUSY_TIMEOUT_MS,
};

/**
 * Build the configuration from environment variables
 *
 * @throws ConfigurationError if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const result = ResolverEnvInput.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid environment configuration: ${formatIssues(result.error)}`);
  }
  const vars = result.data;

  return {
    dsn: vars.PAGE_RESOLVER_DSN,
    pagesQuery: vars.PAGE_RESOLVER_PAGES_QUERY ?? defaultConfig.pagesQuery,
    domainsQuery: vars.PAGE_RESOLVER_DOMAINS_QUERY ?? defaultConfig.domainsQuery,
    urlTemplate: vars.PAGE_RESOLVER_URL_TEMPLATE ?? defaultConfig.urlTemplate,
    busyTimeoutMs: vars.PAGE_RESOLVER_BUSY_TIMEOUT_MS ?? defaultConfig.busyTimeoutMs,
  };
}
