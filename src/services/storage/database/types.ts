/**
 * Type definitions for the page data source
 *
 * Contains the query defaults, connection options and raw row shapes
 * used by the loader and the ad-hoc query engine.
 */

/**
 * Pages relation: (uid, pid, is_siteroot)
 */
export const DEFAULT_PAGES_QUERY = 'SELECT uid, pid, is_siteroot FROM pages';

/**
 * Domains relation: (root page id, domain name, forced), in priority order
 */
export const DEFAULT_DOMAINS_QUERY =
  'SELECT pid, domainName, forced FROM sys_domain ORDER BY sorting ASC';

/**
 * Relation queries used at startup. Columns are read by position.
 */
export interface RelationQueries {
  pagesQuery: string;
  domainsQuery: string;
}

/**
 * Connection options
 */
export interface DataSourceOptions {
  /** Milliseconds to wait on a locked database file (default: 5000) */
  busyTimeoutMs?: number;
}

/**
 * A result row read in raw mode: column values by position
 */
export type RawRow = readonly unknown[];

/**
 * A connection string after its scheme prefix is stripped
 */
export interface ResolvedDsn {
  /** Path handed to better-sqlite3 */
  filename: string;
  inMemory: boolean;
}
