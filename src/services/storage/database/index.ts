/**
 * Page Data Source - Public API
 *
 * Re-exports the data source facade and its standalone operations.
 */

export type { DataSourceOptions, RelationQueries, RawRow, ResolvedDsn } from './types.js';
export { DEFAULT_PAGES_QUERY, DEFAULT_DOMAINS_QUERY } from './types.js';

export { DataSource } from './service.js';

export { openConnection, pingConnection, DEFAULT_BUSY_TIMEOUT_MS } from './connection-operations.js';
export { loadPages, loadDomains, loadRelations } from './load-operations.js';
export { AssociatedRows, runIdQuery } from './query-operations.js';
export { resolveDsn } from './helpers.js';
export {
  decodePageRow,
  decodeDomainRow,
  decodePageId,
  associatedValueToString,
} from './converters.js';
