/**
 * Resolver pipeline
 *
 * One run: open the data source, load the index, run the optional id
 * query, combine the selection and format the output lines. Every step
 * fails fast; the connection is closed whatever the outcome.
 *
 * @module services/resolver
 */

import type { PageId } from '../models/page.js';
import type { OutputMode } from '../models/selection.js';
import type { ResolverConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { DataSource } from './storage/database/index.js';
import { combineSelection } from './selection/combinator.js';
import { formatOutput } from './output/formatter.js';

export interface ResolveRequest {
  /** Overrides config.dsn */
  dsn?: string;
  /** Explicit page id, 0 for none */
  pid: PageId;
  query?: string;
  nfields: number;
  children: boolean;
  roots: boolean;
  mode: OutputMode;
}

export interface ResolveResult {
  lines: string[];
  selected: PageId[];
}

export type DiagnosticLog = (message: string) => void;

const silent: DiagnosticLog = () => undefined;

/**
 * Resolve against an open data source
 *
 * @throws LoadError | QueryError | CycleError | NoSelectionError
 */
export function resolvePages(
  source: DataSource,
  request: ResolveRequest,
  config: Pick<ResolverConfig, 'pagesQuery' | 'domainsQuery' | 'urlTemplate'>,
  log: DiagnosticLog = silent
): ResolveResult {
  const index = source.loadIndex(config);
  const stats = index.stats();
  log(`[Loader] ${stats.pages} pages, ${stats.roots} roots, ${stats.domains} domains`);

  let queryIds: PageId[] | undefined;
  if (request.query !== undefined) {
    queryIds = source.query(request.query, request.nfields);
    log(`[Query] ${queryIds.length} ids returned`);
  } else if (request.nfields > 0) {
    log(`[Query] nfields=${request.nfields} without a query: associated fields will be empty`);
  }

  const selected = combineSelection(index, {
    explicitId: request.pid,
    queryIds,
    expandToChildren: request.children,
    collapseToRoot: request.roots,
  });
  log(`[Resolver] ${selected.length} ids selected`);

  const lines = formatOutput(selected, index, source.associatedRows(), {
    mode: request.mode,
    nfields: request.nfields,
    urlTemplate: config.urlTemplate,
  });
  if (request.mode === 'urls' && lines.length < selected.length) {
    log(`[Resolver] ${selected.length - lines.length} ids skipped: no domain for their root`);
  }

  return { lines, selected };
}

/**
 * Open the configured data source, resolve, and close it
 *
 * @throws ConfigurationError if no connection string is available
 * @throws ConnectionError if the data source cannot be opened
 */
export function runResolver(
  request: ResolveRequest,
  config: ResolverConfig,
  log: DiagnosticLog = silent
): ResolveResult {
  const dsn = request.dsn ?? config.dsn;
  if (dsn === undefined || dsn.trim() === '') {
    throw new ConfigurationError(
      'A connection string is required: pass --dsn or set PAGE_RESOLVER_DSN'
    );
  }

  const source = DataSource.open(dsn, { busyTimeoutMs: config.busyTimeoutMs });
  log(`[DataSource] connected to ${source.getConnection().name}`);
  try {
    return resolvePages(source, request, config, log);
  } finally {
    source.close();
  }
}
