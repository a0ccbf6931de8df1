/**
 * Helper functions for the page data source
 *
 * Connection string parsing and statement preparation with error wrapping.
 */

import Database from 'better-sqlite3';
import { ConfigurationError, errorMessage } from '../../../utils/errors.js';
import type { ResolvedDsn } from './types.js';

/**
 * Accepted scheme prefixes. `sqlite://` is listed before `sqlite:` so the
 * longer prefix is stripped first.
 */
const DSN_PREFIXES = ['sqlite://', 'sqlite:', 'file:'] as const;

const IN_MEMORY = ':memory:';

/**
 * Resolve a connection string to a better-sqlite3 filename
 *
 * @throws ConfigurationError if nothing is left after the scheme prefix
 */
export function resolveDsn(dsn: string): ResolvedDsn {
  let filename = dsn.trim();
  for (const prefix of DSN_PREFIXES) {
    if (filename.startsWith(prefix)) {
      filename = filename.slice(prefix.length);
      break;
    }
  }

  if (filename.length === 0) {
    throw new ConfigurationError(`Connection string "${dsn}" does not name a database file`, {
      dsn,
    });
  }

  return { filename, inMemory: filename === IN_MEMORY };
}

/**
 * Prepare a statement, converting driver errors with the given factory.
 * Statements that do not return rows are rejected: every relation read here
 * must be a SELECT-like query.
 */
export function prepareReader(
  db: Database.Database,
  sql: string,
  fail: (message: string, details: Record<string, unknown>) => Error
): Database.Statement {
  let stmt: Database.Statement;
  try {
    stmt = db.prepare(sql);
  } catch (error) {
    throw fail(`cannot prepare query: ${errorMessage(error)}`, { sql });
  }
  if (!stmt.reader) {
    throw fail('query does not return rows', { sql });
  }
  return stmt;
}

/**
 * Check that a prepared reader projects exactly `expected` columns
 */
export function checkColumnCount(
  stmt: Database.Statement,
  expected: number,
  fail: (message: string, details: Record<string, unknown>) => Error
): void {
  const columns = stmt.columns().map((c) => c.name);
  if (columns.length !== expected) {
    throw fail(`query returns ${columns.length} column(s), expected ${expected}`, {
      sql: stmt.source,
      columns,
    });
  }
}
