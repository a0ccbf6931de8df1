/**
 * Relation loading for the page data source
 *
 * Reads the pages and domains relations in full. Any failure aborts the
 * load; callers never see a partial set of rows.
 */

import Database from 'better-sqlite3';
import type { DomainRow, PageRelations, PageRow } from '../../../models/page.js';
import { LoadError, errorMessage } from '../../../utils/errors.js';
import { decodeDomainRow, decodePageRow, type DecodeResult } from './converters.js';
import { checkColumnCount, prepareReader } from './helpers.js';
import type { RawRow, RelationQueries } from './types.js';

const RELATION_COLUMNS = 3;

function readRelation<T>(
  db: Database.Database,
  relation: 'pages' | 'domains',
  sql: string,
  decode: (raw: RawRow) => DecodeResult<T>
): T[] {
  const fail = (message: string, details: Record<string, unknown>): LoadError =>
    new LoadError(`Cannot load ${relation}: ${message}`, { relation, ...details });

  const stmt = prepareReader(db, sql, fail);
  checkColumnCount(stmt, RELATION_COLUMNS, fail);

  let rawRows: unknown[];
  try {
    rawRows = stmt.raw(true).all();
  } catch (error) {
    throw fail(`query failed: ${errorMessage(error)}`, { sql });
  }

  const rows: T[] = [];
  rawRows.forEach((raw, index) => {
    if (!Array.isArray(raw)) {
      throw fail(`row ${index + 1} is not a positional row`, { sql });
    }
    const decoded = decode(raw);
    if (!decoded.ok) {
      throw fail(`cannot read ${relation} row ${index + 1}: ${decoded.error}`, {
        sql,
        row: raw,
      });
    }
    rows.push(decoded.value);
  });
  return rows;
}

export function loadPages(db: Database.Database, sql: string): PageRow[] {
  return readRelation(db, 'pages', sql, decodePageRow);
}

/**
 * Domain rows in the order the query returns them. Order is significant:
 * it decides which binding wins for a root.
 */
export function loadDomains(db: Database.Database, sql: string): DomainRow[] {
  return readRelation(db, 'domains', sql, decodeDomainRow);
}

/**
 * Load both relations
 * @throws LoadError if either relation cannot be read or decoded
 */
export function loadRelations(db: Database.Database, queries: RelationQueries): PageRelations {
  const pages = loadPages(db, queries.pagesQuery);
  const domains = loadDomains(db, queries.domainsQuery);
  return { pages, domains };
}
