/**
 * Ad-hoc id query operations
 *
 * Runs caller-supplied SQL that yields a page id in its first column,
 * optionally followed by `nfields` associated columns which are recorded
 * per id for later CSV output.
 */

import Database from 'better-sqlite3';
import type { PageId } from '../../../models/page.js';
import { QueryError, errorMessage } from '../../../utils/errors.js';
import { associatedValueToString, decodePageId } from './converters.js';
import { checkColumnCount, prepareReader } from './helpers.js';

/**
 * Associated column values recorded per page id for the rest of the run.
 * A later row for the same id replaces the earlier values.
 */
export class AssociatedRows {
  private readonly rows = new Map<PageId, readonly string[]>();

  set(id: PageId, values: readonly string[]): void {
    this.rows.set(id, values);
  }

  get(id: PageId): readonly string[] | undefined {
    return this.rows.get(id);
  }

  has(id: PageId): boolean {
    return this.rows.has(id);
  }

  get size(): number {
    return this.rows.size;
  }
}

/**
 * Run an id query.
 *
 * The statement must project exactly `nfields + 1` columns. With nfields 0
 * nothing is recorded. Values recorded before a failing row are kept.
 *
 * @returns ids in result order, duplicates included
 * @throws QueryError on prepare, execution or decode failure
 */
export function runIdQuery(
  db: Database.Database,
  sql: string,
  nfields: number,
  assoc: AssociatedRows
): PageId[] {
  if (!Number.isInteger(nfields) || nfields < 0) {
    throw new QueryError(`nfields must be a non-negative integer, got ${nfields}`, { nfields });
  }

  const fail = (message: string, details: Record<string, unknown>): QueryError =>
    new QueryError(`Cannot execute id query: ${message}`, { nfields, ...details });

  const stmt = prepareReader(db, sql, fail);
  checkColumnCount(stmt, nfields + 1, fail);

  const ids: PageId[] = [];
  let rowNumber = 0;
  try {
    for (const raw of stmt.raw(true).iterate()) {
      rowNumber++;
      if (!Array.isArray(raw)) {
        throw fail(`row ${rowNumber} is not a positional row`, { sql });
      }
      const id = decodePageId(raw[0]);
      if (!id.ok) {
        throw fail(`cannot scan row ${rowNumber}: ${id.error}`, { sql, row: raw });
      }
      if (nfields > 0) {
        assoc.set(id.value, raw.slice(1, nfields + 1).map(associatedValueToString));
      }
      ids.push(id.value);
    }
  } catch (error) {
    if (error instanceof QueryError) {
      throw error;
    }
    throw fail(`query failed at row ${rowNumber + 1}: ${errorMessage(error)}`, { sql });
  }

  return ids;
}
