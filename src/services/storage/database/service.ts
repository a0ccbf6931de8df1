/**
 * DataSource class for all page data source operations
 *
 * Wraps one read-only better-sqlite3 connection for the length of a run:
 * relation loading, index construction and ad-hoc id queries.
 */

import Database from 'better-sqlite3';
import type { PageId, PageRelations } from '../../../models/page.js';
import { buildIndex, type HierarchyIndex } from '../../hierarchy/hierarchy-index.js';
import { errorMessage } from '../../../utils/errors.js';
import { openConnection } from './connection-operations.js';
import { loadRelations } from './load-operations.js';
import { AssociatedRows, runIdQuery } from './query-operations.js';
import type { DataSourceOptions, RelationQueries } from './types.js';

export class DataSource {
  private readonly db: Database.Database;
  private readonly assoc = new AssociatedRows();

  private constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Open and ping the database named by `dsn`
   * @throws ConnectionError | ConfigurationError
   */
  static open(dsn: string, options?: DataSourceOptions): DataSource {
    return new DataSource(openConnection(dsn, options));
  }

  /**
   * Wrap an already open connection. The DataSource takes ownership and
   * closes it in close().
   */
  static fromConnection(db: Database.Database): DataSource {
    return new DataSource(db);
  }

  loadRelations(queries: RelationQueries): PageRelations {
    return loadRelations(this.db, queries);
  }

  /**
   * Load both relations and build the hierarchy index
   * @throws LoadError
   */
  loadIndex(queries: RelationQueries): HierarchyIndex {
    const { pages, domains } = this.loadRelations(queries);
    return buildIndex(pages, domains);
  }

  /**
   * Run an ad-hoc id query, recording associated columns in associatedRows()
   * @throws QueryError
   */
  query(sql: string, nfields = 0): PageId[] {
    return runIdQuery(this.db, sql, nfields, this.assoc);
  }

  associatedRows(): AssociatedRows {
    return this.assoc;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  close(): void {
    if (!this.db.open) {
      return;
    }
    try {
      this.db.close();
    } catch (error) {
      console.error('[DataSource] close failed:', errorMessage(error));
    }
  }
}
