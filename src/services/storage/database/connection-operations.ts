/**
 * Connection operations for the page data source: open and ping.
 */

import Database from 'better-sqlite3';
import { ConnectionError, errorMessage } from '../../../utils/errors.js';
import { resolveDsn } from './helpers.js';
import type { DataSourceOptions } from './types.js';

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * Open the database named by `dsn` and verify it answers a query.
 *
 * File databases are opened read-only and must already exist.
 *
 * @throws ConfigurationError if the DSN is empty after its prefix
 * @throws ConnectionError if the file cannot be opened or the ping fails
 */
export function openConnection(dsn: string, options: DataSourceOptions = {}): Database.Database {
  const { filename, inMemory } = resolveDsn(dsn);
  const timeout = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;

  let db: Database.Database;
  try {
    // better-sqlite3 refuses readonly for in-memory databases
    db = inMemory
      ? new Database(filename, { timeout })
      : new Database(filename, { readonly: true, fileMustExist: true, timeout });
  } catch (error) {
    throw new ConnectionError(`Cannot open database "${filename}": ${errorMessage(error)}`, {
      filename,
    });
  }

  try {
    pingConnection(db);
  } catch (error) {
    db.close();
    throw error;
  }

  return db;
}

/**
 * @throws ConnectionError if the connection cannot run a trivial query
 */
export function pingConnection(db: Database.Database): void {
  try {
    db.prepare('SELECT 1').get();
  } catch (error) {
    throw new ConnectionError(`Database ping failed: ${errorMessage(error)}`, {
      filename: db.name,
    });
  }
}
