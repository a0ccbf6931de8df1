/**
 * Shared test helpers for page data source tests
 *
 * Builds real better-sqlite3 databases (in-memory or temp files) from
 * tests/fixtures/schema.sql and fills them with page and domain rows.
 */

import Database from 'better-sqlite3';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';

const SCHEMA_SQL = readFileSync(
  fileURLToPath(new URL('../../fixtures/schema.sql', import.meta.url)),
  'utf-8'
);

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PageFixture {
  uid: number;
  pid: number;
  isRoot?: boolean;
  title?: string;
  hidden?: boolean;
}

export interface DomainFixture {
  rootId: number;
  domainName: string;
  forced?: boolean;
  sorting: number;
}

export interface SiteFixture {
  pages: PageFixture[];
  domains: DomainFixture[];
}

/**
 * Two sites plus an unbound tree and a broken chain:
 *
 *   1 example.com            20 (no domain)
 *   ├─ 2 About               └─ 21
 *   │  ├─ 3 Team
 *   │  └─ 4 Jobs             40 -> 41 -> 42 (missing)
 *   ├─ 5 Contact
 *   └─ 10 shop (site root)
 *      └─ 11 Cart
 */
export const SAMPLE_SITE: SiteFixture = {
  pages: [
    { uid: 1, pid: 0, isRoot: true, title: 'Home' },
    { uid: 2, pid: 1, title: 'About' },
    { uid: 3, pid: 2, title: 'Team' },
    { uid: 4, pid: 2, title: 'Jobs', hidden: true },
    { uid: 5, pid: 1, title: 'Contact' },
    { uid: 10, pid: 1, isRoot: true, title: 'Shop' },
    { uid: 11, pid: 10, title: 'Cart' },
    { uid: 20, pid: 0, title: 'Archive' },
    { uid: 21, pid: 20, title: 'Old news' },
    { uid: 40, pid: 41, title: 'Orphan' },
    { uid: 41, pid: 42, title: 'Orphan parent' },
  ],
  domains: [
    { rootId: 10, domainName: 'shop.example.com', sorting: 1 },
    { rootId: 1, domainName: 'example.com', sorting: 2 },
    { rootId: 1, domainName: 'www.example.com', sorting: 3 },
  ],
};

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

export function insertPages(db: Database.Database, pages: readonly PageFixture[]): void {
  const stmt = db.prepare(
    'INSERT INTO pages (uid, pid, is_siteroot, title, hidden) VALUES (?, ?, ?, ?, ?)'
  );
  for (const page of pages) {
    stmt.run(page.uid, page.pid, page.isRoot ? 1 : 0, page.title ?? '', page.hidden ? 1 : 0);
  }
}

export function insertDomains(db: Database.Database, domains: readonly DomainFixture[]): void {
  const stmt = db.prepare(
    'INSERT INTO sys_domain (pid, domainName, forced, sorting) VALUES (?, ?, ?, ?)'
  );
  for (const domain of domains) {
    stmt.run(domain.rootId, domain.domainName, domain.forced ? 1 : 0, domain.sorting);
  }
}

/**
 * Create an in-memory database with the schema and the given rows
 */
export function createMemoryDatabase(fixture: SiteFixture = SAMPLE_SITE): Database.Database {
  const db = new Database(':memory:');
  db.exec(SCHEMA_SQL);
  insertPages(db, fixture.pages);
  insertDomains(db, fixture.domains);
  return db;
}

/**
 * Write a database file in `dir` and return its path. The file is closed
 * so the resolver can open it read-only.
 */
export function createSiteDatabase(
  dir: string,
  fixture: SiteFixture = SAMPLE_SITE,
  fileName = 'site.db'
): string {
  const path = join(dir, fileName);
  const db = new Database(path);
  try {
    db.exec(SCHEMA_SQL);
    insertPages(db, fixture.pages);
    insertDomains(db, fixture.domains);
  } finally {
    db.close();
  }
  return path;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a temporary directory for database tests
 */
export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTestDir(testDir: string): void {
  try {
    rmSync(testDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}
