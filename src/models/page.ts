/**
 * Page tree interfaces
 *
 * Rows of the pages and domains relations after decoding, and the
 * read-only structures the hierarchy index is built from.
 */

/** Page id. 0 is never a real page: as a parent it means "top level". */
export type PageId = number;

/**
 * One row of the pages relation
 */
export interface PageRow {
  uid: PageId;
  /** Parent page id, 0 for a top-level page */
  pid: PageId;
  /** Page is explicitly flagged as a site root */
  isRoot: boolean;
}

/**
 * One row of the domains relation, in source priority order
 */
export interface DomainRow {
  /** Root page the domain is bound to */
  rootId: PageId;
  domainName: string;
  /** A forced row overrides an earlier binding for the same root */
  forced: boolean;
}

/**
 * Raw relations loaded at startup
 */
export interface PageRelations {
  pages: PageRow[];
  domains: DomainRow[];
}

/**
 * Counts reported after the index is built
 */
export interface HierarchyStats {
  pages: number;
  roots: number;
  domains: number;
}
