/**
 * Hierarchy Index
 *
 * Immutable in-memory view of the page forest: parent pointers, the root set,
 * child adjacency and the root -> domain bindings. Built once per run from the
 * loaded relations by buildIndex().
 *
 * @module services/hierarchy/hierarchy-index
 */

import type { DomainRow, HierarchyStats, PageId, PageRow } from '../../models/page.js';
import { CycleError } from '../../utils/errors.js';

/** Returned by root() when the parent chain breaks before reaching a root */
export const NO_ROOT: PageId = 0;

const NO_CHILDREN: readonly PageId[] = [];

export class HierarchyIndex {
  private readonly parents: ReadonlyMap<PageId, PageId>;
  private readonly roots: ReadonlySet<PageId>;
  private readonly children: ReadonlyMap<PageId, readonly PageId[]>;
  private readonly domains: ReadonlyMap<PageId, string>;

  constructor(
    parents: ReadonlyMap<PageId, PageId>,
    roots: ReadonlySet<PageId>,
    children: ReadonlyMap<PageId, readonly PageId[]>,
    domains: ReadonlyMap<PageId, string>
  ) {
    this.parents = parents;
    this.roots = roots;
    this.children = children;
    this.domains = domains;
  }

  isRoot(id: PageId): boolean {
    return this.roots.has(id);
  }

  /**
   * Walk parent pointers up to the nearest root.
   *
   * @returns the root id, or NO_ROOT when an id on the way has no page row
   * @throws CycleError when the chain revisits a page without meeting a root
   */
  root(id: PageId): PageId {
    if (this.isRoot(id)) {
      return id;
    }

    const path: PageId[] = [id];
    const seen = new Set<PageId>(path);
    let current = id;
    for (;;) {
      const parent = this.parents.get(current);
      if (parent === undefined) {
        return NO_ROOT;
      }
      if (this.isRoot(parent)) {
        return parent;
      }
      path.push(parent);
      if (seen.has(parent)) {
        throw new CycleError(id, path);
      }
      seen.add(parent);
      current = parent;
    }
  }

  /**
   * All pages below `id` at any depth, each exactly once and never `id` itself.
   *
   * Depth-first pre-order: a child, its whole subtree, then the next sibling.
   * Siblings keep the order their rows were loaded in.
   *
   * @throws CycleError when a page is reached twice (only possible on a parent cycle)
   */
  descendants(id: PageId): PageId[] {
    const result: PageId[] = [];
    const seen = new Set<PageId>([id]);
    // Stack entries carry the path from `id` so a cycle can be reported.
    const stack: Array<{ page: PageId; path: PageId[] }> = [];
    pushChildren(stack, this.childrenOf(id), [id]);

    while (stack.length > 0) {
      const entry = stack.pop();
      if (entry === undefined) break;
      const { page, path } = entry;
      if (seen.has(page)) {
        throw new CycleError(id, [...path, page]);
      }
      seen.add(page);
      result.push(page);
      pushChildren(stack, this.childrenOf(page), [...path, page]);
    }

    return result;
  }

  /**
   * Domain bound to a root page, '' when unbound
   */
  domain(rootId: PageId): string {
    return this.domains.get(rootId) ?? '';
  }

  stats(): HierarchyStats {
    return {
      pages: this.parents.size,
      roots: this.roots.size,
      domains: this.domains.size,
    };
  }

  private childrenOf(id: PageId): readonly PageId[] {
    return this.children.get(id) ?? NO_CHILDREN;
  }
}

function pushChildren(
  stack: Array<{ page: PageId; path: PageId[] }>,
  children: readonly PageId[],
  path: PageId[]
): void {
  // Reverse so the first child is popped first.
  for (let i = children.length - 1; i >= 0; i--) {
    stack.push({ page: children[i], path });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Bind domains to roots in source priority order.
 * The first row for a root wins unless a later row is forced.
 */
export function bindDomains(rows: readonly DomainRow[]): Map<PageId, string> {
  const domains = new Map<PageId, string>();
  for (const row of rows) {
    if (domains.has(row.rootId) && !row.forced) {
      continue;
    }
    domains.set(row.rootId, row.domainName);
  }
  return domains;
}

/**
 * Build the index from decoded relation rows.
 *
 * A page with pid 0 is a root whatever its flag says. When a uid appears
 * twice the later row's parent wins, matching a plain map assignment.
 */
export function buildIndex(pageRows: readonly PageRow[], domainRows: readonly DomainRow[]): HierarchyIndex {
  const parents = new Map<PageId, PageId>();
  const roots = new Set<PageId>();

  for (const row of pageRows) {
    parents.set(row.uid, row.pid);
    if (row.isRoot || row.pid === 0) {
      roots.add(row.uid);
    }
  }

  // Adjacency follows the final parent map so a re-parented duplicate row is listed once.
  const children = new Map<PageId, PageId[]>();
  for (const [uid, pid] of parents) {
    const siblings = children.get(pid);
    if (siblings) {
      siblings.push(uid);
    } else {
      children.set(pid, [uid]);
    }
  }

  return new HierarchyIndex(parents, roots, children, bindDomains(domainRows));
}
