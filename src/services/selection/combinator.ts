/**
 * Selection Combinator
 *
 * Merges the explicit page id and the ad-hoc query ids into the final id
 * sequence under the expand-to-children / collapse-to-root flags.
 *
 * The flags are additive: with both set, each source contributes its
 * descendants followed by its roots. Without either flag the query ids
 * replace whatever the explicit id contributed.
 *
 * @module services/selection/combinator
 */

import type { PageId } from '../../models/page.js';
import type { SelectionInput } from '../../models/selection.js';
import { NoSelectionError } from '../../utils/errors.js';

/**
 * The subset of HierarchyIndex the combinator needs
 */
export interface HierarchyLookup {
  root(id: PageId): PageId;
  descendants(id: PageId): PageId[];
}

/**
 * @throws NoSelectionError if the result is empty
 * @throws CycleError from the hierarchy lookups
 */
export function combineSelection(index: HierarchyLookup, input: SelectionInput): PageId[] {
  const { explicitId, queryIds, expandToChildren, collapseToRoot } = input;
  const identity = !expandToChildren && !collapseToRoot;
  let selected: PageId[] = [];

  if (explicitId !== undefined && explicitId > 0) {
    if (expandToChildren) {
      selected.push(...index.descendants(explicitId));
    }
    if (collapseToRoot) {
      selected.push(index.root(explicitId));
    }
    if (identity) {
      selected.push(explicitId);
    }
  }

  if (queryIds !== undefined) {
    if (expandToChildren) {
      for (const id of queryIds) {
        selected.push(...index.descendants(id));
      }
    }
    if (collapseToRoot) {
      for (const id of queryIds) {
        selected.push(index.root(id));
      }
    }
    if (identity) {
      selected = [...queryIds];
    }
  }

  if (selected.length === 0) {
    throw new NoSelectionError('No page ids selected', {
      explicitId: explicitId ?? null,
      queryIdCount: queryIds?.length ?? null,
      expandToChildren,
      collapseToRoot,
    });
  }

  return selected;
}
