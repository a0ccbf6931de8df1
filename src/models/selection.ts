/**
 * Selection and output interfaces
 */

import type { PageId } from './page.js';

/**
 * Inputs to the selection combinator
 */
export interface SelectionInput {
  /** Explicit page id; ignored unless > 0 */
  explicitId?: PageId;
  /** Ids yielded by the ad-hoc query; present whenever a query ran, even if empty */
  queryIds?: readonly PageId[];
  /** Replace each seed by its descendants */
  expandToChildren: boolean;
  /** Replace each seed by its root */
  collapseToRoot: boolean;
}

export type OutputMode = 'urls' | 'id-list';

/**
 * Output rendering options
 */
export interface OutputOptions {
  mode: OutputMode;
  /** Number of associated columns to append as CSV fields (URL mode only) */
  nfields: number;
  /** URL template containing {domain} and {id} */
  urlTemplate: string;
}
