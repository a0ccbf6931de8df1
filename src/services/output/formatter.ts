/**
 * Output Formatter
 *
 * Renders the selected ids as a single comma-separated line or as one URL
 * (or quoted CSV row) per id. Ids whose root has no domain are skipped.
 *
 * @module services/output/formatter
 */

import type { PageId } from '../../models/page.js';
import type { OutputOptions } from '../../models/selection.js';

/** Default URL template */
export const DEFAULT_URL_TEMPLATE = 'https://{domain}/index.php?id={id}';

export const ID_LIST_SEPARATOR = ', ';

/**
 * The subset of HierarchyIndex the formatter needs
 */
export interface DomainLookup {
  root(id: PageId): PageId;
  domain(rootId: PageId): string;
}

/**
 * Associated values by page id
 */
export interface AssociatedLookup {
  get(id: PageId): readonly string[] | undefined;
}

export function formatIdList(ids: readonly PageId[]): string {
  return ids.join(ID_LIST_SEPARATOR);
}

const PLACEHOLDER = /\{(domain|id)\}/g;

/**
 * Fill {domain} and {id} into a URL template in one pass, so placeholder
 * text inside a domain name is left as it is
 */
export function buildUrl(template: string, domain: string, id: PageId): string {
  return template.replace(PLACEHOLDER, (_match: string, key: string) =>
    key === 'domain' ? domain : String(id)
  );
}

/**
 * Double-quote a CSV field, escaping embedded quotes as \"
 */
export function quoteField(value: string): string {
  return `"${value.replaceAll('"', '\\"')}"`;
}

/**
 * One CSV row: the URL followed by exactly `nfields` associated values.
 * Missing values (an id that never came from the query) render as "".
 */
export function formatCsvRow(url: string, values: readonly string[] | undefined, nfields: number): string {
  const fields = [quoteField(url)];
  for (let i = 0; i < nfields; i++) {
    fields.push(quoteField(values?.[i] ?? ''));
  }
  return fields.join(',');
}

/**
 * Render URL lines. Ids whose root has no bound domain produce no line.
 */
export function formatUrls(
  ids: readonly PageId[],
  index: DomainLookup,
  assoc: AssociatedLookup,
  options: Pick<OutputOptions, 'nfields' | 'urlTemplate'>
): string[] {
  const lines: string[] = [];
  for (const id of ids) {
    const domain = index.domain(index.root(id));
    if (domain === '') {
      continue;
    }
    const url = buildUrl(options.urlTemplate, domain, id);
    lines.push(options.nfields > 0 ? formatCsvRow(url, assoc.get(id), options.nfields) : url);
  }
  return lines;
}

/**
 * Render the final selection in the requested mode
 */
export function formatOutput(
  ids: readonly PageId[],
  index: DomainLookup,
  assoc: AssociatedLookup,
  options: OutputOptions
): string[] {
  if (options.mode === 'id-list') {
    return [formatIdList(ids)];
  }
  return formatUrls(ids, index, assoc, options);
}
