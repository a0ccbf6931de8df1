/**
 * Row conversion functions for the page data source
 *
 * Decodes positional raw rows into PageRow / DomainRow and associated
 * column values. Validation is strict: a row that does not fit the expected
 * shape is rejected, never coerced into a guess.
 */

import { z } from 'zod';
import type { DomainRow, PageId, PageRow } from '../../../models/page.js';
import type { RawRow } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COLUMN SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Integer page id. Numeric text is accepted since some schemas store ids as TEXT.
 *
 * The driver reads integers as JS numbers, so an id beyond 2^53 arrives
 * already rounded. Such ids are rejected rather than resolved as a
 * neighbouring page.
 */
export const PageIdColumn = z.union([
  z.number().int('page id must be an integer').safe('page id is out of range'),
  z
    .string()
    .regex(/^-?\d+$/, 'page id must be an integer')
    .transform((value) => Number(value))
    .refine((value) => Number.isSafeInteger(value), 'page id is out of range'),
]);

/**
 * Boolean flag stored as integer, boolean or '0'/'1'/'true'/'false' text
 */
export const FlagColumn = z.union([
  z.boolean(),
  z.number().transform((value) => value !== 0),
  z
    .string()
    .regex(/^(0|1|true|false)$/i, 'flag must be 0, 1, true or false')
    .transform((value) => value === '1' || value.toLowerCase() === 'true'),
]);

const PageRowSchema = z.tuple([PageIdColumn, PageIdColumn, FlagColumn]);

const DomainRowSchema = z.tuple([PageIdColumn, z.string(), FlagColumn]);

// ═══════════════════════════════════════════════════════════════════════════════
// DECODERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Outcome of decoding one row
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const column = e.path.length > 0 ? `column ${e.path.join('.')}: ` : '';
      return `${column}${e.message}`;
    })
    .join('; ');
}

export function decodePageRow(raw: RawRow): DecodeResult<PageRow> {
  const result = PageRowSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  const [uid, pid, isRoot] = result.data;
  return { ok: true, value: { uid, pid, isRoot } };
}

export function decodeDomainRow(raw: RawRow): DecodeResult<DomainRow> {
  const result = DomainRowSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  const [rootId, domainName, forced] = result.data;
  return { ok: true, value: { rootId, domainName, forced } };
}

export function decodePageId(value: unknown): DecodeResult<PageId> {
  const result = PageIdColumn.safeParse(value);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  return { ok: true, value: result.data };
}

/**
 * Render an associated column value as text.
 * NULL becomes '', blobs are read as UTF-8.
 */
export function associatedValueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return String(value);
}
