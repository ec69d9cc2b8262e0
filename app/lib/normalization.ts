/**
 * Field and Key Normalization Utilities
 *
 * Everything the matcher compares goes through here first:
 * 1. Column names → canonical form ("PO Number", "po_number" → "ponumber")
 * 2. Identity values (job, PO, style, color, buyer) → trimmed upper-case text
 * 3. Quantities → number or null
 */

import type { CellValue, Quantity } from './types';

/**
 * Canonical column name: trimmed, lower-case, no spaces, underscores or hyphens.
 *
 * Examples:
 * - "PO Number" → "ponumber"
 * - "po_number" → "ponumber"
 * - " Ex-Factory Qty " → "exfactoryqty"
 */
export function cleanColumnName(column: string): string {
  return column.trim().toLowerCase().replace(/[\s_-]/g, '');
}

/**
 * Normalize an identity-bearing value for comparison.
 * Numbers are rendered without a trailing ".0" so that a PO typed as 100
 * in one sheet and "100" in the other compare equal.
 */
export function normalizeIdentity(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return String(value).trim().toUpperCase();
}

// Plain decimal notation only; Number() would also take "0x32", "0b11", "0o7"
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a quantity cell. Blank, non-numeric and non-finite values become null.
 *
 * Examples:
 * - 120 → 120
 * - " 1,200 " → 1200
 * - "" → null
 * - "n/a" → null
 * - "0x32" → null
 */
export function parseQuantity(value: CellValue | undefined): Quantity {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const cleaned = value.trim().replace(/,/g, '');
  if (!DECIMAL_PATTERN.test(cleaned)) return null;

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * The one "no usable quantity" predicate: missing, blank or zero.
 */
export function isQuantityAbsent(quantity: Quantity | undefined): boolean {
  return quantity === null || quantity === undefined || Number.isNaN(quantity) || quantity === 0;
}

/**
 * Last four characters of the trimmed job number (whole value if shorter).
 */
export function jobLast4(jobNo: string): string {
  return jobNo.trim().slice(-4);
}

/**
 * Style reference joined to PO number, e.g. "S1" + "100" → "S1-100".
 * Returns null when either part is blank.
 */
export function combinedKey(styleRefNo: string, poNumber: string): string | null {
  if (!styleRefNo || !poNumber) return null;
  return `${styleRefNo}-${poNumber}`;
}

// Unit separator; cannot appear in trimmed spreadsheet text
const KEY_SEPARATOR = '\u001f';

/**
 * Join key parts into one lookup key. Returns null if any part is blank,
 * so records with incomplete identities never collide on an empty key.
 */
export function compositeKey(...parts: string[]): string | null {
  if (parts.length === 0 || parts.some((part) => part === '')) return null;
  return parts.join(KEY_SEPARATOR);
}
