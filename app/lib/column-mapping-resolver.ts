/**
 * Column Mapping Resolver
 *
 * Resolves spreadsheet column headers to record fields. Headers and the
 * known patterns are both compared in canonical form (see cleanColumnName),
 * so "PO Number", "po_number" and "PONumber" all land on poNumber.
 */

import { cleanColumnName } from './normalization';
import type { BatchSide } from './types';

export type RecordField =
  | 'jobNo'
  | 'poNumber'
  | 'styleRefNo'
  | 'color'
  | 'availableQty'
  | 'requestedQty'
  | 'buyer';

/**
 * Default column name patterns for each field, in priority order.
 * The first pattern of each list is the name used in the workbooks this
 * tool was built around (ExFactoryQty on the source, ShipQty on the target).
 */
const DEFAULT_COLUMN_PATTERNS: Record<RecordField, string[]> = {
  jobNo: ['JobNo', 'Job Number', 'Job'],
  poNumber: ['PONumber', 'PO No', 'PO', 'Purchase Order'],
  styleRefNo: ['StyleRefNo', 'Style Ref', 'Style Reference', 'Style'],
  color: ['Color', 'Colour'],
  availableQty: ['ExFactoryQty', 'ExFactory Quantity', 'Available Qty', 'Available Quantity'],
  requestedQty: ['ShipQty', 'Ship Quantity', 'Shipped Qty', 'Requested Qty'],
  buyer: ['Buyer', 'Buyer Name', 'Customer'],
};

export const REQUIRED_FIELDS: Record<BatchSide, RecordField[]> = {
  supply: ['jobNo', 'poNumber', 'availableQty', 'styleRefNo', 'color'],
  demand: ['jobNo', 'poNumber', 'requestedQty', 'styleRefNo', 'color'],
};

const OPTIONAL_FIELDS: Record<BatchSide, RecordField[]> = {
  supply: ['buyer'],
  demand: ['buyer'],
};

/**
 * Resolve headers for one batch.
 * Returns field → original header. Fields with no matching header are absent.
 */
export function resolveColumnMapping(headers: string[], side: BatchSide): Map<RecordField, string> {
  const byCanonical = new Map<string, string>();
  for (const header of headers) {
    const canonical = cleanColumnName(header);
    // First occurrence wins for duplicated headers
    if (canonical && !byCanonical.has(canonical)) {
      byCanonical.set(canonical, header);
    }
  }

  const mapping = new Map<RecordField, string>();
  for (const field of [...REQUIRED_FIELDS[side], ...OPTIONAL_FIELDS[side]]) {
    for (const pattern of DEFAULT_COLUMN_PATTERNS[field]) {
      const header = byCanonical.get(cleanColumnName(pattern));
      if (header !== undefined) {
        mapping.set(field, header);
        break;
      }
    }
  }

  return mapping;
}

export function validateRequiredColumns(
  side: BatchSide,
  mapping: Map<RecordField, string>
): { valid: boolean; missing: RecordField[] } {
  const missing = REQUIRED_FIELDS[side].filter((field) => !mapping.has(field));
  return { valid: missing.length === 0, missing };
}

/**
 * Get human-readable names for missing fields
 */
export function getMissingFieldNames(missing: RecordField[]): string[] {
  const fieldToName: Record<RecordField, string> = {
    jobNo: 'JobNo',
    poNumber: 'PONumber',
    styleRefNo: 'StyleRefNo',
    color: 'Color',
    availableQty: 'ExFactoryQty',
    requestedQty: 'ShipQty',
    buyer: 'Buyer',
  };

  return missing.map((field) => fieldToName[field]);
}
