/**
 * Table and record builders shared by the reconciliation tests
 */

import type { CellValue, DemandRecord, RawRow, TabularData } from '../types';

export interface SupplyRowInput {
  jobNo?: CellValue;
  poNumber?: CellValue;
  styleRefNo?: CellValue;
  color?: CellValue;
  availableQty?: CellValue;
}

export interface DemandRowInput {
  jobNo?: CellValue;
  poNumber?: CellValue;
  styleRefNo?: CellValue;
  color?: CellValue;
  requestedQty?: CellValue;
  buyer?: CellValue;
}

export const SUPPLY_HEADERS = ['Job No', 'PO Number', 'Style Ref No', 'Color', 'ExFactory Qty'];
export const DEMAND_HEADERS = ['Job No', 'PO Number', 'Style Ref No', 'Color', 'Ship Qty'];

export function supplyTable(rows: SupplyRowInput[]): TabularData {
  return {
    headers: [...SUPPLY_HEADERS],
    rows: rows.map((row): RawRow => ({
      'Job No': row.jobNo ?? null,
      'PO Number': row.poNumber ?? null,
      'Style Ref No': row.styleRefNo ?? null,
      Color: row.color ?? null,
      'ExFactory Qty': row.availableQty ?? null,
    })),
  };
}

export function demandTable(rows: DemandRowInput[], options: { withBuyer?: boolean } = {}): TabularData {
  const headers = options.withBuyer ? [...DEMAND_HEADERS, 'Buyer'] : [...DEMAND_HEADERS];

  return {
    headers,
    rows: rows.map((row): RawRow => {
      const raw: RawRow = {
        'Job No': row.jobNo ?? null,
        'PO Number': row.poNumber ?? null,
        'Style Ref No': row.styleRefNo ?? null,
        Color: row.color ?? null,
        'Ship Qty': row.requestedQty ?? null,
      };
      if (options.withBuyer) {
        raw.Buyer = row.buyer ?? null;
      }
      return raw;
    }),
  };
}

export function demandRecord(rowIndex: number, overrides: Partial<DemandRecord> = {}): DemandRecord {
  return {
    rowIndex,
    jobNo: `J000${rowIndex}`,
    poNumber: `PO${rowIndex}`,
    styleRefNo: 'S1',
    color: 'RED',
    requestedQty: 10,
    raw: {},
    ...overrides,
  };
}
