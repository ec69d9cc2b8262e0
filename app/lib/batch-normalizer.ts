/**
 * Turns raw tables into normalized supply and demand batches.
 *
 * Both batches are validated before either is converted, so a
 * MissingColumnsError always reports every problem at once.
 */

import {
  getMissingFieldNames,
  resolveColumnMapping,
  validateRequiredColumns,
  type RecordField,
} from './column-mapping-resolver';
import { MissingColumnsError } from './errors';
import { normalizeIdentity, parseQuantity } from './normalization';
import type {
  CellValue,
  DemandBatch,
  DemandRecord,
  RawRow,
  SupplyBatch,
  SupplyRecord,
  TabularData,
} from './types';

export interface NormalizedBatches {
  supply: SupplyBatch;
  demand: DemandBatch;
}

function cell(row: RawRow, mapping: Map<RecordField, string>, field: RecordField): CellValue | undefined {
  const header = mapping.get(field);
  return header === undefined ? undefined : row[header];
}

function normalizeSupplyRow(row: RawRow, rowIndex: number, mapping: Map<RecordField, string>): SupplyRecord {
  const record: SupplyRecord = {
    rowIndex,
    jobNo: normalizeIdentity(cell(row, mapping, 'jobNo')),
    poNumber: normalizeIdentity(cell(row, mapping, 'poNumber')),
    styleRefNo: normalizeIdentity(cell(row, mapping, 'styleRefNo')),
    color: normalizeIdentity(cell(row, mapping, 'color')),
    availableQty: parseQuantity(cell(row, mapping, 'availableQty')),
  };
  if (mapping.has('buyer')) {
    record.buyer = normalizeIdentity(cell(row, mapping, 'buyer'));
  }
  return record;
}

function normalizeDemandRow(row: RawRow, rowIndex: number, mapping: Map<RecordField, string>): DemandRecord {
  const record: DemandRecord = {
    rowIndex,
    jobNo: normalizeIdentity(cell(row, mapping, 'jobNo')),
    poNumber: normalizeIdentity(cell(row, mapping, 'poNumber')),
    styleRefNo: normalizeIdentity(cell(row, mapping, 'styleRefNo')),
    color: normalizeIdentity(cell(row, mapping, 'color')),
    requestedQty: parseQuantity(cell(row, mapping, 'requestedQty')),
    raw: row,
  };
  if (mapping.has('buyer')) {
    record.buyer = normalizeIdentity(cell(row, mapping, 'buyer'));
  }
  return record;
}

export function normalizeBatches(supply: TabularData, demand: TabularData): NormalizedBatches {
  const supplyMapping = resolveColumnMapping(supply.headers, 'supply');
  const demandMapping = resolveColumnMapping(demand.headers, 'demand');

  const supplyCheck = validateRequiredColumns('supply', supplyMapping);
  const demandCheck = validateRequiredColumns('demand', demandMapping);

  if (!supplyCheck.valid || !demandCheck.valid) {
    throw new MissingColumnsError({
      supply: getMissingFieldNames(supplyCheck.missing),
      demand: getMissingFieldNames(demandCheck.missing),
    });
  }

  return {
    supply: {
      records: supply.rows.map((row, index) => normalizeSupplyRow(row, index, supplyMapping)),
    },
    demand: {
      headers: demand.headers,
      records: demand.rows.map((row, index) => normalizeDemandRow(row, index, demandMapping)),
      hasBuyerColumn: demandMapping.has('buyer'),
    },
  };
}
