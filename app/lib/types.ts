/**
 * Type definitions for the Shipment Reconciliation System
 */

/** A single cell value as it comes out of a spreadsheet or CSV file. */
export type CellValue = string | number | boolean | Date | null;

/** Raw row keyed by the original column header. */
export type RawRow = Record<string, CellValue>;

/** Table as loaded from a file: ordered headers plus one object per data row. */
export interface TabularData {
  headers: string[];
  rows: RawRow[];
}

/** Numeric quantity; null when the cell was blank or not a number. */
export type Quantity = number | null;

export type BatchSide = 'supply' | 'demand';

export interface SupplyRecord {
  rowIndex: number;
  jobNo: string;
  poNumber: string;
  styleRefNo: string;
  color: string;
  availableQty: Quantity;
  buyer?: string;
}

export interface DemandRecord {
  rowIndex: number;
  jobNo: string;
  poNumber: string;
  styleRefNo: string;
  color: string;
  requestedQty: Quantity;
  buyer?: string;
  /** All original columns, kept for export. */
  raw: RawRow;
}

export interface SupplyBatch {
  records: SupplyRecord[];
}

export interface DemandBatch {
  headers: string[];
  records: DemandRecord[];
  hasBuyerColumn: boolean;
}

export type StrategyName = 'PO-only' | 'Job+PO' | 'PO+Job' | 'Combined' | 'Style+Color';

export const STRATEGY_NAMES: readonly StrategyName[] = [
  'PO-only',
  'Job+PO',
  'PO+Job',
  'Combined',
  'Style+Color',
] as const;

export interface StrategyDescriptor {
  /** Shown in progress lines ("Matching by ...") */
  description: string;
  /** Suffix for Ok / No Shipment statuses */
  matchLabel: string;
  /** Prefix inside the parentheses of a mismatch status */
  mismatchLabel: string;
}

export const STRATEGY_DESCRIPTORS: Record<StrategyName, StrategyDescriptor> = {
  'PO-only': {
    description: 'PO Number',
    matchLabel: 'PO Match',
    mismatchLabel: 'PO Match',
  },
  'Job+PO': {
    description: 'Job No (last4) + PO Number',
    matchLabel: 'Job+PO Match',
    mismatchLabel: 'Job+PO',
  },
  'PO+Job': {
    description: 'PO Number + Job No (last4)',
    matchLabel: 'PO+Job Match',
    mismatchLabel: 'PO+Job',
  },
  Combined: {
    description: 'Style Ref + PO Number (combined)',
    matchLabel: 'Combined Match',
    mismatchLabel: 'Combined',
  },
  'Style+Color': {
    description: 'Style Ref + Color',
    matchLabel: 'Style+Color Match',
    mismatchLabel: 'Style+Color',
  },
};

export type OutcomeLabel =
  | 'Ok'
  | 'NoShipment'
  | 'OverShipment'
  | 'LessShipment'
  | 'NoMatchFound'
  | 'NoMatchBuyer';

export const OUTCOME_LABELS: readonly OutcomeLabel[] = [
  'Ok',
  'NoShipment',
  'OverShipment',
  'LessShipment',
  'NoMatchFound',
  'NoMatchBuyer',
] as const;

export type ClassifiedOutcome =
  | { kind: 'Ok'; strategy: StrategyName }
  | { kind: 'NoShipment'; strategy: StrategyName }
  | {
      kind: 'OverShipment' | 'LessShipment';
      strategy: StrategyName;
      available: number;
      requested: number;
    };

export type Outcome = ClassifiedOutcome | { kind: 'NoMatchFound' } | { kind: 'NoMatchBuyer' };

export type MatchState =
  | { status: 'NotChecked' }
  | { status: 'Resolved'; outcome: Outcome };

export interface ReconciledRecord {
  record: DemandRecord;
  outcome: Outcome;
  /** Human-readable status, e.g. "Over Shipment (PO Match: 120 vs 150)" */
  status: string;
}

export type CascadeMode = 'standard' | 'buyer';

export interface StrategyPassMetrics {
  mode: CascadeMode;
  strategy: StrategyName;
  passNumber: number;
  candidates: number;
  resolved: number;
  processingTimeMs: number;
}

export interface MatchSummary {
  labelCounts: Record<OutcomeLabel, number>;
  strategyCounts: Record<StrategyName, number>;
  total: number;
}
