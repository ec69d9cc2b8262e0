/**
 * Key Aggregator
 *
 * Builds one lookup index per matching strategy before any record is matched:
 * composite key → total available quantity across every supply row sharing
 * that key. Indexes are read-only once built.
 *
 * A key missing from an index means "no supply found by this strategy".
 * A key present with a zero total means "supply found, nothing available".
 * The two are never merged.
 */

import type { CombinePoSide } from '../matching-config';
import { combinedKey, compositeKey, jobLast4 } from '../normalization';
import type { DemandRecord, StrategyName, SupplyRecord } from '../types';

export interface AggregatedSupply {
  key: string;
  /** Sum of availableQty; blank quantities count as 0 */
  totalQty: number;
  /** Supply rows sharing the key */
  rowCount: number;
  /** Rows that carried a numeric quantity */
  quantifiedRows: number;
}

/** The identity fields every key is built from. */
export type KeyFields = Pick<SupplyRecord, 'jobNo' | 'poNumber' | 'styleRefNo' | 'color'>;

export type KeyBuilder = (record: KeyFields) => string | null;

export interface StrategyKeys {
  supply: KeyBuilder;
  demand: KeyBuilder;
}

const poOnly: KeyBuilder = (r) => compositeKey(r.poNumber);
const jobThenPo: KeyBuilder = (r) => compositeKey(jobLast4(r.jobNo), r.poNumber);
const poThenJob: KeyBuilder = (r) => compositeKey(r.poNumber, jobLast4(r.jobNo));
const styleColor: KeyBuilder = (r) => compositeKey(r.styleRefNo, r.color);
const styleWithPo: KeyBuilder = (r) => combinedKey(r.styleRefNo, r.poNumber);

/**
 * Key builders per strategy. For the combined strategy the style-PO key is
 * computed on the configured side and compared against the other side's
 * plain PO number.
 */
export function createStrategyKeys(combinePoIn: CombinePoSide): Record<StrategyName, StrategyKeys> {
  return {
    'PO-only': { supply: poOnly, demand: poOnly },
    'Job+PO': { supply: jobThenPo, demand: jobThenPo },
    'PO+Job': { supply: poThenJob, demand: poThenJob },
    Combined:
      combinePoIn === 'source'
        ? { supply: styleWithPo, demand: poOnly }
        : { supply: poOnly, demand: styleWithPo },
    'Style+Color': { supply: styleColor, demand: styleColor },
  };
}

/**
 * Group supply rows by key and sum their quantities.
 */
export function buildKeyIndex(records: SupplyRecord[], keyOf: KeyBuilder): Map<string, AggregatedSupply> {
  const index = new Map<string, AggregatedSupply>();

  for (const record of records) {
    const key = keyOf(record);
    if (key === null) continue;

    let entry = index.get(key);
    if (!entry) {
      entry = { key, totalQty: 0, rowCount: 0, quantifiedRows: 0 };
      index.set(key, entry);
    }

    entry.rowCount += 1;
    if (record.availableQty !== null) {
      entry.totalQty += record.availableQty;
      entry.quantifiedRows += 1;
    }
  }

  return index;
}

export interface IndexStats {
  keys: number;
  rows: number;
  quantifiedRows: number;
}

export class SupplyIndexes {
  private readonly indexes = new Map<StrategyName, ReadonlyMap<string, AggregatedSupply>>();
  private readonly keys: Record<StrategyName, StrategyKeys>;

  constructor(supply: SupplyRecord[], strategies: readonly StrategyName[], combinePoIn: CombinePoSide) {
    this.keys = createStrategyKeys(combinePoIn);
    for (const strategy of strategies) {
      if (!this.indexes.has(strategy)) {
        this.indexes.set(strategy, buildKeyIndex(supply, this.keys[strategy].supply));
      }
    }
  }

  demandKey(strategy: StrategyName, record: DemandRecord): string | null {
    return this.keys[strategy].demand(record);
  }

  /**
   * Aggregated supply for this record under the given strategy, or
   * undefined when the strategy finds no supply at all.
   */
  lookup(strategy: StrategyName, record: DemandRecord): AggregatedSupply | undefined {
    const index = this.indexes.get(strategy);
    if (!index) {
      throw new Error(`No supply index built for strategy ${strategy}`);
    }
    const key = this.demandKey(strategy, record);
    return key === null ? undefined : index.get(key);
  }

  /**
   * Keys, supply rows and rows carrying a quantity for one strategy's index.
   */
  indexStats(strategy: StrategyName): IndexStats {
    const stats: IndexStats = { keys: 0, rows: 0, quantifiedRows: 0 };
    for (const entry of this.indexes.get(strategy)?.values() ?? []) {
      stats.keys += 1;
      stats.rows += entry.rowCount;
      stats.quantifiedRows += entry.quantifiedRows;
    }
    return stats;
  }

  strategies(): StrategyName[] {
    return [...this.indexes.keys()];
  }
}
