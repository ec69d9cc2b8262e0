/**
 * Shipment Reconciliation Engine
 *
 * Runs the full pipeline for one pair of batches:
 * - Normalize: canonical columns, required-column check (fatal)
 * - Index: per-strategy supply key → aggregated quantity
 * - Match: buyer-specific cascade for flagged buyers, standard cascade for the rest
 * - Sweep: leftovers → NoMatchFound
 * - Summarize: label and strategy counts
 *
 * The engine holds no state between runs.
 */

import { normalizeBatches } from './batch-normalizer';
import { ReconciliationError, errorMessage } from './errors';
import {
  DEFAULT_RECONCILIATION_CONFIG,
  describeReconciliationConfig,
  type ReconciliationConfig,
} from './matching-config';
import { normalizeIdentity } from './normalization';
import { CascadeMatcher, type CascadePlan, type MatchStrategy } from './matching/cascade-matcher';
import { SupplyIndexes } from './matching/key-aggregator';
import { assertSummaryConsistent, summarizeOutcomes } from './matching/match-summary';
import { NOOP_PROGRESS_SINK, type ProgressSink } from './matching/progress-sink';
import type { TelemetryLogger } from './telemetry';
import type {
  DemandBatch,
  MatchSummary,
  RawRow,
  ReconciledRecord,
  StrategyName,
  StrategyPassMetrics,
  SupplyBatch,
  TabularData,
} from './types';

export const STANDARD_STRATEGIES: readonly StrategyName[] = ['PO-only', 'Job+PO', 'Style+Color'];
export const BUYER_STRATEGIES: readonly StrategyName[] = ['PO+Job', 'Combined'];

export const STATUS_COLUMN = 'Status';

export interface ReconcileOptions {
  progressSink?: ProgressSink;
  telemetry?: TelemetryLogger;
}

export interface ReconciliationInput {
  supply: TabularData;
  demand: TabularData;
}

export interface ReconciliationResult {
  records: ReconciledRecord[];
  summary: MatchSummary;
  metrics: StrategyPassMetrics[];
  buyerSpecificApplied: boolean;
  notices: string[];
}

export type ReconciliationRun =
  | { success: true; result: ReconciliationResult }
  | { success: false; error: ReconciliationError };

function strategiesFor(names: readonly StrategyName[], indexes: SupplyIndexes): MatchStrategy[] {
  return names.map((name): MatchStrategy => ({
    name,
    lookup: (record) => indexes.lookup(name, record),
  }));
}

/**
 * Match already-normalized batches.
 */
export function reconcileBatches(
  supply: SupplyBatch,
  demand: DemandBatch,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const sink = options.progressSink ?? NOOP_PROGRESS_SINK;
  const telemetry = options.telemetry;
  const notices: string[] = [];

  telemetry?.info('Starting reconciliation', {
    supplyRecords: supply.records.length,
    demandRecords: demand.records.length,
    config: describeReconciliationConfig(config),
  });

  const buyerSpecificApplied = config.buyerSpecific && demand.hasBuyerColumn;
  if (config.buyerSpecific && !demand.hasBuyerColumn) {
    const notice = 'Buyer-specific matching requested but the target batch has no Buyer column; using standard matching for all records';
    notices.push(notice);
    sink.report({ type: 'notice', message: notice });
  }

  const flaggedBuyers = new Set(config.flaggedBuyers.map((buyer) => normalizeIdentity(buyer)));
  const isFlagged = (buyer: string | undefined) =>
    buyerSpecificApplied && buyer !== undefined && flaggedBuyers.has(buyer);

  const strategyNames = buyerSpecificApplied
    ? [...BUYER_STRATEGIES, ...STANDARD_STRATEGIES]
    : [...STANDARD_STRATEGIES];
  const indexes = new SupplyIndexes(supply.records, strategyNames, config.combinePoIn);

  telemetry?.logDecision('Built supply indexes', {
    indexes: Object.fromEntries(indexes.strategies().map((name) => [name, indexes.indexStats(name)])),
  });

  const matcher = new CascadeMatcher(demand.records, {
    progressSink: sink,
    progressInterval: config.progressInterval,
  });

  const plans: CascadePlan[] = [];
  if (buyerSpecificApplied) {
    plans.push({
      mode: 'buyer',
      strategies: strategiesFor(BUYER_STRATEGIES, indexes),
      appliesTo: (record) => isFlagged(record.buyer),
      exhaustedOutcome: { kind: 'NoMatchBuyer' },
    });
  }
  plans.push({
    mode: 'standard',
    strategies: strategiesFor(STANDARD_STRATEGIES, indexes),
    appliesTo: (record) => !isFlagged(record.buyer),
  });

  for (const plan of plans) {
    matcher.runPlan(plan);
  }
  matcher.finalSweep();

  const records = matcher.results();
  const summary = summarizeOutcomes(records.map((r) => r.outcome));
  assertSummaryConsistent(summary);

  telemetry?.logSummary('Reconciliation complete', {
    total: summary.total,
    labels: summary.labelCounts,
    strategies: summary.strategyCounts,
  });

  return {
    records,
    summary,
    metrics: matcher.passMetrics(),
    buyerSpecificApplied,
    notices,
  };
}

/**
 * Normalize raw tables, then match. Throws MissingColumnsError before any
 * matching when either table lacks required columns.
 */
export function reconcile(
  input: ReconciliationInput,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const { supply, demand } = normalizeBatches(input.supply, input.demand);
  return reconcileBatches(supply, demand, config, options);
}

/**
 * Same as reconcile() but never throws: every failure comes back as a
 * single typed error and no partial result is returned.
 */
export function runReconciliation(
  input: ReconciliationInput,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG,
  options: ReconcileOptions = {}
): ReconciliationRun {
  try {
    return { success: true, result: reconcile(input, config, options) };
  } catch (error) {
    const failure =
      error instanceof ReconciliationError
        ? error
        : new ReconciliationError(`Error during processing: ${errorMessage(error)}`, 'UNEXPECTED_FAILURE', {
            cause: error,
          });

    options.telemetry?.error('Reconciliation failed', { code: failure.code, error: failure.message });
    return { success: false, error: failure };
  }
}

/**
 * Original target rows plus the status column, ready for export.
 */
export function annotateRows(records: ReconciledRecord[]): RawRow[] {
  return records.map(({ record, status }) => ({ ...record.raw, [STATUS_COLUMN]: status }));
}

export function annotatedHeaders(headers: string[]): string[] {
  return headers.includes(STATUS_COLUMN) ? [...headers] : [...headers, STATUS_COLUMN];
}
