/**
 * Summary Aggregator
 *
 * Label counts always add up to the number of target records.
 */

import { ReconciliationError } from '../errors';
import {
  OUTCOME_LABELS,
  STRATEGY_NAMES,
  type MatchSummary,
  type Outcome,
  type OutcomeLabel,
  type ReconciledRecord,
  type StrategyName,
} from '../types';

function emptyLabelCounts(): Record<OutcomeLabel, number> {
  return {
    Ok: 0,
    NoShipment: 0,
    OverShipment: 0,
    LessShipment: 0,
    NoMatchFound: 0,
    NoMatchBuyer: 0,
  };
}

function emptyStrategyCounts(): Record<StrategyName, number> {
  return {
    'PO-only': 0,
    'Job+PO': 0,
    'PO+Job': 0,
    Combined: 0,
    'Style+Color': 0,
  };
}

export function summarizeOutcomes(outcomes: Outcome[]): MatchSummary {
  const labelCounts = emptyLabelCounts();
  const strategyCounts = emptyStrategyCounts();

  for (const outcome of outcomes) {
    labelCounts[outcome.kind] += 1;
    if ('strategy' in outcome) {
      strategyCounts[outcome.strategy] += 1;
    }
  }

  return { labelCounts, strategyCounts, total: outcomes.length };
}

export function perfectMatches(summary: MatchSummary): number {
  return summary.labelCounts.Ok;
}

/**
 * Text report for the console / results pane.
 */
export function renderSummaryReport(summary: MatchSummary): string {
  const { labelCounts } = summary;
  const lines = [
    '=== Matching Summary ===',
    `Perfect Matches: ${perfectMatches(summary)}`,
    `Less Shipment Cases: ${labelCounts.LessShipment}`,
    `Over Shipment Cases: ${labelCounts.OverShipment}`,
    `No Shipment Cases: ${labelCounts.NoShipment}`,
    `No Matches Found: ${labelCounts.NoMatchFound}`,
  ];

  if (labelCounts.NoMatchBuyer > 0) {
    lines.push(`Buyer-Specific No Matches: ${labelCounts.NoMatchBuyer}`);
  }
  lines.push(`Total Records Processed: ${summary.total}`);

  const usedStrategies = STRATEGY_NAMES.filter((name) => summary.strategyCounts[name] > 0);
  if (usedStrategies.length > 0) {
    lines.push('', '=== Matches by Strategy ===');
    for (const name of usedStrategies) {
      lines.push(`${name}: ${summary.strategyCounts[name]}`);
    }
  }

  return lines.join('\n');
}

export interface DetailedStats {
  totalRecords: number;
  perfectMatches: number;
  quantityMismatches: number;
  noMatches: number;
}

/**
 * Detailed statistics computed from the annotated records themselves.
 */
export function computeDetailedStats(records: ReconciledRecord[]): DetailedStats {
  const count = (...kinds: OutcomeLabel[]) =>
    records.filter((r) => kinds.includes(r.outcome.kind)).length;

  return {
    totalRecords: records.length,
    perfectMatches: count('Ok'),
    quantityMismatches: count('OverShipment', 'LessShipment'),
    noMatches: count('NoMatchFound', 'NoMatchBuyer'),
  };
}

export function isSummaryConsistent(summary: MatchSummary): boolean {
  const sum = OUTCOME_LABELS.reduce((acc, label) => acc + summary.labelCounts[label], 0);
  return sum === summary.total;
}

export function assertSummaryConsistent(summary: MatchSummary): void {
  if (!isSummaryConsistent(summary)) {
    throw new ReconciliationError(
      `Outcome counts do not add up to ${summary.total} target records`,
      'INCONSISTENT_SUMMARY'
    );
  }
}
