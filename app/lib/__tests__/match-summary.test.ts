import {
  assertSummaryConsistent,
  computeDetailedStats,
  isSummaryConsistent,
  renderSummaryReport,
  summarizeOutcomes,
} from '../matching/match-summary';
import { ReconciliationError } from '../errors';
import type { Outcome, ReconciledRecord } from '../types';
import { demandRecord } from './fixtures';

const outcomes: Outcome[] = [
  { kind: 'Ok', strategy: 'PO-only' },
  { kind: 'Ok', strategy: 'Style+Color' },
  { kind: 'LessShipment', strategy: 'PO-only', available: 80, requested: 50 },
  { kind: 'OverShipment', strategy: 'Combined', available: 10, requested: 30 },
  { kind: 'NoShipment', strategy: 'PO-only' },
  { kind: 'NoMatchFound' },
  { kind: 'NoMatchBuyer' },
];

describe('summarizeOutcomes', () => {
  test('counts labels and strategies', () => {
    const summary = summarizeOutcomes(outcomes);

    expect(summary.total).toBe(7);
    expect(summary.labelCounts).toEqual({
      Ok: 2,
      NoShipment: 1,
      OverShipment: 1,
      LessShipment: 1,
      NoMatchFound: 1,
      NoMatchBuyer: 1,
    });
    expect(summary.strategyCounts).toEqual({
      'PO-only': 3,
      'Job+PO': 0,
      'PO+Job': 0,
      Combined: 1,
      'Style+Color': 1,
    });
    expect(isSummaryConsistent(summary)).toBe(true);
  });

  test('an empty batch sums to zero', () => {
    const summary = summarizeOutcomes([]);
    expect(summary.total).toBe(0);
    expect(isSummaryConsistent(summary)).toBe(true);
  });

  test('detects counts that do not add up', () => {
    const summary = summarizeOutcomes(outcomes);
    expect(isSummaryConsistent({ ...summary, total: 8 })).toBe(false);
  });

  test('assertSummaryConsistent rejects counts that do not add up', () => {
    const summary = summarizeOutcomes(outcomes);

    expect(() => assertSummaryConsistent(summary)).not.toThrow();
    expect(() => assertSummaryConsistent({ ...summary, total: 8 })).toThrow(ReconciliationError);
    expect(() => assertSummaryConsistent({ ...summary, total: 8 })).toThrow(
      'Outcome counts do not add up to 8 target records'
    );
  });
});

describe('renderSummaryReport', () => {
  test('lists label counts and the strategies used', () => {
    expect(renderSummaryReport(summarizeOutcomes(outcomes))).toBe(
      [
        '=== Matching Summary ===',
        'Perfect Matches: 2',
        'Less Shipment Cases: 1',
        'Over Shipment Cases: 1',
        'No Shipment Cases: 1',
        'No Matches Found: 1',
        'Buyer-Specific No Matches: 1',
        'Total Records Processed: 7',
        '',
        '=== Matches by Strategy ===',
        'PO-only: 3',
        'Combined: 1',
        'Style+Color: 1',
      ].join('\n')
    );
  });

  test('omits buyer and strategy sections when empty', () => {
    expect(renderSummaryReport(summarizeOutcomes([{ kind: 'NoMatchFound' }]))).toBe(
      [
        '=== Matching Summary ===',
        'Perfect Matches: 0',
        'Less Shipment Cases: 0',
        'Over Shipment Cases: 0',
        'No Shipment Cases: 0',
        'No Matches Found: 1',
        'Total Records Processed: 1',
      ].join('\n')
    );
  });
});

describe('computeDetailedStats', () => {
  test('groups mismatches and no-matches', () => {
    const records: ReconciledRecord[] = outcomes.map((outcome, index) => ({
      record: demandRecord(index),
      outcome,
      status: '',
    }));

    expect(computeDetailedStats(records)).toEqual({
      totalRecords: 7,
      perfectMatches: 2,
      quantityMismatches: 2,
      noMatches: 2,
    });
  });
});
