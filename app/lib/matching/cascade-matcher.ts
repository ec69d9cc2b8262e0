/**
 * Cascade Matcher
 *
 * Every target record starts NotChecked. A plan is an ordered list of
 * strategies applied to a subset of records; each strategy is one pass over
 * the full record list that only looks at records still NotChecked. The
 * first strategy that finds supply resolves the record and nothing after it
 * may touch that record again.
 *
 * After all plans run, a single sweep marks the leftovers NoMatchFound.
 */

import { OutcomeAlreadyResolvedError } from '../errors';
import type {
  CascadeMode,
  DemandRecord,
  MatchState,
  Outcome,
  ReconciledRecord,
  StrategyName,
  StrategyPassMetrics,
} from '../types';
import type { AggregatedSupply } from './key-aggregator';
import { NOOP_PROGRESS_SINK, type ProgressSink } from './progress-sink';
import { classifyQuantity, formatOutcomeStatus } from './quantity-classifier';

export interface MatchStrategy {
  name: StrategyName;
  lookup(record: DemandRecord): AggregatedSupply | undefined;
}

export interface CascadePlan {
  mode: CascadeMode;
  strategies: MatchStrategy[];
  appliesTo(record: DemandRecord): boolean;
  /** Assigned to records of this plan that no strategy resolved */
  exhaustedOutcome?: Outcome;
}

export interface CascadeMatcherOptions {
  progressSink?: ProgressSink;
  /** Emit a progress event every N records visited within a pass */
  progressInterval?: number;
}

interface Entry {
  record: DemandRecord;
  state: MatchState;
}

export class CascadeMatcher {
  private readonly entries: Entry[];
  private readonly sink: ProgressSink;
  private readonly progressInterval: number;
  private readonly metrics: StrategyPassMetrics[] = [];
  private passNumber = 0;
  private swept = false;

  constructor(records: DemandRecord[], options: CascadeMatcherOptions = {}) {
    this.entries = records.map((record): Entry => ({ record, state: { status: 'NotChecked' } }));
    this.sink = options.progressSink ?? NOOP_PROGRESS_SINK;
    this.progressInterval = options.progressInterval ?? 500;
  }

  /**
   * Resolve a record. Throws if the record already carries an outcome.
   */
  private resolve(entry: Entry, outcome: Outcome): void {
    if (entry.state.status === 'Resolved') {
      throw new OutcomeAlreadyResolvedError(entry.record.rowIndex);
    }
    entry.state = { status: 'Resolved', outcome };
  }

  private isEligible(entry: Entry, plan: CascadePlan): boolean {
    return entry.state.status === 'NotChecked' && plan.appliesTo(entry.record);
  }

  private runPass(plan: CascadePlan, strategy: MatchStrategy): StrategyPassMetrics {
    const startTime = Date.now();
    const passNumber = ++this.passNumber;
    const candidates = this.entries.filter((entry) => this.isEligible(entry, plan)).length;

    this.sink.report({ type: 'pass_start', passNumber, mode: plan.mode, strategy: strategy.name, candidates });

    let processed = 0;
    let resolved = 0;

    for (const entry of this.entries) {
      if (!this.isEligible(entry, plan)) continue;

      const supply = strategy.lookup(entry.record);
      if (supply) {
        this.resolve(entry, classifyQuantity(supply.totalQty, entry.record.requestedQty, strategy.name));
        resolved += 1;
      }

      processed += 1;
      if (processed % this.progressInterval === 0) {
        this.sink.report({ type: 'progress', strategy: strategy.name, processed, total: candidates });
      }
    }

    this.sink.report({ type: 'pass_complete', passNumber, strategy: strategy.name, resolved });

    return {
      mode: plan.mode,
      strategy: strategy.name,
      passNumber,
      candidates,
      resolved,
      processingTimeMs: Date.now() - startTime,
    };
  }

  runPlan(plan: CascadePlan): StrategyPassMetrics[] {
    if (this.swept) {
      throw new Error('Cannot run a matching plan after the final sweep');
    }

    const planMetrics = plan.strategies.map((strategy) => this.runPass(plan, strategy));

    const { exhaustedOutcome } = plan;
    if (exhaustedOutcome) {
      for (const entry of this.entries) {
        if (this.isEligible(entry, plan)) {
          this.resolve(entry, exhaustedOutcome);
        }
      }
    }

    this.metrics.push(...planMetrics);
    return planMetrics;
  }

  /**
   * Mark every record still NotChecked as NoMatchFound. Runs once.
   */
  finalSweep(): number {
    if (this.swept) return 0;
    this.swept = true;

    const unresolved = this.entries.filter((entry) => entry.state.status === 'NotChecked');
    this.sink.report({ type: 'final_sweep', unresolved: unresolved.length });

    for (const entry of unresolved) {
      this.resolve(entry, { kind: 'NoMatchFound' });
    }
    return unresolved.length;
  }

  stateOf(rowIndex: number): MatchState | undefined {
    return this.entries.find((entry) => entry.record.rowIndex === rowIndex)?.state;
  }

  passMetrics(): StrategyPassMetrics[] {
    return [...this.metrics];
  }

  /**
   * Reconciled records in input order. Only valid after finalSweep().
   */
  results(): ReconciledRecord[] {
    if (!this.swept) {
      throw new Error('Results requested before the final sweep');
    }

    return this.entries.map(({ record, state }) => {
      if (state.status !== 'Resolved') {
        throw new Error(`Target row ${record.rowIndex} left unresolved`);
      }
      return { record, outcome: state.outcome, status: formatOutcomeStatus(state.outcome) };
    });
  }
}
