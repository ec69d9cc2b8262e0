/**
 * Progress reporting for matching runs.
 *
 * The matcher never owns presentation state; it reports events to whatever
 * sink the caller injects. Sinks are observational only.
 */

import type { TelemetryLogger } from '../telemetry';
import { STRATEGY_DESCRIPTORS, type CascadeMode, type StrategyName } from '../types';

export type ProgressEvent =
  | { type: 'pass_start'; passNumber: number; mode: CascadeMode; strategy: StrategyName; candidates: number }
  | { type: 'progress'; strategy: StrategyName; processed: number; total: number }
  | { type: 'pass_complete'; passNumber: number; strategy: StrategyName; resolved: number }
  | { type: 'final_sweep'; unresolved: number }
  | { type: 'notice'; message: string };

export interface ProgressSink {
  report(event: ProgressEvent): void;
}

export const NOOP_PROGRESS_SINK: ProgressSink = {
  report() {},
};

/**
 * Render an event as a single console/status line.
 * Returns null for events a line-oriented view does not show.
 */
export function formatProgressEvent(event: ProgressEvent): string | null {
  switch (event.type) {
    case 'pass_start': {
      const prefix = event.mode === 'buyer' ? '[Buyer-specific] ' : '';
      return `${event.passNumber}. ${prefix}Matching by ${STRATEGY_DESCRIPTORS[event.strategy].description}...`;
    }
    case 'progress':
      return `   ${event.processed}/${event.total} records checked`;
    case 'pass_complete':
      return null;
    case 'final_sweep':
      return `Marking ${event.unresolved} unmatched record(s)`;
    case 'notice':
      return `Note: ${event.message}`;
  }
}

/**
 * Sink that writes formatted lines, e.g. to stdout or a status widget.
 */
export function createLineProgressSink(writeLine: (line: string) => void): ProgressSink {
  return {
    report(event) {
      const line = formatProgressEvent(event);
      if (line !== null) {
        writeLine(line);
      }
    },
  };
}

/**
 * Sink that forwards events to the structured log.
 */
export function createTelemetryProgressSink(telemetry: TelemetryLogger): ProgressSink {
  return {
    report(event) {
      switch (event.type) {
        case 'pass_start':
          telemetry.logPassStart(event.strategy, {
            passNumber: event.passNumber,
            mode: event.mode,
            candidates: event.candidates,
          });
          break;
        case 'pass_complete':
          telemetry.logPassComplete(event.strategy, {
            passNumber: event.passNumber,
            resolved: event.resolved,
          });
          break;
        case 'progress':
          telemetry.logDecision('Pass progress', { ...event });
          break;
        case 'final_sweep':
          telemetry.info('Final sweep', { unresolved: event.unresolved });
          break;
        case 'notice':
          telemetry.warn(event.message);
          break;
      }
    },
  };
}

/**
 * Fan one event out to several sinks.
 */
export function combineProgressSinks(...sinks: ProgressSink[]): ProgressSink {
  return {
    report(event) {
      for (const sink of sinks) {
        sink.report(event);
      }
    },
  };
}
