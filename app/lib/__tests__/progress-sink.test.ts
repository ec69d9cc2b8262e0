import {
  combineProgressSinks,
  createLineProgressSink,
  createTelemetryProgressSink,
  formatProgressEvent,
  type ProgressEvent,
} from '../matching/progress-sink';
import type { TelemetryLogger } from '../telemetry';

function mockTelemetry() {
  return {
    logPassStart: vi.fn(),
    logPassComplete: vi.fn(),
    logDecision: vi.fn(),
    logSummary: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies TelemetryLogger;
}

describe('formatProgressEvent', () => {
  test('formats pass starts for both cascade modes', () => {
    expect(
      formatProgressEvent({ type: 'pass_start', passNumber: 1, mode: 'standard', strategy: 'PO-only', candidates: 3 })
    ).toBe('1. Matching by PO Number...');
    expect(
      formatProgressEvent({ type: 'pass_start', passNumber: 2, mode: 'buyer', strategy: 'Combined', candidates: 3 })
    ).toBe('2. [Buyer-specific] Matching by Style Ref + PO Number (combined)...');
  });

  test('formats progress, sweep and notices', () => {
    expect(formatProgressEvent({ type: 'progress', strategy: 'PO-only', processed: 500, total: 1200 })).toBe(
      '   500/1200 records checked'
    );
    expect(formatProgressEvent({ type: 'final_sweep', unresolved: 4 })).toBe('Marking 4 unmatched record(s)');
    expect(formatProgressEvent({ type: 'notice', message: 'heads up' })).toBe('Note: heads up');
  });

  test('pass completion has no line', () => {
    expect(formatProgressEvent({ type: 'pass_complete', passNumber: 1, strategy: 'PO-only', resolved: 2 })).toBeNull();
  });
});

describe('createLineProgressSink', () => {
  test('writes only events that have a line', () => {
    const lines: string[] = [];
    const sink = createLineProgressSink((line) => lines.push(line));

    sink.report({ type: 'pass_start', passNumber: 3, mode: 'standard', strategy: 'Style+Color', candidates: 1 });
    sink.report({ type: 'pass_complete', passNumber: 3, strategy: 'Style+Color', resolved: 1 });

    expect(lines).toEqual(['3. Matching by Style Ref + Color...']);
  });
});

describe('createTelemetryProgressSink', () => {
  test('routes each event to the structured log', () => {
    const telemetry = mockTelemetry();
    const sink = createTelemetryProgressSink(telemetry);

    sink.report({ type: 'pass_start', passNumber: 1, mode: 'buyer', strategy: 'PO+Job', candidates: 4 });
    sink.report({ type: 'pass_complete', passNumber: 1, strategy: 'PO+Job', resolved: 2 });
    sink.report({ type: 'final_sweep', unresolved: 1 });
    sink.report({ type: 'notice', message: 'no buyer column' });

    expect(telemetry.logPassStart).toHaveBeenCalledWith('PO+Job', { passNumber: 1, mode: 'buyer', candidates: 4 });
    expect(telemetry.logPassComplete).toHaveBeenCalledWith('PO+Job', { passNumber: 1, resolved: 2 });
    expect(telemetry.info).toHaveBeenCalledWith('Final sweep', { unresolved: 1 });
    expect(telemetry.warn).toHaveBeenCalledWith('no buyer column');
  });
});

describe('combineProgressSinks', () => {
  test('forwards every event to every sink', () => {
    const seenA: ProgressEvent[] = [];
    const seenB: ProgressEvent[] = [];
    const sink = combineProgressSinks({ report: (e) => seenA.push(e) }, { report: (e) => seenB.push(e) });

    const event: ProgressEvent = { type: 'final_sweep', unresolved: 0 };
    sink.report(event);

    expect(seenA).toEqual([event]);
    expect(seenB).toEqual([event]);
  });
});
