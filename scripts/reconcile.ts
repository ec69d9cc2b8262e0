#!/usr/bin/env node
/**
 * Reconcile a source (supply) workbook against a target (shipment) workbook
 * and save the target rows annotated with a Status column.
 *
 * Usage:
 *   npx tsx scripts/reconcile.ts <source> <target> [options]
 *
 * Options:
 *   --out <file>                  .xlsx or .csv (default: <target>-reconciled.xlsx)
 *   --buyer-specific              enable buyer-specific matching
 *   --combine-po-in source|target side on which StyleRefNo-PO is built
 *   --buyers A,B                  flagged buyer names
 *   --verbose | --quiet           log level debug | silent
 */

import path from 'path';

import { errorMessage } from '../app/lib/errors';
import { loadReconciliationConfig, type ReconciliationConfig } from '../app/lib/matching-config';
import { annotateRows, annotatedHeaders, runReconciliation } from '../app/lib/matching-engine';
import { computeDetailedStats, renderSummaryReport } from '../app/lib/matching/match-summary';
import {
  combineProgressSinks,
  createLineProgressSink,
  createTelemetryProgressSink,
} from '../app/lib/matching/progress-sink';
import { createTelemetryLogger, setLogLevel } from '../app/lib/telemetry';
import { readTabularFile, writeReconciliationResult } from '../app/lib/utils/fileProcessing';

const USAGE = 'Usage: npx tsx scripts/reconcile.ts <source> <target> [--out file] [--buyer-specific] [--combine-po-in source|target] [--buyers A,B]';

interface CliArgs {
  sourceFile: string;
  targetFile: string;
  outFile: string;
  overrides: Partial<ReconciliationConfig>;
  verbose: boolean;
  quiet: boolean;
}

function defaultOutputPath(targetFile: string): string {
  const parsed = path.parse(targetFile);
  return path.join(parsed.dir, `${parsed.name}-reconciled.xlsx`);
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const overrides: Partial<ReconciliationConfig> = {};
  let outFile: string | undefined;
  let verbose = false;
  let quiet = false;

  const valueAfter = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--out':
        outFile = valueAfter(i, arg);
        i++;
        break;
      case '--buyer-specific':
        overrides.buyerSpecific = true;
        break;
      case '--combine-po-in': {
        const side = valueAfter(i, arg).toLowerCase();
        if (side !== 'source' && side !== 'target') {
          throw new Error('--combine-po-in must be "source" or "target"');
        }
        overrides.combinePoIn = side;
        i++;
        break;
      }
      case '--buyers':
        overrides.flaggedBuyers = valueAfter(i, arg)
          .split(',')
          .map((buyer) => buyer.trim())
          .filter((buyer) => buyer.length > 0);
        i++;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--quiet':
        quiet = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [sourceFile, targetFile] = positional;
  if (!sourceFile || !targetFile || positional.length > 2) {
    throw new Error('Expected exactly two files: <source> <target>');
  }

  return {
    sourceFile,
    targetFile,
    outFile: outFile ?? defaultOutputPath(targetFile),
    overrides,
    verbose,
    quiet,
  };
}

async function run() {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    process.exit(1);
  }

  if (args.quiet) setLogLevel('silent');
  else if (args.verbose) setLogLevel('debug');

  const telemetry = createTelemetryLogger('reconcile-cli', {
    runId: `reconcile-${Date.now()}`,
    sourceFile: args.sourceFile,
    targetFile: args.targetFile,
  });

  const config = loadReconciliationConfig(args.overrides);

  console.log(`Source: ${args.sourceFile}`);
  console.log(`Target: ${args.targetFile}`);

  const supply = readTabularFile(args.sourceFile);
  const demand = readTabularFile(args.targetFile);
  telemetry.info('Loaded input files', { supplyRows: supply.rows.length, demandRows: demand.rows.length });

  const outcome = runReconciliation({ supply, demand }, config, {
    telemetry,
    progressSink: combineProgressSinks(
      createLineProgressSink((line) => console.log(line)),
      createTelemetryProgressSink(telemetry)
    ),
  });

  if (!outcome.success) {
    console.error(`\nERROR: ${outcome.error.message}`);
    process.exit(1);
  }

  const { result } = outcome;
  console.log(`\n${renderSummaryReport(result.summary)}`);

  const stats = computeDetailedStats(result.records);
  console.log('\n=== Detailed Statistics ===');
  console.log(`Total Records: ${stats.totalRecords}`);
  console.log(`Perfect Matches: ${stats.perfectMatches}`);
  console.log(`Quantity Mismatches: ${stats.quantityMismatches}`);
  console.log(`No Matches: ${stats.noMatches}`);

  writeReconciliationResult(args.outFile, annotatedHeaders(demand.headers), annotateRows(result.records));
  console.log(`\nFile saved successfully at:\n${args.outFile}`);
}

run().catch((err) => {
  console.error('Reconciliation failed:', errorMessage(err));
  process.exit(1);
});
