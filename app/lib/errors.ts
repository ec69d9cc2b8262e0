import type { BatchSide } from './types';

export type ReconciliationErrorCode =
  | 'MISSING_COLUMNS'
  | 'INVALID_CONFIGURATION'
  | 'FILE_PROCESSING'
  | 'OUTCOME_ALREADY_RESOLVED'
  | 'INCONSISTENT_SUMMARY'
  | 'UNEXPECTED_FAILURE';

export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;

  constructor(message: string, code: ReconciliationErrorCode = 'UNEXPECTED_FAILURE', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReconciliationError';
    this.code = code;
  }
}

const SIDE_NAMES: Record<BatchSide, string> = {
  supply: 'source batch',
  demand: 'target batch',
};

/**
 * Raised before any matching when either batch lacks required columns.
 * `missing` holds display names per side; both sides are reported together.
 */
export class MissingColumnsError extends ReconciliationError {
  readonly missing: Record<BatchSide, string[]>;

  constructor(missing: Record<BatchSide, string[]>) {
    const sides: BatchSide[] = ['supply', 'demand'];
    const parts = sides
      .filter((side) => missing[side].length > 0)
      .map((side) => `${SIDE_NAMES[side]}: ${missing[side].join(', ')}`);

    super(`Missing required columns in ${parts.join('; ')}`, 'MISSING_COLUMNS');
    this.name = 'MissingColumnsError';
    this.missing = missing;
  }
}

export class ConfigurationError extends ReconciliationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid reconciliation config: ${issues.join('; ')}`, 'INVALID_CONFIGURATION');
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class FileProcessingError extends ReconciliationError {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, 'FILE_PROCESSING', options);
    this.name = 'FileProcessingError';
    this.filePath = filePath;
  }
}

export class OutcomeAlreadyResolvedError extends ReconciliationError {
  readonly rowIndex: number;

  constructor(rowIndex: number) {
    super(`Outcome for target row ${rowIndex} is already resolved`, 'OUTCOME_ALREADY_RESOLVED');
    this.name = 'OutcomeAlreadyResolvedError';
    this.rowIndex = rowIndex;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
