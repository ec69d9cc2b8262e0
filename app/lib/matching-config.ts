import { z } from 'zod';
import { ConfigurationError } from './errors';

const booleanFromEnv = (key: string, defaultValue: boolean) => {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const numberFromEnv = (key: string, defaultValue: number) => {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
};

const listFromEnv = (key: string, defaultValue: string[]) => {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

export const reconciliationConfigSchema = z.object({
  buyerSpecific: z.boolean(),
  combinePoIn: z.enum(['source', 'target']),
  flaggedBuyers: z.array(z.string().trim().min(1)),
  progressInterval: z.number().int().positive(),
});

export type ReconciliationConfig = z.infer<typeof reconciliationConfigSchema>;
export type CombinePoSide = ReconciliationConfig['combinePoIn'];

const DEFAULT_RECONCILIATION_CONFIG: ReconciliationConfig = {
  buyerSpecific: false,
  combinePoIn: 'source',
  flaggedBuyers: [],
  progressInterval: 500,
};

/**
 * Validate an arbitrary config object. Throws ConfigurationError listing
 * every invalid field.
 */
export function parseReconciliationConfig(input: unknown): ReconciliationConfig {
  const result = reconciliationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Defaults, then environment, then explicit overrides (CLI flags).
 */
export function loadReconciliationConfig(overrides: Partial<ReconciliationConfig> = {}): ReconciliationConfig {
  const config = {
    buyerSpecific: booleanFromEnv('RECONCILE_BUYER_SPECIFIC', DEFAULT_RECONCILIATION_CONFIG.buyerSpecific),
    combinePoIn: process.env.RECONCILE_COMBINE_PO_IN?.toLowerCase() || DEFAULT_RECONCILIATION_CONFIG.combinePoIn,
    flaggedBuyers: listFromEnv('RECONCILE_FLAGGED_BUYERS', DEFAULT_RECONCILIATION_CONFIG.flaggedBuyers),
    progressInterval: numberFromEnv('RECONCILE_PROGRESS_INTERVAL', DEFAULT_RECONCILIATION_CONFIG.progressInterval),
    ...overrides,
  };

  return parseReconciliationConfig(config);
}

export function describeReconciliationConfig(config: ReconciliationConfig): Record<string, unknown> {
  return {
    buyerSpecific: config.buyerSpecific,
    combinePoIn: config.combinePoIn,
    flaggedBuyers: config.flaggedBuyers,
    progressInterval: config.progressInterval,
  };
}

export { DEFAULT_RECONCILIATION_CONFIG };
