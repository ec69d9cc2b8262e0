/**
 * Vitest global setup file
 * Runs before all tests
 */

// Keep pino quiet unless a test run asks for logs
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';

// Config tests set these explicitly; a developer's shell must not leak in
delete process.env.RECONCILE_BUYER_SPECIFIC;
delete process.env.RECONCILE_COMBINE_PO_IN;
delete process.env.RECONCILE_FLAGGED_BUYERS;
delete process.env.RECONCILE_PROGRESS_INTERVAL;
