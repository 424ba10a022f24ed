/**
 * Jest environment setup: keep structured logs out of test output unless
 * a run asks for them.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
