/**
 * Prometheus Metrics
 *
 * Metrics for monitoring field retrieval, validation outcomes and form
 * processing.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Retrieval Metrics
// ============================================================================

export const retrievalsCounter = new promClient.Counter({
  name: 'fieldsense_retrievals_total',
  help: 'Total number of field retrievals by winning strategy',
  labelNames: ['domain', 'strategy', 'outcome'],
  registers: [register],
});

export const retrievalConfidenceHistogram = new promClient.Histogram({
  name: 'fieldsense_retrieval_confidence',
  help: 'Confidence of retrieved field values',
  labelNames: ['domain', 'strategy'],
  buckets: [0.1, 0.3, 0.5, 0.6, 0.7, 0.75, 0.8, 0.9, 1],
  registers: [register],
});

export const ambiguousSelectionsCounter = new promClient.Counter({
  name: 'fieldsense_ambiguous_selections_total',
  help: 'Total number of rankings with more than one candidate tied for the top',
  labelNames: ['domain'],
  registers: [register],
});

// ============================================================================
// Validation Metrics
// ============================================================================

export const validationResultsCounter = new promClient.Counter({
  name: 'fieldsense_validation_results_total',
  help: 'Total number of validation results',
  labelNames: ['domain', 'stage', 'severity', 'valid'],
  registers: [register],
});

export const complianceReportsCounter = new promClient.Counter({
  name: 'fieldsense_compliance_reports_total',
  help: 'Total number of compliance reports by status',
  labelNames: ['domain', 'status'],
  registers: [register],
});

// ============================================================================
// Form Processing Metrics
// ============================================================================

export const formDurationHistogram = new promClient.Histogram({
  name: 'fieldsense_form_duration_seconds',
  help: 'Duration of form processing in seconds',
  labelNames: ['domain', 'status'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register],
});

/**
 * Get Prometheus metrics in text exposition format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
