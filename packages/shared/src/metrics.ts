/**
 * Prometheus Metrics
 *
 * Metrics for model calls, extraction, absorbed failures and the HTTP surface.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Model Gateway Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'idverify_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'operation', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'idverify_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model', 'operation'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'idverify_extraction_duration_seconds',
  help: 'Duration of field extraction',
  labelNames: ['document_type', 'strategy'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

/**
 * Failures converted to an empty record, an empty verdict or a warn outcome.
 * This is the only signal separating "model failed" from "field absent".
 */
export const absorbedFailuresCounter = new promClient.Counter({
  name: 'idverify_absorbed_failures_total',
  help: 'Pipeline failures absorbed into a default result',
  labelNames: ['stage', 'kind'],
  registers: [register],
});

export const validationOutcomesCounter = new promClient.Counter({
  name: 'idverify_validation_outcomes_total',
  help: 'Validation outcomes by rule and status',
  labelNames: ['document_type', 'rule', 'status'],
  registers: [register],
});

export const fraudFlagsCounter = new promClient.Counter({
  name: 'idverify_fraud_flags_total',
  help: 'Authenticity assessments by outcome',
  labelNames: ['document_type', 'outcome'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'idverify_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'idverify_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}
