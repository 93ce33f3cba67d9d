import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'token-escrow-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger entry point calls by label (e.g. token.transfer) and outcome
 */
export const ledgerCallsTotal = new Counter({
  name: 'ledger_calls_total',
  help: 'Ledger entry point calls by label and outcome',
  labelNames: ['label', 'outcome'] as const, // committed, reverted, withdrawn
  registers: [registry],
});

export const ledgerNotificationsTotal = new Counter({
  name: 'ledger_notifications_total',
  help: 'Committed ledger notifications by event type',
  labelNames: ['event_type'] as const,
  registers: [registry],
});

/**
 * Commit records that a pipeline sink failed to deliver
 */
export const commitPipelineFailuresTotal = new Counter({
  name: 'ledger_commit_pipeline_failures_total',
  help: 'Commit records a sink failed to deliver',
  labelNames: ['sink'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
