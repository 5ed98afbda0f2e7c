import client, { Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a custom registry
const registry = new Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================
// Feed Metrics
// ============================================

export const eventsObserved = new Counter({
  name: 'copy_events_observed_total',
  help: 'Target trade events handed to the reconciler',
  labelNames: ['action'] as const,
  registers: [registry],
});

export const pollFailures = new Counter({
  name: 'copy_poll_failures_total',
  help: 'Activity feed polls that failed and aborted the cycle',
  registers: [registry],
});

export const cycleDuration = new Histogram({
  name: 'copy_cycle_duration_ms',
  help: 'Duration of one poll-reconcile-execute cycle in milliseconds',
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [registry],
});

// ============================================
// Reconciliation Metrics
// ============================================

export const decisions = new Counter({
  name: 'copy_decisions_total',
  help: 'Reconciler decisions by type',
  labelNames: ['decision'] as const,
  registers: [registry],
});

export const eventFailures = new Counter({
  name: 'copy_event_failures_total',
  help: 'Events whose processing threw',
  labelNames: ['category'] as const,
  registers: [registry],
});

// ============================================
// Execution Metrics
// ============================================

export const ordersSubmitted = new Counter({
  name: 'copy_orders_submitted_total',
  help: 'Orders submitted to the exchange',
  labelNames: ['action', 'side'] as const,
  registers: [registry],
});

export const sharesFilled = new Counter({
  name: 'copy_shares_filled_total',
  help: 'Confirmed filled size in shares',
  labelNames: ['action'] as const,
  registers: [registry],
});

export const executionOutcomes = new Counter({
  name: 'copy_execution_outcomes_total',
  help: 'Execution outcomes by status',
  labelNames: ['action', 'status'] as const,
  registers: [registry],
});

export const orderLatency = new Histogram({
  name: 'copy_execution_latency_ms',
  help: 'Time from first submission to outcome in milliseconds',
  buckets: [100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [registry],
});

export const openPositions = new Gauge({
  name: 'copy_open_positions',
  help: 'Markets with an open copy position',
  registers: [registry],
});

/**
 * Get the metrics registry
 */
export function getRegistry(): Registry {
  return registry;
}

/**
 * Get all metrics as string for Prometheus scraping
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for metrics response
 */
export function getContentType(): string {
  return registry.contentType;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}

/**
 * Timer utility for measuring duration
 */
export function startTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    return Number(end - start) / 1_000_000; // Convert to milliseconds
  };
}

/**
 * Helper to record an execution outcome
 */
export function recordOutcome(action: string, status: string, filledSize: number, durationMs: number): void {
  executionOutcomes.labels(action, status).inc();
  if (filledSize > 0) {
    sharesFilled.labels(action).inc(filledSize);
  }
  orderLatency.observe(durationMs);
}
