/**
 * Prometheus Metrics
 * Escrow engine and HTTP metrics on a dedicated registry
 */

import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export const register = new Registry();

register.setDefaultLabels({
  app: 'swapbook-backend',
});

// ============================================================================
// Escrow Metrics
// ============================================================================

export const escrowOperationCounter = new Counter({
  name: 'escrow_orders_total',
  help: 'Escrow mutations by operation and outcome',
  labelNames: ['operation', 'outcome'],
  registers: [register],
});

export const openOrdersGauge = new Gauge({
  name: 'escrow_open_orders',
  help: 'Number of open orders held in the book',
  registers: [register],
});

export const escrowOperationDuration = new Histogram({
  name: 'escrow_operation_duration_seconds',
  help: 'Escrow mutation latency including lock wait and custody calls',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register],
});

// Fees are integer base units; precision above 2^53 is not kept here
export const feesCollectedCounter = new Counter({
  name: 'escrow_fees_collected_total',
  help: 'Fees routed to the fee recipient, in base units',
  labelNames: ['asset'],
  registers: [register],
});

export const notificationFailureCounter = new Counter({
  name: 'escrow_notification_failures_total',
  help: 'Order notifications a publisher failed to deliver',
  labelNames: ['publisher'],
  registers: [register],
});

// ============================================================================
// System Metrics
// ============================================================================

export const databaseConnectionGauge = new Gauge({
  name: 'database_connection_status',
  help: 'Database connection status (1 = up, 0 = down)',
  registers: [register],
});

export const redisConnectionGauge = new Gauge({
  name: 'redis_connection_status',
  help: 'Redis connection status (1 = up, 0 = down)',
  registers: [register],
});

// ============================================================================
// HTTP Metrics
// ============================================================================

export const httpRequestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const errorCounter = new Counter({
  name: 'errors_total',
  help: 'Total number of errors',
  labelNames: ['type', 'service'],
  registers: [register],
});

collectDefaultMetrics({ register });
