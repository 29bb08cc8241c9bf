/**
 * Monitoring Module
 */

export * from './metrics';
export { HealthCheckService } from './HealthCheckService';
export type { HealthStatus, OverallStatus } from './HealthCheckService';
export { metricsMiddleware } from './middleware';
