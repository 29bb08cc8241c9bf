/**
 * Middleware Exports
 */

export * from './auth';
export * from './idempotency';
export * from './rateLimiter';
export * from './validation';
export * from './errorHandler';
