/**
 * Infrastructure Exports
 */

export * from './queues';
export * from './redis';
