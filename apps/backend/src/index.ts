/**
 * SwapBook Backend
 * Escrow engine entry point; the HTTP server starts from api/server.ts
 */

export * from './escrow';
export { createApp } from './api/app';
