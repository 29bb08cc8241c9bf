/**
 * @swapbook/shared
 * Shared types and infrastructure for the SwapBook escrow services
 */

export * from './infrastructure';
export * from './types/api';
export * from './types/domain';
