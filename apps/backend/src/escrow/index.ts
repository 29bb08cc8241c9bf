/**
 * Escrow Module
 */

export * from './errors';
export * from './fees';
export { deriveOrderId } from './orderId';
export { MinimumOrderPolicy } from './policy';
export { ReadWriteLock } from './concurrency/ReadWriteLock';
export type {
  AssetTransfer,
  ClosedOrderStatus,
  OrderBookSnapshot,
  TransferKind,
  TransferMovement,
  TransferSession,
} from './custody/AssetTransfer';
export { InMemoryLedger } from './custody/InMemoryLedger';
export type { InMemoryLedgerOptions } from './custody/InMemoryLedger';
export { PgAssetLedger } from './custody/PgAssetLedger';
export { EscrowEventBus } from './events/EscrowEventBus';
export type { EscrowEventListeners, OrderEventPublisher } from './events/EscrowEventBus';
export { QueueEventPublisher } from './events/QueueEventPublisher';
export * from './events/payload';
export { DEFAULT_PAGE_LIMIT, OrderEngine } from './services/OrderEngine';
export type { CreateSwapOrderParams, EscrowOperation, OrderEngineOptions, OrderPage } from './services/OrderEngine';
export { OrderRepository } from './repositories/OrderRepository';
export { OrderStore } from './store/OrderStore';
export { closeDatabasePool, createDatabasePool } from './database';
