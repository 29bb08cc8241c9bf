/**
 * Service Initialization
 * Builds the custody ledger, order engine and publishers for the API
 */

import { closeQueues, closeRedis, getQueue, getRedisClient, QueueName } from '@swapbook/shared';
import type { Pool } from 'pg';
import { closeDatabasePool, createDatabasePool } from '../escrow/database';
import { PgAssetLedger } from '../escrow/custody/PgAssetLedger';
import { EscrowEventBus } from '../escrow/events/EscrowEventBus';
import { QueueEventPublisher } from '../escrow/events/QueueEventPublisher';
import { OrderEngine } from '../escrow/services/OrderEngine';
import { HealthCheckService } from '../monitoring/HealthCheckService';
import { config } from './config';
import type { RouteServices } from './routes';

export interface Services extends RouteServices {
  pool: Pool;
  eventBus: EscrowEventBus;
}

let activePool: Pool | null = null;

/**
 * Must be called before starting the server
 */
export async function initializeServices(): Promise<Services> {
  /* eslint-disable no-console */
  console.log('Initializing services...');

  const pool = createDatabasePool();
  activePool = pool;

  // Fail fast when Redis is unreachable
  await getRedisClient().ping();

  const ledger = new PgAssetLedger(pool, config.escrow.custodyAddress);
  const eventBus = new EscrowEventBus();
  const queuePublisher = new QueueEventPublisher(getQueue(QueueName.ORDER_NOTIFICATIONS));

  // Rebuilds the open book from escrow.orders
  const engine = await OrderEngine.open(ledger, {
    adminAddress: config.escrow.adminAddress,
    feeRecipient: config.escrow.feeRecipient,
    minimumOrderAmounts: config.escrow.minimumOrderAmounts,
    fees: config.escrow.fees,
    publishers: [eventBus, queuePublisher],
  });

  eventBus.on('notification', (notification) => {
    console.log(`[escrow] ${notification.type} ${notification.id}`);
  });

  const healthCheckService = new HealthCheckService(pool, engine);

  console.log(`Recovered ${await engine.getNumberOrders()} open orders`);

  console.log(`Custody address: ${config.escrow.custodyAddress}`);
  console.log('Services initialized successfully');
  /* eslint-enable no-console */

  return { engine, healthCheckService, pool, eventBus };
}

/**
 * Close queues, Redis and the database pool
 */
export async function cleanupServices(): Promise<void> {
  /* eslint-disable no-console */
  console.log('Cleaning up services...');

  await closeQueues();
  await closeRedis();

  if (activePool) {
    await closeDatabasePool(activePool);
    activePool = null;
  }

  console.log('Services cleaned up');
  /* eslint-enable no-console */
}
