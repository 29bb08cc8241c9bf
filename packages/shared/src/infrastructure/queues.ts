/**
 * Job Queue Configuration
 * BullMQ queues carrying escrow notifications to downstream consumers
 */

import { Queue, type QueueOptions } from 'bullmq';

export const QueueName = {
  // Order lifecycle notifications (created / executed / canceled)
  ORDER_NOTIFICATIONS: 'escrow-order-notifications',
} as const;

export type QueueNameType = (typeof QueueName)[keyof typeof QueueName];

export enum QueuePriority {
  CRITICAL = 1,
  HIGH = 5,
  NORMAL = 10,
  LOW = 15,
}

function getRedisConnection(): { host: string; port: number } {
  const parsed = new URL(process.env.REDIS_URL || 'redis://localhost:6379');
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
  };
}

function buildQueueOptions(name: QueueNameType): QueueOptions {
  const base: QueueOptions = {
    connection: getRedisConnection(),
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 1000,
      },
      removeOnComplete: {
        count: 1000,
        age: 24 * 3600,
      },
      removeOnFail: {
        count: 500,
      },
    },
  };

  switch (name) {
    case QueueName.ORDER_NOTIFICATIONS:
      return {
        ...base,
        defaultJobOptions: {
          ...base.defaultJobOptions,
          priority: QueuePriority.HIGH,
          attempts: 5, // Consumers must not miss settlements
        },
      };
  }
}

const queues = new Map<QueueNameType, Queue>();

/**
 * Create or get queue instance
 */
export function getQueue(name: QueueNameType): Queue {
  const existing = queues.get(name);
  if (existing) {
    return existing;
  }

  const queue = new Queue(name, buildQueueOptions(name));
  queues.set(name, queue);
  return queue;
}

export async function closeQueues(): Promise<void> {
  await Promise.all(Array.from(queues.values()).map((queue) => queue.close()));
  queues.clear();
}

export interface QueueHealth {
  name: QueueNameType;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueueHealth(name: QueueNameType): Promise<QueueHealth> {
  const queue = getQueue(name);
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { name, waiting, active, completed, failed, delayed };
}

export async function getAllQueuesHealth(): Promise<QueueHealth[]> {
  return Promise.all(Object.values(QueueName).map((name) => getQueueHealth(name)));
}
