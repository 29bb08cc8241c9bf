/**
 * Health Check Service
 * Reports database, Redis and order book status
 */

import { getAllQueuesHealth, getRedisClient, type QueueHealth } from '@swapbook/shared';
import type { Pool } from 'pg';
import type { OrderEngine } from '../escrow/services/OrderEngine';
import { databaseConnectionGauge, redisConnectionGauge } from './metrics';

export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthStatus {
  status: OverallStatus;
  timestamp: string;
  uptime: number;
  services: {
    database: ServiceHealth;
    redis: ServiceHealth;
  };
  metrics?: {
    openOrders?: number;
    queues?: QueueHealth[];
  };
}

interface ServiceHealth {
  status: 'up' | 'down';
  responseTime?: number;
  error?: string;
}

export class HealthCheckService {
  private readonly startTime: number;

  constructor(
    private readonly pool: Pool,
    private readonly engine: OrderEngine
  ) {
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthStatus> {
    const [dbHealth, redisHealth] = await Promise.all([this.checkDatabase(), this.checkRedis()]);

    databaseConnectionGauge.set(dbHealth.status === 'up' ? 1 : 0);
    redisConnectionGauge.set(redisHealth.status === 'up' ? 1 : 0);

    return {
      status: this.determineOverallStatus(dbHealth, redisHealth),
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: {
        database: dbHealth,
        redis: redisHealth,
      },
    };
  }

  /**
   * Basic health plus book size and queue depth
   */
  async checkDetailedHealth(): Promise<HealthStatus> {
    const basicHealth = await this.checkHealth();
    const openOrders = await this.engine.getNumberOrders();

    try {
      const queues = await getAllQueuesHealth();
      return { ...basicHealth, metrics: { openOrders, queues } };
    } catch (error) {
      console.error('Failed to collect queue health:', error);
      return { ...basicHealth, metrics: { openOrders } };
    }
  }

  private async checkDatabase(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      await this.pool.query('SELECT 1');
      return { status: 'up', responseTime: Date.now() - start };
    } catch (error) {
      return {
        status: 'down',
        responseTime: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  private async checkRedis(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      const result = await getRedisClient().ping();
      const responseTime = Date.now() - start;

      if (result === 'PONG') {
        return { status: 'up', responseTime };
      }

      return { status: 'down', responseTime, error: 'Unexpected ping response' };
    } catch (error) {
      return {
        status: 'down',
        responseTime: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  private determineOverallStatus(dbHealth: ServiceHealth, redisHealth: ServiceHealth): OverallStatus {
    const dbUp = dbHealth.status === 'up';
    const redisUp = redisHealth.status === 'up';

    if (dbUp && redisUp) {
      return 'healthy';
    }

    if (dbUp || redisUp) {
      return 'degraded';
    }

    return 'unhealthy';
  }
}
