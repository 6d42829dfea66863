import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { setTimeout as sleep } from 'timers/promises';
import {
  CircuitBreakerFactory,
  CircuitHealth,
} from '../common/circuit-breaker.factory';

export const SERVICE_NAME = 'agent-leads-api';
const READINESS_ATTEMPTS = 3;
const READINESS_RETRY_DELAY_MS = 500;

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  service: string;
  responseTimeMs: number;
  checks: { database: string };
  circuits: Record<string, CircuitHealth>;
}

export interface ReadinessReport {
  status: 'ready' | 'degraded';
  timestamp: string;
  service: string;
  responseTimeMs: number;
  checks: { database: 'connected' | 'unavailable' };
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly breakerFactory: CircuitBreakerFactory,
  ) {}

  async check(): Promise<HealthReport> {
    const startedAt = Date.now();
    let database = 'healthy';
    try {
      await this.ping();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Database health check failed: ${message}`);
      database = `unhealthy: ${message}`;
    }

    return {
      status: database === 'healthy' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      responseTimeMs: Date.now() - startedAt,
      checks: { database },
      circuits: this.breakerFactory.health(),
    };
  }

  /** Retries the database before reporting it unavailable. */
  async readiness(retryDelayMs = READINESS_RETRY_DELAY_MS): Promise<ReadinessReport> {
    const startedAt = Date.now();
    let connected = false;

    for (let attempt = 1; attempt <= READINESS_ATTEMPTS && !connected; attempt++) {
      try {
        await this.ping();
        connected = true;
      } catch (error: unknown) {
        this.logger.warn(
          `Readiness attempt ${attempt} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
        if (attempt < READINESS_ATTEMPTS) {
          await sleep(retryDelayMs);
        }
      }
    }

    return {
      status: connected ? 'ready' : 'degraded',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      responseTimeMs: Date.now() - startedAt,
      checks: { database: connected ? 'connected' : 'unavailable' },
    };
  }

  private async ping(): Promise<void> {
    await this.dataSource.query('SELECT 1');
  }
}
