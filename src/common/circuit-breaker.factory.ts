import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  stats: {
    failures: number;
    successes: number;
    rejects: number;
    timeouts: number;
    fires: number;
  };
}

type TrackedBreaker = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'stats' | 'close' | 'shutdown'
>;

/**
 * Builds named opossum breakers around slow collaborators (PDF rendering,
 * object storage) and keeps them for health reporting and shutdown.
 */
@Injectable()
export class CircuitBreakerFactory implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private readonly breakers: Map<string, TrackedBreaker> = new Map();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 30000,
    errorThreshold: 50, // percent
    resetTimeout: 30000,
    volumeThreshold: 5,
  };

  createBreaker<TI extends unknown[], TR>(
    name: string,
    action: (...args: TI) => Promise<TR>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TI, TR> {
    if (this.breakers.has(name)) {
      throw new Error(`Circuit breaker "${name}" is already registered`);
    }

    const mergedConfig = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker<TI, TR>(action, {
      name,
      timeout: mergedConfig.timeout,
      errorThresholdPercentage: mergedConfig.errorThreshold,
      resetTimeout: mergedConfig.resetTimeout,
      volumeThreshold: mergedConfig.volumeThreshold,
    });

    breaker.on('open', () => {
      this.logger.error(`[OPEN] Circuit breaker OPEN for ${name}`);
    });

    breaker.on('halfOpen', () => {
      this.logger.warn(`[HALF-OPEN] Circuit breaker HALF-OPEN for ${name}`);
    });

    breaker.on('close', () => {
      this.logger.log(`[CLOSED] Circuit breaker CLOSED for ${name}`);
    });

    breaker.on('timeout', () => {
      this.logger.warn(
        `Circuit breaker timeout for ${name} after ${mergedConfig.timeout}ms`,
      );
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  health(): Record<string, CircuitHealth> {
    const health: Record<string, CircuitHealth> = {};

    this.breakers.forEach((breaker, name) => {
      const stats = breaker.stats;
      health[name] = {
        state: breaker.opened
          ? 'OPEN'
          : breaker.halfOpen
            ? 'HALF_OPEN'
            : 'CLOSED',
        stats: {
          failures: stats.failures,
          successes: stats.successes,
          rejects: stats.rejects,
          timeouts: stats.timeouts,
          fires: stats.fires,
        },
      };
    });

    return health;
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}
