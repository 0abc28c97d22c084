/**
 * Backend Resilience Service
 * Tracks the health of the persistence collaborator and records when stale cache
 * entries are served in degraded-availability mode
 */

import { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Service health status enumeration
 */
export enum ServiceStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNAVAILABLE = 'unavailable'
}

export type FallbackType = 'stale-cache';

/**
 * Service health information
 */
export interface ServiceHealth {
  serviceName: string;
  status: ServiceStatus;
  lastSuccessfulCall?: Date;
  lastFailure?: Date;
  failureCount: number;
  usingFallback: boolean;
  fallbackType?: FallbackType;
  staleServes: number;
  message?: string;
}

// Consecutive failures before a degraded service is reported unavailable
const UNAVAILABLE_AFTER_FAILURES = 3;

export class ResilienceService {
  private serviceHealthMap = new Map<string, ServiceHealth>();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  private current(serviceName: string): ServiceHealth {
    return this.serviceHealthMap.get(serviceName) ?? {
      serviceName,
      status: ServiceStatus.HEALTHY,
      failureCount: 0,
      usingFallback: false,
      staleServes: 0,
    };
  }

  /**
   * Record service failure and update health status
   */
  recordServiceFailure(serviceName: string, error: unknown, context: Record<string, unknown> = {}): ServiceHealth {
    const previous = this.current(serviceName);
    const failureCount = previous.failureCount + 1;
    const health: ServiceHealth = {
      ...previous,
      lastFailure: this.now(),
      failureCount,
      message: errorMessage(error),
      status: failureCount >= UNAVAILABLE_AFTER_FAILURES ? ServiceStatus.UNAVAILABLE : ServiceStatus.DEGRADED,
    };
    this.serviceHealthMap.set(serviceName, health);

    if (health.status !== previous.status) {
      this.logger.warn('Service health changed', {
        serviceName,
        from: previous.status,
        to: health.status,
        failureCount,
        ...context,
      });
    }
    return health;
  }

  /**
   * Record successful service call and update health status
   */
  recordServiceSuccess(serviceName: string): void {
    const previous = this.current(serviceName);
    this.serviceHealthMap.set(serviceName, {
      serviceName,
      status: ServiceStatus.HEALTHY,
      lastSuccessfulCall: this.now(),
      lastFailure: previous.lastFailure,
      failureCount: 0,
      usingFallback: false,
      staleServes: previous.staleServes,
    });

    if (previous.status !== ServiceStatus.HEALTHY) {
      this.logger.info('Service recovered', { serviceName, previousStatus: previous.status });
    }
  }

  /**
   * Mark service as using fallback
   */
  markServiceUsingFallback(serviceName: string, fallbackType: FallbackType): void {
    const previous = this.current(serviceName);
    this.serviceHealthMap.set(serviceName, {
      ...previous,
      status: previous.status === ServiceStatus.HEALTHY ? ServiceStatus.DEGRADED : previous.status,
      usingFallback: true,
      fallbackType,
      staleServes: previous.staleServes + 1,
    });

    this.logger.info('Service using fallback', { serviceName, fallbackType });
  }

  getServiceHealth(serviceName: string): ServiceHealth | null {
    return this.serviceHealthMap.get(serviceName) ?? null;
  }

  getAllServiceHealth(): ServiceHealth[] {
    return Array.from(this.serviceHealthMap.values());
  }

  isSystemDegraded(): boolean {
    return this.getAllServiceHealth().some(s => s.status !== ServiceStatus.HEALTHY);
  }
}
