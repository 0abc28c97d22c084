import { describe, it, expect } from 'vitest';
import { ResilienceService, ServiceStatus } from './resilience-service';
import { quietLogger } from '../../../test/fixtures';

describe('ResilienceService', () => {
  const at = new Date('2024-06-01T10:00:00Z');

  it('reports nothing for a service it has never seen', () => {
    const service = new ResilienceService(quietLogger(), () => at);
    expect(service.getServiceHealth('weather-store')).toBeNull();
    expect(service.isSystemDegraded()).toBe(false);
  });

  it('degrades on failure and becomes unavailable after repeated failures', () => {
    const service = new ResilienceService(quietLogger(), () => at);

    expect(service.recordServiceFailure('weather-store', new Error('timeout')).status).toBe(ServiceStatus.DEGRADED);
    service.recordServiceFailure('weather-store', new Error('timeout'));
    const health = service.recordServiceFailure('weather-store', new Error('throttled'));

    expect(health).toMatchObject({
      status: ServiceStatus.UNAVAILABLE,
      failureCount: 3,
      message: 'throttled',
      lastFailure: at,
    });
    expect(service.isSystemDegraded()).toBe(true);
  });

  it('recovers on success and keeps the stale-serve count', () => {
    const service = new ResilienceService(quietLogger(), () => at);
    service.recordServiceFailure('weather-store', new Error('timeout'));
    service.markServiceUsingFallback('weather-store', 'stale-cache');
    expect(service.getServiceHealth('weather-store')).toMatchObject({
      usingFallback: true,
      fallbackType: 'stale-cache',
      staleServes: 1,
    });

    service.recordServiceSuccess('weather-store');
    expect(service.getServiceHealth('weather-store')).toEqual({
      serviceName: 'weather-store',
      status: ServiceStatus.HEALTHY,
      lastSuccessfulCall: at,
      lastFailure: at,
      failureCount: 0,
      usingFallback: false,
      staleServes: 1,
    });
    expect(service.isSystemDegraded()).toBe(false);
  });
});
