/**
 * Cached Repository
 * Mediates every read and write of locations, readings, forecast points and alerts
 * against the persistence collaborator. Reads go through a TTL cache with
 * single-flight stampede protection; writes invalidate the location's entries.
 */

import {
  Alert,
  AlertState,
  Clock,
  ForecastPoint,
  Location,
  Reading,
  systemClock,
} from '../types';
import { EngineConfig } from '../shared/config/environment';
import { CACHE_OPERATIONS, CacheOperation } from '../shared/config/constants';
import { Logger } from '../shared/utils/logger';
import { CallOptions, withDeadline } from '../shared/utils/deadline';
import {
  BackendUnavailableError,
  NotFoundError,
  isWeatherEngineError,
} from '../shared/utils/errors';
import { Validator, assertLocationId, assertValid, assertValidCoordinates } from '../shared/utils/validation';
import { endOfUtcDay, toIsoDate } from '../shared/utils/dates';
import { ResilienceService, ServiceHealth } from '../shared/services/resilience-service';
import { TtlCache, CacheStats } from './ttl-cache';
import { SingleFlight } from './single-flight';
import { WeatherStore } from './weather-store';

export const BACKEND_SERVICE_NAME = 'weather-store';

export interface CachedRead<T> {
  data: T;
  stale: boolean; // served from an expired entry because the backend failed
  fetchedAt: Date;
}

interface Fetched<T> {
  value: T;
  fetchedAt: number;
}

/**
 * One cached read path: its cache, its single-flight registry and its TTL
 */
class ReadPath<T> {
  readonly cache: TtlCache<T>;
  readonly flights = new SingleFlight<Fetched<T>>();

  constructor(
    readonly operation: CacheOperation,
    readonly ttlMs: number,
    maxEntries: number,
    now: () => number
  ) {
    this.cache = new TtlCache<T>(maxEntries, now);
  }

  key(locationId: string, window: string): string {
    return `${this.operation}:${locationId}:${window}`;
  }
}

export interface CachedRepositoryDependencies {
  store: WeatherStore;
  config: EngineConfig;
  logger: Logger;
  clock?: Clock;
  resilience?: ResilienceService;
}

export class CachedRepository {
  private readonly store: WeatherStore;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly resilience: ResilienceService;

  private readonly locations: ReadPath<Location>;
  private readonly current: ReadPath<Reading>;
  private readonly history: ReadPath<Reading[]>;
  private readonly forecast: ReadPath<ForecastPoint[]>;
  private readonly activeAlerts: ReadPath<Alert[]>;

  // Bumped on every write; a fetch only populates the cache if no write happened meanwhile
  private readonly generations = new Map<string, number>();

  constructor(deps: CachedRepositoryDependencies) {
    this.store = deps.store;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'CachedRepository' });
    this.clock = deps.clock ?? systemClock;
    this.resilience = deps.resilience ?? new ResilienceService(this.logger, this.clock);

    const now = (): number => this.clock().getTime();
    const max = this.config.cacheMaxEntries;
    this.locations = new ReadPath<Location>(CACHE_OPERATIONS.LOCATION, this.config.currentTtlMs, max, now);
    this.current = new ReadPath<Reading>(CACHE_OPERATIONS.CURRENT, this.config.currentTtlMs, max, now);
    this.history = new ReadPath<Reading[]>(CACHE_OPERATIONS.HISTORY, this.config.historyTtlMs, max, now);
    this.forecast = new ReadPath<ForecastPoint[]>(CACHE_OPERATIONS.FORECAST, this.config.forecastTtlMs, max, now);
    this.activeAlerts = new ReadPath<Alert[]>(CACHE_OPERATIONS.ACTIVE_ALERTS, this.config.currentTtlMs, max, now);
  }

  /* ============================================================
     READ PATHS
  ============================================================ */

  async getLocation(locationId: string, options: CallOptions = {}): Promise<CachedRead<Location>> {
    assertLocationId(locationId);
    return this.readThrough(this.locations, locationId, '-', options, async () => {
      const location = await this.store.getLocation(locationId);
      if (!location) throw new NotFoundError('Location', locationId);
      return location;
    });
  }

  async getCurrent(locationId: string, options: CallOptions = {}): Promise<CachedRead<Reading>> {
    assertLocationId(locationId);
    return this.readThrough(this.current, locationId, 'latest', options, async () => {
      const reading = await this.store.getLatestReading(locationId);
      if (!reading) {
        throw new NotFoundError('Current reading', locationId, `No readings recorded for location ${locationId}`);
      }
      return reading;
    });
  }

  /**
   * Readings with fromDate <= timestamp <= toDate, ascending. An empty window is a valid result.
   */
  async getHistory(
    locationId: string,
    fromDate: Date,
    toDate: Date,
    options: CallOptions = {}
  ): Promise<CachedRead<Reading[]>> {
    assertLocationId(locationId);
    assertValid(Validator.validateDateRange({ from: fromDate, to: toDate }), 'history range');

    // Cached per whole UTC day so ranges ending "now" share one entry; trimmed to the range after
    const fetchTo = endOfUtcDay(toDate);
    const window = `${fromDate.toISOString()}/${fetchTo.toISOString()}`;
    const read = await this.readThrough(this.history, locationId, window, options, () =>
      this.store.getReadings(locationId, fromDate, fetchTo)
    );
    const to = toDate.getTime();
    return { ...read, data: read.data.filter(r => r.timestamp.getTime() <= to) };
  }

  /**
   * Current forecast: points dated today or later. Past horizons stay in the store for auditing.
   */
  async getForecast(locationId: string, options: CallOptions = {}): Promise<CachedRead<ForecastPoint[]>> {
    assertLocationId(locationId);
    const today = toIsoDate(this.clock());
    return this.readThrough(this.forecast, locationId, today, options, async () => {
      const points = await this.store.getForecastPoints(locationId, today);
      if (points.length === 0) {
        throw new NotFoundError('Forecast', locationId, `No current forecast for location ${locationId}`);
      }
      return points;
    });
  }

  async listActiveAlerts(locationId: string, options: CallOptions = {}): Promise<CachedRead<Alert[]>> {
    assertLocationId(locationId);
    return this.readThrough(this.activeAlerts, locationId, '-', options, () =>
      this.store.listAlerts(locationId, AlertState.ACTIVE)
    );
  }

  /**
   * Alerts are looked up by id only for manual resolution; not cached
   */
  async getAlert(alertId: string, options: CallOptions = {}): Promise<Alert> {
    assertValid(Validator.validateRequiredString(alertId, 'Alert ID'), 'alert id');
    const alert = await withDeadline(
      this.guardBackend('getAlert', () => this.store.getAlert(alertId)),
      this.deadline(options),
      'getAlert',
      options.signal
    );
    if (!alert) throw new NotFoundError('Alert', alertId);
    return alert;
  }

  /* ============================================================
     WRITE PATHS
  ============================================================ */

  async recordReading(reading: Reading, options: CallOptions = {}): Promise<void> {
    assertValid(Validator.validateReading(reading), 'reading');
    await this.write('recordReading', [reading.locationId], options, () => this.store.putReading(reading));
    this.logger.debug('Reading recorded', { locationId: reading.locationId, timestamp: reading.timestamp.toISOString() });
  }

  async upsertForecast(points: ForecastPoint[], options: CallOptions = {}): Promise<void> {
    if (points.length === 0) return;
    assertValid(
      Validator.combineValidationResults(points.map(p => Validator.validateForecastPoint(p))),
      'forecast points'
    );

    const locationIds = [...new Set(points.map(p => p.locationId))];
    await this.write('upsertForecast', locationIds, options, () => this.store.putForecastPoints(points));
    this.logger.debug('Forecast upserted', { locations: locationIds, points: points.length });
  }

  async saveAlert(alert: Alert, options: CallOptions = {}): Promise<void> {
    assertLocationId(alert.locationId);
    await this.write('saveAlert', [alert.locationId], options, () => this.store.putAlert(alert));
  }

  async saveLocation(location: Location, options: CallOptions = {}): Promise<void> {
    assertValidCoordinates(location);
    assertValid(Validator.validateLocation(location), 'location');
    await this.write('saveLocation', [location.locationId], options, () => this.store.putLocation(location));
  }

  /**
   * Drop cached entries and detach in-flight fetches for a location
   */
  invalidateLocation(locationId: string): void {
    this.generations.set(locationId, this.generationOf(locationId) + 1);
    let removed = 0;
    for (const path of this.paths()) {
      removed += path.cache.invalidateLocation(locationId);
      path.flights.detachLocation(locationId);
    }
    this.logger.debug('Cache invalidated', { locationId, removed });
  }

  getCacheStats(): Record<CacheOperation, CacheStats> {
    return {
      [CACHE_OPERATIONS.LOCATION]: this.locations.cache.getStats(),
      [CACHE_OPERATIONS.CURRENT]: this.current.cache.getStats(),
      [CACHE_OPERATIONS.HISTORY]: this.history.cache.getStats(),
      [CACHE_OPERATIONS.FORECAST]: this.forecast.cache.getStats(),
      [CACHE_OPERATIONS.ACTIVE_ALERTS]: this.activeAlerts.cache.getStats(),
    };
  }

  getBackendHealth(): ServiceHealth | null {
    return this.resilience.getServiceHealth(BACKEND_SERVICE_NAME);
  }

  /* ============================================================
     INTERNALS
  ============================================================ */

  private paths(): Array<ReadPath<Location> | ReadPath<Reading> | ReadPath<Reading[]> | ReadPath<ForecastPoint[]> | ReadPath<Alert[]>> {
    return [this.locations, this.current, this.history, this.forecast, this.activeAlerts];
  }

  private generationOf(locationId: string): number {
    return this.generations.get(locationId) ?? 0;
  }

  private deadline(options: CallOptions): number {
    return options.deadlineMs ?? this.config.defaultDeadlineMs;
  }

  private async readThrough<T>(
    path: ReadPath<T>,
    locationId: string,
    window: string,
    options: CallOptions,
    fetcher: () => Promise<T>
  ): Promise<CachedRead<T>> {
    const key = path.key(locationId, window);
    const hit = path.cache.get(key);
    if (hit) {
      return { data: hit.value, stale: false, fetchedAt: new Date(hit.storedAt) };
    }

    const generation = this.generationOf(locationId);
    const { promise, shared } = path.flights.run(key, locationId, async () => {
      const value = await this.guardBackend(path.operation, fetcher, { locationId });
      if (this.generationOf(locationId) === generation) {
        path.cache.set(key, locationId, value, path.ttlMs);
      }
      return { value, fetchedAt: this.clock().getTime() };
    });

    if (shared) {
      this.logger.debug('Joined in-flight fetch', { operation: path.operation, locationId });
    }

    try {
      const fetched = await withDeadline(promise, this.deadline(options), path.operation, options.signal);
      return { data: fetched.value, stale: false, fetchedAt: new Date(fetched.fetchedAt) };
    } catch (error) {
      if (error instanceof BackendUnavailableError && this.config.degradedAvailabilityOnBackendFailure) {
        const stale = path.cache.peek(key);
        if (stale) {
          this.resilience.markServiceUsingFallback(BACKEND_SERVICE_NAME, 'stale-cache');
          this.logger.warn('Serving stale cache entry', {
            operation: path.operation,
            locationId,
            ageMs: this.clock().getTime() - stale.entry.storedAt,
          });
          return { data: stale.entry.value, stale: true, fetchedAt: new Date(stale.entry.storedAt) };
        }
      }
      throw error;
    }
  }

  private async write(
    operation: string,
    locationIds: string[],
    options: CallOptions,
    fn: () => Promise<void>
  ): Promise<void> {
    // Invalidate once the backend write settles, even if this caller has already timed out
    const settled = this.guardBackend(operation, fn).finally(() => {
      for (const locationId of locationIds) {
        this.invalidateLocation(locationId);
      }
    });
    await withDeadline(settled, this.deadline(options), operation, options.signal);
  }

  /**
   * Run a persistence call; anything it throws that is not an engine error becomes BackendUnavailable
   */
  private async guardBackend<T>(
    operation: string,
    fn: () => Promise<T>,
    context: Record<string, unknown> = {}
  ): Promise<T> {
    const startTime = this.clock().getTime();
    try {
      const result = await fn();
      this.resilience.recordServiceSuccess(BACKEND_SERVICE_NAME);
      return result;
    } catch (error) {
      if (isWeatherEngineError(error)) {
        if (error instanceof NotFoundError) {
          this.resilience.recordServiceSuccess(BACKEND_SERVICE_NAME);
        }
        throw error;
      }
      this.resilience.recordServiceFailure(BACKEND_SERVICE_NAME, error, { operation, ...context });
      this.logger.error('Persistence call failed', error, { operation, ...context });
      throw new BackendUnavailableError(
        `Persistence backend failed during ${operation}`,
        { operation, ...context },
        { cause: error }
      );
    } finally {
      this.logger.performance(operation, this.clock().getTime() - startTime, context);
    }
  }
}
