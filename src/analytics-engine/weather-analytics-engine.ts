/**
 * Weather Analytics Engine
 * Explicitly constructed facade wiring the geo index, cached repository, metrics,
 * forecast aggregation and alert evaluation. Every operation returns a result-or-error value.
 */

import {
  AggregatedForecast,
  Alert,
  Clock,
  Coordinates,
  CropSuitability,
  DailySummary,
  EvaluationOutcome,
  ForecastImplications,
  ForecastPoint,
  Location,
  MetricSet,
  NearbyLocation,
  Reading,
  Trend,
  systemClock,
} from '../types';
import { EngineConfig } from '../shared/config/environment';
import { CacheOperation, DEFAULT_VALUES } from '../shared/config/constants';
import { Logger, createLogger, parseLogLevel } from '../shared/utils/logger';
import { CallOptions } from '../shared/utils/deadline';
import { ConfigurationError, NotFoundError, ValidationError, WeatherEngineError, isWeatherEngineError } from '../shared/utils/errors';
import { startOfUtcDay, subtractDays } from '../shared/utils/dates';
import { Validator, assertValid } from '../shared/utils/validation';
import { ResilienceService, ServiceHealth } from '../shared/services/resilience-service';
import { GeoIndex } from '../geo-index/geo-index';
import { BACKEND_SERVICE_NAME, CachedRead, CachedRepository } from '../data-access/cached-repository';
import { CacheStats } from '../data-access/ttl-cache';
import { WeatherStore } from '../data-access/weather-store';
import { MetricsEngine } from '../metrics-engine/metrics-engine';
import { CropProfileProvider, StaticCropProfileProvider } from '../metrics-engine/crop-profiles';
import { summarizeDays, trend } from '../metrics-engine/agronomy';
import { ForecastAggregator, AggregateOptions } from '../forecast-engine/forecast-aggregator';
import { ForecastSource } from '../forecast-engine/forecast-source';
import { AlertEvaluator, EvaluateOptions } from '../alert-engine/alert-evaluator';
import { AlertHistoryLog } from '../alert-engine/alert-history';

export type EngineResult<T> =
  | { ok: true; value: T; stale: boolean }
  | { ok: false; error: WeatherEngineError };

export interface WeatherAnalyticsEngineDependencies {
  store: WeatherStore;
  config: EngineConfig;
  logger?: Logger;
  cropProfiles?: CropProfileProvider;
  forecastSources?: ForecastSource[];
  alertHistory?: AlertHistoryLog;
  clock?: Clock;
}

export interface MetricOptions extends CallOptions {
  cropId?: string;
  windowDays?: number;
}

export interface ForecastAnalysisOptions extends AggregateOptions {
  cropId?: string;
}

export interface HistoryAnalysis {
  days: DailySummary[];
  temperatureTrend: Trend;
  rainfallTrend: Trend;
  totalRainfall: number;
}

export interface EngineHealth {
  backend: ServiceHealth | null;
  degraded: boolean;
  registeredLocations: number;
  cache: Record<CacheOperation, CacheStats>;
}

interface Produced<T> {
  value: T;
  stale: boolean;
}

export class WeatherAnalyticsEngine {
  readonly repository: CachedRepository;
  readonly metrics: MetricsEngine;
  readonly forecasts: ForecastAggregator;
  readonly alerts: AlertEvaluator;

  private readonly store: WeatherStore;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly resilience: ResilienceService;
  private geoIndex: GeoIndex;

  constructor(deps: WeatherAnalyticsEngineDependencies) {
    this.store = deps.store;
    this.config = deps.config;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('WeatherAnalyticsEngine', parseLogLevel(deps.config.logLevel));
    this.resilience = new ResilienceService(this.logger.child({ component: 'ResilienceService' }), this.clock);

    this.geoIndex = new GeoIndex(this.logger.child({ component: 'GeoIndex' }));
    this.repository = new CachedRepository({
      store: this.store,
      config: this.config,
      logger: this.logger,
      clock: this.clock,
      resilience: this.resilience,
    });
    this.metrics = new MetricsEngine(
      this.config.alertThresholds,
      deps.cropProfiles ?? new StaticCropProfileProvider(),
      this.logger.child({ component: 'MetricsEngine' })
    );
    this.forecasts = new ForecastAggregator({
      repository: this.repository,
      config: this.config,
      logger: this.logger,
      sources: deps.forecastSources,
      clock: this.clock,
    });
    this.alerts = new AlertEvaluator({
      repository: this.repository,
      metrics: this.metrics,
      forecasts: this.forecasts,
      config: this.config,
      logger: this.logger,
      clock: this.clock,
      history: deps.alertHistory,
    });
  }

  /**
   * Rebuild the geo index from persistence. Call once before serving requests.
   */
  async start(): Promise<void> {
    this.geoIndex = await GeoIndex.rebuild(this.store, this.logger.child({ component: 'GeoIndex' }));
    this.logger.info('Weather analytics engine started', { locations: this.geoIndex.size });
  }

  get index(): GeoIndex {
    return this.geoIndex;
  }

  /* ============================================================
     LOCATIONS
  ============================================================ */

  async registerLocation(location: Location, options: CallOptions = {}): Promise<EngineResult<Location>> {
    return this.run('registerLocation', async () => {
      await this.repository.saveLocation(location, options);
      this.geoIndex.register(location);
      return { value: location, stale: false };
    });
  }

  nearby(center: Coordinates, radiusKm: number = DEFAULT_VALUES.DEFAULT_RADIUS_KM): EngineResult<NearbyLocation[]> {
    try {
      return { ok: true, value: this.geoIndex.nearby(center, radiusKm), stale: false };
    } catch (error) {
      return this.failure('nearby', error);
    }
  }

  /* ============================================================
     OBSERVATIONS
  ============================================================ */

  async getCurrent(locationId: string, options: CallOptions = {}): Promise<EngineResult<Reading>> {
    return this.run('getCurrent', async () => {
      const read = await this.repository.getCurrent(locationId, options);
      return { value: read.data, stale: read.stale };
    });
  }

  async getHistory(locationId: string, from: Date, to: Date, options: CallOptions = {}): Promise<EngineResult<Reading[]>> {
    return this.run('getHistory', async () => {
      const read = await this.repository.getHistory(locationId, from, to, options);
      return { value: read.data, stale: read.stale };
    });
  }

  /**
   * Daily aggregates for a window plus temperature and rainfall trends
   */
  async analyzeHistory(
    locationId: string,
    from: Date,
    to: Date,
    options: CallOptions = {}
  ): Promise<EngineResult<HistoryAnalysis>> {
    return this.run('analyzeHistory', async () => {
      const read = await this.repository.getHistory(locationId, from, to, options);
      const days = summarizeDays(read.data);
      const temperatures = days.flatMap(d => (d.avgTemperature === undefined ? [] : [d.avgTemperature]));
      const rainfall = days.flatMap(d => (d.totalRainfall === undefined ? [] : [d.totalRainfall]));
      return {
        value: {
          days,
          temperatureTrend: trend(temperatures),
          rainfallTrend: trend(rainfall),
          totalRainfall: Math.round(rainfall.reduce((sum, r) => sum + r, 0) * 100) / 100,
        },
        stale: read.stale,
      };
    });
  }

  async recordReading(reading: Reading, options: CallOptions = {}): Promise<EngineResult<Reading>> {
    return this.run('recordReading', async () => {
      await this.repository.recordReading(reading, options);
      return { value: reading, stale: false };
    });
  }

  /* ============================================================
     FORECASTS
  ============================================================ */

  async getForecast(
    locationId: string,
    horizonDays: number = this.config.maxForecastHorizonDays,
    options: AggregateOptions = {}
  ): Promise<EngineResult<AggregatedForecast[]>> {
    return this.run('getForecast', async () => {
      const aggregation = await this.forecasts.aggregateWithStatus(locationId, horizonDays, options);
      return { value: aggregation.forecasts, stale: aggregation.stale };
    });
  }

  /**
   * Day-by-day agricultural reading of the aggregated forecast, with crop impacts when a crop is given
   */
  async analyzeForecast(
    locationId: string,
    horizonDays: number = this.config.maxForecastHorizonDays,
    options: ForecastAnalysisOptions = {}
  ): Promise<EngineResult<ForecastImplications>> {
    return this.run('analyzeForecast', async () => {
      // An unknown crop fails before any I/O
      if (options.cropId !== undefined) this.metrics.resolveProfile(options.cropId);
      const aggregation = await this.forecasts.aggregateWithStatus(locationId, horizonDays, options);
      return {
        value: this.metrics.forecastImplications(locationId, aggregation.forecasts, this.clock(), options.cropId),
        stale: aggregation.stale,
      };
    });
  }

  async upsertForecast(points: ForecastPoint[], options: CallOptions = {}): Promise<EngineResult<number>> {
    return this.run('upsertForecast', async () => {
      await this.repository.upsertForecast(points, options);
      for (const locationId of new Set(points.map(p => p.locationId))) {
        this.forecasts.invalidateLocation(locationId);
      }
      return { value: points.length, stale: false };
    });
  }

  /* ============================================================
     METRICS
  ============================================================ */

  async computeMetrics(locationId: string, options: MetricOptions = {}): Promise<EngineResult<MetricSet>> {
    return this.run('computeMetrics', async () => {
      const now = this.clock();
      const windowDays = options.windowDays ?? DEFAULT_VALUES.METRIC_WINDOW_DAYS;
      if (!Number.isInteger(windowDays) || windowDays < 1) {
        throw new ValidationError(`Metric window must be a positive whole number of days, got ${windowDays}`, {
          windowDays,
        });
      }
      const from = startOfUtcDay(subtractDays(now, windowDays - 1));

      await this.repository.getLocation(locationId, options);
      const [current, history] = await Promise.all([
        this.currentOrNull(locationId, options),
        this.repository.getHistory(locationId, from, now, options),
      ]);

      const value = this.metrics.computeMetrics({
        locationId,
        current: current?.data ?? null,
        history: history.data,
        window: { from, to: now },
        computedAt: now,
        cropId: options.cropId,
      });
      return { value, stale: history.stale || (current?.stale ?? false) };
    });
  }

  /**
   * Latest reading against the crop's growing bands. Without a reading every check is unavailable.
   */
  async assessCropSuitability(
    locationId: string,
    cropId: string,
    options: CallOptions = {}
  ): Promise<EngineResult<CropSuitability>> {
    return this.run('assessCropSuitability', async () => {
      assertValid(Validator.validateRequiredString(cropId, 'Crop ID'), 'crop id');
      this.metrics.resolveProfile(cropId);

      await this.repository.getLocation(locationId, options);
      const current = await this.currentOrNull(locationId, options);
      const value = this.metrics.assessSuitability({
        locationId,
        cropId,
        current: current?.data ?? null,
        assessedAt: this.clock(),
      });
      return { value, stale: current?.stale ?? false };
    });
  }

  /* ============================================================
     ALERTS
  ============================================================ */

  async listActiveAlerts(locationId: string, options: CallOptions = {}): Promise<EngineResult<Alert[]>> {
    return this.run('listActiveAlerts', async () => {
      const read = await this.repository.listActiveAlerts(locationId, options);
      return { value: read.data, stale: read.stale };
    });
  }

  async evaluateAlerts(locationId: string, options: EvaluateOptions = {}): Promise<EngineResult<EvaluationOutcome>> {
    return this.run('evaluateAlerts', async () => ({
      value: await this.alerts.evaluate(locationId, options),
      stale: false,
    }));
  }

  async resolveAlert(alertId: string, notes?: string, options: CallOptions = {}): Promise<EngineResult<Alert>> {
    return this.run('resolveAlert', async () => ({
      value: await this.alerts.resolve(alertId, notes, options),
      stale: false,
    }));
  }

  /* ============================================================
     HEALTH
  ============================================================ */

  getHealth(): EngineHealth {
    return {
      backend: this.resilience.getServiceHealth(BACKEND_SERVICE_NAME),
      degraded: this.resilience.isSystemDegraded(),
      registeredLocations: this.geoIndex.size,
      cache: this.repository.getCacheStats(),
    };
  }

  /* ============================================================
     INTERNALS
  ============================================================ */

  private async currentOrNull(locationId: string, options: CallOptions): Promise<CachedRead<Reading> | null> {
    try {
      return await this.repository.getCurrent(locationId, options);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async run<T>(operation: string, fn: () => Promise<Produced<T>>): Promise<EngineResult<T>> {
    try {
      const { value, stale } = await fn();
      return { ok: true, value, stale };
    } catch (error) {
      return this.failure(operation, error);
    }
  }

  /**
   * Engine errors become values; configuration faults and anything unexpected are rethrown
   */
  private failure(operation: string, error: unknown): { ok: false; error: WeatherEngineError } {
    if (isWeatherEngineError(error) && !(error instanceof ConfigurationError)) {
      this.logger.warn('Operation failed', { operation, code: error.code, error: error.message });
      return { ok: false, error };
    }
    this.logger.error('Unexpected failure', error, { operation });
    throw error;
  }
}
