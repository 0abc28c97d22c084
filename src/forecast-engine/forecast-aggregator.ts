/**
 * Forecast Aggregator
 * Merges stored forecast points and live sources into one forecast per day,
 * weighting each source by its confidence and decaying confidence with horizon
 */

import {
  AggregatedForecast,
  Clock,
  ForecastPoint,
  Location,
  MEASUREMENT_FIELDS,
  MeasurementField,
  systemClock,
} from '../types';
import { EngineConfig } from '../shared/config/environment';
import { Logger } from '../shared/utils/logger';
import { CallOptions, withDeadline } from '../shared/utils/deadline';
import { InsufficientDataError, NotFoundError, ValidationError, errorMessage } from '../shared/utils/errors';
import { Validator } from '../shared/utils/validation';
import { addDays, toIsoDate } from '../shared/utils/dates';
import { CachedRepository } from '../data-access/cached-repository';
import { TtlCache } from '../data-access/ttl-cache';
import { SingleFlight } from '../data-access/single-flight';
import { ForecastSource } from './forecast-source';

type AggregatedField =
  | MeasurementField
  | 'minTemperature'
  | 'maxTemperature'
  | 'rainfallProbability';

const AGGREGATED_FIELDS: readonly AggregatedField[] = [
  ...MEASUREMENT_FIELDS,
  'minTemperature',
  'maxTemperature',
  'rainfallProbability',
];

export interface AggregateOptions extends CallOptions {
  onMissingDay?: (error: InsufficientDataError) => void;
}

export interface ForecastAggregation {
  forecasts: AggregatedForecast[];
  stale: boolean;
  skippedSources: string[];
}

export interface ForecastAggregatorDependencies {
  repository: CachedRepository;
  config: EngineConfig;
  logger: Logger;
  sources?: ForecastSource[];
  clock?: Clock;
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * e^(-rate * horizonDays)
 */
export function horizonDecay(horizonDays: number, rate: number): number {
  return Math.exp(-rate * horizonDays);
}

/**
 * Merge one day's points. Confidence-weighted mean per field; base confidence is
 * the confidence-weighted mean of the confidences. Zero-confidence points only
 * count when every point for the day has zero confidence.
 */
export function mergeDay(
  locationId: string,
  forecastDate: string,
  horizonDays: number,
  points: ForecastPoint[],
  decayRate: number
): AggregatedForecast {
  const totalConfidence = points.reduce((sum, p) => sum + p.confidence, 0);
  const weightOf = (point: ForecastPoint): number => (totalConfidence > 0 ? point.confidence : 1);
  const baseConfidence = totalConfidence > 0
    ? points.reduce((sum, p) => sum + p.confidence * p.confidence, 0) / totalConfidence
    : 0;

  const merged: AggregatedForecast = {
    locationId,
    forecastDate,
    horizonDays,
    baseConfidence: round(baseConfidence),
    confidence: round(baseConfidence * horizonDecay(horizonDays, decayRate)),
    sources: [...new Set(points.map(p => p.source))].sort(),
  };

  for (const field of AGGREGATED_FIELDS) {
    let weightedSum = 0;
    let weightTotal = 0;
    for (const point of points) {
      const value = point[field];
      if (value === undefined) continue;
      const weight = weightOf(point);
      weightedSum += weight * value;
      weightTotal += weight;
    }
    if (weightTotal > 0) {
      merged[field] = round(weightedSum / weightTotal);
    }
  }

  return merged;
}

export class ForecastAggregator {
  private readonly repository: CachedRepository;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly sources: ForecastSource[];
  private readonly clock: Clock;

  // Live source results per (source, location, day), shared like repository reads
  private readonly sourceCache: TtlCache<ForecastPoint[]>;
  private readonly sourceFlights = new SingleFlight<ForecastPoint[]>();
  private readonly generations = new Map<string, number>();

  constructor(deps: ForecastAggregatorDependencies) {
    this.repository = deps.repository;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'ForecastAggregator' });
    this.sources = deps.sources ?? [];
    this.clock = deps.clock ?? systemClock;
    this.sourceCache = new TtlCache<ForecastPoint[]>(this.config.cacheMaxEntries, () => this.clock().getTime());
  }

  /**
   * Drop cached source results and detach in-flight source fetches for a location
   */
  invalidateLocation(locationId: string): void {
    this.generations.set(locationId, this.generationOf(locationId) + 1);
    const removed = this.sourceCache.invalidateLocation(locationId);
    this.sourceFlights.detachLocation(locationId);
    this.logger.debug('Source cache invalidated', { locationId, removed });
  }

  /**
   * One aggregated forecast per day from today for `horizonDays` days (capped by
   * configuration), ascending. Days without any point are omitted.
   */
  async aggregate(locationId: string, horizonDays: number, options: AggregateOptions = {}): Promise<AggregatedForecast[]> {
    const { forecasts } = await this.aggregateWithStatus(locationId, horizonDays, options);
    return forecasts;
  }

  async aggregateWithStatus(
    locationId: string,
    horizonDays: number,
    options: AggregateOptions = {}
  ): Promise<ForecastAggregation> {
    if (!Number.isInteger(horizonDays) || horizonDays < 0) {
      throw new ValidationError(`Horizon must be a non-negative whole number of days, got ${horizonDays}`, {
        horizonDays,
      });
    }
    const days = Math.min(horizonDays, this.config.maxForecastHorizonDays);
    const startTime = Date.now();

    const location = await this.repository.getLocation(locationId, options);
    const stored = await this.loadStoredPoints(locationId, options);
    const live = await this.fetchSources(location.data, options);

    const today = toIsoDate(this.clock());
    const byDate = new Map<string, ForecastPoint[]>();
    for (const point of [...stored.points, ...live.points]) {
      const bucket = byDate.get(point.forecastDate) ?? [];
      bucket.push(point);
      byDate.set(point.forecastDate, bucket);
    }

    const forecasts: AggregatedForecast[] = [];
    let ceiling = 1;
    for (let h = 0; h < days; h++) {
      const date = addDays(today, h);
      const points = byDate.get(date);
      if (!points || points.length === 0) {
        const missing = new InsufficientDataError(`No forecast points for ${locationId} on ${date}`, {
          locationId,
          forecastDate: date,
          horizonDays: h,
        });
        this.logger.debug('Forecast day omitted', { locationId, forecastDate: date, horizonDays: h });
        options.onMissingDay?.(missing);
        continue;
      }

      const merged = mergeDay(locationId, date, h, points, this.config.forecastDecayRate);
      // Never more confident about a later day than an earlier one
      merged.confidence = Math.min(merged.confidence, ceiling);
      ceiling = merged.confidence;
      forecasts.push(merged);
    }

    this.logger.performance('aggregateForecast', Date.now() - startTime, {
      locationId,
      days: forecasts.length,
      skippedSources: live.skipped,
    });
    return {
      forecasts,
      stale: location.stale || stored.stale,
      skippedSources: live.skipped,
    };
  }

  private async loadStoredPoints(
    locationId: string,
    options: CallOptions
  ): Promise<{ points: ForecastPoint[]; stale: boolean }> {
    try {
      const read = await this.repository.getForecast(locationId, options);
      return { points: read.data, stale: read.stale };
    } catch (error) {
      // No stored forecast is fine when live sources cover the horizon
      if (error instanceof NotFoundError) {
        return { points: [], stale: false };
      }
      throw error;
    }
  }

  private async fetchSources(
    location: Location,
    options: CallOptions
  ): Promise<{ points: ForecastPoint[]; skipped: string[] }> {
    const today = toIsoDate(this.clock());
    const results = await Promise.allSettled(this.sources.map(source => this.fetchSource(source, location, today, options)));

    const points: ForecastPoint[] = [];
    const skipped: string[] = [];
    results.forEach((result, index) => {
      const source = this.sources[index];
      if (result.status === 'rejected') {
        skipped.push(source.name);
        this.logger.warn('Forecast source failed; continuing without it', {
          source: source.name,
          locationId: location.locationId,
          error: errorMessage(result.reason),
        });
        return;
      }

      for (const point of result.value) {
        const candidate = { ...point, locationId: location.locationId };
        const validation = Validator.validateForecastPoint(candidate);
        if (validation.isValid) {
          points.push(candidate);
        } else {
          this.logger.warn('Dropping invalid forecast point', {
            source: source.name,
            forecastDate: point.forecastDate,
            errors: validation.errors,
          });
        }
      }
    });

    return { points, skipped };
  }

  /**
   * One source's points for today: cached for forecastTtlMs, one fetch shared by
   * concurrent callers, each caller released at its own deadline
   */
  private fetchSource(
    source: ForecastSource,
    location: Location,
    today: string,
    options: CallOptions
  ): Promise<ForecastPoint[]> {
    const { locationId } = location;
    const key = `${source.name}:${locationId}:${today}`;
    const hit = this.sourceCache.get(key);
    if (hit) return Promise.resolve(hit.value);

    const generation = this.generationOf(locationId);
    // Shared with other callers, so no single caller's signal may cancel it
    const { promise } = this.sourceFlights.run(key, locationId, async () => {
      const points = await source.fetch(location);
      if (this.generationOf(locationId) === generation) {
        this.sourceCache.set(key, locationId, points, this.config.forecastTtlMs);
      }
      return points;
    });

    return withDeadline(
      promise,
      options.deadlineMs ?? this.config.defaultDeadlineMs,
      `forecastSource:${source.name}`,
      options.signal
    );
  }

  private generationOf(locationId: string): number {
    return this.generations.get(locationId) ?? 0;
  }
}
