/**
 * HTTP forecast source
 * Adapts a JSON daily-forecast endpoint (one-call style `daily` array, metric units)
 * into forecast points, with retries and exponential backoff
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Clock, ForecastPoint, Location, systemClock } from '../types';
import { Logger, createLogger } from '../shared/utils/logger';
import { errorMessage } from '../shared/utils/errors';
import { toIsoDate } from '../shared/utils/dates';
import { ForecastSource } from './forecast-source';

interface DailyForecastEntry {
  dt: number; // unix seconds
  temp: {
    min: number;
    max: number;
    day: number;
  };
  humidity?: number;
  pop?: number; // probability of precipitation, 0-1
  rain?: number; // mm, 0 when the provider omits it
  wind_speed?: number; // m/s
  wind_deg?: number;
}

export interface HttpForecastSourceConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
  confidence: number; // base confidence assigned to every point from this source
  maxRetries?: number;
  timeoutMs?: number;
  retryBaseDelayMs?: number;
}

export interface HttpForecastSourceDependencies {
  client?: AxiosInstance;
  logger?: Logger;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_RETRY_DELAY_MS = 10000;
const MS_TO_KMH = 3.6;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function optionalNumber(value: unknown): number | undefined {
  return isNumber(value) ? value : undefined;
}

/**
 * Keep only entries with a timestamp and a complete temperature block
 */
export function parseDailyForecast(body: unknown): DailyForecastEntry[] {
  if (!isRecord(body) || !Array.isArray(body.daily)) {
    throw new Error('Forecast response has no daily array');
  }

  const entries: DailyForecastEntry[] = [];
  for (const raw of body.daily) {
    if (!isRecord(raw) || !isNumber(raw.dt) || !isRecord(raw.temp)) continue;
    const { min, max, day } = raw.temp;
    if (!isNumber(min) || !isNumber(max) || !isNumber(day)) continue;

    entries.push({
      dt: raw.dt,
      temp: { min, max, day },
      humidity: optionalNumber(raw.humidity),
      pop: optionalNumber(raw.pop),
      // The provider leaves `rain` out on dry days; a value it sends but we cannot read stays unknown
      rain: raw.rain === undefined ? 0 : optionalNumber(raw.rain),
      wind_speed: optionalNumber(raw.wind_speed),
      wind_deg: optionalNumber(raw.wind_deg),
    });
  }
  return entries;
}

export class HttpForecastSource implements ForecastSource {
  readonly name: string;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly config: HttpForecastSourceConfig, deps: HttpForecastSourceDependencies = {}) {
    this.name = config.name;
    this.client = deps.client ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs ?? 10000 });
    this.logger = deps.logger ?? createLogger(`HttpForecastSource:${config.name}`);
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.maxRetries = config.maxRetries ?? 3;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;
  }

  async fetch(location: Location, signal?: AbortSignal): Promise<ForecastPoint[]> {
    const startTime = Date.now();
    const response = await this.requestWithRetry(location, signal);
    const issuedAt = this.clock();

    const points = parseDailyForecast(response.data).map(entry => this.toForecastPoint(location, entry, issuedAt));
    this.logger.performance('fetchForecast', Date.now() - startTime, {
      locationId: location.locationId,
      points: points.length,
    });
    return points;
  }

  private toForecastPoint(location: Location, entry: DailyForecastEntry, issuedAt: Date): ForecastPoint {
    return {
      locationId: location.locationId,
      forecastDate: toIsoDate(new Date(entry.dt * 1000)),
      source: this.name,
      issuedAt,
      confidence: this.config.confidence,
      temperature: entry.temp.day,
      minTemperature: entry.temp.min,
      maxTemperature: entry.temp.max,
      humidity: entry.humidity,
      rainfall: entry.rain,
      rainfallProbability: entry.pop === undefined ? undefined : Math.round(entry.pop * 100),
      windSpeed: entry.wind_speed === undefined ? undefined : Math.round(entry.wind_speed * MS_TO_KMH * 10) / 10,
      windDirection: entry.wind_deg,
    };
  }

  private async requestWithRetry(location: Location, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    for (let attempt = 1; ; attempt++) {
      try {
        this.logger.debug('Requesting forecast', { locationId: location.locationId, attempt });
        const response = await this.client.get<unknown>('/forecast/daily', {
          params: {
            lat: location.latitude,
            lon: location.longitude,
            units: 'metric',
            appid: this.config.apiKey,
          },
          headers: { Accept: 'application/json' },
          signal,
        });

        if (response.status === 200) {
          return response;
        }
        throw new Error(`Forecast API returned status ${response.status}`);
      } catch (error) {
        this.logger.warn('Forecast API call failed', {
          attempt,
          maxRetries: this.maxRetries,
          error: errorMessage(error),
        });

        if (attempt >= this.maxRetries || signal?.aborted) {
          throw new Error(`Forecast API call failed after ${attempt} attempts: ${errorMessage(error)}`, { cause: error });
        }

        // Exponential backoff
        const delay = Math.min(this.retryBaseDelayMs * Math.pow(2, attempt - 1), MAX_RETRY_DELAY_MS);
        await this.sleep(delay);
      }
    }
  }
}
