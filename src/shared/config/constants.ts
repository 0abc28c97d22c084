/**
 * Engine constants and default configuration values
 */

// Table names
export const TABLE_NAMES = {
  LOCATIONS: 'weather-locations',
  READINGS: 'weather-readings',
  FORECASTS: 'weather-forecasts',
  ALERTS: 'weather-alerts',
  ACTIVE_ALERTS: 'weather-active-alerts',
} as const;

// Repository read paths; each has its own cache keyspace
export const CACHE_OPERATIONS = {
  LOCATION: 'location',
  CURRENT: 'current',
  HISTORY: 'history',
  FORECAST: 'forecast',
  ACTIVE_ALERTS: 'active-alerts',
} as const;

export type CacheOperation = typeof CACHE_OPERATIONS[keyof typeof CACHE_OPERATIONS];

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

// Default values
export const DEFAULT_VALUES = {
  LOG_LEVEL: 'INFO',
  AWS_REGION: 'ap-south-1',
  CURRENT_TTL_MS: 5 * MINUTE_MS,
  FORECAST_TTL_MS: 3 * HOUR_MS,
  HISTORY_TTL_MS: 1 * HOUR_MS,
  MAX_FORECAST_HORIZON_DAYS: 7,
  CACHE_MAX_ENTRIES: 10000,
  DEFAULT_DEADLINE_MS: 5000,
  FORECAST_DECAY_RATE: 0.1,
  DEFAULT_RADIUS_KM: 10,
  METRIC_WINDOW_DAYS: 7,
} as const;

export const EARTH_RADIUS_KM = 6371;

// Generic thresholds used when no crop profile applies
export const AGRONOMY_DEFAULTS = {
  BASE_TEMPERATURE: 10,
  DRY_BELOW: 30,
  SATURATED_ABOVE: 70,
  FROST_TEMPERATURE: 4,
  DISEASE_HUMIDITY: 80,
  DISEASE_MIN_TEMPERATURE: 20,
  SOIL_COLD_BELOW: 10,
  SOIL_HOT_ABOVE: 35,
  TREND_THRESHOLD: 0.1,
} as const;

// Day-level forecast risk bands
export const FORECAST_RISK_DEFAULTS = {
  FROST_MIN_TEMPERATURE: 2,
  HEAT_MAX_TEMPERATURE: 35,
  DISEASE_HUMIDITY: 80,
  DISEASE_MEAN_TEMPERATURE: 20,
  IDEAL_MIN_TEMPERATURE: 15,
  IDEAL_MAX_TEMPERATURE: 30,
  IDEAL_MIN_HUMIDITY: 40,
  IDEAL_MAX_HUMIDITY: 70,
  FAVORABLE_MIN_MEAN_TEMPERATURE: 15,
  FAVORABLE_MAX_MEAN_TEMPERATURE: 30,
  DRY_RAIN_PROBABILITY: 30,
  WET_RAIN_PROBABILITY: 70,
} as const;

export const ALERT_DEFAULTS = {
  FLOOD_RAINFALL_MM: 50,
  DRY_CONSECUTIVE_DAYS: 5,
  FREEZE_TEMPERATURE: 0,
} as const;
