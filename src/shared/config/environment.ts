/**
 * Engine configuration
 * Loaded from environment variables or built in code, validated once, then passed
 * explicitly to every component that needs it
 */

import { ConfigurationError } from '../utils/errors';
import { AGRONOMY_DEFAULTS, ALERT_DEFAULTS, DEFAULT_VALUES, TABLE_NAMES } from './constants';

export interface AlertThresholds {
  floodRainfallMm: number;
  dryConsecutiveDays: number;
  frostTemperature: number;
  freezeTemperature: number;
  diseaseHumidity: number;
  diseaseMinTemperature: number;
}

export interface TableNames {
  locations: string;
  readings: string;
  forecasts: string;
  alerts: string;
  activeAlerts: string;
}

export interface EngineConfig {
  // Cache
  currentTtlMs: number;
  forecastTtlMs: number;
  historyTtlMs: number;
  cacheMaxEntries: number;
  degradedAvailabilityOnBackendFailure: boolean;

  // Request handling
  defaultDeadlineMs: number;

  // Forecast
  maxForecastHorizonDays: number;
  forecastDecayRate: number;

  // Alerts
  alertThresholds: AlertThresholds;
  alertHistoryEnabled: boolean;

  // Persistence
  region: string;
  tables: TableNames;

  // Application Settings
  logLevel: string;
}

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'alertThresholds' | 'tables'>> & {
  alertThresholds?: Partial<AlertThresholds>;
  tables?: Partial<TableNames>;
};

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  currentTtlMs: DEFAULT_VALUES.CURRENT_TTL_MS,
  forecastTtlMs: DEFAULT_VALUES.FORECAST_TTL_MS,
  historyTtlMs: DEFAULT_VALUES.HISTORY_TTL_MS,
  cacheMaxEntries: DEFAULT_VALUES.CACHE_MAX_ENTRIES,
  degradedAvailabilityOnBackendFailure: false,
  defaultDeadlineMs: DEFAULT_VALUES.DEFAULT_DEADLINE_MS,
  maxForecastHorizonDays: DEFAULT_VALUES.MAX_FORECAST_HORIZON_DAYS,
  forecastDecayRate: DEFAULT_VALUES.FORECAST_DECAY_RATE,
  alertThresholds: {
    floodRainfallMm: ALERT_DEFAULTS.FLOOD_RAINFALL_MM,
    dryConsecutiveDays: ALERT_DEFAULTS.DRY_CONSECUTIVE_DAYS,
    frostTemperature: AGRONOMY_DEFAULTS.FROST_TEMPERATURE,
    freezeTemperature: ALERT_DEFAULTS.FREEZE_TEMPERATURE,
    diseaseHumidity: AGRONOMY_DEFAULTS.DISEASE_HUMIDITY,
    diseaseMinTemperature: AGRONOMY_DEFAULTS.DISEASE_MIN_TEMPERATURE,
  },
  alertHistoryEnabled: false,
  region: DEFAULT_VALUES.AWS_REGION,
  tables: {
    locations: TABLE_NAMES.LOCATIONS,
    readings: TABLE_NAMES.READINGS,
    forecasts: TABLE_NAMES.FORECASTS,
    alerts: TABLE_NAMES.ALERTS,
    activeAlerts: TABLE_NAMES.ACTIVE_ALERTS,
  },
  logLevel: DEFAULT_VALUES.LOG_LEVEL,
};

class EngineConfigLoader {
  private readonly errors: string[] = [];

  constructor(private readonly env: EnvSource) {}

  load(): EngineConfig {
    const defaults = DEFAULT_ENGINE_CONFIG;
    const config: EngineConfig = {
      currentTtlMs: this.int('WEATHER_CURRENT_TTL_MS', defaults.currentTtlMs),
      forecastTtlMs: this.int('WEATHER_FORECAST_TTL_MS', defaults.forecastTtlMs),
      historyTtlMs: this.int('WEATHER_HISTORY_TTL_MS', defaults.historyTtlMs),
      cacheMaxEntries: this.int('WEATHER_CACHE_MAX_ENTRIES', defaults.cacheMaxEntries),
      degradedAvailabilityOnBackendFailure: this.bool(
        'WEATHER_DEGRADED_AVAILABILITY',
        defaults.degradedAvailabilityOnBackendFailure
      ),
      defaultDeadlineMs: this.int('WEATHER_DEFAULT_DEADLINE_MS', defaults.defaultDeadlineMs),
      maxForecastHorizonDays: this.int('WEATHER_MAX_FORECAST_DAYS', defaults.maxForecastHorizonDays),
      forecastDecayRate: this.float('WEATHER_FORECAST_DECAY_RATE', defaults.forecastDecayRate),
      alertThresholds: {
        floodRainfallMm: this.float('WEATHER_FLOOD_RAINFALL_MM', defaults.alertThresholds.floodRainfallMm),
        dryConsecutiveDays: this.int('WEATHER_DRY_CONSECUTIVE_DAYS', defaults.alertThresholds.dryConsecutiveDays),
        frostTemperature: this.float('WEATHER_FROST_TEMP', defaults.alertThresholds.frostTemperature),
        freezeTemperature: this.float('WEATHER_FREEZE_TEMP', defaults.alertThresholds.freezeTemperature),
        diseaseHumidity: this.float('WEATHER_DISEASE_HUMIDITY', defaults.alertThresholds.diseaseHumidity),
        diseaseMinTemperature: this.float(
          'WEATHER_DISEASE_MIN_TEMP',
          defaults.alertThresholds.diseaseMinTemperature
        ),
      },
      alertHistoryEnabled: this.bool('WEATHER_ALERT_HISTORY_ENABLED', defaults.alertHistoryEnabled),
      region: this.env.AWS_REGION || defaults.region,
      tables: {
        locations: this.env.LOCATIONS_TABLE_NAME || defaults.tables.locations,
        readings: this.env.READINGS_TABLE_NAME || defaults.tables.readings,
        forecasts: this.env.FORECASTS_TABLE_NAME || defaults.tables.forecasts,
        alerts: this.env.ALERTS_TABLE_NAME || defaults.tables.alerts,
        activeAlerts: this.env.ACTIVE_ALERTS_TABLE_NAME || defaults.tables.activeAlerts,
      },
      logLevel: this.env.LOG_LEVEL || defaults.logLevel,
    };

    if (this.errors.length > 0) {
      throw new ConfigurationError(`Environment configuration errors:\n${this.errors.join('\n')}`, {
        errors: [...this.errors],
      });
    }
    return config;
  }

  private int(name: string, fallback: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      this.errors.push(`${name} must be an integer, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  private float(name: string, fallback: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.errors.push(`${name} must be a number, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  private bool(name: string, fallback: boolean): boolean {
    const raw = this.env[name];
    if (raw === undefined || raw === '') return fallback;
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    this.errors.push(`${name} must be "true" or "false", got "${raw}"`);
    return fallback;
  }
}

/**
 * Check ranges; collects every problem before failing
 */
export function validateEngineConfig(config: EngineConfig): void {
  const errors: string[] = [];

  if (config.currentTtlMs < 1000) {
    errors.push('currentTtlMs must be at least 1000 milliseconds');
  }
  if (config.forecastTtlMs < 1000) {
    errors.push('forecastTtlMs must be at least 1000 milliseconds');
  }
  if (config.historyTtlMs < 1000) {
    errors.push('historyTtlMs must be at least 1000 milliseconds');
  }
  if (config.cacheMaxEntries < 1) {
    errors.push('cacheMaxEntries must be at least 1');
  }
  if (config.defaultDeadlineMs < 1 || config.defaultDeadlineMs > 900000) {
    errors.push('defaultDeadlineMs must be between 1 and 900000 milliseconds');
  }
  if (config.maxForecastHorizonDays < 1 || config.maxForecastHorizonDays > 16) {
    errors.push('maxForecastHorizonDays must be between 1 and 16');
  }
  if (config.forecastDecayRate < 0 || config.forecastDecayRate > 5) {
    errors.push('forecastDecayRate must be between 0 and 5');
  }
  if (config.alertThresholds.floodRainfallMm <= 0) {
    errors.push('floodRainfallMm must be positive');
  }
  if (config.alertThresholds.dryConsecutiveDays < 1 || config.alertThresholds.dryConsecutiveDays > 60) {
    errors.push('dryConsecutiveDays must be between 1 and 60');
  }
  if (config.alertThresholds.freezeTemperature > config.alertThresholds.frostTemperature) {
    errors.push('freezeTemperature must not exceed frostTemperature');
  }
  if (config.alertThresholds.diseaseHumidity < 0 || config.alertThresholds.diseaseHumidity > 100) {
    errors.push('diseaseHumidity must be between 0 and 100');
  }

  const validLogLevels = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
  if (!validLogLevels.includes(config.logLevel.toUpperCase())) {
    errors.push(`LOG_LEVEL must be one of: ${validLogLevels.join(', ')}`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Engine configuration errors:\n${errors.join('\n')}`, { errors });
  }
}

/**
 * Read configuration from environment variables
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  const config = new EngineConfigLoader(env).load();
  validateEngineConfig(config);
  return config;
}

/**
 * Build configuration in code on top of the defaults
 */
export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    alertThresholds: { ...DEFAULT_ENGINE_CONFIG.alertThresholds, ...overrides.alertThresholds },
    tables: { ...DEFAULT_ENGINE_CONFIG.tables, ...overrides.tables },
  };
  validateEngineConfig(config);
  return config;
}
