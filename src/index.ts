/**
 * Weather Analytics Engine public API
 */

export * from './types';
export * from './shared';

export { GeoIndex, haversineKm } from './geo-index/geo-index';

export { CachedRepository, BACKEND_SERVICE_NAME } from './data-access/cached-repository';
export type { CachedRead } from './data-access/cached-repository';
export type { WeatherStore, LocationEnumerator } from './data-access/weather-store';
export { DynamoWeatherStore } from './data-access/dynamo-weather-store';
export { TtlCache } from './data-access/ttl-cache';
export type { CacheStats } from './data-access/ttl-cache';

export { MetricsEngine } from './metrics-engine/metrics-engine';
export type { MetricInputs, SuitabilityInputs } from './metrics-engine/metrics-engine';
export * from './metrics-engine/crop-profiles';
export { heatIndexCelsius, categorizeHeatIndex } from './metrics-engine/heat-index';
export { summarizeDays, trend, assessCropSuitability } from './metrics-engine/agronomy';
export type { SuitabilityChecks } from './metrics-engine/agronomy';
export { analyzeForecastDays, FORECAST_RECOMMENDATIONS } from './metrics-engine/forecast-implications';
export type { ForecastReading } from './metrics-engine/forecast-implications';

export { ForecastAggregator } from './forecast-engine/forecast-aggregator';
export type { AggregateOptions, ForecastAggregation } from './forecast-engine/forecast-aggregator';
export type { ForecastSource } from './forecast-engine/forecast-source';
export { HttpForecastSource } from './forecast-engine/http-forecast-source';
export type { HttpForecastSourceConfig } from './forecast-engine/http-forecast-source';

export { AlertEvaluator } from './alert-engine/alert-evaluator';
export type { EvaluateOptions } from './alert-engine/alert-evaluator';
export { ALERT_RULES } from './alert-engine/alert-rules';
export type { AlertRule, RuleContext, RuleOutcome } from './alert-engine/alert-rules';
export { InMemoryAlertHistoryLog } from './alert-engine/alert-history';
export type { AlertHistoryLog, AlertHistoryFilter } from './alert-engine/alert-history';

export { WeatherAnalyticsEngine } from './analytics-engine/weather-analytics-engine';
export type {
  WeatherAnalyticsEngineDependencies,
  EngineResult,
  EngineHealth,
  HistoryAnalysis,
  MetricOptions,
  ForecastAnalysisOptions,
} from './analytics-engine/weather-analytics-engine';

export { createWeatherHandlers } from './api/weather-handlers';
export type { WeatherHandlers, WeatherHandler } from './api/weather-handlers';
