/**
 * Derived agricultural metric models
 * Metrics are transient: regenerated on demand, never persisted as source of truth
 */

import {
  HeatStressCategory,
  MetricKind,
  RiskFactor,
  SoilMoistureCategory,
  SoilTemperatureStatus,
} from './core';

export type MetricResult<V, C = never> =
  | { available: true; value: V; category?: C }
  | { available: false; reason: string };

export interface MetricWindow {
  from: Date;
  to: Date;
  sampleCount: number;
}

export interface MetricValueMap {
  [MetricKind.HEAT_STRESS_INDEX]: MetricResult<number, HeatStressCategory>;
  [MetricKind.SOIL_MOISTURE_CATEGORY]: MetricResult<number, SoilMoistureCategory>;
  [MetricKind.GROWING_DEGREE_DAYS]: MetricResult<number>;
  [MetricKind.FROST_RISK]: MetricResult<boolean>;
  [MetricKind.DISEASE_RISK]: MetricResult<boolean>;
  [MetricKind.SOIL_TEMPERATURE_STATUS]: MetricResult<number, SoilTemperatureStatus>;
}

export interface AgriculturalMetric<K extends MetricKind = MetricKind> {
  locationId: string;
  kind: K;
  result: MetricValueMap[K];
  window: MetricWindow;
  computedAt: Date;
}

export interface MetricSet {
  locationId: string;
  cropId?: string;
  computedAt: Date;
  heatStress: AgriculturalMetric<MetricKind.HEAT_STRESS_INDEX>;
  soilMoisture: AgriculturalMetric<MetricKind.SOIL_MOISTURE_CATEGORY>;
  growingDegreeDays: AgriculturalMetric<MetricKind.GROWING_DEGREE_DAYS>;
  frostRisk: AgriculturalMetric<MetricKind.FROST_RISK>;
  diseaseRisk: AgriculturalMetric<MetricKind.DISEASE_RISK>;
  soilTemperature: AgriculturalMetric<MetricKind.SOIL_TEMPERATURE_STATUS>;
}

export interface SoilMoistureThresholds {
  dryBelow: number; // percentage
  saturatedAbove: number; // percentage
}

// Conditions a crop grows well in; soil moisture uses the moisture thresholds
export interface CropGrowingBands {
  minTemperature: number; // Celsius
  maxTemperature: number; // Celsius
  minHumidity: number; // percentage
  maxHumidity: number; // percentage
}

// Per-crop thresholds supplied by the crop-profile collaborator
export interface CropProfile {
  cropId: string;
  displayName: string;
  baseTemperature: number; // Celsius, for growing degree days
  moisture: SoilMoistureThresholds;
  growing?: CropGrowingBands;
}

export interface CropSuitability {
  locationId: string;
  cropId: string;
  assessedAt: Date;
  readingAt: Date | null;
  temperature: MetricResult<boolean>;
  humidity: MetricResult<boolean>;
  soilMoisture: MetricResult<boolean>;
  riskFactors: RiskFactor[];
}

/* Forecast implications */

export type WaterRequirement = 'high' | 'moderate' | 'low';

export interface ForecastDayRisks {
  frost: MetricResult<boolean>;
  heatStress: MetricResult<boolean>;
  disease: MetricResult<boolean>;
  idealGrowing: MetricResult<boolean>;
}

export interface CropForecastImpact {
  cropId: string;
  temperatureSuitable: MetricResult<boolean>;
  humiditySuitable: MetricResult<boolean>;
  waterRequirement: MetricResult<WaterRequirement>;
  recommendedActions: string[];
}

export interface ForecastDayImplications {
  forecastDate: string;
  confidence: number;
  risks: ForecastDayRisks;
  crop?: CropForecastImpact;
}

export interface ForecastOutlook {
  totalExpectedRainfall: number; // mm, over days with a rainfall figure
  frostRiskDays: number;
  heatStressDays: number;
  favorableDays: number;
}

export interface ForecastImplications {
  locationId: string;
  cropId?: string;
  generatedAt: Date;
  days: ForecastDayImplications[];
  outlook: ForecastOutlook;
  recommendations: string[];
}
