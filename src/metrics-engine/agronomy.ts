/**
 * Pure agronomic metric functions
 * Missing inputs yield an unavailable result, never a zero
 */

import {
  CropProfile,
  DailySummary,
  HeatStressCategory,
  MeasurementField,
  MetricResult,
  Reading,
  RiskFactor,
  SoilMoistureCategory,
  SoilMoistureThresholds,
  SoilTemperatureStatus,
  Trend,
} from '../types';
import { AGRONOMY_DEFAULTS } from '../shared/config/constants';
import { eachIsoDate, toIsoDate } from '../shared/utils/dates';
import { heatIndexCelsius } from './heat-index';
import { validateMoistureThresholds } from './crop-profiles';

export interface GrowingDegreeDayOptions {
  from: Date;
  to: Date;
  baseTemperature: number;
}

export interface DiseaseRiskThresholds {
  humidity: number;
  minTemperature: number;
}

export interface SoilTemperatureBands {
  coldBelow: number;
  hotAbove: number;
}

const DEFAULT_DISEASE_THRESHOLDS: DiseaseRiskThresholds = {
  humidity: AGRONOMY_DEFAULTS.DISEASE_HUMIDITY,
  minTemperature: AGRONOMY_DEFAULTS.DISEASE_MIN_TEMPERATURE,
};

const DEFAULT_SOIL_TEMPERATURE_BANDS: SoilTemperatureBands = {
  coldBelow: AGRONOMY_DEFAULTS.SOIL_COLD_BELOW,
  hotAbove: AGRONOMY_DEFAULTS.SOIL_HOT_ABOVE,
};

function unavailable(reason: string): { available: false; reason: string } {
  return { available: false, reason };
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function heatStressIndex(reading: Reading | null): MetricResult<number, HeatStressCategory> {
  if (!reading || reading.temperature === undefined) {
    return unavailable('No temperature reading');
  }
  if (reading.humidity === undefined) {
    return unavailable('No humidity reading');
  }
  const { value, category } = heatIndexCelsius(reading.temperature, reading.humidity);
  return { available: true, value, category };
}

export function soilMoistureCategory(
  reading: Reading | null,
  thresholds: SoilMoistureThresholds
): MetricResult<number, SoilMoistureCategory> {
  validateMoistureThresholds(thresholds);
  if (!reading || reading.soilMoisture === undefined) {
    return unavailable('No soil moisture reading');
  }
  return { available: true, value: reading.soilMoisture, category: classifySoilMoisture(reading.soilMoisture, thresholds) };
}

export function classifySoilMoisture(moisture: number, thresholds: SoilMoistureThresholds): SoilMoistureCategory {
  if (moisture < thresholds.dryBelow) return SoilMoistureCategory.DRY;
  if (moisture > thresholds.saturatedAbove) return SoilMoistureCategory.SATURATED;
  return SoilMoistureCategory.OPTIMAL;
}

/**
 * Sum over UTC days of max(0, (dailyMax + dailyMin) / 2 - base).
 * Every day in the range needs at least one temperature sample.
 */
export function growingDegreeDays(readings: Reading[], options: GrowingDegreeDayOptions): MetricResult<number> {
  const { from, to, baseTemperature } = options;
  if (from.getTime() > to.getTime()) {
    return unavailable('Empty window');
  }

  const extremes = new Map<string, { min: number; max: number }>();
  for (const reading of readings) {
    if (reading.temperature === undefined) continue;
    const time = reading.timestamp.getTime();
    if (time < from.getTime() || time > to.getTime()) continue;

    const day = toIsoDate(reading.timestamp);
    const current = extremes.get(day);
    extremes.set(day, current
      ? { min: Math.min(current.min, reading.temperature), max: Math.max(current.max, reading.temperature) }
      : { min: reading.temperature, max: reading.temperature });
  }

  let total = 0;
  const missing: string[] = [];
  for (const day of eachIsoDate(from, to)) {
    const dayExtremes = extremes.get(day);
    if (!dayExtremes) {
      missing.push(day);
      continue;
    }
    total += Math.max(0, (dayExtremes.max + dayExtremes.min) / 2 - baseTemperature);
  }

  if (missing.length > 0) {
    return unavailable(`No temperature samples for ${missing.length} day(s): ${missing.join(', ')}`);
  }
  return { available: true, value: round(total) };
}

export function frostRisk(
  reading: Reading | null,
  frostTemperature: number = AGRONOMY_DEFAULTS.FROST_TEMPERATURE
): MetricResult<boolean> {
  if (!reading || reading.temperature === undefined) {
    return unavailable('No temperature reading');
  }
  return { available: true, value: reading.temperature <= frostTemperature };
}

export function diseaseRisk(
  reading: Reading | null,
  thresholds: DiseaseRiskThresholds = DEFAULT_DISEASE_THRESHOLDS
): MetricResult<boolean> {
  if (!reading || reading.temperature === undefined || reading.humidity === undefined) {
    return unavailable('Needs both temperature and humidity');
  }
  return {
    available: true,
    value: reading.humidity >= thresholds.humidity && reading.temperature >= thresholds.minTemperature,
  };
}

export function soilTemperatureStatus(
  reading: Reading | null,
  bands: SoilTemperatureBands = DEFAULT_SOIL_TEMPERATURE_BANDS
): MetricResult<number, SoilTemperatureStatus> {
  if (!reading || reading.soilTemperature === undefined) {
    return unavailable('No soil temperature reading');
  }
  const value = reading.soilTemperature;
  let category = SoilTemperatureStatus.OPTIMAL;
  if (value < bands.coldBelow) category = SoilTemperatureStatus.COLD;
  else if (value > bands.hotAbove) category = SoilTemperatureStatus.HOT;
  return { available: true, value, category };
}

export interface SuitabilityChecks {
  temperature: MetricResult<boolean>;
  humidity: MetricResult<boolean>;
  soilMoisture: MetricResult<boolean>;
  riskFactors: RiskFactor[];
}

export function withinBand(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * Current conditions against the crop's growing bands (inclusive), plus the
 * stresses they put on it. Soil moisture is suitable between dryBelow and saturatedAbove.
 */
export function assessCropSuitability(
  reading: Reading | null,
  profile: CropProfile,
  diseaseHumidity: number = AGRONOMY_DEFAULTS.DISEASE_HUMIDITY
): SuitabilityChecks {
  const bands = profile.growing;
  const temperature = reading?.temperature;
  const humidity = reading?.humidity;
  const soilMoisture = reading?.soilMoisture;
  const noBands = unavailable(`No growing bands for crop ${profile.cropId}`);

  const riskFactors: RiskFactor[] = [];
  if (bands && temperature !== undefined) {
    if (temperature <= bands.minTemperature) riskFactors.push(RiskFactor.COLD_STRESS);
    if (temperature >= bands.maxTemperature) riskFactors.push(RiskFactor.HEAT_STRESS);
  }
  if (humidity !== undefined && humidity >= diseaseHumidity) riskFactors.push(RiskFactor.DISEASE);
  if (soilMoisture !== undefined && soilMoisture < profile.moisture.dryBelow) riskFactors.push(RiskFactor.DROUGHT_STRESS);

  let temperatureCheck: MetricResult<boolean> = unavailable('No temperature reading');
  if (temperature !== undefined) {
    temperatureCheck = bands
      ? { available: true, value: withinBand(temperature, bands.minTemperature, bands.maxTemperature) }
      : noBands;
  }

  let humidityCheck: MetricResult<boolean> = unavailable('No humidity reading');
  if (humidity !== undefined) {
    humidityCheck = bands
      ? { available: true, value: withinBand(humidity, bands.minHumidity, bands.maxHumidity) }
      : noBands;
  }

  return {
    temperature: temperatureCheck,
    humidity: humidityCheck,
    soilMoisture: soilMoisture === undefined
      ? unavailable('No soil moisture reading')
      : {
          available: true,
          value: withinBand(soilMoisture, profile.moisture.dryBelow, profile.moisture.saturatedAbove),
        },
    riskFactors,
  };
}

/**
 * Daily aggregates per UTC day, ascending
 */
export function summarizeDays(readings: Reading[]): DailySummary[] {
  const byDay = new Map<string, Reading[]>();
  for (const reading of readings) {
    const day = toIsoDate(reading.timestamp);
    const bucket = byDay.get(day) ?? [];
    bucket.push(reading);
    byDay.set(day, bucket);
  }

  const pick = (rows: Reading[], field: MeasurementField): number[] =>
    rows.flatMap(r => {
      const value = r[field];
      return value === undefined ? [] : [value];
    });

  return [...byDay.keys()].sort().map(date => {
    const rows = byDay.get(date) ?? [];
    const temperatures = pick(rows, 'temperature');
    const rainfall = pick(rows, 'rainfall');
    const humidity = pick(rows, 'humidity');
    const soilMoisture = pick(rows, 'soilMoisture');
    const soilTemperature = pick(rows, 'soilTemperature');

    return {
      date,
      sampleCount: rows.length,
      avgTemperature: temperatures.length ? round(mean(temperatures)) : undefined,
      minTemperature: temperatures.length ? Math.min(...temperatures) : undefined,
      maxTemperature: temperatures.length ? Math.max(...temperatures) : undefined,
      totalRainfall: rainfall.length ? round(rainfall.reduce((sum, v) => sum + v, 0)) : undefined,
      avgHumidity: humidity.length ? round(mean(humidity)) : undefined,
      avgSoilMoisture: soilMoisture.length ? round(mean(soilMoisture)) : undefined,
      avgSoilTemperature: soilTemperature.length ? round(mean(soilTemperature)) : undefined,
    };
  });
}

/**
 * Direction of a series: mean of the second half against the first
 */
export function trend(values: number[], threshold: number = AGRONOMY_DEFAULTS.TREND_THRESHOLD): Trend {
  if (values.length < 2) return 'stable';
  const half = Math.floor(values.length / 2);
  const diff = mean(values.slice(half)) - mean(values.slice(0, half));
  if (Math.abs(diff) < threshold) return 'stable';
  return diff > 0 ? 'increasing' : 'decreasing';
}
