/**
 * Weather observation and forecast models
 */

// Every field is optional: sensor gaps are expected
export interface MeasurementFields {
  temperature?: number; // Celsius
  humidity?: number; // percentage
  rainfall?: number; // mm
  windSpeed?: number; // km/h
  windDirection?: number; // degrees
  soilTemperature?: number; // Celsius
  soilMoisture?: number; // volumetric percentage
  solarRadiation?: number; // W/m²
}

export type MeasurementField = keyof MeasurementFields;

export const MEASUREMENT_FIELDS: readonly MeasurementField[] = [
  'temperature',
  'humidity',
  'rainfall',
  'windSpeed',
  'windDirection',
  'soilTemperature',
  'soilMoisture',
  'solarRadiation',
];

export interface Reading extends MeasurementFields {
  locationId: string;
  timestamp: Date;
  source?: string; // IMD, local station, etc.
}

export interface ForecastPoint extends MeasurementFields {
  locationId: string;
  forecastDate: string; // YYYY-MM-DD (UTC)
  source: string;
  issuedAt: Date;
  confidence: number; // 0-1 scale
  minTemperature?: number;
  maxTemperature?: number;
  rainfallProbability?: number; // percentage
}

export interface AggregatedForecast extends MeasurementFields {
  locationId: string;
  forecastDate: string;
  horizonDays: number;
  confidence: number; // 0-1 scale, after horizon decay
  baseConfidence: number; // 0-1 scale, before horizon decay
  sources: string[];
  minTemperature?: number;
  maxTemperature?: number;
  rainfallProbability?: number;
}

export interface DailySummary {
  date: string; // YYYY-MM-DD (UTC)
  sampleCount: number;
  avgTemperature?: number;
  minTemperature?: number;
  maxTemperature?: number;
  totalRainfall?: number;
  avgHumidity?: number;
  avgSoilMoisture?: number;
  avgSoilTemperature?: number;
}
