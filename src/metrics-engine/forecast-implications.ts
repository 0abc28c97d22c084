/**
 * Forecast implications
 * Reads an aggregated forecast day by day for frost, heat, disease and growing
 * conditions, with crop-specific impacts when a crop profile is given
 */

import {
  AggregatedForecast,
  CropForecastImpact,
  CropProfile,
  ForecastDayImplications,
  ForecastDayRisks,
  ForecastOutlook,
  MetricResult,
  WaterRequirement,
} from '../types';
import { FORECAST_RISK_DEFAULTS } from '../shared/config/constants';
import { withinBand } from './agronomy';

export interface ForecastReading {
  days: ForecastDayImplications[];
  outlook: ForecastOutlook;
  recommendations: string[];
}

const RISK = FORECAST_RISK_DEFAULTS;

export const FORECAST_RECOMMENDATIONS = {
  FROST: 'Prepare frost protection for nurseries and sensitive crops',
  HEAT: 'Irrigate early in the morning or in the evening to limit heat stress',
  DISEASE: 'Scout for fungal disease and plan preventive sprays',
  DRY: 'No rain expected over the forecast period; plan irrigation',
} as const;

function unavailable(reason: string): { available: false; reason: string } {
  return { available: false, reason };
}

function lowOf(day: AggregatedForecast): number | undefined {
  return day.minTemperature ?? day.temperature;
}

function highOf(day: AggregatedForecast): number | undefined {
  return day.maxTemperature ?? day.temperature;
}

function meanTemperatureOf(day: AggregatedForecast): number | undefined {
  if (day.minTemperature !== undefined && day.maxTemperature !== undefined) {
    return (day.minTemperature + day.maxTemperature) / 2;
  }
  return day.temperature;
}

export function forecastDayRisks(day: AggregatedForecast): ForecastDayRisks {
  const low = lowOf(day);
  const high = highOf(day);
  const mean = meanTemperatureOf(day);
  const { humidity, rainfall } = day;

  return {
    frost: low === undefined
      ? unavailable('No minimum temperature forecast')
      : { available: true, value: low <= RISK.FROST_MIN_TEMPERATURE },
    heatStress: high === undefined
      ? unavailable('No maximum temperature forecast')
      : { available: true, value: high >= RISK.HEAT_MAX_TEMPERATURE },
    disease: humidity === undefined || mean === undefined
      ? unavailable('Needs both humidity and temperature forecasts')
      : { available: true, value: humidity >= RISK.DISEASE_HUMIDITY && mean >= RISK.DISEASE_MEAN_TEMPERATURE },
    idealGrowing: high === undefined || humidity === undefined || rainfall === undefined
      ? unavailable('Needs temperature, humidity and rainfall forecasts')
      : {
          available: true,
          value: withinBand(high, RISK.IDEAL_MIN_TEMPERATURE, RISK.IDEAL_MAX_TEMPERATURE) &&
            withinBand(humidity, RISK.IDEAL_MIN_HUMIDITY, RISK.IDEAL_MAX_HUMIDITY) &&
            rainfall > 0,
        },
  };
}

export function waterRequirement(rainfallProbability: number | undefined): MetricResult<WaterRequirement> {
  if (rainfallProbability === undefined) return unavailable('No rainfall probability forecast');
  if (rainfallProbability < RISK.DRY_RAIN_PROBABILITY) return { available: true, value: 'high' };
  if (rainfallProbability > RISK.WET_RAIN_PROBABILITY) return { available: true, value: 'low' };
  return { available: true, value: 'moderate' };
}

export function cropForecastImpact(day: AggregatedForecast, profile: CropProfile): CropForecastImpact {
  const bands = profile.growing;
  const low = lowOf(day);
  const high = highOf(day);
  const { humidity, rainfallProbability } = day;
  const noBands = unavailable(`No growing bands for crop ${profile.cropId}`);

  const recommendedActions: string[] = [];
  if (bands) {
    if (low !== undefined && low <= bands.minTemperature) recommendedActions.push('Protect crop from cold conditions');
    if (high !== undefined && high >= bands.maxTemperature) {
      recommendedActions.push('Implement heat stress mitigation measures');
    }
    if (humidity !== undefined && humidity > bands.maxHumidity) {
      recommendedActions.push('Monitor for disease due to high humidity');
    }
  }
  if (rainfallProbability !== undefined && rainfallProbability < RISK.DRY_RAIN_PROBABILITY) {
    recommendedActions.push('Plan for irrigation');
  }

  let temperatureSuitable: MetricResult<boolean> = unavailable('No maximum temperature forecast');
  if (high !== undefined) {
    temperatureSuitable = bands
      ? { available: true, value: withinBand(high, bands.minTemperature, bands.maxTemperature) }
      : noBands;
  }
  let humiditySuitable: MetricResult<boolean> = unavailable('No humidity forecast');
  if (humidity !== undefined) {
    humiditySuitable = bands
      ? { available: true, value: withinBand(humidity, bands.minHumidity, bands.maxHumidity) }
      : noBands;
  }

  return {
    cropId: profile.cropId,
    temperatureSuitable,
    humiditySuitable,
    waterRequirement: waterRequirement(rainfallProbability),
    recommendedActions,
  };
}

const flagged = (result: MetricResult<boolean>): boolean => result.available && result.value;

export function analyzeForecastDays(forecasts: AggregatedForecast[], profile?: CropProfile): ForecastReading {
  const days: ForecastDayImplications[] = forecasts.map(day => ({
    forecastDate: day.forecastDate,
    confidence: day.confidence,
    risks: forecastDayRisks(day),
    ...(profile ? { crop: cropForecastImpact(day, profile) } : {}),
  }));

  const rainfall = forecasts.flatMap(day => (day.rainfall === undefined ? [] : [day.rainfall]));
  const outlook: ForecastOutlook = {
    totalExpectedRainfall: Math.round(rainfall.reduce((sum, r) => sum + r, 0) * 100) / 100,
    frostRiskDays: days.filter(d => flagged(d.risks.frost)).length,
    heatStressDays: days.filter(d => flagged(d.risks.heatStress)).length,
    favorableDays: forecasts.filter(day => {
      const mean = meanTemperatureOf(day);
      return mean !== undefined &&
        withinBand(mean, RISK.FAVORABLE_MIN_MEAN_TEMPERATURE, RISK.FAVORABLE_MAX_MEAN_TEMPERATURE);
    }).length,
  };

  const recommendations: string[] = [];
  if (outlook.frostRiskDays > 0) recommendations.push(FORECAST_RECOMMENDATIONS.FROST);
  if (outlook.heatStressDays > 0) recommendations.push(FORECAST_RECOMMENDATIONS.HEAT);
  if (days.some(d => flagged(d.risks.disease))) recommendations.push(FORECAST_RECOMMENDATIONS.DISEASE);
  // Only when every day carries a rainfall figure
  if (forecasts.length > 0 && rainfall.length === forecasts.length && outlook.totalExpectedRainfall === 0) {
    recommendations.push(FORECAST_RECOMMENDATIONS.DRY);
  }

  return { days, outlook, recommendations };
}
