import { describe, it, expect } from 'vitest';
import { AggregatedForecast, CropProfile } from '../types';
import {
  FORECAST_RECOMMENDATIONS,
  analyzeForecastDays,
  cropForecastImpact,
  forecastDayRisks,
  waterRequirement,
} from './forecast-implications';

function day(forecastDate: string, fields: Partial<AggregatedForecast> = {}): AggregatedForecast {
  return {
    locationId: 'loc-panipat',
    forecastDate,
    horizonDays: 0,
    confidence: 0.8,
    baseConfidence: 0.8,
    sources: ['imd'],
    ...fields,
  };
}

const wheat: CropProfile = {
  cropId: 'wheat',
  displayName: 'Wheat',
  baseTemperature: 4.5,
  moisture: { dryBelow: 25, saturatedAbove: 65 },
  growing: { minTemperature: 12, maxTemperature: 25, minHumidity: 40, maxHumidity: 70 },
};

describe('forecastDayRisks', () => {
  it('flags frost on a cold night', () => {
    expect(forecastDayRisks(day('2024-06-10', { minTemperature: 1, maxTemperature: 18, humidity: 85, rainfall: 0 }))).toEqual({
      frost: { available: true, value: true },
      heatStress: { available: true, value: false },
      disease: { available: true, value: false },
      idealGrowing: { available: true, value: false },
    });
  });

  it('flags heat stress and disease on a hot humid day', () => {
    const risks = forecastDayRisks(day('2024-06-10', { minTemperature: 24, maxTemperature: 36, humidity: 82, rainfall: 4 }));

    expect(risks.frost).toEqual({ available: true, value: false });
    expect(risks.heatStress).toEqual({ available: true, value: true });
    expect(risks.disease).toEqual({ available: true, value: true });
    expect(risks.idealGrowing).toEqual({ available: true, value: false });
  });

  it('falls back to the mean temperature when there is no daily range', () => {
    const risks = forecastDayRisks(day('2024-06-10', { temperature: 25, humidity: 60, rainfall: 2 }));

    expect(risks.frost).toEqual({ available: true, value: false });
    expect(risks.idealGrowing).toEqual({ available: true, value: true });
  });

  it('does not call a dry day ideal', () => {
    const risks = forecastDayRisks(day('2024-06-10', { temperature: 25, humidity: 60, rainfall: 0 }));

    expect(risks.idealGrowing).toEqual({ available: true, value: false });
  });

  it('reports each risk unavailable without its inputs', () => {
    expect(forecastDayRisks(day('2024-06-10'))).toEqual({
      frost: { available: false, reason: 'No minimum temperature forecast' },
      heatStress: { available: false, reason: 'No maximum temperature forecast' },
      disease: { available: false, reason: 'Needs both humidity and temperature forecasts' },
      idealGrowing: { available: false, reason: 'Needs temperature, humidity and rainfall forecasts' },
    });
  });
});

describe('waterRequirement', () => {
  it('rates irrigation need by rain probability', () => {
    expect(waterRequirement(20)).toEqual({ available: true, value: 'high' });
    expect(waterRequirement(30)).toEqual({ available: true, value: 'moderate' });
    expect(waterRequirement(70)).toEqual({ available: true, value: 'moderate' });
    expect(waterRequirement(71)).toEqual({ available: true, value: 'low' });
    expect(waterRequirement(undefined)).toEqual({ available: false, reason: 'No rainfall probability forecast' });
  });
});

describe('cropForecastImpact', () => {
  it('recommends actions for each band the day leaves', () => {
    const impact = cropForecastImpact(
      day('2024-06-10', { minTemperature: 10, maxTemperature: 27, humidity: 75, rainfallProbability: 20 }),
      wheat
    );

    expect(impact).toEqual({
      cropId: 'wheat',
      temperatureSuitable: { available: true, value: false },
      humiditySuitable: { available: true, value: false },
      waterRequirement: { available: true, value: 'high' },
      recommendedActions: [
        'Protect crop from cold conditions',
        'Implement heat stress mitigation measures',
        'Monitor for disease due to high humidity',
        'Plan for irrigation',
      ],
    });
  });

  it('has no action for a day inside the bands', () => {
    const impact = cropForecastImpact(
      day('2024-06-10', { minTemperature: 14, maxTemperature: 22, humidity: 55, rainfallProbability: 80 }),
      wheat
    );

    expect(impact.temperatureSuitable).toEqual({ available: true, value: true });
    expect(impact.humiditySuitable).toEqual({ available: true, value: true });
    expect(impact.waterRequirement).toEqual({ available: true, value: 'low' });
    expect(impact.recommendedActions).toEqual([]);
  });

  it('cannot judge suitability for a crop without growing bands', () => {
    const impact = cropForecastImpact(
      day('2024-06-10', { maxTemperature: 22, humidity: 50, rainfallProbability: 50 }),
      { ...wheat, growing: undefined }
    );

    expect(impact.temperatureSuitable).toEqual({ available: false, reason: 'No growing bands for crop wheat' });
    expect(impact.humiditySuitable).toEqual({ available: false, reason: 'No growing bands for crop wheat' });
    expect(impact.waterRequirement).toEqual({ available: true, value: 'moderate' });
    expect(impact.recommendedActions).toEqual([]);
  });
});

describe('analyzeForecastDays', () => {
  const week = [
    day('2024-06-10', { minTemperature: 1, maxTemperature: 18, humidity: 85, rainfall: 0 }),
    day('2024-06-11', { minTemperature: 24, maxTemperature: 36, humidity: 82, rainfall: 4.25 }),
    day('2024-06-12', { temperature: 25, humidity: 60, rainfall: 2.1 }),
  ];

  it('sums the outlook and recommends for each risk seen', () => {
    const reading = analyzeForecastDays(week);

    expect(reading.outlook).toEqual({
      totalExpectedRainfall: 6.35,
      frostRiskDays: 1,
      heatStressDays: 1,
      favorableDays: 2,
    });
    expect(reading.recommendations).toEqual([
      FORECAST_RECOMMENDATIONS.FROST,
      FORECAST_RECOMMENDATIONS.HEAT,
      FORECAST_RECOMMENDATIONS.DISEASE,
    ]);
    expect(reading.days.map(d => d.forecastDate)).toEqual(['2024-06-10', '2024-06-11', '2024-06-12']);
    expect(reading.days[0]).not.toHaveProperty('crop');
  });

  it('adds the crop impact to every day when a profile is given', () => {
    const reading = analyzeForecastDays(week, wheat);

    expect(reading.days.map(d => d.crop?.cropId)).toEqual(['wheat', 'wheat', 'wheat']);
    expect(reading.days[1].crop?.recommendedActions).toEqual([
      'Implement heat stress mitigation measures',
      'Monitor for disease due to high humidity',
    ]);
  });

  it('recommends irrigation only when every day is forecast dry', () => {
    const dry = [
      day('2024-06-10', { temperature: 22, humidity: 50, rainfall: 0 }),
      day('2024-06-11', { temperature: 23, rainfall: 0 }),
    ];

    expect(analyzeForecastDays(dry).recommendations).toEqual([FORECAST_RECOMMENDATIONS.DRY]);
    expect(analyzeForecastDays([dry[0], day('2024-06-11', { temperature: 23 })]).recommendations).toEqual([]);
  });

  it('returns an empty reading for no days', () => {
    expect(analyzeForecastDays([])).toEqual({
      days: [],
      outlook: { totalExpectedRainfall: 0, frostRiskDays: 0, heatStressDays: 0, favorableDays: 0 },
      recommendations: [],
    });
  });
});
