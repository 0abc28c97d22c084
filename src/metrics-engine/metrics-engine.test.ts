import { describe, it, expect } from 'vitest';
import { HeatStressCategory, MetricKind, RiskFactor, SoilMoistureCategory, SoilTemperatureStatus } from '../types';
import { MetricsEngine } from './metrics-engine';
import { DEFAULT_ENGINE_CONFIG } from '../shared/config/environment';
import { NotFoundError } from '../shared/utils/errors';
import { quietLogger, reading } from '../../test/fixtures';

describe('MetricsEngine', () => {
  const engine = new MetricsEngine(DEFAULT_ENGINE_CONFIG.alertThresholds, undefined, quietLogger());
  const window = { from: new Date('2024-06-09T00:00:00Z'), to: new Date('2024-06-10T06:00:00Z') };
  const computedAt = new Date('2024-06-10T06:00:00Z');
  const current = reading('2024-06-10T05:00:00Z', { temperature: 36, humidity: 55, soilMoisture: 32, soilTemperature: 28 });
  const history = [
    reading('2024-06-09T02:00:00Z', { temperature: 24 }),
    reading('2024-06-09T14:00:00Z', { temperature: 38 }),
    reading('2024-06-10T02:00:00Z', { humidity: 50 }),
    current,
  ];

  it('derives every metric from the latest reading and history window', () => {
    const metrics = engine.computeMetrics({ locationId: 'loc-panipat', current, history, window, computedAt });

    expect(metrics.heatStress).toEqual({
      locationId: 'loc-panipat',
      kind: MetricKind.HEAT_STRESS_INDEX,
      result: { available: true, value: 45.5, category: HeatStressCategory.SEVERE },
      window: { from: current.timestamp, to: current.timestamp, sampleCount: 1 },
      computedAt,
    });
    expect(metrics.soilMoisture.result).toEqual({ available: true, value: 32, category: SoilMoistureCategory.OPTIMAL });
    expect(metrics.frostRisk.result).toEqual({ available: true, value: false });
    expect(metrics.diseaseRisk.result).toEqual({ available: true, value: false });
    expect(metrics.soilTemperature.result).toEqual({ available: true, value: 28, category: SoilTemperatureStatus.OPTIMAL });
    // Day one: (24 + 38) / 2 - 10 = 21; day two: 36 - 10 = 26
    expect(metrics.growingDegreeDays.result).toEqual({ available: true, value: 47 });
    expect(metrics.growingDegreeDays.window).toEqual({ ...window, sampleCount: 3 });
  });

  it('applies the crop profile thresholds', () => {
    const metrics = engine.computeMetrics({ locationId: 'loc-panipat', current, history, window, computedAt, cropId: 'tomato' });

    expect(metrics.cropId).toBe('tomato');
    expect(metrics.soilMoisture.result).toEqual({ available: true, value: 32, category: SoilMoistureCategory.DRY });
  });

  it('marks point metrics unavailable when there is no current reading', () => {
    const metrics = engine.computeMetrics({ locationId: 'loc-panipat', current: null, history: [], window, computedAt });

    expect(metrics.heatStress.result.available).toBe(false);
    expect(metrics.soilMoisture.result.available).toBe(false);
    expect(metrics.frostRisk.result.available).toBe(false);
    expect(metrics.heatStress.window).toEqual({ from: window.to, to: window.to, sampleCount: 0 });
    expect(metrics.growingDegreeDays.result).toEqual({
      available: false,
      reason: 'No temperature samples for 2 day(s): 2024-06-09, 2024-06-10',
    });
  });

  it('rejects an unknown crop', () => {
    expect(() => engine.computeMetrics({ locationId: 'loc-panipat', current, history, window, computedAt, cropId: 'quinoa' }))
      .toThrow(NotFoundError);
  });

  it('assesses crop suitability against the crop growing bands', () => {
    const suitability = engine.assessSuitability({ locationId: 'loc-panipat', cropId: 'wheat', current, assessedAt: computedAt });

    expect(suitability).toEqual({
      locationId: 'loc-panipat',
      cropId: 'wheat',
      assessedAt: computedAt,
      readingAt: current.timestamp,
      temperature: { available: true, value: false },
      humidity: { available: true, value: true },
      soilMoisture: { available: true, value: true },
      riskFactors: [RiskFactor.HEAT_STRESS],
    });
  });

  it('assesses suitability without a reading', () => {
    const suitability = engine.assessSuitability({ locationId: 'loc-panipat', cropId: 'rice', current: null, assessedAt: computedAt });

    expect(suitability.readingAt).toBeNull();
    expect(suitability.riskFactors).toEqual([]);
  });

  it('rejects suitability for an unknown crop', () => {
    expect(() => engine.assessSuitability({ locationId: 'loc-panipat', cropId: 'quinoa', current, assessedAt: computedAt }))
      .toThrow(NotFoundError);
  });

  it('reads forecast implications with and without a crop', () => {
    const forecasts = [{
      locationId: 'loc-panipat',
      forecastDate: '2024-06-10',
      horizonDays: 0,
      confidence: 0.8,
      baseConfidence: 0.8,
      sources: ['imd'],
      minTemperature: 26,
      maxTemperature: 38,
      humidity: 40,
      rainfall: 0,
    }];

    const general = engine.forecastImplications('loc-panipat', forecasts, computedAt);
    const tomato = engine.forecastImplications('loc-panipat', forecasts, computedAt, 'tomato');

    expect(general.cropId).toBeUndefined();
    expect(general.generatedAt).toBe(computedAt);
    expect(general.outlook.heatStressDays).toBe(1);
    expect(general.days[0].crop).toBeUndefined();
    expect(tomato.cropId).toBe('tomato');
    expect(tomato.days[0].crop?.temperatureSuitable).toEqual({ available: true, value: false });
  });
});
