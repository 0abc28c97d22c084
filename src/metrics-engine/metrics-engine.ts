/**
 * Metrics Engine
 * Derives the metric set for a location from its latest reading and a history window.
 * No I/O: callers load readings through the repository and pass them in.
 */

import {
  AgriculturalMetric,
  AggregatedForecast,
  CropProfile,
  CropSuitability,
  ForecastImplications,
  DateRange,
  MetricKind,
  MetricSet,
  MetricValueMap,
  MetricWindow,
  Reading,
} from '../types';
import { AlertThresholds } from '../shared/config/environment';
import { Logger, createLogger } from '../shared/utils/logger';
import {
  assessCropSuitability,
  diseaseRisk,
  frostRisk,
  growingDegreeDays,
  heatStressIndex,
  soilMoistureCategory,
  soilTemperatureStatus,
} from './agronomy';
import { CropProfileProvider, StaticCropProfileProvider, resolveCropProfile } from './crop-profiles';
import { analyzeForecastDays } from './forecast-implications';

export interface MetricInputs {
  locationId: string;
  current: Reading | null;
  history: Reading[];
  window: DateRange;
  computedAt: Date;
  cropId?: string;
}

export interface SuitabilityInputs {
  locationId: string;
  cropId: string;
  current: Reading | null;
  assessedAt: Date;
}

export class MetricsEngine {
  private logger: Logger;

  constructor(
    private readonly thresholds: AlertThresholds,
    private readonly cropProfiles: CropProfileProvider = new StaticCropProfileProvider(),
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('MetricsEngine');
  }

  resolveProfile(cropId?: string): CropProfile {
    return resolveCropProfile(this.cropProfiles, cropId);
  }

  computeMetrics(inputs: MetricInputs): MetricSet {
    const profile = this.resolveProfile(inputs.cropId);
    const { locationId, current, history, window, computedAt } = inputs;

    const pointWindow: MetricWindow = current
      ? { from: current.timestamp, to: current.timestamp, sampleCount: 1 }
      : { from: window.to, to: window.to, sampleCount: 0 };
    const historyWindow: MetricWindow = {
      from: window.from,
      to: window.to,
      sampleCount: history.filter(r => r.temperature !== undefined).length,
    };

    const metric = <K extends MetricKind>(kind: K, result: MetricValueMap[K], metricWindow: MetricWindow): AgriculturalMetric<K> => ({
      locationId,
      kind,
      result,
      window: metricWindow,
      computedAt,
    });

    const set: MetricSet = {
      locationId,
      cropId: inputs.cropId,
      computedAt,
      heatStress: metric(MetricKind.HEAT_STRESS_INDEX, heatStressIndex(current), pointWindow),
      soilMoisture: metric(MetricKind.SOIL_MOISTURE_CATEGORY, soilMoistureCategory(current, profile.moisture), pointWindow),
      growingDegreeDays: metric(
        MetricKind.GROWING_DEGREE_DAYS,
        growingDegreeDays(history, { from: window.from, to: window.to, baseTemperature: profile.baseTemperature }),
        historyWindow
      ),
      frostRisk: metric(MetricKind.FROST_RISK, frostRisk(current, this.thresholds.frostTemperature), pointWindow),
      diseaseRisk: metric(
        MetricKind.DISEASE_RISK,
        diseaseRisk(current, {
          humidity: this.thresholds.diseaseHumidity,
          minTemperature: this.thresholds.diseaseMinTemperature,
        }),
        pointWindow
      ),
      soilTemperature: metric(MetricKind.SOIL_TEMPERATURE_STATUS, soilTemperatureStatus(current), pointWindow),
    };

    this.logger.debug('Metrics computed', {
      locationId,
      cropId: profile.cropId,
      unavailable: [set.heatStress, set.soilMoisture, set.growingDegreeDays, set.frostRisk, set.diseaseRisk, set.soilTemperature]
        .filter(m => !m.result.available)
        .map(m => m.kind),
    });
    return set;
  }

  /**
   * Requires a crop: suitability is always relative to one
   */
  assessSuitability(inputs: SuitabilityInputs): CropSuitability {
    const profile = this.resolveProfile(inputs.cropId);
    const checks = assessCropSuitability(inputs.current, profile, this.thresholds.diseaseHumidity);
    this.logger.debug('Crop suitability assessed', {
      locationId: inputs.locationId,
      cropId: profile.cropId,
      riskFactors: checks.riskFactors,
    });
    return {
      locationId: inputs.locationId,
      cropId: profile.cropId,
      assessedAt: inputs.assessedAt,
      readingAt: inputs.current?.timestamp ?? null,
      ...checks,
    };
  }

  forecastImplications(
    locationId: string,
    forecasts: AggregatedForecast[],
    generatedAt: Date,
    cropId?: string
  ): ForecastImplications {
    const profile = cropId === undefined ? undefined : this.resolveProfile(cropId);
    return {
      locationId,
      cropId: profile?.cropId,
      generatedAt,
      ...analyzeForecastDays(forecasts, profile),
    };
  }
}
