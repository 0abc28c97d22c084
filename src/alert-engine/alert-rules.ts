/**
 * Alert rules
 * Evaluated in a fixed priority order so escalation and de-escalation are reproducible
 */

import {
  AggregatedForecast,
  AlertCategory,
  AlertSeverity,
  HeatStressCategory,
  MetricSet,
  Reading,
  SoilMoistureCategory,
  SoilMoistureThresholds,
} from '../types';
import { AlertThresholds } from '../shared/config/environment';
import { summarizeDays, classifySoilMoisture } from '../metrics-engine/agronomy';
import { addDays, toIsoDate } from '../shared/utils/dates';

export interface RuleContext {
  locationId: string;
  now: Date;
  current: Reading | null;
  history: Reading[];
  forecast: AggregatedForecast[];
  metrics: MetricSet;
  moisture: SoilMoistureThresholds;
  thresholds: AlertThresholds;
}

export type RuleOutcome =
  | {
      status: 'triggered';
      severity: AlertSeverity;
      condition: string;
      recommendedActions: string[];
    }
  | { status: 'clear' }
  | { status: 'unavailable'; reason: string };

export interface AlertRule {
  readonly category: AlertCategory;
  evaluate(context: RuleContext): RuleOutcome;
}

const CLEAR: RuleOutcome = { status: 'clear' };

function unavailable(reason: string): RuleOutcome {
  return { status: 'unavailable', reason };
}

/**
 * Forecast rainfall for today or tomorrow above the flood threshold
 */
export const floodRiskRule: AlertRule = {
  category: AlertCategory.FLOOD_RISK,
  evaluate({ forecast, thresholds }) {
    const nextDay = forecast.filter(f => f.horizonDays <= 1 && f.rainfall !== undefined);
    if (nextDay.length === 0) return unavailable('No rainfall forecast for the next 24 hours');

    const wettest = nextDay.reduce((a, b) => ((b.rainfall ?? 0) > (a.rainfall ?? 0) ? b : a));
    const rainfall = wettest.rainfall ?? 0;
    if (rainfall <= thresholds.floodRainfallMm) return CLEAR;

    return {
      status: 'triggered',
      severity: rainfall > thresholds.floodRainfallMm * 2 ? AlertSeverity.EXTREME : AlertSeverity.HIGH,
      condition: `Forecast rainfall of ${rainfall} mm on ${wettest.forecastDate} exceeds ${thresholds.floodRainfallMm} mm`,
      recommendedActions: [
        'Clear field drainage channels',
        'Postpone fertilizer and pesticide application',
        'Move harvested produce and inputs to raised storage',
      ],
    };
  },
};

export const heatAdvisoryRule: AlertRule = {
  category: AlertCategory.HEAT_ADVISORY,
  evaluate({ metrics }) {
    const result = metrics.heatStress.result;
    if (!result.available) return unavailable(result.reason);

    if (result.category === HeatStressCategory.SEVERE || result.category === HeatStressCategory.EXTREME) {
      return {
        status: 'triggered',
        severity: result.category === HeatStressCategory.EXTREME ? AlertSeverity.EXTREME : AlertSeverity.HIGH,
        condition: `Heat index ${result.value} °C (${result.category})`,
        recommendedActions: [
          'Irrigate in the early morning or evening',
          'Provide shade and water for livestock',
          'Avoid field work during midday hours',
        ],
      };
    }
    return CLEAR;
  },
};

export const frostWarningRule: AlertRule = {
  category: AlertCategory.FROST_WARNING,
  evaluate({ current, thresholds }) {
    if (!current || current.temperature === undefined) return unavailable('No temperature reading');
    const temperature = current.temperature;
    if (temperature > thresholds.frostTemperature) return CLEAR;

    return {
      status: 'triggered',
      severity: temperature <= thresholds.freezeTemperature ? AlertSeverity.EXTREME : AlertSeverity.HIGH,
      condition: `Temperature ${temperature} °C at or below frost threshold of ${thresholds.frostTemperature} °C`,
      recommendedActions: [
        'Apply light irrigation in the evening to hold soil heat',
        'Cover nurseries and sensitive crops overnight',
      ],
    };
  },
};

/**
 * Consecutive dry UTC days ending on the day of the latest soil-moisture reading.
 * A day without soil-moisture samples ends the streak.
 */
export function consecutiveDryDays(readings: Reading[], latestDay: string, moisture: SoilMoistureThresholds): number {
  const dailyMoisture = new Map<string, number>();
  for (const summary of summarizeDays(readings)) {
    if (summary.avgSoilMoisture !== undefined) {
      dailyMoisture.set(summary.date, summary.avgSoilMoisture);
    }
  }

  let streak = 0;
  for (let day = latestDay; ; day = addDays(day, -1)) {
    const value = dailyMoisture.get(day);
    if (value === undefined || classifySoilMoisture(value, moisture) !== SoilMoistureCategory.DRY) {
      return streak;
    }
    streak++;
  }
}

export const irrigationAdvisoryRule: AlertRule = {
  category: AlertCategory.IRRIGATION_ADVISORY,
  evaluate({ current, history, metrics, moisture, thresholds }) {
    const result = metrics.soilMoisture.result;
    if (!current || !result.available) {
      return unavailable(result.available ? 'No current reading' : result.reason);
    }
    // The latest reading decides whether the soil is still dry
    if (result.category !== SoilMoistureCategory.DRY) return CLEAR;

    const readings = history.some(r => r.timestamp.getTime() === current.timestamp.getTime())
      ? history
      : [...history, current];
    const streak = consecutiveDryDays(readings, toIsoDate(current.timestamp), moisture);
    const required = thresholds.dryConsecutiveDays;
    if (streak < required) return CLEAR;

    return {
      status: 'triggered',
      severity: streak >= required * 2 ? AlertSeverity.HIGH : AlertSeverity.MEDIUM,
      condition: `Soil moisture below ${moisture.dryBelow}% for ${streak} consecutive days (latest ${result.value}%)`,
      recommendedActions: [
        'Irrigate the field within the next 24 hours',
        'Apply mulch to reduce evaporation',
      ],
    };
  },
};

export const diseaseRiskRule: AlertRule = {
  category: AlertCategory.DISEASE_RISK,
  evaluate({ current, metrics, thresholds }) {
    const result = metrics.diseaseRisk.result;
    if (!result.available) return unavailable(result.reason);
    if (!result.value) return CLEAR;

    return {
      status: 'triggered',
      severity: AlertSeverity.MEDIUM,
      condition: `Humidity ${current?.humidity}% at or above ${thresholds.diseaseHumidity}% with temperature ${current?.temperature} °C`,
      recommendedActions: [
        'Scout crops for fungal infection',
        'Improve air circulation between rows',
        'Avoid overhead irrigation',
      ],
    };
  },
};

export const ALERT_RULES: readonly AlertRule[] = [
  floodRiskRule,
  heatAdvisoryRule,
  frostWarningRule,
  irrigationAdvisoryRule,
  diseaseRiskRule,
];
