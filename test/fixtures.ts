/**
 * Shared test builders
 */

import { Alert, AlertCategory, AlertSeverity, AlertState, ForecastPoint, Location, Reading } from '../src/types';
import { LogLevel, Logger } from '../src/shared/utils/logger';

export function quietLogger(): Logger {
  return new Logger({ component: 'test' }, LogLevel.ERROR);
}

/**
 * Settable clock; `now` is the Clock to inject
 */
export class ManualClock {
  private ms: number;

  constructor(iso: string) {
    this.ms = Date.parse(iso);
  }

  readonly now = (): Date => new Date(this.ms);

  advance(ms: number): void {
    this.ms += ms;
  }

  set(iso: string): void {
    this.ms = Date.parse(iso);
  }
}

export function location(overrides: Partial<Location> = {}): Location {
  return {
    locationId: 'loc-panipat',
    name: 'Panipat',
    district: 'Panipat',
    state: 'Haryana',
    latitude: 29.3909,
    longitude: 76.9635,
    elevation: 219,
    ...overrides,
  };
}

export function reading(iso: string, fields: Partial<Reading> = {}): Reading {
  return {
    locationId: 'loc-panipat',
    timestamp: new Date(iso),
    ...fields,
  };
}

export function forecastPoint(forecastDate: string, fields: Partial<ForecastPoint> = {}): ForecastPoint {
  return {
    locationId: 'loc-panipat',
    forecastDate,
    source: 'imd',
    issuedAt: new Date('2024-06-01T00:00:00Z'),
    confidence: 0.8,
    ...fields,
  };
}

export function alert(fields: Partial<Alert> = {}): Alert {
  return {
    alertId: 'alert-1',
    locationId: 'loc-panipat',
    category: AlertCategory.FROST_WARNING,
    severity: AlertSeverity.HIGH,
    condition: 'Temperature 3 °C at or below frost threshold of 4 °C',
    recommendedActions: ['Cover nurseries and sensitive crops overnight'],
    state: AlertState.ACTIVE,
    createdAt: new Date('2024-06-01T00:00:00Z'),
    updatedAt: new Date('2024-06-01T00:00:00Z'),
    resolvedAt: null,
    ...fields,
  };
}
