/**
 * NOAA / NWS heat index
 * Rothfusz regression with the Steadman simple formula for mild conditions and the
 * NWS low- and high-humidity adjustments. Computed in Fahrenheit.
 */

import { HeatStressCategory } from '../types';

// Category lower bounds, Fahrenheit
export const HEAT_INDEX_BANDS_F = {
  MODERATE: 90,
  SEVERE: 103,
  EXTREME: 125,
} as const;

export function celsiusToFahrenheit(celsius: number): number {
  return (celsius * 9) / 5 + 32;
}

export function fahrenheitToCelsius(fahrenheit: number): number {
  return ((fahrenheit - 32) * 5) / 9;
}

export function heatIndexFahrenheit(temperatureF: number, humidity: number): number {
  const t = temperatureF;
  const rh = humidity;

  const simple = 0.5 * (t + 61.0 + (t - 68.0) * 1.2 + rh * 0.094);
  if ((simple + t) / 2 < 80) {
    return simple;
  }

  let hi =
    -42.379 +
    2.04901523 * t +
    10.14333127 * rh -
    0.22475541 * t * rh -
    0.00683783 * t * t -
    0.05481717 * rh * rh +
    0.00122874 * t * t * rh +
    0.00085282 * t * rh * rh -
    0.00000199 * t * t * rh * rh;

  if (rh < 13 && t >= 80 && t <= 112) {
    hi -= ((13 - rh) / 4) * Math.sqrt((17 - Math.abs(t - 95)) / 17);
  } else if (rh > 85 && t >= 80 && t <= 87) {
    hi += ((rh - 85) / 10) * ((87 - t) / 5);
  }

  return hi;
}

export function categorizeHeatIndex(heatIndexF: number): HeatStressCategory {
  if (heatIndexF >= HEAT_INDEX_BANDS_F.EXTREME) return HeatStressCategory.EXTREME;
  if (heatIndexF >= HEAT_INDEX_BANDS_F.SEVERE) return HeatStressCategory.SEVERE;
  if (heatIndexF >= HEAT_INDEX_BANDS_F.MODERATE) return HeatStressCategory.MODERATE;
  return HeatStressCategory.NONE;
}

/**
 * Heat index in Celsius (one decimal) with its category
 */
export function heatIndexCelsius(temperatureC: number, humidity: number): {
  value: number;
  category: HeatStressCategory;
} {
  const indexF = heatIndexFahrenheit(celsiusToFahrenheit(temperatureC), humidity);
  return {
    value: Math.round(fahrenheitToCelsius(indexF) * 10) / 10,
    category: categorizeHeatIndex(indexF),
  };
}
