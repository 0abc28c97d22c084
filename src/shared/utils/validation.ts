/**
 * Validation utilities for the Weather Analytics Engine
 * Validation runs synchronously, before any cache or backend interaction
 */

import {
  Coordinates,
  DateRange,
  ForecastPoint,
  Location,
  MEASUREMENT_FIELDS,
  MeasurementField,
  MeasurementFields,
  Reading,
  ValidationResult,
} from '../../types';
import { InvalidCoordinatesError, ValidationError } from './errors';
import { parseIsoDate, toIsoDate } from './dates';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

interface FieldRange {
  min: number;
  max: number;
}

// Physical plausibility bounds for sensor values
const MEASUREMENT_RANGES: Record<MeasurementField, FieldRange> = {
  temperature: { min: -60, max: 60 },
  humidity: { min: 0, max: 100 },
  rainfall: { min: 0, max: 1000 },
  windSpeed: { min: 0, max: 500 },
  windDirection: { min: 0, max: 360 },
  soilTemperature: { min: -60, max: 80 },
  soilMoisture: { min: 0, max: 100 },
  solarRadiation: { min: 0, max: 1500 },
};

function result(errors: string[], warnings: string[] = []): ValidationResult {
  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

// Date parsing rolls impossible days over (2026-02-30 becomes 2026-03-02), so compare the round trip
function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = parseIsoDate(value);
  return !isNaN(parsed.getTime()) && toIsoDate(parsed) === value;
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !isNaN(value.getTime());
}

/**
 * Validator class that provides static validation methods
 */
export class Validator {
  /**
   * Validate coordinates
   */
  static validateCoordinates(coordinates: Coordinates): ValidationResult {
    const errors: string[] = [];
    const { latitude, longitude } = coordinates;

    if (typeof latitude !== 'number' || !Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
      errors.push('Invalid latitude: must be between -90 and 90');
    }

    if (typeof longitude !== 'number' || !Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
      errors.push('Invalid longitude: must be between -180 and 180');
    }

    return result(errors);
  }

  /**
   * Validate required string field
   */
  static validateRequiredString(value: unknown, fieldName: string): ValidationResult {
    const errors: string[] = [];

    if (typeof value !== 'string') {
      errors.push(`${fieldName} is required and must be a string`);
    } else if (value.trim().length === 0) {
      errors.push(`${fieldName} cannot be empty`);
    }

    return result(errors);
  }

  static validateLocation(location: Location): ValidationResult {
    const warnings: string[] = [];
    if (location.elevation !== null && location.elevation < -500) {
      warnings.push('Elevation is below any inhabited land surface');
    }

    return Validator.combineValidationResults([
      Validator.validateRequiredString(location.locationId, 'Location ID'),
      Validator.validateRequiredString(location.name, 'Location name'),
      result([], warnings),
    ]);
  }

  static validateDateRange(range: DateRange): ValidationResult {
    const errors: string[] = [];

    if (!isValidDate(range.from)) {
      errors.push('Range start must be a valid date');
    }
    if (!isValidDate(range.to)) {
      errors.push('Range end must be a valid date');
    }
    if (errors.length === 0 && range.from.getTime() > range.to.getTime()) {
      errors.push('Range start must not be after range end');
    }

    return result(errors);
  }

  static validateMeasurements(fields: MeasurementFields): ValidationResult {
    const errors: string[] = [];

    for (const field of MEASUREMENT_FIELDS) {
      const range = MEASUREMENT_RANGES[field];
      const value: unknown = fields[field];
      if (value === undefined) continue;
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        errors.push(`${field} must be a finite number`);
      } else if (value < range.min || value > range.max) {
        errors.push(`${field} out of valid range (${range.min} to ${range.max})`);
      }
    }

    return result(errors);
  }

  static validateReading(reading: Reading): ValidationResult {
    const timestampErrors = isValidDate(reading.timestamp) ? [] : ['Reading timestamp must be a valid date'];

    return Validator.combineValidationResults([
      Validator.validateRequiredString(reading.locationId, 'Location ID'),
      result(timestampErrors),
      Validator.validateMeasurements(reading),
    ]);
  }

  static validateForecastPoint(point: ForecastPoint): ValidationResult {
    const errors: string[] = [];

    if (!isCalendarDate(point.forecastDate)) {
      errors.push(`Forecast date must be YYYY-MM-DD, got ${point.forecastDate}`);
    }
    if (!Number.isFinite(point.confidence) || point.confidence < 0 || point.confidence > 1) {
      errors.push('Forecast confidence must be between 0 and 1');
    }
    if (point.rainfallProbability !== undefined &&
        (point.rainfallProbability < 0 || point.rainfallProbability > 100)) {
      errors.push('Rainfall probability must be between 0 and 100');
    }
    if (point.minTemperature !== undefined && point.maxTemperature !== undefined &&
        point.minTemperature > point.maxTemperature) {
      errors.push('Minimum temperature cannot be greater than maximum');
    }

    return Validator.combineValidationResults([
      Validator.validateRequiredString(point.locationId, 'Location ID'),
      Validator.validateRequiredString(point.source, 'Forecast source'),
      result(errors),
      Validator.validateMeasurements(point),
    ]);
  }

  /**
   * Combine multiple validation results
   */
  static combineValidationResults(results: ValidationResult[]): ValidationResult {
    const allErrors: string[] = [];
    const allWarnings: string[] = [];

    for (const r of results) {
      allErrors.push(...r.errors);
      allWarnings.push(...r.warnings);
    }

    return result(allErrors, allWarnings);
  }
}

/**
 * Throw a ValidationError when the result carries errors
 */
export function assertValid(validation: ValidationResult, subject: string): void {
  if (!validation.isValid) {
    throw new ValidationError(`Invalid ${subject}: ${validation.errors.join(', ')}`, {
      errors: validation.errors,
    });
  }
}

export function assertValidCoordinates(coordinates: Coordinates): void {
  const validation = Validator.validateCoordinates(coordinates);
  if (!validation.isValid) {
    throw new InvalidCoordinatesError(`Invalid coordinates: ${validation.errors.join(', ')}`, {
      latitude: coordinates.latitude,
      longitude: coordinates.longitude,
    });
  }
}

export function assertLocationId(locationId: string): void {
  assertValid(Validator.validateRequiredString(locationId, 'Location ID'), 'location id');
}
