/**
 * Error taxonomy for the Weather Analytics Engine
 * Every engine failure carries a stable code that the request layer maps to a response
 */

export type WeatherErrorCode =
  | 'INVALID_COORDINATES'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_DATA'
  | 'BACKEND_UNAVAILABLE'
  | 'TIMEOUT'
  | 'CONFIGURATION';

export abstract class WeatherEngineError extends Error {
  abstract readonly code: WeatherErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export class InvalidCoordinatesError extends WeatherEngineError {
  readonly code = 'INVALID_COORDINATES';
}

export class ValidationError extends WeatherEngineError {
  readonly code = 'VALIDATION';
}

export class NotFoundError extends WeatherEngineError {
  readonly code = 'NOT_FOUND';

  constructor(readonly resource: string, readonly resourceId: string, message?: string) {
    super(message ?? `${resource} ${resourceId} not found`, { resource, resourceId });
  }
}

export class InsufficientDataError extends WeatherEngineError {
  readonly code = 'INSUFFICIENT_DATA';
}

export class BackendUnavailableError extends WeatherEngineError {
  readonly code = 'BACKEND_UNAVAILABLE';
}

export class TimeoutError extends WeatherEngineError {
  readonly code = 'TIMEOUT';
}

/**
 * Malformed thresholds or configuration. Never retried, never defaulted.
 */
export class ConfigurationError extends WeatherEngineError {
  readonly code = 'CONFIGURATION';
}

export function isWeatherEngineError(error: unknown): error is WeatherEngineError {
  return error instanceof WeatherEngineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
