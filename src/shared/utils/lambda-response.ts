/**
 * Lambda response utilities for consistent API responses
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { WeatherErrorCode, isWeatherEngineError } from './errors';
import { Logger, createLogger } from './logger';

export class LambdaResponse {
  private static defaultHeaders = {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
    'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  };

  /**
   * Create a successful response
   */
  static success(data: unknown, meta: { stale?: boolean } = {}, statusCode: number = 200): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: true,
        data,
        stale: meta.stale ?? false,
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create an error response
   */
  static error(
    message: string,
    statusCode: number = 500,
    code?: WeatherErrorCode | 'INTERNAL',
    details?: unknown
  ): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: false,
        error: {
          code,
          message,
          details,
        },
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create a validation error response
   */
  static validationError(errors: string[]): APIGatewayProxyResult {
    return this.error('Validation failed', 400, 'VALIDATION', { validationErrors: errors });
  }
}

export const STATUS_BY_CODE: Record<WeatherErrorCode, number> = {
  INVALID_COORDINATES: 400,
  VALIDATION: 400,
  NOT_FOUND: 404,
  INSUFFICIENT_DATA: 422,
  CONFIGURATION: 500,
  BACKEND_UNAVAILABLE: 503,
  TIMEOUT: 504,
};

const defaultLogger = createLogger('LambdaResponse');

/**
 * Map an error to its response; anything that is not an engine error is a 500
 */
export function handleLambdaError(error: unknown, logger: Logger = defaultLogger): APIGatewayProxyResult {
  if (isWeatherEngineError(error)) {
    const statusCode = STATUS_BY_CODE[error.code];
    if (statusCode >= 500) {
      logger.error('Request failed', error, { code: error.code });
    } else {
      logger.warn('Request rejected', { code: error.code, error: error.message });
    }
    return LambdaResponse.error(error.message, statusCode, error.code, error.details);
  }

  logger.error('Lambda function error', error);
  return LambdaResponse.error(
    'Internal server error',
    500,
    'INTERNAL',
    process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined
  );
}
