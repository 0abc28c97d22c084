/**
 * API Gateway handlers over a started engine instance
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { EngineResult, WeatherAnalyticsEngine } from '../analytics-engine/weather-analytics-engine';
import { LambdaResponse, handleLambdaError } from '../shared/utils/lambda-response';
import { Logger, createLogger } from '../shared/utils/logger';

export type WeatherHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

export interface WeatherHandlers {
  getCurrentWeather: WeatherHandler;
  getForecast: WeatherHandler;
  getNearbyLocations: WeatherHandler;
  getActiveAlerts: WeatherHandler;
  evaluateAlerts: WeatherHandler;
  resolveAlert: WeatherHandler;
  getMetrics: WeatherHandler;
  getCropSuitability: WeatherHandler;
  getForecastImplications: WeatherHandler;
}

type NumberParam = { ok: true; value: number | undefined } | { ok: false; error: string };

function numberParam(raw: string | undefined, name: string): NumberParam {
  if (raw === undefined || raw === '') return { ok: true, value: undefined };
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return { ok: false, error: `${name} must be a number` };
  }
  return { ok: true, value };
}

type ParsedBody = { ok: true; value: Record<string, unknown> } | { ok: false; error: string };

function parseBody(body: string | null): ParsedBody {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body || '{}');
  } catch {
    return { ok: false, error: 'Request body must be valid JSON' };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }
  return { ok: true, value: Object.fromEntries(Object.entries(parsed)) };
}

function optionalString(body: Record<string, unknown>, field: string, errors: string[]): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(`${field} must be a string`);
    return undefined;
  }
  return value;
}

export function createWeatherHandlers(
  engine: WeatherAnalyticsEngine,
  logger: Logger = createLogger('WeatherHandlers')
): WeatherHandlers {
  const respond = <T>(result: EngineResult<T>): APIGatewayProxyResult =>
    result.ok ? LambdaResponse.success(result.value, { stale: result.stale }) : handleLambdaError(result.error, logger);

  // Configuration faults and unexpected failures are rethrown by the engine
  const guarded = (operation: string, fn: WeatherHandler): WeatherHandler => async event => {
    try {
      return await fn(event);
    } catch (error) {
      logger.error('Handler failed', error, { operation });
      return handleLambdaError(error, logger);
    }
  };

  return {
    getCurrentWeather: guarded('getCurrentWeather', async event => {
      const locationId = event.pathParameters?.locationId;
      if (!locationId) {
        return LambdaResponse.validationError(['locationId is required']);
      }
      return respond(await engine.getCurrent(locationId));
    }),

    getForecast: guarded('getForecast', async event => {
      const locationId = event.pathParameters?.locationId;
      const days = numberParam(event.queryStringParameters?.days, 'days');
      const errors: string[] = [];
      if (!locationId) errors.push('locationId is required');
      if (!days.ok) errors.push(days.error);
      if (!locationId || !days.ok) {
        return LambdaResponse.validationError(errors);
      }
      return respond(await engine.getForecast(locationId, days.value));
    }),

    getNearbyLocations: guarded('getNearbyLocations', async event => {
      const query = event.queryStringParameters ?? {};
      const lat = numberParam(query.lat, 'lat');
      const lon = numberParam(query.lon, 'lon');
      const radius = numberParam(query.radiusKm, 'radiusKm');

      const errors: string[] = [];
      for (const param of [lat, lon, radius]) {
        if (!param.ok) errors.push(param.error);
      }
      if (lat.ok && lat.value === undefined) errors.push('lat is required');
      if (lon.ok && lon.value === undefined) errors.push('lon is required');
      if (!lat.ok || !lon.ok || !radius.ok || lat.value === undefined || lon.value === undefined) {
        return LambdaResponse.validationError(errors);
      }

      return respond(engine.nearby({ latitude: lat.value, longitude: lon.value }, radius.value));
    }),

    getActiveAlerts: guarded('getActiveAlerts', async event => {
      const locationId = event.pathParameters?.locationId;
      if (!locationId) {
        return LambdaResponse.validationError(['locationId is required']);
      }
      return respond(await engine.listActiveAlerts(locationId));
    }),

    evaluateAlerts: guarded('evaluateAlerts', async event => {
      const locationId = event.pathParameters?.locationId;
      const body = parseBody(event.body);
      const errors: string[] = [];
      if (!locationId) errors.push('locationId is required');
      if (!body.ok) errors.push(body.error);
      const cropId = body.ok ? optionalString(body.value, 'cropId', errors) : undefined;
      if (!locationId || errors.length > 0) {
        return LambdaResponse.validationError(errors);
      }
      return respond(await engine.evaluateAlerts(locationId, { cropId }));
    }),

    resolveAlert: guarded('resolveAlert', async event => {
      const alertId = event.pathParameters?.alertId;
      const body = parseBody(event.body);
      const errors: string[] = [];
      if (!alertId) errors.push('alertId is required');
      if (!body.ok) errors.push(body.error);
      const notes = body.ok ? optionalString(body.value, 'notes', errors) : undefined;
      if (!alertId || errors.length > 0) {
        return LambdaResponse.validationError(errors);
      }
      return respond(await engine.resolveAlert(alertId, notes));
    }),

    getMetrics: guarded('getMetrics', async event => {
      const locationId = event.pathParameters?.locationId;
      const windowDays = numberParam(event.queryStringParameters?.windowDays, 'windowDays');
      const errors: string[] = [];
      if (!locationId) errors.push('locationId is required');
      if (!windowDays.ok) errors.push(windowDays.error);
      if (!locationId || !windowDays.ok) {
        return LambdaResponse.validationError(errors);
      }
      return respond(await engine.computeMetrics(locationId, {
        cropId: event.queryStringParameters?.cropId,
        windowDays: windowDays.value,
      }));
    }),

    getCropSuitability: guarded('getCropSuitability', async event => {
      const locationId = event.pathParameters?.locationId;
      const cropId = event.queryStringParameters?.cropId;
      const errors: string[] = [];
      if (!locationId) errors.push('locationId is required');
      if (!cropId) errors.push('cropId is required');
      if (!locationId || !cropId) {
        return LambdaResponse.validationError(errors);
      }
      return respond(await engine.assessCropSuitability(locationId, cropId));
    }),

    getForecastImplications: guarded('getForecastImplications', async event => {
      const locationId = event.pathParameters?.locationId;
      const days = numberParam(event.queryStringParameters?.days, 'days');
      const errors: string[] = [];
      if (!locationId) errors.push('locationId is required');
      if (!days.ok) errors.push(days.error);
      if (!locationId || !days.ok) {
        return LambdaResponse.validationError(errors);
      }
      return respond(await engine.analyzeForecast(locationId, days.value, {
        cropId: event.queryStringParameters?.cropId,
      }));
    }),
  };
}
