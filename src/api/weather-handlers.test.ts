import { describe, it, expect } from 'vitest';
import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { CropProfile } from '../types';
import { createWeatherHandlers } from './weather-handlers';
import { WeatherAnalyticsEngine } from '../analytics-engine/weather-analytics-engine';
import { createEngineConfig } from '../shared/config/environment';
import { InMemoryWeatherStore } from '../../test/fakes/in-memory-weather-store';
import { ManualClock, location, quietLogger, reading } from '../../test/fixtures';

interface EventParts {
  pathParameters?: Record<string, string>;
  queryStringParameters?: Record<string, string>;
  body?: string;
}

function apiEvent({ pathParameters, queryStringParameters, body }: EventParts = {}): APIGatewayProxyEvent {
  return {
    body: body ?? null,
    headers: {},
    multiValueHeaders: {},
    httpMethod: body === undefined ? 'GET' : 'POST',
    isBase64Encoded: false,
    path: '/',
    pathParameters: pathParameters ?? null,
    queryStringParameters: queryStringParameters ?? null,
    multiValueQueryStringParameters: null,
    stageVariables: null,
    resource: '/',
    requestContext: {
      accountId: '000000000000',
      apiId: 'test-api',
      authorizer: null,
      protocol: 'HTTP/1.1',
      httpMethod: body === undefined ? 'GET' : 'POST',
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: '127.0.0.1',
        user: null,
        userAgent: null,
        userArn: null,
      },
      path: '/',
      stage: 'test',
      requestId: 'request-1',
      requestTimeEpoch: 0,
      resourceId: 'resource-1',
      resourcePath: '/',
    },
  };
}

function bodyOf(result: APIGatewayProxyResult): unknown {
  return JSON.parse(result.body);
}

const MILLET: CropProfile = {
  cropId: 'millet',
  displayName: 'Millet',
  baseTemperature: 10,
  moisture: { dryBelow: 25, saturatedAbove: 65 },
  growing: { minTemperature: 20, maxTemperature: 35, minHumidity: 30, maxHumidity: 60 },
};

async function setup() {
  const clock = new ManualClock('2024-06-10T06:00:00Z');
  const store = new InMemoryWeatherStore();
  store.seedLocation(location());
  store.seedLocation(location({ locationId: 'loc-karnal', name: 'Karnal', latitude: 29.6857, longitude: 76.9905 }));
  store.seedReadings([reading('2024-06-10T05:00:00Z', { temperature: 2.5, humidity: 70 })]);

  const engine = new WeatherAnalyticsEngine({
    store,
    config: createEngineConfig({}),
    logger: quietLogger(),
    clock: clock.now,
    cropProfiles: {
      getProfile: cropId => {
        if (cropId === 'broken') {
          return { cropId, displayName: 'Broken', baseTemperature: 10, moisture: { dryBelow: 80, saturatedAbove: 20 } };
        }
        return cropId === MILLET.cropId ? MILLET : undefined;
      },
    },
  });
  await engine.start();
  return { store, handlers: createWeatherHandlers(engine, quietLogger()) };
}

describe('weather handlers', () => {
  describe('getCurrentWeather', () => {
    it('returns the latest reading', async () => {
      const { handlers } = await setup();

      const result = await handlers.getCurrentWeather(apiEvent({ pathParameters: { locationId: 'loc-panipat' } }));

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toEqual({
        success: true,
        data: { locationId: 'loc-panipat', timestamp: '2024-06-10T05:00:00.000Z', temperature: 2.5, humidity: 70 },
        stale: false,
        timestamp: expect.any(String),
      });
    });

    it('requires a location id', async () => {
      const { handlers } = await setup();

      const result = await handlers.getCurrentWeather(apiEvent());

      expect(result.statusCode).toBe(400);
      expect(bodyOf(result)).toMatchObject({
        error: { code: 'VALIDATION', details: { validationErrors: ['locationId is required'] } },
      });
    });

    it('maps an unknown location to 404', async () => {
      const { handlers } = await setup();

      const result = await handlers.getCurrentWeather(apiEvent({ pathParameters: { locationId: 'loc-unknown' } }));

      expect(result.statusCode).toBe(404);
      expect(bodyOf(result)).toMatchObject({ error: { code: 'NOT_FOUND' } });
    });
  });

  describe('getNearbyLocations', () => {
    it('lists locations within the radius, nearest first', async () => {
      const { handlers } = await setup();

      const result = await handlers.getNearbyLocations(
        apiEvent({ queryStringParameters: { lat: '29.3909', lon: '76.9635', radiusKm: '40' } })
      );

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toMatchObject({
        data: [{ location: { locationId: 'loc-panipat' }, distanceKm: 0 }, { location: { locationId: 'loc-karnal' } }],
      });
    });

    it('reports every malformed or missing parameter', async () => {
      const { handlers } = await setup();

      const result = await handlers.getNearbyLocations(apiEvent({ queryStringParameters: { lon: 'east' } }));

      expect(result.statusCode).toBe(400);
      expect(bodyOf(result)).toMatchObject({
        error: { details: { validationErrors: ['lon must be a number', 'lat is required'] } },
      });
    });

    it('maps out-of-range coordinates to 400', async () => {
      const { handlers } = await setup();

      const result = await handlers.getNearbyLocations(apiEvent({ queryStringParameters: { lat: '95', lon: '76.9' } }));

      expect(result.statusCode).toBe(400);
      expect(bodyOf(result)).toMatchObject({ error: { code: 'INVALID_COORDINATES' } });
    });
  });

  describe('getForecast', () => {
    it('rejects a non-numeric horizon', async () => {
      const { handlers } = await setup();

      const result = await handlers.getForecast(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { days: 'week' } })
      );

      expect(bodyOf(result)).toMatchObject({ error: { details: { validationErrors: ['days must be a number'] } } });
    });

    it('returns an empty forecast when no points are stored', async () => {
      const { handlers } = await setup();

      const result = await handlers.getForecast(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { days: '3' } })
      );

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toMatchObject({ data: [] });
    });
  });

  describe('alerts', () => {
    it('evaluates and lists active alerts', async () => {
      const { handlers } = await setup();
      const path = { pathParameters: { locationId: 'loc-panipat' } };

      const evaluated = await handlers.evaluateAlerts(apiEvent({ ...path, body: '{}' }));
      const listed = await handlers.getActiveAlerts(apiEvent(path));

      expect(evaluated.statusCode).toBe(200);
      expect(bodyOf(evaluated)).toMatchObject({ data: { created: [{ category: 'frost-warning', severity: 'high' }] } });

      expect(bodyOf(listed)).toMatchObject({ data: [{ category: 'frost-warning', state: 'active' }] });
    });

    it('validates the evaluation body', async () => {
      const { handlers } = await setup();
      const path = { pathParameters: { locationId: 'loc-panipat' } };

      const invalidJson = await handlers.evaluateAlerts(apiEvent({ ...path, body: '{crop' }));
      const wrongType = await handlers.evaluateAlerts(apiEvent({ ...path, body: '{"cropId": 42}' }));
      const notObject = await handlers.evaluateAlerts(apiEvent({ ...path, body: '[1]' }));

      expect(bodyOf(invalidJson)).toMatchObject({ error: { details: { validationErrors: ['Request body must be valid JSON'] } } });
      expect(bodyOf(wrongType)).toMatchObject({ error: { details: { validationErrors: ['cropId must be a string'] } } });
      expect(bodyOf(notObject)).toMatchObject({ error: { details: { validationErrors: ['Request body must be a JSON object'] } } });
    });

    it('resolves a stored alert with notes', async () => {
      const { store, handlers } = await setup();
      await handlers.evaluateAlerts(apiEvent({ pathParameters: { locationId: 'loc-panipat' } }));
      const [alertId] = [...store.alerts.keys()];

      const result = await handlers.resolveAlert(
        apiEvent({ pathParameters: { alertId }, body: JSON.stringify({ notes: 'Covered nursery beds' }) })
      );

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toMatchObject({
        data: { alertId, state: 'resolved', resolutionNotes: 'Covered nursery beds', resolvedAt: '2024-06-10T06:00:00.000Z' },
      });
    });

    it('maps an unknown alert to 404 and a missing id to 400', async () => {
      const { handlers } = await setup();

      const unknown = await handlers.resolveAlert(apiEvent({ pathParameters: { alertId: 'alert-unknown' } }));
      const missing = await handlers.resolveAlert(apiEvent());

      expect(unknown.statusCode).toBe(404);
      expect(missing.statusCode).toBe(400);
      expect(bodyOf(missing)).toMatchObject({ error: { details: { validationErrors: ['alertId is required'] } } });
    });
  });

  describe('getMetrics', () => {
    it('returns the metric set', async () => {
      const { handlers } = await setup();

      const result = await handlers.getMetrics(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { windowDays: '3' } })
      );

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toMatchObject({
        data: { locationId: 'loc-panipat', frostRisk: { result: { available: true, value: true } } },
      });
    });

    it('maps a bad window to 400', async () => {
      const { handlers } = await setup();

      const result = await handlers.getMetrics(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { windowDays: '0' } })
      );

      expect(result.statusCode).toBe(400);
      expect(bodyOf(result)).toMatchObject({
        error: { code: 'VALIDATION', message: 'Metric window must be a positive whole number of days, got 0' },
      });
    });

    it('turns a configuration fault into a 500', async () => {
      const { handlers } = await setup();

      const result = await handlers.getMetrics(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { cropId: 'broken' } })
      );

      expect(result.statusCode).toBe(500);
      expect(bodyOf(result)).toMatchObject({ error: { code: 'CONFIGURATION' } });
    });
  });

  describe('getCropSuitability', () => {
    it('assesses the latest reading against the crop bands', async () => {
      const { handlers } = await setup();

      const result = await handlers.getCropSuitability(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { cropId: 'millet' } })
      );

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toMatchObject({
        data: {
          locationId: 'loc-panipat',
          cropId: 'millet',
          readingAt: '2024-06-10T05:00:00.000Z',
          temperature: { available: true, value: false },
          humidity: { available: true, value: false },
          soilMoisture: { available: false, reason: 'No soil moisture reading' },
          riskFactors: ['cold-stress'],
        },
        stale: false,
      });
    });

    it('requires both a location id and a crop id', async () => {
      const { handlers } = await setup();

      const result = await handlers.getCropSuitability(apiEvent());

      expect(result.statusCode).toBe(400);
      expect(bodyOf(result)).toMatchObject({
        error: { details: { validationErrors: ['locationId is required', 'cropId is required'] } },
      });
    });

    it('maps an unknown crop to 404', async () => {
      const { handlers } = await setup();

      const result = await handlers.getCropSuitability(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { cropId: 'saffron' } })
      );

      expect(result.statusCode).toBe(404);
      expect(bodyOf(result)).toMatchObject({ error: { code: 'NOT_FOUND' } });
    });
  });

  describe('getForecastImplications', () => {
    it('returns an empty reading when no forecast is stored', async () => {
      const { handlers } = await setup();

      const result = await handlers.getForecastImplications(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { days: '3', cropId: 'millet' } })
      );

      expect(result.statusCode).toBe(200);
      expect(bodyOf(result)).toMatchObject({
        data: {
          locationId: 'loc-panipat',
          cropId: 'millet',
          generatedAt: '2024-06-10T06:00:00.000Z',
          days: [],
          outlook: { totalExpectedRainfall: 0, frostRiskDays: 0, heatStressDays: 0, favorableDays: 0 },
          recommendations: [],
        },
      });
    });

    it('rejects a non-numeric horizon', async () => {
      const { handlers } = await setup();

      const result = await handlers.getForecastImplications(
        apiEvent({ pathParameters: { locationId: 'loc-panipat' }, queryStringParameters: { days: 'week' } })
      );

      expect(result.statusCode).toBe(400);
      expect(bodyOf(result)).toMatchObject({ error: { details: { validationErrors: ['days must be a number'] } } });
    });
  });
});
