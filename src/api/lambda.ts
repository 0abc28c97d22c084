/**
 * Lambda entry points. One engine per container, configured from the environment
 * and backed by DynamoDB; the geo index is rebuilt on the first invocation.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { WeatherAnalyticsEngine } from '../analytics-engine/weather-analytics-engine';
import { DynamoWeatherStore } from '../data-access/dynamo-weather-store';
import { HttpForecastSource } from '../forecast-engine/http-forecast-source';
import { ForecastSource } from '../forecast-engine/forecast-source';
import { EngineConfig, loadEngineConfig } from '../shared/config/environment';
import { DynamoDBHelper } from '../shared/utils/dynamodb-helper';
import { handleLambdaError } from '../shared/utils/lambda-response';
import { createLogger, parseLogLevel } from '../shared/utils/logger';
import { WeatherHandler, WeatherHandlers, createWeatherHandlers } from './weather-handlers';

const logger = createLogger('WeatherLambda');

// Confidence given to the live forecast API relative to stored (e.g. IMD) points
const LIVE_SOURCE_CONFIDENCE = 0.7;

let handlersPromise: Promise<WeatherHandlers> | undefined;

function forecastSources(): ForecastSource[] {
  const baseUrl = process.env.FORECAST_API_URL;
  const apiKey = process.env.FORECAST_API_KEY;
  if (!baseUrl || !apiKey) {
    logger.info('No live forecast source configured; using stored forecasts only');
    return [];
  }
  return [new HttpForecastSource({ name: 'forecast-api', baseUrl, apiKey, confidence: LIVE_SOURCE_CONFIDENCE })];
}

async function bootstrap(config: EngineConfig): Promise<WeatherHandlers> {
  const engineLogger = createLogger('WeatherAnalyticsEngine', parseLogLevel(config.logLevel));
  const dynamo = new DynamoDBHelper({ region: config.region, logger: engineLogger.child({ component: 'DynamoDBHelper' }) });
  const engine = new WeatherAnalyticsEngine({
    store: new DynamoWeatherStore(dynamo, config.tables),
    config,
    logger: engineLogger,
    forecastSources: forecastSources(),
  });
  await engine.start();
  return createWeatherHandlers(engine, engineLogger.child({ component: 'WeatherHandlers' }));
}

function handlers(): Promise<WeatherHandlers> {
  if (!handlersPromise) {
    handlersPromise = Promise.resolve()
      .then(() => bootstrap(loadEngineConfig()))
      .catch((error: unknown) => {
        // Let the next invocation try again
        handlersPromise = undefined;
        throw error;
      });
  }
  return handlersPromise;
}

function route(name: keyof WeatherHandlers): WeatherHandler {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    try {
      const all = await handlers();
      return await all[name](event);
    } catch (error) {
      logger.error('Engine bootstrap failed', error, { handler: name });
      return handleLambdaError(error, logger);
    }
  };
}

export const getCurrentWeather = route('getCurrentWeather');
export const getForecast = route('getForecast');
export const getNearbyLocations = route('getNearbyLocations');
export const getActiveAlerts = route('getActiveAlerts');
export const evaluateAlerts = route('evaluateAlerts');
export const resolveAlert = route('resolveAlert');
export const getMetrics = route('getMetrics');
export const getCropSuitability = route('getCropSuitability');
export const getForecastImplications = route('getForecastImplications');
