import { ForecastPoint, Location } from '../types';

/**
 * A provider of forecast points for a location, merged alongside the stored forecast
 */
export interface ForecastSource {
  readonly name: string;
  fetch(location: Location, signal?: AbortSignal): Promise<ForecastPoint[]>;
}
