/**
 * Persistence collaborator contract.
 * Not-found is reported as null or an empty list; any thrown error is a backend failure.
 */

import { Alert, AlertState, ForecastPoint, Location, Reading } from '../types';

export interface LocationEnumerator {
  listLocations(): Promise<Location[]>;
}

export interface WeatherStore extends LocationEnumerator {
  getLocation(locationId: string): Promise<Location | null>;
  putLocation(location: Location): Promise<void>;

  getLatestReading(locationId: string): Promise<Reading | null>;
  /** Readings with from <= timestamp <= to, ascending by timestamp */
  getReadings(locationId: string, from: Date, to: Date): Promise<Reading[]>;
  putReading(reading: Reading): Promise<void>;

  /** Points with forecastDate >= fromDate, ascending by forecastDate */
  getForecastPoints(locationId: string, fromDate: string): Promise<ForecastPoint[]>;
  putForecastPoints(points: ForecastPoint[]): Promise<void>;

  getAlert(alertId: string): Promise<Alert | null>;
  listAlerts(locationId: string, state?: AlertState): Promise<Alert[]>;
  putAlert(alert: Alert): Promise<void>;
}
