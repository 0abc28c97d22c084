/**
 * DynamoDB-backed weather store
 *
 * Table layout:
 * - locations: PK locationId
 * - readings:  PK locationId, SK timestamp (ISO-8601)
 * - forecasts: PK locationId, SK `${forecastDate}#${source}`
 * - alerts:    PK alertId, GSI `locationId-index` on locationId
 * - active alerts: PK locationId, SK category; a copy of the one active alert per pair,
 *   written in the same transaction as the alert itself
 *
 * Base-table reads are strongly consistent so a write is visible to the next read.
 */

import {
  Alert,
  AlertCategory,
  AlertSeverity,
  AlertState,
  ForecastPoint,
  Location,
  MEASUREMENT_FIELDS,
  MeasurementFields,
  Reading,
} from '../types';
import { TableNames } from '../shared/config/environment';
import { DynamoDBHelper, DynamoItem, TransactOperation } from '../shared/utils/dynamodb-helper';
import { WeatherStore } from './weather-store';

export const ALERTS_BY_LOCATION_INDEX = 'locationId-index';

const CONSISTENT = { consistentRead: true };

/* ============================================================
   ITEM PARSING
============================================================ */

class MalformedItemError extends Error {
  constructor(table: string, field: string) {
    super(`Malformed ${table} item: field "${field}" is missing or has the wrong type`);
    this.name = 'MalformedItemError';
  }
}

class ItemReader {
  constructor(private readonly item: DynamoItem, private readonly table: string) {}

  string(field: string): string {
    const value: unknown = this.item[field];
    if (typeof value !== 'string') throw new MalformedItemError(this.table, field);
    return value;
  }

  optionalString(field: string): string | undefined {
    const value: unknown = this.item[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw new MalformedItemError(this.table, field);
    return value;
  }

  number(field: string): number {
    const value: unknown = this.item[field];
    if (typeof value !== 'number') throw new MalformedItemError(this.table, field);
    return value;
  }

  optionalNumber(field: string): number | undefined {
    const value: unknown = this.item[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number') throw new MalformedItemError(this.table, field);
    return value;
  }

  date(field: string): Date {
    const value = new Date(this.string(field));
    if (isNaN(value.getTime())) throw new MalformedItemError(this.table, field);
    return value;
  }

  optionalDate(field: string): Date | null {
    const raw = this.optionalString(field);
    return raw === undefined ? null : this.date(field);
  }

  stringList(field: string): string[] {
    const value: unknown = this.item[field];
    if (value === undefined) return [];
    if (!Array.isArray(value)) throw new MalformedItemError(this.table, field);
    return value.filter((entry): entry is string => typeof entry === 'string');
  }

  oneOf<T extends string>(field: string, allowed: readonly T[]): T {
    const raw = this.string(field);
    const match = allowed.find(candidate => candidate === raw);
    if (match === undefined) throw new MalformedItemError(this.table, field);
    return match;
  }

  measurements(): MeasurementFields {
    const fields: MeasurementFields = {};
    for (const field of MEASUREMENT_FIELDS) {
      const value = this.optionalNumber(field);
      if (value !== undefined) fields[field] = value;
    }
    return fields;
  }
}

const ALERT_CATEGORIES = Object.values(AlertCategory);
const ALERT_SEVERITIES = Object.values(AlertSeverity);
const ALERT_STATES = Object.values(AlertState);

export function locationFromItem(item: DynamoItem): Location {
  const reader = new ItemReader(item, 'location');
  return {
    locationId: reader.string('locationId'),
    name: reader.string('name'),
    district: reader.string('district'),
    state: reader.optionalString('state'),
    latitude: reader.number('latitude'),
    longitude: reader.number('longitude'),
    elevation: reader.optionalNumber('elevation') ?? null,
  };
}

export function readingFromItem(item: DynamoItem): Reading {
  const reader = new ItemReader(item, 'reading');
  return {
    locationId: reader.string('locationId'),
    timestamp: reader.date('timestamp'),
    source: reader.optionalString('source'),
    ...reader.measurements(),
  };
}

export function forecastPointFromItem(item: DynamoItem): ForecastPoint {
  const reader = new ItemReader(item, 'forecast');
  return {
    locationId: reader.string('locationId'),
    forecastDate: reader.string('forecastDate'),
    source: reader.string('source'),
    issuedAt: reader.date('issuedAt'),
    confidence: reader.number('confidence'),
    minTemperature: reader.optionalNumber('minTemperature'),
    maxTemperature: reader.optionalNumber('maxTemperature'),
    rainfallProbability: reader.optionalNumber('rainfallProbability'),
    ...reader.measurements(),
  };
}

export function alertFromItem(item: DynamoItem): Alert {
  const reader = new ItemReader(item, 'alert');
  return {
    alertId: reader.string('alertId'),
    locationId: reader.string('locationId'),
    category: reader.oneOf('category', ALERT_CATEGORIES),
    severity: reader.oneOf('severity', ALERT_SEVERITIES),
    condition: reader.string('condition'),
    recommendedActions: reader.stringList('recommendedActions'),
    state: reader.oneOf('state', ALERT_STATES),
    createdAt: reader.date('createdAt'),
    updatedAt: reader.date('updatedAt'),
    resolvedAt: reader.optionalDate('resolvedAt'),
    resolutionNotes: reader.optionalString('resolutionNotes'),
  };
}

// DocumentClient rejects undefined attribute values
function compact(item: Record<string, unknown>): DynamoItem {
  const result: DynamoItem = {};
  for (const [key, value] of Object.entries(item)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/* ============================================================
   STORE
============================================================ */

export class DynamoWeatherStore implements WeatherStore {
  constructor(
    private readonly dynamo: DynamoDBHelper,
    private readonly tables: TableNames
  ) {}

  async listLocations(): Promise<Location[]> {
    const items = await this.dynamo.scanItems(this.tables.locations);
    return items.map(locationFromItem);
  }

  async getLocation(locationId: string): Promise<Location | null> {
    const item = await this.dynamo.getItem(this.tables.locations, { locationId }, CONSISTENT);
    return item ? locationFromItem(item) : null;
  }

  async putLocation(location: Location): Promise<void> {
    await this.dynamo.putItem(this.tables.locations, compact({ ...location }));
  }

  async getLatestReading(locationId: string): Promise<Reading | null> {
    const items = await this.dynamo.queryItems(this.tables.readings, {
      keyConditionExpression: 'locationId = :locationId',
      expressionAttributeValues: { ':locationId': locationId },
      scanIndexForward: false,
      limit: 1,
      consistentRead: true,
    });
    return items.length > 0 ? readingFromItem(items[0]) : null;
  }

  async getReadings(locationId: string, from: Date, to: Date): Promise<Reading[]> {
    const items = await this.dynamo.queryItems(this.tables.readings, {
      keyConditionExpression: 'locationId = :locationId AND #ts BETWEEN :from AND :to',
      expressionAttributeNames: { '#ts': 'timestamp' },
      expressionAttributeValues: {
        ':locationId': locationId,
        ':from': from.toISOString(),
        ':to': to.toISOString(),
      },
      scanIndexForward: true,
      consistentRead: true,
    });
    return items.map(readingFromItem);
  }

  async putReading(reading: Reading): Promise<void> {
    await this.dynamo.putItem(this.tables.readings, compact({
      ...reading,
      timestamp: reading.timestamp.toISOString(),
    }));
  }

  async getForecastPoints(locationId: string, fromDate: string): Promise<ForecastPoint[]> {
    const items = await this.dynamo.queryItems(this.tables.forecasts, {
      keyConditionExpression: 'locationId = :locationId AND sortKey >= :fromDate',
      expressionAttributeValues: { ':locationId': locationId, ':fromDate': fromDate },
      scanIndexForward: true,
      consistentRead: true,
    });
    return items.map(forecastPointFromItem);
  }

  async putForecastPoints(points: ForecastPoint[]): Promise<void> {
    // A batch may not hold two puts for one key; the last point for a (date, source) wins
    const byKey = new Map<string, DynamoItem>();
    for (const point of points) {
      const sortKey = `${point.forecastDate}#${point.source}`;
      byKey.set(`${point.locationId}|${sortKey}`, compact({
        ...point,
        sortKey,
        issuedAt: point.issuedAt.toISOString(),
      }));
    }
    await this.dynamo.batchWriteItems(this.tables.forecasts, [...byKey.values()]);
  }

  async getAlert(alertId: string): Promise<Alert | null> {
    const item = await this.dynamo.getItem(this.tables.alerts, { alertId }, CONSISTENT);
    return item ? alertFromItem(item) : null;
  }

  async listAlerts(locationId: string, state?: AlertState): Promise<Alert[]> {
    if (state === AlertState.ACTIVE) {
      const active = await this.dynamo.queryItems(this.tables.activeAlerts, {
        keyConditionExpression: 'locationId = :locationId',
        expressionAttributeValues: { ':locationId': locationId },
        consistentRead: true,
      });
      return active.map(alertFromItem);
    }

    const items = await this.dynamo.queryItems(this.tables.alerts, {
      indexName: ALERTS_BY_LOCATION_INDEX,
      keyConditionExpression: 'locationId = :locationId',
      expressionAttributeValues: state
        ? { ':locationId': locationId, ':state': state }
        : { ':locationId': locationId },
      expressionAttributeNames: state ? { '#state': 'state' } : undefined,
      filterExpression: state ? '#state = :state' : undefined,
    });
    return items.map(alertFromItem);
  }

  async putAlert(alert: Alert): Promise<void> {
    const item = compact({
      ...alert,
      createdAt: alert.createdAt.toISOString(),
      updatedAt: alert.updatedAt.toISOString(),
      resolvedAt: alert.resolvedAt ? alert.resolvedAt.toISOString() : undefined,
    });
    const slot = { locationId: alert.locationId, category: alert.category };

    const operations: TransactOperation[] = [{ kind: 'put', tableName: this.tables.alerts, item }];
    if (alert.state === AlertState.ACTIVE) {
      operations.push({ kind: 'put', tableName: this.tables.activeAlerts, item });
    } else {
      // Only clear the slot if it still holds this alert
      operations.push({
        kind: 'delete',
        tableName: this.tables.activeAlerts,
        key: slot,
        conditionExpression: 'attribute_not_exists(alertId) OR alertId = :alertId',
        expressionAttributeValues: { ':alertId': alert.alertId },
      });
    }
    await this.dynamo.transactWriteItems(operations);
  }
}
