import { describe, it, expect } from 'vitest';
import { AlertState } from '../types';
import {
  ALERTS_BY_LOCATION_INDEX,
  DynamoWeatherStore,
  alertFromItem,
  locationFromItem,
  readingFromItem,
} from './dynamo-weather-store';
import {
  DynamoDBHelper,
  DynamoItem,
  DynamoKey,
  QueryOptions,
  ReadOptions,
  TransactOperation,
} from '../shared/utils/dynamodb-helper';
import { DEFAULT_ENGINE_CONFIG } from '../shared/config/environment';
import { alert, forecastPoint, quietLogger, reading } from '../../test/fixtures';

/**
 * Records every table call and answers queries from canned items
 */
class RecordingDynamo extends DynamoDBHelper {
  readonly puts: Array<{ tableName: string; item: DynamoItem }> = [];
  readonly batches: Array<{ tableName: string; items: DynamoItem[] }> = [];
  readonly queries: Array<{ tableName: string; options: QueryOptions }> = [];
  readonly gets: Array<{ tableName: string; key: DynamoKey; options: ReadOptions }> = [];
  readonly transactions: TransactOperation[][] = [];

  constructor(private readonly cannedItems: DynamoItem[] = []) {
    super({ region: 'ap-south-1', logger: quietLogger() });
  }

  async putItem(tableName: string, item: DynamoItem): Promise<void> {
    this.puts.push({ tableName, item });
  }

  async getItem(tableName: string, key: DynamoKey, options: ReadOptions = {}): Promise<DynamoItem | null> {
    this.gets.push({ tableName, key, options });
    return this.cannedItems[0] ?? null;
  }

  async queryItems(tableName: string, options: QueryOptions): Promise<DynamoItem[]> {
    this.queries.push({ tableName, options });
    return this.cannedItems;
  }

  async scanItems(_tableName: string): Promise<DynamoItem[]> {
    return this.cannedItems;
  }

  async batchWriteItems(tableName: string, items: DynamoItem[]): Promise<void> {
    this.batches.push({ tableName, items });
  }

  async transactWriteItems(operations: TransactOperation[]): Promise<void> {
    this.transactions.push(operations);
  }
}

const TABLES = DEFAULT_ENGINE_CONFIG.tables;

describe('item parsing', () => {
  it('reads a location with an unknown elevation as null', () => {
    expect(locationFromItem({
      locationId: 'loc-panipat',
      name: 'Panipat',
      district: 'Panipat',
      latitude: 29.3909,
      longitude: 76.9635,
    })).toEqual({
      locationId: 'loc-panipat',
      name: 'Panipat',
      district: 'Panipat',
      state: undefined,
      latitude: 29.3909,
      longitude: 76.9635,
      elevation: null,
    });
  });

  it('keeps only known measurement fields of a reading', () => {
    expect(readingFromItem({
      locationId: 'loc-panipat',
      timestamp: '2024-06-10T05:00:00.000Z',
      temperature: 31.5,
      soilMoisture: 22,
      updatedAt: '2024-06-10T05:00:01.000Z',
    })).toEqual({
      locationId: 'loc-panipat',
      timestamp: new Date('2024-06-10T05:00:00.000Z'),
      source: undefined,
      temperature: 31.5,
      soilMoisture: 22,
    });
  });

  it('rejects malformed fields', () => {
    expect(() => readingFromItem({ locationId: 'loc-panipat', timestamp: 'yesterday' })).toThrow(
      'Malformed reading item: field "timestamp" is missing or has the wrong type'
    );
    expect(() => readingFromItem({ locationId: 'loc-panipat', timestamp: '2024-06-10T05:00:00Z', humidity: '40' }))
      .toThrow('Malformed reading item: field "humidity" is missing or has the wrong type');
    expect(() => alertFromItem({
      alertId: 'alert-1',
      locationId: 'loc-panipat',
      category: 'hail',
      severity: 'high',
      condition: 'Hail',
      state: 'active',
      createdAt: '2024-06-01T00:00:00Z',
      updatedAt: '2024-06-01T00:00:00Z',
    })).toThrow('Malformed alert item: field "category" is missing or has the wrong type');
  });
});

describe('DynamoWeatherStore', () => {
  it('writes an active alert and its location slot in one transaction', async () => {
    const dynamo = new RecordingDynamo();
    const store = new DynamoWeatherStore(dynamo, TABLES);
    const item = {
      alertId: 'alert-1',
      locationId: 'loc-panipat',
      category: 'frost-warning',
      severity: 'high',
      condition: 'Temperature 3 °C at or below frost threshold of 4 °C',
      recommendedActions: ['Cover nurseries and sensitive crops overnight'],
      state: 'active',
      createdAt: '2024-06-01T00:00:00.000Z',
      updatedAt: '2024-06-01T00:00:00.000Z',
    };

    await store.putAlert(alert());

    expect(dynamo.transactions).toEqual([
      [
        { kind: 'put', tableName: 'weather-alerts', item },
        { kind: 'put', tableName: 'weather-active-alerts', item },
      ],
    ]);
  });

  it('clears the location slot only while it still holds the resolved alert', async () => {
    const dynamo = new RecordingDynamo();
    const store = new DynamoWeatherStore(dynamo, TABLES);

    await store.putAlert(alert({ state: AlertState.RESOLVED, resolvedAt: new Date('2024-06-02T00:00:00Z') }));

    expect(dynamo.transactions[0][1]).toEqual({
      kind: 'delete',
      tableName: 'weather-active-alerts',
      key: { locationId: 'loc-panipat', category: 'frost-warning' },
      conditionExpression: 'attribute_not_exists(alertId) OR alertId = :alertId',
      expressionAttributeValues: { ':alertId': 'alert-1' },
    });
  });

  it('round-trips an alert item through the parser', async () => {
    const dynamo = new RecordingDynamo();
    const store = new DynamoWeatherStore(dynamo, TABLES);
    const resolved = alert({ state: AlertState.RESOLVED, resolvedAt: new Date('2024-06-02T00:00:00Z'), resolutionNotes: 'Done' });

    await store.putAlert(resolved);

    const [put] = dynamo.transactions[0];
    expect(put.kind === 'put' && alertFromItem(put.item)).toEqual(resolved);
  });

  it('keeps the last forecast point per date and source in one batch', async () => {
    const dynamo = new RecordingDynamo();
    const store = new DynamoWeatherStore(dynamo, TABLES);

    await store.putForecastPoints([
      forecastPoint('2024-06-10', { rainfall: 4 }),
      forecastPoint('2024-06-11', { rainfall: 0 }),
      forecastPoint('2024-06-10', { rainfall: 9 }),
    ]);

    expect(dynamo.batches).toHaveLength(1);
    expect(dynamo.batches[0].tableName).toBe('weather-forecasts');
    expect(dynamo.batches[0].items.map(item => [item.sortKey, item.rainfall])).toEqual([
      ['2024-06-10#imd', 9],
      ['2024-06-11#imd', 0],
    ]);
  });

  it('queries the newest reading first, one item only', async () => {
    const dynamo = new RecordingDynamo([{ locationId: 'loc-panipat', timestamp: '2024-06-10T05:00:00.000Z', temperature: 31 }]);
    const store = new DynamoWeatherStore(dynamo, TABLES);

    const latest = await store.getLatestReading('loc-panipat');

    expect(latest).toEqual(reading('2024-06-10T05:00:00.000Z', { source: undefined, temperature: 31 }));
    expect(dynamo.queries[0]).toMatchObject({
      tableName: 'weather-readings',
      options: { scanIndexForward: false, limit: 1, consistentRead: true },
    });
  });

  it('reads active alerts from the slot table and other states from the location index', async () => {
    const dynamo = new RecordingDynamo();
    const store = new DynamoWeatherStore(dynamo, TABLES);

    await store.listAlerts('loc-panipat', AlertState.ACTIVE);
    await store.listAlerts('loc-panipat', AlertState.RESOLVED);
    await store.listAlerts('loc-panipat');

    expect(dynamo.queries).toEqual([
      {
        tableName: 'weather-active-alerts',
        options: {
          keyConditionExpression: 'locationId = :locationId',
          expressionAttributeValues: { ':locationId': 'loc-panipat' },
          consistentRead: true,
        },
      },
      {
        tableName: 'weather-alerts',
        options: {
          indexName: ALERTS_BY_LOCATION_INDEX,
          keyConditionExpression: 'locationId = :locationId',
          expressionAttributeValues: { ':locationId': 'loc-panipat', ':state': 'resolved' },
          expressionAttributeNames: { '#state': 'state' },
          filterExpression: '#state = :state',
        },
      },
      {
        tableName: 'weather-alerts',
        options: {
          indexName: ALERTS_BY_LOCATION_INDEX,
          keyConditionExpression: 'locationId = :locationId',
          expressionAttributeValues: { ':locationId': 'loc-panipat' },
          expressionAttributeNames: undefined,
          filterExpression: undefined,
        },
      },
    ]);
  });

  it('reports a missing location as null', async () => {
    const dynamo = new RecordingDynamo();
    const store = new DynamoWeatherStore(dynamo, TABLES);

    await expect(store.getLocation('loc-unknown')).resolves.toBeNull();
    expect(dynamo.gets).toEqual([
      { tableName: 'weather-locations', key: { locationId: 'loc-unknown' }, options: { consistentRead: true } },
    ]);
  });
});
