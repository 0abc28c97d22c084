/**
 * DynamoDB helper utilities for the weather store
 * Provides common database operations with error handling and type safety
 */

import { DynamoDB } from 'aws-sdk';
import { DocumentClient } from 'aws-sdk/clients/dynamodb';
import { Logger, createLogger } from './logger';
import { errorMessage } from './errors';
import { DEFAULT_VALUES } from '../config/constants';

export type DynamoItem = DocumentClient.AttributeMap;
export type DynamoKey = DocumentClient.Key;

export interface QueryOptions {
  keyConditionExpression: string;
  expressionAttributeValues: DocumentClient.ExpressionAttributeValueMap;
  expressionAttributeNames?: DocumentClient.ExpressionAttributeNameMap;
  filterExpression?: string;
  indexName?: string;
  limit?: number;
  scanIndexForward?: boolean;
  consistentRead?: boolean; // base tables only; DynamoDB rejects it on a global secondary index
}

export interface ReadOptions {
  consistentRead?: boolean;
}

export type TransactOperation =
  | { kind: 'put'; tableName: string; item: DynamoItem }
  | {
      kind: 'delete';
      tableName: string;
      key: DynamoKey;
      conditionExpression?: string;
      expressionAttributeValues?: DocumentClient.ExpressionAttributeValueMap;
    };

interface PromiseRequest<T> {
  promise(): Promise<T>;
}

/**
 * The DocumentClient calls the helper makes
 */
export interface DocumentClientLike {
  get(params: DocumentClient.GetItemInput): PromiseRequest<DocumentClient.GetItemOutput>;
  put(params: DocumentClient.PutItemInput): PromiseRequest<DocumentClient.PutItemOutput>;
  query(params: DocumentClient.QueryInput): PromiseRequest<DocumentClient.QueryOutput>;
  scan(params: DocumentClient.ScanInput): PromiseRequest<DocumentClient.ScanOutput>;
  batchWrite(params: DocumentClient.BatchWriteItemInput): PromiseRequest<DocumentClient.BatchWriteItemOutput>;
  transactWrite(params: DocumentClient.TransactWriteItemsInput): PromiseRequest<DocumentClient.TransactWriteItemsOutput>;
}

export interface DynamoDBHelperOptions {
  region?: string;
  client?: DocumentClientLike;
  logger?: Logger;
}

// DynamoDB batch write limit
const BATCH_SIZE = 25;

export class DynamoDBHelper {
  private docClient: DocumentClientLike;
  private logger: Logger;

  constructor(options: DynamoDBHelperOptions = {}) {
    this.docClient = options.client ?? new DynamoDB.DocumentClient({
      region: options.region || process.env.AWS_REGION || DEFAULT_VALUES.AWS_REGION,
    });
    this.logger = options.logger ?? createLogger('DynamoDBHelper');
  }

  /**
   * Put an item into a DynamoDB table
   */
  async putItem(tableName: string, item: DynamoItem): Promise<void> {
    const params: DocumentClient.PutItemInput = {
      TableName: tableName,
      Item: {
        ...item,
        updatedAt: item.updatedAt ?? new Date().toISOString(),
      },
    };

    try {
      await this.docClient.put(params).promise();
    } catch (error) {
      throw this.failure('put item to', tableName, error);
    }
  }

  /**
   * Get an item from a DynamoDB table
   */
  async getItem(tableName: string, key: DynamoKey, options: ReadOptions = {}): Promise<DynamoItem | null> {
    const params: DocumentClient.GetItemInput = {
      TableName: tableName,
      Key: key,
      ConsistentRead: options.consistentRead,
    };

    try {
      const result = await this.docClient.get(params).promise();
      return result.Item || null;
    } catch (error) {
      throw this.failure('get item from', tableName, error);
    }
  }

  /**
   * Query items from a DynamoDB table, following pagination until `limit` items
   * are collected or the key range is exhausted
   */
  async queryItems(tableName: string, options: QueryOptions): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: DynamoKey | undefined;

    try {
      do {
        const params: DocumentClient.QueryInput = {
          TableName: tableName,
          KeyConditionExpression: options.keyConditionExpression,
          ExpressionAttributeValues: options.expressionAttributeValues,
          ExpressionAttributeNames: options.expressionAttributeNames,
          FilterExpression: options.filterExpression,
          IndexName: options.indexName,
          Limit: options.limit,
          ScanIndexForward: options.scanIndexForward,
          ConsistentRead: options.consistentRead,
          ExclusiveStartKey: exclusiveStartKey,
        };
        const result = await this.docClient.query(params).promise();
        items.push(...(result.Items || []));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey && (options.limit === undefined || items.length < options.limit));
    } catch (error) {
      throw this.failure('query items from', tableName, error);
    }

    return options.limit === undefined ? items : items.slice(0, options.limit);
  }

  /**
   * Scan a whole table (startup rebuilds only)
   */
  async scanItems(tableName: string): Promise<DynamoItem[]> {
    const items: DynamoItem[] = [];
    let exclusiveStartKey: DynamoKey | undefined;

    try {
      do {
        const result = await this.docClient.scan({
          TableName: tableName,
          ExclusiveStartKey: exclusiveStartKey,
        }).promise();
        items.push(...(result.Items || []));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw this.failure('scan items from', tableName, error);
    }

    return items;
  }

  /**
   * Batch write items to DynamoDB
   */
  async batchWriteItems(tableName: string, items: DynamoItem[]): Promise<void> {
    const batches: DynamoItem[][] = [];

    for (let i = 0; i < items.length; i += BATCH_SIZE) {
      batches.push(items.slice(i, i + BATCH_SIZE));
    }

    for (const batch of batches) {
      const updatedAt = new Date().toISOString();
      let requestItems: DocumentClient.BatchWriteItemRequestMap | undefined = {
        [tableName]: batch.map(item => ({
          PutRequest: { Item: { ...item, updatedAt: item.updatedAt ?? updatedAt } },
        })),
      };

      try {
        // Retry whatever DynamoDB reports as unprocessed
        while (requestItems && Object.keys(requestItems).length > 0) {
          const result: DocumentClient.BatchWriteItemOutput =
            await this.docClient.batchWrite({ RequestItems: requestItems }).promise();
          requestItems = result.UnprocessedItems;
        }
      } catch (error) {
        throw this.failure('batch write items to', tableName, error);
      }
    }
  }

  /**
   * Apply puts and deletes across tables all-or-nothing
   */
  async transactWriteItems(operations: TransactOperation[]): Promise<void> {
    const updatedAt = new Date().toISOString();
    const transactItems: DocumentClient.TransactWriteItemList = operations.map(operation =>
      operation.kind === 'put'
        ? {
            Put: {
              TableName: operation.tableName,
              Item: { ...operation.item, updatedAt: operation.item.updatedAt ?? updatedAt },
            },
          }
        : {
            Delete: {
              TableName: operation.tableName,
              Key: operation.key,
              ConditionExpression: operation.conditionExpression,
              ExpressionAttributeValues: operation.expressionAttributeValues,
            },
          }
    );
    const tableNames = [...new Set(operations.map(operation => operation.tableName))].join(', ');

    try {
      await this.docClient.transactWrite({ TransactItems: transactItems }).promise();
    } catch (error) {
      throw this.failure('write transaction to', tableNames, error);
    }
  }

  private failure(action: string, tableName: string, error: unknown): Error {
    this.logger.error(`Error trying to ${action} ${tableName}`, error, { tableName });
    return new Error(`Failed to ${action} ${tableName}: ${errorMessage(error)}`, { cause: error });
  }
}
