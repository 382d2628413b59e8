import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas, MAX_BATCH_WRITE } from '../db/tables';
import {
  CashEquityReason,
  CashEquityRecord,
  FillRecord,
  FillSide,
  PortfolioStore,
  Position
} from '../types/portfolio';
import { PersistenceError } from '../types/errors';

const CASH_EQUITY_REASONS: readonly CashEquityReason[] = ['BOOTSTRAP', 'CAPITAL_RESET', 'FILL', 'MARK_TO_MARKET'];

/**
 * Attempts at flushing unprocessed batch deletes before giving up
 */
const MAX_BATCH_ATTEMPTS = 3;

type Item = DynamoDB.DocumentClient.AttributeMap;

function readNumber(item: Item, field: string, operation: string): number {
  const value: unknown = item[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PersistenceError(operation, `malformed item: '${field}' is not a finite number`);
  }
  return value;
}

function readString(item: Item, field: string, operation: string): string {
  const value: unknown = item[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new PersistenceError(operation, `malformed item: '${field}' is not a string`);
  }
  return value;
}

function isFillSide(value: string): value is FillSide {
  return value === 'BUY' || value === 'SELL';
}

function isCashEquityReason(value: string): value is CashEquityReason {
  return CASH_EQUITY_REASONS.some(reason => reason === value);
}

/**
 * Validates a stored cash/equity item
 *
 * @throws PersistenceError if any field is missing or mistyped
 */
export function parseCashEquityRecord(item: Item): CashEquityRecord {
  const operation = 'getLatestCashEquity';
  const reason = readString(item, 'reason', operation);
  if (!isCashEquityReason(reason)) {
    throw new PersistenceError(operation, `malformed item: unknown reason '${reason}'`);
  }

  return {
    sessionId: readString(item, 'sessionId', operation),
    sequence: readNumber(item, 'sequence', operation),
    recordId: readString(item, 'recordId', operation),
    recordedAt: readString(item, 'recordedAt', operation),
    reason,
    cashBalance: readNumber(item, 'cashBalance', operation),
    totalEquity: readNumber(item, 'totalEquity', operation),
    totalFees: readNumber(item, 'totalFees', operation),
    totalRealizedPnl: readNumber(item, 'totalRealizedPnl', operation),
    totalUnrealizedPnl: readNumber(item, 'totalUnrealizedPnl', operation)
  };
}

/**
 * Validates a stored position item
 *
 * @throws PersistenceError if any field is missing or mistyped
 */
export function parsePosition(item: Item): Position {
  const operation = 'getPositions';
  return {
    symbol: readString(item, 'symbol', operation),
    quantity: readNumber(item, 'quantity', operation),
    averageCost: readNumber(item, 'averageCost', operation),
    openedAt: readString(item, 'openedAt', operation),
    updatedAt: readString(item, 'updatedAt', operation)
  };
}

/**
 * Validates a stored fill item
 *
 * @throws PersistenceError if any field is missing or mistyped
 */
export function parseFillRecord(item: Item): FillRecord {
  const operation = 'getFills';
  const side = readString(item, 'side', operation);
  if (!isFillSide(side)) {
    throw new PersistenceError(operation, `malformed item: unknown side '${side}'`);
  }
  const strategy: unknown = item.strategy;
  if (strategy !== null && strategy !== undefined && typeof strategy !== 'string') {
    throw new PersistenceError(operation, "malformed item: 'strategy' is not a string");
  }

  return {
    sessionId: readString(item, 'sessionId', operation),
    sequence: readNumber(item, 'sequence', operation),
    fillId: readString(item, 'fillId', operation),
    symbol: readString(item, 'symbol', operation),
    side,
    quantity: readNumber(item, 'quantity', operation),
    price: readNumber(item, 'price', operation),
    fee: readNumber(item, 'fee', operation),
    notional: readNumber(item, 'notional', operation),
    realizedPnl: readNumber(item, 'realizedPnl', operation),
    strategy: typeof strategy === 'string' ? strategy : null,
    executedAt: readString(item, 'executedAt', operation)
  };
}

/**
 * Portfolio Repository - DynamoDB-backed session store for cash/equity history,
 * open positions and the fill log
 *
 * Cash/equity records and fills are append-only: each write is conditioned on the
 * (sessionId, sequence) key not existing yet.
 */
export const PortfolioRepository: PortfolioStore & {
  listCashEquityHistory(sessionId: string, limit?: number): Promise<CashEquityRecord[]>;
} = {
  /**
   * Get the newest cash/equity record for a session
   *
   * @param sessionId - The session identifier
   * @returns The record with the highest sequence, or null if the session has none
   */
  async getLatestCashEquity(sessionId: string): Promise<CashEquityRecord | null> {
    const result = await documentClient.query({
      TableName: TableNames.CASH_EQUITY,
      KeyConditionExpression: '#pk = :sessionId',
      ExpressionAttributeNames: {
        '#pk': KeySchemas.CASH_EQUITY.partitionKey
      },
      ExpressionAttributeValues: {
        ':sessionId': sessionId
      },
      ScanIndexForward: false,
      Limit: 1
    }).promise();

    const items = result.Items || [];
    return items.length > 0 ? parseCashEquityRecord(items[0]) : null;
  },

  /**
   * List a session's cash/equity history, newest first
   */
  async listCashEquityHistory(sessionId: string, limit?: number): Promise<CashEquityRecord[]> {
    const queryParams: DynamoDB.DocumentClient.QueryInput = {
      TableName: TableNames.CASH_EQUITY,
      KeyConditionExpression: '#pk = :sessionId',
      ExpressionAttributeNames: {
        '#pk': KeySchemas.CASH_EQUITY.partitionKey
      },
      ExpressionAttributeValues: {
        ':sessionId': sessionId
      },
      ScanIndexForward: false
    };

    if (limit) {
      queryParams.Limit = limit;
    }

    const result = await documentClient.query(queryParams).promise();
    return (result.Items || []).map(parseCashEquityRecord);
  },

  /**
   * Get all stored positions for a session, following pagination
   */
  async getPositions(sessionId: string): Promise<Position[]> {
    const positions: Position[] = [];
    let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

    do {
      const queryParams: DynamoDB.DocumentClient.QueryInput = {
        TableName: TableNames.POSITIONS,
        KeyConditionExpression: '#pk = :sessionId',
        ExpressionAttributeNames: {
          '#pk': KeySchemas.POSITIONS.partitionKey
        },
        ExpressionAttributeValues: {
          ':sessionId': sessionId
        }
      };

      if (exclusiveStartKey) {
        queryParams.ExclusiveStartKey = exclusiveStartKey;
      }

      const result = await documentClient.query(queryParams).promise();
      positions.push(...(result.Items || []).map(parsePosition));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return positions;
  },

  /**
   * Append a cash/equity record
   *
   * @throws if a record with the same session and sequence already exists
   */
  async appendCashEquity(record: CashEquityRecord): Promise<void> {
    await documentClient.put({
      TableName: TableNames.CASH_EQUITY,
      Item: record,
      ConditionExpression: 'attribute_not_exists(#sk)',
      ExpressionAttributeNames: {
        '#sk': KeySchemas.CASH_EQUITY.sortKey
      }
    }).promise();
  },

  /**
   * Upsert a position for a session
   */
  async putPosition(sessionId: string, position: Position): Promise<void> {
    await documentClient.put({
      TableName: TableNames.POSITIONS,
      Item: {
        [KeySchemas.POSITIONS.partitionKey]: sessionId,
        ...position
      }
    }).promise();
  },

  /**
   * Delete a closed position
   */
  async deletePosition(sessionId: string, symbol: string): Promise<void> {
    await documentClient.delete({
      TableName: TableNames.POSITIONS,
      Key: {
        [KeySchemas.POSITIONS.partitionKey]: sessionId,
        [KeySchemas.POSITIONS.sortKey]: symbol
      }
    }).promise();
  },

  /**
   * Delete every position stored for a session, in batches of 25
   *
   * @throws PersistenceError if deletes remain unprocessed after retries
   */
  async clearAllPositions(sessionId: string): Promise<void> {
    const positions = await this.getPositions(sessionId);

    for (let offset = 0; offset < positions.length; offset += MAX_BATCH_WRITE) {
      const chunk = positions.slice(offset, offset + MAX_BATCH_WRITE);
      let requestItems: DynamoDB.DocumentClient.BatchWriteItemRequestMap = {
        [TableNames.POSITIONS]: chunk.map(position => ({
          DeleteRequest: {
            Key: {
              [KeySchemas.POSITIONS.partitionKey]: sessionId,
              [KeySchemas.POSITIONS.sortKey]: position.symbol
            }
          }
        }))
      };

      let attempts = 0;
      while (Object.keys(requestItems).length > 0) {
        if (attempts >= MAX_BATCH_ATTEMPTS) {
          throw new PersistenceError(
            'clearAllPositions',
            `unprocessed deletes remain for session '${sessionId}' after ${MAX_BATCH_ATTEMPTS} attempts`
          );
        }
        attempts++;

        const result = await documentClient.batchWrite({ RequestItems: requestItems }).promise();
        requestItems = result.UnprocessedItems || {};
      }
    }
  },

  /**
   * Get a session's fill log, oldest first, following pagination
   */
  async getFills(sessionId: string): Promise<FillRecord[]> {
    const fills: FillRecord[] = [];
    let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

    do {
      const queryParams: DynamoDB.DocumentClient.QueryInput = {
        TableName: TableNames.FILLS,
        KeyConditionExpression: '#pk = :sessionId',
        ExpressionAttributeNames: {
          '#pk': KeySchemas.FILLS.partitionKey
        },
        ExpressionAttributeValues: {
          ':sessionId': sessionId
        },
        ScanIndexForward: true
      };

      if (exclusiveStartKey) {
        queryParams.ExclusiveStartKey = exclusiveStartKey;
      }

      const result = await documentClient.query(queryParams).promise();
      fills.push(...(result.Items || []).map(parseFillRecord));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return fills;
  },

  /**
   * Append a fill to the session log
   *
   * @throws if a fill with the same session and sequence already exists
   */
  async appendFill(record: FillRecord): Promise<void> {
    await documentClient.put({
      TableName: TableNames.FILLS,
      Item: record,
      ConditionExpression: 'attribute_not_exists(#sk)',
      ExpressionAttributeNames: {
        '#sk': KeySchemas.FILLS.sortKey
      }
    }).promise();
  },

  /**
   * Remove a fill whose cash/equity record was never written
   */
  async deleteFill(sessionId: string, sequence: number): Promise<void> {
    await documentClient.delete({
      TableName: TableNames.FILLS,
      Key: {
        [KeySchemas.FILLS.partitionKey]: sessionId,
        [KeySchemas.FILLS.sortKey]: sequence
      }
    }).promise();
  }
};
