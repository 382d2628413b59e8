/**
 * DynamoDB table configurations for portfolio persistence
 */

/**
 * Table name constants - use environment variables for flexibility across environments
 */
export const TableNames = {
  CASH_EQUITY: process.env.CASH_EQUITY_TABLE || 'portfolio-cash-equity',
  POSITIONS: process.env.POSITIONS_TABLE || 'portfolio-positions',
  FILLS: process.env.FILLS_TABLE || 'portfolio-fills'
} as const;

/**
 * Key schema definitions for each table
 */
export const KeySchemas = {
  /**
   * Cash/Equity Table (append-only)
   * - Partition Key: sessionId
   * - Sort Key: sequence (numeric, newest = highest)
   */
  CASH_EQUITY: {
    partitionKey: 'sessionId',
    sortKey: 'sequence'
  },

  /**
   * Positions Table
   * - Partition Key: sessionId
   * - Sort Key: symbol
   */
  POSITIONS: {
    partitionKey: 'sessionId',
    sortKey: 'symbol'
  },

  /**
   * Fills Table (append-only)
   * - Partition Key: sessionId
   * - Sort Key: sequence (matches the FILL cash/equity record)
   */
  FILLS: {
    partitionKey: 'sessionId',
    sortKey: 'sequence'
  }
} as const;

/**
 * DynamoDB BatchWriteItem accepts at most 25 requests per call
 */
export const MAX_BATCH_WRITE = 25;
