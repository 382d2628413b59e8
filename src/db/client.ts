import { DynamoDB } from 'aws-sdk';

/**
 * Client settings for the portfolio tables (cash/equity, positions, fills).
 * AWS_REGION picks the region; DYNAMODB_ENDPOINT points at a local DynamoDB.
 */
const dynamoDbConfig: DynamoDB.DocumentClient.DocumentClientOptions & DynamoDB.Types.ClientConfiguration = {
  region: process.env.AWS_REGION || 'us-east-1',
  ...(process.env.DYNAMODB_ENDPOINT && {
    endpoint: process.env.DYNAMODB_ENDPOINT
  })
};

/**
 * Singleton DocumentClient shared by the portfolio repositories
 */
export const documentClient = new DynamoDB.DocumentClient(dynamoDbConfig);
