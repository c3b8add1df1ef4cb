/**
 * DynamoDB Client Utility - Court Alerts Engine
 *
 * Centralized DynamoDB Document Client using AWS SDK v3.
 * Local development is supported via DYNAMODB_ENDPOINT.
 */

import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TranslateConfig } from '@aws-sdk/lib-dynamodb';

const localEndpoint = process.env['DYNAMODB_ENDPOINT'];

const clientConfig: DynamoDBClientConfig = {
  region: process.env['AWS_REGION'] || 'us-east-1',
  maxAttempts: 3,
  ...(localEndpoint && {
    endpoint: localEndpoint,
    tls: false,
    // DynamoDB Local accepts any credentials
    credentials: {
      accessKeyId: 'local',
      secretAccessKey: 'local',
    },
  }),
};

const dynamoDBClient = new DynamoDBClient(clientConfig);

/**
 * Marshalling options:
 * - removeUndefinedValues: optional attributes (expiryDate) may be undefined
 * - convertEmptyValues: keep empty strings as-is
 */
const marshallOptions: TranslateConfig['marshallOptions'] = {
  removeUndefinedValues: true,
  convertEmptyValues: false,
};

const unmarshallOptions: TranslateConfig['unmarshallOptions'] = {
  wrapNumbers: false,
};

/**
 * DynamoDB Document Client instance, shared by all models
 */
export const docClient = DynamoDBDocumentClient.from(dynamoDBClient, {
  marshallOptions,
  unmarshallOptions,
});

/**
 * Get the DynamoDB table name from environment variable
 */
export const getTableName = (): string => {
  const tableName = process.env['TABLE_NAME'];

  if (!tableName) {
    throw new Error('TABLE_NAME environment variable is not set');
  }

  return tableName;
};

/**
 * Common DynamoDB error codes
 */
export const DynamoDBErrorCodes = {
  CONDITIONAL_CHECK_FAILED: 'ConditionalCheckFailedException',
  RESOURCE_NOT_FOUND: 'ResourceNotFoundException',
  PROVISIONED_THROUGHPUT_EXCEEDED: 'ProvisionedThroughputExceededException',
} as const;

/**
 * Check if an error is a specific DynamoDB error
 */
export const isDynamoDBError = (error: unknown, code: string): boolean => {
  return error instanceof Error && error.name === code;
};
