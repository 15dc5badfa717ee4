/**
 * DynamoDB Service - shared document client for the access engine tables
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ENGINE_CONFIG } from '../config/engine.config';

const client = new DynamoDBClient({ region: ENGINE_CONFIG.region });

export const dynamoDb = DynamoDBDocumentClient.from(client, {
  marshallOptions: {
    removeUndefinedValues: true,
    convertEmptyValues: false
  },
  unmarshallOptions: {
    wrapNumbers: false
  }
});

export const TableNames = {
  POLICIES: ENGINE_CONFIG.dynamodb.tables.policies,
  SESSIONS: ENGINE_CONFIG.dynamodb.tables.sessions,
  DEVICES: ENGINE_CONFIG.dynamodb.tables.devices,
  AUDIT: ENGINE_CONFIG.dynamodb.tables.audit
} as const;

export const IndexNames = {
  IP: ENGINE_CONFIG.dynamodb.indexes.ipIndex
} as const;
