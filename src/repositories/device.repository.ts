/**
 * Device Repository - known devices per user
 *
 * DynamoDB Table Schema:
 * - pk: "USER#{userId}", sk: "DEVICE#{fingerprint}"
 *
 * The last location a device was seen from doubles as the user's set of
 * known locations for location risk.
 */

import { GetCommand, QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { dynamoDb, TableNames } from '../services/dynamodb.service';
import { Item, readOptionalString, readString } from '../utils/item';

export interface KnownDevice {
  userId: string;
  fingerprint: string;
  name: string;
  lastSeenLocation?: string;
  firstSeenAt: string;
  lastSeenAt: string;
}

export interface DeviceSighting {
  userId: string;
  fingerprint: string;
  name: string;
  location: string;
  seenAt: string;
}

export interface DeviceRegistry {
  findDevice(userId: string, fingerprint: string): Promise<KnownDevice | null>;
  listKnownLocations(userId: string): Promise<string[]>;
  recordDevice(sighting: DeviceSighting): Promise<void>;
}

function itemToDevice(item: Item): KnownDevice {
  return {
    userId: readString(item, 'user_id'),
    fingerprint: readString(item, 'fingerprint'),
    name: readString(item, 'device_name', 'Unknown device'),
    lastSeenLocation: readOptionalString(item, 'last_seen_location'),
    firstSeenAt: readString(item, 'first_seen_at'),
    lastSeenAt: readString(item, 'last_seen_at')
  };
}

export async function findDevice(userId: string, fingerprint: string): Promise<KnownDevice | null> {
  const result = await dynamoDb.send(new GetCommand({
    TableName: TableNames.DEVICES,
    Key: { pk: `USER#${userId}`, sk: `DEVICE#${fingerprint}` }
  }));

  return result.Item ? itemToDevice(result.Item) : null;
}

/**
 * Distinct locations any of the user's devices was last seen from
 */
export async function listKnownLocations(userId: string): Promise<string[]> {
  const locations = new Set<string>();
  let exclusiveStartKey: Item | undefined;

  do {
    const result = await dynamoDb.send(new QueryCommand({
      TableName: TableNames.DEVICES,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ProjectionExpression: 'last_seen_location',
      ExpressionAttributeValues: {
        ':pk': `USER#${userId}`,
        ':prefix': 'DEVICE#'
      },
      ExclusiveStartKey: exclusiveStartKey
    }));

    for (const item of result.Items || []) {
      const location = readOptionalString(item, 'last_seen_location');
      if (location) locations.add(location);
    }
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return [...locations];
}

/**
 * Insert or refresh a device after a successful authentication
 */
export async function recordDevice(sighting: DeviceSighting): Promise<void> {
  await dynamoDb.send(new UpdateCommand({
    TableName: TableNames.DEVICES,
    Key: { pk: `USER#${sighting.userId}`, sk: `DEVICE#${sighting.fingerprint}` },
    UpdateExpression: 'SET user_id = :userId, fingerprint = :fp, device_name = :name, ' +
      'last_seen_location = :location, last_seen_at = :seenAt, ' +
      'first_seen_at = if_not_exists(first_seen_at, :seenAt)',
    ExpressionAttributeValues: {
      ':userId': sighting.userId,
      ':fp': sighting.fingerprint,
      ':name': sighting.name,
      ':location': sighting.location,
      ':seenAt': sighting.seenAt
    }
  }));
}

export const deviceRepository: DeviceRegistry = {
  findDevice,
  listKnownLocations,
  recordDevice
};
