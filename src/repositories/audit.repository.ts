/**
 * Audit Repository - authentication history and engine audit trail
 *
 * DynamoDB Table Schema:
 * - pk: "USER#{userId}" (or "IP#{ip}" for anonymous events)
 * - sk: "EVENT#{timestamp}#{eventId}"
 * - GSI: ip-index (ip_address HASH, timestamp RANGE)
 * - ttl: 90 days
 */

import crypto from 'crypto';
import { PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { dynamoDb, IndexNames, TableNames } from '../services/dynamodb.service';
import { BehaviorProfile } from '../models/reevaluation.model';
import { Item, readString } from '../utils/item';

export type AuditEventType =
  | 'auth_success'
  | 'auth_failed'
  | 'access_granted'
  | 'access_denied'
  | 'suspicious_activity'
  | 'session_reevaluated'
  | 'session_revoked'
  | 'threat_check'
  | 'stepup_issued'
  | 'stepup_verified';

export const FAILED_AUTH_EVENTS: readonly AuditEventType[] = ['auth_failed'];

export const AUTH_ATTEMPT_EVENTS: readonly AuditEventType[] = ['auth_success', 'auth_failed'];

export const SUSPICIOUS_EVENTS: readonly AuditEventType[] = ['auth_failed', 'access_denied', 'suspicious_activity'];

export const SUCCESSFUL_EVENTS: readonly AuditEventType[] = ['auth_success', 'access_granted'];

const AUDIT_RETENTION_SECONDS = 90 * 24 * 60 * 60;

const BEHAVIOR_WINDOW_MS = 30 * 24 * 60 * 60 * 1000;

export interface AuditEvent {
  id: string;
  eventType: AuditEventType;
  userId?: string;
  sessionId?: string;
  ipAddress: string;
  timestamp: string;
  details?: Record<string, unknown>;
}

export type AuditEventInput = Omit<AuditEvent, 'id' | 'timestamp'> & { timestamp?: string };

export interface AuditHistory {
  recordEvent(input: AuditEventInput): Promise<AuditEvent>;
  countUserEvents(userId: string, eventTypes: readonly AuditEventType[], since: Date): Promise<number>;
  countIpEvents(ipAddress: string, eventTypes: readonly AuditEventType[], since: Date): Promise<number>;
  getBehaviorProfile(userId: string, now?: Date): Promise<BehaviorProfile | null>;
}

function partitionKey(userId: string | undefined, ipAddress: string): string {
  return userId ? `USER#${userId}` : `IP#${ipAddress}`;
}

/**
 * Build `event_type IN (...)` with one placeholder per type
 */
function eventTypeFilter(eventTypes: readonly AuditEventType[]): {
  expression: string;
  values: Record<string, string>;
} {
  const values: Record<string, string> = {};
  const placeholders = eventTypes.map((type, i) => {
    values[`:type${i}`] = type;
    return `:type${i}`;
  });
  return { expression: `event_type IN (${placeholders.join(', ')})`, values };
}

export async function recordEvent(input: AuditEventInput): Promise<AuditEvent> {
  const event: AuditEvent = {
    id: `evt_${crypto.randomBytes(12).toString('hex')}`,
    eventType: input.eventType,
    userId: input.userId,
    sessionId: input.sessionId,
    ipAddress: input.ipAddress,
    timestamp: input.timestamp || new Date().toISOString(),
    details: input.details
  };

  await dynamoDb.send(new PutCommand({
    TableName: TableNames.AUDIT,
    Item: {
      pk: partitionKey(event.userId, event.ipAddress),
      sk: `EVENT#${event.timestamp}#${event.id}`,
      id: event.id,
      event_type: event.eventType,
      user_id: event.userId,
      session_id: event.sessionId,
      ip_address: event.ipAddress,
      timestamp: event.timestamp,
      details: event.details,
      ttl: Math.floor(new Date(event.timestamp).getTime() / 1000) + AUDIT_RETENTION_SECONDS
    }
  }));

  return event;
}

export async function countUserEvents(
  userId: string,
  eventTypes: readonly AuditEventType[],
  since: Date
): Promise<number> {
  if (eventTypes.length === 0) return 0;

  const filter = eventTypeFilter(eventTypes);
  let total = 0;
  let exclusiveStartKey: Item | undefined;

  do {
    const result = await dynamoDb.send(new QueryCommand({
      TableName: TableNames.AUDIT,
      KeyConditionExpression: 'pk = :pk AND sk >= :since',
      FilterExpression: filter.expression,
      ExpressionAttributeValues: {
        ':pk': `USER#${userId}`,
        ':since': `EVENT#${since.toISOString()}`,
        ...filter.values
      },
      Select: 'COUNT',
      ExclusiveStartKey: exclusiveStartKey
    }));
    total += result.Count || 0;
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}

export async function countIpEvents(
  ipAddress: string,
  eventTypes: readonly AuditEventType[],
  since: Date
): Promise<number> {
  if (eventTypes.length === 0) return 0;

  const filter = eventTypeFilter(eventTypes);
  let total = 0;
  let exclusiveStartKey: Item | undefined;

  do {
    const result = await dynamoDb.send(new QueryCommand({
      TableName: TableNames.AUDIT,
      IndexName: IndexNames.IP,
      KeyConditionExpression: 'ip_address = :ip AND #ts >= :since',
      FilterExpression: filter.expression,
      ExpressionAttributeNames: { '#ts': 'timestamp' },
      ExpressionAttributeValues: {
        ':ip': ipAddress,
        ':since': since.toISOString(),
        ...filter.values
      },
      Select: 'COUNT',
      ExclusiveStartKey: exclusiveStartKey
    }));
    total += result.Count || 0;
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}

/**
 * Typical access hours (UTC) and average successful logins per active day,
 * over the last 30 days. Null when the user has no history yet.
 */
export async function getBehaviorProfile(
  userId: string,
  now: Date = new Date()
): Promise<BehaviorProfile | null> {
  const since = new Date(now.getTime() - BEHAVIOR_WINDOW_MS);
  const hours = new Set<number>();
  const days = new Set<string>();
  let accessCount = 0;
  let exclusiveStartKey: Item | undefined;

  do {
    const result = await dynamoDb.send(new QueryCommand({
      TableName: TableNames.AUDIT,
      KeyConditionExpression: 'pk = :pk AND sk >= :since',
      FilterExpression: 'event_type = :type',
      ProjectionExpression: '#ts',
      ExpressionAttributeNames: { '#ts': 'timestamp' },
      ExpressionAttributeValues: {
        ':pk': `USER#${userId}`,
        ':since': `EVENT#${since.toISOString()}`,
        ':type': 'auth_success'
      },
      ExclusiveStartKey: exclusiveStartKey
    }));

    for (const item of result.Items || []) {
      const timestamp = new Date(readString(item, 'timestamp'));
      if (Number.isNaN(timestamp.getTime())) continue;
      hours.add(timestamp.getUTCHours());
      days.add(timestamp.toISOString().slice(0, 10));
      accessCount++;
    }
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  if (accessCount === 0) return null;

  return {
    typicalHours: [...hours].sort((a, b) => a - b),
    averageAccessCount: accessCount / days.size
  };
}

export const auditRepository: AuditHistory = {
  recordEvent,
  countUserEvents,
  countIpEvents,
  getBehaviorProfile
};
