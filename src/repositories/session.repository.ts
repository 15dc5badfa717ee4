/**
 * Session Repository - DynamoDB operations for the engine's session fields
 *
 * DynamoDB Table Schema:
 * - pk: "SESSION#{sessionId}", sk: "METADATA"
 *
 * Every write is conditional on `revoked = false`. Revocation rides on the
 * risk update itself, so a session is never left rescored but unrevoked,
 * and it happens at most once no matter how many callers race for it.
 */

import { GetCommand, ScanCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { dynamoDb, TableNames } from '../services/dynamodb.service';
import { Session, SessionLocation, SessionRiskUpdate } from '../models/session.model';
import {
  Item,
  readBoolean,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readRecord,
  readString
} from '../utils/item';

export interface SessionStore {
  getSession(sessionId: string): Promise<Session | null>;
  listActiveSessions(minRiskScore?: number, now?: Date): Promise<Session[]>;
  updateSessionRisk(sessionId: string, update: SessionRiskUpdate): Promise<boolean>;
  updateRiskScore(sessionId: string, riskScore: number): Promise<boolean>;
}

function sessionKey(sessionId: string): { pk: string; sk: string } {
  return { pk: `SESSION#${sessionId}`, sk: 'METADATA' };
}

function itemToLocation(item: Item | undefined): SessionLocation | undefined {
  if (!item) return undefined;
  return {
    display: readString(item, 'display', 'Unknown'),
    country_code: readOptionalString(item, 'country_code'),
    latitude: readOptionalNumber(item, 'latitude'),
    longitude: readOptionalNumber(item, 'longitude')
  };
}

export function itemToSession(item: Item): Session {
  return {
    id: readString(item, 'id'),
    user_id: readString(item, 'user_id'),
    risk_score: readNumber(item, 'risk_score'),
    ip_address: readString(item, 'ip_address'),
    user_agent: readString(item, 'user_agent'),
    location: itemToLocation(readRecord(item, 'location')),
    created_at: readString(item, 'created_at'),
    expires_at: readString(item, 'expires_at'),
    last_reevaluated_at: readOptionalString(item, 'last_reevaluated_at'),
    next_reevaluation_at: readOptionalString(item, 'next_reevaluation_at'),
    revoked: readBoolean(item, 'revoked'),
    revoked_at: readOptionalString(item, 'revoked_at'),
    revoke_reason: readOptionalString(item, 'revoke_reason')
  };
}

export async function getSession(sessionId: string): Promise<Session | null> {
  const result = await dynamoDb.send(new GetCommand({
    TableName: TableNames.SESSIONS,
    Key: sessionKey(sessionId)
  }));

  return result.Item ? itemToSession(result.Item) : null;
}

/**
 * Non-revoked, unexpired sessions at or above a risk score
 */
export async function listActiveSessions(
  minRiskScore = 0,
  now: Date = new Date()
): Promise<Session[]> {
  const sessions: Session[] = [];
  let exclusiveStartKey: Item | undefined;

  do {
    const result = await dynamoDb.send(new ScanCommand({
      TableName: TableNames.SESSIONS,
      FilterExpression: 'revoked = :false AND expires_at > :now AND risk_score >= :minScore',
      ExpressionAttributeValues: {
        ':false': false,
        ':now': now.toISOString(),
        ':minScore': minRiskScore
      },
      ExclusiveStartKey: exclusiveStartKey
    }));
    sessions.push(...(result.Items || []).map(itemToSession));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return sessions;
}

function isConditionalCheckFailure(error: unknown): boolean {
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

/**
 * Write back the reevaluated risk state, revoking the session in the same
 * write when `update.revoke` is set. Returns false if the session is gone or
 * was revoked in the meantime; nothing is written then.
 */
export async function updateSessionRisk(
  sessionId: string,
  update: SessionRiskUpdate
): Promise<boolean> {
  const { revoke } = update;
  let updateExpression = 'SET risk_score = :score, ip_address = :ip, user_agent = :ua, ' +
    '#location = :location, last_reevaluated_at = :reevaluatedAt, next_reevaluation_at = :nextAt';
  const values: Record<string, unknown> = {
    ':score': update.risk_score,
    ':ip': update.ip_address,
    ':ua': update.user_agent,
    ':location': update.location ?? null,
    ':reevaluatedAt': update.last_reevaluated_at,
    ':nextAt': update.next_reevaluation_at,
    ':false': false
  };

  if (revoke) {
    updateExpression += ', revoked = :true, revoked_at = :revokedAt, revoke_reason = :reason';
    values[':true'] = true;
    values[':revokedAt'] = revoke.revoked_at;
    values[':reason'] = revoke.reason;
  }

  try {
    await dynamoDb.send(new UpdateCommand({
      TableName: TableNames.SESSIONS,
      Key: sessionKey(sessionId),
      UpdateExpression: updateExpression,
      ConditionExpression: 'attribute_exists(pk) AND revoked = :false',
      ExpressionAttributeNames: { '#location': 'location' },
      ExpressionAttributeValues: values
    }));
    return true;
  } catch (error) {
    if (isConditionalCheckFailure(error)) return false;
    throw error;
  }
}

/**
 * Set only the risk score, as threat enrichment does. Returns false if the
 * session is gone or revoked.
 */
export async function updateRiskScore(sessionId: string, riskScore: number): Promise<boolean> {
  try {
    await dynamoDb.send(new UpdateCommand({
      TableName: TableNames.SESSIONS,
      Key: sessionKey(sessionId),
      UpdateExpression: 'SET risk_score = :score',
      ConditionExpression: 'attribute_exists(pk) AND revoked = :false',
      ExpressionAttributeValues: {
        ':score': riskScore,
        ':false': false
      }
    }));
    return true;
  } catch (error) {
    if (isConditionalCheckFailure(error)) return false;
    throw error;
  }
}

export const sessionRepository: SessionStore = {
  getSession,
  listActiveSessions,
  updateSessionRisk,
  updateRiskScore
};
