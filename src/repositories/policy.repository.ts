/**
 * Policy Repository - DynamoDB operations for access policies
 *
 * DynamoDB Table Schema:
 * - Policy:     pk: "POLICY#{policyId}", sk: "POLICY"
 * - Name guard: pk: "POLICY_NAME#{name}", sk: "NAME"
 *
 * Every write that touches a name also writes its guard item in the same
 * transaction, so two policies can never hold the same name.
 */

import {
  GetCommand,
  ScanCommand,
  TransactWriteCommand,
  TransactWriteCommandInput
} from '@aws-sdk/lib-dynamodb';
import { dynamoDb, TableNames } from '../services/dynamodb.service';
import {
  Policy,
  isPolicyAction,
  toConditions,
  validateConditions
} from '../models/policy.model';
import { SecurityEventTypes, logSecurityEvent } from '../services/security-logger.service';
import {
  Item,
  readBoolean,
  readNumber,
  readRecord,
  readString
} from '../utils/item';

/**
 * DynamoDB caps a transaction at 100 actions
 */
export const MAX_TRANSACTION_ITEMS = 100;

export interface PriorityShift {
  policyId: string;
  fromPriority: number;
  toPriority: number;
}

export interface PolicyStore {
  listPolicies(): Promise<Policy[]>;
  getPolicy(policyId: string): Promise<Policy | null>;
  createPolicy(policy: Policy, shifts?: PriorityShift[]): Promise<void>;
  updatePolicy(policy: Policy, previousName: string): Promise<void>;
  deletePolicy(policy: Policy): Promise<void>;
  seedPolicies(policies: Policy[]): Promise<void>;
}

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

function policyKey(policyId: string): { pk: string; sk: string } {
  return { pk: `POLICY#${policyId}`, sk: 'POLICY' };
}

function nameKey(name: string): { pk: string; sk: string } {
  return { pk: `POLICY_NAME#${name}`, sk: 'NAME' };
}

function policyToItem(policy: Policy): Item {
  return {
    ...policyKey(policy.id),
    id: policy.id,
    name: policy.name,
    description: policy.description,
    priority: policy.priority,
    conditions: toConditions(policy.predicates),
    action: policy.action,
    enabled: policy.enabled,
    created_at: policy.createdAt,
    updated_at: policy.updatedAt
  };
}

/**
 * Map a stored item to a policy. Items whose action or conditions no longer
 * validate are skipped and reported, never evaluated.
 */
export function itemToPolicy(item: Item): Policy | null {
  const id = readString(item, 'id');
  const action = item.action;
  const parsed = validateConditions(readRecord(item, 'conditions') ?? {});

  if (!isPolicyAction(action) || !parsed.valid) {
    logSecurityEvent({
      event_type: SecurityEventTypes.EVALUATION_DEGRADED,
      details: {
        reason: 'malformed_policy',
        policy_id: id,
        errors: isPolicyAction(action) ? parsed.errors : [`Invalid action: ${String(action)}`]
      }
    });
    return null;
  }

  return {
    id,
    name: readString(item, 'name'),
    description: readString(item, 'description'),
    priority: readNumber(item, 'priority'),
    predicates: parsed.predicates,
    action,
    enabled: readBoolean(item, 'enabled', true),
    createdAt: readString(item, 'created_at'),
    updatedAt: readString(item, 'updated_at')
  };
}

function putPolicyItem(policy: Policy, mustExist: boolean): TransactItem {
  return {
    Put: {
      TableName: TableNames.POLICIES,
      Item: policyToItem(policy),
      ConditionExpression: mustExist ? 'attribute_exists(pk)' : 'attribute_not_exists(pk)'
    }
  };
}

function putNameGuard(policy: Policy): TransactItem {
  return {
    Put: {
      TableName: TableNames.POLICIES,
      Item: { ...nameKey(policy.name), policy_id: policy.id },
      ConditionExpression: 'attribute_not_exists(pk)'
    }
  };
}

function deleteNameGuard(name: string, policyId: string): TransactItem {
  return {
    Delete: {
      TableName: TableNames.POLICIES,
      Key: nameKey(name),
      ConditionExpression: 'policy_id = :policyId',
      ExpressionAttributeValues: { ':policyId': policyId }
    }
  };
}

function shiftPriority(shift: PriorityShift, updatedAt: string): TransactItem {
  return {
    Update: {
      TableName: TableNames.POLICIES,
      Key: policyKey(shift.policyId),
      UpdateExpression: 'SET priority = :to, updated_at = :updatedAt',
      ConditionExpression: 'priority = :from',
      ExpressionAttributeValues: {
        ':to': shift.toPriority,
        ':from': shift.fromPriority,
        ':updatedAt': updatedAt
      }
    }
  };
}

async function transact(items: TransactItem[]): Promise<void> {
  if (items.length > MAX_TRANSACTION_ITEMS) {
    throw new RangeError(`Transaction exceeds ${MAX_TRANSACTION_ITEMS} items`);
  }
  await dynamoDb.send(new TransactWriteCommand({ TransactItems: items }));
}

export async function listPolicies(): Promise<Policy[]> {
  const policies: Policy[] = [];
  let exclusiveStartKey: Item | undefined;

  do {
    const result = await dynamoDb.send(new ScanCommand({
      TableName: TableNames.POLICIES,
      FilterExpression: 'sk = :sk',
      ExpressionAttributeValues: { ':sk': 'POLICY' },
      ExclusiveStartKey: exclusiveStartKey
    }));

    for (const item of result.Items || []) {
      const policy = itemToPolicy(item);
      if (policy) policies.push(policy);
    }
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return policies;
}

export async function getPolicy(policyId: string): Promise<Policy | null> {
  const result = await dynamoDb.send(new GetCommand({
    TableName: TableNames.POLICIES,
    Key: policyKey(policyId)
  }));

  return result.Item ? itemToPolicy(result.Item) : null;
}

/**
 * Insert a policy, optionally moving other policies' priorities in the same
 * transaction. Each shift only applies if the policy still has the expected
 * priority.
 */
export async function createPolicy(policy: Policy, shifts: PriorityShift[] = []): Promise<void> {
  await transact([
    putPolicyItem(policy, false),
    putNameGuard(policy),
    ...shifts.map(shift => shiftPriority(shift, policy.updatedAt))
  ]);
}

export async function updatePolicy(policy: Policy, previousName: string): Promise<void> {
  const items: TransactItem[] = [putPolicyItem(policy, true)];
  if (policy.name !== previousName) {
    items.push(deleteNameGuard(previousName, policy.id), putNameGuard(policy));
  }
  await transact(items);
}

export async function deletePolicy(policy: Policy): Promise<void> {
  await transact([
    {
      Delete: {
        TableName: TableNames.POLICIES,
        Key: policyKey(policy.id),
        ConditionExpression: 'attribute_exists(pk)'
      }
    },
    deleteNameGuard(policy.name, policy.id)
  ]);
}

/**
 * Write the default policy set. Fails as a whole if any of them exists.
 */
export async function seedPolicies(policies: Policy[]): Promise<void> {
  await transact(policies.flatMap(policy => [putPolicyItem(policy, false), putNameGuard(policy)]));
}

export const policyRepository: PolicyStore = {
  listPolicies,
  getPolicy,
  createPolicy,
  updatePolicy,
  deletePolicy,
  seedPolicies
};
