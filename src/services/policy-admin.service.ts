/**
 * Policy Administration Service
 *
 * CRUD over access policies. Every mutation is validated in full before the
 * store is touched, and each write is a single DynamoDB transaction, so a
 * rejected request leaves no partial change behind.
 */

import crypto from 'crypto';
import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
  Policy,
  PolicyAction,
  PolicyPredicate,
  comparePolicies,
  isPolicyAction,
  toConditions,
  validateConditions
} from '../models/policy.model';
import { PolicyStore, PriorityShift, policyRepository } from '../repositories/policy.repository';
import {
  EngineError,
  ErrorCodes,
  PolicyNotFoundError,
  PolicyValidationError,
  mapAWSError
} from '../utils/errors';
import { SecurityEventTypes, logSimpleSecurityEvent } from './security-logger.service';

const MAX_NAME_LENGTH = 100;
const MAX_DESCRIPTION_LENGTH = 500;

// Position of the new name guard in the write transactions
const CREATE_NAME_GUARD_INDEX = 1;
const RENAME_NAME_GUARD_INDEX = 2;

export interface CreatePolicyInput {
  name: string;
  description?: string;
  priority?: number;
  conditions?: unknown;
  action: unknown;
  enabled?: boolean;
  /** Take the highest priority and push every policy at or below it down by one */
  insertAtTop?: boolean;
}

export interface UpdatePolicyInput {
  name?: string;
  description?: string;
  priority?: number;
  conditions?: unknown;
  action?: unknown;
  enabled?: boolean;
}

function generatePolicyId(): string {
  return `pol_${crypto.randomBytes(12).toString('hex')}`;
}

function validateName(name: unknown, errors: string[]): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    errors.push('Policy name is required');
    return '';
  }
  if (name.length > MAX_NAME_LENGTH) {
    errors.push(`Policy name must be at most ${MAX_NAME_LENGTH} characters`);
  }
  return name.trim();
}

function validateAction(action: unknown, errors: string[]): PolicyAction {
  if (!isPolicyAction(action)) {
    errors.push(`Invalid action: ${String(action)}. Expected one of allow, stepup, deny`);
    return 'deny';
  }
  return action;
}

function validatePriority(priority: unknown, errors: string[]): number {
  if (typeof priority !== 'number' || !Number.isInteger(priority) || priority < 0) {
    errors.push('Priority must be a non-negative integer');
    return 0;
  }
  return priority;
}

function validateDescription(description: unknown, errors: string[]): string {
  if (description === undefined) return '';
  if (typeof description !== 'string') {
    errors.push('Description must be a string');
    return '';
  }
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    errors.push(`Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`);
  }
  return description;
}

function validatePredicates(conditions: unknown, errors: string[]): PolicyPredicate[] {
  const result = validateConditions(conditions ?? {});
  errors.push(...result.errors);
  return result.predicates;
}

export class PolicyAdminService {
  constructor(private readonly store: PolicyStore = policyRepository) {}

  async listPolicies(): Promise<Policy[]> {
    const policies = await this.store.listPolicies();
    return policies.sort(comparePolicies);
  }

  async getPolicy(policyId: string): Promise<Policy> {
    const policy = await this.store.getPolicy(policyId);
    if (!policy) {
      throw new PolicyNotFoundError(policyId);
    }
    return policy;
  }

  async createPolicy(input: CreatePolicyInput): Promise<Policy> {
    const errors: string[] = [];
    const name = validateName(input.name, errors);
    const description = validateDescription(input.description, errors);
    const action = validateAction(input.action, errors);
    const predicates = validatePredicates(input.conditions, errors);
    if (input.priority !== undefined) validatePriority(input.priority, errors);
    if (errors.length > 0) {
      throw new PolicyValidationError(errors);
    }

    const existing = await this.store.listPolicies();
    if (existing.some(policy => policy.name === name)) {
      throw new PolicyValidationError([`Policy name already exists: ${name}`], ErrorCodes.POLICY_NAME_EXISTS);
    }

    const lowest = existing.reduce((min, policy) => Math.min(min, policy.priority), Infinity);
    const highest = existing.reduce((max, policy) => Math.max(max, policy.priority), 0);

    let priority: number;
    let shifts: PriorityShift[] = [];
    if (input.insertAtTop) {
      priority = input.priority ?? (existing.length > 0 ? lowest : 1);
      shifts = existing
        .filter(policy => policy.priority >= priority)
        .map(policy => ({
          policyId: policy.id,
          fromPriority: policy.priority,
          toPriority: policy.priority + 1
        }));
    } else {
      priority = input.priority ?? highest + 1;
    }

    const now = new Date().toISOString();
    const policy: Policy = {
      id: generatePolicyId(),
      name,
      description,
      priority,
      predicates,
      action,
      enabled: input.enabled ?? true,
      createdAt: now,
      updatedAt: now
    };

    try {
      await this.store.createPolicy(policy, shifts);
    } catch (error) {
      throw this.mapWriteConflict(error, name, CREATE_NAME_GUARD_INDEX);
    }

    logSimpleSecurityEvent(SecurityEventTypes.POLICY_CREATED, {
      policy_id: policy.id,
      name,
      action,
      priority,
      shifted: shifts.length
    });

    return policy;
  }

  async updatePolicy(policyId: string, updates: UpdatePolicyInput): Promise<Policy> {
    const current = await this.getPolicy(policyId);

    const errors: string[] = [];
    const name = updates.name === undefined ? current.name : validateName(updates.name, errors);
    const description = updates.description === undefined
      ? current.description
      : validateDescription(updates.description, errors);
    const action = updates.action === undefined ? current.action : validateAction(updates.action, errors);
    const priority = updates.priority === undefined
      ? current.priority
      : validatePriority(updates.priority, errors);
    const predicates = updates.conditions === undefined
      ? current.predicates
      : validatePredicates(updates.conditions, errors);
    if (updates.enabled !== undefined && typeof updates.enabled !== 'boolean') {
      errors.push('Enabled must be a boolean');
    }
    if (errors.length > 0) {
      throw new PolicyValidationError(errors);
    }

    if (name !== current.name) {
      const existing = await this.store.listPolicies();
      if (existing.some(policy => policy.name === name && policy.id !== policyId)) {
        throw new PolicyValidationError([`Policy name already exists: ${name}`], ErrorCodes.POLICY_NAME_EXISTS);
      }
    }

    const updated: Policy = {
      ...current,
      name,
      description,
      priority,
      predicates,
      action,
      enabled: updates.enabled ?? current.enabled,
      updatedAt: new Date().toISOString()
    };

    try {
      await this.store.updatePolicy(updated, current.name);
    } catch (error) {
      throw this.mapWriteConflict(error, name, name === current.name ? null : RENAME_NAME_GUARD_INDEX);
    }

    logSimpleSecurityEvent(SecurityEventTypes.POLICY_UPDATED, {
      policy_id: policyId,
      changes: Object.keys(updates),
      conditions: toConditions(updated.predicates)
    });

    return updated;
  }

  async deletePolicy(policyId: string): Promise<void> {
    const policy = await this.getPolicy(policyId);
    await this.store.deletePolicy(policy);

    logSimpleSecurityEvent(SecurityEventTypes.POLICY_DELETED, {
      policy_id: policyId,
      name: policy.name
    });
  }

  /**
   * Flip a policy's enabled flag, or set it explicitly
   */
  async togglePolicy(policyId: string, enabled?: boolean): Promise<Policy> {
    const current = await this.getPolicy(policyId);
    const updated: Policy = {
      ...current,
      enabled: enabled ?? !current.enabled,
      updatedAt: new Date().toISOString()
    };

    await this.store.updatePolicy(updated, current.name);

    logSimpleSecurityEvent(SecurityEventTypes.POLICY_TOGGLED, {
      policy_id: policyId,
      enabled: updated.enabled
    });

    return updated;
  }

  /**
   * A cancelled transaction either lost the name race (its guard item failed)
   * or saw a priority move underneath it. Other storage failures keep their
   * AWS meaning.
   */
  private mapWriteConflict(error: unknown, name: string, guardIndex: number | null): unknown {
    if (!(error instanceof TransactionCanceledException)) {
      return error instanceof Error ? mapAWSError(error) : error;
    }

    const reasons = error.CancellationReasons || [];
    if (guardIndex !== null && reasons[guardIndex]?.Code === 'ConditionalCheckFailed') {
      return new PolicyValidationError([`Policy name already exists: ${name}`], ErrorCodes.POLICY_NAME_EXISTS);
    }
    return new EngineError(ErrorCodes.CONFLICT, 'Policies changed concurrently, retry the request');
  }
}

let defaultPolicyAdminService: PolicyAdminService | null = null;

export function getPolicyAdminService(): PolicyAdminService {
  if (!defaultPolicyAdminService) {
    defaultPolicyAdminService = new PolicyAdminService();
  }
  return defaultPolicyAdminService;
}
