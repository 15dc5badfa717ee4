/**
 * Policy Model
 *
 * A policy is an ordered access rule: when every predicate holds for the
 * assessed attempt, its action is the decision. Predicates are stored as a
 * conditions map and parsed into tagged variants before evaluation.
 */

import { DEVICE_TYPES, DeviceType } from './auth-context.model';
import { MAX_RISK_SCORE, MIN_RISK_SCORE } from './risk-assessment.model';
import { PolicyValidationError } from '../utils/errors';

export type PolicyAction = 'allow' | 'stepup' | 'deny';

export const POLICY_ACTIONS: readonly PolicyAction[] = ['allow', 'stepup', 'deny'];

/**
 * Stored representation of a policy's predicates
 */
export interface PolicyConditions {
  min_risk_score?: number;
  max_risk_score?: number;
  allowed_countries?: string[];
  blocked_countries?: string[];
  required_location?: string;
  allowed_devices?: DeviceType[];
  business_hours_only?: boolean;
}

export type PolicyPredicate =
  | { kind: 'min_risk_score'; value: number }
  | { kind: 'max_risk_score'; value: number }
  | { kind: 'allowed_countries'; countries: readonly string[] }
  | { kind: 'blocked_countries'; countries: readonly string[] }
  | { kind: 'required_location'; location: string }
  | { kind: 'allowed_devices'; devices: readonly DeviceType[] }
  | { kind: 'business_hours_only' };

export type PredicateKind = PolicyPredicate['kind'];

const PREDICATE_KINDS: readonly PredicateKind[] = [
  'min_risk_score',
  'max_risk_score',
  'allowed_countries',
  'blocked_countries',
  'required_location',
  'allowed_devices',
  'business_hours_only'
];

export interface Policy {
  id: string;
  name: string;
  description: string;
  priority: number;
  predicates: PolicyPredicate[];
  action: PolicyAction;
  enabled: boolean;
  createdAt: string;
  updatedAt: string;
}

export type PolicyDefinition = Omit<Policy, 'id' | 'createdAt' | 'updatedAt'>;

export interface Decision {
  action: PolicyAction;
  policyName: string;
  policyDescription: string;
  matched: boolean;
  policyId?: string;
}

/**
 * Facts a predicate is tested against
 */
export interface PredicateInput {
  score: number;
  countryCode: string;
  location: string;
  deviceType: DeviceType;
  isBusinessHours: boolean;
}

export const DEFAULT_POLICY_NAME = 'default';

export const DEFAULT_POLICIES: readonly PolicyDefinition[] = [
  {
    name: 'high_risk_deny',
    description: 'Deny access when risk is high',
    priority: 1,
    predicates: [{ kind: 'min_risk_score', value: 75 }],
    action: 'deny',
    enabled: true
  },
  {
    name: 'medium_risk_stepup',
    description: 'Require additional verification for medium risk',
    priority: 2,
    predicates: [
      { kind: 'min_risk_score', value: 40 },
      { kind: 'max_risk_score', value: 74 }
    ],
    action: 'stepup',
    enabled: true
  },
  {
    name: 'low_risk_allow',
    description: 'Allow access when risk is low',
    priority: 3,
    predicates: [{ kind: 'max_risk_score', value: 39 }],
    action: 'allow',
    enabled: true
  }
];

// ============================================================================
// Predicate evaluation
// ============================================================================

/**
 * Country predicates name the traffic a rule targets: `allowed_countries`
 * holds for requests from outside the list, `blocked_countries` for requests
 * from inside it.
 */
export function predicateHolds(predicate: PolicyPredicate, input: PredicateInput): boolean {
  switch (predicate.kind) {
    case 'min_risk_score':
      return input.score >= predicate.value;
    case 'max_risk_score':
      return input.score <= predicate.value;
    case 'allowed_countries':
      return !predicate.countries.includes(input.countryCode);
    case 'blocked_countries':
      return predicate.countries.includes(input.countryCode);
    case 'required_location':
      return input.location === predicate.location;
    case 'allowed_devices':
      return predicate.devices.includes(input.deviceType);
    case 'business_hours_only':
      return input.isBusinessHours;
    default: {
      const unreachable: never = predicate;
      return unreachable;
    }
  }
}

export function policyMatches(policy: Pick<Policy, 'predicates'>, input: PredicateInput): boolean {
  return policy.predicates.every(predicate => predicateHolds(predicate, input));
}

/**
 * Ascending priority; equal priorities fall back to name so the order does
 * not depend on how the policies were loaded.
 */
export function comparePolicies(a: Pick<Policy, 'priority' | 'name'>, b: Pick<Policy, 'priority' | 'name'>): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

// ============================================================================
// Conditions <-> predicates
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPredicateKind(key: string): key is PredicateKind {
  return PREDICATE_KINDS.some(kind => kind === key);
}

function isDeviceType(value: unknown): value is DeviceType {
  return DEVICE_TYPES.some(type => type === value);
}

export function isPolicyAction(value: unknown): value is PolicyAction {
  return POLICY_ACTIONS.some(action => action === value);
}

function parseScore(key: string, value: unknown, errors: string[]): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${key} must be a number`);
    return null;
  }
  if (value < MIN_RISK_SCORE || value > MAX_RISK_SCORE) {
    errors.push(`${key} must be between ${MIN_RISK_SCORE} and ${MAX_RISK_SCORE}`);
    return null;
  }
  return value;
}

function parseCountries(key: string, value: unknown, errors: string[]): string[] | null {
  if (!Array.isArray(value) || value.length === 0) {
    errors.push(`${key} must be a non-empty list of country codes`);
    return null;
  }
  const codes: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string' || !/^[A-Z]{2}$/.test(entry)) {
      errors.push(`${key} contains invalid country code: ${String(entry)}`);
      return null;
    }
    codes.push(entry);
  }
  return codes;
}

/**
 * Validate a stored conditions map and turn it into predicates.
 * Unknown keys and wrongly typed values are reported, never ignored.
 */
export function validateConditions(conditions: unknown): {
  valid: boolean;
  errors: string[];
  predicates: PolicyPredicate[];
} {
  const errors: string[] = [];
  const predicates: PolicyPredicate[] = [];

  if (!isRecord(conditions)) {
    return { valid: false, errors: ['Conditions must be an object'], predicates };
  }

  for (const [key, value] of Object.entries(conditions)) {
    if (!isPredicateKind(key)) {
      errors.push(`Unknown condition: ${key}`);
      continue;
    }

    switch (key) {
      case 'min_risk_score':
      case 'max_risk_score': {
        const score = parseScore(key, value, errors);
        if (score !== null) predicates.push({ kind: key, value: score });
        break;
      }
      case 'allowed_countries':
      case 'blocked_countries': {
        const countries = parseCountries(key, value, errors);
        if (countries) predicates.push({ kind: key, countries });
        break;
      }
      case 'required_location':
        if (typeof value !== 'string' || value.trim().length === 0) {
          errors.push('required_location must be a non-empty string');
        } else {
          predicates.push({ kind: key, location: value });
        }
        break;
      case 'allowed_devices':
        if (!Array.isArray(value) || value.length === 0 || !value.every(isDeviceType)) {
          errors.push(`allowed_devices must be a non-empty list of: ${DEVICE_TYPES.join(', ')}`);
        } else {
          predicates.push({ kind: key, devices: value.filter(isDeviceType) });
        }
        break;
      case 'business_hours_only':
        if (typeof value !== 'boolean') {
          errors.push('business_hours_only must be a boolean');
        } else if (value) {
          predicates.push({ kind: key });
        }
        break;
    }
  }

  const min = conditions.min_risk_score;
  const max = conditions.max_risk_score;
  if (typeof min === 'number' && typeof max === 'number' && min > max) {
    errors.push('min_risk_score cannot exceed max_risk_score');
  }

  return { valid: errors.length === 0, errors, predicates };
}

/**
 * Parse a conditions map, rejecting it as a whole if anything is malformed.
 */
export function parsePredicates(conditions: unknown): PolicyPredicate[] {
  const result = validateConditions(conditions);
  if (!result.valid) {
    throw new PolicyValidationError(result.errors);
  }
  return result.predicates;
}

export function toConditions(predicates: readonly PolicyPredicate[]): PolicyConditions {
  const conditions: PolicyConditions = {};
  for (const predicate of predicates) {
    switch (predicate.kind) {
      case 'min_risk_score':
        conditions.min_risk_score = predicate.value;
        break;
      case 'max_risk_score':
        conditions.max_risk_score = predicate.value;
        break;
      case 'allowed_countries':
        conditions.allowed_countries = [...predicate.countries];
        break;
      case 'blocked_countries':
        conditions.blocked_countries = [...predicate.countries];
        break;
      case 'required_location':
        conditions.required_location = predicate.location;
        break;
      case 'allowed_devices':
        conditions.allowed_devices = [...predicate.devices];
        break;
      case 'business_hours_only':
        conditions.business_hours_only = true;
        break;
    }
  }
  return conditions;
}
