/**
 * Policy Resolver
 *
 * Maps an assessed attempt to allow / stepup / deny. Enabled policies are
 * tried in ascending priority (ties by name); the first whose predicates all
 * hold decides. When nothing matches the configured default applies, which
 * is allow unless overridden.
 *
 * An empty policy table is seeded with the three default policies on first
 * use. If the store cannot be read, the in-memory defaults are evaluated.
 */

import { AuthContext } from '../models/auth-context.model';
import {
  DEFAULT_POLICIES,
  DEFAULT_POLICY_NAME,
  Decision,
  Policy,
  PolicyAction,
  PredicateInput,
  comparePolicies,
  policyMatches
} from '../models/policy.model';
import { RiskAssessment } from '../models/risk-assessment.model';
import { PolicyStore, policyRepository } from '../repositories/policy.repository';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { SecurityEventTypes, logSecurityEvent, logSimpleSecurityEvent } from './security-logger.service';

export const DEFAULT_DECISION_DESCRIPTION = 'No policy matched';

export interface PolicyResolverConfig {
  /** Action when no enabled policy matches (default: allow) */
  defaultDecision?: PolicyAction;
}

/**
 * Default policy set with deterministic ids, e.g. `pol_high_risk_deny`
 */
export function buildDefaultPolicies(now: Date = new Date()): Policy[] {
  const timestamp = now.toISOString();
  return DEFAULT_POLICIES.map(definition => ({
    ...definition,
    predicates: [...definition.predicates],
    id: `pol_${definition.name}`,
    createdAt: timestamp,
    updatedAt: timestamp
  }));
}

export function toPredicateInput(ctx: AuthContext, assessment: Pick<RiskAssessment, 'score'>): PredicateInput {
  return {
    score: assessment.score,
    countryCode: ctx.location.countryCode,
    location: ctx.location.display,
    deviceType: ctx.device.deviceType,
    isBusinessHours: ctx.isBusinessHours
  };
}

export class PolicyResolver {
  private readonly config: Required<PolicyResolverConfig>;

  constructor(
    private readonly store: PolicyStore = policyRepository,
    config: PolicyResolverConfig = {}
  ) {
    this.config = {
      defaultDecision: 'allow',
      ...config
    };
  }

  /**
   * Pure decision over a given policy list. The order of `policies` does not
   * affect the outcome.
   */
  evaluate(ctx: AuthContext, assessment: Pick<RiskAssessment, 'score'>, policies: readonly Policy[]): Decision {
    const input = toPredicateInput(ctx, assessment);
    const match = policies
      .filter(policy => policy.enabled)
      .sort(comparePolicies)
      .find(policy => policyMatches(policy, input));

    if (!match) {
      return {
        action: this.config.defaultDecision,
        policyName: DEFAULT_POLICY_NAME,
        policyDescription: DEFAULT_DECISION_DESCRIPTION,
        matched: false
      };
    }

    return {
      action: match.action,
      policyName: match.name,
      policyDescription: match.description,
      matched: true,
      policyId: match.id
    };
  }

  /**
   * Load the stored policies and decide. Never rejects.
   */
  async resolve(ctx: AuthContext, assessment: Pick<RiskAssessment, 'score'>): Promise<Decision> {
    return this.evaluate(ctx, assessment, await this.loadPolicies());
  }

  /**
   * Stored policies, seeding the defaults into an empty table. Falls back to
   * the in-memory defaults when the store is unavailable.
   */
  async loadPolicies(): Promise<Policy[]> {
    try {
      const policies = await this.store.listPolicies();
      if (policies.length > 0) return policies;
      return await this.seedDefaults(new ConfigurationError('Policy set is empty'));
    } catch (error) {
      logSecurityEvent({
        event_type: SecurityEventTypes.EVALUATION_DEGRADED,
        details: { component: 'policy_store', fallback: 'default_policies', error: errorMessage(error) }
      });
      return buildDefaultPolicies();
    }
  }

  private async seedDefaults(reason: ConfigurationError): Promise<Policy[]> {
    const defaults = buildDefaultPolicies();
    try {
      await this.store.seedPolicies(defaults);
      logSimpleSecurityEvent(SecurityEventTypes.POLICIES_SEEDED, {
        reason: reason.message,
        policies: defaults.map(policy => policy.name)
      });
      return defaults;
    } catch (error) {
      // Another instance may have seeded first
      const policies = await this.store.listPolicies();
      if (policies.length > 0) return policies;
      throw error;
    }
  }
}

let defaultPolicyResolver: PolicyResolver | null = null;

export function getPolicyResolver(): PolicyResolver {
  if (!defaultPolicyResolver) {
    defaultPolicyResolver = new PolicyResolver();
  }
  return defaultPolicyResolver;
}
