/**
 * Access Decision Service
 *
 * Post-authentication pipeline: build the context, score it, resolve the
 * policies. A `stepup` decision comes back with a challenge; an `allow`
 * remembers the device and location for the next attempt.
 *
 * Nothing after the decision can change it. Device and audit writes that
 * fail are logged and the decision stands.
 */

import { AuthContext } from '../models/auth-context.model';
import { Decision } from '../models/policy.model';
import { RiskAssessment } from '../models/risk-assessment.model';
import { AuditEventType, AuditHistory, auditRepository } from '../repositories/audit.repository';
import { DeviceRegistry, deviceRepository } from '../repositories/device.repository';
import { attempt } from '../utils/result';
import { buildDeviceFingerprint, generateDeviceName, hashDeviceFingerprint } from './device.service';
import { PolicyResolver, getPolicyResolver } from './policy-resolver.service';
import { AuthContextInput, RiskScorer, getRiskScorer } from './risk-scorer.service';
import { SecurityEventTypes, logSecurityEvent } from './security-logger.service';
import {
  StepUpChallenge,
  StepUpChallengeStore,
  VerifiedChallenge,
  getStepUpChallengeStore
} from './stepup-challenge.service';

export interface AccessDecisionResult {
  decision: Decision;
  assessment: RiskAssessment;
  challenge?: StepUpChallenge;
}

export interface AccessDecisionDependencies {
  scorer?: RiskScorer;
  resolver?: PolicyResolver;
  challenges?: StepUpChallengeStore;
  devices?: DeviceRegistry;
  audit?: AuditHistory;
}

const DECISION_AUDIT_EVENTS: Readonly<Record<Decision['action'], AuditEventType>> = {
  allow: 'access_granted',
  stepup: 'stepup_issued',
  deny: 'access_denied'
};

export class AccessDecisionService {
  private readonly scorer: RiskScorer;
  private readonly resolver: PolicyResolver;
  private readonly challenges: StepUpChallengeStore;
  private readonly devices: DeviceRegistry;
  private readonly audit: AuditHistory;

  constructor(deps: AccessDecisionDependencies = {}) {
    this.scorer = deps.scorer || getRiskScorer();
    this.resolver = deps.resolver || getPolicyResolver();
    this.challenges = deps.challenges || getStepUpChallengeStore();
    this.devices = deps.devices || deviceRepository;
    this.audit = deps.audit || auditRepository;
  }

  /**
   * Decide on an authenticated attempt. Never rejects on a data source
   * being down; the scorer and resolver fall back on their own.
   */
  async decide(input: AuthContextInput): Promise<AccessDecisionResult> {
    const context = await this.scorer.buildAuthContext(input);
    const assessment = await this.scorer.evaluate(context);
    const decision = await this.resolver.resolve(context, assessment);

    const challenge = decision.action === 'stepup'
      ? this.challenges.issue(context.userId, {
        ipAddress: context.ipAddress,
        policyName: decision.policyName,
        riskScore: assessment.score
      })
      : undefined;

    if (decision.action === 'allow') {
      await this.rememberDevice(context);
    }

    await this.recordAudit(DECISION_AUDIT_EVENTS[decision.action], context.userId, context.ipAddress, {
      risk_score: assessment.score,
      risk_level: assessment.level,
      policy: decision.policyName,
      challenge_id: challenge?.challengeId
    });

    logSecurityEvent({
      event_type: SecurityEventTypes.ACCESS_DECISION,
      user_id: context.userId,
      ip_address: context.ipAddress,
      details: {
        action: decision.action,
        policy: decision.policyName,
        matched: decision.matched,
        risk_score: assessment.score,
        risk_level: assessment.level
      }
    });

    return { decision, assessment, challenge };
  }

  /**
   * Verify a step-up answer. Rejections are StepUpChallengeErrors for the
   * caller to turn into a response.
   */
  async completeStepUp(token: string, code: string): Promise<VerifiedChallenge> {
    const verified = this.challenges.verify(token, code);

    await this.recordAudit('stepup_verified', verified.userId, verified.context.ipAddress, {
      challenge_id: verified.challengeId,
      policy: verified.context.policyName
    });

    return verified;
  }

  private async rememberDevice(context: AuthContext): Promise<void> {
    const remembered = await attempt(() => this.devices.recordDevice({
      userId: context.userId,
      fingerprint: hashDeviceFingerprint(buildDeviceFingerprint(context.device, context.userAgent)),
      name: generateDeviceName(context.device),
      location: context.location.display,
      seenAt: context.timestamp.toISOString()
    }));

    if (!remembered.ok) {
      logSecurityEvent({
        event_type: SecurityEventTypes.EVALUATION_DEGRADED,
        user_id: context.userId,
        ip_address: context.ipAddress,
        details: { component: 'device_registry', error: remembered.error.message }
      });
    }
  }

  private async recordAudit(
    eventType: AuditEventType,
    userId: string,
    ipAddress: string,
    details: Record<string, unknown>
  ): Promise<void> {
    const recorded = await attempt(() => this.audit.recordEvent({ eventType, userId, ipAddress, details }));
    if (!recorded.ok) {
      logSecurityEvent({
        event_type: SecurityEventTypes.EVALUATION_DEGRADED,
        user_id: userId,
        ip_address: ipAddress,
        details: { component: 'audit_history', event: eventType, error: recorded.error.message }
      });
    }
  }
}

let defaultAccessDecisionService: AccessDecisionService | null = null;

export function getAccessDecisionService(): AccessDecisionService {
  if (!defaultAccessDecisionService) {
    defaultAccessDecisionService = new AccessDecisionService();
  }
  return defaultAccessDecisionService;
}
