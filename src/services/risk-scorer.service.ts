/**
 * Risk Scorer
 *
 * Scores one authentication attempt from five weighted factors:
 * device, location, time of day, recent failed attempts and attempt velocity.
 *
 * Factor evaluators return a Result; the scorer owns the fallback. A data
 * source that is down degrades its factor to a neutral value and logs
 * EVALUATION_DEGRADED instead of failing the evaluation.
 */

import { ENGINE_CONFIG } from '../config/engine.config';
import {
  AuthContext,
  GeoLocation,
  freezeContext,
  isWeekday,
  isWithinBusinessHours
} from '../models/auth-context.model';
import {
  RISK_FACTOR_NAMES,
  RISK_FACTOR_WEIGHTS,
  RiskAssessment,
  RiskFactor,
  RiskFactorName,
  calculateRiskLevel,
  calculateWeightedScore,
  clampScore
} from '../models/risk-assessment.model';
import {
  AUTH_ATTEMPT_EVENTS,
  AuditHistory,
  FAILED_AUTH_EVENTS,
  auditRepository
} from '../repositories/audit.repository';
import { DeviceRegistry, deviceRepository } from '../repositories/device.repository';
import { EvaluationDegradation, errorMessage } from '../utils/errors';
import { Result, attempt, ok } from '../utils/result';
import { parseUserAgent } from '../utils/user-agent';
import { buildDeviceFingerprint, hashDeviceFingerprint } from './device.service';
import { GeolocationService, getGeolocationService } from './geolocation.service';
import { SecurityEventTypes, logSecurityEvent } from './security-logger.service';

// ============================================================================
// Factor scores
// ============================================================================

export const DEVICE_SCORES = {
  known: 0,
  unknown: 40
} as const;

export const LOCATION_SCORES = {
  known: 0,
  firstSeen: 20,
  new: 35
} as const;

export const TIME_SCORES = {
  businessHours: 0,
  offHours: 15,
  weekend: 25
} as const;

/**
 * Values used when a factor's data source is unavailable
 */
export const FALLBACK_SCORES: Readonly<Record<RiskFactorName, number>> = {
  device: DEVICE_SCORES.unknown,
  location: LOCATION_SCORES.firstSeen,
  time: 0,
  failed_attempts: 0,
  velocity: 0
};

export function scoreFailedAttempts(count: number): number {
  if (count <= 0) return 0;
  if (count <= 2) return 20;
  return 50;
}

export function scoreVelocity(attempts: number): number {
  if (attempts <= 2) return 0;
  if (attempts <= 5) return 25;
  return 50;
}

export function scoreTime(timestamp: Date): { score: number; details: string } {
  const { startHour, endHour } = ENGINE_CONFIG.risk.businessHours;
  if (!isWeekday(timestamp)) {
    return { score: TIME_SCORES.weekend, details: 'Weekend access' };
  }
  if (!isWithinBusinessHours(timestamp, startHour, endHour)) {
    return { score: TIME_SCORES.offHours, details: 'Outside business hours' };
  }
  return { score: TIME_SCORES.businessHours, details: 'Business hours' };
}

// ============================================================================
// Scorer
// ============================================================================

export interface AuthContextInput {
  userId: string;
  ipAddress: string;
  userAgent: string;
  timestamp?: Date;
  /** Already resolved location; skips the lookup */
  location?: GeoLocation;
}

/**
 * Where the scorer reads a user's history from
 */
export interface RiskHistory {
  devices: DeviceRegistry;
  audit: AuditHistory;
}

export interface RiskScorerDependencies {
  devices?: DeviceRegistry;
  audit?: AuditHistory;
  geolocation?: GeolocationService;
}

type FactorResult = Result<Omit<RiskFactor, 'weight' | 'degraded' | 'name'>, Error>;

export class RiskScorer {
  private readonly history: RiskHistory;
  private readonly geolocation: GeolocationService;

  constructor(deps: RiskScorerDependencies = {}) {
    this.history = {
      devices: deps.devices || deviceRepository,
      audit: deps.audit || auditRepository
    };
    this.geolocation = deps.geolocation || getGeolocationService();
  }

  /**
   * Assemble a frozen context: parsed user agent, resolved location and the
   * business-hours flag. Geolocation never rejects.
   */
  async buildAuthContext(input: AuthContextInput): Promise<AuthContext> {
    const timestamp = input.timestamp || new Date();
    const { startHour, endHour } = ENGINE_CONFIG.risk.businessHours;

    return freezeContext({
      userId: input.userId,
      ipAddress: input.ipAddress,
      userAgent: input.userAgent || '',
      device: parseUserAgent(input.userAgent),
      location: input.location || await this.geolocation.lookup(input.ipAddress),
      timestamp,
      isBusinessHours: isWeekday(timestamp) && isWithinBusinessHours(timestamp, startHour, endHour)
    });
  }

  /**
   * Score an attempt. Never rejects; unavailable factors fall back.
   */
  async evaluate(ctx: AuthContext, history: RiskHistory = this.history): Promise<RiskAssessment> {
    const time = scoreTime(ctx.timestamp);
    const factors: Record<RiskFactorName, RiskFactor> = {
      device: this.toFactor('device', await this.evaluateDevice(ctx, history.devices), ctx),
      location: this.toFactor('location', await this.evaluateLocation(ctx, history.devices), ctx),
      time: this.toFactor('time', ok({ score: time.score, details: time.details }), ctx),
      failed_attempts: this.toFactor('failed_attempts', await this.evaluateFailedAttempts(ctx, history.audit), ctx),
      velocity: this.toFactor('velocity', await this.evaluateVelocity(ctx, history.audit), ctx)
    };

    const score = calculateWeightedScore(factors);
    const assessment: RiskAssessment = {
      score,
      level: calculateRiskLevel(score),
      factors,
      context: ctx,
      assessedAt: new Date().toISOString()
    };

    logSecurityEvent({
      event_type: SecurityEventTypes.RISK_EVALUATED,
      user_id: ctx.userId,
      ip_address: ctx.ipAddress,
      details: {
        score,
        level: assessment.level,
        degraded: RISK_FACTOR_NAMES.filter(name => factors[name].degraded)
      }
    });

    return assessment;
  }

  private toFactor(name: RiskFactorName, result: FactorResult, ctx: AuthContext): RiskFactor {
    if (result.ok) {
      return {
        name,
        weight: RISK_FACTOR_WEIGHTS[name],
        degraded: false,
        ...result.value,
        score: clampScore(result.value.score)
      };
    }

    const degradation = new EvaluationDegradation(name, errorMessage(result.error));
    logSecurityEvent({
      event_type: SecurityEventTypes.EVALUATION_DEGRADED,
      user_id: ctx.userId,
      ip_address: ctx.ipAddress,
      details: {
        factor: degradation.factor,
        fallback_score: FALLBACK_SCORES[name],
        error: degradation.message
      }
    });

    return {
      name,
      score: FALLBACK_SCORES[name],
      weight: RISK_FACTOR_WEIGHTS[name],
      details: `${name} data unavailable`,
      degraded: true
    };
  }

  private evaluateDevice(ctx: AuthContext, devices: DeviceRegistry): Promise<FactorResult> {
    return attempt(async () => {
      const fingerprint = hashDeviceFingerprint(buildDeviceFingerprint(ctx.device, ctx.userAgent));
      const known = await devices.findDevice(ctx.userId, fingerprint);
      return known
        ? { score: DEVICE_SCORES.known, details: `Known device: ${known.name}`, metadata: { fingerprint } }
        : { score: DEVICE_SCORES.unknown, details: 'New device', metadata: { fingerprint } };
    });
  }

  private evaluateLocation(ctx: AuthContext, devices: DeviceRegistry): Promise<FactorResult> {
    return attempt(async () => {
      const knownLocations = await devices.listKnownLocations(ctx.userId);
      const location = ctx.location.display;

      if (knownLocations.length === 0) {
        return { score: LOCATION_SCORES.firstSeen, details: `First location: ${location}` };
      }
      if (knownLocations.includes(location)) {
        return { score: LOCATION_SCORES.known, details: `Known location: ${location}` };
      }
      return { score: LOCATION_SCORES.new, details: `New location: ${location}` };
    });
  }

  private evaluateFailedAttempts(ctx: AuthContext, audit: AuditHistory): Promise<FactorResult> {
    return attempt(async () => {
      const since = new Date(ctx.timestamp.getTime() - ENGINE_CONFIG.risk.failedAttemptsWindowMs);
      const count = await audit.countUserEvents(ctx.userId, FAILED_AUTH_EVENTS, since);
      return {
        score: scoreFailedAttempts(count),
        details: `${count} failed attempts in the last hour`,
        metadata: { count }
      };
    });
  }

  private evaluateVelocity(ctx: AuthContext, audit: AuditHistory): Promise<FactorResult> {
    return attempt(async () => {
      const since = new Date(ctx.timestamp.getTime() - ENGINE_CONFIG.risk.velocityWindowMs);
      const count = await audit.countUserEvents(ctx.userId, AUTH_ATTEMPT_EVENTS, since);
      return {
        score: scoreVelocity(count),
        details: `${count} attempts in the last 5 minutes`,
        metadata: { count }
      };
    });
  }
}

let defaultRiskScorer: RiskScorer | null = null;

export function getRiskScorer(): RiskScorer {
  if (!defaultRiskScorer) {
    defaultRiskScorer = new RiskScorer();
  }
  return defaultRiskScorer;
}
