/**
 * Session Monitor
 *
 * Continuous verification of live sessions. A reevaluation compares the
 * reported context with what the session last saw, rescores it and decides
 * whether to do nothing, watch, step up or revoke.
 *
 * Reevaluations of one session are serialised; a sweep runs many sessions
 * through a bounded pool and records failures per session.
 */

import { ENGINE_CONFIG } from '../config/engine.config';
import { GeoLocation } from '../models/auth-context.model';
import {
  ActiveSessionsSummary,
  Anomaly,
  BehaviorProfile,
  ReevaluationAction,
  ReevaluationConfidence,
  ReevaluationResult,
  SessionContextUpdate,
  SessionHealth,
  SessionRiskLevel,
  SweepResult,
  TerminalReason
} from '../models/reevaluation.model';
import { clampScore, roundScore } from '../models/risk-assessment.model';
import { Session, SessionLocation, isSessionActive, isSessionExpired } from '../models/session.model';
import { AuditHistory, auditRepository } from '../repositories/audit.repository';
import { SessionStore, sessionRepository } from '../repositories/session.repository';
import { errorMessage } from '../utils/errors';
import { KeyedMutex, sessionLocks } from '../utils/keyed-mutex';
import { attempt } from '../utils/result';
import { WorkerPool } from '../utils/worker-pool';
import { calculateHaversineDistance, calculateSpeed } from './geolocation.service';
import { RiskScorer, getRiskScorer } from './risk-scorer.service';
import { SecurityEventTypes, logSecurityEvent } from './security-logger.service';

const REVOKE_SCORE = 90;
const REVOKE_ANOMALIES = 3;
const STEPUP_SCORE = 70;
const MONITOR_SCORE = 40;
const DEFAULT_AVERAGE_ACCESS_COUNT = 10;
const ACCESS_SPIKE_FACTOR = 3;
const SENSITIVE_ACCESS_LIMIT = 5;
const EXPIRY_WARNING_MS = 5 * 60 * 1000;
const HIGH_RISK_SUMMARY_SCORE = 70;

export interface SessionMonitorConfig {
  locationDriftKm?: number;
  impossibleTravelKmh?: number;
  maxRiskIncrease?: number;
  anomalyPenalty?: number;
  sweepRiskThreshold?: number;
  sweepConcurrency?: number;
}

export interface SessionMonitorDependencies {
  sessions?: SessionStore;
  audit?: AuditHistory;
  scorer?: RiskScorer;
  locks?: KeyedMutex;
}

// ============================================================================
// Rules
// ============================================================================

export function getSessionRiskLevel(score: number): SessionRiskLevel {
  if (score >= REVOKE_SCORE) return 'critical';
  if (score >= STEPUP_SCORE) return 'high';
  if (score >= MONITOR_SCORE) return 'medium';
  return 'low';
}

export function determineAction(
  delta: number,
  anomalyCount: number,
  score: number,
  maxRiskIncrease: number = ENGINE_CONFIG.reevaluation.maxRiskIncrease
): ReevaluationAction {
  if (score >= REVOKE_SCORE || anomalyCount >= REVOKE_ANOMALIES) return 'revoke';
  if (score >= STEPUP_SCORE || delta > maxRiskIncrease) return 'stepup';
  if (score >= MONITOR_SCORE || anomalyCount > 0) return 'monitor';
  return 'none';
}

export function determineConfidence(anomalyCount: number): ReevaluationConfidence {
  if (anomalyCount >= 2) return 'high';
  if (anomalyCount === 1) return 'medium';
  return 'low';
}

export function calculateNextReevaluation(score: number, now: Date = new Date()): Date {
  const { intervalsMs } = ENGINE_CONFIG.reevaluation;
  const interval = score >= STEPUP_SCORE
    ? intervalsMs.high
    : score >= MONITOR_SCORE
      ? intervalsMs.medium
      : intervalsMs.low;
  return new Date(now.getTime() + interval);
}

export function detectLocationAnomaly(
  session: Session,
  update: SessionContextUpdate,
  now: Date,
  thresholds: { locationDriftKm: number; impossibleTravelKmh: number }
): Anomaly | null {
  const previous = session.location;
  if (
    previous?.latitude === undefined || previous.longitude === undefined ||
    update.latitude === undefined || update.longitude === undefined
  ) {
    return null;
  }

  const distanceKm = calculateHaversineDistance(
    previous.latitude, previous.longitude, update.latitude, update.longitude
  );
  const since = new Date(session.last_reevaluated_at || session.created_at);
  const elapsedHours = (now.getTime() - since.getTime()) / (60 * 60 * 1000);

  if (elapsedHours > 0) {
    const speed = calculateSpeed(distanceKm, elapsedHours);
    if (speed > thresholds.impossibleTravelKmh) {
      return {
        kind: 'impossible_travel',
        description: `Impossible travel: ${Math.round(speed)} km/h`,
        magnitude: speed
      };
    }
  }

  if (distanceKm > thresholds.locationDriftKm) {
    return {
      kind: 'location_drift',
      description: `Significant location change: ${Math.round(distanceKm)} km`,
      magnitude: distanceKm
    };
  }

  return null;
}

export function detectBehavioralAnomalies(
  update: SessionContextUpdate,
  profile: BehaviorProfile | null,
  now: Date
): Anomaly[] {
  const anomalies: Anomaly[] = [];
  const hour = now.getUTCHours();

  if (profile && profile.typicalHours.length > 0 && !profile.typicalHours.includes(hour)) {
    anomalies.push({
      kind: 'behavioral',
      description: `Access at unusual hour: ${hour}:00 UTC`,
      magnitude: hour
    });
  }

  const average = profile?.averageAccessCount ?? DEFAULT_AVERAGE_ACCESS_COUNT;
  if (update.accessCount !== undefined && update.accessCount > average * ACCESS_SPIKE_FACTOR) {
    anomalies.push({
      kind: 'behavioral',
      description: 'Abnormally high access frequency',
      magnitude: update.accessCount
    });
  }

  if ((update.sensitiveResourceAccess ?? 0) > SENSITIVE_ACCESS_LIMIT) {
    anomalies.push({
      kind: 'behavioral',
      description: 'Multiple sensitive resource access attempts',
      magnitude: update.sensitiveResourceAccess ?? 0
    });
  }

  return anomalies;
}

function toGeoLocation(update: SessionContextUpdate): GeoLocation | undefined {
  if (!update.locationDisplay) return undefined;
  return {
    countryCode: update.countryCode || 'XX',
    city: update.locationDisplay.split(',')[0].trim(),
    display: update.locationDisplay,
    latitude: update.latitude,
    longitude: update.longitude
  };
}

function toSessionLocation(update: SessionContextUpdate, current?: SessionLocation): SessionLocation | undefined {
  if (update.locationDisplay === undefined && update.latitude === undefined) return current;
  const hasCoordinates = update.latitude !== undefined && update.longitude !== undefined;
  return {
    display: update.locationDisplay || current?.display || 'Unknown',
    country_code: update.countryCode ?? current?.country_code,
    latitude: hasCoordinates ? update.latitude : current?.latitude,
    longitude: hasCoordinates ? update.longitude : current?.longitude
  };
}

/**
 * The session's own last known context, used when a sweep has nothing new
 */
export function contextFromSession(session: Session): SessionContextUpdate {
  return {
    ipAddress: session.ip_address,
    userAgent: session.user_agent,
    latitude: session.location?.latitude,
    longitude: session.location?.longitude,
    locationDisplay: session.location?.display,
    countryCode: session.location?.country_code
  };
}

// ============================================================================
// Monitor
// ============================================================================

export class SessionMonitor {
  private readonly config: Required<SessionMonitorConfig>;
  private readonly sessions: SessionStore;
  private readonly audit: AuditHistory;
  private readonly scorer: RiskScorer;
  private readonly locks: KeyedMutex;

  constructor(config: SessionMonitorConfig = {}, deps: SessionMonitorDependencies = {}) {
    const defaults = ENGINE_CONFIG.reevaluation;
    this.config = {
      locationDriftKm: defaults.locationDriftKm,
      impossibleTravelKmh: defaults.impossibleTravelKmh,
      maxRiskIncrease: defaults.maxRiskIncrease,
      anomalyPenalty: defaults.anomalyPenalty,
      sweepRiskThreshold: defaults.sweepRiskThreshold,
      sweepConcurrency: defaults.sweepConcurrency,
      ...config
    };
    this.sessions = deps.sessions || sessionRepository;
    this.audit = deps.audit || auditRepository;
    this.scorer = deps.scorer || getRiskScorer();
    this.locks = deps.locks || sessionLocks;
  }

  /**
   * Reevaluate one session against newly reported context. Absent, revoked
   * and expired sessions give a terminal result without any write, and so
   * does a session store that cannot be read or written.
   */
  reevaluate(sessionId: string, update: SessionContextUpdate): Promise<ReevaluationResult> {
    return this.locks.runExclusive(sessionId, () => this.reevaluateExclusive(sessionId, update));
  }

  async getSessionHealth(sessionId: string, now: Date = new Date()): Promise<SessionHealth | null> {
    const session = await this.sessions.getSession(sessionId);
    if (!session) return null;

    const riskLevel = getSessionRiskLevel(session.risk_score);
    const recommendations: string[] = [];

    if (session.revoked) {
      recommendations.push('Session revoked, re-authentication required');
    } else if (riskLevel === 'critical' || riskLevel === 'high') {
      recommendations.push('Require step-up authentication now');
    } else if (riskLevel === 'medium') {
      recommendations.push('Monitor session activity closely');
    }

    if (new Date(session.expires_at).getTime() < now.getTime() + EXPIRY_WARNING_MS) {
      recommendations.push('Session about to expire');
    }

    return {
      sessionId,
      riskScore: session.risk_score,
      riskLevel,
      isActive: isSessionActive(session, now),
      expiresAt: session.expires_at,
      lastReevaluatedAt: session.last_reevaluated_at,
      nextReevaluationAt: session.next_reevaluation_at ||
        calculateNextReevaluation(session.risk_score, now).toISOString(),
      recommendations
    };
  }

  async getActiveSessionsSummary(now: Date = new Date()): Promise<ActiveSessionsSummary> {
    const sessions = await this.sessions.listActiveSessions(0, now);

    const byRiskLevel: Record<SessionRiskLevel, number> = { low: 0, medium: 0, high: 0, critical: 0 };
    const highRiskSessions: ActiveSessionsSummary['highRiskSessions'] = [];

    for (const session of sessions) {
      byRiskLevel[getSessionRiskLevel(session.risk_score)]++;
      if (session.risk_score >= HIGH_RISK_SUMMARY_SCORE) {
        highRiskSessions.push({
          sessionId: session.id,
          userId: session.user_id,
          riskScore: session.risk_score,
          ipAddress: session.ip_address
        });
      }
    }

    return {
      totalActive: sessions.length,
      byRiskLevel,
      highRiskSessions,
      requiringAction: highRiskSessions.length
    };
  }

  /**
   * Reevaluate every active session at or above the threshold. A failing
   * session is recorded in the result; the sweep carries on.
   */
  async batchReevaluate(riskThreshold: number = this.config.sweepRiskThreshold): Promise<SweepResult> {
    const startedAt = Date.now();
    const sessions = await this.sessions.listActiveSessions(riskThreshold);
    const pool = new WorkerPool({ concurrency: this.config.sweepConcurrency });

    const results = await pool.runAll(sessions.map(session => ({
      id: session.id,
      run: () => this.reevaluate(session.id, contextFromSession(session))
    })));

    const actions: Record<ReevaluationAction, number> = { none: 0, monitor: 0, stepup: 0, revoke: 0 };
    const errors: SweepResult['errors'] = [];
    let reevaluated = 0;

    for (const taskResult of results) {
      if (taskResult.success && taskResult.result) {
        const { result } = taskResult;
        if (result.terminalReason === 'store_unavailable') {
          errors.push({ sessionId: taskResult.id, error: result.error || 'Session store unavailable' });
        } else if (!result.terminal) {
          reevaluated++;
          actions[result.action]++;
        }
      } else {
        errors.push({ sessionId: taskResult.id, error: errorMessage(taskResult.error) });
      }
    }

    const sweep: SweepResult = {
      sessionsSelected: sessions.length,
      sessionsReevaluated: reevaluated,
      actions,
      errors,
      processingTimeMs: Date.now() - startedAt
    };

    logSecurityEvent({
      event_type: SecurityEventTypes.SESSION_SWEEP_COMPLETED,
      details: {
        risk_threshold: riskThreshold,
        selected: sweep.sessionsSelected,
        reevaluated,
        actions,
        errors: errors.length
      }
    });

    return sweep;
  }

  private async reevaluateExclusive(sessionId: string, update: SessionContextUpdate): Promise<ReevaluationResult> {
    const now = update.timestamp || new Date();
    const read = await attempt(() => this.sessions.getSession(sessionId));
    if (!read.ok) return this.storeUnavailable(sessionId, 0, now, read.error);
    const session = read.value;

    if (!session) return this.terminal(sessionId, 'not_found', 0, now);
    if (session.revoked) return this.terminal(sessionId, 'revoked', session.risk_score, now);
    if (isSessionExpired(session, now)) return this.terminal(sessionId, 'expired', session.risk_score, now);

    const anomalies = await this.detectAnomalies(session, update, now);

    const context = await this.scorer.buildAuthContext({
      userId: session.user_id,
      ipAddress: update.ipAddress,
      userAgent: update.userAgent,
      timestamp: now,
      location: toGeoLocation(update)
    });
    const assessment = await this.scorer.evaluate(context);

    const previousScore = session.risk_score;
    const currentScore = clampScore(roundScore(assessment.score + this.config.anomalyPenalty * anomalies.length));
    const delta = roundScore(currentScore - previousScore);
    const action = determineAction(delta, anomalies.length, currentScore, this.config.maxRiskIncrease);
    const nextReevaluationAt = calculateNextReevaluation(currentScore, now).toISOString();
    const revokeReason = anomalies.length >= REVOKE_ANOMALIES
      ? `${anomalies.length} anomalies detected`
      : `Risk score ${currentScore}`;

    const written = await attempt(() => this.sessions.updateSessionRisk(sessionId, {
      risk_score: currentScore,
      ip_address: update.ipAddress,
      user_agent: update.userAgent,
      location: toSessionLocation(update, session.location),
      last_reevaluated_at: now.toISOString(),
      next_reevaluation_at: nextReevaluationAt,
      ...(action === 'revoke' ? { revoke: { reason: revokeReason, revoked_at: now.toISOString() } } : {})
    }));
    if (!written.ok) return this.storeUnavailable(sessionId, previousScore, now, written.error);
    if (!written.value) {
      // Revoked between the read and the write
      return this.terminal(sessionId, 'revoked', previousScore, now);
    }

    if (action === 'revoke') {
      logSecurityEvent({
        event_type: SecurityEventTypes.SESSION_REVOKED,
        user_id: session.user_id,
        session_id: sessionId,
        ip_address: update.ipAddress,
        details: { reason: revokeReason, risk_score: currentScore, anomalies: anomalies.map(a => a.kind) }
      });
    }

    const result: ReevaluationResult = {
      sessionId,
      previousScore,
      currentScore,
      delta,
      anomalies,
      action,
      confidence: determineConfidence(anomalies.length),
      terminal: false,
      reevaluatedAt: now.toISOString(),
      nextReevaluationAt: action === 'revoke' ? undefined : nextReevaluationAt
    };

    await this.recordReevaluation(session, update, result);

    logSecurityEvent({
      event_type: SecurityEventTypes.SESSION_REEVALUATED,
      user_id: session.user_id,
      session_id: sessionId,
      ip_address: update.ipAddress,
      details: { previous_score: previousScore, current_score: currentScore, action, anomalies: anomalies.length }
    });

    return result;
  }

  private async detectAnomalies(session: Session, update: SessionContextUpdate, now: Date): Promise<Anomaly[]> {
    const anomalies: Anomaly[] = [];

    const location = detectLocationAnomaly(session, update, now, this.config);
    if (location) anomalies.push(location);

    if (update.ipAddress && update.ipAddress !== session.ip_address) {
      anomalies.push({
        kind: 'ip_change',
        description: `IP address changed: ${session.ip_address} -> ${update.ipAddress}`,
        magnitude: 1
      });
    }

    if (update.userAgent && session.user_agent && update.userAgent !== session.user_agent) {
      anomalies.push({
        kind: 'device_change',
        description: 'User agent changed during session',
        magnitude: 1
      });
    }

    const profile = await attempt(() => this.audit.getBehaviorProfile(session.user_id, now));
    if (!profile.ok) {
      logSecurityEvent({
        event_type: SecurityEventTypes.EVALUATION_DEGRADED,
        user_id: session.user_id,
        session_id: session.id,
        details: { factor: 'behavior_profile', error: profile.error.message }
      });
    }
    anomalies.push(...detectBehavioralAnomalies(update, profile.ok ? profile.value : null, now));

    return anomalies;
  }

  private async recordReevaluation(
    session: Session,
    update: SessionContextUpdate,
    result: ReevaluationResult
  ): Promise<void> {
    const recorded = await attempt(() => this.audit.recordEvent({
      eventType: result.action === 'revoke' ? 'session_revoked' : 'session_reevaluated',
      userId: session.user_id,
      sessionId: session.id,
      ipAddress: update.ipAddress,
      timestamp: result.reevaluatedAt,
      details: {
        previous_score: result.previousScore,
        current_score: result.currentScore,
        action: result.action,
        anomalies: result.anomalies.map(anomaly => anomaly.description)
      }
    }));

    if (!recorded.ok) {
      logSecurityEvent({
        event_type: SecurityEventTypes.EVALUATION_DEGRADED,
        session_id: session.id,
        details: { component: 'audit_history', error: recorded.error.message }
      });
    }
  }

  /**
   * The stored session is left as it was; the next check tries again
   */
  private storeUnavailable(sessionId: string, score: number, now: Date, error: Error): ReevaluationResult {
    logSecurityEvent({
      event_type: SecurityEventTypes.EVALUATION_DEGRADED,
      session_id: sessionId,
      details: { component: 'session_store', error: error.message }
    });
    return { ...this.terminal(sessionId, 'store_unavailable', score, now), error: error.message };
  }

  private terminal(
    sessionId: string,
    reason: TerminalReason,
    score: number,
    now: Date
  ): ReevaluationResult {
    return {
      sessionId,
      previousScore: score,
      currentScore: score,
      delta: 0,
      anomalies: [],
      action: reason === 'revoked' ? 'revoke' : 'none',
      confidence: 'low',
      terminal: true,
      terminalReason: reason,
      reevaluatedAt: now.toISOString()
    };
  }
}

let defaultSessionMonitor: SessionMonitor | null = null;

export function getSessionMonitor(): SessionMonitor {
  if (!defaultSessionMonitor) {
    defaultSessionMonitor = new SessionMonitor();
  }
  return defaultSessionMonitor;
}
