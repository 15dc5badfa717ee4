/**
 * Reevaluation Model
 *
 * Output of a mid-session reevaluation: anomalies found since the last check,
 * the recomputed score and what the session owner should do about it.
 */

export type AnomalyKind =
  | 'impossible_travel'
  | 'location_drift'
  | 'ip_change'
  | 'device_change'
  | 'behavioral';

export interface Anomaly {
  kind: AnomalyKind;
  description: string;
  magnitude: number;
}

export type ReevaluationAction = 'none' | 'monitor' | 'stepup' | 'revoke';

export type ReevaluationConfidence = 'low' | 'medium' | 'high';

export type TerminalReason = 'not_found' | 'revoked' | 'expired' | 'store_unavailable';

export interface ReevaluationResult {
  sessionId: string;
  previousScore: number;
  currentScore: number;
  delta: number;
  anomalies: Anomaly[];
  action: ReevaluationAction;
  confidence: ReevaluationConfidence;
  terminal: boolean;
  terminalReason?: TerminalReason;
  /** Set with terminalReason 'store_unavailable' */
  error?: string;
  reevaluatedAt: string;
  nextReevaluationAt?: string;
}

/**
 * Context reported for a session since its last check
 */
export interface SessionContextUpdate {
  ipAddress: string;
  userAgent: string;
  latitude?: number;
  longitude?: number;
  locationDisplay?: string;
  countryCode?: string;
  accessCount?: number;
  sensitiveResourceAccess?: number;
  timestamp?: Date;
}

/**
 * Behavioural baseline for a user, supplied by the audit history
 */
export interface BehaviorProfile {
  typicalHours: number[];
  averageAccessCount: number;
}

export type SessionRiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface SessionHealth {
  sessionId: string;
  riskScore: number;
  riskLevel: SessionRiskLevel;
  isActive: boolean;
  expiresAt: string;
  lastReevaluatedAt?: string;
  nextReevaluationAt?: string;
  recommendations: string[];
}

export interface ActiveSessionsSummary {
  totalActive: number;
  byRiskLevel: Record<SessionRiskLevel, number>;
  highRiskSessions: Array<{ sessionId: string; userId: string; riskScore: number; ipAddress: string }>;
  requiringAction: number;
}

export interface SweepResult {
  sessionsSelected: number;
  sessionsReevaluated: number;
  actions: Record<ReevaluationAction, number>;
  errors: Array<{ sessionId: string; error: string }>;
  processingTimeMs: number;
}
