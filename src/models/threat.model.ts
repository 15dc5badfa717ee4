/**
 * Threat Intelligence Model
 */

export type ThreatConfidence = 'low' | 'medium' | 'high';

export type ThreatRecommendation = 'allow' | 'monitor' | 'challenge' | 'block';

export type ReputationSourceStatus = 'abuseipdb' | 'unavailable' | 'unconfigured';

/**
 * Normalised answer from the external reputation source
 */
export interface ExternalReputation {
  abuseConfidenceScore: number;
  totalReports: number;
  countryCode?: string;
  isp?: string;
  isWhitelisted: boolean;
  usageType?: string;
}

export interface LocalReputation {
  suspiciousEvents: number;
  successfulEvents: number;
  score: number;                  // 0-100 abuse ratio
}

export interface ThreatContext {
  failedAttempts?: number;
  locationChangeDistanceKm?: number;
  isTor?: boolean;
  isVpn?: boolean;
}

export interface ThreatAssessment {
  ip: string;
  score: number;
  confidence: ThreatConfidence;
  indicators: string[];
  sources: {
    external: ReputationSourceStatus;
    externalScore: number;
    externalReports: number;
    localScore: number;
    localSuspiciousEvents: number;
  };
  isMalicious: boolean;
  recommendation: ThreatRecommendation;
  countryCode?: string;
  isp?: string;
  checkedAt: string;
}

export interface SessionEnrichment {
  sessionId: string;
  originalScore: number;
  adjustment: number;
  enrichedScore: number;
  threat: ThreatAssessment;
  recommendation: 'allow' | 'step_up_required';
  /** False when the session was revoked meanwhile or the write failed */
  persisted: boolean;
}

export interface IpReputationSummary {
  ip: string;
  totalReports: number;
  abuseConfidenceScore: number;
  isWhitelisted: boolean;
  isBlacklisted: boolean;
  countryCode?: string;
  isp?: string;
  lastChecked: string;
}
