/**
 * Threat Intelligence Gateway
 *
 * Scores an IP address from three sources:
 * - external reputation (AbuseIPDB-compatible /check endpoint)
 * - local history: share of suspicious events from the IP over 30 days
 * - indicators: scanner tools or attack patterns in the user agent, and
 *   contextual signals such as Tor or repeated failures
 *
 * Assessments are cached per IP for an hour. Any source that fails counts
 * as score 0; checkIP never rejects.
 */

import { ENGINE_CONFIG } from '../config/engine.config';
import {
  ExternalReputation,
  IpReputationSummary,
  LocalReputation,
  ReputationSourceStatus,
  SessionEnrichment,
  ThreatAssessment,
  ThreatConfidence,
  ThreatContext,
  ThreatRecommendation
} from '../models/threat.model';
import {
  AuditHistory,
  SUCCESSFUL_EVENTS,
  SUSPICIOUS_EVENTS,
  auditRepository
} from '../repositories/audit.repository';
import { SessionStore, sessionRepository } from '../repositories/session.repository';
import { ExternalServiceTimeout, errorMessage } from '../utils/errors';
import { KeyedMutex, sessionLocks } from '../utils/keyed-mutex';
import { attempt } from '../utils/result';
import { fetchWithTimeout } from '../utils/timeout';
import { SecurityEventTypes, logSecurityEvent } from './security-logger.service';

export const SCANNER_USER_AGENTS = [
  'sqlmap',
  'nikto',
  'nmap',
  'masscan',
  'metasploit',
  'burp',
  'dirbuster',
  'acunetix',
  'nessus'
];

export const ATTACK_PATTERNS = [
  'admin',
  'root',
  'test',
  'backup',
  'phpmyadmin',
  '../',
  '..\\',
  '<script',
  'union select',
  'drop table'
];

const SCORE_WEIGHTS = {
  external: 0.5,
  local: 0.3,
  indicators: 0.2
} as const;

const POINTS_PER_INDICATOR = 20;
const FAILED_ATTEMPTS_INDICATOR_THRESHOLD = 5;
const LOCATION_CHANGE_INDICATOR_KM = 1000;
const MALICIOUS_THRESHOLD = 70;
const BLACKLIST_THRESHOLD = 70;
const ENRICHMENT_SOURCE_THRESHOLD = 50;
const EXTERNAL_ENRICHMENT = 20;
const LOCAL_ENRICHMENT = 15;
const STEP_UP_THRESHOLD = 70;

// ============================================================================
// Cache
// ============================================================================

interface CacheEntry<T> {
  value: T;
  cachedAt: number;
  ttl: number;
}

/**
 * TTL cache with lazy expiry on read. When full, the oldest tenth is dropped.
 */
export class ReputationCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly maxSize: number
  ) {}

  get(key: string, now: number = Date.now()): T | null {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return null;
    }
    if (now - entry.cachedAt > entry.ttl) {
      this.entries.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.value;
  }

  set(key: string, value: T, now: number = Date.now()): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      this.evictOldest();
    }
    this.entries.set(key, { value, cachedAt: now, ttl: this.ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): { size: number; hits: number; misses: number; hitRate: number } {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0
    };
  }

  private evictOldest(): void {
    const count = Math.max(1, Math.ceil(this.maxSize * 0.1));
    const oldest = Array.from(this.entries.entries())
      .sort((a, b) => a[1].cachedAt - b[1].cachedAt)
      .slice(0, count);
    for (const [key] of oldest) {
      this.entries.delete(key);
    }
  }
}

// ============================================================================
// Scoring helpers
// ============================================================================

export function detectIndicators(userAgent = '', context: ThreatContext = {}): string[] {
  const indicators: string[] = [];
  const ua = userAgent.toLowerCase();

  for (const tool of SCANNER_USER_AGENTS) {
    if (ua.includes(tool)) indicators.push(`scanner_tool:${tool}`);
  }
  for (const pattern of ATTACK_PATTERNS) {
    if (ua.includes(pattern)) indicators.push(`attack_pattern:${pattern}`);
  }

  if ((context.failedAttempts ?? 0) > FAILED_ATTEMPTS_INDICATOR_THRESHOLD) {
    indicators.push('excessive_failed_attempts');
  }
  if ((context.locationChangeDistanceKm ?? 0) > LOCATION_CHANGE_INDICATOR_KM) {
    indicators.push('distant_location_change');
  }
  if (context.isTor) indicators.push('tor_exit_node');
  if (context.isVpn) indicators.push('vpn_or_proxy');

  return indicators;
}

export function calculateThreatScore(externalScore: number, localScore: number, indicatorCount: number): number {
  const raw = SCORE_WEIGHTS.external * externalScore +
    SCORE_WEIGHTS.local * localScore +
    SCORE_WEIGHTS.indicators * Math.min(indicatorCount * POINTS_PER_INDICATOR, 100);
  // Drop float noise (e.g. 62.99999999) before truncating
  return Math.trunc(Math.round(raw * 1e6) / 1e6);
}

export function getThreatRecommendation(score: number): ThreatRecommendation {
  if (score >= 90) return 'block';
  if (score >= 70) return 'challenge';
  if (score >= 40) return 'monitor';
  return 'allow';
}

export function calculateConfidence(
  externalReports: number,
  localSuspiciousEvents: number,
  indicatorCount: number
): ThreatConfidence {
  const signals = [externalReports > 0, localSuspiciousEvents > 0, indicatorCount > 0]
    .filter(Boolean).length;
  if (signals >= 2) return 'high';
  if (signals === 1) return 'medium';
  return 'low';
}

// ============================================================================
// AbuseIPDB response
// ============================================================================

interface AbuseIpDbData {
  abuseConfidenceScore?: number;
  totalReports?: number;
  countryCode?: string | null;
  isp?: string | null;
  isWhitelisted?: boolean | null;
  usageType?: string | null;
}

function isAbuseIpDbResponse(value: unknown): value is { data: AbuseIpDbData } {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  const data = value.data;
  return typeof data === 'object' && data !== null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toExternalReputation(data: AbuseIpDbData): ExternalReputation {
  return {
    abuseConfidenceScore: typeof data.abuseConfidenceScore === 'number' ? data.abuseConfidenceScore : 0,
    totalReports: typeof data.totalReports === 'number' ? data.totalReports : 0,
    countryCode: optionalString(data.countryCode),
    isp: optionalString(data.isp),
    isWhitelisted: data.isWhitelisted === true,
    usageType: optionalString(data.usageType)
  };
}

// ============================================================================
// Gateway
// ============================================================================

export interface ThreatIntelligenceConfig {
  /** AbuseIPDB-compatible check endpoint */
  apiUrl?: string;
  /** API key; without one the external source is skipped */
  apiKey?: string;
  maxAgeInDays?: number;
  timeoutMs?: number;
  cacheTtlMs?: number;
  maxCacheSize?: number;
  /** Window for local suspicious/successful event counts */
  localWindowMs?: number;
}

export interface ThreatIntelligenceDependencies {
  audit?: AuditHistory;
  sessions?: SessionStore;
  locks?: KeyedMutex;
}

interface CachedReputation {
  assessment: ThreatAssessment;
  external: ExternalReputation | null;
}

export class ThreatIntelligenceService {
  private readonly config: Required<ThreatIntelligenceConfig>;
  private readonly cache: ReputationCache<CachedReputation>;
  private readonly audit: AuditHistory;
  private readonly sessions: SessionStore;
  private readonly locks: KeyedMutex;
  private externalCalls = 0;

  constructor(config: ThreatIntelligenceConfig = {}, deps: ThreatIntelligenceDependencies = {}) {
    this.config = {
      apiUrl: ENGINE_CONFIG.threatIntel.abuseIpDbUrl,
      apiKey: ENGINE_CONFIG.threatIntel.abuseIpDbApiKey,
      maxAgeInDays: ENGINE_CONFIG.threatIntel.maxAgeInDays,
      timeoutMs: ENGINE_CONFIG.threatIntel.timeoutMs,
      cacheTtlMs: ENGINE_CONFIG.threatIntel.cacheTtlMs,
      maxCacheSize: ENGINE_CONFIG.threatIntel.maxCacheSize,
      localWindowMs: ENGINE_CONFIG.threatIntel.localWindowMs,
      ...config
    };
    this.cache = new ReputationCache(this.config.cacheTtlMs, this.config.maxCacheSize);
    this.audit = deps.audit || auditRepository;
    this.sessions = deps.sessions || sessionRepository;
    this.locks = deps.locks || sessionLocks;
  }

  /**
   * Assess an IP. A cached assessment is returned unchanged for the rest of
   * its TTL; getCacheStats tells hits from misses.
   */
  async checkIP(ip: string, userAgent?: string, context?: ThreatContext): Promise<ThreatAssessment> {
    return (await this.lookup(ip, userAgent, context)).assessment;
  }

  /**
   * Raise a session's risk score by what the reputation sources say about
   * its IP and store it. Holds the session's lock, so it never interleaves
   * with a reevaluation of the same session.
   *
   * Null when the session does not exist or cannot be read.
   */
  enrichSession(sessionId: string): Promise<SessionEnrichment | null> {
    return this.locks.runExclusive(sessionId, () => this.enrichExclusive(sessionId));
  }

  async getIpReputation(ip: string): Promise<IpReputationSummary> {
    const { assessment, external } = await this.lookup(ip);

    return {
      ip,
      totalReports: external?.totalReports ?? 0,
      abuseConfidenceScore: external?.abuseConfidenceScore ?? 0,
      isWhitelisted: external?.isWhitelisted ?? false,
      isBlacklisted: assessment.sources.localScore >= BLACKLIST_THRESHOLD,
      countryCode: assessment.countryCode,
      isp: assessment.isp,
      lastChecked: assessment.checkedAt
    };
  }

  getCacheStats(): ReturnType<ReputationCache<CachedReputation>['getStats']> & { externalCalls: number } {
    return { ...this.cache.getStats(), externalCalls: this.externalCalls };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async enrichExclusive(sessionId: string): Promise<SessionEnrichment | null> {
    const read = await attempt(() => this.sessions.getSession(sessionId));
    if (!read.ok) {
      this.logStoreFailure(sessionId, read.error);
      return null;
    }
    const session = read.value;
    if (!session) return null;

    const threat = await this.checkIP(session.ip_address, session.user_agent);

    let adjustment = 0;
    if (threat.sources.externalScore > ENRICHMENT_SOURCE_THRESHOLD) adjustment += EXTERNAL_ENRICHMENT;
    if (threat.sources.localScore > ENRICHMENT_SOURCE_THRESHOLD) adjustment += LOCAL_ENRICHMENT;

    const enrichedScore = Math.min(session.risk_score + adjustment, 100);

    const written = await attempt(() => this.sessions.updateRiskScore(sessionId, enrichedScore));
    if (!written.ok) this.logStoreFailure(sessionId, written.error);

    return {
      sessionId,
      originalScore: session.risk_score,
      adjustment,
      enrichedScore,
      threat,
      recommendation: enrichedScore >= STEP_UP_THRESHOLD ? 'step_up_required' : 'allow',
      persisted: written.ok && written.value
    };
  }

  private logStoreFailure(sessionId: string, error: Error): void {
    logSecurityEvent({
      event_type: SecurityEventTypes.EVALUATION_DEGRADED,
      session_id: sessionId,
      details: { component: 'session_store', error: error.message }
    });
  }

  private async lookup(ip: string, userAgent?: string, context?: ThreatContext): Promise<CachedReputation> {
    const cached = this.cache.get(ip);
    if (cached) return cached;

    // The cache is not held while the sources are queried
    const [externalResult, local] = await Promise.all([
      this.fetchExternal(ip),
      this.fetchLocal(ip)
    ]);

    const indicators = detectIndicators(userAgent, context);
    const external = externalResult.reputation;
    const externalScore = external?.abuseConfidenceScore ?? 0;
    const externalReports = external?.totalReports ?? 0;
    const score = calculateThreatScore(externalScore, local.score, indicators.length);

    const assessment: ThreatAssessment = {
      ip,
      score,
      confidence: calculateConfidence(externalReports, local.suspiciousEvents, indicators.length),
      indicators,
      sources: {
        external: externalResult.status,
        externalScore,
        externalReports,
        localScore: local.score,
        localSuspiciousEvents: local.suspiciousEvents
      },
      isMalicious: score >= MALICIOUS_THRESHOLD,
      recommendation: getThreatRecommendation(score),
      countryCode: external?.countryCode,
      isp: external?.isp,
      checkedAt: new Date().toISOString()
    };

    if (assessment.isMalicious) {
      logSecurityEvent({
        event_type: SecurityEventTypes.THREAT_DETECTED,
        ip_address: ip,
        details: { score, recommendation: assessment.recommendation, indicators }
      });
    }

    const entry: CachedReputation = { assessment, external };
    this.cache.set(ip, entry);
    return entry;
  }

  private async fetchExternal(ip: string): Promise<{
    status: ReputationSourceStatus;
    reputation: ExternalReputation | null;
  }> {
    if (!this.config.apiKey) {
      return { status: 'unconfigured', reputation: null };
    }

    this.externalCalls++;
    const params = new URLSearchParams({
      ipAddress: ip,
      maxAgeInDays: String(this.config.maxAgeInDays),
      verbose: ''
    });

    try {
      const response = await fetchWithTimeout(
        'abuseipdb',
        `${this.config.apiUrl}?${params.toString()}`,
        { headers: { Key: this.config.apiKey, Accept: 'application/json' } },
        this.config.timeoutMs
      );

      if (!response.ok) {
        throw new Error(`AbuseIPDB returned status ${response.status}`);
      }

      const body: unknown = await response.json();
      if (!isAbuseIpDbResponse(body)) {
        throw new Error('AbuseIPDB returned an unexpected response');
      }

      return { status: 'abuseipdb', reputation: toExternalReputation(body.data) };
    } catch (error) {
      logSecurityEvent({
        event_type: error instanceof ExternalServiceTimeout
          ? SecurityEventTypes.EXTERNAL_SERVICE_TIMEOUT
          : SecurityEventTypes.EVALUATION_DEGRADED,
        ip_address: ip,
        details: { service: 'abuseipdb', error: errorMessage(error) }
      });
      return { status: 'unavailable', reputation: null };
    }
  }

  private async fetchLocal(ip: string): Promise<LocalReputation> {
    const since = new Date(Date.now() - this.config.localWindowMs);
    try {
      const [suspiciousEvents, successfulEvents] = await Promise.all([
        this.audit.countIpEvents(ip, SUSPICIOUS_EVENTS, since),
        this.audit.countIpEvents(ip, SUCCESSFUL_EVENTS, since)
      ]);
      const total = suspiciousEvents + successfulEvents;
      return {
        suspiciousEvents,
        successfulEvents,
        score: total > 0 ? (suspiciousEvents / total) * 100 : 0
      };
    } catch (error) {
      logSecurityEvent({
        event_type: SecurityEventTypes.EVALUATION_DEGRADED,
        ip_address: ip,
        details: { service: 'local_history', error: errorMessage(error) }
      });
      return { suspiciousEvents: 0, successfulEvents: 0, score: 0 };
    }
  }
}

let defaultThreatIntelligenceService: ThreatIntelligenceService | null = null;

export function getThreatIntelligenceService(): ThreatIntelligenceService {
  if (!defaultThreatIntelligenceService) {
    defaultThreatIntelligenceService = new ThreatIntelligenceService();
  }
  return defaultThreatIntelligenceService;
}
