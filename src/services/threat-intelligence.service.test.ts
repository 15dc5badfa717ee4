/**
 * Threat Intelligence Gateway Tests
 * External HTTP is stubbed through global fetch
 */

import * as fc from 'fast-check';
import { Session } from '../models/session.model';
import {
  AuditEventType,
  AuditHistory,
  SUSPICIOUS_EVENTS
} from '../repositories/audit.repository';
import { SessionStore } from '../repositories/session.repository';
import { KeyedMutex } from '../utils/keyed-mutex';
import {
  ReputationCache,
  ThreatIntelligenceService,
  calculateConfidence,
  calculateThreatScore,
  detectIndicators,
  getThreatRecommendation
} from './threat-intelligence.service';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function abuseResponse(abuseConfidenceScore: number, totalReports: number): Response {
  return jsonResponse({
    data: {
      ipAddress: '203.0.113.5',
      abuseConfidenceScore,
      totalReports,
      countryCode: 'NL',
      isp: 'Example Hosting',
      isWhitelisted: false,
      usageType: 'Data Center/Web Hosting/Transit'
    }
  });
}

function abortableNeverResolving(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      reject(error);
    });
  });
}

function fakeAudit(suspicious: number, successful: number): AuditHistory {
  return {
    recordEvent: jest.fn(),
    countUserEvents: jest.fn().mockResolvedValue(0),
    countIpEvents: jest.fn(async (_ip: string, types: readonly AuditEventType[]) =>
      types === SUSPICIOUS_EVENTS ? suspicious : successful
    ),
    getBehaviorProfile: jest.fn().mockResolvedValue(null)
  };
}

/**
 * Single-session store; reads return whatever was last written
 */
function fakeSessions(session: Session | null): SessionStore {
  let row = session ? { ...session } : null;
  return {
    getSession: jest.fn(async () => (row ? { ...row } : null)),
    listActiveSessions: jest.fn().mockResolvedValue([]),
    updateSessionRisk: jest.fn().mockResolvedValue(true),
    updateRiskScore: jest.fn(async (_sessionId: string, riskScore: number) => {
      if (!row || row.revoked) return false;
      row = { ...row, risk_score: riskScore };
      return true;
    })
  };
}

const API_CONFIG = {
  apiUrl: 'https://abuse.test/api/v2/check',
  apiKey: 'test-api-key'
};

describe('Threat Intelligence Gateway', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    jest.spyOn(console, 'info').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('scoring helpers', () => {
    it('should weight external, local and indicator scores and truncate', () => {
      expect(calculateThreatScore(80, 50, 1)).toBe(59);
      expect(calculateThreatScore(33, 33.33, 0)).toBe(26);
      expect(calculateThreatScore(0, 0, 9)).toBe(20);
    });

    it('should keep the score within 0-100', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 100 }),
          fc.double({ min: 0, max: 100, noNaN: true }),
          fc.nat({ max: 20 }),
          (external, local, indicators) => {
            const score = calculateThreatScore(external, local, indicators);
            return Number.isInteger(score) && score >= 0 && score <= 100;
          }
        )
      );
    });

    it('should map scores to recommendations', () => {
      expect([0, 39, 40, 69, 70, 89, 90].map(getThreatRecommendation))
        .toEqual(['allow', 'allow', 'monitor', 'monitor', 'challenge', 'challenge', 'block']);
    });

    it('should rate confidence by the number of agreeing sources', () => {
      expect(calculateConfidence(0, 0, 0)).toBe('low');
      expect(calculateConfidence(3, 0, 0)).toBe('medium');
      expect(calculateConfidence(3, 1, 0)).toBe('high');
    });

    it('should detect scanner tools, attack patterns and context indicators', () => {
      expect(detectIndicators('sqlmap/1.7 (https://sqlmap.org)')).toEqual(['scanner_tool:sqlmap']);
      expect(detectIndicators('Mozilla/5.0 <script>alert(1)</script>')).toEqual(['attack_pattern:<script']);
      expect(detectIndicators('Mozilla/5.0', {
        failedAttempts: 6,
        locationChangeDistanceKm: 1500,
        isVpn: true
      })).toEqual(['excessive_failed_attempts', 'distant_location_change', 'vpn_or_proxy']);
      expect(detectIndicators('Mozilla/5.0', { failedAttempts: 5, locationChangeDistanceKm: 1000 })).toEqual([]);
    });
  });

  describe('ReputationCache', () => {
    it('should expire entries lazily on read', () => {
      const cache = new ReputationCache<string>(1000, 10);
      cache.set('a', 'value', 0);

      expect(cache.get('a', 1000)).toBe('value');
      expect(cache.get('a', 1001)).toBeNull();
      expect(cache.getStats()).toEqual({ size: 0, hits: 1, misses: 1, hitRate: 0.5 });
    });

    it('should drop the oldest entries when full', () => {
      const cache = new ReputationCache<number>(60000, 3);
      cache.set('a', 1, 1);
      cache.set('b', 2, 2);
      cache.set('c', 3, 3);
      cache.set('d', 4, 4);

      expect(cache.get('a', 5)).toBeNull();
      expect(cache.get('d', 5)).toBe(4);
      expect(cache.getStats().size).toBe(3);
    });
  });

  describe('checkIP', () => {
    it('should combine all three sources', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(80, 12));
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(1, 1) });

      const assessment = await service.checkIP('203.0.113.5', 'sqlmap/1.7');

      expect(assessment).toMatchObject({
        ip: '203.0.113.5',
        score: 59,
        confidence: 'high',
        indicators: ['scanner_tool:sqlmap'],
        sources: {
          external: 'abuseipdb',
          externalScore: 80,
          externalReports: 12,
          localScore: 50,
          localSuspiciousEvents: 1
        },
        isMalicious: false,
        recommendation: 'monitor',
        countryCode: 'NL',
        isp: 'Example Hosting'
      });

      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('https://abuse.test/api/v2/check?ipAddress=203.0.113.5&maxAgeInDays=90&verbose=');
      expect(init.headers).toEqual({ Key: 'test-api-key', Accept: 'application/json' });
    });

    it('should serve a repeat check from cache without calling out', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(80, 12));
      const audit = fakeAudit(1, 1);
      const service = new ThreatIntelligenceService(API_CONFIG, { audit });

      const first = await service.checkIP('203.0.113.5');
      const second = await service.checkIP('203.0.113.5');

      expect(second).toEqual(first);
      expect(fetchSpy).toHaveBeenCalledTimes(1);
      expect(audit.countIpEvents).toHaveBeenCalledTimes(2);
      expect(service.getCacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1, externalCalls: 1 });
    });

    it('should flag a malicious IP and log the detection', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(100, 40));
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(3, 0) });

      const assessment = await service.checkIP('203.0.113.5', 'nikto', { isTor: true });

      expect(assessment.score).toBe(88);
      expect(assessment.isMalicious).toBe(true);
      expect(assessment.recommendation).toBe('challenge');
      const logged = JSON.parse(jest.mocked(console.error).mock.calls[0][0]);
      expect(logged.event_type).toBe('THREAT_DETECTED');
      expect(logged.details.indicators).toEqual(['scanner_tool:nikto', 'tor_exit_node']);
    });

    it('should skip the external source without an API key', async () => {
      const service = new ThreatIntelligenceService({ apiKey: '' }, { audit: fakeAudit(0, 4) });

      const assessment = await service.checkIP('198.51.100.7');

      expect(fetchSpy).not.toHaveBeenCalled();
      expect(assessment.sources.external).toBe('unconfigured');
      expect(assessment.score).toBe(0);
      expect(assessment.confidence).toBe('low');
    });

    it('should score the external source 0 after a timeout', async () => {
      fetchSpy.mockImplementationOnce(abortableNeverResolving);
      const service = new ThreatIntelligenceService({ ...API_CONFIG, timeoutMs: 20 }, { audit: fakeAudit(1, 0) });

      const assessment = await service.checkIP('198.51.100.8');

      expect(assessment.sources.external).toBe('unavailable');
      expect(assessment.sources.externalScore).toBe(0);
      // 0.3 * 100
      expect(assessment.score).toBe(30);
      const logged = JSON.parse(jest.mocked(console.warn).mock.calls[0][0]);
      expect(logged.event_type).toBe('EXTERNAL_SERVICE_TIMEOUT');
    });

    it('should score the external source 0 on HTTP errors', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ errors: [] }, 429));
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(0, 0) });

      const assessment = await service.checkIP('198.51.100.9');

      expect(assessment.sources.external).toBe('unavailable');
      const logged = JSON.parse(jest.mocked(console.warn).mock.calls[0][0]);
      expect(logged.event_type).toBe('EVALUATION_DEGRADED');
    });

    it('should score local history 0 when it cannot be read', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(40, 2));
      const audit = fakeAudit(0, 0);
      jest.mocked(audit.countIpEvents).mockRejectedValue(new Error('audit table unavailable'));
      const service = new ThreatIntelligenceService(API_CONFIG, { audit });

      const assessment = await service.checkIP('198.51.100.10');

      expect(assessment.sources.localScore).toBe(0);
      expect(assessment.score).toBe(20);
    });
  });

  describe('enrichSession', () => {
    const session: Session = {
      id: 'sess-1',
      user_id: 'user-1',
      risk_score: 60,
      ip_address: '203.0.113.5',
      user_agent: 'Mozilla/5.0',
      created_at: '2024-03-06T10:00:00.000Z',
      expires_at: '2024-03-06T18:00:00.000Z',
      revoked: false
    };

    it('should add the external adjustment, store it and require step-up', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(80, 12));
      const sessions = fakeSessions(session);
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(1, 1), sessions });

      const enrichment = await service.enrichSession('sess-1');

      expect(enrichment).toMatchObject({
        sessionId: 'sess-1',
        originalScore: 60,
        adjustment: 20,
        enrichedScore: 80,
        recommendation: 'step_up_required',
        persisted: true
      });
      expect(sessions.updateRiskScore).toHaveBeenCalledWith('sess-1', 80);
      expect((await sessions.getSession('sess-1'))?.risk_score).toBe(80);
    });

    it('should add both adjustments and cap at 100', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(90, 5));
      const service = new ThreatIntelligenceService(API_CONFIG, {
        audit: fakeAudit(3, 1),
        sessions: fakeSessions({ ...session, risk_score: 70 })
      });

      const enrichment = await service.enrichSession('sess-1');

      expect(enrichment?.adjustment).toBe(35);
      expect(enrichment?.enrichedScore).toBe(100);
    });

    it('should leave a clean session alone', async () => {
      const service = new ThreatIntelligenceService({ apiKey: '' }, {
        audit: fakeAudit(0, 3),
        sessions: fakeSessions({ ...session, risk_score: 20 })
      });

      await expect(service.enrichSession('sess-1')).resolves.toMatchObject({
        adjustment: 0,
        enrichedScore: 20,
        recommendation: 'allow'
      });
    });

    it('should return null for an unknown session', async () => {
      const service = new ThreatIntelligenceService(API_CONFIG, { sessions: fakeSessions(null) });

      await expect(service.enrichSession('missing')).resolves.toBeNull();
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('should not raise the score of a revoked session', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(80, 12));
      const sessions = fakeSessions({ ...session, revoked: true });
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(1, 1), sessions });

      const enrichment = await service.enrichSession('sess-1');

      expect(enrichment?.enrichedScore).toBe(80);
      expect(enrichment?.persisted).toBe(false);
      expect((await sessions.getSession('sess-1'))?.risk_score).toBe(60);
    });

    it('should log and return null when the session cannot be read', async () => {
      const sessions = fakeSessions(session);
      jest.mocked(sessions.getSession).mockRejectedValueOnce(new Error('Table unavailable'));
      const service = new ThreatIntelligenceService(API_CONFIG, { sessions });

      await expect(service.enrichSession('sess-1')).resolves.toBeNull();

      expect(fetchSpy).not.toHaveBeenCalled();
      const warning = JSON.parse(jest.mocked(console.warn).mock.calls[0][0]);
      expect(warning).toMatchObject({
        event_type: 'EVALUATION_DEGRADED',
        session_id: 'sess-1',
        details: { component: 'session_store', error: 'Table unavailable' }
      });
    });

    it('should report an unstored score when the write fails', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(80, 12));
      const sessions = fakeSessions(session);
      jest.mocked(sessions.updateRiskScore).mockRejectedValueOnce(new Error('Rate exceeded'));
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(1, 1), sessions });

      const enrichment = await service.enrichSession('sess-1');

      expect(enrichment).toMatchObject({ enrichedScore: 80, persisted: false });
      const warning = JSON.parse(jest.mocked(console.warn).mock.calls[0][0]);
      expect(warning.details).toEqual({ component: 'session_store', error: 'Rate exceeded' });
    });

    it('should wait for the session lock before reading', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(80, 12));
      const sessions = fakeSessions(session);
      const locks = new KeyedMutex();
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(1, 1), sessions, locks });

      let release: () => void = () => undefined;
      const held = locks.runExclusive('sess-1', () => new Promise<void>(resolve => {
        release = resolve;
      }));

      const enrichment = service.enrichSession('sess-1');
      await new Promise(resolve => setImmediate(resolve));
      expect(sessions.getSession).not.toHaveBeenCalled();

      release();
      await held;
      await expect(enrichment).resolves.toMatchObject({ enrichedScore: 80, persisted: true });
    });
  });

  describe('getIpReputation', () => {
    it('should summarise external and local reputation', async () => {
      fetchSpy.mockResolvedValueOnce(abuseResponse(65, 7));
      const service = new ThreatIntelligenceService(API_CONFIG, { audit: fakeAudit(4, 1) });

      const summary = await service.getIpReputation('203.0.113.5');

      expect(summary).toMatchObject({
        ip: '203.0.113.5',
        totalReports: 7,
        abuseConfidenceScore: 65,
        isWhitelisted: false,
        isBlacklisted: true,
        countryCode: 'NL',
        isp: 'Example Hosting'
      });
    });
  });
});
