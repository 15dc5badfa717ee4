/**
 * Risk Scorer Tests
 */

import * as fc from 'fast-check';
import { AuthContext, freezeContext } from '../models/auth-context.model';
import {
  AuditEventType,
  AuditHistory,
  FAILED_AUTH_EVENTS
} from '../repositories/audit.repository';
import { DeviceRegistry } from '../repositories/device.repository';
import { GeolocationService } from './geolocation.service';
import {
  RiskScorer,
  scoreFailedAttempts,
  scoreTime,
  scoreVelocity
} from './risk-scorer.service';

const CHROME_MAC_UA =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Wednesday
const WEEKDAY_EVENING = new Date('2024-03-06T20:00:00.000Z');
const WEEKDAY_MORNING = new Date('2024-03-06T10:00:00.000Z');

function makeContext(overrides: Partial<AuthContext> = {}): AuthContext {
  return freezeContext({
    userId: 'user-1',
    ipAddress: '203.0.113.10',
    userAgent: CHROME_MAC_UA,
    device: { browser: 'Chrome', os: 'Mac OS X', deviceType: 'desktop' },
    location: { countryCode: 'ES', city: 'Madrid', display: 'Madrid, Spain' },
    timestamp: WEEKDAY_EVENING,
    isBusinessHours: false,
    ...overrides
  });
}

function fakeDevices(overrides: Partial<DeviceRegistry> = {}): DeviceRegistry {
  return {
    findDevice: jest.fn().mockResolvedValue(null),
    listKnownLocations: jest.fn().mockResolvedValue([]),
    recordDevice: jest.fn().mockResolvedValue(undefined),
    ...overrides
  };
}

function fakeAudit(failed = 0, attempts = 0): AuditHistory {
  return {
    recordEvent: jest.fn(),
    countUserEvents: jest.fn(async (_userId: string, types: readonly AuditEventType[]) =>
      types === FAILED_AUTH_EVENTS ? failed : attempts
    ),
    countIpEvents: jest.fn().mockResolvedValue(0),
    getBehaviorProfile: jest.fn().mockResolvedValue(null)
  };
}

describe('Risk Scorer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('factor tables', () => {
    it('should score failed attempts in bands', () => {
      expect([0, 1, 2, 3, 10].map(scoreFailedAttempts)).toEqual([0, 20, 20, 50, 50]);
    });

    it('should score velocity in bands', () => {
      expect([0, 2, 3, 5, 6].map(scoreVelocity)).toEqual([0, 0, 25, 25, 50]);
    });

    it('should score time of day', () => {
      expect(scoreTime(WEEKDAY_MORNING).score).toBe(0);
      expect(scoreTime(new Date('2024-03-06T18:00:00.000Z')).score).toBe(0);
      expect(scoreTime(new Date('2024-03-06T18:00:01.000Z')).score).toBe(15);
      expect(scoreTime(new Date('2024-03-06T07:59:59.000Z')).score).toBe(15);
      // Saturday
      expect(scoreTime(new Date('2024-03-09T10:00:00.000Z')).score).toBe(25);
    });
  });

  describe('evaluate', () => {
    it('should combine unknown device, new location and off-hours into 23.75', async () => {
      const scorer = new RiskScorer({
        devices: fakeDevices({ listKnownLocations: jest.fn().mockResolvedValue(['Buenos Aires, Argentina']) }),
        audit: fakeAudit(0, 0)
      });

      const assessment = await scorer.evaluate(makeContext());

      expect(assessment.factors.device.score).toBe(40);
      expect(assessment.factors.location.score).toBe(35);
      expect(assessment.factors.time.score).toBe(15);
      expect(assessment.factors.failed_attempts.score).toBe(0);
      expect(assessment.factors.velocity.score).toBe(0);
      expect(assessment.score).toBe(23.75);
      expect(assessment.level).toBe('low');
    });

    it('should score a known device at a known location during business hours as zero', async () => {
      const devices = fakeDevices({
        findDevice: jest.fn().mockResolvedValue({
          userId: 'user-1',
          fingerprint: 'fp',
          name: 'Chrome on Mac OS X',
          firstSeenAt: '2024-01-01T00:00:00.000Z',
          lastSeenAt: '2024-03-01T00:00:00.000Z'
        }),
        listKnownLocations: jest.fn().mockResolvedValue(['Madrid, Spain'])
      });
      const scorer = new RiskScorer({ devices, audit: fakeAudit() });

      const assessment = await scorer.evaluate(makeContext({ timestamp: WEEKDAY_MORNING, isBusinessHours: true }));

      expect(assessment.score).toBe(0);
      expect(assessment.factors.device.details).toBe('Known device: Chrome on Mac OS X');
      expect(devices.findDevice).toHaveBeenCalledWith('user-1', expect.stringMatching(/^[a-f0-9]{64}$/));
    });

    it('should give the first location seen for a user 20', async () => {
      const scorer = new RiskScorer({ devices: fakeDevices(), audit: fakeAudit() });

      const assessment = await scorer.evaluate(makeContext());

      expect(assessment.factors.location.score).toBe(20);
      expect(assessment.factors.location.details).toBe('First location: Madrid, Spain');
    });

    it('should count failures in the trailing hour and attempts in the trailing five minutes', async () => {
      const audit = fakeAudit(3, 6);
      const scorer = new RiskScorer({ devices: fakeDevices(), audit });

      const assessment = await scorer.evaluate(makeContext());

      expect(assessment.factors.failed_attempts.score).toBe(50);
      expect(assessment.factors.velocity.score).toBe(50);
      expect(audit.countUserEvents).toHaveBeenCalledWith(
        'user-1', FAILED_AUTH_EVENTS, new Date('2024-03-06T19:00:00.000Z')
      );
      expect(audit.countUserEvents).toHaveBeenCalledWith(
        'user-1', ['auth_success', 'auth_failed'], new Date('2024-03-06T19:55:00.000Z')
      );
      // 12 + 5 + 3 + 7.5 + 5
      expect(assessment.score).toBe(32.5);
    });

    it('should fall back to neutral values when sources are unavailable', async () => {
      const scorer = new RiskScorer({
        devices: fakeDevices({
          findDevice: jest.fn().mockRejectedValue(new Error('registry down')),
          listKnownLocations: jest.fn().mockRejectedValue(new Error('registry down'))
        }),
        audit: {
          ...fakeAudit(),
          countUserEvents: jest.fn().mockRejectedValue(new Error('audit down'))
        }
      });

      const assessment = await scorer.evaluate(makeContext());

      expect(assessment.factors.device).toMatchObject({ score: 40, degraded: true });
      expect(assessment.factors.location).toMatchObject({ score: 20, degraded: true });
      expect(assessment.factors.failed_attempts).toMatchObject({ score: 0, degraded: true });
      expect(assessment.factors.velocity).toMatchObject({ score: 0, degraded: true });
      expect(assessment.factors.time.degraded).toBe(false);
      // 12 + 5 + 3
      expect(assessment.score).toBe(20);

      const degraded = jest.mocked(console.warn).mock.calls.map(call => JSON.parse(call[0]));
      expect(degraded.map(event => event.details.factor)).toEqual([
        'device', 'location', 'failed_attempts', 'velocity'
      ]);
      expect(degraded[0].event_type).toBe('EVALUATION_DEGRADED');
    });

    it('should keep the score within 0-100 for any history', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.nat({ max: 50 }),
          fc.nat({ max: 50 }),
          fc.boolean(),
          async (failed, attempts, known) => {
            const scorer = new RiskScorer({
              devices: fakeDevices({ listKnownLocations: jest.fn().mockResolvedValue(known ? ['Madrid, Spain'] : []) }),
              audit: fakeAudit(failed, attempts)
            });
            const { score } = await scorer.evaluate(makeContext());
            return score >= 0 && score <= 100;
          }
        ),
        { numRuns: 50 }
      );
    });
  });

  describe('buildAuthContext', () => {
    it('should parse the user agent, resolve location and freeze the result', async () => {
      const geolocation = new GeolocationService({ endpoint: 'http://geo.test/json' });
      jest.spyOn(geolocation, 'lookup').mockResolvedValue({
        countryCode: 'AR',
        city: 'Buenos Aires',
        display: 'Buenos Aires, Argentina'
      });
      const scorer = new RiskScorer({ devices: fakeDevices(), audit: fakeAudit(), geolocation });

      const ctx = await scorer.buildAuthContext({
        userId: 'user-1',
        ipAddress: '200.45.1.1',
        userAgent: CHROME_MAC_UA,
        timestamp: WEEKDAY_MORNING
      });

      expect(ctx.device).toEqual({ browser: 'Chrome', os: 'Mac OS X', deviceType: 'desktop' });
      expect(ctx.location.countryCode).toBe('AR');
      expect(ctx.isBusinessHours).toBe(true);
      expect(Object.isFrozen(ctx)).toBe(true);
      expect(Object.isFrozen(ctx.location)).toBe(true);
    });

    it('should not treat weekend office hours as business hours', async () => {
      const geolocation = new GeolocationService();
      jest.spyOn(geolocation, 'lookup').mockResolvedValue({ countryCode: 'XX', city: 'Unknown', display: 'Unknown' });
      const scorer = new RiskScorer({ devices: fakeDevices(), audit: fakeAudit(), geolocation });

      const ctx = await scorer.buildAuthContext({
        userId: 'user-1',
        ipAddress: '200.45.1.1',
        userAgent: CHROME_MAC_UA,
        timestamp: new Date('2024-03-09T10:00:00.000Z')
      });

      expect(ctx.isBusinessHours).toBe(false);
    });
  });
});
