/**
 * Step-up Challenge Store
 *
 * Issued when a policy decides `stepup`. The caller gets a signed challenge
 * token and a 6 digit one-time code to deliver out of band. Only a SHA-256
 * hash of the code is kept, and a challenge can be verified once.
 */

import crypto from 'crypto';
import * as jwt from 'jsonwebtoken';
import { ENGINE_CONFIG } from '../config/engine.config';
import { ErrorCodes, StepUpChallengeError } from '../utils/errors';
import { SecurityEventTypes, logSecurityEvent } from './security-logger.service';

const TOKEN_TYPE = 'stepup';
const MAX_VERIFY_ATTEMPTS = 5;

export interface StepUpContext {
  ipAddress: string;
  policyName?: string;
  riskScore?: number;
}

export interface StepUpChallenge {
  challengeId: string;
  token: string;
  /** Plain code for delivery; never stored */
  code: string;
  expiresAt: string;
}

export interface VerifiedChallenge {
  challengeId: string;
  userId: string;
  context: StepUpContext;
}

interface StoredChallenge {
  userId: string;
  codeHash: string;
  expiresAt: number;
  attempts: number;
  context: StepUpContext;
}

export interface StepUpChallengeConfig {
  secret?: string;
  ttlSeconds?: number;
  codeLength?: number;
}

function hashCode(code: string): string {
  return crypto.createHash('sha256').update(code).digest('hex');
}

function generateCode(length: number): string {
  return crypto.randomInt(0, 10 ** length).toString().padStart(length, '0');
}

function readClaims(decoded: string | jwt.JwtPayload): { challengeId: string; userId: string } | null {
  if (typeof decoded === 'string') return null;
  const { cid, sub, typ } = decoded;
  if (typeof cid !== 'string' || typeof sub !== 'string' || typ !== TOKEN_TYPE) return null;
  return { challengeId: cid, userId: sub };
}

export class StepUpChallengeStore {
  private readonly config: Required<StepUpChallengeConfig>;
  private readonly challenges = new Map<string, StoredChallenge>();

  constructor(config: StepUpChallengeConfig = {}) {
    this.config = {
      secret: ENGINE_CONFIG.stepUp.secret,
      ttlSeconds: ENGINE_CONFIG.stepUp.ttlSeconds,
      codeLength: ENGINE_CONFIG.stepUp.codeLength,
      ...config
    };
  }

  issue(userId: string, context: StepUpContext): StepUpChallenge {
    this.evictExpired();

    const challengeId = `chl_${crypto.randomBytes(16).toString('hex')}`;
    const code = generateCode(this.config.codeLength);
    const expiresAt = Date.now() + this.config.ttlSeconds * 1000;

    const token = jwt.sign(
      { cid: challengeId, typ: TOKEN_TYPE },
      this.config.secret,
      { algorithm: 'HS256', expiresIn: this.config.ttlSeconds, subject: userId }
    );

    this.challenges.set(challengeId, {
      userId,
      codeHash: hashCode(code),
      expiresAt,
      attempts: 0,
      context
    });

    logSecurityEvent({
      event_type: SecurityEventTypes.STEPUP_ISSUED,
      user_id: userId,
      ip_address: context.ipAddress,
      details: {
        challenge_id: challengeId,
        policy: context.policyName,
        expires_at: new Date(expiresAt).toISOString()
      }
    });

    return { challengeId, token, code, expiresAt: new Date(expiresAt).toISOString() };
  }

  /**
   * Check the token and code. A successful verification consumes the
   * challenge; so does running out of attempts.
   */
  verify(token: string, code: string): VerifiedChallenge {
    let claims: { challengeId: string; userId: string } | null;
    try {
      claims = readClaims(jwt.verify(token, this.config.secret, { algorithms: ['HS256'] }));
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw this.reject(ErrorCodes.CHALLENGE_EXPIRED, 'token_expired');
      }
      throw this.reject(ErrorCodes.CHALLENGE_INVALID, 'bad_token');
    }
    if (!claims) {
      throw this.reject(ErrorCodes.CHALLENGE_INVALID, 'bad_claims');
    }

    const stored = this.challenges.get(claims.challengeId);
    if (!stored || stored.userId !== claims.userId) {
      throw this.reject(ErrorCodes.CHALLENGE_INVALID, 'unknown_challenge', claims);
    }
    if (stored.expiresAt <= Date.now()) {
      this.challenges.delete(claims.challengeId);
      throw this.reject(ErrorCodes.CHALLENGE_EXPIRED, 'challenge_expired', claims);
    }

    const expected = Buffer.from(stored.codeHash, 'hex');
    const actual = Buffer.from(hashCode(code), 'hex');
    if (!crypto.timingSafeEqual(expected, actual)) {
      stored.attempts++;
      if (stored.attempts >= MAX_VERIFY_ATTEMPTS) {
        this.challenges.delete(claims.challengeId);
      }
      throw this.reject(ErrorCodes.CHALLENGE_INVALID, 'wrong_code', claims);
    }

    this.challenges.delete(claims.challengeId);

    logSecurityEvent({
      event_type: SecurityEventTypes.STEPUP_VERIFIED,
      user_id: claims.userId,
      ip_address: stored.context.ipAddress,
      details: { challenge_id: claims.challengeId }
    });

    return { ...claims, context: stored.context };
  }

  get size(): number {
    return this.challenges.size;
  }

  private evictExpired(now: number = Date.now()): void {
    for (const [id, challenge] of this.challenges) {
      if (challenge.expiresAt <= now) this.challenges.delete(id);
    }
  }

  private reject(
    code: typeof ErrorCodes.CHALLENGE_INVALID | typeof ErrorCodes.CHALLENGE_EXPIRED,
    reason: string,
    claims?: { challengeId: string; userId: string }
  ): StepUpChallengeError {
    logSecurityEvent({
      event_type: SecurityEventTypes.STEPUP_FAILED,
      user_id: claims?.userId,
      details: { reason, challenge_id: claims?.challengeId }
    });
    return new StepUpChallengeError(code);
  }
}

let defaultStepUpChallengeStore: StepUpChallengeStore | null = null;

export function getStepUpChallengeStore(): StepUpChallengeStore {
  if (!defaultStepUpChallengeStore) {
    defaultStepUpChallengeStore = new StepUpChallengeStore();
  }
  return defaultStepUpChallengeStore;
}
