/**
 * RiskAssessment Model
 *
 * An assessment combines five weighted factors into a 0-100 score and a
 * level. Scores are deterministic for the same context and history.
 */

import { ENGINE_CONFIG } from '../config/engine.config';
import { AuthContext } from './auth-context.model';

export type RiskFactorName =
  | 'device'
  | 'location'
  | 'time'
  | 'failed_attempts'
  | 'velocity';

export type RiskLevel = 'low' | 'medium' | 'high';

export interface RiskFactor {
  name: RiskFactorName;
  score: number;                  // 0-100
  weight: number;                 // 0-1
  details: string;
  degraded: boolean;              // true when a fallback value was used
  metadata?: Record<string, unknown>;
}

export interface RiskAssessment {
  score: number;
  level: RiskLevel;
  factors: Record<RiskFactorName, RiskFactor>;
  context: AuthContext;
  assessedAt: string;
}

// ============================================================================
// Constants
// ============================================================================

export const MIN_RISK_SCORE = 0;

export const MAX_RISK_SCORE = 100;

export const MEDIUM_RISK_THRESHOLD = ENGINE_CONFIG.risk.levels.mediumFrom;

export const HIGH_RISK_THRESHOLD = ENGINE_CONFIG.risk.levels.highFrom;

export const RISK_FACTOR_NAMES: readonly RiskFactorName[] = [
  'device',
  'location',
  'time',
  'failed_attempts',
  'velocity'
];

/**
 * Factor weights. They sum to 1.0 so the weighted total stays within 0-100.
 */
export const RISK_FACTOR_WEIGHTS: Readonly<Record<RiskFactorName, number>> = ENGINE_CONFIG.risk.weights;

// ============================================================================
// Helpers
// ============================================================================

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return MIN_RISK_SCORE;
  return Math.min(MAX_RISK_SCORE, Math.max(MIN_RISK_SCORE, score));
}

export function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

export function calculateRiskLevel(score: number): RiskLevel {
  if (score < MEDIUM_RISK_THRESHOLD) return 'low';
  if (score < HIGH_RISK_THRESHOLD) return 'medium';
  return 'high';
}

export function isValidRiskScore(score: number): boolean {
  return typeof score === 'number' &&
         !Number.isNaN(score) &&
         score >= MIN_RISK_SCORE &&
         score <= MAX_RISK_SCORE;
}

/**
 * Weighted sum of factor scores, rounded to two decimals and clamped.
 */
export function calculateWeightedScore(factors: Record<RiskFactorName, RiskFactor>): number {
  const total = RISK_FACTOR_NAMES.reduce(
    (sum, name) => sum + clampScore(factors[name].score) * factors[name].weight,
    0
  );
  return clampScore(roundScore(total));
}
