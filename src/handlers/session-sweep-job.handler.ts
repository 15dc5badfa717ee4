/**
 * Session Sweep Job Handler
 *
 * Triggered by an EventBridge schedule. Reevaluates every active session at
 * or above a risk threshold so that risky sessions get rechecked even when
 * their owners make no requests.
 *
 * The rule's input may carry `{ "riskThreshold": 70 }` to narrow a run.
 */

import { Context, ScheduledEvent } from 'aws-lambda';
import { SweepResult } from '../models/reevaluation.model';
import { MAX_RISK_SCORE, MIN_RISK_SCORE } from '../models/risk-assessment.model';
import { getSessionMonitor } from '../services/session-monitor.service';
import { SecurityEventTypes, logSecurityEvent } from '../services/security-logger.service';
import { errorMessage } from '../utils/errors';

/**
 * Threshold from the event detail, or undefined for the configured default
 */
function readRiskThreshold(detail: unknown): number | undefined {
  if (typeof detail !== 'object' || detail === null || !('riskThreshold' in detail)) {
    return undefined;
  }
  const { riskThreshold } = detail;
  if (
    typeof riskThreshold !== 'number' ||
    !Number.isFinite(riskThreshold) ||
    riskThreshold < MIN_RISK_SCORE ||
    riskThreshold > MAX_RISK_SCORE
  ) {
    return undefined;
  }
  return riskThreshold;
}

export async function handler(event: ScheduledEvent, context: Context): Promise<SweepResult> {
  const riskThreshold = readRiskThreshold(event.detail);

  logSecurityEvent({
    event_type: SecurityEventTypes.SESSION_SWEEP_STARTED,
    details: {
      risk_threshold: riskThreshold ?? 'default',
      scheduled_at: event.time,
      request_id: context.awsRequestId
    }
  });

  try {
    return await getSessionMonitor().batchReevaluate(riskThreshold);
  } catch (error) {
    // Only the session listing can fail here; per-session errors are in the result
    logSecurityEvent({
      event_type: SecurityEventTypes.SESSION_SWEEP_FAILED,
      details: { error: errorMessage(error), request_id: context.awsRequestId }
    });
    throw error;
  }
}

export const _testing = {
  readRiskThreshold
};
