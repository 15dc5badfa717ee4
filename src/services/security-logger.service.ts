/**
 * Security Event Logging Service
 *
 * Writes one structured JSON line per engine event (decisions, degradations,
 * policy changes, session revocations) for the log pipeline to pick up.
 */

export const SecurityEventTypes = {
  // Access decisions
  RISK_EVALUATED: 'RISK_EVALUATED',
  ACCESS_DECISION: 'ACCESS_DECISION',
  STEPUP_ISSUED: 'STEPUP_ISSUED',
  STEPUP_VERIFIED: 'STEPUP_VERIFIED',
  STEPUP_FAILED: 'STEPUP_FAILED',

  // Degraded evaluation
  EVALUATION_DEGRADED: 'EVALUATION_DEGRADED',
  EXTERNAL_SERVICE_TIMEOUT: 'EXTERNAL_SERVICE_TIMEOUT',
  POLICIES_SEEDED: 'POLICIES_SEEDED',

  // Policy administration
  POLICY_CREATED: 'POLICY_CREATED',
  POLICY_UPDATED: 'POLICY_UPDATED',
  POLICY_DELETED: 'POLICY_DELETED',
  POLICY_TOGGLED: 'POLICY_TOGGLED',

  // Continuous evaluation
  SESSION_REEVALUATED: 'SESSION_REEVALUATED',
  SESSION_REVOKED: 'SESSION_REVOKED',
  SESSION_SWEEP_STARTED: 'SESSION_SWEEP_STARTED',
  SESSION_SWEEP_COMPLETED: 'SESSION_SWEEP_COMPLETED',
  SESSION_SWEEP_FAILED: 'SESSION_SWEEP_FAILED',
  THREAT_DETECTED: 'THREAT_DETECTED'
} as const;

export type SecurityEventType = typeof SecurityEventTypes[keyof typeof SecurityEventTypes];

export const SecurityEventSeverity = {
  INFO: 'INFO',
  WARNING: 'WARNING',
  ERROR: 'ERROR',
  CRITICAL: 'CRITICAL'
} as const;

export type SecuritySeverity = typeof SecurityEventSeverity[keyof typeof SecurityEventSeverity];

export interface SecurityEvent {
  event_type: SecurityEventType;
  severity: SecuritySeverity;
  timestamp: string;
  user_id?: string;
  session_id?: string;
  ip_address?: string;
  details?: Record<string, unknown>;
}

export interface SecurityEventInput {
  event_type: SecurityEventType;
  severity?: SecuritySeverity;
  user_id?: string;
  session_id?: string;
  ip_address?: string;
  details?: Record<string, unknown>;
}

const REDACTED_KEYS: ReadonlySet<string> = new Set([
  'token',
  'access_token',
  'refresh_token',
  'challenge_token',
  'secret',
  'client_secret',
  'password',
  'otp',
  'otp_code',
  'code',
  'apikey',
  'api_key'
]);

function getSeverityForEventType(eventType: SecurityEventType): SecuritySeverity {
  switch (eventType) {
    case SecurityEventTypes.EVALUATION_DEGRADED:
    case SecurityEventTypes.EXTERNAL_SERVICE_TIMEOUT:
    case SecurityEventTypes.STEPUP_FAILED:
    case SecurityEventTypes.POLICY_DELETED:
      return SecurityEventSeverity.WARNING;

    case SecurityEventTypes.THREAT_DETECTED:
    case SecurityEventTypes.SESSION_SWEEP_FAILED:
      return SecurityEventSeverity.ERROR;

    case SecurityEventTypes.SESSION_REVOKED:
      return SecurityEventSeverity.CRITICAL;

    default:
      return SecurityEventSeverity.INFO;
  }
}

function redact(details: Record<string, unknown>): Record<string, unknown> {
  const clean: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    clean[key] = REDACTED_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : value;
  }
  return clean;
}

/**
 * Log a security event as a structured JSON line.
 * The console method follows severity: ERROR/CRITICAL → error, WARNING → warn.
 */
export function logSecurityEvent(input: SecurityEventInput): SecurityEvent {
  const severity = input.severity || getSeverityForEventType(input.event_type);

  const securityEvent: SecurityEvent = {
    event_type: input.event_type,
    severity,
    timestamp: new Date().toISOString(),
    user_id: input.user_id,
    session_id: input.session_id,
    ip_address: input.ip_address,
    details: input.details ? redact(input.details) : undefined
  };

  const logLevel = severity === SecurityEventSeverity.CRITICAL || severity === SecurityEventSeverity.ERROR
    ? 'error'
    : severity === SecurityEventSeverity.WARNING
    ? 'warn'
    : 'info';

  const logMessage = JSON.stringify({
    level: logLevel,
    message: `[SECURITY] ${input.event_type}`,
    ...securityEvent
  });

  switch (logLevel) {
    case 'error':
      console.error(logMessage);
      break;
    case 'warn':
      console.warn(logMessage);
      break;
    default:
      console.info(logMessage);
  }

  return securityEvent;
}

/**
 * Shorthand for events that only carry a type and free-form details
 */
export function logSimpleSecurityEvent(
  eventType: SecurityEventType,
  details: Record<string, unknown> = {}
): SecurityEvent {
  return logSecurityEvent({ event_type: eventType, details });
}
