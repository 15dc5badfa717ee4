/**
 * Service exports for the access decision engine
 */

export * from './dynamodb.service';
export * from './security-logger.service';
export * from './geolocation.service';
export * from './device.service';
export * from './risk-scorer.service';
export * from './policy-resolver.service';
export * from './policy-admin.service';
export * from './threat-intelligence.service';
export * from './stepup-challenge.service';
export * from './session-monitor.service';
export * from './access-decision.service';
