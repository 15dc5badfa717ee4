/**
 * Repository exports for the access decision engine
 */

export * from './audit.repository';
export * from './device.repository';
export * from './policy.repository';
export * from './session.repository';
