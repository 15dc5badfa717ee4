/**
 * Model exports for the access decision engine
 */

export * from './auth-context.model';
export * from './risk-assessment.model';
export * from './policy.model';
export * from './session.model';
export * from './reevaluation.model';
export * from './threat.model';
