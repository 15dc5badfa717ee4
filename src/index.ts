/**
 * adaptive-access-engine
 *
 * Risk scoring, policy resolution, continuous session reevaluation and IP
 * reputation for authenticated traffic.
 */

export * from './config/engine.config';
export * from './models';
export * from './repositories';
export * from './services';
export * from './handlers';
export * from './utils/errors';
export * from './utils/result';
