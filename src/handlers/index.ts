/**
 * Handler exports for the access decision engine
 */

export { handler as sessionSweepJobHandler } from './session-sweep-job.handler';
