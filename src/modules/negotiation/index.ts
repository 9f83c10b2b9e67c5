export { createNegotiationService, toEvaluateRoundResponse } from './negotiation.service.js';
export type { NegotiationService, NegotiationServiceDeps } from './negotiation.service.js';
export { createNegotiationRouter } from './negotiation.routes.js';
export {
  startSessionTimeoutScheduler,
  stopSessionTimeoutScheduler,
  isSessionTimeoutSchedulerRunning,
  triggerSessionTimeoutSweep,
} from './scheduler/sessionTimeout.js';
export * from './negotiation.types.js';
export * from './engine/index.js';
