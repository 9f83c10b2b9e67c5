import { Router } from 'express';
import { createHealthRouter } from '../modules/health/health.routes.js';
import type { HealthService } from '../modules/health/health.service.js';
import { createNegotiationRouter } from '../modules/negotiation/negotiation.routes.js';
import type { NegotiationService } from '../modules/negotiation/negotiation.service.js';

export interface ApiDependencies {
  negotiationService: NegotiationService;
  healthService?: HealthService;
}

export const createApiRouter = ({ negotiationService, healthService }: ApiDependencies): Router => {
  const router = Router();

  router.use('/health', createHealthRouter(healthService));
  router.use('/negotiations', createNegotiationRouter(negotiationService));

  return router;
};

export default createApiRouter;
