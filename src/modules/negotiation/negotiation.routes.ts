import { Router } from 'express';
import { createNegotiationController } from './negotiation.controller.js';
import type { NegotiationService } from './negotiation.service.js';
import {
  validateBody,
  validateParams,
  validateQuery,
  evaluateRoundSchema,
  closeSessionSchema,
  sessionIdSchema,
  loadIdSchema,
  loadRoundsQuerySchema,
  priceBandQuerySchema,
} from './negotiation.validator.js';

/**
 * Negotiation Module Routes
 * All routes are prefixed with /api/negotiations
 *
 * The router is built over a service so the app and the tests can supply
 * their own stores.
 */
export const createNegotiationRouter = (service: NegotiationService): Router => {
  const negotiationRouter = Router();
  const controller = createNegotiationController(service);

  /**
   * @swagger
   * /api/negotiations/evaluate:
   *   post:
   *     summary: Evaluate a carrier offer for one negotiation round
   *     tags: [Negotiation]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/EvaluateRoundRequest'
   *     responses:
   *       201:
   *         description: Round evaluated and recorded
   *       200:
   *         description: Round was already recorded; the stored decision is returned
   *       400:
   *         description: Validation error, INVALID_ROUND or INVALID_OFFER
   *       404:
   *         description: LOAD_NOT_FOUND
   *       409:
   *         description: DUPLICATE_ROUND_CONFLICT or SESSION_LOAD_MISMATCH
   *       422:
   *         description: INVALID_PRICING
   */
  negotiationRouter.post('/evaluate', validateBody(evaluateRoundSchema), controller.evaluateOffer);

  /**
   * @swagger
   * /api/negotiations/sessions/{sessionId}:
   *   get:
   *     summary: Get a negotiation session with its rounds
   *     tags: [Negotiation]
   *     parameters:
   *       - in: path
   *         name: sessionId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Session summary
   *       404:
   *         description: SESSION_NOT_FOUND
   */
  negotiationRouter.get(
    '/sessions/:sessionId',
    validateParams(sessionIdSchema),
    controller.getSession
  );

  /**
   * @swagger
   * /api/negotiations/sessions/{sessionId}/close:
   *   post:
   *     summary: Close an open session as abandoned or timed out
   *     tags: [Negotiation]
   *     parameters:
   *       - in: path
   *         name: sessionId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [status]
   *             properties:
   *               status:
   *                 type: string
   *                 enum: [ABANDONED, TIMEOUT]
   *               reason:
   *                 type: string
   *     responses:
   *       200:
   *         description: Session closed
   *       404:
   *         description: SESSION_NOT_FOUND
   *       409:
   *         description: SESSION_ALREADY_CLOSED
   */
  negotiationRouter.post(
    '/sessions/:sessionId/close',
    validateParams(sessionIdSchema),
    validateBody(closeSessionSchema),
    controller.closeSession
  );

  /**
   * @swagger
   * /api/negotiations/loads/{loadId}/rounds:
   *   get:
   *     summary: List recorded rounds for a load, newest first
   *     tags: [Negotiation]
   *     parameters:
   *       - in: path
   *         name: loadId
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: page
   *         schema:
   *           type: integer
   *           default: 1
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           default: 10
   *     responses:
   *       200:
   *         description: Paginated rounds
   */
  negotiationRouter.get(
    '/loads/:loadId/rounds',
    validateParams(loadIdSchema),
    validateQuery(loadRoundsQuerySchema),
    controller.getLoadRounds
  );

  /**
   * @swagger
   * /api/negotiations/loads/{loadId}/price-band:
   *   get:
   *     summary: Quote the negotiable price band for a load
   *     tags: [Negotiation]
   *     parameters:
   *       - in: path
   *         name: loadId
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: carrierId
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Price band
   *       404:
   *         description: LOAD_NOT_FOUND
   *       422:
   *         description: INVALID_PRICING
   */
  negotiationRouter.get(
    '/loads/:loadId/price-band',
    validateParams(loadIdSchema),
    validateQuery(priceBandQuerySchema),
    controller.getPriceBand
  );

  return negotiationRouter;
};

export default createNegotiationRouter;
