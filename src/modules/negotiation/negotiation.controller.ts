import { Request, Response, NextFunction } from 'express';
import { NegotiationService, toEvaluateRoundResponse } from './negotiation.service.js';
import type { ClosureStatus } from './engine/types.js';

export interface NegotiationController {
  evaluateOffer(req: Request, res: Response, next: NextFunction): Promise<void>;
  getSession(req: Request, res: Response, next: NextFunction): Promise<void>;
  closeSession(req: Request, res: Response, next: NextFunction): Promise<void>;
  getLoadRounds(req: Request, res: Response, next: NextFunction): Promise<void>;
  getPriceBand(req: Request, res: Response, next: NextFunction): Promise<void>;
}

const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

const queryNumber = (value: unknown): number | string | undefined =>
  typeof value === 'number' || typeof value === 'string' ? value : undefined;

export const createNegotiationController = (service: NegotiationService): NegotiationController => ({
  /**
   * A first evaluation answers 201; a replayed round answers 200 with the
   * stored decision.
   */
  async evaluateOffer(req, res, next) {
    try {
      const { round, replayed } = await service.evaluateRound(req.body);
      res.status(replayed ? 200 : 201).json({
        message: replayed ? 'Negotiation round already recorded' : 'Negotiation round evaluated',
        data: toEvaluateRoundResponse(round, service.maxRounds),
      });
    } catch (error) {
      next(error);
    }
  },

  async getSession(req, res, next) {
    try {
      const data = await service.getSession(req.params.sessionId);
      res.status(200).json({ message: 'Negotiation session', data });
    } catch (error) {
      next(error);
    }
  },

  async closeSession(req, res, next) {
    try {
      const { status, reason }: { status: ClosureStatus; reason?: string | null } = req.body;
      const data = await service.closeSession({
        sessionId: req.params.sessionId,
        status,
        reason: reason || null,
      });
      res.status(200).json({ message: 'Negotiation session closed', data });
    } catch (error) {
      next(error);
    }
  },

  async getLoadRounds(req, res, next) {
    try {
      const data = await service.listLoadRounds(
        req.params.loadId,
        queryNumber(req.query.page),
        queryNumber(req.query.limit)
      );
      res.status(200).json({ message: 'Negotiation rounds', ...data });
    } catch (error) {
      next(error);
    }
  },

  async getPriceBand(req, res, next) {
    try {
      const data = await service.quoteBand(req.params.loadId, queryString(req.query.carrierId));
      res.status(200).json({ message: 'Price band', data });
    } catch (error) {
      next(error);
    }
  },
});
