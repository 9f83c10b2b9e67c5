import { QueryTypes, UniqueConstraintError } from 'sequelize';
import { validate as isUuid } from 'uuid';
import models, { sequelize } from '../../models/index.js';
import type { NegotiationRound } from '../../models/negotiationRound.js';
import type { NegotiationSessionClosure } from '../../models/negotiationSessionClosure.js';
import type {
  CarrierHistoryFactors,
  LoadPricing,
  NegotiationRoundRecord,
  SessionClosureRecord,
} from './engine/types.js';
import {
  CarrierHistorySource,
  LoadPricingSource,
  NegotiationRoundStore,
  RoundAlreadyRecordedError,
  RoundPage,
  SessionAlreadyClosedError,
} from './negotiation.types.js';

const toNumber = (value: number | string): number => Number(value);

const toRoundRecord = (row: NegotiationRound): NegotiationRoundRecord => ({
  negotiationId: row.negotiationId,
  sessionId: row.sessionId,
  loadId: row.loadId,
  carrierId: row.carrierId,
  roundNumber: row.roundNumber,
  carrierOffer: toNumber(row.carrierOffer),
  systemResponse: row.systemResponse,
  counterOffer: row.counterOffer === null ? null : toNumber(row.counterOffer),
  finalStatus: row.finalStatus,
  loadboardRate: toNumber(row.loadboardRate),
  minimumRate: toNumber(row.minimumRate),
  autoAcceptRate: toNumber(row.autoAcceptRate),
  maximumRate: toNumber(row.maximumRate),
  decisionFactors: row.decisionFactors,
  messageToCarrier: row.messageToCarrier,
  justification: row.justification,
  createdAt: row.createdAt,
});

const toClosureRecord = (row: NegotiationSessionClosure): SessionClosureRecord => ({
  sessionId: row.sessionId,
  finalStatus: row.finalStatus,
  reason: row.reason,
  closedAt: row.closedAt,
});

/**
 * PostgreSQL-backed round store. Rows are only ever inserted.
 */
export const roundStore: NegotiationRoundStore = {
  findRound: async (sessionId, roundNumber) => {
    const row = await models.NegotiationRound.findOne({ where: { sessionId, roundNumber } });
    return row ? toRoundRecord(row) : null;
  },

  findLatestRound: async (sessionId) => {
    const row = await models.NegotiationRound.findOne({
      where: { sessionId },
      order: [['roundNumber', 'DESC']],
    });
    return row ? toRoundRecord(row) : null;
  },

  listSessionRounds: async (sessionId) => {
    const rows = await models.NegotiationRound.findAll({
      where: { sessionId },
      order: [['roundNumber', 'ASC']],
    });
    return rows.map(toRoundRecord);
  },

  listLoadRounds: async (loadId, { limit, offset }): Promise<RoundPage> => {
    const { rows, count } = await models.NegotiationRound.findAndCountAll({
      where: { loadId },
      order: [
        ['createdAt', 'DESC'],
        ['roundNumber', 'DESC'],
      ],
      limit,
      offset,
    });
    return { rows: rows.map(toRoundRecord), count };
  },

  insertRound: async (round) => {
    try {
      const row = await models.NegotiationRound.create({ ...round });
      return toRoundRecord(row);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new RoundAlreadyRecordedError(round.sessionId, round.roundNumber);
      }
      throw error;
    }
  },

  findClosure: async (sessionId) => {
    const row = await models.NegotiationSessionClosure.findByPk(sessionId);
    return row ? toClosureRecord(row) : null;
  },

  insertClosure: async (closure) => {
    try {
      const row = await models.NegotiationSessionClosure.create({ ...closure });
      return toClosureRecord(row);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new SessionAlreadyClosedError(closure.sessionId);
      }
      throw error;
    }
  },

  listStaleSessions: async (before) => {
    const rows = await sequelize.query<{ sessionId: string }>(
      `SELECT r.session_id AS "sessionId"
         FROM negotiation_rounds r
         LEFT JOIN negotiation_session_closures c ON c.session_id = r.session_id
        WHERE c.session_id IS NULL
        GROUP BY r.session_id
       HAVING MAX(r.created_at) < :before
          AND BOOL_AND(r.final_status IS NULL)`,
      { replacements: { before }, type: QueryTypes.SELECT }
    );
    return rows.map((row) => row.sessionId);
  },
};

export const loadPricingSource: LoadPricingSource = {
  getLoadPricing: async (loadId): Promise<LoadPricing | null> => {
    // Callers may pass either the row id or the load board reference number
    const load = await models.Load.findOne({
      where: isUuid(loadId) ? { id: loadId } : { referenceNumber: loadId },
    });
    if (!load) return null;
    return {
      baseRate: toNumber(load.loadboardRate),
      fuelSurcharge: toNumber(load.fuelSurcharge),
      urgency: load.urgency,
    };
  },
};

export const carrierHistorySource: CarrierHistorySource = {
  getCarrierHistory: async (carrierId): Promise<CarrierHistoryFactors | null> => {
    const carrier = await models.Carrier.findOne({
      where: isUuid(carrierId) ? { id: carrierId } : { mcNumber: carrierId },
    });
    if (!carrier) return null;
    return {
      totalPriorLoads: carrier.totalPriorLoads,
      averageRating: carrier.averageRating === null ? null : toNumber(carrier.averageRating),
    };
  },
};

export default { roundStore, loadPricingSource, carrierHistorySource };
