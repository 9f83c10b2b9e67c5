import { v4 as uuidv4 } from 'uuid';
import logger from '../../config/logger.js';
import {
  ConflictError,
  DuplicateRoundConflictError,
  InvalidOfferError,
  NegotiationErrorCode,
  NotFoundError,
} from '../../utils/custom-error.js';
import {
  MAX_RATE,
  NegotiationRoundRecord,
  PriceBand,
  SessionClosureRecord,
  assertNextRound,
  assertRoundInRange,
  assertValidPricing,
  computeBand,
  decide,
  describeDecision,
  DEFAULT_MAX_ROUNDS,
  finalStatusFor,
  isTerminal,
  percentageOver,
  remainingRounds,
  roundRate,
} from './engine/index.js';
import {
  CarrierHistorySource,
  CloseSessionInput,
  EvaluateRoundInput,
  EvaluateRoundResponse,
  EvaluatedRound,
  LoadPricingSource,
  NegotiationRoundStore,
  NextSteps,
  PaginatedRounds,
  PriceBandQuote,
  RoundAlreadyRecordedError,
  SessionAlreadyClosedError,
  SessionSummary,
} from './negotiation.types.js';

export interface NegotiationServiceDeps {
  store: NegotiationRoundStore;
  loads: LoadPricingSource;
  carriers: CarrierHistorySource;
  maxRounds?: number;
  now?: () => Date;
  generateId?: () => string;
}

export interface NegotiationService {
  readonly maxRounds: number;
  evaluateRound(input: EvaluateRoundInput): Promise<EvaluatedRound>;
  getSession(sessionId: string): Promise<SessionSummary>;
  closeSession(input: CloseSessionInput): Promise<SessionClosureRecord>;
  listLoadRounds(loadId: string, page?: number | string, limit?: number | string): Promise<PaginatedRounds>;
  quoteBand(loadId: string, carrierId?: string | null): Promise<PriceBandQuote>;
  expireStaleSessions(olderThanMinutes: number): Promise<number>;
}

/**
 * Offers are whole cents. A sub-cent amount is refused rather than rounded, so
 * an offer above the maximum can never round down into it.
 */
const assertValidOffer = (carrierOffer: number): number => {
  if (!Number.isFinite(carrierOffer) || carrierOffer <= 0 || carrierOffer > MAX_RATE) {
    throw new InvalidOfferError(`Carrier offer must be between 0.01 and ${MAX_RATE}`, { carrierOffer });
  }
  if (roundRate(carrierOffer) !== carrierOffer) {
    throw new InvalidOfferError('Carrier offer cannot have more than 2 decimal places', { carrierOffer });
  }
  return carrierOffer;
};

const assertSameLoad = (round: NegotiationRoundRecord, loadId: string): void => {
  if (round.loadId !== loadId) {
    throw new ConflictError(
      `Session ${round.sessionId} belongs to load ${round.loadId}`,
      { sessionId: round.sessionId, loadId, sessionLoadId: round.loadId },
      NegotiationErrorCode.SESSION_LOAD_MISMATCH
    );
  }
};

/**
 * Negotiation Session
 *
 * Orchestrates one evaluation per call: round checks, band, decision, and the
 * append-only write. Holds no state between calls; the store's uniqueness on
 * (sessionId, roundNumber) is the serialization point, and a resubmitted
 * identical round is answered from storage.
 */
export function createNegotiationService(deps: NegotiationServiceDeps): NegotiationService {
  const { store, loads, carriers } = deps;
  const maxRounds = deps.maxRounds ?? DEFAULT_MAX_ROUNDS;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? (() => uuidv4());

  const replayOrConflict = (
    existing: NegotiationRoundRecord,
    input: EvaluateRoundInput,
    offer: number
  ): EvaluatedRound => {
    assertSameLoad(existing, input.loadId);
    if (existing.carrierOffer !== offer) {
      throw new DuplicateRoundConflictError(
        input.sessionId,
        input.roundNumber,
        existing.carrierOffer,
        offer
      );
    }
    logger.info('Negotiation round replayed', {
      sessionId: existing.sessionId,
      roundNumber: existing.roundNumber,
      response: existing.systemResponse,
    });
    return { round: existing, replayed: true };
  };

  const loadBand = async (loadId: string, carrierId: string | null): Promise<PriceBand> => {
    const pricing = await loads.getLoadPricing(loadId);
    if (!pricing) {
      throw new NotFoundError(`Load ${loadId} not found`, NegotiationErrorCode.LOAD_NOT_FOUND);
    }
    // Unknown carriers negotiate with neutral history
    const history = carrierId ? await carriers.getCarrierHistory(carrierId) : null;
    return computeBand(assertValidPricing(pricing), history);
  };

  const buildRound = (
    input: EvaluateRoundInput,
    offer: number,
    band: PriceBand,
    negotiationId: string
  ): NegotiationRoundRecord => {
    const decision = decide(offer, band, input.roundNumber, maxRounds);
    const { messageToCarrier, justification } = describeDecision(decision, offer, band);

    return {
      negotiationId,
      sessionId: input.sessionId,
      loadId: input.loadId,
      carrierId: input.carrierId ?? null,
      roundNumber: input.roundNumber,
      carrierOffer: offer,
      systemResponse: decision.response,
      counterOffer: decision.counterOffer,
      finalStatus: finalStatusFor(input.roundNumber, decision.response, maxRounds),
      loadboardRate: band.effectiveRate,
      minimumRate: band.minimumRate,
      autoAcceptRate: band.autoAcceptRate,
      maximumRate: band.maximumRate,
      decisionFactors: {
        urgencyFactor: band.urgencyFactor,
        historyFactor: band.historyFactor,
        rateDifference: roundRate(offer - band.effectiveRate),
        percentageOverLoadboard: percentageOver(offer, band.effectiveRate),
      },
      messageToCarrier,
      justification,
      createdAt: now(),
    };
  };

  const evaluateRound = async (input: EvaluateRoundInput): Promise<EvaluatedRound> => {
    assertRoundInRange(input.roundNumber, maxRounds);
    const offer = assertValidOffer(input.carrierOffer);

    const existing = await store.findRound(input.sessionId, input.roundNumber);
    if (existing) {
      return replayOrConflict(existing, input, offer);
    }

    const [latest, closure] = await Promise.all([
      store.findLatestRound(input.sessionId),
      store.findClosure(input.sessionId),
    ]);
    if (latest) {
      assertSameLoad(latest, input.loadId);
    }
    assertNextRound(input.sessionId, input.roundNumber, latest, closure, maxRounds);

    const band = await loadBand(input.loadId, input.carrierId ?? null);
    const round = buildRound(input, offer, band, latest?.negotiationId ?? generateId());

    try {
      const saved = await store.insertRound(round);
      logger.info('Negotiation round evaluated', {
        sessionId: saved.sessionId,
        loadId: saved.loadId,
        roundNumber: saved.roundNumber,
        carrierOffer: saved.carrierOffer,
        response: saved.systemResponse,
        counterOffer: saved.counterOffer,
        finalStatus: saved.finalStatus,
      });
      return { round: saved, replayed: false };
    } catch (error) {
      if (!(error instanceof RoundAlreadyRecordedError)) {
        throw error;
      }
      // Lost a race for this round; answer from whichever write won
      const winner = await store.findRound(input.sessionId, input.roundNumber);
      if (!winner) {
        throw error;
      }
      return replayOrConflict(winner, input, offer);
    }
  };

  const getSession = async (sessionId: string): Promise<SessionSummary> => {
    const [rounds, closure] = await Promise.all([
      store.listSessionRounds(sessionId),
      store.findClosure(sessionId),
    ]);
    const latest = rounds[rounds.length - 1];
    if (!latest) {
      throw new NotFoundError(`Session ${sessionId} not found`, NegotiationErrorCode.SESSION_NOT_FOUND);
    }

    const status = latest.finalStatus ?? closure?.finalStatus ?? 'ACTIVE';
    const lastCounter = [...rounds].reverse().find((round) => round.counterOffer !== null);

    return {
      sessionId,
      negotiationId: latest.negotiationId,
      loadId: latest.loadId,
      carrierId: latest.carrierId,
      status,
      currentRound: latest.roundNumber,
      remainingRounds:
        status === 'ACTIVE'
          ? remainingRounds(latest.roundNumber, latest.systemResponse, maxRounds)
          : 0,
      agreedRate: latest.systemResponse === 'ACCEPTED' ? latest.carrierOffer : null,
      lastCounterOffer: lastCounter?.counterOffer ?? null,
      rounds,
      closure,
    };
  };

  const closeSession = async (input: CloseSessionInput): Promise<SessionClosureRecord> => {
    const latest = await store.findLatestRound(input.sessionId);
    if (!latest) {
      throw new NotFoundError(
        `Session ${input.sessionId} not found`,
        NegotiationErrorCode.SESSION_NOT_FOUND
      );
    }
    if (isTerminal(latest.roundNumber, latest.systemResponse, maxRounds)) {
      throw new ConflictError(
        `Session ${input.sessionId} already ended as ${latest.finalStatus}`,
        { sessionId: input.sessionId, finalStatus: latest.finalStatus },
        NegotiationErrorCode.SESSION_ALREADY_CLOSED
      );
    }

    const matchExisting = (existing: SessionClosureRecord): SessionClosureRecord => {
      if (existing.finalStatus !== input.status) {
        throw new ConflictError(
          `Session ${input.sessionId} was already closed as ${existing.finalStatus}`,
          { sessionId: input.sessionId, finalStatus: existing.finalStatus },
          NegotiationErrorCode.SESSION_ALREADY_CLOSED
        );
      }
      return existing;
    };

    const existing = await store.findClosure(input.sessionId);
    if (existing) {
      return matchExisting(existing);
    }

    try {
      const closure = await store.insertClosure({
        sessionId: input.sessionId,
        finalStatus: input.status,
        reason: input.reason ?? null,
        closedAt: now(),
      });
      logger.info('Negotiation session closed', {
        sessionId: closure.sessionId,
        finalStatus: closure.finalStatus,
        reason: closure.reason,
      });
      return closure;
    } catch (error) {
      if (!(error instanceof SessionAlreadyClosedError)) {
        throw error;
      }
      const winner = await store.findClosure(input.sessionId);
      if (!winner) {
        throw error;
      }
      return matchExisting(winner);
    }
  };

  const listLoadRounds = async (
    loadId: string,
    page: number | string = 1,
    limit: number | string = 10
  ): Promise<PaginatedRounds> => {
    const parsedPage = Number.parseInt(String(page), 10) || 1;
    const parsedLimit = Number.parseInt(String(limit), 10) || 10;
    const offset = (parsedPage - 1) * parsedLimit;

    const { rows, count } = await store.listLoadRounds(loadId, { limit: parsedLimit, offset });
    return {
      data: rows,
      total: count,
      page: parsedPage,
      totalPages: Math.ceil(count / parsedLimit),
    };
  };

  const quoteBand = async (loadId: string, carrierId?: string | null): Promise<PriceBandQuote> => {
    const band = await loadBand(loadId, carrierId ?? null);
    return { loadId, carrierId: carrierId ?? null, ...band };
  };

  const expireStaleSessions = async (olderThanMinutes: number): Promise<number> => {
    const cutoff = new Date(now().getTime() - olderThanMinutes * 60 * 1000);
    const sessionIds = await store.listStaleSessions(cutoff);
    let closed = 0;

    for (const sessionId of sessionIds) {
      try {
        await closeSession({
          sessionId,
          status: 'TIMEOUT',
          reason: `No activity for ${olderThanMinutes} minutes`,
        });
        closed += 1;
      } catch (error) {
        logger.error(`Failed to time out session ${sessionId}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return closed;
  };

  return {
    maxRounds,
    evaluateRound,
    getSession,
    closeSession,
    listLoadRounds,
    quoteBand,
    expireStaleSessions,
  };
}

/**
 * Shape a stored round for the calling agent.
 */
export function toEvaluateRoundResponse(
  round: NegotiationRoundRecord,
  maxRounds: number
): EvaluateRoundResponse {
  let nextSteps: NextSteps;
  if (round.systemResponse === 'ACCEPTED') {
    nextSteps = {
      action: 'PROCEED_TO_BOOKING',
      handoffData: {
        loadId: round.loadId,
        carrierId: round.carrierId,
        agreedRate: round.carrierOffer,
      },
    };
  } else if (round.finalStatus) {
    nextSteps = { action: 'END_NEGOTIATION', reason: 'Offer exceeds maximum acceptable rate' };
  } else {
    nextSteps = { action: 'CONTINUE_NEGOTIATION' };
  }

  return {
    negotiationId: round.negotiationId,
    sessionId: round.sessionId,
    loadId: round.loadId,
    carrierId: round.carrierId,
    roundNumber: round.roundNumber,
    carrierOffer: round.carrierOffer,
    response: round.systemResponse,
    ...(round.counterOffer !== null ? { counterOffer: round.counterOffer } : {}),
    ...(round.finalStatus !== null ? { finalStatus: round.finalStatus } : {}),
    remainingRounds: remainingRounds(round.roundNumber, round.systemResponse, maxRounds),
    message: round.messageToCarrier,
    justification: round.justification,
    rateDifference: round.decisionFactors.rateDifference,
    percentageOverLoadboard: round.decisionFactors.percentageOverLoadboard,
    nextSteps,
    createdAt: round.createdAt.toISOString(),
  };
}
