import type {
  CarrierHistoryFactors,
  ClosureStatus,
  FinalStatus,
  LoadPricing,
  NegotiationRoundRecord,
  PriceBand,
  SessionClosureRecord,
  SystemResponse,
} from './engine/types.js';

/**
 * Collaborator ports
 */

export interface LoadPricingSource {
  getLoadPricing(loadId: string): Promise<LoadPricing | null>;
}

export interface CarrierHistorySource {
  getCarrierHistory(carrierId: string): Promise<CarrierHistoryFactors | null>;
}

export interface RoundPage {
  rows: NegotiationRoundRecord[];
  count: number;
}

/**
 * Durable storage for rounds and closures. `(sessionId, roundNumber)` is unique;
 * `insertRound` throws RoundAlreadyRecordedError when the key is taken.
 */
export interface NegotiationRoundStore {
  findRound(sessionId: string, roundNumber: number): Promise<NegotiationRoundRecord | null>;
  findLatestRound(sessionId: string): Promise<NegotiationRoundRecord | null>;
  listSessionRounds(sessionId: string): Promise<NegotiationRoundRecord[]>;
  listLoadRounds(loadId: string, options: { limit: number; offset: number }): Promise<RoundPage>;
  insertRound(round: NegotiationRoundRecord): Promise<NegotiationRoundRecord>;
  findClosure(sessionId: string): Promise<SessionClosureRecord | null>;
  insertClosure(closure: SessionClosureRecord): Promise<SessionClosureRecord>;
  /** Open sessions (no final status, no closure) whose latest round is older than `before`. */
  listStaleSessions(before: Date): Promise<string[]>;
}

export class RoundAlreadyRecordedError extends Error {
  constructor(public readonly sessionId: string, public readonly roundNumber: number) {
    super(`Round ${roundNumber} of session ${sessionId} is already recorded`);
    this.name = 'RoundAlreadyRecordedError';
    Object.setPrototypeOf(this, RoundAlreadyRecordedError.prototype);
  }
}

export class SessionAlreadyClosedError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} already has a closure`);
    this.name = 'SessionAlreadyClosedError';
    Object.setPrototypeOf(this, SessionAlreadyClosedError.prototype);
  }
}

/**
 * Service input / output
 */

export interface EvaluateRoundInput {
  loadId: string;
  carrierId?: string | null;
  sessionId: string;
  carrierOffer: number;
  roundNumber: number;
}

export interface EvaluatedRound {
  round: NegotiationRoundRecord;
  /** True when the round was already recorded and is being returned as-is. */
  replayed: boolean;
}

export type SessionStatus = 'ACTIVE' | FinalStatus;

export interface SessionSummary {
  sessionId: string;
  negotiationId: string;
  loadId: string;
  carrierId: string | null;
  status: SessionStatus;
  currentRound: number;
  remainingRounds: number;
  agreedRate: number | null;
  lastCounterOffer: number | null;
  rounds: NegotiationRoundRecord[];
  closure: SessionClosureRecord | null;
}

export interface CloseSessionInput {
  sessionId: string;
  status: ClosureStatus;
  reason?: string | null;
}

export interface PaginatedRounds {
  data: NegotiationRoundRecord[];
  total: number;
  page: number;
  totalPages: number;
}

export interface PriceBandQuote extends PriceBand {
  loadId: string;
  carrierId: string | null;
}

export type NextStepAction = 'PROCEED_TO_BOOKING' | 'CONTINUE_NEGOTIATION' | 'END_NEGOTIATION';

export interface NextSteps {
  action: NextStepAction;
  handoffData?: {
    loadId: string;
    carrierId: string | null;
    agreedRate: number;
  };
  reason?: string;
}

export interface EvaluateRoundResponse {
  negotiationId: string;
  sessionId: string;
  loadId: string;
  carrierId: string | null;
  roundNumber: number;
  carrierOffer: number;
  response: SystemResponse;
  counterOffer?: number;
  finalStatus?: FinalStatus;
  remainingRounds: number;
  message: string;
  justification: string;
  rateDifference: number;
  percentageOverLoadboard: number;
  nextSteps: NextSteps;
  createdAt: string;
}
