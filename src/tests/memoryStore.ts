import type {
  CarrierHistoryFactors,
  LoadPricing,
  NegotiationRoundRecord,
  RawLoadPricing,
  SessionClosureRecord,
} from '../modules/negotiation/engine/types.js';
import { assertValidPricing } from '../modules/negotiation/engine/thresholds.js';
import {
  CarrierHistorySource,
  LoadPricingSource,
  NegotiationRoundStore,
  RoundAlreadyRecordedError,
  RoundPage,
  SessionAlreadyClosedError,
} from '../modules/negotiation/negotiation.types.js';

/**
 * In-process stand-in for the PostgreSQL round store. Enforces the same
 * uniqueness on (sessionId, roundNumber) and on closures.
 */
export class MemoryRoundStore implements NegotiationRoundStore {
  readonly rounds: NegotiationRoundRecord[] = [];
  readonly closures = new Map<string, SessionClosureRecord>();

  async findRound(sessionId: string, roundNumber: number): Promise<NegotiationRoundRecord | null> {
    return (
      this.rounds.find((round) => round.sessionId === sessionId && round.roundNumber === roundNumber) ??
      null
    );
  }

  async findLatestRound(sessionId: string): Promise<NegotiationRoundRecord | null> {
    const rounds = await this.listSessionRounds(sessionId);
    return rounds[rounds.length - 1] ?? null;
  }

  async listSessionRounds(sessionId: string): Promise<NegotiationRoundRecord[]> {
    return this.rounds
      .filter((round) => round.sessionId === sessionId)
      .sort((a, b) => a.roundNumber - b.roundNumber);
  }

  async listLoadRounds(
    loadId: string,
    { limit, offset }: { limit: number; offset: number }
  ): Promise<RoundPage> {
    const matching = this.rounds
      .filter((round) => round.loadId === loadId)
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || b.roundNumber - a.roundNumber
      );
    return { rows: matching.slice(offset, offset + limit), count: matching.length };
  }

  async insertRound(round: NegotiationRoundRecord): Promise<NegotiationRoundRecord> {
    if (await this.findRound(round.sessionId, round.roundNumber)) {
      throw new RoundAlreadyRecordedError(round.sessionId, round.roundNumber);
    }
    const stored = { ...round, decisionFactors: { ...round.decisionFactors } };
    this.rounds.push(stored);
    return stored;
  }

  async findClosure(sessionId: string): Promise<SessionClosureRecord | null> {
    return this.closures.get(sessionId) ?? null;
  }

  async insertClosure(closure: SessionClosureRecord): Promise<SessionClosureRecord> {
    if (this.closures.has(closure.sessionId)) {
      throw new SessionAlreadyClosedError(closure.sessionId);
    }
    this.closures.set(closure.sessionId, { ...closure });
    return closure;
  }

  async listStaleSessions(before: Date): Promise<string[]> {
    const latestBySession = new Map<string, NegotiationRoundRecord>();
    const finished = new Set<string>();
    for (const round of this.rounds) {
      if (round.finalStatus !== null) finished.add(round.sessionId);
      const latest = latestBySession.get(round.sessionId);
      if (!latest || round.createdAt > latest.createdAt) {
        latestBySession.set(round.sessionId, round);
      }
    }
    return [...latestBySession.values()]
      .filter(
        (round) =>
          !finished.has(round.sessionId) &&
          !this.closures.has(round.sessionId) &&
          round.createdAt < before
      )
      .map((round) => round.sessionId);
  }
}

/**
 * Holds pricing the way a load record does; the urgency tier is checked on
 * the way out, as the database enum would.
 */
export class MemoryLoadSource implements LoadPricingSource {
  constructor(private readonly loads: Record<string, RawLoadPricing> = {}) {}

  set(loadId: string, pricing: RawLoadPricing): void {
    this.loads[loadId] = pricing;
  }

  async getLoadPricing(loadId: string): Promise<LoadPricing | null> {
    const pricing = this.loads[loadId];
    return pricing ? assertValidPricing(pricing) : null;
  }
}

export class MemoryCarrierSource implements CarrierHistorySource {
  constructor(private readonly carriers: Record<string, CarrierHistoryFactors> = {}) {}

  async getCarrierHistory(carrierId: string): Promise<CarrierHistoryFactors | null> {
    return this.carriers[carrierId] ?? null;
  }
}
