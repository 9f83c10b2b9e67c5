import { describe, it, expect } from 'vitest';
import {
  nextRound,
  isTerminal,
  finalStatusFor,
  remainingRounds,
  assertRoundInRange,
  assertNextRound,
} from '../engine/rounds.js';
import type { NegotiationRoundRecord } from '../engine/types.js';
import { InvalidRoundError } from '../../../utils/custom-error.js';

const round = (overrides: Partial<NegotiationRoundRecord> = {}): NegotiationRoundRecord => ({
  negotiationId: 'negotiation-1',
  sessionId: 'call-1',
  loadId: 'LD-1001',
  carrierId: null,
  roundNumber: 1,
  carrierOffer: 3200,
  systemResponse: 'COUNTER_OFFER',
  counterOffer: 2940,
  finalStatus: null,
  loadboardRate: 2800,
  minimumRate: 2660,
  autoAcceptRate: 2856,
  maximumRate: 2940,
  decisionFactors: {
    urgencyFactor: 1.05,
    historyFactor: 1,
    rateDifference: 400,
    percentageOverLoadboard: 14.29,
  },
  messageToCarrier: 'I understand you need $3200.00, but the best I can do is $2940.00.',
  justification: 'Counter-offering to find middle ground',
  createdAt: new Date('2026-03-02T15:00:00.000Z'),
  ...overrides,
});

describe('Round Tracker', () => {
  it('should start at round one and advance by one', () => {
    expect(nextRound(null)).toBe(1);
    expect(nextRound({ roundNumber: 2 })).toBe(3);
  });

  it('should treat accepted, rejected and last-round responses as terminal', () => {
    expect(isTerminal(1, 'ACCEPTED', 3)).toBe(true);
    expect(isTerminal(2, 'REJECTED', 3)).toBe(true);
    expect(isTerminal(3, 'COUNTER_OFFER', 3)).toBe(true);
    expect(isTerminal(1, 'COUNTER_OFFER', 3)).toBe(false);
  });

  it('should derive the final status of a round', () => {
    expect(finalStatusFor(1, 'ACCEPTED', 3)).toBe('DEAL_ACCEPTED');
    expect(finalStatusFor(3, 'REJECTED', 3)).toBe('DEAL_REJECTED');
    expect(finalStatusFor(3, 'COUNTER_OFFER', 3)).toBe('DEAL_REJECTED');
    expect(finalStatusFor(2, 'COUNTER_OFFER', 3)).toBeNull();
  });

  it('should count remaining rounds only while the session is open', () => {
    expect(remainingRounds(1, 'COUNTER_OFFER', 3)).toBe(2);
    expect(remainingRounds(2, 'COUNTER_OFFER', 3)).toBe(1);
    expect(remainingRounds(1, 'ACCEPTED', 3)).toBe(0);
  });

  describe('assertRoundInRange', () => {
    it('should accept 1..maxRounds', () => {
      expect(() => assertRoundInRange(1, 3)).not.toThrow();
      expect(() => assertRoundInRange(3, 3)).not.toThrow();
    });

    it('should reject rounds past the limit', () => {
      expect(() => assertRoundInRange(4, 3)).toThrow('Round 4 exceeds the maximum of 3 rounds');
    });

    it('should reject zero and fractional rounds', () => {
      expect(() => assertRoundInRange(0, 3)).toThrow(InvalidRoundError);
      expect(() => assertRoundInRange(2.5, 3)).toThrow(InvalidRoundError);
    });
  });

  describe('assertNextRound', () => {
    it('should accept round one for a new session', () => {
      expect(() => assertNextRound('call-1', 1, null, null, 3)).not.toThrow();
    });

    it('should reject a skipped round', () => {
      expect(() => assertNextRound('call-1', 2, null, null, 3)).toThrow(
        'Round 2 is out of sequence for session call-1; expected round 1'
      );
      expect(() => assertNextRound('call-1', 3, round(), null, 3)).toThrow(InvalidRoundError);
    });

    it('should accept the round after an open counter', () => {
      expect(() => assertNextRound('call-1', 2, round(), null, 3)).not.toThrow();
    });

    it('should reject rounds after the session ended', () => {
      const accepted = round({
        systemResponse: 'ACCEPTED',
        counterOffer: null,
        finalStatus: 'DEAL_ACCEPTED',
      });

      expect(() => assertNextRound('call-1', 2, accepted, null, 3)).toThrow(
        'Session call-1 already ended in round 1'
      );
    });

    it('should reject rounds after the session was closed', () => {
      const closure = {
        sessionId: 'call-1',
        finalStatus: 'ABANDONED' as const,
        reason: null,
        closedAt: new Date('2026-03-02T15:10:00.000Z'),
      };

      expect(() => assertNextRound('call-1', 2, round(), closure, 3)).toThrow(
        'Session call-1 was closed as ABANDONED'
      );
    });
  });
});
