import { describe, it, expect } from 'vitest';
import { decide, counterOfferFor } from '../engine/decide.js';
import { describeDecision } from '../engine/messages.js';
import { InvalidOfferError, InvalidRoundError } from '../../../utils/custom-error.js';
import { createMockBand } from '../../../tests/factories.js';

describe('Decision Policy', () => {
  const band = createMockBand();

  describe('decide', () => {
    it('should auto-accept at or below the auto-accept rate', () => {
      expect(decide(2800, band, 1)).toEqual({
        response: 'ACCEPTED',
        counterOffer: null,
        reason: 'AUTO_ACCEPT',
      });
      expect(decide(2856, band, 1).reason).toBe('AUTO_ACCEPT');
    });

    it('should accept offers under the minimum rate', () => {
      expect(decide(2000, band, 1)).toEqual({
        response: 'ACCEPTED',
        counterOffer: null,
        reason: 'AUTO_ACCEPT',
      });
    });

    it('should accept between auto-accept and maximum', () => {
      expect(decide(2856.01, band, 1).reason).toBe('WITHIN_MAXIMUM');
      expect(decide(2940, band, 3)).toEqual({
        response: 'ACCEPTED',
        counterOffer: null,
        reason: 'WITHIN_MAXIMUM',
      });
    });

    it('should counter above the maximum while rounds remain', () => {
      expect(decide(3200, band, 1)).toEqual({
        response: 'COUNTER_OFFER',
        counterOffer: 2940,
        reason: 'COUNTER',
      });
      expect(decide(3500, band, 2).response).toBe('COUNTER_OFFER');
    });

    it('should reject above the maximum on the last round', () => {
      expect(decide(3500, band, 3)).toEqual({
        response: 'REJECTED',
        counterOffer: null,
        reason: 'ROUNDS_EXHAUSTED',
      });
    });

    it('should honour a custom round limit', () => {
      expect(decide(3500, band, 3, 5).response).toBe('COUNTER_OFFER');
      expect(decide(3500, band, 5, 5).response).toBe('REJECTED');
      expect(decide(3500, band, 1, 1).response).toBe('REJECTED');
    });

    it('should reject non-positive offers', () => {
      expect(() => decide(0, band, 1)).toThrow(InvalidOfferError);
      expect(() => decide(-100, band, 1)).toThrow(InvalidOfferError);
      expect(() => decide(Number.NaN, band, 1)).toThrow(InvalidOfferError);
    });

    it('should reject round numbers below one', () => {
      expect(() => decide(3000, band, 0)).toThrow(InvalidRoundError);
      expect(() => decide(3000, band, 1.5)).toThrow(InvalidRoundError);
    });
  });

  describe('counterOfferFor', () => {
    it('should meet the offer halfway toward the maximum', () => {
      expect(counterOfferFor(2800, band)).toBe(2870);
    });

    it('should clamp into [minimum, maximum]', () => {
      expect(counterOfferFor(3200, band)).toBe(2940);
      expect(counterOfferFor(2000, band)).toBe(2660);
    });
  });

  describe('describeDecision', () => {
    it('should confirm an auto-accepted offer', () => {
      expect(describeDecision(decide(2800, band, 1), 2800, band)).toEqual({
        messageToCarrier: 'Offer accepted. Proceeding with booking.',
        justification: 'Offer within auto-accept threshold ($2856.00)',
      });
    });

    it('should confirm an offer within the maximum', () => {
      expect(describeDecision(decide(2900, band, 1), 2900, band)).toEqual({
        messageToCarrier: 'Offer accepted. Proceeding with booking.',
        justification: 'Offer within acceptable range (max: $2940.00)',
      });
    });

    it('should quote the counter offer', () => {
      expect(describeDecision(decide(3200, band, 1), 3200, band)).toEqual({
        messageToCarrier: 'I understand you need $3200.00, but the best I can do is $2940.00.',
        justification: 'Counter-offering to find middle ground',
      });
    });

    it('should state the maximum when rounds are exhausted', () => {
      expect(describeDecision(decide(3500, band, 3), 3500, band)).toEqual({
        messageToCarrier:
          "I'm sorry, but $3500.00 is beyond our budget. Our maximum for this load is $2940.00.",
        justification: 'Offer exceeds maximum acceptable rate and no rounds remain',
      });
    });
  });
});
