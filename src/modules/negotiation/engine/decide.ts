import { InvalidOfferError, InvalidRoundError } from '../../../utils/custom-error.js';
import { Decision, PriceBand } from './types.js';
import { clampRate, roundRate } from './rate.js';

export const DEFAULT_MAX_ROUNDS = 3;

/**
 * Decision Policy
 *
 * Evaluated in order, first match wins:
 * 1. offer <= autoAcceptRate           -> ACCEPTED
 * 2. offer <= maximumRate              -> ACCEPTED
 * 3. roundNumber >= maxRounds          -> REJECTED
 * 4. otherwise                         -> COUNTER_OFFER at the midpoint of
 *    maximumRate and the offer, clamped to [minimumRate, maximumRate]
 *
 * Offers under minimumRate fall under autoAcceptRate and are accepted.
 */
export function decide(
  carrierOffer: number,
  band: PriceBand,
  roundNumber: number,
  maxRounds: number = DEFAULT_MAX_ROUNDS
): Decision {
  if (!Number.isFinite(carrierOffer) || carrierOffer <= 0) {
    throw new InvalidOfferError('Carrier offer must be a positive amount', { carrierOffer });
  }
  if (!Number.isInteger(roundNumber) || roundNumber < 1) {
    throw new InvalidRoundError('Round number must be a positive integer', { roundNumber });
  }

  if (carrierOffer <= band.autoAcceptRate) {
    return { response: 'ACCEPTED', counterOffer: null, reason: 'AUTO_ACCEPT' };
  }

  if (carrierOffer <= band.maximumRate) {
    return { response: 'ACCEPTED', counterOffer: null, reason: 'WITHIN_MAXIMUM' };
  }

  if (roundNumber >= maxRounds) {
    return { response: 'REJECTED', counterOffer: null, reason: 'ROUNDS_EXHAUSTED' };
  }

  return {
    response: 'COUNTER_OFFER',
    counterOffer: counterOfferFor(carrierOffer, band),
    reason: 'COUNTER',
  };
}

export function counterOfferFor(carrierOffer: number, band: PriceBand): number {
  const midpoint = roundRate((band.maximumRate + carrierOffer) / 2);
  return clampRate(midpoint, band.minimumRate, band.maximumRate);
}
