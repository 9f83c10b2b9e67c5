import type { Decision, PriceBand } from './types.js';
import { formatRate } from './rate.js';

export interface CarrierMessage {
  messageToCarrier: string;
  justification: string;
}

/**
 * Text the voice agent reads back to the carrier, plus the audit justification.
 */
export function describeDecision(
  decision: Decision,
  carrierOffer: number,
  band: PriceBand
): CarrierMessage {
  switch (decision.reason) {
    case 'AUTO_ACCEPT':
      return {
        messageToCarrier: 'Offer accepted. Proceeding with booking.',
        justification: `Offer within auto-accept threshold (${formatRate(band.autoAcceptRate)})`,
      };
    case 'WITHIN_MAXIMUM':
      return {
        messageToCarrier: 'Offer accepted. Proceeding with booking.',
        justification: `Offer within acceptable range (max: ${formatRate(band.maximumRate)})`,
      };
    case 'ROUNDS_EXHAUSTED':
      return {
        messageToCarrier: `I'm sorry, but ${formatRate(carrierOffer)} is beyond our budget. Our maximum for this load is ${formatRate(band.maximumRate)}.`,
        justification: 'Offer exceeds maximum acceptable rate and no rounds remain',
      };
    case 'COUNTER':
      return {
        messageToCarrier: `I understand you need ${formatRate(carrierOffer)}, but the best I can do is ${formatRate(decision.counterOffer ?? band.maximumRate)}.`,
        justification: 'Counter-offering to find middle ground',
      };
  }
}
