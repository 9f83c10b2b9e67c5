import { z } from 'zod';

export const URGENCY_TIERS = ['LOW', 'NORMAL', 'HIGH', 'CRITICAL'] as const;
export type Urgency = (typeof URGENCY_TIERS)[number];

export const SYSTEM_RESPONSES = ['ACCEPTED', 'COUNTER_OFFER', 'REJECTED'] as const;
export type SystemResponse = (typeof SYSTEM_RESPONSES)[number];

/**
 * Terminal outcome of a session. DEAL_* come from the deciding round,
 * ABANDONED and TIMEOUT from a session closure.
 */
export const FINAL_STATUSES = ['DEAL_ACCEPTED', 'DEAL_REJECTED', 'ABANDONED', 'TIMEOUT'] as const;
export type FinalStatus = (typeof FINAL_STATUSES)[number];

export const CLOSURE_STATUSES = ['ABANDONED', 'TIMEOUT'] as const;
export type ClosureStatus = (typeof CLOSURE_STATUSES)[number];

/** Longest session, load or carrier identifier accepted and stored. */
export const IDENTIFIER_MAX_LENGTH = 100;

/** Highest rate the engine will price or accept. */
export const MAX_RATE = 999_999.99;

export const LoadPricingSchema = z.object({
  baseRate: z.number().finite().positive().max(MAX_RATE),
  fuelSurcharge: z.number().finite().nonnegative().max(MAX_RATE),
  urgency: z.enum(URGENCY_TIERS),
});
export type LoadPricing = z.infer<typeof LoadPricingSchema>;

/** Pricing as a load record holds it, before the urgency tier is checked. */
export const RawLoadPricingSchema = LoadPricingSchema.extend({ urgency: z.string() });
export type RawLoadPricing = z.infer<typeof RawLoadPricingSchema>;

export const CarrierHistoryFactorsSchema = z.object({
  totalPriorLoads: z.number().int().nonnegative(),
  averageRating: z.number().min(0).max(5).nullable(),
});
export type CarrierHistoryFactors = z.infer<typeof CarrierHistoryFactorsSchema>;

export interface PriceBand {
  effectiveRate: number;
  minimumRate: number;
  autoAcceptRate: number;
  maximumRate: number;
  urgencyFactor: number;
  historyFactor: number;
}

export type DecisionReason = 'AUTO_ACCEPT' | 'WITHIN_MAXIMUM' | 'ROUNDS_EXHAUSTED' | 'COUNTER';

export interface Decision {
  response: SystemResponse;
  counterOffer: number | null;
  reason: DecisionReason;
}

export interface DecisionFactors {
  urgencyFactor: number;
  historyFactor: number;
  rateDifference: number;
  percentageOverLoadboard: number;
}

/**
 * One evaluated round. Written once, never updated.
 */
export interface NegotiationRoundRecord {
  negotiationId: string;
  sessionId: string;
  loadId: string;
  carrierId: string | null;
  roundNumber: number;
  carrierOffer: number;
  systemResponse: SystemResponse;
  counterOffer: number | null;
  finalStatus: FinalStatus | null;
  loadboardRate: number;
  minimumRate: number;
  autoAcceptRate: number;
  maximumRate: number;
  decisionFactors: DecisionFactors;
  messageToCarrier: string;
  justification: string;
  createdAt: Date;
}

export interface SessionClosureRecord {
  sessionId: string;
  finalStatus: ClosureStatus;
  reason: string | null;
  closedAt: Date;
}
