import { InvalidPricingError, InvalidUrgencyError } from '../../../utils/custom-error.js';
import {
  CarrierHistoryFactors,
  CarrierHistoryFactorsSchema,
  LoadPricing,
  RawLoadPricingSchema,
  PriceBand,
  URGENCY_TIERS,
  Urgency,
} from './types.js';
import { roundRate } from './rate.js';

/**
 * Threshold Calculator
 *
 * Derives the negotiable price band for a load:
 * - minimum    = effective * 0.95
 * - autoAccept = effective * 1.02
 * - maximum    = effective * urgencyFactor * historyFactor
 *
 * where effective = baseRate + fuelSurcharge.
 */

export const MINIMUM_RATE_FACTOR = 0.95;
export const AUTO_ACCEPT_FACTOR = 1.02;

export const URGENCY_FACTORS: Readonly<Record<Urgency, number>> = {
  CRITICAL: 1.15,
  HIGH: 1.1,
  NORMAL: 1.05,
  LOW: 1.0,
};

/**
 * Additive history bonuses. Each rule applies at most once; matched bonuses are
 * summed onto a 1.00 base.
 */
export const HISTORY_BONUSES: ReadonlyArray<{
  label: string;
  bonus: number;
  applies: (history: CarrierHistoryFactors) => boolean;
}> = [
  { label: 'experienced', bonus: 0.05, applies: (h) => h.totalPriorLoads > 10 },
  {
    label: 'top-rated',
    bonus: 0.02,
    applies: (h) => h.averageRating !== null && h.averageRating > 4.5,
  },
];

export function isUrgency(value: unknown): value is Urgency {
  return typeof value === 'string' && (URGENCY_TIERS as readonly string[]).includes(value);
}

export function urgencyFactor(urgency: unknown): number {
  if (!isUrgency(urgency)) {
    throw new InvalidUrgencyError(urgency);
  }
  return URGENCY_FACTORS[urgency];
}

export function historyFactor(history?: CarrierHistoryFactors | null): number {
  if (!history) return 1;
  const bonus = HISTORY_BONUSES.filter((rule) => rule.applies(history)).reduce(
    (sum, rule) => sum + rule.bonus,
    0
  );
  // 1 + 0.05 + 0.02 carries float noise; factors are quoted to 2 decimals
  return roundRate(1 + bonus);
}

/**
 * Validate a pricing snapshot from the load collaborator.
 */
export function assertValidPricing(pricing: unknown): LoadPricing {
  const parsed = RawLoadPricingSchema.safeParse(pricing);
  if (!parsed.success) {
    throw new InvalidPricingError(
      'Load pricing is malformed',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const { urgency } = parsed.data;
  if (!isUrgency(urgency)) {
    throw new InvalidUrgencyError(urgency);
  }
  return { ...parsed.data, urgency };
}

export function assertValidHistory(history: unknown): CarrierHistoryFactors | null {
  if (history === null || history === undefined) return null;
  const parsed = CarrierHistoryFactorsSchema.safeParse(history);
  if (!parsed.success) {
    throw new InvalidPricingError(
      'Carrier history factors are malformed',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function computeBand(
  pricing: LoadPricing,
  history?: CarrierHistoryFactors | null
): PriceBand {
  const valid = assertValidPricing(pricing);
  const effectiveRate = valid.baseRate + valid.fuelSurcharge;
  const uFactor = urgencyFactor(valid.urgency);
  const hFactor = historyFactor(assertValidHistory(history));

  const minimumRate = roundRate(effectiveRate * MINIMUM_RATE_FACTOR);
  const autoAcceptRate = roundRate(effectiveRate * AUTO_ACCEPT_FACTOR);
  // LOW urgency with neutral history prices the ceiling under the auto-accept
  // point; the ceiling never sits below it.
  const maximumRate = Math.max(roundRate(effectiveRate * uFactor * hFactor), autoAcceptRate);

  return {
    effectiveRate: roundRate(effectiveRate),
    minimumRate,
    autoAcceptRate,
    maximumRate,
    urgencyFactor: uFactor,
    historyFactor: hFactor,
  };
}
