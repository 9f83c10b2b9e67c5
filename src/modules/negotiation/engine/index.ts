export * from './types.js';
export { roundRate, clampRate, percentageOver, formatRate } from './rate.js';
export {
  computeBand,
  assertValidPricing,
  assertValidHistory,
  urgencyFactor,
  historyFactor,
  isUrgency,
  URGENCY_FACTORS,
  HISTORY_BONUSES,
  MINIMUM_RATE_FACTOR,
  AUTO_ACCEPT_FACTOR,
} from './thresholds.js';
export { decide, counterOfferFor, DEFAULT_MAX_ROUNDS } from './decide.js';
export {
  nextRound,
  isTerminal,
  finalStatusFor,
  remainingRounds,
  assertRoundInRange,
  assertNextRound,
} from './rounds.js';
export { describeDecision } from './messages.js';
export type { CarrierMessage } from './messages.js';
