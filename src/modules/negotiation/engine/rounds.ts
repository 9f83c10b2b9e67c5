import { InvalidRoundError } from '../../../utils/custom-error.js';
import type {
  FinalStatus,
  NegotiationRoundRecord,
  SessionClosureRecord,
  SystemResponse,
} from './types.js';

/**
 * Round Tracker. Rounds run 1..maxRounds and advance by exactly one per
 * session; the session's history is the only state consulted.
 */

export function nextRound(latest: Pick<NegotiationRoundRecord, 'roundNumber'> | null): number {
  return latest ? latest.roundNumber + 1 : 1;
}

export function isTerminal(
  roundNumber: number,
  response: SystemResponse,
  maxRounds: number
): boolean {
  if (response === 'ACCEPTED' || response === 'REJECTED') return true;
  return roundNumber >= maxRounds;
}

/**
 * Final status for a freshly decided round, or null while the session can
 * continue. A counter on the last round cannot be answered, so it closes the
 * deal as rejected.
 */
export function finalStatusFor(
  roundNumber: number,
  response: SystemResponse,
  maxRounds: number
): FinalStatus | null {
  if (response === 'ACCEPTED') return 'DEAL_ACCEPTED';
  if (isTerminal(roundNumber, response, maxRounds)) return 'DEAL_REJECTED';
  return null;
}

export function remainingRounds(roundNumber: number, response: SystemResponse, maxRounds: number): number {
  return isTerminal(roundNumber, response, maxRounds) ? 0 : Math.max(0, maxRounds - roundNumber);
}

export function assertRoundInRange(roundNumber: number, maxRounds: number): void {
  if (!Number.isInteger(roundNumber) || roundNumber < 1) {
    throw new InvalidRoundError('Round number must be a positive integer', { roundNumber });
  }
  if (roundNumber > maxRounds) {
    throw new InvalidRoundError(`Round ${roundNumber} exceeds the maximum of ${maxRounds} rounds`, {
      roundNumber,
      maxRounds,
    });
  }
}

export function assertNextRound(
  sessionId: string,
  roundNumber: number,
  latest: NegotiationRoundRecord | null,
  closure: SessionClosureRecord | null,
  maxRounds: number
): void {
  if (closure) {
    throw new InvalidRoundError(`Session ${sessionId} was closed as ${closure.finalStatus}`, {
      sessionId,
      finalStatus: closure.finalStatus,
    });
  }

  if (latest && isTerminal(latest.roundNumber, latest.systemResponse, maxRounds)) {
    throw new InvalidRoundError(`Session ${sessionId} already ended in round ${latest.roundNumber}`, {
      sessionId,
      roundNumber: latest.roundNumber,
      finalStatus: latest.finalStatus,
    });
  }

  const expected = nextRound(latest);
  if (roundNumber !== expected) {
    throw new InvalidRoundError(
      `Round ${roundNumber} is out of sequence for session ${sessionId}; expected round ${expected}`,
      { sessionId, roundNumber, expectedRound: expected }
    );
  }
}
