export class CustomError extends Error {
  public statusCode: number;
  public details?: unknown;
  public code?: string;

  constructor(message: string, statusCode: number = 500, details?: unknown, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
    this.code = code;
    this.name = 'CustomError';
    Object.setPrototypeOf(this, CustomError.prototype);
  }
}

export class ValidationError extends CustomError {
  constructor(message: string, details?: unknown, code?: string) {
    super(message, 400, details, code);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found', code?: string) {
    super(message, 404, undefined, code);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends CustomError {
  constructor(message: string = 'Resource already exists', details?: unknown, code?: string) {
    super(message, 409, details, code);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * Negotiation error codes surfaced to callers in the `code` field of error responses.
 */
export const NegotiationErrorCode = {
  INVALID_ROUND: 'INVALID_ROUND',
  INVALID_PRICING: 'INVALID_PRICING',
  INVALID_OFFER: 'INVALID_OFFER',
  DUPLICATE_ROUND_CONFLICT: 'DUPLICATE_ROUND_CONFLICT',
  SESSION_LOAD_MISMATCH: 'SESSION_LOAD_MISMATCH',
  SESSION_ALREADY_CLOSED: 'SESSION_ALREADY_CLOSED',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  LOAD_NOT_FOUND: 'LOAD_NOT_FOUND',
} as const;

export type NegotiationErrorCode = (typeof NegotiationErrorCode)[keyof typeof NegotiationErrorCode];

export class InvalidRoundError extends ValidationError {
  constructor(message: string, details?: unknown) {
    super(message, details, NegotiationErrorCode.INVALID_ROUND);
    this.name = 'InvalidRoundError';
    Object.setPrototypeOf(this, InvalidRoundError.prototype);
  }
}

export class InvalidOfferError extends ValidationError {
  constructor(message: string, details?: unknown) {
    super(message, details, NegotiationErrorCode.INVALID_OFFER);
    this.name = 'InvalidOfferError';
    Object.setPrototypeOf(this, InvalidOfferError.prototype);
  }
}

/**
 * Malformed load pricing. Reported as 422: the request was well-formed but the
 * load it points at cannot be priced.
 */
export class InvalidPricingError extends CustomError {
  constructor(message: string, details?: unknown) {
    super(message, 422, details, NegotiationErrorCode.INVALID_PRICING);
    this.name = 'InvalidPricingError';
    Object.setPrototypeOf(this, InvalidPricingError.prototype);
  }
}

export class InvalidUrgencyError extends InvalidPricingError {
  constructor(urgency: unknown) {
    super(`Unknown urgency tier: ${String(urgency)}`, { urgency });
    this.name = 'InvalidUrgencyError';
    Object.setPrototypeOf(this, InvalidUrgencyError.prototype);
  }
}

export class DuplicateRoundConflictError extends ConflictError {
  constructor(sessionId: string, roundNumber: number, recordedOffer: number, submittedOffer: number) {
    super(
      `Round ${roundNumber} of session ${sessionId} was already recorded with a different offer`,
      { sessionId, roundNumber, recordedOffer, submittedOffer },
      NegotiationErrorCode.DUPLICATE_ROUND_CONFLICT
    );
    this.name = 'DuplicateRoundConflictError';
    Object.setPrototypeOf(this, DuplicateRoundConflictError.prototype);
  }
}

export default CustomError;
