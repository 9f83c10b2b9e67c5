import Joi from 'joi';
import type { Request, Response, NextFunction } from 'express';
import { CLOSURE_STATUSES, IDENTIFIER_MAX_LENGTH } from './engine/types.js';

/**
 * Identifiers come from the voice platform and the load board, so they are
 * opaque strings rather than UUIDs.
 */
const identifier = (label: string) =>
  Joi.string()
    .trim()
    .min(1)
    .max(IDENTIFIER_MAX_LENGTH)
    .pattern(/^[A-Za-z0-9._:-]+$/)
    .messages({
      'string.empty': `${label} is required`,
      'string.max': `${label} cannot exceed ${IDENTIFIER_MAX_LENGTH} characters`,
      'string.pattern.base': `${label} may only contain letters, digits, ".", "_", ":" and "-"`,
      'any.required': `${label} is required`,
    });

/**
 * Validation schema for evaluating a carrier offer
 */
export const evaluateRoundSchema = Joi.object({
  loadId: identifier('Load ID').required(),
  carrierId: identifier('Carrier ID').allow(null).optional(),
  sessionId: identifier('Session ID').required(),
  // Range checks live in the service so they carry INVALID_OFFER / INVALID_ROUND codes
  carrierOffer: Joi.number().required().messages({
    'number.base': 'Carrier offer must be a number',
    'any.required': 'Carrier offer is required',
  }),
  roundNumber: Joi.number().integer().required().messages({
    'number.base': 'Round number must be a number',
    'number.integer': 'Round number must be an integer',
    'any.required': 'Round number is required',
  }),
});

/**
 * Validation schema for closing a session without a deal
 */
export const closeSessionSchema = Joi.object({
  status: Joi.string()
    .valid(...CLOSURE_STATUSES)
    .required()
    .messages({
      'any.only': 'Status must be either "ABANDONED" or "TIMEOUT"',
      'any.required': 'Status is required',
    }),
  reason: Joi.string().max(500).allow(null, '').optional(),
});

export const sessionIdSchema = Joi.object({
  sessionId: identifier('Session ID').required(),
});

export const loadIdSchema = Joi.object({
  loadId: identifier('Load ID').required(),
});

export const loadRoundsQuerySchema = Joi.object({
  page: Joi.number().integer().min(1).default(1),
  limit: Joi.number().integer().min(1).max(100).default(10),
});

export const priceBandQuerySchema = Joi.object({
  carrierId: identifier('Carrier ID').optional(),
});

/**
 * Middleware function to validate request body
 */
export const validateBody = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      return res.status(400).json({
        success: false,
        message: 'Validation error',
        errors: error.details.map((detail) => detail.message),
      });
    }

    req.body = value;
    next();
  };
};

/**
 * Middleware function to validate request params
 */
export const validateParams = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req.params, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      return res.status(400).json({
        success: false,
        message: 'Validation error',
        errors: error.details.map((detail) => detail.message),
      });
    }

    req.params = value;
    next();
  };
};

/**
 * Middleware function to validate query parameters
 */
export const validateQuery = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req.query, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      return res.status(400).json({
        success: false,
        message: 'Validation error',
        errors: error.details.map((detail) => detail.message),
      });
    }

    req.query = value;
    next();
  };
};
