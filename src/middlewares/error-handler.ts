import { Request, Response, NextFunction } from 'express';
import { BaseError as SequelizeBaseError } from 'sequelize';
import logger from '../config/logger.js';
import { CustomError, NotFoundError } from '../utils/custom-error.js';

interface RequestBody {
  [key: string]: unknown;
}

interface ErrorWithDetails extends Error {
  statusCode?: number;
  status?: number;
  type?: string;
  code?: string;
  details?: unknown;
  original?: {
    message: string;
    code?: string;
    sql?: string;
  };
}

interface ErrorLogData {
  error: {
    message: string;
    name: string;
    statusCode: number;
    code?: string;
    stack?: string;
    details?: unknown;
    originalError?: {
      message: string;
      code?: string;
      sql?: string;
    };
  };
  request: {
    method: string;
    url: string;
    path: string;
    params: Record<string, string>;
    query: unknown;
    body: RequestBody | undefined;
    headers: {
      'content-type'?: string;
      'user-agent'?: string;
    };
    ip: string | undefined;
  };
  timestamp: string;
}

interface ErrorResponse {
  message: string;
  code?: string;
  details?: unknown;
}

const sanitizeRequestBody = (body: RequestBody | undefined): RequestBody | undefined => {
  if (!body || typeof body !== 'object') return undefined;
  const sanitized = { ...body };
  const sensitiveFields = ['password', 'apiKey', 'token', 'authorization'];
  sensitiveFields.forEach((field) => {
    if (sanitized[field]) {
      sanitized[field] = '[REDACTED]';
    }
  });
  return sanitized;
};

/**
 * Resolve the HTTP status for an error. Domain errors carry their own; body
 * parser failures carry `status`; everything else is a 500.
 */
const resolveStatusCode = (err: ErrorWithDetails): number => {
  if (err instanceof CustomError) return err.statusCode;
  if (err.type === 'entity.parse.failed') return 400;
  if (typeof err.statusCode === 'number') return err.statusCode;
  if (typeof err.status === 'number' && err.status >= 400 && err.status < 600) return err.status;
  return 500;
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.originalUrl} not found`));
};

export const errorHandler = (
  err: ErrorWithDetails,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = resolveStatusCode(err);
  const code = err instanceof CustomError ? err.code : undefined;

  // Database and unexpected failures are not echoed to the caller
  const exposeMessage = statusCode < 500 && !(err instanceof SequelizeBaseError);
  const response: ErrorResponse = {
    message: exposeMessage && err.message ? err.message : 'Internal Server Error',
  };

  if (code) {
    response.code = code;
  }
  if (exposeMessage && err.details) {
    response.details = err.details;
  }

  const errorLog: ErrorLogData = {
    error: {
      message: err.message || 'Internal Server Error',
      name: err.name || 'Error',
      statusCode,
      code,
      stack: err.stack,
      details: err.details,
      originalError: err.original
        ? {
            message: err.original.message,
            code: err.original.code,
            sql: err.original.sql,
          }
        : undefined,
    },
    request: {
      method: req.method,
      url: req.originalUrl,
      path: req.path,
      params: req.params,
      query: req.query,
      body: sanitizeRequestBody(req.body),
      headers: {
        'content-type': req.headers['content-type'],
        'user-agent': req.headers['user-agent'],
      },
      ip: req.ip || req.socket.remoteAddress,
    },
    timestamp: new Date().toISOString(),
  };

  if (statusCode >= 500) {
    logger.error('API Error (5xx):', errorLog);
  } else {
    logger.warn('API Error (4xx):', errorLog);
  }

  res.status(statusCode).json(response);
};
